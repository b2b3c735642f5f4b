import { Injectable } from '@nestjs/common';
import type { BatchGradingEntry } from '../batch/batch.types';
import { UnsupportedExportFormatError } from '../common/errors';

export const EXPORT_FORMATS = ['json', 'jsonl', 'csv'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const isExportFormat = (value: string): value is ExportFormat =>
  EXPORT_FORMATS.some((format) => format === value);

const CSV_HEADERS = [
  'contentId',
  'language',
  'assignedLevel',
  'confidence',
  'overallScore',
  'admitted',
  'tier',
  'vocabularyCount',
];

const round4 = (value: number): number => Math.round(value * 10000) / 10000;

@Injectable()
export class ResultExporterService {
  export(entries: readonly BatchGradingEntry[], format: string): string {
    const normalized = format.trim().toLowerCase();
    if (!isExportFormat(normalized)) {
      throw new UnsupportedExportFormatError(format, EXPORT_FORMATS);
    }

    switch (normalized) {
      case 'json':
        return JSON.stringify(entries, null, 2);
      case 'jsonl':
        return entries.map((entry) => JSON.stringify(entry)).join('\n');
      case 'csv':
        return this.toCsv(entries);
    }
  }

  private toCsv(entries: readonly BatchGradingEntry[]): string {
    const rows: Array<Array<string | number | null>> = [CSV_HEADERS];

    for (const entry of entries) {
      rows.push([
        entry.contentId,
        entry.language,
        entry.grading.assignedLevel,
        round4(entry.grading.confidenceScore),
        round4(entry.quality.overallScore),
        entry.admission.admitted ? 'true' : 'false',
        entry.admission.tier,
        entry.vocabulary.length,
      ]);
    }

    return rows.map((row) => this.toCsvRow(row)).join('\n');
  }

  private toCsvRow(values: Array<string | number | null>): string {
    return values
      .map((value) => {
        if (value === null) {
          return '';
        }
        const text = String(value);
        if (text.includes('"') || text.includes(',') || text.includes('\n')) {
          return `"${text.replace(/"/g, '""')}"`;
        }
        return text;
      })
      .join(',');
  }
}
