import { UnsupportedExportFormatError } from '../common/errors';
import type { BatchGradingEntry } from '../batch/batch.types';
import { isExportFormat, ResultExporterService } from './result-exporter.service';

const metrics = {
  vocabularyAppropriateness: 1,
  grammarComplexity: 0.2,
  contentStructure: 0.6,
  educationalValue: 0.3,
  authenticity: 0.8,
  culturalRelevance: 0.7,
  readability: 1,
  engagementFactor: 0,
};

const buildEntry = (overrides: Partial<BatchGradingEntry> = {}): BatchGradingEntry => ({
  contentId: 'content-1',
  language: 'english',
  grading: {
    assignedLevel: 'CET-4',
    confidenceScore: 1,
    levelScores: { 'CET-4': 1 },
    qualityMetrics: metrics,
    recommendations: [],
  },
  quality: {
    educationalValue: 0.3,
    difficultyMatch: 0.8097058824,
    sourceReliability: 0.9,
    contentFreshness: 0.8,
    overallScore: 0.6674264706,
  },
  admission: { admitted: false, tier: 'poor' },
  claimedLevelAccuracy: 0.8097058824,
  vocabulary: [],
  ...overrides,
});

describe('ResultExporterService', () => {
  const exporter = new ResultExporterService();

  it('should export a pretty printed json array', () => {
    const entry = buildEntry();

    const output = exporter.export([entry], 'json');

    expect(output).toBe(JSON.stringify([entry], null, 2));
    expect(JSON.parse(output)).toEqual([entry]);
  });

  it('should export one json document per line', () => {
    const first = buildEntry();
    const second = buildEntry({ contentId: 'content-2' });

    const lines = exporter.export([first, second], 'jsonl').split('\n');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? '')).toEqual(second);
  });

  it('should export csv rows with rounded scores', () => {
    const output = exporter.export(
      [
        buildEntry({
          vocabulary: [
            { word: 'travel', language: 'english', sourceUrl: 'https://example.org/lesson' },
          ],
        }),
      ],
      'csv',
    );

    expect(output.split('\n')).toEqual([
      'contentId,language,assignedLevel,confidence,overallScore,admitted,tier,vocabularyCount',
      'content-1,english,CET-4,1,0.6674,false,poor,1',
    ]);
  });

  it('should quote csv values containing separators or quotes', () => {
    const output = exporter.export([buildEntry({ contentId: 'lesson "a", part 1' })], 'csv');

    expect(output.split('\n')[1]).toBe('"lesson ""a"", part 1",english,CET-4,1,0.6674,false,poor,0');
  });

  it('should accept format names regardless of case', () => {
    expect(exporter.export([], 'JSONL')).toBe('');
    expect(exporter.export([], ' json ')).toBe('[]');
  });

  it('should reject unknown formats', () => {
    expect(() => exporter.export([buildEntry()], 'xml')).toThrow(UnsupportedExportFormatError);
    expect(() => exporter.export([buildEntry()], 'xml')).toThrow(
      'Unsupported export format "xml", expected one of: json, jsonl, csv',
    );
  });

  it('should recognise supported format names', () => {
    expect(isExportFormat('csv')).toBe(true);
    expect(isExportFormat('yaml')).toBe(false);
  });
});
