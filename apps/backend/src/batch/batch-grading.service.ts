import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate as validateRecord } from 'class-validator';
import { ValidationError, ValidationField } from '../common/errors';
import { LoggerService } from '../common/logger';
import { Content } from '../content/content.types';
import { ContentDto } from '../content/dto/content.dto';
import { GradingService } from '../grading/grading.service';
import { QualityScoreService } from '../grading/quality-score.service';
import { VocabularyService } from '../vocabulary/vocabulary.service';
import { BatchGradingEntry } from './batch.types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Injectable()
export class BatchGradingService {
  constructor(
    private readonly grading: GradingService,
    private readonly qualityScore: QualityScoreService,
    private readonly vocabulary: VocabularyService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext(BatchGradingService.name);
  }

  /**
   * Validates every raw record before grading any of them, so a bad batch fails as a whole
   * with all field errors reported together.
   */
  async gradeBatch(records: unknown): Promise<BatchGradingEntry[]> {
    const contents = await this.toContents(records);
    const entries = contents.map((content) => this.gradeOne(content));

    const admitted = entries.filter((entry) => entry.admission.admitted).length;
    this.logger.info(`Graded ${entries.length} items, ${admitted} admitted`);
    return entries;
  }

  gradeOne(content: Content): BatchGradingEntry {
    this.logger.setContentId(content.contentId);
    try {
      const grading = this.grading.gradeContentLevel(content);
      const quality = this.qualityScore.assessContentQuality(content);
      const admission = this.qualityScore.decideAdmission(quality);
      const vocabulary = this.vocabulary.extractLevelVocabulary(content);

      this.logger.debug('Content graded', {
        assignedLevel: grading.assignedLevel,
        overallScore: quality.overallScore,
        admitted: admission.admitted,
        vocabularyCount: vocabulary.length,
      });

      return {
        contentId: content.contentId,
        language: content.language,
        grading,
        quality,
        admission,
        // The quality score already carries the claimed-level accuracy as its difficulty match.
        claimedLevelAccuracy: quality.difficultyMatch,
        vocabulary,
      };
    } finally {
      this.logger.setContentId(undefined);
    }
  }

  private async toContents(records: unknown): Promise<Content[]> {
    if (!Array.isArray(records)) {
      throw new ValidationError('Batch input must be an array of content records');
    }

    const items: unknown[] = records;
    const fields: ValidationField[] = [];
    const contents: Content[] = [];

    for (const [index, record] of items.entries()) {
      if (!isRecord(record)) {
        fields.push({ field: 'record', message: 'record must be an object', index });
        continue;
      }

      const dto = plainToInstance(ContentDto, record);
      const errors = await validateRecord(dto);
      if (errors.length > 0) {
        for (const error of errors) {
          for (const message of Object.values(error.constraints ?? {})) {
            fields.push({ field: error.property, message, index });
          }
        }
        continue;
      }

      contents.push({
        contentId: dto.contentId,
        title: dto.title,
        body: dto.body,
        language: dto.language,
        difficultyLevel: dto.difficultyLevel,
        contentType: dto.contentType,
        sourceUrl: dto.sourceUrl ?? '',
        tags: dto.tags ?? [],
      });
    }

    if (fields.length > 0) {
      throw new ValidationError(`${fields.length} invalid field(s) in batch input`, fields);
    }
    return contents;
  }
}
