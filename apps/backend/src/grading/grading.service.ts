import { Injectable, Logger } from '@nestjs/common';
import { analysedText, Content } from '../content/content.types';
import {
  CET_LEVELS,
  CetLevel,
  JLPT_LEVELS,
  JlptLevel,
  matchLanguage,
} from '../content/content-language';
import { clamp, clamp01 } from '../common/utils/clamp';
import { LookupService } from '../lookup/lookup.service';
import { LevelGradingResult, QualityMetrics, UNSUPPORTED_LEVEL } from './grading.types';
import { MetricsCalculatorService } from './metrics-calculator.service';
import {
  RecommendationsService,
  UNSUPPORTED_LANGUAGE_RECOMMENDATION,
} from './recommendations.service';
import { CharacterProfile, characterProfile, EnglishTextStats, englishTextStats } from '../common/utils/text-stats';

const MIN_LEVEL_SCORE = 0.3;
const UNSUPPORTED_CONFIDENCE = 0.5;

type LevelSelection = {
  assignedLevel: string;
  confidenceScore: number;
  levelScores: Record<string, number>;
};

@Injectable()
export class GradingService {
  private readonly logger = new Logger(GradingService.name);

  constructor(
    private readonly metricsCalculator: MetricsCalculatorService,
    private readonly recommendations: RecommendationsService,
    private readonly lookup: LookupService,
  ) {}

  /**
   * Scores every level of the content's own taxonomy and assigns the best one.
   * Content in an unsupported language gets a neutral `intermediate` result.
   */
  gradeContentLevel(content: Content): LevelGradingResult {
    const result = matchLanguage(content.language, {
      english: () => this.gradeEnglish(content),
      japanese: () => this.gradeJapanese(content),
      other: () => this.gradeUnsupported(content),
    });

    this.logger.debug(
      `Graded content ${content.contentId}: ${result.assignedLevel} (confidence ${result.confidenceScore.toFixed(3)})`,
    );
    return result;
  }

  private gradeEnglish(content: Content): LevelGradingResult {
    const metrics = this.metricsCalculator.computeMetrics(content);
    const stats = englishTextStats(analysedText(content));
    const selection = this.selectLevel(CET_LEVELS, (level) => this.cetLevelScore(stats, level, metrics));

    return {
      ...selection,
      qualityMetrics: metrics,
      recommendations: this.recommendations.levelRecommendations(content.language, selection.assignedLevel),
    };
  }

  private gradeJapanese(content: Content): LevelGradingResult {
    const metrics = this.metricsCalculator.computeMetrics(content);
    const profile = characterProfile(analysedText(content));
    const selection = this.selectLevel(JLPT_LEVELS, (level) => this.jlptLevelScore(profile, level, metrics));

    return {
      ...selection,
      qualityMetrics: metrics,
      recommendations: this.recommendations.levelRecommendations(content.language, selection.assignedLevel),
    };
  }

  private gradeUnsupported(content: Content): LevelGradingResult {
    this.logger.warn(`Unsupported language "${content.language}" for content ${content.contentId}`);
    return {
      assignedLevel: UNSUPPORTED_LEVEL,
      confidenceScore: UNSUPPORTED_CONFIDENCE,
      levelScores: { [UNSUPPORTED_LEVEL]: UNSUPPORTED_CONFIDENCE },
      qualityMetrics: this.metricsCalculator.computeMetrics(content),
      recommendations: [UNSUPPORTED_LANGUAGE_RECOMMENDATION],
    };
  }

  /** First level with the highest score wins; a winner under the floor is raised and written back. */
  private selectLevel<L extends string>(
    levels: readonly L[],
    scoreFor: (level: L) => number,
  ): LevelSelection {
    const levelScores: Record<string, number> = {};
    let assignedLevel = levels[0];
    let best = Number.NEGATIVE_INFINITY;

    for (const level of levels) {
      const score = scoreFor(level);
      levelScores[level] = score;
      if (score > best) {
        best = score;
        assignedLevel = level;
      }
    }

    let confidenceScore = best;
    if (confidenceScore < MIN_LEVEL_SCORE) {
      confidenceScore = Math.max(MIN_LEVEL_SCORE, confidenceScore + 0.1);
      levelScores[assignedLevel] = confidenceScore;
    }

    return { assignedLevel, confidenceScore, levelScores };
  }

  private cetLevelScore(stats: EnglishTextStats, level: CetLevel, metrics: QualityMetrics): number {
    if (stats.wordCount === 0) {
      return MIN_LEVEL_SCORE;
    }

    const criteria = this.lookup.tables.cetCriteria[level];
    const complexity = metrics.grammarComplexity;

    const wordLengthMatch = clamp01(1 - Math.abs(stats.avgWordLength - criteria.targetWordLength) / 3);
    const sentenceLengthMatch = clamp01(
      1 - Math.abs(stats.avgSentenceLength - criteria.targetSentenceLength) / 10,
    );
    const complexityMatch = clamp01(1 - Math.abs(complexity - criteria.targetComplexity));
    const levelMatch = wordLengthMatch * 0.3 + sentenceLengthMatch * 0.3 + complexityMatch * 0.4;

    const base =
      metrics.vocabularyAppropriateness * 0.4 + metrics.readability * 0.3 + metrics.educationalValue * 0.3;

    let boost = 0;
    if (level === 'CET-4' && complexity < 0.4) {
      boost += 0.15;
    } else if (level === 'CET-6' && complexity > 0.6) {
      boost += 0.15;
    } else if (level === 'CET-5' && complexity >= 0.3 && complexity <= 0.7) {
      boost += 0.1;
    }
    if (metrics.vocabularyAppropriateness > 0.7) {
      boost += 0.1;
    }

    return clamp(base * 0.4 + levelMatch * 0.6 + boost, MIN_LEVEL_SCORE, 1);
  }

  private jlptLevelScore(profile: CharacterProfile, level: JlptLevel, metrics: QualityMetrics): number {
    if (profile.total === 0) {
      return MIN_LEVEL_SCORE;
    }

    const criteria = this.lookup.tables.jlptCriteria[level];
    const { kanjiRatio, hiraganaRatio } = profile;

    const kanjiMatch = clamp01(1 - Math.abs(kanjiRatio - criteria.kanjiRatio) * 2);
    const complexityMatch = clamp01(1 - Math.abs(metrics.grammarComplexity - criteria.targetComplexity));
    const levelMatch = kanjiMatch * 0.4 + complexityMatch * 0.4 + metrics.vocabularyAppropriateness * 0.2;

    const base = metrics.authenticity * 0.4 + metrics.readability * 0.3 + metrics.educationalValue * 0.3;

    let boost = 0;
    if (level === 'N5' && kanjiRatio < 0.15 && hiraganaRatio > 0.6) {
      boost += 0.15;
    } else if (level === 'N1' && kanjiRatio > 0.4) {
      boost += 0.15;
    } else if ((level === 'N2' || level === 'N3') && kanjiRatio >= 0.2 && kanjiRatio <= 0.4) {
      boost += 0.1;
    }
    if (metrics.vocabularyAppropriateness > 0.7) {
      boost += 0.1;
    }

    return clamp(base * 0.4 + levelMatch * 0.6 + boost, MIN_LEVEL_SCORE, 1);
  }
}
