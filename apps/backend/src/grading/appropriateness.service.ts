import { Injectable } from '@nestjs/common';
import { analysedText, Content } from '../content/content.types';
import {
  isCetLevel,
  isJlptLevel,
  LanguageFamily,
  levelsOf,
  matchLanguage,
  resolveLanguageFamily,
} from '../content/content-language';
import { clamp } from '../common/utils/clamp';
import { LookupService } from '../lookup/lookup.service';
import type { MinMax } from '../lookup/lookup.types';
import { GradingService } from './grading.service';
import { characterProfile, englishTextStats } from '../common/utils/text-stats';

const UNKNOWN_LEVEL_SCORE = 0.5;
const DEFAULT_VOCABULARY_MATCH = 0.7;
// Word lists this short say nothing about a level.
const MIN_VOCABULARY_LIST_SIZE = 10;

const LEVEL_DISTANCE_STEP: Record<LanguageFamily, number> = {
  english: 0.3,
  japanese: 0.2,
  other: 0,
};

/**
 * Score derived from how many steps apart two levels of the same family are.
 * Levels outside the family score 0.5.
 */
export function levelDistanceScore(family: LanguageFamily, assignedLevel: string, targetLevel: string): number {
  const levels = levelsOf(family);
  const assignedIndex = levels.indexOf(assignedLevel);
  const targetIndex = levels.indexOf(targetLevel);
  if (assignedIndex < 0 || targetIndex < 0) {
    return UNKNOWN_LEVEL_SCORE;
  }
  return Math.max(0, 1 - Math.abs(assignedIndex - targetIndex) * LEVEL_DISTANCE_STEP[family]);
}

function rangeMatch(value: number, range: MinMax, belowSpan: number, aboveSpan: number): number {
  if (value < range.min) {
    return Math.max(0.3, 1 - (range.min - value) / belowSpan);
  }
  if (value > range.max) {
    return Math.max(0.3, 1 - (value - range.max) / aboveSpan);
  }
  return 1;
}

@Injectable()
export class AppropriatenessService {
  constructor(
    private readonly grading: GradingService,
    private readonly lookup: LookupService,
  ) {}

  /**
   * How suitable the content is for `targetLevel`.
   * A level from the other language's taxonomy scores exactly 0 without grading.
   */
  validateLevelAppropriateness(content: Content, targetLevel: string): number {
    const family = resolveLanguageFamily(content.language);
    if (family === 'english' && !isCetLevel(targetLevel)) {
      return 0;
    }
    if (family === 'japanese' && !isJlptLevel(targetLevel)) {
      return 0;
    }

    const result = this.grading.gradeContentLevel(content);
    if (Object.hasOwn(result.levelScores, targetLevel)) {
      return result.levelScores[targetLevel];
    }
    return levelDistanceScore(family, result.assignedLevel, targetLevel);
  }

  /** How well the content matches the level it claims for itself. */
  assessClaimedLevelAccuracy(content: Content): number {
    return matchLanguage(content.language, {
      english: () => this.englishAccuracy(content),
      japanese: () => this.japaneseAccuracy(content),
      other: () => UNKNOWN_LEVEL_SCORE,
    });
  }

  private englishAccuracy(content: Content): number {
    const stats = englishTextStats(analysedText(content).toLowerCase());
    if (stats.wordCount === 0) {
      return UNKNOWN_LEVEL_SCORE;
    }

    const level = isCetLevel(content.difficultyLevel) ? content.difficultyLevel : 'CET-5';
    const criteria = this.lookup.tables.cetCriteria[level];

    const wordMatch = rangeMatch(stats.avgWordLength, criteria.wordLengthRange, 2, 3);
    const sentenceMatch = rangeMatch(stats.avgSentenceLength, criteria.sentenceLengthRange, 5, 8);

    let vocabularyMatch = DEFAULT_VOCABULARY_MATCH;
    const levelWords = new Set(this.lookup.vocabularyFor(content.difficultyLevel));
    if (levelWords.size > MIN_VOCABULARY_LIST_SIZE) {
      const matching = stats.words.filter((word) => levelWords.has(word)).length;
      vocabularyMatch = Math.min(1, matching / stats.wordCount + 0.3);
    }

    return clamp(wordMatch * 0.4 + sentenceMatch * 0.3 + vocabularyMatch * 0.3, 0.1, 1);
  }

  private japaneseAccuracy(content: Content): number {
    const profile = characterProfile(content.body);
    if (profile.total === 0) {
      return 0;
    }
    const expected = isJlptLevel(content.difficultyLevel)
      ? this.lookup.tables.jlptCriteria[content.difficultyLevel].kanjiRatio
      : this.lookup.tables.defaultKanjiRatio;

    return Math.max(0, 1 - Math.abs(profile.kanjiRatio - expected) * 2);
  }
}
