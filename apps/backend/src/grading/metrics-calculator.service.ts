import { Injectable } from '@nestjs/common';
import { analysedText, Content, ContentType } from '../content/content.types';
import { isCetLevel, isJlptLevel, matchLanguage } from '../content/content-language';
import { clamp01 } from '../common/utils/clamp';
import { LookupService } from '../lookup/lookup.service';
import type { GrammarPattern } from '../lookup/lookup.types';
import { QualityMetrics } from './grading.types';
import {
  characterProfile,
  countMatches,
  countPresent,
  englishTextStats,
  japaneseRuns,
  splitSentences,
} from '../common/utils/text-stats';

// Placeholders until a real authenticity / cultural model exists.
const AUTHENTICITY_SCORE = 0.8;
const CULTURAL_RELEVANCE_SCORE = 0.7;

const GENERIC_METRICS: Readonly<QualityMetrics> = {
  vocabularyAppropriateness: 0.5,
  grammarComplexity: 0.5,
  contentStructure: 0.6,
  educationalValue: 0.6,
  authenticity: 0.5,
  culturalRelevance: 0.5,
  readability: 0.6,
  engagementFactor: 0.5,
};

const CONTENT_TYPE_EDUCATIONAL_BASE: Partial<Record<ContentType, number>> = {
  [ContentType.EXERCISE]: 0.3,
  [ContentType.ARTICLE]: 0.2,
  [ContentType.DIALOGUE]: 0.2,
  [ContentType.NEWS]: 0.1,
  [ContentType.CULTURAL]: 0.1,
};

const LIST_MARKER_REGEX = /[1-9]\.|•|\*|-/;
const NO_PATTERN_COMPLEXITY = 0.1;

type PatternTally = {
  matched: number;
  total: number;
};

@Injectable()
export class MetricsCalculatorService {
  constructor(private readonly lookup: LookupService) {}

  computeMetrics(content: Content): QualityMetrics {
    return matchLanguage(content.language, {
      english: () => this.englishMetrics(content),
      japanese: () => this.japaneseMetrics(content),
      other: () => ({ ...GENERIC_METRICS }),
    });
  }

  private englishMetrics(content: Content): QualityMetrics {
    const text = analysedText(content);
    return {
      vocabularyAppropriateness: this.englishVocabulary(text, content.difficultyLevel),
      grammarComplexity: this.englishGrammar(text),
      contentStructure: this.contentStructure(content),
      educationalValue: this.educationalValue(content),
      authenticity: AUTHENTICITY_SCORE,
      culturalRelevance: CULTURAL_RELEVANCE_SCORE,
      readability: this.englishReadability(text),
      engagementFactor: this.engagementFactor(content),
    };
  }

  private japaneseMetrics(content: Content): QualityMetrics {
    const text = analysedText(content);
    return {
      vocabularyAppropriateness: this.japaneseVocabulary(text, content.difficultyLevel),
      grammarComplexity: this.japaneseGrammar(text),
      contentStructure: this.contentStructure(content),
      educationalValue: this.educationalValue(content),
      authenticity: AUTHENTICITY_SCORE,
      culturalRelevance: CULTURAL_RELEVANCE_SCORE,
      readability: this.japaneseReadability(text),
      engagementFactor: this.engagementFactor(content),
    };
  }

  private englishVocabulary(text: string, claimedLevel: string | undefined): number {
    const words = englishTextStats(text.toLowerCase()).words;
    if (words.length === 0) {
      return 0;
    }

    const { tables } = this.lookup;
    const avg = words.reduce((sum, word) => sum + word.length, 0) / words.length;
    const range = isCetLevel(claimedLevel)
      ? tables.cetCriteria[claimedLevel].wordLengthRange
      : tables.defaultWordLengthRange;

    let score: number;
    if (avg < range.min) {
      score = Math.max(0.3, 1 - (range.min - avg) / 2);
    } else if (avg > range.max) {
      score = Math.max(0.3, 1 - (avg - range.max) / 3);
    } else {
      score = 1;
    }

    const keywords = tables.keywords.english;
    if (claimedLevel === 'CET-6' && words.some((word) => keywords.advanced.includes(word))) {
      score += 0.3;
    } else if (claimedLevel === 'CET-4' && words.some((word) => keywords.simple.includes(word))) {
      score += 0.2;
    }

    const educationalCount = words.filter((word) => keywords.educational.includes(word)).length;
    score += Math.min(0.2, (educationalCount / words.length) * 2);

    return clamp01(score);
  }

  private japaneseVocabulary(text: string, claimedLevel: string | undefined): number {
    if (japaneseRuns(text).length === 0) {
      return 0;
    }
    const profile = characterProfile(text);
    const { tables } = this.lookup;
    const expected = isJlptLevel(claimedLevel)
      ? tables.jlptCriteria[claimedLevel]
      : tables.jlptCriteria.N3;

    const kanjiScore = Math.max(0, 1 - Math.abs(profile.kanjiRatio - expected.kanjiRatio) * 3);
    const hiraganaScore = Math.max(
      0,
      1 - Math.abs(profile.hiraganaRatio - expected.hiraganaRatio) * 2,
    );
    const educationalPresent = tables.keywords.japanese.educational.filter((pattern) =>
      text.includes(pattern),
    ).length;

    return clamp01(kanjiScore * 0.6 + hiraganaScore * 0.4 + Math.min(0.2, educationalPresent / 10));
  }

  private englishGrammar(text: string): number {
    const tally = this.tallyPatterns(text, this.lookup.tables.grammarPatterns.english);
    if (tally.matched === 0) {
      return NO_PATTERN_COMPLEXITY;
    }

    const stats = englishTextStats(text);
    // Sentences up to six words long add nothing
    const lengthContribution =
      stats.sentenceCount > 0 ? Math.min(0.5, Math.max(0, stats.avgSentenceLength - 6) / 20) : 0;

    return Math.min(1, (tally.total + lengthContribution) / Math.max(1, tally.matched * 0.5));
  }

  private japaneseGrammar(text: string): number {
    const tally = this.tallyPatterns(text, this.lookup.tables.grammarPatterns.japanese);
    if (tally.matched === 0) {
      return NO_PATTERN_COMPLEXITY;
    }

    const profile = characterProfile(text);
    const kanjiContribution =
      splitSentences(text, 'japanese').length > 0 ? profile.kanjiRatio * 0.3 : 0;

    return Math.min(1, (tally.total + kanjiContribution) / Math.max(1, tally.matched * 0.4));
  }

  private tallyPatterns(text: string, patterns: readonly GrammarPattern[]): PatternTally {
    return patterns.reduce<PatternTally>(
      (tally, { pattern, weight }) => {
        const occurrences = countMatches(text, pattern);
        if (occurrences === 0) {
          return tally;
        }
        return {
          matched: tally.matched + 1,
          total: tally.total + weight * Math.min(occurrences, 3),
        };
      },
      { matched: 0, total: 0 },
    );
  }

  private contentStructure(content: Content): number {
    const { body } = content;
    let score = 0;

    if (content.title.trim().length > 5) {
      score += 0.2;
    }
    if (body.length >= 100 && body.length <= 2000) {
      score += 0.3;
    } else if (body.length > 50) {
      score += 0.2;
    }
    if (splitSentences(body, 'mixed').length >= 3) {
      score += 0.2;
    }
    if (body.split('\n\n').length > 1) {
      score += 0.1;
    }
    if (LIST_MARKER_REGEX.test(body)) {
      score += 0.1;
    }
    if (countPresent(body, this.lookup.tables.keywords.structureMarkers) > 0) {
      score += 0.1;
    }

    return Math.min(1, score);
  }

  private educationalValue(content: Content): number {
    const text = analysedText(content);
    const { keywords } = this.lookup.tables;
    const keywordScore = Math.min(0.4, countPresent(text, keywords.educationalKeywords) / 10);
    const explanationScore = Math.min(0.3, countPresent(text, keywords.explanatoryConnectives) / 5);
    const typeScore = CONTENT_TYPE_EDUCATIONAL_BASE[content.contentType] ?? 0;

    return Math.min(1, keywordScore + explanationScore + typeScore);
  }

  private englishReadability(text: string): number {
    const stats = englishTextStats(text);
    if (stats.sentenceCount === 0 || stats.wordCount === 0) {
      return 0;
    }
    const sentenceScore = clamp01(1 - (stats.avgSentenceLength - 10) / 20);
    const wordScore = clamp01(1 - (stats.avgWordLength - 4) / 6);
    return (sentenceScore + wordScore) / 2;
  }

  private japaneseReadability(text: string): number {
    const profile = characterProfile(text);
    if (profile.total === 0) {
      return 0;
    }
    return profile.hiraganaRatio * 0.6 + (1 - Math.abs(profile.kanjiRatio - 0.3)) * 0.4;
  }

  private engagementFactor(content: Content): number {
    const text = analysedText(content);
    const { keywords } = this.lookup.tables;
    let score = Math.min(0.4, countPresent(text, keywords.engagingElements) / 5);
    score += Math.min(0.3, countPresent(text, keywords.interactivePhrases) / 3);

    if (/[?？]/.test(content.body)) {
      score += 0.15;
    }
    if (/[!！]/.test(content.body)) {
      score += 0.15;
    }

    return Math.min(1, score);
  }
}
