import { Injectable } from '@nestjs/common';
import { Content } from '../content/content.types';
import {
  CetLevel,
  isCetLevel,
  isJlptLevel,
  JlptLevel,
  resolveLanguageFamily,
} from '../content/content-language';
import { QualityMetrics } from './grading.types';
import { MetricsCalculatorService } from './metrics-calculator.service';

export const UNSUPPORTED_LANGUAGE_RECOMMENDATION =
  'Content language is not supported, no level-specific recommendations are available';

type MetricRule = {
  metric: keyof QualityMetrics;
  below: number;
  message: string;
};

// Order matters: suggestions are emitted in this sequence.
const METRIC_RULES: MetricRule[] = [
  {
    metric: 'vocabularyAppropriateness',
    below: 0.7,
    message: 'Adjust vocabulary difficulty to better match the target level',
  },
  {
    metric: 'grammarComplexity',
    below: 0.6,
    message: 'Increase the complexity and variety of grammatical structures',
  },
  {
    metric: 'contentStructure',
    below: 0.7,
    message: 'Improve the structure and organisation of the content',
  },
  {
    metric: 'educationalValue',
    below: 0.8,
    message: 'Strengthen the educational value with more explicit learning points',
  },
  {
    metric: 'readability',
    below: 0.6,
    message: 'Improve readability by simplifying complex sentences',
  },
];

const CET_RECOMMENDATIONS: Record<CetLevel, string[]> = {
  'CET-4': [
    'Use more basic vocabulary and simple sentence patterns',
    'Add more content about everyday life',
  ],
  'CET-5': [
    'Balance basic and intermediate vocabulary',
    'Add more academic and workplace topics',
  ],
  'CET-6': [
    'Use more advanced vocabulary and complex grammatical structures',
    'Add abstract concepts and in-depth analysis',
  ],
};

const JLPT_BEGINNER = [
  'Reduce kanji usage and raise the proportion of hiragana',
  'Use more everyday conversational expressions',
];
const JLPT_ADVANCED = [
  'Increase the use of kanji and complex grammar',
  'Add more formal and written expressions',
];

const JLPT_RECOMMENDATIONS: Record<JlptLevel, string[]> = {
  N5: JLPT_BEGINNER,
  N4: JLPT_BEGINNER,
  N3: ['Balance the use of kanji and kana', 'Add more intermediate grammar expressions'],
  N2: JLPT_ADVANCED,
  N1: JLPT_ADVANCED,
};

@Injectable()
export class RecommendationsService {
  constructor(private readonly metricsCalculator: MetricsCalculatorService) {}

  generateImprovementRecommendations(content: Content, targetLevel: string): string[] {
    const metrics = this.metricsCalculator.computeMetrics(content);
    return [...this.metricRecommendations(metrics), ...this.levelRecommendations(content.language, targetLevel)];
  }

  metricRecommendations(metrics: QualityMetrics): string[] {
    return METRIC_RULES.filter((rule) => metrics[rule.metric] < rule.below).map((rule) => rule.message);
  }

  /** Suggestions for a level of the content's own family; anything else yields none. */
  levelRecommendations(language: string, level: string): string[] {
    const family = resolveLanguageFamily(language);
    if (family === 'english' && isCetLevel(level)) {
      return [...CET_RECOMMENDATIONS[level]];
    }
    if (family === 'japanese' && isJlptLevel(level)) {
      return [...JLPT_RECOMMENDATIONS[level]];
    }
    return [];
  }
}
