import { LookupService } from '../lookup/lookup.service';
import {
  advancedEnglish,
  beginnerEnglish,
  beginnerJapanese,
  buildContent,
  emptyEnglish,
} from '../test-support/content.fixtures';
import { GradingService } from './grading.service';
import { MetricsCalculatorService } from './metrics-calculator.service';
import { QualityMetrics } from './grading.types';
import { RecommendationsService, UNSUPPORTED_LANGUAGE_RECOMMENDATION } from './recommendations.service';

describe('GradingService', () => {
  let gradingService: GradingService;

  beforeEach(() => {
    const lookup = new LookupService();
    const metricsCalculator = new MetricsCalculatorService(lookup);
    gradingService = new GradingService(
      metricsCalculator,
      new RecommendationsService(metricsCalculator),
      lookup,
    );
  });

  describe('gradeContentLevel', () => {
    it('should assign CET-4 to a short beginner text', () => {
      const result = gradingService.gradeContentLevel(beginnerEnglish);

      expect(result.assignedLevel).toBe('CET-4');
      expect(result.confidenceScore).toBe(1);
      expect(Object.keys(result.levelScores)).toEqual(['CET-4', 'CET-5', 'CET-6']);
      expect(result.levelScores['CET-5']).toBeCloseTo(0.67215, 5);
      expect(result.levelScores['CET-6']).toBeCloseTo(0.512, 10);
      expect(result.qualityMetrics.grammarComplexity).toBeLessThan(0.3);
      expect(result.recommendations).toEqual([
        'Use more basic vocabulary and simple sentence patterns',
        'Add more content about everyday life',
      ]);
    });

    it('should assign CET-6 to a dense academic text', () => {
      const result = gradingService.gradeContentLevel(advancedEnglish);

      expect(result.assignedLevel).toBe('CET-6');
      expect(result.confidenceScore).toBeCloseTo(0.89376, 5);
      expect(result.levelScores['CET-4']).toBeCloseTo(0.42682, 5);
      expect(result.levelScores['CET-5']).toBeCloseTo(0.54682, 5);
    });

    it('should give every level the floor score for empty text and keep the first', () => {
      const result = gradingService.gradeContentLevel(emptyEnglish);

      expect(result.levelScores).toEqual({ 'CET-4': 0.3, 'CET-5': 0.3, 'CET-6': 0.3 });
      expect(result.assignedLevel).toBe('CET-4');
      expect(result.confidenceScore).toBe(0.3);
      expect(result.qualityMetrics.vocabularyAppropriateness).toBe(0);
    });

    it('should assign N5 to hiragana-only text and score only JLPT levels', () => {
      const result = gradingService.gradeContentLevel(beginnerJapanese);

      expect(result.assignedLevel).toBe('N5');
      expect(Object.keys(result.levelScores)).toEqual(['N5', 'N4', 'N3', 'N2', 'N1']);
      expect(result.confidenceScore).toBeCloseTo(0.8147, 10);
      expect(result.levelScores.N4).toBeCloseTo(0.6407, 10);
      expect(result.levelScores.N3).toBeCloseTo(0.6407, 10);
      expect(result.levelScores.N2).toBeCloseTo(0.5897, 10);
      expect(result.levelScores.N1).toBeCloseTo(0.4937, 10);
      expect(result.recommendations).toEqual([
        'Reduce kanji usage and raise the proportion of hiragana',
        'Use more everyday conversational expressions',
      ]);
    });

    it('should give unsupported languages a neutral result', () => {
      const result = gradingService.gradeContentLevel(
        buildContent({ language: 'spanish', title: 'Hola', body: 'Buenos dias' }),
      );

      expect(result.assignedLevel).toBe('intermediate');
      expect(result.confidenceScore).toBe(0.5);
      expect(result.levelScores).toEqual({ intermediate: 0.5 });
      expect(result.recommendations).toEqual([UNSUPPORTED_LANGUAGE_RECOMMENDATION]);
    });

    it('should match the language name regardless of case', () => {
      const result = gradingService.gradeContentLevel({ ...beginnerEnglish, language: 'English' });

      expect(result.assignedLevel).toBe('CET-4');
    });

    it('should be idempotent', () => {
      expect(gradingService.gradeContentLevel(beginnerJapanese)).toEqual(
        gradingService.gradeContentLevel(beginnerJapanese),
      );
    });

    it('should keep the assigned level at the maximum score', () => {
      for (const content of [beginnerEnglish, advancedEnglish, beginnerJapanese, emptyEnglish]) {
        const result = gradingService.gradeContentLevel(content);
        const best = Math.max(...Object.values(result.levelScores));

        expect(result.levelScores[result.assignedLevel]).toBe(best);
        expect(result.confidenceScore).toBe(best);
        expect(result.confidenceScore).toBeGreaterThanOrEqual(0.3);
        expect(result.confidenceScore).toBeLessThanOrEqual(1);
      }
    });
  });

  describe('collaborators', () => {
    it('should ask for recommendations of the assigned level only', () => {
      const lowMetrics: QualityMetrics = {
        vocabularyAppropriateness: 0,
        grammarComplexity: 0,
        contentStructure: 0,
        educationalValue: 0,
        authenticity: 0,
        culturalRelevance: 0,
        readability: 0,
        engagementFactor: 0,
      };
      const lookup = new LookupService();
      const metricsCalculator = {
        computeMetrics: jest.fn().mockReturnValue(lowMetrics),
      } as unknown as jest.Mocked<MetricsCalculatorService>;
      const recommendations = {
        levelRecommendations: jest.fn().mockReturnValue([]),
      } as unknown as jest.Mocked<RecommendationsService>;
      const service = new GradingService(metricsCalculator, recommendations, lookup);

      const result = service.gradeContentLevel(beginnerEnglish);

      expect(recommendations.levelRecommendations).toHaveBeenCalledWith('english', result.assignedLevel);
      expect(result.confidenceScore).toBeGreaterThanOrEqual(0.3);
      expect(result.levelScores[result.assignedLevel]).toBe(result.confidenceScore);
    });
  });
});
