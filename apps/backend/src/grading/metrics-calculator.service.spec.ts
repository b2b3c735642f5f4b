import { ContentType } from '../content/content.types';
import { LookupService } from '../lookup/lookup.service';
import {
  advancedEnglish,
  beginnerEnglish,
  beginnerJapanese,
  buildContent,
  emptyEnglish,
} from '../test-support/content.fixtures';
import { MetricsCalculatorService } from './metrics-calculator.service';

describe('MetricsCalculatorService', () => {
  let calculator: MetricsCalculatorService;

  beforeEach(() => {
    calculator = new MetricsCalculatorService(new LookupService());
  });

  describe('english content', () => {
    it('should score a short beginner text', () => {
      const metrics = calculator.computeMetrics(beginnerEnglish);

      expect(metrics.vocabularyAppropriateness).toBe(1);
      expect(metrics.grammarComplexity).toBeCloseTo(0.2, 10);
      expect(metrics.contentStructure).toBeCloseTo(0.6, 10);
      expect(metrics.educationalValue).toBeCloseTo(0.3, 10);
      expect(metrics.readability).toBe(1);
      expect(metrics.engagementFactor).toBe(0);
      expect(metrics.authenticity).toBe(0.8);
      expect(metrics.culturalRelevance).toBe(0.7);
    });

    it('should score a dense academic text', () => {
      const metrics = calculator.computeMetrics(advancedEnglish);

      expect(metrics.vocabularyAppropriateness).toBe(1);
      expect(metrics.grammarComplexity).toBe(1);
      expect(metrics.contentStructure).toBeCloseTo(0.5, 10);
      expect(metrics.readability).toBeCloseTo(0.4402, 4);
    });

    it('should fall back to documented defaults for empty text', () => {
      const metrics = calculator.computeMetrics(emptyEnglish);

      expect(metrics.vocabularyAppropriateness).toBe(0);
      expect(metrics.grammarComplexity).toBe(0.1);
      expect(metrics.contentStructure).toBe(0);
      expect(metrics.educationalValue).toBe(0.2);
      expect(metrics.readability).toBe(0);
    });

    it('should reward structured exercises', () => {
      const metrics = calculator.computeMetrics(
        buildContent({
          title: 'Grammar Practice',
          body:
            'Learn the past tense with these steps.\n\n1. Read the story.\n' +
            '2. Underline every verb, for example walked or played.\n3. Write your own sentences.',
          difficultyLevel: 'CET-4',
          contentType: ContentType.EXERCISE,
        }),
      );

      expect(metrics.contentStructure).toBeCloseTo(1, 10);
      expect(metrics.educationalValue).toBeCloseTo(0.9, 10);
      expect(metrics.grammarComplexity).toBeCloseTo(0.3, 10);
      expect(metrics.engagementFactor).toBeCloseTo(0.2, 10);
    });

    it('should reward interactive content', () => {
      const metrics = calculator.computeMetrics(
        buildContent({
          title: 'Quiz time',
          body: 'What do you think? Try this quiz! Can you answer the question?',
          contentType: ContentType.DIALOGUE,
        }),
      );

      expect(metrics.engagementFactor).toBe(1);
    });

    it('should use the minimal complexity when no grammar pattern matches', () => {
      const metrics = calculator.computeMetrics(
        buildContent({ title: 'Hello', body: 'Hello world', contentType: ContentType.NEWS }),
      );

      expect(metrics.grammarComplexity).toBe(0.1);
      expect(metrics.educationalValue).toBe(0.1);
    });
  });

  describe('japanese content', () => {
    it('should score a hiragana-only beginner text', () => {
      const metrics = calculator.computeMetrics(beginnerJapanese);

      expect(metrics.vocabularyAppropriateness).toBeCloseTo(0.58, 10);
      expect(metrics.grammarComplexity).toBeCloseTo(0.59375, 10);
      expect(metrics.readability).toBeCloseTo(0.88, 10);
      expect(metrics.educationalValue).toBeCloseTo(0.2, 10);
      expect(metrics.contentStructure).toBeCloseTo(0.2, 10);
    });

    it('should return zero vocabulary and readability without Japanese characters', () => {
      const metrics = calculator.computeMetrics(
        buildContent({ language: 'japanese', title: 'Title', body: 'No kana here' }),
      );

      expect(metrics.vocabularyAppropriateness).toBe(0);
      expect(metrics.readability).toBe(0);
    });
  });

  describe('other languages', () => {
    it('should return the generic metrics', () => {
      expect(calculator.computeMetrics(buildContent({ language: 'french', body: 'Bonjour' }))).toEqual({
        vocabularyAppropriateness: 0.5,
        grammarComplexity: 0.5,
        contentStructure: 0.6,
        educationalValue: 0.6,
        authenticity: 0.5,
        culturalRelevance: 0.5,
        readability: 0.6,
        engagementFactor: 0.5,
      });
    });

    it('should hand out a fresh object on every call', () => {
      const content = buildContent({ language: 'french' });
      const first = calculator.computeMetrics(content);
      first.readability = 0;

      expect(calculator.computeMetrics(content).readability).toBe(0.6);
    });
  });

  it('should keep every metric within [0, 1]', () => {
    for (const content of [beginnerEnglish, advancedEnglish, beginnerJapanese, emptyEnglish]) {
      Object.values(calculator.computeMetrics(content)).forEach((value) => {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      });
    }
  });
});
