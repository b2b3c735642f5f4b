import {
  characterProfile,
  countMatches,
  countPresent,
  englishTextStats,
  englishWords,
  escapeRegExp,
  japaneseRuns,
  splitSentences,
} from './text-stats';

describe('text-stats', () => {
  describe('englishTextStats', () => {
    it('should average word and sentence lengths', () => {
      const stats = englishTextStats('My Day I am a student. I go to school. My friend is nice. We study together.');

      expect(stats.wordCount).toBe(17);
      expect(stats.sentenceCount).toBe(4);
      expect(stats.avgSentenceLength).toBe(4.25);
      expect(stats.avgWordLength).toBeCloseTo(56 / 17, 10);
    });

    it('should return zeros for text without words', () => {
      expect(englishTextStats(' ')).toEqual({
        words: [],
        wordCount: 0,
        sentenceCount: 0,
        avgWordLength: 0,
        avgSentenceLength: 0,
      });
    });
  });

  describe('englishWords', () => {
    it('should skip words that carry non-ASCII letters', () => {
      expect(englishWords('A café serves naïve tea.')).toEqual(['A', 'serves', 'tea']);
    });

    it('should not split words at digits or underscores', () => {
      expect(englishWords('level2 snake_case plain')).toEqual(['plain']);
    });
  });

  describe('splitSentences', () => {
    it('should split on Japanese terminators only in japanese mode', () => {
      expect(splitSentences('わたしは がくせいです。たのしいです。', 'japanese')).toEqual([
        'わたしは がくせいです',
        'たのしいです',
      ]);
      expect(splitSentences('Hello. こんにちは。', 'latin')).toEqual(['Hello', 'こんにちは。']);
      expect(splitSentences('Hello. こんにちは。', 'mixed')).toEqual(['Hello', 'こんにちは']);
    });
  });

  describe('characterProfile', () => {
    it('should count each script and derive ratios', () => {
      const profile = characterProfile('日本語をカタカナで');

      expect(profile).toEqual({
        hiragana: 2,
        katakana: 4,
        kanji: 3,
        total: 9,
        kanjiRatio: 3 / 9,
        hiraganaRatio: 2 / 9,
      });
    });

    it('should report zero ratios without Japanese characters', () => {
      expect(characterProfile('plain text').kanjiRatio).toBe(0);
    });
  });

  it('should extract contiguous Japanese runs', () => {
    expect(japaneseRuns('努力 is どりょく, 研究。')).toEqual(['努力', 'どりょく', '研究']);
  });

  it('should count matches with a pattern compiled without the global flag', () => {
    expect(countMatches('She was tired and they were late.', /\bwas\b|\bwere\b/i)).toBe(2);
    expect(countMatches('nothing here', /\bif\b/i)).toBe(0);
  });

  it('should count phrases present at least once', () => {
    expect(countPresent('Let us Study and study again', ['study', 'learn', 'again'])).toBe(2);
  });

  it('should escape regular expression metacharacters', () => {
    expect(escapeRegExp('e.g. (x)')).toBe('e\\.g\\. \\(x\\)');
  });
});
