import {
  recoverEnglishDefinition,
  recoverEnglishExample,
  recoverJapaneseDefinition,
  recoverJapaneseExample,
  recoverJapaneseReading,
} from './context-recovery';

describe('context recovery', () => {
  describe('english', () => {
    it('should recover a definition following the word', () => {
      expect(
        recoverEnglishDefinition('journey', 'A journey means a long trip from one place to another. We enjoyed it.'),
      ).toBe('a long trip from one place to another');
    });

    it('should return undefined when no definition is stated', () => {
      expect(recoverEnglishDefinition('journey', 'The journey was long.')).toBeUndefined();
    });

    it('should prefer an introduced example sentence', () => {
      expect(recoverEnglishExample('journey', 'Example: The journey took three days. It was fun.')).toBe(
        'The journey took three days',
      );
    });
  });

  describe('japanese', () => {
    it('should recover a reading in full-width parentheses', () => {
      expect(recoverJapaneseReading('勉強', '勉強（べんきょう）は大切です。')).toBe('べんきょう');
    });

    it('should recover a quoted definition', () => {
      expect(recoverJapaneseDefinition('努力', '努力は「がんばること」という意味です。', ['意味'])).toBe(
        'がんばること',
      );
    });

    it('should skip definitions that are meta phrases', () => {
      expect(recoverJapaneseDefinition('努力', '努力は「意味」です。', ['意味'])).toBeUndefined();
    });

    it('should recover an introduced example sentence', () => {
      expect(recoverJapaneseExample('努力', '例：毎日努力しています。')).toBe('毎日努力しています');
    });
  });
});
