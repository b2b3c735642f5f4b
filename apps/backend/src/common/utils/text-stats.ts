// ASCII letters bounded by anything but a Unicode word character, so "café" yields no token.
const ENGLISH_WORD_REGEX = /(?<![\p{L}\p{M}\p{N}_])[a-zA-Z]+(?![\p{L}\p{M}\p{N}_])/gu;
const HIRAGANA_REGEX = /[\u3040-\u309F]/g;
const KATAKANA_REGEX = /[\u30A0-\u30FF]/g;
const KANJI_REGEX = /[\u4E00-\u9FAF]/g;
const JAPANESE_RUN_REGEX = /[\u3040-\u309F\u30A0-\u30FF\u4E00-\u9FAF]+/g;

const SENTENCE_SPLITTERS = {
  latin: /[.!?]+/,
  japanese: /[。！？]/,
  mixed: /[.!?。！？]/,
} as const;

export type SentenceMode = keyof typeof SENTENCE_SPLITTERS;

export type EnglishTextStats = {
  words: string[];
  wordCount: number;
  sentenceCount: number;
  avgWordLength: number;
  avgSentenceLength: number;
};

export type CharacterProfile = {
  hiragana: number;
  katakana: number;
  kanji: number;
  total: number;
  kanjiRatio: number;
  hiraganaRatio: number;
};

export function englishWords(text: string): string[] {
  return text.match(ENGLISH_WORD_REGEX) ?? [];
}

export function splitSentences(text: string, mode: SentenceMode): string[] {
  return text
    .split(SENTENCE_SPLITTERS[mode])
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

export function englishTextStats(text: string): EnglishTextStats {
  const words = englishWords(text);
  const sentenceCount = splitSentences(text, 'latin').length;
  const totalLength = words.reduce((sum, word) => sum + word.length, 0);

  return {
    words,
    wordCount: words.length,
    sentenceCount,
    avgWordLength: words.length > 0 ? totalLength / words.length : 0,
    avgSentenceLength: sentenceCount > 0 ? words.length / sentenceCount : 0,
  };
}

export function characterProfile(text: string): CharacterProfile {
  const hiragana = text.match(HIRAGANA_REGEX)?.length ?? 0;
  const katakana = text.match(KATAKANA_REGEX)?.length ?? 0;
  const kanji = text.match(KANJI_REGEX)?.length ?? 0;
  const total = hiragana + katakana + kanji;

  return {
    hiragana,
    katakana,
    kanji,
    total,
    kanjiRatio: total > 0 ? kanji / total : 0,
    hiraganaRatio: total > 0 ? hiragana / total : 0,
  };
}

export function japaneseRuns(text: string): string[] {
  return text.match(JAPANESE_RUN_REGEX) ?? [];
}

export function containsJapanese(text: string): boolean {
  return /[\u3040-\u309F\u30A0-\u30FF\u4E00-\u9FAF]/.test(text);
}

/** Number of non-overlapping matches of `pattern` anywhere in `text`. */
export function countMatches(text: string, pattern: RegExp): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return text.match(new RegExp(pattern.source, flags))?.length ?? 0;
}

/** How many of `phrases` occur at least once in `text`, ignoring case. */
export function countPresent(text: string, phrases: readonly string[]): number {
  const haystack = text.toLowerCase();
  return phrases.filter((phrase) => haystack.includes(phrase.toLowerCase())).length;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
