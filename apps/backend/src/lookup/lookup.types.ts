import type { CetLevel, JlptLevel } from '../content/content-language';

export type MinMax = {
  min: number;
  max: number;
};

export type CetCriteria = {
  vocabularySize: number;
  wordLengthRange: MinMax;
  sentenceLengthRange: MinMax;
  targetWordLength: number;
  targetSentenceLength: number;
  targetComplexity: number;
};

export type JlptCriteria = {
  kanjiCount: number;
  vocabularySize: number;
  kanjiRatio: number;
  hiraganaRatio: number;
  targetComplexity: number;
};

export type GrammarPattern = {
  name: string;
  pattern: RegExp;
  weight: number;
};

export type LanguageKeywords = {
  advanced: readonly string[];
  simple: readonly string[];
  educational: readonly string[];
};

export type KeywordTables = {
  english: LanguageKeywords;
  japanese: Pick<LanguageKeywords, 'educational'>;
  structureMarkers: readonly string[];
  educationalKeywords: readonly string[];
  explanatoryConnectives: readonly string[];
  engagingElements: readonly string[];
  interactivePhrases: readonly string[];
  metaWords: {
    english: readonly string[];
    japanese: readonly string[];
  };
  japaneseFallbackStoplist: readonly string[];
};

/** Shape of the JSON files under `data/`, checked against `schemas/lookup-data.schema.json`. */
export type RawLookupData = {
  keywords: {
    english: { advanced: string[]; simple: string[]; educational: string[] };
    japanese: { educational: string[] };
    structureMarkers: string[];
    educationalKeywords: string[];
    explanatoryConnectives: string[];
    engagingElements: string[];
    interactivePhrases: string[];
    metaWords: { english: string[]; japanese: string[] };
    japaneseFallbackStoplist: string[];
  };
  vocabularyLists: Record<string, string[]>;
  wordFrequencies: {
    english: Record<string, number>;
    japanese: Record<string, number>;
    fallbackCeiling: number;
  };
};

export type LookupTables = {
  readonly cetCriteria: Readonly<Record<CetLevel, CetCriteria>>;
  readonly jlptCriteria: Readonly<Record<JlptLevel, JlptCriteria>>;
  readonly defaultWordLengthRange: MinMax;
  readonly defaultKanjiRatio: number;
  readonly grammarPatterns: {
    readonly english: readonly GrammarPattern[];
    readonly japanese: readonly GrammarPattern[];
  };
  readonly keywords: KeywordTables;
  readonly vocabularyLists: ReadonlyMap<string, readonly string[]>;
  readonly wordFrequencies: {
    readonly english: ReadonlyMap<string, number>;
    readonly japanese: ReadonlyMap<string, number>;
    readonly fallbackCeiling: number;
  };
};
