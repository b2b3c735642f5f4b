import { readFileSync } from 'fs';
import { LookupTableError } from '../common/errors';
import {
  CET_CRITERIA,
  DEFAULT_KANJI_RATIO,
  DEFAULT_WORD_LENGTH_RANGE,
  ENGLISH_GRAMMAR_PATTERNS,
  JAPANESE_GRAMMAR_PATTERNS,
  JLPT_CRITERIA,
} from './level-criteria';
import type { LookupTables, RawLookupData } from './lookup.types';
import { resolveLookupAssetPath } from './utils/asset-path';
import { validateLookupData } from './utils/schema-validate';

const DATA_FILES = {
  keywords: 'data/keywords.json',
  vocabularyLists: 'data/vocabulary-lists.json',
  wordFrequencies: 'data/word-frequencies.json',
} as const;

const readJsonAsset = (relativePath: string): unknown => {
  const filePath = resolveLookupAssetPath(relativePath);
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    throw new LookupTableError(`Cannot read lookup data ${relativePath}: ${message}`);
  }
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (value instanceof RegExp || value instanceof Map || value instanceof Set) {
    return value;
  }
  Object.values(value).forEach((child: unknown) => deepFreeze(child));
  Object.freeze(value);
  return value;
};

/** Builds the frozen tables from already validated raw data. */
export const buildLookupTables = (raw: RawLookupData): LookupTables =>
  deepFreeze({
    cetCriteria: CET_CRITERIA,
    jlptCriteria: JLPT_CRITERIA,
    defaultWordLengthRange: DEFAULT_WORD_LENGTH_RANGE,
    defaultKanjiRatio: DEFAULT_KANJI_RATIO,
    grammarPatterns: {
      english: ENGLISH_GRAMMAR_PATTERNS,
      japanese: JAPANESE_GRAMMAR_PATTERNS,
    },
    keywords: raw.keywords,
    vocabularyLists: new Map(
      Object.entries(raw.vocabularyLists).map(([level, words]): [string, readonly string[]] => [
        level,
        Object.freeze(words.map((word) => word.toLowerCase())),
      ]),
    ),
    wordFrequencies: {
      english: new Map(Object.entries(raw.wordFrequencies.english)),
      japanese: new Map(Object.entries(raw.wordFrequencies.japanese)),
      fallbackCeiling: raw.wordFrequencies.fallbackCeiling,
    },
  });

export const parseLookupData = (data: unknown): LookupTables => {
  const result = validateLookupData(data);
  if (!result.valid) {
    throw new LookupTableError(`Lookup data failed schema validation: ${result.errors}`);
  }
  return buildLookupTables(result.data);
};

/** Reads every data file shipped with the module and validates the combined document. */
export const loadLookupTables = (): LookupTables =>
  parseLookupData({
    keywords: readJsonAsset(DATA_FILES.keywords),
    vocabularyLists: readJsonAsset(DATA_FILES.vocabularyLists),
    wordFrequencies: readJsonAsset(DATA_FILES.wordFrequencies),
  });
