export const CET_LEVELS = ['CET-4', 'CET-5', 'CET-6'] as const;
export const JLPT_LEVELS = ['N5', 'N4', 'N3', 'N2', 'N1'] as const;

export type CetLevel = (typeof CET_LEVELS)[number];
export type JlptLevel = (typeof JLPT_LEVELS)[number];

export type LanguageFamily = 'english' | 'japanese' | 'other';

export type LanguageHandlers<T> = Record<LanguageFamily, () => T>;

export const resolveLanguageFamily = (language: string): LanguageFamily => {
  const normalized = language.trim().toLowerCase();
  if (normalized === 'english') {
    return 'english';
  }
  if (normalized === 'japanese') {
    return 'japanese';
  }
  return 'other';
};

/**
 * Runs exactly one handler for the family of `language`. Every family must be handled.
 */
export const matchLanguage = <T>(language: string, handlers: LanguageHandlers<T>): T =>
  handlers[resolveLanguageFamily(language)]();

export const isCetLevel = (level: string | undefined): level is CetLevel =>
  CET_LEVELS.some((candidate) => candidate === level);

export const isJlptLevel = (level: string | undefined): level is JlptLevel =>
  JLPT_LEVELS.some((candidate) => candidate === level);

export const levelsOf = (family: LanguageFamily): readonly string[] => {
  if (family === 'english') {
    return CET_LEVELS;
  }
  if (family === 'japanese') {
    return JLPT_LEVELS;
  }
  return [];
};
