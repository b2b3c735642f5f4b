import type { CetLevel, JlptLevel } from '../content/content-language';
import type { CetCriteria, GrammarPattern, JlptCriteria, MinMax } from './lookup.types';

export const CET_CRITERIA: Record<CetLevel, CetCriteria> = {
  'CET-4': {
    vocabularySize: 4000,
    wordLengthRange: { min: 3.5, max: 5.5 },
    sentenceLengthRange: { min: 5, max: 12 },
    targetWordLength: 4.5,
    targetSentenceLength: 8,
    targetComplexity: 0.3,
  },
  'CET-5': {
    vocabularySize: 5500,
    wordLengthRange: { min: 4.5, max: 6.5 },
    sentenceLengthRange: { min: 8, max: 16 },
    targetWordLength: 5.5,
    targetSentenceLength: 12,
    targetComplexity: 0.5,
  },
  'CET-6': {
    vocabularySize: 6500,
    wordLengthRange: { min: 5.5, max: 8.0 },
    sentenceLengthRange: { min: 12, max: 20 },
    targetWordLength: 6.5,
    targetSentenceLength: 16,
    targetComplexity: 0.8,
  },
};

export const JLPT_CRITERIA: Record<JlptLevel, JlptCriteria> = {
  N5: { kanjiCount: 100, vocabularySize: 800, kanjiRatio: 0.1, hiraganaRatio: 0.7, targetComplexity: 0.2 },
  N4: { kanjiCount: 300, vocabularySize: 1500, kanjiRatio: 0.2, hiraganaRatio: 0.6, targetComplexity: 0.3 },
  N3: { kanjiCount: 650, vocabularySize: 3000, kanjiRatio: 0.3, hiraganaRatio: 0.5, targetComplexity: 0.5 },
  N2: { kanjiCount: 1000, vocabularySize: 6000, kanjiRatio: 0.4, hiraganaRatio: 0.4, targetComplexity: 0.7 },
  N1: { kanjiCount: 2000, vocabularySize: 10000, kanjiRatio: 0.5, hiraganaRatio: 0.3, targetComplexity: 0.9 },
};

/** Used when English content claims no CET level. */
export const DEFAULT_WORD_LENGTH_RANGE: MinMax = { min: 4.0, max: 6.0 };

/** Kanji ratio expected from Japanese content that claims no JLPT level (N3). */
export const DEFAULT_KANJI_RATIO = 0.3;

// Patterns carry no `g` flag; counting clones them with one.
export const ENGLISH_GRAMMAR_PATTERNS: GrammarPattern[] = [
  { name: 'simple_present', pattern: /\b(am|is|are|do|does)\b/i, weight: 0.1 },
  { name: 'simple_past', pattern: /\b\w+ed\b|\bwas\b|\bwere\b/i, weight: 0.15 },
  { name: 'present_continuous', pattern: /\b(am|is|are)\s+\w+ing\b/i, weight: 0.2 },
  { name: 'present_perfect', pattern: /\bhave\s+\w+ed\b|\bhas\s+\w+ed\b/i, weight: 0.3 },
  { name: 'modal_verbs', pattern: /\b(would|could|might|should|must)\b/i, weight: 0.25 },
  { name: 'passive_voice', pattern: /\b(is|are|was|were)\s+\w+ed\b/i, weight: 0.4 },
  { name: 'conditional', pattern: /\bif\s+\w+.*would\b/i, weight: 0.5 },
  {
    name: 'connective_adverbs',
    pattern: /\b(although|however|therefore|nevertheless|furthermore)\b/i,
    weight: 0.4,
  },
  { name: 'relative_clauses', pattern: /\b(which|that|who|whom|whose)\b/i, weight: 0.35 },
  { name: 'subjunctive', pattern: /\bif\s+\w+\s+were\b/i, weight: 0.6 },
];

export const JAPANESE_GRAMMAR_PATTERNS: GrammarPattern[] = [
  { name: 'masu_form', pattern: /ます|ました/, weight: 0.1 },
  { name: 'desu_form', pattern: /です|でした/, weight: 0.1 },
  { name: 'basic_particles', pattern: /[はがをにでと]/, weight: 0.05 },
  { name: 'te_form', pattern: /[てで]/, weight: 0.2 },
  { name: 'potential', pattern: /できる|られる/, weight: 0.3 },
  { name: 'conditional', pattern: /ば|たら|なら/, weight: 0.25 },
  { name: 'passive', pattern: /れる|られる/, weight: 0.4 },
  { name: 'causative', pattern: /せる|させる/, weight: 0.5 },
  { name: 'keigo', pattern: /いらっしゃる|おっしゃる|なさる|いたします/, weight: 0.6 },
  { name: 'compound_particles', pattern: /について|に関して|によって|において/, weight: 0.4 },
  { name: 'formal_expressions', pattern: /であります|でございます|いたします/, weight: 0.5 },
];
