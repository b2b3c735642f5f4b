import { containsJapanese } from '../../common/utils/text-stats';
import { ExtractionStrategy, optionalGroup, PatternStrategy } from './extraction-strategy';
import type { VocabularyCandidate } from '../vocabulary.types';

// 「語」（よみ）という言葉は「定義」という意味です。例文：...
const BRACKETED_TERM =
  /「([^」]+)」(?:（([^）]+)）)?(?:という言葉)?は「([^」]+)」という意味です。?(?:例文?[：:]([^。]+)。?)?/;

// 語（よみ）は「定義」という意味です。例：...
const BARE_TERM = /([^\s（。、「」]+)(?:（([^）]+)）)?は「([^」]+)」という意味です。?(?:例[：:]([^。]+)。?)?/;

// 語 - 定義 (例)
const DASH_GLOSS = /([^\s-]+)\s*[-–—]\s*([^(]+)\s*\(([^)]+)\)/;

const validJapaneseCandidate = (
  candidate: VocabularyCandidate,
  metaPhrases: readonly string[],
): VocabularyCandidate | null => {
  const { word, definition } = candidate;
  if (!word || !containsJapanese(word) || metaPhrases.includes(word)) {
    return null;
  }
  if (!definition || definition.length < 2) {
    return null;
  }
  return candidate;
};

export const createJapaneseStrategies = (metaPhrases: readonly string[]): ExtractionStrategy[] => [
  new PatternStrategy('japanese-bracketed-term', BRACKETED_TERM, (match) =>
    validJapaneseCandidate(
      {
        word: (match[1] ?? '').trim(),
        reading: optionalGroup(match[2]),
        definition: optionalGroup(match[3]),
        exampleSentence: optionalGroup(match[4]),
      },
      metaPhrases,
    ),
  ),
  new PatternStrategy('japanese-bare-term', BARE_TERM, (match) =>
    validJapaneseCandidate(
      {
        word: (match[1] ?? '').trim(),
        reading: optionalGroup(match[2]),
        definition: optionalGroup(match[3]),
        exampleSentence: optionalGroup(match[4]),
      },
      metaPhrases,
    ),
  ),
  new PatternStrategy('japanese-dash-gloss', DASH_GLOSS, (match) =>
    validJapaneseCandidate(
      {
        word: (match[1] ?? '').trim(),
        definition: optionalGroup(match[2]),
        exampleSentence: optionalGroup(match[3]),
      },
      metaPhrases,
    ),
  ),
];
