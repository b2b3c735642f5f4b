import { ExtractionStrategy, optionalGroup, PatternStrategy } from './extraction-strategy';
import type { VocabularyCandidate } from '../vocabulary.types';

// The word 'x' means ... For example: ... Pronunciation: /.../
const DEFINITION_SENTENCE =
  /(?:The word|Another word)\s*['"]([a-zA-Z]{3,})['"](?:\s*(?:means|which means|is defined as|refers to)\s*([^.!?]+)[.!?])?\s*(?:(?:For example|Example|e\.g\.)[:\s]*([^.!?]+)[.!?])?\s*(?:Pronunciation[:\s]*(\/[^/]+\/|\[[^\]]+\]))?/i;

// 'x' - definition (example)
const QUOTED_DASH = /['"]([a-zA-Z]{3,})['"](?:\s*[-–—]\s*([^(.!?]+))?\s*\(([^)]+)\)?/i;

// x: definition. Example: ...
const COLON_GLOSS = /\b([a-zA-Z]{4,})\s*:\s*([^.!?]+)[.!?]?\s*(?:Example[:\s]*([^.!?]+))?/i;

const ALPHABETIC = /^[a-z]+$/;

const validEnglishCandidate = (
  candidate: VocabularyCandidate,
  metaWords: readonly string[],
  minWordLength: number,
): VocabularyCandidate | null => {
  const { word, definition } = candidate;
  if (word.length < minWordLength || !ALPHABETIC.test(word) || metaWords.includes(word)) {
    return null;
  }
  if (!definition || definition.length < 5) {
    return null;
  }
  return candidate;
};

/** English strategies, most specific first. */
export const createEnglishStrategies = (metaWords: readonly string[]): ExtractionStrategy[] => [
  new PatternStrategy('english-definition-sentence', DEFINITION_SENTENCE, (match) =>
    validEnglishCandidate(
      {
        word: (match[1] ?? '').toLowerCase(),
        definition: optionalGroup(match[2]),
        exampleSentence: optionalGroup(match[3]),
        pronunciation: optionalGroup(match[4]),
      },
      metaWords,
      3,
    ),
  ),
  new PatternStrategy('english-quoted-dash', QUOTED_DASH, (match) =>
    validEnglishCandidate(
      {
        word: (match[1] ?? '').toLowerCase(),
        definition: optionalGroup(match[2]),
        exampleSentence: optionalGroup(match[3]),
      },
      metaWords,
      3,
    ),
  ),
  new PatternStrategy('english-colon-gloss', COLON_GLOSS, (match) =>
    validEnglishCandidate(
      {
        word: (match[1] ?? '').toLowerCase(),
        definition: optionalGroup(match[2]),
        exampleSentence: optionalGroup(match[3]),
      },
      metaWords,
      4,
    ),
  ),
];
