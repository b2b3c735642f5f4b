import type { VocabularyCandidate } from '../vocabulary.types';

export interface ExtractionStrategy {
  readonly name: string;
  extract(text: string): VocabularyCandidate[];
}

type CandidateBuilder = (match: RegExpMatchArray) => VocabularyCandidate | null;

export const optionalGroup = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Strategy driven by one regular expression; the builder turns a match into a candidate
 * or rejects it.
 */
export class PatternStrategy implements ExtractionStrategy {
  private readonly pattern: RegExp;

  constructor(
    readonly name: string,
    pattern: RegExp,
    private readonly build: CandidateBuilder,
  ) {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    this.pattern = new RegExp(pattern.source, flags);
  }

  extract(text: string): VocabularyCandidate[] {
    const candidates: VocabularyCandidate[] = [];
    for (const match of text.matchAll(this.pattern)) {
      const candidate = this.build(match);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }
}
