export type VocabularyItem = {
  word: string;
  reading?: string;
  pronunciation?: string;
  definition?: string;
  exampleSentence?: string;
  level?: string;
  language: string;
  sourceUrl: string;
  audioUrl?: string;
};

/** What a strategy pulls out of the text before the item is tagged with the content's metadata. */
export type VocabularyCandidate = Pick<
  VocabularyItem,
  'word' | 'reading' | 'pronunciation' | 'definition' | 'exampleSentence'
>;
