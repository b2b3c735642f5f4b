import { escapeRegExp } from '../common/utils/text-stats';

const ENGLISH_DEFINITION_LEADS = ['for example', 'example', 'pronunciation'];
const ENGLISH_DEFINITION_VERBS = ['means', 'is defined as', 'refers to'];
const ENGLISH_EXAMPLE_LEADS = ['means', 'is defined as', 'refers to', 'pronunciation'];
const JAPANESE_EXAMPLE_LEADS = ['という意味', 'は「', '「'];

const firstGroup = (text: string, pattern: RegExp): string | undefined =>
  pattern.exec(text)?.[1]?.trim();

const allGroups = (text: string, pattern: RegExp): string[] =>
  Array.from(text.matchAll(pattern), (match) => (match[1] ?? '').trim());

export function recoverEnglishDefinition(word: string, text: string): string | undefined {
  const w = escapeRegExp(word);
  const patterns = [
    new RegExp(`\\b${w}\\b\\s*(?:means|is defined as|refers to)\\s*([^.!?]+)`, 'i'),
    new RegExp(`(?:The word|word)\\s*['"]?${w}['"]?\\s*(?:means|is defined as)\\s*([^.!?]+)`, 'i'),
    new RegExp(`${w}\\s*[-–—]\\s*([^.!?]+)`, 'i'),
  ];

  for (const pattern of patterns) {
    const definition = firstGroup(text, pattern);
    if (!definition || definition.length < 5) {
      continue;
    }
    const lowered = definition.toLowerCase();
    if (ENGLISH_DEFINITION_LEADS.some((lead) => lowered.startsWith(lead))) {
      continue;
    }
    if (ENGLISH_DEFINITION_VERBS.includes(lowered)) {
      continue;
    }
    return definition;
  }
  return undefined;
}

export function recoverEnglishExample(word: string, text: string): string | undefined {
  const w = escapeRegExp(word);
  const patterns = [
    new RegExp(`(?:For example|Example|e\\.g\\.)[:\\s]*([^.!?]*\\b${w}\\b[^.!?]*)[.!?]`, 'gi'),
    new RegExp(`([^.!?]*\\b${w}\\b[^.!?]*)[.!?]`, 'gi'),
  ];
  const target = word.toLowerCase();

  for (const pattern of patterns) {
    const example = allGroups(text, pattern).find((candidate) => {
      const lowered = candidate.toLowerCase();
      return (
        candidate.length >= 10 &&
        lowered.includes(target) &&
        !ENGLISH_EXAMPLE_LEADS.some((lead) => lowered.startsWith(lead)) &&
        lowered !== target
      );
    });
    if (example) {
      return example;
    }
  }
  return undefined;
}

export function recoverJapaneseReading(word: string, text: string): string | undefined {
  const match = new RegExp(`${escapeRegExp(word)}(?:（([^）]+)）|\\(([^)]+)\\))`).exec(text);
  const reading = (match?.[1] ?? match?.[2])?.trim();
  return reading ? reading : undefined;
}

export function recoverJapaneseDefinition(
  word: string,
  text: string,
  metaPhrases: readonly string[],
): string | undefined {
  const w = escapeRegExp(word);
  const patterns = [
    new RegExp(`${w}(?:（[^）]*）)?(?:という言葉)?は「([^」]+)」という意味`),
    new RegExp(`${w}(?:（[^）]*）)?は「([^」]+)」`),
    new RegExp(`${w}\\s*[-–—]\\s*([^(]+)`),
  ];

  for (const pattern of patterns) {
    const definition = firstGroup(text, pattern);
    if (definition && definition.length >= 2 && !metaPhrases.includes(definition)) {
      return definition;
    }
  }
  return undefined;
}

export function recoverJapaneseExample(word: string, text: string): string | undefined {
  const w = escapeRegExp(word);
  const patterns = [new RegExp(`例文?[：:]([^。]*${w}[^。]*)。?`, 'g'), new RegExp(`([^。]*${w}[^。]*)。`, 'g')];

  for (const pattern of patterns) {
    const example = allGroups(text, pattern).find(
      (candidate) =>
        candidate.length >= 5 &&
        candidate.includes(word) &&
        !JAPANESE_EXAMPLE_LEADS.some((lead) => candidate.startsWith(lead)) &&
        candidate !== word,
    );
    if (example) {
      return example;
    }
  }
  return undefined;
}
