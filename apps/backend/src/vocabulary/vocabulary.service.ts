import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { analysedText, Content } from '../content/content.types';
import { matchLanguage } from '../content/content-language';
import { englishWords } from '../common/utils/text-stats';
import { LookupService } from '../lookup/lookup.service';
import {
  recoverEnglishDefinition,
  recoverEnglishExample,
  recoverJapaneseDefinition,
  recoverJapaneseExample,
  recoverJapaneseReading,
} from './context-recovery';
import { createEnglishStrategies } from './strategies/english.strategies';
import { ExtractionStrategy } from './strategies/extraction-strategy';
import { createJapaneseStrategies } from './strategies/japanese.strategies';
import { VocabularyCandidate, VocabularyItem } from './vocabulary.types';

const MAX_ITEMS_CEILING = 10;

const readCount = (configService: ConfigService, key: string, fallback: number): number => {
  const value = Number(configService.get<string>(key) || String(fallback));
  return Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;
};

type Extraction = {
  source: string;
  candidates: VocabularyCandidate[];
};

@Injectable()
export class VocabularyService {
  private readonly logger = new Logger(VocabularyService.name);
  private readonly maxItems: number;
  private readonly fallbackLimit: number;
  private readonly englishStrategies: ExtractionStrategy[];
  private readonly japaneseStrategies: ExtractionStrategy[];

  constructor(
    private readonly lookup: LookupService,
    configService: ConfigService,
  ) {
    this.maxItems = Math.min(MAX_ITEMS_CEILING, readCount(configService, 'VOCAB_MAX_ITEMS', MAX_ITEMS_CEILING));
    this.fallbackLimit = readCount(configService, 'VOCAB_FALLBACK_LIMIT', 5);

    const { metaWords } = lookup.tables.keywords;
    this.englishStrategies = createEnglishStrategies(metaWords.english);
    this.japaneseStrategies = createJapaneseStrategies(metaWords.japanese);
  }

  /**
   * Pulls glossed words out of the text. The first strategy that yields anything wins;
   * without one, words from the claimed level's list are picked up with whatever context
   * can be recovered around them.
   */
  extractLevelVocabulary(content: Content): VocabularyItem[] {
    const text = analysedText(content);
    const extraction = matchLanguage<Extraction | null>(content.language, {
      english: () =>
        this.runCascade(this.englishStrategies, text) ?? {
          source: 'english-level-list',
          candidates: this.englishFallback(text, content.difficultyLevel),
        },
      japanese: () =>
        this.runCascade(this.japaneseStrategies, text) ?? {
          source: 'japanese-level-list',
          candidates: this.japaneseFallback(text, content.difficultyLevel),
        },
      other: () => null,
    });

    if (!extraction) {
      return [];
    }

    const items = extraction.candidates.slice(0, this.maxItems).map(
      (candidate): VocabularyItem => ({
        ...candidate,
        level: content.difficultyLevel,
        language: content.language,
        sourceUrl: content.sourceUrl,
      }),
    );

    this.logger.debug(`Extracted ${items.length} items from content ${content.contentId} via ${extraction.source}`);
    return items;
  }

  private runCascade(strategies: readonly ExtractionStrategy[], text: string): Extraction | null {
    for (const strategy of strategies) {
      const candidates = strategy.extract(text);
      if (candidates.length > 0) {
        return { source: strategy.name, candidates };
      }
    }
    return null;
  }

  private englishFallback(text: string, level: string | undefined): VocabularyCandidate[] {
    const levelWords = new Set(this.lookup.vocabularyFor(level));
    if (levelWords.size === 0) {
      return [];
    }

    const { english: frequencies, fallbackCeiling } = this.lookup.tables.wordFrequencies;
    const found = new Set<string>();
    for (const token of englishWords(text.toLowerCase())) {
      if (token.length < 3 || !levelWords.has(token)) {
        continue;
      }
      if ((frequencies.get(token) ?? 0) >= fallbackCeiling) {
        continue;
      }
      found.add(token);
    }

    return Array.from(found)
      .slice(0, this.fallbackLimit)
      .map((word) => ({
        word,
        definition: recoverEnglishDefinition(word, text),
        exampleSentence: recoverEnglishExample(word, text),
      }));
  }

  private japaneseFallback(text: string, level: string | undefined): VocabularyCandidate[] {
    const { japaneseFallbackStoplist, metaWords } = this.lookup.tables.keywords;
    const found = this.lookup
      .vocabularyFor(level)
      .filter((word) => word.length >= 2 && !japaneseFallbackStoplist.includes(word) && text.includes(word))
      .sort((a, b) => text.indexOf(a) - text.indexOf(b));

    return Array.from(new Set(found))
      .slice(0, this.fallbackLimit)
      .map((word) => ({
        word,
        reading: recoverJapaneseReading(word, text),
        definition: recoverJapaneseDefinition(word, text, metaWords.japanese),
        exampleSentence: recoverJapaneseExample(word, text),
      }));
  }
}
