import { Injectable, Logger } from '@nestjs/common';
import type { LookupTables } from './lookup.types';
import { loadLookupTables } from './lookup-tables';

/**
 * Holds the read-only lookup tables shared by every grading and extraction service.
 * Loaded once per application context.
 */
@Injectable()
export class LookupService {
  private readonly logger = new Logger(LookupService.name);
  readonly tables: LookupTables;

  constructor() {
    this.tables = loadLookupTables();
    this.logger.debug(
      `Lookup tables loaded: ${this.tables.vocabularyLists.size} vocabulary lists`,
    );
  }

  /** Level word list, or an empty list for levels without one. */
  vocabularyFor(level: string | undefined): readonly string[] {
    if (!level) {
      return [];
    }
    return this.tables.vocabularyLists.get(level) ?? [];
  }
}
