/**
 * Sliding context window
 *
 * What one translation request sees of the document:
 * - history summary of earlier content
 * - recent entries that are already translated
 * - the current batch (the only entries the request must translate)
 * - lookahead entries for forward context
 */

import type { Language } from '../types/common.js';
import type { DocumentEntry, SubtitleDocument } from '../document/subtitle-document.js';
import type { GlossaryManager } from '../glossary/glossary-manager.js';

export interface ContextWindowConfig {
  recentEntriesCount: number;
  batchSize: number;
  lookaheadCount: number;
  enableSummarization: boolean;
  /** Position from which a history summary is attached */
  summarizationThreshold: number;
}

export const DEFAULT_WINDOW_CONFIG: ContextWindowConfig = {
  recentEntriesCount: 10,
  batchSize: 15,
  lookaheadCount: 5,
  enableSummarization: true,
  summarizationThreshold: 50,
};

export const WINDOW_PRESETS = {
  default: DEFAULT_WINDOW_CONFIG,
  minimal: {
    recentEntriesCount: 3,
    batchSize: 5,
    lookaheadCount: 2,
    enableSummarization: false,
    summarizationThreshold: 100,
  },
  largeContext: {
    recentEntriesCount: 20,
    batchSize: 10,
    lookaheadCount: 10,
    enableSummarization: true,
    summarizationThreshold: 30,
  },
} satisfies Record<string, ContextWindowConfig>;

export interface TranslatedEntryContext {
  id: number;
  original: string;
  translated: string;
}

export interface WindowEntry {
  id: number;
  text: string;
  timecode: string;
  isSoundEffect: boolean;
}

const toWindowEntry = (entry: DocumentEntry): WindowEntry => ({
  id: entry.id,
  text: entry.originalText,
  timecode: entry.timecode.formatSrt(),
  isSoundEffect: entry.isSoundEffect(),
});

export class ContextWindow {
  constructor(
    readonly sourceLanguage: Language,
    readonly targetLanguage: Language,
    readonly recentEntries: readonly TranslatedEntryContext[],
    readonly currentBatch: readonly WindowEntry[],
    readonly lookahead: readonly WindowEntry[],
    /** Point-in-time copy; later document merges do not reach it */
    readonly glossary: GlossaryManager,
    readonly position: number,
    readonly totalEntries: number,
    readonly historySummary?: string
  ) {}

  /**
   * Window at `position` (an entry index). `batchSize` overrides the
   * configured size, for dynamic sizing. All ranges clip to the document.
   */
  static at(
    doc: SubtitleDocument,
    position: number,
    config: ContextWindowConfig,
    batchSize: number = config.batchSize
  ): ContextWindow {
    const total = doc.entries.length;
    const start = Math.min(Math.max(0, position), total);
    const recentStart = Math.max(0, start - config.recentEntriesCount);
    const batchEnd = Math.min(start + batchSize, total);
    const lookaheadEnd = Math.min(batchEnd + config.lookaheadCount, total);

    const recent: TranslatedEntryContext[] = [];
    for (const entry of doc.entries.slice(recentStart, start)) {
      if (entry.translatedText !== undefined) {
        recent.push({ id: entry.id, original: entry.originalText, translated: entry.translatedText });
      }
    }

    return new ContextWindow(
      doc.metadata.sourceLanguage,
      doc.metadata.targetLanguage ?? '',
      recent,
      doc.entries.slice(start, batchEnd).map(toWindowEntry),
      doc.entries.slice(batchEnd, lookaheadEnd).map(toWindowEntry),
      doc.glossary.clone(),
      start,
      total,
      doc.contextSummary
    );
  }

  isAtEnd(): boolean {
    return this.currentBatch.length === 0;
  }

  batchIds(): number[] {
    return this.currentBatch.map(e => e.id);
  }

  progressPercent(): number {
    if (this.totalEntries === 0) return 100;
    return (this.position / this.totalEntries) * 100;
  }

  remainingEntries(): number {
    return Math.max(0, this.totalEntries - this.position);
  }

  needsSummarization(config: ContextWindowConfig): boolean {
    return (
      config.enableSummarization &&
      this.historySummary === undefined &&
      this.position >= config.summarizationThreshold
    );
  }

  withHistorySummary(summary: string): ContextWindow {
    return new ContextWindow(
      this.sourceLanguage,
      this.targetLanguage,
      this.recentEntries,
      this.currentBatch,
      this.lookahead,
      this.glossary,
      this.position,
      this.totalEntries,
      summary
    );
  }

  /** Same window with only the given ids of the current batch */
  narrowedTo(ids: readonly number[]): ContextWindow {
    const wanted = new Set(ids);
    return new ContextWindow(
      this.sourceLanguage,
      this.targetLanguage,
      this.recentEntries,
      this.currentBatch.filter(e => wanted.has(e.id)),
      this.lookahead,
      this.glossary,
      this.position,
      this.totalEntries,
      this.historySummary
    );
  }
}

/**
 * Windows over the whole document, built lazily so each one sees the
 * translations written for the windows before it. `sizeAt` picks the batch
 * size per position; the configured size is used otherwise.
 */
export function* contextWindows(
  doc: SubtitleDocument,
  config: ContextWindowConfig,
  sizeAt?: (position: number) => number
): Generator<ContextWindow> {
  let position = 0;
  while (position < doc.entries.length) {
    const size = Math.max(1, sizeAt ? sizeAt(position) : config.batchSize);
    yield ContextWindow.at(doc, position, config, size);
    position += size;
  }
}
