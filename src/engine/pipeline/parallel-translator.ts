/**
 * Parallel chunked translation
 *
 * Non-windowed flow for throughput: pending entries are split into chunks
 * that translate concurrently through a WorkerPool. Every chunk sees the
 * same glossary snapshot; suggestions from all chunks are merged into the
 * document once, after the last worker finishes.
 *
 * A chunk whose reply cannot be parsed is split to the size the recovery
 * handler asks for, and the parts go back to the pool in another round.
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { RawEntry, Sleep, TokenUsage } from '../types/common.js';
import { addTokenUsage, emptyTokenUsage } from '../types/common.js';
import { renumberEntries, type SubtitleDocument } from '../document/subtitle-document.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { ContextWindow, WINDOW_PRESETS, type ContextWindowConfig } from '../context/context-window.js';
import { TranslateStage, type BatchResult } from '../stages/stage-2-translate.js';
import { profileFor, type ProviderProfile } from '../providers/profiles.js';
import { chunkEntries } from '../utils/chunker.js';
import { WorkerPool, type WorkerPoolConfig } from './worker-pool.js';

export interface ParallelTranslatorConfig {
  /** Entries per chunk; defaults to the provider profile's batch size */
  chunkSize?: number;
  maxTokensPerChunk: number;
  /** Context around each chunk; recent entries are whatever is already translated */
  window: ContextWindowConfig;
  acceptGlossaryUpdates: boolean;
  customInstructions?: string;
  pool: Partial<WorkerPoolConfig>;
}

export const DEFAULT_PARALLEL_CONFIG: ParallelTranslatorConfig = {
  maxTokensPerChunk: 2000,
  window: WINDOW_PRESETS.minimal,
  acceptGlossaryUpdates: true,
  pool: {},
};

export interface ParallelTranslationResult {
  /** Chunks that settled, counting the parts of split chunks instead of the chunk */
  totalChunks: number;
  completedChunks: number;
  entriesTranslated: number;
  /** Entries of chunks that failed for good; they stay untranslated */
  failedEntryIds: number[];
  tokensUsed: TokenUsage;
  /** Whole document, translated where available, renumbered 1..N */
  entries: RawEntry[];
}

export interface ParallelTranslatorOptions {
  profile?: ProviderProfile;
  sleep?: Sleep;
  quiet?: boolean;
}

export class ParallelTranslator {
  readonly config: ParallelTranslatorConfig;
  private stage: TranslateStage;
  private pool: WorkerPool;
  private profile: ProviderProfile;

  constructor(provider: ILLMProvider, config: Partial<ParallelTranslatorConfig> = {}, options: ParallelTranslatorOptions = {}) {
    this.config = { ...DEFAULT_PARALLEL_CONFIG, ...config };
    this.profile = options.profile ?? profileFor(provider.name);

    // One request per pool attempt: the pool owns timeout and retry here
    this.stage = new TranslateStage(
      provider,
      {
        window: this.config.window,
        maxRetries: 0,
        useExtractiveFallback: false,
        acceptGlossaryUpdates: this.config.acceptGlossaryUpdates,
        customInstructions: this.config.customInstructions,
      },
      { sleep: options.sleep, quiet: true }
    );
    this.pool = WorkerPool.forProvider(this.profile, this.config.pool, {
      sleep: options.sleep,
      quiet: options.quiet,
    });
  }

  async translate(
    doc: SubtitleDocument,
    options: { onProgress?: (completed: number, total: number) => void; signal?: AbortSignal } = {}
  ): Promise<ParallelTranslationResult> {
    const pending = doc.pendingEntries().map(e => e.toRaw());
    const chunks = chunkEntries(pending, {
      maxEntries: this.config.chunkSize ?? this.profile.batchSize,
      maxTokens: this.config.maxTokensPerChunk,
    });

    // Windows are built before any worker starts, so all share one glossary snapshot
    const windows = chunks.map(chunk => {
      const ids = chunk.entries.map(e => e.seq);
      const start = doc.indexOf(ids[0]);
      const end = doc.indexOf(ids[ids.length - 1]);
      return ContextWindow.at(doc, start, this.config.window, end - start + 1).narrowedTo(ids);
    });

    const results: BatchResult[] = [];
    const failedEntryIds: number[] = [];
    let failedChunks = 0;
    let settled = 0;
    let queue = windows;

    while (queue.length > 0) {
      const round = queue;
      const before = settled;
      const outcomes = await this.pool.run(
        round.map((window, index) => ({
          id: index,
          run: (signal: AbortSignal) => this.stage.translateBatch(window, signal),
        })),
        {
          signal: options.signal,
          onProgress: (done, total) => options.onProgress?.(before + done, before + total),
        }
      );
      settled += round.length;

      queue = [];
      for (const outcome of outcomes) {
        const window = round[outcome.id];
        if (outcome.ok) {
          results.push(outcome.value);
          continue;
        }
        const ids = window.batchIds();
        if (outcome.action?.type === 'reduce_batch_size' && ids.length > 1) {
          const size = Math.max(1, Math.min(outcome.action.newSize, ids.length - 1));
          for (let i = 0; i < ids.length; i += size) {
            queue.push(window.narrowedTo(ids.slice(i, i + size)));
          }
          continue;
        }
        failedChunks++;
        failedEntryIds.push(...ids);
      }
    }
    failedEntryIds.sort((a, b) => a - b);

    const translations = results.flatMap(r => r.translations).sort((a, b) => a.id - b.id);
    let entriesTranslated = 0;
    for (const t of translations) {
      const entry = doc.getEntry(t.id);
      if (entry && t.translated !== '') {
        entry.setTranslation(t.translated, t.confidence);
        entriesTranslated++;
      }
    }

    const updates = GlossaryManager.createEmpty();
    for (const result of results) updates.merge(result.glossaryUpdates);
    if (!updates.isEmpty()) doc.glossary.merge(updates);

    return {
      totalChunks: results.length + failedChunks,
      completedChunks: results.length,
      entriesTranslated,
      failedEntryIds,
      tokensUsed: results.reduce((sum, r) => addTokenUsage(sum, r.tokensUsed), emptyTokenUsage()),
      entries: renumberEntries(doc.toRawEntries()),
    };
  }
}
