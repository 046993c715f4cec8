/**
 * Stage 2: Translation
 *
 * Walks the document in context windows, strictly in order, so every
 * request sees the translations written before it:
 * - one JSON request per window (or per sub-chunk after a batch split)
 * - per-batch retry driven by the recovery state machine
 * - empty placeholders when a batch cannot be translated and fallback is on
 * - glossary suggestions from the model merged after each batch
 */

import type { CompletionResult, ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { Sleep, TokenUsage } from '../types/common.js';
import { addTokenUsage, emptyTokenUsage } from '../types/common.js';
import type { DocumentEntry, SubtitleDocument } from '../document/subtitle-document.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import {
  ContextWindow,
  DEFAULT_WINDOW_CONFIG,
  WINDOW_PRESETS,
  type ContextWindowConfig,
} from '../context/context-window.js';
import { DynamicWindowSizer, type DynamicWindowConfig } from '../context/dynamic-sizer.js';
import { HistorySummarizer } from '../analysis/summarizer.js';
import {
  TranslationResponseSchema,
  createCorrectionPrompt,
  createTranslatorPrompt,
  renderTranslatorSystemPrompt,
  type TranslationResponse,
} from '../prompts/system/translator.js';
import { TranslationError, classifyError } from '../quality/errors.js';
import { RECOVERY_STRATEGIES, describeAction, type RecoveryStrategy } from '../quality/recovery.js';
import { currentChunk, initialRetryState, transition, type RetryContext } from '../quality/retry.js';
import { issueFeedback, type ValidationIssue } from '../quality/validation-issue.js';
import { parseJsonFromContent } from '../utils/json-extract.js';
import { sleep as realSleep, withTimeout } from '../utils/timing.js';

export interface TranslationConfig {
  window: ContextWindowConfig;
  /** Retries per batch; a batch makes at most maxRetries + 1 requests */
  maxRetries: number;
  acceptGlossaryUpdates: boolean;
  /** Return empty placeholders instead of failing when a batch is exhausted */
  useExtractiveFallback: boolean;
  customInstructions?: string;
  requestTimeoutMs: number;
  /** Size windows by token budget and scene boundaries instead of `window.batchSize` */
  dynamicSizing?: DynamicWindowConfig;
  recovery: RecoveryStrategy;
  temperature: number;
}

export const DEFAULT_TRANSLATION_CONFIG: TranslationConfig = {
  window: DEFAULT_WINDOW_CONFIG,
  maxRetries: 3,
  acceptGlossaryUpdates: true,
  useExtractiveFallback: true,
  requestTimeoutMs: 120_000,
  recovery: RECOVERY_STRATEGIES.default,
  temperature: 0.3,
};

export const TRANSLATION_PRESETS = {
  default: DEFAULT_TRANSLATION_CONFIG,
  fast: {
    ...DEFAULT_TRANSLATION_CONFIG,
    window: WINDOW_PRESETS.minimal,
    maxRetries: 1,
    acceptGlossaryUpdates: false,
  },
  quality: {
    ...DEFAULT_TRANSLATION_CONFIG,
    window: WINDOW_PRESETS.largeContext,
    maxRetries: 3,
    acceptGlossaryUpdates: true,
  },
} satisfies Record<string, TranslationConfig>;

export interface TranslatedEntry {
  id: number;
  translated: string;
  confidence?: number;
}

export class BatchResult {
  constructor(
    readonly translations: TranslatedEntry[],
    /** Ids the batch was asked to translate, in order */
    readonly entryIds: number[],
    readonly glossaryUpdates: GlossaryManager = GlossaryManager.createEmpty(),
    readonly retriesUsed = 0,
    readonly usedFallback = false,
    readonly tokensUsed: TokenUsage = emptyTokenUsage()
  ) {}

  isComplete(): boolean {
    return this.missingIds().length === 0;
  }

  /** Requested ids the model never answered */
  missingIds(): number[] {
    const answered = new Set(this.translations.map(t => t.id));
    return this.entryIds.filter(id => !answered.has(id));
  }

  getTranslation(id: number): TranslatedEntry | undefined {
    return this.translations.find(t => t.id === id);
  }
}

export class TranslationStats {
  totalBatches = 0;
  completedBatches = 0;
  totalEntriesTranslated = 0;
  totalRetries = 0;
  fallbackUsedCount = 0;
  tokensUsed: TokenUsage = emptyTokenUsage();

  /** Completed batches over planned batches; 1 for an empty document */
  successRate(): number {
    return this.totalBatches === 0 ? 1 : this.completedBatches / this.totalBatches;
  }
}

export interface TranslateStageOptions {
  /** Used after a `switch_provider` recovery action */
  fallbackProvider?: ILLMProvider;
  sleep?: Sleep;
  quiet?: boolean;
}

export interface TranslateDocumentOptions {
  /** Called after each window with the fraction of windows done */
  onProgress?: (fraction: number, completedBatches: number, totalBatches: number) => void;
  /** Awaited after each window is written into the document */
  onBatch?: (result: BatchResult) => void | Promise<void>;
  signal?: AbortSignal;
}

interface WindowPlan {
  position: number;
  size: number;
  lookahead: number;
}

const rangeLabel = (ids: readonly number[]): string =>
  ids.length <= 1 ? `entry ${ids[0] ?? '-'}` : `entries ${ids[0]}-${ids[ids.length - 1]}`;

export class TranslateStage {
  readonly config: TranslationConfig;
  private provider: ILLMProvider;
  private fallbackProvider?: ILLMProvider;
  private sleep: Sleep;
  private quiet: boolean;

  constructor(provider: ILLMProvider, config: Partial<TranslationConfig> = {}, options: TranslateStageOptions = {}) {
    this.provider = provider;
    this.config = { ...DEFAULT_TRANSLATION_CONFIG, ...config };
    this.fallbackProvider = options.fallbackProvider;
    this.sleep = options.sleep ?? realSleep;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Translate one window. Never returns translations for ids outside the
   * current batch. Throws when the batch is aborted, or exhausted with
   * fallback off. `signal` cancels the batch and its in-flight request.
   */
  async translateBatch(window: ContextWindow, signal?: AbortSignal): Promise<BatchResult> {
    const ids = window.batchIds();
    const ctx: RetryContext = {
      strategy: this.config.recovery,
      maxAttempts: this.config.maxRetries + 1,
      canSwitchProvider: this.fallbackProvider !== undefined,
      fallbackEnabled: this.config.useExtractiveFallback,
    };

    const translations = new Map<number, TranslatedEntry>();
    const glossaryUpdates = GlossaryManager.createEmpty();
    let tokensUsed = emptyTokenUsage();
    let state = initialRetryState(ids);

    while (state.phase === 'request' || state.phase === 'waiting') {
      if (signal?.aborted) {
        throw new TranslationError('timeout', `Request for ${rangeLabel(ids)} was aborted`, {
          affectedEntries: [...state.pending],
        });
      }
      if (state.phase === 'waiting') {
        await this.sleep(state.delayMs);
        state = transition(state, { type: 'resumed' }, ctx);
        continue;
      }

      const chunk = currentChunk(state);
      const provider = state.providerIndex === 0 ? this.provider : (this.fallbackProvider ?? this.provider);

      try {
        const { response, usage } = await this.request(provider, window.narrowedTo(chunk), signal);
        tokensUsed = addTokenUsage(tokensUsed, usage);

        const wanted = new Set(chunk);
        for (const t of response.translations) {
          if (wanted.has(t.id)) {
            translations.set(t.id, { id: t.id, translated: t.translated, confidence: t.confidence });
          }
        }
        const updates = response.notes?.glossary_updates;
        if (this.config.acceptGlossaryUpdates && updates) {
          glossaryUpdates.applyUpdates(updates);
        }

        state = transition(state, { type: 'success' }, ctx);
      } catch (error) {
        state = transition(state, { type: 'failure', error: classifyError(error) }, ctx);
        if (state.lastAction && !this.quiet) {
          console.warn(
            `[TranslateStage] ${rangeLabel(chunk)} failed (${state.lastError?.kind}): ${describeAction(state.lastAction)}`
          );
        }
      }
    }

    if (state.phase === 'aborted') {
      const last = state.lastError;
      if (!this.quiet) console.error(`[TranslateStage] Aborting ${rangeLabel(ids)}: ${state.abortReason}`);
      throw new TranslationError(last?.kind ?? 'unknown', state.abortReason ?? 'Batch aborted', {
        affectedEntries: [...state.pending],
        cause: last,
      });
    }

    let fallbackIds = state.fallbackIds;
    if (state.phase === 'exhausted') {
      if (!this.config.useExtractiveFallback) {
        throw (state.lastError ?? new TranslationError('unknown', 'Translation failed')).withEntries([...state.pending]);
      }
      fallbackIds = [...fallbackIds, ...state.pending];
    }

    for (const id of fallbackIds) {
      translations.set(id, { id, translated: '', confidence: 0 });
    }
    if (fallbackIds.length > 0 && !this.quiet) {
      console.warn(`[TranslateStage] Using empty placeholders for ${fallbackIds.length} entries`);
    }

    const result = new BatchResult(
      ids.flatMap(id => {
        const t = translations.get(id);
        return t ? [t] : [];
      }),
      ids,
      glossaryUpdates,
      state.retriesUsed,
      fallbackIds.length > 0,
      tokensUsed
    );

    if (!result.isComplete() && !this.quiet) {
      console.warn(`[TranslateStage] Model omitted ids: ${result.missingIds().join(', ')}`);
    }
    return result;
  }

  /**
   * Write the batch into the document. Empty texts (placeholders) are not
   * written, so those entries stay untranslated.
   */
  applyBatchResult(doc: SubtitleDocument, result: BatchResult): void {
    for (const t of result.translations) {
      const entry = doc.getEntry(t.id);
      if (entry && t.translated !== '') {
        entry.setTranslation(t.translated, t.confidence);
      }
    }
    if (!result.glossaryUpdates.isEmpty()) {
      doc.glossary.merge(result.glossaryUpdates);
    }
  }

  async translateDocument(doc: SubtitleDocument, options: TranslateDocumentOptions = {}): Promise<TranslationStats> {
    const stats = new TranslationStats();
    const plan = this.planWindows(doc);
    stats.totalBatches = plan.length;

    const summarizer = new HistorySummarizer();

    for (const [index, step] of plan.entries()) {
      if (options.signal?.aborted) {
        throw new TranslationError('unknown', 'Translation cancelled');
      }

      // Windows already translated (a resumed session) are not sent again
      if (doc.entries.slice(step.position, step.position + step.size).every(e => e.isTranslated())) {
        stats.completedBatches++;
        options.onProgress?.(stats.completedBatches / plan.length, stats.completedBatches, plan.length);
        continue;
      }

      let window = ContextWindow.at(doc, step.position, { ...this.config.window, lookaheadCount: step.lookahead }, step.size);
      if (window.needsSummarization(this.config.window)) {
        const summary = summarizer.summarize(doc.entries.slice(0, step.position)).text;
        if (summary) window = window.withHistorySummary(summary);
      }

      const result = await this.translateBatch(window);
      this.applyBatchResult(doc, result);
      await options.onBatch?.(result);

      stats.completedBatches++;
      stats.totalEntriesTranslated += result.translations.filter(t => t.translated !== '').length;
      stats.totalRetries += result.retriesUsed;
      stats.tokensUsed = addTokenUsage(stats.tokensUsed, result.tokensUsed);
      if (result.usedFallback) stats.fallbackUsedCount++;

      if (!this.quiet) {
        console.log(
          `[TranslateStage] Batch ${index + 1}/${plan.length} done (${rangeLabel(result.entryIds)}, retries: ${result.retriesUsed})`
        );
      }
      options.onProgress?.(stats.completedBatches / plan.length, stats.completedBatches, plan.length);
    }

    return stats;
  }

  /**
   * One corrective request for a single entry, built from its issues.
   * Returns the new text, or undefined when the model gave nothing usable.
   */
  async correctEntry(
    doc: SubtitleDocument,
    entry: DocumentEntry,
    issues: readonly ValidationIssue[]
  ): Promise<TranslatedEntry | undefined> {
    const messages = buildCorrectionMessages(doc, entry, issues);
    try {
      const completion = await withTimeout(
        signal => this.provider.complete(messages, { temperature: this.config.temperature, jsonMode: true, signal }),
        this.config.requestTimeoutMs,
        `Correction of entry ${entry.id}`
      );
      const response = parseResponse(completion.content);
      const fixed = response.translations.find(t => t.id === entry.id);
      return fixed && fixed.translated.trim() !== ''
        ? { id: fixed.id, translated: fixed.translated, confidence: fixed.confidence }
        : undefined;
    } catch (error) {
      if (!this.quiet) {
        console.warn(`[TranslateStage] Correction of entry ${entry.id} failed: ${classifyError(error).message}`);
      }
      return undefined;
    }
  }

  /**
   * Window positions and sizes for the whole document. Sizes depend only on
   * the source text and scenes, so they are fixed up front.
   */
  private planWindows(doc: SubtitleDocument): WindowPlan[] {
    const plan: WindowPlan[] = [];
    const { dynamicSizing, window } = this.config;
    const sizer = dynamicSizing ? new DynamicWindowSizer(dynamicSizing) : undefined;

    let position = 0;
    while (position < doc.length) {
      const size = sizer
        ? sizer.calculateOptimalSize(doc.entries, position, doc.scenes)
        : Math.min(Math.max(1, window.batchSize), doc.length - position);
      const lookahead = sizer
        ? sizer.calculateLookahead(doc.entries, position + size, window.lookaheadCount, doc.scenes)
        : window.lookaheadCount;
      plan.push({ position, size, lookahead });
      position += size;
    }
    return plan;
  }

  private async request(
    provider: ILLMProvider,
    window: ContextWindow,
    outer?: AbortSignal
  ): Promise<{ response: TranslationResponse; usage: TokenUsage }> {
    const messages: Message[] = [
      { role: 'system', content: renderTranslatorSystemPrompt(window.sourceLanguage, window.targetLanguage) },
      { role: 'user', content: createTranslatorPrompt(window, this.config.customInstructions) },
    ];

    const completion: CompletionResult = await withTimeout(
      timeoutSignal =>
        provider.complete(messages, {
          temperature: this.config.temperature,
          jsonMode: true,
          signal: outer ? AbortSignal.any([timeoutSignal, outer]) : timeoutSignal,
        }),
      this.config.requestTimeoutMs,
      `Request for ${rangeLabel(window.batchIds())}`
    );

    if (completion.finishReason === 'content_filter') {
      throw new TranslationError('provider_error', 'Response blocked by content filter');
    }
    return { response: parseResponse(completion.content), usage: completion.tokensUsed };
  }
}

function parseResponse(content: string): TranslationResponse {
  let json: unknown;
  try {
    json = parseJsonFromContent(content);
  } catch (error) {
    throw new TranslationError('parse_error', 'Could not parse translation response', { cause: error });
  }

  const parsed = TranslationResponseSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new TranslationError('invalid_response', `Unexpected response shape${where}: ${first?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * System + user messages asking the model to fix one entry
 */
export function buildCorrectionMessages(
  doc: SubtitleDocument,
  entry: DocumentEntry,
  issues: readonly ValidationIssue[]
): Message[] {
  return [
    {
      role: 'system',
      content: renderTranslatorSystemPrompt(doc.metadata.sourceLanguage, doc.metadata.targetLanguage ?? ''),
    },
    {
      role: 'user',
      content: createCorrectionPrompt(
        { id: entry.id, text: entry.originalText, previousTranslation: entry.translatedText ?? '' },
        issues.map(issueFeedback)
      ),
    },
  ];
}
