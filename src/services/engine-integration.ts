/**
 * Engine Integration - wires the cuecraft engine to the app
 *
 * Builds providers and pipelines from AppConfig, translates SRT contents
 * with session checkpointing, and runs several files side by side.
 */

import {
  TranslationPipeline,
  OpenAIProvider,
  MockProvider,
  GlossaryManager,
  SubtitleDocument,
  WorkerPool,
  TranslationError,
  RECOVERY_STRATEGIES,
  pipelineConfig,
  profileFor,
  renumberEntries,
  summarizePipelineResult,
  type BatchResult,
  type ILLMProvider,
  type PipelinePreset,
  type PipelineResult,
  type ProgressCallback,
  type ResumeOutcome,
  type SessionRepository,
  type Sleep,
  type TranslationSession,
} from '../engine/index.js';

import type { AppConfig } from '../config.js';
import { hashContent } from '../storage/database.js';
import { parseSrtWithWarnings } from './import/srt.js';
import { formatSrt } from './export/srt.js';

/** Whole-file tasks in translateFiles; the pipeline times its own requests */
const FILE_TASK_TIMEOUT = 6 * 60 * 60 * 1000;

const isLocal = (provider: string): boolean => provider === 'ollama' || provider === 'lmstudio';

/**
 * Create the LLM provider named in config
 */
export function createProvider(config: AppConfig): ILLMProvider {
  switch (config.provider) {
    case 'mock':
      return new MockProvider({ model: 'mock-model' });
    case 'openai':
    case 'anthropic':
    case 'ollama':
    case 'lmstudio':
      return new OpenAIProvider({
        name: config.provider,
        // Local servers ignore the key, but the client needs one
        apiKey: config.openai.apiKey || (isLocal(config.provider) ? config.provider : ''),
        model: config.openai.model,
        baseUrl: config.openai.baseUrl,
        timeout: config.translation.requestTimeoutMs,
      });
    default:
      throw new TranslationError('config_error', `Unsupported provider: ${config.provider}`);
  }
}

export interface PipelineOverrides {
  sourceLanguage?: string;
  targetLanguage?: string;
  preset?: PipelinePreset;
  provider?: ILLMProvider;
  sleep?: Sleep;
  quiet?: boolean;
}

/**
 * Create translation pipeline from config, with per-request overrides
 */
export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): TranslationPipeline {
  const preset = overrides.preset ?? config.translation.preset;
  const pipeline = pipelineConfig(
    overrides.sourceLanguage ?? config.translation.sourceLanguage,
    overrides.targetLanguage ?? config.translation.targetLanguage,
    preset
  );
  pipeline.translation = {
    ...pipeline.translation,
    recovery: RECOVERY_STRATEGIES[config.translation.recoveryProfile],
    requestTimeoutMs: config.translation.requestTimeoutMs,
  };

  const provider = overrides.provider ?? createProvider(config);
  if (!overrides.quiet) {
    console.log(
      `[Pipeline] Creating pipeline: ${provider.name}/${provider.model}, ` +
        `${pipeline.sourceLanguage} -> ${pipeline.targetLanguage}, preset: ${preset}`
    );
  }

  return new TranslationPipeline(pipeline, {
    provider,
    sleep: overrides.sleep,
    quiet: overrides.quiet,
  });
}

// ============ Single file ============

export interface TranslateSrtOptions extends PipelineOverrides {
  sourceFile: string;
  /** Checkpoint and resume through this repository when given */
  sessions?: SessionRepository;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface TranslateSrtResult {
  sourceFile: string;
  srt: string;
  entryCount: number;
  /** Absent when a completed session was reused */
  result?: PipelineResult;
  summary: string;
  resume: ResumeOutcome['status'] | 'disabled';
  sessionId?: string;
  warnings: string[];
}

function translationsOf(batch: BatchResult): Record<string, string> {
  return Object.fromEntries(batch.translations.filter(t => t.translated !== '').map(t => [String(t.id), t.translated]));
}

function documentTranslations(doc: SubtitleDocument): Record<string, string> {
  return Object.fromEntries(doc.translatedEntries().map(e => [String(e.id), e.toRaw().text]));
}

/**
 * Write a stored session's translations and glossary back into a document
 */
export function restoreSession(doc: SubtitleDocument, session: TranslationSession): number {
  let restored = 0;
  for (const [id, text] of Object.entries(session.translations)) {
    const entry = doc.getEntry(Number(id));
    if (entry) {
      entry.setTranslation(text);
      restored++;
    }
  }
  if (session.glossary) {
    doc.glossary.merge(new GlossaryManager(session.glossary));
  }
  return restored;
}

/**
 * Translate SRT contents. Never throws for translation failures; they come
 * back in `result.error` and the session is marked failed.
 */
export async function translateSrt(
  config: AppConfig,
  content: string,
  options: TranslateSrtOptions
): Promise<TranslateSrtResult> {
  const { entries, warnings } = parseSrtWithWarnings(content);
  for (const warning of warnings) {
    if (!options.quiet) console.warn(`[Import] ${options.sourceFile}: ${warning}`);
  }
  if (entries.length === 0) {
    throw new TranslationError('config_error', `No subtitle entries found in ${options.sourceFile}`);
  }

  const sourceLanguage = options.sourceLanguage ?? config.translation.sourceLanguage;
  const targetLanguage = options.targetLanguage ?? config.translation.targetLanguage;
  const provider = options.provider ?? createProvider(config);

  const doc = SubtitleDocument.fromEntries(entries, sourceLanguage)
    .withTargetLanguage(targetLanguage)
    .withSourceFile(options.sourceFile);

  const output = (): string => formatSrt(renumberEntries(doc.toRawEntries()));

  // ============ Session lookup ============
  const sessions = options.sessions;
  let session: TranslationSession | undefined;
  let resume: TranslateSrtResult['resume'] = 'disabled';

  if (sessions) {
    const lookup = {
      sourceFile: options.sourceFile,
      contentHash: hashContent(content),
      sourceLanguage,
      targetLanguage,
      provider: provider.name,
      model: provider.model,
    };
    const outcome = await sessions.findResumable(lookup);
    resume = outcome.status;

    switch (outcome.status) {
      case 'already_completed':
        restoreSession(doc, outcome.session);
        if (!options.quiet) console.log(`[Session] ${options.sourceFile} already translated (${outcome.session.id})`);
        return {
          sourceFile: options.sourceFile,
          srt: output(),
          entryCount: doc.length,
          summary: `Reused completed session ${outcome.session.id}`,
          resume,
          sessionId: outcome.session.id,
          warnings,
        };
      case 'resumed': {
        session = outcome.session;
        const restored = restoreSession(doc, session);
        if (!options.quiet) console.log(`[Session] Resuming ${session.id}: ${restored}/${doc.length} entries done`);
        break;
      }
      case 'source_file_changed':
        if (!options.quiet) console.log(`[Session] ${options.sourceFile} changed since session ${outcome.session.id}, starting over`);
        session = await sessions.create(lookup, doc.length);
        break;
      case 'failed':
        if (!options.quiet) console.log(`[Session] Previous session ${outcome.session.id} failed, starting over`);
        session = await sessions.create(lookup, doc.length);
        break;
      case 'not_found':
        session = await sessions.create(lookup, doc.length);
        break;
    }
  }

  // ============ Translate ============
  const pipeline = createPipeline(config, { ...options, provider, sourceLanguage, targetLanguage });
  const active = session;
  const result = await pipeline.translate(doc, {
    onProgress: options.onProgress,
    signal: options.signal,
    onBatch:
      sessions && active
        ? batch => sessions.updateProgress(active.id, translationsOf(batch), doc.glossary.getData())
        : undefined,
  });

  if (sessions && active) {
    if (result.success) {
      // Repairs and corrections rewrite entries after their batch was saved
      await sessions.updateProgress(active.id, documentTranslations(doc), doc.glossary.getData());
      await sessions.markComplete(active.id);
    } else {
      await sessions.markFailed(active.id, result.error ?? 'Translation failed');
    }
  }

  return {
    sourceFile: options.sourceFile,
    srt: output(),
    entryCount: doc.length,
    result,
    summary: summarizePipelineResult(result),
    resume,
    sessionId: active?.id,
    warnings,
  };
}

// ============ Several files ============

export interface SourceFile {
  name: string;
  content: string;
}

export type FileOutcome =
  | { sourceFile: string; ok: true; translation: TranslateSrtResult }
  | { sourceFile: string; ok: false; error: string };

/**
 * Translate several files concurrently, each through its own sequential
 * pipeline. Results keep the input order.
 */
export async function translateFiles(
  config: AppConfig,
  files: readonly SourceFile[],
  options: Omit<TranslateSrtOptions, 'sourceFile' | 'onProgress'> & {
    onFileDone?: (completed: number, total: number) => void;
  } = {}
): Promise<FileOutcome[]> {
  const provider = options.provider ?? createProvider(config);
  const pool = new WorkerPool(
    {
      maxConcurrent: config.translation.maxConcurrency ?? profileFor(provider.name).maxConcurrentRequests,
      taskTimeoutMs: FILE_TASK_TIMEOUT,
      maxRetries: 0,
    },
    { sleep: options.sleep, quiet: options.quiet }
  );

  const outcomes = await pool.run(
    files.map((file, index) => ({
      id: index,
      run: () => translateSrt(config, file.content, { ...options, provider, sourceFile: file.name }),
    })),
    { signal: options.signal, onProgress: options.onFileDone }
  );

  return outcomes.map((outcome): FileOutcome => {
    const sourceFile = files[outcome.id].name;
    return outcome.ok
      ? { sourceFile, ok: true, translation: outcome.value }
      : { sourceFile, ok: false, error: outcome.error.message };
  });
}
