/**
 * Translation Pipeline - Orchestrates the 3-phase subtitle translation
 *
 * Phase 1: Analyze - speakers, scenes, glossary, summary (local)
 * Phase 2: Translate - context windows through the LLM, in order
 * Phase 3: Validate - check, repair, optionally ask the model to correct
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { Language, Sleep } from '../types/common.js';
import type { PipelinePhase, PipelineResult, ProgressCallback } from '../types/pipeline.js';
import type { SubtitleDocument } from '../document/subtitle-document.js';
import { ANALYSIS_PRESETS, AnalyzeStage, describeAnalysis, type AnalysisConfig, type AnalysisResult } from '../stages/stage-1-analyze.js';
import { TRANSLATION_PRESETS, TranslateStage, TranslationStats, type BatchResult, type TranslationConfig } from '../stages/stage-2-translate.js';
import {
  VALIDATION_PRESETS,
  ValidateStage,
  type SemanticCheck,
  type ValidationConfig,
  type ValidationReport,
} from '../stages/stage-3-validate.js';
import { isRepairable } from '../quality/validation-issue.js';

export interface PipelineConfig {
  sourceLanguage: Language;
  targetLanguage: Language;
  enableAnalysis: boolean;
  enableValidation: boolean;
  /** Send entries with unrepairable issues back to the model once */
  correctIssues: boolean;
  analysis: AnalysisConfig;
  translation: TranslationConfig;
  validation: ValidationConfig;
}

export type PipelinePreset = 'default' | 'fast' | 'quality';

/**
 * Config for a language pair. `fast` skips validation; `quality` uses the
 * thorough analysis, large windows, strict validation and corrections.
 */
export function pipelineConfig(
  sourceLanguage: Language,
  targetLanguage: Language,
  preset: PipelinePreset = 'default'
): PipelineConfig {
  switch (preset) {
    case 'fast':
      return {
        sourceLanguage,
        targetLanguage,
        enableAnalysis: true,
        enableValidation: false,
        correctIssues: false,
        analysis: ANALYSIS_PRESETS.minimal,
        translation: TRANSLATION_PRESETS.fast,
        validation: VALIDATION_PRESETS.default,
      };
    case 'quality':
      return {
        sourceLanguage,
        targetLanguage,
        enableAnalysis: true,
        enableValidation: true,
        correctIssues: true,
        analysis: ANALYSIS_PRESETS.thorough,
        translation: TRANSLATION_PRESETS.quality,
        validation: VALIDATION_PRESETS.strict,
      };
    case 'default':
      return {
        sourceLanguage,
        targetLanguage,
        enableAnalysis: true,
        enableValidation: true,
        correctIssues: false,
        analysis: ANALYSIS_PRESETS.default,
        translation: TRANSLATION_PRESETS.default,
        validation: VALIDATION_PRESETS.default,
      };
  }
}

export interface PipelineDependencies {
  provider: ILLMProvider;
  fallbackProvider?: ILLMProvider;
  semanticCheck?: SemanticCheck;
  sleep?: Sleep;
  quiet?: boolean;
}

export interface RunOptions {
  onProgress?: ProgressCallback;
  /** Called after each translated window, e.g. to checkpoint a session */
  onBatch?: (result: BatchResult) => void | Promise<void>;
  signal?: AbortSignal;
}

const PHASE_SPAN: Record<PipelinePhase, { start: number; width: number }> = {
  analysis: { start: 0, width: 0.1 },
  translation: { start: 0.1, width: 0.8 },
  validation: { start: 0.9, width: 0.1 },
};

/** Overall progress: analysis 0-10%, translation 10-90%, validation 90-100% */
export const overallProgress = (phase: PipelinePhase, phaseProgress: number): number => {
  const span = PHASE_SPAN[phase];
  return span.start + Math.min(1, Math.max(0, phaseProgress)) * span.width;
};

export class TranslationPipeline {
  readonly config: PipelineConfig;
  private analyzeStage: AnalyzeStage;
  private translateStage: TranslateStage;
  private validateStage: ValidateStage;
  private quiet: boolean;

  constructor(config: PipelineConfig, deps: PipelineDependencies) {
    this.config = config;
    this.quiet = deps.quiet ?? false;
    this.analyzeStage = new AnalyzeStage(config.analysis, { quiet: this.quiet });
    this.translateStage = new TranslateStage(deps.provider, config.translation, {
      fallbackProvider: deps.fallbackProvider,
      sleep: deps.sleep,
      quiet: this.quiet,
    });
    this.validateStage = new ValidateStage(config.validation, {
      semanticCheck: deps.semanticCheck,
      quiet: this.quiet,
    });
  }

  /**
   * Run all enabled phases over `doc`, writing translations into it.
   * Never throws for translation failures; they come back in `error`.
   */
  async translate(doc: SubtitleDocument, options: RunOptions = {}): Promise<PipelineResult> {
    const startTime = Date.now();
    const report = (phase: PipelinePhase, phaseProgress: number, message?: string): void => {
      options.onProgress?.({ phase, phaseProgress, overallProgress: overallProgress(phase, phaseProgress), message });
    };

    if (doc.metadata.targetLanguage === undefined) {
      doc.withTargetLanguage(this.config.targetLanguage);
    }

    // ============ PHASE 1: ANALYZE ============
    let analysis: AnalysisResult | undefined;
    if (this.config.enableAnalysis) {
      report('analysis', 0, 'Analyzing document...');
      const stage1 = this.analyzeStage.execute(doc);
      if (stage1.success && stage1.data) {
        analysis = stage1.data;
        report('analysis', 1, `Analysis complete: ${describeAnalysis(analysis)}`);
      } else {
        this.log('warn', `Analysis failed, translating without it: ${stage1.error}`);
        report('analysis', 1, 'Analysis failed');
      }
    }

    // ============ PHASE 2: TRANSLATE ============
    report('translation', 0, 'Translating...');
    let stats: TranslationStats;
    try {
      stats = await this.translateStage.translateDocument(doc, {
        signal: options.signal,
        onBatch: options.onBatch,
        onProgress: (fraction, done, total) =>
          report('translation', fraction, `Translated batch ${done}/${total}`),
      });
    } catch (error) {
      const message = `Translation failed: ${error instanceof Error ? error.message : String(error)}`;
      this.log('error', message);
      return {
        analysis,
        translationStats: new TranslationStats(),
        tokensUsed: { prompt: 0, completion: 0, total: 0 },
        durationMs: Date.now() - startTime,
        success: false,
        error: message,
      };
    }
    report('translation', 1, 'Translation complete');

    // ============ PHASE 3: VALIDATE ============
    let validation: ValidationReport | undefined;
    if (this.config.enableValidation) {
      report('validation', 0, 'Validating translations...');
      const stage3 = this.validateStage.execute(doc);
      if (stage3.success && stage3.data) {
        validation = stage3.data;
        if (this.config.correctIssues && !options.signal?.aborted) {
          validation = await this.correct(doc, validation);
        }
        report('validation', 1, validation.summary());
      } else {
        this.log('warn', `Validation failed: ${stage3.error}`);
        report('validation', 1, 'Validation failed');
      }
    }

    const durationMs = Date.now() - startTime;
    this.log('log', `Done in ${(durationMs / 1000).toFixed(1)}s, ${stats.tokensUsed.total} tokens used`);

    return {
      analysis,
      translationStats: stats,
      validation,
      tokensUsed: stats.tokensUsed,
      durationMs,
      success: true,
    };
  }

  analyze(doc: SubtitleDocument): AnalysisResult {
    return this.analyzeStage.analyzeAndUpdate(doc);
  }

  validate(doc: SubtitleDocument): ValidationReport {
    return this.validateStage.validateAndRepair(doc);
  }

  /**
   * One corrective request per entry whose remaining issues repair could
   * not handle, then a fresh validation
   */
  private async correct(doc: SubtitleDocument, validation: ValidationReport): Promise<ValidationReport> {
    const entryIds = [...new Set(validation.issues.filter(i => !isRepairable(i)).map(i => i.entryId))];
    if (entryIds.length === 0) return validation;

    this.log('log', `Requesting corrections for ${entryIds.length} entries`);
    let corrected = 0;
    for (const id of entryIds) {
      const entry = doc.getEntry(id);
      if (!entry) continue;
      const fixed = await this.translateStage.correctEntry(doc, entry, validation.issuesFor(id));
      if (fixed) {
        entry.setTranslation(fixed.translated, fixed.confidence);
        corrected++;
      }
    }

    return corrected > 0 ? this.validateStage.validateAndRepair(doc) : validation;
  }

  private log(level: 'log' | 'warn' | 'error', message: string): void {
    if (!this.quiet) console[level](`[Pipeline] ${message}`);
  }
}

export const pipelineQualityScore = (result: PipelineResult): number | undefined => result.validation?.qualityScore;

export function summarizePipelineResult(result: PipelineResult): string {
  const parts = [`Duration: ${(result.durationMs / 1000).toFixed(2)}s`];
  if (result.analysis) {
    parts.push(`Analysis: ${describeAnalysis(result.analysis)}`);
  }
  parts.push(
    `Translation: ${result.translationStats.totalEntriesTranslated} entries in ${result.translationStats.totalBatches} batches`
  );
  if (result.validation) {
    parts.push(`Validation: ${(result.validation.qualityScore * 100).toFixed(1)}% quality score`);
  }
  if (!result.success && result.error) {
    parts.push(`Error: ${result.error}`);
  }
  return parts.join(' | ');
}
