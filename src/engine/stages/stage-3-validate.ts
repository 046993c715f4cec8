/**
 * Stage 3: Validation and repair
 *
 * Checks every entry of a translated document (completeness, length ratio,
 * formatting, glossary, confidence and an optional semantic check), fixes
 * what can be fixed without the model and scores the result.
 */

import type { StageResult } from '../types/pipeline.js';
import type { DocumentEntry, SubtitleDocument } from '../document/subtitle-document.js';
import { hasTag } from '../document/formatting.js';
import { GlossaryEnforcer } from '../glossary/glossary-enforcer.js';
import { charLength } from '../utils/chunker.js';
import { CRITICAL_SEVERITY, issueSeverity, type ValidationIssue } from '../quality/validation-issue.js';
import { TranslationRepairer, type RepairResult } from '../quality/repair.js';
import {
  QualityMetrics,
  QUALITY_THRESHOLDS,
  collectMetricsData,
  type QualityScore,
} from '../quality/metrics.js';

export interface ValidationConfig {
  maxLengthRatio: number;
  minLengthRatio: number;
  checkFormatting: boolean;
  checkGlossaryConsistency: boolean;
  enableAutoRepair: boolean;
  minConfidenceThreshold: number;
}

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  maxLengthRatio: 1.5,
  minLengthRatio: 0.3,
  checkFormatting: true,
  checkGlossaryConsistency: true,
  enableAutoRepair: true,
  minConfidenceThreshold: 0.5,
};

export const VALIDATION_PRESETS = {
  default: DEFAULT_VALIDATION_CONFIG,
  strict: {
    maxLengthRatio: 1.2,
    minLengthRatio: 0.5,
    checkFormatting: true,
    checkGlossaryConsistency: true,
    enableAutoRepair: true,
    minConfidenceThreshold: 0.7,
  },
  lenient: {
    maxLengthRatio: 2.0,
    minLengthRatio: 0.2,
    checkFormatting: true,
    checkGlossaryConsistency: false,
    enableAutoRepair: true,
    minConfidenceThreshold: 0.3,
  },
} satisfies Record<string, ValidationConfig>;

export interface SemanticDivergence {
  /** 0..1, higher means further from the original */
  score: number;
  reason: string;
}

/**
 * Caller-supplied meaning check, e.g. back-translation or an embedding
 * comparison. Returns undefined when the translation is acceptable.
 */
export type SemanticCheck = (entry: DocumentEntry) => SemanticDivergence | undefined;

export interface ValidateStageOptions {
  semanticCheck?: SemanticCheck;
  quiet?: boolean;
}

export class ValidationReport {
  readonly qualityScore: number;
  readonly entriesWithIssues: number;

  constructor(
    /** Issues left after repair */
    readonly issues: ValidationIssue[],
    readonly entriesValidated: number,
    readonly metrics: QualityScore,
    /** Issues found before repair; same as `issues` when nothing was repaired */
    readonly rawIssues: ValidationIssue[] = issues,
    readonly repair?: RepairResult
  ) {
    const totalSeverity = issues.reduce((sum, issue) => sum + issueSeverity(issue), 0);
    this.qualityScore = entriesValidated === 0 ? 1 : Math.max(0, 1 - totalSeverity / entriesValidated);
    this.entriesWithIssues = new Set(issues.map(i => i.entryId)).size;
  }

  criticalIssues(): ValidationIssue[] {
    return this.issues.filter(i => issueSeverity(i) >= CRITICAL_SEVERITY);
  }

  passed(): boolean {
    return this.criticalIssues().length === 0;
  }

  issuesFor(entryId: number): ValidationIssue[] {
    return this.issues.filter(i => i.entryId === entryId);
  }

  summary(): string {
    return `Validated ${this.entriesValidated} entries: ${this.issues.length} issues found, ${this.entriesWithIssues} entries affected, quality score: ${(this.qualityScore * 100).toFixed(2)}%`;
  }
}

export class ValidateStage {
  private config: ValidationConfig;
  private semanticCheck?: SemanticCheck;
  private quiet: boolean;

  constructor(config: Partial<ValidationConfig> = {}, options: ValidateStageOptions = {}) {
    this.config = { ...DEFAULT_VALIDATION_CONFIG, ...config };
    this.semanticCheck = options.semanticCheck;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Check the document without changing it
   */
  validate(doc: SubtitleDocument): ValidationReport {
    const issues = doc.entries.flatMap(entry => this.validateEntry(entry, doc));
    return new ValidationReport(issues, doc.length, this.scoreMetrics(doc, issues));
  }

  /**
   * Validate, repair in place when enabled, then validate again so the
   * report reflects the repaired document
   */
  validateAndRepair(doc: SubtitleDocument): ValidationReport {
    const first = this.validate(doc);
    if (!this.config.enableAutoRepair || first.issues.length === 0) {
      return first;
    }

    const repair = new TranslationRepairer().repair(doc, first.issues);
    if (repair.actions.length > 0 && !this.quiet) {
      console.log(`[ValidateStage] Applied ${repair.actions.length} repairs`);
    }

    const issues = doc.entries.flatMap(entry => this.validateEntry(entry, doc));
    return new ValidationReport(issues, doc.length, this.scoreMetrics(doc, issues), first.issues, repair);
  }

  /**
   * Stage wrapper used by the pipeline
   */
  execute(doc: SubtitleDocument): StageResult<ValidationReport> {
    const startTime = Date.now();
    try {
      const data = this.validateAndRepair(doc);
      if (!this.quiet) {
        console.log(`[ValidateStage] ${data.summary()}`);
        if (!data.passed()) {
          console.warn(`[ValidateStage] ${data.criticalIssues().length} critical issues remain`);
        }
      }
      return { stage: 'validate', success: true, data, tokensUsed: 0, duration: Date.now() - startTime };
    } catch (error) {
      return {
        stage: 'validate',
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        tokensUsed: 0,
        duration: Date.now() - startTime,
      };
    }
  }

  validateEntry(entry: DocumentEntry, doc: SubtitleDocument): ValidationIssue[] {
    const translated = entry.translatedText;
    if (translated === undefined) {
      return [{ kind: 'missing_translation', entryId: entry.id }];
    }
    if (translated.trim() === '' && entry.originalText.trim() !== '') {
      return [{ kind: 'empty_translation', entryId: entry.id }];
    }

    const issues: ValidationIssue[] = [];

    const originalLength = charLength(entry.originalText);
    if (originalLength > 0) {
      const translatedLength = charLength(translated);
      const ratio = translatedLength / originalLength;
      if (ratio > this.config.maxLengthRatio) {
        issues.push({
          kind: 'length_too_long',
          entryId: entry.id,
          originalLength,
          translatedLength,
          ratio,
          bound: this.config.maxLengthRatio,
        });
      } else if (ratio < this.config.minLengthRatio) {
        issues.push({
          kind: 'length_too_short',
          entryId: entry.id,
          originalLength,
          translatedLength,
          ratio,
          bound: this.config.minLengthRatio,
        });
      }
    }

    if (this.config.checkFormatting) {
      for (const tag of entry.formatting) {
        if (!hasTag(translated, tag)) {
          issues.push({ kind: 'missing_formatting', entryId: entry.id, tag });
        }
      }
    }

    if (this.config.checkGlossaryConsistency) {
      const enforcer = new GlossaryEnforcer(doc.glossary);
      for (const issue of enforcer.checkConsistency(entry.originalText, translated)) {
        issues.push({ kind: 'glossary_inconsistency', entryId: entry.id, issue });
      }
    }

    if (entry.confidence !== undefined && entry.confidence < this.config.minConfidenceThreshold) {
      issues.push({ kind: 'low_confidence', entryId: entry.id, confidence: entry.confidence });
    }

    const divergence = this.semanticCheck?.(entry);
    if (divergence) {
      issues.push({ kind: 'semantic_divergence', entryId: entry.id, ...divergence });
    }

    return issues;
  }

  private scoreMetrics(doc: SubtitleDocument, issues: readonly ValidationIssue[]): QualityScore {
    const metrics = new QualityMetrics({
      ...QUALITY_THRESHOLDS.default,
      maxLengthRatio: this.config.maxLengthRatio,
      minLengthRatio: this.config.minLengthRatio,
    });
    return metrics.score(
      collectMetricsData(doc, {
        entriesWithIssues: new Set(issues.map(i => i.entryId)).size,
        inconsistentTerms: issues.filter(i => i.kind === 'glossary_inconsistency').length,
        missingTags: issues.filter(i => i.kind === 'missing_formatting').length,
      })
    );
  }
}
