/**
 * Validation issues found in translated entries
 *
 * Severity is in 0..1. Anything at or above CRITICAL_SEVERITY fails a report.
 */

import type { FormattingTag } from '../types/common.js';
import type { GlossaryIssue } from '../types/glossary.js';

export const CRITICAL_SEVERITY = 0.8;

export type ValidationIssue =
  | { kind: 'missing_translation'; entryId: number }
  | { kind: 'empty_translation'; entryId: number }
  | {
      kind: 'length_too_long';
      entryId: number;
      originalLength: number;
      translatedLength: number;
      ratio: number;
      /** The configured max ratio that was exceeded */
      bound: number;
    }
  | {
      kind: 'length_too_short';
      entryId: number;
      originalLength: number;
      translatedLength: number;
      ratio: number;
      bound: number;
    }
  | { kind: 'missing_formatting'; entryId: number; tag: FormattingTag }
  | { kind: 'glossary_inconsistency'; entryId: number; issue: GlossaryIssue }
  | { kind: 'low_confidence'; entryId: number; confidence: number }
  | { kind: 'semantic_divergence'; entryId: number; score: number; reason: string };

export type ValidationIssueKind = ValidationIssue['kind'];

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export function issueSeverity(issue: ValidationIssue): number {
  switch (issue.kind) {
    case 'missing_translation':
    case 'empty_translation':
      return 1;
    case 'length_too_long':
      return clamp(issue.ratio - issue.bound, 0.3, 1);
    case 'length_too_short':
      return clamp(issue.bound - issue.ratio, 0.3, 1);
    case 'missing_formatting':
      return 0.5;
    case 'glossary_inconsistency':
      return 0.4;
    case 'low_confidence':
      return clamp(1 - issue.confidence, 0, 1);
    case 'semantic_divergence':
      return Math.max(0.8, clamp(issue.score, 0, 1));
  }
}

export const isCritical = (issue: ValidationIssue): boolean => issueSeverity(issue) >= CRITICAL_SEVERITY;

/** Only formatting and glossary issues can be fixed without the model */
export const isRepairable = (
  issue: ValidationIssue,
): issue is Extract<ValidationIssue, { kind: 'missing_formatting' | 'glossary_inconsistency' }> =>
  issue.kind === 'missing_formatting' || issue.kind === 'glossary_inconsistency';

const percent = (value: number): string => `${Math.round(value * 100)}%`;

export function describeIssue(issue: ValidationIssue): string {
  switch (issue.kind) {
    case 'missing_translation':
      return `Entry ${issue.entryId}: missing translation`;
    case 'empty_translation':
      return `Entry ${issue.entryId}: empty translation`;
    case 'length_too_long':
      return `Entry ${issue.entryId}: translation too long (${issue.translatedLength} vs ${issue.originalLength} chars, ratio ${issue.ratio.toFixed(2)})`;
    case 'length_too_short':
      return `Entry ${issue.entryId}: translation too short (${issue.translatedLength} vs ${issue.originalLength} chars, ratio ${issue.ratio.toFixed(2)})`;
    case 'missing_formatting':
      return `Entry ${issue.entryId}: missing ${issue.tag} formatting`;
    case 'glossary_inconsistency':
      return issue.issue.kind === 'missing_name'
        ? `Entry ${issue.entryId}: character name "${issue.issue.term}" missing from translation`
        : `Entry ${issue.entryId}: term "${issue.issue.term}" should be translated as "${issue.issue.expected ?? ''}"`;
    case 'low_confidence':
      return `Entry ${issue.entryId}: low confidence (${issue.confidence.toFixed(2)})`;
    case 'semantic_divergence':
      return `Entry ${issue.entryId}: meaning diverges from the original (${issue.reason})`;
  }
}

/**
 * Turn an issue into an instruction for a corrective retry
 */
export function issueFeedback(issue: ValidationIssue): string {
  switch (issue.kind) {
    case 'missing_translation':
    case 'empty_translation':
      return 'The translation is missing; translate the full line.';
    case 'length_too_long':
      return `Translation is ${percent(issue.ratio - 1)} longer than the original; shorten it to under ${percent(issue.bound)} of the original length.`;
    case 'length_too_short':
      return `Translation is only ${percent(issue.ratio)} of the original length; make sure nothing was left out.`;
    case 'missing_formatting':
      return `Keep the ${issue.tag} formatting tags from the original.`;
    case 'glossary_inconsistency':
      return issue.issue.kind === 'missing_name'
        ? `Keep the character name "${issue.issue.term}" unchanged.`
        : `Translate "${issue.issue.term}" as "${issue.issue.expected ?? issue.issue.term}".`;
    case 'low_confidence':
      return 'Re-check the translation; the previous attempt was uncertain.';
    case 'semantic_divergence':
      return `Stay closer to the original meaning: ${issue.reason}.`;
  }
}
