/**
 * Automatic repair of formatting and glossary issues
 */

import type { FormattingTag } from '../types/common.js';
import type { SubtitleDocument } from '../document/subtitle-document.js';
import { TAG_MARKERS, positionTag } from '../document/formatting.js';
import { GlossaryEnforcer } from '../glossary/glossary-enforcer.js';
import { isRepairable, type ValidationIssue } from './validation-issue.js';

export type RepairAction =
  | { type: 'added_formatting'; entryId: number; tag: FormattingTag }
  | { type: 'applied_glossary_correction'; entryId: number; before: string; after: string }
  | { type: 'no_repair_possible'; entryId: number; reason: string };

export interface RepairResult {
  /** True when every repairable issue was fixed */
  success: boolean;
  actions: RepairAction[];
  unresolvedIssues: ValidationIssue[];
}

export function describeRepair(action: RepairAction): string {
  switch (action.type) {
    case 'added_formatting':
      return `Entry ${action.entryId}: added ${action.tag} formatting`;
    case 'applied_glossary_correction':
      return `Entry ${action.entryId}: "${action.before}" -> "${action.after}"`;
    case 'no_repair_possible':
      return `Entry ${action.entryId}: ${action.reason}`;
  }
}

/**
 * Restore a tag the model dropped. Inline tags are only restored when the
 * whole original line was wrapped in them; anywhere else there is no way to
 * know which words they covered.
 */
export function repairFormatting(translated: string, tag: FormattingTag, original: string): string {
  switch (tag) {
    case 'italic':
    case 'bold':
    case 'underline': {
      const { open, close = '' } = TAG_MARKERS[tag];
      return original.startsWith(open) && original.endsWith(close) ? `${open}${translated}${close}` : translated;
    }
    case 'position': {
      const tag = positionTag(original);
      return tag ? `${tag}${translated}` : translated;
    }
    case 'color':
      return translated;
  }
}

export class TranslationRepairer {
  /**
   * Fix what can be fixed in place. Issues that are not repairable are
   * returned unresolved; repairable ones that could not be applied get a
   * `no_repair_possible` action.
   */
  repair(doc: SubtitleDocument, issues: readonly ValidationIssue[]): RepairResult {
    const enforcer = new GlossaryEnforcer(doc.glossary);
    const actions: RepairAction[] = [];
    const unresolvedIssues: ValidationIssue[] = [];
    // Several glossary issues on one entry need a single enforce pass
    const enforced = new Set<number>();

    for (const issue of issues) {
      if (!isRepairable(issue)) {
        unresolvedIssues.push(issue);
        continue;
      }

      const entry = doc.getEntry(issue.entryId);
      if (!entry || entry.translatedText === undefined) {
        unresolvedIssues.push(issue);
        continue;
      }
      const translated = entry.translatedText;

      if (issue.kind === 'missing_formatting') {
        const repaired = repairFormatting(translated, issue.tag, entry.originalText);
        if (repaired !== translated) {
          entry.setTranslation(repaired, entry.confidence);
          actions.push({ type: 'added_formatting', entryId: entry.id, tag: issue.tag });
        } else {
          actions.push({
            type: 'no_repair_possible',
            entryId: entry.id,
            reason: 'Could not determine formatting placement',
          });
          unresolvedIssues.push(issue);
        }
        continue;
      }

      let current = translated;
      if (!enforced.has(entry.id)) {
        enforced.add(entry.id);
        current = enforcer.enforce(entry.originalText, translated);
        if (current !== translated) {
          entry.setTranslation(current, entry.confidence);
          actions.push({ type: 'applied_glossary_correction', entryId: entry.id, before: translated, after: current });
        }
      }

      const { kind, term } = issue.issue;
      const remaining = enforcer.checkConsistency(entry.originalText, current);
      if (remaining.some(i => i.kind === kind && i.term === term)) {
        unresolvedIssues.push(issue);
      }
    }

    return {
      success: unresolvedIssues.every(i => !isRepairable(i)),
      actions,
      unresolvedIssues,
    };
  }
}
