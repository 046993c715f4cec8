/**
 * Glossary Enforcer - checks and fixes terminology in finished translations
 */

import type { GlossaryIssue } from '../types/glossary.js';
import type { GlossaryManager } from './glossary-manager.js';

export class GlossaryEnforcer {
  constructor(private readonly glossary: GlossaryManager) {}

  /**
   * A character name present in the original must survive unchanged, and a
   * recorded term present in the original must appear in its target form.
   */
  checkConsistency(original: string, translated: string): GlossaryIssue[] {
    const issues: GlossaryIssue[] = [];

    for (const name of this.glossary.characterNames) {
      if (original.includes(name) && !translated.includes(name)) {
        issues.push({ kind: 'missing_name', term: name });
      }
    }

    for (const [source, term] of this.glossary.terms) {
      if (original.includes(source) && !translated.includes(term.target)) {
        issues.push({ kind: 'inconsistent_term', term: source, expected: term.target });
      }
    }

    return issues;
  }

  /**
   * Replace source terms the model left untranslated with their target form
   */
  enforce(original: string, translated: string): string {
    let result = translated;
    for (const [source, term] of this.glossary.terms) {
      if (original.includes(source) && result.includes(source)) {
        result = result.split(source).join(term.target);
      }
    }
    return result;
  }
}
