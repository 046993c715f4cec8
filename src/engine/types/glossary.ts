/**
 * Glossary types
 */

export interface GlossaryTerm {
  source: string;
  target: string;
  context?: string;
}

/** Plain JSON shape of a glossary, used for persistence and prompts */
export interface GlossaryData {
  characterNames: string[];
  terms: GlossaryTerm[];
  technicalTerms: Record<string, string>;
}

export type GlossaryIssueKind = 'missing_name' | 'inconsistent_term';

export interface GlossaryIssue {
  kind: GlossaryIssueKind;
  /** Character name or source term */
  term: string;
  /** Expected target rendering, for terms */
  expected?: string;
}
