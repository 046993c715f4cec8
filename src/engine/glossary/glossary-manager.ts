/**
 * Glossary Manager - keeps character names and term renderings consistent
 * across a whole subtitle document.
 *
 * Character names are recorded so the model leaves them untranslated.
 * Terms map a source phrase to the rendering every batch must reuse.
 */

import { z } from 'zod';
import type { GlossaryData, GlossaryTerm } from '../types/glossary.js';

export const GlossaryDataSchema = z.object({
  characterNames: z.array(z.string()).default([]),
  terms: z
    .array(z.object({ source: z.string(), target: z.string(), context: z.string().optional() }))
    .default([]),
  technicalTerms: z.record(z.string()).default({}),
});

export class GlossaryManager {
  readonly characterNames: Set<string>;
  readonly terms: Map<string, GlossaryTerm>;
  readonly technicalTerms: Map<string, string>;

  constructor(data?: Partial<GlossaryData>) {
    this.characterNames = new Set(data?.characterNames ?? []);
    this.terms = new Map((data?.terms ?? []).map(t => [t.source, { ...t }]));
    this.technicalTerms = new Map(Object.entries(data?.technicalTerms ?? {}));
  }

  static createEmpty(): GlossaryManager {
    return new GlossaryManager();
  }

  static fromJSON(json: string): GlossaryManager {
    return new GlossaryManager(GlossaryDataSchema.parse(JSON.parse(json)));
  }

  toJSON(): string {
    return JSON.stringify(this.getData(), null, 2);
  }

  getData(): GlossaryData {
    return {
      characterNames: [...this.characterNames],
      terms: [...this.terms.values()].map(t => ({ ...t })),
      technicalTerms: Object.fromEntries(this.technicalTerms),
    };
  }

  /**
   * Independent copy. Context windows hold one of these so that merges into
   * the document glossary never leak into a window already handed out.
   */
  clone(): GlossaryManager {
    return new GlossaryManager(this.getData());
  }

  // ============ Mutation ============

  addCharacter(name: string): void {
    const trimmed = name.trim();
    if (trimmed) this.characterNames.add(trimmed);
  }

  addTerm(source: string, target: string, context?: string): void {
    this.terms.set(source, { source, target, context });
  }

  addTechnicalTerm(source: string, target: string): void {
    this.technicalTerms.set(source, target);
  }

  /**
   * Union of both glossaries. On a key collision the incoming entry wins.
   */
  merge(other: GlossaryManager): void {
    for (const name of other.characterNames) {
      this.characterNames.add(name);
    }
    for (const [source, term] of other.terms) {
      this.terms.set(source, { ...term });
    }
    for (const [source, target] of other.technicalTerms) {
      this.technicalTerms.set(source, target);
    }
  }

  /**
   * Apply `{ source: target }` pairs proposed by the model during translation
   */
  applyUpdates(updates: Record<string, string>): void {
    for (const [source, target] of Object.entries(updates)) {
      this.addTerm(source, target);
    }
  }

  // ============ Lookup ============

  isCharacterName(name: string): boolean {
    return this.characterNames.has(name);
  }

  /** Terms take precedence over technical terms */
  getTranslation(source: string): string | undefined {
    return this.terms.get(source)?.target ?? this.technicalTerms.get(source);
  }

  /** All recorded source → target pairs, terms overriding technical terms */
  allTerms(): Map<string, string> {
    const result = new Map(this.technicalTerms);
    for (const [source, term] of this.terms) {
      result.set(source, term.target);
    }
    return result;
  }

  isEmpty(): boolean {
    return this.characterNames.size === 0 && this.terms.size === 0 && this.technicalTerms.size === 0;
  }

  /**
   * Generate prompt-friendly glossary text
   */
  toPromptText(): string {
    let text = '';

    if (this.characterNames.size > 0) {
      text += '### Characters (keep as written)\n';
      text += [...this.characterNames].sort().map(n => `- ${n}`).join('\n');
      text += '\n\n';
    }

    const terms = this.allTerms();
    if (terms.size > 0) {
      text += '### Terms\n';
      for (const [source, target] of terms) {
        text += `- ${source} → ${target}\n`;
      }
    }

    return text;
  }

  // Getters
  get characterCount(): number { return this.characterNames.size; }
  get termCount(): number { return this.terms.size + this.technicalTerms.size; }
}
