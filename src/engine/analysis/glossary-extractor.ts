/**
 * Glossary extraction - recurring capitalised names and quoted phrases
 */

import stopWords from './data/stop-words.json' with { type: 'json' };
import type { DocumentEntry, SubtitleDocument } from '../document/subtitle-document.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';

const NAME_PATTERN = /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)\b/g;
const QUOTED_PATTERN = /"([^"]+)"/g;

const SENTENCE_ADVERBS = new Set(stopWords.sentenceAdverbs);

export const DEFAULT_STOP_WORDS: readonly string[] = stopWords.capitalized;

export interface ExtractionConfig {
  minOccurrences: number;
  extractNames: boolean;
  extractQuoted: boolean;
  excludeWords: ReadonlySet<string>;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  minOccurrences: 2,
  extractNames: true,
  extractQuoted: true,
  excludeWords: new Set(DEFAULT_STOP_WORDS),
};

export const EXTRACTION_PRESETS = {
  default: DEFAULT_EXTRACTION_CONFIG,
  minimal: { ...DEFAULT_EXTRACTION_CONFIG, minOccurrences: 3, extractQuoted: false },
  aggressive: { ...DEFAULT_EXTRACTION_CONFIG, minOccurrences: 1, excludeWords: new Set<string>() },
} satisfies Record<string, ExtractionConfig>;

/** Too short, or an adverb that is only capitalised because it opens a sentence */
function isCommonWord(word: string): boolean {
  return word.length <= 2 || SENTENCE_ADVERBS.has(word.toLowerCase());
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export class GlossaryExtractor {
  readonly config: ExtractionConfig;

  constructor(config: Partial<ExtractionConfig> = {}) {
    this.config = { ...DEFAULT_EXTRACTION_CONFIG, ...config };
  }

  extract(entries: readonly DocumentEntry[]): GlossaryManager {
    const names = new Map<string, number>();
    const phrases = new Map<string, number>();

    for (const { originalText } of entries) {
      if (this.config.extractNames) {
        for (const [, name] of originalText.matchAll(NAME_PATTERN)) {
          if (!this.config.excludeWords.has(name) && !isCommonWord(name)) {
            increment(names, name);
          }
        }
      }
      if (this.config.extractQuoted) {
        for (const [, phrase] of originalText.matchAll(QUOTED_PATTERN)) {
          if (phrase.length >= 2) increment(phrases, phrase);
        }
      }
    }

    const glossary = GlossaryManager.createEmpty();
    for (const [name, count] of names) {
      if (count >= this.config.minOccurrences) glossary.addCharacter(name);
    }
    for (const [phrase, count] of phrases) {
      if (count >= this.config.minOccurrences) glossary.addTerm(phrase, phrase, 'quoted phrase');
    }
    return glossary;
  }

  /** Extract and merge into the document glossary */
  extractAndUpdate(doc: SubtitleDocument): GlossaryManager {
    const extracted = this.extract(doc.entries);
    doc.glossary.merge(extracted);
    return extracted;
  }

  /** Copy of `existing` with the extracted entries merged over it */
  extractAndMerge(entries: readonly DocumentEntry[], existing: GlossaryManager): GlossaryManager {
    const result = existing.clone();
    result.merge(this.extract(entries));
    return result;
  }
}
