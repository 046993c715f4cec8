/**
 * Extractive history summaries for long documents.
 *
 * Built from name frequency and a few evenly spaced lines. No model call is
 * made, so summarising never costs a request.
 */

import type { DocumentEntry } from '../document/subtitle-document.js';

const NAME_PATTERN = /\b([A-Z][a-z]+)\b/g;

const SUMMARY_EXCLUDE = new Set([
  'The', 'This', 'That', 'What', 'Where', 'When', 'Why', 'How', 'Yes', 'No', 'Oh', 'Hey',
  'Well', 'Now', 'Here', 'Please', 'Thank', 'Hello', 'Sorry', 'Just', 'Really',
]);

const MAX_NAMES = 5;
const SNIPPET_COUNT = 3;
const MAX_SNIPPET_CHARS = 50;

export interface SummarizationConfig {
  maxSummaryChars: number;
  /** Entries folded into one summary by `summarizeInChunks` */
  entriesPerSummary: number;
  includeCharacterNames: boolean;
  includeDialogueSnippets: boolean;
}

export const DEFAULT_SUMMARIZATION_CONFIG: SummarizationConfig = {
  maxSummaryChars: 500,
  entriesPerSummary: 50,
  includeCharacterNames: true,
  includeDialogueSnippets: true,
};

export interface HistorySummary {
  text: string;
  startEntryId: number;
  endEntryId: number;
  entryCount: number;
}

const EMPTY_SUMMARY: HistorySummary = { text: '', startEntryId: 0, endEntryId: 0, entryCount: 0 };

export class HistorySummarizer {
  readonly config: SummarizationConfig;

  constructor(config: Partial<SummarizationConfig> = {}) {
    this.config = { ...DEFAULT_SUMMARIZATION_CONFIG, ...config };
  }

  summarize(entries: readonly DocumentEntry[]): HistorySummary {
    if (entries.length === 0) return { ...EMPTY_SUMMARY };

    const parts: string[] = [];

    if (this.config.includeCharacterNames) {
      const names = this.likelyNames(entries);
      if (names.length > 0) parts.push(`Characters: ${names.join(', ')}`);
    }

    if (this.config.includeDialogueSnippets) {
      const snippets = this.keySnippets(entries);
      if (snippets.length > 0) parts.push(`Key dialogue: ${snippets.join(' ... ')}`);
    }

    parts.push(`[${entries.length} lines of dialogue]`);

    return {
      text: this.truncate(parts.join('. ')),
      startEntryId: entries[0].id,
      endEntryId: entries[entries.length - 1].id,
      entryCount: entries.length,
    };
  }

  /** One summary per `entriesPerSummary` entries, then combined */
  summarizeInChunks(entries: readonly DocumentEntry[]): HistorySummary {
    const summaries: HistorySummary[] = [];
    for (let i = 0; i < entries.length; i += this.config.entriesPerSummary) {
      summaries.push(this.summarize(entries.slice(i, i + this.config.entriesPerSummary)));
    }
    return this.combine(summaries);
  }

  combine(summaries: readonly HistorySummary[]): HistorySummary {
    if (summaries.length === 0) return { ...EMPTY_SUMMARY };
    return {
      text: this.truncate(summaries.map(s => s.text).join(' ')),
      startEntryId: summaries[0].startEntryId,
      endEntryId: summaries[summaries.length - 1].endEntryId,
      entryCount: summaries.reduce((sum, s) => sum + s.entryCount, 0),
    };
  }

  /** Names seen at least twice, most frequent first */
  private likelyNames(entries: readonly DocumentEntry[]): string[] {
    const counts = new Map<string, number>();
    for (const { originalText } of entries) {
      for (const [, name] of originalText.matchAll(NAME_PATTERN)) {
        if (!SUMMARY_EXCLUDE.has(name)) counts.set(name, (counts.get(name) ?? 0) + 1);
      }
    }
    return [...counts]
      .filter(([, n]) => n >= 2)
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_NAMES)
      .map(([name]) => name);
  }

  private keySnippets(entries: readonly DocumentEntry[]): string[] {
    const len = entries.length;
    const step = len <= SNIPPET_COUNT ? 1 : Math.floor(len / SNIPPET_COUNT);
    const count = Math.min(len, SNIPPET_COUNT);

    const snippets: string[] = [];
    for (let i = 0; i < count; i++) {
      const text = entries[i * step].originalText;
      snippets.push(text.length > MAX_SNIPPET_CHARS ? `${text.slice(0, MAX_SNIPPET_CHARS - 3)}...` : text);
    }
    return snippets;
  }

  /** Cut at the last sentence, else the last word, within the limit */
  private truncate(text: string): string {
    const max = this.config.maxSummaryChars;
    if (text.length <= max) return text;

    const cut = text.slice(0, max - 3);
    const lastSentence = cut.lastIndexOf('. ');
    if (lastSentence >= 0) return `${cut.slice(0, lastSentence)}.`;
    const lastSpace = cut.lastIndexOf(' ');
    if (lastSpace >= 0) return `${cut.slice(0, lastSpace)}...`;
    return `${cut}...`;
  }
}
