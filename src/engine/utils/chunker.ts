/**
 * Entry chunker - splits subtitle entries into request-sized groups
 */

import type { RawEntry } from '../types/common.js';

export interface ChunkerOptions {
  /** Entries per chunk */
  maxEntries: number;
  /** Token budget per chunk; a chunk always takes at least one entry */
  maxTokens: number;
}

const DEFAULT_OPTIONS: ChunkerOptions = {
  maxEntries: 5,
  maxTokens: 2000,
};

/** Length in code points, so surrogate pairs count once */
export const charLength = (text: string): number => [...text].length;

/**
 * Estimate token count for text (rough approximation: 4 characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(charLength(text) / 4);
}

export interface EntryChunk {
  index: number;
  entries: RawEntry[];
  tokenCount: number;
}

/**
 * Chunk entries in order. A chunk closes when it is full or the next entry
 * would push it over the token budget.
 */
export function chunkEntries(entries: readonly RawEntry[], options: Partial<ChunkerOptions> = {}): EntryChunk[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const chunks: EntryChunk[] = [];
  let current: RawEntry[] = [];
  let tokens = 0;

  for (const entry of entries) {
    const entryTokens = estimateTokens(entry.text);
    if (current.length > 0 && (current.length >= opts.maxEntries || tokens + entryTokens > opts.maxTokens)) {
      chunks.push({ index: chunks.length, entries: current, tokenCount: tokens });
      current = [];
      tokens = 0;
    }
    current.push(entry);
    tokens += entryTokens;
  }

  if (current.length > 0) {
    chunks.push({ index: chunks.length, entries: current, tokenCount: tokens });
  }

  return chunks;
}
