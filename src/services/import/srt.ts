/**
 * SRT parser module
 *
 * Turns SubRip text into the flat entry list the engine works on. Blocks
 * without text or with an invalid time range are skipped with a warning;
 * the rest are sorted by start time and renumbered 1..N.
 */

import type { RawEntry } from '../../engine/types/common.js';
import { Timecode } from '../../engine/document/subtitle-document.js';

export interface SrtParseResult {
  entries: RawEntry[];
  warnings: string[];
}

const TIMING_LINE = /^(\S+)\s*-->\s*(\S+)/;

interface PendingBlock {
  seq: number;
  startMs?: number;
  endMs?: number;
  lines: string[];
}

/**
 * Parse SRT contents, collecting warnings for anything skipped
 */
export function parseSrtWithWarnings(content: string): SrtParseResult {
  const warnings: string[] = [];
  const entries: RawEntry[] = [];
  let block: PendingBlock | null = null;

  const flush = () => {
    if (!block || block.startMs === undefined || block.endMs === undefined) {
      block = null;
      return;
    }
    const text = block.lines.join('\n').trim();
    if (text === '') {
      warnings.push(`Skipping empty subtitle entry ${block.seq}`);
    } else if (block.endMs <= block.startMs) {
      warnings.push(`Skipping subtitle entry ${block.seq}: end time is not after start time`);
    } else {
      entries.push({ seq: block.seq, startMs: block.startMs, endMs: block.endMs, text });
    }
    block = null;
  };

  // Text lines of a block with a bad timing line are dropped with it
  let skipping = false;

  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  lines.forEach((line, index) => {
    const trimmed = line.trim();

    if (trimmed === '') {
      skipping = false;
      if (block && block.startMs !== undefined) flush();
      return;
    }
    if (skipping) return;

    if (!block) {
      if (/^\d+$/.test(trimmed)) {
        block = { seq: parseInt(trimmed, 10), lines: [] };
      } else {
        warnings.push(`Unexpected text at line ${index + 1}: ${trimmed}`);
      }
      return;
    }

    if (block.startMs === undefined) {
      const match = TIMING_LINE.exec(trimmed);
      const startMs = match ? Timecode.parseSrtTimestamp(match[1]) : undefined;
      const endMs = match ? Timecode.parseSrtTimestamp(match[2]) : undefined;
      if (startMs === undefined || endMs === undefined) {
        warnings.push(`Invalid timestamp at line ${index + 1}: ${trimmed}`);
        block = null;
        skipping = true;
        return;
      }
      block.startMs = startMs;
      block.endMs = endMs;
      return;
    }

    block.lines.push(trimmed);
  });
  flush();

  entries.sort((a, b) => a.startMs - b.startMs);

  const overlaps = entries.filter((entry, i) => i > 0 && entry.startMs < entries[i - 1].endMs).length;
  if (overlaps > 0) {
    warnings.push(`Found ${overlaps} overlapping subtitle entries`);
  }

  return {
    entries: entries.map((entry, i) => ({ ...entry, seq: i + 1 })),
    warnings,
  };
}

/**
 * Parse SRT contents into raw entries
 */
export function parseSrt(content: string): RawEntry[] {
  return parseSrtWithWarnings(content).entries;
}

/**
 * Check if file format is supported
 */
export function isSupportedFormat(filename: string): boolean {
  return filename.toLowerCase().endsWith('.srt');
}
