/**
 * SRT export - raw entry list back to SubRip text
 */

import type { RawEntry } from '../../engine/types/common.js';
import { Timecode } from '../../engine/document/subtitle-document.js';

export function formatSrtEntry(entry: RawEntry): string {
  const timing = `${Timecode.formatMs(entry.startMs)} --> ${Timecode.formatMs(entry.endMs)}`;
  return `${entry.seq}\n${timing}\n${entry.text}\n`;
}

/**
 * Blocks are separated by a blank line; the output ends with a newline
 */
export function formatSrt(entries: readonly RawEntry[]): string {
  return entries.map(formatSrtEntry).join('\n');
}

/**
 * Output filename for a translated file: `movie.en.srt` -> `movie.es.srt`,
 * `movie.srt` -> `movie.es.srt`
 */
export function translatedFilename(sourceFile: string, sourceLanguage: string, targetLanguage: string): string {
  const base = sourceFile.replace(/\.srt$/i, '');
  const suffix = `.${sourceLanguage}`;
  const stem = base.toLowerCase().endsWith(suffix.toLowerCase()) ? base.slice(0, -suffix.length) : base;
  return `${stem}.${targetLanguage}.srt`;
}
