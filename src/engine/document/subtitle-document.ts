/**
 * Subtitle document model
 *
 * A document is built once from the flat entry list produced by the file
 * layer. Entry ids and timecodes are fixed from then on; passes only ever
 * write translations, speakers and scene ids.
 */

import type { FormattingTag, Language, RawEntry } from '../types/common.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { TranslationError } from '../quality/errors.js';
import { detectFormatting, isSoundEffect } from './formatting.js';

// ============ Timecode ============

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

export class Timecode {
  readonly startMs: number;
  readonly endMs: number;

  constructor(startMs: number, endMs: number) {
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || startMs < 0 || endMs <= startMs) {
      throw new TranslationError('config_error', `Invalid timecode: ${startMs} --> ${endMs}`);
    }
    this.startMs = startMs;
    this.endMs = endMs;
    Object.freeze(this);
  }

  get durationMs(): number {
    return this.endMs - this.startMs;
  }

  /** `HH:MM:SS,mmm --> HH:MM:SS,mmm` */
  formatSrt(): string {
    return `${Timecode.formatMs(this.startMs)} --> ${Timecode.formatMs(this.endMs)}`;
  }

  equals(other: Timecode): boolean {
    return this.startMs === other.startMs && this.endMs === other.endMs;
  }

  static formatMs(ms: number): string {
    const hours = Math.floor(ms / 3_600_000);
    const minutes = Math.floor((ms % 3_600_000) / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1_000);
    const millis = ms % 1_000;
    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
  }

  /**
   * `01:02:03,456` (or with `.` before the millis) to milliseconds
   */
  static parseSrtTimestamp(timestamp: string): number | undefined {
    const parts = timestamp.trim().split(/[:,.]/);
    if (parts.length !== 4 || parts.some(p => !/^\d+$/.test(p))) {
      return undefined;
    }
    const [hours, minutes, seconds, millis] = parts.map(p => parseInt(p, 10));
    return hours * 3_600_000 + minutes * 60_000 + seconds * 1_000 + millis;
  }
}

// ============ Entry ============

export class DocumentEntry {
  readonly id: number;
  readonly timecode: Timecode;
  readonly originalText: string;
  readonly formatting: readonly FormattingTag[];
  translatedText?: string;
  confidence?: number;
  speaker?: string;
  sceneId?: number;

  constructor(id: number, timecode: Timecode, originalText: string) {
    this.id = id;
    this.timecode = timecode;
    this.originalText = originalText;
    this.formatting = Object.freeze(detectFormatting(originalText));
  }

  static fromRaw(raw: RawEntry): DocumentEntry {
    return new DocumentEntry(raw.seq, new Timecode(raw.startMs, raw.endMs), raw.text);
  }

  setTranslation(text: string, confidence?: number): void {
    this.translatedText = text;
    this.confidence = confidence;
  }

  isTranslated(): boolean {
    return this.translatedText !== undefined;
  }

  isSoundEffect(): boolean {
    return isSoundEffect(this.originalText);
  }

  toRaw(): RawEntry {
    return {
      seq: this.id,
      startMs: this.timecode.startMs,
      endMs: this.timecode.endMs,
      text: this.translatedText ?? this.originalText,
    };
  }
}

// ============ Scene ============

export interface Scene {
  id: number;
  startEntryId: number;
  endEntryId: number;
  description?: string;
  tone?: string;
}

export const sceneContains = (scene: Scene, entryId: number): boolean =>
  entryId >= scene.startEntryId && entryId <= scene.endEntryId;

export const sceneLength = (scene: Scene): number => scene.endEntryId - scene.startEntryId + 1;

// ============ Document ============

export interface DocumentMetadata {
  sourceLanguage: Language;
  targetLanguage?: Language;
  totalEntries: number;
  sourceFile?: string;
}

export class SubtitleDocument {
  readonly metadata: DocumentMetadata;
  readonly entries: readonly DocumentEntry[];
  scenes: Scene[] = [];
  glossary: GlossaryManager = GlossaryManager.createEmpty();
  contextSummary?: string;
  characters: string[] = [];

  private readonly indexById: Map<number, number>;

  private constructor(entries: DocumentEntry[], metadata: DocumentMetadata) {
    this.entries = Object.freeze(entries);
    this.metadata = metadata;
    this.indexById = new Map(entries.map((e, i) => [e.id, i]));
  }

  /**
   * Build a document from an ordered entry list. Rejects out-of-order or
   * duplicate sequence numbers and non-positive durations.
   */
  static fromEntries(raw: readonly RawEntry[], sourceLanguage: Language): SubtitleDocument {
    for (let i = 1; i < raw.length; i++) {
      if (raw[i].seq === raw[i - 1].seq) {
        throw new TranslationError('config_error', `Duplicate entry id ${raw[i].seq}`);
      }
      if (raw[i].seq < raw[i - 1].seq) {
        throw new TranslationError(
          'config_error',
          `Entries out of order: ${raw[i].seq} follows ${raw[i - 1].seq}`
        );
      }
    }

    const entries = raw.map(r => DocumentEntry.fromRaw(r));
    return new SubtitleDocument(entries, {
      sourceLanguage,
      totalEntries: entries.length,
    });
  }

  withTargetLanguage(targetLanguage: Language): this {
    this.metadata.targetLanguage = targetLanguage;
    return this;
  }

  withSourceFile(sourceFile: string): this {
    this.metadata.sourceFile = sourceFile;
    return this;
  }

  get length(): number {
    return this.entries.length;
  }

  getEntry(id: number): DocumentEntry | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.entries[index];
  }

  /** Position of the entry with `id`, or -1 */
  indexOf(id: number): number {
    return this.indexById.get(id) ?? -1;
  }

  /** Translated text where present, original otherwise. Never drops or reorders. */
  toRawEntries(): RawEntry[] {
    return this.entries.map(e => e.toRaw());
  }

  translatedEntries(): DocumentEntry[] {
    return this.entries.filter(e => e.isTranslated());
  }

  pendingEntries(): DocumentEntry[] {
    return this.entries.filter(e => !e.isTranslated());
  }

  isFullyTranslated(): boolean {
    return this.entries.every(e => e.isTranslated());
  }

  /** Percentage; an empty document counts as done */
  translationProgress(): number {
    if (this.entries.length === 0) return 100;
    return (this.translatedEntries().length / this.entries.length) * 100;
  }

  sceneForEntry(entryId: number): Scene | undefined {
    return this.scenes.find(s => sceneContains(s, entryId));
  }
}

/**
 * Sort by sequence number and renumber 1..N. Timecodes and text are kept.
 */
export function renumberEntries(entries: readonly RawEntry[]): RawEntry[] {
  return [...entries]
    .sort((a, b) => a.seq - b.seq)
    .map((entry, i) => ({ ...entry, seq: i + 1 }));
}
