/**
 * Speaker tracking for dialogue subtitles ("NAME: line" labels)
 */

import type { DocumentEntry } from '../document/subtitle-document.js';

const SPEAKER_PATTERN = /^\[?([A-Z][A-Za-z\s.]+?)\]?:\s*/;
const SOUND_EFFECT_PATTERN = /^\[.+\]$|^\(.+\)$/;

export interface SpeakerConfig {
  /** A label must recur this often before it counts as a speaker */
  minOccurrences: number;
  /** Carry the last speaker onto following unlabeled lines */
  detectImplicitChanges: boolean;
  continuityGap: number;
}

export const DEFAULT_SPEAKER_CONFIG: SpeakerConfig = {
  minOccurrences: 2,
  detectImplicitChanges: false,
  continuityGap: 3,
};

export const SPEAKER_PRESETS = {
  default: DEFAULT_SPEAKER_CONFIG,
  strict: { minOccurrences: 3, detectImplicitChanges: false, continuityGap: 1 },
  lenient: { minOccurrences: 1, detectImplicitChanges: true, continuityGap: 5 },
} satisfies Record<string, SpeakerConfig>;

export interface SpeakerStats {
  entriesAnalyzed: number;
  entriesWithSpeakers: number;
  uniqueSpeakers: number;
  soundEffectsFound: number;
}

export interface DetectedSpeaker {
  name: string;
  entryIds: number[];
  occurrenceCount: number;
}

export function extractSpeaker(text: string): string | undefined {
  return SPEAKER_PATTERN.exec(text)?.[1].trim();
}

const isNonDialogue = (text: string): boolean => SOUND_EFFECT_PATTERN.test(text.trim());

function looksLikeDialogue(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed || isNonDialogue(trimmed)) return false;
  // Short shouted tokens like "BANG" or "NO!" are usually captions
  if (trimmed.length < 20 && trimmed === trimmed.toUpperCase() && !trimmed.includes(' ')) {
    return false;
  }
  return true;
}

export class SpeakerTracker {
  readonly config: SpeakerConfig;

  constructor(config: Partial<SpeakerConfig> = {}) {
    this.config = { ...DEFAULT_SPEAKER_CONFIG, ...config };
  }

  /**
   * Label entries with recognised speakers. Writes `speaker` on entries.
   */
  detectSpeakers(entries: readonly DocumentEntry[]): SpeakerStats {
    const stats: SpeakerStats = {
      entriesAnalyzed: entries.length,
      entriesWithSpeakers: 0,
      uniqueSpeakers: 0,
      soundEffectsFound: 0,
    };

    const counts = new Map<string, number>();
    for (const entry of entries) {
      if (isNonDialogue(entry.originalText)) {
        stats.soundEffectsFound++;
        continue;
      }
      const speaker = extractSpeaker(entry.originalText);
      if (speaker) counts.set(speaker, (counts.get(speaker) ?? 0) + 1);
    }

    const recognised = new Set(
      [...counts].filter(([, n]) => n >= this.config.minOccurrences).map(([name]) => name)
    );
    stats.uniqueSpeakers = recognised.size;

    for (const entry of entries) {
      if (isNonDialogue(entry.originalText)) continue;
      const speaker = extractSpeaker(entry.originalText);
      if (speaker && recognised.has(speaker)) {
        entry.speaker = speaker;
        stats.entriesWithSpeakers++;
      }
    }

    if (this.config.detectImplicitChanges) {
      this.propagateSpeakers(entries, stats);
    }

    return stats;
  }

  getSpeakers(entries: readonly DocumentEntry[]): DetectedSpeaker[] {
    const byName = new Map<string, number[]>();
    for (const entry of entries) {
      if (entry.speaker) {
        const ids = byName.get(entry.speaker) ?? [];
        ids.push(entry.id);
        byName.set(entry.speaker, ids);
      }
    }
    return [...byName].map(([name, entryIds]) => ({ name, entryIds, occurrenceCount: entryIds.length }));
  }

  /** Labels that recur at least `minOccurrences` times. Does not touch entries. */
  extractSpeakerNames(entries: readonly DocumentEntry[]): string[] {
    const counts = new Map<string, number>();
    for (const entry of entries) {
      const speaker = extractSpeaker(entry.originalText);
      if (speaker) counts.set(speaker, (counts.get(speaker) ?? 0) + 1);
    }
    return [...counts].filter(([, n]) => n >= this.config.minOccurrences).map(([name]) => name);
  }

  private propagateSpeakers(entries: readonly DocumentEntry[], stats: SpeakerStats): void {
    let lastSpeaker: string | undefined;
    let gap = 0;

    for (const entry of entries) {
      if (entry.speaker) {
        lastSpeaker = entry.speaker;
        gap = 0;
      } else if (lastSpeaker && gap < this.config.continuityGap) {
        if (looksLikeDialogue(entry.originalText)) {
          entry.speaker = lastSpeaker;
          stats.entriesWithSpeakers++;
        }
        gap++;
      } else {
        lastSpeaker = undefined;
        gap = 0;
      }
    }
  }
}
