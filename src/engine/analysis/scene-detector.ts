/**
 * Scene detection from timing gaps, scene length and speaker changes
 */

import type { DocumentEntry, Scene, SubtitleDocument } from '../document/subtitle-document.js';

export interface SceneDetectionConfig {
  /** Silence between two entries that starts a new scene */
  minGapMs: number;
  maxEntriesPerScene: number;
  detectSpeakerChanges: boolean;
}

export const DEFAULT_SCENE_CONFIG: SceneDetectionConfig = {
  minGapMs: 3000,
  maxEntriesPerScene: 50,
  detectSpeakerChanges: true,
};

export const SCENE_PRESETS = {
  default: DEFAULT_SCENE_CONFIG,
  shortForm: { minGapMs: 5000, maxEntriesPerScene: 100, detectSpeakerChanges: false },
  detailed: { minGapMs: 2000, maxEntriesPerScene: 30, detectSpeakerChanges: true },
} satisfies Record<string, SceneDetectionConfig>;

/** Silence between the end of `a` and the start of `b`, never negative */
export const gapBetween = (a: DocumentEntry, b: DocumentEntry): number =>
  Math.max(0, b.timecode.startMs - a.timecode.endMs);

export class SceneDetector {
  readonly config: SceneDetectionConfig;

  constructor(config: Partial<SceneDetectionConfig> = {}) {
    this.config = { ...DEFAULT_SCENE_CONFIG, ...config };
  }

  /**
   * Partition `entries` into contiguous scenes. Ids start at 1. Read-only.
   */
  detectScenes(entries: readonly DocumentEntry[]): Scene[] {
    if (entries.length === 0) return [];

    const scenes: Scene[] = [];
    let sceneStart = 0;

    for (let i = 1; i < entries.length; i++) {
      if (this.shouldBreak(entries, sceneStart, i)) {
        scenes.push({
          id: scenes.length + 1,
          startEntryId: entries[sceneStart].id,
          endEntryId: entries[i - 1].id,
        });
        sceneStart = i;
      }
    }

    scenes.push({
      id: scenes.length + 1,
      startEntryId: entries[sceneStart].id,
      endEntryId: entries[entries.length - 1].id,
    });

    return scenes;
  }

  /** Detect scenes and record them on the document and on each entry */
  detectAndUpdate(doc: SubtitleDocument): Scene[] {
    const scenes = this.detectScenes(doc.entries);
    let sceneIndex = 0;
    for (const entry of doc.entries) {
      while (entry.id > scenes[sceneIndex].endEntryId) sceneIndex++;
      entry.sceneId = scenes[sceneIndex].id;
    }
    doc.scenes = scenes;
    return scenes;
  }

  /**
   * The `count` largest gaps as `[index of the later entry, gap ms]`, largest first
   */
  findLargestGaps(entries: readonly DocumentEntry[], count: number): Array<[number, number]> {
    const gaps: Array<[number, number]> = [];
    for (let i = 1; i < entries.length; i++) {
      gaps.push([i, gapBetween(entries[i - 1], entries[i])]);
    }
    return gaps.sort((a, b) => b[1] - a[1]).slice(0, count);
  }

  private shouldBreak(entries: readonly DocumentEntry[], sceneStart: number, current: number): boolean {
    const prev = entries[current - 1];
    const curr = entries[current];

    if (gapBetween(prev, curr) >= this.config.minGapMs) return true;
    if (current - sceneStart >= this.config.maxEntriesPerScene) return true;

    return (
      this.config.detectSpeakerChanges &&
      prev.speaker !== undefined &&
      curr.speaker !== undefined &&
      prev.speaker !== curr.speaker
    );
  }
}
