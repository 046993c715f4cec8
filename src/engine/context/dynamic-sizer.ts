/**
 * Dynamic window sizing
 *
 * Batch length comes from a token budget, then bends toward scene
 * boundaries so short scenes are not split across requests.
 */

import type { DocumentEntry, Scene } from '../document/subtitle-document.js';
import { estimateTokens } from '../utils/chunker.js';

export interface DynamicWindowConfig {
  minBatchSize: number;
  maxBatchSize: number;
  targetTokens: number;
  respectSceneBoundaries: boolean;
  /** How far past `maxBatchSize` a scene may reach and still be pulled in */
  lookaheadFactor: number;
}

export const DEFAULT_DYNAMIC_CONFIG: DynamicWindowConfig = {
  minBatchSize: 5,
  maxBatchSize: 25,
  targetTokens: 2000,
  respectSceneBoundaries: true,
  lookaheadFactor: 1.5,
};

export const DYNAMIC_PRESETS = {
  default: DEFAULT_DYNAMIC_CONFIG,
  fast: { minBatchSize: 10, maxBatchSize: 30, targetTokens: 3000, respectSceneBoundaries: false, lookaheadFactor: 1.0 },
  quality: { minBatchSize: 3, maxBatchSize: 15, targetTokens: 1500, respectSceneBoundaries: true, lookaheadFactor: 2.0 },
} satisfies Record<string, DynamicWindowConfig>;

export class DynamicWindowSizer {
  readonly config: DynamicWindowConfig;

  constructor(config: Partial<DynamicWindowConfig> = {}) {
    this.config = { ...DEFAULT_DYNAMIC_CONFIG, ...config };
  }

  /**
   * Batch size for the window starting at index `position`. Zero past the end.
   */
  calculateOptimalSize(entries: readonly DocumentEntry[], position: number, scenes?: readonly Scene[]): number {
    if (position >= entries.length) return 0;

    const { minBatchSize, maxBatchSize, respectSceneBoundaries } = this.config;
    const remaining = entries.length - position;
    const complexitySize = this.sizeByComplexity(entries.slice(position));

    const adjusted =
      respectSceneBoundaries && scenes && scenes.length > 0
        ? this.adjustForScenes(entries, position, complexitySize, scenes)
        : complexitySize;

    return Math.min(Math.max(adjusted, minBatchSize), maxBatchSize, remaining);
  }

  /**
   * Lookahead for a batch ending before index `batchEnd`. With scene
   * boundaries on, reaches to the end of the following scene, up to twice
   * the base lookahead.
   */
  calculateLookahead(
    entries: readonly DocumentEntry[],
    batchEnd: number,
    baseLookahead: number,
    scenes?: readonly Scene[]
  ): number {
    if (batchEnd >= entries.length) return 0;
    const remaining = entries.length - batchEnd;

    if (this.config.respectSceneBoundaries && scenes) {
      const nextId = entries[batchEnd].id;
      const scene = scenes.find(s => nextId >= s.startEntryId && nextId <= s.endEntryId);
      if (scene) {
        const toSceneEnd = this.indexOfId(entries, scene.endEntryId, batchEnd) - batchEnd + 1;
        return Math.min(toSceneEnd, remaining, baseLookahead * 2);
      }
    }

    return Math.min(baseLookahead, remaining);
  }

  private sizeByComplexity(entries: readonly DocumentEntry[]): number {
    let tokens = 0;
    let count = 0;

    for (const entry of entries.slice(0, this.config.maxBatchSize)) {
      const entryTokens = estimateTokens(entry.originalText);
      if (tokens + entryTokens > this.config.targetTokens && count >= this.config.minBatchSize) break;
      tokens += entryTokens;
      count++;
    }

    return Math.max(count, this.config.minBatchSize);
  }

  private adjustForScenes(
    entries: readonly DocumentEntry[],
    position: number,
    initialSize: number,
    scenes: readonly Scene[]
  ): number {
    const { minBatchSize, maxBatchSize, lookaheadFactor } = this.config;
    const entryId = entries[position].id;
    const scene = scenes.find(s => entryId >= s.startEntryId && entryId <= s.endEntryId);
    if (!scene) return initialSize;

    const sceneEndIndex = this.indexOfId(entries, scene.endEntryId, position);
    const toSceneEnd = sceneEndIndex - position + 1;

    if (toSceneEnd >= minBatchSize && toSceneEnd <= maxBatchSize) {
      return toSceneEnd;
    }

    // The next batch would start inside this scene
    const endsMidScene = position + initialSize <= sceneEndIndex;
    if (endsMidScene && toSceneEnd <= Math.floor(maxBatchSize * lookaheadFactor)) {
      return Math.min(toSceneEnd, maxBatchSize);
    }

    return initialSize;
  }

  /** Index of the entry with `id`, searching forward from `from` */
  private indexOfId(entries: readonly DocumentEntry[], id: number, from: number): number {
    for (let i = from; i < entries.length; i++) {
      if (entries[i].id === id) return i;
      if (entries[i].id > id) return i - 1;
    }
    return entries.length - 1;
  }
}
