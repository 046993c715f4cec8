import { describe, it, expect } from 'vitest';
import type { RawEntry } from '../types/common.js';
import { SubtitleDocument, type Scene } from '../document/subtitle-document.js';
import { DynamicWindowSizer } from './dynamic-sizer.js';

// "Line N" is 2 estimated tokens for every N below 100
function makeEntries(count: number) {
  const raw: RawEntry[] = Array.from({ length: count }, (_, i) => ({
    seq: i + 1,
    startMs: i * 2_000,
    endMs: i * 2_000 + 1_500,
    text: `Line ${i + 1}`,
  }));
  return SubtitleDocument.fromEntries(raw, 'en').entries;
}

const scene = (id: number, startEntryId: number, endEntryId: number): Scene => ({ id, startEntryId, endEntryId });

describe('DynamicWindowSizer', () => {
  const entries = makeEntries(40);

  it('fills the token budget', () => {
    const sizer = new DynamicWindowSizer({ targetTokens: 20 });
    expect(sizer.calculateOptimalSize(entries, 0)).toBe(10);
  });

  it('never goes below the minimum or past the end', () => {
    const sizer = new DynamicWindowSizer({ targetTokens: 1 });
    expect(sizer.calculateOptimalSize(entries, 0)).toBe(5);
    expect(sizer.calculateOptimalSize(entries, 38)).toBe(2);
    expect(sizer.calculateOptimalSize(entries, 40)).toBe(0);
  });

  it('stretches a batch to the end of a short scene', () => {
    const sizer = new DynamicWindowSizer({ targetTokens: 20 });
    expect(sizer.calculateOptimalSize(entries, 0, [scene(1, 1, 12), scene(2, 13, 40)])).toBe(12);
  });

  it('pulls in more of a long scene rather than splitting it early', () => {
    const sizer = new DynamicWindowSizer({ targetTokens: 20 });
    expect(sizer.calculateOptimalSize(entries, 0, [scene(1, 1, 30), scene(2, 31, 40)])).toBe(25);
  });

  it('ignores scenes when boundaries are off', () => {
    const sizer = new DynamicWindowSizer({ targetTokens: 20, respectSceneBoundaries: false });
    expect(sizer.calculateOptimalSize(entries, 0, [scene(1, 1, 12), scene(2, 13, 40)])).toBe(10);
  });

  it('uses the position as an index, not an id', () => {
    const sizer = new DynamicWindowSizer({ targetTokens: 20 });
    expect(sizer.calculateOptimalSize(entries, 12, [scene(1, 1, 12), scene(2, 13, 20), scene(3, 21, 40)])).toBe(8);
  });

  it('extends lookahead to the following scene, up to twice the base', () => {
    const sizer = new DynamicWindowSizer();
    expect(sizer.calculateLookahead(entries, 12, 5, [scene(1, 1, 12), scene(2, 13, 15), scene(3, 16, 40)])).toBe(3);
    expect(sizer.calculateLookahead(entries, 12, 5, [scene(1, 1, 12), scene(2, 13, 40)])).toBe(10);
    expect(sizer.calculateLookahead(entries, 12, 5)).toBe(5);
    expect(sizer.calculateLookahead(entries, 38, 5)).toBe(2);
    expect(sizer.calculateLookahead(entries, 40, 5)).toBe(0);
  });
});
