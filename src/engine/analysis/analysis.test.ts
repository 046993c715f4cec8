import { describe, it, expect } from 'vitest';
import type { RawEntry } from '../types/common.js';
import { SubtitleDocument } from '../document/subtitle-document.js';
import { SceneDetector } from './scene-detector.js';
import { SpeakerTracker, SPEAKER_PRESETS, extractSpeaker } from './speaker-tracker.js';
import { GlossaryExtractor } from './glossary-extractor.js';
import { HistorySummarizer } from './summarizer.js';

/** Entries of 1s each separated by the given gaps */
function withGaps(gaps: number[], texts: string[] = []): SubtitleDocument {
  const entries: RawEntry[] = [];
  let start = 0;
  for (let i = 0; i <= gaps.length; i++) {
    entries.push({ seq: i + 1, startMs: start, endMs: start + 1_000, text: texts[i] ?? `Line ${i + 1}` });
    start += 1_000 + (gaps[i] ?? 0);
  }
  return SubtitleDocument.fromEntries(entries, 'en');
}

const docOf = (texts: string[]): SubtitleDocument => withGaps(texts.slice(1).map(() => 100), texts);

describe('SceneDetector', () => {
  it('breaks scenes on long silences', () => {
    const doc = withGaps([100, 100, 5_000, 100]);
    const scenes = new SceneDetector({ minGapMs: 3_000 }).detectScenes(doc.entries);

    expect(scenes).toEqual([
      { id: 1, startEntryId: 1, endEntryId: 3 },
      { id: 2, startEntryId: 4, endEntryId: 5 },
    ]);
  });

  it('never finds more scenes with a higher gap threshold', () => {
    const doc = withGaps([100, 2_000, 4_000, 6_000, 100]);
    const counts = [1_000, 3_000, 5_000, 7_000].map(
      minGapMs => new SceneDetector({ minGapMs }).detectScenes(doc.entries).length
    );
    expect(counts).toEqual([4, 3, 2, 1]);
  });

  it('caps scene length', () => {
    const doc = withGaps([100, 100, 100, 100]);
    const scenes = new SceneDetector({ maxEntriesPerScene: 2 }).detectScenes(doc.entries);
    expect(scenes.map(s => [s.startEntryId, s.endEntryId])).toEqual([
      [1, 2],
      [3, 4],
      [5, 5],
    ]);
  });

  it('breaks on a change of known speaker', () => {
    const doc = withGaps([100, 100]);
    doc.entries[0].speaker = 'ANNA';
    doc.entries[1].speaker = 'ANNA';
    doc.entries[2].speaker = 'LEO';
    expect(new SceneDetector().detectScenes(doc.entries)).toHaveLength(2);
  });

  it('records scene ids on entries', () => {
    const doc = withGaps([100, 100, 5_000, 100]);
    new SceneDetector().detectAndUpdate(doc);

    expect(doc.entries.map(e => e.sceneId)).toEqual([1, 1, 1, 2, 2]);
    expect(doc.scenes).toHaveLength(2);
  });

  it('returns no scenes for no entries', () => {
    expect(new SceneDetector().detectScenes([])).toEqual([]);
  });

  it('finds the largest gaps', () => {
    const doc = withGaps([100, 4_000, 5_000, 100]);
    expect(new SceneDetector().findLargestGaps(doc.entries, 2)).toEqual([
      [3, 5_000],
      [2, 4_000],
    ]);
  });
});

describe('SpeakerTracker', () => {
  it('extracts speaker labels', () => {
    expect(extractSpeaker('ALICE: Hi there')).toBe('ALICE');
    expect(extractSpeaker('[Dr. Hale]: Sit down')).toBe('Dr. Hale');
    expect(extractSpeaker('no label here')).toBeUndefined();
  });

  it('labels recurring speakers and counts sound effects', () => {
    const doc = docOf(['ALICE: Hi there', 'BOB: Hello', 'ALICE: How are you?', '[door slams]', 'BOB: Fine', 'CAROL: Bye']);
    const stats = new SpeakerTracker().detectSpeakers(doc.entries);

    expect(stats).toEqual({ entriesAnalyzed: 6, entriesWithSpeakers: 4, uniqueSpeakers: 2, soundEffectsFound: 1 });
    expect(doc.entries.map(e => e.speaker)).toEqual(['ALICE', 'BOB', 'ALICE', undefined, 'BOB', undefined]);
  });

  it('carries the last speaker onto unlabeled dialogue', () => {
    const doc = docOf(['MIRA: Wait for me', "I'm coming too", '[thunder]', 'Hurry up']);
    new SpeakerTracker(SPEAKER_PRESETS.lenient).detectSpeakers(doc.entries);

    expect(doc.entries.map(e => e.speaker)).toEqual(['MIRA', 'MIRA', undefined, 'MIRA']);
  });

  it('groups entries per speaker', () => {
    const doc = docOf(['ALICE: One', 'ALICE: Two']);
    const tracker = new SpeakerTracker();
    tracker.detectSpeakers(doc.entries);
    expect(tracker.getSpeakers(doc.entries)).toEqual([{ name: 'ALICE', entryIds: [1, 2], occurrenceCount: 2 }]);
  });
});

describe('GlossaryExtractor', () => {
  const texts = [
    'Marcus left the Citadel.',
    'Where is Marcus?',
    'Guards closed the Citadel.',
    'Call it "the Hollow" now',
    'They fear "the Hollow".',
  ];

  it('keeps recurring names and quoted phrases', () => {
    const glossary = new GlossaryExtractor().extract(docOf(texts).entries);

    expect([...glossary.characterNames]).toEqual(['Marcus', 'Citadel', 'Hollow']);
    expect(glossary.terms.get('the Hollow')).toEqual({ source: 'the Hollow', target: 'the Hollow', context: 'quoted phrase' });
  });

  it('merges into an existing glossary without modifying it', () => {
    const doc = docOf(texts);
    doc.glossary.addTerm('Citadel', 'Ciudadela');
    const merged = new GlossaryExtractor().extractAndMerge(doc.entries, doc.glossary);

    expect(merged.isCharacterName('Marcus')).toBe(true);
    expect(merged.getTranslation('Citadel')).toBe('Ciudadela');
    expect(doc.glossary.isCharacterName('Marcus')).toBe(false);
  });
});

describe('HistorySummarizer', () => {
  const doc = docOf(['Nora opens the door', 'Nora, wait!', 'Leave it', 'Where is Tom?']);

  it('summarizes names, snippets and length', () => {
    expect(new HistorySummarizer().summarize(doc.entries)).toEqual({
      text: 'Characters: Nora. Key dialogue: Nora opens the door ... Nora, wait! ... Leave it. [4 lines of dialogue]',
      startEntryId: 1,
      endEntryId: 4,
      entryCount: 4,
    });
  });

  it('truncates at the last sentence within the limit', () => {
    expect(new HistorySummarizer({ maxSummaryChars: 40 }).summarize(doc.entries).text).toBe('Characters: Nora.');
  });

  it('returns an empty summary for no entries', () => {
    expect(new HistorySummarizer().summarize([]).text).toBe('');
  });

  it('combines chunk summaries', () => {
    const summary = new HistorySummarizer({
      entriesPerSummary: 2,
      includeCharacterNames: false,
      includeDialogueSnippets: false,
    }).summarizeInChunks(doc.entries);

    expect(summary).toEqual({
      text: '[2 lines of dialogue] [2 lines of dialogue]',
      startEntryId: 1,
      endEntryId: 4,
      entryCount: 4,
    });
  });
});
