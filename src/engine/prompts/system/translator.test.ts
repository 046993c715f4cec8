import { describe, it, expect } from 'vitest';
import { SubtitleDocument } from '../../document/subtitle-document.js';
import { ContextWindow, DEFAULT_WINDOW_CONFIG } from '../../context/context-window.js';
import {
  TranslationResponseSchema,
  buildTranslationRequest,
  createCorrectionPrompt,
  renderTranslatorSystemPrompt,
} from './translator.js';

function windowAt(position: number): ContextWindow {
  const doc = SubtitleDocument.fromEntries(
    [
      { seq: 1, startMs: 0, endMs: 1_000, text: 'Hello' },
      { seq: 2, startMs: 2_000, endMs: 3_000, text: '[door slams]' },
      { seq: 3, startMs: 4_000, endMs: 5_000, text: 'Who is there?' },
    ],
    'en'
  ).withTargetLanguage('es');
  doc.entries[0].setTranslation('Hola');
  doc.glossary.addCharacter('Alice');
  doc.glossary.addTerm('Castle', 'Castillo');
  return ContextWindow.at(doc, position, { ...DEFAULT_WINDOW_CONFIG, lookaheadCount: 1 }, 1);
}

describe('renderTranslatorSystemPrompt', () => {
  it('fills in both languages everywhere', () => {
    const prompt = renderTranslatorSystemPrompt('en', 'es');
    expect(prompt.startsWith('You are an expert subtitle translator specializing in en to es translation.')).toBe(true);
    expect(prompt).toContain('- Natural, idiomatic es');
    expect(prompt).not.toContain('{target_language}');
  });
});

describe('buildTranslationRequest', () => {
  it('carries recent translations, the batch, lookahead and glossary', () => {
    expect(buildTranslationRequest(windowAt(1), 'Use informal speech')).toEqual({
      task: 'translate_subtitles',
      source_language: 'en',
      target_language: 'es',
      context: {
        history_summary: undefined,
        recent_translations: [{ id: 1, original: 'Hello', translated: 'Hola' }],
        lookahead: [{ id: 3, text: 'Who is there?' }],
        glossary: { character_names: ['Alice'], terms: { Castle: 'Castillo' } },
      },
      entries_to_translate: [{ id: 2, text: '[door slams]', timecode: '00:00:02,000 --> 00:00:03,000' }],
      instructions: {
        preserve_formatting: true,
        preserve_sound_effects: true,
        max_length_ratio: 1.2,
        custom: 'Use informal speech',
      },
    });
  });

  it('leaves out empty context', () => {
    const request = buildTranslationRequest(windowAt(0).narrowedTo([1]));
    expect(request.context.recent_translations).toBeUndefined();
    expect(request.instructions.custom).toBeUndefined();
  });
});

describe('createCorrectionPrompt', () => {
  it('lists each problem', () => {
    expect(
      createCorrectionPrompt({ id: 4, text: 'Run!', previousTranslation: '' }, ['First problem.', 'Second problem.'])
    ).toBe(
      '## Entry 4\nOriginal: Run!\nPrevious translation: \n\n' +
        '## Problems\n- First problem.\n- Second problem.\n\n' +
        'Return the corrected translation as JSON with the structure specified in the output requirements.'
    );
  });
});

describe('TranslationResponseSchema', () => {
  it('coerces string ids and drops out-of-range confidence', () => {
    const parsed = TranslationResponseSchema.parse({
      translations: [
        { id: '3', translated: 'tres', confidence: 1.5 },
        { id: 4, translated: 'cuatro', confidence: 0.7 },
      ],
      notes: 'not an object',
    });

    expect(parsed).toEqual({
      translations: [
        { id: 3, translated: 'tres', confidence: undefined },
        { id: 4, translated: 'cuatro', confidence: 0.7 },
      ],
      notes: undefined,
    });
  });

  it('rejects a response without translations', () => {
    expect(TranslationResponseSchema.safeParse({ notes: {} }).success).toBe(false);
  });
});
