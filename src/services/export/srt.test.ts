import { describe, it, expect } from 'vitest';
import { parseSrt } from '../import/srt.js';
import { formatSrt, translatedFilename } from './srt.js';

describe('formatSrt', () => {
  const entries = [
    { seq: 1, startMs: 1_000, endMs: 2_500, text: 'Hello' },
    { seq: 2, startMs: 3_723_004, endMs: 3_725_000, text: '<i>Two</i>\nlines' },
  ];

  it('writes blocks separated by a blank line', () => {
    expect(formatSrt(entries)).toBe(
      '1\n00:00:01,000 --> 00:00:02,500\nHello\n\n2\n01:02:03,004 --> 01:02:05,000\n<i>Two</i>\nlines\n'
    );
  });

  it('keeps timecodes through a parse', () => {
    expect(parseSrt(formatSrt(entries))).toEqual(entries);
  });

  it('is empty for no entries', () => {
    expect(formatSrt([])).toBe('');
  });
});

describe('translatedFilename', () => {
  it('swaps the language suffix', () => {
    expect(translatedFilename('movie.en.srt', 'en', 'es')).toBe('movie.es.srt');
    expect(translatedFilename('Movie.EN.SRT', 'en', 'es')).toBe('Movie.es.srt');
  });

  it('adds a suffix when there is none', () => {
    expect(translatedFilename('movie.srt', 'en', 'es')).toBe('movie.es.srt');
  });
});
