import { describe, it, expect } from 'vitest';
import { isSupportedFormat, parseSrt, parseSrtWithWarnings } from './srt.js';

describe('parseSrt', () => {
  it('parses blocks with CRLF endings, a BOM and multi-line text', () => {
    const content =
      '\uFEFF1\r\n00:00:01,000 --> 00:00:02,500\r\nHello there\r\n\r\n' +
      '2\r\n00:00:03,000 --> 00:00:04,000\r\n<i>Two</i>\r\nlines\r\n';

    expect(parseSrtWithWarnings(content)).toEqual({
      entries: [
        { seq: 1, startMs: 1_000, endMs: 2_500, text: 'Hello there' },
        { seq: 2, startMs: 3_000, endMs: 4_000, text: '<i>Two</i>\nlines' },
      ],
      warnings: [],
    });
  });

  it('sorts by start time and renumbers from 1', () => {
    const content = '5\n00:00:10,000 --> 00:00:11,000\nLater\n\n3\n00:00:02,000 --> 00:00:03,000\nEarlier\n';

    expect(parseSrt(content)).toEqual([
      { seq: 1, startMs: 2_000, endMs: 3_000, text: 'Earlier' },
      { seq: 2, startMs: 10_000, endMs: 11_000, text: 'Later' },
    ]);
  });

  it('accepts a dot before the milliseconds', () => {
    expect(parseSrt('1\n01:02:03.004 --> 01:02:05.000\nHi\n')).toEqual([
      { seq: 1, startMs: 3_723_004, endMs: 3_725_000, text: 'Hi' },
    ]);
  });

  it('skips bad blocks with a warning each', () => {
    const content = [
      '1',
      '00:00:01,000 --> 00:00:02,000',
      '',
      '2',
      '00:00:03,000 --> 00:00:02,000',
      'Backwards',
      '',
      '3',
      '00:00:xx --> 00:00:05,000',
      'Bad stamp',
      '',
      '4',
      '00:00:06,000 --> 00:00:07,000',
      'Kept',
    ].join('\n');

    expect(parseSrtWithWarnings(content)).toEqual({
      entries: [{ seq: 1, startMs: 6_000, endMs: 7_000, text: 'Kept' }],
      warnings: [
        'Skipping empty subtitle entry 1',
        'Skipping subtitle entry 2: end time is not after start time',
        'Invalid timestamp at line 9: 00:00:xx --> 00:00:05,000',
      ],
    });
  });

  it('warns about stray text and overlaps', () => {
    const content =
      'garbage\n\n' +
      '1\n00:00:01,000 --> 00:00:03,000\nFirst\n\n' +
      '2\n00:00:02,000 --> 00:00:04,000\nSecond\n';

    const { entries, warnings } = parseSrtWithWarnings(content);

    expect(entries.map(e => e.text)).toEqual(['First', 'Second']);
    expect(warnings).toEqual(['Unexpected text at line 1: garbage', 'Found 1 overlapping subtitle entries']);
  });

  it('returns nothing for empty input', () => {
    expect(parseSrtWithWarnings('')).toEqual({ entries: [], warnings: [] });
  });
});

describe('isSupportedFormat', () => {
  it('accepts .srt in any case', () => {
    expect(isSupportedFormat('movie.SRT')).toBe(true);
    expect(isSupportedFormat('movie.vtt')).toBe(false);
  });
});
