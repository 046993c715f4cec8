/**
 * Common types used across the translation engine
 */

/** ISO-639 style language code, e.g. `en`, `es`, `ja` */
export type Language = string;

export type FormattingTag = 'italic' | 'bold' | 'underline' | 'position' | 'color';

/**
 * One cue as it arrives from (and leaves to) the subtitle file layer.
 * Times are milliseconds from the start of the media.
 */
export interface RawEntry {
  seq: number;
  startMs: number;
  endMs: number;
  text: string;
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export const emptyTokenUsage = (): TokenUsage => ({ prompt: 0, completion: 0, total: 0 });

export const addTokenUsage = (a: TokenUsage, b: TokenUsage): TokenUsage => ({
  prompt: a.prompt + b.prompt,
  completion: a.completion + b.completion,
  total: a.total + b.total,
});

export type Sleep = (ms: number) => Promise<void>;
