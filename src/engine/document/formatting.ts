/**
 * Subtitle markup detection
 */

import type { FormattingTag } from '../types/common.js';

interface TagMarkers {
  open: string;
  close?: string;
}

/** Markers that identify each tag. Position and color carry attributes. */
export const TAG_MARKERS: Record<FormattingTag, TagMarkers> = {
  italic: { open: '<i>', close: '</i>' },
  bold: { open: '<b>', close: '</b>' },
  underline: { open: '<u>', close: '</u>' },
  position: { open: '{\\an' },
  color: { open: '<font', close: '</font>' },
};

const TAG_ORDER: FormattingTag[] = ['italic', 'bold', 'underline', 'position', 'color'];

export function hasTag(text: string, tag: FormattingTag): boolean {
  const { open, close } = TAG_MARKERS[tag];
  return text.includes(open) || (close !== undefined && text.includes(close));
}

export function detectFormatting(text: string): FormattingTag[] {
  return TAG_ORDER.filter(tag => hasTag(text, tag));
}

/** Bracketed or parenthesised from end to end, e.g. `[door slams]` */
export function isSoundEffect(text: string): boolean {
  const trimmed = text.trim();
  return (
    (trimmed.startsWith('[') && trimmed.endsWith(']')) ||
    (trimmed.startsWith('(') && trimmed.endsWith(')'))
  );
}

/** First `{\an8}`-style position tag anywhere in the text, if any */
export function positionTag(text: string): string | undefined {
  return /\{\\an[^}]*\}/.exec(text)?.[0];
}

export function stripMarkup(text: string): string {
  return text
    .replace(/\{\\[^}]*\}/g, '')
    .replace(/<\/?[a-z][^>]*>/gi, '');
}
