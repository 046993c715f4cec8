import { describe, it, expect } from 'vitest';
import { canProceed, completionPercentage, resumeOutcome, type TranslationSession } from './session-repository.js';

const session = (overrides: Partial<TranslationSession> = {}): TranslationSession => ({
  id: 's1',
  sourceFile: 'movie.srt',
  contentHash: 'hash-a',
  sourceLanguage: 'en',
  targetLanguage: 'es',
  provider: 'mock',
  model: 'mock-model',
  status: 'in_progress',
  totalEntries: 4,
  translations: {},
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

describe('resumeOutcome', () => {
  it('is not_found without a session', () => {
    expect(resumeOutcome(undefined, 'hash-a')).toEqual({ status: 'not_found' });
  });

  it('detects a changed source file before looking at status', () => {
    const completed = session({ status: 'completed' });
    expect(resumeOutcome(completed, 'hash-b')).toEqual({
      status: 'source_file_changed',
      session: completed,
      previousHash: 'hash-a',
    });
  });

  it('maps session status', () => {
    expect(resumeOutcome(session({ status: 'completed' }), 'hash-a').status).toBe('already_completed');
    expect(resumeOutcome(session({ status: 'failed' }), 'hash-a').status).toBe('failed');
    expect(resumeOutcome(session({ status: 'in_progress' }), 'hash-a').status).toBe('resumed');
    expect(resumeOutcome(session({ status: 'paused' }), 'hash-a').status).toBe('resumed');
  });
});

describe('canProceed', () => {
  it('allows a fresh start or a resume only', () => {
    expect(canProceed({ status: 'not_found' })).toBe(true);
    expect(canProceed({ status: 'resumed', session: session() })).toBe(true);
    expect(canProceed({ status: 'already_completed', session: session() })).toBe(false);
    expect(canProceed({ status: 'failed', session: session() })).toBe(false);
  });
});

describe('completionPercentage', () => {
  it('counts stored translations', () => {
    expect(completionPercentage(session({ translations: { '1': 'uno' } }))).toBe(25);
    expect(completionPercentage(session({ totalEntries: 0 }))).toBe(0);
  });
});
