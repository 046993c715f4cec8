/**
 * Session Repository Interface
 *
 * Persists translation progress so an interrupted run can pick up where
 * it stopped. A session is identified by the source content hash plus the
 * language pair, provider and model.
 */

import type { GlossaryData } from '../types/glossary.js';

export type SessionStatus = 'in_progress' | 'paused' | 'completed' | 'failed';

export interface SessionKey {
  /** sha-256 of the source file contents */
  contentHash: string;
  sourceLanguage: string;
  targetLanguage: string;
  provider: string;
  model: string;
}

export interface TranslationSession extends SessionKey {
  id: string;
  sourceFile: string;
  status: SessionStatus;
  totalEntries: number;
  /** Translated text by entry id */
  translations: Record<string, string>;
  glossary?: GlossaryData;
  error?: string;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

export type ResumeOutcome =
  | { status: 'resumed'; session: TranslationSession }
  | { status: 'not_found' }
  | { status: 'source_file_changed'; session: TranslationSession; previousHash: string }
  | { status: 'already_completed'; session: TranslationSession }
  | { status: 'failed'; session: TranslationSession };

export interface SessionLookup extends SessionKey {
  sourceFile: string;
}

export interface SessionRepository {
  create(lookup: SessionLookup, totalEntries: number): Promise<TranslationSession>;
  /**
   * Latest session for the same contents, language pair, provider and model.
   * With none, the latest session under the same file name is reported as
   * `source_file_changed`.
   */
  findResumable(lookup: SessionLookup): Promise<ResumeOutcome>;
  updateProgress(id: string, translations: Record<string, string>, glossary?: GlossaryData): Promise<void>;
  markComplete(id: string): Promise<void>;
  markFailed(id: string, error: string): Promise<void>;
  get(id: string): Promise<TranslationSession | undefined>;
  list(): Promise<TranslationSession[]>;
}

/**
 * How to treat the latest matching session for a file whose current
 * contents hash to `contentHash`
 */
export function resumeOutcome(session: TranslationSession | undefined, contentHash: string): ResumeOutcome {
  if (!session) return { status: 'not_found' };
  if (session.contentHash !== contentHash) {
    return { status: 'source_file_changed', session, previousHash: session.contentHash };
  }
  switch (session.status) {
    case 'completed':
      return { status: 'already_completed', session };
    case 'failed':
      return { status: 'failed', session };
    case 'in_progress':
    case 'paused':
      return { status: 'resumed', session };
  }
}

/** Only a fresh start or a resume lets translation go ahead */
export const canProceed = (outcome: ResumeOutcome): boolean =>
  outcome.status === 'resumed' || outcome.status === 'not_found';

export function completionPercentage(session: TranslationSession): number {
  if (session.totalEntries === 0) return 0;
  return (Object.keys(session.translations).length / session.totalEntries) * 100;
}
