/**
 * Database layer using LowDB
 *
 * Translation sessions are kept in a JSON file so an interrupted run can
 * resume after a restart.
 */

import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import fs from 'fs';
import { createHash, randomUUID } from 'crypto';
import type { GlossaryData } from '../engine/types/glossary.js';
import {
  resumeOutcome,
  type ResumeOutcome,
  type SessionLookup,
  type SessionRepository,
  type SessionStatus,
  type TranslationSession,
} from '../engine/interfaces/session-repository.js';

export interface DatabaseSchema {
  sessions: TranslationSession[];
}

export const createDefaultData = (): DatabaseSchema => ({ sessions: [] });

// Database instance
let db: Low<DatabaseSchema> | null = null;

/**
 * Initialize database
 */
export async function initDatabase(dataDir: string = './data'): Promise<Low<DatabaseSchema>> {
  // Ensure data directory exists
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const dbPath = path.join(dataDir, 'cuecraft-db.json');
  const adapter = new JSONFile<DatabaseSchema>(dbPath);
  db = new Low(adapter, createDefaultData());

  // Read existing data
  await db.read();
  db.data ||= createDefaultData();

  console.log(`[Database] Initialized: ${dbPath}`);
  console.log(`[Database] Sessions: ${db.data.sessions.length}`);

  return db;
}

/**
 * Get database instance
 */
export function getDb(): Low<DatabaseSchema> {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/** sha-256 of the source contents, hex */
export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

const STUCK_TIMEOUT = 30 * 60 * 1000; // 30 minutes

// ============ Session Operations ============

export class LowSessionRepository implements SessionRepository {
  constructor(
    private readonly db: Low<DatabaseSchema>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(lookup: SessionLookup, totalEntries: number): Promise<TranslationSession> {
    const timestamp = this.now().toISOString();
    const session: TranslationSession = {
      ...lookup,
      id: randomUUID(),
      status: 'in_progress',
      totalEntries,
      translations: {},
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.db.data.sessions.push(session);
    await this.db.write();
    return session;
  }

  async findResumable(lookup: SessionLookup): Promise<ResumeOutcome> {
    const latest = (matches: (s: TranslationSession) => boolean): TranslationSession | undefined =>
      this.db.data.sessions
        .filter(
          s =>
            s.sourceLanguage === lookup.sourceLanguage &&
            s.targetLanguage === lookup.targetLanguage &&
            s.provider === lookup.provider &&
            s.model === lookup.model &&
            matches(s)
        )
        .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))[0];

    // Sessions are keyed by content; the file name only reports a changed source
    const session =
      latest(s => s.contentHash === lookup.contentHash) ?? latest(s => s.sourceFile === lookup.sourceFile);

    const outcome = resumeOutcome(session, lookup.contentHash);
    if (outcome.status === 'resumed' && outcome.session.status !== 'in_progress') {
      await this.setStatus(outcome.session.id, 'in_progress');
    }
    return outcome;
  }

  async updateProgress(id: string, translations: Record<string, string>, glossary?: GlossaryData): Promise<void> {
    const session = this.require(id);
    session.translations = { ...session.translations, ...translations };
    if (glossary) session.glossary = glossary;
    session.updatedAt = this.now().toISOString();
    await this.db.write();
  }

  async markComplete(id: string): Promise<void> {
    const session = this.require(id);
    session.completedAt = this.now().toISOString();
    await this.setStatus(id, 'completed');
  }

  async markFailed(id: string, error: string): Promise<void> {
    this.require(id).error = error;
    await this.setStatus(id, 'failed');
  }

  async get(id: string): Promise<TranslationSession | undefined> {
    return this.db.data.sessions.find(s => s.id === id);
  }

  async list(): Promise<TranslationSession[]> {
    return [...this.db.data.sessions].sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  /**
   * Sessions left in progress by a run that died (no update for 30
   * minutes) are paused so they show as resumable
   */
  async pauseStuckSessions(): Promise<number> {
    const now = this.now().getTime();
    let paused = 0;
    for (const session of this.db.data.sessions) {
      if (session.status === 'in_progress' && now - new Date(session.updatedAt).getTime() > STUCK_TIMEOUT) {
        session.status = 'paused';
        paused++;
      }
    }
    if (paused > 0) {
      await this.db.write();
      console.log(`[Database] Paused ${paused} stuck sessions`);
    }
    return paused;
  }

  private async setStatus(id: string, status: SessionStatus): Promise<void> {
    const session = this.require(id);
    session.status = status;
    session.updatedAt = this.now().toISOString();
    await this.db.write();
  }

  private require(id: string): TranslationSession {
    const session = this.db.data.sessions.find(s => s.id === id);
    if (!session) {
      throw new Error(`Session not found: ${id}`);
    }
    return session;
  }
}
