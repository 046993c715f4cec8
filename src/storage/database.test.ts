import { describe, it, expect, beforeEach } from 'vitest';
import { Low, Memory } from 'lowdb';
import { LowSessionRepository, createDefaultData, hashContent, type DatabaseSchema } from './database.js';
import type { SessionLookup } from '../engine/interfaces/session-repository.js';
import type { GlossaryData } from '../engine/types/glossary.js';

const lookup: SessionLookup = {
  sourceFile: 'movie.srt',
  contentHash: 'hash-a',
  sourceLanguage: 'en',
  targetLanguage: 'es',
  provider: 'mock',
  model: 'mock-model',
};

const MINUTE = 60_000;

describe('LowSessionRepository', () => {
  let time: number;
  let db: Low<DatabaseSchema>;
  let repo: LowSessionRepository;

  const advance = (ms: number) => {
    time += ms;
  };

  beforeEach(() => {
    time = Date.parse('2026-01-01T00:00:00.000Z');
    db = new Low(new Memory<DatabaseSchema>(), createDefaultData());
    repo = new LowSessionRepository(db, () => new Date(time));
  });

  it('creates in-progress sessions', async () => {
    const session = await repo.create(lookup, 10);

    expect(session).toMatchObject({
      ...lookup,
      status: 'in_progress',
      totalEntries: 10,
      translations: {},
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(await repo.get(session.id)).toBe(session);
  });

  it('finds nothing for another model', async () => {
    await repo.create(lookup, 10);
    expect(await repo.findResumable({ ...lookup, model: 'other-model' })).toEqual({ status: 'not_found' });
  });

  it('resumes an unfinished session', async () => {
    const session = await repo.create(lookup, 10);
    const outcome = await repo.findResumable(lookup);
    expect(outcome).toEqual({ status: 'resumed', session });
  });

  it('reports a changed source file', async () => {
    await repo.create(lookup, 10);
    const outcome = await repo.findResumable({ ...lookup, contentHash: 'hash-b' });
    expect(outcome.status).toBe('source_file_changed');
  });

  it('resumes the same contents under another file name', async () => {
    const session = await repo.create(lookup, 10);

    const outcome = await repo.findResumable({ ...lookup, sourceFile: 'renamed.srt' });

    expect(outcome).toEqual({ status: 'resumed', session });
  });

  it('keeps completed sessions of files that alternate under one name', async () => {
    const first = await repo.create(lookup, 10);
    await repo.markComplete(first.id);
    advance(MINUTE);
    const second = await repo.create({ ...lookup, contentHash: 'hash-b' }, 10);
    advance(MINUTE);
    await repo.markComplete(second.id);

    expect(await repo.findResumable(lookup)).toEqual({ status: 'already_completed', session: first });
    expect(await repo.findResumable({ ...lookup, contentHash: 'hash-b' })).toEqual({
      status: 'already_completed',
      session: second,
    });
    expect(await repo.findResumable({ ...lookup, contentHash: 'hash-c' })).toEqual({
      status: 'source_file_changed',
      session: second,
      previousHash: 'hash-b',
    });
  });

  it('reports completed and failed sessions', async () => {
    const done = await repo.create(lookup, 10);
    advance(MINUTE);
    await repo.markComplete(done.id);
    expect((await repo.findResumable(lookup)).status).toBe('already_completed');
    expect(done.completedAt).toBe('2026-01-01T00:01:00.000Z');

    advance(MINUTE);
    const broken = await repo.create(lookup, 10);
    advance(MINUTE);
    await repo.markFailed(broken.id, 'Translation failed: bad key');
    expect((await repo.findResumable(lookup)).status).toBe('failed');
    expect(broken.error).toBe('Translation failed: bad key');
  });

  it('picks the most recently updated session', async () => {
    const first = await repo.create(lookup, 10);
    advance(MINUTE);
    const second = await repo.create(lookup, 10);

    expect(await repo.findResumable(lookup)).toEqual({ status: 'resumed', session: second });

    advance(MINUTE);
    await repo.updateProgress(first.id, { '1': 'uno' });
    expect(await repo.findResumable(lookup)).toEqual({ status: 'resumed', session: first });
    expect((await repo.list()).map(s => s.id)).toEqual([first.id, second.id]);
  });

  it('merges progress and keeps the latest glossary', async () => {
    const session = await repo.create(lookup, 10);
    const glossary: GlossaryData = { characterNames: ['Alice'], terms: [], technicalTerms: {} };

    await repo.updateProgress(session.id, { '1': 'uno', '2': 'dos' });
    advance(MINUTE);
    await repo.updateProgress(session.id, { '2': 'DOS', '3': 'tres' }, glossary);

    expect(session.translations).toEqual({ '1': 'uno', '2': 'DOS', '3': 'tres' });
    expect(session.glossary).toEqual(glossary);
    expect(session.updatedAt).toBe('2026-01-01T00:01:00.000Z');
  });

  it('pauses sessions that stopped updating and resumes them as in progress', async () => {
    const stuck = await repo.create(lookup, 10);
    advance(20 * MINUTE);
    const recent = await repo.create({ ...lookup, sourceFile: 'other.srt', contentHash: 'hash-c' }, 10);
    advance(11 * MINUTE);

    expect(await repo.pauseStuckSessions()).toBe(1);
    expect(stuck.status).toBe('paused');
    expect(recent.status).toBe('in_progress');

    const outcome = await repo.findResumable(lookup);
    expect(outcome.status).toBe('resumed');
    expect(stuck.status).toBe('in_progress');
  });

  it('throws for unknown ids', async () => {
    await expect(repo.markComplete('nope')).rejects.toThrow('Session not found: nope');
  });
});

describe('hashContent', () => {
  it('is the sha-256 hex digest', () => {
    expect(hashContent('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
