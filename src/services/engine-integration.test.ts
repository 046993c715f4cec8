import { describe, it, expect, beforeEach } from 'vitest';
import { Low, Memory } from 'lowdb';
import { MockProvider, OpenAIProvider, PROVIDER_PROFILES, TranslationError, profileFor } from '../engine/index.js';
import { loadConfig } from '../config.js';
import { LowSessionRepository, createDefaultData, hashContent, type DatabaseSchema } from '../storage/database.js';
import { createProvider, translateFiles, translateSrt } from './engine-integration.js';

const SRT = [
  '1',
  '00:00:01,000 --> 00:00:02,000',
  'we should leave now',
  '',
  '2',
  '00:00:03,000 --> 00:00:04,000',
  'they are coming for us',
  '',
  '3',
  '00:00:05,000 --> 00:00:06,000',
  'the car is out back',
  '',
].join('\n');

const ECHOED =
  '1\n00:00:01,000 --> 00:00:02,000\n[T] we should leave now\n\n' +
  '2\n00:00:03,000 --> 00:00:04,000\n[T] they are coming for us\n\n' +
  '3\n00:00:05,000 --> 00:00:06,000\n[T] the car is out back\n';

const config = loadConfig({ LLM_PROVIDER: 'mock' });

const lookup = {
  sourceFile: 'movie.srt',
  contentHash: hashContent(SRT),
  sourceLanguage: 'en',
  targetLanguage: 'es',
  provider: 'mock',
  model: 'mock-model',
};

describe('createProvider', () => {
  it('builds the configured provider', () => {
    expect(createProvider(config)).toBeInstanceOf(MockProvider);

    const openai = createProvider(loadConfig({ OPENAI_API_KEY: 'test-key' }));
    expect(openai).toBeInstanceOf(OpenAIProvider);
    expect(openai.model).toBe('gpt-4o-mini');
    expect(openai.name).toBe('openai');
  });

  it('names OpenAI-compatible servers after their provider', () => {
    const ollama = createProvider(
      loadConfig({ LLM_PROVIDER: 'ollama', OPENAI_BASE_URL: 'http://localhost:11434/v1', OPENAI_MODEL: 'llama3' })
    );
    expect(ollama).toBeInstanceOf(OpenAIProvider);
    expect(ollama.name).toBe('ollama');
    expect(profileFor(ollama.name)).toEqual(PROVIDER_PROFILES.ollama);

    const anthropic = createProvider(loadConfig({ LLM_PROVIDER: 'anthropic', OPENAI_API_KEY: 'test-key' }));
    expect(profileFor(anthropic.name)).toEqual(PROVIDER_PROFILES.anthropic);
  });

  it('rejects unknown providers', () => {
    expect(() => createProvider(loadConfig({ LLM_PROVIDER: 'carrier-pigeon' }))).toThrow(
      'Unsupported provider: carrier-pigeon'
    );
  });
});

describe('translateSrt', () => {
  let sessions: LowSessionRepository;

  beforeEach(() => {
    sessions = new LowSessionRepository(new Low(new Memory<DatabaseSchema>(), createDefaultData()));
  });

  it('translates without sessions', async () => {
    const translation = await translateSrt(config, SRT, { sourceFile: 'movie.srt', provider: new MockProvider(), quiet: true });

    expect(translation.srt).toBe(ECHOED);
    expect(translation.entryCount).toBe(3);
    expect(translation.resume).toBe('disabled');
    expect(translation.sessionId).toBeUndefined();
    expect(translation.result?.success).toBe(true);
  });

  it('throws when the file has no entries', async () => {
    await expect(translateSrt(config, '', { sourceFile: 'empty.srt', quiet: true })).rejects.toThrow(
      'No subtitle entries found in empty.srt'
    );
  });

  it('stores the finished translation and reuses it', async () => {
    const first = await translateSrt(config, SRT, {
      sourceFile: 'movie.srt',
      provider: new MockProvider(),
      sessions,
      quiet: true,
    });

    expect(first.resume).toBe('not_found');
    const stored = first.sessionId === undefined ? undefined : await sessions.get(first.sessionId);
    expect(stored?.status).toBe('completed');
    expect(stored?.translations).toEqual({
      '1': '[T] we should leave now',
      '2': '[T] they are coming for us',
      '3': '[T] the car is out back',
    });

    const provider = new MockProvider();
    const second = await translateSrt(config, SRT, { sourceFile: 'movie.srt', provider, sessions, quiet: true });

    expect(provider.callCount).toBe(0);
    expect(second.resume).toBe('already_completed');
    expect(second.result).toBeUndefined();
    expect(second.srt).toBe(ECHOED);
    expect(second.summary).toBe(`Reused completed session ${first.sessionId}`);
  });

  it('resumes an interrupted session without resending finished windows', async () => {
    const previous = await sessions.create(lookup, 3);
    await sessions.updateProgress(previous.id, {
      '1': 'debemos irnos ya',
      '2': 'vienen por nosotros',
      '3': 'el coche está atrás',
    });
    const provider = new MockProvider();

    const translation = await translateSrt(config, SRT, { sourceFile: 'movie.srt', provider, sessions, quiet: true });

    expect(translation.resume).toBe('resumed');
    expect(translation.sessionId).toBe(previous.id);
    expect(provider.callCount).toBe(0);
    expect(translation.srt).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\ndebemos irnos ya\n\n' +
        '2\n00:00:03,000 --> 00:00:04,000\nvienen por nosotros\n\n' +
        '3\n00:00:05,000 --> 00:00:06,000\nel coche está atrás\n'
    );
    expect((await sessions.get(previous.id))?.status).toBe('completed');
  });

  it('starts over when the source file changed', async () => {
    const previous = await sessions.create({ ...lookup, contentHash: 'old-hash' }, 3);
    const provider = new MockProvider();

    const translation = await translateSrt(config, SRT, { sourceFile: 'movie.srt', provider, sessions, quiet: true });

    expect(translation.resume).toBe('source_file_changed');
    expect(translation.sessionId).not.toBe(previous.id);
    expect(provider.callCount).toBe(1);
    expect(translation.srt).toBe(ECHOED);
  });

  it('marks the session failed when translation fails', async () => {
    const provider = new MockProvider({ script: [new TranslationError('config_error', 'bad key')] });

    const translation = await translateSrt(config, SRT, { sourceFile: 'movie.srt', provider, sessions, quiet: true });

    expect(translation.result?.success).toBe(false);
    expect(translation.srt).toBe(SRT);
    const stored = translation.sessionId === undefined ? undefined : await sessions.get(translation.sessionId);
    expect(stored?.status).toBe('failed');
    expect(stored?.error).toBe('Translation failed: Configuration error: bad key');
  });
});

describe('translateFiles', () => {
  it('translates files independently and keeps their order', async () => {
    const outcomes = await translateFiles(
      config,
      [
        { name: 'a.srt', content: SRT },
        { name: 'b.srt', content: '' },
      ],
      { provider: new MockProvider(), quiet: true }
    );

    expect(outcomes).toHaveLength(2);
    expect(outcomes[0].sourceFile).toBe('a.srt');
    expect(outcomes[0].ok && outcomes[0].translation.srt).toBe(ECHOED);
    expect(outcomes[1]).toEqual({ sourceFile: 'b.srt', ok: false, error: 'No subtitle entries found in b.srt' });
  });
});
