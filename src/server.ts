/**
 * Cuecraft - HTTP server for subtitle translation
 *
 * Integrated with:
 * - LowDB for translation sessions
 * - OpenAI or an OpenAI-compatible server (or the mock provider) for translation
 */

import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';
import { loadConfig, validateConfig, hasAIProvider } from './config.js';
import { initDatabase, getDb, LowSessionRepository } from './storage/database.js';
import { translateSrt, translateFiles } from './services/engine-integration.js';
import { isSupportedFormat } from './services/import/srt.js';
import { translatedFilename } from './services/export/srt.js';
import { TranslationError, completionPercentage, pipelineQualityScore } from './engine/index.js';

// Load configuration
const config = loadConfig();
const configValidation = validateConfig(config);

const app = express();
const PORT = config.port;

// Uploaded subtitle files stay in memory
const storage = multer.memoryStorage();
const upload = multer({
  storage,
  limits: { fileSize: 10 * 1024 * 1024 }, // 10MB limit
  fileFilter: (_req, file, cb) => {
    if (isSupportedFormat(file.originalname)) {
      cb(null, true);
    } else {
      cb(new TranslationError('config_error', 'Only .srt files are allowed'));
    }
  },
});

const TranslateRequestSchema = z.object({
  sourceLanguage: z.string().trim().min(2).optional(),
  targetLanguage: z.string().trim().min(2).optional(),
  preset: z.enum(['default', 'fast', 'quality']).optional(),
  resume: z
    .enum(['true', 'false'])
    .optional()
    .transform(value => value !== 'false'),
});

const sessions = () => new LowSessionRepository(getDb());

/**
 * Aborts when the client goes away before the response is sent
 */
function abortOnDisconnect(res: express.Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

function errorStatus(error: unknown): number {
  if (error instanceof z.ZodError) return 400;
  if (error instanceof TranslationError && error.kind === 'config_error') return 400;
  return 500;
}

function errorMessage(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

// Middleware
app.use(cors());
app.use(express.json());

// ============ API Routes ============

// System status
app.get('/api/status', (_req, res) => {
  res.json({
    version: '0.1.0',
    ready: configValidation.valid && hasAIProvider(config),
    ai: {
      provider: config.provider,
      model: config.provider === 'mock' ? 'mock-model' : config.openai.model,
      configured: hasAIProvider(config),
    },
    translation: {
      sourceLanguage: config.translation.sourceLanguage,
      targetLanguage: config.translation.targetLanguage,
      preset: config.translation.preset,
      recoveryProfile: config.translation.recoveryProfile,
    },
    config: {
      valid: configValidation.valid,
      errors: configValidation.errors,
    },
    storage: 'lowdb',
  });
});

// Translate one SRT file
app.post('/api/translate', upload.single('file'), async (req, res) => {
  try {
    if (!req.file) {
      return res.status(400).json({ error: 'No file uploaded (field "file")' });
    }
    const fields = TranslateRequestSchema.parse(req.body);
    const signal = abortOnDisconnect(res);

    console.log(`[Server] Translating ${req.file.originalname} (${req.file.size} bytes)`);

    const translation = await translateSrt(config, req.file.buffer.toString('utf-8'), {
      sourceFile: req.file.originalname,
      sourceLanguage: fields.sourceLanguage,
      targetLanguage: fields.targetLanguage,
      preset: fields.preset,
      sessions: fields.resume ? sessions() : undefined,
      signal,
    });

    const targetLanguage = fields.targetLanguage ?? config.translation.targetLanguage;
    const sourceLanguage = fields.sourceLanguage ?? config.translation.sourceLanguage;
    const result = translation.result;

    res.status(result && !result.success ? 502 : 200).json({
      success: result ? result.success : true,
      filename: translatedFilename(req.file.originalname, sourceLanguage, targetLanguage),
      srt: translation.srt,
      entries: translation.entryCount,
      sessionId: translation.sessionId,
      resume: translation.resume,
      summary: translation.summary,
      qualityScore: result ? pipelineQualityScore(result) : undefined,
      stats: result
        ? {
            batches: result.translationStats.totalBatches,
            entriesTranslated: result.translationStats.totalEntriesTranslated,
            retries: result.translationStats.totalRetries,
            tokensUsed: result.tokensUsed.total,
            durationMs: result.durationMs,
          }
        : undefined,
      error: result?.error,
      warnings: translation.warnings,
    });
  } catch (error) {
    console.error('[Server] Translation error:', error);
    res.status(errorStatus(error)).json({ error: errorMessage(error) });
  }
});

// Translate several SRT files side by side
app.post('/api/translate/batch', upload.array('files', 20), async (req, res) => {
  try {
    const files = Array.isArray(req.files) ? req.files : [];
    if (files.length === 0) {
      return res.status(400).json({ error: 'No files uploaded (field "files")' });
    }
    const fields = TranslateRequestSchema.parse(req.body);

    console.log(`[Server] Translating ${files.length} files`);

    const outcomes = await translateFiles(
      config,
      files.map(f => ({ name: f.originalname, content: f.buffer.toString('utf-8') })),
      {
        sourceLanguage: fields.sourceLanguage,
        targetLanguage: fields.targetLanguage,
        preset: fields.preset,
        sessions: fields.resume ? sessions() : undefined,
        signal: abortOnDisconnect(res),
      }
    );

    res.json({
      files: outcomes.map(outcome =>
        outcome.ok
          ? {
              sourceFile: outcome.sourceFile,
              success: outcome.translation.result?.success ?? true,
              srt: outcome.translation.srt,
              summary: outcome.translation.summary,
              sessionId: outcome.translation.sessionId,
            }
          : { sourceFile: outcome.sourceFile, success: false, error: outcome.error }
      ),
    });
  } catch (error) {
    console.error('[Server] Batch translation error:', error);
    res.status(errorStatus(error)).json({ error: errorMessage(error) });
  }
});

// List sessions
app.get('/api/sessions', async (_req, res) => {
  try {
    const list = await sessions().list();
    res.json(
      list.map(s => ({
        id: s.id,
        sourceFile: s.sourceFile,
        sourceLanguage: s.sourceLanguage,
        targetLanguage: s.targetLanguage,
        provider: s.provider,
        model: s.model,
        status: s.status,
        totalEntries: s.totalEntries,
        progress: Math.round(completionPercentage(s)),
        updatedAt: s.updatedAt,
      }))
    );
  } catch (error) {
    res.status(500).json({ error: 'Failed to get sessions' });
  }
});

// Get one session
app.get('/api/sessions/:id', async (req, res) => {
  try {
    const session = await sessions().get(req.params.id);
    if (!session) {
      return res.status(404).json({ error: 'Session not found' });
    }
    res.json({ ...session, progress: Math.round(completionPercentage(session)) });
  } catch (error) {
    res.status(500).json({ error: 'Failed to get session' });
  }
});

// Upload and other middleware errors
app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  console.error('[Server] Request error:', errorMessage(error));
  res.status(error instanceof multer.MulterError ? 400 : errorStatus(error)).json({ error: errorMessage(error) });
});

// ============ Start Server ============

async function startServer() {
  if (!configValidation.valid) {
    for (const problem of configValidation.errors) {
      console.warn(`[Config] ${problem}`);
    }
  }

  // Initialize database
  const db = await initDatabase(config.storage.dataDir);
  await new LowSessionRepository(db).pauseStuckSessions();

  app.listen(PORT, () => {
    console.log(`[Server] Cuecraft listening on http://localhost:${PORT}`);
    console.log(`[Server] AI: ${hasAIProvider(config) ? `${config.provider} ✅` : 'not configured ⚠️'}`);
  });
}

startServer().catch(console.error);
