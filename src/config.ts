/**
 * Configuration management for Cuecraft
 */

import { RECOVERY_STRATEGIES, type RecoveryProfile } from './engine/quality/recovery.js';
import type { PipelinePreset } from './engine/pipeline/translation-pipeline.js';

export interface AppConfig {
  // Server
  port: number;

  // AI Provider
  provider: string;
  openai: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };

  // Translation settings
  translation: {
    sourceLanguage: string;
    targetLanguage: string;
    preset: PipelinePreset;
    recoveryProfile: RecoveryProfile;
    /** Overrides the provider profile's concurrency */
    maxConcurrency?: number;
    requestTimeoutMs: number;
  };

  // Storage
  storage: {
    dataDir: string;
  };
}

const PRESETS: readonly string[] = ['default', 'fast', 'quality'];
const PROVIDERS: readonly string[] = ['openai', 'anthropic', 'ollama', 'lmstudio', 'mock'];
/** Served over the OpenAI-compatible API without a key */
const LOCAL_PROVIDERS: readonly string[] = ['ollama', 'lmstudio'];

const isPreset = (value: string): value is PipelinePreset => PRESETS.includes(value);
const isRecoveryProfile = (value: string): value is RecoveryProfile => value in RECOVERY_STRATEGIES;

const optionalInt = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : parseInt(value, 10);

/**
 * Load configuration from environment variables. Unknown preset or
 * recovery names are kept as defaults and reported by validateConfig.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const preset = env.PIPELINE_PRESET ?? 'default';
  const recovery = env.RECOVERY_PROFILE ?? 'default';

  return {
    port: parseInt(env.PORT ?? '3000', 10),

    provider: env.LLM_PROVIDER ?? 'openai',
    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini',
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },

    translation: {
      sourceLanguage: env.SOURCE_LANGUAGE ?? 'en',
      targetLanguage: env.TARGET_LANGUAGE ?? 'es',
      preset: isPreset(preset) ? preset : 'default',
      recoveryProfile: isRecoveryProfile(recovery) ? recovery : 'default',
      maxConcurrency: optionalInt(env.MAX_CONCURRENCY),
      requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS ?? '120000', 10),
    },

    storage: {
      dataDir: env.DATA_DIR ?? './data',
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!PROVIDERS.includes(config.provider)) {
    errors.push(`Unsupported LLM_PROVIDER "${config.provider}" (expected ${PROVIDERS.join(', ')})`);
  }

  if ((config.provider === 'openai' || config.provider === 'anthropic') && !config.openai.apiKey) {
    errors.push(`OPENAI_API_KEY is required when LLM_PROVIDER is ${config.provider}`);
  }

  if (LOCAL_PROVIDERS.includes(config.provider) && !config.openai.baseUrl) {
    errors.push(`OPENAI_BASE_URL is required when LLM_PROVIDER is ${config.provider}`);
  }

  if (env.PIPELINE_PRESET && !isPreset(env.PIPELINE_PRESET)) {
    errors.push(`Unknown PIPELINE_PRESET "${env.PIPELINE_PRESET}" (expected ${PRESETS.join(', ')})`);
  }

  if (env.RECOVERY_PROFILE && !isRecoveryProfile(env.RECOVERY_PROFILE)) {
    errors.push(
      `Unknown RECOVERY_PROFILE "${env.RECOVERY_PROFILE}" (expected ${Object.keys(RECOVERY_STRATEGIES).join(', ')})`
    );
  }

  if (!Number.isInteger(config.port) || config.port <= 0) {
    errors.push('PORT must be a positive integer');
  }

  const { maxConcurrency, requestTimeoutMs } = config.translation;
  if (maxConcurrency !== undefined && (!Number.isInteger(maxConcurrency) || maxConcurrency < 1)) {
    errors.push('MAX_CONCURRENCY must be a positive integer');
  }

  if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
    errors.push('REQUEST_TIMEOUT_MS must be a positive number of milliseconds');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if an AI provider is usable
 */
export function hasAIProvider(config: AppConfig): boolean {
  if (config.provider === 'mock') return true;
  if (LOCAL_PROVIDERS.includes(config.provider)) return Boolean(config.openai.baseUrl);
  return Boolean(config.openai.apiKey);
}
