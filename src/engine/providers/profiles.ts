/**
 * Per-provider concurrency and rate limits
 */

export type ProviderName = 'openai' | 'anthropic' | 'ollama' | 'lmstudio' | 'mock';

export interface ProviderProfile {
  maxConcurrentRequests: number;
  /** Requests per minute; undefined for local servers */
  targetRpm?: number;
  /** Entries per request in the chunked (non-windowed) flow */
  batchSize: number;
}

export const PROVIDER_PROFILES: Record<ProviderName, ProviderProfile> = {
  openai: { maxConcurrentRequests: 10, targetRpm: 60, batchSize: 5 },
  anthropic: { maxConcurrentRequests: 5, targetRpm: 45, batchSize: 8 },
  ollama: { maxConcurrentRequests: 8, batchSize: 5 },
  lmstudio: { maxConcurrentRequests: 6, batchSize: 4 },
  mock: { maxConcurrentRequests: 4, batchSize: 5 },
};

const isProviderName = (name: string): name is ProviderName => name in PROVIDER_PROFILES;

export function profileFor(name: string): ProviderProfile {
  return isProviderName(name) ? PROVIDER_PROFILES[name] : PROVIDER_PROFILES.openai;
}

/** Minimum spacing between dispatches implied by the rpm limit */
export function minDispatchIntervalMs(profile: ProviderProfile): number {
  return profile.targetRpm ? Math.ceil(60_000 / profile.targetRpm) : 0;
}
