import { ArrClient } from '../arr/client.js';
import type { RateLimiterRegistry } from '../rate-limit/token-bucket.js';
import type { ArrClientFactory } from './types.js';

export interface ClientSettings {
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
}

/**
 * Clients built here share one rate-limit bucket per instance across all
 * queues that target it.
 */
export function createArrClientFactory(limiters: RateLimiterRegistry, settings: ClientSettings): ArrClientFactory {
  return (instance, apiKey, hooks) =>
    new ArrClient({
      instance,
      apiKey,
      gate: limiters.gateFor(instance),
      ...settings,
      onRetry: hooks.onRetry,
    });
}
