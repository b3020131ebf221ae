import type { BackoffConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';

/**
 * Bounded exponential back-off between acquisition attempts.
 *
 * delay(n) = min(baseDelayMs * 2^(n-1), maxDelayMs) after the n-th
 * consecutive failure; at `maxAttempts` failures the capability is parked.
 */
export class RetryBackoff {
  readonly config: BackoffConfig;

  constructor(config: Partial<BackoffConfig> = {}) {
    this.config = { ...DEFAULT_RUNTIME_CONFIG.monitor.backoff, ...config };
  }

  delayFor(consecutiveFailures: number): number {
    if (consecutiveFailures <= 0) return 0;
    const exponential = this.config.baseDelayMs * 2 ** (consecutiveFailures - 1);
    return Math.min(exponential, this.config.maxDelayMs);
  }

  isParked(consecutiveFailures: number): boolean {
    return consecutiveFailures >= this.config.maxAttempts;
  }
}
