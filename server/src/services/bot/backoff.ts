export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

const DEFAULT_CONFIG: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 60_000, // 1 minute
  multiplier: 2,
};

/**
 * Delay before the next retry of a failing call, doubling up to a cap.
 * `reset` after the first success.
 */
export class RetryBackoff {
  private failures = 0;
  private readonly config: BackoffConfig;

  constructor(config: Partial<BackoffConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  nextDelay(): number {
    const { baseDelayMs, multiplier, maxDelayMs } = this.config;
    const delay = Math.min(baseDelayMs * Math.pow(multiplier, this.failures), maxDelayMs);
    this.failures++;
    return delay;
  }

  reset(): void {
    this.failures = 0;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }
}
