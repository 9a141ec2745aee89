/**
 * Retry and circuit breaker for calls across the LLM boundary
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Per-attempt timeout */
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 60000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  resetTimeoutMs?: number;
  /** Successful probes needed in half-open before closing */
  recoveryProbes?: number;
  onStateChange?: (state: CircuitState, reason: string) => void;
  now?: () => number;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 * @param shouldRetry - Return false to give up immediately on an error
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: Error | null = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Timeout after ${config.timeoutMs}ms`)),
          config.timeoutMs
        );
      });

      const result = await Promise.race([fn(), timeoutPromise]);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      clearTimeout(timer);
      lastError = error instanceof Error ? error : new Error(String(error));
      const retryable = shouldRetry(error);
      const isLast = attempt === config.maxAttempts || !retryable;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: lastError.message,
        nextRetryInMs: isLast ? undefined : lastDelay,
      });

      if (isLast) {
        if (!retryable) {
          throw lastError;
        }
        break;
      }

      await sleep(lastDelay);

      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new Error(
    `Failed after ${config.maxAttempts} attempts. Last error: ${lastError?.message}`
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Stops calling the LLM endpoint after repeated failures, then lets
 * probe calls through once the reset timeout has passed.
 */
export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly recoveryProbes: number;
  private readonly onStateChange?: (state: CircuitState, reason: string) => void;
  private readonly now: () => number;

  private state: CircuitState = 'closed';
  private failures = 0;
  private probeSuccesses = 0;
  private openedAt = 0;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 60000;
    this.recoveryProbes = options.recoveryProbes ?? 2;
    this.onStateChange = options.onStateChange;
    this.now = options.now ?? Date.now;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const waitMs = this.openedAt + this.resetTimeoutMs - this.now();
      if (waitMs > 0) {
        throw new Error(`LLM endpoint circuit is open; retry in ${waitMs}ms`);
      }
      this.transition('half-open', 'reset timeout elapsed');
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  private recordSuccess() {
    if (this.state !== 'half-open') {
      this.failures = Math.max(0, this.failures - 1);
      return;
    }
    this.probeSuccesses++;
    if (this.probeSuccesses >= this.recoveryProbes) {
      this.failures = 0;
      this.transition('closed', 'endpoint recovered');
    }
  }

  private recordFailure() {
    this.failures++;
    if (this.state === 'half-open') {
      this.open('probe call failed');
    } else if (this.failures >= this.failureThreshold) {
      this.open(`${this.failures} consecutive failures`);
    }
  }

  private open(reason: string) {
    this.openedAt = this.now();
    this.transition('open', reason);
  }

  private transition(state: CircuitState, reason: string) {
    this.state = state;
    this.probeSuccesses = 0;
    this.onStateChange?.(state, reason);
  }
}

/**
 * Check if an error is worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
    'status: 429',
    'status: 500',
    'status: 502',
    'status: 503',
    'status: 504',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
