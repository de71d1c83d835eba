/**
 * Circuit breaker per extraction provider
 *
 * Only server-side failures (transient I/O, HTTP 429/5xx, network errors)
 * count towards the threshold. Parse and client errors do not trip it.
 * While OPEN, calls fail at once with CircuitOpenError so the fallback chain
 * can move to the next provider.
 */

import { TransientIOError, errorMessage, isServerError } from '../../pipeline/errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 1,
};

/** Cap on recovery time after repeated trips: 16 minutes */
const MAX_RECOVERY_MS = 960000;

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

/**
 * The provider's circuit is open. Transient: the provider may recover.
 */
export class CircuitOpenError extends TransientIOError {
  constructor(
    readonly provider: string,
    readonly timeToRecovery: number
  ) {
    super(`Circuit for ${provider} is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`, {
      provider,
      time_to_recovery_ms: timeToRecovery,
    });
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  /** Consecutive trips double the recovery time */
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    private readonly provider: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getRecoveryTimeMs(): number {
    const exponent = Math.min(Math.max(0, this.consecutiveTrips - 1), 4);
    return Math.min(this.config.recoveryTimeMs * Math.pow(2, exponent), MAX_RECOVERY_MS);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();
    if (this.state === 'OPEN') {
      throw new CircuitOpenError(this.provider, this.getTimeToRecovery());
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (error instanceof TransientIOError || isServerError(error)) {
        this.recordFailure();
      } else {
        console.error(`[CircuitBreaker] ${this.provider}: client-side error (not counted): ${errorMessage(error)}`);
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === 'OPEN' && this.lastFailureTime !== null) {
      if (this.now() - this.lastFailureTime >= this.getRecoveryTimeMs()) {
        console.error(`[CircuitBreaker] ${this.provider}: OPEN -> HALF_OPEN (trip #${this.consecutiveTrips})`);
        this.state = 'HALF_OPEN';
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error(`[CircuitBreaker] ${this.provider}: recovery confirmed, HALF_OPEN -> CLOSED`);
        this.state = 'CLOSED';
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
        this.consecutiveTrips = 0;
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.state = 'OPEN';
      this.successCount = 0;
      console.error(
        `[CircuitBreaker] ${this.provider}: OPEN after ${this.failureCount} failures (trip #${this.consecutiveTrips}, recovery ${this.getRecoveryTimeMs()}ms)`
      );
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (this.now() - this.lastFailureTime));
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === 'OPEN' ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
  }
}
