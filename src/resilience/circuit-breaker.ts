import { CircuitOpenError, classifyError } from './errors.js';

export type CircuitStatus = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitState {
  state: CircuitStatus;
  failures: number;
  lastFailureTime: number;
  successes: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export interface CircuitBreakerOptions extends Partial<CircuitBreakerConfig> {
  now?: () => number;
}

export type CircuitGate =
  | { allowed: true; trial: boolean }
  | { allowed: false; retryInMs: number };

interface CircuitRecord extends CircuitState {
  trialInFlight: boolean;
}

export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 30000,
};

/**
 * Per-target circuit breakers (a target is a model id or a synthesis
 * endpoint). Records are created on first use and live as long as the
 * registry. Every transition completes inside a single synchronous method,
 * so concurrent calls sharing a target cannot interleave a read and write.
 */
export class CircuitBreakerRegistry {
  private records = new Map<string, CircuitRecord>();
  private config: CircuitBreakerConfig;
  private now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.config = {
      failureThreshold: options.failureThreshold ?? DEFAULT_CIRCUIT_CONFIG.failureThreshold,
      recoveryTimeoutMs: options.recoveryTimeoutMs ?? DEFAULT_CIRCUIT_CONFIG.recoveryTimeoutMs,
    };
    this.now = options.now ?? Date.now;
  }

  /**
   * Ask permission to call `target`. An open circuit whose recovery window
   * has elapsed moves to HALF_OPEN and hands out exactly one trial.
   */
  acquire(target: string): CircuitGate {
    const record = this.record(target);

    switch (record.state) {
      case 'CLOSED':
        return { allowed: true, trial: false };

      case 'OPEN': {
        const elapsed = this.now() - record.lastFailureTime;
        if (elapsed > this.config.recoveryTimeoutMs) {
          record.state = 'HALF_OPEN';
          record.trialInFlight = true;
          console.log(`[CircuitBreaker] ${target} moved to HALF_OPEN`);
          return { allowed: true, trial: true };
        }
        return { allowed: false, retryInMs: this.config.recoveryTimeoutMs - elapsed };
      }

      case 'HALF_OPEN':
        if (record.trialInFlight) {
          return { allowed: false, retryInMs: 0 };
        }
        record.trialInFlight = true;
        return { allowed: true, trial: true };
    }
  }

  recordSuccess(target: string): void {
    const record = this.record(target);
    if (record.state !== 'CLOSED') {
      console.log(`[CircuitBreaker] ${target} CLOSED after successful trial`);
    }
    record.state = 'CLOSED';
    record.failures = 0;
    record.successes++;
    record.trialInFlight = false;
  }

  recordFailure(target: string): void {
    const record = this.record(target);
    record.failures++;
    record.lastFailureTime = this.now();
    record.trialInFlight = false;

    if (record.state === 'HALF_OPEN') {
      record.state = 'OPEN';
      console.warn(`[CircuitBreaker] ${target} trial failed, circuit re-OPENED`);
      return;
    }

    if (record.state === 'CLOSED' && record.failures >= this.config.failureThreshold) {
      record.state = 'OPEN';
      console.warn(`[CircuitBreaker] ${target} OPENED after ${record.failures} consecutive failures`);
    }
  }

  /**
   * Give back a trial slot without an outcome, e.g. when the call that held
   * it was cancelled by a hangup.
   */
  release(target: string): void {
    const record = this.records.get(target);
    if (record) {
      record.trialInFlight = false;
    }
  }

  /**
   * Run `fn` behind the breaker. Cancellations release the slot without
   * counting, and invalid requests are not held against the target.
   */
  async execute<T>(target: string, fn: () => Promise<T>): Promise<T> {
    const gate = this.acquire(target);
    if (!gate.allowed) {
      throw new CircuitOpenError(target);
    }

    try {
      const result = await fn();
      this.recordSuccess(target);
      return result;
    } catch (error) {
      const classified = classifyError(error, target);
      if (classified.kind === 'cancelled' || classified.kind === 'request_invalid') {
        this.release(target);
      } else {
        this.recordFailure(target);
      }
      throw classified;
    }
  }

  getState(target: string): CircuitState {
    const { trialInFlight: _trial, ...state } = this.record(target);
    return state;
  }

  snapshot(): Record<string, CircuitState> {
    const result: Record<string, CircuitState> = {};
    for (const target of this.records.keys()) {
      result[target] = this.getState(target);
    }
    return result;
  }

  private record(target: string): CircuitRecord {
    let record = this.records.get(target);
    if (!record) {
      record = {
        state: 'CLOSED',
        failures: 0,
        lastFailureTime: 0,
        successes: 0,
        trialInFlight: false,
      };
      this.records.set(target, record);
    }
    return record;
  }
}
