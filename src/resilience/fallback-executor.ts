import type { ModelProfile } from '../context/types.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import {
  CancelledError,
  CircuitOpenError,
  NoModelAvailableError,
  classifyError,
  type PipelineError,
} from './errors.js';

export interface AttemptTarget {
  modelId: string;
  region: string;
  /** 1-based count of network attempts, this one included. */
  attempt: number;
}

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of the random delay added on top of the exponential part. */
  jitterMs: number;
}

export interface FallbackExecutorOptions {
  breakers: CircuitBreakerRegistry;
  /** Model ids from most capable to cheapest. */
  fallbackChain: string[];
  /** Regions that serve a model, in probe order. */
  regionsFor: (modelId: string, preferredRegion: string) => string[];
  /** Profiles used to place a model that is not in the chain. */
  profileFor?: (modelId: string) => Pick<ModelProfile, 'speedRank' | 'costRank'> | undefined;
  maxAttempts?: number;
  backoff?: Partial<BackoffConfig>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface FallbackOutcome<T> {
  result: T;
  modelId: string;
  region: string;
  attempts: number;
  /** A different model or region than the one first asked for served the call. */
  degraded: boolean;
  failures: PipelineError[];
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 200,
  maxDelayMs: 2000,
  jitterMs: 100,
};

export function backoffDelay(
  retry: number,
  config: BackoffConfig,
  random: () => number = Math.random
): number {
  const exponential = Math.min(config.baseDelayMs * Math.pow(2, retry), config.maxDelayMs);
  return exponential + Math.floor(random() * config.jitterMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Cancelled while backing off'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Cancelled while backing off'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs a call against a model, walking down the fallback chain when it
 * fails. Circuit-open and timeout failures move on without waiting; rate
 * limits and outages wait out an exponential backoff with jitter first.
 * An unavailable region is swapped for the next region serving the same
 * model before the model itself is abandoned.
 */
export class FallbackExecutor {
  private maxAttempts: number;
  private backoff: BackoffConfig;
  private sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private random: () => number;

  constructor(private options: FallbackExecutorOptions) {
    this.maxAttempts = options.maxAttempts ?? 4;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  async run<T>(
    initialModel: string,
    preferredRegion: string,
    call: (target: AttemptTarget) => Promise<T>,
    signal?: AbortSignal
  ): Promise<FallbackOutcome<T>> {
    const failures: PipelineError[] = [];
    const visited = new Set<string>();
    let modelId: string | undefined = initialModel;
    let regions = this.regionQueue(initialModel, preferredRegion);
    let attempts = 0;
    let retries = 0;

    while (modelId !== undefined && attempts < this.maxAttempts) {
      if (signal?.aborted) {
        throw new CancelledError('Turn cancelled');
      }
      visited.add(modelId);

      const region = regions.shift() ?? preferredRegion;
      const gate = this.options.breakers.acquire(modelId);
      if (!gate.allowed) {
        console.warn(`[Resilience] Circuit open for ${modelId}, skipping to next model`);
        failures.push(new CircuitOpenError(modelId));
        modelId = this.nextModel(modelId, visited);
        regions = modelId ? this.regionQueue(modelId, preferredRegion) : [];
        continue;
      }

      attempts++;
      try {
        const result = await call({ modelId, region, attempt: attempts });
        this.options.breakers.recordSuccess(modelId);
        return {
          result,
          modelId,
          region,
          attempts,
          degraded: modelId !== initialModel || region !== preferredRegion,
          failures,
        };
      } catch (error) {
        const failure = classifyError(error, modelId);

        if (failure.kind === 'cancelled') {
          this.options.breakers.release(modelId);
          throw failure;
        }

        if (failure.kind === 'request_invalid') {
          this.options.breakers.release(modelId);
          console.error(`[Resilience] Non-retryable failure from ${modelId}: ${failure.message}`);
          throw failure;
        }

        this.options.breakers.recordFailure(modelId);
        failures.push(failure);
        console.warn(`[Resilience] ${modelId}@${region} failed (${failure.kind}): ${failure.message}`);

        if (failure.kind === 'service_unavailable' && regions.length > 0) {
          await this.wait(retries++, signal);
          continue;
        }

        modelId = this.nextModel(modelId, visited);
        regions = modelId ? this.regionQueue(modelId, preferredRegion) : [];

        if (failure.kind !== 'timeout' && modelId !== undefined && attempts < this.maxAttempts) {
          await this.wait(retries++, signal);
        }
      }
    }

    const last = failures[failures.length - 1];
    throw new NoModelAvailableError(
      `No model could serve the request after ${attempts} attempt(s)` +
        (last ? `; last failure: ${last.message}` : ''),
      initialModel,
      { cause: last }
    );
  }

  /**
   * The next entry of the chain after `current` that has not been tried.
   * A model outside the chain continues at the first entry that is faster
   * or cheaper than it; without a profile it starts at the head.
   */
  nextModel(current: string, visited: ReadonlySet<string> = new Set()): string | undefined {
    const chain = this.options.fallbackChain;
    const untried = (id: string) => id !== current && !visited.has(id);

    const index = chain.indexOf(current);
    if (index >= 0) {
      return chain.slice(index + 1).find(untried);
    }

    const profile = this.options.profileFor?.(current);
    if (!profile) {
      return chain.find(untried);
    }
    return chain.find(id => {
      const candidate = this.options.profileFor?.(id);
      return untried(id) && candidate !== undefined &&
        (candidate.speedRank > profile.speedRank || candidate.costRank < profile.costRank);
    });
  }

  private regionQueue(modelId: string, preferredRegion: string): string[] {
    const regions = this.options.regionsFor(modelId, preferredRegion);
    return regions.length > 0 ? [...regions] : [preferredRegion];
  }

  private async wait(retry: number, signal?: AbortSignal): Promise<void> {
    const delay = backoffDelay(retry, this.backoff, this.random);
    await this.sleepFn(delay, signal);
  }
}
