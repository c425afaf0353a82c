import axios, { type AxiosInstance } from 'axios';
import type { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { classifyError } from '../resilience/errors.js';
import { DEFAULT_BACKOFF, backoffDelay, sleep, type BackoffConfig } from '../resilience/fallback-executor.js';
import type { SynthesisOptions, SynthesisService } from './types.js';

export interface HttpSynthesisOptions {
  baseUrl: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

/**
 * Text-to-speech over HTTP: POST the text, receive raw audio bytes in the
 * requested encoding.
 */
export class HttpSynthesisClient implements SynthesisService {
  readonly target: string;
  private http: AxiosInstance;
  private timeoutMs: number;

  constructor(options: HttpSynthesisOptions) {
    this.target = options.baseUrl.replace(/\/+$/, '');
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async synthesize(text: string, options: SynthesisOptions, signal?: AbortSignal): Promise<Buffer> {
    try {
      const response = await this.http.post<ArrayBuffer>(
        `${this.target}/v1/speak`,
        { text },
        {
          params: {
            model: options.voice,
            encoding: options.encoding,
            sample_rate: options.sampleRate,
          },
          timeout: this.timeoutMs,
          headers: { 'Content-Type': 'application/json' },
          responseType: 'arraybuffer',
          signal,
        }
      );
      return Buffer.from(response.data);
    } catch (error) {
      throw classifyError(error, this.target);
    }
  }
}

export interface ResilientSynthesizerOptions {
  breakers: CircuitBreakerRegistry;
  maxAttempts?: number;
  backoff?: Partial<BackoffConfig>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Puts a synthesizer behind the shared breaker registry and retries
 * retryable failures with backoff. There is no alternative endpoint to
 * fall back to, so an open circuit fails fast.
 */
export class ResilientSynthesizer implements SynthesisService {
  readonly target: string;
  private maxAttempts: number;
  private backoff: BackoffConfig;
  private sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private random: () => number;

  constructor(private inner: SynthesisService, private options: ResilientSynthesizerOptions) {
    this.target = `synthesis:${inner.target}`;
    this.maxAttempts = options.maxAttempts ?? 2;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  async synthesize(text: string, options: SynthesisOptions, signal?: AbortSignal): Promise<Buffer> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.options.breakers.execute(
          this.target,
          () => this.inner.synthesize(text, options, signal)
        );
      } catch (error) {
        const failure = classifyError(error, this.target);
        const canRetry = failure.retryable && failure.kind !== 'circuit_open';
        if (!canRetry || attempt + 1 >= this.maxAttempts) {
          throw failure;
        }
        await this.sleepFn(backoffDelay(attempt, this.backoff, this.random), signal);
      }
    }
  }
}
