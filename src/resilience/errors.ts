import axios from 'axios';

export type PipelineErrorKind =
  | 'rate_limited'
  | 'service_unavailable'
  | 'request_invalid'
  | 'timeout'
  | 'circuit_open'
  | 'segmentation'
  | 'cancelled'
  | 'no_model_available'
  | 'configuration';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, readonly target?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Whether another model or region may succeed where this call failed. */
  get retryable(): boolean {
    return this.kind === 'rate_limited' ||
      this.kind === 'service_unavailable' ||
      this.kind === 'timeout' ||
      this.kind === 'circuit_open';
  }
}

export class RateLimitedError extends PipelineError {
  readonly kind = 'rate_limited';
}

export class ServiceUnavailableError extends PipelineError {
  readonly kind = 'service_unavailable';
}

export class RequestInvalidError extends PipelineError {
  readonly kind = 'request_invalid';
}

export class TimeoutError extends PipelineError {
  readonly kind = 'timeout';
}

export class CircuitOpenError extends PipelineError {
  readonly kind = 'circuit_open';

  constructor(target: string) {
    super(`Circuit open for ${target}`, target);
  }
}

export class SegmentationError extends PipelineError {
  readonly kind = 'segmentation';
}

export class CancelledError extends PipelineError {
  readonly kind = 'cancelled';
}

export class NoModelAvailableError extends PipelineError {
  readonly kind = 'no_model_available';
}

export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH']);

/**
 * Map any thrown value onto the pipeline error taxonomy.
 * Unknown failures are treated as the service being unavailable.
 */
export function classifyError(error: unknown, target?: string): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new CancelledError('Request cancelled', target, { cause: error });
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail = `${target ?? 'request'}: ${status ?? error.code ?? 'network'} ${error.message}`;

    if (error.code === 'ERR_CANCELED') {
      return new CancelledError('Request cancelled', target, { cause: error });
    }
    if (status === 429) {
      return new RateLimitedError(`Rate limited - ${detail}`, target, { cause: error });
    }
    if (status === 408 || status === 504 || (error.code && TIMEOUT_CODES.has(error.code))) {
      return new TimeoutError(`Timed out - ${detail}`, target, { cause: error });
    }
    if (status !== undefined && status >= 400 && status < 500) {
      return new RequestInvalidError(`Request rejected - ${detail}`, target, { cause: error });
    }
    if ((status !== undefined && status >= 500) || (error.code && UNAVAILABLE_CODES.has(error.code))) {
      return new ServiceUnavailableError(`Service unavailable - ${detail}`, target, { cause: error });
    }
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new CancelledError('Request cancelled', target, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ServiceUnavailableError(message, target, { cause: error });
}

export function isCancellation(error: unknown): boolean {
  return classifyError(error).kind === 'cancelled';
}
