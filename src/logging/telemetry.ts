import type { DeepLogger } from './deep-logger.js';

export interface TurnTelemetry {
  callId: string;
  tenantId: string;
  modelId: string;
  region: string;
  rule: string;
  complexity: number;
  attempts: number;
  degraded: boolean;
  status: string;
  inputTokens?: number;
  outputTokens?: number;
  estimatedCost?: number;
  firstTokenMs?: number;
  elapsedMs: number;
  segments: number;
  skippedSegments: number;
  error?: string;
}

/** Fire-and-forget sink: `record` must return without waiting on I/O. */
export interface TelemetrySink {
  record(point: TurnTelemetry): void;
}

export class DeepLogTelemetrySink implements TelemetrySink {
  constructor(private logger: Pick<DeepLogger, 'logEvent'>) {}

  record(point: TurnTelemetry): void {
    setImmediate(() => {
      this.logger
        .logEvent('turn_telemetry', { ...point })
        .catch((error: unknown) => {
          console.warn('[Telemetry] Failed to write telemetry point:', error instanceof Error ? error.message : error);
        });
    });
  }
}

export class NullTelemetrySink implements TelemetrySink {
  record(): void {}
}
