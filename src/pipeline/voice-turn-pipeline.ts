import type { ConversationContext, ModelProfile, RoutingDecision } from '../context/types.js';
import type { BuildOptions, TurnRequestBuilder } from '../generation/request-builder.js';
import type { GenerationDelta, GenerationService, TokenUsage } from '../generation/types.js';
import type { TelemetrySink } from '../logging/telemetry.js';
import type { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import {
  CancelledError,
  ServiceUnavailableError,
  TimeoutError,
  classifyError,
  type PipelineError,
} from '../resilience/errors.js';
import type { AttemptTarget, FallbackExecutor, FallbackOutcome } from '../resilience/fallback-executor.js';
import type { ComplexityScorer } from '../routing/complexity-scorer.js';
import type { ModelSelector } from '../routing/model-selector.js';
import { EventStream } from '../streaming/event-stream.js';
import { SentenceSegmenter, type SegmentEvent } from '../streaming/sentence-segmenter.js';
import type { DispatchSummary, SynthesisDispatcher } from '../synthesis/synthesis-dispatcher.js';
import type { AudioSink, SynthesisOptions, SynthesisService } from '../synthesis/types.js';

export type TurnStatus = 'completed' | 'partial' | 'apology' | 'failed' | 'cancelled';

export interface TurnOptions {
  latencyBudgetMs?: number;
  costSensitive?: boolean;
  /** Defaults to the context's `anticipatesTools` flag. */
  needsTools?: boolean;
  /** Defaults to the context's region hint, then the configured default. */
  preferredRegion?: string;
  /** Deadline for the first streamed delta of each generation attempt. */
  firstTokenTimeoutMs?: number;
  build?: BuildOptions;
  signal?: AbortSignal;
}

export interface TurnResult {
  status: TurnStatus;
  /** Generated text that was segmented for speech. */
  responseText: string;
  /** What the caller actually heard, apology included. */
  spokenText: string;
  apologized: boolean;
  complexity: number;
  routing: RoutingDecision;
  /** Model and region that served the turn, when one did. */
  modelId?: string;
  region?: string;
  attempts: number;
  degraded: boolean;
  firstTokenMs: number | null;
  usage?: TokenUsage;
  dispatch?: DispatchSummary;
  error?: PipelineError;
  elapsedMs: number;
}

export interface VoiceTurnPipelineDeps {
  scorer: ComplexityScorer;
  selector: ModelSelector;
  builder: TurnRequestBuilder;
  generation: GenerationService;
  executor: FallbackExecutor;
  breakers: CircuitBreakerRegistry;
  dispatcher: SynthesisDispatcher;
  /** Speaks the apology; normally the same resilient synthesizer the dispatcher uses. */
  synthesizer: SynthesisService;
  synthesis: SynthesisOptions;
  apologyPhrase: string;
  telemetry?: TelemetrySink;
  defaults?: {
    region?: string;
    latencyBudgetMs?: number;
    firstTokenTimeoutMs?: number;
    channelCapacity?: number;
  };
  now?: () => number;
}

interface OpenedStream {
  deltas: AsyncIterable<GenerationDelta>;
}

/**
 * One conversational turn: score, route, stream the reply through the
 * segmenter, and speak it sentence by sentence as it arrives. Failures
 * before any audio fall back across models and regions; failures after it
 * end the turn with an apology.
 */
export class VoiceTurnPipeline {
  private now: () => number;

  constructor(private deps: VoiceTurnPipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  async runTurn(
    utterance: string,
    context: ConversationContext,
    sink: AudioSink,
    options: TurnOptions = {}
  ): Promise<TurnResult> {
    const startedAt = this.now();
    const defaults = this.deps.defaults ?? {};
    const turn = new AbortController();
    const onAbort = () => turn.abort();
    if (options.signal?.aborted) {
      turn.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const complexity = this.deps.scorer.score(utterance, context);
    const routing = this.deps.selector.select({
      score: complexity,
      latencyBudgetMs: options.latencyBudgetMs ?? defaults.latencyBudgetMs ?? 800,
      costSensitive: options.costSensitive ?? false,
      needsTools: options.needsTools ?? context.anticipatesTools ?? false,
      preferredRegion: options.preferredRegion ?? context.regionHint ?? defaults.region ?? 'us-east-1',
    });

    if (routing.regionFallback) {
      console.warn(`[Pipeline] ${routing.modelId} is not served in the preferred region, using ${routing.region}`);
    }

    const base = {
      complexity,
      routing,
      startedAt,
      callId: context.callId,
      tenantId: context.tenantId,
    };

    try {
      let opened: FallbackOutcome<OpenedStream>;
      try {
        opened = await this.deps.executor.run(
          routing.modelId,
          routing.region,
          (target) => this.openStream(utterance, context, routing, target, options, turn.signal),
          turn.signal
        );
      } catch (error) {
        const failure = classifyError(error, routing.modelId);
        if (failure.kind === 'cancelled') {
          return this.finish(base, {
            status: 'cancelled',
            attempts: 0,
            degraded: routing.degraded,
            error: failure,
          });
        }
        console.error(`[Pipeline] Turn ${context.callId} could not start: ${failure.message}`);
        const apologized = await this.apologize(sink, 1, turn.signal);
        return this.finish(base, {
          status: apologized ? 'apology' : 'failed',
          apologized,
          attempts: 0,
          degraded: routing.degraded,
          error: failure,
        });
      }

      const stream = opened.result;
      const segmenter = new SentenceSegmenter({ startedAt, now: this.now });
      const channel = new EventStream<SegmentEvent>(defaults.channelCapacity ?? 8);
      const generated: string[] = [];

      const produce = async (): Promise<void> => {
        try {
          for await (const event of segmenter.segment(stream.deltas)) {
            if (event.type !== 'error') {
              generated.push(event.text);
            }
            await channel.push(event);
          }
        } finally {
          channel.end();
        }
      };

      const consume = this.deps.dispatcher
        .dispatch(channel, sink, turn.signal)
        .then((summary) => {
          if (summary.sinkError) {
            turn.abort();
          }
          return summary;
        });

      const [, dispatch] = await Promise.all([produce(), consume]);

      const served = {
        modelId: opened.modelId,
        region: opened.region,
        attempts: opened.attempts,
        degraded: routing.degraded || opened.degraded,
        firstTokenMs: segmenter.firstTokenLatencyMs,
        usage: segmenter.usage,
        dispatch,
        responseText: generated.join(''),
      };

      if (options.signal?.aborted) {
        return this.finish(base, {
          ...served,
          status: 'cancelled',
          error: new CancelledError('Turn cancelled'),
        });
      }

      if (dispatch.sinkError) {
        return this.finish(base, {
          ...served,
          status: 'failed',
          error: classifyError(dispatch.sinkError),
        });
      }

      if (dispatch.error) {
        const failure = classifyError(dispatch.error, opened.modelId);
        if (failure.kind !== 'cancelled') {
          this.deps.breakers.recordFailure(opened.modelId);
        }
        console.warn(`[Pipeline] Stream from ${opened.modelId} failed mid-turn: ${failure.message}`);
        const apologized = await this.apologize(sink, segmenter.emittedCount + 1, turn.signal);
        const status: TurnStatus = dispatch.delivered.length > 0
          ? 'partial'
          : apologized ? 'apology' : 'failed';
        return this.finish(base, { ...served, status, apologized, error: failure });
      }

      if (dispatch.delivered.length === 0) {
        this.deps.breakers.recordFailure(opened.modelId);
        console.warn(`[Pipeline] ${opened.modelId} produced nothing to speak`);
        const apologized = await this.apologize(sink, segmenter.emittedCount + 1, turn.signal);
        return this.finish(base, {
          ...served,
          status: apologized ? 'apology' : 'failed',
          apologized,
          error: new ServiceUnavailableError(`${opened.modelId} produced nothing to speak`, opened.modelId),
        });
      }

      return this.finish(base, { ...served, status: 'completed' });
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      turn.abort();
    }
  }

  /**
   * One generation attempt. Resolves once the first delta arrives, so a
   * failure that happens before any content still counts against this
   * model and lets the executor fall back. A stream that ends before any
   * content is such a failure.
   */
  private async openStream(
    utterance: string,
    context: ConversationContext,
    routing: RoutingDecision,
    target: AttemptTarget,
    options: TurnOptions,
    turnSignal: AbortSignal
  ): Promise<OpenedStream> {
    const built = this.deps.builder.build(
      utterance,
      context,
      { ...routing, modelId: target.modelId, region: target.region },
      options.build
    );
    if (!built.ok) {
      throw built.error;
    }

    const attempt = new AbortController();
    const signal = AbortSignal.any([turnSignal, attempt.signal]);
    const iterator = this.deps.generation.stream(built.request, signal)[Symbol.asyncIterator]();
    const deadline = options.firstTokenTimeoutMs ?? this.deps.defaults?.firstTokenTimeoutMs ?? 3000;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        attempt.abort();
        reject(new TimeoutError(`No response from ${target.modelId} within ${deadline}ms`, target.modelId));
      }, deadline);
    });

    let first: IteratorResult<GenerationDelta>;
    try {
      first = await Promise.race([iterator.next(), timedOut]);
    } catch (error) {
      attempt.abort();
      throw error;
    } finally {
      clearTimeout(timer);
    }

    if (first.done || first.value.type === 'end') {
      attempt.abort();
      throw new ServiceUnavailableError(`${target.modelId} returned an empty response`, target.modelId);
    }
    if (first.value.type === 'error') {
      attempt.abort();
      throw first.value.error;
    }

    return { deltas: resume(first, iterator) };
  }

  private async apologize(sink: AudioSink, sequence: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) {
      return false;
    }
    const phrase = this.deps.apologyPhrase;
    try {
      const audio = await this.deps.synthesizer.synthesize(phrase, this.deps.synthesis, signal);
      await sink.write({ sequence, text: phrase, audio, substituted: true });
      return true;
    } catch (error) {
      console.error('[Pipeline] Could not speak the apology:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  private finish(
    base: {
      complexity: number;
      routing: RoutingDecision;
      startedAt: number;
      callId: string;
      tenantId: string;
    },
    outcome: Partial<TurnResult> & Pick<TurnResult, 'status' | 'attempts' | 'degraded'>
  ): TurnResult {
    const apologized = outcome.apologized ?? false;
    const spoken = outcome.dispatch?.spokenText ?? '';
    const result: TurnResult = {
      responseText: '',
      firstTokenMs: null,
      ...outcome,
      apologized,
      spokenText: apologized
        ? [spoken, this.deps.apologyPhrase].filter(Boolean).join(' ')
        : spoken,
      complexity: base.complexity,
      routing: base.routing,
      elapsedMs: this.now() - base.startedAt,
    };

    this.recordTelemetry(base.callId, base.tenantId, result);
    return result;
  }

  private recordTelemetry(callId: string, tenantId: string, result: TurnResult): void {
    const telemetry = this.deps.telemetry;
    if (!telemetry) return;

    const modelId = result.modelId ?? result.routing.modelId;
    const profile = this.deps.selector.getModel(modelId);
    telemetry.record({
      callId,
      tenantId,
      modelId,
      region: result.region ?? result.routing.region,
      rule: result.routing.rule,
      complexity: result.complexity,
      attempts: result.attempts,
      degraded: result.degraded,
      status: result.status,
      inputTokens: result.usage?.inputTokens,
      outputTokens: result.usage?.outputTokens,
      estimatedCost: estimateCost(profile, result.usage),
      firstTokenMs: result.firstTokenMs ?? undefined,
      elapsedMs: result.elapsedMs,
      segments: result.dispatch?.delivered.length ?? 0,
      skippedSegments: result.dispatch?.skipped.length ?? 0,
      error: result.error?.message,
    });
  }
}

export function estimateCost(profile: ModelProfile | undefined, usage: TokenUsage | undefined): number | undefined {
  if (!profile || !usage) return undefined;
  if (profile.costPerInputToken === undefined || profile.costPerOutputToken === undefined) {
    return undefined;
  }
  return usage.inputTokens * profile.costPerInputToken + usage.outputTokens * profile.costPerOutputToken;
}

async function* resume(
  first: IteratorResult<GenerationDelta>,
  iterator: AsyncIterator<GenerationDelta>
): AsyncGenerator<GenerationDelta> {
  try {
    if (first.done) return;
    yield first.value;
    while (true) {
      const next = await iterator.next();
      if (next.done) return;
      yield next.value;
    }
  } finally {
    await iterator.return?.();
  }
}
