import type { PipelineConfig } from '../config/pipeline-config.js';
import { TurnRequestBuilder } from '../generation/request-builder.js';
import { HttpGenerationClient } from '../generation/generation-client.js';
import type { GenerationService } from '../generation/types.js';
import { DeepLogger } from '../logging/deep-logger.js';
import { DeepLogTelemetrySink, type TelemetrySink } from '../logging/telemetry.js';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { FallbackExecutor } from '../resilience/fallback-executor.js';
import { ComplexityScorer } from '../routing/complexity-scorer.js';
import { ModelSelector } from '../routing/model-selector.js';
import { HttpSynthesisClient, ResilientSynthesizer } from '../synthesis/synthesis-client.js';
import { SynthesisDispatcher } from '../synthesis/synthesis-dispatcher.js';
import type { SynthesisOptions, SynthesisService } from '../synthesis/types.js';
import { VoiceTurnPipeline } from './voice-turn-pipeline.js';

export interface PipelineOverrides {
  generation?: GenerationService;
  /** Raw synthesizer; it is still wrapped with the shared breakers. */
  synthesizer?: SynthesisService;
  telemetry?: TelemetrySink;
  breakers?: CircuitBreakerRegistry;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface PipelineComponents {
  pipeline: VoiceTurnPipeline;
  scorer: ComplexityScorer;
  selector: ModelSelector;
  breakers: CircuitBreakerRegistry;
  executor: FallbackExecutor;
}

/** Wire a pipeline from configuration. Process-wide state (breakers) can be shared by passing it in. */
export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): PipelineComponents {
  const breakers = overrides.breakers ?? new CircuitBreakerRegistry({
    failureThreshold: config.resilience.failureThreshold,
    recoveryTimeoutMs: config.resilience.recoveryTimeoutMs,
    now: overrides.now,
  });
  const backoff = {
    baseDelayMs: config.resilience.baseDelayMs,
    maxDelayMs: config.resilience.maxDelayMs,
    jitterMs: config.resilience.jitterMs,
  };

  const scorer = new ComplexityScorer(config.scorer);
  const selector = new ModelSelector({
    models: config.models,
    availability: config.availability,
    fallbackRegions: config.fallbackRegions,
    reasoningBudgetTokens: config.routing.reasoningBudgetTokens,
  });
  const builder = new TurnRequestBuilder(
    (modelId) => selector.getModel(modelId),
    { temperature: config.generation.temperature, maxTokens: config.generation.maxTokens }
  );

  const executor = new FallbackExecutor({
    breakers,
    fallbackChain: config.fallbackChain,
    regionsFor: (modelId, preferred) => selector.regionsFor(modelId, preferred),
    profileFor: (modelId) => selector.getModel(modelId),
    maxAttempts: config.resilience.maxAttempts,
    backoff,
    sleep: overrides.sleep,
    random: overrides.random,
  });

  const generation = overrides.generation ?? new HttpGenerationClient({
    baseUrl: config.generation.baseUrl,
    endpoints: config.generation.endpoints,
    timeoutMs: config.generation.timeoutMs,
  });

  const synthesizer = new ResilientSynthesizer(
    overrides.synthesizer ?? new HttpSynthesisClient({
      baseUrl: config.synthesis.baseUrl,
      timeoutMs: config.synthesis.timeoutMs,
    }),
    { breakers, backoff, sleep: overrides.sleep, random: overrides.random }
  );

  const synthesis: SynthesisOptions = {
    voice: config.synthesis.voice,
    encoding: config.synthesis.encoding,
    sampleRate: config.synthesis.sampleRate,
  };

  const dispatcher = new SynthesisDispatcher({
    synthesizer,
    synthesis,
    fallbackPhrase: config.synthesis.fallbackPhrase,
    maxConcurrency: config.synthesis.maxConcurrency,
    now: overrides.now,
  });

  const telemetry = overrides.telemetry ?? new DeepLogTelemetrySink(
    new DeepLogger(config.logging.logsPath, config.logging.telemetryFile)
  );

  const pipeline = new VoiceTurnPipeline({
    scorer,
    selector,
    builder,
    generation,
    executor,
    breakers,
    dispatcher,
    synthesizer,
    synthesis,
    apologyPhrase: config.synthesis.apologyPhrase,
    telemetry,
    defaults: {
      region: config.routing.defaultRegion,
      latencyBudgetMs: config.routing.latencyBudgetMs,
      firstTokenTimeoutMs: config.generation.firstTokenTimeoutMs,
      channelCapacity: config.streaming.channelCapacity,
    },
    now: overrides.now,
  });

  return { pipeline, scorer, selector, breakers, executor };
}
