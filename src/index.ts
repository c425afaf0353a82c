export * from './context/types.js';
export * from './config/pipeline-config.js';
export { envOverrides, getEnvConfig, parseEnv, type EnvConfig } from './config/env.js';
export * from './routing/complexity-scorer.js';
export * from './routing/model-selector.js';
export * from './generation/types.js';
export * from './generation/request-builder.js';
export * from './generation/generation-client.js';
export * from './streaming/event-stream.js';
export * from './streaming/sentence-segmenter.js';
export * from './synthesis/types.js';
export * from './synthesis/synthesis-client.js';
export * from './synthesis/synthesis-dispatcher.js';
export * from './synthesis/audio-sinks.js';
export * from './resilience/errors.js';
export * from './resilience/circuit-breaker.js';
export * from './resilience/fallback-executor.js';
export * from './logging/deep-logger.js';
export * from './logging/telemetry.js';
export * from './pipeline/voice-turn-pipeline.js';
export * from './pipeline/call-session.js';
export * from './pipeline/factory.js';
export { APP_NAME, APP_VERSION } from './version.js';
