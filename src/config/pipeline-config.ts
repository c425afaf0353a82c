import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../resilience/errors.js';
import { DEFAULT_COMPLEXITY_PATTERNS } from '../routing/complexity-scorer.js';

export const ModelProfileSchema = z.object({
  id: z.string().min(1),
  tier: z.enum(['frontier', 'advanced', 'balanced', 'fast']),
  intelligenceRank: z.number().int().nonnegative(),
  speedRank: z.number().int().nonnegative(),
  costRank: z.number().int().nonnegative(),
  maxOutputTokens: z.number().int().positive(),
  maxReasoningTokens: z.number().int().positive().optional(),
  supportsTools: z.boolean().default(false),
  supportsExtendedReasoning: z.boolean().default(false),
  supportsVision: z.boolean().default(false),
  costPerInputToken: z.number().nonnegative().optional(),
  costPerOutputToken: z.number().nonnegative().optional(),
});

const DEFAULT_MODELS: z.input<typeof ModelProfileSchema>[] = [
  {
    id: 'anthropic.claude-opus-4-20250514-v1:0',
    tier: 'frontier',
    intelligenceRank: 5,
    speedRank: 1,
    costRank: 5,
    maxOutputTokens: 32000,
    maxReasoningTokens: 16000,
    supportsTools: true,
    supportsExtendedReasoning: true,
    supportsVision: true,
    costPerInputToken: 0.000015,
    costPerOutputToken: 0.000075,
  },
  {
    id: 'anthropic.claude-sonnet-4-20250514-v1:0',
    tier: 'advanced',
    intelligenceRank: 4,
    speedRank: 2,
    costRank: 4,
    maxOutputTokens: 64000,
    maxReasoningTokens: 16000,
    supportsTools: true,
    supportsExtendedReasoning: true,
    supportsVision: true,
    costPerInputToken: 0.000003,
    costPerOutputToken: 0.000015,
  },
  {
    id: 'anthropic.claude-3-5-sonnet-20241022-v2:0',
    tier: 'balanced',
    intelligenceRank: 3,
    speedRank: 3,
    costRank: 3,
    maxOutputTokens: 8192,
    supportsTools: true,
    supportsExtendedReasoning: false,
    supportsVision: true,
    costPerInputToken: 0.000003,
    costPerOutputToken: 0.000015,
  },
  {
    id: 'anthropic.claude-3-5-haiku-20241022-v1:0',
    tier: 'fast',
    intelligenceRank: 2,
    speedRank: 4,
    costRank: 2,
    maxOutputTokens: 8192,
    supportsTools: true,
    supportsExtendedReasoning: false,
    supportsVision: false,
    costPerInputToken: 0.0000008,
    costPerOutputToken: 0.000004,
  },
  {
    id: 'anthropic.claude-3-haiku-20240307-v1:0',
    tier: 'fast',
    intelligenceRank: 1,
    speedRank: 5,
    costRank: 1,
    maxOutputTokens: 4096,
    supportsTools: true,
    supportsExtendedReasoning: false,
    supportsVision: true,
    costPerInputToken: 0.00000025,
    costPerOutputToken: 0.00000125,
  },
];

const DEFAULT_AVAILABILITY: Record<string, string[]> = {
  'anthropic.claude-opus-4-20250514-v1:0': ['us-east-1', 'us-west-2'],
  'anthropic.claude-sonnet-4-20250514-v1:0': ['us-east-1', 'us-west-2', 'eu-west-1'],
  'anthropic.claude-3-5-sonnet-20241022-v2:0': ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-northeast-1'],
  'anthropic.claude-3-5-haiku-20241022-v1:0': ['us-east-1', 'us-west-2'],
  'anthropic.claude-3-haiku-20240307-v1:0': ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-northeast-1'],
};

export const PipelineConfigSchema = z.object({
  models: z.array(ModelProfileSchema).default(DEFAULT_MODELS),
  availability: z.record(z.array(z.string())).default(DEFAULT_AVAILABILITY),
  fallbackRegions: z.array(z.string()).default(['us-east-1', 'us-west-2', 'eu-west-1']),
  fallbackChain: z.array(z.string()).default([
    'anthropic.claude-sonnet-4-20250514-v1:0',
    'anthropic.claude-3-5-sonnet-20241022-v2:0',
    'anthropic.claude-3-5-haiku-20241022-v1:0',
    'anthropic.claude-3-haiku-20240307-v1:0',
  ]),

  scorer: z.object({
    patterns: z.array(z.string().min(1)).default(DEFAULT_COMPLEXITY_PATTERNS),
    contextPolicy: z.enum(['first-match', 'additive']).default('first-match'),
  }).default({}),

  routing: z.object({
    defaultRegion: z.string().default('us-east-1'),
    latencyBudgetMs: z.number().int().positive().default(800),
    reasoningBudgetTokens: z.number().int().positive().default(4096),
  }).default({}),

  generation: z.object({
    baseUrl: z.string().url().default('http://localhost:8080'),
    /** Region to endpoint; regions without an entry use `baseUrl`. */
    endpoints: z.record(z.string().url()).default({}),
    timeoutMs: z.number().int().positive().default(15000),
    firstTokenTimeoutMs: z.number().int().positive().default(3000),
    temperature: z.number().min(0).max(1).default(0.3),
    maxTokens: z.number().int().positive().default(300),
  }).default({}),

  synthesis: z.object({
    baseUrl: z.string().url().default('http://localhost:8081'),
    voice: z.string().default('aura-asteria-en'),
    encoding: z.enum(['linear16', 'mulaw', 'mp3']).default('mulaw'),
    sampleRate: z.number().int().positive().default(8000),
    timeoutMs: z.number().int().positive().default(5000),
    maxConcurrency: z.number().int().positive().default(3),
    fallbackPhrase: z.string().default('Is there anything else I can help you with?'),
    apologyPhrase: z.string().default("Sorry, I'm having trouble right now. Could you say that again?"),
  }).default({}),

  resilience: z.object({
    failureThreshold: z.number().int().positive().default(5),
    recoveryTimeoutMs: z.number().int().positive().default(30000),
    maxAttempts: z.number().int().positive().default(4),
    baseDelayMs: z.number().int().nonnegative().default(200),
    maxDelayMs: z.number().int().nonnegative().default(2000),
    jitterMs: z.number().int().nonnegative().default(100),
  }).default({}),

  streaming: z.object({
    channelCapacity: z.number().int().positive().default(8),
  }).default({}),

  logging: z.object({
    logsPath: z.string().default('logs'),
    telemetryFile: z.string().default('telemetry.jsonl'),
  }).default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Cross-field checks the schema cannot express: every model id named
 * outside the table must exist in it.
 */
export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
  if (config.models.length === 0) {
    throw new ConfigurationError('Configuration must declare at least one model');
  }

  const known = new Set(config.models.map(model => model.id));
  const unknown = [
    ...Object.keys(config.availability),
    ...config.fallbackChain,
  ].filter(id => !known.has(id));

  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown model id(s) in configuration: ${[...new Set(unknown)].join(', ')}`);
  }

  return config;
}

export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.errors
      .map(err => `${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid pipeline configuration - ${details}`);
  }
  return validatePipelineConfig(result.data);
}

export type ConfigOverrides = Record<string, Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Shallow-merge override sections into each section of `base`. */
export function applyOverrides(base: unknown, overrides: ConfigOverrides): Record<string, unknown> {
  const merged: Record<string, unknown> = isRecord(base) ? { ...base } : {};
  for (const [section, values] of Object.entries(overrides)) {
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), ...values };
  }
  return merged;
}

export class PipelineConfigManager {
  private config: PipelineConfig;

  constructor(private configPath?: string, private overrides: ConfigOverrides = {}) {
    this.config = parsePipelineConfig(applyOverrides({}, overrides));
  }

  async load(): Promise<PipelineConfig> {
    if (!this.configPath) {
      console.log('[Config] No configuration file given, using defaults');
      return this.config;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.log(`[Config] No configuration file found at ${this.configPath}, using defaults`);
        return this.config;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Configuration at ${this.configPath} is not valid JSON`, undefined, { cause: error });
    }

    this.config = parsePipelineConfig(applyOverrides(parsed, this.overrides));
    console.log(`[Config] Loaded configuration from ${this.configPath}`);
    return this.config;
  }

  getConfig(): PipelineConfig {
    return this.config;
  }

  async save(): Promise<void> {
    if (!this.configPath) {
      throw new ConfigurationError('No configuration path to save to');
    }
    await fs.writeFile(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
    console.log(`[Config] Saved configuration to ${this.configPath}`);
  }
}
