import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync, readFileSync } from 'fs';
import { join } from 'path';
import os from 'os';
import {
  PipelineConfigManager,
  applyOverrides,
  parsePipelineConfig,
} from '../../src/config/pipeline-config.js';
import { envOverrides, parseEnv } from '../../src/config/env.js';
import { ConfigurationError } from '../../src/resilience/errors.js';

describe('parsePipelineConfig', () => {
  it('fills every section with defaults', () => {
    const config = parsePipelineConfig({});
    expect(config.models).toHaveLength(5);
    expect(config.routing).toEqual({ defaultRegion: 'us-east-1', latencyBudgetMs: 800, reasoningBudgetTokens: 4096 });
    expect(config.resilience.failureThreshold).toBe(5);
    expect(config.resilience.recoveryTimeoutMs).toBe(30000);
    expect(config.synthesis.maxConcurrency).toBe(3);
    expect(config.scorer.contextPolicy).toBe('first-match');
  });

  it('rejects values of the wrong type with the offending path', () => {
    expect(() => parsePipelineConfig({ routing: { latencyBudgetMs: 'fast' } }))
      .toThrow(/routing\.latencyBudgetMs/);
  });

  it('rejects model ids missing from the model table', () => {
    expect(() => parsePipelineConfig({ fallbackChain: ['ghost-model'] }))
      .toThrow('Unknown model id(s) in configuration: ghost-model');
  });

  it('rejects an empty model table', () => {
    expect(() => parsePipelineConfig({ models: [] })).toThrow(ConfigurationError);
  });

  it('accepts a custom model table', () => {
    const config = parsePipelineConfig({
      models: [{ id: 'local', tier: 'balanced', intelligenceRank: 1, speedRank: 1, costRank: 1, maxOutputTokens: 512 }],
      availability: { local: ['us-east-1'] },
      fallbackChain: ['local'],
    });
    expect(config.models[0]).toMatchObject({ id: 'local', supportsTools: false });
  });
});

describe('applyOverrides', () => {
  it('merges override sections over the base sections', () => {
    const merged = applyOverrides(
      { routing: { defaultRegion: 'eu-west-1', latencyBudgetMs: 500 } },
      { routing: { latencyBudgetMs: 300 }, logging: { logsPath: '/tmp/logs' } }
    );
    expect(merged).toEqual({
      routing: { defaultRegion: 'eu-west-1', latencyBudgetMs: 300 },
      logging: { logsPath: '/tmp/logs' },
    });
  });
});

describe('PipelineConfigManager', () => {
  let tempDir: string;

  afterEach(() => {
    vi.restoreAllMocks();
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  function makeTempDir(): string {
    tempDir = join(os.tmpdir(), `voice-turn-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    return tempDir;
  }

  it('uses defaults when the file does not exist', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const manager = new PipelineConfigManager(join(makeTempDir(), 'missing.json'));
    const config = await manager.load();
    expect(config.routing.latencyBudgetMs).toBe(800);
  });

  it('applies overrides on top of the file', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const file = join(makeTempDir(), 'pipeline.json');
    writeFileSync(file, JSON.stringify({ routing: { latencyBudgetMs: 500, defaultRegion: 'eu-west-1' } }));

    const manager = new PipelineConfigManager(file, { routing: { latencyBudgetMs: 250 } });
    const config = await manager.load();

    expect(config.routing.latencyBudgetMs).toBe(250);
    expect(config.routing.defaultRegion).toBe('eu-west-1');
  });

  it('rejects a file that is not JSON', async () => {
    const file = join(makeTempDir(), 'pipeline.json');
    writeFileSync(file, '{ routing: ');

    await expect(new PipelineConfigManager(file).load()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('saves the effective configuration', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const file = join(makeTempDir(), 'pipeline.json');
    const manager = new PipelineConfigManager(file, { synthesis: { voice: 'test-voice' } });
    await manager.save();

    const saved: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    expect(parsePipelineConfig(saved).synthesis.voice).toBe('test-voice');
  });
});

describe('environment overrides', () => {
  it('drops invalid variables and keeps the rest', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const env = parseEnv({ GENERATION_URL: 'http://gen.test', LATENCY_BUDGET_MS: 'soon' });
    expect(env).toEqual({ GENERATION_URL: 'http://gen.test' });
  });

  it('maps variables onto configuration sections', () => {
    const overrides = envOverrides({
      GENERATION_URL: 'http://gen.test',
      DEFAULT_REGION: 'eu-west-1',
      LATENCY_BUDGET_MS: 300,
      LOG_PATH: '/var/log/voice',
    });
    expect(overrides).toEqual({
      generation: { baseUrl: 'http://gen.test' },
      routing: { defaultRegion: 'eu-west-1', latencyBudgetMs: 300 },
      logging: { logsPath: '/var/log/voice' },
    });
  });
});
