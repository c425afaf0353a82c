#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { envOverrides, getEnvConfig } from '../config/env.js';
import { PipelineConfigManager, type PipelineConfig } from '../config/pipeline-config.js';
import { createContext, type ConversationContext } from '../context/types.js';
import { DeepLogger } from '../logging/deep-logger.js';
import { createPipeline } from '../pipeline/factory.js';
import { ComplexityScorer } from '../routing/complexity-scorer.js';
import { ModelSelector } from '../routing/model-selector.js';
import { SentenceSegmenter } from '../streaming/sentence-segmenter.js';
import { MemoryAudioSink } from '../synthesis/audio-sinks.js';
import { APP_NAME, APP_VERSION } from '../version.js';

const program = new Command();

program
  .name('voice-turn')
  .description(`${APP_NAME} - latency-aware model routing and streaming speech for voice calls`)
  .version(APP_VERSION)
  .option('-c, --config <path>', 'Pipeline configuration file (JSON)');

async function loadConfig(): Promise<{ manager: PipelineConfigManager; config: PipelineConfig }> {
  const env = getEnvConfig();
  const configPath: string | undefined = program.opts().config ?? env.VOICE_PIPELINE_CONFIG;
  const manager = new PipelineConfigManager(configPath, envOverrides(env));
  const config = await manager.load();
  return { manager, config };
}

function sampleContext(priorTurns: number, tools: boolean, multiTurn: boolean, region?: string): ConversationContext {
  const context = createContext('cli-call', 'cli-tenant', 'cli-agent', region);
  for (let i = 0; i < priorTurns; i++) {
    context.turns.push({
      role: i % 2 === 0 ? 'user' : 'assistant',
      content: i % 2 === 0 ? 'Earlier question.' : 'Earlier answer.',
      timestamp: new Date(),
    });
  }
  context.anticipatesTools = tools;
  context.multiTurn = multiTurn;
  return context;
}

function fail(error: unknown): never {
  console.error(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}

program
  .command('score')
  .description('Score how complex an utterance is (0 to 1)')
  .argument('<utterance>', 'What the caller said')
  .option('-t, --turns <number>', 'Number of prior turns in the conversation', '0')
  .option('--tools', 'The agent expects to call tools', false)
  .option('--multi-turn', 'The call is flagged multi-turn', false)
  .action(async (utterance: string, options: { turns: string; tools: boolean; multiTurn: boolean }) => {
    try {
      const { config } = await loadConfig();
      const scorer = new ComplexityScorer(config.scorer);
      const context = sampleContext(parseInt(options.turns, 10) || 0, options.tools, options.multiTurn);
      const breakdown = scorer.explain(utterance, context);

      console.log('\n' + chalk.bold('🧮 Complexity'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`Words:            ${chalk.yellow(breakdown.wordCount)} (factor ${breakdown.wordFactor.toFixed(3)})`);
      console.log(`Patterns:         ${breakdown.matchedPatterns.length > 0 ? chalk.cyan(breakdown.matchedPatterns.join(', ')) : chalk.gray('none')}`);
      console.log(`Context factor:   ${breakdown.contextFactor.toFixed(2)} (${config.scorer.contextPolicy})`);
      console.log(`Score:            ${chalk.green(breakdown.score.toFixed(3))}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('route')
  .description('Show which model and region would serve an utterance')
  .argument('<utterance>', 'What the caller said')
  .option('-b, --budget <ms>', 'Latency budget in milliseconds')
  .option('-r, --region <region>', 'Preferred region')
  .option('--cost-sensitive', 'Prefer the cheapest eligible model', false)
  .option('--tools', 'The turn needs tool calling', false)
  .action(async (utterance: string, options: { budget?: string; region?: string; costSensitive: boolean; tools: boolean }) => {
    try {
      const { config } = await loadConfig();
      const scorer = new ComplexityScorer(config.scorer);
      const selector = new ModelSelector({
        models: config.models,
        availability: config.availability,
        fallbackRegions: config.fallbackRegions,
        reasoningBudgetTokens: config.routing.reasoningBudgetTokens,
      });

      const context = sampleContext(0, options.tools, false, options.region);
      const score = scorer.score(utterance, context);
      const decision = selector.select({
        score,
        latencyBudgetMs: options.budget ? parseInt(options.budget, 10) : config.routing.latencyBudgetMs,
        costSensitive: options.costSensitive,
        needsTools: options.tools,
        preferredRegion: options.region ?? config.routing.defaultRegion,
      });

      console.log('\n' + chalk.bold('🧭 Routing Decision'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`Score:            ${chalk.yellow(score.toFixed(3))}`);
      console.log(`Rule:             ${chalk.cyan(decision.rule)}`);
      console.log(`Model:            ${chalk.green(decision.modelId)}`);
      console.log(`Region:           ${decision.region}${decision.regionFallback ? chalk.yellow(' (fallback)') : ''}`);
      console.log(`Reasoning budget: ${decision.reasoningBudget}`);
      if (decision.degraded) {
        console.log(chalk.yellow('⚠️  Model is not served in any configured region; routing degraded'));
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('segment')
  .description('Split text into speech segments the way a live stream would be split')
  .argument('<text>', 'Response text')
  .option('-s, --chunk-size <chars>', 'Characters per simulated stream delta', '7')
  .action((text: string, options: { chunkSize: string }) => {
    const size = Math.max(1, parseInt(options.chunkSize, 10) || 7);
    const segmenter = new SentenceSegmenter();

    const events = [];
    for (let i = 0; i < text.length; i += size) {
      events.push(...segmenter.push(text.slice(i, i + size)));
    }
    events.push(...segmenter.end());

    console.log('\n' + chalk.bold('✂️  Segments'));
    console.log(chalk.gray('─'.repeat(50)));
    for (const event of events) {
      if (event.type === 'error') {
        console.log(chalk.red(`error: ${event.error.message}`));
      } else {
        console.log(`${chalk.gray(`#${event.sequence}`)} ${chalk.cyan(event.type.padEnd(8))} ${JSON.stringify(event.text)}`);
      }
    }
  });

program
  .command('turn')
  .description('Run one full turn against the configured generation and synthesis services')
  .argument('<utterance>', 'What the caller said')
  .option('-b, --budget <ms>', 'Latency budget in milliseconds')
  .option('-r, --region <region>', 'Preferred region')
  .option('-p, --prompt <text>', 'Agent system prompt')
  .action(async (utterance: string, options: { budget?: string; region?: string; prompt?: string }) => {
    const spinner = ora('Loading configuration...').start();
    try {
      const { config } = await loadConfig();
      const { pipeline } = createPipeline(config);
      const sink = new MemoryAudioSink();

      spinner.text = 'Running turn...';
      const result = await pipeline.runTurn(
        utterance,
        createContext('cli-call', 'cli-tenant', 'cli-agent', options.region),
        sink,
        {
          latencyBudgetMs: options.budget ? parseInt(options.budget, 10) : undefined,
          build: { systemPrompt: options.prompt },
        }
      );

      if (result.status === 'completed') {
        spinner.succeed(`Turn completed in ${result.elapsedMs}ms`);
      } else {
        spinner.warn(`Turn ended with status ${result.status}`);
      }

      console.log(`Model:        ${chalk.green(result.modelId ?? result.routing.modelId)} @ ${result.region ?? result.routing.region}`);
      console.log(`Attempts:     ${result.attempts}${result.degraded ? chalk.yellow(' (degraded)') : ''}`);
      console.log(`First token:  ${result.firstTokenMs ?? '-'}ms`);
      console.log(`Audio chunks: ${sink.chunks.length} (${sink.chunks.reduce((sum, chunk) => sum + chunk.audio.length, 0)} bytes)`);
      console.log(`Spoken:       ${chalk.cyan(result.spokenText || '(nothing)')}`);
      if (result.error) {
        console.log(chalk.red(`Error:        ${result.error.kind}: ${result.error.message}`));
      }
    } catch (error) {
      spinner.fail('Turn failed');
      fail(error);
    }
  });

program
  .command('telemetry')
  .description('Show recent turn telemetry')
  .option('-n, --limit <number>', 'Number of entries', '20')
  .action(async (options: { limit: string }) => {
    try {
      const { config } = await loadConfig();
      const logger = new DeepLogger(config.logging.logsPath, config.logging.telemetryFile);
      const entries = logger.readRecent(parseInt(options.limit, 10) || 20);

      if (entries.length === 0) {
        console.log(chalk.gray(`No telemetry in ${logger.logFile}`));
        return;
      }
      for (const entry of entries) {
        const data = entry.data;
        console.log(
          `${chalk.gray(entry.timestamp)} ${chalk.cyan(String(data.status))} ` +
          `${String(data.modelId)} ${String(data.elapsedMs)}ms`
        );
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('config')
  .description('Show or write the effective configuration')
  .option('--init', 'Write the effective configuration to the --config path')
  .action(async (options: { init?: boolean }) => {
    try {
      const { manager, config } = await loadConfig();
      if (options.init) {
        await manager.save();
        console.log(chalk.green('✅ Configuration written'));
        return;
      }
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
