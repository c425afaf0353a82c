import { z } from 'zod';

// Environment variable schema
const envSchema = z.object({
  VOICE_PIPELINE_CONFIG: z.string().optional(),

  GENERATION_URL: z.string().url().optional(),
  SYNTHESIS_URL: z.string().url().optional(),

  DEFAULT_REGION: z.string().optional(),
  LATENCY_BUDGET_MS: z.coerce.number().int().positive().optional(),

  LOG_PATH: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  console.warn('⚠️  Environment variable validation errors:');
  result.error.errors.forEach((err) => {
    console.warn(`   ${err.path.join('.')}: ${err.message}`);
  });
  console.warn('   Ignoring invalid environment variables.');

  // Keep whatever did validate
  const invalid = new Set(result.error.errors.map(err => String(err.path[0])));
  const valid = Object.fromEntries(
    Object.entries(env).filter(([key]) => !invalid.has(key))
  );
  return envSchema.parse(valid);
}

let envConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!envConfig) {
    envConfig = parseEnv();
  }
  return envConfig;
}

/**
 * Environment overrides in the shape of a partial pipeline configuration,
 * to be merged over the file configuration before validation.
 */
export function envOverrides(env: EnvConfig = getEnvConfig()): Record<string, Record<string, unknown>> {
  const overrides: Record<string, Record<string, unknown>> = {};

  if (env.GENERATION_URL) {
    overrides.generation = { baseUrl: env.GENERATION_URL };
  }
  if (env.SYNTHESIS_URL) {
    overrides.synthesis = { baseUrl: env.SYNTHESIS_URL };
  }
  if (env.DEFAULT_REGION || env.LATENCY_BUDGET_MS) {
    overrides.routing = {
      ...(env.DEFAULT_REGION ? { defaultRegion: env.DEFAULT_REGION } : {}),
      ...(env.LATENCY_BUDGET_MS ? { latencyBudgetMs: env.LATENCY_BUDGET_MS } : {}),
    };
  }
  if (env.LOG_PATH) {
    overrides.logging = { logsPath: env.LOG_PATH };
  }

  return overrides;
}
