import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Anthropic
  anthropicApiKey: z.string().min(1).optional(),
  llmClassifierModel: z.string().default('claude-3-5-haiku-latest'),
  llmResponseModel: z.string().default('claude-sonnet-4-5'),
  classifierTimeoutMs: z.coerce.number().int().positive().default(8000),
  responseTimeoutMs: z.coerce.number().int().positive().default(15000),

  // Sessions
  sessionIdleMinutes: z.coerce.number().int().positive().default(240),
  sessionSweepCron: z.string().default('*/15 * * * *'),

  // App
  timezone: z.string().default('UTC'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
  databasePath: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmClassifierModel: env('LLM_CLASSIFIER_MODEL'),
    llmResponseModel: env('LLM_RESPONSE_MODEL'),
    classifierTimeoutMs: env('CLASSIFIER_TIMEOUT_MS'),
    responseTimeoutMs: env('RESPONSE_TIMEOUT_MS'),
    sessionIdleMinutes: env('SESSION_IDLE_MINUTES'),
    sessionSweepCron: env('SESSION_SWEEP_CRON'),
    timezone: env('TIMEZONE'),
    host: env('HOST'),
    port: env('PORT'),
    databasePath: env('DATABASE_PATH'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
