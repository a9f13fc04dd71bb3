/**
 * Process-level configuration, read from environment variables.
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const EnvSchema = z.object({
  STEPWISE_HOME: optionalString,
  STEPWISE_TASK_LIST_ID: optionalString,
  STEPWISE_TEAM_NAME: optionalString,
  STEPWISE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  STEPWISE_MODEL: z.string().trim().min(1).default('claude-sonnet-4-5'),
  STEPWISE_PROVIDER: z.enum(['anthropic', 'openai', 'google']).optional(),
  STEPWISE_BASE_URL: optionalString,
  STEPWISE_MAX_TURNS: z.coerce.number().int().positive().default(20),
  STEPWISE_ACTOR: z.string().trim().min(1).default('agent'),
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
});

export type ProviderName = 'anthropic' | 'openai' | 'google';

export interface StepwiseConfig {
  /** Root directory for persistent state (default: ~/.stepwise) */
  home: string;
  /** Explicit task list override */
  taskListId?: string;
  /** Team/group name; used as the task list id when no override is set */
  teamName?: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  model: string;
  provider?: ProviderName;
  baseURL?: string;
  maxTurns: number;
  /** Identity recorded as owner when a task is started without one */
  actor: string;
  apiKeys: Partial<Record<ProviderName, string>>;
}

/**
 * Read and validate configuration from an environment map.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StepwiseConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    home: values.STEPWISE_HOME ?? join(homedir(), '.stepwise'),
    taskListId: values.STEPWISE_TASK_LIST_ID,
    teamName: values.STEPWISE_TEAM_NAME,
    logLevel: values.STEPWISE_LOG_LEVEL,
    model: values.STEPWISE_MODEL,
    provider: values.STEPWISE_PROVIDER,
    baseURL: values.STEPWISE_BASE_URL,
    maxTurns: values.STEPWISE_MAX_TURNS,
    actor: values.STEPWISE_ACTOR,
    apiKeys: {
      anthropic: values.ANTHROPIC_API_KEY,
      openai: values.OPENAI_API_KEY,
      google: values.GEMINI_API_KEY,
    },
  };
}
