/**
 * Environment configuration
 */

import { z } from 'zod';
import { DEFAULT_MAX_STEPS } from './constants';
import { ConfigurationError } from './errors';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const envSchema = z.object({
  APP_NAME: z.string().min(1).default('chat-workflow'),
  APP_ENV: z.string().min(1).default('local'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Persistence
  MONGODB_URI: optionalString,
  MONGODB_DATABASE: z.string().min(1).default('chat_workflow'),
  MONGODB_COLLECTION: z.string().min(1).default('graph_states'),

  // Graph execution
  GRAPH_MAX_STEPS: z.coerce.number().int().positive().default(DEFAULT_MAX_STEPS),
  TOOL_DISPATCH: z.enum(['sequential', 'parallel']).default('sequential'),

  // Sessions
  STRICT_SETTINGS: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .default('false'),
  DEFAULT_WORKFLOW: optionalString,
});

export type EnvConfig = z.infer<typeof envSchema>;

export type AppConfig = {
  appName: string;
  appEnv: string;
  logLevel: EnvConfig['LOG_LEVEL'];
  mongo?: {
    uri: string;
    database: string;
    collection: string;
  };
  graph: {
    maxSteps: number;
    toolDispatch: EnvConfig['TOOL_DISPATCH'];
  };
  session: {
    strictSettings: boolean;
    defaultWorkflow?: string;
  };
};

/**
 * Validate `env` and map it onto {@link AppConfig}.
 * Throws {@link ConfigurationError} listing every invalid variable.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    appName: parsed.APP_NAME,
    appEnv: parsed.APP_ENV,
    logLevel: parsed.LOG_LEVEL,
    mongo: parsed.MONGODB_URI
      ? {
          uri: parsed.MONGODB_URI,
          database: parsed.MONGODB_DATABASE,
          collection: parsed.MONGODB_COLLECTION,
        }
      : undefined,
    graph: {
      maxSteps: parsed.GRAPH_MAX_STEPS,
      toolDispatch: parsed.TOOL_DISPATCH,
    },
    session: {
      strictSettings: parsed.STRICT_SETTINGS,
      defaultWorkflow: parsed.DEFAULT_WORKFLOW,
    },
  };
}
