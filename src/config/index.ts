import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const DEFAULT_MODEL = 'meta-llama/Meta-Llama-3.1-70B-Instruct-Turbo';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const envSchema = z.object({
  TOGETHER_API_KEY: z
    .string({ required_error: 'missing API key for the completion service' })
    .trim()
    .min(1, 'missing API key for the completion service'),
  TOGETHER_BASE_URL: optionalString.pipe(z.string().url().optional()),
  MODEL_NAME: optionalString,
  EDU_MEMORY_FILE: optionalString,
  EDU_HISTORY_WINDOW: optionalString.pipe(
    z.coerce.number().int().positive().default(20)
  ),
  EDU_TYPING_DELAY_MS: optionalString.pipe(
    z.coerce.number().int().min(0).default(10)
  ),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('warn'),
  LOG_FILE: optionalString,
});

export interface AppConfig {
  together: {
    apiKey: string;
    baseURL?: string;
    model: string;
    temperature: number;
  };
  memory: {
    filePath: string;
    historyWindow: number;
  };
  typingDelayMs: number;
  log: {
    level: string;
    file?: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  const parsed = result.data;

  return {
    together: {
      apiKey: parsed.TOGETHER_API_KEY,
      baseURL: parsed.TOGETHER_BASE_URL,
      model: parsed.MODEL_NAME ?? DEFAULT_MODEL,
      temperature: 0,
    },
    memory: {
      filePath: parsed.EDU_MEMORY_FILE ?? 'edu_memory.json',
      historyWindow: parsed.EDU_HISTORY_WINDOW,
    },
    typingDelayMs: parsed.EDU_TYPING_DELAY_MS,
    log: {
      level: parsed.LOG_LEVEL,
      file: parsed.LOG_FILE,
    },
  };
}

/** Reads `.env` into `process.env` (existing variables win) and validates it. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
