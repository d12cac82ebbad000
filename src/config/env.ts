import dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

dotenv.config();

// z.coerce.boolean() treats "false" as true, so flags are parsed from their text
const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') return fallback;
      return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
    });

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().default(''),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),

  DESIGNER_MODEL: z.string().min(1).default('qwen/qwen-2.5-coder-32b-instruct'),
  VALIDATOR_MODEL: z.string().min(1).default('openai/gpt-4o-mini'),
  VISION_VALIDATOR_MODEL: z.string().min(1).default('qwen/qwen2.5-vl-72b-instruct'),
  DESIGNER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  VALIDATOR_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4000),
  VALIDATOR_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(3000),

  ITERATION_LIMIT: z.coerce.number().int().positive().default(5),
  SYNTAX_CHECK_MODE: z.enum(['loose', 'strict']).default('loose'),

  RENDER_ENABLED: booleanFlag(true),
  CHROME_EXECUTABLE_PATH: z.string().default(''),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  RENDER_VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1280),
  RENDER_VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(1024),
  SCREENSHOT_MAX_WIDTH: z.coerce.number().int().positive().default(1280),
  SCREENSHOT_MAX_BYTES: z.coerce.number().int().positive().default(4 * 1024 * 1024),

  PREVIEW_OUTPUT_DIR: z.string().min(1).default(path.join(process.cwd(), 'outputs')),
  PREVIEW_HOST: z.string().min(1).default('127.0.0.1'),
  PREVIEW_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  PREVIEW_PORT_SCAN: z.coerce.number().int().positive().default(10),

  RUN_LOG_DIR: z.string().default(path.join(os.tmpdir(), 'prototype-studio', 'logs')),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const formatted = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
  throw new Error(`Invalid environment configuration:\n${formatted}`);
}

export const env = parsed.data;
export type Env = typeof env;
