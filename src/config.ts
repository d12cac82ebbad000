import * as path from 'path';
import { env } from './config/env';
import type { SyntaxCheckMode } from './jobs/types';

export interface Config {
  openRouter: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  designer: {
    model: string;
    temperature: number;
    maxTokens: number;
  };
  validator: {
    textModel: string;
    visionModel: string;
    temperature: number;
    maxTokens: number;
    syntaxMode: SyntaxCheckMode;
  };
  render: {
    enabled: boolean;
    executablePath: string;
    timeoutMs: number;
    viewport: {
      width: number;
      height: number;
    };
    screenshot: {
      maxWidth: number;
      maxBytes: number;
    };
  };
  preview: {
    outputDir: string;
    host: string;
    port: number;
    portScan: number;
  };
  workflow: {
    maxIterations: number;
  };
}

export const config: Config = {
  openRouter: {
    apiKey: env.OPENROUTER_API_KEY,
    baseUrl: env.OPENROUTER_BASE_URL,
    timeoutMs: env.LLM_TIMEOUT_MS,
    maxRetries: env.LLM_MAX_RETRIES,
    retryDelayMs: env.LLM_RETRY_DELAY_MS,
  },
  designer: {
    model: env.DESIGNER_MODEL,
    temperature: env.DESIGNER_TEMPERATURE,
    maxTokens: env.MAX_OUTPUT_TOKENS,
  },
  validator: {
    textModel: env.VALIDATOR_MODEL,
    visionModel: env.VISION_VALIDATOR_MODEL,
    temperature: env.VALIDATOR_TEMPERATURE,
    maxTokens: Math.min(env.VALIDATOR_MAX_TOKENS, env.MAX_OUTPUT_TOKENS),
    syntaxMode: env.SYNTAX_CHECK_MODE,
  },
  render: {
    enabled: env.RENDER_ENABLED,
    executablePath: env.CHROME_EXECUTABLE_PATH,
    timeoutMs: env.RENDER_TIMEOUT_MS,
    viewport: {
      width: env.RENDER_VIEWPORT_WIDTH,
      height: env.RENDER_VIEWPORT_HEIGHT,
    },
    screenshot: {
      maxWidth: env.SCREENSHOT_MAX_WIDTH,
      maxBytes: env.SCREENSHOT_MAX_BYTES,
    },
  },
  preview: {
    outputDir: path.resolve(env.PREVIEW_OUTPUT_DIR),
    host: env.PREVIEW_HOST,
    port: env.PREVIEW_PORT,
    portScan: env.PREVIEW_PORT_SCAN,
  },
  workflow: {
    maxIterations: env.ITERATION_LIMIT,
  },
};
