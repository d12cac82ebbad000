import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config';
import { CompletionError, describeError } from '../errors';
import { createLogger } from '../logger';
import { sleep } from '../utils/withTimeout';
import { LLMResponse, LLMResponseMetadata, calculateCost } from './llmMetadata';

const log = createLogger('openrouter');

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image_url';
  image_url: {
    url: string;
  };
}

export type ContentPart = TextPart | ImagePart;

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string | ContentPart[];
}

export interface ImageAttachment {
  data: Buffer;
  mimeType: 'image/png' | 'image/jpeg';
}

export interface CompletionRequest {
  model: string;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  /** Attached to the last user message as an image part. */
  image?: ImageAttachment;
  timeoutMs?: number;
}

/**
 * The one seam between the workflow and any chat-completion provider.
 * Implementations throw CompletionError on every failure.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<LLMResponse>;
}

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  adapter?: AxiosAdapter;
}

const chatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const apiErrorSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

function defaultOptions(): OpenRouterOptions {
  return {
    apiKey: config.openRouter.apiKey,
    baseUrl: config.openRouter.baseUrl,
    timeoutMs: config.openRouter.timeoutMs,
    maxRetries: config.openRouter.maxRetries,
    retryDelayMs: config.openRouter.retryDelayMs,
  };
}

export function toDataUrl(image: ImageAttachment): string {
  return `data:${image.mimeType};base64,${image.data.toString('base64')}`;
}

/**
 * Returns a copy of `messages` with the image appended to the last user
 * message, converting plain string content into content parts.
 */
export function attachImage(messages: Message[], image: ImageAttachment): Message[] {
  const imagePart: ImagePart = { type: 'image_url', image_url: { url: toDataUrl(image) } };
  let lastUser = -1;
  messages.forEach((message, index) => {
    if (message.role === 'user') lastUser = index;
  });

  if (lastUser === -1) {
    return [...messages, { role: 'user', content: [imagePart] }];
  }

  return messages.map((message, index) => {
    if (index !== lastUser) return message;
    const parts: ContentPart[] =
      typeof message.content === 'string'
        ? [{ type: 'text', text: message.content }]
        : [...message.content];
    return { role: message.role, content: [...parts, imagePart] };
  });
}

export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const body = apiErrorSchema.safeParse(error.response?.data);
    const detail = body.success ? body.data.error.message : error.message;

    if (status === 429) {
      return new CompletionError(`Rate limit reached: ${detail}`, 'rate_limit', status);
    }
    if (status === 401) {
      return new CompletionError(`Authentication failed: ${detail}`, 'auth', status);
    }
    if (status === 402 || status === 403) {
      return new CompletionError(`Insufficient credits or access denied: ${detail}`, 'quota', status);
    }
    if (status !== undefined && status >= 500) {
      return new CompletionError(`Service unavailable (${status}): ${detail}`, 'unavailable', status);
    }
    if (status !== undefined) {
      return new CompletionError(`Invalid request (${status}): ${detail}`, 'bad_request', status);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED') {
      return new CompletionError(`Request timed out: ${detail}`, 'timeout');
    }
    return new CompletionError(`Network error: ${detail}`, 'network');
  }

  return new CompletionError(describeError(error), 'network');
}

export class OpenRouterService implements CompletionClient {
  private readonly client: AxiosInstance;
  private readonly options: OpenRouterOptions;

  constructor(options: Partial<OpenRouterOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
    this.client = axios.create({
      baseURL: this.options.baseUrl,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
      },
      ...(this.options.adapter && { adapter: this.options.adapter }),
    });
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    if (!this.options.apiKey) {
      throw new CompletionError('OPENROUTER_API_KEY is not configured', 'auth');
    }

    const requestTimestamp = Date.now();
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;
    const messages = request.image ? attachImage(request.messages, request.image) : request.messages;
    const maxRetries = this.options.maxRetries;

    log.debug(
      `Request → ${request.model} (${messages.length} messages${request.image ? ', with image' : ''})`
    );

    let lastError: CompletionError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        log.info(`⏳ Retry attempt ${attempt}/${maxRetries} after rate limit...`);
        await sleep(this.options.retryDelayMs);
      }

      try {
        const response = await this.client.post(
          '/chat/completions',
          {
            model: request.model,
            messages,
            ...(request.temperature !== undefined && { temperature: request.temperature }),
            ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
          },
          {
            timeout: timeoutMs,
            signal: AbortSignal.timeout(timeoutMs),
          }
        );

        return this.toResponse(response.data, request.model, requestTimestamp);
      } catch (error) {
        lastError = toCompletionError(error);

        if (lastError.kind === 'rate_limit' && attempt < maxRetries) {
          log.warn(`⚠️ Rate limited (attempt ${attempt + 1}/${maxRetries + 1})`);
          continue;
        }
        break;
      }
    }

    const failure = lastError ?? new CompletionError('Completion failed without an error', 'network');
    log.error(`❌ ${request.model} failed after ${Date.now() - requestTimestamp}ms: ${failure.message}`);
    throw failure;
  }

  private toResponse(data: unknown, requestedModel: string, requestTimestamp: number): LLMResponse {
    const responseTimestamp = Date.now();
    const parsed = chatCompletionResponseSchema.safeParse(data);

    if (!parsed.success) {
      const apiError = apiErrorSchema.safeParse(data);
      if (apiError.success) {
        throw new CompletionError(`API error: ${apiError.data.error.message}`, 'invalid_response');
      }
      throw new CompletionError('Invalid response structure: no choices array', 'invalid_response');
    }

    const content = parsed.data.choices[0].message.content;
    if (!content) {
      throw new CompletionError('No content in response', 'invalid_response');
    }

    const usage = parsed.data.usage;
    const metadata: LLMResponseMetadata = {
      model: parsed.data.model || requestedModel,
      provider: 'openrouter',
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
      latencyMs: responseTimestamp - requestTimestamp,
      requestTimestamp,
      responseTimestamp,
      success: true,
    };

    if (metadata.usage && metadata.usage.totalTokens) {
      metadata.estimatedCost = calculateCost(metadata.usage, metadata.model);
      metadata.costCurrency = 'USD';
    }

    log.info(`✅ ${metadata.model} responded in ${metadata.latencyMs}ms (${content.length} chars)`);
    return { content, metadata };
  }
}
