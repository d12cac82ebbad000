import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { LLMResponse, LLMResponseMetadata } from '../src/llm/llmMetadata';
import type { CompletionClient, CompletionRequest } from '../src/llm/openRouterService';
import type { Artifact } from '../src/jobs/types';

export function stubMetadata(overrides: Partial<LLMResponseMetadata> = {}): LLMResponseMetadata {
  return {
    model: 'stub-model',
    provider: 'unknown',
    requestTimestamp: 0,
    success: true,
    ...overrides,
  };
}

/**
 * Records every request and answers with `reply`, which may throw to
 * simulate a failing service.
 */
export class StubCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: (request: CompletionRequest, callIndex: number) => string) {}

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const content = this.reply(request, this.requests.length - 1);
    return { content, metadata: stubMetadata({ model: request.model }) };
  }
}

export const SAMPLE_ARTIFACT: Artifact = {
  markup: '<div class="hero">Hi</div>',
  style: '.hero { color: #222; }',
  behavior: "document.querySelector('.hero').addEventListener('click', () => alert('hi'));",
};

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
