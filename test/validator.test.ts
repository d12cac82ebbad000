import { describe, it } from 'node:test';
import assert from 'assert';
import sharp from 'sharp';
import { ValidatorStage, parseVerdict } from '../src/jobs/validator';
import { CompletionError } from '../src/errors';
import { judgeFailureFeedback } from '../src/llm/presets/validator';
import type { Renderer } from '../src/render/browserRenderer';
import { SAMPLE_ARTIFACT, StubCompletionClient } from './helpers';

const settings = {
  textModel: 'test-text',
  visionModel: 'test-vision',
  temperature: 0.3,
  maxTokens: 2000,
  syntaxMode: 'loose' as const,
  screenshot: { maxWidth: 800, maxBytes: 4 * 1024 * 1024 },
};

class StubRenderer implements Renderer {
  readonly captured: string[] = [];

  constructor(private readonly available: boolean, private readonly capturePng: () => Promise<Buffer>) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async capture(documentHtml: string): Promise<Buffer> {
    this.captured.push(documentHtml);
    return this.capturePng();
  }
}

function whitePng(): Promise<Buffer> {
  return sharp({ create: { width: 40, height: 30, channels: 3, background: { r: 255, g: 255, b: 255 } } })
    .png()
    .toBuffer();
}

const approve = () => 'VERDICT: APPROVED\nAnalysis: good';

describe('parseVerdict', () => {
  it('follows an explicit verdict line', () => {
    assert.strictEqual(parseVerdict('VERDICT: APPROVED\nAnalysis: fine'), 'approved');
    assert.strictEqual(parseVerdict('VERDICT: REJECTED\nThis would be approved with a footer.'), 'rejected');
    assert.strictEqual(parseVerdict('**Verdict:** approved'), 'approved');
  });

  it('accepts a single bare keyword', () => {
    assert.strictEqual(parseVerdict('Validation result: APPROVED'), 'approved');
    assert.strictEqual(parseVerdict('Validation result: REJECTED'), 'rejected');
  });

  it('treats ambiguous or missing keywords as rejected', () => {
    assert.strictEqual(parseVerdict('Parts are approved, others rejected.'), 'rejected');
    assert.strictEqual(parseVerdict('Looks nice overall.'), 'rejected');
    assert.strictEqual(parseVerdict('This is not approved yet.'), 'rejected');
    assert.strictEqual(parseVerdict('VERDICT: DISAPPROVED'), 'rejected');
  });
});

describe('ValidatorStage', () => {
  it('uses text-only review exactly once when rendering is unavailable', async () => {
    const client = new StubCompletionClient(approve);
    const renderer = new StubRenderer(false, whitePng);
    const validator = new ValidatorStage(client, renderer, settings);

    const outcome = await validator.validate('A hero banner', SAMPLE_ARTIFACT, 1);

    assert.strictEqual(renderer.captured.length, 0);
    assert.strictEqual(client.requests.length, 1);
    assert.strictEqual(client.requests[0].model, 'test-text');
    assert.strictEqual(client.requests[0].image, undefined);
    assert.strictEqual(outcome.mode, 'text');
    assert.strictEqual(outcome.verdict, 'approved');
    assert.strictEqual(outcome.feedback, 'VERDICT: APPROVED\nAnalysis: good');
  });

  it('uses text-only review without a renderer', async () => {
    const client = new StubCompletionClient(approve);
    const outcome = await new ValidatorStage(client, null, settings).validate('A hero banner', SAMPLE_ARTIFACT, 2);

    assert.strictEqual(outcome.mode, 'text');
    assert.strictEqual(client.requests.length, 1);
  });

  it('shows the vision model a screenshot of the composed page', async () => {
    const client = new StubCompletionClient(approve);
    const renderer = new StubRenderer(true, whitePng);
    const validator = new ValidatorStage(client, renderer, settings);

    const outcome = await validator.validate('A hero banner', SAMPLE_ARTIFACT, 1);

    assert.strictEqual(outcome.mode, 'visual');
    assert.strictEqual(renderer.captured.length, 1);
    assert.ok(renderer.captured[0].includes('<div class="hero">Hi</div>'));
    assert.strictEqual(client.requests.length, 1);
    assert.strictEqual(client.requests[0].model, 'test-vision');
    assert.strictEqual(client.requests[0].image?.mimeType, 'image/jpeg');
  });

  it('falls back to text review when capture fails', async () => {
    const client = new StubCompletionClient(approve);
    const renderer = new StubRenderer(true, async () => {
      throw new Error('Chrome crashed');
    });
    const validator = new ValidatorStage(client, renderer, settings);

    const outcome = await validator.validate('A hero banner', SAMPLE_ARTIFACT, 1);

    assert.strictEqual(outcome.mode, 'text');
    assert.strictEqual(client.requests.length, 1);
    assert.strictEqual(client.requests[0].model, 'test-text');
  });

  it('falls back to text review when the availability check fails', async () => {
    const client = new StubCompletionClient(approve);
    const renderer: Renderer = {
      isAvailable: async () => {
        throw new Error('browser lookup failed');
      },
      capture: async () => {
        throw new Error('capture must not run');
      },
    };
    const validator = new ValidatorStage(client, renderer, settings);

    const outcome = await validator.validate('A hero banner', SAMPLE_ARTIFACT, 1);

    assert.strictEqual(outcome.mode, 'text');
    assert.strictEqual(outcome.verdict, 'approved');
    assert.strictEqual(client.requests.length, 1);
    assert.strictEqual(client.requests[0].model, 'test-text');
  });

  it('forces rejection on structural errors even when the judge approves', async () => {
    const client = new StubCompletionClient(approve);
    const validator = new ValidatorStage(client, null, settings);

    const outcome = await validator.validate('A hero banner', { markup: '', style: '', behavior: '' }, 3);

    assert.strictEqual(outcome.verdict, 'rejected');
    assert.strictEqual(outcome.feedback, 'Code syntax errors: Markup is empty\n\nVERDICT: APPROVED\nAnalysis: good');
  });

  it('rejects deterministically when the judging service fails', async () => {
    const client = new StubCompletionClient(() => {
      throw new CompletionError('Request timed out: aborted', 'timeout');
    });
    const validator = new ValidatorStage(client, null, settings);

    const outcome = await validator.validate('A hero banner', SAMPLE_ARTIFACT, 1);

    assert.strictEqual(outcome.verdict, 'rejected');
    assert.strictEqual(outcome.feedback, judgeFailureFeedback('Request timed out: aborted'));
    assert.strictEqual(outcome.metadata?.success, false);
  });
});
