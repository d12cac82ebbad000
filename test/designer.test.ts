import { describe, it } from 'node:test';
import assert from 'assert';
import { DesignerStage, composeDesignerUserPrompt } from '../src/jobs/designer';
import { CompletionError } from '../src/errors';
import { FALLBACK_ARTIFACT, designerSystemPrompt } from '../src/llm/presets/designer';
import { StubCompletionClient } from './helpers';

const settings = { model: 'test-designer', temperature: 0.7, maxTokens: 4000, syntaxMode: 'loose' as const };

const reply = [
  '```html',
  '<section class="signup"><form><input type="email"><button>Join</button></form></section>',
  '```',
  '```css',
  '.signup { padding: 2rem; }',
  '```',
  '```javascript',
  "document.querySelector('form').addEventListener('submit', (e) => e.preventDefault());",
  '```',
].join('\n');

describe('DesignerStage', () => {
  it('asks the designer model and extracts the artifact', async () => {
    const client = new StubCompletionClient(() => reply);
    const designer = new DesignerStage(client, settings);

    const result = await designer.generate('A newsletter signup form');

    assert.strictEqual(result.usedFallback, false);
    assert.deepStrictEqual(result.artifact, {
      markup: '<section class="signup"><form><input type="email"><button>Join</button></form></section>',
      style: '.signup { padding: 2rem; }',
      behavior: "document.querySelector('form').addEventListener('submit', (e) => e.preventDefault());",
    });
    assert.strictEqual(result.syntax.valid, true);
    assert.strictEqual(result.profile.type, 'form');

    assert.strictEqual(client.requests.length, 1);
    const request = client.requests[0];
    assert.strictEqual(request.model, 'test-designer');
    assert.strictEqual(request.temperature, 0.7);
    assert.strictEqual(request.maxTokens, 4000);
    assert.strictEqual(request.messages[0].content, designerSystemPrompt);
  });

  it('carries review feedback into the prompt', async () => {
    const client = new StubCompletionClient(() => reply);
    const designer = new DesignerStage(client, settings);

    await designer.generate('A newsletter signup form', 'Add a privacy note under the button', 1);

    const userContent = client.requests[0].messages[1].content;
    assert.strictEqual(typeof userContent, 'string');
    assert.ok(String(userContent).includes('REVIEW FEEDBACK ON ITERATION 1:\nAdd a privacy note under the button'));
  });

  it('serves the fallback artifact when the service fails', async () => {
    const client = new StubCompletionClient(() => {
      throw new CompletionError('Service unavailable (503): down', 'unavailable', 503);
    });
    const designer = new DesignerStage(client, settings);

    const result = await designer.generate('A newsletter signup form');

    assert.strictEqual(result.usedFallback, true);
    assert.deepStrictEqual(result.artifact, FALLBACK_ARTIFACT);
    assert.strictEqual(result.syntax.valid, true);
    assert.strictEqual(result.error, 'Service unavailable (503): down');
    assert.strictEqual(result.metadata?.success, false);
  });

  it('does not call the service for blank requirements', async () => {
    const client = new StubCompletionClient(() => reply);
    const designer = new DesignerStage(client, settings);

    const result = await designer.generate('   ');

    assert.strictEqual(client.requests.length, 0);
    assert.strictEqual(result.usedFallback, true);
    assert.strictEqual(result.error, 'Requirements are empty');
  });
});

describe('composeDesignerUserPrompt', () => {
  it('lists requirements and analysis without feedback on the first pass', () => {
    const prompt = composeDesignerUserPrompt('Landing page', {
      type: 'landing',
      style: 'modern',
      interactive: false,
      responsive: true,
      features: ['landing page', 'landing'],
    });

    assert.strictEqual(
      prompt,
      [
        'REQUIREMENTS:',
        'Landing page',
        '',
        'ANALYSIS:',
        '- Page type: landing',
        '- Visual style: modern',
        '- Interactive: no',
        '- Responsive: yes',
        '- Mentioned features: landing page, landing',
      ].join('\n')
    );
  });
});
