import { describe, it } from 'node:test';
import assert from 'assert';
import { addUsage, calculateCost, createUnavailableMetadata, emptyRunUsage } from '../src/llm/llmMetadata';
import { stubMetadata } from './helpers';

describe('calculateCost', () => {
  it('prices prompt and completion tokens per million', () => {
    const cost = calculateCost({ promptTokens: 2_000_000, completionTokens: 1_000_000 }, 'openai/gpt-4o-mini');
    assert.ok(Math.abs(cost - 0.9) < 1e-9);
  });

  it('reports zero for unknown models', () => {
    assert.strictEqual(calculateCost({ promptTokens: 500, completionTokens: 500 }, 'someone/unlisted'), 0);
  });
});

describe('addUsage', () => {
  it('accumulates tokens and cost across calls', () => {
    let total = emptyRunUsage();
    total = addUsage(
      total,
      stubMetadata({ usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }, estimatedCost: 0.5 })
    );
    total = addUsage(total, stubMetadata({ usage: { promptTokens: 1, completionTokens: 2, totalTokens: 3 } }));

    assert.deepStrictEqual(total, {
      calls: 2,
      promptTokens: 11,
      completionTokens: 7,
      totalTokens: 18,
      estimatedCost: 0.5,
    });
  });

  it('counts failed calls without tokens', () => {
    const total = addUsage(emptyRunUsage(), createUnavailableMetadata('m', 'down'));
    assert.deepStrictEqual(total, { calls: 1, promptTokens: 0, completionTokens: 0, totalTokens: 0, estimatedCost: 0 });
  });

  it('ignores missing metadata', () => {
    const start = emptyRunUsage();
    assert.strictEqual(addUsage(start, undefined), start);
  });
});
