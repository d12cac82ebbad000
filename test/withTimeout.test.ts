import { describe, it } from 'node:test';
import assert from 'assert';
import { TimeoutError } from '../src/errors';
import { sleep, withTimeout } from '../src/utils/withTimeout';

describe('withTimeout', () => {
  it('resolves with the result of fast work', async () => {
    assert.strictEqual(await withTimeout(Promise.resolve(42), 1000, 'Fast work'), 42);
  });

  it('rejects with a TimeoutError when the limit passes first', async () => {
    await assert.rejects(withTimeout(sleep(500), 20, 'Slow work'), (error) => {
      assert.ok(error instanceof TimeoutError);
      assert.strictEqual(error.message, 'Slow work timed out after 20ms');
      assert.strictEqual(error.operation, 'Slow work');
      return true;
    });
  });

  it('passes the work failure through unchanged', async () => {
    const failure = new Error('disk full');
    await assert.rejects(withTimeout(Promise.reject(failure), 1000, 'Write'), (error) => error === failure);
  });
});
