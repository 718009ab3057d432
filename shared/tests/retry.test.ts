/**
 * Retry helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Logger } from '../src/logger.js';
import { backoffDelay, withRetry } from '../src/retry.js';
import { DEFAULT_RETRY_CONFIG } from '../src/types.js';

class RecordingLogger extends Logger {
  readonly warnings: string[] = [];

  constructor() {
    super('test', 'error');
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}

function recorder() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe('backoffDelay', () => {
  it('grows exponentially up to the cap', () => {
    const config = { ...DEFAULT_RETRY_CONFIG, baseDelay: 100, maxDelay: 350 };
    assert.equal(backoffDelay(0, config), 100);
    assert.equal(backoffDelay(1, config), 200);
    assert.equal(backoffDelay(2, config), 350);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`failure ${calls}`);
        return 'done';
      },
      { maxRetries: 3, baseDelay: 100, sleep }
    );

    assert.equal(result, 'done');
    assert.equal(calls, 3);
    assert.deepEqual(delays, [100, 200]);
  });

  it('rethrows the last error once retries run out', async () => {
    const { sleep } = recorder();
    let calls = 0;

    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { maxRetries: 2, baseDelay: 1, sleep }
      ),
      { message: 'failure 3' }
    );
    assert.equal(calls, 3);
  });

  it('stops when shouldRetry declines', async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new Error('permanent');
        },
        { maxRetries: 5, sleep, shouldRetry: error => error.message !== 'permanent' }
      ),
      { message: 'permanent' }
    );
    assert.equal(calls, 1);
    assert.deepEqual(delays, []);
  });

  it('reports each retry to the given logger', async () => {
    const { sleep } = recorder();
    const logger = new RecordingLogger();
    let calls = 0;

    await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error('flaky');
        return calls;
      },
      { maxRetries: 4, baseDelay: 1, sleep, logger }
    );

    assert.deepEqual(logger.warnings, ['Retry attempt 1/4', 'Retry attempt 2/4']);
  });

  it('wraps thrown non-errors', async () => {
    const { sleep } = recorder();
    await assert.rejects(
      withRetry(() => Promise.reject('plain string'), { maxRetries: 0, sleep }),
      { message: 'plain string' }
    );
  });
});
