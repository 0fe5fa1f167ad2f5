import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { HttpError } from '../src/utils/http.js';
import { isRetryableError, withRetry } from '../src/utils/retry.js';
import './helpers/fakes.js';

const httpError = (status: number, headers: Record<string, string> = {}): HttpError =>
  new HttpError(status, 'https://api.example/x', new Headers(headers));

function failing(errors: unknown[], value = 'done'): { fn: () => Promise<string>; calls: () => number } {
  let calls = 0;
  return {
    fn: async () => {
      const error = errors[calls++];
      if (error !== undefined) throw error;
      return value;
    },
    calls: () => calls,
  };
}

describe('isRetryableError', () => {
  it('retries server errors, rate limits and network failures', () => {
    assert.equal(isRetryableError(httpError(503)), true);
    assert.equal(isRetryableError(httpError(429)), true);
    assert.equal(isRetryableError(new Error('fetch failed')), true);
    assert.equal(isRetryableError(new Error('read ECONNRESET')), true);
  });

  it('does not retry client errors', () => {
    assert.equal(isRetryableError(httpError(404)), false);
    assert.equal(isRetryableError('boom'), false);
  });
});

describe('withRetry', () => {
  it('returns after transient failures', async () => {
    const op = failing([httpError(500), new Error('socket timeout')]);
    assert.equal(await withRetry(op.fn, { initialDelayMs: 0 }), 'done');
    assert.equal(op.calls(), 3);
  });

  it('throws non-retryable errors at once', async () => {
    const error = httpError(404);
    const op = failing([error]);
    await assert.rejects(withRetry(op.fn, { initialDelayMs: 0 }), error);
    assert.equal(op.calls(), 1);
  });

  it('gives up after maxRetries', async () => {
    const op = failing([httpError(502), httpError(502), httpError(502)]);
    await assert.rejects(withRetry(op.fn, { initialDelayMs: 0, maxRetries: 2 }), { status: 502 });
    assert.equal(op.calls(), 3);
  });

  it('allows more attempts when rate limited', async () => {
    const limited = (): HttpError => httpError(429, { 'retry-after': '0' });
    const op = failing([limited(), limited(), limited(), limited()]);
    assert.equal(await withRetry(op.fn, { initialDelayMs: 0, maxRetries: 1 }), 'done');
    assert.equal(op.calls(), 5);
  });
});
