import assert from 'node:assert/strict';
import test from 'node:test';

import { ExternalCallError, SchemaError, ValidationError } from '../../utils/errors';
import { callWithRetry, withSchemaReprompt } from '../retry';

const policy = { retryBudget: 2, baseDelayMs: 0 };

test('retries a retryable failure until it succeeds', async () => {
  const attempts: number[] = [];

  const result = await callWithRetry(async (attempt) => {
    attempts.push(attempt);
    if (attempt < 3) throw new ExternalCallError('timeout');
    return 'ok';
  }, policy);

  assert.equal(result, 'ok');
  assert.deepEqual(attempts, [1, 2, 3]);
});

test('gives up once the retry budget is spent', async () => {
  let calls = 0;
  await assert.rejects(
    callWithRetry(async () => {
      calls += 1;
      throw new ExternalCallError('timeout');
    }, policy),
    ExternalCallError,
  );
  assert.equal(calls, 3);
});

test('does not retry other errors', async () => {
  let calls = 0;
  await assert.rejects(
    callWithRetry(async () => {
      calls += 1;
      throw new ValidationError('bad input');
    }, policy),
    ValidationError,
  );
  assert.equal(calls, 1);
});

test('re-prompts exactly once on malformed output', async () => {
  const flags: boolean[] = [];

  await assert.rejects(
    withSchemaReprompt(async (reprompt) => {
      flags.push(reprompt);
      throw new SchemaError('not json', 'raw');
    }),
    (error: unknown) => error instanceof SchemaError && error.rawPayload === 'raw',
  );
  assert.deepEqual(flags, [false, true]);
});

test('returns the re-prompted answer', async () => {
  const result = await withSchemaReprompt(async (reprompt) => {
    if (!reprompt) throw new SchemaError('empty', '');
    return 'fixed';
  });
  assert.equal(result, 'fixed');
});
