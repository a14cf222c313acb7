import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { fail, succeed } from '../sessions/results';
import { StubResponse, stubRequest } from '../testing/httpStubs';
import { handle, parseInput, sendResult, statusForFailure } from './respond';

import type { MutationFailureReason } from '../sessions/results';

describe('statusForFailure', () => {
  it.each<[MutationFailureReason, number]>([
    ['invalid', 422],
    ['notFound', 404],
    ['inactive', 409],
    ['completed', 409],
    ['empty', 409],
    ['capacity', 409],
  ])('maps %s to %i', (reason, status) => {
    expect(statusForFailure(reason)).toBe(status);
  });
});

describe('parseInput', () => {
  const schema = z.object({ count: z.number() });

  it('returns the parsed value without responding', () => {
    const res = new StubResponse();
    expect(parseInput(schema, { count: 3 }, stubRequest(), res)).toEqual({ count: 3 });
    expect(res.status).not.toHaveBeenCalled();
  });

  it('answers 400 with the issues for a malformed input', () => {
    const res = new StubResponse();
    expect(parseInput(schema, { count: 'three' }, stubRequest(), res)).toBeUndefined();
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({
      details: [{ path: ['count'] }],
      error: 'Invalid request format',
    });
  });
});

describe('sendResult', () => {
  it('sends the value with the success status', () => {
    const res = new StubResponse();
    sendResult(res, succeed({ id: 'a' }), 201);
    expect(res.statusCode).toBe(201);
    expect(res.body).toEqual({ id: 'a' });
  });

  it('sends the reason and message of a failure', () => {
    const res = new StubResponse();
    sendResult(res, fail('notFound', 'No reading at index 4'));
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ error: 'notFound', message: 'No reading at index 4' });
  });
});

describe('handle', () => {
  it('turns a thrown error into a 500', async () => {
    const res = new StubResponse();
    const handler = handle('explode', () => Promise.reject(new Error('disk full')));

    await handler(stubRequest(), res);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'Failed to process request', message: 'disk full' });
  });

  it('leaves an already answered response alone', async () => {
    const res = new StubResponse();
    res.status(408).json({ error: 'Request timeout' });
    const handler = handle('late', () => Promise.reject(new Error('headers already sent')));

    await handler(stubRequest(), res);

    expect(res.statusCode).toBe(408);
    expect(res.json).toHaveBeenCalledOnce();
  });
});
