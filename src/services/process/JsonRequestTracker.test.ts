import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JsonRequestTracker, WorkerRequestError, parseWorkerResponse } from './JsonRequestTracker';

describe('parseWorkerResponse', () => {
  it('keeps only well-typed fields', () => {
    expect(parseWorkerResponse('{"id":"1","ok":true,"result":{"text":"hi"}}')).toEqual({
      id: '1',
      ok: true,
      result: { text: 'hi' },
      error: undefined
    });
    expect(parseWorkerResponse('{"id":7,"ok":"yes","error":false}')).toEqual({
      id: undefined,
      ok: undefined,
      result: undefined,
      error: undefined
    });
  });

  it('rejects lines that are not JSON objects', () => {
    expect(parseWorkerResponse('loading model...')).toBeUndefined();
    expect(parseWorkerResponse('[1,2]')).toBeUndefined();
    expect(parseWorkerResponse('null')).toBeUndefined();
  });
});

describe('JsonRequestTracker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves a request with the result of its matching response', async () => {
    const tracker = new JsonRequestTracker('transcriber');
    const first = tracker.open(1000);
    const second = tracker.open(1000);

    tracker.receive(`{"id":"${second.id}","ok":true,"result":{"text":"two"}}\n{"id":"${first.id}",`);
    tracker.receive(`"ok":true,"result":{"text":"one"}}\n`);

    await expect(first.response).resolves.toEqual({ text: 'one' });
    await expect(second.response).resolves.toEqual({ text: 'two' });
    expect(tracker.pendingCount).toBe(0);
  });

  it('skips noise and responses for unknown requests', async () => {
    const tracker = new JsonRequestTracker('transcriber');
    const request = tracker.open(1000);

    tracker.receive('warming up\n\n{"id":"other","ok":true,"result":1}\n');
    expect(tracker.pendingCount).toBe(1);

    tracker.receive(`{"id":"${request.id}","ok":true,"result":2}\n`);
    await expect(request.response).resolves.toBe(2);
  });

  it('rejects a request the worker reports as failed', async () => {
    const tracker = new JsonRequestTracker('transcriber');
    const request = tracker.open(1000);

    tracker.receive(`{"id":"${request.id}","ok":false,"error":"model not loaded"}\n`);

    await expect(request.response).rejects.toEqual(new WorkerRequestError('rejected', 'model not loaded'));
    await expect(request.response).rejects.toMatchObject({ reason: 'rejected' });
  });

  it('times a request out', async () => {
    const tracker = new JsonRequestTracker('transcriber');
    const request = tracker.open(250);
    const outcome = request.response.catch((error: unknown) => error);

    vi.advanceTimersByTime(250);

    expect(await outcome).toMatchObject({
      reason: 'timeout',
      message: 'transcriber worker request timed out after 250ms'
    });
    expect(tracker.pendingCount).toBe(0);
  });

  it('fails every pending request at once', async () => {
    const tracker = new JsonRequestTracker('transcriber');
    const requests = [tracker.open(1000), tracker.open(1000)];
    const outcomes = requests.map((request) => request.response.catch((error: unknown) => error));

    tracker.failAll(new WorkerRequestError('exited', 'transcriber worker exited (code=1, signal=none)'));

    for (const outcome of outcomes) {
      expect(await outcome).toMatchObject({ reason: 'exited' });
    }
    expect(tracker.pendingCount).toBe(0);
  });
});
