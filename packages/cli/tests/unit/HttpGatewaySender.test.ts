import { describe, it, expect } from 'vitest';
import { createJob } from '@cadencekit/core';
import type { SendContext } from '@cadencekit/core';
import { HttpGatewaySender } from '../../src/senders/HttpGatewaySender.js';
import type { FetchFn } from '../../src/senders/HttpGatewaySender.js';

const job = createJob(3, { phone: '100', message: 'hi' }, 'phone');
const context: SendContext = { campaignKey: 'spring', attempt: 2, dryRun: false };

function respondWith(status: number, body = ''): FetchFn {
  return () => Promise.resolve(new Response(body === '' ? null : body, { status }));
}

function ticking(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0;
}

describe('HttpGatewaySender', () => {
  it('should post the job as JSON with a bearer token', async () => {
    const requests: Array<{ url: string; init: RequestInit }> = [];
    const sender = new HttpGatewaySender({
      url: 'https://gateway.test/send',
      token: 'test-secret',
      fetch: (url, init) => {
        requests.push({ url, init });
        return Promise.resolve(new Response(null, { status: 202 }));
      },
      now: ticking(1000, 1042),
    });

    const result = await sender.send(job, context);

    expect(result).toEqual({ status: 'sent', latencyMs: 42 });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('https://gateway.test/send');
    expect(requests[0]?.init.method).toBe('POST');
    expect(requests[0]?.init.headers).toEqual({
      'content-type': 'application/json',
      authorization: 'Bearer test-secret',
    });
    expect(requests[0]?.init.body).toBe(
      '{"campaignKey":"spring","jobId":"100","index":3,"attempt":2,"payload":{"phone":"100","message":"hi"}}',
    );
  });

  it('should release the body of a successful response', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"queued":true}'));
      },
      cancel() {
        cancelled = true;
      },
    });
    const sender = new HttpGatewaySender({
      url: 'https://gateway.test/send',
      fetch: () => Promise.resolve(new Response(body, { status: 200 })),
    });

    const result = await sender.send(job, context);

    expect(result.status).toBe('sent');
    expect(cancelled).toBe(true);
  });

  it('should omit the authorization header without a token', async () => {
    let headers: RequestInit['headers'];
    const sender = new HttpGatewaySender({
      url: 'https://gateway.test/send',
      fetch: (_url, init) => {
        headers = init.headers;
        return Promise.resolve(new Response(null, { status: 200 }));
      },
    });

    await sender.send(job, context);

    expect(headers).toEqual({ 'content-type': 'application/json' });
  });

  it.each([
    [401, 'session-invalid'],
    [403, 'session-invalid'],
    [408, 'transient'],
    [429, 'transient'],
    [500, 'transient'],
    [503, 'transient'],
    [400, 'permanent'],
    [404, 'permanent'],
    [422, 'permanent'],
  ])('should map status %i to a %s failure', async (status, kind) => {
    const sender = new HttpGatewaySender({ url: 'https://gateway.test/send', fetch: respondWith(status) });

    expect(await sender.send(job, context)).toEqual({
      status: 'failed',
      kind,
      message: `Gateway responded ${String(status)}`,
    });
  });

  it('should include the trimmed response body in the message', async () => {
    const sender = new HttpGatewaySender({
      url: 'https://gateway.test/send',
      fetch: respondWith(422, '  unknown phone number \n'),
    });

    expect(await sender.send(job, context)).toEqual({
      status: 'failed',
      kind: 'permanent',
      message: 'Gateway responded 422: unknown phone number',
    });
  });

  it('should treat network errors as transient', async () => {
    const sender = new HttpGatewaySender({
      url: 'https://gateway.test/send',
      fetch: () => Promise.reject(new Error('connect ECONNREFUSED')),
    });

    expect(await sender.send(job, context)).toEqual({
      status: 'failed',
      kind: 'transient',
      message: 'Gateway network error: connect ECONNREFUSED',
    });
  });

  it('should abort and report a timeout when the gateway does not answer', async () => {
    const sender = new HttpGatewaySender({
      url: 'https://gateway.test/send',
      timeoutMs: 5,
      fetch: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });

    expect(await sender.send(job, context)).toEqual({
      status: 'failed',
      kind: 'transient',
      message: 'Gateway request timed out after 5ms',
    });
  });
});
