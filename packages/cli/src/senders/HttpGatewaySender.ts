import { permanentFailure, sent, sessionInvalid, toErrorMessage, transientFailure } from '@cadencekit/core';
import type { CampaignJob, SendContext, SendResult, Sender } from '@cadencekit/core';
import { DEFAULT_GATEWAY_TIMEOUT_MS } from '../config/env.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpGatewaySenderOptions {
  /** Endpoint that accepts one job per POST. */
  readonly url: string;
  /** Sent as a bearer token when set. */
  readonly token?: string;
  /** Default: `15000`. */
  readonly timeoutMs?: number;
  /** Default: the global `fetch`. */
  readonly fetch?: FetchFn;
  readonly now?: () => number;
}

const MAX_DETAIL_LENGTH = 200;

/**
 * Sender that posts each job as JSON to a delivery gateway.
 *
 * Status mapping: 2xx is sent; 401 and 403 mean the session is gone;
 * 408, 429, 5xx, network errors and timeouts are transient; any other 4xx is
 * a permanent failure of that job.
 */
export class HttpGatewaySender implements Sender {
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly options: HttpGatewaySenderOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GATEWAY_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? (() => performance.now());
  }

  async send(job: CampaignJob, context: SendContext): Promise<SendResult> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.token) headers['authorization'] = `Bearer ${this.options.token}`;

    const body = JSON.stringify({
      campaignKey: context.campaignKey,
      jobId: job.id,
      index: job.index,
      attempt: context.attempt,
      payload: job.payload,
    });

    const started = this.now();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await this.fetchFn(this.options.url, { method: 'POST', headers, body, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        return transientFailure(`Gateway request timed out after ${String(this.timeoutMs)}ms`);
      }
      return transientFailure(`Gateway network error: ${toErrorMessage(err)}`);
    } finally {
      clearTimeout(timeout);
    }

    if (res.ok) {
      const latencyMs = Math.max(0, Math.round(this.now() - started));
      // Unread bodies keep the connection checked out.
      await res.body?.cancel().catch(() => undefined);
      return sent(latencyMs);
    }

    const detail = (await res.text().catch(() => '')).trim().slice(0, MAX_DETAIL_LENGTH);
    const message = `Gateway responded ${String(res.status)}${detail ? `: ${detail}` : ''}`;

    if (res.status === 401 || res.status === 403) return sessionInvalid(message);
    if (res.status === 408 || res.status === 429 || res.status >= 500) return transientFailure(message);
    return permanentFailure(message);
  }
}
