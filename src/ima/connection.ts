import http from 'node:http';
import https from 'node:https';
import { Readable } from 'node:stream';
import fetch, { RequestInit, Response } from 'node-fetch';
import { HttpsProxyAgent } from 'https-proxy-agent';
import type { Logger } from 'pino';
import { ImaError, errorMessage } from './errors.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type PostOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
  /** Cut-off for connecting and receiving the response headers; cleared once they arrive. */
  headersTimeoutMs?: number;
  signal?: AbortSignal;
};

export type PostResult = {
  response: Response;
  /** Stops the request timer and detaches from the caller's signal. */
  release: () => void;
};

export const DEFAULT_BASE_URL = 'https://ima.qq.com';

/**
 * Keep-alive connection pool for one client. The agent is created on first
 * use and rebuilt after close(), so a retry never reuses a torn-down pool.
 */
export class ImaConnection {
  private agent: http.Agent | undefined;
  private readonly fetchImpl: FetchLike;
  private readonly proxy: string | undefined;

  constructor(
    private readonly baseUrl: string,
    private readonly log: Logger,
    options: { fetchImpl?: FetchLike; proxy?: string } = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.proxy = options.proxy;
  }

  get isOpen(): boolean {
    return this.agent !== undefined;
  }

  private getAgent(): http.Agent {
    if (!this.agent) {
      this.agent = this.proxy
        ? new HttpsProxyAgent(this.proxy, { keepAlive: true, maxSockets: 30 })
        : new https.Agent({ keepAlive: true, maxSockets: 30 });
      this.log.debug({ proxy: Boolean(this.proxy) }, 'Created HTTP agent');
    }
    return this.agent;
  }

  close(): void {
    if (!this.agent) return;
    this.agent.destroy();
    this.agent = undefined;
  }

  async post(path: string, body: unknown, options: PostOptions): Promise<PostResult> {
    const controller = new AbortController();
    let timedOut = false;
    let headersTimedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const headersTimer =
      options.headersTimeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            headersTimedOut = true;
            controller.abort();
          }, options.headersTimeoutMs);
    const onAbort = () => controller.abort();
    const outer = options.signal;
    if (outer?.aborted) controller.abort();
    else outer?.addEventListener('abort', onAbort, { once: true });
    const release = () => {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    };

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: options.headers,
        body: JSON.stringify(body),
        agent: this.getAgent(),
        signal: controller.signal,
      });
      clearTimeout(headersTimer);
      return { response, release };
    } catch (err) {
      clearTimeout(headersTimer);
      release();
      if (outer?.aborted) throw new ImaError('aborted', `Request to ${path} was cancelled`, { cause: err });
      if (headersTimedOut) {
        throw new ImaError('timeout', `Request to ${path} got no response within ${options.headersTimeoutMs} ms`, {
          cause: err,
        });
      }
      if (timedOut) throw new ImaError('timeout', `Request to ${path} timed out after ${options.timeoutMs} ms`, { cause: err });
      throw new ImaError('network', `HTTP request to ${path} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export async function readText(response: Response): Promise<string> {
  return response.text().catch(() => '');
}

export function discardBody(body: NodeJS.ReadableStream | null): void {
  if (body instanceof Readable && !body.destroyed) body.destroy();
}
