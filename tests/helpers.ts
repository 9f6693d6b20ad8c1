import { Readable } from 'node:stream';
import { Headers, Response, type RequestInit } from 'node-fetch';
import { pino } from 'pino';
import type { FetchLike } from '../src/ima/connection.js';
import type { ImaCredentials } from '../src/ima/types.js';

export const silentLogger = pino({ level: 'silent' });

export const BASE_URL = 'https://ima.test';

export function makeCreds(overrides: Partial<ImaCredentials> = {}): ImaCredentials {
  return {
    xImaCookie: 'IMA-GUID=test-guid',
    xImaBkn: 'test-bkn',
    knowledgeBaseId: 'kb-test',
    clientId: 'client-test',
    timeoutSeconds: 5,
    retryCount: 2,
    robotType: 5,
    sceneType: 1,
    modelType: 4,
    rawLog: { enabled: false, dir: 'logs/raw', maxBytes: 1024, onSuccess: false },
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function sseResponse(chunks: string[], status = 200): Response {
  return new Response(Readable.from(chunks.map(c => Buffer.from(c))), {
    status,
    headers: { 'content-type': 'text/event-stream; charset=utf-8' },
  });
}

export function jsonResponse(body: unknown, status = 200, contentType = 'application/json'): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
    status,
    headers: { 'content-type': contentType },
  });
}

export type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

export type RecordedCall = {
  path: string;
  body: unknown;
  headers: Headers;
};

/**
 * Fetch stand-in that dispatches on the URL path. A list of routes is
 * consumed in order and its last entry repeats.
 */
export function fakeFetch(routes: Record<string, Route | Route[]>) {
  const calls: RecordedCall[] = [];
  const served = new Map<string, number>();
  const fetchImpl: FetchLike = async (url, init) => {
    const path = new URL(url).pathname;
    calls.push({
      path,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
      headers: new Headers(init?.headers),
    });
    const route = routes[path];
    if (!route) throw new Error(`Unexpected request to ${path}`);
    if (!Array.isArray(route)) return route(init);
    const n = served.get(path) ?? 0;
    served.set(path, n + 1);
    const handler = route[Math.min(n, route.length - 1)];
    if (!handler) throw new Error(`No handler for ${path}`);
    return handler(init);
  };
  const callsTo = (path: string) => calls.filter(c => c.path === path);
  return { fetchImpl, calls, callsTo };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

/** Event-stream response that sends one chunk and then goes quiet. */
export function stallingSseResponse(first: string): Response {
  const body = new Readable({ read() {} });
  body.push(first);
  return new Response(body, { status: 200, headers: { 'content-type': 'text/event-stream' } });
}

/** Route that answers after `ms`, or fails the way fetch does once the request is aborted. */
export function delayedRoute(ms: number, route: Route): Route {
  return init =>
    new Promise<Response>((resolve, reject) => {
      const timer = setTimeout(() => resolve(route(init)), ms);
      init?.signal?.addEventListener('abort', () => {
        clearTimeout(timer);
        reject(new Error('The operation was aborted'));
      });
    });
}
