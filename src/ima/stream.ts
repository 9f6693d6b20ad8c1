import type { Logger } from 'pino';
import { discardBody } from './connection.js';
import { ImaError, errorMessage, isImaError } from './errors.js';
import { ChunkDecoder, extractMessagesFromDocument, parseSseLine } from './sseParser.js';
import type { ImaMessage } from './types.js';

export type StreamStats = {
  chunkCount: number;
  parsedCount: number;
  failedCount: number;
  decodeFailures: number;
  bytes: number;
  elapsedMs: number;
  streamError?: string;
  fullResponse: string;
};

export type StreamOptions = {
  log: Logger;
  /** Idle limit before the first byte arrives. */
  initialTimeoutMs?: number;
  /** Idle limit once data has started flowing. */
  chunkTimeoutMs?: number;
  /** Below this many chunks the whole body is also tried as one JSON document. */
  fallbackChunkThreshold?: number;
  signal?: AbortSignal;
  now?: () => number;
  onComplete?: (stats: StreamStats) => Promise<void> | void;
};

export const INITIAL_TIMEOUT_MS = 180_000;
export const CHUNK_TIMEOUT_MS = 120_000;
export const FALLBACK_CHUNK_THRESHOLD = 100;

const IDLE = Symbol('idle');

function nextWithin<T>(
  iterator: AsyncIterator<T>,
  ms: number,
  signal?: AbortSignal,
): Promise<IteratorResult<T> | typeof IDLE> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ImaError('aborted', 'Stream read was cancelled'));
      return;
    }
    const onAbort = () => {
      cleanup();
      reject(new ImaError('aborted', 'Stream read was cancelled'));
    };
    const timer = setTimeout(() => {
      cleanup();
      resolve(IDLE);
    }, ms);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    // Settling after the timer or the abort is a no-op; the handlers keep a
    // late rejection from going unhandled once the body is destroyed.
    iterator.next().then(
      result => {
        cleanup();
        resolve(result);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

const tryParseDocument = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Reads an event-stream body and yields messages in arrival order.
 *
 * An idle stream ends early and is reported through `streamError`; read
 * failures other than cancellation are absorbed the same way. Messages
 * recovered by the whole-body fallback are yielded after the streamed ones.
 * The body is destroyed on every exit path.
 */
export async function* processStream(
  body: NodeJS.ReadableStream,
  options: StreamOptions,
): AsyncGenerator<ImaMessage, void, undefined> {
  const {
    log,
    signal,
    initialTimeoutMs = INITIAL_TIMEOUT_MS,
    chunkTimeoutMs = CHUNK_TIMEOUT_MS,
    fallbackChunkThreshold = FALLBACK_CHUNK_THRESHOLD,
    now = Date.now,
  } = options;

  const started = now();
  const decoder = new ChunkDecoder();
  const stats: StreamStats = {
    chunkCount: 0,
    parsedCount: 0,
    failedCount: 0,
    decodeFailures: 0,
    bytes: 0,
    elapsedMs: 0,
    fullResponse: '',
  };
  let buffer = '';
  let hasData = false;
  let lastDataAt = started;

  const parse = (line: string): ImaMessage | null => {
    try {
      const message = parseSseLine(line);
      if (message) stats.parsedCount++;
      return message;
    } catch (err) {
      stats.failedCount++;
      log.debug({ err: errorMessage(err), line: line.slice(0, 200) }, 'Skipped unparseable event line');
      return null;
    }
  };

  try {
    const iterator = body[Symbol.asyncIterator]();
    try {
      for (;;) {
        const threshold = hasData ? chunkTimeoutMs : initialTimeoutMs;
        const remaining = threshold - (now() - lastDataAt);
        const result = remaining > 0 ? await nextWithin(iterator, remaining, signal) : IDLE;
        if (result === IDLE) {
          const idleSeconds = ((now() - lastDataAt) / 1000).toFixed(1);
          stats.streamError = `Timeout after ${idleSeconds}s idle with ${stats.chunkCount} chunks`;
          if (hasData) log.warn({ chunks: stats.chunkCount }, 'Event stream stalled');
          else log.error('Event stream timed out before any data arrived');
          break;
        }
        if (result.done) break;

        const chunk = typeof result.value === 'string' ? Buffer.from(result.value) : result.value;
        if (chunk.length === 0) continue;
        hasData = true;
        lastDataAt = now();
        stats.chunkCount++;
        stats.bytes += chunk.length;

        const text = decoder.decode(chunk);
        buffer += text;
        stats.fullResponse += text;

        let newline = buffer.indexOf('\n');
        while (newline >= 0) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          const message = line ? parse(line) : null;
          if (message) yield message;
          newline = buffer.indexOf('\n');
        }
      }
    } catch (err) {
      if (isImaError(err, 'aborted')) throw err;
      stats.streamError = `Stream read failed: ${errorMessage(err)}`;
      log.error({ err }, 'Event stream read failed');
    } finally {
      discardBody(body);
    }

    const tail = decoder.flush();
    buffer += tail;
    stats.fullResponse += tail;
    for (const rawLine of buffer.split('\n')) {
      const line = rawLine.trim();
      const message = line ? parse(line) : null;
      if (message) yield message;
    }
    buffer = '';

    const whole = stats.fullResponse.trim();
    if ((stats.chunkCount < fallbackChunkThreshold || !hasData) && whole) {
      const doc = tryParseDocument(whole);
      if (doc !== undefined) {
        for (const message of extractMessagesFromDocument(doc)) {
          stats.parsedCount++;
          yield message;
        }
      }
    }
  } finally {
    stats.elapsedMs = now() - started;
    stats.decodeFailures = decoder.failures;
    log.info(
      {
        chunks: stats.chunkCount,
        parsed: stats.parsedCount,
        failed: stats.failedCount,
        decodeFailures: stats.decodeFailures,
        bytes: stats.bytes,
        ms: stats.elapsedMs,
        streamError: stats.streamError,
      },
      'Event stream finished',
    );
    if (stats.chunkCount > FALLBACK_CHUNK_THRESHOLD && stats.parsedCount < 5) {
      log.error({ chunks: stats.chunkCount, parsed: stats.parsedCount }, 'Most of the event stream could not be parsed');
    }
    await options.onComplete?.(stats);
  }
}
