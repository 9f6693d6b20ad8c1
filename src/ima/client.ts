import crypto from 'node:crypto';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../logger.js';
import { DEFAULT_BASE_URL, ImaConnection, discardBody, readText, type FetchLike } from './connection.js';
import { buildHeaders, parseImaGuid } from './credentials.js';
import { ImaError, errorMessage, isAuthExpiredError, isImaError } from './errors.js';
import { RawCapture } from './rawCapture.js';
import { SessionInitializer } from './session.js';
import { processStream, type StreamOptions } from './stream.js';
import { TokenManager } from './tokenManager.js';
import {
  upstreamErrorSchema,
  type ImaCredentials,
  type ImaMessage,
  type ImaSession,
  type QaRequestBody,
} from './types.js';

export const QA_PATH = '/cgi-bin/assistant/qa';
const STREAM_TOTAL_TIMEOUT_MS = 300_000;
const RESPONSE_HEADERS_TIMEOUT_MS = 30_000;
const RETRY_DELAY_MS = 1000;

export type ImaClientOptions = {
  baseUrl?: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
  /** Retry delay; should resolve early once the signal aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  /** Limit on waiting for the question response headers. */
  headersTimeoutMs?: number;
  /** Overrides for the idle timeouts and fallback threshold of the stream reader. */
  stream?: Pick<StreamOptions, 'initialTimeoutMs' | 'chunkTimeoutMs' | 'fallbackChunkThreshold'>;
  rawCapture?: RawCapture;
};

export type AskOptions = {
  signal?: AbortSignal;
  traceId?: string;
  attempt?: number;
};

export type ClientStatus = {
  isConfigured: boolean;
  isAuthenticated: boolean;
  lastTestTime?: Date;
  errorMessage?: string;
};

export interface AskBackend {
  askComplete(question: string, options?: AskOptions): Promise<ImaMessage[]>;
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>(resolve => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

const newTraceId = () => crypto.randomUUID().slice(0, 8);

export function buildQaRequest(creds: ImaCredentials, session: ImaSession, question: string, now: number): QaRequestBody {
  return {
    session_id: session.id,
    robot_type: creds.robotType,
    question,
    question_type: 2,
    client_id: creds.clientId,
    command_info: { type: 14, knowledge_qa_info: { tags: [], knowledge_ids: [] } },
    model_info: { model_type: creds.modelType, enable_enhancement: false },
    history_info: {},
    device_info: {
      uskey: crypto.randomBytes(32).toString('base64'),
      uskey_bus_infos_input: `${parseImaGuid(creds.xImaCookie)}_${Math.floor(now / 1000)}`,
    },
  };
}

function nonStreamError(text: string, contentType: string): ImaError {
  const label = contentType || 'no content type';
  if (!text.trim()) {
    return new ImaError('non_stream', `Expected an event stream, got ${label} with an empty body`);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return new ImaError('non_stream', `Expected an event stream, got ${label} that is not JSON: ${text.slice(0, 200)}`);
  }
  const parsed = upstreamErrorSchema.safeParse(json);
  const rawCode = parsed.success && parsed.data.code !== undefined ? String(parsed.data.code).trim() : '';
  const numeric = rawCode ? Number(rawCode) : NaN;
  const code = Number.isFinite(numeric) ? numeric : undefined;
  const msg = parsed.success && parsed.data.msg ? parsed.data.msg : 'unknown error';
  return new ImaError('non_stream', `Expected an event stream, upstream error (code: ${code ?? (rawCode || 'N/A')}): ${msg}`, {
    code,
  });
}

/**
 * Client for the IMA question-answering API.
 *
 * Single-flight: session and connection state live on the instance, so one
 * client must not run two questions at once. Use one client per concurrent
 * conversation or serialize calls.
 */
export class ImaClient implements AskBackend {
  readonly tokens: TokenManager;
  readonly sessions: SessionInitializer;
  private readonly connection: ImaConnection;
  private readonly log: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly headersTimeoutMs: number;
  private readonly streamOptions: ImaClientOptions['stream'];
  private readonly rawCapture: RawCapture;
  private currentSessionId: string | undefined;

  constructor(readonly creds: ImaCredentials, options: ImaClientOptions = {}) {
    this.log = (options.logger ?? rootLogger).child({ module: 'ima-client' });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.headersTimeoutMs = options.headersTimeoutMs ?? RESPONSE_HEADERS_TIMEOUT_MS;
    this.streamOptions = options.stream;
    this.connection = new ImaConnection(options.baseUrl ?? DEFAULT_BASE_URL, this.log, {
      fetchImpl: options.fetchImpl,
      proxy: creds.proxy,
    });
    this.tokens = new TokenManager(creds, this.connection, this.log, this.now);
    this.sessions = new SessionInitializer(creds, this.tokens, this.connection, this.log);
    this.rawCapture = options.rawCapture ?? new RawCapture(creds.rawLog, this.log);
  }

  get sessionId(): string | undefined {
    return this.currentSessionId;
  }

  get maxRetries(): number {
    return Math.max(0, this.creds.retryCount);
  }

  refreshToken(signal?: AbortSignal): Promise<boolean> {
    return this.tokens.refresh(signal);
  }

  ensureValidToken(signal?: AbortSignal): Promise<boolean> {
    return this.tokens.ensureValid(signal);
  }

  async initSession(knowledgeBaseId?: string, signal?: AbortSignal): Promise<string> {
    const session = await this.sessions.init(knowledgeBaseId, signal);
    this.currentSessionId = session.id;
    return session.id;
  }

  closeConnection(): void {
    this.connection.close();
    this.currentSessionId = undefined;
  }

  async close(): Promise<void> {
    this.closeConnection();
  }

  /**
   * Asks one question on a fresh session and yields messages as they are
   * parsed. Throws on empty input, authentication failure, a non-200 status
   * or a response that is not an event stream.
   */
  async *ask(question: string, options: AskOptions = {}): AsyncGenerator<ImaMessage, void, undefined> {
    if (!question.trim()) throw new ImaError('input', 'Question cannot be empty');
    const traceId = options.traceId ?? newTraceId();
    const attempt = options.attempt ?? 0;
    const log = this.log.child({ traceId, attempt: attempt + 1 });

    // No context carries over between questions.
    this.closeConnection();
    const sessionId = await this.initSession(undefined, options.signal);
    const session: ImaSession = { id: sessionId, initialized: true };

    const body = buildQaRequest(this.creds, session, question, this.now());
    log.debug({ question: question.slice(0, 50) }, 'Sending question');
    const { response, release } = await this.connection.post(QA_PATH, body, {
      headers: buildHeaders(this.creds, 'text/event-stream'),
      timeoutMs: STREAM_TOTAL_TIMEOUT_MS,
      headersTimeoutMs: this.headersTimeoutMs,
      signal: options.signal,
    });

    try {
      if (response.status !== 200) {
        const text = await readText(response);
        log.error({ status: response.status, body: text.slice(0, 500) }, 'Question request failed');
        throw new ImaError('http', `HTTP request failed: ${response.status} - ${text.slice(0, 200)}`, {
          status: response.status,
        });
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.includes('text/event-stream')) {
        const text = await readText(response);
        log.error({ contentType, body: text.slice(0, 1000) }, 'Expected an event stream');
        throw nonStreamError(text, contentType);
      }
      if (!response.body) throw new ImaError('network', 'Event stream response has no body');

      let count = 0;
      const stream = processStream(response.body, {
        ...this.streamOptions,
        log,
        signal: options.signal,
        now: this.now,
        onComplete: stats => this.rawCapture.persist({ traceId, attempt, question, stats }).then(() => undefined),
      });
      for await (const message of stream) {
        count++;
        yield message;
      }

      if (count === 0) {
        log.warn('No parseable messages in the event stream');
        yield {
          type: 'system',
          content: 'Request succeeded but no parseable content was received',
          raw: 'No valid SSE messages received',
        };
      }
    } catch (err) {
      if (err instanceof ImaError) throw err;
      throw new ImaError('network', `Ask failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      release();
      discardBody(response.body);
    }
  }

  /**
   * Asks a question with bounded retries. Never throws; always returns at
   * least one message, a `system` message when every attempt failed.
   */
  async askComplete(question: string, options: AskOptions = {}): Promise<ImaMessage[]> {
    const traceId = options.traceId ?? newTraceId();
    const maxRetries = this.maxRetries;
    const attempts = maxRetries + 1;
    const log = this.log.child({ traceId });
    let messages: ImaMessage[] = [];

    log.info({ question: question.slice(0, 50) }, 'Asking question');
    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        for await (const message of this.ask(question, { signal: options.signal, traceId, attempt })) {
          messages.push(message);
        }
        if (messages.length > 0) break;
        log.warn({ attempt: attempt + 1 }, 'Attempt produced no messages');
      } catch (err) {
        log.error({ attempt: attempt + 1, attempts, err: errorMessage(err) }, 'Attempt failed');
        if (messages.length > 0) break;
        if (isImaError(err, 'input')) {
          messages.push({ type: 'system', content: err.message, raw: 'Invalid input' });
          break;
        }
        if (options.signal?.aborted || isImaError(err, 'aborted')) break;

        const retriesLeft = attempt < maxRetries;
        if (!retriesLeft) break;
        if (isAuthExpiredError(err)) {
          log.info('Authentication error, refreshing token');
          if (!(await this.tokens.refresh(options.signal))) {
            log.error('Token refresh failed, giving up');
            break;
          }
          this.closeConnection();
          messages = [];
          continue;
        }
        messages = [];
        await this.sleep(RETRY_DELAY_MS, options.signal);
        if (options.signal?.aborted) break;
      }
    }

    if (messages.length === 0) {
      log.error({ attempts }, 'All attempts failed');
      messages.push({
        type: 'system',
        content: `Failed to get an answer: all ${attempts} attempts failed`,
        raw: 'All retries exhausted',
      });
    } else {
      log.info({ count: messages.length }, 'Question answered');
    }
    return messages;
  }

  /** True when a test question returns at least one non-system message. */
  async validateConfig(options: Pick<AskOptions, 'signal'> = {}): Promise<boolean> {
    const messages = await this.askComplete('connection test', { signal: options.signal });
    return messages.some(m => m.type !== 'system');
  }

  async getStatus(): Promise<ClientStatus> {
    const status: ClientStatus = { isConfigured: true, isAuthenticated: false };
    const ok = await this.validateConfig();
    status.isAuthenticated = ok;
    status.lastTestTime = new Date(this.now());
    if (!ok) status.errorMessage = 'Authentication failed, check the IMA credentials';
    return status;
  }
}
