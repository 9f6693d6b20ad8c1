import type { Logger } from 'pino';
import type { ImaConnection } from './connection.js';
import { readText } from './connection.js';
import { buildHeaders, hasRequiredCredentials } from './credentials.js';
import { ImaError } from './errors.js';
import type { TokenManager } from './tokenManager.js';
import { initSessionResponseSchema, type ImaCredentials, type ImaSession } from './types.js';

export const INIT_SESSION_PATH = '/cgi-bin/session_logic/init_session';

export function buildInitSessionBody(creds: ImaCredentials, knowledgeBaseId: string) {
  return {
    envInfo: { robotType: creds.robotType, interactType: 0 },
    byKeyword: knowledgeBaseId,
    relatedUrl: knowledgeBaseId,
    sceneType: creds.sceneType,
    msgsLimit: 0,
    forbidAutoAddToHistoryList: true,
    knowledgeBaseInfoWithFolder: { knowledge_base_id: knowledgeBaseId, folder_ids: [] as string[] },
  };
}

/**
 * Opens a server-side session scoped to one question. An authentication
 * failure from the token manager surfaces here as an `auth` ImaError.
 */
export class SessionInitializer {
  constructor(
    private readonly creds: ImaCredentials,
    private readonly tokens: TokenManager,
    private readonly connection: ImaConnection,
    private readonly log: Logger,
  ) {}

  async init(knowledgeBaseId?: string, signal?: AbortSignal): Promise<ImaSession> {
    if (!hasRequiredCredentials(this.creds)) {
      throw new ImaError('auth', 'Authentication failed - X-Ima-Cookie and X-Ima-Bkn are required');
    }
    if (!(await this.tokens.ensureValid(signal))) {
      if (signal?.aborted) throw new ImaError('aborted', 'Session initialization was cancelled');
      throw new ImaError('auth', 'Authentication failed - unable to obtain a valid token');
    }

    const kbId = knowledgeBaseId || this.creds.knowledgeBaseId;
    this.log.info({ knowledgeBaseId: kbId }, 'Initializing session');

    const { response, release } = await this.connection.post(INIT_SESSION_PATH, buildInitSessionBody(this.creds, kbId), {
      headers: buildHeaders(this.creds, 'application/json'),
      timeoutMs: this.creds.timeoutSeconds * 1000,
      signal,
    });
    let text: string;
    try {
      text = await readText(response);
    } finally {
      release();
    }

    if (response.status !== 200) {
      this.log.error({ status: response.status, body: text.slice(0, 500) }, 'Session initialization HTTP error');
      throw new ImaError('http', `init_session HTTP ${response.status}: ${text.slice(0, 500)}`, { status: response.status });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ImaError('upstream', `init_session returned malformed JSON: ${text.slice(0, 200)}`, { cause: err });
    }
    const parsed = initSessionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ImaError('upstream', `Unexpected init_session response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const { code, msg } = parsed.data;
    const id = parsed.data.session_id || parsed.data.session_info?.id;
    if (code !== 0 || !id) {
      this.log.error({ code, msg }, 'Session initialization rejected');
      throw new ImaError('auth', `Session initialization failed (code: ${code}): ${msg ?? ''}`, { code });
    }

    this.log.info({ sessionId: `${id.slice(0, 16)}...` }, 'Session initialized');
    return { id, initialized: true };
  }
}
