import type { Logger } from 'pino';
import type { ImaConnection } from './connection.js';
import { readText } from './connection.js';
import {
  buildHeaders,
  hasRequiredCredentials,
  isTokenExpired,
  parseRefreshToken,
  parseUserId,
} from './credentials.js';
import { errorMessage, isImaError } from './errors.js';
import { tokenRefreshResponseSchema, type ImaCredentials } from './types.js';

export const REFRESH_PATH = '/cgi-bin/auth_login/refresh';
export const DEFAULT_TOKEN_VALID_SECONDS = 7200;
const TOKEN_TYPE = 14;

/**
 * Tracks access-token expiry on the credential bundle and renews it from the
 * refresh endpoint. Neither `refresh` nor `ensureValid` throws; a cancelled
 * refresh resolves to false.
 */
export class TokenManager {
  constructor(
    private readonly creds: ImaCredentials,
    private readonly connection: ImaConnection,
    private readonly log: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  isExpired(): boolean {
    return isTokenExpired(this.creds, this.now());
  }

  /** Fills userId/refreshToken from cookie material when they are not set. */
  private recoverRefreshMaterial(): boolean {
    if (!this.creds.userId) this.creds.userId = parseUserId(this.creds);
    if (!this.creds.refreshToken) this.creds.refreshToken = parseRefreshToken(this.creds);
    return Boolean(this.creds.userId && this.creds.refreshToken);
  }

  async ensureValid(signal?: AbortSignal): Promise<boolean> {
    if (!hasRequiredCredentials(this.creds)) {
      this.log.error('X-Ima-Cookie and X-Ima-Bkn must both be set');
      return false;
    }
    if (!this.isExpired()) return true;

    if (!this.recoverRefreshMaterial()) {
      // No refresh material: the cookie headers alone authenticate.
      this.log.info('No refresh token available, using cookie authentication');
      return true;
    }
    this.log.info('Access token expired, refreshing');
    return this.refresh(signal);
  }

  async refresh(signal?: AbortSignal): Promise<boolean> {
    if (!hasRequiredCredentials(this.creds)) return false;
    if (!this.recoverRefreshMaterial()) {
      this.log.warn('Token refresh needs a user id and a refresh token');
      return false;
    }

    const body = {
      user_id: this.creds.userId,
      refresh_token: this.creds.refreshToken,
      token_type: TOKEN_TYPE,
    };

    try {
      const { response, release } = await this.connection.post(REFRESH_PATH, body, {
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
        this.log.error({ status: response.status, body: text.slice(0, 200) }, 'Token refresh request failed');
        return false;
      }

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (err) {
        this.log.error({ err: errorMessage(err), body: text.slice(0, 200) }, 'Token refresh returned malformed JSON');
        return false;
      }

      const parsed = tokenRefreshResponseSchema.safeParse(json);
      if (!parsed.success) {
        this.log.error({ issues: parsed.error.issues }, 'Unexpected token refresh response');
        return false;
      }
      const data = parsed.data;
      if (data.code !== 0 || !data.token) {
        this.log.warn({ code: data.code, msg: data.msg, type: data.type, causedBy: data.caused_by }, 'Token refresh rejected');
        return false;
      }

      const validSeconds = Number(data.token_valid_time ?? DEFAULT_TOKEN_VALID_SECONDS);
      const issuedAt = this.now();
      this.creds.currentToken = data.token;
      this.creds.tokenValidSeconds = Number.isFinite(validSeconds) && validSeconds > 0 ? validSeconds : DEFAULT_TOKEN_VALID_SECONDS;
      this.creds.tokenIssuedAt = issuedAt;
      this.creds.updatedAt = new Date(issuedAt);
      this.log.info({ validSeconds: this.creds.tokenValidSeconds }, 'Access token refreshed');
      return true;
    } catch (err) {
      if (isImaError(err, 'aborted')) {
        this.log.warn('Token refresh cancelled');
        return false;
      }
      this.log.error({ err }, 'Token refresh failed');
      return false;
    }
  }
}
