export type ImaErrorKind =
  | 'input'
  | 'auth'
  | 'http'
  | 'non_stream'
  | 'upstream'
  | 'network'
  | 'timeout'
  | 'aborted';

export class ImaError extends Error {
  readonly kind: ImaErrorKind;
  readonly status?: number;
  readonly code?: number;

  constructor(kind: ImaErrorKind, message: string, details: { status?: number; code?: number; cause?: unknown } = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ImaError';
    this.kind = kind;
    this.status = details.status;
    this.code = details.code;
  }
}

// Upstream codes observed for an expired login.
const LOGIN_EXPIRED_CODES = new Set([600001, 600002, 600003]);

// Fallback for errors that did not come through ImaError. The upstream
// answers an expired login with a plain JSON body instead of a stream, so
// "expected an event stream" counts as an auth signal too.
const LOGIN_EXPIRED_PATTERNS = [
  'session initialization failed',
  'authentication failed',
  'login expired',
  'token expired',
  'code: 600001',
  'code: 600002',
  'code: 600003',
  'unauthorized',
  '401',
  'expected an event stream',
];

export function isImaError(err: unknown, kind?: ImaErrorKind): err is ImaError {
  return err instanceof ImaError && (kind === undefined || err.kind === kind);
}

export function isAuthExpiredError(err: unknown): boolean {
  if (err instanceof ImaError) {
    if (err.kind === 'auth' || err.kind === 'non_stream') return true;
    if (err.status === 401) return true;
    return err.code !== undefined && LOGIN_EXPIRED_CODES.has(err.code);
  }
  const text = errorMessage(err).toLowerCase();
  return LOGIN_EXPIRED_PATTERNS.some(p => text.includes(p));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
