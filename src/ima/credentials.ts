import type { ImaCredentials } from './types.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/141.0.0.0 Safari/537.36';

const safeDecode = (value: string) => {
  try { return decodeURIComponent(value); } catch { return value; }
};

function matchMarker(source: string | undefined, pattern: RegExp): string | undefined {
  if (!source) return undefined;
  const m = source.match(pattern);
  return m ? m[1] : undefined;
}

export function hasRequiredCredentials(creds: ImaCredentials): boolean {
  return creds.xImaCookie.trim() !== '' && creds.xImaBkn.trim() !== '';
}

export function isTokenExpired(creds: ImaCredentials, now: number): boolean {
  if (creds.tokenIssuedAt === undefined || creds.tokenValidSeconds === undefined) return true;
  return now >= creds.tokenIssuedAt + creds.tokenValidSeconds * 1000;
}

export function parseUserId(creds: ImaCredentials): string | undefined {
  return (
    matchMarker(creds.xImaCookie, /IMA-UID=([^;]+)/) ??
    matchMarker(creds.cookies, /user_id=([a-f0-9]{16})/)
  );
}

/**
 * Finds refresh material in the cookie headers. Falls back to the access
 * token marker, then to a `refresh_token` entry in the raw cookie string.
 */
export function parseRefreshToken(creds: ImaCredentials): string | undefined {
  const candidate =
    matchMarker(creds.xImaCookie, /IMA-REFRESH-TOKEN=([^;]+)/) ??
    matchMarker(creds.xImaCookie, /IMA-TOKEN=([^;]+)/) ??
    matchMarker(creds.cookies, /refresh_token=([^;]+)/);
  return candidate === undefined ? undefined : safeDecode(candidate);
}

export function parseImaGuid(xImaCookie: string): string {
  return matchMarker(xImaCookie, /IMA-GUID=([^;]*)/) || 'default_guid';
}

export function parseCookieString(cookieString: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!cookieString) return out;
  for (const part of cookieString.split(';')) {
    const idx = part.indexOf('=');
    if (idx < 0) continue;
    const name = part.slice(0, idx).trim();
    if (name) out[name] = part.slice(idx + 1).trim();
  }
  return out;
}

export function buildCookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies).map(([k, v]) => `${k}=${v}`).join('; ');
}

export function withAccessToken(xImaCookie: string, token: string | undefined): string {
  if (!token) return xImaCookie;
  if (/IMA-TOKEN=[^;]+/.test(xImaCookie)) return xImaCookie.replace(/IMA-TOKEN=[^;]+/, `IMA-TOKEN=${token}`);
  return xImaCookie ? `${xImaCookie}; IMA-TOKEN=${token}` : `IMA-TOKEN=${token}`;
}

export function buildHeaders(creds: ImaCredentials, accept: 'application/json' | 'text/event-stream'): Record<string, string> {
  const headers: Record<string, string> = {
    'x-ima-cookie': withAccessToken(creds.xImaCookie, creds.currentToken),
    'x-ima-bkn': creds.xImaBkn,
    from_browser_ima: '1',
    extension_version: '999.999.999',
    'user-agent': USER_AGENT,
    accept,
    'content-type': 'application/json',
    'accept-language': 'zh-CN,zh;q=0.9,en;q=0.8,en-GB;q=0.7,en-US;q=0.6',
    'sec-fetch-dest': 'empty',
    'sec-fetch-mode': 'cors',
    'sec-fetch-site': 'same-origin',
    referer: 'https://ima.qq.com/wikis',
  };
  const cookie = buildCookieHeader(parseCookieString(creds.cookies));
  if (cookie) headers.cookie = cookie;
  if (creds.currentToken) headers.authorization = `Bearer ${creds.currentToken}`;
  return headers;
}
