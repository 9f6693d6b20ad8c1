import { describe, expect, it } from 'vitest';
import {
  buildHeaders,
  hasRequiredCredentials,
  isTokenExpired,
  parseCookieString,
  parseImaGuid,
  parseRefreshToken,
  parseUserId,
  withAccessToken,
} from '../src/ima/credentials.js';
import { makeCreds } from './helpers.js';

describe('credentials', () => {
  it('requires both signing headers', () => {
    expect(hasRequiredCredentials(makeCreds())).toBe(true);
    expect(hasRequiredCredentials(makeCreds({ xImaBkn: '  ' }))).toBe(false);
    expect(hasRequiredCredentials(makeCreds({ xImaCookie: '' }))).toBe(false);
  });

  it('treats a token as expired at issue time plus validity', () => {
    expect(isTokenExpired(makeCreds(), 0)).toBe(true);
    const creds = makeCreds({ currentToken: 'tok', tokenIssuedAt: 1000, tokenValidSeconds: 10 });
    expect(isTokenExpired(creds, 10_999)).toBe(false);
    expect(isTokenExpired(creds, 11_000)).toBe(true);
  });

  it('finds the user id in either cookie source', () => {
    expect(parseUserId(makeCreds({ xImaCookie: 'IMA-GUID=g; IMA-UID=user-1' }))).toBe('user-1');
    expect(parseUserId(makeCreds({ cookies: 'a=1; user_id=0123456789abcdef' }))).toBe('0123456789abcdef');
    expect(parseUserId(makeCreds())).toBeUndefined();
  });

  it('prefers the refresh token marker and url-decodes it', () => {
    expect(parseRefreshToken(makeCreds({ xImaCookie: 'IMA-REFRESH-TOKEN=abc%3D; IMA-TOKEN=tok' }))).toBe('abc=');
    expect(parseRefreshToken(makeCreds({ xImaCookie: 'IMA-GUID=g; IMA-TOKEN=tok' }))).toBe('tok');
    expect(parseRefreshToken(makeCreds({ cookies: 'refresh_token=from-cookie' }))).toBe('from-cookie');
    expect(parseRefreshToken(makeCreds())).toBeUndefined();
  });

  it('falls back to a default guid', () => {
    expect(parseImaGuid('IMA-GUID=g1; x=y')).toBe('g1');
    expect(parseImaGuid('')).toBe('default_guid');
  });

  it('parses a cookie string', () => {
    expect(parseCookieString('a=1; b = 2 ; c')).toEqual({ a: '1', b: '2' });
    expect(parseCookieString(undefined)).toEqual({});
  });

  it('substitutes or appends the access token', () => {
    expect(withAccessToken('IMA-GUID=g; IMA-TOKEN=old', 'new')).toBe('IMA-GUID=g; IMA-TOKEN=new');
    expect(withAccessToken('IMA-GUID=g', 'new')).toBe('IMA-GUID=g; IMA-TOKEN=new');
    expect(withAccessToken('', 'new')).toBe('IMA-TOKEN=new');
    expect(withAccessToken('IMA-GUID=g', undefined)).toBe('IMA-GUID=g');
  });

  it('builds browser-like headers', () => {
    const headers = buildHeaders(
      makeCreds({ xImaCookie: 'IMA-GUID=g; IMA-TOKEN=old', currentToken: 'tok', cookies: 'a=1' }),
      'text/event-stream',
    );
    expect(headers['x-ima-cookie']).toBe('IMA-GUID=g; IMA-TOKEN=tok');
    expect(headers['x-ima-bkn']).toBe('test-bkn');
    expect(headers.accept).toBe('text/event-stream');
    expect(headers.authorization).toBe('Bearer tok');
    expect(headers.cookie).toBe('a=1');
    expect(headers.from_browser_ima).toBe('1');
  });

  it('omits cookie and authorization headers when absent', () => {
    const headers = buildHeaders(makeCreds(), 'application/json');
    expect(headers.cookie).toBeUndefined();
    expect(headers.authorization).toBeUndefined();
    expect(headers['x-ima-cookie']).toBe('IMA-GUID=test-guid');
  });
});
