import { describe, expect, it } from 'vitest';
import { ImaConnection } from '../src/ima/connection.js';
import { REFRESH_PATH, TokenManager } from '../src/ima/tokenManager.js';
import type { ImaCredentials } from '../src/ima/types.js';
import { BASE_URL, fakeFetch, jsonResponse, makeCreds, silentLogger, type Route } from './helpers.js';

const NOW = 50_000;
const REFRESHABLE = 'IMA-GUID=test-guid; IMA-UID=u1; IMA-REFRESH-TOKEN=r1';

function setup(creds: ImaCredentials, refresh?: Route | Route[]) {
  const fake = fakeFetch(refresh ? { [REFRESH_PATH]: refresh } : {});
  const connection = new ImaConnection(BASE_URL, silentLogger, { fetchImpl: fake.fetchImpl });
  const tokens = new TokenManager(creds, connection, silentLogger, () => NOW);
  return { tokens, fake, creds };
}

describe('TokenManager.ensureValid', () => {
  it('fails without the signing headers', async () => {
    const { tokens, fake } = setup(makeCreds({ xImaBkn: '' }));
    expect(await tokens.ensureValid()).toBe(false);
    expect(fake.calls).toHaveLength(0);
  });

  it('keeps an unexpired token', async () => {
    const { tokens, fake } = setup(makeCreds({ currentToken: 'tok', tokenIssuedAt: NOW - 1000, tokenValidSeconds: 60 }));
    expect(tokens.isExpired()).toBe(false);
    expect(await tokens.ensureValid()).toBe(true);
    expect(fake.calls).toHaveLength(0);
  });

  it('falls back to cookie authentication without refresh material', async () => {
    const { tokens, fake } = setup(makeCreds());
    expect(await tokens.ensureValid()).toBe(true);
    expect(fake.calls).toHaveLength(0);
  });

  it('refreshes an expired token', async () => {
    const { tokens, fake, creds } = setup(makeCreds({ xImaCookie: REFRESHABLE }), () =>
      jsonResponse({ code: 0, token: 'new-token', token_valid_time: '3600' }),
    );
    expect(await tokens.ensureValid()).toBe(true);
    expect(fake.calls[0]?.body).toEqual({ user_id: 'u1', refresh_token: 'r1', token_type: 14 });
    expect(creds).toMatchObject({ currentToken: 'new-token', tokenValidSeconds: 3600, tokenIssuedAt: NOW });
    expect(creds.updatedAt?.getTime()).toBe(NOW);
    expect(tokens.isExpired()).toBe(false);
  });
});

describe('TokenManager.refresh', () => {
  it('defaults the validity window', async () => {
    const { tokens, creds } = setup(makeCreds({ xImaCookie: REFRESHABLE }), () => jsonResponse({ code: 0, token: 't' }));
    expect(await tokens.refresh()).toBe(true);
    expect(creds.tokenValidSeconds).toBe(7200);
  });

  it('uses configured refresh material before the cookie', async () => {
    const { tokens, fake } = setup(makeCreds({ userId: 'cfg-user', refreshToken: 'cfg-refresh' }), () =>
      jsonResponse({ code: 0, token: 't' }),
    );
    expect(await tokens.refresh()).toBe(true);
    expect(fake.calls[0]?.body).toMatchObject({ user_id: 'cfg-user', refresh_token: 'cfg-refresh' });
  });

  it('reports a rejected refresh', async () => {
    const { tokens, creds } = setup(makeCreds({ xImaCookie: REFRESHABLE, currentToken: 'old' }), () =>
      jsonResponse({ code: 600001, msg: 'login expired' }),
    );
    expect(await tokens.refresh()).toBe(false);
    expect(creds.currentToken).toBe('old');
  });

  it('reports HTTP errors, malformed bodies and network failures', async () => {
    const creds = makeCreds({ xImaCookie: REFRESHABLE });
    expect(await setup(creds, () => jsonResponse('oops', 500, 'text/plain')).tokens.refresh()).toBe(false);
    expect(await setup(creds, () => jsonResponse('not json', 200, 'text/plain')).tokens.refresh()).toBe(false);
    expect(
      await setup(creds, () => {
        throw new Error('connection reset');
      }).tokens.refresh(),
    ).toBe(false);
    expect(creds.currentToken).toBeUndefined();
  });

  it('does not call the endpoint without refresh material', async () => {
    const { tokens, fake } = setup(makeCreds());
    expect(await tokens.refresh()).toBe(false);
    expect(fake.calls).toHaveLength(0);
  });
});
