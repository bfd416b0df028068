import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  registerVerifiedUser,
  postJson,
  readJson,
  locationOf,
  withCookies,
  CookieJar,
  FakeIdentityProvider,
  TestClock,
  TEST_FRONTEND_URL,
  TEST_PASSWORD,
  type TestContext,
} from './test-setup.js';
import { generateCodeChallenge } from '../../crypto/pkce.js';

describe('Federated Login', () => {
  let ctx: TestContext;
  let idp: FakeIdentityProvider;
  let jar: CookieJar;

  beforeEach(async () => {
    const clock = new TestClock();
    idp = await FakeIdentityProvider.create(clock);
    ctx = setupTestContext({ oidc: idp.client(), clock });
    jar = new CookieJar();
  });

  /**
   * Start a flow and return the state and nonce the provider would see
   */
  async function startFlow(): Promise<{ state: string; nonce: string; codeChallenge: string }> {
    const res = await ctx.app.request('/auth/federated');
    expect(res.status).toBe(302);
    jar.store(res);

    const params = locationOf(res).searchParams;
    return {
      state: params.get('state') ?? '',
      nonce: params.get('nonce') ?? '',
      codeChallenge: params.get('code_challenge') ?? '',
    };
  }

  function callback(query: string): Promise<Response> {
    return Promise.resolve(ctx.app.request(`/auth/federated/callback?${query}`, withCookies(jar)));
  }

  const grace = {
    sub: 'idp-user-1',
    email: 'Grace@Example.com',
    email_verified: true,
    name: 'Grace Hopper',
    picture: 'https://img.test/grace.png',
  };

  it('should redirect to the provider with PKCE and a flow cookie', async () => {
    const res = await ctx.app.request('/auth/federated');

    expect(res.status).toBe(302);
    const url = locationOf(res);
    expect(`${url.origin}${url.pathname}`).toBe('https://idp.test/authorize');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('redirect_uri')).toBe('http://auth.test/auth/federated/callback');
    expect(url.searchParams.get('scope')).toBe('openid email profile');
    expect(url.searchParams.get('code_challenge_method')).toBe('S256');

    jar.store(res);
    expect(jar.get('oidc-flow')).toBeDefined();
  });

  it('should create an account and open a session', async () => {
    const { state, nonce, codeChallenge } = await startFlow();
    idp.approve({ ...grace, nonce });

    const res = await callback(`code=test-code&state=${state}`);

    expect(res.status).toBe(302);
    expect(res.headers.get('Location')).toBe(`${TEST_FRONTEND_URL}/auth/complete`);

    jar.store(res);
    expect(jar.get('oidc-flow')).toBeUndefined();
    expect(jar.get('refresh-session')).toBeDefined();

    const tokenRequest = idp.tokenRequests[0];
    expect(tokenRequest?.get('grant_type')).toBe('authorization_code');
    expect(tokenRequest?.get('code')).toBe('test-code');
    expect(generateCodeChallenge(tokenRequest?.get('code_verifier') ?? '')).toBe(codeChallenge);

    const me = await ctx.app.request('/auth/me', withCookies(jar));
    expect((await readJson(me)).user).toMatchObject({
      username: 'Grace_Hopper',
      email: 'grace@example.com',
      email_verified: true,
      auth_provider: 'federated',
      profile_picture_url: 'https://img.test/grace.png',
    });
  });

  it('should sign the same identity in to the same account', async () => {
    const first = await startFlow();
    idp.approve({ ...grace, nonce: first.nonce });
    await callback(`code=c1&state=${first.state}`);

    const second = await startFlow();
    idp.approve({ ...grace, picture: 'https://img.test/grace-2.png', nonce: second.nonce });
    const res = await callback(`code=c2&state=${second.state}`);
    expect(res.status).toBe(302);

    const user = await ctx.storage.users.findByExternalId('idp-user-1');
    expect(user?.username).toBe('Grace_Hopper');
    expect(user?.profilePictureUrl).toBe('https://img.test/grace-2.png');
  });

  it('should link to an existing password account with the same email', async () => {
    await registerVerifiedUser(ctx, { username: 'grace', email: 'grace@example.com' });
    const existing = await ctx.storage.users.findByEmail('grace@example.com');

    const { state, nonce } = await startFlow();
    idp.approve({ ...grace, nonce });
    const res = await callback(`code=test-code&state=${state}`);
    expect(res.status).toBe(302);

    const linked = await ctx.storage.users.findByExternalId('idp-user-1');
    expect(linked?.id).toBe(existing?.id);
    expect(linked?.username).toBe('grace');
    expect(linked?.credentials.kind).toBe('linked');

    const passwordLogin = await postJson(ctx, '/auth/login', { email: 'grace@example.com', password: TEST_PASSWORD });
    expect(passwordLogin.status).toBe(200);
  });

  it('should pick the next free username', async () => {
    await registerVerifiedUser(ctx, { username: 'Grace_Hopper', email: 'someone@example.com' });

    const { state, nonce } = await startFlow();
    idp.approve({ ...grace, nonce });
    await callback(`code=test-code&state=${state}`);

    const user = await ctx.storage.users.findByExternalId('idp-user-1');
    expect(user?.username).toBe('Grace_Hopper2');
  });

  it('should reject a callback without a flow cookie', async () => {
    const { state, nonce } = await startFlow();
    idp.approve({ ...grace, nonce });
    jar.delete('oidc-flow');

    const res = await callback(`code=test-code&state=${state}`);

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: 'auth_failure', message: 'No authentication flow in progress' });
    expect(idp.tokenRequests).toHaveLength(0);
  });

  it('should reject a state mismatch', async () => {
    const { nonce } = await startFlow();
    idp.approve({ ...grace, nonce });

    const res = await callback('code=test-code&state=forged-state');

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: 'auth_failure', message: 'Invalid authentication state' });
  });

  it('should clear the flow cookie even when the callback fails', async () => {
    const { nonce } = await startFlow();
    idp.approve({ ...grace, nonce });

    const res = await callback('code=test-code&state=forged-state');

    expect(res.status).toBe(401);
    expect(res.headers.getSetCookie().some((header) => header.startsWith('oidc-flow=;'))).toBe(true);
  });

  it('should reject a flow older than its lifetime', async () => {
    const { state, nonce } = await startFlow();
    idp.approve({ ...grace, nonce });

    ctx.clock.advance(10 * 60 * 1000 + 1);
    const res = await callback(`code=test-code&state=${state}`);

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: 'auth_failure', message: 'No authentication flow in progress' });
  });

  it('should reject an email the provider has not verified', async () => {
    const { state, nonce } = await startFlow();
    idp.approve({ ...grace, email_verified: false, nonce });

    const res = await callback(`code=test-code&state=${state}`);

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: 'auth_failure',
      message: 'Email not verified by identity provider',
    });
    expect(await ctx.storage.users.findByEmail('grace@example.com')).toBeNull();
  });

  it('should reject an ID token with the wrong nonce', async () => {
    const { state } = await startFlow();
    idp.approve({ ...grace, nonce: 'some-other-nonce' });

    const res = await callback(`code=test-code&state=${state}`);

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: 'auth_failure', message: 'Invalid ID token' });
  });

  it('should report a failing token endpoint as provider_failure', async () => {
    const { state, nonce } = await startFlow();
    idp.approve({ ...grace, nonce });
    idp.tokenEndpointStatus = 500;

    const res = await callback(`code=test-code&state=${state}`);

    expect(res.status).toBe(502);
    expect(await readJson(res)).toEqual({
      error: 'provider_failure',
      message: 'Failed to exchange authorization code',
    });
  });

  it('should reject a provider error', async () => {
    await startFlow();

    const res = await callback('error=access_denied');

    expect(res.status).toBe(401);
    expect((await readJson(res)).error).toBe('auth_failure');
  });

  it('should require code and state', async () => {
    await startFlow();

    const res = await callback('state=abc');

    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({ error: 'validation_failure', message: 'Missing authorization code' });
  });

  it('should answer 404 when federation is not configured', async () => {
    const plain = setupTestContext();

    const initiate = await plain.app.request('/auth/federated');
    const done = await plain.app.request('/auth/federated/callback?code=a&state=b');

    expect(initiate.status).toBe(404);
    expect(done.status).toBe(404);
  });
});
