import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  postJson,
  readJson,
  stringField,
  CookieJar,
  TEST_PASSWORD,
  type TestContext,
} from './test-setup.js';
import {
  MESSAGE_REGISTERED,
  MESSAGE_EMAIL_VERIFIED,
  MESSAGE_EMAIL_VERIFICATION_PROCESSED,
  MESSAGE_VERIFICATION_RESENT,
} from '../../routes/auth/password.js';
import { MESSAGE_EMAIL_NOT_VERIFIED, MESSAGE_INVALID_CREDENTIALS } from '../../services/account-service.js';

describe('Registration and Email Verification', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  const alice = { username: 'alice', email: 'alice@example.com', password: TEST_PASSWORD };

  it('should register, verify and log in', async () => {
    const registerRes = await postJson(ctx, '/auth/register', alice);
    expect(registerRes.status).toBe(200);
    expect(await readJson(registerRes)).toEqual({ message: MESSAGE_REGISTERED });

    const token = ctx.mailer.lastToken('verification', 'alice@example.com');
    expect(token).toMatch(/^[0-9a-f]{64}$/);

    const verifyRes = await ctx.app.request(`/auth/verify-email?token=${token}`);
    expect(verifyRes.status).toBe(200);
    expect(await readJson(verifyRes)).toEqual({ message: MESSAGE_EMAIL_VERIFIED, verified: true });

    const loginRes = await postJson(ctx, '/auth/login', { email: alice.email, password: alice.password });
    expect(loginRes.status).toBe(200);

    const body = await readJson(loginRes);
    expect(body.user).toMatchObject({
      username: 'alice',
      email: 'alice@example.com',
      email_verified: true,
      auth_provider: 'password',
      profile_picture_url: null,
    });
    expect(stringField(body, 'token').split('.')).toHaveLength(3);

    const jar = new CookieJar();
    jar.store(loginRes);
    expect(jar.get('access-session')).toBe(body.token);
    expect(jar.get('refresh-session')).toBe(body.refresh_token);
  });

  it('should refuse login before verification', async () => {
    await postJson(ctx, '/auth/register', alice);

    const res = await postJson(ctx, '/auth/login', { email: alice.email, password: alice.password });

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: 'auth_failure', message: MESSAGE_EMAIL_NOT_VERIFIED });
  });

  it('should answer a duplicate registration like a new one', async () => {
    await postJson(ctx, '/auth/register', alice);

    const sameEmail = await postJson(ctx, '/auth/register', { ...alice, username: 'alice2' });
    const sameUsername = await postJson(ctx, '/auth/register', { ...alice, email: 'other@example.com' });

    expect(sameEmail.status).toBe(200);
    expect(await readJson(sameEmail)).toEqual({ message: MESSAGE_REGISTERED });
    expect(sameUsername.status).toBe(200);
    expect(await readJson(sameUsername)).toEqual({ message: MESSAGE_REGISTERED });

    expect(ctx.mailer.count('verification', 'alice@example.com')).toBe(1);
    expect(ctx.mailer.count('verification', 'other@example.com')).toBe(0);
  });

  it('should normalize the email address', async () => {
    await postJson(ctx, '/auth/register', { ...alice, email: '  Alice@Example.COM ' });

    expect(ctx.mailer.count('verification', 'alice@example.com')).toBe(1);
    expect(await ctx.storage.users.findByEmail('alice@example.com')).not.toBeNull();
  });

  it('should report invalid input as validation_failure', async () => {
    const shortPassword = await postJson(ctx, '/auth/register', { ...alice, password: 'short1' });
    expect(shortPassword.status).toBe(400);
    expect(await readJson(shortPassword)).toEqual({
      error: 'validation_failure',
      message: 'password: Password must be at least 8 characters',
    });

    const noDigit = await postJson(ctx, '/auth/register', { ...alice, password: 'onlyletters' });
    expect(await readJson(noDigit)).toEqual({
      error: 'validation_failure',
      message: 'password: Password must contain at least one letter and one number',
    });

    const badEmail = await postJson(ctx, '/auth/register', { ...alice, email: 'not-an-email' });
    expect(await readJson(badEmail)).toEqual({
      error: 'validation_failure',
      message: 'email: Invalid email format',
    });

    const badUsername = await postJson(ctx, '/auth/register', { ...alice, username: 'al' });
    expect(await readJson(badUsername)).toEqual({
      error: 'validation_failure',
      message: 'username: Username must be at least 3 characters',
    });

    expect(ctx.mailer.sent).toHaveLength(0);
  });

  it('should reject a malformed JSON body', async () => {
    const res = await ctx.app.request('/auth/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"email":',
    });

    expect(res.status).toBe(400);
    expect((await readJson(res)).error).toBe('validation_failure');
  });

  it('should accept a verification token only once', async () => {
    await postJson(ctx, '/auth/register', alice);
    const token = ctx.mailer.lastToken('verification', alice.email);

    await ctx.app.request(`/auth/verify-email?token=${token}`);
    const second = await ctx.app.request(`/auth/verify-email?token=${token}`);

    expect(second.status).toBe(200);
    expect(await readJson(second)).toEqual({ message: MESSAGE_EMAIL_VERIFICATION_PROCESSED, verified: false });
  });

  it('should answer unknown verification tokens with 200', async () => {
    const res = await ctx.app.request(`/auth/verify-email?token=${'0'.repeat(64)}`);

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ message: MESSAGE_EMAIL_VERIFICATION_PROCESSED, verified: false });
  });

  it('should reject an expired verification token', async () => {
    await postJson(ctx, '/auth/register', alice);
    const token = ctx.mailer.lastToken('verification', alice.email);

    ctx.clock.advance(24 * 60 * 60 * 1000 + 1);
    const res = await ctx.app.request(`/auth/verify-email?token=${token}`);

    expect(await readJson(res)).toEqual({ message: MESSAGE_EMAIL_VERIFICATION_PROCESSED, verified: false });
    const user = await ctx.storage.users.findByEmail(alice.email);
    expect(user?.emailVerified).toBe(false);
  });

  it('should resend verification and supersede the previous token', async () => {
    await postJson(ctx, '/auth/register', alice);
    const first = ctx.mailer.lastToken('verification', alice.email);

    const res = await postJson(ctx, '/auth/resend-verification', { email: alice.email });
    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ message: MESSAGE_VERIFICATION_RESENT });

    const second = ctx.mailer.lastToken('verification', alice.email);
    expect(second).not.toBe(first);

    const stale = await ctx.app.request(`/auth/verify-email?token=${first}`);
    expect((await readJson(stale)).verified).toBe(false);

    const fresh = await ctx.app.request(`/auth/verify-email?token=${second}`);
    expect((await readJson(fresh)).verified).toBe(true);
  });

  it('should not resend verification to verified or unknown accounts', async () => {
    await postJson(ctx, '/auth/register', alice);
    await ctx.app.request(`/auth/verify-email?token=${ctx.mailer.lastToken('verification', alice.email)}`);

    const verified = await postJson(ctx, '/auth/resend-verification', { email: alice.email });
    const unknown = await postJson(ctx, '/auth/resend-verification', { email: 'nobody@example.com' });

    expect(await readJson(verified)).toEqual({ message: MESSAGE_VERIFICATION_RESENT });
    expect(await readJson(unknown)).toEqual({ message: MESSAGE_VERIFICATION_RESENT });
    expect(ctx.mailer.sent).toHaveLength(1);
  });

  it('should give the same answer for a wrong password and an unknown email', async () => {
    await postJson(ctx, '/auth/register', alice);
    await ctx.app.request(`/auth/verify-email?token=${ctx.mailer.lastToken('verification', alice.email)}`);

    const wrongPassword = await postJson(ctx, '/auth/login', { email: alice.email, password: 'wrong-pass-9' });
    const unknownEmail = await postJson(ctx, '/auth/login', { email: 'nobody@example.com', password: 'wrong-pass-9' });

    expect(wrongPassword.status).toBe(401);
    expect(unknownEmail.status).toBe(401);
    expect(await readJson(wrongPassword)).toEqual({ error: 'auth_failure', message: MESSAGE_INVALID_CREDENTIALS });
    expect(await readJson(unknownEmail)).toEqual({ error: 'auth_failure', message: MESSAGE_INVALID_CREDENTIALS });
  });
});
