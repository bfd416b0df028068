import type { Hono } from 'hono';
import * as jose from 'jose';
import { createAuthServer, createAuthServices, type AuthServerOptions, type AuthServices } from '../../app.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import type { IMailer } from '../../mail/mailer.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import { TokenBucketRateLimiter } from '../../middleware/rate-limiter.js';
import { OidcClient } from '../../federation/oidc-client.js';
import type { Clock } from '../../types/clock.js';
import type { AppEnv } from '../../types/hono.js';

/**
 * Test fixtures and helpers
 */

export const TEST_FRONTEND_URL = 'http://app.test';
export const TEST_PASSWORD = 'correct-horse-1';

// Controllable clock shared by services and storage calls
export class TestClock {
  private time: number;

  constructor(start: Date = new Date('2026-01-15T12:00:00Z')) {
    this.time = start.getTime();
  }

  readonly now: Clock = () => new Date(this.time);

  advance(ms: number): void {
    this.time += ms;
  }
}

export interface SentMail {
  kind: 'verification' | 'password_reset' | 'password_changed';
  to: string;
  username: string;
  token?: string;
}

// Mailer that records instead of sending
export class CapturingMailer implements IMailer {
  readonly sent: SentMail[] = [];

  async sendVerificationEmail(to: string, username: string, token: string): Promise<void> {
    this.sent.push({ kind: 'verification', to, username, token });
  }

  async sendPasswordResetEmail(to: string, username: string, token: string): Promise<void> {
    this.sent.push({ kind: 'password_reset', to, username, token });
  }

  async sendPasswordChangedEmail(to: string, username: string): Promise<void> {
    this.sent.push({ kind: 'password_changed', to, username });
  }

  count(kind: SentMail['kind'], to: string): number {
    return this.sent.filter((mail) => mail.kind === kind && mail.to === to).length;
  }

  lastToken(kind: SentMail['kind'], to: string): string {
    const mail = this.sent.filter((m) => m.kind === kind && m.to === to).pop();
    if (!mail?.token) {
      throw new Error(`No ${kind} mail with a token sent to ${to}`);
    }
    return mail.token;
  }
}

// Keeps cookies between app.request calls
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(res: Response): void {
    for (const header of res.headers.getSetCookie()) {
      const [pair = '', ...attributes] = header.split(';');
      const eq = pair.indexOf('=');
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      const expired = attributes.some((attribute) => attribute.trim().toLowerCase() === 'max-age=0');
      if (expired || value === '') {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  delete(name: string): void {
    this.cookies.delete(name);
  }

  header(): string {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}

export function withCookies(jar: CookieJar, method = 'GET', body?: unknown): RequestInit {
  if (body === undefined) {
    return { method, headers: { Cookie: jar.header() } };
  }
  return {
    method,
    headers: { Cookie: jar.header(), 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new Error('Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

export function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string') {
    throw new Error(`Expected "${key}" to be a string`);
  }
  return value;
}

export function locationOf(res: Response): URL {
  const location = res.headers.get('Location');
  if (!location) {
    throw new Error('Expected a Location header');
  }
  return new URL(location);
}

/**
 * Limits high enough that no test trips them unless it means to
 */
export function createGenerousLimiter(): TokenBucketRateLimiter {
  const limits = { ratePerSecond: 1000, burst: 1000 };
  return new TokenBucketRateLimiter({ tiers: { sensitive: limits, auth: limits, general: limits } });
}

export function testConfig(): AuthServerOptions['config'] {
  return {
    server: { port: 0, host: '127.0.0.1', environment: 'test', frontendUrl: TEST_FRONTEND_URL },
    secrets: { jwtSecret: 'test-secret', cookieEncryptionKey: 'test-cookie-key' },
    cookies: { domain: undefined },
    lifetimes: {
      accessTokenHours: 24,
      refreshTokenDays: 30,
      emailVerificationHours: 24,
      passwordResetHours: 1,
      oidcFlowMinutes: 10,
    },
    security: { passwordHashCost: 1024, timingFloorMs: 0 },
  };
}

/**
 * In-process stand-in for an OpenID Connect provider: signs ID tokens
 * with a local key and answers the token endpoint through a stubbed fetch.
 */
export class FakeIdentityProvider {
  readonly issuer = 'https://idp.test';
  readonly clientId = 'test-client';
  readonly tokenRequests: URLSearchParams[] = [];
  tokenEndpointStatus = 200;

  private claims: Record<string, unknown> = {};

  private constructor(
    private readonly privateKey: jose.KeyLike,
    private readonly jwks: jose.JWTVerifyGetKey,
    private readonly clock: TestClock
  ) {}

  static async create(clock: TestClock): Promise<FakeIdentityProvider> {
    const { publicKey, privateKey } = await jose.generateKeyPair('RS256');
    const jwk = await jose.exportJWK(publicKey);
    const jwks = jose.createLocalJWKSet({ keys: [{ ...jwk, kid: 'test-key', alg: 'RS256' }] });
    return new FakeIdentityProvider(privateKey, jwks, clock);
  }

  /**
   * Claims for the next ID token, as if the user approved with this identity
   */
  approve(claims: Record<string, unknown>): void {
    this.claims = claims;
  }

  readonly fetch: typeof fetch = async (_input, init) => {
    this.tokenRequests.push(new URLSearchParams(typeof init?.body === 'string' ? init.body : ''));
    if (this.tokenEndpointStatus !== 200) {
      return new Response('{"error":"invalid_grant"}', { status: this.tokenEndpointStatus });
    }
    const idToken = await this.signIdToken(this.claims);
    return new Response(
      JSON.stringify({ access_token: 'provider-access-token', token_type: 'Bearer', id_token: idToken }),
      { status: 200, headers: { 'Content-Type': 'application/json' } }
    );
  };

  async signIdToken(claims: Record<string, unknown>, overrides: { audience?: string; issuer?: string } = {}): Promise<string> {
    const issuedAt = Math.floor(this.clock.now().getTime() / 1000);
    return new jose.SignJWT(claims)
      .setProtectedHeader({ alg: 'RS256', kid: 'test-key' })
      .setIssuer(overrides.issuer ?? this.issuer)
      .setAudience(overrides.audience ?? this.clientId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + 600)
      .sign(this.privateKey);
  }

  client(): OidcClient {
    return new OidcClient({
      provider: {
        authorizationEndpoint: `${this.issuer}/authorize`,
        tokenEndpoint: `${this.issuer}/token`,
        jwksUri: `${this.issuer}/jwks`,
        issuers: [this.issuer],
        scopes: ['openid', 'email', 'profile'],
      },
      clientId: this.clientId,
      clientSecret: 'test-client-secret',
      redirectUrl: 'http://auth.test/auth/federated/callback',
      fetch: this.fetch,
      jwks: this.jwks,
      now: this.clock.now,
    });
  }
}

// Shared test context
export interface TestContext {
  app: Hono<AppEnv>;
  storage: MemoryStorage;
  services: AuthServices;
  mailer: CapturingMailer;
  clock: TestClock;
  limiter: TokenBucketRateLimiter;
  logger: Logger;
}

export interface TestContextOptions {
  limiter?: TokenBucketRateLimiter;
  oidc?: OidcClient;
  clock?: TestClock;
  config?: AuthServerOptions['config'];
}

// Setup function for tests
export function setupTestContext(options: TestContextOptions = {}): TestContext {
  const storage = createMemoryStorage();
  const mailer = new CapturingMailer();
  const clock = options.clock ?? new TestClock();
  const limiter = options.limiter ?? createGenerousLimiter();
  const logger = createLogger('silent');
  const config = options.config ?? testConfig();

  const services = createAuthServices({
    storage,
    mailer,
    logger,
    jwtSecret: config.secrets.jwtSecret,
    lifetimes: config.lifetimes,
    passwordHashCost: config.security.passwordHashCost,
    now: clock.now,
  });

  const app = createAuthServer({
    storage,
    services,
    logger,
    config,
    limiter,
    oidc: options.oidc,
    enableLogging: false,
    now: clock.now,
  });

  return { app, storage, services, mailer, clock, limiter, logger };
}

export function postJson(
  ctx: TestContext,
  path: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  return Promise.resolve(
    ctx.app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    })
  );
}

/**
 * Register through the API and follow the verification link
 */
export async function registerVerifiedUser(
  ctx: TestContext,
  user: { username: string; email: string; password?: string }
): Promise<void> {
  const password = user.password ?? TEST_PASSWORD;
  const res = await postJson(ctx, '/auth/register', { ...user, password });
  if (res.status !== 200) {
    throw new Error(`Registration failed with ${res.status}`);
  }
  const token = ctx.mailer.lastToken('verification', user.email);
  const verify = await ctx.app.request(`/auth/verify-email?token=${token}`);
  if (verify.status !== 200) {
    throw new Error(`Verification failed with ${verify.status}`);
  }
}

/**
 * Log in and keep the session cookies in `jar`
 */
export async function loginWithJar(
  ctx: TestContext,
  jar: CookieJar,
  email: string,
  password: string = TEST_PASSWORD
): Promise<Record<string, unknown>> {
  const res = await postJson(ctx, '/auth/login', { email, password });
  if (res.status !== 200) {
    throw new Error(`Login failed with ${res.status}`);
  }
  jar.store(res);
  return readJson(res);
}

export { jose };
