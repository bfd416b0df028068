import { createRemoteJWKSet, jwtVerify, type JWTVerifyGetKey } from 'jose';
import { z } from 'zod';
import type { OidcFlowState } from '../types/token.js';
import { type Clock, systemClock } from '../types/clock.js';
import { ApiError } from '../errors/api-error.js';
import { generateRandomBase64Url, generateCodeVerifier } from '../crypto/random.js';
import { generateCodeChallenge } from '../crypto/pkce.js';
import { constantTimeCompare } from '../crypto/hash.js';
import type { ProviderConfig } from './providers.js';

/**
 * Token response from identity provider
 */
const tokenResponseSchema = z.object({
  id_token: z.string().min(1),
  access_token: z.string().optional(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

const idTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  email_verified: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
  name: z.string().optional(),
  picture: z.string().optional(),
  nonce: z.string().optional(),
});

/**
 * Identity asserted by a verified ID token
 */
export interface FederatedIdentity {
  externalId: string;
  email: string;
  emailVerified: boolean;
  name?: string;
  picture?: string;
}

export interface OidcClientOptions {
  provider: ProviderConfig;
  clientId: string;
  clientSecret: string;
  redirectUrl: string;
  fetch?: typeof fetch;
  /** Key source for ID token signatures; the provider's JWKS endpoint by default */
  jwks?: JWTVerifyGetKey;
  now?: Clock;
}

/**
 * Relying-party side of the authorization code flow with PKCE
 */
export class OidcClient {
  private readonly provider: ProviderConfig;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly redirectUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly jwks: JWTVerifyGetKey;
  private readonly now: Clock;

  constructor(options: OidcClientOptions) {
    this.provider = options.provider;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.redirectUrl = options.redirectUrl;
    this.fetchFn = options.fetch ?? fetch;
    this.jwks = options.jwks ?? createRemoteJWKSet(new URL(options.provider.jwksUri));
    this.now = options.now ?? systemClock;
  }

  /**
   * Build the provider redirect and the state to keep until the callback
   */
  createAuthorizationRequest(): { url: string; flow: OidcFlowState } {
    const flow: OidcFlowState = {
      csrfToken: generateRandomBase64Url(32),
      nonce: generateRandomBase64Url(32),
      codeVerifier: generateCodeVerifier(),
      issuedAt: this.now().getTime(),
    };

    const authUrl = new URL(this.provider.authorizationEndpoint);
    authUrl.searchParams.set('response_type', 'code');
    authUrl.searchParams.set('client_id', this.clientId);
    authUrl.searchParams.set('redirect_uri', this.redirectUrl);
    authUrl.searchParams.set('scope', this.provider.scopes.join(' '));
    authUrl.searchParams.set('state', flow.csrfToken);
    authUrl.searchParams.set('nonce', flow.nonce);
    authUrl.searchParams.set('code_challenge', generateCodeChallenge(flow.codeVerifier));
    authUrl.searchParams.set('code_challenge_method', 'S256');

    return { url: authUrl.toString(), flow };
  }

  /**
   * Exchange an authorization code for the provider's ID token
   */
  async exchangeCode(code: string, codeVerifier: string): Promise<string> {
    const tokenParams = new URLSearchParams();
    tokenParams.set('grant_type', 'authorization_code');
    tokenParams.set('code', code);
    tokenParams.set('redirect_uri', this.redirectUrl);
    tokenParams.set('client_id', this.clientId);
    tokenParams.set('client_secret', this.clientSecret);
    tokenParams.set('code_verifier', codeVerifier);

    let response: Response;
    try {
      response = await this.fetchFn(this.provider.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: tokenParams.toString(),
      });
    } catch (err) {
      throw ApiError.providerFailure('Token exchange failed', err);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw ApiError.providerFailure(
        'Failed to exchange authorization code',
        new Error(`Token endpoint answered ${response.status}: ${body.slice(0, 200)}`)
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw ApiError.providerFailure('Malformed token response', err);
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw ApiError.providerFailure('No ID token in token response', parsed.error);
    }
    return parsed.data.id_token;
  }

  /**
   * Check signature, issuer, audience, expiry and nonce of an ID token
   */
  async verifyIdToken(idToken: string, expectedNonce: string): Promise<FederatedIdentity> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(idToken, this.jwks, {
        issuer: this.provider.issuers,
        audience: this.clientId,
        currentDate: this.now(),
      }));
    } catch {
      throw ApiError.authFailure('Invalid ID token');
    }

    const claims = idTokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw ApiError.authFailure('Invalid ID token');
    }
    if (!claims.data.nonce || !constantTimeCompare(claims.data.nonce, expectedNonce)) {
      throw ApiError.authFailure('Invalid ID token');
    }

    const { sub, email, email_verified, name, picture } = claims.data;
    return {
      externalId: sub,
      email: email.trim().toLowerCase(),
      emailVerified: email_verified === true || email_verified === 'true',
      name,
      picture,
    };
  }
}
