import type { OidcConfig } from '../config/index.js';
import { OIDC_SCOPES } from '../config/constants.js';

/**
 * Endpoints and issuer of an OpenID Connect provider
 */
export interface ProviderConfig {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  jwksUri: string;
  /** Every `iss` value the provider is known to put in ID tokens */
  issuers: string[];
  scopes: readonly string[];
}

/**
 * Provider templates with pre-configured endpoints
 */
export const providerTemplates = {
  google: {
    authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenEndpoint: 'https://oauth2.googleapis.com/token',
    jwksUri: 'https://www.googleapis.com/oauth2/v3/certs',
    issuers: ['https://accounts.google.com', 'accounts.google.com'],
    scopes: OIDC_SCOPES,
  },
} satisfies Record<string, ProviderConfig>;

/**
 * Resolve provider endpoints from configuration.
 * Explicit endpoints override the template's.
 */
export function getProviderConfig(oidc: OidcConfig): ProviderConfig {
  const template: Partial<ProviderConfig> = oidc.provider === 'google' ? providerTemplates.google : {};

  const authorizationEndpoint = oidc.authorizationEndpoint ?? template.authorizationEndpoint;
  const tokenEndpoint = oidc.tokenEndpoint ?? template.tokenEndpoint;
  const jwksUri = oidc.jwksUri ?? template.jwksUri;
  const issuers = oidc.issuer ? [oidc.issuer] : template.issuers;

  if (!authorizationEndpoint || !tokenEndpoint || !jwksUri || !issuers) {
    throw new Error(
      'OIDC_ISSUER, OIDC_AUTHORIZATION_ENDPOINT, OIDC_TOKEN_ENDPOINT and OIDC_JWKS_URI are required for generic_oidc'
    );
  }

  return {
    authorizationEndpoint,
    tokenEndpoint,
    jwksUri,
    issuers,
    scopes: template.scopes ?? OIDC_SCOPES,
  };
}
