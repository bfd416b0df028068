import type { Context } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import {
  COOKIE_ACCESS_SESSION,
  COOKIE_REFRESH_SESSION,
  COOKIE_OIDC_FLOW,
} from '../config/constants.js';
import type { Environment } from '../config/index.js';

export interface CookieSettings {
  secure: boolean;
  domain?: string;
  refreshSameSite: 'Strict' | 'Lax';
}

export function createCookieSettings(environment: Environment, domain?: string): CookieSettings {
  const development = environment === 'development';
  return {
    secure: !development,
    domain,
    refreshSameSite: development ? 'Lax' : 'Strict',
  };
}

function baseOptions(settings: CookieSettings) {
  return {
    path: '/',
    httpOnly: true,
    secure: settings.secure,
    ...(settings.domain ? { domain: settings.domain } : {}),
  };
}

export function setSessionCookies(
  c: Context,
  settings: CookieSettings,
  session: { accessToken: string; accessMaxAge: number; refreshSecret: string; refreshMaxAge: number }
): void {
  setCookie(c, COOKIE_ACCESS_SESSION, session.accessToken, {
    ...baseOptions(settings),
    sameSite: 'Lax',
    maxAge: session.accessMaxAge,
  });
  setCookie(c, COOKIE_REFRESH_SESSION, session.refreshSecret, {
    ...baseOptions(settings),
    sameSite: settings.refreshSameSite,
    maxAge: session.refreshMaxAge,
  });
}

export function clearSessionCookies(c: Context, settings: CookieSettings): void {
  deleteCookie(c, COOKIE_ACCESS_SESSION, baseOptions(settings));
  deleteCookie(c, COOKIE_REFRESH_SESSION, baseOptions(settings));
}

export function getRefreshCookie(c: Context): string | undefined {
  return getCookie(c, COOKIE_REFRESH_SESSION) || undefined;
}

export function setFlowCookie(c: Context, settings: CookieSettings, sealed: string, maxAge: number): void {
  setCookie(c, COOKIE_OIDC_FLOW, sealed, {
    ...baseOptions(settings),
    sameSite: 'Lax',
    maxAge,
  });
}

export function getFlowCookie(c: Context): string | undefined {
  return getCookie(c, COOKIE_OIDC_FLOW) || undefined;
}

export function clearFlowCookie(c: Context, settings: CookieSettings): void {
  deleteCookie(c, COOKIE_OIDC_FLOW, baseOptions(settings));
}
