import type { Context } from 'hono';
import type { RefreshSessionMetadata } from '../services/refresh-session-service.js';
import { clientIp } from '../middleware/rate-limiter.js';

const MAX_DEVICE_INFO_LENGTH = 512;

/**
 * Device and address recorded on a new refresh session
 */
export function sessionMetadata(c: Context): RefreshSessionMetadata {
  const userAgent = c.req.header('User-Agent');
  const ip = clientIp(c);
  return {
    deviceInfo: userAgent ? userAgent.slice(0, MAX_DEVICE_INFO_LENGTH) : undefined,
    ipAddress: ip === 'unknown' ? undefined : ip,
  };
}
