/**
 * Gateway - Authentication
 *
 * Admin routes take `Authorization: Bearer <adminToken>`. Client routes
 * take an API key in `X-API-Key` or, failing that, as the bearer token.
 * Without a configured admin token every admin route is refused.
 */

import { timingSafeEqual } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import pino from 'pino';

export class GatewayAuth {
  private readonly adminToken: string | null;
  private readonly log: pino.Logger;

  constructor(adminToken: string | undefined, logger?: pino.Logger) {
    this.adminToken = adminToken && adminToken.length > 0 ? adminToken : null;
    this.log = logger ?? pino({ name: 'verigate:auth' });

    if (!this.adminToken) {
      this.log.warn('No admin token configured; admin routes are disabled');
    }
  }

  get adminEnabled(): boolean {
    return this.adminToken !== null;
  }

  /**
   * Validate an admin request's Authorization header.
   */
  validateAdmin(req: IncomingMessage): boolean {
    if (!this.adminToken) return false;

    const token = bearerToken(req);
    if (token === null) {
      this.logInvalidAttempt(req, 'Missing or malformed Authorization header');
      return false;
    }
    if (!this.isAdminToken(token)) {
      this.logInvalidAttempt(req, 'Invalid admin token');
      return false;
    }
    return true;
  }

  isAdminToken(token: string): boolean {
    if (!this.adminToken) return false;
    const a = Buffer.from(token);
    const b = Buffer.from(this.adminToken);
    return a.length === b.length && timingSafeEqual(a, b);
  }

  private logInvalidAttempt(req: IncomingMessage, reason: string): void {
    this.log.warn(
      { ip: req.socket.remoteAddress ?? 'unknown', method: req.method ?? 'UNKNOWN', url: req.url ?? '/' },
      `Invalid admin auth: ${reason}`,
    );
  }
}

/**
 * Token from `Authorization: Bearer <token>`, or null.
 */
export function bearerToken(req: IncomingMessage): string | null {
  const header = req.headers['authorization'];
  if (!header) return null;

  const parts = header.split(' ');
  if (parts.length !== 2 || parts[0]?.toLowerCase() !== 'bearer' || !parts[1]) {
    return null;
  }
  return parts[1];
}

/**
 * API key presented by a client request: `X-API-Key` first, then bearer.
 */
export function presentedApiKey(req: IncomingMessage): string | undefined {
  const header = req.headers['x-api-key'];
  const value = Array.isArray(header) ? header[0] : header;
  if (value && value.length > 0) return value;
  return bearerToken(req) ?? undefined;
}
