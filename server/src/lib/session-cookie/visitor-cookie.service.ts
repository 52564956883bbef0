/**
 * Visitor Cookie Service
 * Signs and verifies the cookie that remembers a browser's chat identity
 * (vendor end-user id, generated display name and the conversation the
 * page last opened) across page loads.
 *
 * - JWT (HS256) with typ="visitor_session"
 * - TTL via SESSION_COOKIE_TTL_SECONDS
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { logger } from '../logger/structured-logger.js';

export const VISITOR_COOKIE_NAME = 'visitor_session';

export interface VisitorIdentity {
  endUserId?: string;
  displayName: string;
  conversationId?: string;
}

export interface VisitorCookieOptions {
  secret: string;
  ttlSeconds: number;
}

export function signVisitorCookie(identity: VisitorIdentity, options: VisitorCookieOptions): string {
  const payload = {
    displayName: identity.displayName,
    ...(identity.endUserId ? { endUserId: identity.endUserId } : {}),
    ...(identity.conversationId ? { conversationId: identity.conversationId } : {}),
    typ: 'visitor_session' as const,
  };

  return jwt.sign(payload, options.secret, {
    algorithm: 'HS256',
    expiresIn: options.ttlSeconds,
  });
}

/**
 * Returns the identity if valid, null if invalid/expired
 */
export function verifyVisitorCookie(token: string, secret: string): VisitorIdentity | null {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      clockTolerance: 5,
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      logger.debug({ reason: 'expired' }, '[VisitorCookie] Token expired');
      return null;
    }
    if (error instanceof jwt.JsonWebTokenError) {
      logger.debug({ reason: 'invalid_signature', message: error.message }, '[VisitorCookie] Token verification failed');
      return null;
    }
    throw error;
  }

  if (typeof decoded === 'string' || decoded.typ !== 'visitor_session') {
    logger.warn({ reason: 'invalid_typ' }, '[VisitorCookie] Token has invalid typ claim');
    return null;
  }

  const { displayName, endUserId, conversationId } = decoded;
  if (typeof displayName !== 'string' || !displayName) {
    logger.warn({ reason: 'missing_displayName' }, '[VisitorCookie] Token missing displayName');
    return null;
  }

  return {
    displayName,
    ...(typeof endUserId === 'string' && endUserId ? { endUserId } : {}),
    ...(typeof conversationId === 'string' && conversationId ? { conversationId } : {}),
  };
}

/**
 * Parse cookie header and extract a named cookie
 */
export function extractCookieFromHeader(cookieHeader: string | undefined, name: string = VISITOR_COOKIE_NAME): string | null {
  if (!cookieHeader) {
    return null;
  }

  // Format: "name1=value1; name2=value2"
  for (const cookie of cookieHeader.split(';')) {
    const separator = cookie.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const cookieName = cookie.slice(0, separator).trim();
    const value = cookie.slice(separator + 1).trim();
    if (cookieName === name && value) {
      try {
        return decodeURIComponent(value);
      } catch {
        logger.debug({ cookie: name }, '[VisitorCookie] Cookie value is not valid URI encoding');
        return null;
      }
    }
  }

  return null;
}
