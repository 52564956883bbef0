/**
 * Conversation Ownership Validator
 * A page may only act on conversations started for its own visitor identity
 * (same vendor end-user id as the signed visitor cookie).
 */

import { logger } from '../../lib/logger/structured-logger.js';
import {
  extractCookieFromHeader,
  verifyVisitorCookie,
  type VisitorIdentity,
} from '../../lib/session-cookie/visitor-cookie.service.js';
import type { ChatSession } from './chat-session.js';
import type { ChatSessionRegistry } from './chat-session.registry.js';

export type OwnershipFailureReason = 'no_identity' | 'conversation_not_found' | 'owner_mismatch';

export type OwnershipValidationResult =
  | { valid: true; session: ChatSession }
  | { valid: false; reason: OwnershipFailureReason };

export class ConversationOwnershipValidator {
  constructor(
    private readonly registry: ChatSessionRegistry,
    private readonly cookieSecret: string
  ) { }

  identify(cookieHeader: string | undefined): VisitorIdentity | null {
    const token = extractCookieFromHeader(cookieHeader);
    return token ? verifyVisitorCookie(token, this.cookieSecret) : null;
  }

  validate(conversationId: string, cookieHeader: string | undefined): OwnershipValidationResult {
    return this.validateIdentity(conversationId, this.identify(cookieHeader));
  }

  validateIdentity(conversationId: string, identity: VisitorIdentity | null): OwnershipValidationResult {
    if (!identity?.endUserId) {
      logger.debug({ conversationId, reason: 'no_identity' }, '[Ownership] No visitor identity');
      return { valid: false, reason: 'no_identity' };
    }

    const session = this.registry.get(conversationId);
    if (!session) {
      return { valid: false, reason: 'conversation_not_found' };
    }

    if (session.endUserId !== identity.endUserId) {
      logger.warn({
        conversationId,
        visitorEndUserId: identity.endUserId,
        ownerEndUserId: session.endUserId,
        reason: 'owner_mismatch',
      }, '[Ownership] Visitor does not own conversation');
      return { valid: false, reason: 'owner_mismatch' };
    }

    return { valid: true, session };
  }
}
