/**
 * Session Controller
 *
 * Endpoints (mounted under /api/v1/session):
 * - POST /reset - forget the visitor identity and close its chat session
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { createValidationError } from '../../middleware/error.middleware.js';
import { VISITOR_COOKIE_NAME } from '../../lib/session-cookie/visitor-cookie.service.js';
import type { ConversationOwnershipValidator } from '../../services/chat/conversation-ownership.validator.js';
import type { ConversationRelayService } from '../../services/relay/conversation-relay.service.js';

const ResetSchema = z.object({
  conversationId: z.string().min(1).optional(),
}).default({});

export function createSessionRouter(
  relay: ConversationRelayService,
  ownership: ConversationOwnershipValidator
): Router {
  const router = Router();

  // The cookie is always cleared; the session only closes for its own visitor
  router.post('/reset', (req: Request, res: Response) => {
    const parsed = ResetSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw createValidationError('Invalid reset request', parsed.error.issues);
    }

    const { conversationId } = parsed.data;
    let closed = false;
    if (conversationId) {
      const result = ownership.validate(conversationId, req.headers.cookie);
      closed = result.valid && relay.closeConversation(conversationId);
      if (!result.valid) {
        req.log.debug({ conversationId, reason: result.reason }, '[Session] Reset left conversation open');
      }
    }

    req.log.info({ conversationId, closed }, '[Session] Visitor identity reset');

    res.clearCookie(VISITOR_COOKIE_NAME, { path: '/' });
    res.status(204).end();
  });

  return router;
}
