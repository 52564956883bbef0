/**
 * API v1 Router Aggregator
 *
 * Route Structure:
 * - /api/v1/conversations/:id/messages  GET (transcript), POST (send)
 * - /api/v1/conversations/:id/end       POST
 * - /api/v1/session/reset               POST
 */

import { Router } from 'express';
import { createConversationsRouter } from '../../controllers/conversations/conversations.controller.js';
import { createSessionRouter } from '../../controllers/session/session.controller.js';
import type { ConversationOwnershipValidator } from '../../services/chat/conversation-ownership.validator.js';
import type { ConversationRelayService } from '../../services/relay/conversation-relay.service.js';

export function createV1Router(relay: ConversationRelayService, ownership: ConversationOwnershipValidator): Router {
  const router = Router();

  router.use('/conversations', createConversationsRouter(relay, ownership));
  router.use('/session', createSessionRouter(relay, ownership));

  return router;
}
