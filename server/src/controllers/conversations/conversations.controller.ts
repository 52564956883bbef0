/**
 * Conversations Controller
 *
 * Endpoints (mounted under /api/v1/conversations):
 * - GET  /:conversationId/messages - transcript
 * - POST /:conversationId/messages - send an end-user message
 * - POST /:conversationId/end      - end the conversation
 *
 * Every route requires the visitor cookie of the conversation's end user;
 * anything else is reported as not found.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler, createNotFoundError, createValidationError } from '../../middleware/error.middleware.js';
import type { ConversationOwnershipValidator } from '../../services/chat/conversation-ownership.validator.js';
import type { ConversationRelayService } from '../../services/relay/conversation-relay.service.js';

const SendMessageSchema = z.object({
  text: z.string(),
});

export function createConversationsRouter(
  relay: ConversationRelayService,
  ownership: ConversationOwnershipValidator
): Router {
  const router = Router();

  router.param('conversationId', (req: Request, _res: Response, next: NextFunction, conversationId: string) => {
    const result = ownership.validate(conversationId, req.headers.cookie);
    if (!result.valid) {
      req.log.debug({ conversationId, reason: result.reason }, '[Conversations] Access denied');
      next(createNotFoundError(`Conversation ${conversationId} not found`));
      return;
    }
    next();
  });

  router.get('/:conversationId/messages', (req: Request, res: Response) => {
    res.status(200).json(relay.getTranscript(req.params.conversationId ?? ''));
  });

  router.post('/:conversationId/messages', asyncHandler(async (req: Request, res: Response) => {
    const conversationId = req.params.conversationId ?? '';
    const parsed = SendMessageSchema.safeParse(req.body);

    if (!parsed.success) {
      throw createValidationError('Request body must include text', parsed.error.issues);
    }

    const message = await relay.sendUserMessage(conversationId, parsed.data.text);

    req.log.info({ conversationId, messageId: message.id }, '[Conversations] Message sent');
    res.status(201).json({ message });
  }));

  router.post('/:conversationId/end', asyncHandler(async (req: Request, res: Response) => {
    const conversationId = req.params.conversationId ?? '';
    await relay.endConversation(conversationId);
    res.status(200).json({ conversationId, ended: true });
  }));

  return router;
}
