/**
 * Chat Page Controller
 *
 * Endpoints:
 * - GET / - start (or resume the visitor identity of) a conversation and render the chat page
 *
 * One live conversation per visitor: a reload replaces the conversation
 * recorded in the visitor cookie.
 */

import { Router, type Request, type Response } from 'express';
import { asyncHandler, AppError } from '../../middleware/error.middleware.js';
import {
  signVisitorCookie,
  VISITOR_COOKIE_NAME,
  type VisitorCookieOptions,
} from '../../lib/session-cookie/visitor-cookie.service.js';
import type { ConversationOwnershipValidator } from '../../services/chat/conversation-ownership.validator.js';
import type { ConversationRelayService } from '../../services/relay/conversation-relay.service.js';
import { generateVisitorName } from '../../services/chat/display-name.js';
import type { ChatSession } from '../../services/chat/chat-session.js';
import { renderChatPage, renderErrorPage } from '../../views/chat-page.template.js';

export interface ChatPageRouterDeps {
  relay: ConversationRelayService;
  ownership: ConversationOwnershipValidator;
  cookie: VisitorCookieOptions;
  secureCookie: boolean;
  defaultAvatarUrl?: string;
  wsPath: string;
  generateName?: () => string;
}

export function createChatPageRouter(deps: ChatPageRouterDeps): Router {
  const router = Router();
  const generateName = deps.generateName ?? (() => generateVisitorName());

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const identity = deps.ownership.identify(req.headers.cookie);
    const displayName = identity?.displayName ?? generateName();

    let session: ChatSession;
    try {
      session = await deps.relay.openConversation({
        displayName,
        ...(identity?.endUserId ? { endUserId: identity.endUserId } : {}),
        ...(deps.defaultAvatarUrl ? { avatar: deps.defaultAvatarUrl } : {}),
      });
    } catch (err) {
      const status = err instanceof AppError ? err.statusCode : 500;
      req.log.error({
        error: err instanceof Error ? err.message : String(err),
        status,
      }, '[ChatPage] Could not open conversation');
      res.status(status).type('html').send(
        renderErrorPage('Could not start a conversation with the agent. Please try again shortly.', req.traceId)
      );
      return;
    }

    if (identity?.conversationId) {
      const previous = deps.ownership.validateIdentity(identity.conversationId, identity);
      if (previous.valid) {
        deps.relay.closeConversation(previous.session.conversationId);
        req.log.debug({
          previousConversationId: previous.session.conversationId,
          conversationId: session.conversationId,
        }, '[ChatPage] Replaced previous conversation');
      }
    }

    res.cookie(
      VISITOR_COOKIE_NAME,
      signVisitorCookie({
        endUserId: session.endUserId,
        displayName,
        conversationId: session.conversationId,
      }, deps.cookie),
      {
        httpOnly: true,
        sameSite: 'lax',
        secure: deps.secureCookie,
        path: '/',
        maxAge: deps.cookie.ttlSeconds * 1000,
      }
    );

    res.status(200).type('html').send(renderChatPage({
      conversationId: session.conversationId,
      endUserId: session.endUserId,
      displayName,
      wsPath: deps.wsPath,
      ...(session.avatar ? { avatar: session.avatar } : {}),
    }));
  }));

  return router;
}
