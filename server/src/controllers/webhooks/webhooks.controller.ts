/**
 * Webhooks Controller
 *
 * Endpoints:
 * - POST /webhooks/message - agent platform conversation events (signed)
 *
 * The raw body is kept as a Buffer: the signature covers the exact bytes sent.
 */

import express, { Router, type Request, type Response } from 'express';
import type { Webhook } from 'svix';
import { AppError, createValidationError } from '../../middleware/error.middleware.js';
import {
  verifyWebhookSignature,
  WebhookVerificationError,
  type VerifiedWebhook,
} from '../../services/webhooks/webhook-signature.js';
import { parseWebhookEvent } from '../../services/webhooks/webhook-events.schema.js';
import type { WebhookDispatcher } from '../../services/webhooks/webhook-dispatcher.js';

export interface WebhooksRouterDeps {
  verifier: Webhook;
  dispatcher: WebhookDispatcher;
}

export function createWebhooksRouter(deps: WebhooksRouterDeps): Router {
  const router = Router();

  router.post(
    '/message',
    express.raw({ type: () => true, limit: '1mb' }),
    (req: Request, res: Response) => {
      const payload = Buffer.isBuffer(req.body) ? req.body.toString('utf8') : '';

      let verified: VerifiedWebhook;
      try {
        verified = verifyWebhookSignature(deps.verifier, payload, req.headers);
      } catch (err) {
        if (err instanceof WebhookVerificationError) {
          req.log.warn({ reason: err.reason, detail: err.message }, '[Webhook] Signature verification failed');
          throw new AppError('Bad Request', 400, 'INVALID_SIGNATURE', undefined, true);
        }
        if (err instanceof SyntaxError) {
          throw createValidationError('Webhook body is not valid JSON');
        }
        throw err;
      }

      const parsed = parseWebhookEvent(verified.body);
      if (!parsed.success) {
        req.log.warn({ webhookId: verified.id, issues: parsed.issues }, '[Webhook] Failed to parse event');
        throw createValidationError('Invalid webhook event', parsed.issues);
      }

      const outcome = deps.dispatcher.dispatch(parsed.value);
      req.log.info({ webhookId: verified.id, kind: parsed.value.kind, outcome }, '[Webhook] Event received');

      res.status(204).end();
    }
  );

  return router;
}
