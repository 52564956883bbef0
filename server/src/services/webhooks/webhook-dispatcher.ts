/**
 * Routes verified webhook events to the relay
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { ConversationRelayService } from '../relay/conversation-relay.service.js';
import { MessageBatcher } from './message-batcher.js';
import type { WebhookEvent } from './webhook-events.schema.js';

export type DispatchOutcome = 'queued' | 'conversation_ended' | 'ignored';

export class WebhookDispatcher {
  readonly batcher: MessageBatcher;

  constructor(
    private readonly relay: ConversationRelayService,
    batchDelayMs: number
  ) {
    this.batcher = new MessageBatcher(batchDelayMs, event => {
      this.relay.deliverInboundMessage(event);
    });
  }

  dispatch(webhook: WebhookEvent): DispatchOutcome {
    switch (webhook.kind) {
      case 'message':
        this.batcher.push(webhook.event);
        return 'queued';

      case 'conversation_ended': {
        const { conversation_id: conversationId, ended_by: endedBy } = webhook.event.data;
        const changed = this.relay.markConversationEnded(conversationId);
        logger.info({ conversationId, endedByRole: endedBy.role, changed }, '[Webhook] Conversation ended');
        return 'conversation_ended';
      }

      case 'unsupported':
        logger.info({ type: webhook.event.type }, '[Webhook] Unsupported event type ignored');
        return 'ignored';
    }
  }

  /**
   * Deliver anything still buffered and stop the timer (shutdown)
   */
  shutdown(): void {
    this.batcher.flush();
    this.batcher.dispose();
  }
}
