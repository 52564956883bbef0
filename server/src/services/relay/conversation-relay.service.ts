/**
 * Conversation Relay Service
 *
 * Correlates a browser visitor with a vendor conversation and moves messages
 * both ways:
 * - outbound: user text -> local transcript (pending) -> agent platform
 * - inbound: webhook message events -> local transcript / notifications
 */

import type { ConversationMessageDTO, MessageContentDTO, TranscriptDTO } from '@api';
import { logger } from '../../lib/logger/structured-logger.js';
import {
  AppError,
  createConflictError,
  createNotFoundError,
  createUpstreamError,
  createValidationError,
} from '../../middleware/error.middleware.js';
import type { AgentPlatformClient } from '../agent-platform/agent-api.types.js';
import { ChatSession } from '../chat/chat-session.js';
import type { ChatSessionRegistry } from '../chat/chat-session.registry.js';
import type { MessageEvent } from '../webhooks/webhook-events.schema.js';

const MAX_MESSAGE_LENGTH = 4000;

export const SEND_FAILED_NOTIFICATION = 'Message could not be delivered to the agent. Please try again.';

export interface OpenConversationInput {
  endUserId?: string;
  displayName: string;
  avatar?: string;
}

export type InboundDeliveryOutcome = 'added' | 'notified' | 'no_session' | 'own_echo';

export class ConversationRelayService {
  /** Ended locally, vendor not yet told (its end call failed) */
  private readonly unconfirmedEnds = new Set<string>();

  constructor(
    private readonly agentClient: AgentPlatformClient,
    private readonly registry: ChatSessionRegistry
  ) { }

  async openConversation(input: OpenConversationInput): Promise<ChatSession> {
    const started = await this.callAgent('start_conversation', () =>
      this.agentClient.startConversation(input.endUserId)
    );

    const session = this.registry.register(new ChatSession({
      conversationId: started.conversationId,
      endUserId: started.endUserId,
      displayName: input.displayName,
      ...(input.avatar ? { avatar: input.avatar } : {}),
    }));

    logger.info({
      conversationId: session.conversationId,
      endUserId: session.endUserId,
      activeSessions: this.registry.size,
    }, '[Relay] Conversation opened');

    return session;
  }

  async sendUserMessage(conversationId: string, rawText: string): Promise<ConversationMessageDTO> {
    const session = this.requireSession(conversationId);
    if (session.ended) {
      throw createConflictError('Conversation has ended', 'CONVERSATION_ENDED');
    }

    const text = rawText.trim();
    if (!text) {
      throw createValidationError('Message text must not be empty');
    }
    if (text.length > MAX_MESSAGE_LENGTH) {
      throw createValidationError(`Message text must be at most ${MAX_MESSAGE_LENGTH} characters`);
    }

    // Shown immediately; the platform echoes it back via webhook, which is dropped
    const pending = session.addMessage({
      role: 'end_user',
      authorId: session.endUserId,
      name: session.displayName,
      avatar: session.avatar ?? null,
      content: { type: 'text', body: text },
      deliveryStatus: 'pending',
    });

    try {
      await this.callAgent('send_message', () =>
        this.agentClient.sendUserMessage(
          conversationId,
          {
            id: session.endUserId,
            displayName: session.displayName,
            ...(session.avatar ? { avatar: session.avatar } : {}),
          },
          text
        )
      );
    } catch (err) {
      session.updateDeliveryStatus(pending.id, 'failed');
      session.notify(SEND_FAILED_NOTIFICATION);
      throw err;
    }

    return session.updateDeliveryStatus(pending.id, 'sent') ?? { ...pending, deliveryStatus: 'sent' };
  }

  async endConversation(conversationId: string): Promise<void> {
    const session = this.requireSession(conversationId);
    const changed = session.end();

    if (!changed && !this.unconfirmedEnds.has(conversationId)) {
      logger.debug({ conversationId }, '[Relay] Conversation already ended');
      return;
    }

    this.unconfirmedEnds.add(conversationId);
    await this.callAgent('end_conversation', () => this.agentClient.endConversation(conversationId));
    this.unconfirmedEnds.delete(conversationId);
    logger.info({ conversationId, retried: !changed }, '[Relay] Conversation ended by user');
  }

  getTranscript(conversationId: string): TranscriptDTO {
    const session = this.requireSession(conversationId);
    return {
      conversationId,
      ended: session.ended,
      messages: session.getMessages(),
    };
  }

  getSession(conversationId: string): ChatSession | undefined {
    return this.registry.get(conversationId);
  }

  /**
   * Drop the local session (identity reset or page reload). Open sockets get
   * a conversation_ended event; the vendor conversation is left to expire.
   */
  closeConversation(conversationId: string): boolean {
    this.registry.get(conversationId)?.end();
    this.unconfirmedEnds.delete(conversationId);
    const removed = this.registry.unregister(conversationId);
    if (removed) {
      logger.info({ conversationId, activeSessions: this.registry.size }, '[Relay] Conversation closed');
    }
    return removed;
  }

  /**
   * Show one inbound webhook message in its conversation's chat
   */
  deliverInboundMessage(event: MessageEvent): InboundDeliveryOutcome {
    const { conversation_id: conversationId, author, content } = event.data;
    const session = this.registry.get(conversationId);

    if (!session) {
      logger.debug({ conversationId, messageId: event.data.message_id }, '[Relay] No chat session for message');
      return 'no_session';
    }

    if (author.id && author.id === session.endUserId) {
      return 'own_echo';
    }

    if (content.type === 'presence') {
      session.notify(content.body);
      return 'notified';
    }

    const messageContent: MessageContentDTO = content.type === 'link'
      ? { type: 'link', url: content.url, ...(content.link_text ? { linkText: content.link_text } : {}) }
      : { type: 'text', body: content.body };

    session.addMessage({
      role: author.role,
      authorId: author.id ?? null,
      name: author.display_name ?? null,
      avatar: author.avatar ?? null,
      content: messageContent,
      timestamp: new Date(event.data.created_at),
    });
    return 'added';
  }

  /**
   * Conversation ended on the platform side (webhook)
   */
  markConversationEnded(conversationId: string): boolean {
    const session = this.registry.get(conversationId);
    if (!session) {
      return false;
    }
    this.unconfirmedEnds.delete(conversationId);
    return session.end();
  }

  private requireSession(conversationId: string): ChatSession {
    const session = this.registry.get(conversationId);
    if (!session) {
      throw createNotFoundError(`Conversation ${conversationId} not found`);
    }
    return session;
  }

  private async callAgent<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof AppError) {
        throw err;
      }
      logger.error({
        operation,
        error: err instanceof Error ? err.message : String(err),
      }, '[Relay] Agent platform call failed');
      throw createUpstreamError(`Agent platform ${operation} failed`, {
        reason: err instanceof Error ? err.name : 'unknown',
      });
    }
  }
}
