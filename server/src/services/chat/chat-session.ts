/**
 * Chat Session
 * In-memory transcript of one browser <-> vendor conversation, with push
 * notifications to subscribers (the page's WebSocket connections).
 */

import { randomUUID } from 'node:crypto';
import type {
  AuthorRoleDTO,
  ChatSocketEventDTO,
  ConversationMessageDTO,
  DeliveryStatusDTO,
  MessageContentDTO,
} from '@api';
import { logger } from '../../lib/logger/structured-logger.js';
import { formatAuthorLabel } from './display-name.js';

export type ChatSessionListener = (event: ChatSocketEventDTO) => void;

export interface NewMessageInput {
  role: AuthorRoleDTO;
  content: MessageContentDTO;
  authorId?: string | null;
  name?: string | null;
  avatar?: string | null;
  deliveryStatus?: DeliveryStatusDTO;
  timestamp?: Date;
}

export interface ChatSessionInit {
  conversationId: string;
  endUserId: string;
  displayName: string;
  avatar?: string;
}

export class ChatSession {
  readonly conversationId: string;
  readonly endUserId: string;
  readonly displayName: string;
  readonly avatar: string | undefined;

  private readonly messages: ConversationMessageDTO[] = [];
  private readonly listeners = new Set<ChatSessionListener>();
  private endedFlag = false;

  constructor(init: ChatSessionInit) {
    this.conversationId = init.conversationId;
    this.endUserId = init.endUserId;
    this.displayName = init.displayName;
    this.avatar = init.avatar;
  }

  get ended(): boolean {
    return this.endedFlag;
  }

  get messageCount(): number {
    return this.messages.length;
  }

  getMessages(): ConversationMessageDTO[] {
    return this.messages.map(message => ({ ...message }));
  }

  addMessage(input: NewMessageInput): ConversationMessageDTO {
    const message: ConversationMessageDTO = {
      id: randomUUID(),
      conversationId: this.conversationId,
      role: input.role,
      displayName: formatAuthorLabel(input.role, input.name, input.authorId),
      content: input.content,
      timestamp: (input.timestamp ?? new Date()).toISOString(),
      deliveryStatus: input.deliveryStatus ?? 'sent',
      ...(input.authorId ? { authorId: input.authorId } : {}),
      ...(input.avatar ? { avatar: input.avatar } : {}),
    };

    this.messages.push(message);
    this.emit({ type: 'message', message: { ...message } });
    return { ...message };
  }

  updateDeliveryStatus(messageId: string, status: DeliveryStatusDTO): ConversationMessageDTO | undefined {
    const message = this.messages.find(m => m.id === messageId);
    if (!message) {
      return undefined;
    }
    message.deliveryStatus = status;
    this.emit({ type: 'message_updated', message: { ...message } });
    return { ...message };
  }

  notify(text: string): void {
    this.emit({ type: 'notification', text });
  }

  /**
   * Returns false when the session had already ended
   */
  end(): boolean {
    if (this.endedFlag) {
      return false;
    }
    this.endedFlag = true;
    this.emit({ type: 'conversation_ended' });
    return true;
  }

  subscribe(listener: ChatSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  private emit(event: ChatSocketEventDTO): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.warn({
          conversationId: this.conversationId,
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        }, '[ChatSession] Listener failed');
      }
    }
  }
}
