import { createConflictError } from '../../middleware/error.middleware.js';
import { ChatSession } from './chat-session.js';

/**
 * Live chat sessions keyed by vendor conversation id
 */
export class ChatSessionRegistry {
  private sessions = new Map<string, ChatSession>();

  register(session: ChatSession): ChatSession {
    if (this.sessions.has(session.conversationId)) {
      throw createConflictError(
        `Chat session already registered for conversation ${session.conversationId}`,
        'SESSION_ALREADY_REGISTERED'
      );
    }
    this.sessions.set(session.conversationId, session);
    return session;
  }

  get(conversationId: string): ChatSession | undefined {
    return this.sessions.get(conversationId);
  }

  unregister(conversationId: string): boolean {
    return this.sessions.delete(conversationId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
