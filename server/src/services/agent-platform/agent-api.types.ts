import { z } from 'zod';

export const StartConversationResponseSchema = z.object({
  id: z.string().min(1),
  end_user_id: z.string().min(1),
}).passthrough();

export interface StartedConversation {
  conversationId: string;
  endUserId: string;
}

export interface EndUserAuthor {
  id: string;
  displayName: string;
  avatar?: string;
}

export type AgentApiOperation = 'start_conversation' | 'send_message' | 'end_conversation';

/**
 * Outbound side of the relay. The HTTP client implements it; tests provide fakes.
 */
export interface AgentPlatformClient {
  startConversation(endUserId?: string): Promise<StartedConversation>;
  sendUserMessage(conversationId: string, author: EndUserAuthor, text: string): Promise<void>;
  endConversation(conversationId: string): Promise<void>;
}

/**
 * Non-2xx (or malformed) response from the agent platform
 */
export class AgentApiError extends Error {
  constructor(
    public readonly operation: AgentApiOperation,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(`Agent API ${operation} failed with status ${status}`);
    this.name = 'AgentApiError';
  }
}
