import type {
  AgentPlatformClient,
  EndUserAuthor,
  StartedConversation,
} from '../../src/services/agent-platform/agent-api.types.js';

export interface SentMessage {
  conversationId: string;
  author: EndUserAuthor;
  text: string;
}

/**
 * In-process stand-in for the agent platform
 */
export class FakeAgentClient implements AgentPlatformClient {
  readonly started: Array<string | undefined> = [];
  readonly sent: SentMessage[] = [];
  readonly ended: string[] = [];
  readonly failures: { start?: Error; send?: Error; end?: Error } = {};

  private counter = 0;

  async startConversation(endUserId?: string): Promise<StartedConversation> {
    this.started.push(endUserId);
    if (this.failures.start) {
      throw this.failures.start;
    }
    this.counter++;
    return {
      conversationId: `conv-${this.counter}`,
      endUserId: endUserId ?? `user-${this.counter}`,
    };
  }

  async sendUserMessage(conversationId: string, author: EndUserAuthor, text: string): Promise<void> {
    if (this.failures.send) {
      throw this.failures.send;
    }
    this.sent.push({ conversationId, author, text });
  }

  async endConversation(conversationId: string): Promise<void> {
    if (this.failures.end) {
      throw this.failures.end;
    }
    this.ended.push(conversationId);
  }
}
