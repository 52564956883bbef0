/**
 * Agent Platform HTTP Client
 * Bearer-authenticated JSON calls to the vendor conversation API (v2)
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { fetchWithTimeout } from '../../utils/fetch-with-timeout.js';
import {
  AgentApiError,
  StartConversationResponseSchema,
  type AgentApiOperation,
  type AgentPlatformClient,
  type EndUserAuthor,
  type StartedConversation,
} from './agent-api.types.js';

export interface AgentApiClientConfig {
  baseUrl: string;
  apiKey: string;
  channelId: string;
  timeoutMs: number;
}

const PROVIDER = 'agent_platform';

export class AgentApiClient implements AgentPlatformClient {
  constructor(private readonly config: AgentApiClientConfig) { }

  async startConversation(endUserId?: string): Promise<StartedConversation> {
    const requestBody: Record<string, string> = { channel_id: this.config.channelId };
    if (endUserId) {
      requestBody.end_user_id = endUserId;
    }

    const body = await this.post('start_conversation', '/api/v2/conversations', requestBody);

    const parsed = StartConversationResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({
        operation: 'start_conversation',
        issues: parsed.error.issues,
      }, '[AgentApi] Malformed start conversation response');
      throw new AgentApiError('start_conversation', 200, body);
    }

    logger.info({
      conversationId: parsed.data.id,
      endUserId: parsed.data.end_user_id,
      reusedEndUser: Boolean(endUserId),
    }, '[AgentApi] Conversation started');

    return { conversationId: parsed.data.id, endUserId: parsed.data.end_user_id };
  }

  async sendUserMessage(conversationId: string, author: EndUserAuthor, text: string): Promise<void> {
    await this.post('send_message', `/api/v2/conversations/${encodeURIComponent(conversationId)}/messages`, {
      author: {
        role: 'end_user',
        display_name: author.displayName,
        id: author.id,
        avatar: author.avatar,
      },
      content: { type: 'text', body: text },
    });
  }

  async endConversation(conversationId: string): Promise<void> {
    await this.post('end_conversation', `/api/v2/conversations/${encodeURIComponent(conversationId)}/end`);
  }

  private async post(operation: AgentApiOperation, path: string, payload?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiKey}`,
      Accept: 'application/json',
    };
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await fetchWithTimeout(
      `${this.config.baseUrl}${path}`,
      {
        method: 'POST',
        headers,
        ...(payload !== undefined && { body: JSON.stringify(payload) }),
      },
      { timeoutMs: this.config.timeoutMs, provider: PROVIDER, stage: operation }
    );

    const body = parseBody(response.text);

    if (!response.ok) {
      logger.warn({ operation, status: response.status, body }, '[AgentApi] Error response');
      throw new AgentApiError(operation, response.status, body);
    }

    logger.info({ operation, status: response.status }, '[AgentApi] Success response');
    return body;
  }
}

// Bodies are JSON in practice; an empty or non-JSON body is kept as text
function parseBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
