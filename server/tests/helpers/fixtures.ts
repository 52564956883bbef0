import type { AppConfig } from '../../src/config/env.js';
import type { MessageEvent } from '../../src/services/webhooks/webhook-events.schema.js';

export const TEST_WEBHOOK_SECRET = 'whsec_' + Buffer.from('test-secret').toString('base64');

export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    env: 'test',
    agent: {
      baseUrl: 'https://agents.example.test',
      apiKey: 'test-api-key',
      channelId: 'channel-1',
      timeoutMs: 1000,
    },
    webhook: {
      secret: TEST_WEBHOOK_SECRET,
      batchDelayMs: 10_000,
    },
    sessionCookie: {
      secret: 'test-cookie-secret',
      ttlSeconds: 3600,
    },
    defaultAvatarUrl: undefined,
    staticDir: 'server/public',
    corsOrigins: [],
    ...overrides,
  };
}

export interface MessageEventOverrides {
  messageId?: string;
  conversationId?: string;
  timestamp?: string;
  author?: MessageEvent['data']['author'];
  content?: MessageEvent['data']['content'];
}

export function buildMessageEvent(overrides: MessageEventOverrides = {}): MessageEvent {
  const timestamp = overrides.timestamp ?? '2024-05-01T12:00:00.000Z';
  return {
    type: 'v1.conversation.message',
    timestamp,
    data: {
      message_id: overrides.messageId ?? 'msg-1',
      conversation_id: overrides.conversationId ?? 'conv-1',
      end_user_id: 'user-1',
      channel: { id: 'channel-1', name: 'Demo', type: 'custom', modality: 'messaging', description: 'Demo channel' },
      created_at: timestamp,
      author: overrides.author ?? { id: 'agent-7', role: 'ai_agent', display_name: 'Ava', avatar: null },
      content: overrides.content ?? { type: 'text', body: 'Hello from the agent' },
    },
  };
}
