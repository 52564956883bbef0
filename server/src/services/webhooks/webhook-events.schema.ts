/**
 * Webhook event envelopes sent by the agent platform
 */

import { z } from 'zod';

const IsoDateString = z.string().refine(value => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO-8601 date',
});

// Links become clickable buttons on the page: web URLs only
const WebUrl = z.string().url().refine(value => /^https?:\/\//i.test(value), {
  message: 'Expected an http(s) URL',
});

export const AuthorRoleSchema = z.enum(['end_user', 'ai_agent', 'human_agent']);

export const WebhookContentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), body: z.string() }),
  z.object({ type: z.literal('presence'), body: z.string() }),
  z.object({ type: z.literal('link'), url: WebUrl, link_text: z.string().nullish() }),
]);

const ChannelSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  type: z.string().nullish(),
  modality: z.string().nullish(),
  description: z.string().nullish(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
  created_at: IsoDateString.nullish(),
});

export const MessageEventSchema = z.object({
  type: z.literal('v1.conversation.message'),
  timestamp: IsoDateString,
  data: z.object({
    message_id: z.string(),
    conversation_id: z.string(),
    end_user_id: z.string(),
    channel: ChannelSchema,
    created_at: IsoDateString,
    author: z.object({
      id: z.string().nullish(),
      role: AuthorRoleSchema,
      display_name: z.string().nullish(),
      avatar: z.string().nullish(),
    }),
    content: WebhookContentSchema,
  }),
});

export const ConversationEndedEventSchema = z.object({
  type: z.literal('v1.conversation.ended'),
  timestamp: IsoDateString,
  data: z.object({
    conversation_id: z.string(),
    channel_id: z.string(),
    end_user_id: z.string(),
    ended_by: z.object({
      id: z.string().nullish(),
      role: z.string(),
    }),
  }),
});

export const GenericEventSchema = z.object({
  type: z.string(),
  timestamp: z.string().optional(),
  data: z.record(z.string(), z.unknown()),
});

export type MessageEvent = z.infer<typeof MessageEventSchema>;
export type ConversationEndedEvent = z.infer<typeof ConversationEndedEventSchema>;
export type GenericEvent = z.infer<typeof GenericEventSchema>;

export type WebhookEvent =
  | { kind: 'message'; event: MessageEvent }
  | { kind: 'conversation_ended'; event: ConversationEndedEvent }
  | { kind: 'unsupported'; event: GenericEvent };

export type ParseWebhookResult =
  | { success: true; value: WebhookEvent }
  | { success: false; issues: z.ZodIssue[] };

/**
 * Known types must match their schema exactly; any other type only needs the envelope
 */
export function parseWebhookEvent(body: unknown): ParseWebhookResult {
  const envelope = GenericEventSchema.safeParse(body);
  if (!envelope.success) {
    return { success: false, issues: envelope.error.issues };
  }

  switch (envelope.data.type) {
    case 'v1.conversation.message': {
      const parsed = MessageEventSchema.safeParse(body);
      return parsed.success
        ? { success: true, value: { kind: 'message', event: parsed.data } }
        : { success: false, issues: parsed.error.issues };
    }
    case 'v1.conversation.ended': {
      const parsed = ConversationEndedEventSchema.safeParse(body);
      return parsed.success
        ? { success: true, value: { kind: 'conversation_ended', event: parsed.data } }
        : { success: false, issues: parsed.error.issues };
    }
    default:
      return { success: true, value: { kind: 'unsupported', event: envelope.data } };
  }
}
