import type { ConversationMessageDTO } from "./conversation-message.dto.js";

// Server -> browser events on /ws
export type ChatSocketEventDTO =
    | { type: "transcript"; messages: ConversationMessageDTO[]; ended: boolean }
    | { type: "message"; message: ConversationMessageDTO }
    | { type: "message_updated"; message: ConversationMessageDTO }
    | { type: "notification"; text: string }
    | { type: "conversation_ended" };

export type ChatSocketEventType = ChatSocketEventDTO["type"];
