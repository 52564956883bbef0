export type AuthorRoleDTO = "end_user" | "ai_agent" | "human_agent";

export interface TextContentDTO {
    type: "text";
    body: string;
}

/** Status notices from the platform (e.g. "an agent has joined"); shown as notifications, never as bubbles */
export interface PresenceContentDTO {
    type: "presence";
    body: string;
}

export interface LinkContentDTO {
    type: "link";
    url: string;
    linkText?: string;
}

export type MessageContentDTO = TextContentDTO | PresenceContentDTO | LinkContentDTO;

export type DeliveryStatusDTO = "pending" | "sent" | "failed";

export interface ConversationMessageDTO {
    id: string;
    conversationId: string;
    role: AuthorRoleDTO;
    authorId?: string;
    displayName: string;
    avatar?: string;
    content: MessageContentDTO;
    timestamp: string;     // ISO string
    deliveryStatus: DeliveryStatusDTO;
}

export interface TranscriptDTO {
    conversationId: string;
    ended: boolean;
    messages: ConversationMessageDTO[];
}
