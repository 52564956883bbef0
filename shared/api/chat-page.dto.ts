export interface ChatPageBootstrapDTO {
    conversationId: string;
    endUserId: string;
    displayName: string;
    avatar?: string;
    wsPath: string;
}

export interface SendMessageRequestDTO {
    text: string;
}

export interface ResetSessionRequestDTO {
    conversationId?: string;
}
