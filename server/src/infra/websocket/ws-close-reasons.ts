/**
 * WebSocket close codes used by the chat socket
 *
 * Standard codes:
 * - 1000: Normal closure
 * - 1001: Going away (server shutdown)
 * Application codes (4000-4999):
 * - 4400: Missing conversationId
 * - 4404: Unknown conversation (reload the page to start a new one)
 */

export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  BAD_REQUEST: 4400,
  CONVERSATION_NOT_FOUND: 4404,
} as const;

export const CLOSE_REASONS = {
  SERVER_SHUTDOWN: 'SERVER_SHUTDOWN',
  MISSING_CONVERSATION_ID: 'MISSING_CONVERSATION_ID',
  CONVERSATION_NOT_FOUND: 'CONVERSATION_NOT_FOUND',
} as const;

export type CloseReason = typeof CLOSE_REASONS[keyof typeof CLOSE_REASONS];
