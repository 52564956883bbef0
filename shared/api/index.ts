// ESM + NodeNext: include .js in re-exports
export type * from "./conversation-message.dto.js";
export type * from "./chat-socket-event.dto.js";
export type * from "./chat-page.dto.js";
