/**
 * Server-rendered chat page shell.
 * Transcript rendering and live updates happen in /static/chat.js.
 */

import type { ChatPageBootstrapDTO } from '@api';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * JSON safe to embed inside a <script> element
 */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

function layout(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<link rel="stylesheet" href="/static/chat.css">
</head>
<body>
${body}
</body>
</html>
`;
}

export function renderChatPage(bootstrap: ChatPageBootstrapDTO): string {
  return layout('Agent Chat', `<main class="chat" data-conversation-id="${escapeHtml(bootstrap.conversationId)}">
<header class="chat-header">
  <span class="chat-title">Chatting as ${escapeHtml(bootstrap.displayName)}</span>
</header>
<div id="notifications" class="notifications" aria-live="polite"></div>
<section id="messages" class="messages" aria-live="polite"></section>
<form id="composer" class="composer" autocomplete="off">
  <input id="message-input" class="message-input" type="text" placeholder="Type a message..." aria-label="Message">
  <button id="end-button" class="button button-end" type="button">End Chat</button>
  <button id="reset-button" class="button button-reset" type="button">Reset</button>
</form>
</main>
<script id="chat-bootstrap" type="application/json">${serializeForScript(bootstrap)}</script>
<script src="/static/chat.js" defer></script>`);
}

export function renderErrorPage(message: string, traceId: string): string {
  return layout('Agent Chat - Unavailable', `<main class="chat chat-error">
<h1>Chat unavailable</h1>
<p>${escapeHtml(message)}</p>
<p class="trace">Trace ID: ${escapeHtml(traceId)}</p>
<p><a href="/">Try again</a></p>
</main>`);
}
