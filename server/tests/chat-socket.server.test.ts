/**
 * Chat socket server - transcript replay and live session events
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { createServer, type Server as HTTPServer } from 'http';
import WebSocket from 'ws';
import type { ChatSocketEventDTO } from '@api';
import { ChatSocketServer } from '../src/infra/websocket/chat-socket.server.js';
import { signVisitorCookie } from '../src/lib/session-cookie/visitor-cookie.service.js';
import { ChatSession } from '../src/services/chat/chat-session.js';
import { ChatSessionRegistry } from '../src/services/chat/chat-session.registry.js';
import { ConversationOwnershipValidator } from '../src/services/chat/conversation-ownership.validator.js';

const COOKIE_OPTIONS = { secret: 'test-cookie-secret', ttlSeconds: 3600 };
const OWNER_COOKIE = `visitor_session=${signVisitorCookie({ endUserId: 'user-1', displayName: 'Alice Jones' }, COOKIE_OPTIONS)}`;

interface OpenedSocket {
  ws: WebSocket;
  events: ChatSocketEventDTO[];
  closed: Promise<number>;
}

function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  return new Promise((resolve, reject) => {
    const started = Date.now();
    const check = () => {
      if (condition()) {
        resolve();
      } else if (Date.now() - started > timeoutMs) {
        reject(new Error('Timed out waiting for condition'));
      } else {
        setTimeout(check, 10);
      }
    };
    check();
  });
}

describe('ChatSocketServer', () => {
  let server: HTTPServer;
  let sockets: ChatSocketServer;
  let registry: ChatSessionRegistry;
  let session: ChatSession;
  let baseUrl: string;

  function connect(query: string, cookie: string = OWNER_COOKIE): OpenedSocket {
    const ws = new WebSocket(`${baseUrl}/ws${query}`, { headers: { Cookie: cookie } });
    const events: ChatSocketEventDTO[] = [];
    ws.on('message', (data) => {
      events.push(JSON.parse(data.toString()));
    });
    const closed = new Promise<number>((resolve) => {
      ws.on('close', (code) => resolve(code));
    });
    return { ws, events, closed };
  }

  before(async () => {
    server = createServer();
    registry = new ChatSessionRegistry();
    session = registry.register(new ChatSession({
      conversationId: 'conv-1',
      endUserId: 'user-1',
      displayName: 'Alice Jones',
    }));
    session.addMessage({ role: 'ai_agent', name: 'Ava', content: { type: 'text', body: 'Welcome!' } });

    sockets = new ChatSocketServer(
      server,
      new ConversationOwnershipValidator(registry, COOKIE_OPTIONS.secret),
      { path: '/ws', heartbeatIntervalMs: 60_000 }
    );

    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    assert.ok(address && typeof address === 'object');
    baseUrl = `ws://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await sockets.shutdown();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  it('sends the transcript first, then live events', async () => {
    const client = connect('?conversationId=conv-1');

    await waitFor(() => client.events.length === 1);
    const [transcript] = client.events;
    assert.equal(transcript?.type, 'transcript');
    assert.ok(transcript?.type === 'transcript');
    assert.equal(transcript.ended, false);
    assert.deepEqual(transcript.messages.map(m => m.content), [{ type: 'text', body: 'Welcome!' }]);

    session.notify('Ava is typing');
    await waitFor(() => client.events.length === 2);
    assert.deepEqual(client.events[1], { type: 'notification', text: 'Ava is typing' });

    client.ws.close();
    await client.closed;
    await waitFor(() => session.subscriberCount === 0);
  });

  it('closes with 4404 for unknown conversations', async () => {
    const client = connect('?conversationId=missing');

    assert.equal(await client.closed, 4404);
    assert.equal(client.events.length, 0);
  });

  it('closes with 4404 for another visitor', async () => {
    const strangerCookie = `visitor_session=${signVisitorCookie({ endUserId: 'user-2', displayName: 'Bob Brown' }, COOKIE_OPTIONS)}`;
    const client = connect('?conversationId=conv-1', strangerCookie);

    assert.equal(await client.closed, 4404);
    assert.equal(client.events.length, 0);
  });

  it('closes with 4404 without a visitor cookie', async () => {
    const client = connect('?conversationId=conv-1', '');

    assert.equal(await client.closed, 4404);
  });

  it('closes with 4400 when no conversation id is given', async () => {
    const client = connect('');

    assert.equal(await client.closed, 4400);
  });
});
