/**
 * Chat Socket Server
 * Pushes a conversation's transcript and live events to the chat page
 *
 * Protocol (server -> client only): ChatSocketEventDTO as JSON text frames.
 * Connect with /ws?conversationId=<id>; the first frame is the full transcript.
 * The upgrade request must carry the visitor cookie of the conversation's end
 * user, otherwise the socket is closed as not found.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage, Server as HTTPServer } from 'http';
import type { ChatSocketEventDTO } from '@api';
import { logger } from '../../lib/logger/structured-logger.js';
import type { ConversationOwnershipValidator } from '../../services/chat/conversation-ownership.validator.js';
import { CLOSE_CODES, CLOSE_REASONS } from './ws-close-reasons.js';

export interface ChatSocketServerConfig {
  path: string;
  heartbeatIntervalMs: number;
}

const DEFAULT_CONFIG: ChatSocketServerConfig = {
  path: '/ws',
  heartbeatIntervalMs: 30_000,
};

export class ChatSocketServer {
  private readonly wss: WebSocketServer;
  private readonly config: ChatSocketServerConfig;
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private heartbeatInterval: NodeJS.Timeout | undefined;

  constructor(
    server: HTTPServer,
    private readonly ownership: ConversationOwnershipValidator,
    config?: Partial<ChatSocketServerConfig>
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.wss = new WebSocketServer({
      server,
      path: this.config.path,
      maxPayload: 64 * 1024, // clients never need to send more than pongs
    });

    this.wss.on('connection', (ws, req) => this.handleConnection(ws, req));
    this.startHeartbeat();

    logger.info({ path: this.config.path }, 'ChatSocketServer: Initialized');
  }

  get connectionCount(): number {
    return this.wss.clients.size;
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const conversationId = url.searchParams.get('conversationId');

    if (!conversationId) {
      ws.close(CLOSE_CODES.BAD_REQUEST, CLOSE_REASONS.MISSING_CONVERSATION_ID);
      return;
    }

    const ownership = this.ownership.validate(conversationId, req.headers.cookie);
    if (!ownership.valid) {
      logger.info({ conversationId, reason: ownership.reason }, 'ChatSocketServer: Conversation not available');
      ws.close(CLOSE_CODES.CONVERSATION_NOT_FOUND, CLOSE_REASONS.CONVERSATION_NOT_FOUND);
      return;
    }
    const { session } = ownership;

    this.alive.set(ws, true);
    ws.on('pong', () => this.alive.set(ws, true));

    const unsubscribe = session.subscribe(event => this.send(ws, event));

    ws.on('close', (code) => {
      unsubscribe();
      logger.debug({ conversationId, code, subscribers: session.subscriberCount }, 'ChatSocketServer: Client disconnected');
    });

    ws.on('error', (err) => {
      logger.warn({ conversationId, error: err.message }, 'ChatSocketServer: Socket error');
    });

    this.send(ws, {
      type: 'transcript',
      messages: session.getMessages(),
      ended: session.ended,
    });

    logger.debug({ conversationId, subscribers: session.subscriberCount }, 'ChatSocketServer: Client connected');
  }

  private send(ws: WebSocket, event: ChatSocketEventDTO): void {
    if (ws.readyState !== WebSocket.OPEN) {
      return;
    }
    ws.send(JSON.stringify(event), (err) => {
      if (err) {
        logger.warn({ eventType: event.type, error: err.message }, 'ChatSocketServer: Send failed');
        ws.terminate();
      }
    });
  }

  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      let terminated = 0;

      for (const ws of this.wss.clients) {
        if (this.alive.get(ws) === false) {
          ws.terminate();
          terminated++;
          continue;
        }
        this.alive.set(ws, false);
        ws.ping();
      }

      if (terminated > 0) {
        logger.info({ terminated }, 'ChatSocketServer heartbeat: terminated dead connections');
      }
    }, this.config.heartbeatIntervalMs);

    this.heartbeatInterval.unref();
  }

  shutdown(): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = undefined;
    }

    for (const ws of this.wss.clients) {
      ws.close(CLOSE_CODES.GOING_AWAY, CLOSE_REASONS.SERVER_SHUTDOWN);
    }

    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
