import { createServer } from 'http';
import { createApp, WS_PATH } from './app.js';
import { ConfigError, getConfig } from './config/env.js';
import { ChatSocketServer } from './infra/websocket/chat-socket.server.js';
import { logger } from './lib/logger/structured-logger.js';
import { AgentApiClient } from './services/agent-platform/agent-api.client.js';
import { ChatSessionRegistry } from './services/chat/chat-session.registry.js';
import { ConversationOwnershipValidator } from './services/chat/conversation-ownership.validator.js';
import { ConversationRelayService } from './services/relay/conversation-relay.service.js';
import { WebhookDispatcher } from './services/webhooks/webhook-dispatcher.js';

function loadConfigOrExit() {
  try {
    return getConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ invalidKeys: err.invalidKeys }, err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfigOrExit();

const registry = new ChatSessionRegistry();
const agentClient = new AgentApiClient(config.agent);
const relay = new ConversationRelayService(agentClient, registry);
const dispatcher = new WebhookDispatcher(relay, config.webhook.batchDelayMs);

const app = createApp({ config, registry, relay, dispatcher });
const server = createServer(app);
const chatSockets = new ChatSocketServer(
  server,
  new ConversationOwnershipValidator(registry, config.sessionCookie.secret),
  { path: WS_PATH }
);

server.listen(config.port, () => {
  logger.info({
    port: config.port,
    env: config.env,
    agentBaseUrl: config.agent.baseUrl,
    webhookPath: '/webhooks/message',
  }, `Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
  logger.info(`Received ${signal}. Shutting down gracefully...`);

  dispatcher.shutdown();
  void chatSockets.shutdown()
    .catch((err: unknown) => {
      logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'WebSocket server close failed');
    })
    .finally(() => {
      server.close(() => {
        logger.info('Server closed');
        process.exit(0);
      });
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
