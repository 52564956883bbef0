import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import path from 'path';
import type { AppConfig } from './config/env.js';
import { createChatPageRouter } from './controllers/chat-page/chat-page.controller.js';
import { createLivenessHandler } from './controllers/health.controller.js';
import { createWebhooksRouter } from './controllers/webhooks/webhooks.controller.js';
import { createErrorMiddleware, createNotFoundError } from './middleware/error.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { createV1Router } from './routes/v1/index.js';
import { ConversationOwnershipValidator } from './services/chat/conversation-ownership.validator.js';
import type { ChatSessionRegistry } from './services/chat/chat-session.registry.js';
import type { ConversationRelayService } from './services/relay/conversation-relay.service.js';
import type { WebhookDispatcher } from './services/webhooks/webhook-dispatcher.js';
import { createWebhookVerifier } from './services/webhooks/webhook-signature.js';

export const WS_PATH = '/ws';

export interface AppDependencies {
  config: AppConfig;
  registry: ChatSessionRegistry;
  relay: ConversationRelayService;
  dispatcher: WebhookDispatcher;
  generateName?: () => string;
}

export function createApp(deps: AppDependencies) {
  const { config } = deps;
  const app = express();
  const ownership = new ConversationOwnershipValidator(deps.registry, config.sessionCookie.secret);

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        'connect-src': ["'self'", 'ws:', 'wss:'],
        'img-src': ["'self'", 'data:', 'https:'],
      },
    },
  }));
  app.use(compression());
  // Same-origin page; cross-site callers only when listed in CORS_ORIGINS
  app.use(cors({
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : false,
    credentials: true,
  }));

  // Request context & logging (BEFORE routes)
  app.use(requestContextMiddleware);
  app.use(httpLoggingMiddleware);

  // Webhooks read the raw body for signature checks, so they mount before express.json()
  app.use('/webhooks', createWebhooksRouter({
    verifier: createWebhookVerifier(config.webhook.secret),
    dispatcher: deps.dispatcher,
  }));

  app.use(express.json({ limit: '100kb' }));

  app.use('/api/v1', createV1Router(deps.relay, ownership));

  app.use('/static', express.static(path.resolve(process.cwd(), config.staticDir), {
    index: false,
    maxAge: config.env === 'production' ? '1h' : 0,
  }));

  app.get('/healthz', createLivenessHandler(deps.registry));

  app.use(createChatPageRouter({
    relay: deps.relay,
    ownership,
    cookie: config.sessionCookie,
    secureCookie: config.env === 'production',
    wsPath: WS_PATH,
    ...(config.defaultAvatarUrl ? { defaultAvatarUrl: config.defaultAvatarUrl } : {}),
    ...(deps.generateName ? { generateName: deps.generateName } : {}),
  }));

  app.use((req, _res, next) => {
    next(createNotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  app.use(createErrorMiddleware({ production: config.env === 'production' }));

  return app;
}
