/**
 * Environment configuration
 * Loaded once from process.env (and .env via dotenv), validated with zod.
 */

import dotenv from 'dotenv';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  AGENT_BASE_URL: z.string().url(),
  AGENT_API_KEY: z.string().min(1),
  AGENT_CHANNEL_ID: z.string().min(1),
  AGENT_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  WEBHOOK_SECRET: z.string().min(1),
  WEBHOOK_BATCH_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),

  SESSION_COOKIE_SECRET: z.string().optional(),
  SESSION_COOKIE_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  DEFAULT_AVATAR_URL: z.string().url().optional(),
  STATIC_DIR: z.string().default('server/public'),
  CORS_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  agent: {
    baseUrl: string;
    apiKey: string;
    channelId: string;
    timeoutMs: number;
  };
  webhook: {
    secret: string;
    batchDelayMs: number;
  };
  sessionCookie: {
    secret: string;
    ttlSeconds: number;
  };
  defaultAvatarUrl: string | undefined;
  staticDir: string;
  /** Extra origins allowed to call the API; empty means same-origin only */
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(public readonly invalidKeys: string[], message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Empty strings in .env mean "unset"
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
    throw new ConfigError(keys, `Invalid environment configuration: ${keys.join(', ')}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    env: e.NODE_ENV,
    agent: {
      baseUrl: e.AGENT_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.AGENT_API_KEY,
      channelId: e.AGENT_CHANNEL_ID,
      timeoutMs: e.AGENT_API_TIMEOUT_MS,
    },
    webhook: {
      secret: e.WEBHOOK_SECRET,
      batchDelayMs: e.WEBHOOK_BATCH_DELAY_MS,
    },
    sessionCookie: {
      // Per-process secret: visitor identities do not survive a restart
      secret: e.SESSION_COOKIE_SECRET ?? randomBytes(16).toString('hex'),
      ttlSeconds: e.SESSION_COOKIE_TTL_SECONDS,
    },
    defaultAvatarUrl: e.DEFAULT_AVATAR_URL,
    staticDir: e.STATIC_DIR,
    corsOrigins: (e.CORS_ORIGINS ?? '').split(',').map(origin => origin.trim()).filter(Boolean),
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
