import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, loadConfig } from '../src/config/env.js';

const REQUIRED_ENV = {
  AGENT_BASE_URL: 'https://agents.example.test/',
  AGENT_API_KEY: 'test-api-key',
  AGENT_CHANNEL_ID: 'channel-1',
  WEBHOOK_SECRET: 'test-secret',
};

describe('loadConfig', () => {
  it('applies defaults when only required variables are set', () => {
    const config = loadConfig({ ...REQUIRED_ENV });

    assert.equal(config.port, 3000);
    assert.equal(config.env, 'development');
    assert.equal(config.agent.baseUrl, 'https://agents.example.test');
    assert.equal(config.agent.timeoutMs, 10_000);
    assert.equal(config.webhook.batchDelayMs, 2000);
    assert.equal(config.sessionCookie.ttlSeconds, 604_800);
    assert.equal(config.staticDir, 'server/public');
    assert.equal(config.defaultAvatarUrl, undefined);
    assert.deepEqual(config.corsOrigins, []);
  });

  it('splits CORS_ORIGINS', () => {
    const config = loadConfig({ ...REQUIRED_ENV, CORS_ORIGINS: 'https://a.example.test, https://b.example.test,' });

    assert.deepEqual(config.corsOrigins, ['https://a.example.test', 'https://b.example.test']);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ ...REQUIRED_ENV, PORT: '8080', WEBHOOK_BATCH_DELAY_MS: '0' });

    assert.equal(config.port, 8080);
    assert.equal(config.webhook.batchDelayMs, 0);
  });

  it('generates a cookie secret when SESSION_COOKIE_SECRET is blank', () => {
    const config = loadConfig({ ...REQUIRED_ENV, SESSION_COOKIE_SECRET: '  ' });

    assert.match(config.sessionCookie.secret, /^[0-9a-f]{32}$/);
  });

  it('keeps an explicit cookie secret', () => {
    const config = loadConfig({ ...REQUIRED_ENV, SESSION_COOKIE_SECRET: 'test-cookie-secret' });

    assert.equal(config.sessionCookie.secret, 'test-cookie-secret');
  });

  it('names every missing required variable', () => {
    assert.throws(
      () => loadConfig({}),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepEqual(
          [...err.invalidKeys].sort(),
          ['AGENT_API_KEY', 'AGENT_BASE_URL', 'AGENT_CHANNEL_ID', 'WEBHOOK_SECRET']
        );
        return true;
      }
    );
  });

  it('rejects a malformed base URL', () => {
    assert.throws(
      () => loadConfig({ ...REQUIRED_ENV, AGENT_BASE_URL: 'not a url' }),
      (err: unknown) => err instanceof ConfigError && err.invalidKeys.includes('AGENT_BASE_URL')
    );
  });
});
