import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import { signWebhookPayload } from '../src/services/webhooks/webhook-signature.js';
import { buildMessageEvent, TEST_WEBHOOK_SECRET } from './helpers/fixtures.js';
import { createTestApp } from './helpers/test-app.js';

function signedHeaders(body: string, id = 'msg_1', timestamp = Math.floor(Date.now() / 1000)) {
  return {
    'webhook-id': id,
    'webhook-timestamp': String(timestamp),
    'webhook-signature': signWebhookPayload(TEST_WEBHOOK_SECRET, id, timestamp, body),
  };
}

describe('POST /webhooks/message', () => {
  let ctx: ReturnType<typeof createTestApp>;

  beforeEach(async () => {
    ctx = createTestApp();
    await ctx.relay.openConversation({ displayName: 'Alice Jones' });
  });

  afterEach(() => {
    ctx.dispatcher.batcher.dispose();
  });

  function post(body: string, headers: Record<string, string>) {
    return request(ctx.app)
      .post('/webhooks/message')
      .set('Content-Type', 'application/json')
      .set(headers)
      .send(body);
  }

  it('queues a signed message and shows it after the batch flushes', async () => {
    const body = JSON.stringify(buildMessageEvent());

    const response = await post(body, signedHeaders(body));

    assert.equal(response.status, 204);
    assert.equal(ctx.dispatcher.batcher.pending, 1);

    ctx.dispatcher.batcher.flush();

    const transcript = ctx.relay.getTranscript('conv-1');
    assert.equal(transcript.messages.length, 1);
    assert.deepEqual(transcript.messages[0]?.content, { type: 'text', body: 'Hello from the agent' });
  });

  it('delivers out-of-order messages by timestamp', async () => {
    const later = JSON.stringify(buildMessageEvent({
      messageId: 'm-2',
      timestamp: '2024-05-01T12:00:02.000Z',
      content: { type: 'text', body: 'second' },
    }));
    const earlier = JSON.stringify(buildMessageEvent({
      messageId: 'm-1',
      timestamp: '2024-05-01T12:00:01.000Z',
      content: { type: 'text', body: 'first' },
    }));

    assert.equal((await post(later, signedHeaders(later, 'msg_2'))).status, 204);
    assert.equal((await post(earlier, signedHeaders(earlier, 'msg_1'))).status, 204);
    ctx.dispatcher.batcher.flush();

    const bodies = ctx.relay.getTranscript('conv-1').messages.map(m => m.content.type === 'text' ? m.content.body : '');
    assert.deepEqual(bodies, ['first', 'second']);
  });

  it('rejects an invalid signature without dispatching', async () => {
    const body = JSON.stringify(buildMessageEvent());
    const headers = signedHeaders(body);
    headers['webhook-signature'] = 'v1,aW52YWxpZA==';

    const response = await post(body, headers);

    assert.equal(response.status, 400);
    assert.equal(response.body.error, 'Bad Request');
    assert.equal(response.body.code, 'INVALID_SIGNATURE');
    assert.equal(ctx.dispatcher.batcher.pending, 0);
  });

  it('rejects a stale delivery', async () => {
    const body = JSON.stringify(buildMessageEvent());

    const response = await post(body, signedHeaders(body, 'msg_1', Math.floor(Date.now() / 1000) - 3600));

    assert.equal(response.status, 400);
    assert.equal(response.body.code, 'INVALID_SIGNATURE');
    assert.equal(ctx.dispatcher.batcher.pending, 0);
  });

  it('rejects unsigned requests', async () => {
    const body = JSON.stringify(buildMessageEvent());

    const response = await post(body, {});

    assert.equal(response.status, 400);
    assert.equal(response.body.code, 'INVALID_SIGNATURE');
  });

  it('disables the chat when the conversation ends', async () => {
    const body = JSON.stringify({
      type: 'v1.conversation.ended',
      timestamp: '2024-05-01T12:05:00.000Z',
      data: {
        conversation_id: 'conv-1',
        channel_id: 'channel-1',
        end_user_id: 'user-1',
        ended_by: { id: 'agent-7', role: 'ai_agent' },
      },
    });

    const response = await post(body, signedHeaders(body));

    assert.equal(response.status, 204);
    assert.equal(ctx.relay.getTranscript('conv-1').ended, true);
    assert.deepEqual(ctx.agent.ended, []);
  });

  it('acknowledges unsupported event types', async () => {
    const body = JSON.stringify({ type: 'v1.conversation.created', data: { conversation_id: 'conv-1' } });

    const response = await post(body, signedHeaders(body));

    assert.equal(response.status, 204);
    assert.equal(ctx.dispatcher.batcher.pending, 0);
  });

  it('rejects a signed body that is not JSON', async () => {
    const body = 'not json';

    const response = await post(body, signedHeaders(body));

    assert.equal(response.status, 400);
    assert.equal(response.body.code, 'VALIDATION_ERROR');
    assert.equal(response.body.error, 'Webhook body is not valid JSON');
  });

  it('rejects a signed message event with missing fields', async () => {
    const body = JSON.stringify({ type: 'v1.conversation.message', timestamp: '2024-05-01T12:00:00Z', data: {} });

    const response = await post(body, signedHeaders(body));

    assert.equal(response.status, 400);
    assert.equal(response.body.error, 'Invalid webhook event');
  });
});
