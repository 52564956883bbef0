import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { MessageBatcher } from '../src/services/webhooks/message-batcher.js';
import type { MessageEvent } from '../src/services/webhooks/webhook-events.schema.js';
import { buildMessageEvent } from './helpers/fixtures.js';

describe('MessageBatcher', () => {
  let batcher: MessageBatcher | undefined;

  afterEach(() => {
    batcher?.dispose();
  });

  it('delivers a batch sorted by event timestamp', () => {
    const delivered: string[] = [];
    batcher = new MessageBatcher(10_000, event => delivered.push(event.data.message_id));

    batcher.push(buildMessageEvent({ messageId: 'second', timestamp: '2024-05-01T12:00:02.000Z' }));
    batcher.push(buildMessageEvent({ messageId: 'third', timestamp: '2024-05-01T12:00:03.000Z' }));
    batcher.push(buildMessageEvent({ messageId: 'first', timestamp: '2024-05-01T12:00:01.000Z' }));

    assert.equal(batcher.pending, 3);
    assert.equal(batcher.flush(), 3);
    assert.deepEqual(delivered, ['first', 'second', 'third']);
    assert.equal(batcher.pending, 0);
  });

  it('keeps arrival order for equal timestamps', () => {
    const delivered: string[] = [];
    batcher = new MessageBatcher(10_000, event => delivered.push(event.data.message_id));

    batcher.push(buildMessageEvent({ messageId: 'a' }));
    batcher.push(buildMessageEvent({ messageId: 'b' }));
    batcher.push(buildMessageEvent({ messageId: 'c' }));
    batcher.flush();

    assert.deepEqual(delivered, ['a', 'b', 'c']);
  });

  it('restarts the delay on every push', async () => {
    const delivered: MessageEvent[] = [];
    batcher = new MessageBatcher(100, event => delivered.push(event));

    batcher.push(buildMessageEvent({ messageId: 'a' }));
    await sleep(60);
    batcher.push(buildMessageEvent({ messageId: 'b' }));
    await sleep(60);

    assert.equal(delivered.length, 0, 'first timer should have been rescheduled');

    await sleep(100);

    assert.deepEqual(delivered.map(e => e.data.message_id), ['a', 'b']);
  });

  it('continues delivering after one delivery throws', () => {
    const delivered: string[] = [];
    batcher = new MessageBatcher(10_000, event => {
      if (event.data.message_id === 'bad') {
        throw new Error('boom');
      }
      delivered.push(event.data.message_id);
    });

    batcher.push(buildMessageEvent({ messageId: 'bad', timestamp: '2024-05-01T12:00:01.000Z' }));
    batcher.push(buildMessageEvent({ messageId: 'good', timestamp: '2024-05-01T12:00:02.000Z' }));

    assert.equal(batcher.flush(), 2);
    assert.deepEqual(delivered, ['good']);
  });

  it('drops queued messages on dispose', async () => {
    const delivered: MessageEvent[] = [];
    batcher = new MessageBatcher(20, event => delivered.push(event));

    batcher.push(buildMessageEvent());
    batcher.dispose();
    await sleep(50);

    assert.equal(delivered.length, 0);
    assert.equal(batcher.pending, 0);
  });
});
