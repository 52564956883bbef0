/**
 * Inbound Message Batcher
 *
 * Webhook deliveries can arrive out of order. Messages are buffered and every
 * push restarts a single flush timer; on flush the batch is sorted by event
 * timestamp and handed to the delivery callback in order.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { MessageEvent } from './webhook-events.schema.js';

export type DeliverMessage = (event: MessageEvent) => void;

export class MessageBatcher {
  private queue: MessageEvent[] = [];
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly delayMs: number,
    private readonly deliver: DeliverMessage
  ) { }

  push(event: MessageEvent): void {
    this.queue.push(event);

    if (this.timer) {
      clearTimeout(this.timer);
      logger.debug({ queued: this.queue.length }, '[Batcher] Rescheduling flush');
    } else {
      logger.debug({ queued: this.queue.length }, '[Batcher] Scheduling flush');
    }

    this.timer = setTimeout(() => this.flush(), this.delayMs);
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Deliver everything queued so far, oldest event first
   */
  flush(): number {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    const batch = this.queue;
    this.queue = [];

    // Array.prototype.sort is stable, so equal timestamps keep arrival order
    batch.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));

    for (const event of batch) {
      try {
        this.deliver(event);
      } catch (err) {
        logger.error({
          messageId: event.data.message_id,
          conversationId: event.data.conversation_id,
          error: err instanceof Error ? err.message : String(err),
        }, '[Batcher] Message delivery failed');
      }
    }

    if (batch.length > 0) {
      logger.debug({ delivered: batch.length }, '[Batcher] Batch flushed');
    }
    return batch.length;
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.queue = [];
  }
}
