/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so upstream calls cannot hang.
 * The deadline covers the whole exchange: headers AND body. The timer is
 * always cleared in finally.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  stage?: string;
  provider?: string;
}

export interface FetchedText {
  status: number;
  ok: boolean;
  text: string;
}

export class UpstreamRequestError extends Error {
  readonly code = 'UPSTREAM_UNREACHABLE';

  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly stage: string,
    public readonly host: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'UpstreamRequestError';
  }
}

export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<FetchedText> {
  const controller = new AbortController();
  const startTime = Date.now();
  // Parse URL for safe logging (no query params)
  const { host, pathname } = new URL(url);
  const stage = config.stage || 'unknown';
  const provider = config.provider || 'unknown';

  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  logger.debug({
    method: options.method || 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    stage,
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    const text = await response.text();

    logger.debug({
      host,
      path: pathname,
      status: response.status,
      durationMs: Date.now() - startTime,
      stage,
    }, '[FETCH] Response');

    return { status: response.status, ok: response.ok, text };
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind: FetchErrorKind = timedOut ? 'TIMEOUT' : 'NETWORK_ERROR';

    logger.warn({
      host,
      path: pathname,
      errorKind,
      durationMs,
      stage,
      error: err instanceof Error ? err.message : String(err),
    }, '[FETCH] Request failed');

    throw new UpstreamRequestError(
      `${provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms (${host})`,
      errorKind,
      provider,
      stage,
      host,
      config.timeoutMs
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
