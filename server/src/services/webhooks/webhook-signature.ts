/**
 * Webhook Signature Verification
 *
 * Deliveries are signed with the Standard Webhooks scheme; svix does the
 * HMAC check and the 5 minute timestamp window. A `whsec_` secret is
 * base64 after the prefix, anything else is used as raw bytes.
 */

import { Webhook, WebhookVerificationError as SvixVerificationError } from 'svix';

const SECRET_PREFIX = 'whsec_';
const HEADER_NAMES = [
  'webhook-id',
  'webhook-timestamp',
  'webhook-signature',
  'svix-id',
  'svix-timestamp',
  'svix-signature',
] as const;

export type WebhookVerificationReason = 'missing_headers' | 'rejected';

export class WebhookVerificationError extends Error {
  constructor(
    public readonly reason: WebhookVerificationReason,
    detail: string
  ) {
    super(`Webhook verification failed: ${detail}`);
    this.name = 'WebhookVerificationError';
  }
}

export type WebhookHeaders = Record<string, string | string[] | undefined>;

export function createWebhookVerifier(secret: string): Webhook {
  return secret.startsWith(SECRET_PREFIX)
    ? new Webhook(secret)
    : new Webhook(secret, { format: 'raw' });
}

function pickSignatureHeaders(headers: WebhookHeaders): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const name of HEADER_NAMES) {
    const value = headers[name];
    const first = Array.isArray(value) ? value[0] : value;
    if (first) {
      picked[name] = first;
    }
  }
  return picked;
}

function hasHeader(headers: Record<string, string>, suffix: string): boolean {
  return Boolean(headers[`webhook-${suffix}`] ?? headers[`svix-${suffix}`]);
}

/**
 * Header value for `webhook-signature`, for local tooling and tests
 * @param timestamp seconds since epoch
 */
export function signWebhookPayload(secret: string, id: string, timestamp: number, payload: string): string {
  return createWebhookVerifier(secret).sign(id, new Date(timestamp * 1000), payload);
}

export interface VerifiedWebhook {
  id: string;
  /** JSON-decoded body */
  body: unknown;
}

/**
 * Verify a webhook delivery against the shared signing secret.
 * Header names must be lower-case (as Node delivers them).
 * A correctly signed body that is not JSON surfaces as a SyntaxError.
 */
export function verifyWebhookSignature(
  verifier: Webhook,
  payload: string,
  headers: WebhookHeaders
): VerifiedWebhook {
  const signatureHeaders = pickSignatureHeaders(headers);

  if (!hasHeader(signatureHeaders, 'id') || !hasHeader(signatureHeaders, 'timestamp') || !hasHeader(signatureHeaders, 'signature')) {
    throw new WebhookVerificationError('missing_headers', 'missing signature headers');
  }

  let body: unknown;
  try {
    body = verifier.verify(payload, signatureHeaders);
  } catch (err) {
    if (err instanceof SvixVerificationError) {
      throw new WebhookVerificationError('rejected', err.message);
    }
    throw err;
  }

  return {
    id: signatureHeaders['webhook-id'] ?? signatureHeaders['svix-id'] ?? '',
    body,
  };
}
