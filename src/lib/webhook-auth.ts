import { createHmac, timingSafeEqual } from 'crypto';
import { loggers } from './logger.js';

export const SIGNATURE_HEADER = 'x-line-signature';

export interface WebhookVerificationResult {
  valid: boolean;
  error?: string;
}

export interface VerifyOptions {
  /**
   * Development only: accept requests when no shared secret is configured.
   * A configured secret is always enforced.
   */
  allowUnsigned?: boolean;
}

export function computeSignature(secret: string, rawBody: string | Uint8Array): string {
  return createHmac('sha256', secret).update(rawBody).digest('base64');
}

/**
 * Verify a webhook body against its base64 HMAC-SHA256 signature.
 * Compares in constant time over the exact raw bytes of the body.
 */
export function verifyWebhookSignature(
  rawBody: string | Uint8Array,
  signatureHeader: string | null | undefined,
  secret: string | undefined,
  options: VerifyOptions = {}
): WebhookVerificationResult {
  if (!secret) {
    if (options.allowUnsigned) {
      loggers.warn('Webhook secret not configured, accepting unsigned request (development mode)');
      return { valid: true };
    }
    return { valid: false, error: 'Webhook secret not configured' };
  }

  if (!signatureHeader) {
    return { valid: false, error: 'Missing signature header' };
  }

  const expectedBuffer = Buffer.from(computeSignature(secret, rawBody), 'utf8');
  const actualBuffer = Buffer.from(signatureHeader.trim(), 'utf8');

  if (expectedBuffer.length !== actualBuffer.length) {
    // keep the comparison cost independent of where the mismatch is
    timingSafeEqual(expectedBuffer, expectedBuffer);
    return { valid: false, error: 'Invalid signature' };
  }

  if (!timingSafeEqual(expectedBuffer, actualBuffer)) {
    return { valid: false, error: 'Invalid signature' };
  }

  return { valid: true };
}
