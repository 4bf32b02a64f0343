/**
 * Message Fingerprint
 *
 * Deterministic key for "the same kind of message": normalized sender plus
 * normalized subject, optionally with the start of the body. Used as the
 * classification cache key. Not meant to be collision resistant.
 */

import * as crypto from 'crypto';
import { normalizeSender, normalizeSubject, BODY_PREVIEW_LENGTH } from './domain';

// Bump when normalization changes so old cache entries stop matching
const FINGERPRINT_VERSION = '1';

export type FingerprintInput = {
  sender: string;
  subject: string;
  body?: string;
};

export function computeFingerprint(input: FingerprintInput, options: { includeBody?: boolean } = {}): string {
  const parts = [normalizeSender(input.sender), normalizeSubject(input.subject)];
  if (options.includeBody) {
    parts.push((input.body ?? '').replace(/\s+/g, ' ').trim().toLowerCase().slice(0, BODY_PREVIEW_LENGTH));
  }
  parts.push(`v${FINGERPRINT_VERSION}`);

  return crypto
    .createHash('sha256')
    .update(parts.join('|'))
    .digest('hex')
    .slice(0, 16);
}
