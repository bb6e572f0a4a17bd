import { createHash } from 'node:crypto';
import type { AlertCategory, AlertSource } from '@skyfuse/shared';

export interface FingerprintFields {
  category: AlertCategory;
  source: AlertSource;
  subject: string;
  timestamp: number;
}

/** Index of the dedup-window-sized bucket the timestamp falls in. */
export function timeBucket(timestamp: number, windowSeconds: number): number {
  return Math.floor(timestamp / (windowSeconds * 1000));
}

/**
 * Identity key for "the same logical condition": category, source, subject
 * and coarse time bucket, in that order. Not a security boundary.
 */
export function fingerprint(fields: FingerprintFields, windowSeconds: number): string {
  const canonical = [
    fields.category,
    fields.source,
    fields.subject,
    String(timeBucket(fields.timestamp, windowSeconds)),
  ].join('\u001f');
  return createHash('sha1').update(canonical, 'utf8').digest('hex');
}
