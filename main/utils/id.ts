/**
 * Module: id
 *
 * Identifier helpers shared by the engine, storage and channels.
 */

import * as crypto from 'crypto';

/**
 * Dialog instance id
 * Format: aa/bb/cccccccc where a,b are random bytes and c is time-based
 */
export function generateInstanceId(): string {
  const r16 = crypto.randomInt(0x10000);
  const aByte = r16 & 0xff;
  const bByte = (r16 >>> 8) & 0xff;
  const time32 = (Date.now() & 0xffffffff) >>> 0;

  const a = aByte.toString(16).padStart(2, '0');
  const b = bByte.toString(16).padStart(2, '0');
  const c = time32.toString(16).padStart(8, '0');
  return `${a}/${b}/${c}`;
}

export function generateActivityId(): string {
  return crypto.randomUUID();
}

/** Storage-safe file name for a conversation key. */
export function conversationFileName(key: string): string {
  const readable = key.replace(/[^A-Za-z0-9_.-]/g, '_').slice(0, 64);
  const digest = crypto.createHash('md5').update(key).digest('hex').substring(0, 8);
  return `${readable}-${digest}`;
}
