/**
 * Content hashing shared by queries and graphs.
 */

import { createHash } from 'node:crypto';

/**
 * SHA-256 of the UTF-8 encoding of `content`, as 64 lowercase hex chars.
 */
export function sha256Hex(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}
