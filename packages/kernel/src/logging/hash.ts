/**
 * Fleetwire Kernel: Argument Hashing
 *
 * SHA-256 over canonical JSON (sorted keys at every level), so two calls
 * with the same arguments hash identically regardless of key order.
 */

import { createHash } from 'node:crypto';
import { canonicalJson, type JsonObject } from '../types/json.js';

export function computeArgsHash(args: JsonObject): string {
  return createHash('sha256').update(canonicalJson(args)).digest('hex');
}
