/**
 * Fleetwire Runtime Host: ULID
 *
 * 26-character Crockford Base32 identifier: 10 characters of millisecond
 * timestamp followed by 16 characters of randomness. Sorts by creation
 * time at millisecond resolution; used as `event_id` on log lines.
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest % 32n)) + out;
    rest /= 32n;
  }
  return out;
}

export function ulid(now: number = Date.now()): string {
  const random = BigInt('0x' + randomBytes(10).toString('hex'));
  return encode(BigInt(now), 10) + encode(random, 16);
}
