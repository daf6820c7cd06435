/**
 * cmdtree Runtime Host — ULID
 *
 * 26-character, time-sortable identifiers used as `event_id` in the
 * registry event log, so a reader can drop lines duplicated by a sync or a
 * retried write.
 *
 * Layout: 10 Crockford Base32 characters of millisecond time followed by 16
 * characters of randomness from node:crypto.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const ENCODING = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function encode(value: bigint, width: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < width; i++) {
    out = ENCODING.charAt(Number(rest % 32n)) + out;
    rest /= 32n;
  }
  return out;
}

export function ulid(now: number = Date.now()): string {
  const random = randomBytes(10).reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
  return encode(BigInt(now), 10) + encode(random, 16);
}
