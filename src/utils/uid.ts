/**
 * UID generation under the 2.25 root (PS3.5 B.2): a 128-bit integer in decimal.
 */

import { randomUUID } from 'crypto';
import type { SeededRandom } from './random';

export const UID_ROOT = '2.25';
export const MAX_UID_LENGTH = 64;

const UID_PATTERN = /^(0|[1-9][0-9]*)(\.(0|[1-9][0-9]*))*$/;

/**
 * 128-bit integer value of a UUID (PS3.5 B.2)
 */
export function uuidToUint128(uuid: string): bigint {
  const hex = uuid.replace(/-/g, '');
  if (!/^[0-9a-f]{32}$/i.test(hex)) {
    throw new RangeError(`Not a UUID: ${uuid}`);
  }
  return BigInt(`0x${hex}`);
}

/**
 * Draw a new UID. A seeded source yields the same UIDs on every run; any
 * other source takes them from a random UUID. The stream advances either
 * way, so the rest of an unseeded run matches a rerun with its seed.
 */
export function generateUid(random: SeededRandom): string {
  const drawn = random.nextUint128();
  const value = random.reproducible ? drawn : uuidToUint128(randomUUID());
  return `${UID_ROOT}.${value.toString(10)}`;
}

/**
 * Dotted-numeric, no leading zeros, at most 64 characters
 */
export function isValidUid(uid: string): boolean {
  return uid.length > 0 && uid.length <= MAX_UID_LENGTH && UID_PATTERN.test(uid);
}
