/**
 * Seedable pseudorandom source (mulberry32).
 *
 * One instance is created per generation run and passed explicitly to every
 * consumer; there is no module-level random state.
 */

import { randomInt } from 'crypto';

const UINT32_RANGE = 0x100000000;

/** Largest seed; mulberry32 keeps 32 bits of state */
export const MAX_SEED = 0xffffffff;

/**
 * Fresh 32-bit seed from the OS entropy source
 */
export function randomSeed(): number {
  return randomInt(0, UINT32_RANGE);
}

export function validateSeed(seed: number): number {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
  return seed;
}

export class SeededRandom {
  readonly seed: number;
  /**
   * False when the seed was drawn here rather than given. UIDs from such a
   * source come from the OS entropy pool instead of the stream.
   */
  readonly reproducible: boolean;
  private state: number;

  constructor(seed?: number) {
    this.reproducible = seed !== undefined;
    this.seed = seed === undefined ? randomSeed() : validateSeed(seed);
    this.state = this.seed;
  }

  /** Uniform integer in [0, 2^32) */
  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return (x ^ (x >>> 14)) >>> 0;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`Invalid integer range [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /** Uniform float in [min, max) */
  float(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  pick<T>(items: ReadonlyArray<T>): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  /** Uniform 128-bit unsigned integer */
  nextUint128(): bigint {
    let value = 0n;
    for (let i = 0; i < 4; i++) {
      value = (value << 32n) | BigInt(this.nextUint32());
    }
    return value;
  }
}
