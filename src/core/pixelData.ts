/**
 * Pixel Synthesizer: uniform 12-bit noise on a 16-bit grid.
 */

import { SeededRandom } from '../utils/random';
import type { ImageGeometry } from './types';

/** Exclusive upper bound of generated intensities (12-bit) */
export const MAX_INTENSITY = 4096;

export function assertValidGeometry(geometry: ImageGeometry): void {
  const { width, height } = geometry;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid geometry ${width}x${height}`);
  }
}

/**
 * Generate a row-major grid of width * height samples in [0, 4096).
 * The same seed always yields the same grid.
 */
export function synthesizePixels(geometry: ImageGeometry, seed?: number): Uint16Array {
  assertValidGeometry(geometry);

  const random = new SeededRandom(seed);
  const pixels = new Uint16Array(geometry.width * geometry.height);
  for (let i = 0; i < pixels.length; i++) {
    // top 12 bits of a uniform 32-bit draw
    pixels[i] = random.nextUint32() >>> 20;
  }
  return pixels;
}
