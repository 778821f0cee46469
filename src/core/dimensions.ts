/**
 * Dimension Solver: byte budget + frame count -> square acquisition matrix.
 */

import type { DimensionResult } from './types';

/** Fixed per-run estimate of everything that is not pixel data */
export const METADATA_OVERHEAD_BYTES = 100 * 1024;

/** Pixel budget ceiling: 10 MiB below the 32-bit element length limit */
export const MAX_PIXEL_BYTES = 2 ** 32 - 1 - 10 * 1024 * 1024;

export const BYTES_PER_SAMPLE = 2;
export const MIN_DIMENSION = 128;

function integerSqrt(value: number): number {
  let root = Math.floor(Math.sqrt(value));
  while (root * root > value) root--;
  while ((root + 1) * (root + 1) <= value) root++;
  return root;
}

/**
 * Round down to a realistic matrix size: multiple of 256, else 128, never below 128
 */
export function roundToMatrixSize(side: number): number {
  if (side >= 256) return Math.floor(side / 256) * 256;
  return MIN_DIMENSION;
}

/**
 * Solve the per-frame geometry for a total byte budget.
 *
 * Callers validate `frameCount >= 1` and `totalBytes > METADATA_OVERHEAD_BYTES`
 * first; both are contract violations here.
 */
export function calculateDimensions(totalBytes: number, frameCount: number): DimensionResult {
  if (!Number.isInteger(frameCount) || frameCount < 1) {
    throw new RangeError(`Frame count must be a positive integer, got ${frameCount}`);
  }
  if (!Number.isFinite(totalBytes) || totalBytes <= METADATA_OVERHEAD_BYTES) {
    throw new RangeError(
      `Total size must exceed the ${METADATA_OVERHEAD_BYTES}-byte metadata overhead, got ${totalBytes}`
    );
  }

  let availableBytes = Math.floor(totalBytes) - METADATA_OVERHEAD_BYTES;
  const clamped = availableBytes > MAX_PIXEL_BYTES;
  if (clamped) {
    availableBytes = MAX_PIXEL_BYTES;
  }

  const totalSamples = Math.floor(availableBytes / BYTES_PER_SAMPLE);
  const samplesPerFrame = Math.floor(totalSamples / frameCount);
  const side = roundToMatrixSize(integerSqrt(samplesPerFrame));

  return {
    geometry: { width: side, height: side },
    availableBytes,
    clamped,
  };
}

/**
 * Pixel bytes of one frame
 */
export function frameByteLength(width: number, height: number): number {
  return width * height * BYTES_PER_SAMPLE;
}
