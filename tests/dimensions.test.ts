import { describe, expect, it } from 'vitest';
import {
  calculateDimensions,
  frameByteLength,
  MAX_PIXEL_BYTES,
  METADATA_OVERHEAD_BYTES,
  roundToMatrixSize,
} from '../src/core/dimensions';
import { parseSize } from '../src/utils/size';

describe('dimension solver', () => {
  it('solves 5MB over 5 frames to 512x512', () => {
    const result = calculateDimensions(parseSize('5MB'), 5);
    expect(result.geometry).toEqual({ width: 512, height: 512 });
    expect(result.clamped).toBe(false);
    expect(result.availableBytes).toBe(5 * 1024 * 1024 - METADATA_OVERHEAD_BYTES);
  });

  it('clamps 4.5GB to the length-field ceiling and still yields a large matrix', () => {
    const result = calculateDimensions(parseSize('4.5GB'), 120);
    expect(result.clamped).toBe(true);
    expect(result.availableBytes).toBe(MAX_PIXEL_BYTES);
    expect(result.geometry).toEqual({ width: 4096, height: 4096 });
    expect(frameByteLength(4096, 4096)).toBeLessThanOrEqual(0xfffffffe);
  });

  it('rounds a single large frame down to a multiple of 256', () => {
    const result = calculateDimensions(parseSize('1GB'), 1);
    expect(result.geometry.width).toBe(23040);
    expect(result.geometry.width % 256).toBe(0);
  });

  it('falls back to 128 below 256 samples per side', () => {
    expect(calculateDimensions(200 * 1024, 1).geometry).toEqual({ width: 128, height: 128 });
    expect(calculateDimensions(parseSize('1MB'), 100).geometry).toEqual({ width: 128, height: 128 });
  });

  it('keeps pixel data within the budget whenever the side reaches 256', () => {
    const budgets = ['3MB', '10MB', '64MB', '250MB', '1GB', '3GB'];
    const frameCounts = [1, 3, 7, 20, 64];
    for (const size of budgets) {
      for (const frames of frameCounts) {
        const totalBytes = parseSize(size);
        const { geometry, availableBytes } = calculateDimensions(totalBytes, frames);
        expect(geometry.width).toBe(geometry.height);
        if (geometry.width >= 256) {
          expect(geometry.width % 256).toBe(0);
          expect(frames * frameByteLength(geometry.width, geometry.height)).toBeLessThanOrEqual(availableBytes);
        } else {
          expect(geometry.width).toBe(128);
        }
      }
    }
  });

  it('maps raw sides onto realistic matrix sizes', () => {
    expect(roundToMatrixSize(100)).toBe(128);
    expect(roundToMatrixSize(255)).toBe(128);
    expect(roundToMatrixSize(256)).toBe(256);
    expect(roundToMatrixSize(511)).toBe(256);
    expect(roundToMatrixSize(716)).toBe(512);
  });

  it('rejects contract violations with RangeError', () => {
    expect(() => calculateDimensions(parseSize('5MB'), 0)).toThrow(RangeError);
    expect(() => calculateDimensions(parseSize('5MB'), 1.5)).toThrow(RangeError);
    expect(() => calculateDimensions(METADATA_OVERHEAD_BYTES, 1)).toThrow(RangeError);
  });
});
