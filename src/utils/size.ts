/**
 * Size strings ("100MB", "4.5GB") to byte counts and back
 */

import { InvalidFormatError } from '../core/errors';
import type { SizeSpec, SizeUnit } from '../core/types';

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)(KB|MB|GB)$/i;

export const SIZE_MULTIPLIERS: Record<SizeUnit, number> = {
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

function isSizeUnit(unit: string): unit is SizeUnit {
  return unit in SIZE_MULTIPLIERS;
}

/**
 * Parse a size string into its magnitude and unit
 */
export function parseSizeSpec(input: string): SizeSpec {
  const match = SIZE_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidFormatError(`Invalid size format: '${input}'. Use a format like '100MB' or '4.5GB'`, input);
  }

  const magnitude = Number(match[1]);
  const unit = match[2].toUpperCase();
  if (!isSizeUnit(unit)) {
    throw new InvalidFormatError(`Unsupported unit '${match[2]}'. Use KB, MB or GB`, input);
  }
  if (!(magnitude > 0)) {
    throw new InvalidFormatError(`Size must be greater than zero: '${input}'`, input);
  }
  return { magnitude, unit };
}

/**
 * Resolve a size spec to bytes, truncated toward zero
 */
export function sizeSpecToBytes(spec: SizeSpec): number {
  return Math.trunc(spec.magnitude * SIZE_MULTIPLIERS[spec.unit]);
}

/**
 * Parse a size string (e.g. "4.5GB") into a byte count
 */
export function parseSize(input: string): number {
  return sizeSpecToBytes(parseSizeSpec(input));
}

/**
 * Human-readable byte count using the largest unit that keeps the value >= 1
 */
export function formatBytes(bytes: number): string {
  if (bytes >= SIZE_MULTIPLIERS.GB) return `${(bytes / SIZE_MULTIPLIERS.GB).toFixed(2)} GB`;
  if (bytes >= SIZE_MULTIPLIERS.MB) return `${(bytes / SIZE_MULTIPLIERS.MB).toFixed(2)} MB`;
  if (bytes >= SIZE_MULTIPLIERS.KB) return `${(bytes / SIZE_MULTIPLIERS.KB).toFixed(2)} KB`;
  return `${bytes} B`;
}
