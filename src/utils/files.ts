/**
 * File helpers: atomic writes, prefix reads, free-space checks
 */

import * as fs from 'fs';
import * as path from 'path';
import { InsufficientSpaceError } from '../core/errors';
import { formatBytes } from './size';

export const PART_SUFFIX = '.part';

/** Largest single write; Node rejects lengths above 2^31 - 1 */
export const MAX_WRITE_BYTES = 1024 * 1024 * 1024;

/** Referenced File ID components hold at most 8 characters */
export const MAX_FILE_NAME_LENGTH = 8;

const INSTANCE_PREFIX = 'IMG';

/** Instance names stay within 8 characters up to this count */
export const MAX_INSTANCE_COUNT = 10 ** MAX_FILE_NAME_LENGTH - 1;

/**
 * Write chunks to `<filePath>.part`, then rename over `filePath`.
 * The partial file is removed if anything fails.
 */
export function writeFileAtomic(
  filePath: string,
  chunks: ReadonlyArray<Uint8Array>,
  maxWriteBytes: number = MAX_WRITE_BYTES
): number {
  const partPath = filePath + PART_SUFFIX;
  let written = 0;
  try {
    const fd = fs.openSync(partPath, 'w');
    try {
      for (const chunk of chunks) {
        let offset = 0;
        while (offset < chunk.length) {
          offset += fs.writeSync(fd, chunk, offset, Math.min(chunk.length - offset, maxWriteBytes));
        }
        written += chunk.length;
      }
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(partPath, filePath);
  } catch (error) {
    fs.rmSync(partPath, { force: true });
    throw error;
  }
  return written;
}

/**
 * Read at most `maxBytes` from the start of a file
 */
export function readFilePrefix(filePath: string, maxBytes: number): Uint8Array {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = new Uint8Array(maxBytes);
    let total = 0;
    while (total < maxBytes) {
      const read = fs.readSync(fd, buffer, total, maxBytes - total, total);
      if (read === 0) break;
      total += read;
    }
    return buffer.subarray(0, total);
  } finally {
    fs.closeSync(fd);
  }
}

function nearestExistingDir(target: string): string {
  let current = path.resolve(target);
  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

/**
 * Free bytes available to this process on the volume holding `dir`
 */
export function availableBytes(dir: string): number {
  const stats = fs.statfsSync(nearestExistingDir(dir));
  return stats.bavail * stats.bsize;
}

/**
 * Throw InsufficientSpaceError when the volume cannot take `requiredBytes`
 */
export function checkDiskSpace(dir: string, requiredBytes: number): void {
  const available = availableBytes(dir);
  if (requiredBytes > available) {
    throw new InsufficientSpaceError(
      `Not enough disk space in ${dir}: need ${formatBytes(requiredBytes)}, have ${formatBytes(available)}`,
      requiredBytes,
      available
    );
  }
}

/**
 * `IMG0001`-style name, zero-padded to 4 digits or to the width of `total`.
 * The prefix shortens (`IM`, `I`, none) as digits are added, so every name
 * fits a Referenced File ID component.
 */
export function instanceFileName(instanceNumber: number, total: number): string {
  if (total > MAX_INSTANCE_COUNT) {
    throw new RangeError(`At most ${MAX_INSTANCE_COUNT} instances can be named, got ${total}`);
  }
  const width = Math.max(4, String(total).length);
  const prefix = INSTANCE_PREFIX.slice(0, MAX_FILE_NAME_LENGTH - width);
  return `${prefix}${String(instanceNumber).padStart(width, '0')}`;
}
