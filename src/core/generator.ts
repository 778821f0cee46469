/**
 * Series Generator
 *
 * Orchestrates one run: size -> geometry -> study context -> one Part 10 file
 * per frame -> DICOMDIR. Core code never prints; progress goes to the
 * reporter the caller passes in.
 */

import * as fs from 'fs';
import * as path from 'path';
import { calculateDimensions, METADATA_OVERHEAD_BYTES } from './dimensions';
import { buildDicomDir, type DicomDirResult } from './dicomdir';
import { IndexBuildError, InvalidOptionsError } from './errors';
import { encodeInstanceChunks } from './instance';
import { createInstanceRecord, createStudyContext } from './metadata';
import { resolveGeneratorOptions, type GeneratorOptionsInput } from './options';
import type { DimensionResult, GeneratedFile, ImageGeometry, StudyContext } from './types';
import { instanceFileName, writeFileAtomic } from '../utils/files';
import { SeededRandom } from '../utils/random';
import { formatBytes, parseSize } from '../utils/size';
import { generateUid } from '../utils/uid';

export interface GenerationPlan {
  outputDir: string;
  frameCount: number;
  targetBytes: number;
  geometry: ImageGeometry;
  seed: number;
  context: StudyContext;
}

export interface GenerationResult {
  outputDir: string;
  geometry: ImageGeometry;
  targetBytes: number;
  /** Bytes of instance files actually written */
  totalBytes: number;
  clamped: boolean;
  seed: number;
  files: GeneratedFile[];
  dicomdirPath?: string;
  /** Set when the index could not be built; the instance files are still valid */
  indexError?: IndexBuildError;
}

/**
 * Progress hooks. Every method is optional.
 */
export interface GenerationReporter {
  onPlan?(plan: GenerationPlan): void;
  onClamp?(dimensions: DimensionResult): void;
  onFileWritten?(file: GeneratedFile, total: number): void;
  onIndexWritten?(index: DicomDirResult): void;
  onIndexFailed?(error: IndexBuildError): void;
  onComplete?(result: GenerationResult): void;
}

/**
 * Generate a complete synthetic MR series on disk
 */
export function generateSeries(input: GeneratorOptionsInput, reporter: GenerationReporter = {}): GenerationResult {
  const options = resolveGeneratorOptions(input);
  const targetBytes = parseSize(options.totalSize);
  if (targetBytes <= METADATA_OVERHEAD_BYTES) {
    const issue = `totalSize: ${formatBytes(targetBytes)} does not exceed the ${formatBytes(METADATA_OVERHEAD_BYTES)} metadata overhead`;
    throw new InvalidOptionsError(`Invalid generator options: ${issue}`, [issue]);
  }

  const dimensions = calculateDimensions(targetBytes, options.frameCount);
  if (dimensions.clamped) {
    reporter.onClamp?.(dimensions);
  }
  const { geometry } = dimensions;

  const outputDir = path.resolve(options.outputDir);
  fs.mkdirSync(outputDir, { recursive: true });

  const random = new SeededRandom(options.seed);
  const { seed } = random;
  const context = createStudyContext(random, options.overrides);
  reporter.onPlan?.({ outputDir, frameCount: options.frameCount, targetBytes, geometry, seed, context });

  const files: GeneratedFile[] = [];
  let totalBytes = 0;
  for (let instanceNumber = 1; instanceNumber <= options.frameCount; instanceNumber++) {
    const pixelSeed = random.nextUint32();
    const record = createInstanceRecord(context, { geometry, instanceNumber, random, pixelSeed });

    const fileName = instanceFileName(instanceNumber, options.frameCount);
    const filePath = path.join(outputDir, fileName);
    const byteLength = writeFileAtomic(filePath, encodeInstanceChunks(record));

    const file: GeneratedFile = {
      path: filePath,
      fileName,
      sopInstanceUID: record.sopInstanceUID,
      studyUID: context.studyUID,
      seriesUID: context.seriesUID,
      patientID: context.patientID,
      instanceNumber,
      byteLength,
    };
    files.push(file);
    totalBytes += byteLength;
    reporter.onFileWritten?.(file, options.frameCount);
  }

  const result: GenerationResult = {
    outputDir,
    geometry,
    targetBytes,
    totalBytes,
    clamped: dimensions.clamped,
    seed,
    files,
  };

  if (options.dicomdir) {
    try {
      const index = buildDicomDir(
        outputDir,
        files.map((file) => file.path),
        { sopInstanceUID: generateUid(random) }
      );
      result.dicomdirPath = index.path;
      reporter.onIndexWritten?.(index);
    } catch (error) {
      if (!(error instanceof IndexBuildError)) throw error;
      result.indexError = error;
      reporter.onIndexFailed?.(error);
    }
  }

  reporter.onComplete?.(result);
  return result;
}
