/**
 * mri-dicom-synth: synthetic DICOM MR series generator
 *
 * Solves a byte budget into per-frame geometry, writes Explicit VR Little
 * Endian Part 10 files with plausible MR metadata, and indexes them in a
 * DICOMDIR.
 *
 * @module mri-dicom-synth
 */

/** Run orchestration */
export {
  generateSeries,
  type GenerationPlan,
  type GenerationReporter,
  type GenerationResult,
} from './core/generator';
export {
  GeneratorOptionsSchema,
  StudyOverridesSchema,
  resolveGeneratorOptions,
  type GeneratorOptions,
  type GeneratorOptionsInput,
  type StudyOverrides,
} from './core/options';

/** Building blocks */
export { parseSize, parseSizeSpec, sizeSpecToBytes, formatBytes } from './utils/size';
export {
  calculateDimensions,
  frameByteLength,
  roundToMatrixSize,
  METADATA_OVERHEAD_BYTES,
  MAX_PIXEL_BYTES,
} from './core/dimensions';
export { createStudyContext, createInstanceRecord, type InstanceInput } from './core/metadata';
export { synthesizePixels, MAX_INTENSITY } from './core/pixelData';
export { encodeInstance, encodeInstanceChunks, instanceToDataset } from './core/instance';
export { buildDicomDir, DICOMDIR_NAME, type DicomDirOptions, type DicomDirResult } from './core/dicomdir';
export { inspectDirectory, inspectFile, type InspectionReport, type InstanceSummary } from './core/inspector';

/** Part 10 reading and writing */
export { write, writeChunks, serializeDataset, ElementStreamWriter, type WriteOptions } from './core/writer';
export { readDicom, readDicomHeader, readPixelSamples, type DicomDataSet, type ReadOptions } from './core/reader';
export { TAGS, UIDS, element, elements, getTagName, type TagKeyword } from './core/tags';
export { SafeDataView } from './utils/SafeDataView';
export { formatTagWithComma, normalizeTag } from './utils/tagUtils';

/** Randomness and identifiers */
export { SeededRandom, randomSeed, validateSeed, MAX_SEED } from './utils/random';
export { generateUid, isValidUid, uuidToUint128, UID_ROOT } from './utils/uid';
export { checkDiskSpace, instanceFileName, writeFileAtomic, MAX_INSTANCE_COUNT } from './utils/files';

export {
  DicomSynthError,
  DicomParseError,
  EncodingError,
  IndexBuildError,
  InsufficientSpaceError,
  InvalidFormatError,
  InvalidOptionsError,
  PayloadTooLargeError,
  type DicomErrorCode,
} from './core/errors';
export type {
  DicomElement,
  DimensionResult,
  ElementDict,
  ElementValue,
  GeneratedFile,
  ImageGeometry,
  InstanceRecord,
  PatientSex,
  PixelDataLocation,
  SizeSpec,
  SizeUnit,
  StudyContext,
  VR,
} from './core/types';
