/**
 * Type definitions for the MRI series generator
 *
 * Element-level types model the raw tag/VR/value encoding step. Everything
 * above that level (study context, instance records) is a closed, typed schema.
 */

/**
 * Value Representations understood by the writer and reader
 */
export type VR =
  | 'AE' | 'AS' | 'CS' | 'DA' | 'DS' | 'DT' | 'FD' | 'FL' | 'IS' | 'LO'
  | 'LT' | 'OB' | 'OD' | 'OF' | 'OL' | 'OW' | 'PN' | 'SH' | 'SL' | 'SQ'
  | 'SS' | 'ST' | 'TM' | 'UC' | 'UI' | 'UL' | 'UN' | 'UR' | 'US' | 'UT';

export type ElementValue =
  | string
  | number
  | ReadonlyArray<string>
  | ReadonlyArray<number>
  | Uint8Array
  | Uint16Array;

/**
 * DICOM Element structure
 * Tags are keyed in the x-prefixed form (e.g. "x00100010") by the enclosing dict.
 */
export interface DicomElement {
  vr: VR;
  Value?: ElementValue;
  /** Sequence items, only for SQ */
  items?: ReadonlyArray<ElementDict>;
}

export type ElementDict = Record<string, DicomElement>;

/**
 * Square acquisition matrix
 */
export interface ImageGeometry {
  width: number;
  height: number;
}

export type SizeUnit = 'KB' | 'MB' | 'GB';

export interface SizeSpec {
  magnitude: number;
  unit: SizeUnit;
}

/**
 * Outcome of solving a byte budget into a per-frame geometry
 */
export interface DimensionResult {
  geometry: ImageGeometry;
  /** Bytes left for pixel data after overhead and clamping */
  availableBytes: number;
  /** True when the pixel budget was capped at the length-field ceiling */
  clamped: boolean;
}

export type PatientSex = 'M' | 'F';

/**
 * Attributes shared by every instance of one generation run
 */
export interface StudyContext {
  readonly studyUID: string;
  readonly seriesUID: string;
  readonly frameOfReferenceUID: string;
  readonly patientID: string;
  readonly patientName: string;
  readonly patientBirthDate: string;
  readonly patientSex: PatientSex;
  readonly studyDate: string;
  readonly studyTime: string;
  readonly studyID: string;
  readonly studyDescription: string;
  readonly accessionNumber: string;
  readonly seriesNumber: number;
  readonly seriesDescription: string;
  readonly manufacturer: string;
  readonly modelName: string;
  readonly fieldStrengthTesla: number;
  readonly imagingFrequencyMHz: number;
  readonly echoTimeMs: number;
  readonly repetitionTimeMs: number;
  readonly flipAngleDeg: number;
  readonly sliceThicknessMm: number;
  readonly spacingBetweenSlicesMm: number;
  readonly sequenceName: string;
  readonly pixelSpacingMm: number;
  readonly windowCenter: number;
  readonly windowWidth: number;
}

/**
 * One frame of the series, ready to encode
 */
export interface InstanceRecord {
  readonly context: StudyContext;
  readonly sopInstanceUID: string;
  /** 1-based rank in generation order */
  readonly instanceNumber: number;
  readonly geometry: ImageGeometry;
  /** Row-major samples, width * height entries */
  readonly pixelData: Uint16Array;
  readonly imagePositionPatient: readonly [number, number, number];
  readonly sliceLocation: number;
}

/**
 * A written instance file and the identifiers the index needs
 */
export interface GeneratedFile {
  path: string;
  fileName: string;
  sopInstanceUID: string;
  studyUID: string;
  seriesUID: string;
  patientID: string;
  instanceNumber: number;
  byteLength: number;
}

/**
 * Byte range of the Pixel Data value inside a file
 */
export interface PixelDataLocation {
  offset: number;
  length: number;
}
