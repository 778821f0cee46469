/**
 * Metadata Builder
 *
 * A StudyContext is drawn once per run from the run's generator and shared,
 * unchanged, by every instance. Each instance adds its own SOP Instance UID,
 * instance number, slice position and pixel grid.
 */

import type { SeededRandom } from '../utils/random';
import { generateUid } from '../utils/uid';
import type { StudyOverrides } from './options';
import { assertValidGeometry, synthesizePixels } from './pixelData';
import type { ImageGeometry, InstanceRecord, PatientSex, StudyContext } from './types';

export interface ScannerModel {
  manufacturer: string;
  modelName: string;
  fieldStrengthTesla: 1.5 | 3.0;
}

export const SCANNER_MODELS: ReadonlyArray<ScannerModel> = [
  { manufacturer: 'SIEMENS', modelName: 'Avanto', fieldStrengthTesla: 1.5 },
  { manufacturer: 'SIEMENS', modelName: 'Skyra', fieldStrengthTesla: 3.0 },
  { manufacturer: 'GE MEDICAL SYSTEMS', modelName: 'Signa HDxt', fieldStrengthTesla: 1.5 },
  { manufacturer: 'GE MEDICAL SYSTEMS', modelName: 'Discovery MR750', fieldStrengthTesla: 3.0 },
  { manufacturer: 'PHILIPS', modelName: 'Achieva', fieldStrengthTesla: 1.5 },
  { manufacturer: 'PHILIPS', modelName: 'Ingenia', fieldStrengthTesla: 3.0 },
];

export const SEQUENCE_NAMES: ReadonlyArray<string> = ['T1_MPRAGE', 'T1_SE', 'T2_FSE', 'T2_FLAIR'];

/** Proton gyromagnetic ratio, MHz per tesla */
export const GYROMAGNETIC_RATIO_MHZ_PER_T = 42.58;

/** Position of the first slice, mm */
const FIRST_SLICE_ORIGIN = -100;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function randomDate(random: SeededRandom, minYear: number, maxYear: number): string {
  const year = random.int(minYear, maxYear);
  const month = random.int(1, 12);
  const day = random.int(1, 28);
  return `${pad(year, 4)}${pad(month, 2)}${pad(day, 2)}`;
}

/**
 * Draw the shared attributes of one run
 */
export function createStudyContext(random: SeededRandom, overrides: StudyOverrides = {}): StudyContext {
  const studyUID = generateUid(random);
  const seriesUID = generateUid(random);
  const frameOfReferenceUID = generateUid(random);

  const patientName = `TEST^PATIENT^${random.int(1000, 9999)}`;
  const patientID = `PID${random.int(100000, 999999)}`;
  const patientBirthDate = randomDate(random, 1950, 2000);
  const patientSex: PatientSex = random.pick(['M', 'F'] as const);

  const studyDate = randomDate(random, 2020, 2024);
  const studyTime = `${pad(random.int(0, 23), 2)}${pad(random.int(0, 59), 2)}${pad(random.int(0, 59), 2)}`;
  const studyID = `STD${random.int(1000, 9999)}`;
  const accessionNumber = `ACC${random.int(100000, 999999)}`;

  const scanner = random.pick(SCANNER_MODELS);
  const echoTimeMs = random.float(10, 30);
  const repetitionTimeMs = random.float(400, 800);
  const flipAngleDeg = random.float(60, 90);
  const sliceThicknessMm = random.float(1.0, 5.0);
  const spacingBetweenSlicesMm = sliceThicknessMm + random.float(0, 0.5);
  const sequenceName = random.pick(SEQUENCE_NAMES);
  const pixelSpacingMm = random.float(0.5, 2.0);
  const windowCenter = random.float(500, 1500);
  const windowWidth = random.float(1000, 2000);

  return Object.freeze({
    studyUID,
    seriesUID,
    frameOfReferenceUID,
    patientID: overrides.patientID ?? patientID,
    patientName: overrides.patientName ?? patientName,
    patientBirthDate,
    patientSex,
    studyDate,
    studyTime,
    studyID,
    studyDescription: overrides.studyDescription ?? 'Brain MRI',
    accessionNumber,
    seriesNumber: 1,
    seriesDescription: overrides.seriesDescription ?? `${sequenceName} Synthetic Series`,
    manufacturer: scanner.manufacturer,
    modelName: scanner.modelName,
    fieldStrengthTesla: scanner.fieldStrengthTesla,
    imagingFrequencyMHz: scanner.fieldStrengthTesla * GYROMAGNETIC_RATIO_MHZ_PER_T,
    echoTimeMs,
    repetitionTimeMs,
    flipAngleDeg,
    sliceThicknessMm,
    spacingBetweenSlicesMm,
    sequenceName,
    pixelSpacingMm,
    windowCenter,
    windowWidth,
  });
}

export interface InstanceInput {
  geometry: ImageGeometry;
  /** 1-based position in generation order */
  instanceNumber: number;
  /** The run's generator; supplies the SOP Instance UID */
  random: SeededRandom;
  /** Seed for this instance's pixel grid, drawn before dispatch */
  pixelSeed?: number;
  /** Pre-built pixel grid, bypasses the synthesizer */
  pixelData?: Uint16Array;
}

/**
 * Build one instance of the series
 */
export function createInstanceRecord(context: StudyContext, input: InstanceInput): InstanceRecord {
  const { geometry, instanceNumber } = input;
  assertValidGeometry(geometry);
  if (!Number.isInteger(instanceNumber) || instanceNumber < 1) {
    throw new RangeError(`Instance number must be a positive integer, got ${instanceNumber}`);
  }

  const sopInstanceUID = generateUid(input.random);
  const pixelData = input.pixelData ?? synthesizePixels(geometry, input.pixelSeed);
  const z = FIRST_SLICE_ORIGIN + (instanceNumber - 1) * context.spacingBetweenSlicesMm;

  return Object.freeze({
    context,
    sopInstanceUID,
    instanceNumber,
    geometry: { width: geometry.width, height: geometry.height },
    pixelData,
    imagePositionPatient: [FIRST_SLICE_ORIGIN, FIRST_SLICE_ORIGIN, z] as const,
    sliceLocation: z,
  });
}
