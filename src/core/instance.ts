/**
 * MR instance encoding: InstanceRecord -> tag/VR/value dict -> Part 10 bytes.
 */

import { createEncodingError, PayloadTooLargeError } from './errors';
import { frameByteLength } from './dimensions';
import { elements, TAGS, UIDS } from './tags';
import type { ElementDict, InstanceRecord } from './types';
import { concatChunks, MAX_LONG_VALUE_LENGTH, writeChunks } from './writer';

export const CHARACTER_SET = 'ISO_IR 192';
export const IMAGE_TYPE = ['ORIGINAL', 'PRIMARY', 'M', 'ND'] as const;
export const IMAGE_ORIENTATION = ['1', '0', '0', '0', '1', '0'] as const;

/** Decimal String rendering used for every acquisition parameter */
export function formatDecimal(value: number, digits = 6): string {
  return value.toFixed(digits);
}

/**
 * Fail before any pixel copy if the grid cannot be encoded
 */
function checkPixelPayload(record: InstanceRecord): void {
  const { width, height } = record.geometry;
  const expectedBytes = frameByteLength(width, height);
  if (expectedBytes > MAX_LONG_VALUE_LENGTH) {
    throw new PayloadTooLargeError(
      `Pixel data of ${width}x${height} needs ${expectedBytes} bytes, above the 32-bit length limit`,
      TAGS.PixelData.tag,
      expectedBytes
    );
  }
  if (record.pixelData.length !== width * height) {
    throw createEncodingError(
      `Pixel grid holds ${record.pixelData.length} samples, geometry ${width}x${height} needs ${width * height}`,
      TAGS.PixelData.tag
    );
  }
}

/**
 * Map an instance onto the closed set of elements it carries
 */
export function instanceToDataset(record: InstanceRecord): ElementDict {
  const { context: ctx, geometry } = record;
  const spacing = formatDecimal(ctx.pixelSpacingMm);

  return elements({
    SpecificCharacterSet: CHARACTER_SET,
    ImageType: IMAGE_TYPE,
    SOPClassUID: UIDS.MRImageStorage,
    SOPInstanceUID: record.sopInstanceUID,
    StudyDate: ctx.studyDate,
    StudyTime: ctx.studyTime,
    AccessionNumber: ctx.accessionNumber,
    Modality: 'MR',
    Manufacturer: ctx.manufacturer,
    StudyDescription: ctx.studyDescription,
    SeriesDescription: ctx.seriesDescription,
    ManufacturerModelName: ctx.modelName,

    PatientName: ctx.patientName,
    PatientID: ctx.patientID,
    PatientBirthDate: ctx.patientBirthDate,
    PatientSex: ctx.patientSex,

    SequenceName: ctx.sequenceName,
    SliceThickness: formatDecimal(ctx.sliceThicknessMm),
    RepetitionTime: formatDecimal(ctx.repetitionTimeMs),
    EchoTime: formatDecimal(ctx.echoTimeMs),
    ImagingFrequency: formatDecimal(ctx.imagingFrequencyMHz),
    MagneticFieldStrength: formatDecimal(ctx.fieldStrengthTesla, 1),
    SpacingBetweenSlices: formatDecimal(ctx.spacingBetweenSlicesMm),
    FlipAngle: formatDecimal(ctx.flipAngleDeg),

    StudyInstanceUID: ctx.studyUID,
    SeriesInstanceUID: ctx.seriesUID,
    StudyID: ctx.studyID,
    SeriesNumber: ctx.seriesNumber,
    InstanceNumber: record.instanceNumber,
    ImagePositionPatient: record.imagePositionPatient.map((v) => formatDecimal(v)),
    ImageOrientationPatient: IMAGE_ORIENTATION,
    FrameOfReferenceUID: ctx.frameOfReferenceUID,
    SliceLocation: formatDecimal(record.sliceLocation),

    SamplesPerPixel: 1,
    PhotometricInterpretation: 'MONOCHROME2',
    Rows: geometry.height,
    Columns: geometry.width,
    PixelSpacing: [spacing, spacing],
    BitsAllocated: 16,
    BitsStored: 16,
    HighBit: 15,
    PixelRepresentation: 0,
    WindowCenter: formatDecimal(ctx.windowCenter, 1),
    WindowWidth: formatDecimal(ctx.windowWidth, 1),

    PixelData: record.pixelData,
  });
}

/**
 * Encode an instance as Part 10 chunks; the pixel chunk is a view, not a copy
 */
export function encodeInstanceChunks(record: InstanceRecord): Uint8Array[] {
  checkPixelPayload(record);
  return writeChunks(instanceToDataset(record), {
    mediaStorageSOPClassUID: UIDS.MRImageStorage,
    mediaStorageSOPInstanceUID: record.sopInstanceUID,
  });
}

/**
 * Encode an instance into a single Part 10 buffer
 */
export function encodeInstance(record: InstanceRecord): Uint8Array {
  return concatChunks(encodeInstanceChunks(record));
}
