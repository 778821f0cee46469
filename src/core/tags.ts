/**
 * Tag dictionary for every element this package writes or reads back.
 */

import type { DicomElement, ElementDict, ElementValue, VR } from './types';

export interface TagDefinition {
  tag: string;
  vr: VR;
  name: string;
}

export const TAGS = {
  // File Meta Information
  FileMetaInformationGroupLength: { tag: 'x00020000', vr: 'UL', name: 'File Meta Information Group Length' },
  FileMetaInformationVersion: { tag: 'x00020001', vr: 'OB', name: 'File Meta Information Version' },
  MediaStorageSOPClassUID: { tag: 'x00020002', vr: 'UI', name: 'Media Storage SOP Class UID' },
  MediaStorageSOPInstanceUID: { tag: 'x00020003', vr: 'UI', name: 'Media Storage SOP Instance UID' },
  TransferSyntaxUID: { tag: 'x00020010', vr: 'UI', name: 'Transfer Syntax UID' },
  ImplementationClassUID: { tag: 'x00020012', vr: 'UI', name: 'Implementation Class UID' },
  ImplementationVersionName: { tag: 'x00020013', vr: 'SH', name: 'Implementation Version Name' },

  // Directory structuring
  FileSetID: { tag: 'x00041130', vr: 'CS', name: 'File-set ID' },
  OffsetOfTheFirstDirectoryRecordOfTheRootDirectoryEntity: { tag: 'x00041200', vr: 'UL', name: 'Offset of the First Directory Record of the Root Directory Entity' },
  OffsetOfTheLastDirectoryRecordOfTheRootDirectoryEntity: { tag: 'x00041202', vr: 'UL', name: 'Offset of the Last Directory Record of the Root Directory Entity' },
  FileSetConsistencyFlag: { tag: 'x00041212', vr: 'US', name: 'File-set Consistency Flag' },
  DirectoryRecordSequence: { tag: 'x00041220', vr: 'SQ', name: 'Directory Record Sequence' },
  OffsetOfTheNextDirectoryRecord: { tag: 'x00041400', vr: 'UL', name: 'Offset of the Next Directory Record' },
  RecordInUseFlag: { tag: 'x00041410', vr: 'US', name: 'Record In-use Flag' },
  OffsetOfReferencedLowerLevelDirectoryEntity: { tag: 'x00041420', vr: 'UL', name: 'Offset of Referenced Lower-Level Directory Entity' },
  DirectoryRecordType: { tag: 'x00041430', vr: 'CS', name: 'Directory Record Type' },
  ReferencedFileID: { tag: 'x00041500', vr: 'CS', name: 'Referenced File ID' },
  ReferencedSOPClassUIDInFile: { tag: 'x00041510', vr: 'UI', name: 'Referenced SOP Class UID in File' },
  ReferencedSOPInstanceUIDInFile: { tag: 'x00041511', vr: 'UI', name: 'Referenced SOP Instance UID in File' },
  ReferencedTransferSyntaxUIDInFile: { tag: 'x00041512', vr: 'UI', name: 'Referenced Transfer Syntax UID in File' },

  // SOP Common / General Study / General Series
  SpecificCharacterSet: { tag: 'x00080005', vr: 'CS', name: 'Specific Character Set' },
  ImageType: { tag: 'x00080008', vr: 'CS', name: 'Image Type' },
  SOPClassUID: { tag: 'x00080016', vr: 'UI', name: 'SOP Class UID' },
  SOPInstanceUID: { tag: 'x00080018', vr: 'UI', name: 'SOP Instance UID' },
  StudyDate: { tag: 'x00080020', vr: 'DA', name: 'Study Date' },
  StudyTime: { tag: 'x00080030', vr: 'TM', name: 'Study Time' },
  AccessionNumber: { tag: 'x00080050', vr: 'SH', name: 'Accession Number' },
  Modality: { tag: 'x00080060', vr: 'CS', name: 'Modality' },
  Manufacturer: { tag: 'x00080070', vr: 'LO', name: 'Manufacturer' },
  StudyDescription: { tag: 'x00081030', vr: 'LO', name: 'Study Description' },
  SeriesDescription: { tag: 'x0008103e', vr: 'LO', name: 'Series Description' },
  ManufacturerModelName: { tag: 'x00081090', vr: 'LO', name: "Manufacturer's Model Name" },

  // Patient
  PatientName: { tag: 'x00100010', vr: 'PN', name: "Patient's Name" },
  PatientID: { tag: 'x00100020', vr: 'LO', name: 'Patient ID' },
  PatientBirthDate: { tag: 'x00100030', vr: 'DA', name: "Patient's Birth Date" },
  PatientSex: { tag: 'x00100040', vr: 'CS', name: "Patient's Sex" },

  // MR acquisition
  SequenceName: { tag: 'x00180024', vr: 'SH', name: 'Sequence Name' },
  SliceThickness: { tag: 'x00180050', vr: 'DS', name: 'Slice Thickness' },
  RepetitionTime: { tag: 'x00180080', vr: 'DS', name: 'Repetition Time' },
  EchoTime: { tag: 'x00180081', vr: 'DS', name: 'Echo Time' },
  ImagingFrequency: { tag: 'x00180084', vr: 'DS', name: 'Imaging Frequency' },
  MagneticFieldStrength: { tag: 'x00180087', vr: 'DS', name: 'Magnetic Field Strength' },
  SpacingBetweenSlices: { tag: 'x00180088', vr: 'DS', name: 'Spacing Between Slices' },
  FlipAngle: { tag: 'x00181314', vr: 'DS', name: 'Flip Angle' },

  // Relationship / plane
  StudyInstanceUID: { tag: 'x0020000d', vr: 'UI', name: 'Study Instance UID' },
  SeriesInstanceUID: { tag: 'x0020000e', vr: 'UI', name: 'Series Instance UID' },
  StudyID: { tag: 'x00200010', vr: 'SH', name: 'Study ID' },
  SeriesNumber: { tag: 'x00200011', vr: 'IS', name: 'Series Number' },
  InstanceNumber: { tag: 'x00200013', vr: 'IS', name: 'Instance Number' },
  ImagePositionPatient: { tag: 'x00200032', vr: 'DS', name: 'Image Position (Patient)' },
  ImageOrientationPatient: { tag: 'x00200037', vr: 'DS', name: 'Image Orientation (Patient)' },
  FrameOfReferenceUID: { tag: 'x00200052', vr: 'UI', name: 'Frame of Reference UID' },
  SliceLocation: { tag: 'x00201041', vr: 'DS', name: 'Slice Location' },

  // Image pixel
  SamplesPerPixel: { tag: 'x00280002', vr: 'US', name: 'Samples per Pixel' },
  PhotometricInterpretation: { tag: 'x00280004', vr: 'CS', name: 'Photometric Interpretation' },
  Rows: { tag: 'x00280010', vr: 'US', name: 'Rows' },
  Columns: { tag: 'x00280011', vr: 'US', name: 'Columns' },
  PixelSpacing: { tag: 'x00280030', vr: 'DS', name: 'Pixel Spacing' },
  BitsAllocated: { tag: 'x00280100', vr: 'US', name: 'Bits Allocated' },
  BitsStored: { tag: 'x00280101', vr: 'US', name: 'Bits Stored' },
  HighBit: { tag: 'x00280102', vr: 'US', name: 'High Bit' },
  PixelRepresentation: { tag: 'x00280103', vr: 'US', name: 'Pixel Representation' },
  WindowCenter: { tag: 'x00281050', vr: 'DS', name: 'Window Center' },
  WindowWidth: { tag: 'x00281051', vr: 'DS', name: 'Window Width' },

  PixelData: { tag: 'x7fe00010', vr: 'OW', name: 'Pixel Data' },
} as const satisfies Record<string, TagDefinition>;

export type TagKeyword = keyof typeof TAGS;

export function isTagKeyword(name: string): name is TagKeyword {
  return Object.prototype.hasOwnProperty.call(TAGS, name);
}

/**
 * Build an element with the dictionary VR for `keyword`
 */
export function element(keyword: TagKeyword, value: ElementValue): DicomElement {
  return { vr: TAGS[keyword].vr, Value: value };
}

/**
 * Build a dataset from keyword/value pairs. Every VR comes from `TAGS`;
 * undefined values are left out.
 */
export function elements(values: Partial<Record<TagKeyword, ElementValue>>): ElementDict {
  const dict: ElementDict = {};
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined || !isTagKeyword(name)) continue;
    dict[TAGS[name].tag] = element(name, value);
  }
  return dict;
}

const TAG_NAMES: ReadonlyMap<string, string> = new Map(
  Object.values(TAGS).map((definition) => [definition.tag, definition.name])
);

/**
 * Resolve a tag to its dictionary name
 */
export function getTagName(tag: string): string {
  return TAG_NAMES.get(tag.toLowerCase()) ?? `Unknown Tag (${tag})`;
}

/** Well-known UIDs */
export const UIDS = {
  ExplicitVRLittleEndian: '1.2.840.10008.1.2.1',
  MRImageStorage: '1.2.840.10008.5.1.4.1.1.4',
  MediaStorageDirectoryStorage: '1.2.840.10008.1.3.10',
} as const;
