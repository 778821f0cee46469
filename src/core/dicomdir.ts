/**
 * DICOMDIR Builder
 *
 * Reads every instance file back, groups it patient -> study -> series, and
 * writes a Media Storage Directory file whose directory records carry real
 * byte offsets. Offsets are measured from the first byte of the file
 * (preamble included).
 */

import * as fs from 'fs';
import * as path from 'path';
import { IndexBuildError, toError } from './errors';
import { readDicomHeader, type DicomDataSet } from './reader';
import { elements, TAGS, UIDS } from './tags';
import type { ElementDict } from './types';
import { concatChunks, serializeItem, writeChunks } from './writer';
import { writeFileAtomic } from '../utils/files';
import { SeededRandom } from '../utils/random';
import { generateUid } from '../utils/uid';

export const DICOMDIR_NAME = 'DICOMDIR';

const MAX_FILE_SET_ID_LENGTH = 16;
const MAX_FILE_ID_COMPONENT_LENGTH = 8;
const FILE_ID_COMPONENT = /^[A-Z0-9_]+$/;
const SEQUENCE_DELIMITER_LENGTH = 8;
const RECORD_IN_USE = 0xffff;

export type DirectoryRecordType = 'PATIENT' | 'STUDY' | 'SERIES' | 'IMAGE';

export interface DicomDirOptions {
  /** Media Storage SOP Instance UID of the DICOMDIR itself */
  sopInstanceUID?: string;
  /** Defaults to the output directory's name */
  fileSetID?: string;
}

export interface DicomDirResult {
  path: string;
  recordCount: number;
}

interface IndexedImage {
  fileId: string[];
  sopClassUID: string;
  sopInstanceUID: string;
  transferSyntaxUID: string;
  instanceNumber: number;
}

interface IndexedSeries {
  seriesUID: string;
  modality: string;
  seriesNumber: number;
  images: IndexedImage[];
}

interface IndexedStudy {
  studyUID: string;
  studyDate: string;
  studyTime: string;
  studyID: string;
  accessionNumber: string;
  studyDescription: string;
  series: Map<string, IndexedSeries>;
}

interface IndexedPatient {
  patientID: string;
  patientName: string;
  studies: Map<string, IndexedStudy>;
}

export interface DirectoryRecord {
  type: DirectoryRecordType;
  fields: ElementDict;
  children: DirectoryRecord[];
}

/**
 * Upper-case CS characters only, at most 16
 */
export function toFileSetID(name: string): string {
  const cleaned = name
    .toUpperCase()
    .replace(/[^A-Z0-9_ ]/g, '_')
    .slice(0, MAX_FILE_SET_ID_LENGTH)
    .trim();
  return cleaned.length > 0 ? cleaned : 'MRI_SERIES';
}

/**
 * Path of a file relative to the file-set root, split into File ID components
 */
export function toFileIdComponents(outputDir: string, filePath: string): string[] {
  const relative = path.relative(outputDir, filePath);
  const components = relative.split(path.sep);
  for (const component of components) {
    if (component.length > MAX_FILE_ID_COMPONENT_LENGTH || !FILE_ID_COMPONENT.test(component)) {
      throw new Error(`"${relative}" is not a valid Referenced File ID (components: 1-8 of A-Z 0-9 _)`);
    }
  }
  return components;
}

function required(dataset: DicomDataSet, tag: string, name: string, fileName: string): string {
  const value = dataset.string(tag);
  if (value === undefined || value.length === 0) {
    throw new Error(`${fileName} has no ${name}`);
  }
  return value;
}

function readInstanceHeader(filePath: string): DicomDataSet {
  const fileName = path.basename(filePath);
  const dataset = readDicomHeader(filePath);
  if (!dataset.pixelData) {
    throw new Error(`${fileName} has no Pixel Data`);
  }

  const expectedSize = dataset.pixelData.offset + dataset.pixelData.length;
  const actualSize = fs.statSync(filePath).size;
  if (actualSize !== expectedSize) {
    throw new Error(`${fileName} is truncated or padded: ${actualSize} bytes, expected ${expectedSize}`);
  }
  return dataset;
}

function indexFiles(outputDir: string, filePaths: ReadonlyArray<string>): Map<string, IndexedPatient> {
  const patients = new Map<string, IndexedPatient>();

  for (const filePath of filePaths) {
    const fileName = path.basename(filePath);
    let dataset: DicomDataSet;
    try {
      dataset = readInstanceHeader(filePath);
    } catch (error) {
      throw new Error(`Cannot index ${fileName}: ${toError(error).message}`, { cause: error });
    }

    const patientID = required(dataset, TAGS.PatientID.tag, 'Patient ID', fileName);
    let patient = patients.get(patientID);
    if (!patient) {
      patient = { patientID, patientName: dataset.string(TAGS.PatientName.tag) ?? '', studies: new Map() };
      patients.set(patientID, patient);
    }

    const studyUID = required(dataset, TAGS.StudyInstanceUID.tag, 'Study Instance UID', fileName);
    let study = patient.studies.get(studyUID);
    if (!study) {
      study = {
        studyUID,
        studyDate: dataset.string(TAGS.StudyDate.tag) ?? '',
        studyTime: dataset.string(TAGS.StudyTime.tag) ?? '',
        studyID: dataset.string(TAGS.StudyID.tag) ?? '',
        accessionNumber: dataset.string(TAGS.AccessionNumber.tag) ?? '',
        studyDescription: dataset.string(TAGS.StudyDescription.tag) ?? '',
        series: new Map(),
      };
      patient.studies.set(studyUID, study);
    }

    const seriesUID = required(dataset, TAGS.SeriesInstanceUID.tag, 'Series Instance UID', fileName);
    let series = study.series.get(seriesUID);
    if (!series) {
      series = {
        seriesUID,
        modality: required(dataset, TAGS.Modality.tag, 'Modality', fileName),
        seriesNumber: dataset.intString(TAGS.SeriesNumber.tag) ?? 0,
        images: [],
      };
      study.series.set(seriesUID, series);
    }

    series.images.push({
      fileId: toFileIdComponents(outputDir, filePath),
      sopClassUID: required(dataset, TAGS.MediaStorageSOPClassUID.tag, 'Media Storage SOP Class UID', fileName),
      sopInstanceUID: required(dataset, TAGS.MediaStorageSOPInstanceUID.tag, 'Media Storage SOP Instance UID', fileName),
      transferSyntaxUID: dataset.transferSyntax,
      instanceNumber: dataset.intString(TAGS.InstanceNumber.tag) ?? 0,
    });
  }

  return patients;
}

/**
 * Directory record tree in patient -> study -> series -> image order
 */
function buildRecordTree(patients: Map<string, IndexedPatient>): DirectoryRecord[] {
  return [...patients.values()].map((patient): DirectoryRecord => ({
    type: 'PATIENT',
    fields: elements({
      PatientName: patient.patientName,
      PatientID: patient.patientID,
    }),
    children: [...patient.studies.values()].map((study): DirectoryRecord => ({
      type: 'STUDY',
      fields: elements({
        StudyDate: study.studyDate,
        StudyTime: study.studyTime,
        AccessionNumber: study.accessionNumber,
        StudyDescription: study.studyDescription,
        StudyInstanceUID: study.studyUID,
        StudyID: study.studyID,
      }),
      children: [...study.series.values()].map((series): DirectoryRecord => ({
        type: 'SERIES',
        fields: elements({
          Modality: series.modality,
          SeriesInstanceUID: series.seriesUID,
          SeriesNumber: series.seriesNumber,
        }),
        children: [...series.images]
          .sort((a, b) => a.instanceNumber - b.instanceNumber)
          .map((image): DirectoryRecord => ({
            type: 'IMAGE',
            fields: elements({
              ReferencedFileID: image.fileId,
              ReferencedSOPClassUIDInFile: image.sopClassUID,
              ReferencedSOPInstanceUIDInFile: image.sopInstanceUID,
              ReferencedTransferSyntaxUIDInFile: image.transferSyntaxUID,
              InstanceNumber: image.instanceNumber,
            }),
            children: [],
          })),
      })),
    })),
  }));
}

function recordItem(record: DirectoryRecord, next: number, lower: number): ElementDict {
  return {
    ...elements({
      OffsetOfTheNextDirectoryRecord: next,
      RecordInUseFlag: RECORD_IN_USE,
      OffsetOfReferencedLowerLevelDirectoryEntity: lower,
      DirectoryRecordType: record.type,
    }),
    ...record.fields,
  };
}

function flatten(records: ReadonlyArray<DirectoryRecord>, out: DirectoryRecord[] = []): DirectoryRecord[] {
  for (const record of records) {
    out.push(record);
    flatten(record.children, out);
  }
  return out;
}

function directoryDataset(fileSetID: string, first: number, last: number, items: ElementDict[]): ElementDict {
  return {
    ...elements({
      FileSetID: fileSetID,
      OffsetOfTheFirstDirectoryRecordOfTheRootDirectoryEntity: first,
      OffsetOfTheLastDirectoryRecordOfTheRootDirectoryEntity: last,
      FileSetConsistencyFlag: 0,
    }),
    [TAGS.DirectoryRecordSequence.tag]: { vr: TAGS.DirectoryRecordSequence.vr, items },
  };
}

/**
 * Encode the DICOMDIR. Record offsets are fixed-width UL values, so item
 * lengths measured with zero offsets hold once the real offsets are filled in.
 */
export function encodeDicomDir(
  roots: ReadonlyArray<DirectoryRecord>,
  fileSetID: string,
  sopInstanceUID: string
): { chunks: Uint8Array[]; recordCount: number } {
  const writeOptions = {
    mediaStorageSOPClassUID: UIDS.MediaStorageDirectoryStorage,
    mediaStorageSOPInstanceUID: sopInstanceUID,
  };

  // Pass 1: layout. The record sequence is the last element, so the first
  // item starts right before the trailing sequence delimiter.
  const emptyLength = concatChunks(writeChunks(directoryDataset(fileSetID, 0, 0, []), writeOptions)).length;
  const ordered = flatten(roots);
  const offsets = new Map<DirectoryRecord, number>();
  let cursor = emptyLength - SEQUENCE_DELIMITER_LENGTH;
  for (const record of ordered) {
    offsets.set(record, cursor);
    cursor += serializeItem(recordItem(record, 0, 0)).length;
  }
  const offsetOf = (record: DirectoryRecord | undefined): number =>
    record === undefined ? 0 : offsets.get(record) ?? 0;

  // Pass 2: link siblings and children.
  const nextOf = new Map<DirectoryRecord, DirectoryRecord>();
  const linkSiblings = (siblings: ReadonlyArray<DirectoryRecord>): void => {
    siblings.forEach((record, i) => {
      if (i + 1 < siblings.length) nextOf.set(record, siblings[i + 1]);
      linkSiblings(record.children);
    });
  };
  linkSiblings(roots);

  const items = ordered.map((record) => recordItem(record, offsetOf(nextOf.get(record)), offsetOf(record.children[0])));
  const dataset = directoryDataset(fileSetID, offsetOf(roots[0]), offsetOf(roots[roots.length - 1]), items);
  const chunks = writeChunks(dataset, writeOptions);

  const totalLength = chunks.reduce((acc, chunk) => acc + chunk.length, 0);
  if (totalLength !== cursor + SEQUENCE_DELIMITER_LENGTH) {
    throw new Error(`Directory layout drifted: expected ${cursor + SEQUENCE_DELIMITER_LENGTH} bytes, encoded ${totalLength}`);
  }
  return { chunks, recordCount: ordered.length };
}

/**
 * Build `DICOMDIR` in `outputDir` for the given instance files.
 * Any failure is raised as IndexBuildError; instance files are never touched.
 */
export function buildDicomDir(
  outputDir: string,
  filePaths: ReadonlyArray<string>,
  options: DicomDirOptions = {}
): DicomDirResult {
  const dicomDirPath = path.join(outputDir, DICOMDIR_NAME);
  try {
    if (filePaths.length === 0) {
      throw new Error('No instance files to index');
    }
    const roots = buildRecordTree(indexFiles(outputDir, filePaths));
    const fileSetID = toFileSetID(options.fileSetID ?? path.basename(path.resolve(outputDir)));
    const sopInstanceUID = options.sopInstanceUID ?? generateUid(new SeededRandom());

    const { chunks, recordCount } = encodeDicomDir(roots, fileSetID, sopInstanceUID);
    writeFileAtomic(dicomDirPath, chunks);
    return { path: dicomDirPath, recordCount };
  } catch (error) {
    if (error instanceof IndexBuildError) throw error;
    const cause = toError(error);
    throw new IndexBuildError(`Failed to build ${DICOMDIR_NAME}: ${cause.message}`, outputDir, cause);
  }
}
