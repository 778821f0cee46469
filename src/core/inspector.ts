/**
 * Inspector: one flat record per instance file, for comparing the output of
 * different generator builds. Keys are snake_case to match that format.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DICOMDIR_NAME } from './dicomdir';
import { toError } from './errors';
import { readDicomHeader } from './reader';
import { TAGS } from './tags';
import { PART_SUFFIX } from '../utils/files';

export interface InstanceSummary {
  filename: string;
  file_size: number;
  patient_id?: string;
  patient_name?: string;
  patient_birth_date?: string;
  patient_sex?: string;
  study_uid?: string;
  study_id?: string;
  study_description?: string;
  study_date?: string;
  series_uid?: string;
  series_number?: number;
  modality?: string;
  sop_instance_uid?: string;
  instance_number?: number;
  rows?: number;
  columns?: number;
  bits_allocated?: number;
  manufacturer?: string;
  model?: string;
  field_strength?: number;
  echo_time?: number;
  repetition_time?: number;
}

export interface InspectionReport {
  source_directory: string;
  file_count: number;
  files: InstanceSummary[];
  /** Files that looked like instances but could not be read */
  warnings: string[];
}

/**
 * Summarize one instance file. Parse failures propagate.
 */
export function inspectFile(filePath: string, rootDir: string = path.dirname(filePath)): InstanceSummary {
  const dataset = readDicomHeader(filePath);
  return {
    filename: path.relative(rootDir, filePath),
    file_size: fs.statSync(filePath).size,
    patient_id: dataset.string(TAGS.PatientID.tag),
    patient_name: dataset.string(TAGS.PatientName.tag),
    patient_birth_date: dataset.string(TAGS.PatientBirthDate.tag),
    patient_sex: dataset.string(TAGS.PatientSex.tag),
    study_uid: dataset.string(TAGS.StudyInstanceUID.tag),
    study_id: dataset.string(TAGS.StudyID.tag),
    study_description: dataset.string(TAGS.StudyDescription.tag),
    study_date: dataset.string(TAGS.StudyDate.tag),
    series_uid: dataset.string(TAGS.SeriesInstanceUID.tag),
    series_number: dataset.intString(TAGS.SeriesNumber.tag),
    modality: dataset.string(TAGS.Modality.tag),
    sop_instance_uid: dataset.string(TAGS.SOPInstanceUID.tag),
    instance_number: dataset.intString(TAGS.InstanceNumber.tag),
    rows: dataset.uint16(TAGS.Rows.tag),
    columns: dataset.uint16(TAGS.Columns.tag),
    bits_allocated: dataset.uint16(TAGS.BitsAllocated.tag),
    manufacturer: dataset.string(TAGS.Manufacturer.tag),
    model: dataset.string(TAGS.ManufacturerModelName.tag),
    field_strength: dataset.floatString(TAGS.MagneticFieldStrength.tag),
    echo_time: dataset.floatString(TAGS.EchoTime.tag),
    repetition_time: dataset.floatString(TAGS.RepetitionTime.tag),
  };
}

/** Long-series names, where the prefix has shrunk to `I` or nothing */
const INSTANCE_NAME = /^I?[0-9]{7,8}$/;

function isInstanceCandidate(name: string): boolean {
  if (name === DICOMDIR_NAME || name.endsWith(PART_SUFFIX)) return false;
  return name.startsWith('IM') || INSTANCE_NAME.test(name) || name.toLowerCase().endsWith('.dcm');
}

/**
 * Summarize every instance file directly under `dir`, in name order
 */
export function inspectDirectory(dir: string): InspectionReport {
  const names = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isInstanceCandidate(entry.name))
    .map((entry) => entry.name)
    .sort();

  const files: InstanceSummary[] = [];
  const warnings: string[] = [];
  for (const name of names) {
    try {
      files.push(inspectFile(path.join(dir, name), dir));
    } catch (error) {
      warnings.push(`Could not read ${name}: ${toError(error).message}`);
    }
  }

  return {
    source_directory: dir,
    file_count: files.length,
    files,
    warnings,
  };
}
