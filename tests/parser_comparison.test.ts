/**
 * Parser Comparison Tests
 *
 * Decodes generated files with dicom-parser, an independent implementation,
 * to check that the writer's output is readable outside this project.
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as dicomParser from 'dicom-parser';
import { formatDecimal } from '../src/core/instance';
import { generateSeries, type GenerationResult } from '../src/core/generator';
import { UIDS } from '../src/core/tags';

describe('dicom-parser cross-check', () => {
  let outputDir: string;
  let result: GenerationResult;

  beforeAll(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mri-compare-'));
    result = generateSeries({ frameCount: 3, totalSize: '2MB', outputDir, seed: 1234 });
  });

  afterAll(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  function parseFile(filePath: string): dicomParser.DataSet {
    return dicomParser.parseDicom(new Uint8Array(fs.readFileSync(filePath)));
  }

  it('reads the file meta group', () => {
    const dataSet = parseFile(result.files[0].path);
    expect(dataSet.string('x00020010')).toBe(UIDS.ExplicitVRLittleEndian);
    expect(dataSet.string('x00020002')).toBe(UIDS.MRImageStorage);
    expect(dataSet.string('x00020003')).toBe(result.files[0].sopInstanceUID);
  });

  it('reads identifiers, geometry and acquisition parameters', () => {
    for (const file of result.files) {
      const dataSet = parseFile(file.path);
      expect(dataSet.string('x0020000d')).toBe(file.studyUID);
      expect(dataSet.string('x0020000e')).toBe(file.seriesUID);
      expect(dataSet.string('x00080018')).toBe(file.sopInstanceUID);
      expect(dataSet.string('x00100020')).toBe(file.patientID);
      expect(dataSet.intString('x00200013')).toBe(file.instanceNumber);
      expect(dataSet.string('x00080060')).toBe('MR');
      expect(dataSet.uint16('x00280010')).toBe(result.geometry.height);
      expect(dataSet.uint16('x00280011')).toBe(result.geometry.width);
      expect(dataSet.uint16('x00280100')).toBe(16);
      expect(dataSet.uint16('x00280103')).toBe(0);
    }
  });

  it('agrees on the Pixel Data extent', () => {
    const dataSet = parseFile(result.files[1].path);
    const pixelElement = dataSet.elements.x7fe00010;
    expect(pixelElement.length).toBe(result.geometry.width * result.geometry.height * 2);
    expect(pixelElement.dataOffset + pixelElement.length).toBe(result.files[1].byteLength);
  });

  it('decodes DS values as written', () => {
    const dataSet = parseFile(result.files[0].path);
    const thickness = dataSet.string('x00180050');
    expect(thickness).toMatch(/^\d+\.\d{6}$/);
    expect(formatDecimal(dataSet.floatString('x00180050') ?? NaN)).toBe(thickness);
  });

  it('walks the DICOMDIR record sequence', () => {
    if (!result.dicomdirPath) throw new Error('DICOMDIR was not written');
    const dataSet = parseFile(result.dicomdirPath);
    expect(dataSet.string('x00020002')).toBe(UIDS.MediaStorageDirectoryStorage);

    const items = dataSet.elements.x00041220.items ?? [];
    expect(items).toHaveLength(6);
    const types = items.map((item) => item.dataSet?.string('x00041430'));
    expect(types).toEqual(['PATIENT', 'STUDY', 'SERIES', 'IMAGE', 'IMAGE', 'IMAGE']);

    // Each record offset points at its item tag, 8 bytes before the item data
    const itemOffsets = items.map((item) => item.dataOffset - 8);
    expect(dataSet.uint32('x00041200')).toBe(itemOffsets[0]);
    expect(items[0].dataSet?.uint32('x00041420')).toBe(itemOffsets[1]);
    expect(items[2].dataSet?.uint32('x00041420')).toBe(itemOffsets[3]);
    expect(items[3].dataSet?.uint32('x00041400')).toBe(itemOffsets[4]);
    expect(items[5].dataSet?.uint32('x00041400')).toBe(0);
  });
});
