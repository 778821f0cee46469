import { describe, expect, it } from 'vitest';
import { EncodingError, PayloadTooLargeError } from '../src/core/errors';
import { encodeInstance, encodeInstanceChunks } from '../src/core/instance';
import { createInstanceRecord, createStudyContext } from '../src/core/metadata';
import { TAGS, UIDS } from '../src/core/tags';
import type { ElementDict, InstanceRecord } from '../src/core/types';
import {
  checkValueLength,
  concatChunks,
  ElementStreamWriter,
  IMPLEMENTATION_CLASS_UID,
  write,
} from '../src/core/writer';
import { SeededRandom } from '../src/utils/random';

const decoder = new TextDecoder();

function encodeOne(tag: string, element: ElementDict[string]): number[] {
  return Array.from(concatChunks(new ElementStreamWriter().add(tag, element).toChunks()));
}

function ascii(text: string): number[] {
  return Array.from(new TextEncoder().encode(text));
}

function makeRecord(seed = 1): InstanceRecord {
  const random = new SeededRandom(seed);
  const ctx = createStudyContext(random);
  return createInstanceRecord(ctx, { geometry: { width: 128, height: 128 }, instanceNumber: 1, random, pixelSeed: 5 });
}

const MINIMAL: ElementDict = {
  [TAGS.PatientName.tag]: { vr: 'PN', Value: 'DOE^JOHN' },
  [TAGS.SOPInstanceUID.tag]: { vr: 'UI', Value: '1.2.3.4' },
  [TAGS.SOPClassUID.tag]: { vr: 'UI', Value: UIDS.MRImageStorage },
};

describe('DICOM Writer', () => {
  it('writes the preamble, magic and a group length that spans the meta group', () => {
    const bytes = write(MINIMAL);
    expect(bytes.slice(0, 128).every((b) => b === 0)).toBe(true);
    expect(decoder.decode(bytes.slice(128, 132))).toBe('DICM');

    // (0002,0000) UL, 4 bytes
    expect(Array.from(bytes.slice(132, 140))).toEqual([0x02, 0x00, 0x00, 0x00, ...ascii('UL'), 0x04, 0x00]);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const metaLength = view.getUint32(140, true);

    // The first body element, (0008,0016), starts right after the meta group
    const bodyStart = 144 + metaLength;
    expect(view.getUint16(bodyStart, true)).toBe(0x0008);
    expect(view.getUint16(bodyStart + 2, true)).toBe(0x0016);
  });

  it('emits body elements in ascending tag order regardless of insertion order', () => {
    const bytes = write(MINIMAL);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    let offset = 144 + view.getUint32(140, true);
    const seen: number[] = [];
    while (offset < bytes.length) {
      seen.push(view.getUint16(offset, true) * 0x10000 + view.getUint16(offset + 2, true));
      offset += 8 + view.getUint16(offset + 6, true);
    }
    expect(seen).toEqual([0x00080016, 0x00080018, 0x00100010]);
  });

  it('fills the file meta group from the dataset', () => {
    const text = decoder.decode(write(MINIMAL));
    expect(text).toContain(UIDS.ExplicitVRLittleEndian);
    expect(text).toContain(IMPLEMENTATION_CLASS_UID);
    expect(text).toContain('MRISYNTH_1_0');
  });

  it('pads text with a space and UIDs with NUL', () => {
    expect(encodeOne('x00100010', { vr: 'PN', Value: 'ABC' })).toEqual([
      0x10, 0x00, 0x10, 0x00, ...ascii('PN'), 0x04, 0x00, ...ascii('ABC '),
    ]);
    expect(encodeOne('x0020000d', { vr: 'UI', Value: '1.2.3' })).toEqual([
      0x20, 0x00, 0x0d, 0x00, ...ascii('UI'), 0x06, 0x00, ...ascii('1.2.3'), 0x00,
    ]);
  });

  it('joins multiple values with a backslash', () => {
    expect(encodeOne('x00080008', { vr: 'CS', Value: ['ORIGINAL', 'PRIMARY'] })).toEqual([
      0x08, 0x00, 0x08, 0x00, ...ascii('CS'), 0x10, 0x00, ...ascii('ORIGINAL\\PRIMARY'),
    ]);
  });

  it('renders numbers for IS and DS within their length limits', () => {
    expect(encodeOne('x00200013', { vr: 'IS', Value: 42 })).toEqual([
      0x20, 0x00, 0x13, 0x00, ...ascii('IS'), 0x02, 0x00, ...ascii('42'),
    ]);
    expect(encodeOne('x00180050', { vr: 'DS', Value: 0.1 + 0.2 })).toEqual([
      0x18, 0x00, 0x50, 0x00, ...ascii('DS'), 0x04, 0x00, ...ascii('0.3 '),
    ]);
    expect(() => encodeOne('x00200013', { vr: 'IS', Value: 1.5 })).toThrow(EncodingError);
  });

  it('encodes binary numeric VRs little-endian', () => {
    expect(encodeOne('x00280010', { vr: 'US', Value: [1, 512] })).toEqual([
      0x28, 0x00, 0x10, 0x00, ...ascii('US'), 0x04, 0x00, 0x01, 0x00, 0x00, 0x02,
    ]);
    expect(encodeOne('x00020000', { vr: 'UL', Value: 0x01020304 })).toEqual([
      0x02, 0x00, 0x00, 0x00, ...ascii('UL'), 0x04, 0x00, 0x04, 0x03, 0x02, 0x01,
    ]);
    expect(() => encodeOne('x00280010', { vr: 'US', Value: 70000 })).toThrow(EncodingError);
  });

  it('uses reserved bytes and a 32-bit length for long VRs', () => {
    expect(encodeOne('x00020001', { vr: 'OB', Value: new Uint8Array([0, 1]) })).toEqual([
      0x02, 0x00, 0x01, 0x00, ...ascii('OB'), 0x00, 0x00, 0x02, 0x00, 0x00, 0x00, 0x00, 0x01,
    ]);
    expect(encodeOne('x7fe00010', { vr: 'OW', Value: new Uint16Array([0x0102]) })).toEqual([
      0xe0, 0x7f, 0x10, 0x00, ...ascii('OW'), 0x00, 0x00, 0x02, 0x00, 0x00, 0x00, 0x02, 0x01,
    ]);
  });

  it('writes sequences with undefined length, explicit-length items and a delimiter', () => {
    const bytes = encodeOne('x00041220', {
      vr: 'SQ',
      items: [{ [TAGS.RecordInUseFlag.tag]: { vr: 'US', Value: 0xffff } }],
    });
    expect(bytes).toEqual([
      0x04, 0x00, 0x20, 0x12, ...ascii('SQ'), 0x00, 0x00, 0xff, 0xff, 0xff, 0xff,
      0xfe, 0xff, 0x00, 0xe0, 0x0a, 0x00, 0x00, 0x00,
      0x04, 0x00, 0x10, 0x14, ...ascii('US'), 0x02, 0x00, 0xff, 0xff,
      0xfe, 0xff, 0xdd, 0xe0, 0x00, 0x00, 0x00, 0x00,
    ]);
  });

  it('rejects elements out of ascending order', () => {
    const stream = new ElementStreamWriter().add('x00100020', { vr: 'LO', Value: 'A' });
    expect(() => stream.add('x00100010', { vr: 'PN', Value: 'B' })).toThrow('ascending tag order');
    expect(() => stream.add('x00100020', { vr: 'LO', Value: 'C' })).toThrow(EncodingError);
  });

  it('rejects malformed tags, odd binary values and oversized text', () => {
    expect(() => encodeOne('x0010001', { vr: 'PN', Value: 'A' })).toThrow(EncodingError);
    expect(() => encodeOne('x00091001', { vr: 'OB', Value: new Uint8Array(3) })).toThrow('odd length');
    expect(() => encodeOne('x00080060', { vr: 'CS', Value: 'A'.repeat(17) })).toThrow(EncodingError);
    expect(() => encodeOne('x0020000d', { vr: 'UI', Value: '1.2.abc' })).toThrow(EncodingError);
  });

  it('checks value lengths against the field they are written to', () => {
    expect(() => checkValueLength('x7fe00010', 'OW', 0xfffffffe)).not.toThrow();
    expect(() => checkValueLength('x7fe00010', 'OW', 0xffffffff)).toThrow(PayloadTooLargeError);
    expect(() => checkValueLength('x00100020', 'LO', 0x10000)).toThrow(EncodingError);
    expect(() => checkValueLength('x00100020', 'LO', 0xffff)).not.toThrow();
  });

  it('refuses transfer syntaxes other than Explicit VR Little Endian', () => {
    expect(() => write(MINIMAL, { transferSyntax: '1.2.840.10008.1.2' })).toThrow(EncodingError);
  });

  it('requires a media storage SOP class', () => {
    const dataset: ElementDict = { [TAGS.SOPInstanceUID.tag]: { vr: 'UI', Value: '1.2.3' } };
    expect(() => write(dataset)).toThrow('Media Storage SOP Class UID is required');
  });
});

describe('instance encoding', () => {
  it('is byte-identical for the same record', () => {
    const record = makeRecord();
    expect(encodeInstance(record)).toEqual(encodeInstance(record));
  });

  it('ends with the pixel data element', () => {
    const record = makeRecord();
    const bytes = encodeInstance(record);
    const pixelStart = bytes.length - 128 * 128 * 2;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    expect(view.getUint32(pixelStart - 4, true)).toBe(128 * 128 * 2);
    expect(decoder.decode(bytes.slice(pixelStart - 8, pixelStart - 6))).toBe('OW');
    expect(view.getUint16(pixelStart, true)).toBe(record.pixelData[0]);
    expect(view.getUint16(bytes.length - 2, true)).toBe(record.pixelData[record.pixelData.length - 1]);
  });

  it('keeps the pixel chunk as a view of the record samples', () => {
    const record = makeRecord();
    const chunks = encodeInstanceChunks(record);
    expect(chunks[chunks.length - 1].buffer).toBe(record.pixelData.buffer);
  });

  it('refuses geometry whose pixel data exceeds the 32-bit length field', () => {
    const record: InstanceRecord = { ...makeRecord(), geometry: { width: 46341, height: 46341 } };
    expect(() => encodeInstanceChunks(record)).toThrow(PayloadTooLargeError);
  });

  it('refuses a pixel grid that does not match the geometry', () => {
    const record: InstanceRecord = { ...makeRecord(), pixelData: new Uint16Array(10) };
    expect(() => encodeInstanceChunks(record)).toThrow(EncodingError);
  });
});
