/**
 * DICOM Writer
 *
 * Zero-dependency Part 10 serializer for Explicit VR Little Endian.
 * Elements are emitted in ascending tag order; text values are padded to even
 * length, binary values must already be even.
 */

import { createEncodingError, PayloadTooLargeError } from './errors';
import { element, elements, TAGS, UIDS } from './tags';
import type { DicomElement, ElementDict, ElementValue, VR } from './types';
import { formatTagWithComma, normalizeTag, parseTag, tagSortKey, type TagParts } from '../utils/tagUtils';

export interface WriteOptions {
  /**
   * Transfer Syntax to write.
   * Only Explicit VR Little Endian (1.2.840.10008.1.2.1) is supported.
   */
  transferSyntax?: string;
  /** Defaults to the dataset's SOP Class UID (0008,0016) */
  mediaStorageSOPClassUID?: string;
  /** Defaults to the dataset's SOP Instance UID (0008,0018) */
  mediaStorageSOPInstanceUID?: string;
  implementationClassUID?: string;
  implementationVersionName?: string;
}

const PREAMBLE_LENGTH = 128;
export const IMPLEMENTATION_CLASS_UID = '2.25.159724638016549720194830162557486930';
export const IMPLEMENTATION_VERSION_NAME = 'MRISYNTH_1_0';

/** Largest value a 16-bit length field can carry */
export const MAX_SHORT_VALUE_LENGTH = 0xffff;
/** 0xFFFFFFFF is reserved for undefined length */
export const MAX_LONG_VALUE_LENGTH = 0xfffffffe;
export const UNDEFINED_LENGTH = 0xffffffff;

/**
 * VRs that use 32-bit length (Explicit VR)
 */
export const LONG_VRS = new Set<VR>(['OB', 'OD', 'OF', 'OL', 'OW', 'SQ', 'UC', 'UR', 'UT', 'UN']);

/**
 * VRs that use space padding (0x20). UI pads with 0x00.
 */
const SPACE_PADDED_VRS = new Set<VR>(['AE', 'AS', 'CS', 'DA', 'DS', 'DT', 'IS', 'LO', 'LT', 'PN', 'SH', 'ST', 'TM', 'UC', 'UR', 'UT']);

const BINARY_VRS = new Set<VR>(['OB', 'OD', 'OF', 'OL', 'OW', 'UN']);

const KNOWN_VRS = new Set<VR>([...LONG_VRS, ...SPACE_PADDED_VRS, 'UI', 'US', 'UL', 'SS', 'SL', 'FL', 'FD']);
const KNOWN_VR_NAMES: ReadonlySet<string> = KNOWN_VRS;

export function isKnownVR(value: string): value is VR {
  return KNOWN_VR_NAMES.has(value);
}

/**
 * Maximum characters per value (PS3.5 Table 6.2-1)
 */
const MAX_VALUE_CHARS: Partial<Record<VR, number>> = {
  AE: 16, AS: 4, CS: 16, DA: 8, DS: 16, DT: 26, IS: 12, LO: 64,
  LT: 10240, PN: 324, SH: 16, ST: 1024, TM: 16, UI: 64,
};

type NumericVR = 'US' | 'UL' | 'SS' | 'SL' | 'FL' | 'FD';

interface NumericCodec {
  size: number;
  min: number;
  max: number;
  integer: boolean;
  set: (view: DataView, offset: number, value: number) => void;
}

const NUMERIC_CODECS: Record<NumericVR, NumericCodec> = {
  US: { size: 2, min: 0, max: 0xffff, integer: true, set: (v, o, n) => v.setUint16(o, n, true) },
  UL: { size: 4, min: 0, max: 0xffffffff, integer: true, set: (v, o, n) => v.setUint32(o, n, true) },
  SS: { size: 2, min: -0x8000, max: 0x7fff, integer: true, set: (v, o, n) => v.setInt16(o, n, true) },
  SL: { size: 4, min: -0x80000000, max: 0x7fffffff, integer: true, set: (v, o, n) => v.setInt32(o, n, true) },
  FL: { size: 4, min: -Infinity, max: Infinity, integer: false, set: (v, o, n) => v.setFloat32(o, n, true) },
  FD: { size: 8, min: -Infinity, max: Infinity, integer: false, set: (v, o, n) => v.setFloat64(o, n, true) },
};

function isNumericVR(vr: VR): vr is NumericVR {
  return vr in NUMERIC_CODECS;
}

const HOST_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

const encoder = new TextEncoder();
const EMPTY = new Uint8Array(0);

/**
 * Check a value length against the length field it will be written to.
 * Long VRs that overflow 32 bits raise PayloadTooLargeError; short VRs that
 * overflow 16 bits raise EncodingError.
 */
export function checkValueLength(tag: string, vr: VR, length: number): void {
  if (LONG_VRS.has(vr)) {
    if (length > MAX_LONG_VALUE_LENGTH) {
      throw new PayloadTooLargeError(
        `Value of ${length} bytes exceeds the 32-bit length field (max ${MAX_LONG_VALUE_LENGTH}) (tag: ${formatTagWithComma(tag)})`,
        tag,
        length
      );
    }
  } else if (length > MAX_SHORT_VALUE_LENGTH) {
    throw createEncodingError(`Value of ${length} bytes exceeds the 16-bit length field of VR ${vr}`, tag);
  }
}

/**
 * Little-endian byte view of 16-bit samples. No copy on little-endian hosts.
 */
export function uint16ToBytes(samples: Uint16Array): Uint8Array {
  if (HOST_LITTLE_ENDIAN) {
    return new Uint8Array(samples.buffer, samples.byteOffset, samples.byteLength);
  }
  const bytes = new Uint8Array(samples.byteLength);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < samples.length; i++) {
    view.setUint16(i * 2, samples[i], true);
  }
  return bytes;
}

export function concatChunks(chunks: ReadonlyArray<Uint8Array>): Uint8Array {
  let totalLength = 0;
  for (let i = 0; i < chunks.length; i++) {
    totalLength += chunks[i].length;
  }

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (let i = 0; i < chunks.length; i++) {
    result.set(chunks[i], offset);
    offset += chunks[i].length;
  }
  return result;
}

function formatNumber(tag: string, vr: VR, value: number): string {
  if (!Number.isFinite(value)) {
    throw createEncodingError(`Non-finite number ${value} for VR ${vr}`, tag);
  }
  if (vr === 'IS') {
    if (!Number.isInteger(value)) {
      throw createEncodingError(`IS value must be an integer, got ${value}`, tag);
    }
    return String(value);
  }
  let text = String(value);
  for (let precision = 15; text.length > 16 && precision > 0; precision--) {
    text = String(Number(value.toPrecision(precision)));
  }
  return text;
}

function toTextValues(tag: string, vr: VR, value: ElementValue | undefined): string[] {
  if (value === undefined) return [];
  if (typeof value === 'string') return [value];
  if (typeof value === 'number') return [formatNumber(tag, vr, value)];
  if (value instanceof Uint8Array || value instanceof Uint16Array) {
    throw createEncodingError(`Binary value given for text VR ${vr}`, tag);
  }
  const values: string[] = [];
  for (const item of value) {
    values.push(typeof item === 'number' ? formatNumber(tag, vr, item) : item);
  }
  return values;
}

function encodeText(tag: string, vr: VR, value: ElementValue | undefined): Uint8Array {
  const values = toTextValues(tag, vr, value);
  const maxChars = MAX_VALUE_CHARS[vr];
  for (const text of values) {
    if (maxChars !== undefined && text.length > maxChars) {
      throw createEncodingError(`Value "${text}" exceeds ${maxChars} characters for VR ${vr}`, tag);
    }
    if (vr === 'UI' && !/^[0-9.]*$/.test(text)) {
      throw createEncodingError(`UID "${text}" contains characters other than digits and dots`, tag);
    }
  }

  const joined = vr === 'LT' || vr === 'ST' || vr === 'UT' ? values.join('') : values.join('\\');
  if (joined.length === 0) return EMPTY;

  const bytes = encoder.encode(joined);
  if (bytes.length % 2 === 0) return bytes;

  const padded = new Uint8Array(bytes.length + 1);
  padded.set(bytes);
  padded[bytes.length] = SPACE_PADDED_VRS.has(vr) ? 0x20 : 0x00;
  return padded;
}

function encodeNumeric(tag: string, vr: NumericVR, value: ElementValue | undefined): Uint8Array {
  if (value === undefined) return EMPTY;
  if (typeof value === 'string' || value instanceof Uint8Array || value instanceof Uint16Array) {
    throw createEncodingError(`VR ${vr} expects numeric values`, tag);
  }

  const numbers: number[] = [];
  if (typeof value === 'number') {
    numbers.push(value);
  } else {
    for (const item of value) {
      if (typeof item !== 'number') {
        throw createEncodingError(`VR ${vr} expects numeric values, got "${item}"`, tag);
      }
      numbers.push(item);
    }
  }

  const codec = NUMERIC_CODECS[vr];
  const bytes = new Uint8Array(numbers.length * codec.size);
  const view = new DataView(bytes.buffer);
  numbers.forEach((n, i) => {
    if ((codec.integer && !Number.isInteger(n)) || n < codec.min || n > codec.max || Number.isNaN(n)) {
      throw createEncodingError(`Value ${n} out of range for VR ${vr}`, tag);
    }
    codec.set(view, i * codec.size, n);
  });
  return bytes;
}

function encodeBinary(tag: string, vr: VR, value: ElementValue | undefined): Uint8Array {
  let bytes: Uint8Array;
  if (value === undefined) {
    bytes = EMPTY;
  } else if (value instanceof Uint16Array) {
    bytes = uint16ToBytes(value);
  } else if (value instanceof Uint8Array) {
    bytes = value;
  } else {
    throw createEncodingError(`VR ${vr} expects a byte array`, tag);
  }
  if (bytes.length % 2 !== 0) {
    throw createEncodingError(`Binary value has odd length ${bytes.length}`, tag);
  }
  return bytes;
}

function encodeSequence(items: ReadonlyArray<ElementDict>): Uint8Array {
  const chunks = items.map((item) => serializeItem(item));

  // Sequence Delimitation Item (FFFE,E0DD), length 0
  const seqDelim = new Uint8Array(8);
  const view = new DataView(seqDelim.buffer);
  view.setUint16(0, 0xfffe, true);
  view.setUint16(2, 0xe0dd, true);
  view.setUint32(4, 0, true);
  chunks.push(seqDelim);

  return concatChunks(chunks);
}

function encodeValue(tag: string, element: DicomElement): Uint8Array {
  const { vr } = element;
  if (vr === 'SQ') return encodeSequence(element.items ?? []);
  if (isNumericVR(vr)) return encodeNumeric(tag, vr, element.Value);
  if (BINARY_VRS.has(vr)) return encodeBinary(tag, vr, element.Value);
  return encodeText(tag, vr, element.Value);
}

function elementHeader(parts: TagParts, vr: VR, length: number): Uint8Array {
  const isLongVR = LONG_VRS.has(vr);
  const header = new Uint8Array(isLongVR ? 12 : 8);
  const view = new DataView(header.buffer);

  view.setUint16(0, parts.group, true);
  view.setUint16(2, parts.element, true);
  header[4] = vr.charCodeAt(0);
  header[5] = vr.charCodeAt(1);

  if (isLongVR) {
    view.setUint16(6, 0, true); // Reserved
    view.setUint32(8, length, true);
  } else {
    view.setUint16(6, length, true);
  }
  return header;
}

/**
 * Accumulates encoded elements and rejects any tag that does not strictly
 * increase. Header and value are kept as separate chunks so large values are
 * never copied.
 */
export class ElementStreamWriter {
  private readonly chunks: Uint8Array[] = [];
  private lastKey = -1;
  private lastTag?: string;
  private length = 0;

  add(tag: string, element: DicomElement): this {
    const parts = parseTag(tag);
    if (!parts) {
      throw createEncodingError('Malformed tag, expected xGGGGEEEE', tag);
    }
    if (!KNOWN_VRS.has(element.vr)) {
      throw createEncodingError(`Unknown VR "${element.vr}"`, tag);
    }
    const key = tagSortKey(parts);
    if (key <= this.lastKey) {
      throw createEncodingError(`Element out of ascending tag order (after ${this.lastTag})`, tag);
    }

    const value = encodeValue(tag, element);
    if (element.vr !== 'SQ') {
      checkValueLength(tag, element.vr, value.length);
    }
    const header = elementHeader(parts, element.vr, element.vr === 'SQ' ? UNDEFINED_LENGTH : value.length);

    this.chunks.push(header);
    if (value.length > 0) this.chunks.push(value);
    this.length += header.length + value.length;
    this.lastKey = key;
    this.lastTag = tag;
    return this;
  }

  get byteLength(): number {
    return this.length;
  }

  toChunks(): Uint8Array[] {
    return [...this.chunks];
  }
}

function sortedTags(dict: ElementDict): Array<{ tag: string; key: number }> {
  return Object.keys(dict)
    .map((tag) => {
      const parts = parseTag(tag);
      if (!parts) {
        throw createEncodingError('Malformed tag, expected xGGGGEEEE', tag);
      }
      return { tag, key: tagSortKey(parts) };
    })
    .sort((a, b) => a.key - b.key);
}

/**
 * Serialize a dataset body (no preamble, no meta group) in ascending tag order
 */
export function serializeDataset(dict: ElementDict): Uint8Array[] {
  const stream = new ElementStreamWriter();
  for (const { tag } of sortedTags(dict)) {
    stream.add(normalizeTag(tag), dict[tag]);
  }
  return stream.toChunks();
}

/**
 * Serialize a sequence item with explicit length: (FFFE,E000) header + body
 */
export function serializeItem(dict: ElementDict): Uint8Array {
  const body = concatChunks(serializeDataset(dict));
  const header = new Uint8Array(8);
  const view = new DataView(header.buffer);
  view.setUint16(0, 0xfffe, true);
  view.setUint16(2, 0xe000, true);
  view.setUint32(4, body.length, true);
  return concatChunks([header, body]);
}

function firstString(element: DicomElement | undefined): string | undefined {
  const value = element?.Value;
  if (value === undefined || typeof value === 'number') return undefined;
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array || value instanceof Uint16Array) return undefined;
  const first = value[0];
  return typeof first === 'string' ? first : undefined;
}

/**
 * Serialize a dataset into Part 10 file chunks:
 * preamble + "DICM", file meta group (0002), then the dataset body.
 */
export function writeChunks(dataset: ElementDict, options: WriteOptions = {}): Uint8Array[] {
  const metaInput: ElementDict = {};
  const body: ElementDict = {};

  for (const tag of Object.keys(dataset)) {
    const parts = parseTag(tag);
    if (!parts) {
      throw createEncodingError('Malformed tag, expected xGGGGEEEE', tag);
    }
    const normalized = normalizeTag(tag);
    if (parts.group === 0x0002) {
      metaInput[normalized] = dataset[tag];
    } else {
      body[normalized] = dataset[tag];
    }
  }

  const transferSyntax =
    options.transferSyntax ?? firstString(metaInput[TAGS.TransferSyntaxUID.tag]) ?? UIDS.ExplicitVRLittleEndian;
  if (transferSyntax !== UIDS.ExplicitVRLittleEndian) {
    throw createEncodingError(`Unsupported transfer syntax ${transferSyntax}`, TAGS.TransferSyntaxUID.tag);
  }

  const sopClass =
    options.mediaStorageSOPClassUID ??
    firstString(metaInput[TAGS.MediaStorageSOPClassUID.tag]) ??
    firstString(body[TAGS.SOPClassUID.tag]);
  const sopInstance =
    options.mediaStorageSOPInstanceUID ??
    firstString(metaInput[TAGS.MediaStorageSOPInstanceUID.tag]) ??
    firstString(body[TAGS.SOPInstanceUID.tag]);
  if (!sopClass) {
    throw createEncodingError('Media Storage SOP Class UID is required', TAGS.MediaStorageSOPClassUID.tag);
  }
  if (!sopInstance) {
    throw createEncodingError('Media Storage SOP Instance UID is required', TAGS.MediaStorageSOPInstanceUID.tag);
  }

  const meta = elements({
    FileMetaInformationVersion: new Uint8Array([0x00, 0x01]),
    MediaStorageSOPClassUID: sopClass,
    MediaStorageSOPInstanceUID: sopInstance,
    TransferSyntaxUID: transferSyntax,
    ImplementationClassUID:
      options.implementationClassUID ?? firstString(metaInput[TAGS.ImplementationClassUID.tag]) ?? IMPLEMENTATION_CLASS_UID,
    ImplementationVersionName:
      options.implementationVersionName ??
      firstString(metaInput[TAGS.ImplementationVersionName.tag]) ??
      IMPLEMENTATION_VERSION_NAME,
  });

  const metaChunks = serializeDataset(meta);
  const metaLength = metaChunks.reduce((acc, c) => acc + c.length, 0);
  const groupLength = new ElementStreamWriter()
    .add(TAGS.FileMetaInformationGroupLength.tag, element('FileMetaInformationGroupLength', metaLength))
    .toChunks();

  const header = new Uint8Array(PREAMBLE_LENGTH + 4);
  header.set(encoder.encode('DICM'), PREAMBLE_LENGTH);

  return [header, ...groupLength, ...metaChunks, ...serializeDataset(body)];
}

/**
 * Serialize a dataset to a Uint8Array (DICOM Part 10 file).
 */
export function write(dataset: ElementDict, options: WriteOptions = {}): Uint8Array {
  return concatChunks(writeChunks(dataset, options));
}
