/**
 * DICOM Reader
 *
 * Reads back Part 10 files in Explicit VR Little Endian, the only syntax the
 * writer produces. Used by the index builder and the inspector.
 */

import { createParseError, DicomParseError, toError } from './errors';
import { TAGS, UIDS } from './tags';
import type { DicomElement, ElementDict, PixelDataLocation, VR } from './types';
import { isKnownVR, LONG_VRS, UNDEFINED_LENGTH } from './writer';
import { readFilePrefix } from '../utils/files';
import { SafeDataView } from '../utils/SafeDataView';
import { formatTagWithComma, normalizeTag, tagFromParts } from '../utils/tagUtils';

const PREAMBLE_LENGTH = 128;

/** Enough to hold every attribute ahead of Pixel Data */
export const HEADER_READ_BYTES = 64 * 1024;
const ITEM_GROUP = 0xfffe;
const ITEM = 0xe000;
const ITEM_DELIMITATION = 0xe00d;
const SEQUENCE_DELIMITATION = 0xe0dd;

export interface ReadOptions {
  /**
   * Stop at Pixel Data (7FE0,0010). Its location is still reported, so a
   * prefix of the file is enough to read every other attribute.
   */
  stopAtPixelData?: boolean;
}

/**
 * Parsed dataset with typed accessors
 */
export interface DicomDataSet {
  /** Dataset body, keyed by x-prefixed tag */
  dict: ElementDict;
  /** File meta group (0002) */
  meta: ElementDict;
  transferSyntax: string;
  /** Present when the Pixel Data header was reached */
  pixelData?: PixelDataLocation;
  element(tag: string): DicomElement | undefined;
  string(tag: string): string | undefined;
  strings(tag: string): string[];
  uint16(tag: string): number | undefined;
  uint32(tag: string): number | undefined;
  floatString(tag: string): number | undefined;
  intString(tag: string): number | undefined;
  items(tag: string): ElementDict[];
}

interface ReadState {
  stopAtPixelData: boolean;
  pixelData?: PixelDataLocation;
}

type TextVR = Exclude<VR, 'US' | 'UL' | 'SS' | 'SL' | 'FL' | 'FD' | 'OB' | 'OD' | 'OF' | 'OL' | 'OW' | 'UN' | 'SQ'>;

const NUMERIC_READERS: Partial<Record<VR, { size: number; read: (view: SafeDataView) => number }>> = {
  US: { size: 2, read: (v) => v.readUint16() },
  UL: { size: 4, read: (v) => v.readUint32() },
  SS: { size: 2, read: (v) => v.readInt16() },
  SL: { size: 4, read: (v) => v.readInt32() },
  FL: { size: 4, read: (v) => v.readFloat32() },
  FD: { size: 8, read: (v) => v.readFloat64() },
};

const BINARY_VRS = new Set<VR>(['OB', 'OD', 'OF', 'OL', 'OW', 'UN']);

function isTextVR(vr: VR): vr is TextVR {
  return vr !== 'SQ' && !BINARY_VRS.has(vr) && NUMERIC_READERS[vr] === undefined;
}

function readVR(view: SafeDataView, tag: string, offset: number): VR {
  const bytes = view.readBytes(2);
  const vr = String.fromCharCode(bytes[0], bytes[1]);
  if (!isKnownVR(vr)) {
    throw createParseError(`Unknown VR "${vr}"`, formatTagWithComma(tag), offset);
  }
  return vr;
}

function readValue(view: SafeDataView, tag: string, vr: VR, length: number, state: ReadState): DicomElement {
  if (vr === 'SQ') {
    return { vr, items: readSequence(view, tag, length, state) };
  }
  if (length === UNDEFINED_LENGTH) {
    throw createParseError(`Undefined length is not supported for VR ${vr}`, formatTagWithComma(tag), view.getPosition());
  }

  const numeric = NUMERIC_READERS[vr];
  if (numeric) {
    if (length % numeric.size !== 0) {
      throw createParseError(`Length ${length} is not a multiple of ${numeric.size} for VR ${vr}`, formatTagWithComma(tag), view.getPosition());
    }
    const values: number[] = [];
    for (let i = 0; i < length / numeric.size; i++) {
      values.push(numeric.read(view));
    }
    return { vr, Value: values };
  }

  if (!isTextVR(vr)) {
    return { vr, Value: view.readBytes(length) };
  }

  const text = view.readString(length);
  if (vr === 'LT' || vr === 'ST' || vr === 'UT') {
    return { vr, Value: [text] };
  }
  return { vr, Value: text.length === 0 ? [] : text.split('\\').map((part) => part.trim()) };
}

function readItemHeader(view: SafeDataView): { element: number; length: number; offset: number } {
  const offset = view.getPosition();
  const group = view.readUint16();
  const element = view.readUint16();
  const length = view.readUint32();
  if (group !== ITEM_GROUP) {
    throw createParseError(`Expected item tag, found group ${group.toString(16).padStart(4, '0')}`, undefined, offset);
  }
  return { element, length, offset };
}

function readSequence(view: SafeDataView, tag: string, length: number, state: ReadState): ElementDict[] {
  const items: ElementDict[] = [];
  const end = length === UNDEFINED_LENGTH ? undefined : view.getPosition() + length;

  for (;;) {
    if (end !== undefined && view.getPosition() >= end) break;

    const header = readItemHeader(view);
    if (header.element === SEQUENCE_DELIMITATION) {
      if (end !== undefined) {
        throw createParseError('Sequence delimiter inside a defined-length sequence', formatTagWithComma(tag), header.offset);
      }
      break;
    }
    if (header.element !== ITEM) {
      throw createParseError(`Unexpected delimiter (FFFE,${header.element.toString(16).toUpperCase()})`, formatTagWithComma(tag), header.offset);
    }

    const itemEnd = header.length === UNDEFINED_LENGTH ? undefined : view.getPosition() + header.length;
    items.push(readElements(view, itemEnd, { ...state, stopAtPixelData: false }));
  }

  if (end !== undefined && view.getPosition() !== end) {
    throw createParseError('Sequence overran its declared length', formatTagWithComma(tag), view.getPosition());
  }
  return items;
}

/**
 * Read elements until `end`, or until an Item Delimitation Item when `end`
 * is undefined.
 */
function readElements(view: SafeDataView, end: number | undefined, state: ReadState): ElementDict {
  const dict: ElementDict = {};

  while (end === undefined || view.getPosition() < end) {
    const offset = view.getPosition();
    const group = view.readUint16();
    const element = view.readUint16();

    if (group === ITEM_GROUP) {
      view.skip(4);
      if (element === ITEM_DELIMITATION && end === undefined) {
        return dict;
      }
      throw createParseError('Unexpected delimiter in dataset', undefined, offset);
    }

    const tag = tagFromParts(group, element);
    const vr = readVR(view, tag, offset);
    let length: number;
    if (LONG_VRS.has(vr)) {
      view.skip(2);
      length = view.readUint32();
    } else {
      length = view.readUint16();
    }

    if (tag === TAGS.PixelData.tag) {
      if (length === UNDEFINED_LENGTH) {
        throw createParseError('Encapsulated Pixel Data is not supported', formatTagWithComma(tag), offset);
      }
      state.pixelData = { offset: view.getPosition(), length };
      if (state.stopAtPixelData) {
        dict[tag] = { vr };
        return dict;
      }
    }

    dict[tag] = readValue(view, tag, vr, length, state);
  }

  if (view.getPosition() !== end) {
    throw createParseError('Item overran its declared length', undefined, view.getPosition());
  }
  return dict;
}

function firstOf(element: DicomElement | undefined): string | number | undefined {
  const value = element?.Value;
  if (value === undefined) return undefined;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (value instanceof Uint8Array || value instanceof Uint16Array) return undefined;
  return value[0];
}

/**
 * Wrap an element dict with typed accessors
 */
export function createDataSet(
  dict: ElementDict,
  meta: ElementDict = {},
  transferSyntax: string = UIDS.ExplicitVRLittleEndian,
  pixelData?: PixelDataLocation
): DicomDataSet {
  const element = (tag: string): DicomElement | undefined => dict[normalizeTag(tag)] ?? meta[normalizeTag(tag)];

  const numberAt = (tag: string): number | undefined => {
    const value = firstOf(element(tag));
    return typeof value === 'number' ? value : undefined;
  };

  const parsedString = (tag: string, parseValue: (text: string) => number): number | undefined => {
    const value = firstOf(element(tag));
    if (typeof value !== 'string' || value.length === 0) return undefined;
    const num = parseValue(value);
    return Number.isNaN(num) ? undefined : num;
  };

  return {
    dict,
    meta,
    transferSyntax,
    pixelData,
    element,
    string: (tag) => {
      const value = firstOf(element(tag));
      return typeof value === 'string' ? value : undefined;
    },
    strings: (tag) => {
      const value = element(tag)?.Value;
      if (typeof value === 'string') return [value];
      if (value === undefined || typeof value === 'number') return [];
      if (value instanceof Uint8Array || value instanceof Uint16Array) return [];
      const values: string[] = [];
      for (const item of value) {
        if (typeof item === 'string') values.push(item);
      }
      return values;
    },
    uint16: (tag) => {
      const value = numberAt(tag);
      return value === undefined ? undefined : value & 0xffff;
    },
    uint32: numberAt,
    floatString: (tag) => parsedString(tag, parseFloat),
    intString: (tag) => parsedString(tag, (text) => parseInt(text, 10)),
    items: (tag) => [...(element(tag)?.items ?? [])],
  };
}

/**
 * Parse a Part 10 file. Every failure surfaces as DicomParseError.
 */
export function readDicom(byteArray: Uint8Array, options: ReadOptions = {}): DicomDataSet {
  if (byteArray.length < PREAMBLE_LENGTH + 4) {
    throw createParseError('File too small to be a valid DICOM file', undefined, 0);
  }

  const view = new SafeDataView(byteArray);
  view.setPosition(PREAMBLE_LENGTH);
  if (view.readString(4) !== 'DICM') {
    throw createParseError('Missing DICM prefix', undefined, PREAMBLE_LENGTH);
  }

  const state: ReadState = { stopAtPixelData: options.stopAtPixelData ?? false };

  try {
    const groupLengthOffset = view.getPosition();
    const groupLength = readElements(view, groupLengthOffset + 12, state)[TAGS.FileMetaInformationGroupLength.tag];
    const metaLength = firstOf(groupLength);
    if (typeof metaLength !== 'number') {
      throw createParseError('File meta group must start with its group length', undefined, groupLengthOffset);
    }

    const meta = readElements(view, view.getPosition() + metaLength, state);
    const transferSyntax = firstOf(meta[TAGS.TransferSyntaxUID.tag]);
    if (transferSyntax !== UIDS.ExplicitVRLittleEndian) {
      throw createParseError(`Unsupported transfer syntax ${String(transferSyntax)}`, formatTagWithComma(TAGS.TransferSyntaxUID.tag));
    }

    const dict = readElements(view, view.byteLength, state);
    return createDataSet(dict, meta, transferSyntax, state.pixelData);
  } catch (error) {
    if (error instanceof DicomParseError) {
      throw error;
    }
    const cause = toError(error);
    throw createParseError(`Data element parsing failed - ${cause.message}`, undefined, view.getPosition(), cause);
  }
}

/**
 * Copy the Pixel Data samples of a fully read file into a Uint16Array
 */
export function readPixelSamples(byteArray: Uint8Array, location: PixelDataLocation): Uint16Array {
  if (location.offset + location.length > byteArray.length) {
    throw createParseError('Pixel Data extends past the end of the file', formatTagWithComma(TAGS.PixelData.tag), location.offset);
  }
  const view = new DataView(byteArray.buffer, byteArray.byteOffset + location.offset, location.length);
  const samples = new Uint16Array(location.length / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = view.getUint16(i * 2, true);
  }
  return samples;
}

/**
 * Read every attribute ahead of Pixel Data without loading the pixels
 */
export function readDicomHeader(filePath: string): DicomDataSet {
  return readDicom(readFilePrefix(filePath, HEADER_READ_BYTES), { stopAtPixelData: true });
}
