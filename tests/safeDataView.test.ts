import { describe, expect, it } from 'vitest';
import { DicomParseError } from '../src/core/errors';
import { SafeDataView } from '../src/utils/SafeDataView';

describe('SafeDataView', () => {
  it('reads little-endian integers and enforces bounds', () => {
    const bytes = new Uint8Array(6);
    const view = new DataView(bytes.buffer);
    view.setUint16(0, 0x1234, true);
    view.setInt16(2, -2, true);

    const safe = new SafeDataView(bytes);
    expect(safe.readUint16()).toBe(0x1234);
    expect(safe.readInt16()).toBe(-2);
    expect(safe.getPosition()).toBe(4);
    expect(safe.getRemainingBytes()).toBe(2);

    expect(() => safe.readUint32()).toThrow('Read beyond buffer');
    expect(() => safe.setPosition(-1)).toThrow('out of bounds');
    expect(() => safe.setPosition(7)).toThrow(DicomParseError);
  });

  it('honours the byte offset of a subarray', () => {
    const bytes = new Uint8Array([0xff, 0xff, 0x01, 0x00, 0x00, 0x00]);
    const safe = new SafeDataView(bytes.subarray(2));
    expect(safe.byteLength).toBe(4);
    expect(safe.readUint32()).toBe(1);
  });

  it('trims null terminators and spaces when reading strings', () => {
    const text = new TextEncoder().encode('Test  \0\0');
    const safe = new SafeDataView(text);
    expect(safe.readString(text.length)).toBe('Test');
  });

  it('returns byte views without copying', () => {
    const bytes = new Uint8Array([1, 2, 3, 4]);
    const safe = new SafeDataView(bytes);
    safe.skip(1);
    const slice = safe.readBytes(2);
    expect(Array.from(slice)).toEqual([2, 3]);
    expect(slice.buffer).toBe(bytes.buffer);
  });
});
