/**
 * SafeDataView: Safe byte reading wrapper
 *
 * Provides bounds-checked little-endian reads for reading back written files.
 */

import { createParseError } from '../core/errors';

const decoder = new TextDecoder('utf-8');

/**
 * DataView wrapper for safe byte reading
 */
export class SafeDataView {
  private readonly view: DataView;
  private offset: number;

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = 0;
  }

  get byteLength(): number {
    return this.view.byteLength;
  }

  getPosition(): number {
    return this.offset;
  }

  setPosition(position: number): void {
    if (position < 0 || position > this.view.byteLength) {
      throw createParseError(`Position ${position} out of bounds (max: ${this.view.byteLength})`, undefined, position);
    }
    this.offset = position;
  }

  getRemainingBytes(): number {
    return this.view.byteLength - this.offset;
  }

  private ensure(length: number): void {
    if (this.offset + length > this.view.byteLength) {
      throw createParseError(
        `Read beyond buffer: need ${length} bytes, have ${this.view.byteLength - this.offset}`,
        undefined,
        this.offset
      );
    }
  }

  readUint16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readInt16(): number {
    this.ensure(2);
    const value = this.view.getInt16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readInt32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readFloat32(): number {
    this.ensure(4);
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readFloat64(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length);
    const bytes = new Uint8Array(this.view.buffer, this.view.byteOffset + this.offset, length);
    this.offset += length;
    return bytes;
  }

  /**
   * Read a text value, dropping trailing NUL and space padding
   */
  readString(length: number): string {
    const bytes = this.readBytes(length);
    let end = bytes.length;
    while (end > 0 && (bytes[end - 1] === 0 || bytes[end - 1] === 32)) {
      end--;
    }
    return decoder.decode(bytes.subarray(0, end));
  }

  skip(length: number): void {
    this.ensure(length);
    this.offset += length;
  }
}
