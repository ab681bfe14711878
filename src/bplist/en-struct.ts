import { type AcceptedBitLength, type IntField, intFields } from "./de-struct";

/**
 * Growable big-endian byte buffer; written through the same {@link intFields} the reader uses.
 */
export class ByteSink {
  private _bytes = new Uint8Array(256);
  private _view = new DataView(this._bytes.buffer);
  private _length = 0;

  get length() {
    return this._length;
  }

  writeInt(bitLength: AcceptedBitLength, value: number | bigint) {
    const field: IntField<number | bigint> = intFields[bitLength];
    field.write(this._reserve(field.byteLength), this._length - field.byteLength, value);
    return this;
  }

  writeUintOfSize(byteSize: number, value: number | bigint) {
    switch (byteSize) {
      case 1:
        return this.writeInt(8, value);
      case 2:
        return this.writeInt(16, value);
      case 4:
        return this.writeInt(32, value);
      case 8:
        return this.writeInt(64, value);
    }
    throw new RangeError(`Unexpected byte size for unsigned int: ${byteSize}`);
  }

  writeFloat64(value: number) {
    this._reserve(8).setFloat64(this._length - 8, value);
    return this;
  }

  writeBytes(bytes: Uint8Array) {
    this._reserve(bytes.byteLength);
    this._bytes.set(bytes, this._length - bytes.byteLength);
    return this;
  }

  toUint8Array() {
    return this._bytes.slice(0, this._length);
  }

  /** grows the buffer if needed and advances the length; returns the view to write through */
  private _reserve(byteCount: number) {
    const required = this._length + byteCount;
    if (required > this._bytes.byteLength) {
      let capacity = this._bytes.byteLength * 2;
      while (capacity < required) {
        capacity *= 2;
      }
      const grown = new Uint8Array(capacity);
      grown.set(this._bytes.subarray(0, this._length));
      this._bytes = grown;
      this._view = new DataView(grown.buffer);
    }
    this._length = required;
    return this._view;
  }
}
