import { describe, expect, it } from 'vitest';
import { ParseError } from './errors/parse-error';
import { deStruct, readUints, uintBitLength } from './de-struct';
import { ByteSink } from './en-struct';

describe('deStruct', () => {
  it('reads mixed widths back to back', () => {
    const bytes = new ByteSink()
      .writeInt(8, 0xAB)
      .writeInt(16, 0x1234)
      .writeInt(-64, -2n)
      .toUint8Array();

    expect(deStruct([8, 16, -64], new DataView(bytes.buffer))).toEqual([0xAB, 0x1234, -2n]);
  });

  it('reads 128-bit ints as signed', () => {
    const bytes = new ByteSink().writeInt(-128, -3n).writeInt(-128, 2n ** 64n).toUint8Array();

    expect(deStruct([-128, -128], new DataView(bytes.buffer))).toEqual([-3n, 2n ** 64n]);
  });

  it('throws past the end of the view', () => {
    expect(() => deStruct([32], new DataView(new ArrayBuffer(2)))).toThrow(RangeError);
  });
});

describe('readUints', () => {
  it('reads a table of two byte entries', () => {
    const view = new DataView(new Uint8Array([0x00, 0x08, 0x01, 0x00]).buffer);

    expect(readUints(view, 2, 2)).toEqual([8, 256]);
  });

  it('only knows one, two and four byte entries', () => {
    expect(uintBitLength(4)).toBe(32);
    expect(() => uintBitLength(3)).toThrow(ParseError);
  });
});

describe('ByteSink', () => {
  it('grows past its initial capacity', () => {
    const sink = new ByteSink();
    for (let i = 0; i < 300; ++i) {
      sink.writeInt(8, i);
    }

    const bytes = sink.toUint8Array();
    expect(bytes).toHaveLength(300);
    expect(bytes[299]).toBe(299 & 0xFF);
  });
});
