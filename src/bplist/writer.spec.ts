import { describe, expect, it } from 'vitest';
import { Writer, serialize } from './writer';
import { Uid } from './models/uid';
import { ByteSink } from './en-struct';

const header = [0x62, 0x70, 0x6C, 0x69, 0x73, 0x74, 0x30, 0x30];

describe('Writer', () => {
  it('writes a lone boolean as header, object, offset table and trailer', () => {
    expect([...serialize(true)]).toEqual([
      ...header,
      0x09,
      0x08,
      0, 0, 0, 0, 0,
      0, 1, 1,
      0, 0, 0, 0, 0, 0, 0, 1,
      0, 0, 0, 0, 0, 0, 0, 0,
      0, 0, 0, 0, 0, 0, 0, 9,
    ]);
  });

  it('writes dictionary keys before values, depth first', () => {
    const bytes = serialize({ a: 1n });

    // dict, "a", 1
    expect([...bytes.subarray(8, 14)]).toEqual([0xD1, 0x01, 0x02, 0x51, 0x61, 0x10]);
    expect(bytes[14]).toBe(0x01);
  });

  it('moves sizes of 15 and up into a trailing int', () => {
    const bytes = serialize('Library/PersistentStores');

    expect([...bytes.subarray(8, 11)]).toEqual([0x5F, 0x10, 24]);
  });

  it('writes non-ASCII strings as big-endian UTF-16', () => {
    const bytes = serialize('é');

    expect([...bytes.subarray(8, 11)]).toEqual([0x61, 0x00, 0xE9]);
  });

  it('picks the smallest uid width', () => {
    expect([...serialize(Uid.of(5)).subarray(8, 10)]).toEqual([0x80, 0x05]);
    expect([...serialize(Uid.of(300)).subarray(8, 11)]).toEqual([0x81, 0x01, 0x2C]);
  });

  describe('writeInt', () => {
    const intBytes = (value: bigint) => {
      const sink = new ByteSink();
      Writer.writeInt(sink, value);
      return [...sink.toUint8Array()];
    };

    it('writes small non-negative ints unsigned', () => {
      expect(intBytes(0n)).toEqual([0x10, 0x00]);
      expect(intBytes(501n)).toEqual([0x11, 0x01, 0xF5]);
      expect(intBytes(228000n)).toEqual([0x12, 0x00, 0x03, 0x7A, 0xA0]);
    });

    it('writes negatives as 8 byte signed', () => {
      expect(intBytes(-1n)).toEqual([0x13, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF]);
    });

    it('writes values past the signed 64-bit range in 16 bytes', () => {
      expect(intBytes(2n ** 64n - 1n)).toEqual([
        0x14,
        0, 0, 0, 0, 0, 0, 0, 0,
        0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF,
      ]);
    });

    it('rejects what does not fit in 64 bits', () => {
      expect(() => intBytes(2n ** 64n)).toThrow(RangeError);
      expect(() => intBytes(-(2n ** 63n) - 1n)).toThrow(RangeError);
    });
  });
});
