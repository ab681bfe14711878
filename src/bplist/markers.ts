import { ParseError } from "./errors/parse-error";

export enum Marker {
  null = 0b0000_0000, // 0x00
  false = 0b0000_1000, // 0x08
  true = 0b0000_1001, // 0x09
  fill = 0b0000_1111, // 0x0F
  /** lower nibble is exponent of byte-size of the int */
  int = 0b0001_0000, // 0x10
  /** lower nibble is exponent of byte-size of the real */
  real = 0b0010_0000, // 0x20
  date = 0b0011_0000, // 0x30
  /** lower nibble is byte-size or 1111 for trailing int-based size, then bytes */
  data = 0b0100_0000, // 0x40
  /** lower nibble is byte-size or 1111 for trailing int-based size, then bytes */
  ascii = 0b0101_0000, // 0x50
  /** lower nibble is UTF-16 code unit count or 1111 for trailing int-based count, then 2-byte big-endian units */
  unicode = 0b0110_0000, // 0x60
  /** lower nibble is byte-size minus 1 */
  uid = 0b1000_0000, // 0x80
  /** lower nibble is count or 1111 for trailing int-based count, then objrefs */
  array = 0b1010_0000, // 0xA0
  /** lower nibble is count or 1111 for trailing int-based count, then objrefs */
  orderedSet = 0b1011_0000, // 0xB0
  /** lower nibble is count or 1111 for trailing int-based count, then objrefs */
  set = 0b1100_0000, // 0xC0
  /** lower nibble is count or 1111 for trailing int-based count, then keyrefs and objrefs */
  dict = 0b1101_0000, // 0xD0
}

/** lower nibble meaning "the size follows as an int object" */
export const extendedSizeNibble = 0xF;

export const markerPrimitives: ReadonlyMap<Marker, null | false | true> = new Map([
  [Marker.null, null],
  [Marker.false, false],
  [Marker.true, true],
]);

export type MarkerByteParts = {
  readonly marker: Marker;
  readonly lowerNibble: number;
}

export function byteToMarker(byte: number, offset?: number): MarkerByteParts {
  if (((byte | 0) & 0xFF) !== byte) {
    throw new ParseError(`marker is not an integral byte: ${byte}`, offset);
  }

  const upperNibbleMasked = byte & 0xF0;
  const lowerNibbleMasked = byte & 0x0F;

  if (upperNibbleMasked === 0) {
    if (Marker[byte] === undefined) {
      throw new ParseError(`byte 0x${byte.toString(16)} has zero upper-nibble but is unknown`, offset);
    }
    return {
      marker: byte,
      lowerNibble: lowerNibbleMasked,
    };
  }

  if (Marker[upperNibbleMasked] === undefined) {
    throw new ParseError(`byte 0x${byte.toString(16)} has non-zero upper-nibble but is unknown`, offset);
  }

  // `byte` is a complex type marker with some dynamic sizing
  return {
    marker: upperNibbleMasked,
    lowerNibble: lowerNibbleMasked,
  }
}

export function markerToByte(marker: Marker, lowerNibble = 0) {
  return marker | (lowerNibble & 0x0F);
}
