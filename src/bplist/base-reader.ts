import { cfAbsoluteTimeEpochMilliseconds } from "./constants/epoch";
import { type AcceptedBitLength, type IntField, intFields, readUints, uintBitLength } from "./de-struct";
import { ParseError } from "./errors/parse-error";
import { Marker, byteToMarker } from "./markers";
import { Uid } from "./models/uid";
import type { ObjRef } from "./types/bplist-index-aliases";

/** keeps `String.fromCharCode(...units)` under engine argument limits */
const charCodeChunkSize = 0x2000;

export class BaseReader {

  /**
   * A DataView over `[offset, offset + byteLength)`, or a ParseError if that runs off the buffer.
   */
  static viewOf(buffer: ArrayBuffer, offset: number, byteLength: number) {
    if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(byteLength)
      || offset < 0 || byteLength < 0 || offset + byteLength > buffer.byteLength) {
      throw new ParseError(`Reading ${byteLength} bytes runs past the end of a ${buffer.byteLength} byte buffer`, offset);
    }
    return new DataView(buffer, offset, byteLength);
  }

  /**
   * First byte must be a {@link Marker.int} which determines the rest of size of the int.
   * Reads the marker byte and the rest of the int, returns the int, and the total number of bytes read.
   */
  static readDynamicInt(buffer: ArrayBuffer, offset: number) {
    const markerByte = this.viewOf(buffer, offset, 1).getUint8(0);

    const markerParts = byteToMarker(markerByte, offset);
    if (markerParts.marker !== Marker.int) {
      throw new ParseError(`dynamic int was not an int, was ${Marker[markerParts.marker]}`, offset);
    }
    const bytes = 2 ** markerParts.lowerNibble;
    const entry = this.readInt(buffer, offset + 1, bytes);
    return {
      entry,
      bytesRead: bytes + 1
    };
  }

  /**
   * According to the comments in CFBinaryPList.c, ints of size 1|2|4 are
   * always unsigned while ints of size 8|16 are always signed.
   */
  static readInt(buffer: ArrayBuffer, offset: number, bytes: number): bigint {
    const view = this.viewOf(buffer, offset, bytes);

    let bits: AcceptedBitLength;
    switch (bytes) {
      case 1:
      case 2:
      case 4:
        bits = uintBitLength(bytes);
        break;
      case 8:
        bits = -64;
        break;
      case 16:
        bits = -128;
        break;
      default:
        throw new ParseError(`Unexpected byte length for int: ${bytes}`, offset);
    }

    const field: IntField<number | bigint> = intFields[bits];
    return BigInt(field.read(view, 0));
  }

  static readReal(buffer: ArrayBuffer, offset: number, bytes: number) {
    const view = this.viewOf(buffer, offset, bytes);
    switch (bytes) {
      case 4:
        return view.getFloat32(0);
      case 8:
        return view.getFloat64(0);
    }

    throw new ParseError(`Unexpected byte length for real: ${bytes}`, offset);
  }

  static readDate(buffer: ArrayBuffer, offset: number, bytes: number) {
    const secondsSinceEpoch = this.readReal(buffer, offset, bytes);

    const utcMilliseconds = cfAbsoluteTimeEpochMilliseconds + secondsSinceEpoch * 1e3;
    return new Date(utcMilliseconds);
  }

  static readData(buffer: ArrayBuffer, offset: number, size: number) {
    this.viewOf(buffer, offset, size);
    return buffer.slice(offset, offset + size);
  }

  static readAscii(buffer: ArrayBuffer, offset: number, bytes: number) {
    this.viewOf(buffer, offset, bytes);
    return fromCharCodes(new Uint8Array(buffer, offset, bytes));
  }

  static readUnicode16(buffer: ArrayBuffer, offset: number, count: number) {
    // damn you little-endian; if Uint16Array were bigendian we could just read that
    const dataView = this.viewOf(buffer, offset, count * 2);
    const units = new Uint16Array(count);
    for (let i = 0; i < count; ++i) {
      units[i] = dataView.getUint16(i * 2);
    }
    return fromCharCodes(units);
  }

  static readUid(buffer: ArrayBuffer, offset: number, bytes: number) {
    const view = this.viewOf(buffer, offset, bytes);
    switch (bytes) {
      case 1:
      case 2:
      case 4:
        return new Uid(BigInt(intFields[uintBitLength(bytes)].read(view, 0)));
      case 8:
        return new Uid(intFields[64].read(view, 0));
    }
    throw new ParseError(`Unexpected byte length for UID: ${bytes}`, offset);
  }

  static readObjRefs(buffer: ArrayBuffer, offset: number, count: number, objectRefSize: number): ObjRef[] {
    const dataView = this.viewOf(buffer, offset, count * objectRefSize);
    return readUints(dataView, count, objectRefSize);
  }
}

function fromCharCodes(units: Uint8Array | Uint16Array) {
  let result = '';
  for (let i = 0; i < units.length; i += charCodeChunkSize) {
    result += String.fromCharCode(...units.subarray(i, i + charCodeChunkSize));
  }
  return result;
}
