import { BaseReader } from "../base-reader";
import { headerByteLength } from "../constants/magic-number";
import { ParseError } from "../errors/parse-error";
import { Marker, byteToMarker, extendedSizeNibble, markerPrimitives } from "../markers";
import type { ObjectTableOffset } from "../types/bplist-index-aliases";
import type { ILogger } from "../../shared/logger";
import { ObjectTableArrayLike, ObjectTableDict, type ObjectTableEntry } from "./object-table-entries";
import type { OffsetTable } from "./offset-table";
import type { Trailer } from "./trailer";

export class ObjectTable extends BaseReader {

  readonly objectTableOffset = headerByteLength;

  private readonly _table = new Map<ObjectTableOffset, ObjectTableEntry>();

  constructor(buffer: ArrayBuffer, offsetTable: OffsetTable, trailer: Trailer, logger: ILogger) {
    super();

    const objectRefSize = trailer.objectRefSize;

    for (let ref = 0; ref < offsetTable.count; ++ref) {
      const offset = offsetTable.getObjectTableOffsetByObjRef(ref);
      if (offset < this.objectTableOffset) {
        throw new ParseError(`Ref ${ref} points into the header`, offset);
      }
      if (this._table.has(offset)) {
        // two refs sharing one object
        continue;
      }

      const { entry, bytesRead } = ObjectTable.parseObjectTableEntry(buffer, offset, objectRefSize, logger);
      if (offset + bytesRead > offsetTable.offsetTableOffset) {
        throw new ParseError(`Object of ${bytesRead} bytes overlaps the offset table`, offset);
      }
      this._table.set(offset, entry);
    }
  }

  getEntryByObjectTableOffset(offset: ObjectTableOffset) {
    const result = this._table.get(offset);
    if (result === undefined) {
      throw new ParseError('Offset not in object table', offset);
    }
    return result;
  }

  static parseObjectTableEntry(
    buffer: ArrayBuffer,
    offset: number,
    objectRefSize: number,
    logger: ILogger,
  ): { entry: ObjectTableEntry, bytesRead: number } {
    const markerByte = this.viewOf(buffer, offset, 1).getUint8(0);
    const { marker, lowerNibble } = byteToMarker(markerByte, offset);
    logger.debug('DBG: offset=%s found marker=%s with lowerNibble=0x%s', offset, Marker[marker], lowerNibble.toString(16));

    const primitive = markerPrimitives.get(marker);
    if (primitive !== undefined) {
      return {
        entry: primitive,
        bytesRead: 1,
      }
    }

    let bytesRead = 1;
    let entry: ObjectTableEntry;

    /** lower nibble, or the int that follows the marker when the nibble is 0xF */
    const readSize = () => {
      if (lowerNibble !== extendedSizeNibble) {
        return lowerNibble;
      }
      const sizeCheck = this.readDynamicInt(buffer, offset + bytesRead);
      bytesRead += sizeCheck.bytesRead;
      if (sizeCheck.entry < 0n || sizeCheck.entry > BigInt(buffer.byteLength)) {
        throw new ParseError(`Implausible size ${sizeCheck.entry}`, offset);
      }
      return Number(sizeCheck.entry);
    };

    switch (marker) {
      case Marker.int: {
        const bytes = 2 ** lowerNibble;
        entry = this.readInt(buffer, offset + bytesRead, bytes);
        bytesRead += bytes;
        break;
      }

      case Marker.real: {
        const bytes = 2 ** lowerNibble;
        entry = this.readReal(buffer, offset + bytesRead, bytes);
        bytesRead += bytes;
        break;
      }

      case Marker.date: {
        const bytes = 2 ** lowerNibble;
        if (bytes !== 8) {
          logger.warn('WARN: date of %d bytes at offset %d; CoreFoundation writes 8', bytes, offset);
        }
        entry = this.readDate(buffer, offset + bytesRead, bytes);
        bytesRead += bytes;
        break;
      }

      case Marker.data: {
        const bytes = readSize();
        entry = this.readData(buffer, offset + bytesRead, bytes);
        bytesRead += bytes;
        break;
      }

      case Marker.ascii: {
        const bytes = readSize();
        entry = this.readAscii(buffer, offset + bytesRead, bytes);
        bytesRead += bytes;
        break;
      }

      case Marker.unicode: {
        const charCount = readSize();
        entry = this.readUnicode16(buffer, offset + bytesRead, charCount);
        bytesRead += charCount * 2;
        break;
      }

      case Marker.uid: {
        const bytes = lowerNibble + 1;
        entry = this.readUid(buffer, offset + bytesRead, bytes);
        bytesRead += bytes;
        break;
      }

      case Marker.array:
      case Marker.orderedSet:
      case Marker.set: {
        const size = readSize();
        entry = new ObjectTableArrayLike(
          marker,
          this.readObjRefs(buffer, offset + bytesRead, size, objectRefSize),
        );
        bytesRead += size * objectRefSize;
        break;
      }

      case Marker.dict: {
        const size = readSize();
        const keysAndObjs = this.readObjRefs(buffer, offset + bytesRead, size * 2, objectRefSize);
        entry = new ObjectTableDict(
          Array.from({ length: size }, (_, i) => [keysAndObjs[i], keysAndObjs[i + size]] as const),
        );
        bytesRead += size * objectRefSize * 2;
        break;
      }

      default:
        throw new ParseError(`Unexpected ${Marker[marker]} marker`, offset);
    }

    logger.debug('DBG: offset=%d done, read %d bytes and found %O', offset, bytesRead, entry);

    return {
      entry,
      bytesRead,
    }
  }
}
