import { BaseReader } from "./base-reader";
import { bplistMagicNumber, bplistVersion, versionByteLength } from "./constants/magic-number";
import { ParseError } from "./errors/parse-error";
import { Marker } from "./markers";
import { ObjectTable } from "./models/object-table";
import { ObjectTableArrayLike, ObjectTableDict } from "./models/object-table-entries";
import { OffsetTable } from "./models/offset-table";
import { Trailer } from "./models/trailer";
import type { ObjRef } from "./types/bplist-index-aliases";
import type { PlistValue } from "./value";
import { type ILogger, resolveLogger } from "../shared/logger";

export class Reader extends BaseReader {

  readonly version: string;

  readonly trailer: Trailer;
  readonly offsetTable: OffsetTable;
  readonly objectTable: ObjectTable;

  constructor(buffer: ArrayBuffer, readonly logger: ILogger) {
    super();

    const magicNumber = Reader.readAscii(buffer, 0, bplistMagicNumber.length);
    if (magicNumber !== bplistMagicNumber) {
      throw new ParseError(`Invalid magicNumber (at start of file); must be ${bplistMagicNumber} but got ${JSON.stringify(magicNumber)}`, 0);
    }
    this.version = Reader.readAscii(buffer, bplistMagicNumber.length, versionByteLength);
    if (this.version !== bplistVersion) {
      logger.warn('WARN: version is not 00 and will likely have issues / fail! version = %s', this.version);
    }

    this.trailer = Trailer.fromBuffer(buffer);
    logger.debug('DBG: Trailer found: %O', this.trailer);
    this.offsetTable = new OffsetTable(buffer, this.trailer);
    this.objectTable = new ObjectTable(buffer, this.offsetTable, this.trailer, logger);
  }

  buildTopLevelObject(): PlistValue {
    const topRef = Number(this.trailer.topObject);

    return this._buildObjectsRecursive(topRef, new Map(), new Set());
  }

  private _buildObjectsRecursive(ref: ObjRef, workingSet: Map<ObjRef, PlistValue>, inProgress: Set<ObjRef>): PlistValue {
    if (workingSet.has(ref)) {
      return workingSet.get(ref) ?? null;
    }
    if (inProgress.has(ref)) {
      throw new ParseError(`Ref ${ref} contains itself`);
    }

    const tableEntry = this.getObjectEntryByObjRef(ref);

    let output: PlistValue;
    if (tableEntry instanceof ObjectTableArrayLike) {
      if (tableEntry.type !== Marker.array) {
        this.logger.warn('WARN: reading %s at ref %d as an array', tableEntry.typeName, ref);
      }
      inProgress.add(ref);
      output = Object.freeze(tableEntry.objrefs.map(r => this._buildObjectsRecursive(r, workingSet, inProgress)));
      inProgress.delete(ref);
    }
    else if (tableEntry instanceof ObjectTableDict) {
      inProgress.add(ref);
      const pairs = tableEntry.entries.map(([key, value]) => {
        const keyOutput = this._buildObjectsRecursive(key, workingSet, inProgress);
        if (typeof keyOutput !== 'string') {
          throw new ParseError(`Dictionary at ref ${ref} has a non-string key`);
        }
        return [keyOutput, this._buildObjectsRecursive(value, workingSet, inProgress)] as const;
      });
      inProgress.delete(ref);

      output = Object.freeze(
        Object.fromEntries(pairs),
      );
    }
    else {
      output = tableEntry;
    }

    workingSet.set(ref, output);
    return output;
  }

  getObjectEntryByObjRef(ref: ObjRef) {
    const offset = this.offsetTable.getObjectTableOffsetByObjRef(ref);

    return this.objectTable.getEntryByObjectTableOffset(offset);
  }
}

/**
 * Parses a whole `bplist00` document into its top-level value.
 *
 * @throws ParseError if the document is malformed
 */
export function parseBuffer(data: ArrayBuffer | Uint8Array, logger: ILogger = resolveLogger()): PlistValue {
  // copy: a Node Buffer may be a window onto a shared pool
  const buffer = data instanceof ArrayBuffer ? data : new Uint8Array(data).buffer;

  return new Reader(buffer, logger).buildTopLevelObject();
}
