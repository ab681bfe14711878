import { readUints } from "../de-struct";
import { ParseError } from "../errors/parse-error";
import type { Trailer } from "./trailer";
import type { ObjRef, ObjectTableOffset } from "../types/bplist-index-aliases";

/**
 * Maps ObjRefs (indicies) to full-file-offsets pointing to objects
 */
export class OffsetTable {
  readonly offsetTableOffset: number;
  readonly offsetIntSize: number;
  readonly count: number;

  private readonly _table: readonly ObjectTableOffset[];

  constructor(buffer: ArrayBuffer, trailer: Trailer) {
    this.offsetTableOffset = Number(trailer.offsetTableOffset);
    this.offsetIntSize = trailer.offsetIntSize;
    this.count = Number(trailer.numObjects);

    const offsetTableView = new DataView(buffer, this.offsetTableOffset, trailer.offsetTableByteLength);
    this._table = readUints(offsetTableView, this.count, this.offsetIntSize);

    this._table.forEach((offset, ref) => {
      if (offset < 0 || offset >= this.offsetTableOffset) {
        throw new ParseError(`Ref ${ref} points at byte ${offset}, outside the object table`, this.offsetTableOffset);
      }
    });
  }

  has(ref: ObjRef) {
    return Number.isInteger(ref) && ref >= 0 && ref < this._table.length;
  }

  getObjectTableOffsetByObjRef(ref: ObjRef) {
    if (!this.has(ref)) {
      throw new ParseError(`Ref ${ref} not in OffsetTable of ${this._table.length} entries`);
    }
    return this._table[ref];
  }
}
