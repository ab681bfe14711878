import { Marker } from "../markers";
import type { ObjRef } from "../types/bplist-index-aliases";
import type { Uid } from "./uid";

export class ObjectTableArrayLike {
  constructor(
    readonly type: Marker.array | Marker.set | Marker.orderedSet,
    readonly objrefs: readonly ObjRef[],
  ) { }

  get typeName() {
    return Marker[this.type];
  }
}

type DictKeyValue = readonly [key: ObjRef, value: ObjRef];
export class ObjectTableDict {
  constructor(
    readonly entries: readonly DictKeyValue[],
  ) { }
}

/** an object as it sits in the table, with containers still holding objrefs */
export type ObjectTableEntry = null | boolean | bigint | number | Date | ArrayBuffer | string | Uid | ObjectTableDict | ObjectTableArrayLike;
