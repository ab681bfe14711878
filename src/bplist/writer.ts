import { cfAbsoluteTimeEpochMilliseconds } from "./constants/epoch";
import { bplistMagicNumber, bplistVersion } from "./constants/magic-number";
import { ByteSink } from "./en-struct";
import { Marker, extendedSizeNibble, markerToByte } from "./markers";
import { Trailer } from "./models/trailer";
import { Uid } from "./models/uid";
import type { ObjRef } from "./types/bplist-index-aliases";
import { type PlistValue, isArray } from "./value";
import { type ILogger, resolveLogger } from "../shared/logger";

type Scalar = null | boolean | bigint | number | string | Date | ArrayBuffer | Uid;

type FlatEntry =
  | { readonly kind: 'scalar', readonly value: Scalar }
  | { readonly kind: 'array', readonly objrefs: ObjRef[] }
  | { readonly kind: 'dict', readonly keyrefs: ObjRef[], readonly objrefs: ObjRef[] };

const maxInt64 = 0x7FFF_FFFF_FFFF_FFFFn;
const maxUint64 = 0xFFFF_FFFF_FFFF_FFFFn;

/**
 * Writes a value tree as a `bplist00` document.
 * Objects are not shared: every node of the tree gets its own object.
 */
export class Writer {

  private readonly _entries: FlatEntry[] = [];

  constructor(readonly logger: ILogger) { }

  static write(value: PlistValue, logger: ILogger = resolveLogger()) {
    return new Writer(logger).write(value);
  }

  write(value: PlistValue): Uint8Array {
    this._entries.length = 0;
    const topObject = this._flatten(value);

    const objectRefSize = Writer.unsignedByteSize(this._entries.length - 1);
    const sink = new ByteSink();
    for (const char of bplistMagicNumber + bplistVersion) {
      sink.writeInt(8, char.charCodeAt(0));
    }

    const offsets = this._entries.map(entry => {
      const offset = sink.length;
      Writer.writeEntry(sink, entry, objectRefSize);
      return offset;
    });

    const offsetTableOffset = sink.length;
    const offsetIntSize = Writer.unsignedByteSize(offsetTableOffset);
    for (const offset of offsets) {
      sink.writeUintOfSize(offsetIntSize, offset);
    }

    for (let i = 0; i < Trailer.unusedLeadingBytes; ++i) {
      sink.writeInt(8, 0);
    }
    sink
      .writeInt(8, 0) // sortVersion
      .writeInt(8, offsetIntSize)
      .writeInt(8, objectRefSize)
      .writeInt(64, this._entries.length)
      .writeInt(64, topObject)
      .writeInt(64, offsetTableOffset);

    this.logger.debug('DBG: wrote %d objects in %d bytes', this._entries.length, sink.length);
    return sink.toUint8Array();
  }

  /** depth-first, parents before children; returns the ref of `value` */
  private _flatten(value: PlistValue): ObjRef {
    const ref = this._entries.length;

    if (isArray(value)) {
      const objrefs: ObjRef[] = [];
      this._entries.push({ kind: 'array', objrefs });
      for (const element of value) {
        objrefs.push(this._flatten(element));
      }
    }
    else if (Writer.isScalar(value)) {
      this._entries.push({ kind: 'scalar', value });
    }
    else {
      const keyrefs: ObjRef[] = [];
      const objrefs: ObjRef[] = [];
      this._entries.push({ kind: 'dict', keyrefs, objrefs });
      for (const [key, element] of Object.entries(value)) {
        keyrefs.push(this._flatten(key));
        objrefs.push(this._flatten(element));
      }
    }

    return ref;
  }

  static isScalar(value: PlistValue): value is Scalar {
    return typeof value !== 'object'
      || value === null
      || value instanceof Uid
      || value instanceof Date
      || value instanceof ArrayBuffer;
  }

  static writeEntry(sink: ByteSink, entry: FlatEntry, objectRefSize: number) {
    switch (entry.kind) {
      case 'array':
        this.writeMarkerWithSize(sink, Marker.array, entry.objrefs.length);
        entry.objrefs.forEach(ref => sink.writeUintOfSize(objectRefSize, ref));
        return;
      case 'dict':
        this.writeMarkerWithSize(sink, Marker.dict, entry.objrefs.length);
        entry.keyrefs.forEach(ref => sink.writeUintOfSize(objectRefSize, ref));
        entry.objrefs.forEach(ref => sink.writeUintOfSize(objectRefSize, ref));
        return;
      case 'scalar':
        this.writeScalar(sink, entry.value);
        return;
    }
  }

  static writeScalar(sink: ByteSink, value: Scalar) {
    if (value === null) {
      sink.writeInt(8, Marker.null);
    }
    else if (typeof value === 'boolean') {
      sink.writeInt(8, value ? Marker.true : Marker.false);
    }
    else if (typeof value === 'bigint') {
      this.writeInt(sink, value);
    }
    else if (typeof value === 'number') {
      sink.writeInt(8, markerToByte(Marker.real, 3)).writeFloat64(value);
    }
    else if (typeof value === 'string') {
      this.writeString(sink, value);
    }
    else if (value instanceof Date) {
      const secondsSinceEpoch = (value.getTime() - cfAbsoluteTimeEpochMilliseconds) / 1e3;
      sink.writeInt(8, markerToByte(Marker.date, 3)).writeFloat64(secondsSinceEpoch);
    }
    else if (value instanceof Uid) {
      const bytes = this.unsignedByteSize(value.value, true);
      sink.writeInt(8, markerToByte(Marker.uid, bytes - 1)).writeUintOfSize(bytes, value.value);
    }
    else {
      this.writeMarkerWithSize(sink, Marker.data, value.byteLength);
      sink.writeBytes(new Uint8Array(value));
    }
  }

  /**
   * Mirrors the read side: 1|2|4 byte ints are unsigned, 8 byte ints are signed,
   * and 16 bytes hold unsigned 64-bit values.
   */
  static writeInt(sink: ByteSink, value: bigint) {
    if (value < 0n) {
      if (value < -maxInt64 - 1n) {
        throw new RangeError(`Integer ${value} does not fit in 64 bits`);
      }
      sink.writeInt(8, markerToByte(Marker.int, 3)).writeInt(-64, value);
    }
    else if (value <= 0xFFFF_FFFFn) {
      const bytes = this.unsignedByteSize(value);
      sink.writeInt(8, markerToByte(Marker.int, Math.log2(bytes))).writeUintOfSize(bytes, value);
    }
    else if (value <= maxInt64) {
      sink.writeInt(8, markerToByte(Marker.int, 3)).writeInt(-64, value);
    }
    else if (value <= maxUint64) {
      sink.writeInt(8, markerToByte(Marker.int, 4)).writeInt(-128, value);
    }
    else {
      throw new RangeError(`Integer ${value} does not fit in 64 bits`);
    }
  }

  static writeString(sink: ByteSink, value: string) {
    if (/^[\x00-\x7F]*$/.test(value)) {
      this.writeMarkerWithSize(sink, Marker.ascii, value.length);
      for (let i = 0; i < value.length; ++i) {
        sink.writeInt(8, value.charCodeAt(i));
      }
      return;
    }

    this.writeMarkerWithSize(sink, Marker.unicode, value.length);
    for (let i = 0; i < value.length; ++i) {
      sink.writeInt(16, value.charCodeAt(i));
    }
  }

  static writeMarkerWithSize(sink: ByteSink, marker: Marker, size: number) {
    if (size < extendedSizeNibble) {
      sink.writeInt(8, markerToByte(marker, size));
      return;
    }
    sink.writeInt(8, markerToByte(marker, extendedSizeNibble));
    this.writeInt(sink, BigInt(size));
  }

  /**
   * Smallest of 1, 2 or 4 bytes (8 too, when `allowEightBytes`) that holds `value`.
   */
  static unsignedByteSize(value: number | bigint, allowEightBytes = false) {
    const big = BigInt(value);
    if (big <= 0xFFn) {
      return 1;
    }
    if (big <= 0xFFFFn) {
      return 2;
    }
    if (big <= 0xFFFF_FFFFn) {
      return 4;
    }
    if (allowEightBytes && big <= maxUint64) {
      return 8;
    }
    throw new RangeError(`${value} does not fit in 4 bytes`);
  }
}

export function serialize(value: PlistValue, logger?: ILogger) {
  return Writer.write(value, logger);
}
