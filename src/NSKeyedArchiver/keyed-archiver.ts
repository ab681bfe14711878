import { ParseError, type PlistValue, Uid, serialize } from "../bplist";
import { assert } from "../shared/assert";
import { type ILogOptions, type ILogger, resolveLogger } from "../shared/logger";
import { AnyObject } from "./any-object";
import type { Archivable } from "./archivable";
import type { Encoder } from "./coder";
import { keyedArchiveVersion, keyedArchiverClassName, nullObjectSentinel, rootObjectKey } from "./constants";
import { MalformedData } from "./errors/malformed-data";
import type { IArchivedClass } from "./types/archive-types";
import type { IArchivedPList } from "./types/archived-plist";

type MutableRecord = { [key: string]: PlistValue };

/**
 * Builds the `$objects` table of one archive.
 *
 * Each object gets a slot before its fields are written, so its `Uid` is fixed while nested
 * objects are still being added after it. Field writes go to the "active" slot, which nested
 * encodes swap out and put back.
 *
 * One archiver encodes one root object; {@link seal} ends its life.
 */
export class KeyedArchiver implements Encoder {

  private readonly _objects: PlistValue[] = [nullObjectSentinel];
  /** the object records among `_objects`, by index, still open for writing */
  private readonly _records = new Map<number, MutableRecord>();
  private _activeObjectIndex: number | undefined;
  private _sealed = false;

  constructor(readonly logger: ILogger = resolveLogger()) { }

  /**
   * The envelope for `rootObject`, as a plist value tree.
   */
  static archivedPlist(rootObject: AnyObject | Archivable, options: ILogOptions = {}): IArchivedPList {
    const root = rootObject instanceof AnyObject ? rootObject : AnyObject.erasing(rootObject);

    const archiver = new KeyedArchiver(resolveLogger(options));
    const rootUid = archiver.encodeNewObject(encoder => {
      root.encode(encoder);
      return root.classes;
    });
    return archiver.seal(rootUid);
  }

  /**
   * `rootObject` archived and written as a binary plist.
   *
   * @throws MalformedData if the plist writer rejects a value
   */
  static archivedData(rootObject: AnyObject | Archivable, options: ILogOptions = {}): Uint8Array {
    const logger = resolveLogger(options);
    const plist = KeyedArchiver.archivedPlist(rootObject, options);
    try {
      return serialize(plist, logger);
    }
    catch (error) {
      if (error instanceof ParseError || error instanceof RangeError) {
        throw new MalformedData(error);
      }
      throw error;
    }
  }

  /**
   * Reserves a slot, runs `encode` with it active, then links a fresh class info record
   * built from the class chain `encode` returns.
   */
  encodeNewObject(encode: (archiver: Encoder) => readonly string[]): Uid {
    assert(!this._sealed, 'archiver was used after seal');

    const record: MutableRecord = Object.create(null);
    const newObjectIndex = this._objects.push(record) - 1;
    this._records.set(newObjectIndex, record);

    try {
      this._withActiveObject(newObjectIndex, () => {
        const classes = encode(this);
        assert(classes.length > 0, 'an archived object must have a class');

        const classInfo: IArchivedClass = {
          $classes: [...classes],
          $classname: classes[0],
        };
        const classInfoIndex = this._objects.push(classInfo) - 1;

        this._ensureActiveObject().$class = Uid.of(classInfoIndex);
      });
    }
    finally {
      this._records.delete(newObjectIndex);
    }

    return Uid.of(newObjectIndex);
  }

  /**
   * Ends this archiver and returns the envelope with `rootObject` as `$top.root`.
   */
  seal(rootObject: Uid): IArchivedPList {
    assert(!this._sealed, 'archiver was sealed twice');
    assert(this._activeObjectIndex === undefined, 'archiver was sealed while an object was being encoded');
    assert(this._records.size === 0, 'archiver was sealed with an object record still open');
    assert(rootObject.value < BigInt(this._objects.length), `root ${rootObject} is outside $objects`);
    this._sealed = true;

    this.logger.debug('DBG: sealing archive of %d objects with root %s', this._objects.length, rootObject);

    return {
      $archiver: keyedArchiverClassName,
      $objects: this._objects,
      $top: { [rootObjectKey]: rootObject },
      $version: keyedArchiveVersion,
    };
  }

  // encoding

  encodeInt32(value: number, forKey: string) {
    this._setValue(BigInt.asIntN(32, toIntegerBigInt(value)), forKey);
  }

  encodeInt64(value: bigint | number, forKey: string) {
    this._setValue(BigInt.asIntN(64, toIntegerBigInt(value)), forKey);
  }

  encodeBool(value: boolean, forKey: string) {
    this._setValue(value, forKey);
  }

  encodeDouble(value: number, forKey: string) {
    this._setValue(value, forKey);
  }

  encodeBytes(value: ArrayBuffer | Uint8Array, forKey: string) {
    this._setValue(value instanceof ArrayBuffer ? value.slice(0) : new Uint8Array(value).buffer, forKey);
  }

  encodeString(value: string, forKey: string) {
    assert(!this._sealed, 'archiver was used after seal');
    const index = this._objects.push(value) - 1;
    this._setValue(Uid.of(index), forKey);
  }

  encodeObject(object: AnyObject | Archivable, forKey: string) {
    const nested = object instanceof AnyObject ? object : AnyObject.erasing(object);
    const uid = this.encodeNewObject(encoder => {
      nested.encode(encoder);
      return nested.classes;
    });
    this._setValue(uid, forKey);
  }

  private _setValue(value: PlistValue, forKey: string) {
    this._ensureActiveObject()[forKey] = value;
  }

  private _withActiveObject(index: number, fn: () => void) {
    const lastIndex = this._activeObjectIndex;
    this._activeObjectIndex = index;
    try {
      fn();
    }
    finally {
      this._activeObjectIndex = lastIndex;
    }
  }

  private _ensureActiveObject() {
    assert(!this._sealed, 'archiver was used after seal');
    const index = this._activeObjectIndex;
    assert(index !== undefined, 'expected an active object');
    assert(index < this._objects.length, 'internal state of archiver is inconsistent');
    const record = this._records.get(index);
    assert(record !== undefined, `$objects[${index}] is not an open object record`);
    return record;
  }
}

/** drops the fraction of a `number`; NaN and the infinities become 0 */
function toIntegerBigInt(value: number | bigint) {
  if (typeof value === 'bigint') {
    return value;
  }
  return Number.isFinite(value) ? BigInt(Math.trunc(value)) : 0n;
}
