import { readFileSync } from "node:fs";
import {
  ParseError,
  type PlistDictionary,
  type PlistValue,
  Uid,
  asDictionary,
  asString,
  getOwnValue,
  parseBuffer,
} from "../bplist";
import { assert } from "../shared/assert";
import { type ILogOptions, type ILogger, resolveLogger } from "../shared/logger";
import { $ObjectsMap } from "./$objects-map";
import type { AnyObject } from "./any-object";
import type { Decoder } from "./coder";
import { keyedArchiveVersion, keyedArchiverClassName, rootObjectKey } from "./constants";
import { KeyedArchiveError } from "./errors/keyed-archive-error";
import { MalformedData } from "./errors/malformed-data";
import { MalformedObject } from "./errors/malformed-object";
import { NoRootObject } from "./errors/no-root-object";
import { UnknownClass } from "./errors/unknown-class";
import { UnsupportedArchiver } from "./errors/unsupported-archiver";
import type { TypeRegistry } from "./type-registry";
import { type IArchivedPList, toArchivedPList } from "./types/archived-plist";

const minInt64 = -(2n ** 63n);
const maxInt64 = 2n ** 63n - 1n;

/**
 * Walks one archive from `$top.root`, instantiating each object through the registry entry
 * for its `$classname`.
 *
 * The unarchiver is itself the {@link Decoder} handed to every `decode`; which object it reads
 * from is the "active" object, swapped while a nested `decodeObject` runs and put back after.
 *
 * Only {@link unarchiveRootObject} throws. A nested object that fails to decode comes back
 * from `decodeObject` as `undefined`.
 */
export class KeyedUnarchiver implements Decoder {

  private readonly $objects: $ObjectsMap;
  private _activeObject: Uid | undefined;

  constructor(
    readonly archive: IArchivedPList,
    readonly registry: TypeRegistry,
    readonly logger: ILogger = resolveLogger(),
  ) {
    this.$objects = new $ObjectsMap(archive.$objects);
  }

  /**
   * @throws MalformedData if `data` is not a binary plist shaped like a keyed archive
   * @throws KeyedArchiveError subclasses from {@link unarchiveRootObject}
   */
  static unarchiveObjectFromData(data: ArrayBuffer | Uint8Array, registry: TypeRegistry, options: ILogOptions = {}): AnyObject {
    const logger = resolveLogger(options);

    let value: PlistValue;
    try {
      value = parseBuffer(data, logger);
    }
    catch (error) {
      throw wrapCodecError(error);
    }
    return KeyedUnarchiver.unarchiveObjectFromPlist(value, registry, options);
  }

  /**
   * @throws MalformedData if the file is not a binary plist shaped like a keyed archive
   * @throws KeyedArchiveError subclasses from {@link unarchiveRootObject}
   */
  static unarchiveObjectFromFile(path: string, registry: TypeRegistry, options: ILogOptions = {}): AnyObject {
    const nodeBuf = readFileSync(path);
    return KeyedUnarchiver.unarchiveObjectFromData(nodeBuf, registry, options);
  }

  /**
   * For a plist the caller has already parsed, e.g. to look at it for other reasons first.
   *
   * @throws MalformedData if `value` is not shaped like a keyed archive
   * @throws KeyedArchiveError subclasses from {@link unarchiveRootObject}
   */
  static unarchiveObjectFromPlist(value: PlistValue, registry: TypeRegistry, options: ILogOptions = {}): AnyObject {
    let archive: IArchivedPList;
    try {
      archive = toArchivedPList(value);
    }
    catch (error) {
      throw wrapCodecError(error);
    }
    return new KeyedUnarchiver(archive, registry, resolveLogger(options)).unarchiveRootObject();
  }

  unarchiveRootObject(): AnyObject {
    const { $archiver, $top, $version } = this.archive;
    if ($archiver !== keyedArchiverClassName) {
      throw new UnsupportedArchiver($archiver);
    }
    if ($version !== keyedArchiveVersion) {
      this.logger.warn(`Unexpected NSKeyedArchiver version; expected ${keyedArchiveVersion} but got ${$version}`);
    }

    if (!Object.prototype.hasOwnProperty.call($top, rootObjectKey)) {
      throw new NoRootObject();
    }
    const root = $top[rootObjectKey];
    if (!this.$objects.has(root)) {
      throw new MalformedObject(`$top.root ${root} is outside $objects of ${this.$objects.length}`);
    }

    this._activeObject = root;
    try {
      return this._decodeActiveObject();
    }
    finally {
      this._activeObject = undefined;
    }
  }

  private _decodeActiveObject(): AnyObject {
    const uid = this._ensureActiveObjectUid();
    const instance = asDictionary(this.$objects.getByUid(uid));
    if (!instance) {
      throw new MalformedObject(`${uid} is not an object`);
    }

    const classUid = getOwnValue(instance, '$class');
    if (!(classUid instanceof Uid)) {
      throw new MalformedObject(`${uid} has no $class uid`);
    }
    if (!this.$objects.has(classUid)) {
      throw new MalformedObject(`$class ${classUid} of ${uid} is outside $objects`);
    }
    const classInfo = asDictionary(this.$objects.getByUid(classUid));
    const $classname = classInfo && asString(getOwnValue(classInfo, '$classname'));
    if ($classname === undefined) {
      throw new MalformedObject(`$class ${classUid} of ${uid} has no $classname`);
    }

    const unarchiveFn = this.registry.getUnarchiveFn($classname);
    if (!unarchiveFn) {
      throw new UnknownClass($classname);
    }

    this.logger.debug('DBG: decoding %s as %s', uid, $classname);
    const object = unarchiveFn(this);
    if (object === undefined) {
      throw new MalformedObject(`${$classname} at ${uid} could not be decoded from its fields`);
    }
    return object;
  }

  // de/coding

  containsValue(forKey: string): boolean {
    return forKey[0] !== '$' && this._getRawValue(forKey) !== undefined;
  }

  decodeInt32(forKey: string): number {
    return Number(BigInt.asIntN(32, this.decodeInt64(forKey)));
  }

  decodeInt64(forKey: string): bigint {
    const value = this._getRawValue(forKey);
    if (typeof value !== 'bigint' || value < minInt64 || value > maxInt64) {
      return 0n;
    }
    return value;
  }

  decodeBool(forKey: string): boolean {
    const value = this._getRawValue(forKey);
    return typeof value === 'boolean' ? value : false;
  }

  decodeDouble(forKey: string): number {
    const value = this._getRawValue(forKey);
    if (typeof value === 'number') {
      return value;
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    return 0;
  }

  decodeBytes(forKey: string): ArrayBuffer | undefined {
    const value = this._getRawValue(forKey);
    return value instanceof ArrayBuffer ? value : undefined;
  }

  decodeString(forKey: string): string | undefined {
    const uid = this._getRawValue(forKey);
    if (!(uid instanceof Uid)) {
      return undefined;
    }
    return asString(this.$objects.getByUid(uid));
  }

  decodeObject(forKey: string): AnyObject | undefined {
    const uid = this._getRawValue(forKey);
    if (!(uid instanceof Uid) || uid.value === 0n || !this.$objects.has(uid)) {
      return undefined;
    }

    const lastObject = this._activeObject;
    this._activeObject = uid;
    try {
      return this._decodeActiveObject();
    }
    catch (error) {
      if (error instanceof KeyedArchiveError) {
        this.logger.debug('DBG: field %s of %s decoded as absent: %s', forKey, lastObject, error.message);
        return undefined;
      }
      throw error;
    }
    finally {
      this._activeObject = lastObject;
    }
  }

  private _getRawValue(forKey: string): PlistValue | undefined {
    const instance = this._ensureActiveObject();
    return instance && getOwnValue(instance, forKey);
  }

  private _ensureActiveObjectUid() {
    const uid = this._activeObject;
    assert(uid !== undefined, 'expected an active object');
    assert(this.$objects.has(uid), 'internal state of unarchiver is inconsistent');
    return uid;
  }

  private _ensureActiveObject(): PlistDictionary | undefined {
    return asDictionary(this.$objects.getByUid(this._ensureActiveObjectUid()));
  }
}

function wrapCodecError(error: unknown) {
  if (error instanceof ParseError || error instanceof RangeError) {
    return new MalformedData(error);
  }
  return error;
}
