import { inspect } from "node:util";
import { type Archivable, type ArchivableType, getClasses, isArchivableType } from "./archivable";
import type { Encoder } from "./coder";

/**
 * A type-erased archivable value.
 *
 * Holds one value together with what was known about its type when it was erased:
 * how to describe it, how to encode it, its class chain, and the type itself as a tag
 * for {@link downcast}. This is what the unarchiver hands back whatever class it decoded,
 * and what `encodeObject` accepts whatever class is being encoded.
 */
export class AnyObject {
  private constructor(
    private readonly _object: Archivable,
    private readonly _type: ArchivableType,
    private readonly _describe: () => string,
    private readonly _encode: (archiver: Encoder) => void,
    private readonly _getClasses: () => string[],
  ) { }

  /**
   * @param type defaults to `object.constructor`, which then has to be an {@link ArchivableType}
   * @throws TypeError if `object` is not an instance of `type`
   */
  static erasing<T extends Archivable>(object: T, type?: ArchivableType<T>) {
    const resolvedType = type ?? archivableTypeOf(object);
    if (!(object instanceof resolvedType)) {
      throw new TypeError(`Object is not an instance of ${resolvedType.$classname}`);
    }

    return new AnyObject(
      object,
      resolvedType,
      () => inspect(object),
      archiver => object.encode(archiver),
      () => getClasses(resolvedType),
    );
  }

  get $classname() {
    return this._type.$classname;
  }

  get type(): ArchivableType {
    return this._type;
  }

  /** most-derived first */
  get classes() {
    return this._getClasses();
  }

  encode(archiver: Encoder) {
    this._encode(archiver);
  }

  is(type: ArchivableType) {
    return this._type === type;
  }

  /**
   * The value, if it was erased as exactly `type` (a subclass does not match).
   * A mismatch leaves this handle as it was.
   */
  downcast<T extends Archivable>(type: ArchivableType<T>): T | undefined {
    const object = this._object;
    if (this._type !== type || !(object instanceof type)) {
      return undefined;
    }
    return object;
  }

  debugDescription() {
    return this._describe();
  }

  toString() {
    return `AnyObject<${this.$classname}>`;
  }

  [inspect.custom]() {
    return `AnyObject<${this.$classname}> ${this._describe()}`;
  }
}

function archivableTypeOf(object: Archivable): ArchivableType {
  const type: unknown = object.constructor;
  if (!isArchivableType(type)) {
    throw new TypeError(`${object.constructor.name} is not archivable; it needs static $classname, $superclass and decode`);
  }
  return type;
}
