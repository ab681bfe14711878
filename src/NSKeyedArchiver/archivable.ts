import type { Decoder, Encoder } from "./coder";

/**
 * An instance that can write itself into a keyed archive.
 *
 * Its fields, and those of its archived superclasses, are written by `encode` alone:
 * nothing walks the class chain to encode ancestors.
 */
export interface Archivable {
  encode(archiver: Encoder): void;
}

/**
 * The static side of an archivable class.
 *
 * ```ts
 * class Person implements Archivable {
 *   static readonly $classname = 'RCDPerson';
 *   static readonly $superclass = NSObject;
 *
 *   constructor(readonly age: number, readonly firstName: string) { }
 *
 *   encode(archiver: Encoder) {
 *     archiver.encodeInt32(this.age, 'Age');
 *     archiver.encodeString(this.firstName, 'FirstName');
 *   }
 *
 *   static decode(unarchiver: Decoder) {
 *     const firstName = unarchiver.decodeString('FirstName');
 *     return firstName === undefined ? undefined : new Person(unarchiver.decodeInt32('Age'), firstName);
 *   }
 * }
 * ```
 */
export interface ArchivableType<T extends Archivable = Archivable> {
  new(...args: never[]): T;

  /** the class name recorded in the archive and dispatched on when decoding */
  readonly $classname: string;
  /** the archived superclass; {@link NSObject} for direct subclasses of the root */
  readonly $superclass: ArchivableType;

  /** `undefined` when a field the type needs is missing */
  decode(unarchiver: Decoder): T | undefined;
}

/**
 * The root class. Its own `$superclass` is itself, which is what ends every class chain.
 */
export class NSObject implements Archivable {
  static readonly $classname: string = 'NSObject';
  static readonly $superclass: ArchivableType = NSObject;

  static decode(): NSObject {
    return new NSObject();
  }

  encode() { }
}

export function isRootClass(type: ArchivableType) {
  return type.$superclass === type;
}

/**
 * Most-derived first, e.g. `['RCDPerson', 'NSObject']`; written to `$classes`.
 */
export function getClasses(type: ArchivableType): string[] {
  if (isRootClass(type)) {
    return [type.$classname];
  }
  return [type.$classname, ...getClasses(type.$superclass)];
}

export function isArchivableType(value: unknown): value is ArchivableType {
  return typeof value === 'function'
    && '$classname' in value && typeof value.$classname === 'string'
    && '$superclass' in value && typeof value.$superclass === 'function'
    && 'decode' in value && typeof value.decode === 'function';
}
