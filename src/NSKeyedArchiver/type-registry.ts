import { AnyObject } from "./any-object";
import { type Archivable, type ArchivableType, isRootClass } from "./archivable";
import type { Decoder } from "./coder";

export type UnarchiveFn = (unarchiver: Decoder) => AnyObject | undefined;

/**
 * Which types the unarchiver may instantiate, by class name.
 * Append-only: registering a name a second time is a no-op.
 */
export class TypeRegistry {

  private readonly _unarchiveFns = new Map<string, UnarchiveFn>();

  /** Registers `type` and every class in its chain, each under its own name. */
  registerType<T extends Archivable>(type: ArchivableType<T>): this {
    if (!isRootClass(type)) {
      this.registerType(type.$superclass);
    }

    if (!this._unarchiveFns.has(type.$classname)) {
      this._unarchiveFns.set(type.$classname, unarchiver => {
        const object = type.decode(unarchiver);
        return object === undefined ? undefined : AnyObject.erasing(object, type);
      });
    }
    return this;
  }

  getUnarchiveFn(forClassName: string): UnarchiveFn | undefined {
    return this._unarchiveFns.get(forClassName);
  }

  has(forClassName: string) {
    return this._unarchiveFns.has(forClassName);
  }

  get size() {
    return this._unarchiveFns.size;
  }

  classNames() {
    return [...this._unarchiveFns.keys()];
  }
}
