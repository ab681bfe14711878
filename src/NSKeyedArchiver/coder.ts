import type { AnyObject } from "./any-object";
import type { Archivable } from "./archivable";

/**
 * What an {@link Archivable}'s `encode` writes its fields through.
 * Every method writes into the object currently being encoded; writing a key twice keeps the last value.
 * Integer methods drop any fraction and wrap to their width; NaN and the infinities are written as 0.
 */
export interface Encoder {
  encodeInt32(value: number, forKey: string): void;
  encodeInt64(value: bigint | number, forKey: string): void;
  encodeString(value: string, forKey: string): void;
  /** Raw archivable values are erased on the way in. */
  encodeObject(object: AnyObject | Archivable, forKey: string): void;

  encodeBool(value: boolean, forKey: string): void;
  encodeDouble(value: number, forKey: string): void;
  encodeBytes(value: ArrayBuffer | Uint8Array, forKey: string): void;
}

/**
 * What an archivable type's static `decode` reads its fields through.
 * Nothing here throws: a missing or mistyped field decodes to its zero value or `undefined`,
 * and it is up to `decode` to give up (return `undefined`) when a field it needs is absent.
 */
export interface Decoder {
  /** `0` if absent or not an integer; truncated to 32 bits */
  decodeInt32(forKey: string): number;
  /** `0n` if absent or not an integer in the signed 64-bit range */
  decodeInt64(forKey: string): bigint;
  decodeString(forKey: string): string | undefined;
  decodeObject(forKey: string): AnyObject | undefined;

  /** `false` if absent or not a boolean */
  decodeBool(forKey: string): boolean;
  /** `0` if absent; integers are converted */
  decodeDouble(forKey: string): number;
  decodeBytes(forKey: string): ArrayBuffer | undefined;

  containsValue(forKey: string): boolean;
}
