import { Uid } from "./models/uid";

/**
 * A decoded plist node.
 * Integers are `bigint` so 64-bit values survive; reals are `number`.
 */
export type PlistValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | Date
  | ArrayBuffer
  | Uid
  | PlistArray
  | PlistDictionary
  ;

export type PlistArray = readonly PlistValue[];

export interface PlistDictionary {
  readonly [key: string]: PlistValue;
}

export function isArray(value: PlistValue | undefined): value is PlistArray {
  return Array.isArray(value);
}

export function isDictionary(value: PlistValue | undefined): value is PlistDictionary {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && !(value instanceof Uid)
    && !(value instanceof Date)
    && !(value instanceof ArrayBuffer);
}

export function asDictionary(value: PlistValue | undefined) {
  return isDictionary(value) ? value : undefined;
}

export function asArray(value: PlistValue | undefined) {
  return isArray(value) ? value : undefined;
}

export function asString(value: PlistValue | undefined) {
  return typeof value === 'string' ? value : undefined;
}

export function asInteger(value: PlistValue | undefined) {
  return typeof value === 'bigint' ? value : undefined;
}

export function asReal(value: PlistValue | undefined) {
  return typeof value === 'number' ? value : undefined;
}

export function asBoolean(value: PlistValue | undefined) {
  return typeof value === 'boolean' ? value : undefined;
}

export function asUid(value: PlistValue | undefined) {
  return value instanceof Uid ? value : undefined;
}

export function asData(value: PlistValue | undefined) {
  return value instanceof ArrayBuffer ? value : undefined;
}

export function asDate(value: PlistValue | undefined) {
  return value instanceof Date ? value : undefined;
}

/**
 * Only own keys count; inherited names like `toString` are never fields.
 */
export function getOwnValue(dict: PlistDictionary, key: string): PlistValue | undefined {
  return Object.prototype.hasOwnProperty.call(dict, key) ? dict[key] : undefined;
}
