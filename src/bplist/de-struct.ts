import { ParseError } from "./errors/parse-error";

/** big-endian integer widths in bits; negative widths are signed */
export type AcceptedBitLength = 8 | 16 | 32 | 64 | -64 | -128;

type BitLengthToType<T extends AcceptedBitLength> =
  T extends 64 | -64 | -128 ? bigint : number;

type DeStructResult<T extends readonly AcceptedBitLength[]> = {
  -readonly [k in keyof T]: BitLengthToType<T[k]>;
}

export interface IntField<T extends number | bigint> {
  readonly byteLength: number;
  read(view: DataView, byteOffset: number): T;
  /** `value` is truncated to the field, as DataView setters do */
  write(view: DataView, byteOffset: number, value: number | bigint): void;
}

export const intFields = {
  [8]: {
    byteLength: 1,
    read: (view, byteOffset) => view.getUint8(byteOffset),
    write: (view, byteOffset, value) => view.setUint8(byteOffset, Number(value)),
  },
  [16]: {
    byteLength: 2,
    read: (view, byteOffset) => view.getUint16(byteOffset),
    write: (view, byteOffset, value) => view.setUint16(byteOffset, Number(value)),
  },
  [32]: {
    byteLength: 4,
    read: (view, byteOffset) => view.getUint32(byteOffset),
    write: (view, byteOffset, value) => view.setUint32(byteOffset, Number(value)),
  },
  [64]: {
    byteLength: 8,
    read: (view, byteOffset) => view.getBigUint64(byteOffset),
    write: (view, byteOffset, value) => view.setBigUint64(byteOffset, BigInt(value)),
  },
  [-64]: {
    byteLength: 8,
    read: (view, byteOffset) => view.getBigInt64(byteOffset),
    write: (view, byteOffset, value) => view.setBigInt64(byteOffset, BigInt(value)),
  },
  [-128]: {
    byteLength: 16,
    read: (view, byteOffset) => (view.getBigInt64(byteOffset) << 64n) + view.getBigUint64(byteOffset + 8),
    write: (view, byteOffset, value) => {
      const big = BigInt(value);
      view.setBigInt64(byteOffset, big >> 64n);
      view.setBigUint64(byteOffset + 8, BigInt.asUintN(64, big));
    },
  },
} satisfies { readonly [K in AcceptedBitLength]: IntField<BitLengthToType<K>> };

/**
 * Reads fields of the given widths back to back from the start of `view`.
 *
 * @throws RangeError if reading out of bounds
 */
export function deStruct<const Ts extends readonly AcceptedBitLength[]>(
  input: Ts,
  view: DataView,
) {
  let byteOffset = 0;
  const values = input.map(bitLength => {
    const field: IntField<number | bigint> = intFields[bitLength];
    const value = field.read(view, byteOffset);
    byteOffset += field.byteLength;
    return value;
  });

  return values as DeStructResult<Ts>;
}

/**
 * `count` unsigned ints of `byteSize` bytes each, as offset and object ref tables hold them.
 */
export function readUints(view: DataView, count: number, byteSize: number): number[] {
  const field = intFields[uintBitLength(byteSize)];
  return Array.from({ length: count }, (_, i) => field.read(view, i * field.byteLength));
}

export function uintBitLength(byteSize: number): 8 | 16 | 32 {
  switch (byteSize) {
    case 1:
      return 8;
    case 2:
      return 16;
    case 4:
      return 32;
  }
  throw new ParseError(`Unexpected int size: ${byteSize}`);
}
