
/**
 * A `CF$UID` value: an index into an archive's `$objects`, kept apart from plain integers.
 */
export class Uid {
  constructor(readonly value: bigint) { }

  static of(index: number | bigint) {
    return new Uid(BigInt(index));
  }

  toString() {
    return `Uid<${this.value}>`;
  }
}
