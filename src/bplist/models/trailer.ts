import { headerByteLength } from "../constants/magic-number";
import { deStruct } from "../de-struct";
import { ParseError } from "../errors/parse-error";

export class Trailer {
  static readonly trailerByteLength = 32;
  static readonly unusedLeadingBytes = 5;
  static readonly acceptedIntSizes: readonly number[] = [1, 2, 4];

  constructor(
    readonly sortVersion: number,
    /** size of offsets found in offsetTable that point to objects in object table */
    readonly offsetIntSize: number,
    /** size of objectRefs that are found in arrays/sets/dicts */
    readonly objectRefSize: number,
    readonly numObjects: bigint,
    readonly topObject: bigint,
    readonly offsetTableOffset: bigint,
    readonly _trailerOffset: number,
  ) { }

  static fromBuffer(buffer: ArrayBuffer) {
    const trailerOffset = buffer.byteLength - this.trailerByteLength;
    if (trailerOffset < headerByteLength) {
      throw new ParseError(`Buffer of ${buffer.byteLength} bytes is too short to hold a header and trailer`);
    }
    const trailerView = new DataView(buffer, trailerOffset + this.unusedLeadingBytes);

    const [sortVersion, offsetIntSize, objectRefSize, numObjects, topObject, offsetTableOffset] = deStruct([8, 8, 8, 64, 64, 64], trailerView);
    const trailer = new Trailer(
      sortVersion,
      offsetIntSize,
      objectRefSize,
      numObjects,
      topObject,
      offsetTableOffset,
      trailerOffset,
    );
    trailer.validate();
    return trailer;
  }

  get offsetTableByteLength() {
    return Number(this.numObjects) * this.offsetIntSize;
  }

  private validate() {
    if (!Trailer.acceptedIntSizes.includes(this.offsetIntSize)) {
      throw new ParseError(`Unexpected offsetIntSize: ${this.offsetIntSize}`, this._trailerOffset);
    }
    if (!Trailer.acceptedIntSizes.includes(this.objectRefSize)) {
      throw new ParseError(`Unexpected objectRefSize: ${this.objectRefSize}`, this._trailerOffset);
    }
    if (this.numObjects === 0n) {
      throw new ParseError('Trailer declares zero objects', this._trailerOffset);
    }
    if (this.topObject >= this.numObjects) {
      throw new ParseError(`topObject ${this.topObject} is not below numObjects ${this.numObjects}`, this._trailerOffset);
    }
    if (this.offsetTableOffset < BigInt(headerByteLength)
      || this.offsetTableOffset + BigInt(this.offsetTableByteLength) > BigInt(this._trailerOffset)) {
      throw new ParseError(`Offset table at ${this.offsetTableOffset} does not fit between header and trailer`, this._trailerOffset);
    }
  }
}
