import { KeyedArchiveError } from "./keyed-archive-error";

export class MalformedObject extends KeyedArchiveError {
  readonly name = 'MalformedObject';

  constructor(readonly reason: string) {
    super(`structure of the decoding object is malformed: ${reason}`);
  }
}
