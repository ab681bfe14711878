import { KeyedArchiveError } from "./keyed-archive-error";

export class UnknownClass extends KeyedArchiveError {
  readonly name = 'UnknownClass';

  constructor(readonly $classname: string) {
    super(`decoding class \`${$classname}\` is unknown, did you forget to register?`);
  }
}
