import { KeyedArchiveError } from "./keyed-archive-error";

export class NoRootObject extends KeyedArchiveError {
  readonly name = 'NoRootObject';

  constructor() {
    super('root object is not found');
  }
}
