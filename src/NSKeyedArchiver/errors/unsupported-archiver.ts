import { KeyedArchiveError } from "./keyed-archive-error";

export class UnsupportedArchiver extends KeyedArchiveError {
  readonly name = 'UnsupportedArchiver';

  constructor(readonly archiver: string) {
    super(`archiver \`${archiver}\` is not supported`);
  }
}
