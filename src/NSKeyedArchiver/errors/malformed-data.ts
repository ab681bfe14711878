import { KeyedArchiveError } from "./keyed-archive-error";

/** The bytes could not be parsed or written, or the envelope is not shaped like a keyed archive. */
export class MalformedData extends KeyedArchiveError {
  readonly name = 'MalformedData';
  declare readonly cause: Error;

  constructor(cause: Error) {
    super(`archive data is malformed: ${cause.message}`, { cause });
  }
}
