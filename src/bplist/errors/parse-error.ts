
export class ParseError extends Error {
  readonly name = 'ParseError';

  constructor(message: string, readonly offset?: number) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
  }
}
