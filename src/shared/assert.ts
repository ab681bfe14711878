
export class AssertError extends Error {
  readonly name = 'AssertError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * For internal invariants only; input problems get their own error types.
 */
export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new AssertError(message);
  }
}
