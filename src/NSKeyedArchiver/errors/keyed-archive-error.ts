
/**
 * Base of every error the keyed archiver and unarchiver report to callers.
 */
export abstract class KeyedArchiveError extends Error {
  abstract readonly name: string;
}
