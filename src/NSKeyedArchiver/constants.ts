/** the only `$archiver` accepted; the non-keyed `NSArchiver` is deprecated */
export const keyedArchiverClassName = 'NSKeyedArchiver';
export const keyedArchiveVersion = 100000n;

/** `$objects[0]`, which `Uid(0)` (nil) points at */
export const nullObjectSentinel = '$null';
export const rootObjectKey = 'root';
