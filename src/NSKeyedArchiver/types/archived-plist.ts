import { ParseError, type PlistValue, Uid, asArray, asDictionary, asInteger, asString, getOwnValue } from "../../bplist";

/**
 * The expected structure of a decoded bplist made by NSKeyedArchiver.
 */
export type IArchivedPList = {
  readonly $archiver: string;
  readonly $objects: readonly PlistValue[];
  readonly $top: { readonly [name: string]: Uid };
  readonly $version: bigint;
};

/**
 * Checks that `value` has the four envelope keys with the right kinds.
 * Their values (which archiver, which version, whether `root` exists) are the unarchiver's business.
 *
 * @throws ParseError naming the first key that is missing or of the wrong kind
 */
export function toArchivedPList(value: PlistValue): IArchivedPList {
  const dict = asDictionary(value);
  if (!dict) {
    throw new ParseError('archive is not a dictionary');
  }

  const $archiver = asString(getOwnValue(dict, '$archiver'));
  if ($archiver === undefined) {
    throw new ParseError('$archiver must be a string');
  }

  const $objects = asArray(getOwnValue(dict, '$objects'));
  if (!$objects) {
    throw new ParseError('$objects must be an array');
  }

  const topDict = asDictionary(getOwnValue(dict, '$top'));
  if (!topDict) {
    throw new ParseError('$top must be a dictionary');
  }
  const $top = Object.fromEntries(
    Object.entries(topDict).map(([name, ref]) => {
      if (!(ref instanceof Uid)) {
        throw new ParseError(`$top.${name} must be a uid`);
      }
      return [name, ref] as const;
    }),
  );

  const $version = asInteger(getOwnValue(dict, '$version'));
  if ($version === undefined || $version < 0n || $version > 0xFFFF_FFFFn) {
    throw new ParseError('$version must be an unsigned 32-bit integer');
  }

  return { $archiver, $objects, $top, $version };
}
