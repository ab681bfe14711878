export * from './constants';
export type { IArchivedClass } from './types/archive-types';
export { type IArchivedPList, toArchivedPList } from './types/archived-plist';

export * from './errors/keyed-archive-error';
export * from './errors/malformed-data';
export * from './errors/malformed-object';
export * from './errors/no-root-object';
export * from './errors/unknown-class';
export * from './errors/unsupported-archiver';

export { $ObjectsMap } from './$objects-map';
export type { Decoder, Encoder } from './coder';
export { type Archivable, type ArchivableType, NSObject, getClasses, isArchivableType, isRootClass } from './archivable';
export { AnyObject } from './any-object';
export { type UnarchiveFn, TypeRegistry } from './type-registry';
export { KeyedArchiver } from './keyed-archiver';
export { KeyedUnarchiver } from './keyed-unarchiver';
