export * from './constants/epoch';
export * from './constants/magic-number';

export { type ObjectTableEntry, ObjectTableArrayLike, ObjectTableDict } from './models/object-table-entries';
export * from './models/object-table';
export * from './models/offset-table';
export * from './models/trailer';
export * from './models/uid';

export * from './de-struct';
export * from './en-struct';

export * from './errors/parse-error';
export * from './markers';
export * from './value';

export { Reader, parseBuffer } from './reader';
export { Writer, serialize } from './writer';
