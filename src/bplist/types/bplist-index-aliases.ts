/** index of an object, as stored in containers and the trailer's `topObject` */
export type ObjRef = number & {};

/** byte offset of an object from the start of the file */
export type ObjectTableOffset = number & {};
