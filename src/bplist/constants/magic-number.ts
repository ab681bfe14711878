export const bplistMagicNumber = 'bplist';
export const bplistVersion = '00';
export const versionByteLength = 2;
export const headerByteLength = bplistMagicNumber.length + versionByteLength;
