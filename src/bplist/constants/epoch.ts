/** 2001-01-01T00:00:00Z, the reference date plist dates count seconds from */
export const cfAbsoluteTimeEpochMilliseconds = Date.UTC(2001, 0, 1);
