import { describe, expect, it, vi } from 'vitest';
import { ParseError } from './errors/parse-error';
import { Reader, parseBuffer } from './reader';
import { asArray, asData, asDictionary } from './value';
import { serialize } from './writer';
import { Uid } from './models/uid';
import { LogLevel, buildLeveledLogger } from '../shared/logger';
import { buildCapturingLogger, catchError, loadMobileSyncBackupBytes, parseHexFixture } from '../test-support/fixtures';

describe('parseBuffer', () => {
  it('reads back every kind of value the writer writes', () => {
    const data = new Uint8Array([0xDE, 0xAD, 0xBE, 0xEF]).buffer;
    const bytes = serialize({
      name: 'Ada',
      small: 42n,
      negative: -1n,
      unsigned: 2n ** 64n - 1n,
      ratio: 1.5,
      when: new Date(Date.UTC(2001, 0, 2)),
      data,
      enabled: false,
      nothing: null,
      list: [1n, 'é'],
      ref: Uid.of(300),
    });

    const dict = asDictionary(parseBuffer(bytes));

    expect(dict).toMatchObject({
      name: 'Ada',
      small: 42n,
      negative: -1n,
      unsigned: 2n ** 64n - 1n,
      ratio: 1.5,
      when: new Date(Date.UTC(2001, 0, 2)),
      enabled: false,
      nothing: null,
      list: [1n, 'é'],
    });
    expect(dict?.ref).toBeInstanceOf(Uid);
    expect(dict?.ref).toEqual(Uid.of(300));
    expect([...new Uint8Array(asData(dict?.data) ?? new ArrayBuffer(0))]).toEqual([0xDE, 0xAD, 0xBE, 0xEF]);
  });

  it('reads documents that need two byte refs and offsets', () => {
    const list = Array.from({ length: 300 }, (_, i) => BigInt(i));
    const bytes = serialize(list);

    const trailer = bytes.subarray(bytes.length - 32);
    expect(trailer[6]).toBe(2);
    expect(trailer[7]).toBe(2);

    const parsed = asArray(parseBuffer(bytes));
    expect(parsed).toHaveLength(300);
    expect(parsed?.[299]).toBe(299n);
  });

  it('accepts a Uint8Array that is a window onto a larger buffer', () => {
    const doc = serialize('windowed');
    const padded = new Uint8Array(doc.length + 4);
    padded.set(doc, 4);

    expect(parseBuffer(padded.subarray(4))).toBe('windowed');
  });

  it('builds an object once for every ref that points at it', () => {
    // ["x", "x"] with both refs on object 1
    const bytes = parseHexFixture(`
      62 70 6C 69 73 74 30 30
      A2 01 01
      51 78
      08 0B
      00 00 00 00 00 00 01 01
      00 00 00 00 00 00 00 02
      00 00 00 00 00 00 00 00
      00 00 00 00 00 00 00 0D
    `);

    const parsed = asArray(parseBuffer(bytes));

    expect(parsed).toEqual(['x', 'x']);
  });

  it('reads an object once when two offsets point at it', () => {
    // [<ref 1>, <ref 2>] where refs 1 and 2 share the offset of "x"
    const bytes = parseHexFixture(`
      62 70 6C 69 73 74 30 30
      A2 01 02
      51 78
      08 0B 0B
      00 00 00 00 00 00 01 01
      00 00 00 00 00 00 00 03
      00 00 00 00 00 00 00 00
      00 00 00 00 00 00 00 0D
    `);

    expect(parseBuffer(bytes)).toEqual(['x', 'x']);
  });

  it('resolves shared values in a CoreFoundation-style archive', () => {
    const envelope = asDictionary(parseBuffer(loadMobileSyncBackupBytes()));
    const [, record, path, classInfo] = asArray(envelope?.$objects) ?? [];

    expect(record).toMatchObject({ GroupID: 501n, UserID: 501n, Flags: 0n, Size: 0n, InodeNumber: 228000n });
    expect(path).toBe('Library/PersistentStores');
    expect(classInfo).toEqual({ $classes: ['MBFile', 'NSObject'], $classname: 'MBFile' });
  });

  it('rejects a bad magic number', () => {
    const bytes = serialize(true);
    bytes[0] = 0x63;

    const error = catchError(() => parseBuffer(bytes));
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toHaveProperty('offset', 0);
  });

  it('rejects a buffer too short for the trailer', () => {
    const headerOnly = serialize(true).subarray(0, 8);

    expect(() => parseBuffer(headerOnly)).toThrow(ParseError);
  });

  it('rejects an empty buffer', () => {
    expect(() => parseBuffer(new ArrayBuffer(0))).toThrow(ParseError);
  });

  it('rejects a top object outside the object count', () => {
    const bytes = serialize(true);
    // low byte of topObject
    bytes[bytes.length - 9] = 1;

    expect(() => parseBuffer(bytes)).toThrow(/topObject 1 is not below numObjects 1/);
  });

  it('rejects an unknown marker', () => {
    const bytes = serialize(true);
    bytes[8] = 0x70;

    expect(() => parseBuffer(bytes)).toThrow(/has non-zero upper-nibble but is unknown/);
  });

  it('rejects a container that refers to itself', () => {
    // [ <ref 0> ]
    const bytes = serialize([null]);
    bytes[9] = 0x00;

    expect(() => parseBuffer(bytes)).toThrow(/Ref 0 contains itself/);
  });

  it('rejects a string that runs into the offset table', () => {
    const bytes = serialize('abc');
    bytes[8] = 0x55;

    expect(() => parseBuffer(bytes)).toThrow(ParseError);
  });

  it('reads sets as arrays and says so', () => {
    const bytes = serialize([1n, 2n]);
    bytes[8] = 0xC2;
    const { logger } = buildCapturingLogger();

    const parsed = new Reader(new Uint8Array(bytes).buffer, buildLeveledLogger({ logger, level: LogLevel.warn })).buildTopLevelObject();

    expect(parsed).toEqual([1n, 2n]);
    expect(logger.warn).toHaveBeenCalledWith('WARN: reading %s at ref %d as an array', 'set', 0);
  });

  it('logs parse details only at debug level', () => {
    const { logger } = buildCapturingLogger();
    const bytes = serialize(true);

    new Reader(new Uint8Array(bytes).buffer, buildLeveledLogger({ logger, level: LogLevel.info })).buildTopLevelObject();
    expect(logger.debug).not.toHaveBeenCalled();

    new Reader(new Uint8Array(bytes).buffer, buildLeveledLogger({ logger, level: LogLevel.debug })).buildTopLevelObject();
    expect(logger.debug).toHaveBeenCalled();
  });

  it('warns on an unexpected version and carries on', () => {
    const bytes = serialize(true);
    bytes[7] = 0x31;
    const warn = vi.fn();
    const { logger } = buildCapturingLogger();

    const reader = new Reader(new Uint8Array(bytes).buffer, buildLeveledLogger({ logger: { ...logger, warn }, level: LogLevel.warn }));

    expect(reader.version).toBe('01');
    expect(reader.buildTopLevelObject()).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
