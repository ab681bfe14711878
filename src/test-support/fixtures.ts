import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { vi } from 'vitest';
import { Uid, type PlistValue } from '../bplist';
import { type Archivable, type ArchivableType, NSObject } from '../NSKeyedArchiver/archivable';
import type { Decoder, Encoder } from '../NSKeyedArchiver/coder';
import type { IArchivedPList } from '../NSKeyedArchiver/types/archived-plist';
import { type ILogOptions, type ILogger, LogLevel } from '../shared/logger';

export class Person implements Archivable {
  static readonly $classname: string = 'RCDPerson';
  static readonly $superclass: ArchivableType = NSObject;

  constructor(
    readonly age: number,
    readonly firstName: string,
    readonly lastName: string,
  ) { }

  encode(archiver: Encoder) {
    archiver.encodeInt32(this.age, 'Age');
    archiver.encodeString(this.firstName, 'FirstName');
    archiver.encodeString(this.lastName, 'LastName');
  }

  static decode(unarchiver: Decoder) {
    const age = unarchiver.decodeInt32('Age');
    const firstName = unarchiver.decodeString('FirstName');
    const lastName = unarchiver.decodeString('LastName');
    if (firstName === undefined || lastName === undefined) {
      return undefined;
    }
    return new Person(age, firstName, lastName);
  }
}

export class Employee extends Person {
  static readonly $classname: string = 'RCDEmployee';
  static readonly $superclass: ArchivableType = Person;

  static decode(unarchiver: Decoder) {
    const person = Person.decode(unarchiver);
    return person && new Employee(person.age, person.firstName, person.lastName);
  }
}

/** a leader it cannot do without and a deputy it can */
export class Team implements Archivable {
  static readonly $classname = 'RCDTeam';
  static readonly $superclass = NSObject;

  constructor(
    readonly name: string,
    readonly leader: Person,
    readonly deputy?: Person,
  ) { }

  encode(archiver: Encoder) {
    // nested object first, so the name lands after the leader's slots
    archiver.encodeObject(this.leader, 'Leader');
    archiver.encodeString(this.name, 'Name');
    if (this.deputy) {
      archiver.encodeObject(this.deputy, 'Deputy');
    }
  }

  static decode(unarchiver: Decoder) {
    const name = unarchiver.decodeString('Name');
    const leader = unarchiver.decodeObject('Leader')?.downcast(Person);
    if (name === undefined || leader === undefined) {
      return undefined;
    }
    return new Team(name, leader, unarchiver.decodeObject('Deputy')?.downcast(Person));
  }
}

export class MBFile implements Archivable {
  static readonly $classname = 'MBFile';
  static readonly $superclass = NSObject;

  constructor(
    readonly groupId: number,
    readonly inodeNumber: bigint,
    readonly relativePath: string,
  ) { }

  encode(archiver: Encoder) {
    archiver.encodeInt32(this.groupId, 'GroupID');
    archiver.encodeInt64(this.inodeNumber, 'InodeNumber');
    archiver.encodeString(this.relativePath, 'RelativePath');
  }

  static decode(unarchiver: Decoder) {
    const relativePath = unarchiver.decodeString('RelativePath');
    if (relativePath === undefined) {
      return undefined;
    }
    return new MBFile(unarchiver.decodeInt32('GroupID'), unarchiver.decodeInt64('InodeNumber'), relativePath);
  }
}

/**
 * A backup manifest entry laid out the way Apple's archiver writes it,
 * with more fields than {@link MBFile} reads.
 */
export function buildMobileSyncBackupArchive(): IArchivedPList {
  return {
    $archiver: 'NSKeyedArchiver',
    $objects: [
      '$null',
      {
        $class: Uid.of(3),
        Birth: 1500000000n,
        Flags: 0n,
        GroupID: 501n,
        InodeNumber: 228000n,
        LastModified: 1500000000n,
        LastStatusChange: 1500000000n,
        Mode: 16877n,
        ProtectionClass: 0n,
        RelativePath: Uid.of(2),
        Size: 0n,
        UserID: 501n,
      },
      'Library/PersistentStores',
      { $classes: ['MBFile', 'NSObject'], $classname: 'MBFile' },
    ],
    $top: { root: Uid.of(1) },
    $version: 100000n,
  };
}

/**
 * The same entry as CoreFoundation writes it to bytes, with equal values stored once:
 * GroupID and UserID point at one `501`, Flags and Size at one `0`, and `$classname`
 * at the `MBFile` string inside `$classes`.
 */
export function loadMobileSyncBackupBytes() {
  return parseHexFixture(readFileSync(join(__dirname, 'mobilesync-backup.hex'), 'utf8'));
}

/** hex bytes separated by whitespace; `#` starts a comment */
export function parseHexFixture(text: string) {
  const digits = text
    .split('\n')
    .map(line => line.replace(/#.*/, ''))
    .join('')
    .replace(/\s+/g, '');
  return Uint8Array.from(digits.match(/../g) ?? [], byte => parseInt(byte, 16));
}

/** `$objects` with a record for `$top.root` at index 1 */
export function buildArchive(objects: readonly PlistValue[], overrides: Partial<IArchivedPList> = {}): IArchivedPList {
  return {
    $archiver: 'NSKeyedArchiver',
    $objects: ['$null', ...objects],
    $top: { root: Uid.of(1) },
    $version: 100000n,
    ...overrides,
  };
}

export function buildCapturingLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  } satisfies ILogger;

  const options: ILogOptions = { log: { logger, level: LogLevel.debug } };
  return { logger, options };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  }
  catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}
