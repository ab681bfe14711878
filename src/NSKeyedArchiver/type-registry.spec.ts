import { describe, expect, it } from 'vitest';
import { Employee, Person } from '../test-support/fixtures';
import { type Archivable, NSObject } from './archivable';
import type { Decoder } from './coder';
import { KeyedArchiver } from './keyed-archiver';
import { KeyedUnarchiver } from './keyed-unarchiver';
import { TypeRegistry } from './type-registry';

/** claims the same class name as {@link Person} */
class Impostor implements Archivable {
  static readonly $classname = 'RCDPerson';
  static readonly $superclass = NSObject;

  encode() { }

  static decode(_unarchiver: Decoder) {
    return new Impostor();
  }
}

describe('TypeRegistry', () => {
  it('registers a type together with its ancestors', () => {
    const registry = new TypeRegistry().registerType(Employee);

    expect(registry.classNames()).toEqual(['NSObject', 'RCDPerson', 'RCDEmployee']);
    expect(registry.size).toBe(3);
    expect(registry.has('RCDPerson')).toBe(true);
  });

  it('registers shared ancestors once', () => {
    const registry = new TypeRegistry().registerType(Person).registerType(Employee);

    expect(registry.size).toBe(3);
  });

  it('keeps the first type registered under a name', () => {
    const registry = new TypeRegistry().registerType(Person).registerType(Impostor);
    const data = KeyedArchiver.archivedData(new Person(26, 'Cyan', 'Yang'));

    const object = KeyedUnarchiver.unarchiveObjectFromData(data, registry);

    expect(object.is(Person)).toBe(true);
    expect(object.downcast(Impostor)).toBeUndefined();
  });

  it('has nothing for an unregistered name', () => {
    const registry = new TypeRegistry();

    expect(registry.getUnarchiveFn('Foo')).toBeUndefined();
    expect(registry.has('Foo')).toBe(false);
  });
});
