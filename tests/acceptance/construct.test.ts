import { describe, it, expect, vi } from 'vitest';
import {
  defineRecord,
  RecordType,
  chain,
  bound,
  ok,
  fail,
  isNotBlank,
  isString,
  toInteger,
  toIntegerOrNull,
  toString,
  maxLength,
  ShapeError,
  KeyError,
  ConstructionException,
  ConversionStepError,
  SchemaDefinitionError,
} from '../../src/index.js';

interface Person {
  name: string;
  age: number;
}

interface Team {
  name: string;
  lead: Person;
}

interface Settings {
  theme: string;
  size: number | null;
}

function definePerson(): RecordType<Person> {
  return defineRecord<Person>({
    schema: {
      name: 'Person',
      fields: [
        { name: 'name', required: true, step: isNotBlank },
        { name: 'age', defaultValue: 0, step: toInteger },
      ],
    },
  });
}

function defineSettings(options?: { nilToEmpty?: boolean }): RecordType<Settings> {
  return defineRecord<Settings>({
    schema: {
      name: 'Settings',
      fields: [
        { name: 'theme', defaultValue: 'light', step: toString },
        { name: 'size', step: toIntegerOrNull },
      ],
      options,
    },
  });
}

describe('construct', () => {
  describe('single mapping', () => {
    it('should convert every field', () => {
      const Person = definePerson();

      expect(Person.construct({ name: 'Alice', age: '30' })).toEqual({
        ok: true,
        value: { name: 'Alice', age: 30 },
      });
    });

    it('should report every failing field at once', () => {
      const Person = definePerson();

      expect(Person.construct({ name: '', age: 'x' })).toEqual({
        ok: false,
        error: { name: 'must not be blank', age: 'must be an integer' },
      });
    });

    it('should apply defaults to absent fields', () => {
      const Person = definePerson();

      expect(Person.constructOrThrow({ name: 'Alice' })).toEqual({ name: 'Alice', age: 0 });
    });

    it('should keep an explicit null instead of the default', () => {
      const Settings = defineSettings();

      expect(Settings.constructOrThrow({ theme: null })).toEqual({ theme: '', size: null });
    });

    it('should drop keys that match no field', () => {
      const Person = definePerson();
      const record = Person.constructOrThrow({ name: 'Alice', nickname: 'Al' });

      expect(Object.keys(record ?? {})).toEqual(['name', 'age']);
    });

    it('should resolve keys case-insensitively and through aliases', () => {
      const Contact = defineRecord({
        schema: {
          name: 'Contact',
          fields: [
            { name: 'name', step: isString },
            { name: 'email', aliases: ['emailAddress', 'mail'], step: isString },
          ],
        },
      });

      expect(Contact.construct({ NAME: 'Alice', EmailAddress: 'alice@example.test' })).toEqual({
        ok: true,
        value: { name: 'Alice', email: 'alice@example.test' },
      });
    });

    it('should let the first key win when several resolve to the same field', () => {
      const Contact = defineRecord({
        schema: {
          name: 'Contact',
          fields: [{ name: 'email', aliases: ['mail'], step: isString }],
        },
      });

      expect(Contact.constructOrThrow({ mail: 'first@example.test', email: 'second@example.test' })).toEqual({
        email: 'first@example.test',
      });
    });

    it('should accept ordered pairs and maps', () => {
      const Person = definePerson();

      expect(
        Person.constructOrThrow([
          ['name', 'Ada'],
          ['age', '36'],
        ]),
      ).toEqual({ name: 'Ada', age: 36 });
      expect(Person.constructOrThrow(new Map([['name', 'Ada']]))).toEqual({ name: 'Ada', age: 0 });
    });

    it('should treat an empty Map like an empty mapping', () => {
      const Settings = defineSettings();

      expect(Settings.construct(new Map())).toEqual(Settings.construct({}));
      expect(Settings.construct(new Map())).toEqual({ ok: true, value: { theme: 'light', size: null } });
    });

    it('should construct a nested record from an empty Map', () => {
      const Settings = defineSettings();
      const Profile = defineRecord({
        schema: { name: 'Profile', fields: [{ name: 'settings', step: Settings.asStep() }] },
      });

      expect(Profile.construct({ settings: new Map() })).toEqual({
        ok: true,
        value: { settings: { theme: 'light', size: null } },
      });
    });

    it('should stop a chain at its first failure', () => {
      const second = vi.fn((value: unknown) => ok(value));
      const Tag = defineRecord({
        schema: {
          name: 'Tag',
          fields: [{ name: 'label', step: chain(isString, second) }],
        },
      });

      expect(Tag.construct({ label: 12 })).toEqual({ ok: false, error: { label: 'must be a string' } });
      expect(second).not.toHaveBeenCalled();
    });

    it('should run bound steps with their arguments', () => {
      const Tag = defineRecord({
        schema: {
          name: 'Tag',
          fields: [{ name: 'label', step: [isString, bound(maxLength, 3)] }],
        },
      });

      expect(Tag.construct({ label: 'urgent' })).toEqual({
        ok: false,
        error: { label: 'must be at most 3 characters' },
      });
    });
  });

  describe('nested record types', () => {
    function defineTeam(): RecordType<Team> {
      const Person = definePerson();
      return defineRecord<Team>({
        schema: {
          name: 'Team',
          fields: [
            { name: 'name', step: toString },
            { name: 'lead', step: Person.asStep() },
          ],
        },
      });
    }

    it('should keep the nested report under the field name', () => {
      const Team = defineTeam();

      expect(Team.construct({ lead: { name: '', age: 1 } })).toEqual({
        ok: false,
        error: { lead: { name: 'must not be blank' } },
      });
    });

    it('should build nested records', () => {
      const Team = defineTeam();

      expect(Team.constructOrThrow({ name: 'core', lead: { name: 'Alice', age: '41' } })).toEqual({
        name: 'core',
        lead: { name: 'Alice', age: 41 },
      });
    });

    it('should report a nested shape failure by its message', () => {
      const Team = defineTeam();

      expect(Team.construct({ name: 'core', lead: 42 })).toEqual({
        ok: false,
        error: { lead: 'Cannot construct Person from number' },
      });
    });
  });

  describe('null input', () => {
    it('should build a record from defaults by default', () => {
      const Settings = defineSettings();

      expect(Settings.construct(null)).toEqual({ ok: true, value: { theme: 'light', size: null } });
      expect(Settings.construct(undefined)).toEqual({ ok: true, value: { theme: 'light', size: null } });
    });

    it('should return null when nilToEmpty is off', () => {
      const Settings = defineSettings();

      expect(Settings.construct(null, { nilToEmpty: false })).toEqual({ ok: true, value: null });
    });

    it('should prefer call options over schema options', () => {
      const Settings = defineSettings({ nilToEmpty: false });

      expect(Settings.construct(null)).toEqual({ ok: true, value: null });
      expect(Settings.construct(null, { nilToEmpty: true })).toEqual({
        ok: true,
        value: { theme: 'light', size: null },
      });
    });
  });

  describe('lists', () => {
    it('should return an empty list for an empty list', () => {
      const Person = definePerson();

      expect(Person.construct([])).toEqual({ ok: true, value: [] });
    });

    it('should build one record per element', () => {
      const Person = definePerson();

      expect(Person.construct([{ name: 'Alice' }, { name: 'Bob', age: '2' }])).toEqual({
        ok: true,
        value: [
          { name: 'Alice', age: 0 },
          { name: 'Bob', age: 2 },
        ],
      });
    });

    it('should report every failing element by index', () => {
      const Person = definePerson();

      expect(Person.construct([{ name: 'Alice' }, { name: '' }, 7])).toEqual({
        ok: false,
        error: {
          1: { name: 'must not be blank' },
          2: 'Cannot construct Person from number',
        },
      });
    });

    it('should evaluate every element even after a failure', () => {
      const step = vi.fn((value: unknown) => (value === 'bad' ? fail('is bad') : ok(value)));
      const Item = defineRecord({ schema: { name: 'Item', fields: [{ name: 'sku', step }] } });

      const result = Item.construct([{ sku: 'bad' }, { sku: 'a' }, { sku: 'b' }]);

      expect(result).toEqual({ ok: false, error: { 0: { sku: 'is bad' } } });
      expect(step).toHaveBeenCalledTimes(3);
    });
  });

  describe('existing records', () => {
    it('should rebuild a constructed record with identical values', () => {
      const Person = definePerson();
      const record = Person.constructOrThrow({ name: 'Alice', age: '30' });

      const again = Person.construct(record);

      expect(again).toEqual({ ok: true, value: { name: 'Alice', age: 30 } });
    });

    it('should recognize its own records', () => {
      const Person = definePerson();
      const record = Person.constructOrThrow({ name: 'Alice' });

      expect(Person.is(record)).toBe(true);
      expect(Person.is({ name: 'Alice', age: 0 })).toBe(false);
      expect(definePerson().is(record)).toBe(false);
    });
  });

  describe('unrecognized input', () => {
    it.each([
      ['Alice', 'Cannot construct Person from string'],
      [42, 'Cannot construct Person from number'],
      [new Date(0), 'Cannot construct Person from an instance of Date'],
    ])('should fail with a ShapeError for %j', (input, message) => {
      const Person = definePerson();
      const result = Person.construct(input);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ShapeError);
      expect(result.error).toHaveProperty('message', message);
    });
  });

  describe('checkKeys', () => {
    function defineAccount(): RecordType {
      return defineRecord({
        schema: {
          name: 'Account',
          fields: [
            { name: 'id', required: true, step: isString },
            { name: 'name', step: toString },
          ],
          options: { checkKeys: true },
        },
      });
    }

    it('should throw instead of reporting a missing required field', () => {
      const Account = defineAccount();

      expect(() => Account.construct({ name: 'x' })).toThrow(KeyError);
      expect(() => Account.construct({ name: 'x' })).toThrow("Required key 'id' is missing for Account");
    });

    it('should throw on unknown keys', () => {
      const Account = defineAccount();

      try {
        Account.construct({ id: 'a1', plan: 'free' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(KeyError);
        expect(error).toMatchObject({ code: 'UNKNOWN_KEY', key: 'plan', recordType: 'Account' });
      }
    });

    it('should count a default as present', () => {
      const Account = defineRecord({
        schema: {
          name: 'Account',
          fields: [{ name: 'id', required: true, defaultValue: 'guest', step: isString }],
        },
      });

      expect(Account.construct({}, { checkKeys: true })).toEqual({ ok: true, value: { id: 'guest' } });
    });

    it('should report a missing required field as a field error when off', () => {
      const Account = defineAccount();

      expect(Account.construct({ name: 'x' }, { checkKeys: false })).toEqual({
        ok: false,
        error: { id: 'must be a string' },
      });
    });
  });

  describe('constructOrThrow', () => {
    it('should throw a ConstructionException carrying the report', () => {
      const Person = definePerson();

      try {
        Person.constructOrThrow({ name: ' ' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConstructionException);
        expect(error).toMatchObject({ code: 'CONSTRUCTION_FAILED', report: { name: 'must not be blank' } });
        expect(error).toHaveProperty('message', 'Failed to construct Person: {"name":"must not be blank"}');
      }
    });

    it('should carry a ShapeError as the cause', () => {
      const Person = definePerson();

      try {
        Person.constructOrThrow(true);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConstructionException);
        expect(error).toHaveProperty('report', null);
        expect(error).toHaveProperty('message', 'Cannot construct Person from boolean');
        expect(error).toHaveProperty('cause', expect.any(ShapeError));
      }
    });
  });

  describe('defects', () => {
    it('should surface a throwing step as ConversionStepError', () => {
      const Item = defineRecord({
        schema: {
          name: 'Item',
          fields: [
            {
              name: 'sku',
              step: () => {
                throw new Error('boom');
              },
            },
          ],
        },
      });

      expect(() => Item.construct({ sku: 'a' })).toThrow(ConversionStepError);
      expect(() => Item.construct({ sku: 'a' })).toThrow('Conversion step for Item.sku threw: boom');
    });

    it('should reject inconsistent schemas at registration', () => {
      expect(() =>
        defineRecord({
          schema: {
            name: 'Contact',
            fields: [
              { name: 'email', aliases: ['mail'] },
              { name: 'mail' },
            ],
          },
        }),
      ).toThrow(SchemaDefinitionError);
    });
  });
});
