/**
 * Tests for the property name → value type registry.
 * Uses Node.js built-in test runner.
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import {
  BinaryValue,
  DateTimeListValue,
  DateValue,
  InlineValue,
  InvalidValueError,
  RecurValue,
  TemporalValue,
  TextValue,
  TypesRegistry,
  date,
  dateTime,
  decodeValue,
  duration,
  encodeValue,
  geo,
  types,
  weekday,
} from '../index.js';

// ── Lookup ─────────────────────────────────────────────────────────────────

describe('Type lookup', () => {
  test('known names, in any case', () => {
    assert.equal(types.valueTypeOf('DTSTART'), 'date-time');
    assert.equal(types.valueTypeOf('dtstart'), 'date-time');
    assert.equal(types.valueTypeOf('RSVP'), 'boolean');
    assert.equal(types.valueTypeOf('Tzoffsetto'), 'utc-offset');
  });

  test('unknown names default to text', () => {
    assert.equal(types.valueTypeOf('X-UNKNOWN'), 'text');
  });

  test('codecFor returns the value type', () => {
    assert.equal(types.codecFor('rrule'), RecurValue);
    assert.equal(types.codecFor('summary'), TextValue);
    assert.equal(types.codecFor('dtstart'), TemporalValue);
  });

  test('custom registries add names without touching the default one', () => {
    const custom = new TypesRegistry({ 'X-ALT-DTSTART': 'date-time' });
    assert.equal(custom.valueTypeOf('x-alt-dtstart'), 'date-time');
    assert.equal(types.valueTypeOf('x-alt-dtstart'), 'text');
  });

  test('custom registries reject unknown value types', () => {
    assert.throws(() => new TypesRegistry({ 'X-FOO': 'bogus' }), InvalidValueError);
  });
});

// ── Decoding ───────────────────────────────────────────────────────────────

describe('Decoding by property', () => {
  test('RRULE', () => {
    const value = types.decode('RRULE', 'BYDAY=MO;FREQ=DAILY');
    assert.ok(value instanceof RecurValue);
    assert.equal(value.toIcal(), 'FREQ=DAILY;BYDAY=MO');
  });

  test('DTSTART with TZID', () => {
    const value = types.decode('DTSTART', '20230101T120000', { TZID: 'America/New_York' });
    assert.deepEqual(value.value, dateTime(2023, 1, 1, 12, 0, 0, 'America/New_York'));
    assert.equal(value.params.get('TZID'), 'America/New_York');
  });

  test('DTSTART with VALUE=DATE', () => {
    const value = types.decode('DTSTART', '20230101', { VALUE: 'DATE' });
    assert.ok(value instanceof DateValue);
    assert.deepEqual(value.value, date(2023, 1, 1));
  });

  test('VALUE=BINARY replaces the default type', () => {
    const value = types.decode('ATTACH', 'aGVsbG8=', { VALUE: 'BINARY', ENCODING: 'BASE64' });
    assert.ok(value instanceof BinaryValue);
    assert.equal(value.text, 'hello');
  });

  test('BINARY keeps bytes that are not text', () => {
    const value = decodeValue('ATTACH', 'iVBORw0KGgo=', { ENCODING: 'BASE64', VALUE: 'BINARY' });
    assert.equal(value.toIcal(), 'iVBORw0KGgo=');
  });

  test('EXDATE with VALUE=DATE stays a list', () => {
    const value = types.decode('EXDATE', '20230101,20230108', { VALUE: 'DATE' });
    assert.ok(value instanceof DateTimeListValue);
    assert.deepEqual(value.value, [date(2023, 1, 1), date(2023, 1, 8)]);
  });

  test('text is unescaped', () => {
    assert.equal(types.decode('SUMMARY', 'Lunch\\, then nap').value, 'Lunch, then nap');
  });

  test('parameters are copied onto the value', () => {
    const value = types.decode('ATTENDEE', 'mailto:a@example.com', { CN: 'A', ROLE: 'CHAIR' });
    assert.equal(value.params.toIcal(), 'CN=A;ROLE=CHAIR');
  });

  test('caller parameters are merged with the type\'s own', () => {
    const value = types.decode('DTSTART', '20230101T120000', { TZID: 'America/New_York', 'X-NOTE': 'a' });
    assert.equal(value.params.toIcal(), 'VALUE=DATE-TIME;TZID=America/New_York;X-NOTE=a');
  });

  test('decoding leaves the caller\'s parameters alone', () => {
    const params = { VALUE: 'DATE' };
    types.decode('DTSTART', '20230101', params);
    assert.deepEqual(params, { VALUE: 'DATE' });
  });

  test('parameter values have types too', () => {
    assert.equal(types.decode('RSVP', 'TRUE').value, true);
  });

  test('decodeValue uses the default registry', () => {
    assert.deepEqual(decodeValue('TZOFFSETFROM', '-0500').value, duration({ hours: -5 }));
  });
});

describe('Lenient decoding', () => {
  test('valid text decodes without warnings', () => {
    const { value, warnings } = types.decodeLenient('PRIORITY', '5');
    assert.equal(value.value, 5);
    assert.deepEqual(warnings, []);
  });

  test('invalid text is kept verbatim and reported', () => {
    const { value, warnings } = types.decodeLenient('dtstart', 'not-a-date', { TZID: 'Europe/Vienna' });
    assert.ok(value instanceof InlineValue);
    assert.equal(value.value, 'not-a-date');
    assert.equal(value.params.get('TZID'), 'Europe/Vienna');
    assert.equal(warnings.length, 1);
    assert.equal(warnings[0]?.property, 'DTSTART');
    assert.equal(warnings[0]?.valueType, 'date-time');
    assert.equal(
      warnings[0]?.message,
      'Invalid date-time, date or time value: "not-a-date" (no temporal type matched)',
    );
  });
});

// ── Encoding ───────────────────────────────────────────────────────────────

describe('Encoding by property', () => {
  test('scalars', () => {
    assert.equal(types.encode('PRIORITY', 5), '5');
    assert.equal(types.encode('RSVP', false), 'FALSE');
    assert.equal(types.encode('GEO', [1.5, -2.25]), '1.5;-2.25');
    assert.equal(types.encode('SUMMARY', 'Tea; biscuits'), 'Tea\\; biscuits');
    assert.equal(types.encode('ORGANIZER', 'boss@example.com'), 'mailto:boss@example.com');
  });

  test('temporal values', () => {
    assert.equal(types.encode('DTSTART', dateTime(2023, 1, 1, 12, 0, 0, 'UTC')), '20230101T120000Z');
    assert.equal(types.encode('DTSTART', date(2023, 1, 1)), '20230101');
    assert.equal(types.encode('TRIGGER', duration({ minutes: -15 })), '-PT15M');
    assert.equal(types.encode('TZOFFSETTO', duration({ hours: 5, minutes: 30 })), '+0530');
  });

  test('composites', () => {
    assert.equal(
      types.encode('FREEBUSY', [dateTime(2023, 1, 1, 9, 0, 0, 'UTC'), duration({ hours: 1 })]),
      '20230101T090000Z/PT1H',
    );
    assert.equal(types.encode('EXDATE', [date(2023, 1, 1), date(2023, 1, 8)]), '20230101,20230108');
    assert.equal(types.encode('RRULE', { FREQ: 'DAILY', COUNT: 3 }), 'FREQ=DAILY;COUNT=3');
  });

  test('rejects values of the wrong type', () => {
    assert.throws(() => types.encode('PRIORITY', 'high'), InvalidValueError);
    assert.throws(
      () => types.encode('DTSTART', 'yesterday'),
      (err: unknown) => err instanceof InvalidValueError && err.reason === 'unsupported native type',
    );
  });

  test('encodeValue uses the default registry', () => {
    assert.equal(encodeValue('GEO', geo(48.2, 16.37)), '48.2;16.37');
  });
});

// ── Round trip ─────────────────────────────────────────────────────────────

describe('decode(encode(v)) equals v', () => {
  const samples: [string, unknown][] = [
    ['ATTACH', 'http://example.com/agenda.pdf'],
    ['ATTENDEE', 'guest@example.com'],
    ['RSVP', true],
    ['PERCENT-COMPLETE', -12],
    ['GEO', geo(-33.8688, 151.2093)],
    ['DESCRIPTION', 'Line one\nLine two, with; punctuation \\ and a backslash'],
    ['DTSTART', dateTime(2024, 2, 29, 23, 59, 59, 'UTC')],
    ['DTSTART', dateTime(2024, 2, 29, 7, 0, 0)],
    ['DUE', date(1999, 12, 31)],
    ['DURATION', duration({ days: 2, hours: 3, seconds: 1 })],
    ['TZOFFSETFROM', duration({ hours: -3, minutes: -30 })],
    ['FREEBUSY', [dateTime(2023, 4, 1, 8, 0, 0, 'UTC'), dateTime(2023, 4, 1, 9, 15, 0, 'UTC')]],
    ['RDATE', [dateTime(2023, 4, 1, 8, 0, 0, 'UTC'), dateTime(2023, 4, 8, 8, 0, 0, 'UTC')]],
    ['RRULE', { FREQ: 'MONTHLY', BYDAY: [weekday('TU', 2)], UNTIL: dateTime(2024, 1, 1, 0, 0, 0, 'UTC') }],
  ];

  for (const [name, native] of samples) {
    test(`${name} ${JSON.stringify(native)}`, () => {
      const expected = types.codecFor(name).fromNative(native);
      const decoded = types.decode(name, types.encode(name, native));
      assert.ok(decoded.equals(expected), `${decoded.toIcal()} != ${expected.toIcal()}`);
    });
  }

  test('a BINARY value survives a round trip with its parameters', () => {
    const encoded = new BinaryValue('payload').toIcal();
    const decoded = types.decode('ATTACH', encoded, { VALUE: 'BINARY', ENCODING: 'BASE64' });
    assert.ok(decoded instanceof BinaryValue);
    assert.equal(decoded.text, 'payload');
    assert.equal(decoded.params.toIcal(), 'ENCODING=BASE64;VALUE=BINARY');
  });
});
