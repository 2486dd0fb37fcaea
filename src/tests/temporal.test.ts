/**
 * Tests for DATE, DATE-TIME, TIME, DURATION and the temporal dispatcher.
 * Uses Node.js built-in test runner.
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import { DateTime } from 'luxon';

import {
  DateTimeValue,
  DateValue,
  DurationValue,
  InvalidValueError,
  TemporalValue,
  TimeValue,
  date,
  dateTime,
  decodeTemporal,
  duration,
  fromDateTime,
  temporal,
  time,
} from '../index.js';

// ── Date ───────────────────────────────────────────────────────────────────

describe('DATE', () => {
  test('decodes YYYYMMDD', () => {
    const value = DateValue.fromIcal('20230115');
    assert.deepEqual(value.value, date(2023, 1, 15));
    assert.equal(value.params.get('VALUE'), 'DATE');
  });

  test('pads small years', () => {
    assert.equal(new DateValue(date(987, 3, 4)).toIcal(), '09870304');
  });

  test('rejects impossible dates', () => {
    assert.throws(() => DateValue.fromIcal('20230230'), InvalidValueError);
    assert.throws(() => DateValue.fromIcal('20231301'), InvalidValueError);
  });

  test('accepts 29 February only in leap years', () => {
    assert.deepEqual(DateValue.fromIcal('20240229').value, date(2024, 2, 29));
    assert.throws(() => DateValue.fromIcal('20230229'), InvalidValueError);
  });

  test('rejects other shapes', () => {
    assert.throws(() => DateValue.fromIcal('2023011'), InvalidValueError);
    assert.throws(() => DateValue.fromIcal('2023-01-15'), InvalidValueError);
    assert.throws(() => DateValue.fromIcal('20230115T000000'), InvalidValueError);
  });
});

// ── Date-Time ──────────────────────────────────────────────────────────────

describe('DATE-TIME', () => {
  test('a trailing Z means UTC', () => {
    const value = DateTimeValue.fromIcal('20230101T120000Z');
    assert.deepEqual(value.value, dateTime(2023, 1, 1, 12, 0, 0, 'UTC'));
    assert.equal(value.params.get('TZID'), undefined);
    assert.equal(value.toIcal(), '20230101T120000Z');
  });

  test('no suffix and no zone means floating', () => {
    const value = DateTimeValue.fromIcal('20230101T120000');
    assert.deepEqual(value.value, dateTime(2023, 1, 1, 12, 0, 0));
    assert.equal('tzid' in value.value, false);
    assert.equal(value.toIcal(), '20230101T120000');
  });

  test('a known zone localizes the value', () => {
    const value = DateTimeValue.fromIcal('20230101T120000', 'America/New_York');
    assert.deepEqual(value.value, dateTime(2023, 1, 1, 12, 0, 0, 'America/New_York'));
    assert.equal(value.params.get('TZID'), 'America/New_York');
    assert.equal(value.toIcal(), '20230101T120000');
  });

  test('a UTC zone is written with Z and no TZID', () => {
    const value = DateTimeValue.fromIcal('20230101T120000', 'utc');
    assert.equal(value.value.tzid, 'UTC');
    assert.equal(value.params.toIcal(), 'VALUE=DATE-TIME');
    assert.equal(value.toIcal(), '20230101T120000Z');
  });

  test('an unknown zone is ignored', () => {
    assert.equal(DateTimeValue.fromIcal('20230101T120000Z', 'Nowhere/Special').value.tzid, 'UTC');
    assert.equal(DateTimeValue.fromIcal('20230101T120000', 'Nowhere/Special').value.tzid, undefined);
  });

  test('a lower-case t separator is accepted', () => {
    assert.equal(DateTimeValue.fromIcal('20230101t080000z').toIcal(), '20230101T080000Z');
  });

  test('rejects numeric offsets', () => {
    assert.throws(
      () => DateTimeValue.fromIcal('20230101T120000+0100'),
      (err: unknown) => err instanceof InvalidValueError && err.reason === 'unsupported zone suffix "+0100"',
    );
  });

  test('rejects impossible times', () => {
    assert.throws(() => DateTimeValue.fromIcal('20230101T250000'), InvalidValueError);
    assert.throws(() => DateTimeValue.fromIcal('20230101T126000Z'), InvalidValueError);
  });

  test('caller parameters are added after the type\'s own', () => {
    const value = DateTimeValue.fromIcal('20230101T120000', 'Europe/Vienna', { 'X-NOTE': 'extra' });
    assert.equal(value.params.toIcal(), 'VALUE=DATE-TIME;TZID=Europe/Vienna;X-NOTE=extra');
  });

  test('rejects unknown zones on native values', () => {
    assert.throws(() => new DateTimeValue(dateTime(2023, 1, 1, 0, 0, 0, 'Mars/Base')), InvalidValueError);
  });

  test('zoned luxon values become TZID parameters', () => {
    const dt = DateTime.fromObject({ year: 2023, month: 6, day: 1, hour: 8 }, { zone: 'Europe/Berlin' });
    const value = new DateTimeValue(fromDateTime(dt));
    assert.equal(value.params.toIcal(), 'VALUE=DATE-TIME;TZID=Europe/Berlin');
    assert.equal(value.toIcal(), '20230601T080000');
  });

  test('equality ignores parameters', () => {
    const a = DateTimeValue.fromIcal('20230101T120000Z');
    const b = new DateTimeValue(dateTime(2023, 1, 1, 12, 0, 0, 'UTC'), { 'X-NOTE': 'extra' });
    assert.ok(a.equals(b));
    assert.ok(!a.equals(DateTimeValue.fromIcal('20230101T120000')));
  });
});

// ── Time ───────────────────────────────────────────────────────────────────

describe('TIME', () => {
  test('decodes floating times', () => {
    const value = TimeValue.fromIcal('083000');
    assert.deepEqual(value.value, time(8, 30, 0));
    assert.equal(value.params.get('VALUE'), 'TIME');
  });

  test('decodes UTC times', () => {
    const value = TimeValue.fromIcal('083000Z');
    assert.deepEqual(value.value, time(8, 30, 0, 'UTC'));
    assert.equal(value.toIcal(), '083000Z');
  });

  test('localizes into a known zone', () => {
    const value = TimeValue.fromIcal('230000', 'Europe/Paris');
    assert.equal(value.params.get('TZID'), 'Europe/Paris');
    assert.equal(value.toIcal(), '230000');
  });

  test('rejects out-of-range fields', () => {
    assert.throws(() => TimeValue.fromIcal('246000'), InvalidValueError);
    assert.throws(() => TimeValue.fromIcal('0830'), InvalidValueError);
  });
});

// ── Duration ───────────────────────────────────────────────────────────────

describe('DURATION', () => {
  test('negative days', () => {
    assert.equal(new DurationValue(duration({ days: -1 })).toIcal(), '-P1D');
    assert.deepEqual(DurationValue.fromIcal('-P1D').value, duration({ days: -1 }));
  });

  test('decodes every component', () => {
    assert.deepEqual(DurationValue.fromIcal('P15DT5H0M20S').value, {
      kind: 'duration',
      sign: 1,
      days: 15,
      hours: 5,
      minutes: 0,
      seconds: 20,
    });
  });

  test('weeks become days', () => {
    assert.equal(DurationValue.fromIcal('P7W').value.days, 49);
    assert.equal(DurationValue.fromIcal('P7W').toIcal(), 'P49D');
  });

  test('time-only durations', () => {
    const value = DurationValue.fromIcal('-PT15M');
    assert.equal(value.value.sign, -1);
    assert.equal(value.value.minutes, 15);
    assert.equal(value.toIcal(), '-PT15M');
  });

  test('keeps the minute segment between hours and seconds', () => {
    assert.equal(new DurationValue(duration({ hours: 1, seconds: 5 })).toIcal(), 'PT1H0M5S');
  });

  test('zero is P0D', () => {
    assert.equal(new DurationValue(duration({})).toIcal(), 'P0D');
  });

  test('days with a time part', () => {
    assert.equal(new DurationValue(duration({ days: 1, hours: 2 })).toIcal(), 'P1DT2H');
  });

  test('normalizes carried units', () => {
    assert.equal(DurationValue.fromIcal('PT36H').toIcal(), 'P1DT12H');
    assert.equal(DurationValue.fromIcal('PT90M').toIcal(), 'PT1H30M');
  });

  test('a leading plus sign is accepted', () => {
    assert.equal(DurationValue.fromIcal('+PT10S').toIcal(), 'PT10S');
  });

  test('rejects malformed durations', () => {
    assert.throws(() => DurationValue.fromIcal('P1W2D'), InvalidValueError);
    assert.throws(() => DurationValue.fromIcal('P1H'), InvalidValueError);
    assert.throws(() => DurationValue.fromIcal('xyz'), InvalidValueError);
  });

  test('decode(encode(v)) returns v', () => {
    const samples = [
      duration({ days: 3 }),
      duration({ hours: -2, minutes: -30 }),
      duration({ days: 15, hours: 5, seconds: 20 }),
      duration({ seconds: 59 }),
    ];
    for (const sample of samples) {
      assert.deepEqual(DurationValue.fromIcal(new DurationValue(sample).toIcal()).value, sample);
    }
  });
});

// ── Dispatcher ─────────────────────────────────────────────────────────────

describe('Temporal dispatcher', () => {
  test('picks the value type from the native kind', () => {
    assert.ok(temporal(date(2023, 1, 1)) instanceof DateValue);
    assert.ok(temporal(dateTime(2023, 1, 1, 0, 0, 0)) instanceof DateTimeValue);
    assert.ok(temporal(time(9, 0, 0)) instanceof TimeValue);
    assert.ok(temporal(duration({ hours: 1 })) instanceof DurationValue);
  });

  test('decodes by shape', () => {
    assert.ok(decodeTemporal('P1D') instanceof DurationValue);
    assert.ok(decodeTemporal('20230101T120000Z') instanceof DateTimeValue);
    assert.ok(decodeTemporal('20230101') instanceof DateValue);
    assert.ok(decodeTemporal('120000') instanceof TimeValue);
  });

  test('duration detection ignores case', () => {
    assert.deepEqual(decodeTemporal('-p1d').value, duration({ days: -1 }));
  });

  test('passes the zone on', () => {
    assert.equal(decodeTemporal('20230101T120000', 'Europe/Paris').params.get('TZID'), 'Europe/Paris');
  });

  test('reports every failed attempt', () => {
    assert.throws(
      () => decodeTemporal('20231301'),
      (err: unknown) =>
        err instanceof InvalidValueError &&
        err.valueType === 'date-time, date or time' &&
        err.cause instanceof AggregateError &&
        err.cause.errors.length === 3,
    );
  });

  test('rejects unsupported native values', () => {
    assert.throws(
      () => TemporalValue.fromNative({ kind: 'week', weeks: 2 }),
      (err: unknown) => err instanceof InvalidValueError && err.reason === 'unsupported native type',
    );
    assert.throws(() => TemporalValue.fromNative('20230101'), InvalidValueError);
  });
});
