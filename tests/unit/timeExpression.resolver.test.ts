jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { TimeExpressionResolver, correctYear, isCanonicalDate, isCanonicalTime } from '../../src/services/datetime/timeExpression.resolver';
import { UnresolvedError, ValidationError } from '../../src/utils/errors';
import { DateTime } from 'luxon';

const MONDAY_UTC = new Date('2024-01-15T10:00:00Z');
const BOGOTA = 'America/Bogota';

describe('TimeExpressionResolver', () => {
  const resolver = new TimeExpressionResolver();

  function resolveOk(text: string, reference: Date, zone: string) {
    const result = resolver.resolve(text, reference, zone);
    if (!result.success) {
      throw new Error(`expected "${text}" to resolve, got: ${result.error.message}`);
    }
    return result.data;
  }

  it('resolves "tomorrow at 3pm" by the relative-day rule', () => {
    const moment = resolveOk('tomorrow at 3pm', MONDAY_UTC, 'UTC');

    expect(moment.date).toBe('2024-01-16');
    expect(moment.time).toBe('15:00');
    expect(moment.isoDatetime).toBe('2024-01-16T15:00:00Z');
    expect(moment.resolutionMethod).toBe('manual_rule');
    expect(moment.timeZoneName).toBe('UTC');
    expect(moment.originalInput).toBe('tomorrow at 3pm');
  });

  it('keeps the instant of ISO input with a UTC designator', () => {
    const moment = resolveOk('2024-01-20T15:00:00Z', MONDAY_UTC, BOGOTA);

    expect(moment.isoDatetime).toBe('2024-01-20T10:00:00-05:00');
    expect(moment.date).toBe('2024-01-20');
    expect(moment.time).toBe('10:00');
  });

  it('keeps the instant of ISO input with a numeric offset', () => {
    const moment = resolveOk('2024-01-20T15:00:00-05:00', MONDAY_UTC, 'UTC');

    expect(moment.isoDatetime).toBe('2024-01-20T20:00:00Z');
    expect(moment.time).toBe('20:00');
  });

  it('reads naive ISO input on the client wall clock', () => {
    const moment = resolveOk('2024-01-20 15:00', MONDAY_UTC, BOGOTA);

    expect(moment.isoDatetime).toBe('2024-01-20T15:00:00-05:00');
    expect(moment.time).toBe('15:00');
  });

  it('resolves "próximo viernes a las 8pm" from a Monday in Bogota', () => {
    const moment = resolveOk('próximo viernes a las 8pm', new Date('2024-01-15T17:00:00Z'), BOGOTA);

    expect(moment.date).toBe('2024-01-19');
    expect(moment.time).toBe('20:00');
    expect(moment.isoDatetime).toBe('2024-01-19T20:00:00-05:00');
    expect(moment.resolutionMethod).toBe('manual_rule');
  });

  it('pushes "next <weekday>" a full week when the reference is that weekday', () => {
    const friday = new Date('2024-01-19T15:00:00Z');

    expect(resolveOk('next friday at 8pm', friday, 'UTC').date).toBe('2024-01-26');
    expect(resolveOk('próximo lunes', MONDAY_UTC, 'UTC').date).toBe('2024-01-22');
  });

  it('checks "pasado mañana" before "mañana"', () => {
    const moment = resolveOk('pasado mañana a las 10am', MONDAY_UTC, 'UTC');

    expect(moment.date).toBe('2024-01-17');
    expect(moment.time).toBe('10:00');
  });

  it('reads "hoy" as the reference day', () => {
    const moment = resolveOk('hoy a las 6pm', MONDAY_UTC, 'UTC');

    expect(moment.date).toBe('2024-01-15');
    expect(moment.time).toBe('18:00');
  });

  it('does not read "por la mañana" as tomorrow', () => {
    const moment = resolveOk('mañana por la mañana a las 9am', MONDAY_UTC, 'UTC');

    expect(moment.date).toBe('2024-01-16');
    expect(moment.time).toBe('09:00');
  });

  it('anchors relative days on the client zone, not UTC', () => {
    // 22:00 on Jan 15 in Bogota, already Jan 16 in UTC
    const lateEvening = new Date('2024-01-16T03:00:00Z');

    expect(resolveOk('tomorrow', lateEvening, BOGOTA).date).toBe('2024-01-16');
    expect(resolveOk('tomorrow', lateEvening, 'UTC').date).toBe('2024-01-17');
  });

  it('defaults to midnight when no time is given', () => {
    const moment = resolveOk('mañana', MONDAY_UTC, 'UTC');

    expect(moment.time).toBe('00:00');
    expect(moment.isoDatetime).toBe('2024-01-16T00:00:00Z');
  });

  it('translates Spanish day-month phrases for the fallback parser', () => {
    const moment = resolveOk('el 15 de enero a las 2 pm', new Date('2024-01-01T12:00:00Z'), 'UTC');

    expect(moment.date).toBe('2024-01-15');
    expect(moment.time).toBe('14:00');
    expect(moment.resolutionMethod).toBe('phrase_translation');
  });

  it('moves a day-month already past this year into next year', () => {
    const moment = resolveOk('5 de enero', new Date('2024-06-01T12:00:00Z'), 'UTC');

    expect(moment.date).toBe('2025-01-05');
    expect(moment.time).toBe('00:00');
  });

  it('leaves a bare weekday to the parser', () => {
    const moment = resolveOk('viernes', MONDAY_UTC, 'UTC');

    expect(moment.resolutionMethod).not.toBe('manual_rule');
    expect(moment.date).toBe('2024-01-19');
  });

  it('returns suggestions when nothing matches', () => {
    const result = resolver.resolve('blorp', MONDAY_UTC, 'UTC');

    expect(result.success).toBe(false);
    if (result.success) return;

    expect(result.error).toBeInstanceOf(UnresolvedError);
    expect(result.error.originalInput).toBe('blorp');
    expect(result.error.referenceDateContext).toBe('2024-01-15 (Monday) UTC');
    expect(result.error.suggestions).toEqual([
      'tomorrow at 2pm',
      'next friday at 8pm',
      '2024-01-16 15:00',
      'in 2 days at 3pm',
      'mañana a las 3pm',
    ]);
    expect(result.error.message).toBe(
      'Sorry, I couldn\'t understand the date or time "blorp", could you try something like "tomorrow at 2pm"?'
    );
  });

  it('treats blank input as unresolved', () => {
    const result = resolver.resolve('   ', MONDAY_UTC, 'UTC');
    expect(result.success).toBe(false);
  });

  it('throws on an unknown time zone', () => {
    expect(() => resolver.resolve('tomorrow', MONDAY_UTC, 'Mars/Olympus_Mons')).toThrow(ValidationError);
  });
});

describe('correctYear', () => {
  const reference = DateTime.fromISO('2024-06-01T12:00:00', { zone: 'UTC' });

  it('lifts a past year to the reference year', () => {
    expect(correctYear({ year: 2023, month: 8, day: 10 }, reference)).toEqual({ year: 2024, month: 8, day: 10 });
  });

  it('rolls an earlier date of the reference year forward', () => {
    expect(correctYear({ year: 2024, month: 3, day: 1 }, reference)).toEqual({ year: 2025, month: 3, day: 1 });
  });

  it('keeps the reference day and later dates', () => {
    expect(correctYear({ year: 2024, month: 6, day: 1 }, reference)).toEqual({ year: 2024, month: 6, day: 1 });
    expect(correctYear({ year: 2026, month: 1, day: 2 }, reference)).toEqual({ year: 2026, month: 1, day: 2 });
  });
});

describe('canonical formats', () => {
  it('accepts only real YYYY-MM-DD dates', () => {
    expect(isCanonicalDate('2024-02-29')).toBe(true);
    expect(isCanonicalDate('2023-02-29')).toBe(false);
    expect(isCanonicalDate('tomorrow')).toBe(false);
  });

  it('accepts only 24h HH:MM times', () => {
    expect(isCanonicalTime('09:30')).toBe(true);
    expect(isCanonicalTime('23:59')).toBe(true);
    expect(isCanonicalTime('24:00')).toBe(false);
    expect(isCanonicalTime('9:30')).toBe(false);
  });
});
