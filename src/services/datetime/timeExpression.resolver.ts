import * as chrono from 'chrono-node';
import { DateTime, IANAZone } from 'luxon';
import { ExtractedTime, ResolutionMethod, ResolvedMoment } from '../../types/datetime';
import { Result, fail, ok } from '../../types/result';
import { UnresolvedError, ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { DEFAULT_TIME, extractTime, formatClock } from './time.rules';
import {
  DATETIME_RULES,
  DateTimeRules,
  daysUntilNextWeekday,
  findNextWeekday,
  findRelativeDayOffset,
  normalizeInput,
  stripPartOfDayIdioms,
  translatePhrases,
} from './phrase.rules';

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

interface ParserCandidate {
  text: string;
  method: ResolutionMethod;
  parsers: chrono.Chrono[];
}

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const CLOCK_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;
const ISO_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

export function isCanonicalDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && DateTime.fromISO(value).isValid;
}

export function isCanonicalTime(value: string): boolean {
  return CLOCK_PATTERN.test(value);
}

export function assertTimeZone(timeZoneName: string): void {
  if (!IANAZone.isValidZone(timeZoneName)) {
    throw new ValidationError(`Unknown time zone: ${timeZoneName}`);
  }
}

/**
 * Turns bilingual (English/Spanish) date/time text into a zoned moment.
 *
 * Strategies run in a fixed order and the first success wins:
 *   1. explicit ISO 8601 text; a written offset fixes the instant, otherwise
 *      the wall clock is read in the client zone;
 *   2. relative-day and "next <weekday>" rules, combined with an explicit clock time;
 *   3. Spanish phrase translation followed by chrono;
 *   4. chrono on the raw text.
 * Parser output is year-corrected against the reference date.
 */
export class TimeExpressionResolver {
  constructor(private readonly rules: DateTimeRules = DATETIME_RULES) {}

  resolve(text: string, referenceInstant: Date, timeZoneName: string): Result<ResolvedMoment, UnresolvedError> {
    assertTimeZone(timeZoneName);

    const reference = DateTime.fromJSDate(referenceInstant, { zone: timeZoneName });
    const normalized = normalizeInput(text);

    if (!normalized) {
      return fail(this.unresolved(text, reference));
    }

    const explicit = this.parseIso(text.trim(), timeZoneName);
    if (explicit) {
      logger.debug('Date resolved from ISO input', { input: text });
      return ok(this.toResolvedMoment(explicit, 'statistical_parser', text, timeZoneName));
    }

    const explicitTime = extractTime(normalized);
    const targetTime = explicitTime ?? DEFAULT_TIME;

    const manualDate = this.applyManualRules(normalized, reference);
    if (manualDate) {
      const moment = this.localize(manualDate, targetTime, timeZoneName);
      if (moment) {
        logger.debug('Date resolved by manual rule', { input: text, date: manualDate });
        return ok(this.toResolvedMoment(moment, 'manual_rule', text, timeZoneName));
      }
    }

    const translated = translatePhrases(normalized, this.rules);
    const candidates: ParserCandidate[] = [];
    if (translated !== normalized) {
      candidates.push({ text: translated, method: 'phrase_translation', parsers: [chrono.en.GB] });
    }
    candidates.push({ text: normalized, method: 'statistical_parser', parsers: [chrono.en.GB, chrono.es.casual] });

    for (const candidate of candidates) {
      for (const parser of candidate.parsers) {
        const resolved = this.parseWith(parser, candidate, reference, explicitTime, text, timeZoneName);
        if (resolved) {
          logger.debug('Date resolved by parser', { input: text, method: resolved.resolutionMethod, parsed: candidate.text });
          return ok(resolved);
        }
      }
    }

    logger.info('Date expression unresolved', { input: text, timeZoneName });
    return fail(this.unresolved(text, reference));
  }

  private parseIso(text: string, timeZoneName: string): DateTime | null {
    if (!ISO_DATETIME_PATTERN.test(text)) return null;

    // An offset in the text wins; `zone` only applies to naive input.
    const moment = DateTime.fromISO(text.toUpperCase().replace(' ', 'T'), { zone: timeZoneName });
    return moment.isValid ? moment.set({ second: 0, millisecond: 0 }) : null;
  }

  private applyManualRules(text: string, reference: DateTime): CalendarDate | null {
    const withoutIdioms = stripPartOfDayIdioms(text, this.rules);

    const offset = findRelativeDayOffset(withoutIdioms, this.rules);
    if (offset !== null) {
      return toCalendarDate(reference.plus({ days: offset }));
    }

    const weekday = findNextWeekday(withoutIdioms, this.rules);
    if (weekday !== null) {
      const referenceWeekday = reference.weekday - 1; // luxon: Monday = 1
      return toCalendarDate(reference.plus({ days: daysUntilNextWeekday(referenceWeekday, weekday) }));
    }

    return null;
  }

  private parseWith(
    parser: chrono.Chrono,
    candidate: ParserCandidate,
    reference: DateTime,
    explicitTime: ExtractedTime | null,
    originalInput: string,
    timeZoneName: string
  ): ResolvedMoment | null {
    // chrono reads the reference in system-local wall-clock terms; hand it the
    // target zone's wall clock so relative phrases anchor on the client's day.
    const wallClock = new Date(reference.year, reference.month - 1, reference.day, reference.hour, reference.minute);
    const [result] = parser.parse(candidate.text, wallClock, { forwardDate: true });
    if (!result) return null;

    if (result.start.isCertain('timezoneOffset')) {
      const instant = DateTime.fromJSDate(result.start.date(), { zone: timeZoneName }).set({ second: 0, millisecond: 0 });
      if (!instant.isValid) return null;

      const corrected = result.start.isCertain('year') ? instant : instant.set(correctYear(toCalendarDate(instant), reference));
      return this.toResolvedMoment(corrected, candidate.method, originalInput, timeZoneName);
    }

    const year = result.start.get('year');
    const month = result.start.get('month');
    const day = result.start.get('day');
    if (year === null || month === null || day === null) return null;

    const date = correctYear({ year, month, day }, reference);

    let method = candidate.method;
    let time: ExtractedTime = DEFAULT_TIME;
    const hour = result.start.get('hour');
    if (result.start.isCertain('hour') && hour !== null) {
      time = { hour, minute: result.start.get('minute') ?? 0, rule: 'parser' };
    } else if (explicitTime) {
      time = explicitTime;
      method = 'regex_time';
    }

    const moment = this.localize(date, time, timeZoneName);
    return moment ? this.toResolvedMoment(moment, method, originalInput, timeZoneName) : null;
  }

  private localize(date: CalendarDate, time: ExtractedTime, timeZoneName: string): DateTime | null {
    const moment = DateTime.fromObject(
      { ...date, hour: time.hour, minute: time.minute, second: 0, millisecond: 0 },
      { zone: timeZoneName }
    );
    return moment.isValid ? moment : null;
  }

  private toResolvedMoment(
    moment: DateTime,
    method: ResolutionMethod,
    originalInput: string,
    timeZoneName: string
  ): ResolvedMoment {
    return Object.freeze({
      isoDatetime: moment.toISO({ suppressMilliseconds: true }) ?? '',
      date: moment.toFormat('yyyy-MM-dd'),
      time: formatClock(moment.hour, moment.minute),
      timeZoneName,
      resolutionMethod: method,
      originalInput,
    });
  }

  private unresolved(text: string, reference: DateTime): UnresolvedError {
    const isoExample = `${reference.plus({ days: 1 }).toFormat('yyyy-MM-dd')} 15:00`;
    const [first, second, ...rest] = this.rules.suggestions;
    const suggestions = [first, second, isoExample, ...rest].filter((s): s is string => Boolean(s));
    const context = `${reference.toFormat('yyyy-MM-dd')} (${reference.setLocale('en').toFormat('cccc')}) ${reference.zoneName ?? ''}`;
    return new UnresolvedError(text, context, suggestions);
  }
}

function toCalendarDate(value: DateTime): CalendarDate {
  return { year: value.year, month: value.month, day: value.day };
}

/**
 * Parsers tend to anchor day/month phrases on the wrong year. A year before the
 * reference year is pulled up to it; a date earlier in the reference year is
 * pushed to the next one.
 */
export function correctYear(date: CalendarDate, reference: DateTime): CalendarDate {
  if (date.year < reference.year) {
    return { ...date, year: reference.year };
  }

  const referenceDate = toCalendarDate(reference);
  if (date.year === referenceDate.year && compareDates(date, referenceDate) < 0) {
    return { ...date, year: date.year + 1 };
  }

  return date;
}

function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}
