import { DateTime } from 'luxon';
import {
  AvailabilityResult,
  Booking,
  BookingConfirmation,
  BookingRequest,
  BusinessHours,
  CancellationResult,
  CancelRequest,
} from '../types/booking';
import { BusyInterval, CalendarBackend } from '../types/calendar';
import { ResolvedMoment } from '../types/datetime';
import { Result, fail, ok } from '../types/result';
import { InsufficientIdentifierError, NotFoundError, UnresolvedError, errorMessage } from '../utils/errors';
import { businessWindow, resolveTimeRange } from '../utils/businessHours';
import { logger } from '../utils/logger';
import { classDuration } from '../config/classTypes';
import { BookingLedger } from './booking.ledger';
import { availableSlots, fallbackSlots } from './availability/slot.engine';
import { TimeExpressionResolver, assertTimeZone, isCanonicalDate, isCanonicalTime } from './datetime/timeExpression.resolver';
import { extractTime, formatClock } from './datetime/time.rules';
import { normalizeInput } from './datetime/phrase.rules';

export const DEFAULT_INSTRUCTOR_LABEL = 'Available Staff';
const DEFAULT_MAX_CALENDAR_RESULTS = 100;
const CALENDAR_WARNING = "Your booking is saved, but we couldn't add it to the studio calendar.";

export interface SchedulingDependencies {
  resolver: TimeExpressionResolver;
  ledger: BookingLedger;
  calendar?: CalendarBackend | null;
  businessHours: BusinessHours;
  defaultTimeZone: string;
  clock?: () => Date;
  maxCalendarResults?: number;
}

export type CancelError = NotFoundError | InsufficientIdentifierError | UnresolvedError;

/** "mañana" + "8pm" reads as "mañana at 8pm"; "a las 8pm" already carries its connector. */
function joinDateAndTime(date: string, time: string): string {
  const trimmed = time.trim();
  return /^(at|a la|a las|@)\b/i.test(trimmed) ? `${date} ${trimmed}` : `${date} at ${trimmed}`;
}

export class BookingService {
  private clock: () => Date;

  constructor(private deps: SchedulingDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get timeZone(): string {
    return this.deps.defaultTimeZone;
  }

  get businessHours(): BusinessHours {
    return this.deps.businessHours;
  }

  now(): Date {
    return this.clock();
  }

  resolveDateTime(text: string, timezone?: string): Result<ResolvedMoment, UnresolvedError> {
    return this.deps.resolver.resolve(text, this.clock(), timezone ?? this.deps.defaultTimeZone);
  }

  async book(request: BookingRequest): Promise<Result<BookingConfirmation, UnresolvedError>> {
    const timezone = request.timezone ?? this.deps.defaultTimeZone;
    assertTimeZone(timezone);

    let date = request.date;
    let time = request.time;
    if (!isCanonicalDate(date) || !isCanonicalTime(time)) {
      const resolved = this.deps.resolver.resolve(joinDateAndTime(date, time), this.clock(), timezone);
      if (!resolved.success) {
        return resolved;
      }
      date = resolved.data.date;
      time = resolved.data.time;
    }

    const durationMinutes = classDuration(request.classType);
    const start = DateTime.fromISO(`${date}T${time}`, { zone: timezone });
    const end = start.plus({ minutes: durationMinutes });
    const instructor = request.instructor?.trim() || null;

    let calendarEventId: string | null = null;
    let calendarLink: string | null = null;
    let warning: string | null = null;

    if (this.deps.calendar) {
      try {
        const created = await this.deps.calendar.createEvent({
          summary: `${request.classType} - ${request.clientName}`,
          description: [
            `Client: ${request.clientName}`,
            `Phone: ${request.clientPhone}`,
            `Instructor: ${instructor ?? DEFAULT_INSTRUCTOR_LABEL}`,
            request.notes ? `Notes: ${request.notes}` : null,
          ]
            .filter(Boolean)
            .join('\n'),
          start: start.toISO() ?? `${date}T${time}`,
          end: end.toISO() ?? `${date}T${time}`,
          timeZoneName: timezone,
        });
        calendarEventId = created.id;
        calendarLink = created.link;
      } catch (error) {
        logger.warn('Calendar event creation failed, local booking still created', {
          clientPhone: request.clientPhone,
          date,
          time,
          error: errorMessage(error),
        });
        warning = CALENDAR_WARNING;
      }
    }

    const bookingId = this.deps.ledger.create({
      clientName: request.clientName,
      clientPhone: request.clientPhone,
      date,
      time,
      classType: request.classType,
      instructor,
      notes: request.notes?.trim() || null,
      calendarEventId,
    });

    logger.info('Class booked', { bookingId, classType: request.classType, date, time, calendarEventId });

    return ok({
      bookingId,
      clientName: request.clientName,
      date,
      time,
      classType: request.classType,
      durationMinutes,
      instructor: instructor ?? DEFAULT_INSTRUCTOR_LABEL,
      scheduledStart: start.toISO() ?? '',
      scheduledEnd: end.toISO() ?? '',
      calendarEventId,
      calendarLink,
      warning,
      confirmation: `Your ${request.classType} class is confirmed for ${date} at ${time}`,
    });
  }

  cancel(request: CancelRequest): Result<CancellationResult, CancelError> {
    if (request.bookingId) {
      const cancelled = this.deps.ledger.cancelById(request.bookingId);
      if (!cancelled.success) return cancelled;

      return ok({
        bookingId: cancelled.data.bookingId,
        booking: cancelled.data,
        message: `Booking ${cancelled.data.bookingId} has been cancelled successfully`,
      });
    }

    if (!request.clientPhone || !request.date || !request.time) {
      return fail(new InsufficientIdentifierError());
    }

    let date = request.date;
    if (!isCanonicalDate(date)) {
      const resolved = this.resolveDateTime(date, request.timezone);
      if (!resolved.success) return resolved;
      date = resolved.data.date;
    }
    const time = this.canonicalTime(request.time);

    const cancelled = this.deps.ledger.cancelByKey(request.clientPhone, date, time);
    if (!cancelled.success) return cancelled;

    return ok({
      bookingId: cancelled.data.bookingId,
      booking: cancelled.data,
      message: `Your booking for ${date} at ${time} has been cancelled`,
    });
  }

  async checkAvailability(
    dateOrText: string,
    timeRangeText?: string,
    instructor?: string,
    timezone?: string
  ): Promise<Result<AvailabilityResult, UnresolvedError>> {
    const zone = timezone ?? this.deps.defaultTimeZone;
    assertTimeZone(zone);

    let date = dateOrText;
    if (!isCanonicalDate(date)) {
      const resolved = this.deps.resolver.resolve(dateOrText, this.clock(), zone);
      if (!resolved.success) return resolved;
      date = resolved.data.date;
    }

    const window = resolveTimeRange(timeRangeText) ?? businessWindow(this.deps.businessHours);
    const base = { date, timeZoneName: zone, window };

    let busyIntervals: BusyInterval[] = [];
    if (this.deps.calendar) {
      const day = DateTime.fromISO(date, { zone });
      const windowStart = DateTime.fromISO(`${date}T${window[0]}`, { zone });
      const windowEnd = DateTime.fromISO(`${date}T${window[1]}`, { zone });

      try {
        const events = await this.deps.calendar.listEvents(
          (windowStart.isValid ? windowStart : day.startOf('day')).toJSDate(),
          (windowEnd.isValid ? windowEnd : day.endOf('day')).toJSDate(),
          this.deps.maxCalendarResults ?? DEFAULT_MAX_CALENDAR_RESULTS
        );
        busyIntervals = events.map((event) => ({ startInstant: event.startInstant, endInstant: event.endInstant }));
      } catch (error) {
        logger.warn('Calendar lookup failed, offering fallback slots', { date, error: errorMessage(error) });
        return ok({
          ...base,
          slots: fallbackSlots(date, this.deps.businessHours, instructor),
          degraded: true,
        });
      }
    }

    const slots = availableSlots({
      date,
      timeWindow: window,
      instructor,
      busyIntervals,
      businessHours: this.deps.businessHours,
      timeZoneName: zone,
    });

    logger.info('Availability checked', { date, window, open: slots.filter((slot) => slot.available).length });
    return ok({ ...base, slots, degraded: false });
  }

  listBookings(clientPhone: string): Booking[] {
    return this.deps.ledger.listByPhone(clientPhone);
  }

  private canonicalTime(time: string): string {
    if (isCanonicalTime(time)) return time;
    const extracted = extractTime(normalizeInput(time));
    return extracted ? formatClock(extracted.hour, extracted.minute) : time;
  }
}
