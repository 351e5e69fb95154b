import { DateTime } from 'luxon';
import { Booking, NewBooking } from '../types/booking';
import { Result, fail, ok } from '../types/result';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export type BookingIdGenerator = (now: Date) => string;

export interface BookingLedgerOptions {
  generateId?: BookingIdGenerator;
  clock?: () => Date;
}

export const timestampBookingId: BookingIdGenerator = (now) =>
  `BK_${DateTime.fromJSDate(now, { zone: 'utc' }).toFormat('yyyyMMdd_HHmmss')}`;

/**
 * Process-wide record of active bookings, keyed by id and indexed by phone.
 *
 * Every method is synchronous, so each mutation runs to completion on the
 * event loop before any other session touches the maps. Keep it that way: an
 * `await` inside a mutation would break linearizability.
 *
 * No overlap check happens on create. Availability is advisory.
 */
export class BookingLedger {
  private bookings = new Map<string, Booking>();
  private phoneIndex = new Map<string, string[]>();
  private issuedIds = new Set<string>();
  private generateId: BookingIdGenerator;
  private clock: () => Date;

  constructor(options: BookingLedgerOptions = {}) {
    this.generateId = options.generateId ?? timestampBookingId;
    this.clock = options.clock ?? (() => new Date());
  }

  get size(): number {
    return this.bookings.size;
  }

  create(booking: NewBooking): string {
    const now = this.clock();
    const bookingId = this.nextId(now);

    this.bookings.set(bookingId, Object.freeze({ ...booking, bookingId, createdAt: now.toISOString() }));
    const ids = this.phoneIndex.get(booking.clientPhone) ?? [];
    ids.push(bookingId);
    this.phoneIndex.set(booking.clientPhone, ids);

    logger.info('Booking recorded', { bookingId, clientPhone: booking.clientPhone, date: booking.date, time: booking.time });
    return bookingId;
  }

  get(bookingId: string): Booking | undefined {
    return this.bookings.get(bookingId);
  }

  cancelById(bookingId: string): Result<Booking, NotFoundError> {
    const booking = this.bookings.get(bookingId);
    if (!booking) {
      return fail(new NotFoundError(`bookingId=${bookingId}`));
    }

    this.remove(booking);
    logger.info('Booking cancelled', { bookingId });
    return ok(booking);
  }

  /** Removes the first booking (in creation order) matching all three fields exactly. */
  cancelByKey(clientPhone: string, date: string, time: string): Result<Booking, NotFoundError> {
    const match = this.listByPhone(clientPhone).find((booking) => booking.date === date && booking.time === time);
    if (!match) {
      return fail(new NotFoundError(`clientPhone=${clientPhone} date=${date} time=${time}`));
    }

    this.remove(match);
    logger.info('Booking cancelled by key', { bookingId: match.bookingId, clientPhone, date, time });
    return ok(match);
  }

  listByPhone(clientPhone: string): Booking[] {
    const ids = this.phoneIndex.get(clientPhone) ?? [];
    return ids.map((id) => this.bookings.get(id)).filter((booking): booking is Booking => booking !== undefined);
  }

  private remove(booking: Booking): void {
    this.bookings.delete(booking.bookingId);

    const remaining = (this.phoneIndex.get(booking.clientPhone) ?? []).filter((id) => id !== booking.bookingId);
    if (remaining.length > 0) {
      this.phoneIndex.set(booking.clientPhone, remaining);
    } else {
      this.phoneIndex.delete(booking.clientPhone);
    }
  }

  // ids are never reissued, even after the booking holding one is cancelled
  private nextId(now: Date): string {
    const base = this.generateId(now);
    let candidate = base;
    for (let suffix = 2; this.issuedIds.has(candidate); suffix++) {
      candidate = `${base}_${suffix}`;
    }
    this.issuedIds.add(candidate);
    return candidate;
  }
}
