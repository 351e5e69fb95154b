import { DateTime } from 'luxon';
import { BusinessHours, Slot, TimeWindow } from '../../types/booking';
import { BusyInterval } from '../../types/calendar';
import { formatClock } from '../datetime/time.rules';
import { businessWindow, toMinutes } from '../../utils/businessHours';

export const SLOT_MINUTES = 60;

export interface SlotQuery {
  /** YYYY-MM-DD */
  date: string;
  timeWindow?: TimeWindow | null;
  instructor?: string | null;
  busyIntervals: readonly BusyInterval[];
  businessHours: BusinessHours;
  timeZoneName: string;
}

const MINUTE_MS = 60_000;

function truncateToMinute(instant: number): number {
  return Math.floor(instant / MINUTE_MS) * MINUTE_MS;
}

/** Whole hours h with h:00 inside [start, end). */
export function candidateHours(window: TimeWindow): number[] {
  const startMinutes = toMinutes(window[0]);
  const endMinutes = toMinutes(window[1]);
  const hours: number[] = [];

  for (let hour = Math.ceil(startMinutes / 60); hour < 24 && hour * 60 < endMinutes; hour++) {
    hours.push(hour);
  }

  return hours;
}

/**
 * A slot is taken when its start instant falls inside a busy interval
 * (start inclusive, end exclusive). Only the slot start is tested: an event
 * beginning at 10:30 does not block the 10:00 slot.
 */
export function isSlotBusy(slotStart: number, busyIntervals: readonly BusyInterval[]): boolean {
  const start = truncateToMinute(slotStart);
  return busyIntervals.some((interval) => {
    const intervalStart = truncateToMinute(interval.startInstant.getTime());
    const intervalEnd = truncateToMinute(interval.endInstant.getTime());
    return start >= intervalStart && start < intervalEnd;
  });
}

export function availableSlots(query: SlotQuery): Slot[] {
  const window = query.timeWindow ?? businessWindow(query.businessHours);
  const day = DateTime.fromISO(query.date, { zone: query.timeZoneName }).startOf('day');

  return candidateHours(window).map((hour) => {
    const slotStart = day.set({ hour, minute: 0, second: 0, millisecond: 0 });
    return {
      time: formatClock(hour, 0),
      date: query.date,
      durationMinutes: SLOT_MINUTES,
      instructor: query.instructor ?? null,
      available: !isSlotBusy(slotStart.toMillis(), query.busyIntervals),
    };
  });
}

/**
 * Used when the calendar cannot be read: offers every second hour of the
 * business day, all marked available.
 */
export function fallbackSlots(date: string, businessHours: BusinessHours, instructor?: string | null): Slot[] {
  const slots: Slot[] = [];

  for (let hour = businessHours.startHour; hour < businessHours.endHour; hour++) {
    if (hour % 2 !== 0) continue;
    slots.push({
      time: formatClock(hour, 0),
      date,
      durationMinutes: SLOT_MINUTES,
      instructor: instructor ?? null,
      available: true,
    });
  }

  return slots;
}
