export interface Booking {
  readonly bookingId: string;
  readonly clientName: string;
  readonly clientPhone: string;
  readonly date: string;
  readonly time: string;
  readonly classType: string;
  readonly instructor: string | null;
  readonly notes: string | null;
  readonly calendarEventId: string | null;
  readonly createdAt: string;
}

export type NewBooking = Omit<Booking, 'bookingId' | 'createdAt'>;

export interface BookingRequest {
  clientName: string;
  clientPhone: string;
  /** YYYY-MM-DD or free text ("tomorrow", "el 15 de enero") */
  date: string;
  /** HH:MM or free text ("3pm", "a las 8pm") */
  time: string;
  classType: string;
  instructor?: string;
  notes?: string;
  timezone?: string;
}

export interface BookingConfirmation {
  bookingId: string;
  clientName: string;
  date: string;
  time: string;
  classType: string;
  durationMinutes: number;
  instructor: string;
  scheduledStart: string;
  scheduledEnd: string;
  calendarEventId: string | null;
  calendarLink: string | null;
  warning: string | null;
  confirmation: string;
}

export interface CancelRequest {
  bookingId?: string;
  clientPhone?: string;
  date?: string;
  time?: string;
  timezone?: string;
}

export interface CancellationResult {
  bookingId: string;
  booking: Booking;
  message: string;
}

export interface Slot {
  time: string;
  date: string;
  durationMinutes: number;
  instructor: string | null;
  available: boolean;
}

export interface AvailabilityResult {
  date: string;
  timeZoneName: string;
  window: TimeWindow;
  slots: Slot[];
  degraded: boolean;
}

/** [start, end) as HH:MM strings */
export type TimeWindow = readonly [string, string];

export interface BusinessHours {
  startHour: number;
  endHour: number;
}
