import { google, calendar_v3 } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { CalendarBackend, CalendarEvent, CreatedCalendarEvent, NewCalendarEvent } from '../../types/calendar';
import { env } from '../../config/env';
import { logger } from '../../utils/logger';
import { CalendarBackendError, CalendarFailureKind, toError } from '../../utils/errors';

const serviceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export interface GoogleCalendarConfig {
  /** base64-encoded service account JSON */
  credentials?: string;
  calendarId?: string;
  timeZoneName?: string;
}

function failureKind(error: unknown): CalendarFailureKind {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = Number(error.code);
    if (code === 401 || code === 403) return 'auth';
  }
  return 'transport';
}

export class GoogleCalendarAdapter implements CalendarBackend {
  private calendar: calendar_v3.Calendar;
  private calendarId: string;
  private timeZoneName: string;

  constructor(config: GoogleCalendarConfig = {}) {
    const credentialsBase64 = config.credentials ?? env.GOOGLE_CALENDAR_CREDENTIALS;
    if (!credentialsBase64) {
      throw new Error('GOOGLE_CALENDAR_CREDENTIALS not configured');
    }

    const credentials = serviceAccountSchema.parse(JSON.parse(Buffer.from(credentialsBase64, 'base64').toString('utf8')));
    const auth = new GoogleAuth({
      credentials,
      scopes: ['https://www.googleapis.com/auth/calendar'],
    });

    this.calendar = google.calendar({ version: 'v3', auth });
    this.calendarId = config.calendarId ?? env.GOOGLE_CALENDAR_ID;
    this.timeZoneName = config.timeZoneName ?? env.DEFAULT_TIMEZONE;
  }

  async listEvents(start: Date, end: Date, maxResults: number): Promise<CalendarEvent[]> {
    let items: calendar_v3.Schema$Event[];
    try {
      const result = await this.calendar.events.list({
        calendarId: this.calendarId,
        timeMin: start.toISOString(),
        timeMax: end.toISOString(),
        maxResults,
        singleEvents: true,
        orderBy: 'startTime',
      });
      items = result.data.items ?? [];
    } catch (error) {
      throw new CalendarBackendError('listEvents', toError(error), failureKind(error));
    }

    const events = items
      .filter((item) => item.status !== 'cancelled')
      .map((item) => this.toCalendarEvent(item))
      .filter((event): event is CalendarEvent => event !== null);

    logger.debug('Google Calendar events listed', { count: events.length, timeMin: start.toISOString() });
    return events;
  }

  async createEvent(event: NewCalendarEvent): Promise<CreatedCalendarEvent> {
    let created: calendar_v3.Schema$Event;
    try {
      const result = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: event.summary,
          description: event.description,
          start: { dateTime: event.start, timeZone: event.timeZoneName },
          end: { dateTime: event.end, timeZone: event.timeZoneName },
          attendees: event.attendees?.map((email) => ({ email })),
        },
      });
      created = result.data;
    } catch (error) {
      throw new CalendarBackendError('createEvent', toError(error), failureKind(error));
    }

    if (!created.id) {
      throw new CalendarBackendError('createEvent', new Error('Calendar returned an event without id'));
    }

    logger.info('Google Calendar event created', { eventId: created.id });
    return { id: created.id, link: created.htmlLink ?? null };
  }

  private toCalendarEvent(item: calendar_v3.Schema$Event): CalendarEvent | null {
    const start = this.toInstant(item.start);
    const end = this.toInstant(item.end);
    if (!item.id || !start || !end) return null;

    return {
      id: item.id,
      summary: item.summary ?? '',
      startInstant: start,
      endInstant: end,
      allDay: Boolean(item.start?.date && !item.start.dateTime),
      description: item.description ?? undefined,
      link: item.htmlLink ?? undefined,
    };
  }

  // all-day events carry a bare date; they span the whole day in the studio's zone
  private toInstant(value: calendar_v3.Schema$EventDateTime | undefined): Date | null {
    if (value?.dateTime) {
      const parsed = DateTime.fromISO(value.dateTime);
      return parsed.isValid ? parsed.toJSDate() : null;
    }
    if (value?.date) {
      const parsed = DateTime.fromISO(value.date, { zone: value.timeZone ?? this.timeZoneName });
      return parsed.isValid ? parsed.startOf('day').toJSDate() : null;
    }
    return null;
  }
}
