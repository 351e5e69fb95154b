export interface BusyInterval {
  readonly startInstant: Date;
  readonly endInstant: Date;
}

export interface CalendarEvent {
  id: string;
  summary: string;
  startInstant: Date;
  endInstant: Date;
  allDay: boolean;
  description?: string;
  link?: string;
}

export interface NewCalendarEvent {
  summary: string;
  description: string;
  /** ISO-8601 with offset */
  start: string;
  end: string;
  timeZoneName: string;
  attendees?: string[];
}

export interface CreatedCalendarEvent {
  id: string;
  link: string | null;
}

export interface CalendarBackend {
  listEvents(start: Date, end: Date, maxResults: number): Promise<CalendarEvent[]>;
  createEvent(event: NewCalendarEvent): Promise<CreatedCalendarEvent>;
}
