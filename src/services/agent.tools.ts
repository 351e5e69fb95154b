import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { BookingService } from './booking.service';
import { AppError, UnresolvedError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ToolSession {
  clientPhone: string;
  clientName?: string;
  timezone?: string;
}

export interface ToolOutcome {
  content: string;
  isError: boolean;
}

const checkAvailabilityInput = z.object({
  date: z.string().min(1),
  time_range: z.string().optional(),
  instructor: z.string().optional(),
});

const makeBookingInput = z.object({
  client_name: z.string().min(1).optional(),
  client_phone: z.string().min(1).optional(),
  date: z.string().min(1),
  time: z.string().min(1),
  class_type: z.string().min(1),
  instructor: z.string().optional(),
  notes: z.string().optional(),
});

const cancelBookingInput = z.object({
  booking_id: z.string().min(1).optional(),
  client_phone: z.string().min(1).optional(),
  date: z.string().min(1).optional(),
  time: z.string().min(1).optional(),
});

const viewBookingsInput = z.object({
  client_phone: z.string().min(1).optional(),
});

const parseDateTimeInput = z.object({
  user_input: z.string().min(1),
  timezone: z.string().optional(),
});

export const TOOL_DEFINITIONS: Anthropic.Messages.Tool[] = [
  {
    name: 'check_availability',
    description: 'List open class slots for a day. Accepts YYYY-MM-DD or free text such as "tomorrow" or "el viernes".',
    input_schema: {
      type: 'object',
      properties: {
        date: { type: 'string', description: 'Day to check, ISO or natural language' },
        time_range: { type: 'string', description: 'Optional range such as "morning", "tarde" or "9am-12pm"' },
        instructor: { type: 'string', description: 'Optional instructor name' },
      },
      required: ['date'],
    },
  },
  {
    name: 'make_booking',
    description: 'Book a class for the client. Date and time may be ISO or natural language.',
    input_schema: {
      type: 'object',
      properties: {
        client_name: { type: 'string' },
        client_phone: { type: 'string', description: 'Defaults to the phone of the current chat' },
        date: { type: 'string' },
        time: { type: 'string' },
        class_type: { type: 'string' },
        instructor: { type: 'string' },
        notes: { type: 'string' },
      },
      required: ['date', 'time', 'class_type'],
    },
  },
  {
    name: 'cancel_booking',
    description: 'Cancel a booking by booking ID, or by phone plus date and time.',
    input_schema: {
      type: 'object',
      properties: {
        booking_id: { type: 'string' },
        client_phone: { type: 'string' },
        date: { type: 'string' },
        time: { type: 'string' },
      },
    },
  },
  {
    name: 'view_bookings',
    description: "List the client's active bookings.",
    input_schema: {
      type: 'object',
      properties: {
        client_phone: { type: 'string', description: 'Defaults to the phone of the current chat' },
      },
    },
  },
  {
    name: 'parse_date_time',
    description: 'Turn an English or Spanish date/time phrase into a calendar date and 24h time.',
    input_schema: {
      type: 'object',
      properties: {
        user_input: { type: 'string' },
        timezone: { type: 'string', description: 'IANA zone, defaults to the studio zone' },
      },
      required: ['user_input'],
    },
  },
];

function success(payload: Record<string, unknown>): ToolOutcome {
  return { content: JSON.stringify({ success: true, ...payload }), isError: false };
}

function failure(error: unknown): ToolOutcome {
  const payload: Record<string, unknown> = { success: false, error: errorMessage(error) };
  if (error instanceof UnresolvedError) {
    payload.suggestions = error.suggestions;
    payload.reference_date = error.referenceDateContext;
  }
  return { content: JSON.stringify(payload), isError: true };
}

/** Runs the agent's tool calls against the booking orchestrator. */
export class AgentToolkit {
  constructor(private bookings: BookingService) {}

  async execute(name: string, input: unknown, session: ToolSession): Promise<ToolOutcome> {
    try {
      return await this.dispatch(name, input, session);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return failure(new Error(`Invalid input for ${name}: ${error.issues.map((issue) => issue.path.join('.')).join(', ')}`));
      }
      if (error instanceof AppError) {
        return failure(error);
      }
      logger.error('Tool execution failed', { tool: name, error: errorMessage(error) });
      return failure(new Error(`The ${name} tool failed, please try again`));
    }
  }

  private async dispatch(name: string, input: unknown, session: ToolSession): Promise<ToolOutcome> {
    switch (name) {
      case 'check_availability': {
        const args = checkAvailabilityInput.parse(input);
        const result = await this.bookings.checkAvailability(args.date, args.time_range, args.instructor, session.timezone);
        if (!result.success) return failure(result.error);

        const { date, timeZoneName, window, slots, degraded } = result.data;
        return success({
          date,
          timezone: timeZoneName,
          window: { start: window[0], end: window[1] },
          available_times: slots.filter((slot) => slot.available).map((slot) => slot.time),
          booked_times: slots.filter((slot) => !slot.available).map((slot) => slot.time),
          degraded,
        });
      }

      case 'make_booking': {
        const args = makeBookingInput.parse(input);
        const result = await this.bookings.book({
          clientName: args.client_name ?? session.clientName ?? 'Client',
          clientPhone: args.client_phone ?? session.clientPhone,
          date: args.date,
          time: args.time,
          classType: args.class_type,
          instructor: args.instructor,
          notes: args.notes,
          timezone: session.timezone,
        });
        if (!result.success) return failure(result.error);

        const booking = result.data;
        return success({
          booking_id: booking.bookingId,
          date: booking.date,
          time: booking.time,
          class_type: booking.classType,
          duration_minutes: booking.durationMinutes,
          instructor: booking.instructor,
          calendar_link: booking.calendarLink,
          warning: booking.warning,
          confirmation: booking.confirmation,
        });
      }

      case 'cancel_booking': {
        const args = cancelBookingInput.parse(input);
        const result = this.bookings.cancel({
          bookingId: args.booking_id,
          clientPhone: args.client_phone ?? (args.booking_id ? undefined : session.clientPhone),
          date: args.date,
          time: args.time,
          timezone: session.timezone,
        });
        if (!result.success) return failure(result.error);

        return success({ booking_id: result.data.bookingId, message: result.data.message });
      }

      case 'view_bookings': {
        const args = viewBookingsInput.parse(input);
        const bookings = this.bookings.listBookings(args.client_phone ?? session.clientPhone);
        return success({
          count: bookings.length,
          bookings: bookings.map((booking) => ({
            booking_id: booking.bookingId,
            date: booking.date,
            time: booking.time,
            class_type: booking.classType,
            instructor: booking.instructor,
          })),
        });
      }

      case 'parse_date_time': {
        const args = parseDateTimeInput.parse(input);
        const result = this.bookings.resolveDateTime(args.user_input, args.timezone ?? session.timezone);
        if (!result.success) return failure(result.error);

        return success({
          date: result.data.date,
          time: result.data.time,
          iso_datetime: result.data.isoDatetime,
          timezone: result.data.timeZoneName,
          method: result.data.resolutionMethod,
        });
      }

      default:
        return failure(new Error(`Unknown tool: ${name}`));
    }
  }
}
