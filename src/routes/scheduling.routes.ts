import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BookingService } from '../services/booking.service';
import { CLASS_TYPE_CATALOG } from '../config/classTypes';
import { ValidationError } from '../utils/errors';

const resolveSchema = z.object({
  text: z.string().min(1).max(500),
  timezone: z.string().optional(),
});

const availabilitySchema = z.object({
  date: z.string().min(1),
  time_range: z.string().optional(),
  instructor: z.string().optional(),
  timezone: z.string().optional(),
});

const bookingSchema = z.object({
  client_name: z.string().min(1),
  client_phone: z.string().min(1),
  date: z.string().min(1),
  time: z.string().min(1),
  class_type: z.string().min(1),
  instructor: z.string().optional(),
  notes: z.string().max(1000).optional(),
  timezone: z.string().optional(),
});

const listSchema = z.object({
  phone: z.string().min(1),
});

const cancelSchema = z.object({
  booking_id: z.string().min(1).optional(),
  client_phone: z.string().min(1).optional(),
  date: z.string().min(1).optional(),
  time: z.string().min(1).optional(),
  timezone: z.string().optional(),
});

function parse<T>(schema: z.ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

export function createSchedulingRouter(bookings: BookingService): Router {
  const router = Router();

  router.post('/resolve', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text, timezone } = parse(resolveSchema, req.body);
      const result = bookings.resolveDateTime(text, timezone);
      if (!result.success) throw result.error;

      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  });

  router.get('/availability', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parse(availabilitySchema, req.query);
      const result = await bookings.checkAvailability(query.date, query.time_range, query.instructor, query.timezone);
      if (!result.success) throw result.error;

      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  });

  router.post('/bookings', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parse(bookingSchema, req.body);
      const result = await bookings.book({
        clientName: body.client_name,
        clientPhone: body.client_phone,
        date: body.date,
        time: body.time,
        classType: body.class_type,
        instructor: body.instructor,
        notes: body.notes,
        timezone: body.timezone,
      });
      if (!result.success) throw result.error;

      res.status(201).json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  });

  router.get('/bookings', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { phone } = parse(listSchema, req.query);
      res.json({ success: true, data: bookings.listBookings(phone) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/bookings/cancel', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parse(cancelSchema, req.body);
      const result = bookings.cancel({
        bookingId: body.booking_id,
        clientPhone: body.client_phone,
        date: body.date,
        time: body.time,
        timezone: body.timezone,
      });
      if (!result.success) throw result.error;

      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  });

  router.get('/class-types', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: Object.entries(CLASS_TYPE_CATALOG).map(([name, durationMinutes]) => ({ name, durationMinutes })),
    });
  });

  return router;
}
