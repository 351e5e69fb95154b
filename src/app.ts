import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { checkRedisHealth } from './config/redis';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createWebhookRouter } from './routes/webhook.routes';
import { createSchedulingRouter } from './routes/scheduling.routes';
import { createChatRouter } from './routes/chat.routes';
import { TimeExpressionResolver } from './services/datetime/timeExpression.resolver';
import { BookingLedger } from './services/booking.ledger';
import { BookingService } from './services/booking.service';
import { AgentService } from './services/agent.service';
import { InboundService } from './services/inbound.service';
import { GoogleCalendarAdapter } from './services/calendar/google.adapter';
import { ChannelFactory } from './services/messaging/channel.factory';
import { MessagingAdapter } from './services/messaging/channel.adapter';
import { CalendarBackend } from './types/calendar';
import './types/express';

export interface AppServices {
  bookings: BookingService;
  agent: AgentService;
  channel: MessagingAdapter | null;
  inbound: InboundService | null;
}

function buildCalendar(): CalendarBackend | null {
  if (!env.GOOGLE_CALENDAR_CREDENTIALS) {
    logger.info('Google Calendar not configured, bookings stay local');
    return null;
  }

  try {
    return new GoogleCalendarAdapter();
  } catch (error) {
    logger.error('Google Calendar setup failed, bookings stay local', { error: errorMessage(error) });
    return null;
  }
}

function buildChannel(): MessagingAdapter | null {
  try {
    return ChannelFactory.create({
      provider: env.MESSAGE_PROVIDER,
      credentials: {
        WHATSAPP_API_KEY: env.WHATSAPP_API_KEY,
        WHATSAPP_PHONE_ID: env.WHATSAPP_PHONE_ID,
        WHATSAPP_BASE_URL: env.WHATSAPP_BASE_URL,
        WHATSAPP_APP_SECRET: env.WHATSAPP_APP_SECRET,
        TWILIO_ACCOUNT_SID: env.TWILIO_ACCOUNT_SID,
        TWILIO_AUTH_TOKEN: env.TWILIO_AUTH_TOKEN,
        TWILIO_WHATSAPP_NUMBER: env.TWILIO_WHATSAPP_NUMBER,
        WEBHOOK_BASE_URL: env.WEBHOOK_BASE_URL,
      },
    });
  } catch (error) {
    logger.warn('Message channel not configured, webhooks disabled', {
      provider: env.MESSAGE_PROVIDER,
      error: errorMessage(error),
    });
    return null;
  }
}

export function createServices(): AppServices {
  const bookings = new BookingService({
    resolver: new TimeExpressionResolver(),
    ledger: new BookingLedger(),
    calendar: buildCalendar(),
    businessHours: { startHour: env.BUSINESS_HOURS_START, endHour: env.BUSINESS_HOURS_END },
    defaultTimeZone: env.DEFAULT_TIMEZONE,
  });
  const agent = new AgentService({ bookings });
  const channel = buildChannel();
  const inbound = channel ? new InboundService(agent, channel) : null;

  return { bookings, agent, channel, inbound };
}

export function createApp(services: AppServices): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  // Webhooks (Twilio form-encoded + Meta JSON)
  app.use('/webhook', express.urlencoded({ extended: false }));
  app.use(
    express.json({
      verify: (req, _res, buf) => {
        req.rawBody = buf;
      },
    })
  );

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips webhooks and health)
  app.use(apiKeyAuth);

  app.use(
    '/webhook',
    createWebhookRouter({
      channel: services.channel,
      inbound: services.inbound,
      verifyToken: env.WHATSAPP_WEBHOOK_TOKEN,
    })
  );
  app.use('/api/scheduling', createSchedulingRouter(services.bookings));
  app.use('/api/chat', createChatRouter(services.agent));

  app.get('/health', async (_req, res) => {
    const redisHealth = await checkRedisHealth();
    res.json({
      status: 'ok',
      redis: redisHealth,
      channel: services.channel?.provider ?? null,
      timestamp: new Date().toISOString(),
    });
  });

  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
