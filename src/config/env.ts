import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const hourOfDay = z.coerce.number().int().min(0, 'Business hours must be between 0 and 23').max(23, 'Business hours must be between 0 and 23');

const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    API_KEYS: optionalString,
    SENTRY_DSN: optionalString,
    REDIS_URL: optionalString,
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
    MESSAGE_PROVIDER: z.enum(['whatsapp', 'twilio']).default('whatsapp'),
    WHATSAPP_API_KEY: optionalString,
    WHATSAPP_PHONE_ID: optionalString,
    WHATSAPP_BUSINESS_ACCOUNT_ID: optionalString,
    WHATSAPP_BASE_URL: z.string().url().default('https://graph.facebook.com/v18.0'),
    WHATSAPP_WEBHOOK_TOKEN: optionalString,
    WHATSAPP_APP_SECRET: optionalString,
    TWILIO_ACCOUNT_SID: optionalString,
    TWILIO_AUTH_TOKEN: optionalString,
    TWILIO_WHATSAPP_NUMBER: optionalString,
    GOOGLE_CALENDAR_CREDENTIALS: optionalString,
    GOOGLE_CALENDAR_ID: z.string().default('primary'),
    DEFAULT_TIMEZONE: z.string().default('America/Bogota'),
    BUSINESS_HOURS_START: hourOfDay.default(9),
    BUSINESS_HOURS_END: hourOfDay.default(17),
    WEBHOOK_BASE_URL: z.string().default('http://localhost:3000'),
  })
  .refine((value) => value.BUSINESS_HOURS_START < value.BUSINESS_HOURS_END, {
    message: 'BUSINESS_HOURS_START must be before BUSINESS_HOURS_END',
    path: ['BUSINESS_HOURS_END'],
  });

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
