import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis } from './config/redis';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { createApp, createServices } from './app';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start() {
  try {
    await connectRedis();

    const app = createApp(createServices());
    app.listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV, timezone: env.DEFAULT_TIMEZONE });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();
