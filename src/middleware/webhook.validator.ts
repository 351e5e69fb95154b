import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';
import { MessageProvider, MessagingAdapter } from '../services/messaging/channel.adapter';
import { logger } from '../utils/logger';
import '../types/express';

export function validateWebhookSignature(provider: MessageProvider, channel: MessagingAdapter | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    // Skip validation in development
    if (env.NODE_ENV === 'development') {
      return next();
    }

    if (!channel || channel.provider !== provider) {
      logger.warn('Webhook received for unconfigured channel', { provider });
      return res.status(503).json({ error: `${provider} not configured` });
    }

    if (!channel.validateWebhook(req)) {
      logger.warn('Invalid webhook signature', { provider, path: req.originalUrl });
      return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
  };
}
