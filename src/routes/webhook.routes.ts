import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { MessageProvider, MessagingAdapter } from '../services/messaging/channel.adapter';
import { InboundService } from '../services/inbound.service';
import { validateWebhookSignature } from '../middleware/webhook.validator';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface WebhookDependencies {
  channel: MessagingAdapter | null;
  inbound: Pick<InboundService, 'process'> | null;
  verifyToken?: string;
}

const verificationSchema = z.object({
  'hub.mode': z.string().optional(),
  'hub.verify_token': z.string().optional(),
  'hub.challenge': z.string().optional(),
});

async function receive(deps: WebhookDependencies, provider: MessageProvider, payload: unknown): Promise<void> {
  const { channel, inbound } = deps;
  if (!channel || !inbound || channel.provider !== provider) {
    logger.warn('Inbound webhook for unconfigured channel', { provider });
    return;
  }

  const messages = channel.handleInbound(payload);
  const summary = await inbound.process(messages);
  logger.info('Inbound webhook processed', { provider, ...summary });
}

/**
 * Runs the agent and delivery for a webhook payload after the provider has
 * been answered. Failures are logged, never rethrown.
 */
export function dispatchInbound(deps: WebhookDependencies, provider: MessageProvider, payload: unknown): void {
  void receive(deps, provider, payload).catch((error: unknown) => {
    logger.error('Inbound webhook error', { provider, error: errorMessage(error) });
  });
}

export function createWebhookRouter(deps: WebhookDependencies): Router {
  const router = Router();

  // Meta subscription handshake
  router.get('/whatsapp', (req: Request, res: Response) => {
    const query = verificationSchema.safeParse(req.query);
    const params: z.infer<typeof verificationSchema> = query.success ? query.data : {};

    if (
      params['hub.mode'] === 'subscribe' &&
      deps.verifyToken &&
      params['hub.verify_token'] === deps.verifyToken
    ) {
      logger.info('WhatsApp webhook verified');
      return res.status(200).send(params['hub.challenge'] ?? '');
    }

    logger.warn('WhatsApp webhook verification failed');
    res.sendStatus(403);
  });

  // Acknowledge before the agent runs so Meta does not time out and redeliver
  router.post('/whatsapp', validateWebhookSignature('whatsapp', deps.channel), (req: Request, res: Response) => {
    res.status(200).json({ success: true });
    dispatchInbound(deps, 'whatsapp', req.body);
  });

  router.post('/twilio', validateWebhookSignature('twilio', deps.channel), (req: Request, res: Response) => {
    // Empty TwiML, replies go out through the API
    res.type('text/xml').send('<Response></Response>');
    dispatchInbound(deps, 'twilio', req.body);
  });

  return router;
}
