import crypto from 'crypto';
import { z } from 'zod';
import { ChannelConfig, MessagingAdapter, headerValue } from './channel.adapter';
import { InboundMessage, InboundMessageType, MessageDelivery, SignedRequest } from '../../types/messaging';
import { logger } from '../../utils/logger';
import { DeliveryError, toError } from '../../utils/errors';

const DEFAULT_BASE_URL = 'https://graph.facebook.com/v18.0';

const KNOWN_TYPES: readonly InboundMessageType[] = ['text', 'image', 'audio', 'video', 'document', 'location', 'sticker', 'interactive'];

const webhookSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              field: z.string(),
              value: z
                .object({
                  contacts: z
                    .array(z.object({ wa_id: z.string(), profile: z.object({ name: z.string() }).partial().optional() }))
                    .optional(),
                  messages: z
                    .array(
                      z.object({
                        id: z.string(),
                        from: z.string(),
                        type: z.string(),
                        timestamp: z.string().optional(),
                        text: z.object({ body: z.string() }).optional(),
                      })
                    )
                    .optional(),
                })
                .passthrough(),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).min(1),
});

/** WhatsApp Business Cloud API (Meta Graph) channel. */
export class WhatsAppCloudAdapter implements MessagingAdapter {
  readonly provider = 'whatsapp';
  private apiKey: string;
  private phoneId: string;
  private baseUrl: string;

  constructor(private config: ChannelConfig) {
    const apiKey = config.credentials.WHATSAPP_API_KEY;
    const phoneId = config.credentials.WHATSAPP_PHONE_ID;

    if (!apiKey || !phoneId) {
      throw new DeliveryError('whatsapp', 'unavailable', new Error('Missing WhatsApp credentials'));
    }

    this.apiKey = apiKey;
    this.phoneId = phoneId;
    this.baseUrl = config.credentials.WHATSAPP_BASE_URL || DEFAULT_BASE_URL;
  }

  async send(toAddress: string, bodyText: string): Promise<MessageDelivery> {
    const url = `${this.baseUrl}/${this.phoneId}/messages`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          messaging_product: 'whatsapp',
          to: toAddress,
          type: 'text',
          text: { body: bodyText },
        }),
      });
    } catch (error) {
      logger.warn('WhatsApp send failed', { to: toAddress, error: toError(error).message });
      throw new DeliveryError('whatsapp', 'network', toError(error));
    }

    if (!res.ok) {
      const errorBody = await res.text();
      logger.warn('WhatsApp API rejected message', { to: toAddress, status: res.status });
      throw new DeliveryError(
        'whatsapp',
        res.status >= 500 ? 'unavailable' : 'rejected',
        new Error(`WhatsApp API returned ${res.status}: ${errorBody}`)
      );
    }

    const parsed = sendResponseSchema.safeParse(await res.json());
    const deliveryId = parsed.success ? parsed.data.messages[0].id : 'unknown';

    logger.info('WhatsApp message sent', { to: toAddress, deliveryId });
    return { deliveryId };
  }

  handleInbound(payload: unknown): InboundMessage[] {
    const parsed = webhookSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('Unrecognized WhatsApp webhook payload', { issues: parsed.error.issues.length });
      return [];
    }

    const inbound: InboundMessage[] = [];
    for (const entry of parsed.data.entry) {
      for (const change of entry.changes) {
        if (change.field !== 'messages') continue;

        const contacts = change.value.contacts ?? [];
        for (const message of change.value.messages ?? []) {
          const contact = contacts.find((c) => c.wa_id === message.from);
          const seconds = Number(message.timestamp);
          inbound.push({
            fromAddress: message.from,
            contactName: contact?.profile?.name,
            bodyText: message.text?.body ?? '',
            messageType: KNOWN_TYPES.find((type) => type === message.type) ?? 'unknown',
            messageId: message.id,
            timestamp: Number.isFinite(seconds) && message.timestamp ? new Date(seconds * 1000) : new Date(),
          });
        }
      }
    }

    return inbound;
  }

  validateWebhook(req: SignedRequest): boolean {
    const signature = headerValue(req, 'x-hub-signature-256');
    const appSecret = this.config.credentials.WHATSAPP_APP_SECRET;

    if (!signature || !appSecret) {
      return false;
    }

    const payload = req.rawBody ?? Buffer.from(JSON.stringify(req.body ?? {}));
    const expected = `sha256=${crypto.createHmac('sha256', appSecret).update(payload).digest('hex')}`;

    const given = Buffer.from(signature);
    const wanted = Buffer.from(expected);
    return given.length === wanted.length && crypto.timingSafeEqual(given, wanted);
  }
}
