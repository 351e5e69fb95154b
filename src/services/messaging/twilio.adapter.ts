import twilio from 'twilio';
import { z } from 'zod';
import { ChannelConfig, MessagingAdapter, headerValue } from './channel.adapter';
import { InboundMessage, InboundMessageType, MessageDelivery, SignedRequest } from '../../types/messaging';
import { logger } from '../../utils/logger';
import { DeliveryError, DeliveryFailureKind, toError } from '../../utils/errors';

const WHATSAPP_PREFIX = 'whatsapp:';

const inboundSchema = z
  .object({
    From: z.string().min(1),
    Body: z.string().default(''),
    MessageSid: z.string().default(''),
    ProfileName: z.string().optional(),
    NumMedia: z.coerce.number().default(0),
    MediaContentType0: z.string().optional(),
  })
  .passthrough();

const formParamsSchema = z.record(z.string());

function withPrefix(address: string): string {
  return address.startsWith(WHATSAPP_PREFIX) ? address : `${WHATSAPP_PREFIX}${address}`;
}

function withoutPrefix(address: string): string {
  return address.startsWith(WHATSAPP_PREFIX) ? address.slice(WHATSAPP_PREFIX.length) : address;
}

function mediaType(contentType: string | undefined): InboundMessageType {
  const family = contentType?.split('/')[0];
  if (family === 'image' || family === 'audio' || family === 'video') return family;
  return 'document';
}

function failureKind(error: unknown): DeliveryFailureKind {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = Number(error.status);
    if (status >= 500) return 'unavailable';
    if (status >= 400) return 'rejected';
  }
  return 'network';
}

/** WhatsApp through Twilio's messaging API. */
export class TwilioWhatsAppAdapter implements MessagingAdapter {
  readonly provider = 'twilio';
  private client: ReturnType<typeof twilio>;
  private fromNumber: string;

  constructor(private config: ChannelConfig) {
    const accountSid = config.credentials.TWILIO_ACCOUNT_SID;
    const authToken = config.credentials.TWILIO_AUTH_TOKEN;
    const fromNumber = config.credentials.TWILIO_WHATSAPP_NUMBER;

    if (!accountSid || !authToken || !fromNumber) {
      throw new DeliveryError('twilio', 'unavailable', new Error('Missing Twilio credentials'));
    }

    this.client = twilio(accountSid, authToken);
    this.fromNumber = fromNumber;
  }

  async send(toAddress: string, bodyText: string): Promise<MessageDelivery> {
    try {
      const result = await this.client.messages.create({
        to: withPrefix(toAddress),
        from: withPrefix(this.fromNumber),
        body: bodyText,
      });
      logger.info('WhatsApp message sent', { provider: 'twilio', to: toAddress, deliveryId: result.sid });
      return { deliveryId: result.sid };
    } catch (error) {
      logger.warn('Twilio send failed', { to: toAddress, error: toError(error).message });
      throw new DeliveryError('twilio', failureKind(error), toError(error));
    }
  }

  handleInbound(payload: unknown): InboundMessage[] {
    const parsed = inboundSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('Unrecognized Twilio webhook payload', { issues: parsed.error.issues.length });
      return [];
    }

    const message = parsed.data;
    return [
      {
        fromAddress: withoutPrefix(message.From),
        contactName: message.ProfileName,
        bodyText: message.Body,
        messageType: message.NumMedia > 0 ? mediaType(message.MediaContentType0) : 'text',
        messageId: message.MessageSid,
        timestamp: new Date(),
      },
    ];
  }

  validateWebhook(req: SignedRequest): boolean {
    const signature = headerValue(req, 'x-twilio-signature');
    const authToken = this.config.credentials.TWILIO_AUTH_TOKEN;
    const baseUrl = this.config.credentials.WEBHOOK_BASE_URL;

    if (!signature || !authToken || !baseUrl) {
      return false;
    }

    const params = formParamsSchema.safeParse(req.body);
    return twilio.validateRequest(authToken, signature, `${baseUrl}${req.originalUrl}`, params.success ? params.data : {});
  }
}
