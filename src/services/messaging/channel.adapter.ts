import { InboundMessage, MessageChannel, SignedRequest } from '../../types/messaging';

export interface MessagingAdapter extends MessageChannel {
  handleInbound(payload: unknown): InboundMessage[];
  validateWebhook(req: SignedRequest): boolean;
}

export type MessageProvider = 'whatsapp' | 'twilio';

export interface ChannelConfig {
  provider: MessageProvider;
  credentials: Record<string, string | undefined>;
}

export function headerValue(req: SignedRequest, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
