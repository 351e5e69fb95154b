import { IncomingHttpHeaders } from 'http';

export interface MessageDelivery {
  deliveryId: string;
}

export interface MessageChannel {
  readonly provider: string;
  send(toAddress: string, bodyText: string): Promise<MessageDelivery>;
}

export type InboundMessageType = 'text' | 'image' | 'audio' | 'video' | 'document' | 'location' | 'sticker' | 'interactive' | 'unknown';

export interface InboundMessage {
  fromAddress: string;
  contactName?: string;
  bodyText: string;
  messageType: InboundMessageType;
  messageId: string;
  timestamp: Date;
}

/** The parts of an HTTP request a webhook signature check reads. */
export interface SignedRequest {
  headers: IncomingHttpHeaders;
  body: unknown;
  originalUrl: string;
  rawBody?: Buffer;
}
