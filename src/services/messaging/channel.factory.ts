import { ChannelConfig, MessagingAdapter } from './channel.adapter';
import { WhatsAppCloudAdapter } from './whatsapp.adapter';
import { TwilioWhatsAppAdapter } from './twilio.adapter';

export class ChannelFactory {
  static create(config: ChannelConfig): MessagingAdapter {
    switch (config.provider) {
      case 'whatsapp':
        return new WhatsAppCloudAdapter(config);
      case 'twilio':
        return new TwilioWhatsAppAdapter(config);
      default:
        throw new Error(`Unsupported message provider: ${String(config.provider)}`);
    }
  }
}
