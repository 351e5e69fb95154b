import { AgentService } from './agent.service';
import { InboundMessage, MessageChannel } from '../types/messaging';
import { logger } from '../utils/logger';
import { DeliveryError, errorMessage } from '../utils/errors';

export interface InboundSummary {
  processed: number;
  skipped: number;
  failed: number;
}

/**
 * Feeds normalized inbound messages to the agent and delivers the replies.
 * Only text messages with a body are answered.
 */
export class InboundService {
  constructor(
    private agent: AgentService,
    private channel: MessageChannel,
    private timezone?: string
  ) {}

  async process(messages: InboundMessage[]): Promise<InboundSummary> {
    const summary: InboundSummary = { processed: 0, skipped: 0, failed: 0 };

    for (const message of messages) {
      if (message.messageType !== 'text' || message.bodyText.trim() === '') {
        logger.debug('Skipping non-text inbound message', {
          from: message.fromAddress,
          messageType: message.messageType,
        });
        summary.skipped++;
        continue;
      }

      const reply = await this.agent.handleMessage({
        clientPhone: message.fromAddress,
        clientName: message.contactName,
        message: message.bodyText.trim(),
        timezone: this.timezone,
      });

      try {
        await this.channel.send(message.fromAddress, reply.response);
        summary.processed++;
      } catch (error) {
        summary.failed++;
        if (error instanceof DeliveryError) {
          logger.error('Reply delivery failed', {
            provider: error.provider,
            kind: error.kind,
            to: message.fromAddress,
            error: error.originalError.message,
          });
        } else {
          logger.error('Reply delivery failed', { to: message.fromAddress, error: errorMessage(error) });
        }
      }
    }

    return summary;
  }
}
