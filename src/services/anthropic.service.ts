import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { ServiceError, toError } from '../utils/errors';

export interface CompletionRequest {
  system: string;
  messages: Anthropic.Messages.MessageParam[];
  tools: Anthropic.Messages.Tool[];
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = Number(error.status);
    return Number.isFinite(status) ? status : undefined;
  }
  return undefined;
}

export class AnthropicService {
  private client: Anthropic | null;

  constructor(
    apiKey: string | undefined = env.ANTHROPIC_API_KEY,
    private model: string = env.ANTHROPIC_MODEL
  ) {
    this.client = apiKey ? new Anthropic({ apiKey }) : null;
  }

  /**
   * One model turn. Resolves to null when the model is not configured or keeps
   * failing, so callers can fall back to canned replies.
   */
  async complete(request: CompletionRequest): Promise<Anthropic.Messages.Message | null> {
    if (!this.client) {
      logger.warn('Anthropic not configured, using fallback reply');
      return null;
    }

    const maxRetries = 3;
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.client.messages.create({
          model: this.model,
          system: request.system,
          messages: request.messages,
          tools: request.tools,
          temperature: 0.3,
          max_tokens: 1024,
        });

        logger.debug('Anthropic response generated', {
          attempt,
          stopReason: response.stop_reason,
          tokens: { prompt: response.usage.input_tokens, completion: response.usage.output_tokens },
        });
        return response;
      } catch (error) {
        lastError = toError(error);
        const status = statusOf(error);

        if (status === 429) {
          const delay = Math.pow(2, attempt) * 1000;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        if (status === 400 || status === 401) {
          throw new ServiceError('Anthropic', 'complete', lastError, false);
        }

        logger.error('Anthropic error', { attempt, error: lastError.message });
      }
    }

    logger.error('Anthropic failed after retries, using fallback', { error: lastError?.message });
    return null;
  }
}
