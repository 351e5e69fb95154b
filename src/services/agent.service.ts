import Anthropic from '@anthropic-ai/sdk';
import { DateTime } from 'luxon';
import { AnthropicService } from './anthropic.service';
import { AgentToolkit, TOOL_DEFINITIONS, ToolSession } from './agent.tools';
import { BookingService } from './booking.service';
import { ConversationCache } from './cache.service';
import { AgentResponse, IncomingChat } from '../types/agent';
import { buildSystemPrompt } from '../utils/prompts';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const MAX_TOOL_ROUNDS = 5;
export const AGENT_APOLOGY =
  "I apologize, but I'm having trouble processing your request right now. Please try again or contact our staff directly.";

type ToolUseBlock = Anthropic.Messages.ToolUseBlock;

export interface AgentDependencies {
  bookings: BookingService;
  anthropic?: AnthropicService;
  cache?: ConversationCache;
}

interface ConversationOutcome {
  reply: string;
  toolsUsed: string[];
  fallback: boolean;
}

/** Canned reply used when the model is unavailable. */
export function fallbackReply(message: string): string {
  const text = message.toLowerCase();

  if (text.includes('cancel')) {
    return 'I can help you cancel a booking. Please share your booking ID, or the date and time of your class.';
  }

  if (text.includes('disponib') || text.includes('available') || text.includes('horario') || text.includes('schedule')) {
    return 'I can check open slots for you. Which day are you interested in?';
  }

  if (text.includes('book') || text.includes('reserv') || text.includes('agendar') || text.includes('clase') || text.includes('class')) {
    return "I'd be happy to book a class for you! Which class would you like, and what day and time work best?";
  }

  return 'Thanks for reaching out! I can book, check or cancel classes for you. What would you like to do?';
}

function isToolUse(block: Anthropic.Messages.ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

function textOf(content: Anthropic.Messages.ContentBlock[]): string {
  return content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('\n')
    .trim();
}

export class AgentService {
  private bookings: BookingService;
  private anthropic: AnthropicService;
  private cache: ConversationCache;
  private toolkit: AgentToolkit;

  constructor(deps: AgentDependencies) {
    this.bookings = deps.bookings;
    this.anthropic = deps.anthropic ?? new AnthropicService();
    this.cache = deps.cache ?? new ConversationCache();
    this.toolkit = new AgentToolkit(deps.bookings);
  }

  async handleMessage(incoming: IncomingChat): Promise<AgentResponse> {
    const { clientPhone, clientName, message } = incoming;
    const timezone = incoming.timezone ?? this.bookings.timeZone;

    try {
      const history = await this.cache.getHistory(clientPhone);
      const today = DateTime.fromJSDate(this.bookings.now(), { zone: timezone }).setLocale('en');
      const system = buildSystemPrompt(
        {
          today: today.toFormat('yyyy-MM-dd'),
          weekday: today.toFormat('cccc'),
          timeZoneName: timezone,
          businessHours: this.bookings.businessHours,
        },
        { phone: clientPhone, name: clientName }
      );

      const messages: Anthropic.Messages.MessageParam[] = [
        ...history.map((turn) => ({ role: turn.role, content: turn.content })),
        { role: 'user', content: message },
      ];

      const outcome = await this.converse(system, messages, message, { clientPhone, clientName, timezone: incoming.timezone });

      await this.cache.appendTurns(clientPhone, [
        { role: 'user', content: message },
        { role: 'assistant', content: outcome.reply },
      ]);

      logger.info('Message handled', {
        clientPhone,
        toolsUsed: outcome.toolsUsed,
        fallback: outcome.fallback,
      });

      return {
        success: true,
        clientPhone,
        response: outcome.reply,
        toolsUsed: outcome.toolsUsed,
        fallback: outcome.fallback,
      };
    } catch (error) {
      logger.error('Failed to handle message', { clientPhone, error: errorMessage(error) });

      return {
        success: false,
        clientPhone,
        response: AGENT_APOLOGY,
        toolsUsed: [],
        fallback: true,
      };
    }
  }

  async resetConversation(clientPhone: string): Promise<void> {
    await this.cache.clear(clientPhone);
  }

  private async converse(
    system: string,
    messages: Anthropic.Messages.MessageParam[],
    userMessage: string,
    session: ToolSession
  ): Promise<ConversationOutcome> {
    const toolsUsed: string[] = [];

    for (let round = 0; ; round++) {
      const response = await this.anthropic.complete({ system, messages, tools: TOOL_DEFINITIONS });
      if (!response) {
        return { reply: fallbackReply(userMessage), toolsUsed, fallback: true };
      }

      const text = textOf(response.content);
      const toolCalls = response.content.filter(isToolUse);

      if (toolCalls.length === 0 || response.stop_reason !== 'tool_use') {
        return { reply: text || AGENT_APOLOGY, toolsUsed, fallback: false };
      }

      if (round >= MAX_TOOL_ROUNDS) {
        logger.warn('Tool round limit reached', { rounds: round, pending: toolCalls.map((call) => call.name) });
        return { reply: text || AGENT_APOLOGY, toolsUsed, fallback: false };
      }

      messages.push({ role: 'assistant', content: response.content });

      const results: Anthropic.Messages.ToolResultBlockParam[] = [];
      for (const call of toolCalls) {
        toolsUsed.push(call.name);
        const outcome = await this.toolkit.execute(call.name, call.input, session);
        logger.debug('Tool executed', { tool: call.name, isError: outcome.isError });
        results.push({
          type: 'tool_result',
          tool_use_id: call.id,
          content: outcome.content,
          is_error: outcome.isError,
        });
      }

      messages.push({ role: 'user', content: results });
    }
  }
}
