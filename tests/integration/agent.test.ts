jest.mock('../../src/config/env', () => ({
  env: {
    PORT: '3000',
    NODE_ENV: 'test',
    ANTHROPIC_API_KEY: 'test-key',
    ANTHROPIC_MODEL: 'claude-test',
    DEFAULT_TIMEZONE: 'UTC',
    BUSINESS_HOURS_START: 9,
    BUSINESS_HOURS_END: 17,
    WEBHOOK_BASE_URL: 'http://localhost:3000',
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('../../src/config/redis', () => ({
  redis: {
    get: jest.fn().mockResolvedValue(null),
    set: jest.fn().mockResolvedValue('OK'),
    del: jest.fn().mockResolvedValue(1),
    isOpen: false,
  },
  connectRedis: jest.fn().mockResolvedValue(undefined),
  checkRedisHealth: jest.fn().mockResolvedValue({ status: 'disabled' }),
}));

const mockCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: mockCreate },
  })),
}));

import { AgentService, AGENT_APOLOGY, MAX_TOOL_ROUNDS, fallbackReply } from '../../src/services/agent.service';
import { AnthropicService } from '../../src/services/anthropic.service';
import { BookingService } from '../../src/services/booking.service';
import { BookingLedger } from '../../src/services/booking.ledger';
import { InboundService } from '../../src/services/inbound.service';
import { TimeExpressionResolver } from '../../src/services/datetime/timeExpression.resolver';
import { InboundMessage, MessageChannel, MessageDelivery } from '../../src/types/messaging';
import { DeliveryError } from '../../src/utils/errors';

const NOW = new Date('2024-01-15T10:00:00Z'); // Monday
const PHONE = '+573001112233';
const usage = { input_tokens: 40, output_tokens: 12 };

function textReply(text: string) {
  return { content: [{ type: 'text', text }], stop_reason: 'end_turn', usage };
}

function toolCall(id: string, name: string, input: Record<string, unknown>, text?: string) {
  const content: Record<string, unknown>[] = text ? [{ type: 'text', text }] : [];
  content.push({ type: 'tool_use', id, name, input });
  return { content, stop_reason: 'tool_use', usage };
}

function makeBookings(): BookingService {
  return new BookingService({
    resolver: new TimeExpressionResolver(),
    ledger: new BookingLedger({ generateId: () => 'BK_TEST', clock: () => NOW }),
    businessHours: { startHour: 9, endHour: 17 },
    defaultTimeZone: 'UTC',
    clock: () => NOW,
  });
}

describe('Agent Integration', () => {
  let bookings: BookingService;
  let agent: AgentService;

  beforeEach(() => {
    mockCreate.mockReset();
    bookings = makeBookings();
    agent = new AgentService({ bookings });
  });

  it('books a class through the make_booking tool', async () => {
    mockCreate
      .mockResolvedValueOnce(
        toolCall('tu_1', 'make_booking', { date: 'tomorrow', time: '3pm', class_type: 'Yoga' }, 'Let me book that.')
      )
      .mockResolvedValueOnce(textReply('Done! Your booking ID is BK_TEST.'));

    const result = await agent.handleMessage({ clientPhone: PHONE, clientName: 'Ana', message: 'Yoga tomorrow at 3pm please' });

    expect(result).toEqual({
      success: true,
      clientPhone: PHONE,
      response: 'Done! Your booking ID is BK_TEST.',
      toolsUsed: ['make_booking'],
      fallback: false,
    });
    expect(bookings.listBookings(PHONE)).toMatchObject([
      { bookingId: 'BK_TEST', clientName: 'Ana', date: '2024-01-16', time: '15:00', classType: 'Yoga' },
    ]);

    const followUp = mockCreate.mock.calls[1][0];
    const [toolResult] = followUp.messages[2].content;
    expect(followUp.messages[2].role).toBe('user');
    expect(toolResult).toMatchObject({ type: 'tool_result', tool_use_id: 'tu_1', is_error: false });
    expect(JSON.parse(toolResult.content)).toEqual({
      success: true,
      booking_id: 'BK_TEST',
      date: '2024-01-16',
      time: '15:00',
      class_type: 'Yoga',
      duration_minutes: 60,
      instructor: 'Available Staff',
      calendar_link: null,
      warning: null,
      confirmation: 'Your Yoga class is confirmed for 2024-01-16 at 15:00',
    });
  });

  it('builds the system prompt from the studio and client', async () => {
    mockCreate.mockResolvedValueOnce(textReply('Hola Ana!'));

    await agent.handleMessage({ clientPhone: PHONE, clientName: 'Ana', message: 'hola' });

    const { system, model, tools } = mockCreate.mock.calls[0][0];
    expect(model).toBe('claude-test');
    expect(system).toContain('Today is Monday 2024-01-15 (UTC)');
    expect(system).toContain('Business hours: 09:00 to 17:00');
    expect(system).toContain('- Pilates (45 minutes)');
    expect(system).toContain(`CLIENT:\nPhone: ${PHONE}\nName: Ana`);
    expect(tools.map((tool: { name: string }) => tool.name)).toEqual([
      'check_availability',
      'make_booking',
      'cancel_booking',
      'view_bookings',
      'parse_date_time',
    ]);
  });

  it('replays cached history on the next message', async () => {
    mockCreate.mockResolvedValueOnce(textReply('Hi! How can I help?')).mockResolvedValueOnce(textReply('Sure.'));

    await agent.handleMessage({ clientPhone: PHONE, message: 'hello' });
    await agent.handleMessage({ clientPhone: PHONE, message: 'what classes do you have?' });

    expect(mockCreate.mock.calls[1][0].messages).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Hi! How can I help?' },
      { role: 'user', content: 'what classes do you have?' },
    ]);
  });

  it('reports invalid tool input back to the model', async () => {
    mockCreate
      .mockResolvedValueOnce(toolCall('tu_2', 'make_booking', { date: 'tomorrow' }))
      .mockResolvedValueOnce(textReply('Which class and time?'));

    await agent.handleMessage({ clientPhone: PHONE, message: 'book me tomorrow' });

    const [toolResult] = mockCreate.mock.calls[1][0].messages[2].content;
    expect(toolResult.is_error).toBe(true);
    expect(JSON.parse(toolResult.content)).toEqual({
      success: false,
      error: 'Invalid input for make_booking: time, class_type',
    });
    expect(bookings.listBookings(PHONE)).toEqual([]);
  });

  it('passes date suggestions through when a phrase cannot be read', async () => {
    mockCreate
      .mockResolvedValueOnce(toolCall('tu_3', 'parse_date_time', { user_input: 'blorp' }))
      .mockResolvedValueOnce(textReply('Could you rephrase the date?'));

    await agent.handleMessage({ clientPhone: PHONE, message: 'blorp' });

    const [toolResult] = mockCreate.mock.calls[1][0].messages[2].content;
    expect(JSON.parse(toolResult.content)).toEqual({
      success: false,
      error: 'Sorry, I couldn\'t understand the date or time "blorp", could you try something like "tomorrow at 2pm"?',
      suggestions: ['tomorrow at 2pm', 'next friday at 8pm', '2024-01-16 15:00', 'in 2 days at 3pm', 'mañana a las 3pm'],
      reference_date: '2024-01-15 (Monday) UTC',
    });
  });

  it('stops after the tool round limit', async () => {
    mockCreate.mockResolvedValue(toolCall('tu_loop', 'view_bookings', {}));

    const result = await agent.handleMessage({ clientPhone: PHONE, message: 'show my bookings' });

    expect(mockCreate).toHaveBeenCalledTimes(MAX_TOOL_ROUNDS + 1);
    expect(result.toolsUsed).toEqual(Array(MAX_TOOL_ROUNDS).fill('view_bookings'));
    expect(result.response).toBe(AGENT_APOLOGY);
    expect(result.success).toBe(true);
  });

  it('falls back to a keyword reply when the model keeps failing', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('overloaded'), { status: 500 }));

    const result = await agent.handleMessage({ clientPhone: PHONE, message: 'Quiero reservar una clase' });

    expect(mockCreate).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({
      success: true,
      fallback: true,
      response: "I'd be happy to book a class for you! Which class would you like, and what day and time work best?",
    });
  });

  it('apologizes when the model rejects the request', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('invalid x-api-key'), { status: 401 }));

    const result = await agent.handleMessage({ clientPhone: PHONE, message: 'hola' });

    expect(result).toEqual({
      success: false,
      clientPhone: PHONE,
      response: AGENT_APOLOGY,
      toolsUsed: [],
      fallback: true,
    });
  });

  it('uses the fallback without an API key', async () => {
    const offline = new AgentService({ bookings, anthropic: new AnthropicService('') });

    const result = await offline.handleMessage({ clientPhone: PHONE, message: 'can I cancel my class?' });

    expect(mockCreate).not.toHaveBeenCalled();
    expect(result.response).toBe(
      'I can help you cancel a booking. Please share your booking ID, or the date and time of your class.'
    );
  });
});

describe('fallbackReply', () => {
  it('matches Spanish and English keywords', () => {
    expect(fallbackReply('¿Qué horarios hay disponibles?')).toBe('I can check open slots for you. Which day are you interested in?');
    expect(fallbackReply('hello')).toBe(
      'Thanks for reaching out! I can book, check or cancel classes for you. What would you like to do?'
    );
  });
});

describe('InboundService', () => {
  function inbound(overrides: Partial<InboundMessage> = {}): InboundMessage {
    return {
      fromAddress: PHONE,
      contactName: 'Ana',
      bodyText: 'hola, quiero reservar',
      messageType: 'text',
      messageId: 'wamid.1',
      timestamp: NOW,
      ...overrides,
    };
  }

  function makeChannel(send: jest.Mock<Promise<MessageDelivery>, [string, string]>): MessageChannel {
    return { provider: 'whatsapp', send };
  }

  const offlineAgent = () => new AgentService({ bookings: makeBookings(), anthropic: new AnthropicService('') });

  it('answers text messages and skips the rest', async () => {
    const send = jest.fn<Promise<MessageDelivery>, [string, string]>().mockResolvedValue({ deliveryId: 'wamid.out' });
    const service = new InboundService(offlineAgent(), makeChannel(send));

    const summary = await service.process([
      inbound(),
      inbound({ messageType: 'image', bodyText: '' }),
      inbound({ bodyText: '   ' }),
    ]);

    expect(summary).toEqual({ processed: 1, skipped: 2, failed: 0 });
    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(
      PHONE,
      "I'd be happy to book a class for you! Which class would you like, and what day and time work best?"
    );
  });

  it('counts delivery failures without throwing', async () => {
    const send = jest
      .fn<Promise<MessageDelivery>, [string, string]>()
      .mockRejectedValue(new DeliveryError('whatsapp', 'rejected', new Error('bad number')));
    const service = new InboundService(offlineAgent(), makeChannel(send));

    const summary = await service.process([inbound()]);

    expect(summary).toEqual({ processed: 0, skipped: 0, failed: 1 });
  });
});
