import { z } from 'zod';
import { redis } from '../config/redis';
import { AgentTurn } from '../types/agent';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const CACHE_TTL = 86400; // 24 hours
const KEY_PREFIX = 'conv:';
export const MAX_HISTORY_TURNS = 20;

const historySchema = z.array(
  z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
  })
);

/**
 * Recent conversation turns per client phone. Lives in Redis when it is
 * connected, otherwise in process memory. Read/write failures degrade to an
 * empty history.
 */
export class ConversationCache {
  private memory = new Map<string, AgentTurn[]>();

  async getHistory(clientPhone: string): Promise<AgentTurn[]> {
    if (!redis.isOpen) {
      return [...(this.memory.get(clientPhone) ?? [])];
    }

    try {
      const data = await redis.get(`${KEY_PREFIX}${clientPhone}`);
      if (!data) return [];

      const parsed = historySchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data : [];
    } catch (error) {
      logger.warn('Cache get failed', { clientPhone, error: errorMessage(error) });
      return [];
    }
  }

  async appendTurns(clientPhone: string, turns: AgentTurn[]): Promise<void> {
    const history = [...(await this.getHistory(clientPhone)), ...turns].slice(-MAX_HISTORY_TURNS);

    if (!redis.isOpen) {
      this.memory.set(clientPhone, history);
      return;
    }

    try {
      await redis.set(`${KEY_PREFIX}${clientPhone}`, JSON.stringify(history), { EX: CACHE_TTL });
    } catch (error) {
      logger.warn('Cache set failed', { clientPhone, error: errorMessage(error) });
    }
  }

  async clear(clientPhone: string): Promise<void> {
    this.memory.delete(clientPhone);
    if (!redis.isOpen) return;

    try {
      await redis.del(`${KEY_PREFIX}${clientPhone}`);
    } catch (error) {
      logger.warn('Cache invalidate failed', { clientPhone, error: errorMessage(error) });
    }
  }
}
