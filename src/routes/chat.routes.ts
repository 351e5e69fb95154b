import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AgentService } from '../services/agent.service';
import { ValidationError } from '../utils/errors';

const chatMessageSchema = z.object({
  client_phone: z.string().min(1),
  client_name: z.string().min(1).optional(),
  message: z.string().min(1).max(5000),
  timezone: z.string().optional(),
});

export function createChatRouter(agent: AgentService): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
      }

      const result = await agent.handleMessage({
        clientPhone: parsed.data.client_phone,
        clientName: parsed.data.client_name,
        message: parsed.data.message,
        timezone: parsed.data.timezone,
      });

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/conversation/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await agent.resetConversation(req.params.phone);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
