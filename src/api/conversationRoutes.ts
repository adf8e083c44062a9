import express, { Request, Response } from 'express';
import { z } from 'zod';
import { ConversationOrchestrator } from '../application/conversation/ConversationOrchestrator';
import { handleError } from './errors';
import {
  validateBody,
  validateParams,
  validateQuery,
  conversationMessageSchema,
  proactiveCheckSchema,
  transcriptQuerySchema,
  userIdParamSchema
} from './validation';

/**
 * Create conversation routes using the ConversationOrchestrator.
 *
 * Turn endpoints always answer 200: a failed turn is already converted to
 * an apology with `status: "error"`.
 */
export function createConversationRoutes(orchestrator: ConversationOrchestrator) {
  const router = express.Router();

  // One inbound message (or a proactive check when `message` is absent)
  router.post('/conversation/messages', validateBody(conversationMessageSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof conversationMessageSchema> = req.body;
      const response = await orchestrator.handleTurn(input);
      res.json(response);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Channel-triggered re-engagement check
  router.post('/conversation/proactive', validateBody(proactiveCheckSchema), async (req: Request, res: Response) => {
    try {
      const { userId }: z.infer<typeof proactiveCheckSchema> = req.body;
      const response = await orchestrator.runProactiveCheck(userId);
      res.json(response);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Transcript
  router.get(
    '/conversation/:userId/transcript',
    validateParams(userIdParamSchema),
    validateQuery(transcriptQuerySchema),
    async (req: Request, res: Response) => {
      try {
        const { limit } = transcriptQuerySchema.parse(req.query);
        const turns = await orchestrator.getTranscript(req.params.userId, limit);
        res.json({ userId: req.params.userId, turns });
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  return router;
}
