import express, { Request, Response } from 'express';
import { EngagementService } from '../application/services/EngagementService';
import { Clock, DAY_MS, systemClock } from '../domain/common/Clock';
import { EngagementState } from '../types';
import { handleError } from './errors';
import {
  validateBody,
  validateParams,
  userIdParamSchema,
  updateBuddyStatusSchema,
  UpdateBuddyStatusInput
} from './validation';

async function applyStatus(
  engagementService: EngagementService,
  userId: string,
  body: UpdateBuddyStatusInput,
  postponeDefaultDays: number,
  clock: Clock
): Promise<EngagementState> {
  switch (body.status) {
    case 'ACTIVE':
      return engagementService.setActive(userId);
    case 'BUSY':
      return engagementService.setBusy(userId);
    case 'POSTPONED':
      return engagementService.setPostponed(
        userId,
        body.nextContactAt ?? clock() + postponeDefaultDays * DAY_MS
      );
  }
}

/**
 * Create engagement routes using the EngagementService.
 */
export function createEngagementRoutes(
  engagementService: EngagementService,
  postponeDefaultDays: number,
  clock: Clock = systemClock
) {
  const router = express.Router();

  // Effective state (an expired postponement reads, and is stored, as ACTIVE)
  router.get('/engagement/:userId', validateParams(userIdParamSchema), async (req: Request, res: Response) => {
    try {
      const state = await engagementService.loadCurrent(req.params.userId);
      res.json(state);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Admin override of buddy status
  router.put(
    '/engagement/:userId/status',
    validateParams(userIdParamSchema),
    validateBody(updateBuddyStatusSchema),
    async (req: Request, res: Response) => {
      try {
        const state = await applyStatus(engagementService, req.params.userId, req.body, postponeDefaultDays, clock);
        res.json(state);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  return router;
}
