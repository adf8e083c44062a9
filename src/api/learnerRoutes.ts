import express, { Request, Response } from 'express';
import { z } from 'zod';
import { PreferenceService } from '../application/services/PreferenceService';
import { CatalogService } from '../application/services/CatalogService';
import { AssignmentService } from '../application/services/AssignmentService';
import { handleError } from './errors';
import {
  validateBody,
  validateParams,
  userIdParamSchema,
  userTaskParamSchema,
  setPreferencesSchema,
  assignProjectsSchema,
  updateAssignmentStatusSchema,
  addCommentSchema
} from './validation';

export interface LearnerRouteServices {
  preferences: PreferenceService;
  catalog: CatalogService;
  assignments: AssignmentService;
}

/**
 * Create per-learner routes: preferences, assigned projects and tasks.
 */
export function createLearnerRoutes({ preferences, catalog, assignments }: LearnerRouteServices) {
  const router = express.Router();

  // Preferences
  router.put(
    '/learners/:userId/preferences',
    validateParams(userIdParamSchema),
    validateBody(setPreferencesSchema),
    async (req: Request, res: Response) => {
      try {
        const body: z.infer<typeof setPreferencesSchema> = req.body;
        const saved = await preferences.setPreferences(req.params.userId, body.preferences);
        res.json(saved);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  router.get('/learners/:userId/preferences', validateParams(userIdParamSchema), async (req: Request, res: Response) => {
    try {
      const list = await preferences.getPreferences(req.params.userId);
      res.json({ userId: req.params.userId, preferences: list });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Assigned projects (replaces the whole list)
  router.put(
    '/learners/:userId/projects',
    validateParams(userIdParamSchema),
    validateBody(assignProjectsSchema),
    async (req: Request, res: Response) => {
      try {
        const body: z.infer<typeof assignProjectsSchema> = req.body;
        const projects = await catalog.assignProjects(req.params.userId, body.projects);
        res.json({ userId: req.params.userId, projects });
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  router.get('/learners/:userId/projects', validateParams(userIdParamSchema), async (req: Request, res: Response) => {
    try {
      const projects = await catalog.getAssignedProjects(req.params.userId);
      res.json({ userId: req.params.userId, projects });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Tasks grouped by status
  router.get('/learners/:userId/tasks', validateParams(userIdParamSchema), async (req: Request, res: Response) => {
    try {
      const board = await assignments.listUserTasks(req.params.userId);
      res.json(board);
    } catch (err) {
      handleError(err, res);
    }
  });

  router.put(
    '/learners/:userId/tasks/:taskId/status',
    validateParams(userTaskParamSchema),
    validateBody(updateAssignmentStatusSchema),
    async (req: Request, res: Response) => {
      try {
        const body: z.infer<typeof updateAssignmentStatusSchema> = req.body;
        const assignment = await assignments.updateStatus(req.params.userId, req.params.taskId, body.status);
        res.json(assignment);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  router.post(
    '/learners/:userId/tasks/:taskId/comments',
    validateParams(userTaskParamSchema),
    validateBody(addCommentSchema),
    async (req: Request, res: Response) => {
      try {
        const body: z.infer<typeof addCommentSchema> = req.body;
        const assignment = await assignments.addComment(
          req.params.userId,
          req.params.taskId,
          body.comment,
          body.commentBy
        );
        res.status(201).json(assignment);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  return router;
}
