import express, { Request, Response } from 'express';
import { z } from 'zod';
import { CatalogService } from '../application/services/CatalogService';
import { handleError } from './errors';
import {
  validateBody,
  validateParams,
  idParamSchema,
  createProjectSchema,
  createTaskSchema
} from './validation';

/**
 * Create catalog routes using the CatalogService.
 */
export function createCatalogRoutes(catalogService: CatalogService) {
  const router = express.Router();

  // List projects
  router.get('/projects', async (req: Request, res: Response) => {
    try {
      const projects = await catalogService.listProjects();
      res.json(projects);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Create project
  router.post('/projects', validateBody(createProjectSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof createProjectSchema> = req.body;
      const project = await catalogService.createProject(input);
      res.status(201).json(project);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Tasks of a project
  router.get('/projects/:id/tasks', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const tasks = await catalogService.listProjectTasks(req.params.id);
      res.json(tasks);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Create task (distributed to learners whose preferences match)
  router.post('/tasks', validateBody(createTaskSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof createTaskSchema> = req.body;
      const created = await catalogService.createTask(input);
      res.status(201).json(created);
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
