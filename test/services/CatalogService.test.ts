import { NotFoundError, ValidationError } from '../../src/domain/common/Errors';
import { CatalogProject, CatalogTask } from '../../src/types';
import { createHarness, TestHarness } from '../harness';
import { T0 } from '../helpers';

describe('CatalogService', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('createProject', () => {
    it('should store a trimmed project and announce it', async () => {
      const created: CatalogProject[] = [];
      harness.container.eventBus.on('catalog:project_created', project => {
        created.push(project);
      });

      const project = await harness.container.catalogService.createProject({
        name: '  Backend Bootcamp ',
        description: 'APIs and databases',
        projectType: 'training'
      });

      expect(project.id).toMatch(/^proj_/);
      expect(project).toMatchObject({
        name: 'Backend Bootcamp',
        description: 'APIs and databases',
        projectType: 'training',
        createdAt: T0
      });
      expect(created).toEqual([project]);
      expect(await harness.container.catalogService.listProjects()).toEqual([project]);
    });

    it('should require a name', async () => {
      await expect(
        harness.container.catalogService.createProject({ name: '  ', description: '', projectType: 'project' })
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('getProject', () => {
    it('should fail for an unknown project', async () => {
      await expect(harness.container.catalogService.getProject('proj_missing')).rejects.toThrow(NotFoundError);
      await expect(harness.container.catalogService.listProjectTasks('proj_missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('createTask', () => {
    it('should store the task, announce it and distribute it', async () => {
      const { catalogService, preferenceService } = harness.container;
      const announced: CatalogTask[] = [];
      harness.container.eventBus.on('catalog:task_created', task => {
        announced.push(task);
      });
      await preferenceService.setPreferences('u1', ['Backend']);
      const project = await catalogService.createProject({ name: 'Backend Bootcamp', description: '', projectType: 'project' });

      const { task, distributedTo } = await catalogService.createTask({
        projectId: project.id,
        title: ' Build API ',
        description: 'Expose a REST endpoint',
        skillType: 'Backend',
        category: 'APIs',
        estimatedTime: 4
      });

      expect(task.id).toMatch(/^task_/);
      expect(task.title).toBe('Build API');
      expect(distributedTo).toEqual(['u1']);
      expect(announced).toEqual([task]);
      expect(await catalogService.listProjectTasks(project.id)).toEqual([task]);
    });

    it('should reject tasks for unknown projects', async () => {
      await expect(harness.container.catalogService.createTask({
        projectId: 'proj_missing',
        title: 'Build API',
        description: '',
        skillType: 'Backend',
        category: null,
        estimatedTime: null
      })).rejects.toThrow(NotFoundError);
    });
  });

  describe('assignProjects', () => {
    it('should replace the list sorted by sequence', async () => {
      const { catalogService } = harness.container;
      const first = await catalogService.createProject({ name: 'First', description: '', projectType: 'project' });
      const second = await catalogService.createProject({ name: 'Second', description: '', projectType: 'project' });

      await catalogService.assignProjects('u1', [{ projectId: first.id, sequence: 1 }]);
      const saved = await catalogService.assignProjects('u1', [
        { projectId: first.id, sequence: 2 },
        { projectId: second.id, sequence: 1 }
      ]);

      expect(saved).toEqual([
        { projectId: second.id, sequence: 1 },
        { projectId: first.id, sequence: 2 }
      ]);
      expect(await catalogService.getAssignedProjects('u1')).toEqual(saved);
    });

    it('should reject repeated and unknown projects', async () => {
      const { catalogService } = harness.container;
      const project = await catalogService.createProject({ name: 'Only', description: '', projectType: 'project' });

      await expect(catalogService.assignProjects('u1', [
        { projectId: project.id, sequence: 1 },
        { projectId: project.id, sequence: 2 }
      ])).rejects.toThrow(ValidationError);
      await expect(catalogService.assignProjects('u1', [
        { projectId: 'proj_missing', sequence: 1 }
      ])).rejects.toThrow(NotFoundError);
    });
  });
});
