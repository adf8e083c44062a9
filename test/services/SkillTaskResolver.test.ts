import { SkillTaskResolver } from '../../src/application/services/SkillTaskResolver';
import { createHarness, seedProject, seedTask, TestHarness } from '../harness';

describe('SkillTaskResolver', () => {
  let harness: TestHarness;
  let resolver: SkillTaskResolver;

  beforeEach(async () => {
    harness = await createHarness();
    const c = harness.container;
    resolver = new SkillTaskResolver(c.taskRepo, c.projectRepo, c.projectAssignmentRepo, c.assignmentRepo, harness.logger);
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('assigned-project tier', () => {
    it('should pick the first match in natural title order', async () => {
      const project = await seedProject(harness.container);
      for (const title of ['Backend Task 10', 'Backend Task 2', 'Backend Task 1']) {
        await seedTask(harness.container, project.id, { title });
      }
      await harness.container.catalogService.assignProjects('u1', [{ projectId: project.id, sequence: 1 }]);

      const resolved = await resolver.resolveNextTask('u1', 'Backend');

      expect(resolved?.task.title).toBe('Backend Task 1');
      expect(resolved?.tier).toBe('assigned_project');
    });

    it('should follow project sequence and skip projects without matches', async () => {
      const later = await seedProject(harness.container, { name: 'Later' });
      const earlier = await seedProject(harness.container, { name: 'Earlier' });
      const frontendOnly = await seedProject(harness.container, { name: 'Styling' });
      await seedTask(harness.container, later.id, { title: 'A later task' });
      await seedTask(harness.container, earlier.id, { title: 'Z earlier task' });
      await seedTask(harness.container, frontendOnly.id, { title: 'Style a page', skillType: 'Frontend' });
      await harness.container.catalogService.assignProjects('u1', [
        { projectId: later.id, sequence: 3 },
        { projectId: earlier.id, sequence: 2 },
        { projectId: frontendOnly.id, sequence: 1 }
      ]);

      const resolved = await resolver.resolveNextTask('u1', 'backend');

      expect(resolved?.task.title).toBe('Z earlier task');
      expect(resolved?.tier).toBe('assigned_project');
    });

    it('should match on category and title substrings', async () => {
      const project = await seedProject(harness.container);
      await seedTask(harness.container, project.id, {
        title: 'Wire the checkout',
        skillType: 'Frontend',
        category: 'Backend APIs'
      });
      await harness.container.catalogService.assignProjects('u1', [{ projectId: project.id, sequence: 1 }]);

      expect((await resolver.resolveNextTask('u1', 'backend'))?.task.title).toBe('Wire the checkout');
      expect((await resolver.resolveNextTask('u1', 'checkout'))?.task.title).toBe('Wire the checkout');
    });

    it('should exclude held tasks by id and by title', async () => {
      const main = await seedProject(harness.container, { name: 'Main' });
      const mirror = await seedProject(harness.container, { name: 'Mirror' });
      const first = await seedTask(harness.container, main.id, { title: 'Backend Task 1' });
      await seedTask(harness.container, main.id, { title: 'Backend Task 2' });
      await seedTask(harness.container, main.id, { title: 'Backend Task 10' });
      const mirrored = await seedTask(harness.container, mirror.id, { title: 'Backend Task 2' });
      await harness.container.catalogService.assignProjects('u1', [{ projectId: main.id, sequence: 1 }]);
      await harness.container.assignmentService.assignActive('u1', first, 'held');
      await harness.container.assignmentService.assignActive('u1', mirrored, 'held elsewhere');

      const resolved = await resolver.resolveNextTask('u1', 'Backend');

      expect(resolved?.task.title).toBe('Backend Task 10');
    });
  });

  describe('keyword-project tier', () => {
    it('should take any task from a project that mentions the skill', async () => {
      await seedProject(harness.container, { name: 'Web Foundations' });
      const bootcamp = await seedProject(harness.container, { name: 'Backend Bootcamp' });
      await seedTask(harness.container, bootcamp.id, { title: 'Style a page', skillType: 'Frontend' });
      await seedTask(harness.container, bootcamp.id, { title: 'Add a form', skillType: 'Frontend' });

      const resolved = await resolver.resolveNextTask('u1', 'Backend');

      expect(resolved?.task.title).toBe('Add a form');
      expect(resolved?.tier).toBe('keyword_project');
    });

    it('should move on to the next mentioning project when one is exhausted', async () => {
      const first = await seedProject(harness.container, { name: 'DevOps Basics' });
      harness.clock.advance(1000);
      const second = await seedProject(harness.container, { name: 'Misc', description: 'Shipping with devops pipelines' });
      const held = await seedTask(harness.container, first.id, { title: 'Write a Dockerfile', skillType: 'Frontend' });
      await seedTask(harness.container, second.id, { title: 'Set up CI', skillType: 'Frontend' });
      await harness.container.assignmentService.assignActive('u1', held, 'held');

      const resolved = await resolver.resolveNextTask('u1', 'DevOps');

      expect(resolved?.task.title).toBe('Set up CI');
      expect(resolved?.tier).toBe('keyword_project');
    });
  });

  describe('global tier', () => {
    it('should search the whole catalog last', async () => {
      const project = await seedProject(harness.container, { name: 'Misc' });
      await seedTask(harness.container, project.id, { title: 'Containerise the app', skillType: 'devops' });

      const resolved = await resolver.resolveNextTask('u1', 'DevOps');

      expect(resolved?.task.title).toBe('Containerise the app');
      expect(resolved?.tier).toBe('global');
    });

    it('should return null when nothing matches', async () => {
      const project = await seedProject(harness.container, { name: 'Misc' });
      await seedTask(harness.container, project.id, { title: 'Build API' });

      expect(await resolver.resolveNextTask('u1', 'Quantum')).toBeNull();
      expect(await resolver.resolveNextTask('u1', '   ')).toBeNull();
    });
  });
});
