import { FileSystemAssignmentRepository } from '../../src/infrastructure/repositories/FileSystemAssignmentRepository';
import { FileSystemChatRepository } from '../../src/infrastructure/repositories/FileSystemChatRepository';
import { FileSystemPreferenceRepository } from '../../src/infrastructure/repositories/FileSystemPreferenceRepository';
import { FileSystemProjectAssignmentRepository } from '../../src/infrastructure/repositories/FileSystemProjectAssignmentRepository';
import { NotFoundError } from '../../src/domain/common/Errors';
import { NewTaskAssignment } from '../../src/types';
import { TestDataDir, RecordingLogger, ManualClock, T0 } from '../helpers';

function newAssignment(taskId: string): NewTaskAssignment {
  return {
    taskId,
    assignedBy: 'admin',
    status: 'pending',
    expectedCompletionDate: null,
    completionDate: null,
    comments: []
  };
}

describe('FileSystem repositories', () => {
  let testDataDir: TestDataDir;
  let logger: RecordingLogger;
  let clock: ManualClock;

  beforeEach(() => {
    testDataDir = new TestDataDir();
    logger = new RecordingLogger();
    clock = new ManualClock();
  });

  afterEach(async () => {
    await testDataDir.cleanup();
  });

  describe('FileSystemAssignmentRepository', () => {
    let repo: FileSystemAssignmentRepository;

    beforeEach(async () => {
      repo = new FileSystemAssignmentRepository(testDataDir.getPath(), logger, clock.clock);
      await repo.initialize();
    });

    it('should number new assignments after the existing ones', async () => {
      await repo.addTasks('u1', [newAssignment('t1'), newAssignment('t2')]);
      clock.advance(1000);

      const added = await repo.addTasks('u1', [newAssignment('t3')]);

      expect(added).toEqual([{ ...newAssignment('t3'), sequence: 3, assignedAt: T0 + 1000 }]);
    });

    it('should skip tasks the user already holds', async () => {
      await repo.addTasks('u1', [newAssignment('t1')]);

      const added = await repo.addTasks('u1', [newAssignment('t1'), newAssignment('t2'), newAssignment('t2')]);

      expect(added.map(a => [a.taskId, a.sequence])).toEqual([['t2', 2]]);
      expect((await repo.findByUser('u1'))?.tasks).toHaveLength(2);
    });

    it('should update and comment on a held task', async () => {
      await repo.addTasks('u1', [newAssignment('t1')]);

      await repo.updateTask('u1', 't1', { status: 'active' });
      const updated = await repo.addComment('u1', 't1', { comment: 'On it', commentBy: 'user', createdAt: T0 });

      expect(updated.status).toBe('active');
      expect(updated.comments).toEqual([{ comment: 'On it', commentBy: 'user', createdAt: T0 }]);
    });

    it('should keep every assignment added concurrently', async () => {
      await Promise.all([repo.addTasks('u1', [newAssignment('t1')]), repo.addTasks('u1', [newAssignment('t2')])]);

      const stored = (await repo.findByUser('u1'))?.tasks ?? [];

      expect(stored.map(t => [t.taskId, t.sequence])).toEqual([
        ['t1', 1],
        ['t2', 2]
      ]);
    });

    it('should keep a comment added while the status changes', async () => {
      await repo.addTasks('u1', [newAssignment('t1')]);

      await Promise.all([
        repo.updateTask('u1', 't1', { status: 'active' }),
        repo.addComment('u1', 't1', { comment: 'Started', commentBy: 'user', createdAt: T0 })
      ]);

      const [task] = (await repo.findByUser('u1'))?.tasks ?? [];
      expect(task.status).toBe('active');
      expect(task.comments).toHaveLength(1);
    });

    it('should fail to update a task the user does not hold', async () => {
      await expect(repo.updateTask('u1', 'ghost', { status: 'active' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('FileSystemChatRepository', () => {
    it('should return the most recent turns in order', async () => {
      const repo = new FileSystemChatRepository(testDataDir.getPath(), logger);
      for (let i = 1; i <= 4; i++) {
        await repo.append('u1', { id: `turn_${i}`, role: i % 2 ? 'user' : 'assistant', text: `m${i}`, timestamp: T0 + i });
      }

      expect((await repo.recent('u1', 2)).map(t => t.text)).toEqual(['m3', 'm4']);
      expect(await repo.recent('u1', 0)).toEqual([]);
      expect(await repo.recent('ghost', 5)).toEqual([]);
      expect((await repo.findByUser('u1'))?.createdAt).toBe(T0 + 1);
    });

    it('should keep turns appended concurrently', async () => {
      const repo = new FileSystemChatRepository(testDataDir.getPath(), logger);

      await Promise.all([
        repo.append('u1', { id: 'turn_1', role: 'user', text: 'hello', timestamp: T0 }),
        repo.append('u1', { id: 'turn_2', role: 'assistant', text: 'hi there', timestamp: T0 + 1 })
      ]);

      expect((await repo.recent('u1', 10)).map(t => t.id)).toEqual(['turn_1', 'turn_2']);
    });
  });

  describe('FileSystemPreferenceRepository', () => {
    it('should find users by any skill, ignoring case', async () => {
      const repo = new FileSystemPreferenceRepository(testDataDir.getPath(), logger, clock.clock);
      await repo.save('u1', ['Backend']);
      await repo.save('u2', ['Frontend']);
      await repo.save('u3', ['All']);

      const found = await repo.findByAnySkill(['all', 'BACKEND']);

      expect(found.map(p => p.userId).sort()).toEqual(['u1', 'u3']);
    });
  });

  describe('FileSystemProjectAssignmentRepository', () => {
    it('should keep projects ordered by sequence', async () => {
      const repo = new FileSystemProjectAssignmentRepository(testDataDir.getPath(), logger, clock.clock);

      await repo.replace('u1', [
        { projectId: 'p2', sequence: 2 },
        { projectId: 'p1', sequence: 1 }
      ]);

      expect(await repo.findByUser('u1')).toEqual([
        { projectId: 'p1', sequence: 1 },
        { projectId: 'p2', sequence: 2 }
      ]);
      expect(await repo.findByUser('u2')).toEqual([]);
    });
  });
});
