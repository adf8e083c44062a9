import { AssignmentComment, NewTaskAssignment, TaskAssignment, UserAssignments } from '../../types';
import { IAssignmentRepository, UpdateAssignmentInput } from '../../domain/repositories/IAssignmentRepository';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { NotFoundError } from '../../domain/common/Errors';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of IAssignmentRepository.
 * Stores one document per user holding the ordered assignment list.
 */
export class FileSystemAssignmentRepository implements IAssignmentRepository {
  private store: JsonDocumentStore<UserAssignments>;

  constructor(
    dataDir: string,
    private logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.store = new JsonDocumentStore<UserAssignments>(dataDir, 'assignments', doc => doc.userId, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async findByUser(userId: string): Promise<UserAssignments | null> {
    return this.store.get(userId);
  }

  async addTasks(userId: string, tasks: NewTaskAssignment[]): Promise<TaskAssignment[]> {
    if (tasks.length === 0) return [];
    const now = this.clock();
    let added: TaskAssignment[] = [];

    await this.store.update(userId, current => {
      const doc: UserAssignments = current ?? { userId, tasks: [], createdAt: now, updatedAt: now };
      added = this.numberNew(doc, tasks, now);
      return added.length > 0 ? { ...doc, tasks: [...doc.tasks, ...added], updatedAt: now } : doc;
    });

    if (added.length > 0) {
      this.logger.debug(`Assigned ${added.length} task(s) to user: ${userId}`);
    }
    return added;
  }

  /**
   * Drop tasks the user already holds and continue the sequence after the highest one.
   */
  private numberNew(doc: UserAssignments, tasks: NewTaskAssignment[], now: number): TaskAssignment[] {
    const taken = new Set(doc.tasks.map(t => t.taskId));
    let sequence = doc.tasks.reduce((max, t) => Math.max(max, t.sequence), 0);
    const added: TaskAssignment[] = [];

    for (const task of tasks) {
      if (taken.has(task.taskId)) {
        this.logger.debug(`Skipping duplicate assignment: ${doc.userId}/${task.taskId}`);
        continue;
      }
      taken.add(task.taskId);
      sequence += 1;
      added.push({ ...task, sequence, assignedAt: now });
    }
    return added;
  }

  async updateTask(
    userId: string,
    taskId: string,
    updates: UpdateAssignmentInput | ((task: TaskAssignment) => UpdateAssignmentInput)
  ): Promise<TaskAssignment> {
    return this.modify(userId, taskId, task => ({
      ...task,
      ...(typeof updates === 'function' ? updates(task) : updates)
    }));
  }

  async addComment(userId: string, taskId: string, comment: AssignmentComment): Promise<TaskAssignment> {
    return this.modify(userId, taskId, task => ({ ...task, comments: [...task.comments, comment] }));
  }

  private async modify(
    userId: string,
    taskId: string,
    change: (task: TaskAssignment) => TaskAssignment
  ): Promise<TaskAssignment> {
    const { doc } = await this.store.update(userId, current => {
      const task = current?.tasks.find(t => t.taskId === taskId);
      if (!current || !task) {
        throw new NotFoundError('Task assignment', `${userId}/${taskId}`);
      }
      const updated = change(task);
      return {
        ...current,
        tasks: current.tasks.map(t => (t.taskId === taskId ? updated : t)),
        updatedAt: this.clock()
      };
    });

    const updated = doc.tasks.find(t => t.taskId === taskId);
    if (!updated) {
      throw new NotFoundError('Task assignment', `${userId}/${taskId}`);
    }
    return updated;
  }
}
