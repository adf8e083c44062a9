import {
  AssignedBy,
  AssignmentStatus,
  CatalogTask,
  EnrichedTask,
  NewTaskAssignment,
  TaskAssignment,
  UserTaskBoard,
  UserTaskView
} from '../../types';
import { IAssignmentRepository } from '../../domain/repositories/IAssignmentRepository';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, DAY_MS, systemClock, toDateString } from '../../domain/common/Clock';
import { BusinessRuleError, NotFoundError, ValidationError } from '../../domain/common/Errors';

const STATUS_RANK: Record<AssignmentStatus, number> = {
  pending: 0,
  active: 1,
  completed: 2
};

export const EXPECTED_COMPLETION_DAYS = 3;

/**
 * Application service for a learner's task assignments.
 */
export class AssignmentService {
  constructor(
    private assignmentRepo: IAssignmentRepository,
    private taskRepo: ITaskRepository,
    private projectRepo: IProjectRepository,
    private eventBus: IEventBus,
    private logger: ILogger,
    private clock: Clock = systemClock
  ) {}

  /**
   * Store validated recommendations as pending assignments.
   */
  async assignRecommended(userId: string, tasks: EnrichedTask[]): Promise<TaskAssignment[]> {
    const now = this.clock();
    return this.add(userId, tasks.map((task): NewTaskAssignment => ({
      taskId: task.taskId,
      assignedBy: 'admin',
      status: 'pending',
      expectedCompletionDate: null,
      completionDate: null,
      comments: [{ comment: 'Recommended by your learning coach', commentBy: 'admin', createdAt: now }]
    })));
  }

  /**
   * Assign a single task as active, due a few days from now.
   * @returns The stored assignment, or null if the user already holds the task
   */
  async assignActive(userId: string, task: CatalogTask, comment: string): Promise<TaskAssignment | null> {
    const now = this.clock();
    const [added] = await this.add(userId, [{
      taskId: task.id,
      assignedBy: 'admin',
      status: 'active',
      expectedCompletionDate: toDateString(now + EXPECTED_COMPLETION_DAYS * DAY_MS),
      completionDate: null,
      comments: [{ comment, commentBy: 'admin', createdAt: now }]
    }]);
    return added ?? null;
  }

  private async add(userId: string, tasks: NewTaskAssignment[]): Promise<TaskAssignment[]> {
    if (tasks.length === 0) return [];

    const added = await this.assignmentRepo.addTasks(userId, tasks);
    if (added.length > 0) {
      await this.eventBus.emit('assignment:created', { userId, assignments: added });
      this.logger.info(`Assigned ${added.length} task(s)`, { userId, taskIds: added.map(a => a.taskId) });
    }
    return added;
  }

  /**
   * Tasks grouped by status, each group in sequence order.
   */
  async listUserTasks(userId: string): Promise<UserTaskBoard> {
    const views = await this.loadViews(userId);
    const active = views.filter(v => v.status === 'active');
    const pending = views.filter(v => v.status === 'pending');
    const completed = views.filter(v => v.status === 'completed');

    return {
      userId,
      active,
      pending,
      completed,
      summary: {
        total: views.length,
        active: active.length,
        pending: pending.length,
        completed: completed.length
      }
    };
  }

  async listActiveTasks(userId: string): Promise<UserTaskView[]> {
    return (await this.loadViews(userId)).filter(v => v.status === 'active');
  }

  async listCompletedTasks(userId: string): Promise<UserTaskView[]> {
    return (await this.loadViews(userId)).filter(v => v.status === 'completed');
  }

  /**
   * Re-read the active list and publish it for connected UIs.
   */
  async refreshActiveTasks(userId: string): Promise<UserTaskView[]> {
    const activeTasks = await this.listActiveTasks(userId);
    await this.eventBus.emit('learner:tasks_refreshed', { userId, activeTasks });
    return activeTasks;
  }

  /**
   * Move an assignment forward. Statuses only advance
   * (pending, active, completed); the same status is a no-op.
   * @throws {BusinessRuleError} on regression
   */
  async updateStatus(userId: string, taskId: string, status: AssignmentStatus): Promise<TaskAssignment> {
    const current = await this.findAssignment(userId, taskId);
    if (current.status === status) return current;

    assertForward(taskId, current.status, status);

    // Re-checked against the stored assignment in case another update landed first.
    const updated = await this.assignmentRepo.updateTask(userId, taskId, task => {
      assertForward(taskId, task.status, status);
      return {
        status,
        completionDate: status === 'completed' ? toDateString(this.clock()) : task.completionDate
      };
    });

    await this.eventBus.emit('assignment:updated', { userId, assignment: updated });
    this.logger.info(`Task ${taskId} moved to ${status}`, { userId });
    return updated;
  }

  async addComment(userId: string, taskId: string, comment: string, commentBy: AssignedBy): Promise<TaskAssignment> {
    const text = comment.trim();
    if (!text) {
      throw new ValidationError('Comment cannot be empty');
    }

    await this.findAssignment(userId, taskId);
    const updated = await this.assignmentRepo.addComment(userId, taskId, {
      comment: text,
      commentBy,
      createdAt: this.clock()
    });

    await this.eventBus.emit('assignment:updated', { userId, assignment: updated });
    return updated;
  }

  private async findAssignment(userId: string, taskId: string): Promise<TaskAssignment> {
    const doc = await this.assignmentRepo.findByUser(userId);
    const assignment = doc?.tasks.find(t => t.taskId === taskId);
    if (!assignment) {
      throw new NotFoundError('Task assignment', `${userId}/${taskId}`);
    }
    return assignment;
  }

  private async loadViews(userId: string): Promise<UserTaskView[]> {
    const doc = await this.assignmentRepo.findByUser(userId);
    if (!doc) return [];

    const projectNames = new Map<string, string>();
    const views: UserTaskView[] = [];

    for (const assignment of [...doc.tasks].sort((a, b) => a.sequence - b.sequence)) {
      const task = await this.taskRepo.findById(assignment.taskId);
      const projectId = task?.projectId ?? '';

      let projectName = projectNames.get(projectId);
      if (projectName === undefined) {
        const project = projectId ? await this.projectRepo.findById(projectId) : null;
        projectName = project?.name ?? 'Unknown Project';
        projectNames.set(projectId, projectName);
      }

      views.push({
        taskId: assignment.taskId,
        title: task?.title ?? 'Unknown Task',
        description: task?.description ?? '',
        skillType: task?.skillType ?? '',
        projectId,
        projectName,
        status: assignment.status,
        assignedBy: assignment.assignedBy,
        sequence: assignment.sequence,
        expectedCompletionDate: assignment.expectedCompletionDate,
        completionDate: assignment.completionDate,
        comments: assignment.comments
      });
    }
    return views;
  }
}

function assertForward(taskId: string, from: AssignmentStatus, to: AssignmentStatus): void {
  if (STATUS_RANK[to] < STATUS_RANK[from]) {
    throw new BusinessRuleError(`Cannot move task from ${from} back to ${to}`, { taskId, from, to });
  }
}
