import { NewTaskAssignment, TaskAssignment, UserAssignments } from '../../types';

/**
 * Input for updating an assignment (status and dates only).
 */
export type UpdateAssignmentInput = Partial<Pick<TaskAssignment, 'status' | 'completionDate' | 'expectedCompletionDate'>>;

/**
 * Repository interface for a user's task assignments.
 * Holds at most one assignment per (user, taskId).
 */
export interface IAssignmentRepository {
  /**
   * Find a user's assignments.
   * @returns The assignment document, null if the user has none
   */
  findByUser(userId: string): Promise<UserAssignments | null>;

  /**
   * Append assignments. Entries whose taskId is already assigned to the user
   * are skipped; new entries continue the user's sequence numbering.
   * @returns Only the assignments that were actually stored
   */
  addTasks(userId: string, tasks: NewTaskAssignment[]): Promise<TaskAssignment[]>;

  /**
   * Update one assignment. A function receives the stored assignment and runs
   * while no other write to the user's document is in progress; what it throws is rethrown.
   * @throws {NotFoundError} if the user has no assignment for the task
   */
  updateTask(
    userId: string,
    taskId: string,
    updates: UpdateAssignmentInput | ((task: TaskAssignment) => UpdateAssignmentInput)
  ): Promise<TaskAssignment>;

  /**
   * Append a comment to one assignment.
   * @throws {NotFoundError} if the user has no assignment for the task
   */
  addComment(userId: string, taskId: string, comment: TaskAssignment['comments'][number]): Promise<TaskAssignment>;
}
