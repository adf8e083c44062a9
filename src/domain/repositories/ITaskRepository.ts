import { CatalogTask } from '../../types';

/**
 * Input for creating a catalog task (without generated fields).
 */
export type CreateTaskInput = Omit<CatalogTask, 'id' | 'createdAt'>;

/**
 * Repository interface for catalog tasks.
 */
export interface ITaskRepository {
  /**
   * Create a new task.
   * @returns The created task with generated id and timestamp
   */
  create(task: CreateTaskInput): Promise<CatalogTask>;

  /**
   * Find a task by ID.
   * @returns The task if found, null otherwise
   */
  findById(id: string): Promise<CatalogTask | null>;

  /**
   * Find all tasks of a project.
   */
  findByProjectId(projectId: string): Promise<CatalogTask[]>;

  /**
   * Find every task in the catalog.
   */
  findAll(): Promise<CatalogTask[]>;
}
