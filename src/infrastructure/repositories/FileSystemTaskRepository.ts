import { CatalogTask } from '../../types';
import { ITaskRepository, CreateTaskInput } from '../../domain/repositories/ITaskRepository';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of ITaskRepository.
 * Stores catalog tasks as individual JSON files.
 */
export class FileSystemTaskRepository implements ITaskRepository {
  private store: JsonDocumentStore<CatalogTask>;

  constructor(
    dataDir: string,
    private idGenerator: IIdGenerator,
    private logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.store = new JsonDocumentStore<CatalogTask>(dataDir, 'tasks', task => task.id, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async create(input: CreateTaskInput): Promise<CatalogTask> {
    const task: CatalogTask = {
      ...input,
      id: this.idGenerator.generate('task'),
      createdAt: this.clock()
    };

    await this.store.put(task);
    this.logger.debug(`Created task: ${task.id}`);
    return task;
  }

  async findById(id: string): Promise<CatalogTask | null> {
    return this.store.get(id);
  }

  async findByProjectId(projectId: string): Promise<CatalogTask[]> {
    const tasks = await this.store.all();
    return tasks.filter(t => t.projectId === projectId);
  }

  async findAll(): Promise<CatalogTask[]> {
    return this.store.all();
  }
}
