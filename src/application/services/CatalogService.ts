import { CatalogProject, CatalogTask, ProjectAssignment } from '../../types';
import { IProjectRepository, CreateProjectInput } from '../../domain/repositories/IProjectRepository';
import { ITaskRepository, CreateTaskInput } from '../../domain/repositories/ITaskRepository';
import { IProjectAssignmentRepository } from '../../domain/repositories/IProjectAssignmentRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';
import { PreferenceService } from './PreferenceService';

export interface CreatedTask {
  task: CatalogTask;
  distributedTo: string[];
}

/**
 * Application service for the project/task catalog and the projects
 * assigned to each learner.
 */
export class CatalogService {
  constructor(
    private projectRepo: IProjectRepository,
    private taskRepo: ITaskRepository,
    private projectAssignmentRepo: IProjectAssignmentRepository,
    private preferences: PreferenceService,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  async createProject(input: CreateProjectInput): Promise<CatalogProject> {
    if (!input.name.trim()) {
      throw new ValidationError('Project name is required');
    }

    const project = await this.projectRepo.create({ ...input, name: input.name.trim() });
    await this.eventBus.emit('catalog:project_created', project);
    return project;
  }

  async listProjects(): Promise<CatalogProject[]> {
    return this.projectRepo.findAll();
  }

  async getProject(id: string): Promise<CatalogProject> {
    const project = await this.projectRepo.findById(id);
    if (!project) {
      throw new NotFoundError('Project', id);
    }
    return project;
  }

  async listProjectTasks(projectId: string): Promise<CatalogTask[]> {
    await this.getProject(projectId);
    return this.taskRepo.findByProjectId(projectId);
  }

  /**
   * Create a task and hand it to learners whose preferences match.
   */
  async createTask(input: CreateTaskInput): Promise<CreatedTask> {
    if (!input.title.trim()) {
      throw new ValidationError('Task title is required');
    }
    await this.getProject(input.projectId);

    const task = await this.taskRepo.create({ ...input, title: input.title.trim() });
    await this.eventBus.emit('catalog:task_created', task);

    const distributedTo = await this.preferences.distributeTask(task);
    return { task, distributedTo };
  }

  /**
   * Replace the user's assigned projects.
   * @throws {ValidationError} on repeated project ids
   * @throws {NotFoundError} if a project does not exist
   */
  async assignProjects(userId: string, projects: ProjectAssignment[]): Promise<ProjectAssignment[]> {
    const ids = new Set(projects.map(p => p.projectId));
    if (ids.size !== projects.length) {
      throw new ValidationError('Each project can be assigned only once');
    }
    for (const id of ids) {
      await this.getProject(id);
    }

    const saved = await this.projectAssignmentRepo.replace(userId, projects);
    this.logger.info(`Assigned ${saved.length} project(s)`, { userId });
    return saved;
  }

  async getAssignedProjects(userId: string): Promise<ProjectAssignment[]> {
    return this.projectAssignmentRepo.findByUser(userId);
  }
}
