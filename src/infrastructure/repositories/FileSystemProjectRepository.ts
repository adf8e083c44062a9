import { CatalogProject } from '../../types';
import { IProjectRepository, CreateProjectInput } from '../../domain/repositories/IProjectRepository';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of IProjectRepository.
 * Stores projects as individual JSON files.
 */
export class FileSystemProjectRepository implements IProjectRepository {
  private store: JsonDocumentStore<CatalogProject>;

  constructor(
    dataDir: string,
    private idGenerator: IIdGenerator,
    private logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.store = new JsonDocumentStore<CatalogProject>(dataDir, 'projects', project => project.id, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async create(input: CreateProjectInput): Promise<CatalogProject> {
    const project: CatalogProject = {
      id: this.idGenerator.generate('proj'),
      name: input.name,
      description: input.description,
      projectType: input.projectType,
      createdAt: this.clock()
    };

    await this.store.put(project);
    this.logger.debug(`Created project: ${project.id}`);
    return project;
  }

  async findById(id: string): Promise<CatalogProject | null> {
    return this.store.get(id);
  }

  async findAll(): Promise<CatalogProject[]> {
    const projects = await this.store.all();
    return projects.sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id));
  }
}
