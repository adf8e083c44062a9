import { CatalogProject } from '../../types';

/**
 * Input for creating a catalog project (without generated fields).
 */
export type CreateProjectInput = Omit<CatalogProject, 'id' | 'createdAt'>;

/**
 * Repository interface for catalog projects.
 */
export interface IProjectRepository {
  /**
   * Create a new project.
   * @returns The created project with generated id and timestamp
   */
  create(project: CreateProjectInput): Promise<CatalogProject>;

  /**
   * Find a project by ID.
   * @returns The project if found, null otherwise
   */
  findById(id: string): Promise<CatalogProject | null>;

  /**
   * Find all projects, oldest first.
   */
  findAll(): Promise<CatalogProject[]>;
}
