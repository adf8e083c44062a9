import { AssignedProjects, ProjectAssignment } from '../../types';
import { IProjectAssignmentRepository } from '../../domain/repositories/IProjectAssignmentRepository';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of IProjectAssignmentRepository.
 */
export class FileSystemProjectAssignmentRepository implements IProjectAssignmentRepository {
  private store: JsonDocumentStore<AssignedProjects>;

  constructor(
    dataDir: string,
    private logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.store = new JsonDocumentStore<AssignedProjects>(dataDir, 'assigned-projects', doc => doc.userId, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async findByUser(userId: string): Promise<ProjectAssignment[]> {
    const doc = await this.store.get(userId);
    return doc ? sortBySequence(doc.projects) : [];
  }

  async replace(userId: string, projects: ProjectAssignment[]): Promise<ProjectAssignment[]> {
    const sorted = sortBySequence(projects);
    await this.store.put({ userId, projects: sorted, updatedAt: this.clock() });
    this.logger.debug(`Replaced ${sorted.length} project assignment(s) for user: ${userId}`);
    return sorted;
  }
}

function sortBySequence(projects: ProjectAssignment[]): ProjectAssignment[] {
  return [...projects].sort((a, b) => a.sequence - b.sequence);
}
