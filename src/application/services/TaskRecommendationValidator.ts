import { EnrichedTask, RecommendationCandidate, ValidationSummary } from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IProjectAssignmentRepository } from '../../domain/repositories/IProjectAssignmentRepository';
import { IAssignmentRepository } from '../../domain/repositories/IAssignmentRepository';
import { ILogger } from '../../domain/common/ILogger';

export interface ValidationOutcome {
  tasks: EnrichedTask[];
  summary: ValidationSummary;
}

/**
 * Checks oracle task proposals against the catalog the user can actually
 * reach. Returned ids are always within the user's assigned projects,
 * unique, and not already assigned to the user.
 */
export class TaskRecommendationValidator {
  constructor(
    private taskRepo: ITaskRepository,
    private projectRepo: IProjectRepository,
    private projectAssignmentRepo: IProjectAssignmentRepository,
    private assignmentRepo: IAssignmentRepository,
    private logger: ILogger
  ) {}

  async validate(userId: string, candidates: RecommendationCandidate[]): Promise<ValidationOutcome> {
    // Ground truth: every task of every assigned project
    const assignedProjects = await this.projectAssignmentRepo.findByUser(userId);
    const validTasks = new Map<string, { projectId: string; title: string }>();
    for (const { projectId } of assignedProjects) {
      for (const task of await this.taskRepo.findByProjectId(projectId)) {
        validTasks.set(task.id, { projectId: task.projectId, title: task.title });
      }
    }

    const accepted = candidates.filter(c => validTasks.has(c.taskId));
    const hallucinated = candidates.length - accepted.length;

    const assignments = await this.assignmentRepo.findByUser(userId);
    const taken = new Set((assignments?.tasks ?? []).map(t => t.taskId));
    const survivors: RecommendationCandidate[] = [];
    for (const candidate of accepted) {
      if (taken.has(candidate.taskId)) continue;
      taken.add(candidate.taskId);
      survivors.push(candidate);
    }

    const projectNames = new Map<string, string>();
    const tasks: EnrichedTask[] = [];
    for (const candidate of survivors) {
      const entry = validTasks.get(candidate.taskId);
      if (!entry) continue;

      let projectName = projectNames.get(entry.projectId);
      if (projectName === undefined) {
        const project = await this.projectRepo.findById(entry.projectId);
        projectName = project?.name ?? 'Unknown Project';
        projectNames.set(entry.projectId, projectName);
      }

      tasks.push({
        taskId: candidate.taskId,
        taskName: entry.title || candidate.title,
        projectId: entry.projectId,
        projectName
      });
    }

    const summary: ValidationSummary = {
      proposed: candidates.length,
      accepted: accepted.length,
      hallucinated,
      duplicates: accepted.length - survivors.length,
      final: tasks.length
    };

    if (hallucinated > 0) {
      this.logger.warn(`Dropped ${hallucinated} hallucinated task proposal(s)`, { userId });
    }
    this.logger.info('Task recommendations validated', { userId, ...summary });

    return { tasks, summary };
  }
}
