import { CatalogProject, CatalogTask } from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IProjectAssignmentRepository } from '../../domain/repositories/IProjectAssignmentRepository';
import { IAssignmentRepository } from '../../domain/repositories/IAssignmentRepository';
import { ILogger } from '../../domain/common/ILogger';
import { compareSortKeys, naturalSortKey } from '../../domain/common/naturalSort';

export type ResolverTier = 'assigned_project' | 'keyword_project' | 'global';

export interface ResolvedTask {
  task: CatalogTask;
  tier: ResolverTier;
}

interface Exclusions {
  ids: Set<string>;
  titles: Set<string>;
}

/**
 * Picks the single best next task for a skill.
 *
 * Tiers, first non-empty wins:
 * 1. the user's assigned projects in sequence order, skill-matching tasks;
 * 2. projects whose name or description mentions the skill, any task;
 * 3. skill-matching tasks across the whole catalog.
 *
 * Tasks the user already holds are excluded by id and by exact title, since
 * the same content can exist under several projects.
 */
export class SkillTaskResolver {
  constructor(
    private taskRepo: ITaskRepository,
    private projectRepo: IProjectRepository,
    private projectAssignmentRepo: IProjectAssignmentRepository,
    private assignmentRepo: IAssignmentRepository,
    private logger: ILogger
  ) {}

  async resolveNextTask(userId: string, skillName: string): Promise<ResolvedTask | null> {
    const skill = skillName.trim().toLowerCase();
    if (!skill) return null;

    const exclusions = await this.loadExclusions(userId);
    const available = (task: CatalogTask) =>
      !exclusions.ids.has(task.id) && !exclusions.titles.has(task.title);
    const matchesSkill = (task: CatalogTask) => available(task) && this.matchesSkill(task, skill);

    // 1. Assigned projects, in sequence order
    for (const assigned of await this.projectAssignmentRepo.findByUser(userId)) {
      const tasks = await this.taskRepo.findByProjectId(assigned.projectId);
      const picked = this.pickFirst(tasks.filter(matchesSkill));
      if (picked) return this.found(userId, skillName, picked, 'assigned_project');
    }

    // 2. Projects mentioning the skill
    const projects = await this.projectRepo.findAll();
    for (const project of projects.filter(p => this.mentionsSkill(p, skill))) {
      const tasks = await this.taskRepo.findByProjectId(project.id);
      const picked = this.pickFirst(tasks.filter(available));
      if (picked) return this.found(userId, skillName, picked, 'keyword_project');
    }

    // 3. Whole catalog
    const picked = this.pickFirst((await this.taskRepo.findAll()).filter(matchesSkill));
    if (picked) return this.found(userId, skillName, picked, 'global');

    this.logger.info(`No task found for skill "${skillName}"`, { userId });
    return null;
  }

  private async loadExclusions(userId: string): Promise<Exclusions> {
    const assignments = await this.assignmentRepo.findByUser(userId);
    const ids = new Set((assignments?.tasks ?? []).map(t => t.taskId));
    const titles = new Set<string>();

    for (const id of ids) {
      const task = await this.taskRepo.findById(id);
      if (task?.title) titles.add(task.title);
    }
    return { ids, titles };
  }

  private matchesSkill(task: CatalogTask, skill: string): boolean {
    return (
      task.skillType.toLowerCase() === skill ||
      (task.category ?? '').toLowerCase().includes(skill) ||
      task.title.toLowerCase().includes(skill)
    );
  }

  private mentionsSkill(project: CatalogProject, skill: string): boolean {
    return project.name.toLowerCase().includes(skill) || project.description.toLowerCase().includes(skill);
  }

  /**
   * First task by natural title order, id breaking ties.
   */
  private pickFirst(tasks: CatalogTask[]): CatalogTask | null {
    if (tasks.length === 0) return null;
    const keyed = tasks.map(task => ({ task, key: naturalSortKey(task.title) }));
    keyed.sort((a, b) => compareSortKeys(a.key, b.key) || (a.task.id < b.task.id ? -1 : a.task.id > b.task.id ? 1 : 0));
    return keyed[0].task;
  }

  private found(userId: string, skillName: string, task: CatalogTask, tier: ResolverTier): ResolvedTask {
    this.logger.info(`Resolved task for skill "${skillName}"`, { userId, taskId: task.id, tier });
    return { task, tier };
  }
}
