import { CatalogTask, UserPreferences } from '../../types';
import { IPreferenceRepository } from '../../domain/repositories/IPreferenceRepository';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { errorMessage } from '../../domain/common/Errors';
import { EngagementService } from './EngagementService';
import { AssignmentService } from './AssignmentService';
import { TaskRelevanceChecker } from './TaskRelevanceChecker';

export const ALLOWED_SKILLS = [
  'All',
  'Frontend',
  'Backend',
  'AI',
  'ML',
  'Devops',
  'Data Analysis',
  'Data',
  'DSA',
  'Fullstack',
  'GenAI',
  'Analytics'
] as const;

export const ALL_SKILLS = 'All';

/**
 * Learner skill preferences and the preference-driven distribution of new
 * catalog tasks.
 */
export class PreferenceService {
  constructor(
    private preferenceRepo: IPreferenceRepository,
    private projectRepo: IProjectRepository,
    private engagement: EngagementService,
    private assignments: AssignmentService,
    private relevance: TaskRelevanceChecker,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  /**
   * Keep known skills only (in their canonical spelling), without repeats.
   */
  normalize(preferences: string[]): string[] {
    const result: string[] = [];
    for (const raw of preferences) {
      const canonical = ALLOWED_SKILLS.find(s => s.toLowerCase() === raw.trim().toLowerCase());
      if (canonical && !result.includes(canonical)) {
        result.push(canonical);
      }
    }
    return result;
  }

  /**
   * Replace the user's preferences. A user still completing their profile
   * moves on to regular conversation.
   */
  async setPreferences(userId: string, preferences: string[]): Promise<UserPreferences> {
    const valid = this.normalize(preferences);
    const dropped = preferences.length - valid.length;
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} unknown or repeated preference(s)`, { userId });
    }

    const saved = await this.preferenceRepo.save(userId, valid);

    const state = await this.engagement.load(userId);
    if (state.onboardingPhase === 'AWAITING_PROFILE') {
      await this.engagement.setPhase(userId, 'CONVERSING');
    }

    await this.eventBus.emit('preferences:updated', saved);
    this.logger.info('Preferences saved', { userId, preferences: valid });
    return saved;
  }

  async getPreferences(userId: string): Promise<string[]> {
    const doc = await this.preferenceRepo.findByUser(userId);
    return doc?.preferences ?? [];
  }

  /**
   * Give a new catalog task to every user whose preferences include its
   * skill or `All`, when the task is relevant to its project.
   * @returns Ids of the users who received the task
   */
  async distributeTask(task: CatalogTask): Promise<string[]> {
    if (!task.skillType) return [];

    const project = await this.projectRepo.findById(task.projectId);
    if (project && !(await this.relevance.isRelevant(project, task))) {
      this.logger.info(`Task ${task.id} not relevant to its project, skipping distribution`);
      return [];
    }

    const recipients: string[] = [];
    for (const prefs of await this.preferenceRepo.findByAnySkill([ALL_SKILLS, task.skillType])) {
      try {
        const added = await this.assignments.assignActive(
          prefs.userId,
          task,
          `Matches your ${task.skillType} preference`
        );
        if (added) recipients.push(prefs.userId);
      } catch (err) {
        this.logger.warn(`Failed to distribute task ${task.id}`, { userId: prefs.userId, error: errorMessage(err) });
      }
    }

    this.logger.info(`Distributed task ${task.id} to ${recipients.length} user(s)`);
    return recipients;
  }
}
