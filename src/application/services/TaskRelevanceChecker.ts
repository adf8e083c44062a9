import { CatalogProject, CatalogTask } from '../../types';
import { ICompletionOracle } from '../../domain/services/ICompletionOracle';
import { IPromptLoader } from '../../domain/services/IPromptLoader';
import { IRelevanceCache } from '../../domain/services/IRelevanceCache';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';

/**
 * Asks the oracle whether a task fits its project, memoising answers per
 * (project, task). Projects without a description accept every task.
 * Oracle failures count as relevant and are not memoised.
 */
export class TaskRelevanceChecker {
  constructor(
    private oracle: ICompletionOracle,
    private prompts: IPromptLoader,
    private cache: IRelevanceCache,
    private logger: ILogger
  ) {}

  async isRelevant(project: CatalogProject, task: CatalogTask): Promise<boolean> {
    const cached = this.cache.get(project.id, task.id);
    if (cached !== undefined) return cached;

    if (!project.description.trim()) {
      this.cache.set(project.id, task.id, true);
      return true;
    }

    try {
      const prompt = await this.prompts.render('task_relevance', {
        task_title: task.title,
        project_description: project.description
      });
      const answer = await this.oracle.complete(prompt);
      const relevant = answer.trim().toLowerCase().startsWith('yes');

      this.cache.set(project.id, task.id, relevant);
      this.logger.debug(`Relevance of ${task.id} to ${project.id}: ${relevant}`);
      return relevant;
    } catch (err) {
      this.logger.error('Relevance check failed, treating task as relevant', toError(err), {
        projectId: project.id,
        taskId: task.id
      });
      return true;
    }
  }
}
