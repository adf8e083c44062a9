/**
 * Memo of task-to-project relevance answers, keyed by project and task id.
 */
export interface IRelevanceCache {
  get(projectId: string, taskId: string): boolean | undefined;
  set(projectId: string, taskId: string, relevant: boolean): void;
  size(): number;
}
