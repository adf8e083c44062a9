import { IRelevanceCache } from '../../domain/services/IRelevanceCache';

/**
 * Process-lifetime relevance memo. Entries are never evicted.
 */
export class InMemoryRelevanceCache implements IRelevanceCache {
  private readonly entries = new Map<string, boolean>();

  get(projectId: string, taskId: string): boolean | undefined {
    return this.entries.get(`${projectId}:${taskId}`);
  }

  set(projectId: string, taskId: string, relevant: boolean): void {
    this.entries.set(`${projectId}:${taskId}`, relevant);
  }

  size(): number {
    return this.entries.size;
  }
}
