import { EngagementState } from '../../types';
import { EngagementUpdate, IEngagementRepository } from '../../domain/repositories/IEngagementRepository';
import { ILogger } from '../../domain/common/ILogger';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of IEngagementRepository.
 */
export class FileSystemEngagementRepository implements IEngagementRepository {
  private store: JsonDocumentStore<EngagementState>;

  constructor(dataDir: string, logger: ILogger) {
    this.store = new JsonDocumentStore<EngagementState>(dataDir, 'engagement', state => state.userId, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async findByUser(userId: string): Promise<EngagementState | null> {
    return this.store.get(userId);
  }

  async update(
    userId: string,
    change: (current: EngagementState | null) => EngagementState
  ): Promise<EngagementUpdate> {
    const { doc, written } = await this.store.update(userId, change);
    return { state: doc, changed: written };
  }
}
