import { UserPreferences } from '../../types';
import { IPreferenceRepository } from '../../domain/repositories/IPreferenceRepository';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of IPreferenceRepository.
 */
export class FileSystemPreferenceRepository implements IPreferenceRepository {
  private store: JsonDocumentStore<UserPreferences>;

  constructor(
    dataDir: string,
    logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.store = new JsonDocumentStore<UserPreferences>(dataDir, 'preferences', doc => doc.userId, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async findByUser(userId: string): Promise<UserPreferences | null> {
    return this.store.get(userId);
  }

  async save(userId: string, preferences: string[]): Promise<UserPreferences> {
    return this.store.put({ userId, preferences, updatedAt: this.clock() });
  }

  async findByAnySkill(skills: string[]): Promise<UserPreferences[]> {
    const wanted = new Set(skills.map(s => s.toLowerCase()));
    const all = await this.store.all();
    return all.filter(doc => doc.preferences.some(p => wanted.has(p.toLowerCase())));
  }
}
