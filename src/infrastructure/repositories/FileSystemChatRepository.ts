import { ChatTurn, UserSession } from '../../types';
import { IChatRepository } from '../../domain/repositories/IChatRepository';
import { ILogger } from '../../domain/common/ILogger';
import { JsonDocumentStore } from './JsonDocumentStore';

/**
 * File system based implementation of IChatRepository.
 * Stores one transcript document per user.
 */
export class FileSystemChatRepository implements IChatRepository {
  private store: JsonDocumentStore<UserSession>;

  constructor(dataDir: string, private logger: ILogger) {
    this.store = new JsonDocumentStore<UserSession>(dataDir, 'chats', session => session.userId, logger);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async findByUser(userId: string): Promise<UserSession | null> {
    return this.store.get(userId);
  }

  async append(userId: string, turn: ChatTurn): Promise<UserSession> {
    const { doc: session } = await this.store.update(userId, existing =>
      existing
        ? { ...existing, turns: [...existing.turns, turn], updatedAt: turn.timestamp }
        : { userId, turns: [turn], createdAt: turn.timestamp, updatedAt: turn.timestamp }
    );

    this.logger.debug(`Appended ${turn.role} turn for user: ${userId}`);
    return session;
  }

  async recent(userId: string, limit: number): Promise<ChatTurn[]> {
    const session = await this.store.get(userId);
    if (!session || limit <= 0) return [];
    return session.turns.slice(-limit);
  }
}
