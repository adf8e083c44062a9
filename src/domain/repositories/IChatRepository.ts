import { ChatTurn, UserSession } from '../../types';

/**
 * Repository interface for per-user conversation transcripts.
 * Transcripts are append-only.
 */
export interface IChatRepository {
  /**
   * Find a user's transcript.
   * @returns The session if the user has ever written, null otherwise
   */
  findByUser(userId: string): Promise<UserSession | null>;

  /**
   * Append a turn, creating the session on first use.
   * @returns The updated session
   */
  append(userId: string, turn: ChatTurn): Promise<UserSession>;

  /**
   * Most recent turns in chronological order.
   * @param limit - Maximum number of turns to return
   */
  recent(userId: string, limit: number): Promise<ChatTurn[]>;
}
