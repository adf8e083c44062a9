import { EngagementState } from '../../types';

export interface EngagementUpdate {
  state: EngagementState;
  changed: boolean;
}

/**
 * Repository interface for per-user engagement state.
 * Each state is written as a single document.
 */
export interface IEngagementRepository {
  findByUser(userId: string): Promise<EngagementState | null>;

  /**
   * Apply `change` to the stored state (null for a new user) and write the result.
   * Updates for one user never interleave. Returning the current state unchanged skips the write.
   * @throws {StorageError} if the write fails; the stored state is then unchanged
   */
  update(userId: string, change: (current: EngagementState | null) => EngagementState): Promise<EngagementUpdate>;
}
