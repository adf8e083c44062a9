import { UserPreferences } from '../../types';

/**
 * Repository interface for learner skill preferences.
 */
export interface IPreferenceRepository {
  findByUser(userId: string): Promise<UserPreferences | null>;

  /**
   * Replace the user's preferences.
   */
  save(userId: string, preferences: string[]): Promise<UserPreferences>;

  /**
   * Users whose preferences contain any of the given skills (case-insensitive).
   */
  findByAnySkill(skills: string[]): Promise<UserPreferences[]>;
}
