import { ProjectAssignment } from '../../types';

/**
 * Repository interface for the projects assigned to each user.
 */
export interface IProjectAssignmentRepository {
  /**
   * Projects assigned to the user, in ascending sequence order.
   */
  findByUser(userId: string): Promise<ProjectAssignment[]>;

  /**
   * Replace all of the user's project assignments.
   */
  replace(userId: string, projects: ProjectAssignment[]): Promise<ProjectAssignment[]>;
}
