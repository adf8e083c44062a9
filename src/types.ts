// Onboarding and availability
export type OnboardingPhase = 'NEW' | 'AWAITING_NAME' | 'AWAITING_PROFILE' | 'CONVERSING';
export type BuddyStatus = 'ACTIVE' | 'BUSY' | 'POSTPONED';

/**
 * `nextContactAt` is set exactly when the user postponed contact.
 */
export type BuddyAvailability =
  | { buddyStatus: 'ACTIVE' | 'BUSY'; nextContactAt: null }
  | { buddyStatus: 'POSTPONED'; nextContactAt: number };

export interface EngagementProfile {
  userId: string;
  onboardingPhase: OnboardingPhase;
  assistantName: string | null;   // Name the user gave the assistant
  createdAt: number;
  updatedAt: number;
}

export type EngagementState = EngagementProfile & BuddyAvailability;

// Transcript
export type SpeakerRole = 'user' | 'assistant';

export interface ChatTurn {
  id: string;
  role: SpeakerRole;
  text: string;
  timestamp: number;
}

export interface UserSession {
  userId: string;
  turns: ChatTurn[];
  createdAt: number;
  updatedAt: number;
}

// Catalog (read-only from the conversation's point of view)
export type ProjectType = 'project' | 'training';

export interface CatalogProject {
  id: string;
  name: string;
  description: string;
  projectType: ProjectType;
  createdAt: number;
}

export interface CatalogTask {
  id: string;
  projectId: string;
  title: string;
  description: string;
  skillType: string;
  category: string | null;
  estimatedTime: number | null;   // Hours
  createdAt: number;
}

export interface ProjectAssignment {
  projectId: string;
  sequence: number;
}

export interface AssignedProjects {
  userId: string;
  projects: ProjectAssignment[];
  updatedAt: number;
}

// Task assignments
export type AssignmentStatus = 'pending' | 'active' | 'completed';
export type AssignedBy = 'user' | 'admin';

export interface AssignmentComment {
  comment: string;
  commentBy: AssignedBy;
  createdAt: number;
}

export interface TaskAssignment {
  taskId: string;
  assignedBy: AssignedBy;
  status: AssignmentStatus;
  sequence: number;
  expectedCompletionDate: string | null;   // YYYY-MM-DD
  completionDate: string | null;           // YYYY-MM-DD
  comments: AssignmentComment[];
  assignedAt: number;
}

export interface UserAssignments {
  userId: string;
  tasks: TaskAssignment[];
  createdAt: number;
  updatedAt: number;
}

export type NewTaskAssignment = Omit<TaskAssignment, 'sequence' | 'assignedAt'>;

export interface UserTaskView {
  taskId: string;
  title: string;
  description: string;
  skillType: string;
  projectId: string;
  projectName: string;
  status: AssignmentStatus;
  assignedBy: AssignedBy;
  sequence: number;
  expectedCompletionDate: string | null;
  completionDate: string | null;
  comments: AssignmentComment[];
}

export interface UserTaskBoard {
  userId: string;
  active: UserTaskView[];
  pending: UserTaskView[];
  completed: UserTaskView[];
  summary: {
    total: number;
    active: number;
    pending: number;
    completed: number;
  };
}

// Preferences
export interface UserPreferences {
  userId: string;
  preferences: string[];
  updatedAt: number;
}

// Recommendations
export interface RecommendationCandidate {
  taskId: string;
  title: string;
}

export interface EnrichedTask {
  taskId: string;
  taskName: string;
  projectId: string;
  projectName: string;
}

export interface ValidationSummary {
  proposed: number;
  accepted: number;
  hallucinated: number;
  duplicates: number;
  final: number;
}

// Conversation
export type ConversationIntent = 'task_assignment' | 'buddy_response' | 'general_conversation';

export interface QuickReplyButton {
  name: string;
  callback: string;
}

export type TurnStatus = 'success' | 'skipped' | 'error';

export interface TurnResponse {
  status: TurnStatus;
  message: string | null;          // null when the turn was skipped silently
  phase?: OnboardingPhase;
  intent?: ConversationIntent;
  buttons?: QuickReplyButton[];
  tasks?: EnrichedTask[];
  activeTasks?: UserTaskView[];
}
