import {
  EngagementState,
  ChatTurn,
  UserPreferences,
  CatalogProject,
  CatalogTask,
  TaskAssignment,
  UserTaskView,
  QuickReplyButton,
} from '../../types';

/**
 * Type-safe domain event definitions.
 */

// Engagement Events
export interface EngagementUpdatedEvent {
  type: 'engagement:updated';
  data: EngagementState;
}

// Conversation Events
export interface ConversationTurnEvent {
  type: 'conversation:turn';
  data: { userId: string; turn: ChatTurn };
}

// Assignment Events
export interface AssignmentCreatedEvent {
  type: 'assignment:created';
  data: { userId: string; assignments: TaskAssignment[] };
}

export interface AssignmentUpdatedEvent {
  type: 'assignment:updated';
  data: { userId: string; assignment: TaskAssignment };
}

export interface LearnerTasksRefreshedEvent {
  type: 'learner:tasks_refreshed';
  data: { userId: string; activeTasks: UserTaskView[] };
}

// Preference Events
export interface PreferencesUpdatedEvent {
  type: 'preferences:updated';
  data: UserPreferences;
}

// Catalog Events
export interface CatalogProjectCreatedEvent {
  type: 'catalog:project_created';
  data: CatalogProject;
}

export interface CatalogTaskCreatedEvent {
  type: 'catalog:task_created';
  data: CatalogTask;
}

// Notification Events (fire when a message leaves through the outbound channel)
export interface NotifyNudgeSentEvent {
  type: 'notify:nudge_sent';
  data: { userId: string; message: string; buttons: QuickReplyButton[]; delivered: boolean };
}

/**
 * Union type of all domain events.
 */
export type DomainEvent =
  | EngagementUpdatedEvent
  | ConversationTurnEvent
  | AssignmentCreatedEvent
  | AssignmentUpdatedEvent
  | LearnerTasksRefreshedEvent
  | PreferencesUpdatedEvent
  | CatalogProjectCreatedEvent
  | CatalogTaskCreatedEvent
  | NotifyNudgeSentEvent;

/**
 * Type-safe event map for event bus.
 * Maps event name strings to their payload types.
 */
export type TypedEventMap = {
  [E in DomainEvent as E['type']]: E['data'];
};

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

/**
 * Get the payload type for a specific event name.
 */
export type EventPayload<K extends EventName> = TypedEventMap[K];
