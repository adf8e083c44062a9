import { EnrichedTask } from '../../types';

export const APOLOGY =
  'Sorry, something went wrong on my side. Please try again in a moment.';

export const PLAN_NOT_READY =
  'Looks like your study plan has not been prepared yet. Please check back with your mentor soon.';

export const NAME_REPROMPT =
  'I would love a name before we begin. What would you like to call me?';

export const IDLE_NUDGE =
  'Hi! It has been a while. Tell me what you would like to learn next and I will find a task for you.';

export const NO_ACTIVE_TASKS = 'You have no active tasks right now.';

export function welcome(defaultName: string): string {
  return `Hello! I am ${defaultName}, your AI learning assistant. Looks like we meet for the first time. Please give me a new name to get going.`;
}

export function greeting(assistantName: string): string {
  return `Hola! ${assistantName} at your service.\n\nI can help you with\n> Upskilling\n> Getting a job\n> Achieving your Goals`;
}

export function recommendedTasks(tasks: EnrichedTask[]): string {
  if (tasks.length === 0) return PLAN_NOT_READY;

  const lines = tasks.map((task, index) =>
    `${index + 1}. *${task.taskName}*\n   Project: ${task.projectName}\n   Task ID: ${task.taskId}`
  );
  return `I've selected ${tasks.length} personalized task${tasks.length === 1 ? '' : 's'} for your learning path:\n\n${lines.join('\n\n')}`;
}

export function activeTaskReminder(titles: string[]): string {
  if (titles.length === 0) return NO_ACTIVE_TASKS;

  const list = titles.map((title, index) => `${index + 1}. ${title}`).join('\n');
  return `You have ${titles.length} task${titles.length === 1 ? '' : 's'} to complete:\n\n${list}`;
}

export function preferencesAnnouncement(preferences: string[]): string {
  return `Looks like preferences have been set for ${preferences.join(', ')}. From where do you want to start? Please choose from your preferences!`;
}

export function busyAcknowledgement(): string {
  return 'No problem, I will give you some space. Message me whenever you are ready.';
}

export function postponeAcknowledgement(date: string): string {
  return `Sure, I will check in with you again on ${date}.`;
}

export function resumeAcknowledgement(): string {
  return 'Great, let us keep going!';
}
