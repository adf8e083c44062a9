import { QuickReplyButton } from '../../types';

/** The channel cuts button labels to this many characters. */
export const CHANNEL_LABEL_LIMIT = 20;

export interface QuickReply {
  callback: string;
  label: string;
  response: string;
}

const GREETING_REPLIES: QuickReply[] = [
  {
    callback: 'upskilling',
    label: 'Upskilling',
    response: 'Great choice! Tell me which skill you want to build, or set your preferences and I will line up tasks for you.'
  },
  {
    callback: 'getting_job',
    label: 'Getting a job',
    response: 'Let us get you job ready. Tell me the role you are aiming for and I will suggest tasks that close the gaps.'
  },
  {
    callback: 'achieving_goals',
    label: 'Achieving your Goals',
    response: 'Tell me the goal you are working towards and I will help you break it into tasks.'
  }
];

const PROGRAM_REPLIES: QuickReply[] = [
  {
    callback: 'sfs',
    label: 'Software Finishing School',
    response: 'Great! The Software Finishing School takes you through production-grade projects with mentor reviews. Ask me anything about it.'
  },
  {
    callback: 'ps',
    label: 'Placement Support',
    response: 'Great! Placement Support pairs you with a mentor for mock interviews and referrals. Ask me anything about it.'
  },
  {
    callback: 'js',
    label: 'Job Support',
    response: 'Great! Job Support helps you settle into your new role with on-demand help from senior engineers. Ask me anything about it.'
  }
];

function toButtons(replies: QuickReply[]): QuickReplyButton[] {
  return replies.map(r => ({ name: r.label, callback: r.callback }));
}

export const GREETING_BUTTONS: QuickReplyButton[] = toButtons(GREETING_REPLIES);
export const PROGRAM_BUTTONS: QuickReplyButton[] = toButtons(PROGRAM_REPLIES);

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

const LOOKUP = new Map<string, QuickReply>();
for (const reply of [...GREETING_REPLIES, ...PROGRAM_REPLIES]) {
  LOOKUP.set(normalize(reply.callback), reply);
  LOOKUP.set(normalize(reply.label), reply);
  LOOKUP.set(normalize(reply.label.slice(0, CHANNEL_LABEL_LIMIT)), reply);
}

/**
 * Resolve a button press by callback code, full label or truncated label.
 */
export function matchQuickReply(message: string): QuickReply | null {
  return LOOKUP.get(normalize(message)) ?? null;
}
