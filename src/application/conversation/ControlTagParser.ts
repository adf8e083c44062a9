import { Clock, DAY_MS, toDateString } from '../../domain/common/Clock';

export type PostponeArgument =
  | { type: 'default' }
  | { type: 'days'; days: number }
  | { type: 'date'; date: string };

export type ControlCommand =
  | { kind: 'busy' }
  | { kind: 'postpone'; argument: PostponeArgument }
  | { kind: 'confirm' }
  | { kind: 'aligned' }
  | { kind: 'tool'; name: string; argument: string | null };

export interface ParsedControlText {
  /** Display text, guaranteed free of control tags. */
  text: string;
  commands: ControlCommand[];
  /** Tags that were stripped without producing a command. */
  ignored: string[];
}

const TAG = /\[([A-Z][A-Z_]*)(?::([^\]\n]*))?\]/g;
const MAX_POSTPONE_DAYS = 365;

/**
 * Extract bracketed control tags from oracle text.
 *
 * Recognised: [BUSY], [POSTPONE], [POSTPONE:<days>], [POSTPONE:<YYYY-MM-DD>],
 * [NEXT_TASK], [CONFIRM], [ALIGNED], [TOOL:<name>], [TOOL:<name>:<argument>].
 * Anything else shaped like a tag is dropped and listed in `ignored`.
 */
export function parseControlTags(raw: string): ParsedControlText {
  const commands: ControlCommand[] = [];
  const ignored: string[] = [];

  let text = raw.replace(TAG, (match, name: string, argument: string | undefined) => {
    const command = toCommand(name, argument?.trim());
    if (command) {
      commands.push(command);
    } else {
      ignored.push(match);
    }
    return ' ';
  });

  // Nothing shaped like a tag survives into the user-facing text
  let previous: string;
  do {
    previous = text;
    text = text.replace(TAG, match => {
      ignored.push(match);
      return ' ';
    });
  } while (text !== previous);

  return { text: tidy(text), commands, ignored };
}

function toCommand(name: string, argument: string | undefined): ControlCommand | null {
  switch (name) {
    case 'BUSY':
      return argument ? null : { kind: 'busy' };
    case 'POSTPONE':
      return { kind: 'postpone', argument: parsePostponeArgument(argument) };
    case 'NEXT_TASK':
    case 'CONFIRM':
      return { kind: 'confirm' };
    case 'ALIGNED':
      return { kind: 'aligned' };
    case 'TOOL': {
      if (!argument) return null;
      const separator = argument.indexOf(':');
      const toolName = (separator === -1 ? argument : argument.slice(0, separator)).trim();
      const toolArgument = separator === -1 ? '' : argument.slice(separator + 1).trim();
      return toolName ? { kind: 'tool', name: toolName, argument: toolArgument || null } : null;
    }
    default:
      return null;
  }
}

function parsePostponeArgument(argument: string | undefined): PostponeArgument {
  if (!argument) return { type: 'default' };

  if (/^\d+$/.test(argument)) {
    const days = parseInt(argument, 10);
    return days >= 1 && days <= MAX_POSTPONE_DAYS ? { type: 'days', days } : { type: 'default' };
  }

  // The round trip rejects calendar dates that do not exist, such as 2026-02-30.
  if (/^\d{4}-\d{2}-\d{2}$/.test(argument) && isCalendarDate(argument)) {
    return { type: 'date', date: argument };
  }

  return { type: 'default' };
}

/**
 * Turn a postpone argument into the next-contact timestamp. Dates mean the
 * start of that day (UTC); anything not in the future falls back to
 * `defaultDays` from now.
 */
export function resolvePostponeUntil(argument: PostponeArgument, clock: Clock, defaultDays: number): number {
  const now = clock();
  const fallbackAt = now + defaultDays * DAY_MS;

  switch (argument.type) {
    case 'days':
      return now + argument.days * DAY_MS;
    case 'date': {
      const at = Date.parse(`${argument.date}T00:00:00Z`);
      return at > now ? at : fallbackAt;
    }
    case 'default':
      return fallbackAt;
  }
}

function tidy(text: string): string {
  return text
    .split('\n')
    .map(line => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function isCalendarDate(value: string): boolean {
  const at = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(at) && toDateString(at) === value;
}
