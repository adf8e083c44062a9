/**
 * Source of the current time in epoch milliseconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Calendar date (UTC) of a timestamp as YYYY-MM-DD.
 */
export function toDateString(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}
