/**
 * Start of the unread window: local midnight `days` days before `now`.
 * `days = 0` is today only.
 */
export function windowStart(days: number, now: Date = new Date()): Date {
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`days must be a non-negative integer, got ${days}`);
  }
  const start = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  start.setDate(start.getDate() - days);
  return start;
}

/** Gmail search query for unread messages received at or after `start`. */
export function buildUnreadQuery(start: Date): string {
  const epochSeconds = Math.floor(start.getTime() / 1000);
  return `is:unread after:${epochSeconds}`;
}
