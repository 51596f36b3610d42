const MINUTE = 60;
const HOUR = 3600;
const DAY = 86400;
const WEEK = 604800;
const MONTH = 2592000;

function plural(count: number, unit: string): string {
  return count === 1 ? `1 ${unit} ago` : `${count} ${unit}s ago`;
}

/**
 * Human-readable age of `date` relative to `now`.
 * Ages past 30 days are counted in months, without ever switching to years.
 */
export function formatRelativeTime(date: Date, now: Date = new Date()): string {
  const seconds = (now.getTime() - date.getTime()) / 1000;

  if (seconds < MINUTE) {
    return 'just now';
  }
  if (seconds < HOUR) {
    return plural(Math.floor(seconds / MINUTE), 'minute');
  }
  if (seconds < DAY) {
    return plural(Math.floor(seconds / HOUR), 'hour');
  }
  if (seconds < WEEK) {
    const days = Math.floor(seconds / DAY);
    return days === 1 ? 'yesterday' : `${days} days ago`;
  }
  if (seconds < MONTH) {
    return plural(Math.floor(seconds / WEEK), 'week');
  }
  return plural(Math.floor(seconds / MONTH), 'month');
}
