import { ClockParseError } from './errors';

// Platform timestamps look like 2024-03-01T09:15:00.123456-08:00; the last
// 13 characters (fraction and offset) are dropped and the rest read as the
// platform's wall clock.
const PLATFORM_SUFFIX_LENGTH = 13;
const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Parses a `YYYY-MM-DDTHH:MM:SS` wall-clock string. The result carries the
 * wall-clock fields in its UTC components, so every timestamp read this way
 * compares consistently with every other.
 */
export function parseWallClock(raw: string): Date {
  const match = WALL_CLOCK_PATTERN.exec(raw);
  if (!match) {
    throw new ClockParseError(raw);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(part => Number.parseInt(part, 10));
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(millis);

  // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2); reject those.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new ClockParseError(raw);
  }

  return date;
}

export function parsePlatformTimestamp(raw: string): Date {
  if (raw.length <= PLATFORM_SUFFIX_LENGTH) {
    throw new ClockParseError(raw);
  }
  return parseWallClock(raw.slice(0, -PLATFORM_SUFFIX_LENGTH));
}

/** `Www Mmm dd hh:mm:ss yyyy`, day padded with a space. */
export function formatCtime(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  const day = date.getUTCDate().toString().padStart(2, ' ');
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${WEEKDAYS[date.getUTCDay()]} ${MONTHS[date.getUTCMonth()]} ${day} ${time} ${date.getUTCFullYear()}`;
}
