import { ConfigurationError } from './errors';

export interface TimeWindowParts {
  seconds?: number;
  minutes?: number;
  hours?: number;
  days?: number;
}

const UNITS = [
  ['days', 'day'],
  ['hours', 'hour'],
  ['minutes', 'minute'],
  ['seconds', 'second']
] as const;

/**
 * Token regeneration window. Components are kept as configured so the
 * user-facing description reads back the way the course staff wrote it
 * ("90 minutes" stays "90 minutes").
 */
export class TimeWindow {
  public readonly seconds: number;
  public readonly minutes: number;
  public readonly hours: number;
  public readonly days: number;

  private constructor(seconds: number, minutes: number, hours: number, days: number) {
    this.seconds = seconds;
    this.minutes = minutes;
    this.hours = hours;
    this.days = days;
    Object.freeze(this);
  }

  static of(parts: TimeWindowParts = {}): TimeWindow {
    const issues: string[] = [];
    for (const [key] of UNITS) {
      const value = parts[key] ?? 0;
      if (!Number.isInteger(value) || value < 0) {
        issues.push(`${key} must be a non-negative integer (got ${value})`);
      }
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid rate limit window', issues);
    }

    return new TimeWindow(parts.seconds ?? 0, parts.minutes ?? 0, parts.hours ?? 0, parts.days ?? 0);
  }

  totalSeconds(): number {
    return this.seconds + 60 * (this.minutes + 60 * (this.hours + 24 * this.days));
  }

  totalMilliseconds(): number {
    return this.totalSeconds() * 1000;
  }

  /** e.g. "1 day 2 hours", or "none" for an empty window. */
  describe(): string {
    const parts: string[] = [];
    for (const [key, label] of UNITS) {
      const value = this[key];
      if (value === 0) {
        continue;
      }
      parts.push(`${value} ${label}${value === 1 ? '' : 's'}`);
    }
    return parts.length > 0 ? parts.join(' ') : 'none';
  }
}
