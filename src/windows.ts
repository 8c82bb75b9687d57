import { format, getUnixTime, parseISO, subDays } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { InvalidTimezoneError } from './errors.js';

export interface TimeWindow {
  /** Local calendar day, yyyy-MM-dd */
  readonly date: string;
  /** 09:00 local, UTC epoch seconds */
  readonly timeFrom: number;
  /** 18:00 local, UTC epoch seconds */
  readonly timeTill: number;
  readonly readableUtcStart: string;
}

export const WORKDAY_START = '09:00:00';
export const WORKDAY_END = '18:00:00';
const WORKDAY_START_HOUR = 9;

export function assertValidTimezone(timezone: string): void {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
  } catch {
    throw new InvalidTimezoneError(timezone);
  }
}

/**
 * The calendar day the look-back starts from: today in `timezone`, or
 * yesterday while today's working hours have not begun yet.
 */
export function anchorDate(timezone: string, now: Date = new Date()): string {
  assertValidTimezone(timezone);
  const today = formatInTimeZone(now, timezone, 'yyyy-MM-dd');
  const hour = Number(formatInTimeZone(now, timezone, 'H'));
  if (hour < WORKDAY_START_HOUR) {
    return format(subDays(parseISO(today), 1), 'yyyy-MM-dd');
  }
  return today;
}

/**
 * Build `daysBack + 1` working-hour windows (09:00–18:00 local), newest day
 * first. Local wall-clock times go through the zone's rules for that day, so
 * DST days get their own UTC offset.
 */
export function generateWorkingWindows(
  timezone: string,
  daysBack: number,
  now: Date = new Date(),
): TimeWindow[] {
  if (!Number.isInteger(daysBack) || daysBack < 0) {
    throw new RangeError(`daysBack must be a non-negative integer, got ${daysBack}`);
  }

  const anchor = parseISO(anchorDate(timezone, now));
  const windows: TimeWindow[] = [];

  for (let i = 0; i <= daysBack; i++) {
    const date = format(subDays(anchor, i), 'yyyy-MM-dd');
    const start = fromZonedTime(`${date}T${WORKDAY_START}`, timezone);
    const end = fromZonedTime(`${date}T${WORKDAY_END}`, timezone);

    windows.push(Object.freeze({
      date,
      timeFrom: getUnixTime(start),
      timeTill: getUnixTime(end),
      readableUtcStart: formatInTimeZone(start, 'UTC', "yyyy-MM-dd HH:mm:ss 'UTC'"),
    }));
  }

  return windows;
}
