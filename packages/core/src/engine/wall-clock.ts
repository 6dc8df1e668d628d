import { parseExpression } from 'cron-parser';

/**
 * Wall-clock delay targets such as "09:00", "6:30pm", "Sunday at 6:00pm"
 * or "mon 09:15".
 */
export interface WallClockTime {
  readonly hour: number;
  readonly minute: number;
  /** 0 = Sunday; every day when omitted */
  readonly weekday?: number;
}

const WEEKDAYS: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tues: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thur: 4, thurs: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const PATTERN = /^(?:([a-z]+)\s+(?:at\s+)?)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)?$/i;

export function parseWallClock(spec: string): WallClockTime | undefined {
  const m = spec.trim().match(PATTERN);
  if (!m) return undefined;
  const [, day, h, mm, meridiem] = m;

  let weekday: number | undefined;
  if (day !== undefined) {
    weekday = WEEKDAYS[day.toLowerCase()];
    if (weekday === undefined) return undefined;
  }

  let hour = Number(h);
  const minute = mm === undefined ? 0 : Number(mm);
  if (minute > 59) return undefined;

  if (meridiem) {
    if (hour < 1 || hour > 12) return undefined;
    const pm = meridiem.toLowerCase() === 'pm';
    hour = (hour % 12) + (pm ? 12 : 0);
  } else {
    // A bare "9" is ambiguous
    if (mm === undefined || hour > 23) return undefined;
  }

  return weekday === undefined ? { hour, minute } : { hour, minute, weekday };
}

export function toCronExpression(time: WallClockTime): string {
  return `${time.minute} ${time.hour} * * ${time.weekday ?? '*'}`;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * First instant at or after `enteredAt` whose local time in `timezone`
 * matches `time`. A time already passed today rolls to the next eligible day.
 */
export function nextLocalOccurrence(time: WallClockTime, enteredAt: number, timezone: string): number {
  const interval = parseExpression(toCronExpression(time), {
    currentDate: new Date(enteredAt - 1000),
    tz: timezone,
  });
  let next = interval.next().getTime();
  while (next < enteredAt) {
    next = interval.next().getTime();
  }
  return next;
}
