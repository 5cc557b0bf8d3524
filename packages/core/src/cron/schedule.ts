import { CronExpressionParser } from 'cron-parser';
import { InvalidScheduleError, errorMessage } from './errors.ts';
import { fromWallClock, isValidTimezone, toWallClock } from './timezone.ts';
import type { CronSchedule } from './types.ts';

const DAY_MS = 24 * 60 * 60 * 1000;
// Long enough to reach the next Feb 29 across a skipped leap year.
const MAX_SEARCH_DAYS = 366 * 8;

export interface CronFields {
  seconds: number[];
  minutes: number[];
  hours: number[];
  daysOfMonth: Set<number>;
  months: Set<number>;
  daysOfWeek: Set<number>;
  /** When both day fields are restricted a day matches if either does. */
  daysOfMonthRestricted: boolean;
  daysOfWeekRestricted: boolean;
}

function numbers(values: readonly unknown[]): number[] {
  const out = values.filter((v): v is number => typeof v === 'number');
  return [...new Set(out)].sort((a, b) => a - b);
}

function parseWithLibrary(trimmed: string, expr: string) {
  try {
    return CronExpressionParser.parse(trimmed);
  } catch (err) {
    throw new InvalidScheduleError(`Invalid cron expression "${expr}": ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export function parseCronExpression(expr: string): CronFields {
  const trimmed = expr.trim();
  if (!trimmed) {
    throw new InvalidScheduleError('Cron expression is empty');
  }

  if (!trimmed.startsWith('@')) {
    const fields = trimmed.split(/\s+/);
    if (fields.length !== 5 && fields.length !== 6) {
      throw new InvalidScheduleError(
        `Invalid cron expression "${expr}": expected 5 or 6 fields, got ${fields.length}`,
      );
    }
    const dayOfMonth = fields[fields.length - 3];
    const dayOfWeek = fields[fields.length - 1];
    if (/[LW#]/i.test(dayOfMonth) || /[L#]/i.test(dayOfWeek)) {
      throw new InvalidScheduleError(
        `Invalid cron expression "${expr}": L, W and # modifiers are not supported`,
      );
    }
  }

  const { fields } = parseWithLibrary(trimmed, expr);
  const daysOfWeek = new Set(numbers(fields.dayOfWeek.values).map((d) => (d === 7 ? 0 : d)));
  const daysOfMonth = new Set(numbers(fields.dayOfMonth.values));

  return {
    seconds: numbers(fields.second.values),
    minutes: numbers(fields.minute.values),
    hours: numbers(fields.hour.values),
    daysOfMonth,
    months: new Set(numbers(fields.month.values)),
    daysOfWeek,
    daysOfMonthRestricted: daysOfMonth.size < 31,
    daysOfWeekRestricted: daysOfWeek.size < 7,
  };
}

function matchesDay(fields: CronFields, dayOfMonth: number, dayOfWeek: number): boolean {
  const domMatch = fields.daysOfMonth.has(dayOfMonth);
  const dowMatch = fields.daysOfWeek.has(dayOfWeek);
  if (fields.daysOfMonthRestricted && fields.daysOfWeekRestricted) {
    return domMatch || dowMatch;
  }
  return domMatch && dowMatch;
}

/**
 * Walks local wall-clock time in `timezone` and converts to an instant only for
 * matching candidates, so times inside a DST gap are never produced and a
 * repeated hour resolves to its first occurrence.
 */
export function nextCronOccurrence(
  fields: CronFields,
  referenceMs: number,
  timezone: string,
): number | null {
  const start = toWallClock(referenceMs, timezone);
  const startDay = Date.UTC(start.year, start.month - 1, start.day);

  for (let offset = 0; offset <= MAX_SEARCH_DAYS; offset++) {
    const date = new Date(startDay + offset * DAY_MS);
    const year = date.getUTCFullYear();
    const month = date.getUTCMonth() + 1;
    const day = date.getUTCDate();

    if (!fields.months.has(month) || !matchesDay(fields, day, date.getUTCDay())) continue;

    const firstDay = offset === 0;
    for (const hour of fields.hours) {
      if (firstDay && hour < start.hour) continue;
      for (const minute of fields.minutes) {
        if (firstDay && hour === start.hour && minute < start.minute) continue;
        for (const second of fields.seconds) {
          const instant = fromWallClock({ year, month, day, hour, minute, second }, timezone);
          if (instant !== null && instant > referenceMs) return instant;
        }
      }
    }
  }

  return null;
}

function checkSchedule(schedule: CronSchedule, timezone: string): CronFields | null {
  if (!isValidTimezone(timezone)) {
    throw new InvalidScheduleError(`Unknown timezone "${timezone}"`);
  }

  switch (schedule.kind) {
    case 'at':
      if (!Number.isFinite(schedule.atMs) || schedule.atMs <= 0) {
        throw new InvalidScheduleError('at schedule needs a positive epoch timestamp');
      }
      return null;
    case 'every':
      if (!Number.isFinite(schedule.everyMs) || schedule.everyMs <= 0) {
        throw new InvalidScheduleError('every schedule needs an interval greater than 0ms');
      }
      return null;
    case 'cron':
      return parseCronExpression(schedule.expr);
    default: {
      const unknown: never = schedule;
      throw new InvalidScheduleError(`Unknown schedule kind: ${JSON.stringify(unknown)}`);
    }
  }
}

export function validateSchedule(schedule: CronSchedule, timezone: string): void {
  checkSchedule(schedule, timezone);
}

/**
 * Next eligible execution instant strictly after `referenceMs`, or null when the
 * schedule will not fire again. Throws InvalidScheduleError on malformed input.
 */
export function computeNextRun(
  schedule: CronSchedule,
  referenceMs: number,
  timezone: string,
): number | null {
  const cronFields = checkSchedule(schedule, timezone);

  switch (schedule.kind) {
    case 'at':
      return schedule.atMs > referenceMs ? schedule.atMs : null;
    case 'every':
      return referenceMs + schedule.everyMs;
    case 'cron':
      return cronFields === null ? null : nextCronOccurrence(cronFields, referenceMs, timezone);
  }
}

export function describeSchedule(schedule: CronSchedule): string {
  switch (schedule.kind) {
    case 'at':
      return `at ${new Date(schedule.atMs).toISOString()}`;
    case 'every':
      return schedule.everyMs % 1000 === 0
        ? `every ${schedule.everyMs / 1000}s`
        : `every ${schedule.everyMs}ms`;
    case 'cron':
      return `cron ${schedule.expr}`;
  }
}
