export interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  if (!timezone) return false;
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

export function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function toWallClock(instantMs: number, timezone: string): WallClock {
  const parts = formatterFor(timezone).formatToParts(new Date(instantMs));
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parts.find((p) => p.type === type)?.value;
    return value === undefined ? 0 : Number(value);
  };
  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

function wallClockAsUtc(wall: WallClock): number {
  return Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
}

function sameWallClock(a: WallClock, b: WallClock): boolean {
  return (
    a.year === b.year &&
    a.month === b.month &&
    a.day === b.day &&
    a.hour === b.hour &&
    a.minute === b.minute &&
    a.second === b.second
  );
}

/** UTC offset of `timezone` at the given instant, in ms (east of UTC is positive). */
export function offsetAt(instantMs: number, timezone: string): number {
  const wholeSecond = Math.floor(instantMs / 1000) * 1000;
  return wallClockAsUtc(toWallClock(wholeSecond, timezone)) - wholeSecond;
}

/**
 * Absolute instant of a local wall-clock time. Returns null when the time falls in a
 * daylight-saving gap, and the earlier instant when it occurs twice.
 */
export function fromWallClock(wall: WallClock, timezone: string): number | null {
  const naive = wallClockAsUtc(wall);
  // Offsets a day either side bracket any single transition near this time.
  const offsets = new Set([
    offsetAt(naive - DAY_MS, timezone),
    offsetAt(naive, timezone),
    offsetAt(naive + DAY_MS, timezone),
  ]);

  let earliest: number | null = null;
  for (const offset of offsets) {
    const candidate = naive - offset;
    if (!sameWallClock(toWallClock(candidate, timezone), wall)) continue;
    if (earliest === null || candidate < earliest) earliest = candidate;
  }
  return earliest;
}
