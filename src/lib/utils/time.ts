// ============================================================
// Time helpers
// ============================================================
// Candle timestamps are integer epoch milliseconds of the bar's
// open time. Session windows are "HH:MM" clock strings.
// ============================================================

export const MINUTE_MS = 60_000;
export const MINUTES_PER_DAY = 24 * 60;

/**
 * Normalise an epoch timestamp of unknown unit to integer milliseconds.
 *
 * - >= 1e12 is already ms
 * - a fractional value is seconds
 * - any other integer is seconds
 *
 * @throws when the input is not a finite number
 *
 * @example
 * toEpochMs(1700000000)       // 1700000000000
 * toEpochMs(1700000000.25)    // 1700000000250
 * toEpochMs('1700000000000')  // 1700000000000
 */
export function toEpochMs(input: number | string): number {
  if (typeof input === 'string' && input.trim() === '') {
    throw new Error(`invalid timestamp: ${input}`);
  }

  const n = typeof input === 'string' ? Number(input) : input;

  if (!Number.isFinite(n)) {
    throw new Error(`invalid timestamp: ${input}`);
  }

  if (!Number.isInteger(n)) {
    return Math.floor(n * 1000);
  }

  if (n >= 1e12) {
    return n;
  }

  return n * 1000;
}

/** Start of the bucket of size `intervalMs` containing `ts` */
export function floorToInterval(ts: number, intervalMs: number): number {
  return Math.floor(ts / intervalMs) * intervalMs;
}

/**
 * Parse "HH:MM" into minutes after midnight. Returns null for anything
 * that is not a valid 24h clock time.
 */
export function parseClock(value: string): number | null {
  const match = /^(\d{2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;

  return hours * 60 + minutes;
}

/** Minutes after midnight of `ts`, shifted by a fixed UTC offset */
export function minuteOfDay(ts: number, utcOffsetMinutes = 0): number {
  const shifted = Math.floor(ts / MINUTE_MS) + utcOffsetMinutes;
  return ((shifted % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

/**
 * Half-open clock window [start, end). A window whose start is after its
 * end wraps midnight; equal start and end is empty.
 */
export function isWithinClockWindow(minute: number, start: number, end: number): boolean {
  if (start === end) return false;
  if (start < end) return minute >= start && minute < end;
  return minute >= start || minute < end;
}

export function formatTimestamp(ts: number): string {
  return new Date(ts).toISOString();
}
