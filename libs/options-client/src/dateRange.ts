import { formatIsoDate } from '@strikeline/option-symbols';
import { InvalidRangeError } from './errors';
import { TIMESPANS } from './types';
import type { DateInput, DateRange, SplitDateRangeOptions, Timespan, TimespanInput } from './types';

const DAY_MS = 86_400_000;

/** Server-side cap on rows returned by a single aggregates request. */
export const DEFAULT_ROW_CAP = 50_000;

const DEFAULT_HEADROOM = 0.5;
const HIGH_VOLATILITY_HEADROOM = 0.2;

// Estimated bars per span of days, kept as integer pairs so window sizes
// come out exact.
const BAR_DENSITY: Record<Timespan, { bars: number; days: number }> = {
  minute: { bars: 1440, days: 1 },
  hour: { bars: 24, days: 1 },
  day: { bars: 1, days: 1 },
  week: { bars: 1, days: 7 },
  month: { bars: 1, days: 28 },
  quarter: { bars: 1, days: 90 },
  year: { bars: 1, days: 365 },
};

const ISO_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function normalizeTimespan(value: string): Timespan {
  const lowered = value.trim().toLowerCase();
  if (lowered === 'min') {
    return 'minute';
  }
  const match = TIMESPANS.find((timespan) => timespan === lowered);
  if (!match) {
    throw new InvalidRangeError(`Unsupported timespan "${value}"`, value);
  }
  return match;
}

/** Normalise a date input to UTC midnight of its calendar day. */
export function toUtcDay(input: DateInput): Date {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidRangeError('Invalid date', input);
    }
    return new Date(Date.UTC(input.getUTCFullYear(), input.getUTCMonth(), input.getUTCDate()));
  }

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new InvalidRangeError(`Invalid epoch milliseconds ${input}`, input);
    }
    return toUtcDay(new Date(input));
  }

  const match = ISO_DAY_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidRangeError(`Expected a YYYY-MM-DD date, got "${input}"`, input);
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (formatIsoDate(date) !== input.trim()) {
    throw new InvalidRangeError(`"${input}" is not a calendar date`, input);
  }
  return date;
}

export function formatDay(input: DateInput): string {
  return formatIsoDate(toUtcDay(input));
}

export function safeWindowDays(timespan: Timespan, options: SplitDateRangeOptions = {}): number {
  const rowCap = options.rowCap ?? DEFAULT_ROW_CAP;
  if (!Number.isFinite(rowCap) || rowCap <= 0) {
    throw new InvalidRangeError(`Row cap must be a positive number, got ${rowCap}`, rowCap);
  }
  const headroom = options.highVolatility ? HIGH_VOLATILITY_HEADROOM : DEFAULT_HEADROOM;
  const { bars, days } = BAR_DENSITY[timespan];
  return Math.max(1, Math.floor((rowCap * headroom * days) / bars));
}

export function estimateRowCount(range: DateRange, timespan: Timespan): number {
  const dayCount = Math.round((range.end.getTime() - range.start.getTime()) / DAY_MS) + 1;
  const { bars, days } = BAR_DENSITY[timespan];
  return Math.ceil((dayCount * bars) / days);
}

/**
 * Split `[from, to]` into contiguous, ascending windows small enough that a
 * single aggregates request per window stays under the row cap.
 *
 * @example
 * splitDateRange('2024-01-01', '2024-01-31', 'minute');
 * // => [2024-01-01..2024-01-17, 2024-01-18..2024-01-31]
 */
export function splitDateRange(
  from: DateInput,
  to: DateInput,
  timespan: TimespanInput,
  options: SplitDateRangeOptions = {},
): DateRange[] {
  const start = toUtcDay(from);
  const end = toUtcDay(to);
  if (start.getTime() > end.getTime()) {
    throw new InvalidRangeError(
      `Range start ${formatIsoDate(start)} is after its end ${formatIsoDate(end)}`,
      { from, to },
    );
  }

  const windowDays = safeWindowDays(normalizeTimespan(timespan), options);
  const chunks: DateRange[] = [];

  for (let cursor = start.getTime(); cursor <= end.getTime(); ) {
    const chunkEnd = Math.min(cursor + (windowDays - 1) * DAY_MS, end.getTime());
    chunks.push(Object.freeze({ start: new Date(cursor), end: new Date(chunkEnd) }));
    cursor = chunkEnd + DAY_MS;
  }

  return chunks;
}
