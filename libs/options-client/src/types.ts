export interface Logger {
  debug?(message: string, meta?: unknown): void;
  info?(message: string, meta?: unknown): void;
  warn?(message: string, meta?: unknown): void;
  error?(message: string, meta?: unknown): void;
}

export interface MetricsSink {
  recordRequest?(info: {
    client: string;
    operation: string;
    durationMs: number;
    status: number;
  }): void | Promise<void>;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

export type QueryParamValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryParamValue>;

export interface RequestOptions {
  method?: string;
  params?: QueryParams;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
  operation?: string;
}

/** Per-call controls accepted by every endpoint helper. */
export interface RequestControl {
  signal?: AbortSignal;
}

export interface OptionsClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Pool size used by ranged fetches that do not pass their own. */
  maxConcurrentChunks?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
}

export const TIMESPANS = ['minute', 'hour', 'day', 'week', 'month', 'quarter', 'year'] as const;

export type Timespan = (typeof TIMESPANS)[number];

/** `min` is accepted as shorthand for `minute`. */
export type TimespanInput = Timespan | 'min';

/** A `Date`, a `YYYY-MM-DD` string or epoch milliseconds. */
export type DateInput = Date | string | number;

/** Inclusive range of UTC calendar days. */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

export interface SplitDateRangeOptions {
  highVolatility?: boolean;
  rowCap?: number;
}

/**
 * Timestamp filter value. Dates and numbers (epoch milliseconds) are scaled
 * to nanoseconds; bigints are nanoseconds; strings (`YYYY-MM-DD` or
 * nanosecond digits) are sent as given.
 */
export type TimestampInput = Date | string | number | bigint;

export type SortOrder = 'asc' | 'desc';

export interface TimestampFilters {
  timestamp?: TimestampInput;
  timestampLt?: TimestampInput;
  timestampLte?: TimestampInput;
  timestampGt?: TimestampInput;
  timestampGte?: TimestampInput;
}

export interface TradesParams extends TimestampFilters {
  order?: SortOrder;
  sort?: string;
  limit?: number;
}

export interface QuotesParams extends TradesParams {}

export interface AdjustedParams {
  adjusted?: boolean;
}

export interface AggregateBarsParams extends AdjustedParams {
  multiplier?: number;
  timespan?: TimespanInput;
  sort?: SortOrder;
  limit?: number;
}

export interface FullRangeAggregateBarsParams extends AggregateBarsParams, SplitDateRangeOptions {
  /** Defaults to `true`. */
  parallel?: boolean;
  maxConcurrency?: number;
  allowPartial?: boolean;
  signal?: AbortSignal;
}

export interface PageOptions {
  maxPages?: number;
  signal?: AbortSignal;
}
