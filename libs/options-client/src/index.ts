/**
 * @strikeline/options-client
 *
 * REST client for options market data with ranged aggregate fetching.
 *
 * ```typescript
 * import { createOptionsClientFromEnv } from '@strikeline/options-client';
 *
 * const client = createOptionsClientFromEnv();
 * const { bars, complete } = await client.getFullRangeAggregateBars(
 *   'TSLA211015P00125000',
 *   '2021-06-01',
 *   '2021-10-15',
 *   { timespan: 'minute', maxConcurrency: 3 },
 * );
 * ```
 *
 * Environment: `MARKET_DATA_API_KEY` (required), `MARKET_DATA_BASE_URL`,
 * `MARKET_DATA_TIMEOUT_MS`, `MARKET_DATA_MAX_CONCURRENT_CHUNKS`.
 */

export { OptionsClient, createOptionsClientFromEnv, formatTimestamp } from './optionsClient';
export type { FullRangeAggregates, PagedPayload } from './optionsClient';

export {
  DEFAULT_ROW_CAP,
  estimateRowCount,
  formatDay,
  normalizeTimespan,
  safeWindowDays,
  splitDateRange,
  toUtcDay,
} from './dateRange';

export { collectPageRecords, collectPages, fetchChunks, fetchMerged, mergePages } from './fetchMerger';
export type {
  ChunkFetchMode,
  ChunkFetchReport,
  ChunkFetcher,
  ChunkResult,
  CollectPagesOptions,
  FetchChunksOptions,
  MergedRecords,
} from './fetchMerger';

export {
  aggregateBarSchema,
  aggregatesResponseSchema,
  dailyOpenCloseSchema,
  lastTradeResponseSchema,
  optionSnapshotResponseSchema,
  pagedResponseSchema,
  quoteSchema,
  quotesResponseSchema,
  tradeSchema,
  tradesResponseSchema,
} from './schemas';
export type {
  AggregateBar,
  AggregatesResponse,
  DailyOpenClose,
  LastTradeResponse,
  OptionSnapshotResponse,
  Quote,
  QuotesResponse,
  Trade,
  TradesResponse,
} from './schemas';

export { TIMESPANS } from './types';
export type {
  AdjustedParams,
  AggregateBarsParams,
  DateInput,
  DateRange,
  FullRangeAggregateBarsParams,
  HttpTransport,
  Logger,
  MetricsSink,
  OptionsClientConfig,
  PageOptions,
  QueryParamValue,
  QueryParams,
  QuotesParams,
  RequestControl,
  RequestOptions,
  SortOrder,
  SplitDateRangeOptions,
  Timespan,
  TimespanInput,
  TimestampFilters,
  TimestampInput,
  TradesParams,
} from './types';

export {
  ApiRequestError,
  ChunkFetchError,
  FetchAbortedError,
  InvalidRangeError,
  OptionsRequestError,
} from './errors';
