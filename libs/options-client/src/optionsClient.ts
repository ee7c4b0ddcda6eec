import type { z } from 'zod';
import { ensurePrefix } from '@strikeline/option-symbols';
import { formatDay, normalizeTimespan, splitDateRange } from './dateRange';
import { FetchAbortedError, InvalidRangeError, OptionsRequestError, describeError } from './errors';
import { fetchMerged, mergePages, collectPages } from './fetchMerger';
import type { ChunkFetchMode } from './fetchMerger';
import {
  aggregatesResponseSchema,
  dailyOpenCloseSchema,
  lastTradeResponseSchema,
  optionSnapshotResponseSchema,
  quotesResponseSchema,
  tradesResponseSchema,
} from './schemas';
import type {
  AggregateBar,
  AggregatesResponse,
  DailyOpenClose,
  LastTradeResponse,
  OptionSnapshotResponse,
  QuotesResponse,
  TradesResponse,
} from './schemas';
import type {
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
  QueryParams,
  QuotesParams,
  RequestControl,
  RequestOptions,
  Timespan,
  TimestampFilters,
  TimestampInput,
  TradesParams,
} from './types';
import type { ChunkFetchError } from './errors';

const DEFAULT_BASE_URL = 'https://api.polygon.io';
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_CONCURRENT_CHUNKS = 5;
const AGGREGATES_PAGE_LIMIT = 50_000;
const CLIENT_NAME = 'options';

export interface PagedPayload<TRecord = unknown> {
  results: TRecord[];
  next_url?: string;
}

export interface FullRangeAggregates {
  symbol: string;
  timespan: Timespan;
  bars: AggregateBar[];
  chunkCount: number;
  complete: boolean;
  failures: ChunkFetchError[];
}

type GetOptions = Pick<RequestOptions, 'signal' | 'operation' | 'timeoutMs'>;

export class OptionsClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxConcurrentChunks: number;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly transport: HttpTransport;

  constructor(private readonly config: OptionsClientConfig) {
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxConcurrentChunks = config.maxConcurrentChunks ?? DEFAULT_MAX_CONCURRENT_CHUNKS;
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
  }

  // ---------------------------------------------------------------------------
  // Public HTTP helpers
  // ---------------------------------------------------------------------------

  /** Send a request and return the decoded JSON body, unvalidated. */
  async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = (options.method ?? 'GET').toUpperCase();
    const url = this.buildUrl(path, options.params);
    const operation = options.operation ?? path;
    const timeout = options.timeoutMs ?? this.timeoutMs;

    const init: RequestInit = {
      method,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
        ...options.headers,
      },
      signal: options.signal,
    };

    const start = Date.now();
    let response: Response;
    try {
      response = await this.executeHttp(url, init, timeout > 0 ? timeout : undefined);
    } catch (error) {
      const status = error instanceof OptionsRequestError ? error.status : 0;
      await this.recordRequest(operation, start, status);
      if (!(error instanceof FetchAbortedError)) {
        this.logger?.warn?.(`[OptionsClient] ${method} ${operation} failed: ${describeError(error)}`);
      }
      throw error;
    }

    if (!response.ok) {
      const bodyText = await safeReadBody(response);
      await this.recordRequest(operation, start, response.status);
      this.logger?.warn?.(`[OptionsClient] ${method} ${operation} failed with status ${response.status}`);
      throw new OptionsRequestError(
        `Options API request failed with status ${response.status}`,
        response.status,
        bodyText,
      );
    }

    const data = await parseJson(response);
    await this.recordRequest(operation, start, response.status);
    return data;
  }

  /** GET a path (or an absolute cursor URL) and validate the body with `schema`. */
  async get<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    params?: QueryParams,
    options: GetOptions = {},
  ): Promise<z.infer<T>> {
    const data = await this.request(path, { ...options, method: 'GET', params });
    return schema.parse(data);
  }

  // ---------------------------------------------------------------------------
  // Trades & quotes
  // ---------------------------------------------------------------------------

  async getTrades(symbol: string, params: TradesParams = {}, control: RequestControl = {}): Promise<TradesResponse> {
    return this.get(`/v3/trades/${encodeSymbol(symbol)}`, tradesResponseSchema, buildTickQuery(params), {
      ...control,
      operation: 'trades',
    });
  }

  async getQuotes(symbol: string, params: QuotesParams = {}, control: RequestControl = {}): Promise<QuotesResponse> {
    return this.get(`/v3/quotes/${encodeSymbol(symbol)}`, quotesResponseSchema, buildTickQuery(params), {
      ...control,
      operation: 'quotes',
    });
  }

  async getLastTrade(symbol: string, control: RequestControl = {}): Promise<LastTradeResponse> {
    return this.get(`/v2/last/trade/${encodeSymbol(symbol)}`, lastTradeResponseSchema, undefined, {
      ...control,
      operation: 'last_trade',
    });
  }

  // ---------------------------------------------------------------------------
  // Aggregates
  // ---------------------------------------------------------------------------

  async getDailyOpenClose(
    symbol: string,
    date: DateInput,
    params: AdjustedParams = {},
    control: RequestControl = {},
  ): Promise<DailyOpenClose> {
    return this.get(
      `/v1/open-close/${encodeSymbol(symbol)}/${formatDay(date)}`,
      dailyOpenCloseSchema,
      { adjusted: params.adjusted },
      { ...control, operation: 'daily_open_close' },
    );
  }

  async getPreviousClose(symbol: string, params: AdjustedParams = {}, control: RequestControl = {}): Promise<AggregatesResponse> {
    return this.get(
      `/v2/aggs/ticker/${encodeSymbol(symbol)}/prev`,
      aggregatesResponseSchema,
      { adjusted: params.adjusted },
      { ...control, operation: 'previous_close' },
    );
  }

  /** One aggregates request; the server caps the number of bars it returns. */
  async getAggregateBars(
    symbol: string,
    from: DateInput,
    to: DateInput,
    params: AggregateBarsParams = {},
    control: RequestControl = {},
  ): Promise<AggregatesResponse> {
    const multiplier = params.multiplier ?? 1;
    if (!Number.isInteger(multiplier) || multiplier < 1) {
      throw new InvalidRangeError(`Multiplier must be a positive integer, got ${multiplier}`, multiplier);
    }
    const timespan = normalizeTimespan(params.timespan ?? 'day');
    const path = [
      '/v2/aggs/ticker',
      encodeSymbol(symbol),
      'range',
      multiplier,
      timespan,
      formatDay(from),
      formatDay(to),
    ].join('/');

    return this.get(
      path,
      aggregatesResponseSchema,
      { adjusted: params.adjusted, sort: params.sort, limit: params.limit },
      { ...control, operation: 'aggregates' },
    );
  }

  /**
   * Aggregate bars over a range of any length: the range is split into
   * windows that stay under the row cap, each window is fetched (following
   * its cursors), and the bars are merged in the requested sort order.
   */
  async getFullRangeAggregateBars(
    symbol: string,
    from: DateInput,
    to: DateInput,
    params: FullRangeAggregateBarsParams = {},
  ): Promise<FullRangeAggregates> {
    const prefixed = ensurePrefix(symbol);
    const timespan = normalizeTimespan(params.timespan ?? 'day');
    const chunks = splitDateRange(from, to, timespan, {
      highVolatility: params.highVolatility,
      rowCap: params.rowCap,
    });
    const ordered = params.sort === 'desc' ? [...chunks].reverse() : chunks;

    const mode: ChunkFetchMode =
      params.parallel === false
        ? { parallel: false }
        : { parallel: true, maxConcurrency: params.maxConcurrency ?? this.maxConcurrentChunks };

    this.logger?.debug?.(
      `[OptionsClient] Fetching ${prefixed} ${timespan} bars in ${chunks.length} chunk(s)`,
    );

    const barsParams: AggregateBarsParams = {
      multiplier: params.multiplier,
      timespan,
      adjusted: params.adjusted,
      sort: params.sort,
      limit: params.limit ?? AGGREGATES_PAGE_LIMIT,
    };

    const merged = await fetchMerged(
      ordered,
      (chunk, _index, signal) => this.fetchChunkBars(prefixed, chunk, barsParams, signal),
      (bars, chunk) => {
        if (bars.length === 0) {
          this.logger?.warn?.(
            `[OptionsClient] No ${timespan} bars for ${prefixed} between ${formatDay(chunk.start)} and ${formatDay(chunk.end)}`,
          );
        }
        return bars;
      },
      { ...mode, allowPartial: params.allowPartial, signal: params.signal, logger: this.logger },
    );

    return {
      symbol: prefixed,
      timespan,
      bars: merged.records,
      chunkCount: chunks.length,
      complete: merged.complete,
      failures: merged.failures,
    };
  }

  // ---------------------------------------------------------------------------
  // Snapshot
  // ---------------------------------------------------------------------------

  async getSnapshot(underlying: string, symbol: string, control: RequestControl = {}): Promise<OptionSnapshotResponse> {
    return this.get(
      `/v3/snapshot/options/${encodeURIComponent(underlying.trim().toUpperCase())}/${encodeSymbol(symbol)}`,
      optionSnapshotResponseSchema,
      undefined,
      { ...control, operation: 'snapshot' },
    );
  }

  // ---------------------------------------------------------------------------
  // Pagination
  // ---------------------------------------------------------------------------

  /** Follow `next_url` cursors from an already fetched page. */
  async getAllPages<TPage extends PagedPayload>(
    firstPage: TPage,
    schema: z.ZodType<TPage, z.ZodTypeDef, unknown>,
    options: PageOptions = {},
  ): Promise<TPage[]> {
    return collectPages(firstPage, {
      fetchNextPage: (cursor, signal) => this.get(cursor, schema, undefined, { signal, operation: 'next_page' }),
      getNextCursor: (page) => page.next_url,
      maxPages: options.maxPages,
      signal: options.signal,
      logger: this.logger,
    });
  }

  /** Like {@link getAllPages}, concatenating the `results` of every page. */
  async mergeAllPages<TRecord>(
    firstPage: PagedPayload<TRecord>,
    schema: z.ZodType<PagedPayload<TRecord>, z.ZodTypeDef, unknown>,
    options: PageOptions = {},
  ): Promise<TRecord[]> {
    return mergePages(firstPage, (page) => page.results, {
      fetchNextPage: (cursor, signal) => this.get(cursor, schema, undefined, { signal, operation: 'next_page' }),
      getNextCursor: (page) => page.next_url,
      maxPages: options.maxPages,
      signal: options.signal,
      logger: this.logger,
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async fetchChunkBars(
    symbol: string,
    chunk: DateRange,
    params: AggregateBarsParams,
    signal: AbortSignal,
  ): Promise<AggregateBar[]> {
    const firstPage = await this.getAggregateBars(symbol, chunk.start, chunk.end, params, { signal });
    return this.mergeAllPages(firstPage, aggregatesResponseSchema, { signal });
  }

  private async recordRequest(operation: string, start: number, status: number): Promise<void> {
    await this.metrics?.recordRequest?.({
      client: CLIENT_NAME,
      operation,
      durationMs: Date.now() - start,
      status,
    });
  }

  private async executeHttp(url: string, init: RequestInit, timeoutMs?: number): Promise<Response> {
    const controller = new AbortController();
    const originalSignal = init.signal ?? undefined;
    const abortHandler = () => controller.abort(originalSignal?.reason);

    if (originalSignal) {
      if (originalSignal.aborted) {
        throw new FetchAbortedError(originalSignal.reason);
      }
      originalSignal.addEventListener('abort', abortHandler);
    }

    let timedOut = false;
    const timeoutId = timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : undefined;

    try {
      return await this.transport(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (originalSignal?.aborted) {
        throw new FetchAbortedError(originalSignal.reason);
      }
      if (timedOut) {
        throw new OptionsRequestError(`Options API request timed out after ${timeoutMs}ms`, 0);
      }
      throw new OptionsRequestError(`Options API request failed: ${describeError(error)}`, 0);
    } finally {
      clearTimeout(timeoutId);
      originalSignal?.removeEventListener('abort', abortHandler);
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(path, this.baseUrl);
    if (params) {
      const entries = Object.entries(params).filter(([, value]) => value !== undefined);
      entries.sort(([a], [b]) => a.localeCompare(b));
      for (const [key, value] of entries) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }
}

function encodeSymbol(symbol: string): string {
  return encodeURIComponent(ensurePrefix(symbol));
}

export function formatTimestamp(value: TimestampInput): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidRangeError('Invalid timestamp', value);
    }
    return `${value.getTime()}000000`;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidRangeError(`Timestamp must be integer epoch milliseconds, got ${value}`, value);
    }
    return `${value}000000`;
  }
  return String(value);
}

const TIMESTAMP_FILTER_KEYS: Array<[keyof TimestampFilters, string]> = [
  ['timestamp', 'timestamp'],
  ['timestampLt', 'timestamp.lt'],
  ['timestampLte', 'timestamp.lte'],
  ['timestampGt', 'timestamp.gt'],
  ['timestampGte', 'timestamp.gte'],
];

function buildTickQuery(params: TradesParams): QueryParams | undefined {
  const query: QueryParams = {};
  for (const [field, key] of TIMESTAMP_FILTER_KEYS) {
    const value = params[field];
    if (value !== undefined) {
      query[key] = formatTimestamp(value);
    }
  }
  if (params.order) {
    query.order = params.order;
  }
  if (params.sort) {
    query.sort = params.sort;
  }
  if (params.limit !== undefined) {
    query.limit = params.limit;
  }
  return Object.keys(query).length ? query : undefined;
}

async function parseJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new OptionsRequestError(
      `Failed to parse JSON response: ${describeError(error)}`,
      response.status,
      text,
    );
  }
}

async function safeReadBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `Failed to read response body: ${describeError(error)}`;
  }
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function createOptionsClientFromEnv(
  overrides: Partial<Omit<OptionsClientConfig, 'apiKey'>> = {},
): OptionsClient {
  const apiKey = process.env.MARKET_DATA_API_KEY;
  if (!apiKey) {
    throw new Error('MARKET_DATA_API_KEY environment variable is required');
  }

  const config: OptionsClientConfig = {
    apiKey,
    baseUrl: overrides.baseUrl ?? process.env.MARKET_DATA_BASE_URL ?? DEFAULT_BASE_URL,
    timeoutMs:
      overrides.timeoutMs ??
      parseOptionalNumber(process.env.MARKET_DATA_TIMEOUT_MS) ??
      DEFAULT_TIMEOUT_MS,
    maxConcurrentChunks:
      overrides.maxConcurrentChunks ??
      parseOptionalNumber(process.env.MARKET_DATA_MAX_CONCURRENT_CHUNKS) ??
      DEFAULT_MAX_CONCURRENT_CHUNKS,
    logger: overrides.logger,
    metrics: overrides.metrics,
    transport: overrides.transport,
  };

  return new OptionsClient(config);
}
