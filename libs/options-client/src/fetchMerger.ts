import { formatIsoDate } from '@strikeline/option-symbols';
import { ChunkFetchError, FetchAbortedError } from './errors';
import type { DateRange, Logger } from './types';

// ============================================================================
// Chunked fetches
// ============================================================================

/** Sequential or bounded-parallel execution. There is no default pool size. */
export type ChunkFetchMode = { parallel: false } | { parallel: true; maxConcurrency: number };

export type FetchChunksOptions = ChunkFetchMode & {
  /** Collect failures instead of rejecting on the first one. */
  allowPartial?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
};

export type ChunkFetcher<TResult> = (
  chunk: DateRange,
  index: number,
  signal: AbortSignal,
) => Promise<TResult>;

export interface ChunkResult<TResult> {
  chunk: DateRange;
  index: number;
  value: TResult;
}

export interface ChunkFetchReport<TResult> {
  /** Successful fetches in chunk order. */
  results: ChunkResult<TResult>[];
  failures: ChunkFetchError[];
  complete: boolean;
}

export async function fetchChunks<TResult>(
  chunks: readonly DateRange[],
  fetchOne: ChunkFetcher<TResult>,
  options: FetchChunksOptions,
): Promise<ChunkFetchReport<TResult>> {
  const { signal, logger } = options;
  const limit = options.parallel ? options.maxConcurrency : 1;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`maxConcurrency must be a positive integer, got ${limit}`);
  }
  if (signal?.aborted) {
    throw new FetchAbortedError(signal.reason);
  }

  const controller = new AbortController();
  const slots: Array<ChunkResult<TResult> | undefined> = new Array(chunks.length);
  const failures: ChunkFetchError[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (!controller.signal.aborted) {
      const index = next++;
      if (index >= chunks.length) {
        return;
      }
      const chunk = chunks[index];
      logger?.debug?.(
        `Fetching chunk ${index + 1}/${chunks.length} (${formatIsoDate(chunk.start)}..${formatIsoDate(chunk.end)})`,
      );

      try {
        const value = await fetchOne(chunk, index, controller.signal);
        slots[index] = { chunk, index, value };
      } catch (error) {
        if (controller.signal.aborted) {
          // The outcome was already decided by another failure or the caller.
          return;
        }
        const failure = new ChunkFetchError(chunk, index, error);
        if (!options.allowPartial) {
          controller.abort(failure);
          throw failure;
        }
        logger?.warn?.(failure.message);
        failures.push(failure);
      }
    }
  };

  const workerCount = Math.min(limit, Math.max(1, chunks.length));
  const workers = Promise.all(Array.from({ length: workerCount }, () => worker()));
  await raceAbort(workers, signal, (reason) => controller.abort(reason));

  failures.sort((a, b) => a.index - b.index);
  const results = slots.filter((slot): slot is ChunkResult<TResult> => slot !== undefined);
  return { results, failures, complete: failures.length === 0 };
}

export interface MergedRecords<TRecord> {
  records: TRecord[];
  failures: ChunkFetchError[];
  complete: boolean;
}

/** Fetch every chunk and concatenate their records in chunk order. */
export async function fetchMerged<TResult, TRecord>(
  chunks: readonly DateRange[],
  fetchOne: ChunkFetcher<TResult>,
  extractRecords: (result: TResult, chunk: DateRange) => readonly TRecord[],
  options: FetchChunksOptions,
): Promise<MergedRecords<TRecord>> {
  const report = await fetchChunks(chunks, fetchOne, options);
  const records = report.results.flatMap(({ value, chunk }) => extractRecords(value, chunk));
  return { records, failures: report.failures, complete: report.complete };
}

// ============================================================================
// Cursor pagination
// ============================================================================

export interface CollectPagesOptions<TPage> {
  fetchNextPage: (cursor: string, signal?: AbortSignal) => Promise<TPage>;
  getNextCursor: (page: TPage) => string | null | undefined;
  /** Counts the initial page. */
  maxPages?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/** Follow cursors one page at a time, starting from an already fetched page. */
export async function collectPages<TPage>(
  initial: TPage,
  options: CollectPagesOptions<TPage>,
): Promise<TPage[]> {
  const { signal, logger } = options;
  const maxPages = options.maxPages ?? Number.POSITIVE_INFINITY;
  if (!(maxPages >= 1)) {
    throw new RangeError(`maxPages must be at least 1, got ${maxPages}`);
  }

  const pages = [initial];
  let cursor = options.getNextCursor(initial);

  while (cursor && pages.length < maxPages) {
    if (signal?.aborted) {
      throw new FetchAbortedError(signal.reason);
    }
    logger?.debug?.(`Fetching page ${pages.length + 1}`);
    const page = await raceAbort(options.fetchNextPage(cursor, signal), signal);
    pages.push(page);
    cursor = options.getNextCursor(page);
  }

  if (cursor) {
    logger?.debug?.(`Stopped after ${pages.length} pages with more results available`);
  }
  return pages;
}

export async function collectPageRecords<TPage, TRecord>(
  initial: TPage,
  extractRecords: (page: TPage) => readonly TRecord[],
  options: CollectPagesOptions<TPage>,
): Promise<TRecord[][]> {
  const pages = await collectPages(initial, options);
  return pages.map((page) => [...extractRecords(page)]);
}

export async function mergePages<TPage, TRecord>(
  initial: TPage,
  extractRecords: (page: TPage) => readonly TRecord[],
  options: CollectPagesOptions<TPage>,
): Promise<TRecord[]> {
  const pages = await collectPages(initial, options);
  return pages.flatMap((page) => extractRecords(page));
}

// ============================================================================
// Helpers
// ============================================================================

async function raceAbort<T>(
  work: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort?: (reason: unknown) => void,
): Promise<T> {
  if (!signal) {
    return work;
  }

  let rejectAborted: (error: FetchAbortedError) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const listener = () => {
    onAbort?.(signal.reason);
    rejectAborted(new FetchAbortedError(signal.reason));
  };
  signal.addEventListener('abort', listener, { once: true });

  try {
    return await Promise.race([work, aborted]);
  } finally {
    signal.removeEventListener('abort', listener);
  }
}
