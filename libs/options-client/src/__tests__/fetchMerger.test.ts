import { describe, expect, it, vi } from 'vitest';
import { splitDateRange } from '../dateRange';
import { ChunkFetchError, FetchAbortedError } from '../errors';
import { collectPageRecords, collectPages, fetchChunks, fetchMerged, mergePages } from '../fetchMerger';
import type { DateRange } from '../types';

const chunks = splitDateRange('2024-01-01', '2024-01-04', 'day', { rowCap: 2 });

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('fetchChunks', () => {
  it('splits the fixture into one chunk per day', () => {
    expect(chunks).toHaveLength(4);
  });

  it('runs sequentially in chunk order', async () => {
    const order: number[] = [];
    let active = 0;
    let peak = 0;

    const report = await fetchChunks(
      chunks,
      async (_chunk, index) => {
        active += 1;
        peak = Math.max(peak, active);
        order.push(index);
        await delay(1);
        active -= 1;
        return index * 10;
      },
      { parallel: false },
    );

    expect(order).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(1);
    expect(report.results.map((result) => result.value)).toEqual([0, 10, 20, 30]);
    expect(report.complete).toBe(true);
  });

  it('bounds the pool and reports results in chunk order', async () => {
    let active = 0;
    let peak = 0;
    const latencies = [8, 1, 5, 1];

    const report = await fetchChunks(
      chunks,
      async (chunk, index) => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(latencies[index]);
        active -= 1;
        return chunk.start.getUTCDate();
      },
      { parallel: true, maxConcurrency: 2 },
    );

    expect(peak).toBe(2);
    expect(report.results.map((result) => result.value)).toEqual([1, 2, 3, 4]);
    expect(report.results.map((result) => result.index)).toEqual([0, 1, 2, 3]);
  });

  it('rejects on the first failure and aborts outstanding fetches', async () => {
    const slow = deferred<number>();
    const signals: AbortSignal[] = [];

    const pending = fetchChunks(
      chunks,
      (_chunk, index, signal) => {
        signals.push(signal);
        if (index === 1) {
          return Promise.reject(new Error('upstream 500'));
        }
        return slow.promise;
      },
      { parallel: true, maxConcurrency: 4 },
    );

    const error = await pending.catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(ChunkFetchError);
    if (error instanceof ChunkFetchError) {
      expect(error.index).toBe(1);
      expect(error.chunk).toBe(chunks[1]);
      expect(error.message).toBe('Chunk 1 (2024-01-02..2024-01-02) failed: upstream 500');
    }
    expect(signals[0].aborted).toBe(true);
    slow.resolve(0);
  });

  it('collects failures when partial results are allowed', async () => {
    const warn = vi.fn();

    const report = await fetchChunks(
      chunks,
      async (_chunk, index) => {
        if (index === 2) {
          throw new Error('timeout');
        }
        return index;
      },
      { parallel: true, maxConcurrency: 2, allowPartial: true, logger: { warn } },
    );

    expect(report.complete).toBe(false);
    expect(report.results.map((result) => result.index)).toEqual([0, 1, 3]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].index).toBe(2);
    expect(warn).toHaveBeenCalledWith('Chunk 2 (2024-01-03..2024-01-03) failed: timeout');
  });

  it('rejects with FetchAbortedError when the caller aborts', async () => {
    const controller = new AbortController();
    const never = deferred<number>();
    const seen: AbortSignal[] = [];

    const pending = fetchChunks(
      chunks,
      (_chunk, _index, signal) => {
        seen.push(signal);
        return never.promise;
      },
      { parallel: true, maxConcurrency: 2, signal: controller.signal },
    );
    controller.abort('user cancelled');

    await expect(pending).rejects.toBeInstanceOf(FetchAbortedError);
    expect(seen).toHaveLength(2);
    expect(seen[0].aborted).toBe(true);
  });

  it('refuses to start with an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchOne = vi.fn(async () => 1);

    await expect(
      fetchChunks(chunks, fetchOne, { parallel: false, signal: controller.signal }),
    ).rejects.toBeInstanceOf(FetchAbortedError);
    expect(fetchOne).not.toHaveBeenCalled();
  });

  it('rejects a pool size below one', async () => {
    await expect(fetchChunks(chunks, async () => 1, { parallel: true, maxConcurrency: 0 })).rejects.toThrow(
      RangeError,
    );
  });

  it('returns an empty report for no chunks', async () => {
    const report = await fetchChunks([], async () => 1, { parallel: true, maxConcurrency: 3 });

    expect(report).toEqual({ results: [], failures: [], complete: true });
  });
});

describe('fetchMerged', () => {
  it('concatenates records in chunk order without deduplicating', async () => {
    const extract = (values: string[], chunk: DateRange) =>
      values.map((value) => `${chunk.start.getUTCDate()}:${value}`);

    const merged = await fetchMerged(
      chunks,
      async (_chunk, index) => {
        await delay(4 - index);
        return index === 2 ? [] : ['a', 'a'];
      },
      extract,
      { parallel: true, maxConcurrency: 4 },
    );

    expect(merged.records).toEqual(['1:a', '1:a', '2:a', '2:a', '4:a', '4:a']);
    expect(merged.complete).toBe(true);
  });
});

interface Page {
  items: number[];
  next?: string;
}

describe('pagination', () => {
  const pagesByCursor: Record<string, Page> = {
    c2: { items: [3, 4], next: 'c3' },
    c3: { items: [5] },
  };
  const first: Page = { items: [1, 2], next: 'c2' };

  const options = () => ({
    fetchNextPage: vi.fn(async (cursor: string) => pagesByCursor[cursor]),
    getNextCursor: (page: Page) => page.next,
  });

  it('follows cursors until none remains', async () => {
    const opts = options();
    const pages = await collectPages(first, opts);

    expect(pages.map((page) => page.items)).toEqual([[1, 2], [3, 4], [5]]);
    expect(opts.fetchNextPage.mock.calls.map(([cursor]) => cursor)).toEqual(['c2', 'c3']);
  });

  it('counts the initial page against maxPages', async () => {
    const opts = options();

    expect(await collectPages(first, { ...opts, maxPages: 1 })).toEqual([first]);
    expect(opts.fetchNextPage).not.toHaveBeenCalled();
    expect(await mergePages(first, (page) => page.items, { ...opts, maxPages: 2 })).toEqual([1, 2, 3, 4]);
  });

  it('groups or flattens records per page', async () => {
    expect(await collectPageRecords(first, (page) => page.items, options())).toEqual([[1, 2], [3, 4], [5]]);
    expect(await mergePages(first, (page) => page.items, options())).toEqual([1, 2, 3, 4, 5]);
  });

  it('rejects a maxPages below one', async () => {
    await expect(collectPages(first, { ...options(), maxPages: 0 })).rejects.toThrow(RangeError);
  });

  it('stops with FetchAbortedError when aborted mid-way', async () => {
    const controller = new AbortController();
    const pending = collectPages(first, {
      fetchNextPage: () => new Promise<Page>(() => undefined),
      getNextCursor: (page: Page) => page.next,
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(FetchAbortedError);
  });
});
