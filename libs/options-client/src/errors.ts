import { formatIsoDate } from '@strikeline/option-symbols';
import type { DateRange } from './types';

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

export class OptionsRequestError extends ApiRequestError {
  constructor(message: string, status: number, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'OptionsRequestError';
  }
}

export class InvalidRangeError extends Error {
  constructor(
    message: string,
    public readonly input?: unknown,
  ) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class ChunkFetchError extends Error {
  constructor(
    public readonly chunk: DateRange,
    public readonly index: number,
    cause: unknown,
  ) {
    super(
      `Chunk ${index} (${formatIsoDate(chunk.start)}..${formatIsoDate(chunk.end)}) failed: ${describeError(cause)}`,
      { cause },
    );
    this.name = 'ChunkFetchError';
  }
}

export class FetchAbortedError extends Error {
  constructor(public readonly reason?: unknown) {
    super(reason === undefined ? 'Fetch aborted' : `Fetch aborted: ${describeError(reason)}`);
    this.name = 'FetchAbortedError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
