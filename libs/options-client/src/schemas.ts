import { z } from 'zod';

// ============================================================================
// Shared envelopes
// ============================================================================

const envelopeFields = {
  status: z.string().optional(),
  request_id: z.string().optional(),
};

export function pagedResponseSchema<T extends z.ZodTypeAny>(record: T) {
  return z
    .object({
      ...envelopeFields,
      results: z.array(record).default([]),
      next_url: z.string().optional(),
    })
    .passthrough();
}

// ============================================================================
// Aggregates
// ============================================================================

export const aggregateBarSchema = z
  .object({
    t: z.number(),
    o: z.number(),
    h: z.number(),
    l: z.number(),
    c: z.number(),
    v: z.number(),
    vw: z.number().optional(),
    n: z.number().optional(),
  })
  .passthrough();

export const aggregatesResponseSchema = z
  .object({
    ...envelopeFields,
    ticker: z.string().optional(),
    adjusted: z.boolean().optional(),
    queryCount: z.number().optional(),
    resultsCount: z.number().optional(),
    results: z.array(aggregateBarSchema).default([]),
    next_url: z.string().optional(),
  })
  .passthrough();

export const dailyOpenCloseSchema = z
  .object({
    status: z.string().optional(),
    from: z.string(),
    symbol: z.string(),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number(),
    afterHours: z.number().optional(),
    preMarket: z.number().optional(),
  })
  .passthrough();

// ============================================================================
// Trades & quotes
// ============================================================================

export const tradeSchema = z
  .object({
    sip_timestamp: z.number(),
    price: z.number(),
    size: z.number(),
    exchange: z.number().optional(),
    conditions: z.array(z.number()).optional(),
    participant_timestamp: z.number().optional(),
    sequence_number: z.number().optional(),
  })
  .passthrough();

export const quoteSchema = z
  .object({
    sip_timestamp: z.number(),
    ask_price: z.number(),
    ask_size: z.number(),
    bid_price: z.number(),
    bid_size: z.number(),
    ask_exchange: z.number().optional(),
    bid_exchange: z.number().optional(),
    sequence_number: z.number().optional(),
  })
  .passthrough();

export const tradesResponseSchema = pagedResponseSchema(tradeSchema);
export const quotesResponseSchema = pagedResponseSchema(quoteSchema);

export const lastTradeResponseSchema = z
  .object({
    ...envelopeFields,
    results: z
      .object({
        T: z.string().optional(),
        p: z.number(),
        s: z.number(),
        t: z.number(),
        x: z.number().optional(),
        c: z.array(z.number()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

// ============================================================================
// Snapshot
// ============================================================================

export const optionSnapshotResponseSchema = z
  .object({
    ...envelopeFields,
    results: z
      .object({
        break_even_price: z.number().optional(),
        implied_volatility: z.number().optional(),
        open_interest: z.number().optional(),
        details: z
          .object({
            contract_type: z.string(),
            exercise_style: z.string().optional(),
            expiration_date: z.string(),
            shares_per_contract: z.number().optional(),
            strike_price: z.number(),
            ticker: z.string(),
          })
          .passthrough()
          .optional(),
        greeks: z
          .object({
            delta: z.number().optional(),
            gamma: z.number().optional(),
            theta: z.number().optional(),
            vega: z.number().optional(),
          })
          .passthrough()
          .optional(),
        day: z.record(z.unknown()).optional(),
        last_quote: z.record(z.unknown()).optional(),
        underlying_asset: z.record(z.unknown()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type AggregateBar = z.infer<typeof aggregateBarSchema>;
export type AggregatesResponse = z.infer<typeof aggregatesResponseSchema>;
export type DailyOpenClose = z.infer<typeof dailyOpenCloseSchema>;
export type Trade = z.infer<typeof tradeSchema>;
export type Quote = z.infer<typeof quoteSchema>;
export type TradesResponse = z.infer<typeof tradesResponseSchema>;
export type QuotesResponse = z.infer<typeof quotesResponseSchema>;
export type LastTradeResponse = z.infer<typeof lastTradeResponseSchema>;
export type OptionSnapshotResponse = z.infer<typeof optionSnapshotResponseSchema>;
