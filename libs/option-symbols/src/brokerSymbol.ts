import { MalformedSymbolError, SymbolTooShortError } from './errors';
import {
  decodeExpiryDigits,
  formatExpiryDigits,
  formatIsoDate,
  formatPlainStrike,
  normalizeOptionType,
  optionTypeCode,
  optionTypeFromCode,
  parsePlainStrike,
  resolveReferenceYear,
} from './fields';
import type {
  BrokerSymbolVariant,
  ExpiryInput,
  OptionTypeInput,
  ParsedOptionSymbol,
  ParseSymbolAsDateOptions,
  ParseSymbolAsStringOptions,
  ParseSymbolOptions,
  StrikeInput,
} from './types';

const DOT_MARKER = '.';
const SEPARATOR = '_';

/** Six date digits, the side and at least one strike digit. */
const MIN_TAIL_LENGTH = 8;

/**
 * Build a broker-style option symbol.
 *
 * - `underscore`: `TSLA_090321C700` (date as `MMDDYY`)
 * - `dot`: `.TSLA210903C700` (date as `YYMMDD`)
 *
 * A string `expiry` must already be six digits in the variant's own order.
 * Integral strikes are written without a fraction.
 */
export function buildBrokerSymbol(
  underlying: string,
  expiry: ExpiryInput,
  optionType: OptionTypeInput,
  strike: StrikeInput,
  variant: BrokerSymbolVariant = 'underscore',
): string {
  const ticker = underlying.trim().toUpperCase();
  const side = optionTypeCode(normalizeOptionType(optionType));
  const strikeText = formatPlainStrike(strike);

  if (variant === 'dot') {
    return `${DOT_MARKER}${ticker}${formatExpiryDigits(expiry, 'YYMMDD')}${side}${strikeText}`;
  }
  return `${ticker}${SEPARATOR}${formatExpiryDigits(expiry, 'MMDDYY')}${side}${strikeText}`;
}

/**
 * Rewrites `.TSLA210903C700` as `TSLA_090321C700`.
 */
function dotToUnderscore(symbol: string): string {
  const body = symbol.slice(DOT_MARKER.length).toUpperCase();
  const tickerLength = /^[A-Z]*/.exec(body)?.[0].length ?? 0;
  if (tickerLength === 0) {
    throw new MalformedSymbolError(`Missing underlying ticker in "${symbol}"`, symbol);
  }
  if (body.length < tickerLength + MIN_TAIL_LENGTH) {
    throw new SymbolTooShortError(symbol, DOT_MARKER.length + tickerLength + MIN_TAIL_LENGTH);
  }

  const ticker = body.slice(0, tickerLength);
  const yy = body.slice(tickerLength, tickerLength + 2);
  const mmdd = body.slice(tickerLength + 2, tickerLength + 6);
  return `${ticker}${SEPARATOR}${mmdd}${yy}${body.slice(tickerLength + 6)}`;
}

/**
 * Parse either broker variant. Dot symbols are rewritten into the underscore
 * form first; `canonicalSymbol` is always the underscore form.
 */
export function parseBrokerSymbol(
  symbol: string,
  options: ParseSymbolAsStringOptions,
): ParsedOptionSymbol<string>;
export function parseBrokerSymbol(
  symbol: string,
  options?: ParseSymbolAsDateOptions,
): ParsedOptionSymbol<Date>;
export function parseBrokerSymbol(
  symbol: string,
  options?: ParseSymbolOptions,
): ParsedOptionSymbol<Date | string>;
export function parseBrokerSymbol(
  symbol: string,
  options: ParseSymbolOptions = {},
): ParsedOptionSymbol<Date> | ParsedOptionSymbol<string> {
  const trimmed = symbol.trim();
  const underscored = (
    trimmed.startsWith(DOT_MARKER) ? dotToUnderscore(trimmed) : trimmed
  ).toUpperCase();

  const parts = underscored.split(SEPARATOR);
  if (parts.length !== 2 || !parts[0]) {
    throw new MalformedSymbolError(
      `Expected "TICKER_MMDDYY{C|P}STRIKE" but got "${symbol}"`,
      symbol,
    );
  }

  const [underlyingSymbol, tail] = parts;
  if (tail.length < MIN_TAIL_LENGTH) {
    throw new SymbolTooShortError(symbol, underlyingSymbol.length + SEPARATOR.length + MIN_TAIL_LENGTH);
  }

  const strikePrice = parsePlainStrike(tail.slice(7));
  if (strikePrice === undefined) {
    throw new MalformedSymbolError(`Strike "${tail.slice(7)}" in "${symbol}" is not a number`, symbol);
  }

  const expiry = decodeExpiryDigits(
    tail.slice(0, 6),
    'MMDDYY',
    resolveReferenceYear(options.referenceYear),
    symbol,
  );
  const fields = {
    underlyingSymbol,
    optionType: optionTypeFromCode(tail.charAt(6), symbol),
    strikePrice,
    canonicalSymbol: underscored,
  };

  if (options.expiryAsString) {
    return Object.freeze({ ...fields, expiry: formatIsoDate(expiry) });
  }
  return Object.freeze({ ...fields, expiry });
}
