import { MalformedSymbolError, SymbolTooShortError } from './errors';
import {
  decodeExpiryDigits,
  decodeStrike,
  encodeStrike,
  formatExpiryDigits,
  formatIsoDate,
  normalizeOptionType,
  optionTypeCode,
  optionTypeFromCode,
  resolveReferenceYear,
} from './fields';
import type {
  ExpiryInput,
  OptionTypeInput,
  ParsedOptionSymbol,
  ParseSymbolAsDateOptions,
  ParseSymbolAsStringOptions,
  ParseSymbolOptions,
  StrikeInput,
} from './types';

export const MARKET_PREFIX = 'O:';

/** `YYMMDD` + side + eight strike digits. */
export const OCC_SUFFIX_LENGTH = 15;

const STRIKE_DIGITS = /^\d{8}$/;

/**
 * Build an OCC-style option symbol.
 *
 * @param expiry - a `Date` (read in UTC) or a `YYMMDD` string
 * @param optionType - `c`/`call` for calls; anything else builds a put
 * @param strike - at most three fraction digits are kept, e.g. `15.0034` → `00015003`
 * @param prefixed - prepend the `O:` market marker
 *
 * @example
 * buildOptionSymbol('TSLA', new Date(Date.UTC(2021, 9, 15)), 'put', 125, true);
 * // => 'O:TSLA211015P00125000'
 */
export function buildOptionSymbol(
  underlying: string,
  expiry: ExpiryInput,
  optionType: OptionTypeInput,
  strike: StrikeInput,
  prefixed = false,
): string {
  const expiryDigits = formatExpiryDigits(expiry, 'YYMMDD');
  const side = optionTypeCode(normalizeOptionType(optionType));
  const symbol = `${underlying.trim().toUpperCase()}${expiryDigits}${side}${encodeStrike(strike)}`;
  return prefixed ? `${MARKET_PREFIX}${symbol}` : symbol;
}

export function stripMarketPrefix(symbol: string): string {
  return symbol.toUpperCase().startsWith(MARKET_PREFIX) ? symbol.slice(MARKET_PREFIX.length) : symbol;
}

/**
 * Parse an OCC-style symbol, with or without the `O:` marker.
 *
 * Digits in the underlying part are dropped, so correction-suffixed tickers
 * such as `TSLA1` parse as `TSLA`.
 */
export function parseOptionSymbol(
  symbol: string,
  options: ParseSymbolAsStringOptions,
): ParsedOptionSymbol<string>;
export function parseOptionSymbol(
  symbol: string,
  options?: ParseSymbolAsDateOptions,
): ParsedOptionSymbol<Date>;
export function parseOptionSymbol(
  symbol: string,
  options?: ParseSymbolOptions,
): ParsedOptionSymbol<Date | string>;
export function parseOptionSymbol(
  symbol: string,
  options: ParseSymbolOptions = {},
): ParsedOptionSymbol<Date> | ParsedOptionSymbol<string> {
  const body = stripMarketPrefix(symbol.trim().toUpperCase());
  if (body.length < OCC_SUFFIX_LENGTH) {
    throw new SymbolTooShortError(symbol, OCC_SUFFIX_LENGTH);
  }

  const split = body.length - OCC_SUFFIX_LENGTH;
  const suffix = body.slice(split);
  const underlyingSymbol = body.slice(0, split).replace(/\d/g, '');

  const strikeDigits = suffix.slice(7);
  if (!STRIKE_DIGITS.test(strikeDigits)) {
    throw new MalformedSymbolError(
      `Strike "${strikeDigits}" in "${symbol}" must be eight digits`,
      symbol,
    );
  }

  const expiry = decodeExpiryDigits(
    suffix.slice(0, 6),
    'YYMMDD',
    resolveReferenceYear(options.referenceYear),
    symbol,
  );
  const fields = {
    underlyingSymbol,
    optionType: optionTypeFromCode(suffix.charAt(6), symbol),
    strikePrice: decodeStrike(strikeDigits),
    canonicalSymbol: `${underlyingSymbol}${suffix}`,
  };

  if (options.expiryAsString) {
    return Object.freeze({ ...fields, expiry: formatIsoDate(expiry) });
  }
  return Object.freeze({ ...fields, expiry });
}

/**
 * Upper-cases the symbol and adds the `O:` marker the REST endpoints expect.
 */
export function ensurePrefix(symbol: string): string {
  const upper = symbol.trim().toUpperCase();
  if (upper.length < OCC_SUFFIX_LENGTH) {
    throw new SymbolTooShortError(symbol, OCC_SUFFIX_LENGTH);
  }
  return upper.startsWith(MARKET_PREFIX) ? upper : `${MARKET_PREFIX}${upper}`;
}
