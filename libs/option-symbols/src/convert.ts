import { buildBrokerSymbol, parseBrokerSymbol } from './brokerSymbol';
import { UnrecognizedFormatError } from './errors';
import { MARKET_PREFIX, OCC_SUFFIX_LENGTH, buildOptionSymbol, parseOptionSymbol } from './occSymbol';
import type { KnownSymbolFormat, ParsedOptionSymbol, SymbolFormat } from './types';

/**
 * Classify a symbol by shape. This is a heuristic, not a grammar: a symbol
 * classified here can still fail to parse.
 */
export function detectSymbolFormat(symbol: string): SymbolFormat {
  const trimmed = symbol.trim();
  if (trimmed.startsWith('.')) {
    return 'BROKER_DOT';
  }
  if (trimmed.includes('_')) {
    return 'BROKER_UNDERSCORE';
  }
  if (trimmed.toUpperCase().startsWith(MARKET_PREFIX) || trimmed.length > OCC_SUFFIX_LENGTH) {
    return 'OCC_STYLE';
  }
  return 'UNKNOWN';
}

export function requireSymbolFormat(symbol: string): KnownSymbolFormat {
  const format = detectSymbolFormat(symbol);
  if (format === 'UNKNOWN') {
    throw new UnrecognizedFormatError(symbol);
  }
  return format;
}

export interface ParseAnySymbolOptions {
  referenceYear?: number;
}

/** Parse a symbol in whichever encoding it is detected to be in. */
export function parseAnySymbol(
  symbol: string,
  options: ParseAnySymbolOptions = {},
): ParsedOptionSymbol<Date> {
  const format = requireSymbolFormat(symbol);
  return format === 'OCC_STYLE'
    ? parseOptionSymbol(symbol, { referenceYear: options.referenceYear })
    : parseBrokerSymbol(symbol, { referenceYear: options.referenceYear });
}

export interface ConvertSymbolOptions extends ParseAnySymbolOptions {
  /** Add the `O:` marker when the target is `OCC_STYLE`. */
  prefixed?: boolean;
}

/**
 * Convert between encodings by decoding into a parsed symbol and encoding
 * that again; there is no string-level transcoding.
 *
 * @example
 * convertSymbol('.TSLA210903C700', 'OCC_STYLE'); // => 'TSLA210903C00700000'
 */
export function convertSymbol(
  symbol: string,
  to: KnownSymbolFormat,
  options: ConvertSymbolOptions = {},
): string {
  const parsed = parseAnySymbol(symbol, options);
  const { underlyingSymbol, expiry, optionType, strikePrice } = parsed;

  switch (to) {
    case 'OCC_STYLE':
      return buildOptionSymbol(underlyingSymbol, expiry, optionType, strikePrice, options.prefixed ?? false);
    case 'BROKER_UNDERSCORE':
      return buildBrokerSymbol(underlyingSymbol, expiry, optionType, strikePrice, 'underscore');
    case 'BROKER_DOT':
      return buildBrokerSymbol(underlyingSymbol, expiry, optionType, strikePrice, 'dot');
  }
}
