/**
 * @strikeline/option-symbols
 *
 * Builds, parses and converts option ticker symbols.
 *
 * ## Encodings
 *
 * - **OCC-style**: `TSLA211015P00125000`, optionally prefixed `O:`
 *   (underlying, `YYMMDD`, side, strike × 1000 in eight digits)
 * - **Broker underscore**: `TSLA_101521P125` (`MMDDYY`, plain strike)
 * - **Broker dot**: `.TSLA211015P125` (`YYMMDD`, plain strike)
 *
 * ## Usage
 *
 * ```typescript
 * import { buildOptionSymbol, parseOptionSymbol, convertSymbol } from '@strikeline/option-symbols';
 *
 * buildOptionSymbol('TSLA', new Date(Date.UTC(2021, 9, 15)), 'put', 125, true);
 * // => 'O:TSLA211015P00125000'
 *
 * parseOptionSymbol('O:TSLA211015P00125000', { expiryAsString: true });
 * // => { underlyingSymbol: 'TSLA', expiry: '2021-10-15', optionType: 'PUT', strikePrice: 125, ... }
 *
 * convertSymbol('O:TSLA211015P00125000', 'BROKER_UNDERSCORE');
 * // => 'TSLA_101521P125'
 * ```
 *
 * Two-digit years are expanded with the century of `referenceYear`, which
 * defaults to the current UTC year.
 */

export {
  buildOptionSymbol,
  parseOptionSymbol,
  ensurePrefix,
  stripMarketPrefix,
  MARKET_PREFIX,
  OCC_SUFFIX_LENGTH,
} from './occSymbol';
export { buildBrokerSymbol, parseBrokerSymbol } from './brokerSymbol';
export { detectSymbolFormat, requireSymbolFormat, parseAnySymbol, convertSymbol } from './convert';
export type { ConvertSymbolOptions, ParseAnySymbolOptions } from './convert';
export { toSymbolTuple, toSymbolRecord, describeOptionSymbol } from './projections';
export { normalizeOptionType, formatIsoDate } from './fields';

export type {
  OptionType,
  OptionTypeInput,
  ExpiryInput,
  StrikeInput,
  SymbolFormat,
  KnownSymbolFormat,
  BrokerSymbolVariant,
  ParsedOptionSymbol,
  ParseSymbolOptions,
  ParseSymbolAsDateOptions,
  ParseSymbolAsStringOptions,
  OptionSymbolTuple,
  OptionSymbolRecord,
} from './types';

export {
  OptionSymbolError,
  MalformedExpiryError,
  MalformedStrikeError,
  MalformedSymbolError,
  SymbolTooShortError,
  UnrecognizedFormatError,
} from './errors';
