export type OptionType = 'CALL' | 'PUT';

/**
 * Accepted spellings for the option side. Matching is case-insensitive and
 * only `c`/`call` mean a call; every other string is read as a put.
 */
export type OptionTypeInput = string;

/** A UTC calendar date, or six digits in the order the target encoding uses. */
export type ExpiryInput = Date | string;

/** Strike as a number or decimal string, e.g. `145`, `240.5`, `'15.003'`. */
export type StrikeInput = number | string;

export type SymbolFormat = 'OCC_STYLE' | 'BROKER_UNDERSCORE' | 'BROKER_DOT' | 'UNKNOWN';

export type KnownSymbolFormat = Exclude<SymbolFormat, 'UNKNOWN'>;

export type BrokerSymbolVariant = 'underscore' | 'dot';

export interface ParsedOptionSymbol<TExpiry extends Date | string = Date> {
  readonly underlyingSymbol: string;
  readonly expiry: TExpiry;
  readonly optionType: OptionType;
  readonly strikePrice: number;
  /** Encoded form without any market prefix. */
  readonly canonicalSymbol: string;
}

export interface ParseSymbolOptions {
  /** Return `expiry` as `YYYY-MM-DD` instead of a `Date`. */
  expiryAsString?: boolean;
  /**
   * Year whose century is applied to two-digit expiry years.
   * Defaults to the current UTC year.
   */
  referenceYear?: number;
}

export type ParseSymbolAsStringOptions = ParseSymbolOptions & { expiryAsString: true };

export type ParseSymbolAsDateOptions = ParseSymbolOptions & { expiryAsString?: false };

export type OptionSymbolTuple<TExpiry extends Date | string = Date> = [
  underlyingSymbol: string,
  expiry: TExpiry,
  optionType: OptionType,
  strikePrice: number,
  canonicalSymbol: string,
];

export interface OptionSymbolRecord {
  underlyingSymbol: string;
  expiry: string;
  optionType: OptionType;
  strikePrice: number;
  canonicalSymbol: string;
}
