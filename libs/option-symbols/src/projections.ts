import { formatIsoDate } from './fields';
import type { OptionSymbolRecord, OptionSymbolTuple, ParsedOptionSymbol } from './types';

export function toSymbolTuple<TExpiry extends Date | string>(
  parsed: ParsedOptionSymbol<TExpiry>,
): OptionSymbolTuple<TExpiry> {
  return [
    parsed.underlyingSymbol,
    parsed.expiry,
    parsed.optionType,
    parsed.strikePrice,
    parsed.canonicalSymbol,
  ];
}

/** JSON-ready copy with the expiry as `YYYY-MM-DD`. */
export function toSymbolRecord(parsed: ParsedOptionSymbol<Date | string>): OptionSymbolRecord {
  return {
    underlyingSymbol: parsed.underlyingSymbol,
    expiry: parsed.expiry instanceof Date ? formatIsoDate(parsed.expiry) : parsed.expiry,
    optionType: parsed.optionType,
    strikePrice: parsed.strikePrice,
    canonicalSymbol: parsed.canonicalSymbol,
  };
}

export function describeOptionSymbol(parsed: ParsedOptionSymbol<Date | string>): string {
  const { underlyingSymbol, expiry, optionType, strikePrice } = toSymbolRecord(parsed);
  return `${underlyingSymbol} ${expiry} ${optionType} ${strikePrice}`;
}
