import { describe, expect, it } from 'vitest';
import { buildBrokerSymbol, parseBrokerSymbol } from '../brokerSymbol';
import { MalformedExpiryError, MalformedSymbolError, SymbolTooShortError } from '../errors';
import type { ParsedOptionSymbol, ParseSymbolOptions } from '../types';

const utc = (year: number, month: number, day: number) => new Date(Date.UTC(year, month - 1, day));

describe('buildBrokerSymbol', () => {
  it('builds the underscore variant with an MMDDYY date', () => {
    expect(buildBrokerSymbol('TSLA', utc(2021, 9, 3), 'call', 700)).toBe('TSLA_090321C700');
  });

  it('builds the dot variant with a YYMMDD date', () => {
    expect(buildBrokerSymbol('TSLA', utc(2021, 9, 3), 'call', 700, 'dot')).toBe('.TSLA210903C700');
  });

  it('writes integral strikes without a fraction', () => {
    expect(buildBrokerSymbol('AMD', utc(2024, 1, 19), 'p', 72.5)).toBe('AMD_011924P72.5');
    expect(buildBrokerSymbol('AMD', utc(2024, 1, 19), 'p', '72.0')).toBe('AMD_011924P72');
  });

  it('passes six-digit expiry strings through in the variant order', () => {
    expect(buildBrokerSymbol('msft', '011924', 'c', 400)).toBe('MSFT_011924C400');
    expect(buildBrokerSymbol('msft', '240119', 'c', 400, 'dot')).toBe('.MSFT240119C400');
  });

  it('rejects malformed expiry strings', () => {
    expect(() => buildBrokerSymbol('MSFT', '1/19/24', 'c', 400)).toThrow(MalformedExpiryError);
  });
});

describe('parseBrokerSymbol', () => {
  it('parses the underscore variant', () => {
    expect(parseBrokerSymbol('TSLA_090321C700', { referenceYear: 2026 })).toEqual({
      underlyingSymbol: 'TSLA',
      expiry: utc(2021, 9, 3),
      optionType: 'CALL',
      strikePrice: 700,
      canonicalSymbol: 'TSLA_090321C700',
    });
  });

  it('reorders the dot variant date before decoding', () => {
    const parsed = parseBrokerSymbol('.TSLA210903C700', { referenceYear: 2026 });

    expect(parsed.underlyingSymbol).toBe('TSLA');
    expect(parsed.expiry).toEqual(utc(2021, 9, 3));
    expect(parsed.canonicalSymbol).toBe('TSLA_090321C700');
  });

  it('handles lower-case dot symbols with fractional strikes', () => {
    const parsed = parseBrokerSymbol('.tsla210903p72.5', { expiryAsString: true, referenceYear: 2026 });

    expect(parsed.expiry).toBe('2021-09-03');
    expect(parsed.optionType).toBe('PUT');
    expect(parsed.strikePrice).toBe(72.5);
    expect(parsed.canonicalSymbol).toBe('TSLA_090321P72.5');
  });

  it('accepts options whose expiry form is only known at run time', () => {
    for (const expiryAsString of [true, false]) {
      const options: ParseSymbolOptions = { expiryAsString, referenceYear: 2026 };
      const parsed: ParsedOptionSymbol<Date | string> = parseBrokerSymbol('TSLA_090321C700', options);

      expect(parsed.expiry).toEqual(expiryAsString ? '2021-09-03' : utc(2021, 9, 3));
    }
  });

  it('rejects symbols too short to hold a date, side and strike', () => {
    expect(() => parseBrokerSymbol('TSLA_0903C')).toThrow(SymbolTooShortError);
    expect(() => parseBrokerSymbol('.TSLA2109')).toThrow(SymbolTooShortError);
  });

  it('rejects structurally broken symbols', () => {
    expect(() => parseBrokerSymbol('TSLA090321C700')).toThrow(MalformedSymbolError);
    expect(() => parseBrokerSymbol('TSLA_090321C7x', { referenceYear: 2026 })).toThrow(MalformedSymbolError);
    expect(() => parseBrokerSymbol('.210903C700')).toThrow(MalformedSymbolError);
    expect(() => parseBrokerSymbol('TSLA_133021C700', { referenceYear: 2026 })).toThrow(MalformedExpiryError);
  });

  it('rebuilds the symbol it parsed', () => {
    for (const symbol of ['TSLA_090321C700', 'AMD_011924P72.5']) {
      const parsed = parseBrokerSymbol(symbol, { referenceYear: 2026 });
      expect(
        buildBrokerSymbol(parsed.underlyingSymbol, parsed.expiry, parsed.optionType, parsed.strikePrice),
      ).toBe(symbol);
    }

    const dot = parseBrokerSymbol('.SPY231215P455', { referenceYear: 2026 });
    expect(buildBrokerSymbol(dot.underlyingSymbol, dot.expiry, dot.optionType, dot.strikePrice, 'dot')).toBe(
      '.SPY231215P455',
    );
  });
});
