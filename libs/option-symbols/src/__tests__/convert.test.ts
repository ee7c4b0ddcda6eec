import { describe, expect, it } from 'vitest';
import { convertSymbol, detectSymbolFormat, parseAnySymbol, requireSymbolFormat } from '../convert';
import { UnrecognizedFormatError } from '../errors';
import { parseOptionSymbol } from '../occSymbol';
import { describeOptionSymbol, toSymbolRecord, toSymbolTuple } from '../projections';

describe('detectSymbolFormat', () => {
  it('recognises broker variants', () => {
    expect(detectSymbolFormat('.TSLA210903C700')).toBe('BROKER_DOT');
    expect(detectSymbolFormat('TSLA_090321C700')).toBe('BROKER_UNDERSCORE');
  });

  it('recognises OCC-style symbols by prefix or length', () => {
    expect(detectSymbolFormat('O:TSLA211015P00125000')).toBe('OCC_STYLE');
    expect(detectSymbolFormat('TSLA211015P00125000')).toBe('OCC_STYLE');
    expect(detectSymbolFormat('o:x')).toBe('OCC_STYLE');
  });

  it('reports anything else as unknown', () => {
    expect(detectSymbolFormat('TSLA')).toBe('UNKNOWN');
    expect(() => requireSymbolFormat('TSLA')).toThrow(UnrecognizedFormatError);
  });
});

describe('convertSymbol', () => {
  it('converts broker symbols to OCC-style', () => {
    expect(convertSymbol('.TSLA210903C700', 'OCC_STYLE', { referenceYear: 2026 })).toBe('TSLA210903C00700000');
    expect(convertSymbol('TSLA_090321C700', 'OCC_STYLE', { prefixed: true, referenceYear: 2026 })).toBe(
      'O:TSLA210903C00700000',
    );
  });

  it('converts OCC-style symbols to both broker variants', () => {
    expect(convertSymbol('O:TSLA211015P00125000', 'BROKER_UNDERSCORE', { referenceYear: 2026 })).toBe(
      'TSLA_101521P125',
    );
    expect(convertSymbol('O:TSLA211015P00125000', 'BROKER_DOT', { referenceYear: 2026 })).toBe('.TSLA211015P125');
  });

  it('returns the normalised symbol after a round trip through another encoding', () => {
    const broker = convertSymbol('O:AAPL240119C00195500', 'BROKER_UNDERSCORE', { referenceYear: 2026 });
    expect(broker).toBe('AAPL_011924C195.5');
    expect(convertSymbol(broker, 'OCC_STYLE', { referenceYear: 2026 })).toBe('AAPL240119C00195500');

    const dot = convertSymbol('TSLA_090321C700', 'BROKER_DOT', { referenceYear: 2026 });
    expect(dot).toBe('.TSLA210903C700');
    expect(convertSymbol(dot, 'BROKER_UNDERSCORE', { referenceYear: 2026 })).toBe('TSLA_090321C700');
  });

  it('refuses symbols of unknown format', () => {
    expect(() => convertSymbol('TSLA', 'OCC_STYLE')).toThrow(UnrecognizedFormatError);
  });
});

describe('parseAnySymbol', () => {
  it('dispatches on the detected format', () => {
    const occ = parseAnySymbol('O:TSLA210903C00700000', { referenceYear: 2026 });
    const dot = parseAnySymbol('.TSLA210903C700', { referenceYear: 2026 });

    expect(toSymbolRecord(occ)).toEqual({ ...toSymbolRecord(dot), canonicalSymbol: 'TSLA210903C00700000' });
  });
});

describe('projections', () => {
  const parsed = parseOptionSymbol('O:TSLA211015P00125000', { referenceYear: 2026 });

  it('projects to a tuple', () => {
    expect(toSymbolTuple(parsed)).toEqual(['TSLA', new Date(Date.UTC(2021, 9, 15)), 'PUT', 125, 'TSLA211015P00125000']);
  });

  it('projects to a JSON-ready record', () => {
    expect(toSymbolRecord(parsed)).toEqual({
      underlyingSymbol: 'TSLA',
      expiry: '2021-10-15',
      optionType: 'PUT',
      strikePrice: 125,
      canonicalSymbol: 'TSLA211015P00125000',
    });
    expect(JSON.parse(JSON.stringify(toSymbolRecord(parsed)))).toEqual(toSymbolRecord(parsed));
  });

  it('describes the contract on one line', () => {
    expect(describeOptionSymbol(parsed)).toBe('TSLA 2021-10-15 PUT 125');
  });
});
