import { describe, expect, it } from 'vitest';
import {
  InvalidHoldingError,
  holdingsFromSymbols,
  normalizeHolding,
  parseCsvRows,
  parseHoldingsCsv,
  validateHoldings,
} from '@/data/portfolio';

describe('normalizeHolding', () => {
  it('trims and uppercases the symbol', () => {
    expect(normalizeHolding({ symbol: ' aapl ', shares: 3, costBasis: 120 })).toEqual({
      symbol: 'AAPL',
      shares: 3,
      costBasis: 120,
    });
  });

  it('accepts numeric strings and treats a blank cost basis as unknown', () => {
    expect(normalizeHolding({ symbol: 'msft', shares: '2.5', costBasis: '  ' })).toEqual({
      symbol: 'MSFT',
      shares: 2.5,
      costBasis: null,
    });
  });

  it.each([
    [{ symbol: '  ', shares: 1 }, 'symbol'],
    [{ symbol: 42, shares: 1 }, 'symbol'],
    [{ symbol: 'A', shares: 0 }, 'shares'],
    [{ symbol: 'A', shares: -2 }, 'shares'],
    [{ symbol: 'A', shares: 'ten' }, 'shares'],
    [{ symbol: 'A', shares: 1, costBasis: -1 }, 'costBasis'],
    [{ symbol: 'A', shares: 1, costBasis: 'abc' }, 'costBasis'],
  ])('rejects %j on %s', (input, field) => {
    try {
      normalizeHolding(input, 4);
      expect.unreachable('normalizeHolding should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidHoldingError);
      if (error instanceof InvalidHoldingError) {
        expect(error.field).toBe(field);
        expect(error.index).toBe(4);
      }
    }
  });

  it('allows a zero cost basis', () => {
    expect(normalizeHolding({ symbol: 'GIFT', shares: 1, costBasis: 0 }).costBasis).toBe(0);
  });
});

describe('validateHoldings', () => {
  it('reports the index of the first invalid holding', () => {
    expect(() =>
      validateHoldings([
        { symbol: 'A', shares: 1 },
        { symbol: 'B', shares: 0 },
      ])
    ).toThrow('Holding 1 (B): shares must be a positive number');
  });
});

describe('parseHoldingsCsv', () => {
  it('parses rows by header name', () => {
    const csv = 'symbol,shares,cost_basis\nAAPL,50,145\nnvda,20,450\n';
    expect(parseHoldingsCsv(csv)).toEqual([
      { symbol: 'AAPL', shares: 50, costBasis: 145 },
      { symbol: 'NVDA', shares: 20, costBasis: 450 },
    ]);
  });

  it('accepts reordered, mixed-case columns, CRLF, a BOM and blank lines', () => {
    const csv = '\uFEFFShares, Cost_Basis ,SYMBOL\r\n\r\n10,,msft\r\n5,99.5,goog\r\n';
    expect(parseHoldingsCsv(csv)).toEqual([
      { symbol: 'MSFT', shares: 10, costBasis: null },
      { symbol: 'GOOG', shares: 5, costBasis: 99.5 },
    ]);
  });

  it('treats a missing cost_basis column as unknown cost', () => {
    expect(parseHoldingsCsv('symbol,shares\nVTI,12')).toEqual([{ symbol: 'VTI', shares: 12, costBasis: null }]);
  });

  it('returns no holdings for empty text or a header alone', () => {
    expect(parseHoldingsCsv('')).toEqual([]);
    expect(parseHoldingsCsv('symbol,shares\n')).toEqual([]);
  });

  it('requires symbol and shares columns', () => {
    expect(() => parseHoldingsCsv('ticker,qty\nAAPL,1')).toThrow(
      'CSV header must include symbol and shares columns'
    );
  });

  it('rejects an invalid row', () => {
    expect(() => parseHoldingsCsv('symbol,shares\nAAPL,1\nMSFT,-3')).toThrow(InvalidHoldingError);
  });

  it('reads quoted cells as exported by spreadsheets', () => {
    const csv = '"symbol","shares","cost_basis"\n"AAPL","50","145.00"\n"BRK.B", "3" ,""\n';
    expect(parseHoldingsCsv(csv)).toEqual([
      { symbol: 'AAPL', shares: 50, costBasis: 145 },
      { symbol: 'BRK.B', shares: 3, costBasis: null },
    ]);
  });

  it('keeps commas inside quoted cells out of the column split', () => {
    const csv = 'name,symbol,shares\n"Apple, Inc.",AAPL,10\n';
    expect(parseHoldingsCsv(csv)).toEqual([{ symbol: 'AAPL', shares: 10, costBasis: null }]);
  });

  it('skips rows whose cells are all empty', () => {
    expect(parseHoldingsCsv('symbol,shares\n,,\nVTI,2\n')).toEqual([
      { symbol: 'VTI', shares: 2, costBasis: null },
    ]);
  });
});

describe('parseCsvRows', () => {
  it('unescapes doubled quotes inside a quoted cell', () => {
    expect(parseCsvRows('note,symbol\n"the ""core"" position",VTI')).toEqual([
      ['note', 'symbol'],
      ['the "core" position', 'VTI'],
    ]);
  });

  it('keeps empty trailing cells', () => {
    expect(parseCsvRows('a,b,\n')).toEqual([['a', 'b', '']]);
  });
});

describe('holdingsFromSymbols', () => {
  it('aligns shares and cost bases by position with defaults', () => {
    expect(holdingsFromSymbols(['aapl', 'msft', 'goog'], [10], [150, null])).toEqual([
      { symbol: 'AAPL', shares: 10, costBasis: 150 },
      { symbol: 'MSFT', shares: 1, costBasis: null },
      { symbol: 'GOOG', shares: 1, costBasis: null },
    ]);
  });
});
