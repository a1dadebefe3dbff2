/**
 * Portfolio input: holding validation, CSV files and symbol lists
 */

import type { Holding } from '@/types/analysis';

export class InvalidHoldingError extends Error {
  constructor(
    message: string,
    public index: number,
    public field: 'symbol' | 'shares' | 'costBasis'
  ) {
    super(message);
    this.name = 'InvalidHoldingError';
  }
}

export interface HoldingInput {
  symbol: unknown;
  shares: unknown;
  costBasis?: unknown;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value.trim());
  return Number.NaN;
}

export function normalizeHolding(input: HoldingInput, index: number = 0): Holding {
  const symbol = typeof input.symbol === 'string' ? input.symbol.trim().toUpperCase() : '';
  if (!symbol) {
    throw new InvalidHoldingError(`Holding ${index}: symbol is required and cannot be empty`, index, 'symbol');
  }

  const shares = toNumber(input.shares);
  if (!Number.isFinite(shares) || shares <= 0) {
    throw new InvalidHoldingError(
      `Holding ${index} (${symbol}): shares must be a positive number`,
      index,
      'shares'
    );
  }

  let costBasis: number | null = null;
  const rawCost = input.costBasis;
  if (rawCost !== undefined && rawCost !== null && !(typeof rawCost === 'string' && rawCost.trim() === '')) {
    costBasis = toNumber(rawCost);
    if (!Number.isFinite(costBasis) || costBasis < 0) {
      throw new InvalidHoldingError(
        `Holding ${index} (${symbol}): cost basis must be a non-negative number`,
        index,
        'costBasis'
      );
    }
  }

  return { symbol, shares, costBasis };
}

/** Re-validates already-typed holdings; throws on the first bad one. */
export function validateHoldings(holdings: ReadonlyArray<HoldingInput>): Holding[] {
  return holdings.map((h, i) => normalizeHolding(h, i));
}

/**
 * Splits CSV text into trimmed cells. Quoted cells may contain commas, and
 * `""` inside quotes is a literal quote. Rows with no content are dropped.
 */
export function parseCsvRows(text: string): string[][] {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const rows: string[][] = [];

  for (const line of lines) {
    if (!line.trim()) continue;

    const cells: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const char = line[i];
      if (char === '"') {
        if (inQuotes && line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = !inQuotes;
        }
      } else if (char === ',' && !inQuotes) {
        cells.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }
    cells.push(current.trim());

    if (cells.some((cell) => cell !== '')) {
      rows.push(cells);
    }
  }

  return rows;
}

/**
 * Header row names the columns (symbol, shares, cost_basis; any order,
 * case-insensitive). cost_basis is optional. Blank lines are skipped.
 */
export function parseHoldingsCsv(text: string): Holding[] {
  const rows = parseCsvRows(text);
  if (rows.length === 0) return [];

  const header = rows[0].map((cell) => cell.toLowerCase());
  const symbolCol = header.indexOf('symbol');
  const sharesCol = header.indexOf('shares');
  const costCol = header.indexOf('cost_basis');
  if (symbolCol === -1 || sharesCol === -1) {
    throw new InvalidHoldingError('CSV header must include symbol and shares columns', 0, 'symbol');
  }

  return rows.slice(1).map((cells, index) =>
    normalizeHolding(
      {
        symbol: cells[symbolCol] ?? '',
        shares: cells[sharesCol] ?? '',
        costBasis: costCol === -1 ? undefined : cells[costCol],
      },
      index
    )
  );
}

/**
 * Builds holdings from a symbol list. Missing share counts default to 1,
 * missing cost bases to null.
 */
export function holdingsFromSymbols(
  symbols: string[],
  shares: number[] = [],
  costBasis: Array<number | null> = []
): Holding[] {
  return symbols.map((symbol, i) =>
    normalizeHolding({ symbol, shares: shares[i] ?? 1, costBasis: costBasis[i] ?? null }, i)
  );
}
