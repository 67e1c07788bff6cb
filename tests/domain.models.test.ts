import {
  entryCandidateSchema,
  isOpen,
  normalizeTicker,
  portfolioSnapshotSchema,
  positionSchema,
  priceBarSchema
} from '../src/domain/models.js';

const openPosition = {
  id: 'pos-1',
  ticker: 'NVDA',
  entryDate: '2025-03-10',
  openedAt: Date.UTC(2025, 2, 10),
  entryPrice: 100,
  shareCount: 200,
  initialStopPrice: 93,
  stopPrice: 93,
  stopType: 'FIXED',
  targetPrice: 120,
  highestPriceSeen: 100,
  signalSource: 'MANUAL',
  notes: '',
  status: 'OPEN'
};

describe('domain models', () => {
  it('parses an open position', () => {
    const parsed = positionSchema.parse(openPosition);

    expect(isOpen(parsed)).toBe(true);
  });

  it('rejects exit fields on an open position', () => {
    const result = positionSchema.safeParse({ ...openPosition, exitPrice: 110 });

    expect(result.success).toBe(false);
  });

  it('requires exit fields on a closed position', () => {
    const result = positionSchema.safeParse({ ...openPosition, status: 'CLOSED' });

    expect(result.success).toBe(false);
  });

  it('rejects non-finite numeric values', () => {
    const result = priceBarSchema.safeParse({
      date: '2025-03-10',
      open: Number.NaN,
      high: 104,
      low: 100,
      close: 103,
      volume: 1_000
    });

    expect(result.success).toBe(false);
  });

  it('rejects a negative drawdown on a snapshot', () => {
    const result = portfolioSnapshotSchema.safeParse({
      date: '2025-03-10',
      cash: 80_000,
      positionsMarketValue: 21_200,
      totalEquity: 101_200,
      dailyPnL: 0,
      dailyPnLPct: 0,
      openPositionCount: 1,
      totalReturnPct: 1.2,
      peakEquity: 101_200,
      maxDrawdownPct: -1
    });

    expect(result.success).toBe(false);
  });

  it('bounds a candidate stop percent to (0, 1)', () => {
    expect(entryCandidateSchema.safeParse({ ticker: 'NVDA', entryPrice: 100, stopPercent: 0.07 }).success).toBe(true);
    expect(entryCandidateSchema.safeParse({ ticker: 'NVDA', entryPrice: 100, stopPercent: 1 }).success).toBe(false);
  });

  it('normalizes tickers', () => {
    expect(normalizeTicker('  nvda ')).toBe('NVDA');
  });
});
