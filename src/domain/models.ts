import { z } from 'zod';

const positiveFinite = z.number().finite().positive();
const finiteNonNegativeNumber = z.number().finite().nonnegative();
const epochMsSchema = z.number().int().nonnegative();
const nonEmptyString = z.string().min(1);

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const positionStatusSchema = z.enum(['OPEN', 'CLOSED']);
export const exitReasonSchema = z.enum(['STOP', 'TARGET', 'MANUAL']);
export const stopTypeSchema = z.enum(['FIXED', 'BREAKEVEN', 'TRAILING']);

/**
 * Example:
 * {
 *   "id": "pos-1",
 *   "ticker": "NVDA",
 *   "entryDate": "2025-03-10",
 *   "openedAt": 1741615200000,
 *   "entryPrice": 100,
 *   "shareCount": 200,
 *   "initialStopPrice": 93,
 *   "stopPrice": 100,
 *   "stopType": "BREAKEVEN",
 *   "targetPrice": 120,
 *   "highestPriceSeen": 106,
 *   "signalSource": "BREAKOUT",
 *   "notes": "",
 *   "status": "OPEN"
 * }
 */
const positionBaseSchema = z.object({
  id: nonEmptyString,
  ticker: nonEmptyString,
  entryDate: isoDateSchema,
  openedAt: epochMsSchema,
  entryPrice: positiveFinite,
  shareCount: z.number().int().positive(),
  initialStopPrice: finiteNonNegativeNumber,
  stopPrice: finiteNonNegativeNumber,
  stopType: stopTypeSchema,
  targetPrice: positiveFinite,
  highestPriceSeen: positiveFinite,
  signalSource: nonEmptyString,
  notes: z.string()
});

export const openPositionSchema = positionBaseSchema
  .extend({
    status: z.literal('OPEN')
  })
  .strict();

/**
 * Example (fields beyond the open shape):
 * {
 *   "status": "CLOSED",
 *   "exitDate": "2025-03-21",
 *   "exitPrice": 112,
 *   "exitReason": "TARGET",
 *   "realizedReturnPct": 12,
 *   "realizedReturnAbsolute": 2400,
 *   "rMultiple": 1.71,
 *   "daysHeld": 11
 * }
 */
export const closedPositionSchema = positionBaseSchema
  .extend({
    status: z.literal('CLOSED'),
    exitDate: isoDateSchema,
    exitPrice: positiveFinite,
    exitReason: exitReasonSchema,
    realizedReturnPct: z.number().finite(),
    realizedReturnAbsolute: z.number().finite(),
    rMultiple: z.number().finite(),
    daysHeld: z.number().int().nonnegative()
  })
  .strict();

export const positionSchema = z.discriminatedUnion('status', [openPositionSchema, closedPositionSchema]);

export const closedPositionSummarySchema = z
  .object({
    positionId: nonEmptyString,
    ticker: nonEmptyString,
    entryPrice: positiveFinite,
    exitPrice: positiveFinite,
    shareCount: z.number().int().positive(),
    exitReason: exitReasonSchema,
    exitDate: isoDateSchema,
    realizedReturnPct: z.number().finite(),
    realizedReturnAbsolute: z.number().finite(),
    rMultiple: z.number().finite(),
    daysHeld: z.number().int().nonnegative()
  })
  .strict();

/**
 * Example:
 * {
 *   "date": "2025-03-10",
 *   "cash": 80000,
 *   "positionsMarketValue": 21200,
 *   "totalEquity": 101200,
 *   "dailyPnL": 1200,
 *   "dailyPnLPct": 1.2,
 *   "openPositionCount": 1,
 *   "totalReturnPct": 1.2,
 *   "peakEquity": 101200,
 *   "maxDrawdownPct": 0
 * }
 */
export const portfolioSnapshotSchema = z
  .object({
    date: isoDateSchema,
    cash: finiteNonNegativeNumber,
    positionsMarketValue: finiteNonNegativeNumber,
    totalEquity: finiteNonNegativeNumber,
    dailyPnL: z.number().finite(),
    dailyPnLPct: z.number().finite(),
    openPositionCount: z.number().int().nonnegative(),
    totalReturnPct: z.number().finite(),
    peakEquity: finiteNonNegativeNumber,
    maxDrawdownPct: finiteNonNegativeNumber
  })
  .strict();

/**
 * Example:
 * {
 *   "date": "2025-03-10",
 *   "open": 101.2,
 *   "high": 104.9,
 *   "low": 100.7,
 *   "close": 104.1,
 *   "volume": 1830000
 * }
 */
export const priceBarSchema = z
  .object({
    date: isoDateSchema,
    open: positiveFinite,
    high: positiveFinite,
    low: positiveFinite,
    close: positiveFinite,
    volume: finiteNonNegativeNumber
  })
  .strict();

/** A screened candidate handed to the coordinator. */
export const entryCandidateSchema = z
  .object({
    ticker: nonEmptyString,
    entryPrice: positiveFinite,
    stopPercent: z.number().finite().gt(0).lt(1).optional(),
    signalSource: nonEmptyString.optional(),
    notes: z.string().optional()
  })
  .strict();

export type PositionStatus = z.infer<typeof positionStatusSchema>;
export type ExitReason = z.infer<typeof exitReasonSchema>;
export type StopType = z.infer<typeof stopTypeSchema>;
export type OpenPosition = z.infer<typeof openPositionSchema>;
export type ClosedPosition = z.infer<typeof closedPositionSchema>;
export type Position = z.infer<typeof positionSchema>;
export type ClosedPositionSummary = z.infer<typeof closedPositionSummarySchema>;
export type PortfolioSnapshot = z.infer<typeof portfolioSnapshotSchema>;
export type PriceBar = z.infer<typeof priceBarSchema>;
export type EntryCandidate = z.infer<typeof entryCandidateSchema>;

export function isOpen(position: Position): position is OpenPosition {
  return position.status === 'OPEN';
}

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export function toClosedSummary(position: ClosedPosition): ClosedPositionSummary {
  return {
    positionId: position.id,
    ticker: position.ticker,
    entryPrice: position.entryPrice,
    exitPrice: position.exitPrice,
    shareCount: position.shareCount,
    exitReason: position.exitReason,
    exitDate: position.exitDate,
    realizedReturnPct: position.realizedReturnPct,
    realizedReturnAbsolute: position.realizedReturnAbsolute,
    rMultiple: position.rMultiple,
    daysHeld: position.daysHeld
  };
}
