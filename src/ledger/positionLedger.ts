import Decimal from 'decimal.js';

import { toIsoDate, daysBetween } from '../calendar/tradingCalendar.js';
import { InputValidationError, StateError } from '../domain/errors.js';
import type {
  ClosedPosition,
  ClosedPositionSummary,
  ExitReason,
  OpenPosition,
  PortfolioSnapshot,
  Position
} from '../domain/models.js';
import { normalizeTicker } from '../domain/models.js';
import { percentOf } from '../domain/money.js';
import { classifyStop } from '../policy/stopPolicy.js';

export type OpenPositionInput = {
  ticker: string;
  entryPrice: number;
  shareCount: number;
  stopPrice: number;
  targetPrice: number;
  signalSource?: string;
  notes?: string;
};

/**
 * Authoritative store of positions, cash and snapshots for one portfolio.
 * Every mutating call is applied completely or not at all.
 */
export interface PositionLedger {
  readonly portfolioId: string;
  open(input: OpenPositionInput): Promise<string>;
  close(positionId: string, exitPrice: number, exitReason: ExitReason): Promise<ClosedPositionSummary>;
  updateStop(positionId: string, newStopPrice: number, newHighestPriceSeen: number): Promise<OpenPosition>;
  listOpen(): Promise<OpenPosition[]>;
  get(positionId: string): Promise<Position | null>;
  listClosed(limit?: number): Promise<ClosedPosition[]>;
  getCash(): Promise<number>;
  getStartingCapital(): Promise<number>;
  appendSnapshot(snapshot: PortfolioSnapshot): Promise<PortfolioSnapshot>;
  latestSnapshot(beforeDate?: string): Promise<PortfolioSnapshot | null>;
  listSnapshots(): Promise<PortfolioSnapshot[]>;
}

export type NormalizedOpenInput = Required<OpenPositionInput>;

export function validateOpenInput(input: OpenPositionInput): NormalizedOpenInput {
  const ticker = normalizeTicker(input.ticker);
  const problems: string[] = [];

  if (ticker.length === 0) problems.push('ticker is required');
  if (!Number.isFinite(input.entryPrice) || input.entryPrice <= 0) problems.push('entryPrice must be > 0');
  if (!Number.isInteger(input.shareCount) || input.shareCount <= 0) problems.push('shareCount must be a positive integer');
  if (!Number.isFinite(input.stopPrice) || input.stopPrice < 0) problems.push('stopPrice must be >= 0');
  if (input.stopPrice >= input.entryPrice) problems.push('stopPrice must be below entryPrice');
  if (!Number.isFinite(input.targetPrice) || input.targetPrice <= input.entryPrice) {
    problems.push('targetPrice must be above entryPrice');
  }

  if (problems.length > 0) {
    throw new InputValidationError('InvalidEntry', `Invalid entry: ${problems.join('; ')}`, {
      ticker: input.ticker,
      problems
    });
  }

  return {
    ticker,
    entryPrice: input.entryPrice,
    shareCount: input.shareCount,
    stopPrice: input.stopPrice,
    targetPrice: input.targetPrice,
    signalSource: input.signalSource ?? 'MANUAL',
    notes: input.notes ?? ''
  };
}

export function buildOpenPosition(id: string, input: NormalizedOpenInput, nowMs: number): OpenPosition {
  return {
    id,
    ticker: input.ticker,
    entryDate: toIsoDate(nowMs),
    openedAt: nowMs,
    entryPrice: input.entryPrice,
    shareCount: input.shareCount,
    initialStopPrice: input.stopPrice,
    stopPrice: input.stopPrice,
    stopType: 'FIXED',
    targetPrice: input.targetPrice,
    highestPriceSeen: input.entryPrice,
    signalSource: input.signalSource,
    notes: input.notes,
    status: 'OPEN'
  };
}

export function assertExitPrice(exitPrice: number): void {
  if (!Number.isFinite(exitPrice) || exitPrice <= 0) {
    throw new InputValidationError('InvalidParameter', 'exitPrice must be a positive finite number', { exitPrice });
  }
}

/** Resolves a position that is about to be closed. */
export function requireClosable(position: Position | null, positionId: string): OpenPosition {
  if (!position) {
    throw new StateError('PositionNotFound', `Position ${positionId} not found`, { positionId });
  }

  if (position.status !== 'OPEN') {
    throw new StateError('PositionAlreadyClosed', `Position ${positionId} is already closed`, { positionId });
  }

  return position;
}

/** Resolves a position whose stop is about to move. */
export function requireOpen(position: Position | null, positionId: string): OpenPosition {
  if (!position) {
    throw new StateError('PositionNotFound', `Position ${positionId} not found`, { positionId });
  }

  if (position.status !== 'OPEN') {
    throw new StateError('PositionNotOpen', `Position ${positionId} is not open`, { positionId });
  }

  return position;
}

export function closePositionRecord(
  position: OpenPosition,
  exitPrice: number,
  exitReason: ExitReason,
  nowMs: number
): ClosedPosition {
  const exitDate = toIsoDate(nowMs);
  const pnlPerShare = new Decimal(exitPrice).minus(position.entryPrice);
  const riskPerShare = new Decimal(position.entryPrice).minus(position.initialStopPrice);

  return {
    ...position,
    status: 'CLOSED',
    exitDate,
    exitPrice,
    exitReason,
    realizedReturnPct: percentOf(pnlPerShare.toNumber(), position.entryPrice),
    realizedReturnAbsolute: pnlPerShare.times(position.shareCount).toNumber(),
    rMultiple: riskPerShare.gt(0) ? pnlPerShare.div(riskPerShare).toNumber() : 0,
    daysHeld: daysBetween(position.entryDate, exitDate)
  };
}

/**
 * The single place where the stop ratchet is enforced: a lower stop is
 * rejected, and the recorded high only ever grows.
 */
export function applyStopUpdate(position: OpenPosition, newStopPrice: number, newHighestPriceSeen: number): OpenPosition {
  if (!Number.isFinite(newStopPrice) || !Number.isFinite(newHighestPriceSeen)) {
    throw new InputValidationError('InvalidParameter', 'stop and highest price must be finite', {
      positionId: position.id,
      newStopPrice,
      newHighestPriceSeen
    });
  }

  if (newStopPrice < position.stopPrice) {
    throw new StateError('StopCannotDecrease', `Stop for ${position.id} cannot move from ${position.stopPrice} to ${newStopPrice}`, {
      positionId: position.id,
      currentStop: position.stopPrice,
      newStopPrice
    });
  }

  return {
    ...position,
    stopPrice: newStopPrice,
    stopType: classifyStop(newStopPrice, position.entryPrice, position.initialStopPrice),
    highestPriceSeen: Math.max(position.highestPriceSeen, newHighestPriceSeen)
  };
}

export function compareByEntry(left: OpenPosition, right: OpenPosition): number {
  if (left.entryDate !== right.entryDate) {
    return left.entryDate < right.entryDate ? -1 : 1;
  }

  if (left.openedAt !== right.openedAt) {
    return left.openedAt - right.openedAt;
  }

  return left.id.localeCompare(right.id, undefined, { numeric: true });
}
