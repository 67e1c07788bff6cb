import { CapacityError, InputValidationError, StateError } from '../domain/errors.js';
import type {
  ClosedPosition,
  ClosedPositionSummary,
  ExitReason,
  OpenPosition,
  PortfolioSnapshot,
  Position
} from '../domain/models.js';
import { toClosedSummary } from '../domain/models.js';
import { addMoney, notional, subtractMoney } from '../domain/money.js';

import {
  applyStopUpdate,
  assertExitPrice,
  buildOpenPosition,
  closePositionRecord,
  compareByEntry,
  requireClosable,
  requireOpen,
  validateOpenInput,
  type OpenPositionInput,
  type PositionLedger
} from './positionLedger.js';

export type MemoryLedgerOptions = {
  portfolioId?: string;
  startingCapital: number;
  now?: () => number;
};

/**
 * Process-local ledger. Each operation validates first and commits its
 * writes in one synchronous step, so no await can interleave with a
 * half-applied change.
 */
export class MemoryPositionLedger implements PositionLedger {
  readonly portfolioId: string;
  private readonly startingCapital: number;
  private readonly now: () => number;
  private readonly positions = new Map<string, Position>();
  private readonly snapshots = new Map<string, PortfolioSnapshot>();
  private cash: number;
  private sequence = 0;

  constructor(options: MemoryLedgerOptions) {
    if (!Number.isFinite(options.startingCapital) || options.startingCapital <= 0) {
      throw new InputValidationError('InvalidParameter', 'startingCapital must be positive', {
        startingCapital: options.startingCapital
      });
    }

    this.portfolioId = options.portfolioId ?? 'default';
    this.startingCapital = options.startingCapital;
    this.cash = options.startingCapital;
    this.now = options.now ?? Date.now;
  }

  async open(input: OpenPositionInput): Promise<string> {
    const normalized = validateOpenInput(input);
    const cost = notional(normalized.entryPrice, normalized.shareCount);

    if (cost > this.cash) {
      throw new CapacityError('InsufficientCash', `Insufficient cash: need ${cost}, have ${this.cash}`, {
        required: cost,
        available: this.cash
      });
    }

    const id = `pos-${this.sequence + 1}`;
    const position = buildOpenPosition(id, normalized, this.now());

    this.sequence += 1;
    this.cash = subtractMoney(this.cash, cost);
    this.positions.set(id, position);
    return id;
  }

  async close(positionId: string, exitPrice: number, exitReason: ExitReason): Promise<ClosedPositionSummary> {
    const open = requireClosable(this.positions.get(positionId) ?? null, positionId);
    assertExitPrice(exitPrice);

    const closed = closePositionRecord(open, exitPrice, exitReason, this.now());

    this.cash = addMoney(this.cash, notional(exitPrice, open.shareCount));
    this.positions.set(positionId, closed);
    return toClosedSummary(closed);
  }

  async updateStop(positionId: string, newStopPrice: number, newHighestPriceSeen: number): Promise<OpenPosition> {
    const open = requireOpen(this.positions.get(positionId) ?? null, positionId);
    const updated = applyStopUpdate(open, newStopPrice, newHighestPriceSeen);

    this.positions.set(positionId, updated);
    return { ...updated };
  }

  async listOpen(): Promise<OpenPosition[]> {
    const open: OpenPosition[] = [];
    for (const position of this.positions.values()) {
      if (position.status === 'OPEN') {
        open.push({ ...position });
      }
    }

    return open.sort(compareByEntry);
  }

  async get(positionId: string): Promise<Position | null> {
    const position = this.positions.get(positionId);
    return position ? { ...position } : null;
  }

  async listClosed(limit?: number): Promise<ClosedPosition[]> {
    const closed: ClosedPosition[] = [];
    for (const position of this.positions.values()) {
      if (position.status === 'CLOSED') {
        closed.push({ ...position });
      }
    }

    // Same exit date: most recently opened first.
    return closed
      .reverse()
      .sort((left, right) => (left.exitDate === right.exitDate ? 0 : left.exitDate < right.exitDate ? 1 : -1))
      .slice(0, limit);
  }

  async getCash(): Promise<number> {
    return this.cash;
  }

  async getStartingCapital(): Promise<number> {
    return this.startingCapital;
  }

  async appendSnapshot(snapshot: PortfolioSnapshot): Promise<PortfolioSnapshot> {
    if (this.snapshots.has(snapshot.date)) {
      throw new StateError('SnapshotAlreadyExists', `Snapshot for ${snapshot.date} already exists`, {
        date: snapshot.date
      });
    }

    const stored = Object.freeze({ ...snapshot });
    this.snapshots.set(snapshot.date, stored);
    return stored;
  }

  async latestSnapshot(beforeDate?: string): Promise<PortfolioSnapshot | null> {
    const candidates = (await this.listSnapshots()).filter((item) => beforeDate === undefined || item.date < beforeDate);
    return candidates[candidates.length - 1] ?? null;
  }

  async listSnapshots(): Promise<PortfolioSnapshot[]> {
    return [...this.snapshots.values()].sort((left, right) => (left.date < right.date ? -1 : left.date > right.date ? 1 : 0));
  }
}
