import type { Pool, PoolClient } from 'pg';
import pino, { type Logger } from 'pino';

import { transaction } from '../data/database.js';
import { CapacityError, StateError } from '../domain/errors.js';
import type {
  ClosedPosition,
  ClosedPositionSummary,
  ExitReason,
  OpenPosition,
  PortfolioSnapshot,
  Position
} from '../domain/models.js';
import { closedPositionSchema, openPositionSchema, portfolioSnapshotSchema, toClosedSummary } from '../domain/models.js';
import { addMoney, notional, subtractMoney } from '../domain/money.js';

import {
  applyStopUpdate,
  assertExitPrice,
  buildOpenPosition,
  closePositionRecord,
  requireClosable,
  requireOpen,
  validateOpenInput,
  type OpenPositionInput,
  type PositionLedger
} from './positionLedger.js';

type PortfolioRow = {
  starting_capital: string;
  cash_balance: string;
};

type PositionRow = {
  id: string;
  ticker: string;
  entry_date: string;
  opened_at_ms: string;
  entry_price: string;
  share_count: number;
  initial_stop: string;
  stop_price: string;
  stop_type: string;
  target_price: string;
  highest_price: string;
  signal_source: string;
  notes: string;
  status: string;
  exit_date: string | null;
  exit_price: string | null;
  exit_reason: string | null;
  realized_return_pct: string | null;
  realized_return_abs: string | null;
  r_multiple: string | null;
  days_held: number | null;
};

type SnapshotRow = {
  snapshot_date: string;
  cash: string;
  positions_value: string;
  total_equity: string;
  daily_pnl: string;
  daily_pnl_pct: string;
  open_position_count: number;
  total_return_pct: string;
  peak_equity: string;
  max_drawdown_pct: string;
};

const POSITION_COLUMNS = `
  id::text AS id,
  ticker,
  to_char(entry_date, 'YYYY-MM-DD') AS entry_date,
  opened_at_ms::text AS opened_at_ms,
  entry_price,
  share_count,
  initial_stop,
  stop_price,
  stop_type,
  target_price,
  highest_price,
  signal_source,
  notes,
  status,
  to_char(exit_date, 'YYYY-MM-DD') AS exit_date,
  exit_price,
  exit_reason,
  realized_return_pct,
  realized_return_abs,
  r_multiple,
  days_held`;

const SNAPSHOT_COLUMNS = `
  to_char(snapshot_date, 'YYYY-MM-DD') AS snapshot_date,
  cash,
  positions_value,
  total_equity,
  daily_pnl,
  daily_pnl_pct,
  open_position_count,
  total_return_pct,
  peak_equity,
  max_drawdown_pct`;

const UNIQUE_VIOLATION = '23505';

export type PgLedgerOptions = {
  pool: Pool;
  portfolioId: string;
  now?: () => number;
  logger?: Logger;
};

export class PgPositionLedger implements PositionLedger {
  readonly portfolioId: string;
  private readonly pool: Pool;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: PgLedgerOptions) {
    this.pool = options.pool;
    this.portfolioId = options.portfolioId;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? pino({ name: 'pg-ledger' });
  }

  /** Creates the portfolio row on first use; an existing row is left untouched. */
  async ensurePortfolio(startingCapital: number): Promise<void> {
    await this.pool.query(
      `INSERT INTO portfolios (id, starting_capital, cash_balance)
       VALUES ($1, $2, $2)
       ON CONFLICT (id) DO NOTHING`,
      [this.portfolioId, startingCapital]
    );
  }

  async open(input: OpenPositionInput): Promise<string> {
    const normalized = validateOpenInput(input);
    const draft = buildOpenPosition('pending', normalized, this.now());
    const cost = notional(draft.entryPrice, draft.shareCount);

    try {
      return await transaction(this.pool, async (client) => {
        const portfolio = await this.lockPortfolio(client);
        const cash = Number(portfolio.cash_balance);

        if (cost > cash) {
          throw new CapacityError('InsufficientCash', `Insufficient cash: need ${cost}, have ${cash}`, {
            required: cost,
            available: cash
          });
        }

        const inserted = await client.query<{ id: string }>(
          `INSERT INTO positions (
             portfolio_id, ticker, entry_date, opened_at_ms, entry_price, share_count,
             initial_stop, stop_price, stop_type, target_price, highest_price,
             signal_source, notes, status
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $7, 'FIXED', $8, $5, $9, $10, 'OPEN')
           RETURNING id::text AS id`,
          [
            this.portfolioId,
            draft.ticker,
            draft.entryDate,
            draft.openedAt,
            draft.entryPrice,
            draft.shareCount,
            draft.stopPrice,
            draft.targetPrice,
            draft.signalSource,
            draft.notes
          ]
        );

        const id = inserted.rows[0]?.id;
        if (!id) {
          throw new Error('Position insert returned no id');
        }

        await this.writeCash(client, subtractMoney(cash, cost));
        this.logger.debug({ positionId: id, ticker: draft.ticker, cost }, 'position inserted');
        return id;
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new CapacityError('DuplicateTicker', `An open position already exists for ${draft.ticker}`, {
          ticker: draft.ticker
        });
      }

      throw error;
    }
  }

  async close(positionId: string, exitPrice: number, exitReason: ExitReason): Promise<ClosedPositionSummary> {
    return transaction(this.pool, async (client) => {
      const portfolio = await this.lockPortfolio(client);
      const open = requireClosable(await this.selectForUpdate(client, positionId), positionId);
      assertExitPrice(exitPrice);

      const closed = closePositionRecord(open, exitPrice, exitReason, this.now());

      await client.query(
        `UPDATE positions
         SET status = 'CLOSED', exit_date = $3, exit_price = $4, exit_reason = $5,
             realized_return_pct = $6, realized_return_abs = $7, r_multiple = $8,
             days_held = $9, updated_at = NOW()
         WHERE id = $1 AND portfolio_id = $2`,
        [
          positionId,
          this.portfolioId,
          closed.exitDate,
          closed.exitPrice,
          closed.exitReason,
          closed.realizedReturnPct,
          closed.realizedReturnAbsolute,
          closed.rMultiple,
          closed.daysHeld
        ]
      );

      await this.writeCash(client, addMoney(Number(portfolio.cash_balance), notional(exitPrice, open.shareCount)));
      return toClosedSummary(closed);
    });
  }

  async updateStop(positionId: string, newStopPrice: number, newHighestPriceSeen: number): Promise<OpenPosition> {
    return transaction(this.pool, async (client) => {
      const open = requireOpen(await this.selectForUpdate(client, positionId), positionId);
      const updated = applyStopUpdate(open, newStopPrice, newHighestPriceSeen);

      await client.query(
        `UPDATE positions
         SET stop_price = $3, stop_type = $4, highest_price = $5, updated_at = NOW()
         WHERE id = $1 AND portfolio_id = $2`,
        [positionId, this.portfolioId, updated.stopPrice, updated.stopType, updated.highestPriceSeen]
      );

      return updated;
    });
  }

  async listOpen(): Promise<OpenPosition[]> {
    const result = await this.pool.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS}
       FROM positions
       WHERE portfolio_id = $1 AND status = 'OPEN'
       ORDER BY entry_date ASC, opened_at_ms ASC, id ASC`,
      [this.portfolioId]
    );

    return result.rows.map((row) => openPositionSchema.parse(toPositionShape(row)));
  }

  async get(positionId: string): Promise<Position | null> {
    if (!isNumericId(positionId)) {
      return null;
    }

    const result = await this.pool.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS} FROM positions WHERE id = $1 AND portfolio_id = $2`,
      [positionId, this.portfolioId]
    );

    const row = result.rows[0];
    return row ? rowToPosition(row) : null;
  }

  async listClosed(limit?: number): Promise<ClosedPosition[]> {
    const result = await this.pool.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS}
       FROM positions
       WHERE portfolio_id = $1 AND status = 'CLOSED'
       ORDER BY exit_date DESC, id DESC
       LIMIT $2`,
      [this.portfolioId, limit ?? null]
    );

    return result.rows.map((row) => closedPositionSchema.parse(toPositionShape(row)));
  }

  async getCash(): Promise<number> {
    const portfolio = await this.readPortfolio();
    return Number(portfolio.cash_balance);
  }

  async getStartingCapital(): Promise<number> {
    const portfolio = await this.readPortfolio();
    return Number(portfolio.starting_capital);
  }

  async appendSnapshot(snapshot: PortfolioSnapshot): Promise<PortfolioSnapshot> {
    const result = await this.pool.query(
      `INSERT INTO portfolio_snapshots (
         portfolio_id, snapshot_date, cash, positions_value, total_equity, daily_pnl,
         daily_pnl_pct, open_position_count, total_return_pct, peak_equity, max_drawdown_pct
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (portfolio_id, snapshot_date) DO NOTHING`,
      [
        this.portfolioId,
        snapshot.date,
        snapshot.cash,
        snapshot.positionsMarketValue,
        snapshot.totalEquity,
        snapshot.dailyPnL,
        snapshot.dailyPnLPct,
        snapshot.openPositionCount,
        snapshot.totalReturnPct,
        snapshot.peakEquity,
        snapshot.maxDrawdownPct
      ]
    );

    if (result.rowCount === 0) {
      throw new StateError('SnapshotAlreadyExists', `Snapshot for ${snapshot.date} already exists`, {
        date: snapshot.date
      });
    }

    return snapshot;
  }

  async latestSnapshot(beforeDate?: string): Promise<PortfolioSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      `SELECT ${SNAPSHOT_COLUMNS}
       FROM portfolio_snapshots
       WHERE portfolio_id = $1 AND ($2::date IS NULL OR snapshot_date < $2::date)
       ORDER BY snapshot_date DESC
       LIMIT 1`,
      [this.portfolioId, beforeDate ?? null]
    );

    const row = result.rows[0];
    return row ? rowToSnapshot(row) : null;
  }

  async listSnapshots(): Promise<PortfolioSnapshot[]> {
    const result = await this.pool.query<SnapshotRow>(
      `SELECT ${SNAPSHOT_COLUMNS}
       FROM portfolio_snapshots
       WHERE portfolio_id = $1
       ORDER BY snapshot_date ASC`,
      [this.portfolioId]
    );

    return result.rows.map(rowToSnapshot);
  }

  private async lockPortfolio(client: PoolClient): Promise<PortfolioRow> {
    const result = await client.query<PortfolioRow>(
      'SELECT starting_capital, cash_balance FROM portfolios WHERE id = $1 FOR UPDATE',
      [this.portfolioId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Portfolio ${this.portfolioId} is not initialised`);
    }

    return row;
  }

  private async readPortfolio(): Promise<PortfolioRow> {
    const result = await this.pool.query<PortfolioRow>(
      'SELECT starting_capital, cash_balance FROM portfolios WHERE id = $1',
      [this.portfolioId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Portfolio ${this.portfolioId} is not initialised`);
    }

    return row;
  }

  private async selectForUpdate(client: PoolClient, positionId: string): Promise<Position | null> {
    if (!isNumericId(positionId)) {
      return null;
    }

    const result = await client.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS} FROM positions WHERE id = $1 AND portfolio_id = $2 FOR UPDATE`,
      [positionId, this.portfolioId]
    );

    const row = result.rows[0];
    return row ? rowToPosition(row) : null;
  }

  private async writeCash(client: PoolClient, cash: number): Promise<void> {
    await client.query('UPDATE portfolios SET cash_balance = $2, updated_at = NOW() WHERE id = $1', [
      this.portfolioId,
      cash
    ]);
  }
}

function isNumericId(positionId: string): boolean {
  return /^\d+$/.test(positionId);
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

function toNumberOrNull(value: string | null): number | null {
  return value === null ? null : Number(value);
}

function toPositionShape(row: PositionRow): Record<string, unknown> {
  const base = {
    id: row.id,
    ticker: row.ticker,
    entryDate: row.entry_date,
    openedAt: Number(row.opened_at_ms),
    entryPrice: Number(row.entry_price),
    shareCount: row.share_count,
    initialStopPrice: Number(row.initial_stop),
    stopPrice: Number(row.stop_price),
    stopType: row.stop_type,
    targetPrice: Number(row.target_price),
    highestPriceSeen: Number(row.highest_price),
    signalSource: row.signal_source,
    notes: row.notes,
    status: row.status
  };

  if (row.status === 'OPEN') {
    return base;
  }

  return {
    ...base,
    exitDate: row.exit_date,
    exitPrice: toNumberOrNull(row.exit_price),
    exitReason: row.exit_reason,
    realizedReturnPct: toNumberOrNull(row.realized_return_pct),
    realizedReturnAbsolute: toNumberOrNull(row.realized_return_abs),
    rMultiple: toNumberOrNull(row.r_multiple),
    daysHeld: row.days_held
  };
}

function rowToPosition(row: PositionRow): Position {
  return row.status === 'OPEN'
    ? openPositionSchema.parse(toPositionShape(row))
    : closedPositionSchema.parse(toPositionShape(row));
}

function rowToSnapshot(row: SnapshotRow): PortfolioSnapshot {
  return portfolioSnapshotSchema.parse({
    date: row.snapshot_date,
    cash: Number(row.cash),
    positionsMarketValue: Number(row.positions_value),
    totalEquity: Number(row.total_equity),
    dailyPnL: Number(row.daily_pnl),
    dailyPnLPct: Number(row.daily_pnl_pct),
    openPositionCount: row.open_position_count,
    totalReturnPct: Number(row.total_return_pct),
    peakEquity: Number(row.peak_equity),
    maxDrawdownPct: Number(row.max_drawdown_pct)
  });
}
