import { PgPositionLedger } from '../src/ledger/pgLedger.js';

type QueryResult = { rows: unknown[]; rowCount?: number };
type Responder = (sql: string, params: unknown[]) => QueryResult | Promise<QueryResult>;

const MARCH_21 = Date.UTC(2025, 2, 21, 20, 0);

function openRow(overrides: Record<string, unknown> = {}) {
  return {
    id: '7',
    ticker: 'NVDA',
    entry_date: '2025-03-10',
    opened_at_ms: String(Date.UTC(2025, 2, 10, 14, 30)),
    entry_price: '100.000000',
    share_count: 200,
    initial_stop: '93.000000',
    stop_price: '93.000000',
    stop_type: 'FIXED',
    target_price: '120.000000',
    highest_price: '100.000000',
    signal_source: 'MANUAL',
    notes: '',
    status: 'OPEN',
    exit_date: null,
    exit_price: null,
    exit_reason: null,
    realized_return_pct: null,
    realized_return_abs: null,
    r_multiple: null,
    days_held: null,
    ...overrides
  };
}

function pgMock(respond: Responder) {
  const client = {
    query: jest.fn(async (sql: string, params: unknown[] = []) => respond(sql, params)),
    release: jest.fn()
  };
  const pool = {
    connect: jest.fn(async () => client),
    query: jest.fn(async (sql: string, params: unknown[] = []) => respond(sql, params))
  };

  return { client, pool };
}

function portfolioResponder(cash: string, extra: Responder): Responder {
  return (sql, params) => {
    if (sql.startsWith('SELECT starting_capital')) {
      return { rows: [{ starting_capital: '100000', cash_balance: cash }] };
    }

    return extra(sql, params);
  };
}

function statements(calls: unknown[][]): string[] {
  return calls.map((call) => String(call[0]).trim().split(/\s+/).slice(0, 2).join(' '));
}

describe('PgPositionLedger', () => {
  it('opens inside a transaction that locks the portfolio row', async () => {
    const { client, pool } = pgMock(
      portfolioResponder('100000.000000', (sql) => (sql.includes('INSERT INTO positions') ? { rows: [{ id: '7' }] } : { rows: [] }))
    );
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default', now: () => MARCH_21 });

    const id = await ledger.open({ ticker: 'nvda', entryPrice: 100, shareCount: 200, stopPrice: 93, targetPrice: 120 });

    expect(id).toBe('7');
    expect(statements(client.query.mock.calls)).toEqual([
      'BEGIN',
      'SELECT starting_capital,',
      'INSERT INTO',
      'UPDATE portfolios',
      'COMMIT'
    ]);
    expect(String(client.query.mock.calls[1]?.[0])).toContain('FOR UPDATE');
    expect(client.query.mock.calls[3]?.[1]).toEqual(['default', 80_000]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back when cash is short', async () => {
    const { client, pool } = pgMock(portfolioResponder('1000', () => ({ rows: [] })));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    await expect(
      ledger.open({ ticker: 'NVDA', entryPrice: 100, shareCount: 200, stopPrice: 93, targetPrice: 120 })
    ).rejects.toMatchObject({ code: 'InsufficientCash' });

    expect(statements(client.query.mock.calls)).toEqual(['BEGIN', 'SELECT starting_capital,', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('maps the one-open-per-ticker index to DuplicateTicker', async () => {
    const { pool } = pgMock(
      portfolioResponder('100000', (sql) => {
        if (sql.includes('INSERT INTO positions')) {
          throw Object.assign(new Error('duplicate key value'), { code: '23505' });
        }

        return { rows: [] };
      })
    );
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    await expect(
      ledger.open({ ticker: 'NVDA', entryPrice: 100, shareCount: 10, stopPrice: 93, targetPrice: 120 })
    ).rejects.toMatchObject({ code: 'DuplicateTicker' });
  });

  it('closes a locked position and credits the proceeds', async () => {
    const { client, pool } = pgMock(
      portfolioResponder('80000.000000', (sql) => (sql.includes('FROM positions') ? { rows: [openRow()] } : { rows: [] }))
    );
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default', now: () => MARCH_21 });

    const summary = await ledger.close('7', 112, 'TARGET');

    expect(summary).toMatchObject({
      positionId: '7',
      exitDate: '2025-03-21',
      realizedReturnPct: 12,
      realizedReturnAbsolute: 2400,
      daysHeld: 11
    });
    const cashWrite = client.query.mock.calls.find((call) => String(call[0]).startsWith('UPDATE portfolios'));
    expect(cashWrite?.[1]).toEqual(['default', 102_400]);
    expect(statements(client.query.mock.calls).at(-1)).toBe('COMMIT');
  });

  it('rejects closing an already closed row and rolls back', async () => {
    const closed = openRow({
      status: 'CLOSED',
      exit_date: '2025-03-21',
      exit_price: '112',
      exit_reason: 'TARGET',
      realized_return_pct: '12',
      realized_return_abs: '2400',
      r_multiple: '1.71',
      days_held: 11
    });
    const { client, pool } = pgMock(
      portfolioResponder('102400', (sql) => (sql.includes('FROM positions') ? { rows: [closed] } : { rows: [] }))
    );
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    await expect(ledger.close('7', 112, 'TARGET')).rejects.toMatchObject({ code: 'PositionAlreadyClosed' });
    expect(statements(client.query.mock.calls).at(-1)).toBe('ROLLBACK');
  });

  it('raises a stop inside a transaction and writes the new level', async () => {
    const { client, pool } = pgMock((sql) => (sql.includes('FROM positions') ? { rows: [openRow()] } : { rows: [] }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    const updated = await ledger.updateStop('7', 100, 106);

    expect(updated).toMatchObject({ id: '7', stopPrice: 100, stopType: 'BREAKEVEN', highestPriceSeen: 106 });
    expect(statements(client.query.mock.calls)).toEqual(['BEGIN', 'SELECT id::text', 'UPDATE positions', 'COMMIT']);
    expect(String(client.query.mock.calls[1]?.[0])).toContain('FOR UPDATE');
    expect(client.query.mock.calls[2]?.[1]).toEqual(['7', 'default', 100, 'BREAKEVEN', 106]);
  });

  it('rolls back a stop that would move down', async () => {
    const raised = openRow({ stop_price: '100.000000', stop_type: 'BREAKEVEN', highest_price: '106.000000' });
    const { client, pool } = pgMock((sql) => (sql.includes('FROM positions') ? { rows: [raised] } : { rows: [] }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    await expect(ledger.updateStop('7', 95, 106)).rejects.toMatchObject({ code: 'StopCannotDecrease' });
    expect(statements(client.query.mock.calls)).toEqual(['BEGIN', 'SELECT id::text', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('refuses to move the stop of a closed position', async () => {
    const closed = openRow({
      status: 'CLOSED',
      exit_date: '2025-03-21',
      exit_price: '112',
      exit_reason: 'TARGET',
      realized_return_pct: '12',
      realized_return_abs: '2400',
      r_multiple: '1.71',
      days_held: 11
    });
    const { client, pool } = pgMock((sql) => (sql.includes('FROM positions') ? { rows: [closed] } : { rows: [] }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    await expect(ledger.updateStop('7', 100, 112)).rejects.toMatchObject({ code: 'PositionNotOpen' });
    expect(statements(client.query.mock.calls).at(-1)).toBe('ROLLBACK');
  });

  it('lists open positions in entry order and parses numeric columns', async () => {
    const { pool } = pgMock(() => ({
      rows: [openRow(), openRow({ id: '9', ticker: 'AMD', entry_price: '50.000000', initial_stop: '46.500000', stop_price: '46.500000', target_price: '60.000000', highest_price: '50.000000' })]
    }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    const open = await ledger.listOpen();

    expect(open.map((position) => [position.id, position.ticker, position.entryPrice, position.stopPrice])).toEqual([
      ['7', 'NVDA', 100, 93],
      ['9', 'AMD', 50, 46.5]
    ]);
    expect(String(pool.query.mock.calls[0]?.[0])).toContain('ORDER BY entry_date ASC, opened_at_ms ASC, id ASC');
    expect(pool.query.mock.calls[0]?.[1]).toEqual(['default']);
  });

  it('reads the latest snapshot with or without a cutoff date', async () => {
    const row = {
      snapshot_date: '2025-03-11',
      cash: '80000.000000',
      positions_value: '21200.000000',
      total_equity: '101200.000000',
      daily_pnl: '1200.000000',
      daily_pnl_pct: '1.2',
      open_position_count: 1,
      total_return_pct: '1.2',
      peak_equity: '101200.000000',
      max_drawdown_pct: '0'
    };
    const { pool } = pgMock(() => ({ rows: [row] }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    expect(await ledger.latestSnapshot()).toEqual({
      date: '2025-03-11',
      cash: 80_000,
      positionsMarketValue: 21_200,
      totalEquity: 101_200,
      dailyPnL: 1_200,
      dailyPnLPct: 1.2,
      openPositionCount: 1,
      totalReturnPct: 1.2,
      peakEquity: 101_200,
      maxDrawdownPct: 0
    });
    await ledger.latestSnapshot('2025-03-12');

    expect(String(pool.query.mock.calls[0]?.[0])).toContain('$2::date IS NULL OR snapshot_date < $2::date');
    expect(pool.query.mock.calls.map((call) => call[1])).toEqual([
      ['default', null],
      ['default', '2025-03-12']
    ]);
  });

  it('treats a non-numeric id as not found without querying', async () => {
    const { pool } = pgMock(() => ({ rows: [] }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    expect(await ledger.get('pos-1')).toBeNull();
    expect(pool.query).not.toHaveBeenCalled();
  });

  it('reports a duplicate snapshot date', async () => {
    const { pool } = pgMock(() => ({ rows: [], rowCount: 0 }));
    const ledger = new PgPositionLedger({ pool: pool as never, portfolioId: 'default' });

    await expect(
      ledger.appendSnapshot({
        date: '2025-03-10',
        cash: 100_000,
        positionsMarketValue: 0,
        totalEquity: 100_000,
        dailyPnL: 0,
        dailyPnLPct: 0,
        openPositionCount: 0,
        totalReturnPct: 0,
        peakEquity: 100_000,
        maxDrawdownPct: 0
      })
    ).rejects.toMatchObject({ code: 'SnapshotAlreadyExists' });
  });
});
