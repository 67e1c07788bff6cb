import pino from 'pino';

import { parseCommand } from '../src/app/main.js';
import { bootRuntime, runEveningRoutine } from '../src/app/runtime.js';
import { envSchema } from '../src/config/schema.js';
import { PaperPriceFeed } from '../src/feed/paperPriceFeed.js';
import type { NotificationRecord } from '../src/notifications/notificationSink.js';

const MONDAY = Date.UTC(2025, 2, 10, 20, 0);

async function boot() {
  const feed = new PaperPriceFeed();
  const delivered: NotificationRecord[] = [];
  const runtime = await bootRuntime({
    config: envSchema.parse({ LOG_LEVEL: 'silent', PORTFOLIO_ID: 'runtime-test' }),
    feed,
    sink: {
      deliver: async (record) => {
        delivered.push(record);
      }
    },
    logger: pino({ enabled: false }),
    now: () => MONDAY
  });

  return { runtime, feed, delivered };
}

describe('runtime', () => {
  it('boots on the in-memory ledger without a database', async () => {
    const { runtime } = await boot();

    expect(runtime.ledger.portfolioId).toBe('runtime-test');
    expect(await runtime.ledger.getCash()).toBe(100_000);
    expect(runtime.params.maxOpenPositions).toBe(6);
    await runtime.shutdown();
  });

  it('skips the evening routine on a weekend', async () => {
    const { runtime } = await boot();

    expect(await runEveningRoutine(runtime, '2025-03-08')).toEqual({
      status: 'SKIPPED',
      date: '2025-03-08',
      reason: 'NON_TRADING_DAY'
    });
    expect(await runtime.ledger.listSnapshots()).toEqual([]);
    await runtime.shutdown();
  });

  it('sweeps at the close and records the day', async () => {
    const { runtime, feed, delivered } = await boot();
    await runtime.coordinator.enterPosition({ ticker: 'NVDA', entryPrice: 100, portfolioValue: 100_000 });
    feed.setLatestPrice('NVDA', 125);

    const result = await runEveningRoutine(runtime, '2025-03-10');

    expect(result).toMatchObject({
      status: 'COMPLETED',
      outcomes: [expect.objectContaining({ status: 'CLOSED' })],
      snapshot: { date: '2025-03-10', cash: 105_000, totalEquity: 105_000, openPositionCount: 0 }
    });
    expect(delivered.map((record) => record.type)).toEqual(['PositionOpened', 'StopAdjusted', 'PositionClosed']);
    await runtime.shutdown();
  });
});

describe('parseCommand', () => {
  it('defaults to the monitor', () => {
    expect(parseCommand([])).toEqual({ command: 'monitor', date: undefined });
    expect(parseCommand(['evening', '2025-03-10'])).toEqual({ command: 'evening', date: '2025-03-10' });
    expect(() => parseCommand(['trade'])).toThrow('Unknown command "trade"');
  });
});
