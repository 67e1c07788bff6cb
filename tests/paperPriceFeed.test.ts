import { PaperPriceFeed } from '../src/feed/paperPriceFeed.js';

const bars = [
  { date: '2025-03-11', open: 101, high: 104, low: 100, close: 103, volume: 1_000 },
  { date: '2025-03-10', open: 99, high: 102, low: 98, close: 101, volume: 1_200 },
  { date: '2025-03-12', open: 103, high: 107, low: 102, close: 106, volume: 900 }
];

describe('PaperPriceFeed', () => {
  it('serves the latest close and a bounded history', async () => {
    const feed = new PaperPriceFeed();
    feed.seedBars('nvda', bars);

    expect(await feed.latestPrice('NVDA')).toBe(106);
    expect((await feed.history('NVDA', 2)).map((bar) => bar.date)).toEqual(['2025-03-11', '2025-03-12']);
  });

  it('prefers an intraday quote until it is cleared', async () => {
    const feed = new PaperPriceFeed();
    feed.seedBars('NVDA', bars);
    feed.setLatestPrice('NVDA', 108.5);

    expect(await feed.latestPrice('nvda')).toBe(108.5);
    feed.clearLatestPrice('NVDA');
    expect(await feed.latestPrice('nvda')).toBe(106);
  });

  it('fails for an unknown ticker', async () => {
    const feed = new PaperPriceFeed();

    await expect(feed.latestPrice('MSFT')).rejects.toMatchObject({ code: 'MissingPrice' });
    await expect(feed.history('MSFT', 0)).rejects.toMatchObject({ code: 'InvalidParameter' });
  });
});
