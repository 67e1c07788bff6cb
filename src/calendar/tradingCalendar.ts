const DAY_MS = 24 * 60 * 60 * 1000;

// NYSE full-day closures.
const NYSE_HOLIDAYS = new Set<string>([
  '2025-01-01',
  '2025-01-20',
  '2025-02-17',
  '2025-04-18',
  '2025-05-26',
  '2025-06-19',
  '2025-07-04',
  '2025-09-01',
  '2025-11-27',
  '2025-12-25',
  '2026-01-01',
  '2026-01-19',
  '2026-02-16',
  '2026-04-03',
  '2026-05-25',
  '2026-06-19',
  '2026-07-03',
  '2026-09-07',
  '2026-11-26',
  '2026-12-25'
]);

/** UTC calendar date of an epoch-ms timestamp, as `YYYY-MM-DD`. */
export function toIsoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

function parseIsoDate(isoDate: string): number {
  const parsed = Date.parse(`${isoDate}T00:00:00Z`);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid ISO date ${isoDate}`);
  }

  return parsed;
}

/** Whole calendar days from `from` to `to`; never negative. */
export function daysBetween(from: string, to: string): number {
  const diff = Math.round((parseIsoDate(to) - parseIsoDate(from)) / DAY_MS);
  return Math.max(0, diff);
}

export function isHoliday(isoDate: string): boolean {
  return NYSE_HOLIDAYS.has(isoDate);
}

export function isTradingDay(isoDate: string): boolean {
  const weekday = new Date(parseIsoDate(isoDate)).getUTCDay();
  if (weekday === 0 || weekday === 6) {
    return false;
  }

  return !isHoliday(isoDate);
}

export function previousTradingDay(isoDate: string): string {
  let cursor = parseIsoDate(isoDate) - DAY_MS;
  while (!isTradingDay(toIsoDate(cursor))) {
    cursor -= DAY_MS;
  }

  return toIsoDate(cursor);
}
