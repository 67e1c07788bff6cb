import fc from 'fast-check';

import { isTradingError } from '../src/domain/errors.js';
import {
  classifyStop,
  evaluateExit,
  initialStop,
  targetFor,
  trailingStopUpdate
} from '../src/policy/stopPolicy.js';

describe('stop policy', () => {
  it('derives the initial stop and target from the entry', () => {
    expect(initialStop(100, 0.07)).toBe(93);
    expect(targetFor(100, 0.2)).toBe(120);
    expect(initialStop(50, 0.07)).toBe(46.5);
  });

  it('rejects stop percents outside (0, 1)', () => {
    for (const stopPercent of [0, 1, -0.1, Number.NaN]) {
      let caught: unknown;
      try {
        initialStop(100, stopPercent);
      } catch (error) {
        caught = error;
      }

      expect(isTradingError(caught, 'InvalidParameter')).toBe(true);
    }
  });

  it('walks the breakeven then trail sequence without lowering the stop', () => {
    const first = trailingStopUpdate(100, 106, 93, 100);
    expect(first).toEqual({ newStop: 100, newHighest: 106 });

    const pullback = trailingStopUpdate(100, 101, first.newStop, first.newHighest);
    expect(pullback).toEqual({ newStop: 100, newHighest: 106 });

    const trail = trailingStopUpdate(100, 112, pullback.newStop, pullback.newHighest);
    expect(trail).toEqual({ newStop: 100.8, newHighest: 112 });
  });

  it('measures the trail from the running high rather than the tick', () => {
    expect(trailingStopUpdate(100, 111, 100, 120)).toEqual({ newStop: 108, newHighest: 120 });
  });

  it('rounds trail levels to the stored price scale', () => {
    const first = trailingStopUpdate(100, 113.3333333, 93, 100);
    expect(first).toEqual({ newStop: 102, newHighest: 113.3333333 });
    expect(trailingStopUpdate(100, 113.3333333, first.newStop, first.newHighest).newStop).toBe(102);
    expect(initialStop(33.3333333, 0.07)).toBe(31);
  });

  it('leaves the stop alone below the breakeven trigger', () => {
    expect(trailingStopUpdate(100, 104.99, 93, 100)).toEqual({ newStop: 93, newHighest: 104.99 });
  });

  it('moves to breakeven exactly at a 5% gain', () => {
    expect(trailingStopUpdate(100, 105, 93, 100).newStop).toBe(100);
  });

  it('lets the stop win a tie with the price', () => {
    expect(evaluateExit(93, 93, 120)).toBe('STOP_HIT');
    expect(evaluateExit(100, 100, 100)).toBe('STOP_HIT');
    expect(evaluateExit(120, 93, 120)).toBe('TARGET_HIT');
    expect(evaluateExit(110, 93, 120)).toBe('NONE');
  });

  it('classifies stop levels', () => {
    expect(classifyStop(93, 100, 93)).toBe('FIXED');
    expect(classifyStop(100, 100, 93)).toBe('BREAKEVEN');
    expect(classifyStop(100.8, 100, 93)).toBe('TRAILING');
  });

  it('keeps stops monotone and the high above every observed price', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 1, max: 1000, noNaN: true }),
        fc.array(fc.double({ min: 0.5, max: 2, noNaN: true }), { minLength: 1, maxLength: 60 }),
        (entry, moves) => {
          let stop = initialStop(entry, 0.07);
          let highest = entry;
          const seen: number[] = [];

          for (const move of moves) {
            const price = entry * move;
            seen.push(price);

            const next = trailingStopUpdate(entry, price, stop, highest);
            expect(next.newStop).toBeGreaterThanOrEqual(stop);
            expect(next.newHighest).toBeGreaterThanOrEqual(entry);
            expect(next.newHighest).toBeGreaterThanOrEqual(Math.max(...seen));

            stop = next.newStop;
            highest = next.newHighest;
          }
        }
      )
    );
  });

  it('returns exactly one decision for any stop below target', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0.01, max: 1000, noNaN: true }),
        fc.double({ min: 0.01, max: 500, noNaN: true }),
        fc.double({ min: 0.01, max: 500, noNaN: true }),
        (price, stop, spread) => {
          const target = stop + spread;
          const decision = evaluateExit(price, stop, target);

          if (price <= stop) {
            expect(decision).toBe('STOP_HIT');
          } else if (price >= target) {
            expect(decision).toBe('TARGET_HIT');
          } else {
            expect(decision).toBe('NONE');
          }
        }
      )
    );
  });
});
