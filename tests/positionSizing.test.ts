import { isTradingError } from '../src/domain/errors.js';
import { computeShareCount, sizePosition } from '../src/risk/positionSizing.js';

function codeOf(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    return isTradingError(error) ? error.code : 'untyped';
  }

  return undefined;
}

describe('position sizing', () => {
  it('takes the smaller of the risk budget and the capital cap', () => {
    expect(sizePosition(50_000, 50, 46.5, 0.02, 0.2)).toEqual({
      riskPerShare: 3.5,
      riskBasedShares: 285,
      capShares: 200,
      shareCount: 200
    });
  });

  it('is limited by risk when the stop is wide', () => {
    expect(computeShareCount(100_000, 100, 93, 0.02, 0.5)).toBe(285);
  });

  it('rejects a stop at or above the entry', () => {
    expect(codeOf(() => sizePosition(50_000, 50, 50, 0.02, 0.2))).toBe('InvalidStopAboveEntry');
    expect(codeOf(() => sizePosition(50_000, 50, 51, 0.02, 0.2))).toBe('InvalidStopAboveEntry');
  });

  it('reports a zero-share result instead of returning 0', () => {
    expect(codeOf(() => sizePosition(1_000, 500, 499, 0.02, 0.2))).toBe('ZeroShareResult');
  });

  it('rejects nonsensical inputs', () => {
    expect(codeOf(() => sizePosition(0, 50, 46.5, 0.02, 0.2))).toBe('InvalidParameter');
    expect(codeOf(() => sizePosition(50_000, -1, 46.5, 0.02, 0.2))).toBe('InvalidParameter');
    expect(codeOf(() => sizePosition(50_000, 50, 46.5, 0, 0.2))).toBe('InvalidParameter');
    expect(codeOf(() => sizePosition(50_000, 50, 46.5, 0.02, 1.5))).toBe('InvalidParameter');
  });
});
