import { describe, expect, it } from 'vitest';
import type { DeltaPoint } from '@/types/telemetry';
import { lap, point, steadyLap } from '@/test/builders';
import {
  calculateDelta,
  cumulativeDelta,
  interpolateTimeAtDistance,
  significantDeltas,
} from './deltaCalculation';
import { PreconditionError } from './errors';

function deltaPoint(distance: number, delta: number): DeltaPoint {
  return { distance, delta, referenceTime: 0, comparisonTime: delta };
}

describe('calculateDelta', () => {
  it('is zero everywhere when a lap is compared with itself', () => {
    const reference = steadyLap(40, 400, 41);
    const deltas = calculateDelta(reference, reference);

    expect(deltas).toHaveLength(41);
    expect(deltas.every(d => d.delta === 0)).toBe(true);
  });

  it('interpolates the comparison lap at each reference distance', () => {
    const reference = lap([point(0, 0), point(5, 50), point(10, 100)]);
    const comparison = lap([point(0, 0), point(12, 100)], 2);

    expect(calculateDelta(reference, comparison)).toEqual([
      { distance: 0, delta: 0, referenceTime: 0, comparisonTime: 0 },
      { distance: 50, delta: 1, referenceTime: 5, comparisonTime: 6 },
      { distance: 100, delta: 2, referenceTime: 10, comparisonTime: 12 },
    ]);
  });

  it('reports a faster comparison lap as negative delta', () => {
    const reference = lap([point(0, 0), point(10, 100)]);
    const comparison = lap([point(0, 0), point(8, 100)], 2);

    expect(calculateDelta(reference, comparison).map(d => d.delta)).toEqual([0, -2]);
  });

  it('returns nothing for an empty reference lap', () => {
    expect(calculateDelta(lap([]), steadyLap(10, 100, 11))).toEqual([]);
  });

  it('rejects an empty comparison lap', () => {
    expect(() => calculateDelta(steadyLap(10, 100, 11), lap([]))).toThrow(PreconditionError);
  });
});

describe('interpolateTimeAtDistance', () => {
  const points = [point(1, 10), point(2, 20), point(3, 30)];

  it('returns the exact time on a sample', () => {
    expect(interpolateTimeAtDistance(points, 20)).toBe(2);
  });

  it('interpolates between samples', () => {
    expect(interpolateTimeAtDistance(points, 25)).toBe(2.5);
  });

  it('uses the nearest sample outside the distance range', () => {
    expect(interpolateTimeAtDistance(points, 0)).toBe(1);
    expect(interpolateTimeAtDistance(points, 50)).toBe(3);
  });

  it('uses the last sample at a repeated distance', () => {
    expect(interpolateTimeAtDistance([point(0, 0), point(1, 10), point(4, 10), point(5, 20)], 10)).toBe(4);
  });

  it('rejects an empty sample list', () => {
    expect(() => interpolateTimeAtDistance([], 10)).toThrow(PreconditionError);
  });
});

describe('cumulativeDelta', () => {
  it('is the final delta of the series', () => {
    expect(cumulativeDelta([deltaPoint(0, 0), deltaPoint(10, 0.4), deltaPoint(20, -0.25)])).toBe(-0.25);
  });

  it('is zero for an empty series', () => {
    expect(cumulativeDelta([])).toBe(0);
  });
});

describe('significantDeltas', () => {
  const series = [
    deltaPoint(0, 0),
    deltaPoint(10, 0.05),
    deltaPoint(20, 0.3),
    deltaPoint(30, 0.2),
    deltaPoint(40, -0.1),
    deltaPoint(50, -0.05),
    deltaPoint(60, 0.5),
  ];

  it('separates gains from losses, largest first', () => {
    const { gains, losses } = significantDeltas(series);

    expect(gains.map(d => d.distance)).toEqual([40]);
    expect(losses.map(d => d.distance)).toEqual([60, 20]);
  });

  it('caps each list at the limit', () => {
    expect(significantDeltas(series, { limit: 1 }).losses.map(d => d.distance)).toEqual([60]);
  });

  it('ignores changes within the threshold', () => {
    const { gains, losses } = significantDeltas(series, { threshold: 1 });
    expect(gains).toEqual([]);
    expect(losses).toEqual([]);
  });
});
