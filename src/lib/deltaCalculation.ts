import type { DeltaPoint, Lap, TelemetryPoint } from '@/types/telemetry';
import { DEFAULT_DELTA_HIGHLIGHT_OPTIONS, type DeltaHighlightOptions } from './config';
import { PreconditionError } from './errors';

function nearestByDistance(points: readonly TelemetryPoint[], distance: number): TelemetryPoint {
  let nearest = points[0];
  for (const point of points) {
    if (Math.abs(point.distance - distance) < Math.abs(nearest.distance - distance)) {
      nearest = point;
    }
  }
  return nearest;
}

/**
 * Time at which a lap passed the given distance, linearly interpolated between
 * the samples either side of it. Outside the lap's distance range the nearest
 * sample's time is used.
 */
export function interpolateTimeAtDistance(points: readonly TelemetryPoint[], distance: number): number {
  if (points.length === 0) {
    throw new PreconditionError('Cannot interpolate time on a lap with no samples');
  }

  let before: TelemetryPoint | undefined;
  let after: TelemetryPoint | undefined;
  for (const point of points) {
    if (point.distance <= distance) before = point;
    if (!after && point.distance >= distance) after = point;
  }

  if (!before || !after) {
    return nearestByDistance(points, distance).time;
  }
  if (before.distance === distance) return before.time;

  const range = after.distance - before.distance;
  if (range === 0) return before.time;

  const ratio = (distance - before.distance) / range;
  return before.time + ratio * (after.time - before.time);
}

/**
 * Distance-aligned time delta of `comparison` against `reference`, one point per
 * reference sample. Positive delta means the comparison lap is slower there.
 * Times and distances are compared as recorded, so both laps should share an
 * origin (each lap starting from time and distance zero).
 */
export function calculateDelta(reference: Lap, comparison: Lap): DeltaPoint[] {
  const comparisonPoints = comparison.telemetryPoints;
  if (comparisonPoints.length === 0) {
    throw new PreconditionError(`Cannot compare against lap ${comparison.lapNumber}: it has no samples`);
  }

  return reference.telemetryPoints.map(point => {
    const comparisonTime = interpolateTimeAtDistance(comparisonPoints, point.distance);
    return {
      distance: point.distance,
      delta: comparisonTime - point.time,
      referenceTime: point.time,
      comparisonTime,
    };
  });
}

// Delta at the end of the lap
export function cumulativeDelta(deltaPoints: readonly DeltaPoint[]): number {
  return deltaPoints.length > 0 ? deltaPoints[deltaPoints.length - 1].delta : 0;
}

/**
 * Points where the comparison lap gained (delta fell) or lost (delta rose) more
 * than the threshold since the previous point, largest |delta| first.
 */
export function significantDeltas(
  deltaPoints: readonly DeltaPoint[],
  options: Partial<DeltaHighlightOptions> = {},
): { gains: DeltaPoint[]; losses: DeltaPoint[] } {
  const { threshold, limit } = { ...DEFAULT_DELTA_HIGHLIGHT_OPTIONS, ...options };
  const gains: DeltaPoint[] = [];
  const losses: DeltaPoint[] = [];

  for (let i = 1; i < deltaPoints.length; i++) {
    const change = deltaPoints[i].delta - deltaPoints[i - 1].delta;
    if (change < -threshold) {
      gains.push(deltaPoints[i]);
    } else if (change > threshold) {
      losses.push(deltaPoints[i]);
    }
  }

  const byMagnitude = (a: DeltaPoint, b: DeltaPoint) => Math.abs(b.delta) - Math.abs(a.delta);
  return {
    gains: gains.sort(byMagnitude).slice(0, limit),
    losses: losses.sort(byMagnitude).slice(0, limit),
  };
}
