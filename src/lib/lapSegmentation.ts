import type { Lap, LapBoundary, TelemetryPoint } from '@/types/telemetry';
import { DEFAULT_SEGMENTATION_OPTIONS, type SegmentationOptions } from './config';

function buildLap(lapNumber: number, points: TelemetryPoint[], boundary: LapBoundary): Lap {
  const first = points[0];
  const last = points[points.length - 1];
  return {
    lapNumber,
    duration: last.time - first.time,
    telemetryPoints: points,
    boundary,
  };
}

/**
 * Split samples at beacon crossing times. The sample whose time first reaches a
 * pending beacon opens the next lap. Each sample consumes at most one beacon, so
 * beacons passed between two samples close one lap per following sample.
 * Laps are kept whatever their length.
 */
export function segmentByBeacons(
  points: readonly TelemetryPoint[],
  beaconTimes: readonly number[],
): Lap[] {
  const beacons = [...beaconTimes].sort((a, b) => a - b);
  const laps: Lap[] = [];
  let current: TelemetryPoint[] = [];
  let beaconIndex = 0;

  for (const point of points) {
    // A beacon before the first sample has no lap to close
    if (beaconIndex < beacons.length && point.time >= beacons[beaconIndex]) {
      if (current.length > 0) {
        laps.push(buildLap(laps.length + 1, current, 'beacon'));
        current = [];
      }
      beaconIndex++;
    }
    current.push(point);
  }

  if (current.length > 0) {
    laps.push(buildLap(laps.length + 1, current, 'beacon'));
  }

  return laps;
}

/**
 * Split samples where the odometer resets or the logger stopped recording.
 * Candidates no longer than the minimum lap duration are dropped (pit lane,
 * out-laps cut short) rather than merged, and numbering skips over them.
 * If every candidate is dropped the whole stream becomes a single lap.
 */
export function segmentByHeuristics(
  points: readonly TelemetryPoint[],
  options: Partial<SegmentationOptions> = {},
): Lap[] {
  const opts = { ...DEFAULT_SEGMENTATION_OPTIONS, ...options };
  if (points.length === 0) return [];

  const laps: Lap[] = [];
  let current: TelemetryPoint[] = [];

  const closeCandidate = () => {
    const duration = current[current.length - 1].time - current[0].time;
    if (duration > opts.minLapDurationSeconds) {
      laps.push(buildLap(laps.length + 1, current, 'heuristic'));
    }
    current = [];
  };

  for (let i = 0; i < points.length; i++) {
    const point = points[i];
    current.push(point);

    if (i < points.length - 1) {
      const next = points[i + 1];
      const distanceReset = next.distance < point.distance;
      const timeGap = next.time - point.time > opts.maxSampleGapSeconds;
      if (distanceReset || timeGap) closeCandidate();
    }
  }

  if (current.length > 0) closeCandidate();

  if (laps.length === 0) {
    return [buildLap(1, [...points], 'session')];
  }
  return laps;
}

/**
 * Partition a session's samples into laps. Beacon times, when the export has
 * any, are authoritative; otherwise distance resets and time gaps are used.
 */
export function segmentLaps(
  points: readonly TelemetryPoint[],
  beaconTimes: readonly number[],
  options: Partial<SegmentationOptions> = {},
): Lap[] {
  if (points.length === 0) return [];
  if (beaconTimes.length > 0) return segmentByBeacons(points, beaconTimes);
  return segmentByHeuristics(points, options);
}
