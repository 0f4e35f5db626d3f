import type { Lap, Session } from '@/types/telemetry';
import { computeLapStats } from './lapStats';

export type ConsistencyLevel = 'Excellent' | 'Good' | 'Average' | 'Low';

export interface SessionSummary {
  lapCount: number;
  bestLap?: Lap;
  averageLapTime?: number; // seconds
  lapTimeStdDev?: number; // seconds, population
  consistencyScore: number; // 0-100, higher is steadier
  totalDuration: number; // seconds, sum of lap durations
  maxSpeed?: number; // km/h
  averageSpeed?: number; // km/h, mean of per-lap averages
  totalDistance: number; // meters, furthest final distance of any lap
}

function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function stdDev(values: readonly number[]): number | undefined {
  const avg = mean(values);
  if (avg === undefined) return undefined;
  return Math.sqrt(values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length);
}

/**
 * Lap time consistency on a 0-100 scale: 100 when every lap matches, 0 once the
 * standard deviation reaches half the mean lap time. Needs at least two laps.
 */
export function consistencyScore(laps: readonly Lap[]): number {
  if (laps.length < 2) return 0;
  const times = laps.map(lap => lap.duration);
  const avg = mean(times);
  const std = stdDev(times);
  if (avg === undefined || std === undefined || avg <= 0) return 0;
  return Math.min(100, Math.max(0, 100 * (1 - (2 * std) / avg)));
}

export function consistencyLevel(score: number): ConsistencyLevel {
  if (score >= 80) return 'Excellent';
  if (score >= 60) return 'Good';
  if (score >= 40) return 'Average';
  return 'Low';
}

// Laps slower than two standard deviations above the mean
export function findOutlierLaps(laps: readonly Lap[]): Lap[] {
  const times = laps.map(lap => lap.duration);
  const avg = mean(times);
  const std = stdDev(times);
  if (avg === undefined || std === undefined) return [];
  const upper = avg + 2 * std;
  return laps.filter(lap => lap.duration > upper);
}

export function averageDeviationFromBest(laps: readonly Lap[]): number {
  if (laps.length === 0) return 0;
  const best = Math.min(...laps.map(lap => lap.duration));
  return mean(laps.map(lap => lap.duration - best)) ?? 0;
}

export function summarizeSession(session: Session): SessionSummary {
  const { laps } = session;
  const times = laps.map(lap => lap.duration);

  let bestLap: Lap | undefined;
  let maxSpeed: number | undefined;
  let totalDistance = 0;
  const lapAverageSpeeds: number[] = [];

  for (const lap of laps) {
    if (!bestLap || lap.duration < bestLap.duration) bestLap = lap;

    const { averageSpeed } = computeLapStats(lap);
    if (averageSpeed !== undefined) lapAverageSpeeds.push(averageSpeed);

    const points = lap.telemetryPoints;
    if (points.length > 0) {
      totalDistance = Math.max(totalDistance, points[points.length - 1].distance);
    }
    for (const point of points) {
      if (point.speed !== undefined && (maxSpeed === undefined || point.speed > maxSpeed)) {
        maxSpeed = point.speed;
      }
    }
  }

  return {
    lapCount: laps.length,
    bestLap,
    averageLapTime: mean(times),
    lapTimeStdDev: stdDev(times),
    consistencyScore: consistencyScore(laps),
    totalDuration: times.reduce((sum, t) => sum + t, 0),
    maxSpeed,
    averageSpeed: mean(lapAverageSpeeds),
    totalDistance,
  };
}
