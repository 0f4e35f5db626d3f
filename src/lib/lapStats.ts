import type { Lap, TelemetryPoint } from '@/types/telemetry';
import { DEFAULT_LAP_STATS_OPTIONS, type LapStatsOptions } from './config';

export interface LapStats {
  lapNumber: number;
  duration: number; // seconds
  distance: number; // meters covered during the lap
  maxSpeed?: number;
  averageSpeed?: number;
  minSpeed?: number;
  maxRpm?: number;
  averageRpm?: number;
  minRpm?: number;
  maxLateralG?: number;
  maxLongitudinalG?: number;
  peakCombinedG?: number;
  averageExhaustTemp?: number;
  averageWaterTemp?: number;
  powerBandPercent?: number; // share of all samples, 0-100
}

// Values of one channel, skipping samples that don't carry it
function channelValues(points: readonly TelemetryPoint[], read: (p: TelemetryPoint) => number | undefined): number[] {
  const values: number[] = [];
  for (const point of points) {
    const value = read(point);
    if (value !== undefined) values.push(value);
  }
  return values;
}

function max(values: number[]): number | undefined {
  return values.length > 0 ? values.reduce((a, b) => Math.max(a, b)) : undefined;
}

function min(values: number[]): number | undefined {
  return values.length > 0 ? values.reduce((a, b) => Math.min(a, b)) : undefined;
}

function average(values: number[]): number | undefined {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : undefined;
}

/**
 * Per-lap aggregates. Absent channel values are left out of every aggregate,
 * never counted as zero; an aggregate is undefined when no sample carries its channel.
 */
export function computeLapStats(lap: Lap, options: Partial<LapStatsOptions> = {}): LapStats {
  const { powerBandRpm } = { ...DEFAULT_LAP_STATS_OPTIONS, ...options };
  const points = lap.telemetryPoints;

  const speeds = channelValues(points, p => p.speed);
  const rpms = channelValues(points, p => p.rpm);
  const lateral = channelValues(points, p => p.lateralAccel).map(Math.abs);
  const longitudinal = channelValues(points, p => p.longitudinalAccel).map(Math.abs);
  const combined = channelValues(points, p =>
    p.lateralAccel !== undefined && p.longitudinalAccel !== undefined
      ? Math.sqrt(p.lateralAccel ** 2 + p.longitudinalAccel ** 2)
      : undefined,
  );

  const inBand = rpms.filter(rpm => rpm >= powerBandRpm.min && rpm <= powerBandRpm.max).length;

  return {
    lapNumber: lap.lapNumber,
    duration: lap.duration,
    distance: points.length > 0 ? points[points.length - 1].distance - points[0].distance : 0,
    maxSpeed: max(speeds),
    averageSpeed: average(speeds),
    minSpeed: min(speeds),
    maxRpm: max(rpms),
    averageRpm: average(rpms),
    minRpm: min(rpms),
    maxLateralG: max(lateral),
    maxLongitudinalG: max(longitudinal),
    peakCombinedG: max(combined),
    averageExhaustTemp: average(channelValues(points, p => p.exhaustTemp)),
    averageWaterTemp: average(channelValues(points, p => p.waterTemp)),
    powerBandPercent: rpms.length > 0 ? (inBand / points.length) * 100 : undefined,
  };
}

// Format lap time as m:ss.sss
export function formatLapTime(seconds: number): string {
  const totalMs = Math.round(seconds * 1000);
  const minutes = Math.floor(totalMs / 60000);
  const remainder = (totalMs - minutes * 60000) / 1000;
  return `${minutes}:${remainder.toFixed(3).padStart(6, '0')}`;
}
