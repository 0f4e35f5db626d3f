import type { BrakingZone, Lap, TelemetryPoint } from '@/types/telemetry';
import { DEFAULT_BRAKING_OPTIONS, type BrakingOptions } from './config';
import { PreconditionError } from './errors';

interface OpenZone {
  startIndex: number;
  start: TelemetryPoint;
  entrySpeed: number;
  minSpeed: number;
  peakDeceleration: number;
}

interface BrakingReading {
  braking: boolean;
  speed: number;
  deceleration: number;
}

/**
 * Read sample i. Returns null when the sample lacks the channels needed to
 * decide, in which case it neither opens nor closes a zone.
 */
function readSample(points: readonly TelemetryPoint[], i: number, opts: BrakingOptions): BrakingReading | null {
  const { speed, longitudinalAccel } = points[i];
  if (speed === undefined || longitudinalAccel === undefined) return null;
  const deceleration = Math.abs(longitudinalAccel);

  if (opts.mode === 'deceleration') {
    return { braking: longitudinalAccel < -opts.decelerationThresholdG, speed, deceleration };
  }

  // speedDrop compares against the following sample
  if (i >= points.length - 1) return null;
  const nextSpeed = points[i + 1].speed;
  if (nextSpeed === undefined) return null;
  const braking =
    nextSpeed - speed < -opts.speedDropThresholdKph && longitudinalAccel < -opts.speedDropDecelerationG;
  return { braking, speed, deceleration };
}

/**
 * Find braking zones in a single left-to-right scan over the lap.
 *
 * A zone opens on the first braking sample and closes on the first sample that
 * no longer brakes. Entry speed, minimum speed and peak deceleration are taken
 * from the braking samples only; exit speed, span and duration come from the
 * closing sample.
 * A zone still open on the last sample has no close and is not reported.
 */
export function detectBrakingZones(lap: Lap, options: Partial<BrakingOptions> = {}): BrakingZone[] {
  const opts = { ...DEFAULT_BRAKING_OPTIONS, ...options };
  const points = lap.telemetryPoints;
  if (points.length === 0) {
    throw new PreconditionError(`Cannot detect braking zones on lap ${lap.lapNumber}: it has no samples`);
  }

  const zones: BrakingZone[] = [];
  let open: OpenZone | null = null;

  for (let i = 0; i < points.length; i++) {
    const reading = readSample(points, i, opts);
    if (!reading) continue;

    const point = points[i];
    const { braking, speed, deceleration } = reading;

    if (braking) {
      if (!open) {
        open = { startIndex: i, start: point, entrySpeed: speed, minSpeed: speed, peakDeceleration: deceleration };
      } else {
        open.minSpeed = Math.min(open.minSpeed, speed);
        open.peakDeceleration = Math.max(open.peakDeceleration, deceleration);
      }
    } else if (open) {
      zones.push({
        startIndex: open.startIndex,
        endIndex: i,
        startDistance: open.start.distance,
        endDistance: point.distance,
        entrySpeed: open.entrySpeed,
        minSpeed: open.minSpeed,
        exitSpeed: speed,
        speedDelta: open.entrySpeed - speed,
        peakDeceleration: open.peakDeceleration,
        distanceSpan: point.distance - open.start.distance,
        duration: point.time - open.start.time,
      });
      open = null;
    }
  }

  return zones;
}
