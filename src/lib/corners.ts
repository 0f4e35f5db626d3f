import type { Corner, Lap, TelemetryPoint } from '@/types/telemetry';
import { DEFAULT_CORNER_OPTIONS, type CornerOptions } from './config';
import { PreconditionError } from './errors';

const STANDARD_GRAVITY = 9.81; // m/s²

interface OpenCorner {
  startIndex: number;
  apexIndex: number;
  entrySpeed: number;
  apexSpeed: number;
  apexLateralG: number;
  peakLateralG: number;
  openingLateralG: number;
}

// Radius of the circle driven at a speed (km/h) under a lateral load (G): v² / a
function turnRadius(speedKph: number, lateralG: number): number {
  if (lateralG <= 0) return 0;
  const metersPerSecond = speedKph / 3.6;
  return metersPerSecond ** 2 / (STANDARD_GRAVITY * lateralG);
}

/**
 * Find corners from lateral load.
 *
 * A corner is open while |lateral G| exceeds the threshold (and, when a cap is
 * set, speed stays under it). The apex is the first slowest sample; exit speed
 * is read from the sample that closes the corner. Direction follows the sign of
 * lateral G on the opening sample: positive is a right-hander.
 */
export function detectCorners(lap: Lap, options: Partial<CornerOptions> = {}): Corner[] {
  const opts = { ...DEFAULT_CORNER_OPTIONS, ...options };
  const points: readonly TelemetryPoint[] = lap.telemetryPoints;
  if (points.length === 0) {
    throw new PreconditionError(`Cannot detect corners on lap ${lap.lapNumber}: it has no samples`);
  }

  const corners: Corner[] = [];
  let open: OpenCorner | null = null;

  for (let i = 0; i < points.length; i++) {
    const { speed, lateralAccel } = points[i];
    if (speed === undefined || lateralAccel === undefined) continue;

    const lateralG = Math.abs(lateralAccel);
    const cornering =
      lateralG > opts.lateralThresholdG &&
      (opts.maxCornerSpeedKph === null || speed < opts.maxCornerSpeedKph);

    if (cornering) {
      if (!open) {
        open = {
          startIndex: i,
          apexIndex: i,
          entrySpeed: speed,
          apexSpeed: speed,
          apexLateralG: lateralG,
          peakLateralG: lateralG,
          openingLateralG: lateralAccel,
        };
      } else {
        if (speed < open.apexSpeed) {
          open.apexSpeed = speed;
          open.apexIndex = i;
          open.apexLateralG = lateralG;
        }
        open.peakLateralG = Math.max(open.peakLateralG, lateralG);
      }
    } else if (open) {
      corners.push({
        startIndex: open.startIndex,
        endIndex: i,
        apexIndex: open.apexIndex,
        entrySpeed: open.entrySpeed,
        apexSpeed: open.apexSpeed,
        exitSpeed: speed,
        peakLateralG: open.peakLateralG,
        direction: open.openingLateralG > 0 ? 'right' : 'left',
        apexDistance: points[open.apexIndex].distance,
        turnRadius: turnRadius(open.apexSpeed, open.apexLateralG),
      });
      open = null;
    }
  }

  return corners;
}
