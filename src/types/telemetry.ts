// Core telemetry data types

// Channels every sample must carry
export const REQUIRED_CHANNELS = ['time', 'distance'] as const;

// Channels a logger may or may not export
export const OPTIONAL_CHANNELS = [
  'speed',
  'latitude',
  'longitude',
  'altitude',
  'satelliteCount',
  'heading',
  'positionAccuracy',
  'speedAccuracy',
  'lateralAccel',
  'longitudinalAccel',
  'slope',
  'yawRate',
  'turnRadius',
  'rpm',
  'exhaustTemp',
  'waterTemp',
  'accelX',
  'accelY',
  'accelZ',
  'gyroX',
  'gyroY',
  'gyroZ',
  'loggerTemp',
  'batteryVoltage',
] as const;

export type RequiredChannel = (typeof REQUIRED_CHANNELS)[number];
export type OptionalChannel = (typeof OPTIONAL_CHANNELS)[number];
export type Channel = RequiredChannel | OptionalChannel;

// Channels decoded with integer syntax; everything else is decimal
export const INTEGER_CHANNELS: ReadonlySet<Channel> = new Set<Channel>(['satelliteCount', 'rpm']);

export interface TelemetryPoint {
  readonly time: number; // seconds since session start
  readonly distance: number; // meters since session start
  readonly speed?: number; // km/h
  readonly latitude?: number;
  readonly longitude?: number;
  readonly altitude?: number; // meters
  readonly satelliteCount?: number;
  readonly heading?: number; // degrees (0-360)
  readonly positionAccuracy?: number; // meters
  readonly speedAccuracy?: number; // km/h
  readonly lateralAccel?: number; // G, positive = right
  readonly longitudinalAccel?: number; // G, negative = braking
  readonly slope?: number; // degrees
  readonly yawRate?: number; // deg/s
  readonly turnRadius?: number; // meters
  readonly rpm?: number;
  readonly exhaustTemp?: number; // °C
  readonly waterTemp?: number; // °C
  readonly accelX?: number;
  readonly accelY?: number;
  readonly accelZ?: number;
  readonly gyroX?: number;
  readonly gyroY?: number;
  readonly gyroZ?: number;
  readonly loggerTemp?: number; // °C
  readonly batteryVoltage?: number; // volts
}

// How a lap's boundaries were found
export type LapBoundary = 'beacon' | 'heuristic' | 'session';

export interface Lap {
  readonly lapNumber: number; // 1-based, no gaps
  readonly duration: number; // seconds, last sample time - first sample time
  readonly telemetryPoints: readonly TelemetryPoint[];
  readonly boundary: LapBoundary;
}

export interface SessionMetadata {
  track?: string;
  racer?: string;
  vehicle?: string;
  championship?: string;
  sessionName?: string;
  date?: Date;
}

export interface Session {
  readonly id: string;
  readonly date: Date;
  readonly track?: string;
  readonly racer?: string;
  readonly vehicle?: string;
  readonly championship?: string;
  readonly sessionName?: string;
  readonly laps: readonly Lap[];
}

export interface BrakingZone {
  startIndex: number; // sample that opened the zone
  endIndex: number; // first sample that no longer brakes
  startDistance: number;
  endDistance: number;
  entrySpeed: number; // km/h
  minSpeed: number; // km/h
  exitSpeed: number; // km/h, at the closing sample
  speedDelta: number; // km/h, entry - exit
  peakDeceleration: number; // G, absolute
  distanceSpan: number; // meters
  duration: number; // seconds
}

export type CornerDirection = 'left' | 'right';

export interface Corner {
  startIndex: number;
  endIndex: number;
  apexIndex: number;
  entrySpeed: number; // km/h
  apexSpeed: number; // km/h
  exitSpeed: number; // km/h
  peakLateralG: number; // absolute
  direction: CornerDirection;
  apexDistance: number; // meters
  turnRadius: number; // meters at the apex, 0 without lateral load
}

export interface DeltaPoint {
  distance: number;
  delta: number; // seconds, positive = comparison slower
  referenceTime: number;
  comparisonTime: number;
}

// Column index per channel; a missing key means the channel is absent from the file
export type ColumnMapping = Partial<Record<Channel, number>>;

// Why a data row was dropped
export type RowRejection = 'fieldCount' | 'missingTime' | 'missingDistance' | 'invalidGpsFix';

export interface ParseDiagnostics {
  encoding: string | null; // null when the input was already text
  headerLine: number; // 0-based index among non-empty lines
  totalRows: number;
  decodedRows: number;
  skippedRows: number;
  skipReasons: Record<RowRejection, number>;
  beaconTimes: number[];
  resolvedChannels: Channel[];
  unresolvedChannels: Channel[];
}

export interface ParsedSession {
  session: Session;
  diagnostics: ParseDiagnostics;
}
