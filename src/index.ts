export * from './types/telemetry';

export * from './lib/config';
export * from './lib/errors';

export {
  COLUMN_SYNONYMS,
  ALL_CHANNELS,
  cleanField,
  resolveColumns,
  listResolvedChannels,
  listUnresolvedChannels,
  type SynonymTable,
} from './lib/columnResolver';
export { decodeSample, parseDecimal, parseInteger, type DecodeResult } from './lib/sampleDecoder';
export { METADATA_KEYS, extractMetadata, parseSessionDate } from './lib/metadataExtractor';
export {
  decodeText,
  findHeaderIndex,
  parseBeaconMarkers,
  parseMyChronCsv,
  type ParseOptions,
} from './lib/myChronParser';
export { importSessionFile } from './lib/sessionImport';

export { segmentLaps, segmentByBeacons, segmentByHeuristics } from './lib/lapSegmentation';
export { detectBrakingZones } from './lib/brakingZones';
export { detectCorners } from './lib/corners';
export {
  calculateDelta,
  interpolateTimeAtDistance,
  cumulativeDelta,
  significantDeltas,
} from './lib/deltaCalculation';
export { computeLapStats, formatLapTime, type LapStats } from './lib/lapStats';
export {
  summarizeSession,
  consistencyScore,
  consistencyLevel,
  findOutlierLaps,
  averageDeviationFromBest,
  type ConsistencyLevel,
  type SessionSummary,
} from './lib/sessionSummary';
