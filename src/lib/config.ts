// Default thresholds for parsing, segmentation and event detection.
// Every public operation takes a Partial of its options and spreads it over these.

export interface ParserOptions {
  /** TextDecoder labels tried in order; the first that decodes without error wins. */
  encodings: readonly string[];
  /** Number of leading lines scanned for key/value metadata. */
  metadataLineLimit: number;
  /** Fewest fields a line needs to be accepted as the header row. */
  minHeaderColumns: number;
  /** Accepted first-field names of the header row, compared case-insensitively. */
  timeHeaderNames: readonly string[];
  /** Case-insensitive token identifying the beacon-marker line. */
  beaconMarkerToken: string;
  /** Legacy export compatibility: absent optional channels decode as 0 instead of being left out. */
  zeroFillMissingChannels: boolean;
}

export interface SegmentationOptions {
  /** A jump in time larger than this between two samples closes the lap. */
  maxSampleGapSeconds: number;
  /** Heuristic candidates lasting this long or less are dropped. */
  minLapDurationSeconds: number;
}

export type BrakingDetectionMode = 'deceleration' | 'speedDrop';

export interface BrakingOptions {
  mode: BrakingDetectionMode;
  /** 'deceleration' mode: zone is open while longitudinal G is below minus this value. */
  decelerationThresholdG: number;
  /** 'speedDrop' mode: speed must fall by more than this to the next sample. */
  speedDropThresholdKph: number;
  /** 'speedDrop' mode: longitudinal G must also be below minus this value. */
  speedDropDecelerationG: number;
}

export interface CornerOptions {
  /** Corner is open while |lateral G| is above this value. */
  lateralThresholdG: number;
  /** When set, the corner also requires speed below this value. */
  maxCornerSpeedKph: number | null;
}

export interface LapStatsOptions {
  powerBandRpm: { min: number; max: number };
}

export const DEFAULT_PARSER_OPTIONS: Readonly<ParserOptions> = {
  encodings: ['utf-8', 'latin1', 'ascii'],
  metadataLineLimit: 13,
  minHeaderColumns: 3,
  timeHeaderNames: ['time'],
  beaconMarkerToken: 'beacon markers',
  zeroFillMissingChannels: false,
};

export const DEFAULT_SEGMENTATION_OPTIONS: Readonly<SegmentationOptions> = {
  maxSampleGapSeconds: 5,
  minLapDurationSeconds: 10,
};

export const DEFAULT_BRAKING_OPTIONS: Readonly<BrakingOptions> = {
  mode: 'deceleration',
  decelerationThresholdG: 0.5,
  speedDropThresholdKph: 5,
  speedDropDecelerationG: 0.3,
};

export const DEFAULT_CORNER_OPTIONS: Readonly<CornerOptions> = {
  lateralThresholdG: 0.8,
  maxCornerSpeedKph: null,
};

// IAME X30 style two-stroke power band
export const DEFAULT_LAP_STATS_OPTIONS: Readonly<LapStatsOptions> = {
  powerBandRpm: { min: 10000, max: 13500 },
};

export interface DeltaHighlightOptions {
  /** Change in delta between consecutive points that counts as a gain or loss (seconds). */
  threshold: number;
  /** Most points reported per list. */
  limit: number;
}

export const DEFAULT_DELTA_HIGHLIGHT_OPTIONS: Readonly<DeltaHighlightOptions> = {
  threshold: 0.1,
  limit: 5,
};
