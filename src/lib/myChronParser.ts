import { randomUUID } from 'node:crypto';
import type {
  ParsedSession,
  RowRejection,
  Session,
  TelemetryPoint,
} from '@/types/telemetry';
import {
  DEFAULT_PARSER_OPTIONS,
  type ParserOptions,
  type SegmentationOptions,
} from './config';
import { TelemetryParseError } from './errors';
import { splitCsvLine, splitLines } from './csvLine';
import {
  cleanField,
  listResolvedChannels,
  listUnresolvedChannels,
  resolveColumns,
} from './columnResolver';
import { decodeSample, parseDecimal } from './sampleDecoder';
import { extractMetadata } from './metadataExtractor';
import { segmentLaps } from './lapSegmentation';

/**
 * MyChron / Race Studio CSV export parser.
 *
 * Layout:
 *   "Format","AiM CSV File"
 *   "Session","..."             <- key/value preamble
 *   "Beacon Markers","62.431","124.902",...
 *   "Time","Distance on GPS Speed","GPS Speed",...   <- header
 *   "s","m","km/h",...                                <- units, always skipped
 *   "0.000","0.00","0.0",...                          <- data
 */

export interface ParseOptions extends Partial<ParserOptions> {
  segmentation?: Partial<SegmentationOptions>;
}

/**
 * Decode raw bytes with the first encoding that accepts them. Unknown labels
 * are skipped like failed decodes.
 */
export function decodeText(
  bytes: ArrayBuffer | Uint8Array,
  encodings: readonly string[],
): { text: string; encoding: string } {
  for (const encoding of encodings) {
    try {
      const decoder = new TextDecoder(encoding, { fatal: true });
      return { text: decoder.decode(bytes), encoding };
    } catch (error) {
      // RangeError: unsupported label, TypeError: invalid byte sequence
      if (error instanceof RangeError || error instanceof TypeError) continue;
      throw error;
    }
  }
  throw new TelemetryParseError('InvalidFormat');
}

/**
 * Index of the header row: first field is a time channel name and the row is
 * wide enough to be a header. Returns -1 when there is none.
 */
export function findHeaderIndex(
  rows: ReadonlyArray<readonly string[]>,
  options: Partial<Pick<ParserOptions, 'minHeaderColumns' | 'timeHeaderNames'>> = {},
): number {
  const { minHeaderColumns, timeHeaderNames } = { ...DEFAULT_PARSER_OPTIONS, ...options };
  const names = timeHeaderNames.map(name => name.toLowerCase());

  return rows.findIndex(fields => {
    if (fields.length < minHeaderColumns) return false;
    return names.includes(cleanField(fields[0] ?? '').toLowerCase());
  });
}

// Crossing times after the label field, ascending; unparseable tokens are dropped
export function parseBeaconMarkers(fields: readonly string[]): number[] {
  const times: number[] = [];
  for (const field of fields.slice(1)) {
    const value = parseDecimal(cleanField(field));
    if (value !== undefined) times.push(value);
  }
  return times.sort((a, b) => a - b);
}

function emptySkipReasons(): Record<RowRejection, number> {
  return { fieldCount: 0, missingTime: 0, missingDistance: 0, invalidGpsFix: 0 };
}

function describeSkipReasons(reasons: Record<RowRejection, number>): string {
  return Object.entries(reasons)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason}: ${count}`)
    .join(', ');
}

/**
 * Parse a MyChron CSV export into a Session with laps.
 *
 * Throws TelemetryParseError when the bytes cannot be decoded, when no header
 * row is found, or when no data row decodes. Anything less severe is counted in
 * the returned diagnostics and the parse carries on.
 */
export function parseMyChronCsv(
  input: ArrayBuffer | Uint8Array | string,
  options: ParseOptions = {},
): ParsedSession {
  const { segmentation, ...parserOptions } = options;
  const opts = { ...DEFAULT_PARSER_OPTIONS, ...parserOptions };

  let text: string;
  let encoding: string | null = null;
  if (typeof input === 'string') {
    text = input;
  } else {
    ({ text, encoding } = decodeText(input, opts.encodings));
  }

  const lines = splitLines(text);
  const rows = lines.map(splitCsvLine);

  const headerIndex = findHeaderIndex(rows, opts);
  if (headerIndex === -1) {
    throw new TelemetryParseError('MissingHeaders');
  }

  const metadata = extractMetadata(lines.slice(0, Math.min(opts.metadataLineLimit, headerIndex)));

  const token = opts.beaconMarkerToken.toLowerCase();
  const beaconIndex = lines.findIndex(line => line.toLowerCase().includes(token));
  let beaconTimes: number[] = [];
  if (beaconIndex !== -1) {
    beaconTimes = parseBeaconMarkers(rows[beaconIndex]);
    if (beaconTimes.length === 0) {
      console.warn(`MyChron CSV: beacon marker line ${beaconIndex + 1} has no readable times, using lap heuristics`);
    }
  }

  const header = rows[headerIndex];
  const mapping = resolveColumns(header);

  const points: TelemetryPoint[] = [];
  const skipReasons = emptySkipReasons();
  let totalRows = 0;

  // The row right after the header holds units
  for (let i = headerIndex + 2; i < rows.length; i++) {
    totalRows++;
    const result = decodeSample(rows[i], mapping, header.length, opts);
    if (result.ok) {
      points.push(result.point);
    } else {
      skipReasons[result.reason]++;
    }
  }

  const skippedRows = totalRows - points.length;
  if (skippedRows > 0) {
    console.warn(`MyChron CSV: skipped ${skippedRows} of ${totalRows} rows (${describeSkipReasons(skipReasons)})`);
  }

  if (points.length === 0) {
    throw new TelemetryParseError(
      'NoValidData',
      totalRows > 0
        ? `No valid telemetry data found (${skippedRows} of ${totalRows} rows skipped)`
        : 'No valid telemetry data found',
    );
  }

  const laps = segmentLaps(points, beaconTimes, segmentation);

  const { date, ...details } = metadata;
  const session: Session = {
    id: randomUUID(),
    date: date ?? new Date(),
    ...details,
    laps,
  };

  return {
    session,
    diagnostics: {
      encoding,
      headerLine: headerIndex,
      totalRows,
      decodedRows: points.length,
      skippedRows,
      skipReasons,
      beaconTimes,
      resolvedChannels: listResolvedChannels(mapping),
      unresolvedChannels: listUnresolvedChannels(mapping),
    },
  };
}
