import {
  type Channel,
  type ColumnMapping,
  type RowRejection,
  type TelemetryPoint,
  INTEGER_CHANNELS,
  OPTIONAL_CHANNELS,
} from '@/types/telemetry';
import { DEFAULT_PARSER_OPTIONS, type ParserOptions } from './config';
import { cleanField } from './columnResolver';

export type DecodeResult =
  | { ok: true; point: TelemetryPoint }
  | { ok: false; reason: RowRejection };

type DecoderOptions = Pick<ParserOptions, 'zeroFillMissingChannels'>;

type MutablePoint = { -readonly [K in keyof TelemetryPoint]: TelemetryPoint[K] };

// Plain decimal notation only: no locale separators, no NaN/Infinity, no trailing junk
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseDecimal(text: string): number | undefined {
  if (!DECIMAL_PATTERN.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export function parseInteger(text: string): number | undefined {
  if (!INTEGER_PATTERN.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Decode one data row into a TelemetryPoint.
 *
 * A bad optional field only drops that channel. The row itself is rejected when
 * its field count differs from the header, when time or distance is missing or
 * unparseable, or when both GPS coordinates are exactly zero (no fix).
 */
export function decodeSample(
  fields: readonly string[],
  mapping: ColumnMapping,
  headerLength: number,
  options: Partial<DecoderOptions> = {},
): DecodeResult {
  const { zeroFillMissingChannels } = { ...DEFAULT_PARSER_OPTIONS, ...options };

  if (fields.length !== headerLength) {
    return { ok: false, reason: 'fieldCount' };
  }

  const read = (channel: Channel): number | undefined => {
    const idx = mapping[channel];
    if (idx === undefined) return undefined;
    const raw = cleanField(fields[idx] ?? '');
    return INTEGER_CHANNELS.has(channel) ? parseInteger(raw) : parseDecimal(raw);
  };

  const time = read('time');
  if (time === undefined) return { ok: false, reason: 'missingTime' };

  const distance = read('distance');
  if (distance === undefined) return { ok: false, reason: 'missingDistance' };

  // Only a fix with both coordinates present can be judged invalid
  const latitude = read('latitude');
  const longitude = read('longitude');
  if (latitude !== undefined && longitude !== undefined && latitude === 0 && longitude === 0) {
    return { ok: false, reason: 'invalidGpsFix' };
  }

  const point: MutablePoint = { time, distance };
  for (const channel of OPTIONAL_CHANNELS) {
    const value = read(channel);
    if (value !== undefined) {
      point[channel] = value;
    } else if (zeroFillMissingChannels) {
      point[channel] = 0;
    }
  }

  return { ok: true, point };
}
