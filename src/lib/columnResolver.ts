import {
  type Channel,
  type ColumnMapping,
  OPTIONAL_CHANNELS,
  REQUIRED_CHANNELS,
} from '@/types/telemetry';
import columnSynonyms from './columnSynonyms.json';

/**
 * Column Resolver
 *
 * Header text differs between logger firmware and export tools ("GPS Speed" in
 * Race Studio exports, "GPS_Speed" in older RS2 files, plain "Speed" elsewhere).
 * Each canonical channel has an ordered list of candidate header names; the
 * first candidate present in the header row wins.
 */

export type SynonymTable = Readonly<Record<Channel, readonly string[]>>;

export const COLUMN_SYNONYMS: SynonymTable = columnSynonyms;

export const ALL_CHANNELS: readonly Channel[] = [...REQUIRED_CHANNELS, ...OPTIONAL_CHANNELS];

// Strip whitespace and any quote characters wrapping a field
export function cleanField(value: string): string {
  return value.trim().replace(/^"+|"+$/g, '').trim();
}

/**
 * Map header fields to column indices. Matching is exact and case-sensitive
 * after cleaning; channels with no matching candidate are left out.
 */
export function resolveColumns(
  headerFields: readonly string[],
  synonyms: SynonymTable = COLUMN_SYNONYMS,
): ColumnMapping {
  const indexByName = new Map<string, number>();
  headerFields.forEach((field, idx) => {
    const name = cleanField(field);
    // Duplicate header names resolve to their first column
    if (!indexByName.has(name)) indexByName.set(name, idx);
  });

  const mapping: ColumnMapping = {};
  for (const channel of ALL_CHANNELS) {
    for (const candidate of synonyms[channel]) {
      const idx = indexByName.get(candidate);
      if (idx !== undefined) {
        mapping[channel] = idx;
        break;
      }
    }
  }
  return mapping;
}

export function listUnresolvedChannels(mapping: ColumnMapping): Channel[] {
  return ALL_CHANNELS.filter(channel => mapping[channel] === undefined);
}

export function listResolvedChannels(mapping: ColumnMapping): Channel[] {
  return ALL_CHANNELS.filter(channel => mapping[channel] !== undefined);
}
