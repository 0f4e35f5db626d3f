import type { SessionMetadata } from '@/types/telemetry';
import { cleanField } from './columnResolver';
import { splitCsvLine } from './csvLine';

/**
 * Metadata Extractor
 *
 * Race Studio exports open with a preamble of key/value rows:
 *   "Session","Osona2"
 *   "Racer","..."
 *   "Date","Saturday, March 9, 2024"
 * Other tools write "Track: Circuit Osona" instead. Both shapes are accepted.
 */

// Ordered: for each field the first listed key found in the preamble wins
export const METADATA_KEYS: ReadonlyArray<{ field: keyof SessionMetadata; keys: readonly string[] }> = [
  { field: 'track', keys: ['track', 'venue', 'session'] },
  { field: 'sessionName', keys: ['session', 'session name'] },
  { field: 'racer', keys: ['racer', 'driver'] },
  { field: 'vehicle', keys: ['vehicle', 'kart'] },
  { field: 'championship', keys: ['championship'] },
  { field: 'date', keys: ['date'] },
];

const COLON_LINE = /^\s*"?([^",:]+?)"?\s*:\s*(.*)$/;

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

// "Saturday, March 9, 2024"
const SESSION_DATE = /^([A-Za-z]+),\s*([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/;

/**
 * Parse a preamble date in the "EEEE, MMMM d, yyyy" form. Returns midnight UTC,
 * or undefined when the text does not match.
 */
export function parseSessionDate(text: string): Date | undefined {
  const match = SESSION_DATE.exec(text.trim());
  if (!match) return undefined;

  const [, weekday, monthName, dayText, yearText] = match;
  if (!WEEKDAYS.includes(weekday.toLowerCase())) return undefined;

  const month = MONTHS.indexOf(monthName.toLowerCase());
  if (month === -1) return undefined;

  const day = parseInt(dayText, 10);
  const year = parseInt(yearText, 10);
  const date = new Date(Date.UTC(year, month, day));
  // Rejects "February 30" and friends, which Date.UTC would roll over
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) return undefined;

  return date;
}

// Split a preamble line into a lower-case key and a cleaned value
export function splitMetadataLine(line: string): { key: string; value: string } | null {
  const colon = COLON_LINE.exec(line);
  if (colon) {
    return { key: cleanField(colon[1]).toLowerCase(), value: cleanField(colon[2]) };
  }

  const parts = splitCsvLine(line);
  if (parts.length < 2) return null;
  return { key: cleanField(parts[0]).toLowerCase(), value: cleanField(parts[1]) };
}

export function extractMetadata(lines: readonly string[]): SessionMetadata {
  // First occurrence of each key
  const values = new Map<string, string>();
  for (const line of lines) {
    const entry = splitMetadataLine(line);
    if (entry && !values.has(entry.key)) {
      values.set(entry.key, entry.value);
    }
  }

  const metadata: SessionMetadata = {};
  for (const { field, keys } of METADATA_KEYS) {
    const value = keys.map(key => values.get(key)).find(v => v !== undefined && v !== '');
    if (value === undefined) continue;

    if (field === 'date') {
      const date = parseSessionDate(value);
      if (date) metadata.date = date;
    } else {
      metadata[field] = value;
    }
  }
  return metadata;
}
