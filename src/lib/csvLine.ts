import Papa from 'papaparse';

// Split text into trimmed, non-empty lines (CRLF, LF and bare CR endings)
export function splitLines(text: string): string[] {
  return text
    .split(/\r\n|\n|\r/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

// Quote-toggling split: a quote flips the in-field state and is dropped
function splitTogglingQuotes(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      fields.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current.trim());
  return fields;
}

/**
 * Tokenise a single CSV line. Lines are parsed one at a time so an unbalanced
 * quote only affects its own line. When papaparse reports malformed quoting
 * (`"0.5"x,...`) the line is re-split by toggling on each quote, which keeps
 * the field count.
 */
export function splitCsvLine(line: string): string[] {
  const result = Papa.parse<string[]>(line, {
    delimiter: ',',
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false,
  });
  if (result.errors.length > 0) return splitTogglingQuotes(line);
  return result.data[0] ?? [];
}
