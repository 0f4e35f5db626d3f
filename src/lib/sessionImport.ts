import type { ParsedSession } from '@/types/telemetry';
import { parseMyChronCsv, type ParseOptions } from './myChronParser';

/**
 * Read a MyChron CSV export (a File from an upload, or any Blob) and parse it.
 * Parse failures reject with the TelemetryParseError.
 */
export async function importSessionFile(file: Blob, options: ParseOptions = {}): Promise<ParsedSession> {
  const buffer = await file.arrayBuffer();
  return parseMyChronCsv(buffer, options);
}
