import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFixture } from '@/test/builders';
import { TelemetryParseError } from './errors';
import { importSessionFile } from './sessionImport';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('importSessionFile', () => {
  it('parses an uploaded export', async () => {
    const file = new Blob([readFixture('mychron-export.csv')], { type: 'text/csv' });
    const { session, diagnostics } = await importSessionFile(file);

    expect(session.track).toBe('Osona2');
    expect(session.laps).toHaveLength(3);
    expect(diagnostics.encoding).toBe('utf-8');
  });

  it('passes options to the parser', async () => {
    const file = new Blob(['Time,Distance,Speed\ns,m,km/h\n0,0,60\n']);
    const { session } = await importSessionFile(file, { zeroFillMissingChannels: true });
    expect(session.laps[0].telemetryPoints[0].rpm).toBe(0);
  });

  it('rejects with the parse error', async () => {
    const file = new Blob(['not a telemetry export']);
    await expect(importSessionFile(file)).rejects.toBeInstanceOf(TelemetryParseError);
    await expect(importSessionFile(file)).rejects.toMatchObject({ kind: 'MissingHeaders' });
  });
});
