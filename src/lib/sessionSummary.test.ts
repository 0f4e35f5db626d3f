import { describe, expect, it } from 'vitest';
import type { Session } from '@/types/telemetry';
import { lap, point, timedLap } from '@/test/builders';
import {
  averageDeviationFromBest,
  consistencyLevel,
  consistencyScore,
  findOutlierLaps,
  summarizeSession,
} from './sessionSummary';

const laps = (durations: number[]) => durations.map((duration, i) => timedLap(duration, i + 1));

describe('summarizeSession', () => {
  it('summarises laps, speed and distance', () => {
    const first = lap([point(0, 0, { speed: 50 }), point(60, 1000, { speed: 90 })], 1);
    const second = lap([point(60, 1000, { speed: 95 }), point(118, 2000, { speed: 60 })], 2);
    const session: Session = { id: 'test-session', date: new Date(0), laps: [first, second] };

    const summary = summarizeSession(session);

    expect(summary).toMatchObject({
      lapCount: 2,
      bestLap: second,
      averageLapTime: 59,
      lapTimeStdDev: 1,
      totalDuration: 118,
      maxSpeed: 95,
      averageSpeed: 73.75,
      totalDistance: 2000,
    });
    expect(summary.consistencyScore).toBeCloseTo(96.61, 2);
  });

  it('handles a session without laps', () => {
    const summary = summarizeSession({ id: 'test-session', date: new Date(0), laps: [] });

    expect(summary).toEqual({
      lapCount: 0,
      bestLap: undefined,
      averageLapTime: undefined,
      lapTimeStdDev: undefined,
      consistencyScore: 0,
      totalDuration: 0,
      maxSpeed: undefined,
      averageSpeed: undefined,
      totalDistance: 0,
    });
  });
});

describe('consistencyScore', () => {
  it('scales the spread of lap times against the mean', () => {
    expect(consistencyScore(laps([60, 62, 61, 63]))).toBeCloseTo(96.364, 3);
  });

  it('is 100 for identical laps', () => {
    expect(consistencyScore(laps([60, 60, 60]))).toBe(100);
  });

  it('needs two laps', () => {
    expect(consistencyScore(laps([60]))).toBe(0);
    expect(consistencyScore([])).toBe(0);
  });

  it('bottoms out at zero', () => {
    expect(consistencyScore(laps([10, 90]))).toBe(0);
  });
});

describe('consistencyLevel', () => {
  it('labels score bands', () => {
    expect(consistencyLevel(80)).toBe('Excellent');
    expect(consistencyLevel(79.9)).toBe('Good');
    expect(consistencyLevel(60)).toBe('Good');
    expect(consistencyLevel(40)).toBe('Average');
    expect(consistencyLevel(39.9)).toBe('Low');
  });
});

describe('findOutlierLaps', () => {
  it('returns laps more than two standard deviations slower than the mean', () => {
    const session = laps([60, 60, 60, 60, 60, 60, 60, 60, 60, 90]);
    expect(findOutlierLaps(session).map(l => l.lapNumber)).toEqual([10]);
  });

  it('returns nothing for steady laps', () => {
    expect(findOutlierLaps(laps([60, 61, 60.5]))).toEqual([]);
    expect(findOutlierLaps([])).toEqual([]);
  });
});

describe('averageDeviationFromBest', () => {
  it('averages the gap to the best lap', () => {
    expect(averageDeviationFromBest(laps([60, 62, 61, 63]))).toBe(1.5);
  });

  it('is zero without laps', () => {
    expect(averageDeviationFromBest([])).toBe(0);
  });
});
