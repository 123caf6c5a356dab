import { describe, expect, it } from 'vitest';

import { aggregateWindow, ratingForUptime } from '../src/report/aggregate';
import type { CheckResult } from '../src/monitor/types';
import { checkResult, failedOutcome } from './helpers/builders';

const START = 1_759_968_000;
const NOW = 1_760_054_400;

function dayOfChecks(): CheckResult[] {
  return Array.from({ length: 24 }, (_unused, index) =>
    index === 5
      ? checkResult({ path: '/ping', method: 'GET', checkedAt: START + index * 3600, ...failedOutcome() })
      : checkResult({ path: '/ping', method: 'GET', checkedAt: START + index * 3600, latencyMs: 185 }),
  );
}

describe('report/aggregate', () => {
  it('computes uptime and average latency over a day of checks', () => {
    const report = aggregateWindow({ startedAt: START, checks: dayOfChecks(), incidents: [] }, NOW);

    expect(report).toMatchObject({
      windowStart: START,
      windowEnd: NOW,
      uptimePct: 95.83,
      totalChecks: 24,
      successfulChecks: 23,
      failedChecks: 1,
      avgLatencyMs: 185,
      p95LatencyMs: 185,
      rating: 'good',
    });
    expect(report.endpoints).toEqual([
      { path: '/ping', totalChecks: 24, successfulChecks: 23, uptimePct: 95.83, avgLatencyMs: 185 },
    ]);
  });

  it('reports full uptime for an empty window', () => {
    expect(aggregateWindow({ startedAt: START, checks: [], incidents: [] }, NOW)).toEqual({
      windowStart: START,
      windowEnd: NOW,
      uptimePct: 100,
      totalChecks: 0,
      successfulChecks: 0,
      failedChecks: 0,
      avgLatencyMs: null,
      p95LatencyMs: null,
      rating: 'excellent',
      endpoints: [],
      incidents: [],
    });
  });

  it('averages successful latencies only and breaks uptime down per endpoint', () => {
    const report = aggregateWindow(
      {
        startedAt: START,
        checks: [
          checkResult({ path: '/ping', method: 'GET', latencyMs: 100 }),
          checkResult({ path: '/ping', method: 'HEAD', latencyMs: 300 }),
          checkResult({ path: '/api/health', method: 'GET', ...failedOutcome() }),
          checkResult({ path: '/api/health', method: 'HEAD', latencyMs: 201 }),
        ],
        incidents: [],
      },
      NOW,
    );

    expect(report.uptimePct).toBe(75);
    expect(report.avgLatencyMs).toBe(200);
    expect(report.p95LatencyMs).toBe(300);
    expect(report.rating).toBe('poor');
    expect(report.endpoints).toEqual([
      { path: '/ping', totalChecks: 2, successfulChecks: 2, uptimePct: 100, avgLatencyMs: 200 },
      { path: '/api/health', totalChecks: 2, successfulChecks: 1, uptimePct: 50, avgLatencyMs: 201 },
    ]);
  });

  it('lists open incidents and incidents closed inside the window', () => {
    const report = aggregateWindow(
      {
        startedAt: START,
        checks: [],
        incidents: [
          { id: 1, path: '/old', startedAt: START - 7200, endedAt: START - 3600, reasons: [] },
          { id: 2, path: '/ping', startedAt: START + 600, endedAt: START + 900, reasons: ['x'] },
          { id: 3, path: '/api/health', startedAt: NOW - 120, endedAt: null, reasons: [] },
        ],
      },
      NOW,
    );

    expect(report.incidents).toEqual([
      {
        path: '/ping',
        startedAt: START + 600,
        endedAt: START + 900,
        durationSec: 300,
        open: false,
        reasons: ['x'],
      },
      {
        path: '/api/health',
        startedAt: NOW - 120,
        endedAt: null,
        durationSec: 120,
        open: true,
        reasons: [],
      },
    ]);
  });

  it('maps uptime to a rating', () => {
    expect(ratingForUptime(100)).toBe('excellent');
    expect(ratingForUptime(99)).toBe('excellent');
    expect(ratingForUptime(98.99)).toBe('good');
    expect(ratingForUptime(95)).toBe('good');
    expect(ratingForUptime(90)).toBe('fair');
    expect(ratingForUptime(89.99)).toBe('poor');
  });
});
