import { notificationDeliveries } from '@keepwatch/db';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { MonitorDeps } from '../src/deps';
import { listUndelivered } from '../src/notify/backup';
import { claimNotificationDelivery } from '../src/notify/dedupe';
import { acquireLease } from '../src/scheduler/lock';
import { runDailyReport } from '../src/scheduler/report';
import { buildConfig, buildDeps, checkResult, failedOutcome, silenceConsole } from './helpers/builders';

const MIDNIGHT = 1_760_054_400;
const WINDOW_START = MIDNIGHT - 86_400;

const WEBHOOK = {
  type: 'webhook' as const,
  url: 'https://hooks.example.test/keepwatch',
  method: 'POST' as const,
};

function seedDay(deps: MonitorDeps): void {
  deps.store.transaction((tx) => {
    tx.writeMeta({ windowStartedAt: WINDOW_START });
    tx.appendChecks(
      Array.from({ length: 24 }, (_unused, index) =>
        checkResult({
          path: '/ping',
          method: 'GET',
          checkedAt: WINDOW_START + index * 3600,
          ...(index === 5 ? failedOutcome() : { latencyMs: 185 }),
        }),
      ),
    );
    tx.openIncident('/ping', WINDOW_START + 5 * 3600, ['GET Timeout after 10000ms']);
    tx.closeIncident('/ping', WINDOW_START + 6 * 3600);
    tx.openIncident('/api/health', MIDNIGHT - 600, ['HEAD Unexpected HTTP status: 503']);
  });
}

describe('scheduler/report', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it('reports the day at the scheduled time and resets the window once', async () => {
    const deps = buildDeps();
    seedDay(deps);

    const first = await runDailyReport(deps, MIDNIGHT + 10);
    const second = await runDailyReport(deps, MIDNIGHT + 30);

    expect(first.status).toBe('logged');
    expect(first.reset).toBe(true);
    expect(first.report).toMatchObject({
      windowStart: WINDOW_START,
      windowEnd: MIDNIGHT + 10,
      uptimePct: 95.83,
      totalChecks: 24,
      avgLatencyMs: 185,
      rating: 'good',
    });
    expect(first.report?.incidents.map((i) => [i.path, i.open])).toEqual([
      ['/ping', false],
      ['/api/health', true],
    ]);
    expect(second.status).toBe('skipped');

    expect(deps.store.transaction((tx) => tx.listChecks())).toEqual([]);
    expect(deps.store.transaction((tx) => tx.listIncidents()).map((i) => i.path)).toEqual([
      '/api/health',
    ]);
    expect(deps.store.transaction((tx) => tx.readMeta())).toMatchObject({
      windowStartedAt: MIDNIGHT + 10,
      lastReportAt: MIDNIGHT + 10,
    });
  });

  it('prunes old delivery records after the reset', async () => {
    const deps = buildDeps();
    seedDay(deps);
    deps.store.run('seed', (db) => {
      claimNotificationDelivery(db, 'service:down:old', 'webhook', WINDOW_START - 10 * 86_400);
      claimNotificationDelivery(db, 'service:down:recent', 'webhook', WINDOW_START);
    });

    const r = await runDailyReport(deps, MIDNIGHT + 10);

    expect(r.reset).toBe(true);
    expect(
      deps.store.db
        .select({ eventKey: notificationDeliveries.eventKey })
        .from(notificationDeliveries)
        .all(),
    ).toEqual([{ eventKey: 'service:down:recent' }]);
  });

  it('skips outside the schedule', async () => {
    const deps = buildDeps();
    seedDay(deps);

    const r = await runDailyReport(deps, MIDNIGHT + 600);

    expect(r).toEqual({ status: 'skipped', report: null, delivery: null, reset: false });
    expect(deps.store.transaction((tx) => tx.listChecks())).toHaveLength(24);
  });

  it('keeps the window when delivery fails and retries on the next trigger', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('down', { status: 502 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const deps = buildDeps({ config: buildConfig({ notification: WEBHOOK }) });
    seedDay(deps);

    const failed = await runDailyReport(deps, MIDNIGHT + 10);

    expect(failed.status).toBe('failed');
    expect(failed.reset).toBe(false);
    expect(failed.delivery).toEqual({
      status: 'failed',
      channel: 'webhook',
      httpStatus: 502,
      error: 'HTTP 502',
    });
    expect(deps.store.transaction((tx) => tx.listChecks())).toHaveLength(24);
    expect(deps.store.transaction((tx) => tx.readMeta()).lastReportAt).toBeNull();
    expect(listUndelivered(deps.store.db).map((m) => [m.eventKey, m.subject, m.error])).toEqual([
      [`report:daily:${MIDNIGHT + 10}`, 'Daily uptime report: Test API 95.83%', 'HTTP 502'],
    ]);

    const retried = await runDailyReport(deps, MIDNIGHT + 70);

    expect(retried.status).toBe('sent');
    expect(retried.reset).toBe(true);
    expect(retried.report?.totalChecks).toBe(24);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('sends a forced report without touching the window', async () => {
    const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const deps = buildDeps({ config: buildConfig({ notification: WEBHOOK }) });
    seedDay(deps);

    const r = await runDailyReport(deps, MIDNIGHT + 3 * 3600, { force: true });

    expect(r.status).toBe('sent');
    expect(r.reset).toBe(false);
    expect(deps.store.transaction((tx) => tx.listChecks())).toHaveLength(24);
    expect(deps.store.transaction((tx) => tx.readMeta()).lastReportAt).toBeNull();
  });

  it('skips report delivery when the channel does not accept reports', async () => {
    const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const deps = buildDeps({
      config: buildConfig({ notification: { ...WEBHOOK, enabled_events: ['service.down'] } }),
    });
    seedDay(deps);

    const r = await runDailyReport(deps, MIDNIGHT + 10);

    expect(r.status).toBe('logged');
    expect(r.reset).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('does not run while another invocation holds the report lease', async () => {
    const deps = buildDeps();
    seedDay(deps);
    deps.store.run('test lease', (db) => acquireLease(db, 'report', MIDNIGHT, 120));

    const r = await runDailyReport(deps, MIDNIGHT + 10);

    expect(r.status).toBe('locked');
    expect(deps.store.transaction((tx) => tx.listChecks())).toHaveLength(24);
  });

  it('does not reset twice when another invocation committed during delivery', async () => {
    const deps = buildDeps({ config: buildConfig({ notification: WEBHOOK }) });
    seedDay(deps);
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        deps.store.transaction((tx) => tx.writeMeta({ lastReportAt: MIDNIGHT + 5 }));
        return new Response('ok', { status: 200 });
      }),
    );

    const r = await runDailyReport(deps, MIDNIGHT + 10);

    expect(r.status).toBe('duplicate');
    expect(r.reset).toBe(false);
    expect(deps.store.transaction((tx) => tx.listChecks())).toHaveLength(24);
  });
});
