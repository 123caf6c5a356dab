import { notificationDeliveries } from '@keepwatch/db';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { TransitionEvent } from '../src/monitor/types';
import { listUndelivered } from '../src/notify/backup';
import {
  buildAlertPayload,
  deliverReport,
  dispatchAlert,
  sendTestAlert,
} from '../src/notify/dispatcher';
import type { EmailSendRequest } from '../src/notify/email';
import type { UptimeReport } from '../src/report/aggregate';
import type { NotificationConfig } from '../src/schemas/config';
import { T0, buildConfig, createStore, silenceConsole } from './helpers/builders';

const TIMEOUT = 'Timeout after 10000ms';

const DOWN: TransitionEvent = {
  scope: 'aggregate',
  from: 'healthy',
  to: 'down',
  at: T0,
  affectedEndpoints: [
    { path: '/ping', reasons: [`GET ${TIMEOUT}`, `HEAD ${TIMEOUT}`] },
    { path: '/api/health', reasons: [`GET ${TIMEOUT}`] },
  ],
  outageStartedAt: T0,
  notify: 'down',
};

const RECOVERED: TransitionEvent = {
  scope: 'aggregate',
  from: 'down',
  to: 'healthy',
  at: T0 + 300,
  affectedEndpoints: [{ path: '/ping', reasons: [] }],
  outageStartedAt: T0,
  notify: 'recovered',
};

const WEBHOOK: NotificationConfig = {
  type: 'webhook',
  url: 'https://hooks.example.test/keepwatch',
  method: 'POST',
};

const EMAIL: NotificationConfig = {
  type: 'email',
  from: 'alerts@example.test',
  to: ['ops@example.test'],
  api_key_env: 'RESEND_API_KEY',
  subject_prefix: '[keepwatch]',
};

const SUMMARY = `/ping GET ${TIMEOUT}; /ping HEAD ${TIMEOUT}; /api/health GET ${TIMEOUT}`;

function notifierDeps(notification: NotificationConfig | null) {
  return { store: createStore(), config: buildConfig({ notification }) };
}

function fakeEmailClient(result: { id: string | null; error: string | null }) {
  return { send: vi.fn(async (_request: EmailSendRequest) => result) };
}

describe('notify/dispatcher', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  describe('buildAlertPayload', () => {
    it('summarizes the failure reasons of a down event', () => {
      expect(buildAlertPayload(DOWN, buildConfig())).toEqual({
        severity: 'down',
        service_name: 'Test API',
        base_url: 'https://api.example.test',
        affected_endpoints: DOWN.affectedEndpoints,
        started_at: T0,
        duration_sec: null,
        error_summary: SUMMARY,
        at: T0,
      });
    });

    it('measures the outage of a recovery', () => {
      expect(buildAlertPayload(RECOVERED, buildConfig())).toMatchObject({
        severity: 'recovered',
        started_at: T0,
        duration_sec: 300,
        error_summary: null,
        at: T0 + 300,
      });
    });

    it('caps the error summary', () => {
      const long = 'x'.repeat(600);
      const payload = buildAlertPayload(
        { ...DOWN, affectedEndpoints: [{ path: '/ping', reasons: [long] }] },
        buildConfig(),
      );

      expect(payload.error_summary).toHaveLength(500);
      expect(payload.error_summary?.endsWith('...')).toBe(true);
    });
  });

  describe('dispatchAlert', () => {
    it('skips events that do not notify', async () => {
      const r = await dispatchAlert({ ...DOWN, notify: null }, notifierDeps(WEBHOOK));

      expect(r).toEqual({ status: 'skipped', channel: null, httpStatus: null, error: null });
    });

    it('skips when no channel is configured', async () => {
      const r = await dispatchAlert(DOWN, notifierDeps(null));

      expect(r).toEqual({ status: 'skipped', channel: null, httpStatus: null, error: null });
    });

    it('skips events the channel does not accept', async () => {
      const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);

      const r = await dispatchAlert(
        DOWN,
        notifierDeps({ ...WEBHOOK, enabled_events: ['service.recovered'] }),
      );

      expect(r.status).toBe('skipped');
      expect(r.channel).toBe('webhook');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('delivers a down alert once per event', async () => {
      const fetchMock = vi.fn(
        async (_input: string | URL | Request, _init?: RequestInit) =>
          new Response('ok', { status: 200 }),
      );
      vi.stubGlobal('fetch', fetchMock);
      const deps = notifierDeps(WEBHOOK);

      const first = await dispatchAlert(DOWN, deps);
      const second = await dispatchAlert(DOWN, deps);

      expect(first).toEqual({ status: 'sent', channel: 'webhook', httpStatus: 200, error: null });
      expect(second).toEqual({
        status: 'duplicate',
        channel: 'webhook',
        httpStatus: null,
        error: null,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);

      const body = fetchMock.mock.calls[0]?.[1]?.body;
      expect(typeof body === 'string' ? JSON.parse(body) : null).toEqual({
        event: 'service.down',
        event_key: `service:down:${T0}`,
        message: [
          'Service DOWN: Test API (https://api.example.test)',
          'Affected: /ping, /api/health',
          `Error: ${SUMMARY}`,
        ].join('\n'),
        severity: 'down',
        service_name: 'Test API',
        base_url: 'https://api.example.test',
        affected_endpoints: DOWN.affectedEndpoints,
        started_at: T0,
        duration_sec: null,
        error_summary: SUMMARY,
        at: T0,
      });

      const rows = deps.store.db.select().from(notificationDeliveries).all();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        eventKey: `service:down:${T0}`,
        channel: 'webhook',
        status: 'success',
        httpStatus: 200,
        error: null,
      });
    });

    it('records a failed delivery', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response('bad gateway', { status: 502 })),
      );
      const deps = notifierDeps(WEBHOOK);

      const r = await dispatchAlert(RECOVERED, deps);

      expect(r).toEqual({ status: 'failed', channel: 'webhook', httpStatus: 502, error: 'HTTP 502' });
      expect(deps.store.db.select().from(notificationDeliveries).all()[0]).toMatchObject({
        eventKey: `service:recovered:${T0 + 300}`,
        status: 'failed',
        error: 'HTTP 502',
      });
    });

    it('keeps the text of a failed alert', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response('bad gateway', { status: 502 })),
      );
      const deps = notifierDeps(WEBHOOK);

      await dispatchAlert(RECOVERED, deps);

      expect(listUndelivered(deps.store.db)).toEqual([
        {
          id: 1,
          eventKey: `service:recovered:${T0 + 300}`,
          channel: 'webhook',
          subject: '[RECOVERED] Test API',
          body: 'Service RECOVERED: Test API (https://api.example.test)\nDowntime: 5m',
          error: 'HTTP 502',
          createdAt: T0 + 300,
        },
      ]);
    });

    it('does not keep delivered alerts', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response('ok', { status: 200 })),
      );
      const deps = notifierDeps(WEBHOOK);

      await dispatchAlert(DOWN, deps);

      expect(listUndelivered(deps.store.db)).toEqual([]);
    });

    it('logs the alert text when the store is unavailable', async () => {
      const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);
      const consoleSpy = silenceConsole();
      const deps = notifierDeps(WEBHOOK);
      deps.store.close();

      const r = await dispatchAlert(DOWN, deps);

      expect(r.status).toBe('failed');
      expect(r.channel).toBe('webhook');
      expect(fetchMock).not.toHaveBeenCalled();
      const logged = consoleSpy.error.mock.calls
        .map((call) => String(call[0]))
        .find((line) => line.startsWith('notify: cannot keep undelivered message'));
      expect(
        logged?.startsWith(`notify: cannot keep undelivered message event_key=service:down:${T0}: `),
      ).toBe(true);
      expect(
        logged?.endsWith(
          [
            '[DOWN] Test API',
            'Service DOWN: Test API (https://api.example.test)',
            'Affected: /ping, /api/health',
            `Error: ${SUMMARY}`,
          ].join('\n'),
        ),
      ).toBe(true);
    });

    it('sends email through the configured client', async () => {
      const client = fakeEmailClient({ id: 'email-1', error: null });

      const r = await dispatchAlert(RECOVERED, { ...notifierDeps(EMAIL), emailClient: client });

      expect(r).toEqual({ status: 'sent', channel: 'email', httpStatus: null, error: null });
      expect(client.send).toHaveBeenCalledWith({
        from: 'alerts@example.test',
        to: ['ops@example.test'],
        subject: '[keepwatch] [RECOVERED] Test API',
        text: 'Service RECOVERED: Test API (https://api.example.test)\nDowntime: 5m',
      });
    });

    it('fails email delivery when the API key is missing', async () => {
      const r = await dispatchAlert(DOWN, { ...notifierDeps(EMAIL), env: {} });

      expect(r).toEqual({
        status: 'failed',
        channel: 'email',
        httpStatus: null,
        error: 'RESEND_API_KEY is not set',
      });
    });

    it('surfaces errors returned by the email provider', async () => {
      const client = fakeEmailClient({ id: null, error: 'invalid sender' });

      const r = await dispatchAlert(DOWN, { ...notifierDeps(EMAIL), emailClient: client });

      expect(r).toEqual({
        status: 'failed',
        channel: 'email',
        httpStatus: null,
        error: 'invalid sender',
      });
    });
  });

  describe('sendTestAlert', () => {
    it('posts a test ping to the webhook', async () => {
      const fetchMock = vi.fn(
        async (_input: string | URL | Request, _init?: RequestInit) =>
          new Response('ok', { status: 200 }),
      );
      vi.stubGlobal('fetch', fetchMock);
      const deps = notifierDeps(WEBHOOK);

      const r = await sendTestAlert(deps, T0);

      expect(r).toEqual({ status: 'sent', channel: 'webhook', httpStatus: 200, error: null });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://hooks.example.test/keepwatch');
      const body = fetchMock.mock.calls[0]?.[1]?.body;
      expect(typeof body === 'string' ? JSON.parse(body) : null).toEqual({
        event: 'test.ping',
        event_key: `test:ping:${T0}`,
        message:
          'Test alert for Test API (https://api.example.test)\nNotifications from keepwatch reach this channel.',
        service_name: 'Test API',
        base_url: 'https://api.example.test',
        at: T0,
      });
      expect(deps.store.db.select().from(notificationDeliveries).all()).toEqual([]);
    });

    it('ignores enabled_events and sends again on repeat', async () => {
      const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);
      const deps = notifierDeps({ ...WEBHOOK, enabled_events: ['service.down'] });

      await sendTestAlert(deps, T0);
      await sendTestAlert(deps, T0);

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('skips without a channel', async () => {
      await expect(sendTestAlert(notifierDeps(null), T0)).resolves.toEqual({
        status: 'skipped',
        channel: null,
        httpStatus: null,
        error: null,
      });
    });

    it('reports a failed test ping without keeping it', async () => {
      const client = fakeEmailClient({ id: null, error: 'invalid sender' });
      const deps = { ...notifierDeps(EMAIL), emailClient: client };

      const r = await sendTestAlert(deps, T0);

      expect(r).toEqual({
        status: 'failed',
        channel: 'email',
        httpStatus: null,
        error: 'invalid sender',
      });
      expect(client.send).toHaveBeenCalledWith({
        from: 'alerts@example.test',
        to: ['ops@example.test'],
        subject: '[keepwatch] [TEST] Test API',
        text: 'Test alert for Test API (https://api.example.test)\nNotifications from keepwatch reach this channel.',
      });
      expect(listUndelivered(deps.store.db)).toEqual([]);
    });
  });

  describe('deliverReport', () => {
    const REPORT: UptimeReport = {
      windowStart: T0,
      windowEnd: T0 + 86_400,
      uptimePct: 100,
      totalChecks: 2,
      successfulChecks: 2,
      failedChecks: 0,
      avgLatencyMs: 120,
      p95LatencyMs: 120,
      rating: 'excellent',
      endpoints: [],
      incidents: [],
    };

    it('skips without a channel', async () => {
      await expect(deliverReport(REPORT, notifierDeps(null))).resolves.toEqual({
        status: 'skipped',
        channel: null,
        httpStatus: null,
        error: null,
      });
    });

    it('keeps a report that could not be delivered', async () => {
      const client = fakeEmailClient({ id: null, error: 'rate limited' });
      const deps = { ...notifierDeps(EMAIL), emailClient: client };

      const r = await deliverReport(REPORT, deps);

      expect(r.status).toBe('failed');
      const kept = listUndelivered(deps.store.db);
      expect(kept).toHaveLength(1);
      expect(kept[0]).toMatchObject({
        eventKey: `report:daily:${T0 + 86_400}`,
        channel: 'email',
        subject: 'Daily uptime report: Test API 100.00%',
        error: 'rate limited',
        createdAt: T0 + 86_400,
      });
      expect(kept[0]?.body.startsWith('Daily uptime report for Test API')).toBe(true);
    });

    it('emails the report with an HTML body', async () => {
      const client = fakeEmailClient({ id: 'email-2', error: null });

      const r = await deliverReport(REPORT, { ...notifierDeps(EMAIL), emailClient: client });

      expect(r.status).toBe('sent');
      const request = client.send.mock.calls[0]?.[0];
      expect(request?.subject).toBe('[keepwatch] Daily uptime report: Test API 100.00%');
      expect(request?.html?.startsWith('<h2>Daily uptime report for Test API</h2>')).toBe(true);
    });
  });
});
