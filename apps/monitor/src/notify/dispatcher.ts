import { clipMessage, toErrorMessage } from '../errors';
import type { AffectedEndpoint, NotificationSeverity, TransitionEvent } from '../monitor/types';
import type { UptimeReport } from '../report/aggregate';
import { formatReportHtml, formatReportText, reportSubject } from '../report/format';
import type { MonitorConfig, NotificationConfig, NotificationEventType } from '../schemas/config';
import type { StateStore } from '../store/state-store';
import { saveUndelivered } from './backup';
import { channelAccepts, type ChannelMessage, type ChannelSender } from './channel';
import { alertEventKey, claimNotificationDelivery, finalizeNotificationDelivery } from './dedupe';
import { createResendClient, sendEmail, type EmailClient } from './email';
import { alertText, testAlertText, type AlertPayload } from './message';
import { sendWebhook } from './webhook';

export type DeliveryStatus = 'sent' | 'failed' | 'skipped' | 'duplicate';

export type DeliveryOutcome = {
  status: DeliveryStatus;
  channel: NotificationConfig['type'] | null;
  httpStatus: number | null;
  error: string | null;
};

export type NotifierConfig = Pick<MonitorConfig, 'serviceName' | 'baseUrl' | 'notification'>;

export type NotifierDeps = {
  store: StateStore;
  config: NotifierConfig;
  // Replaces the Resend client built from the configured API key variable.
  emailClient?: EmailClient;
  env?: NodeJS.ProcessEnv;
};

const MAX_ERROR_SUMMARY = 500;

function skipped(channel: DeliveryOutcome['channel']): DeliveryOutcome {
  return { status: 'skipped', channel, httpStatus: null, error: null };
}

function summarizeReasons(endpoints: AffectedEndpoint[]): string | null {
  const unique = [...new Set(endpoints.flatMap((e) => e.reasons.map((r) => `${e.path} ${r}`)))];
  if (unique.length === 0) return null;
  return clipMessage(unique.join('; '), MAX_ERROR_SUMMARY);
}

export function buildAlertPayload(
  event: TransitionEvent,
  config: Pick<MonitorConfig, 'serviceName' | 'baseUrl'>,
): AlertPayload {
  const severity: NotificationSeverity =
    event.notify ?? (event.to === 'down' ? 'down' : 'recovered');
  const startedAt = severity === 'down' ? event.at : (event.outageStartedAt ?? event.at);

  return {
    severity,
    service_name: config.serviceName,
    base_url: config.baseUrl,
    affected_endpoints: event.affectedEndpoints,
    started_at: startedAt,
    duration_sec: severity === 'recovered' ? Math.max(0, event.at - startedAt) : null,
    error_summary: severity === 'down' ? summarizeReasons(event.affectedEndpoints) : null,
    at: event.at,
  };
}

function resolveSender(notification: NotificationConfig, deps: NotifierDeps): ChannelSender {
  switch (notification.type) {
    case 'webhook':
      return (message) => sendWebhook(notification, message);
    case 'email': {
      let client = deps.emailClient;
      if (!client) {
        const apiKey = (deps.env ?? process.env)[notification.api_key_env];
        if (!apiKey) {
          const error = `${notification.api_key_env} is not set`;
          return async () => ({ ok: false, httpStatus: null, error });
        }
        client = createResendClient(apiKey);
      }
      const resolved = client;
      return (message) => sendEmail(notification, message, resolved);
    }
  }
}

async function deliver(
  notification: NotificationConfig,
  message: ChannelMessage,
  deps: NotifierDeps,
): Promise<DeliveryOutcome> {
  try {
    const r = await resolveSender(notification, deps)(message);
    return {
      status: r.ok ? 'sent' : 'failed',
      channel: notification.type,
      httpStatus: r.httpStatus,
      error: r.error,
    };
  } catch (err) {
    return {
      status: 'failed',
      channel: notification.type,
      httpStatus: null,
      error: toErrorMessage(err),
    };
  }
}

// Keeps the rendered text of a failed delivery. When the store is unavailable too, the text
// goes to the error log instead.
function keepUndelivered(
  deps: NotifierDeps,
  message: ChannelMessage,
  outcome: DeliveryOutcome,
  now: number,
): void {
  const channel = outcome.channel ?? 'none';
  try {
    const id = deps.store.run('save undelivered message', (db) =>
      saveUndelivered(db, {
        eventKey: message.eventKey,
        channel,
        subject: message.subject,
        body: message.text,
        error: outcome.error,
        createdAt: now,
      }),
    );
    console.warn(`notify: kept undelivered message id=${id} event_key=${message.eventKey}`);
  } catch (err) {
    console.error(
      `notify: cannot keep undelivered message event_key=${message.eventKey}: ${toErrorMessage(err)}\n${message.subject}\n${message.text}`,
    );
  }
}

function eventTypeFor(severity: NotificationSeverity): NotificationEventType {
  return severity === 'down' ? 'service.down' : 'service.recovered';
}

// Best-effort: failures are reported in the outcome and logged, never thrown.
export async function dispatchAlert(
  event: TransitionEvent,
  deps: NotifierDeps,
  now: number = event.at,
): Promise<DeliveryOutcome> {
  if (event.notify === null) return skipped(null);

  const eventType = eventTypeFor(event.notify);
  const notification = deps.config.notification;
  if (!notification) {
    console.warn(`notify: no channel configured event=${eventType} at=${event.at}`);
    return skipped(null);
  }
  if (!channelAccepts(notification, eventType)) {
    console.log(`notify: skipped event=${eventType} channel=${notification.type}`);
    return skipped(notification.type);
  }

  const eventKey = alertEventKey(event.notify, event.at);
  const channel = notification.type;
  const payload = buildAlertPayload(event, deps.config);
  const message: ChannelMessage = {
    eventType,
    eventKey,
    subject: `[${payload.severity.toUpperCase()}] ${deps.config.serviceName}`,
    text: alertText(payload),
    html: null,
    payload,
  };

  let claimed: boolean;
  try {
    claimed = deps.store.run('claim notification delivery', (db) =>
      claimNotificationDelivery(db, eventKey, channel, now),
    );
  } catch (err) {
    const error = toErrorMessage(err);
    console.error(`notify: delivery failed code=ALERT_DELIVERY_ERROR channel=${channel} ${error}`);
    const failed: DeliveryOutcome = { status: 'failed', channel, httpStatus: null, error };
    keepUndelivered(deps, message, failed, now);
    return failed;
  }
  if (!claimed) {
    console.log(`notify: duplicate event_key=${eventKey} channel=${channel}`);
    return { status: 'duplicate', channel, httpStatus: null, error: null };
  }

  const outcome = await deliver(notification, message, deps);

  try {
    deps.store.run('finalize notification delivery', (db) =>
      finalizeNotificationDelivery(db, eventKey, channel, {
        status: outcome.status === 'sent' ? 'success' : 'failed',
        httpStatus: outcome.httpStatus,
        error: outcome.error,
      }),
    );
  } catch (err) {
    console.error(`notify: cannot record delivery event_key=${eventKey}: ${toErrorMessage(err)}`);
  }

  if (outcome.status === 'sent') {
    console.log(`notify: sent event=${eventType} channel=${channel}`);
  } else {
    const error = outcome.error ?? 'unknown';
    console.error(
      `notify: delivery failed code=ALERT_DELIVERY_ERROR event=${eventType} channel=${channel} error=${error}`,
    );
    keepUndelivered(deps, message, outcome, now);
  }
  return outcome;
}

// Sends a `test.ping` through the configured channel. No dedupe and no `enabled_events` filter.
export async function sendTestAlert(deps: NotifierDeps, now: number): Promise<DeliveryOutcome> {
  const notification = deps.config.notification;
  if (!notification) {
    console.warn('notify: no channel configured event=test.ping');
    return skipped(null);
  }

  const identity = { service_name: deps.config.serviceName, base_url: deps.config.baseUrl };
  const outcome = await deliver(
    notification,
    {
      eventType: 'test.ping',
      eventKey: `test:ping:${now}`,
      subject: `[TEST] ${deps.config.serviceName}`,
      text: testAlertText(identity),
      html: null,
      payload: { ...identity, at: now },
    },
    deps,
  );

  if (outcome.status === 'sent') {
    console.log(`notify: sent event=test.ping channel=${notification.type}`);
  } else {
    console.error(
      `notify: test alert failed channel=${notification.type} error=${outcome.error ?? 'unknown'}`,
    );
  }
  return outcome;
}

export function reportPayload(
  report: UptimeReport,
  config: NotifierConfig,
): Record<string, unknown> {
  return {
    service_name: config.serviceName,
    base_url: config.baseUrl,
    report: {
      window_start: report.windowStart,
      window_end: report.windowEnd,
      uptime_pct: report.uptimePct,
      total_checks: report.totalChecks,
      successful_checks: report.successfulChecks,
      failed_checks: report.failedChecks,
      avg_latency_ms: report.avgLatencyMs,
      p95_latency_ms: report.p95LatencyMs,
      rating: report.rating,
      endpoints: report.endpoints.map((e) => ({
        path: e.path,
        uptime_pct: e.uptimePct,
        total_checks: e.totalChecks,
        avg_latency_ms: e.avgLatencyMs,
      })),
      incidents: report.incidents.map((i) => ({
        path: i.path,
        started_at: i.startedAt,
        ended_at: i.endedAt,
        duration_sec: i.durationSec,
        reasons: i.reasons,
      })),
    },
  };
}

// Reports are guarded by the report lease and schedule, so no delivery row is claimed here.
export async function deliverReport(
  report: UptimeReport,
  deps: NotifierDeps,
): Promise<DeliveryOutcome> {
  const notification = deps.config.notification;
  if (!notification || !channelAccepts(notification, 'report.daily')) {
    return skipped(notification?.type ?? null);
  }

  const ctx = { serviceName: deps.config.serviceName, baseUrl: deps.config.baseUrl };
  const message: ChannelMessage = {
    eventType: 'report.daily',
    eventKey: `report:daily:${report.windowEnd}`,
    subject: reportSubject(report, ctx),
    text: formatReportText(report, ctx),
    html: formatReportHtml(report, ctx),
    payload: reportPayload(report, deps.config),
  };
  const outcome = await deliver(notification, message, deps);
  if (outcome.status === 'failed') keepUndelivered(deps, message, outcome, report.windowEnd);
  return outcome;
}
