import type { MonitorDeps } from '../deps';
import { toErrorMessage } from '../errors';
import { deliverReport, type DeliveryOutcome } from '../notify/dispatcher';
import { aggregateWindow, type UptimeReport } from '../report/aggregate';
import { formatReportText } from '../report/format';
import { isReportDue } from '../report/schedule';
import type { StoredWindow } from '../store/state-store';
import { acquireLease, releaseLease } from './lock';
import { runRetention } from './retention';

export type ReportRunStatus = 'sent' | 'logged' | 'skipped' | 'locked' | 'failed' | 'duplicate';

export type ReportRunResult = {
  status: ReportRunStatus;
  report: UptimeReport | null;
  delivery: DeliveryOutcome | null;
  // True when the window was cleared and `last_report_at` advanced.
  reset: boolean;
};

export type ReportRunOptions = {
  // Bypasses the schedule guard and leaves the window untouched.
  force?: boolean;
};

const REPORT_LEASE = 'report';
const REPORT_LEASE_SECONDS = 120;

function result(
  status: ReportRunStatus,
  report: UptimeReport | null = null,
  delivery: DeliveryOutcome | null = null,
  reset = false,
): ReportRunResult {
  return { status, report, delivery, reset };
}

type Snapshot = { window: StoredWindow; lastReportAt: number | null };

export async function runDailyReport(
  deps: MonitorDeps,
  now: number,
  opts: ReportRunOptions = {},
): Promise<ReportRunResult> {
  const { config, store } = deps;
  const force = opts.force ?? false;

  const leaseExpiresAt = now + REPORT_LEASE_SECONDS;
  const acquired = store.run('acquire report lease', (db) =>
    acquireLease(db, REPORT_LEASE, now, REPORT_LEASE_SECONDS),
  );
  if (!acquired) {
    console.log('report: skipped; another invocation holds the report lease');
    return result('locked');
  }

  try {
    const snapshot = store.transaction((tx): Snapshot | null => {
      const meta = tx.readMeta();
      const due =
        force ||
        isReportDue(now, config.reportSchedule, config.reportGraceMinutes, meta.lastReportAt);
      if (!due) return null;
      return { window: tx.readWindow(now), lastReportAt: meta.lastReportAt };
    });
    if (!snapshot) return result('skipped');

    let report: UptimeReport;
    try {
      report = aggregateWindow(snapshot.window, now);
    } catch (err) {
      console.error(
        `report: code=REPORT_GENERATION_ERROR aggregation failed: ${toErrorMessage(err)}`,
      );
      return result('failed');
    }

    const ctx = { serviceName: config.serviceName, baseUrl: config.baseUrl };
    const delivery = await deliverReport(report, deps);
    if (delivery.status === 'failed') {
      const channel = delivery.channel ?? 'none';
      console.error(
        `report: code=REPORT_GENERATION_ERROR delivery failed channel=${channel} error=${delivery.error ?? 'unknown'}; window kept`,
      );
      return result('failed', report, delivery);
    }

    const status: ReportRunStatus = delivery.status === 'sent' ? 'sent' : 'logged';
    if (status === 'logged') {
      console.log(`report: no channel accepts report.daily\n${formatReportText(report, ctx)}`);
    } else {
      const channel = delivery.channel ?? 'none';
      console.log(
        `report: sent channel=${channel} uptime=${report.uptimePct} checks=${report.totalChecks}`,
      );
    }

    if (force) return result(status, report, delivery);

    const committed = store.transaction((tx) => {
      // Another invocation committed a report since the snapshot was read.
      if (tx.readMeta().lastReportAt !== snapshot.lastReportAt) return false;

      if (snapshot.window.maxCheckId !== null) tx.deleteChecksUpTo(snapshot.window.maxCheckId);
      tx.deleteClosedIncidents(
        snapshot.window.incidents.filter((i) => i.endedAt !== null).map((i) => i.id),
      );
      tx.writeMeta({ windowStartedAt: now, lastReportAt: now });
      return true;
    });

    if (!committed) {
      console.warn('report: window already reset by another invocation');
      return result('duplicate', report, delivery);
    }

    try {
      runRetention(store, now);
    } catch (err) {
      console.error(`retention: failed: ${toErrorMessage(err)}`);
    }
    return result(status, report, delivery, true);
  } finally {
    try {
      store.run('release report lease', (db) => releaseLease(db, REPORT_LEASE, leaseExpiresAt));
    } catch (err) {
      console.error(`report: cannot release lease: ${toErrorMessage(err)}`);
    }
  }
}
