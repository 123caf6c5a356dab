import { avg, percentileFromValues, roundPct } from '../analytics/latency';
import type { CheckResult, DailyWindow, Incident } from '../monitor/types';

export type UptimeRating = 'excellent' | 'good' | 'fair' | 'poor';

export type EndpointUptime = {
  path: string;
  totalChecks: number;
  successfulChecks: number;
  uptimePct: number;
  avgLatencyMs: number | null;
};

export type ReportIncident = {
  path: string;
  startedAt: number;
  endedAt: number | null;
  durationSec: number;
  open: boolean;
  reasons: string[];
};

export type UptimeReport = {
  windowStart: number;
  windowEnd: number;
  uptimePct: number;
  totalChecks: number;
  successfulChecks: number;
  failedChecks: number;
  avgLatencyMs: number | null;
  p95LatencyMs: number | null;
  rating: UptimeRating;
  endpoints: EndpointUptime[];
  incidents: ReportIncident[];
};

export function ratingForUptime(uptimePct: number): UptimeRating {
  if (uptimePct >= 99) return 'excellent';
  if (uptimePct >= 95) return 'good';
  if (uptimePct >= 90) return 'fair';
  return 'poor';
}

function uptimeOf(checks: CheckResult[]): { total: number; ok: number; pct: number } {
  const total = checks.length;
  const ok = checks.filter((c) => c.success).length;
  // An empty window has seen no failures.
  const pct = total === 0 ? 100 : roundPct((ok / total) * 100);
  return { total, ok, pct };
}

function successLatencies(checks: CheckResult[]): number[] {
  const out: number[] = [];
  for (const c of checks) {
    if (c.success && c.latencyMs !== null) out.push(c.latencyMs);
  }
  return out;
}

function toReportIncident(incident: Incident, now: number): ReportIncident {
  const end = incident.endedAt ?? now;
  return {
    path: incident.path,
    startedAt: incident.startedAt,
    endedAt: incident.endedAt,
    durationSec: Math.max(0, end - incident.startedAt),
    open: incident.endedAt === null,
    reasons: incident.reasons,
  };
}

export function aggregateWindow(window: DailyWindow, now: number): UptimeReport {
  const overall = uptimeOf(window.checks);
  const latencies = successLatencies(window.checks);

  const byPath = new Map<string, CheckResult[]>();
  for (const c of window.checks) {
    const list = byPath.get(c.path);
    if (list) list.push(c);
    else byPath.set(c.path, [c]);
  }

  const endpoints: EndpointUptime[] = [...byPath.entries()].map(([path, checks]) => {
    const u = uptimeOf(checks);
    return {
      path,
      totalChecks: u.total,
      successfulChecks: u.ok,
      uptimePct: u.pct,
      avgLatencyMs: avg(successLatencies(checks)),
    };
  });

  const incidents = window.incidents
    .filter((i) => i.endedAt === null || i.endedAt >= window.startedAt)
    .map((i) => toReportIncident(i, now));

  return {
    windowStart: window.startedAt,
    windowEnd: now,
    uptimePct: overall.pct,
    totalChecks: overall.total,
    successfulChecks: overall.ok,
    failedChecks: overall.total - overall.ok,
    avgLatencyMs: avg(latencies),
    p95LatencyMs: percentileFromValues(latencies, 0.95),
    rating: ratingForUptime(overall.pct),
    endpoints,
    incidents,
  };
}
