import { Hono } from 'hono';

import type { MonitorDeps } from '../deps';
import { computeAggregateStatus } from '../monitor/tracker';

export function statusRoutes(deps: Pick<MonitorDeps, 'store' | 'config'>) {
  const app = new Hono();

  app.get('/', (c) => {
    const snapshot = deps.store.transaction((tx) => {
      const meta = tx.readMeta();
      const states = tx.listEndpointStates();
      const checks = tx.listChecks();
      return { meta, states, checks };
    });

    const { meta, states, checks } = snapshot;
    const current = computeAggregateStatus(states);
    const successful = checks.filter((r) => r.success).length;

    return c.json({
      service_name: deps.config.serviceName,
      base_url: deps.config.baseUrl,
      aggregate: {
        status: meta.aggregate?.status ?? null,
        healthy_fraction: current.healthyFraction,
        changed_at: meta.aggregate?.changedAt ?? null,
        outage_started_at: meta.aggregate?.outageStartedAt ?? null,
      },
      endpoints: states.map((s) => ({
        path: s.path,
        status: s.status,
        consecutive_failures: s.consecutiveFailures,
        last_transition_at: s.lastTransitionAt,
        last_checked_at: s.lastCheckedAt,
        last_error: s.lastError,
      })),
      window: {
        started_at: meta.windowStartedAt,
        total_checks: checks.length,
        successful_checks: successful,
      },
      last_cycle_at: meta.lastCycleAt,
      last_report_at: meta.lastReportAt,
    });
  });

  return app;
}
