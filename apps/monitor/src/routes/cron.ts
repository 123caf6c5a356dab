import { Hono } from 'hono';
import { z } from 'zod';

import { unixNow, type MonitorDeps } from '../deps';
import { requireBearerToken } from '../middleware/auth';
import { sendTestAlert } from '../notify/dispatcher';
import type { CycleResult } from '../scheduler/cycle';
import { runDailyReport, type ReportRunResult } from '../scheduler/report';
import { runScheduledTick } from '../scheduler/scheduled';

export type CronRouteDeps = MonitorDeps & {
  cronToken: () => string | undefined;
  now?: () => number;
};

const reportQuerySchema = z.object({
  force: z.enum(['true', 'false']).optional(),
});

function cycleBody(cycle: CycleResult) {
  return {
    status: cycle.status,
    checked_at: cycle.checkedAt,
    aggregate: cycle.aggregate
      ? { overall: cycle.aggregate.overall, healthy_fraction: cycle.aggregate.healthyFraction }
      : null,
    event: cycle.event
      ? {
          from: cycle.event.from,
          to: cycle.event.to,
          notify: cycle.event.notify,
          affected_endpoints: cycle.event.affectedEndpoints.map((e) => e.path),
        }
      : null,
    delivery: cycle.delivery,
  };
}

function reportBody(run: ReportRunResult) {
  return {
    status: run.status,
    reset: run.reset,
    uptime_pct: run.report?.uptimePct ?? null,
    total_checks: run.report?.totalChecks ?? null,
    delivery: run.delivery,
  };
}

export function cronRoutes(deps: CronRouteDeps) {
  const app = new Hono();
  const now = deps.now ?? unixNow;

  app.use('*', requireBearerToken(deps.cronToken));

  app.post('/check', async (c) => {
    const tick = await runScheduledTick(deps, now());
    return c.json({ cycle: cycleBody(tick.cycle), report: reportBody(tick.report) });
  });

  app.post('/report', async (c) => {
    const query = reportQuerySchema.parse(c.req.query());
    const run = await runDailyReport(deps, now(), { force: query.force === 'true' });
    return c.json({ report: reportBody(run) });
  });

  app.post('/test-alert', async (c) => {
    const delivery = await sendTestAlert(deps, now());
    return c.json({ delivery });
  });

  return app;
}
