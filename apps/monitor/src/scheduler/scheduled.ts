import type { MonitorDeps } from '../deps';
import { runCheckCycle, type CycleResult } from './cycle';
import { runDailyReport, type ReportRunResult } from './report';

export type TickResult = {
  cycle: CycleResult;
  report: ReportRunResult;
};

export async function runScheduledTick(deps: MonitorDeps, now: number): Promise<TickResult> {
  const cycle = await runCheckCycle(deps, now);
  const report = await runDailyReport(deps, now);
  return { cycle, report };
}
