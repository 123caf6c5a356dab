import type { MonitorDeps } from '../deps';
import { probeAll } from '../monitor/http';
import { updateHealthState, type HealthUpdate } from '../monitor/tracker';
import type { AggregateStatus, CheckResult, TransitionEvent } from '../monitor/types';
import { dispatchAlert, type DeliveryOutcome } from '../notify/dispatcher';

export type CycleResult = {
  status: 'committed' | 'stale';
  checkedAt: number;
  aggregate: AggregateStatus | null;
  event: TransitionEvent | null;
  delivery: DeliveryOutcome | null;
  results: CheckResult[];
};

function logCommitted(update: HealthUpdate, results: CheckResult[], checkedAt: number): void {
  const up = update.states.filter((s) => s.status === 'up').length;
  const line = `cycle: committed checked_at=${checkedAt} aggregate=${update.status.overall} up=${up}/${update.states.length} checks=${results.length}`;
  if (update.status.overall === 'healthy') console.log(line);
  else console.warn(line);

  for (const t of update.endpointTransitions) {
    console.log(`cycle: endpoint ${t.path} ${t.from} -> ${t.to}`);
  }
  if (update.removedPaths.length > 0) {
    console.log(`cycle: dropped unconfigured endpoints ${update.removedPaths.join(', ')}`);
  }
}

// One check cycle: probe, then commit the new state in a single transaction, then alert.
export async function runCheckCycle(deps: MonitorDeps, now: number): Promise<CycleResult> {
  const { config, store } = deps;

  const results = await (deps.probe ?? probeAll)(
    {
      baseUrl: config.baseUrl,
      endpoints: config.endpoints,
      timeoutMs: config.timeoutMs,
      headers: config.headers,
    },
    now,
  );

  const update = store.transaction((tx): HealthUpdate | null => {
    const meta = tx.readMeta();
    // An overlapping invocation already committed a newer cycle.
    if (meta.lastCycleAt !== null && now <= meta.lastCycleAt) return null;

    const next = updateHealthState({
      endpoints: config.endpoints,
      results,
      states: tx.listEndpointStates(),
      aggregate: meta.aggregate,
      checkedAt: now,
      failuresToDown: config.downThresholdCycles,
    });

    tx.putEndpointStates(next.states);
    for (const path of next.removedPaths) {
      tx.closeIncident(path, now);
    }
    tx.deleteEndpointStates(next.removedPaths);

    for (const change of next.incidentChanges) {
      if (change.action === 'open') tx.openIncident(change.path, change.at, change.reasons);
      else tx.closeIncident(change.path, change.at);
    }

    tx.appendChecks(results);
    tx.writeMeta({
      lastCycleAt: now,
      aggregate: next.aggregate,
      ...(meta.windowStartedAt === null ? { windowStartedAt: now } : {}),
    });
    return next;
  });

  if (!update) {
    console.warn(`cycle: stale checked_at=${now}; a newer cycle is already recorded`);
    return { status: 'stale', checkedAt: now, aggregate: null, event: null, delivery: null, results };
  }

  logCommitted(update, results, now);

  const event = update.event;
  let delivery: DeliveryOutcome | null = null;
  if (event) {
    console.log(
      `cycle: aggregate ${event.from} -> ${event.to} notify=${event.notify ?? 'none'} affected=${event.affectedEndpoints.length}`,
    );
    if (event.notify !== null) {
      delivery = await dispatchAlert(event, deps, now);
    }
  }

  return { status: 'committed', checkedAt: now, aggregate: update.status, event, delivery, results };
}
