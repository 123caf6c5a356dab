import type { OverallStatus } from '@keepwatch/db';

import { clipMessage } from '../errors';
import { computeNextState, type CycleOutcome, type IncidentAction } from './state-machine';
import type {
  AffectedEndpoint,
  AggregateState,
  AggregateStatus,
  CheckResult,
  EndpointConfig,
  EndpointState,
  EndpointTransition,
  NotificationSeverity,
  TransitionEvent,
} from './types';

export type HealthUpdateInput = {
  endpoints: EndpointConfig[];
  results: CheckResult[];
  states: EndpointState[];
  aggregate: AggregateState | null;
  checkedAt: number;
  failuresToDown?: number;
};

export type IncidentChange = {
  path: string;
  action: Exclude<IncidentAction, 'none'>;
  at: number;
  reasons: string[];
};

export type HealthUpdate = {
  states: EndpointState[];
  removedPaths: string[];
  aggregate: AggregateState;
  status: AggregateStatus;
  endpointTransitions: EndpointTransition[];
  incidentChanges: IncidentChange[];
  event: TransitionEvent | null;
};

export function computeAggregateStatus(
  states: ReadonlyArray<Pick<EndpointState, 'status'>>,
): AggregateStatus {
  const total = states.length;
  if (total === 0) return { overall: 'healthy', healthyFraction: 1 };

  const up = states.filter((s) => s.status === 'up').length;
  const overall: OverallStatus = up === 0 ? 'down' : up === total ? 'healthy' : 'degraded';
  return { overall, healthyFraction: up / total };
}

// Certificate and DNS errors can list hundreds of names.
export const MAX_FAILURE_REASON_LENGTH = 500;

export function failureReason(result: CheckResult): string {
  const detail = result.error ?? result.errorKind ?? 'failed';
  return clipMessage(`${result.method} ${detail}`, MAX_FAILURE_REASON_LENGTH);
}

function groupByPath(results: CheckResult[]): Map<string, CheckResult[]> {
  const grouped = new Map<string, CheckResult[]>();
  for (const r of results) {
    const list = grouped.get(r.path);
    if (list) list.push(r);
    else grouped.set(r.path, [r]);
  }
  return grouped;
}

function cycleOutcome(results: CheckResult[]): CycleOutcome {
  return results.some((r) => r.success) ? 'up' : 'down';
}

function notificationFor(
  prev: AggregateState,
  to: OverallStatus,
): { notify: NotificationSeverity | null; outageStartedAt: number | null } {
  if (to === 'down' && prev.outageStartedAt === null) {
    return { notify: 'down', outageStartedAt: null };
  }
  if (to === 'healthy' && prev.outageStartedAt !== null) {
    return { notify: 'recovered', outageStartedAt: prev.outageStartedAt };
  }
  return { notify: null, outageStartedAt: prev.outageStartedAt };
}

export function updateHealthState(input: HealthUpdateInput): HealthUpdate {
  const { endpoints, checkedAt } = input;
  const byPath = groupByPath(input.results);
  const prevByPath = new Map(input.states.map((s) => [s.path, s]));
  const configured = new Set(endpoints.map((e) => e.path));

  const states: EndpointState[] = [];
  const endpointTransitions: EndpointTransition[] = [];
  const incidentChanges: IncidentChange[] = [];
  const reasonsByPath = new Map<string, string[]>();

  for (const endpoint of endpoints) {
    const prev = prevByPath.get(endpoint.path) ?? null;
    const results = byPath.get(endpoint.path) ?? [];

    if (results.length === 0) {
      states.push(
        prev ?? {
          path: endpoint.path,
          status: 'up',
          consecutiveFailures: 0,
          lastTransitionAt: checkedAt,
          lastCheckedAt: null,
          lastError: null,
        },
      );
      continue;
    }

    const reasons = results.filter((r) => !r.success).map(failureReason);
    reasonsByPath.set(endpoint.path, reasons);

    const { next, incidentAction } = computeNextState(prev, cycleOutcome(results), checkedAt, {
      failuresToDown: input.failuresToDown,
    });

    states.push({
      path: endpoint.path,
      status: next.status,
      consecutiveFailures: next.consecutiveFailures,
      lastTransitionAt: next.lastTransitionAt,
      lastCheckedAt: checkedAt,
      lastError: reasons.length > 0 ? reasons.join('; ') : null,
    });

    if (next.changed) {
      endpointTransitions.push({
        path: endpoint.path,
        from: prev?.status ?? 'up',
        to: next.status,
        at: checkedAt,
        reasons,
      });
    }
    if (incidentAction !== 'none') {
      incidentChanges.push({ path: endpoint.path, action: incidentAction, at: checkedAt, reasons });
    }
  }

  const removedPaths = input.states.map((s) => s.path).filter((p) => !configured.has(p));

  const prevAggregate: AggregateState = input.aggregate ?? {
    status: 'healthy',
    changedAt: checkedAt,
    outageStartedAt: null,
  };
  const status = computeAggregateStatus(states);

  if (status.overall === prevAggregate.status) {
    return {
      states,
      removedPaths,
      aggregate: prevAggregate,
      status,
      endpointTransitions,
      incidentChanges,
      event: null,
    };
  }

  const { notify, outageStartedAt } = notificationFor(prevAggregate, status.overall);

  let affectedEndpoints: AffectedEndpoint[];
  if (status.overall === 'healthy') {
    affectedEndpoints = endpointTransitions
      .filter((t) => t.to === 'up')
      .map((t) => ({ path: t.path, reasons: [] }));
  } else {
    affectedEndpoints = states
      .filter((s) => s.status === 'down')
      .map((s) => ({
        path: s.path,
        reasons: reasonsByPath.get(s.path) ?? (s.lastError ? [s.lastError] : []),
      }));
  }

  const aggregate: AggregateState = {
    status: status.overall,
    changedAt: checkedAt,
    outageStartedAt:
      notify === 'down' ? checkedAt : notify === 'recovered' ? null : prevAggregate.outageStartedAt,
  };

  return {
    states,
    removedPaths,
    aggregate,
    status,
    endpointTransitions,
    incidentChanges,
    event: {
      scope: 'aggregate',
      from: prevAggregate.status,
      to: status.overall,
      at: checkedAt,
      affectedEndpoints,
      outageStartedAt: notify === 'down' ? checkedAt : outageStartedAt,
      notify,
    },
  };
}
