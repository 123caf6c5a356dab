import type { EndpointStatus } from '@keepwatch/db';

import type { EndpointState } from './types';

export type CycleOutcome = 'up' | 'down';

export type IncidentAction = 'open' | 'close' | 'none';

export type NextState = {
  status: EndpointStatus;
  lastTransitionAt: number;
  consecutiveFailures: number;
  changed: boolean;
};

export type StateMachineConfig = {
  failuresToDown: number;
};

export const DEFAULT_FAILURES_TO_DOWN = 1;

const MAX_STREAK = 1000;

function capStreak(n: number): number {
  return Math.min(Math.max(n, 0), MAX_STREAK);
}

export function normalizeThreshold(raw: number | undefined, fallback: number): number {
  if (typeof raw !== 'number' || !Number.isFinite(raw)) return fallback;
  const n = Math.trunc(raw);
  return n >= 1 ? n : fallback;
}

export function computeNextState(
  prev: Pick<EndpointState, 'status' | 'consecutiveFailures' | 'lastTransitionAt'> | null,
  outcome: CycleOutcome,
  checkedAt: number,
  config?: Partial<StateMachineConfig>,
): { next: NextState; incidentAction: IncidentAction } {
  const failuresToDown = normalizeThreshold(config?.failuresToDown, DEFAULT_FAILURES_TO_DOWN);

  // A path seen for the first time starts UP.
  const prevStatus: EndpointStatus = prev?.status ?? 'up';
  const prevFailures = prev?.consecutiveFailures ?? 0;
  const prevTransitionAt = prev?.lastTransitionAt ?? checkedAt;

  let nextStatus: EndpointStatus = prevStatus;
  let failures = 0;

  if (outcome === 'up') {
    nextStatus = 'up';
  } else {
    failures = capStreak(prevFailures + 1);
    if (prevStatus === 'down' || failures >= failuresToDown) {
      nextStatus = 'down';
    }
  }

  const changed = nextStatus !== prevStatus;

  const incidentAction: IncidentAction =
    prevStatus === 'up' && nextStatus === 'down'
      ? 'open'
      : prevStatus === 'down' && nextStatus === 'up'
        ? 'close'
        : 'none';

  return {
    next: {
      status: nextStatus,
      lastTransitionAt: changed ? checkedAt : prevTransitionAt,
      consecutiveFailures: failures,
      changed,
    },
    incidentAction,
  };
}
