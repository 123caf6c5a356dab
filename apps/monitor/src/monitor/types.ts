import type { EndpointStatus, HttpMethod, OverallStatus, ProbeErrorKind } from '@keepwatch/db';

export type ProbeOutcome = {
  success: boolean;
  latencyMs: number | null;
  httpStatus: number | null;
  errorKind: ProbeErrorKind | null;
  error: string | null;
};

export type CheckResult = ProbeOutcome & {
  path: string;
  method: HttpMethod;
  checkedAt: number;
};

export type EndpointConfig = {
  path: string;
  methods: HttpMethod[];
};

export type EndpointState = {
  path: string;
  status: EndpointStatus;
  consecutiveFailures: number;
  lastTransitionAt: number;
  lastCheckedAt: number | null;
  lastError: string | null;
};

// The previous cycle's computed aggregate, persisted between invocations.
export type AggregateState = {
  status: OverallStatus;
  changedAt: number;
  // Set while a DOWN alert has gone out and no recovery has been announced yet.
  outageStartedAt: number | null;
};

export type AggregateStatus = {
  overall: OverallStatus;
  healthyFraction: number;
};

export type NotificationSeverity = 'down' | 'recovered';

export type AffectedEndpoint = {
  path: string;
  reasons: string[];
};

export type TransitionEvent = {
  scope: 'aggregate';
  from: OverallStatus;
  to: OverallStatus;
  at: number;
  affectedEndpoints: AffectedEndpoint[];
  outageStartedAt: number | null;
  notify: NotificationSeverity | null;
};

export type EndpointTransition = {
  path: string;
  from: EndpointStatus;
  to: EndpointStatus;
  at: number;
  reasons: string[];
};

export type Incident = {
  id: number;
  path: string;
  startedAt: number;
  endedAt: number | null;
  reasons: string[];
};

export type DailyWindow = {
  startedAt: number;
  checks: CheckResult[];
  incidents: Incident[];
};
