// SQLite-backed persistence for everything that outlives a single cycle.
//
// - `meta (key, value)` holds scalar state as strings; values are parsed back into typed values
//   and fall back to "absent" when missing or malformed.
// - Every cycle reads and writes through one `BEGIN IMMEDIATE` transaction, so concurrent
//   invocations serialize on the write lock.

import {
  MAX_INCIDENT_REASONS,
  MAX_INCIDENT_REASON_LENGTH,
  OVERALL_STATUSES,
  and,
  asc,
  checkResults,
  endpointState,
  eq,
  incidentReasonsJsonSchema,
  incidents,
  inArray,
  isNotNull,
  isNull,
  lte,
  meta,
  openDatabase,
  parseDbJson,
  serializeDbJson,
  type CheckResultRow,
  type Db,
  type DbTransaction,
  type EndpointStateRow,
  type IncidentRow,
  type SqliteDatabase,
} from '@keepwatch/db';

import { MonitorError, clipMessage, isMonitorError, toErrorMessage } from '../errors';
import type {
  AggregateState,
  CheckResult,
  DailyWindow,
  EndpointState,
  Incident,
} from '../monitor/types';

export const META_KEYS = {
  lastCycleAt: 'last_cycle_at',
  aggregateStatus: 'aggregate_status',
  aggregateChangedAt: 'aggregate_changed_at',
  outageStartedAt: 'outage_started_at',
  windowStartedAt: 'window_started_at',
  lastReportAt: 'last_report_at',
} as const;

type MetaKey = (typeof META_KEYS)[keyof typeof META_KEYS];

export type StoreMeta = {
  lastCycleAt: number | null;
  aggregate: AggregateState | null;
  windowStartedAt: number | null;
  lastReportAt: number | null;
};

export type MetaPatch = Partial<StoreMeta>;

export type StoredCheck = CheckResult & { id: number };

export type StoredWindow = DailyWindow & {
  checks: StoredCheck[];
  // Highest check id included in the window; null when there are no checks.
  maxCheckId: number | null;
};

function parseTimestampMeta(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const n = Number.parseInt(raw, 10);
  return Number.isSafeInteger(n) ? n : null;
}

function parseEnumMeta<T extends string>(raw: string | undefined, allowed: readonly T[]): T | null {
  if (raw === undefined) return null;
  return allowed.find((v) => v === raw) ?? null;
}

function toEndpointState(row: EndpointStateRow): EndpointState {
  return {
    path: row.path,
    status: row.status,
    consecutiveFailures: row.consecutiveFailures,
    lastTransitionAt: row.lastTransitionAt,
    lastCheckedAt: row.lastCheckedAt,
    lastError: row.lastError,
  };
}

function toStoredCheck(row: CheckResultRow): StoredCheck {
  return {
    id: row.id,
    path: row.path,
    method: row.method,
    checkedAt: row.checkedAt,
    success: row.success,
    latencyMs: row.latencyMs,
    httpStatus: row.httpStatus,
    errorKind: row.errorKind,
    error: row.error,
  };
}

function toIncident(row: IncidentRow): Incident {
  return {
    id: row.id,
    path: row.path,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
    reasons: parseDbJson(incidentReasonsJsonSchema, row.reasonsJson, { field: 'reasons_json' }),
  };
}

function storeError(action: string, err: unknown): MonitorError {
  if (isMonitorError(err)) return err;
  return new MonitorError('STATE_STORE_IO_ERROR', `${action}: ${toErrorMessage(err)}`, {
    cause: err,
  });
}

export class StateTx {
  constructor(private readonly tx: DbTransaction) {}

  readMeta(): StoreMeta {
    const rows = this.tx.select().from(meta).all();
    const map = new Map(rows.map((r) => [r.key, r.value]));

    const status = parseEnumMeta(map.get(META_KEYS.aggregateStatus), OVERALL_STATUSES);
    const aggregate: AggregateState | null =
      status === null
        ? null
        : {
            status,
            changedAt: parseTimestampMeta(map.get(META_KEYS.aggregateChangedAt)) ?? 0,
            outageStartedAt: parseTimestampMeta(map.get(META_KEYS.outageStartedAt)),
          };

    return {
      lastCycleAt: parseTimestampMeta(map.get(META_KEYS.lastCycleAt)),
      aggregate,
      windowStartedAt: parseTimestampMeta(map.get(META_KEYS.windowStartedAt)),
      lastReportAt: parseTimestampMeta(map.get(META_KEYS.lastReportAt)),
    };
  }

  writeMeta(patch: MetaPatch): void {
    if (patch.lastCycleAt !== undefined) this.setMeta(META_KEYS.lastCycleAt, patch.lastCycleAt);
    if (patch.windowStartedAt !== undefined) {
      this.setMeta(META_KEYS.windowStartedAt, patch.windowStartedAt);
    }
    if (patch.lastReportAt !== undefined) this.setMeta(META_KEYS.lastReportAt, patch.lastReportAt);
    if (patch.aggregate !== undefined) {
      const a = patch.aggregate;
      this.setMeta(META_KEYS.aggregateStatus, a?.status ?? null);
      this.setMeta(META_KEYS.aggregateChangedAt, a?.changedAt ?? null);
      this.setMeta(META_KEYS.outageStartedAt, a?.outageStartedAt ?? null);
    }
  }

  private setMeta(key: MetaKey, value: string | number | null): void {
    if (value === null) {
      this.tx.delete(meta).where(eq(meta.key, key)).run();
      return;
    }
    const v = String(value);
    this.tx
      .insert(meta)
      .values({ key, value: v })
      .onConflictDoUpdate({ target: meta.key, set: { value: v } })
      .run();
  }

  listEndpointStates(): EndpointState[] {
    return this.tx
      .select()
      .from(endpointState)
      .orderBy(asc(endpointState.path))
      .all()
      .map(toEndpointState);
  }

  putEndpointStates(states: EndpointState[]): void {
    for (const s of states) {
      const row = {
        status: s.status,
        consecutiveFailures: s.consecutiveFailures,
        lastTransitionAt: s.lastTransitionAt,
        lastCheckedAt: s.lastCheckedAt,
        lastError: s.lastError,
      };
      this.tx
        .insert(endpointState)
        .values({ path: s.path, ...row })
        .onConflictDoUpdate({ target: endpointState.path, set: row })
        .run();
    }
  }

  deleteEndpointStates(paths: string[]): number {
    if (paths.length === 0) return 0;
    return this.tx.delete(endpointState).where(inArray(endpointState.path, paths)).run().changes;
  }

  appendChecks(results: CheckResult[]): void {
    if (results.length === 0) return;
    this.tx
      .insert(checkResults)
      .values(
        results.map((r) => ({
          path: r.path,
          method: r.method,
          checkedAt: r.checkedAt,
          success: r.success,
          latencyMs: r.latencyMs,
          httpStatus: r.httpStatus,
          errorKind: r.errorKind,
          error: r.error,
        })),
      )
      .run();
  }

  listChecks(): StoredCheck[] {
    return this.tx
      .select()
      .from(checkResults)
      .orderBy(asc(checkResults.id))
      .all()
      .map(toStoredCheck);
  }

  deleteChecksUpTo(id: number): number {
    return this.tx.delete(checkResults).where(lte(checkResults.id, id)).run().changes;
  }

  listIncidents(opts: { openOnly?: boolean } = {}): Incident[] {
    const q = this.tx.select().from(incidents);
    const rows = opts.openOnly
      ? q.where(isNull(incidents.endedAt)).orderBy(asc(incidents.id)).all()
      : q.orderBy(asc(incidents.id)).all();
    return rows.map(toIncident);
  }

  openIncident(path: string, startedAt: number, reasons: string[]): number {
    const r = this.tx
      .insert(incidents)
      .values({
        path,
        startedAt,
        reasonsJson: serializeDbJson(
          incidentReasonsJsonSchema,
          reasons
            .slice(0, MAX_INCIDENT_REASONS)
            .map((r) => clipMessage(r, MAX_INCIDENT_REASON_LENGTH)),
          { field: 'reasons_json' },
        ),
      })
      .run();
    return Number(r.lastInsertRowid);
  }

  closeIncident(path: string, endedAt: number): boolean {
    const r = this.tx
      .update(incidents)
      .set({ endedAt })
      .where(and(eq(incidents.path, path), isNull(incidents.endedAt)))
      .run();
    return r.changes > 0;
  }

  // Only closed incidents are removed; an open incident carries over into the next window.
  deleteClosedIncidents(ids: number[]): number {
    if (ids.length === 0) return 0;
    return this.tx
      .delete(incidents)
      .where(and(inArray(incidents.id, ids), isNotNull(incidents.endedAt)))
      .run().changes;
  }

  readWindow(now: number): StoredWindow {
    const checks = this.listChecks();
    const windowStartedAt = this.readMeta().windowStartedAt;
    const last = checks[checks.length - 1];

    return {
      startedAt: windowStartedAt ?? checks[0]?.checkedAt ?? now,
      checks,
      incidents: this.listIncidents(),
      maxCheckId: last?.id ?? null,
    };
  }
}

export class StateStore {
  private constructor(
    readonly sqlite: SqliteDatabase,
    readonly db: Db,
  ) {}

  static open(filename: string): StateStore {
    try {
      const { sqlite, db } = openDatabase({ filename });
      return new StateStore(sqlite, db);
    } catch (err) {
      throw storeError(`open ${filename}`, err);
    }
  }

  // Runs `fn` in a write transaction. Any failure rolls the transaction back.
  transaction<T>(fn: (tx: StateTx) => T): T {
    try {
      return this.db.transaction((tx) => fn(new StateTx(tx)), { behavior: 'immediate' });
    } catch (err) {
      throw storeError('transaction failed', err);
    }
  }

  // Single statements outside a cycle transaction (leases, delivery bookkeeping).
  run<T>(action: string, fn: (db: Db) => T): T {
    try {
      return fn(this.db);
    } catch (err) {
      throw storeError(action, err);
    }
  }

  close(): void {
    if (this.sqlite.open) this.sqlite.close();
  }
}
