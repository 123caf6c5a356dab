import { integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

export const HTTP_METHODS = ['GET', 'HEAD'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const ENDPOINT_STATUSES = ['up', 'down'] as const;
export type EndpointStatus = (typeof ENDPOINT_STATUSES)[number];

export const OVERALL_STATUSES = ['healthy', 'degraded', 'down'] as const;
export type OverallStatus = (typeof OVERALL_STATUSES)[number];

export const PROBE_ERROR_KINDS = ['timeout', 'connection_error', 'http_error', 'unknown'] as const;
export type ProbeErrorKind = (typeof PROBE_ERROR_KINDS)[number];

export const endpointState = sqliteTable('endpoint_state', {
  path: text('path').primaryKey(),
  status: text('status', { enum: ENDPOINT_STATUSES }).notNull(),
  consecutiveFailures: integer('consecutive_failures').notNull().default(0),
  lastTransitionAt: integer('last_transition_at').notNull(),
  lastCheckedAt: integer('last_checked_at'),
  lastError: text('last_error'),
});

export const checkResults = sqliteTable('check_results', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  path: text('path').notNull(),
  method: text('method', { enum: HTTP_METHODS }).notNull(),
  checkedAt: integer('checked_at').notNull(),
  success: integer('success', { mode: 'boolean' }).notNull(),
  latencyMs: integer('latency_ms'),
  httpStatus: integer('http_status'),
  errorKind: text('error_kind', { enum: PROBE_ERROR_KINDS }),
  error: text('error'),
});

export const incidents = sqliteTable(
  'incidents',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    path: text('path').notNull(),
    startedAt: integer('started_at').notNull(),
    endedAt: integer('ended_at'),
    reasonsJson: text('reasons_json').notNull().default('[]'),
  },
  (t) => ({
    openPath: uniqueIndex('idx_incidents_open_path').on(t.path).where(sql`ended_at IS NULL`),
  }),
);

export const meta = sqliteTable('meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

export const locks = sqliteTable('locks', {
  name: text('name').primaryKey(),
  expiresAt: integer('expires_at').notNull(),
});

export const notificationDeliveries = sqliteTable(
  'notification_deliveries',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    eventKey: text('event_key').notNull(),
    channel: text('channel').notNull(),
    status: text('status', { enum: ['success', 'failed'] }).notNull(),
    httpStatus: integer('http_status'),
    error: text('error'),
    createdAt: integer('created_at').notNull(),
  },
  (t) => ({
    eventChannel: uniqueIndex('notification_deliveries_event_key_channel_unique').on(
      t.eventKey,
      t.channel,
    ),
  }),
);

export const undeliveredMessages = sqliteTable('undelivered_messages', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  eventKey: text('event_key').notNull(),
  channel: text('channel').notNull(),
  subject: text('subject').notNull(),
  body: text('body').notNull(),
  error: text('error'),
  createdAt: integer('created_at').notNull(),
});

export type EndpointStateRow = typeof endpointState.$inferSelect;
export type CheckResultRow = typeof checkResults.$inferSelect;
export type IncidentRow = typeof incidents.$inferSelect;
