import { and, eq, notificationDeliveries, type Db } from '@keepwatch/db';

export type NotificationDeliveryOutcome = {
  status: 'success' | 'failed';
  httpStatus: number | null;
  error: string | null;
};

export function alertEventKey(notify: 'down' | 'recovered', at: number): string {
  return `service:${notify}:${at}`;
}

// UNIQUE(event_key, channel) is the idempotency key: a placeholder row claims the event
// before anything is sent.
export function claimNotificationDelivery(
  db: Db,
  eventKey: string,
  channel: string,
  createdAt: number,
): boolean {
  const r = db
    .insert(notificationDeliveries)
    .values({ eventKey, channel, status: 'failed', httpStatus: null, error: 'pending', createdAt })
    .onConflictDoNothing()
    .run();
  return r.changes > 0;
}

export function finalizeNotificationDelivery(
  db: Db,
  eventKey: string,
  channel: string,
  outcome: NotificationDeliveryOutcome,
): void {
  db.update(notificationDeliveries)
    .set({ status: outcome.status, httpStatus: outcome.httpStatus, error: outcome.error })
    .where(
      and(eq(notificationDeliveries.eventKey, eventKey), eq(notificationDeliveries.channel, channel)),
    )
    .run();
}
