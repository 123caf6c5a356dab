import {
  asc,
  inArray,
  lt,
  notificationDeliveries,
  undeliveredMessages,
  type Db,
} from '@keepwatch/db';

import type { StateStore } from '../store/state-store';

export const DELIVERY_RETENTION_DAYS = 7;
export const UNDELIVERED_RETENTION_DAYS = 30;

// Keep delete batches bounded so one statement never holds the write lock for long.
const DELETE_BATCH_SIZE = 5_000;
const MAX_BATCHES = 20;

export type RetentionResult = {
  deliveries: number;
  undelivered: number;
};

function deleteInBatches(deleteBatch: (limit: number) => number): number {
  let total = 0;
  for (let i = 0; i < MAX_BATCHES; i++) {
    const deleted = deleteBatch(DELETE_BATCH_SIZE);
    total += deleted;
    if (deleted < DELETE_BATCH_SIZE) break;
  }
  return total;
}

function pruneDeliveries(db: Db, cutoff: number): number {
  const t = notificationDeliveries;
  return deleteInBatches((limit) => {
    const ids = db
      .select({ id: t.id })
      .from(t)
      .where(lt(t.createdAt, cutoff))
      .orderBy(asc(t.id))
      .limit(limit);
    return db.delete(t).where(inArray(t.id, ids)).run().changes;
  });
}

function pruneUndelivered(db: Db, cutoff: number): number {
  const t = undeliveredMessages;
  return deleteInBatches((limit) => {
    const ids = db
      .select({ id: t.id })
      .from(t)
      .where(lt(t.createdAt, cutoff))
      .orderBy(asc(t.id))
      .limit(limit);
    return db.delete(t).where(inArray(t.id, ids)).run().changes;
  });
}

// Drops delivery records past their retention. Runs after a daily report reset.
export function runRetention(store: StateStore, now: number): RetentionResult {
  const result = store.run('prune delivery history', (db) => ({
    deliveries: pruneDeliveries(db, now - DELIVERY_RETENTION_DAYS * 86_400),
    undelivered: pruneUndelivered(db, now - UNDELIVERED_RETENTION_DAYS * 86_400),
  }));

  console.log(
    `retention: deleted deliveries=${result.deliveries} undelivered=${result.undelivered}`,
  );
  return result;
}
