import { and, eq, locks, lte, type Db } from '@keepwatch/db';

// Takes the named lease when it is free or expired. Returns false while another holder's
// lease is still live.
export function acquireLease(db: Db, name: string, now: number, leaseSeconds: number): boolean {
  const expiresAt = now + leaseSeconds;

  const r = db
    .insert(locks)
    .values({ name, expiresAt })
    .onConflictDoUpdate({
      target: locks.name,
      set: { expiresAt },
      setWhere: lte(locks.expiresAt, now),
    })
    .run();

  return r.changes > 0;
}

export function releaseLease(db: Db, name: string, expiresAt: number): void {
  db.delete(locks)
    .where(and(eq(locks.name, name), eq(locks.expiresAt, expiresAt)))
    .run();
}
