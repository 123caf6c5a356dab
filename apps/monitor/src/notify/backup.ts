import { asc, undeliveredMessages, type Db } from '@keepwatch/db';

export type UndeliveredMessage = {
  eventKey: string;
  channel: string;
  subject: string;
  body: string;
  error: string | null;
  createdAt: number;
};

// An alert or report that could not be delivered keeps its rendered text here.
export function saveUndelivered(db: Db, message: UndeliveredMessage): number {
  const r = db.insert(undeliveredMessages).values(message).run();
  return Number(r.lastInsertRowid);
}

export function listUndelivered(db: Db): Array<UndeliveredMessage & { id: number }> {
  return db.select().from(undeliveredMessages).orderBy(asc(undeliveredMessages.id)).all();
}
