import { v4 as uuid } from 'uuid';
import { getDb, now } from './client.js';
import {
  isEventType,
  type AnyOutboxEvent,
  type ConsumerClass,
  type EventPayloads,
  type EventType,
  type OutboxEvent,
} from './types.js';

interface EventRow {
  id: string;
  type: string;
  payload: string;
  created_at: string;
  broadcast_consumed: number;
  dispatch_consumed: number;
}

// Column names are never taken from input
const CONSUMER_COLUMNS: Record<ConsumerClass, string> = {
  broadcast: 'broadcast_consumed',
  dispatch: 'dispatch_consumed',
};

function toEvent(row: EventRow): AnyOutboxEvent | null {
  if (!isEventType(row.type)) return null;
  return {
    id: row.id,
    type: row.type,
    payload: JSON.parse(row.payload),
    created_at: row.created_at,
    broadcast_consumed: row.broadcast_consumed === 1,
    dispatch_consumed: row.dispatch_consumed === 1,
  };
}

/**
 * Appends an event row. Callers run this inside the same transaction as the
 * mutation it describes, so the pair commits or rolls back together.
 */
export function emitEvent<T extends EventType>(type: T, payload: EventPayloads[T]): OutboxEvent<T> {
  const db = getDb();
  const id = uuid();
  const createdAt = now();

  db.prepare(`
    INSERT INTO events (id, type, payload, created_at)
    VALUES (?, ?, ?, ?)
  `).run(id, type, JSON.stringify(payload), createdAt);

  return {
    id,
    type,
    payload,
    created_at: createdAt,
    broadcast_consumed: false,
    dispatch_consumed: false,
  };
}

export function getEvent(id: string): AnyOutboxEvent | null {
  const db = getDb();
  const row = db.prepare<[string], EventRow>('SELECT * FROM events WHERE id = ?').get(id);
  return row ? toEvent(row) : null;
}

/**
 * Events this consumer has not yet marked, oldest first. Rows written in the
 * same millisecond keep their insertion order.
 */
export function pollUnconsumed(consumer: ConsumerClass, limit = 500): AnyOutboxEvent[] {
  const db = getDb();
  const column = CONSUMER_COLUMNS[consumer];
  const rows = db.prepare<[number], EventRow>(`
    SELECT * FROM events
    WHERE ${column} = 0
    ORDER BY created_at ASC, rowid ASC
    LIMIT ?
  `).all(limit);

  const events: AnyOutboxEvent[] = [];
  for (const row of rows) {
    const event = toEvent(row);
    if (event) events.push(event);
  }
  return events;
}

/** Sets only this consumer's flag. Returns false when the event does not exist. */
export function markConsumed(eventId: string, consumer: ConsumerClass): boolean {
  const db = getDb();
  const column = CONSUMER_COLUMNS[consumer];
  const result = db.prepare(`UPDATE events SET ${column} = 1 WHERE id = ?`).run(eventId);
  return result.changes > 0;
}

/** Deletes events every consumer has processed and that were created before `before`. */
export function pruneConsumed(before: string): number {
  const db = getDb();
  const result = db.prepare(`
    DELETE FROM events
    WHERE broadcast_consumed = 1 AND dispatch_consumed = 1 AND created_at < ?
  `).run(before);
  return result.changes;
}
