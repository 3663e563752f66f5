import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { CONFIG } from '../utils/config.js';

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!db) {
    if (CONFIG.databasePath !== ':memory:') {
      mkdirSync(dirname(CONFIG.databasePath), { recursive: true });
    }
    db = new Database(CONFIG.databasePath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Runs `fn` inside a BEGIN IMMEDIATE transaction so the write lock is taken
 * before any read. Nested calls become savepoints of the outer transaction.
 */
export function withTransaction<T>(fn: () => T): T {
  return getDb().transaction(fn).immediate();
}

export function now(): string {
  return new Date().toISOString();
}
