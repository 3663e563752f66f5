import { v4 as uuid } from 'uuid';
import { getDb, now, withTransaction } from './client.js';
import { emitEvent } from './events.js';
import { NotFoundError } from '../errors.js';
import type { AgentRun } from './types.js';

/** Exit code recorded when the worker never produced one of its own. */
export const FAILED_EXIT_CODE = -1;

export function startRun(taskId: string, stepId: string): AgentRun {
  return withTransaction(() => {
    const db = getDb();
    const run: AgentRun = {
      id: uuid(),
      task_id: taskId,
      step_id: stepId,
      started_at: now(),
      completed_at: null,
      exit_code: null,
      error: null,
    };

    db.prepare(`
      INSERT INTO agent_runs (id, task_id, step_id, started_at)
      VALUES (?, ?, ?, ?)
    `).run(run.id, run.task_id, run.step_id, run.started_at);

    emitEvent('run_started', { run });
    return run;
  });
}

export function getRun(id: string): AgentRun | null {
  const db = getDb();
  return db.prepare<[string], AgentRun>('SELECT * FROM agent_runs WHERE id = ?').get(id) ?? null;
}

export function getRunsByTask(taskId: string): AgentRun[] {
  const db = getDb();
  return db.prepare<[string], AgentRun>(
    'SELECT * FROM agent_runs WHERE task_id = ? ORDER BY started_at ASC, rowid ASC'
  ).all(taskId);
}

export function getActiveRun(taskId: string): AgentRun | null {
  const db = getDb();
  return db.prepare<[string], AgentRun>(
    'SELECT * FROM agent_runs WHERE task_id = ? AND completed_at IS NULL ORDER BY started_at DESC LIMIT 1'
  ).get(taskId) ?? null;
}

export function getActiveRuns(): AgentRun[] {
  const db = getDb();
  return db.prepare<[], AgentRun>(
    'SELECT * FROM agent_runs WHERE completed_at IS NULL ORDER BY started_at ASC'
  ).all();
}

export function countActiveRuns(): number {
  const db = getDb();
  const row = db.prepare<[], { cnt: number }>(
    'SELECT COUNT(*) AS cnt FROM agent_runs WHERE completed_at IS NULL'
  ).get();
  return row?.cnt ?? 0;
}

/**
 * Closes a run. A run that already has completed_at is left untouched and
 * returned as stored.
 */
export function completeRun(id: string, exitCode: number, error: string | null = null): AgentRun {
  return withTransaction(() => {
    const db = getDb();
    const result = db.prepare(`
      UPDATE agent_runs
      SET completed_at = ?, exit_code = ?, error = ?
      WHERE id = ? AND completed_at IS NULL
    `).run(now(), exitCode, error, id);

    const run = getRun(id);
    if (!run) throw new NotFoundError('run', id);
    if (result.changes > 0) {
      emitEvent('run_completed', { run });
    }
    return run;
  });
}

export function failRun(id: string, error: string): AgentRun {
  return completeRun(id, FAILED_EXIT_CODE, error);
}

/**
 * Marks every run still open as failed. Used at coordinator start, when no
 * worker from a previous process can still be alive.
 */
export function recoverInterruptedRuns(reason = 'interrupted: coordinator restarted'): AgentRun[] {
  return getActiveRuns().map(run => failRun(run.id, reason));
}
