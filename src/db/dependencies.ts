import { v4 as uuid } from 'uuid';
import { getDb, now, withTransaction } from './client.js';
import { emitEvent } from './events.js';
import { getTask } from './tasks.js';
import {
  CycleDetectedError,
  InvalidInputError,
  NotFoundError,
  SelfDependencyError,
} from '../errors.js';
import type { Dependency } from './types.js';

export interface LinkedTask {
  dependency_id: string;
  task_id: string;
  title: string;
  step_name: string;
  step_position: number;
  cancelled: boolean;
  done: boolean;
}

interface LinkedRow {
  dependency_id: string;
  task_id: string;
  title: string;
  step_name: string;
  step_position: number;
  cancelled: number;
  terminal_position: number;
}

function toLinked(row: LinkedRow): LinkedTask {
  return {
    dependency_id: row.dependency_id,
    task_id: row.task_id,
    title: row.title,
    step_name: row.step_name,
    step_position: row.step_position,
    cancelled: row.cancelled === 1,
    done: row.step_position === row.terminal_position,
  };
}

const TERMINAL_POSITION = `
  (SELECT MAX(position) FROM workflow_steps WHERE project_id = t.project_id)
`;

/** True when `from` can already reach `to` by following successor edges. */
export function reaches(from: string, to: string): boolean {
  const db = getDb();
  const successorsOf = db.prepare<[string], { successor_id: string }>(
    'SELECT successor_id FROM task_dependencies WHERE predecessor_id = ?'
  );

  const visited = new Set<string>([from]);
  const queue = [from];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    if (current === to) return true;
    for (const { successor_id } of successorsOf.all(current)) {
      if (!visited.has(successor_id)) {
        visited.add(successor_id);
        queue.push(successor_id);
      }
    }
  }
  return false;
}

export function addDependency(predecessorId: string, successorId: string): Dependency {
  if (predecessorId === successorId) {
    throw new SelfDependencyError(predecessorId);
  }

  return withTransaction(() => {
    const predecessor = getTask(predecessorId);
    if (!predecessor) throw new NotFoundError('task', predecessorId);
    const successor = getTask(successorId);
    if (!successor) throw new NotFoundError('task', successorId);

    if (predecessor.project_id !== successor.project_id) {
      throw new InvalidInputError('Dependencies must connect tasks of the same project');
    }

    const db = getDb();
    const existing = db.prepare<[string, string], { id: string }>(
      'SELECT id FROM task_dependencies WHERE predecessor_id = ? AND successor_id = ?'
    ).get(predecessorId, successorId);
    if (existing) {
      throw new InvalidInputError(`Dependency ${predecessorId} -> ${successorId} already exists`);
    }

    if (reaches(successorId, predecessorId)) {
      throw new CycleDetectedError(predecessorId, successorId);
    }

    const dependency: Dependency = {
      id: uuid(),
      predecessor_id: predecessorId,
      successor_id: successorId,
      created_at: now(),
    };
    db.prepare(`
      INSERT INTO task_dependencies (id, predecessor_id, successor_id, created_at)
      VALUES (?, ?, ?, ?)
    `).run(dependency.id, dependency.predecessor_id, dependency.successor_id, dependency.created_at);

    emitEvent('dependency_created', { dependency });
    return dependency;
  });
}

export function getDependency(id: string): Dependency | null {
  const db = getDb();
  return db.prepare<[string], Dependency>('SELECT * FROM task_dependencies WHERE id = ?').get(id) ?? null;
}

/** Returns false, without emitting, when the edge is already gone. */
export function removeDependency(id: string): boolean {
  return withTransaction(() => {
    const dependency = getDependency(id);
    if (!dependency) return false;

    const db = getDb();
    db.prepare('DELETE FROM task_dependencies WHERE id = ?').run(id);
    emitEvent('dependency_removed', { dependency });
    return true;
  });
}

export function getProjectDependencies(projectId: string): Dependency[] {
  const db = getDb();
  return db.prepare<[string], Dependency>(`
    SELECT d.* FROM task_dependencies d
    JOIN tasks t ON d.successor_id = t.id
    WHERE t.project_id = ?
    ORDER BY d.created_at ASC, d.rowid ASC
  `).all(projectId);
}

export function getPredecessors(taskId: string): LinkedTask[] {
  const db = getDb();
  return db.prepare<[string], LinkedRow>(`
    SELECT d.id AS dependency_id, t.id AS task_id, t.title, t.cancelled,
           ws.name AS step_name, ws.position AS step_position,
           ${TERMINAL_POSITION} AS terminal_position
    FROM task_dependencies d
    JOIN tasks t ON d.predecessor_id = t.id
    JOIN workflow_steps ws ON t.step_id = ws.id
    WHERE d.successor_id = ?
    ORDER BY d.created_at ASC, d.rowid ASC
  `).all(taskId).map(toLinked);
}

export function getSuccessors(taskId: string): LinkedTask[] {
  const db = getDb();
  return db.prepare<[string], LinkedRow>(`
    SELECT d.id AS dependency_id, t.id AS task_id, t.title, t.cancelled,
           ws.name AS step_name, ws.position AS step_position,
           ${TERMINAL_POSITION} AS terminal_position
    FROM task_dependencies d
    JOIN tasks t ON d.successor_id = t.id
    JOIN workflow_steps ws ON t.step_id = ws.id
    WHERE d.predecessor_id = ?
    ORDER BY d.created_at ASC, d.rowid ASC
  `).all(taskId).map(toLinked);
}

export function getDependencies(taskId: string): { predecessors: LinkedTask[]; successors: LinkedTask[] } {
  return { predecessors: getPredecessors(taskId), successors: getSuccessors(taskId) };
}

/** Predecessors still holding the task back: neither done nor cancelled. */
export function getBlockers(taskId: string): LinkedTask[] {
  return getPredecessors(taskId).filter(p => !p.done && !p.cancelled);
}

/** Derived on every call; nothing is stored. */
export function isBlocked(taskId: string): boolean {
  return getBlockers(taskId).length > 0;
}
