import { v4 as uuid } from 'uuid';
import { getDb, now, withTransaction } from './client.js';
import { emitEvent } from './events.js';
import { getWorkflowSteps, requireProject } from './projects.js';
import { InvalidInputError, NotFoundError } from '../errors.js';
import { isTaskKind, type TaskView } from './types.js';

interface TaskRow {
  id: string;
  project_id: string;
  parent_task_id: string | null;
  title: string;
  description: string;
  kind: string;
  step_id: string;
  cancelled: number;
  plan_approved: number;
  fan_in: number;
  worktree_path: string | null;
  branch: string | null;
  session_id: string | null;
  output: string | null;
  created_at: string;
  updated_at: string;
  step_name: string;
  step_position: number;
}

const TASK_VIEW_SELECT = `
  SELECT t.*, ws.name AS step_name, ws.position AS step_position
  FROM tasks t
  JOIN workflow_steps ws ON t.step_id = ws.id
`;

function toTask(row: TaskRow): TaskView {
  return {
    ...row,
    kind: isTaskKind(row.kind) ? row.kind : 'unit',
    cancelled: row.cancelled === 1,
    plan_approved: row.plan_approved === 1,
    fan_in: row.fan_in === 1,
  };
}

export interface NewTask {
  project_id: string;
  title: string;
  description?: string;
  step_id?: string;
  parent_task_id?: string | null;
  kind?: string;
  fan_in?: boolean;
}

/**
 * Validates and inserts a task row without emitting anything. Callers own the
 * transaction and the event.
 */
export function insertTask(data: NewTask): TaskView {
  const db = getDb();
  requireProject(data.project_id);

  const title = data.title.trim();
  if (!title) {
    throw new InvalidInputError('Task title is required');
  }

  const kind = data.kind ?? 'unit';
  if (!isTaskKind(kind)) {
    throw new InvalidInputError(`Invalid task kind '${kind}'. Must be one of unit, research, milestone`);
  }

  const steps = getWorkflowSteps(data.project_id);
  const step = data.step_id ? steps.find(s => s.id === data.step_id) : steps[0];
  if (!step) {
    throw new InvalidInputError(`Step '${data.step_id}' does not belong to project ${data.project_id}`);
  }

  if (data.parent_task_id) {
    const parent = getTask(data.parent_task_id);
    if (!parent) throw new NotFoundError('task', data.parent_task_id);
    if (parent.project_id !== data.project_id) {
      throw new InvalidInputError(`Parent task ${parent.id} belongs to another project`);
    }
  }

  const id = uuid();
  const createdAt = now();
  db.prepare(`
    INSERT INTO tasks (id, project_id, parent_task_id, title, description, kind, step_id, fan_in, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    data.project_id,
    data.parent_task_id ?? null,
    title,
    data.description ?? '',
    kind,
    step.id,
    data.fan_in ? 1 : 0,
    createdAt,
    createdAt
  );

  return requireTask(id);
}

export function createTask(data: NewTask): TaskView {
  return withTransaction(() => {
    const task = insertTask(data);
    emitEvent('task_created', { task });
    return task;
  });
}

export function getTask(id: string): TaskView | null {
  const db = getDb();
  const row = db.prepare<[string], TaskRow>(`${TASK_VIEW_SELECT} WHERE t.id = ?`).get(id);
  return row ? toTask(row) : null;
}

export function requireTask(id: string): TaskView {
  const task = getTask(id);
  if (!task) throw new NotFoundError('task', id);
  return task;
}

export function getTasksByProject(projectId: string): TaskView[] {
  const db = getDb();
  return db.prepare<[string], TaskRow>(
    `${TASK_VIEW_SELECT} WHERE t.project_id = ? ORDER BY t.created_at ASC, t.rowid ASC`
  ).all(projectId).map(toTask);
}

export function getChildren(parentId: string): TaskView[] {
  const db = getDb();
  return db.prepare<[string], TaskRow>(
    `${TASK_VIEW_SELECT} WHERE t.parent_task_id = ? ORDER BY t.created_at ASC, t.rowid ASC`
  ).all(parentId).map(toTask);
}

/** The live synchronization task for a parent, if one was created. */
export function getFanInTask(parentId: string): TaskView | null {
  const db = getDb();
  const row = db.prepare<[string], TaskRow>(
    `${TASK_VIEW_SELECT} WHERE t.parent_task_id = ? AND t.fan_in = 1 AND t.cancelled = 0`
  ).get(parentId);
  return row ? toTask(row) : null;
}

export function updateTaskStep(id: string, stepId: string): TaskView {
  const db = getDb();
  db.prepare('UPDATE tasks SET step_id = ?, updated_at = ? WHERE id = ?').run(stepId, now(), id);
  return requireTask(id);
}

export function updateTaskCancelled(id: string, cancelled: boolean): TaskView {
  const db = getDb();
  db.prepare('UPDATE tasks SET cancelled = ?, updated_at = ? WHERE id = ?').run(cancelled ? 1 : 0, now(), id);
  return requireTask(id);
}

export function updatePlanApproved(id: string): TaskView {
  const db = getDb();
  db.prepare('UPDATE tasks SET plan_approved = 1, updated_at = ? WHERE id = ?').run(now(), id);
  return requireTask(id);
}

export function setTaskWorkspace(id: string, worktreePath: string, branch: string): TaskView {
  return withTransaction(() => {
    const db = getDb();
    db.prepare('UPDATE tasks SET worktree_path = ?, branch = ?, updated_at = ? WHERE id = ?')
      .run(worktreePath, branch, now(), id);
    const task = requireTask(id);
    emitEvent('task_updated', { task });
    return task;
  });
}

export function clearTaskWorkspace(id: string): TaskView {
  return withTransaction(() => {
    const db = getDb();
    db.prepare(`
      UPDATE tasks SET worktree_path = NULL, branch = NULL, session_id = NULL, updated_at = ?
      WHERE id = ?
    `).run(now(), id);
    const task = requireTask(id);
    emitEvent('task_updated', { task });
    return task;
  });
}

export function setTaskSession(id: string, sessionId: string): TaskView {
  return withTransaction(() => {
    const db = getDb();
    db.prepare('UPDATE tasks SET session_id = ?, updated_at = ? WHERE id = ?').run(sessionId, now(), id);
    const task = requireTask(id);
    emitEvent('task_updated', { task });
    return task;
  });
}

export function setTaskOutput(id: string, output: string): TaskView {
  return withTransaction(() => {
    requireTask(id);
    const db = getDb();
    db.prepare('UPDATE tasks SET output = ?, updated_at = ? WHERE id = ?').run(output, now(), id);
    const task = requireTask(id);
    emitEvent('task_updated', { task });
    return task;
  });
}
