import { v4 as uuid } from 'uuid';
import { getDb, now, withTransaction } from './client.js';
import { emitEvent } from './events.js';
import { InvalidInputError, NotFoundError } from '../errors.js';
import { isWorkerRole, type Project, type WorkerRole, type WorkflowStep } from './types.js';

interface StepRow {
  id: string;
  project_id: string;
  name: string;
  position: number;
  dispatchable: number;
  role: string | null;
  model: string | null;
  created_at: string;
}

export interface StepInput {
  name: string;
  dispatchable?: boolean;
  role?: string | null;
  model?: string | null;
}

function toStep(row: StepRow): WorkflowStep {
  return {
    ...row,
    dispatchable: row.dispatchable === 1,
    role: isWorkerRole(row.role) ? row.role : null,
  };
}

function validateSteps(steps: StepInput[]): Array<{ name: string; dispatchable: boolean; role: WorkerRole | null; model: string | null }> {
  if (steps.length < 2) {
    throw new InvalidInputError('A workflow needs at least two steps');
  }

  const seen = new Set<string>();
  return steps.map((step, position) => {
    const name = typeof step.name === 'string' ? step.name.trim() : '';
    if (!name) {
      throw new InvalidInputError(`Step at position ${position} is missing a name`);
    }
    if (seen.has(name)) {
      throw new InvalidInputError(`Duplicate step name '${name}'`);
    }
    seen.add(name);

    const dispatchable = step.dispatchable ?? false;
    const role = step.role ?? null;
    if (role !== null && !isWorkerRole(role)) {
      throw new InvalidInputError(`Unknown worker role '${role}' on step '${name}'`);
    }
    if (dispatchable && role === null) {
      throw new InvalidInputError(`Dispatch step '${name}' must name a worker role`);
    }
    if (!dispatchable && role !== null) {
      throw new InvalidInputError(`Step '${name}' has a role but is not a dispatch step`);
    }
    if (dispatchable && position === steps.length - 1) {
      throw new InvalidInputError(`Terminal step '${name}' cannot be a dispatch step`);
    }

    return { name, dispatchable, role, model: step.model ?? null };
  });
}

export function createProject(data: {
  title: string;
  description?: string;
  steps: StepInput[];
  repo_path?: string | null;
  base_branch?: string | null;
}): { project: Project; steps: WorkflowStep[] } {
  const title = data.title.trim();
  if (!title) {
    throw new InvalidInputError('Project title is required');
  }
  const steps = validateSteps(data.steps);

  return withTransaction(() => {
    const db = getDb();
    const id = uuid();
    const createdAt = now();

    db.prepare(`
      INSERT INTO projects (id, title, description, status, repo_path, base_branch, created_at, updated_at)
      VALUES (?, ?, ?, 'active', ?, ?, ?, ?)
    `).run(id, title, data.description ?? '', data.repo_path ?? null, data.base_branch ?? null, createdAt, createdAt);

    const insertStep = db.prepare(`
      INSERT INTO workflow_steps (id, project_id, name, position, dispatchable, role, model, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    steps.forEach((step, position) => {
      insertStep.run(uuid(), id, step.name, position, step.dispatchable ? 1 : 0, step.role, step.model, createdAt);
    });

    const project = requireProject(id);
    const created = getWorkflowSteps(id);
    emitEvent('project_created', { project, steps: created });
    return { project, steps: created };
  });
}

export function getProject(id: string): Project | null {
  const db = getDb();
  return db.prepare<[string], Project>('SELECT * FROM projects WHERE id = ?').get(id) ?? null;
}

export function requireProject(id: string): Project {
  const project = getProject(id);
  if (!project) throw new NotFoundError('project', id);
  return project;
}

export function getAllProjects(): Project[] {
  const db = getDb();
  return db.prepare<[], Project>('SELECT * FROM projects ORDER BY created_at DESC').all();
}

export function getWorkflowSteps(projectId: string): WorkflowStep[] {
  const db = getDb();
  return db.prepare<[string], StepRow>(
    'SELECT * FROM workflow_steps WHERE project_id = ? ORDER BY position ASC'
  ).all(projectId).map(toStep);
}

export function getStep(id: string): WorkflowStep | null {
  const db = getDb();
  const row = db.prepare<[string], StepRow>('SELECT * FROM workflow_steps WHERE id = ?').get(id);
  return row ? toStep(row) : null;
}

export function requireStep(id: string): WorkflowStep {
  const step = getStep(id);
  if (!step) throw new NotFoundError('step', id);
  return step;
}

/** Looks a step up by id, or by name within the project. */
export function findStep(projectId: string, idOrName: string): WorkflowStep | null {
  const db = getDb();
  const row = db.prepare<[string, string, string], StepRow>(
    'SELECT * FROM workflow_steps WHERE project_id = ? AND (id = ? OR name = ?)'
  ).get(projectId, idOrName, idOrName);
  return row ? toStep(row) : null;
}

/** The highest-position step: reaching it means the task is done. */
export function getTerminalStep(projectId: string): WorkflowStep {
  const db = getDb();
  const row = db.prepare<[string], StepRow>(
    'SELECT * FROM workflow_steps WHERE project_id = ? ORDER BY position DESC LIMIT 1'
  ).get(projectId);
  if (!row) throw new NotFoundError('step', `terminal step of project ${projectId}`);
  return toStep(row);
}

