import Database from 'better-sqlite3';
import { withTransaction } from '../db/client.js';
import { emitEvent } from '../db/events.js';
import { getTerminalStep, getWorkflowSteps } from '../db/projects.js';
import { getChildren, getFanInTask, insertTask, requireTask } from '../db/tasks.js';
import type { TaskView, WorkflowStep } from '../db/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('fan-in');

/** Orchestrator steps take integration work; otherwise the first dispatch step does. */
export function pickIntegrationStep(steps: WorkflowStep[]): WorkflowStep | null {
  const dispatchable = steps.filter(s => s.dispatchable);
  return dispatchable.find(s => s.role === 'orchestrator') ?? dispatchable[0] ?? null;
}

function describeChildren(children: TaskView[]): string {
  const lines = ['All subtasks are done. Integrate their results:', ''];
  for (const child of children) {
    lines.push(`- ${child.title} (${child.id})`);
    if (child.output) {
      lines.push(`  Output: ${child.output}`);
    }
  }
  return lines.join('\n');
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Creates the single integration task for `parentId` once every live child is
 * done. Returns null when children are still open, when the parent was already
 * synchronized, or when the workflow has no step that could run it.
 */
export function synchronizeParent(parentId: string): TaskView | null {
  try {
    return withTransaction(() => {
      const parent = requireTask(parentId);
      const children = getChildren(parentId).filter(c => !c.cancelled && !c.fan_in);
      if (children.length === 0) return null;

      const terminal = getTerminalStep(parent.project_id);
      if (children.some(c => c.step_id !== terminal.id)) return null;

      if (getFanInTask(parentId)) return null;

      const step = pickIntegrationStep(getWorkflowSteps(parent.project_id));
      if (!step) {
        log.warn(`Parent ${parentId} is ready for integration but its workflow has no dispatch step`);
        return null;
      }

      const task = insertTask({
        project_id: parent.project_id,
        parent_task_id: parentId,
        title: `Integrate: ${parent.title}`,
        description: describeChildren(children),
        step_id: step.id,
        kind: 'unit',
        fan_in: true,
      });

      emitEvent('task_created', { task });
      emitEvent('fan_in_triggered', {
        parent_task_id: parentId,
        task,
        sibling_ids: children.map(c => c.id),
      });
      log.info(`Created integration task ${task.id} for parent ${parentId}`);
      return task;
    });
  } catch (err) {
    if (isUniqueViolation(err)) {
      log.debug(`Parent ${parentId} was synchronized concurrently`);
      return null;
    }
    throw err;
  }
}
