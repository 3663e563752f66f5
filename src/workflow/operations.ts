import { withTransaction } from '../db/client.js';
import { emitEvent } from '../db/events.js';
import { getStep, getTerminalStep, getWorkflowSteps } from '../db/projects.js';
import {
  getChildren,
  getTask,
  insertTask,
  requireTask,
  updatePlanApproved,
  updateTaskCancelled,
  updateTaskStep,
} from '../db/tasks.js';
import { addDependency, getSuccessors, isBlocked } from '../db/dependencies.js';
import { InvalidInputError, InvalidTransitionError, NotFoundError } from '../errors.js';
import type { TaskView, WorkflowStep } from '../db/types.js';
import { assertTransition, isTerminal, toRef } from './state-machine.js';
import { synchronizeParent } from './fan-in.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workflow');

function resolveTarget(task: TaskView, steps: WorkflowStep[], target: string): WorkflowStep {
  const step = steps.find(s => s.id === target || s.name === target);
  if (step) return step;
  if (getStep(target)) {
    throw new InvalidInputError(`Step ${target} does not belong to project ${task.project_id}`);
  }
  throw new NotFoundError('step', target);
}

/** Whether the task's parent holds it back until its plan is approved. */
export function awaitingPlanApproval(task: TaskView): boolean {
  if (!task.parent_task_id) return false;
  const parent = getTask(task.parent_task_id);
  return parent !== null && parent.kind === 'milestone' && !parent.plan_approved;
}

function applyMove(task: TaskView, from: WorkflowStep, to: WorkflowStep, steps: WorkflowStep[]): TaskView {
  const moved = updateTaskStep(task.id, to.id);
  emitEvent('task_moved', {
    task: moved,
    from_step: toRef(from),
    to_step: toRef(to),
    direction: to.position > from.position ? 'forward' : 'backward',
  });
  if (isTerminal(to, steps)) {
    onTaskCompleted(moved);
  }
  return moved;
}

/**
 * Emits task_ready for every successor that `taskId` no longer holds back.
 * Runs whenever a predecessor stops blocking: on completion and on cancel.
 */
function wakeSuccessors(taskId: string): void {
  for (const successor of getSuccessors(taskId)) {
    if (successor.cancelled || isBlocked(successor.task_id)) continue;
    const next = requireTask(successor.task_id);
    if (awaitingPlanApproval(next)) continue;
    emitEvent('task_ready', { task: next });
  }
}

/**
 * Runs in the transaction that put `task` into its terminal step: wakes
 * successors, synchronizes the parent, and advances a milestone whose
 * integration task just finished.
 */
function onTaskCompleted(task: TaskView): void {
  wakeSuccessors(task.id);

  if (!task.parent_task_id) return;

  if (!task.fan_in) {
    synchronizeParent(task.parent_task_id);
    return;
  }

  const parent = requireTask(task.parent_task_id);
  if (parent.kind !== 'milestone' || parent.cancelled) return;

  const steps = getWorkflowSteps(parent.project_id);
  const current = steps.find(s => s.id === parent.step_id);
  if (!current || isTerminal(current, steps)) return;
  const next = steps.find(s => s.position === current.position + 1);
  if (!next) return;

  log.info(`Milestone ${parent.id} advances from '${current.name}' to '${next.name}'`);
  applyMove(parent, current, next, steps);
}

/** Moves a task one step forward or to any earlier step. */
export function moveTask(taskId: string, target: string): TaskView {
  return withTransaction(() => {
    const task = requireTask(taskId);
    const steps = getWorkflowSteps(task.project_id);
    const to = resolveTarget(task, steps, target);
    assertTransition(task, to, steps);

    const from = steps.find(s => s.id === task.step_id);
    if (!from) throw new NotFoundError('step', task.step_id);
    return applyMove(task, from, to, steps);
  });
}

/** Jumps a live task straight to its project's terminal step. */
export function completeTask(taskId: string): TaskView {
  return withTransaction(() => {
    const task = requireTask(taskId);
    if (task.cancelled) {
      throw new InvalidTransitionError('Cannot complete a cancelled task');
    }
    const steps = getWorkflowSteps(task.project_id);
    const terminal = getTerminalStep(task.project_id);
    if (task.step_id === terminal.id) {
      throw new InvalidTransitionError(`Task is already in the terminal step '${terminal.name}'`);
    }
    const from = steps.find(s => s.id === task.step_id);
    if (!from) throw new NotFoundError('step', task.step_id);
    return applyMove(task, from, terminal, steps);
  });
}

export function cancelTask(taskId: string): TaskView {
  return withTransaction(() => {
    const task = requireTask(taskId);
    if (task.cancelled) {
      throw new InvalidTransitionError('Task is already cancelled');
    }
    const terminal = getTerminalStep(task.project_id);
    if (task.step_id === terminal.id) {
      throw new InvalidTransitionError(`Cannot cancel a task in the terminal step '${terminal.name}'`);
    }
    const cancelled = updateTaskCancelled(taskId, true);
    emitEvent('task_cancelled', { task: cancelled });
    wakeSuccessors(taskId);
    return cancelled;
  });
}

/** Restores a cancelled task in the step it was cancelled in. */
export function uncancelTask(taskId: string): TaskView {
  return withTransaction(() => {
    const task = requireTask(taskId);
    if (!task.cancelled) {
      throw new InvalidTransitionError('Task is not cancelled');
    }
    const restored = updateTaskCancelled(taskId, false);
    emitEvent('task_uncancelled', { task: restored });
    return restored;
  });
}

export function approvePlan(milestoneId: string): TaskView {
  return withTransaction(() => {
    const milestone = requireTask(milestoneId);
    if (milestone.kind !== 'milestone') {
      throw new InvalidInputError('Only milestones can be approved');
    }
    if (milestone.plan_approved) {
      throw new InvalidInputError('This milestone is already approved');
    }
    const children = getChildren(milestoneId).filter(c => !c.cancelled);
    if (children.length === 0) {
      throw new InvalidInputError('Milestone must have at least one child task before approval');
    }

    const approved = updatePlanApproved(milestoneId);
    emitEvent('plan_approved', { task: approved });
    for (const child of children) {
      if (!isBlocked(child.id)) {
        emitEvent('task_ready', { task: child });
      }
    }
    return approved;
  });
}

export interface SubtaskSpec {
  title: string;
  description?: string;
  kind?: string;
  step?: string;
}

export interface SubtaskOptions {
  /** Edges between specs of this batch, by index. */
  dependencies?: Array<{ from: number; to: number }>;
  /** Successors of this task are made to wait on every new subtask too. */
  cascadeFrom?: string;
}

function defaultSubtaskStep(parent: TaskView, steps: WorkflowStep[]): WorkflowStep {
  const next = steps.find(s => s.position === parent.step_position + 1);
  if (next) return next;
  return steps.find(s => s.dispatchable) ?? steps[0];
}

/**
 * Creates several children of `parentId` in one transaction. Dependency edges
 * are in place before any task_created event is written, so the dispatcher
 * never sees a new subtask without its blockers.
 */
export function createSubtasks(parentId: string, specs: SubtaskSpec[], options: SubtaskOptions = {}): TaskView[] {
  if (specs.length === 0) {
    throw new InvalidInputError('At least one subtask is required');
  }

  return withTransaction(() => {
    const parent = requireTask(parentId);
    const steps = getWorkflowSteps(parent.project_id);
    const fallback = defaultSubtaskStep(parent, steps);

    const created = specs.map(spec => {
      const step = spec.step ? resolveTarget(parent, steps, spec.step) : fallback;
      return insertTask({
        project_id: parent.project_id,
        parent_task_id: parentId,
        title: spec.title,
        description: spec.description,
        kind: spec.kind,
        step_id: step.id,
      });
    });

    for (const edge of options.dependencies ?? []) {
      const from = created[edge.from];
      const to = created[edge.to];
      if (!from || !to) {
        throw new InvalidInputError(`Dependency ${edge.from} -> ${edge.to} refers to a subtask outside this batch`);
      }
      addDependency(from.id, to.id);
    }

    if (options.cascadeFrom) {
      for (const successor of getSuccessors(options.cascadeFrom)) {
        for (const task of created) {
          if (task.id !== successor.task_id) addDependency(task.id, successor.task_id);
        }
      }
    }

    return created.map(task => {
      emitEvent('task_created', { task });
      return task;
    });
  });
}
