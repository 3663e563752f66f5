import { InvalidTransitionError, type StepRef } from '../errors.js';
import type { WorkflowStep } from '../db/types.js';

interface Positioned {
  step_id: string;
  cancelled: boolean;
}

export function toRef(step: Pick<WorkflowStep, 'id' | 'name' | 'position'>): StepRef {
  return { id: step.id, name: step.name, position: step.position };
}

function currentStep(task: Positioned, steps: WorkflowStep[]): WorkflowStep {
  const step = steps.find(s => s.id === task.step_id);
  if (!step) {
    throw new InvalidTransitionError(`Task sits in step ${task.step_id}, which is not part of this workflow`);
  }
  return step;
}

/**
 * Steps a task may move to: the next step, or any earlier one. A cancelled
 * task has none.
 */
export function validTargets(task: Positioned, steps: WorkflowStep[]): WorkflowStep[] {
  if (task.cancelled) return [];
  const current = currentStep(task, steps);
  return steps.filter(s => s.position === current.position + 1 || s.position < current.position);
}

export function canTransition(task: Positioned, target: WorkflowStep, steps: WorkflowStep[]): boolean {
  return validTargets(task, steps).some(s => s.id === target.id);
}

export function assertTransition(task: Positioned, target: WorkflowStep, steps: WorkflowStep[]): void {
  const current = currentStep(task, steps);
  if (task.cancelled) {
    throw new InvalidTransitionError(
      `Cannot move a cancelled task (currently in '${current.name}'); uncancel it first`,
      toRef(current)
    );
  }
  if (!canTransition(task, target, steps)) {
    throw InvalidTransitionError.forMove(toRef(current), toRef(target), validTargets(task, steps).map(toRef));
  }
}

export function isTerminal(step: WorkflowStep, steps: WorkflowStep[]): boolean {
  return steps.length > 0 && steps[steps.length - 1].id === step.id;
}
