export type ErrorCode =
  | 'invalid_transition'
  | 'cycle_detected'
  | 'self_dependency'
  | 'not_found'
  | 'invalid_input'
  | 'worker_launch_failure'
  | 'config_error';

export class TaskflowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export interface StepRef {
  id: string;
  name: string;
  position: number;
}

export class InvalidTransitionError extends TaskflowError {
  readonly current: StepRef | null;
  readonly validTargets: StepRef[];

  constructor(message: string, current: StepRef | null = null, validTargets: StepRef[] = []) {
    super('invalid_transition', message);
    this.current = current;
    this.validTargets = validTargets;
  }

  static forMove(current: StepRef, requested: StepRef, validTargets: StepRef[]): InvalidTransitionError {
    const valid = validTargets.map((s) => `'${s.name}'`).join(', ') || 'none';
    return new InvalidTransitionError(
      `Cannot move task from '${current.name}' to '${requested.name}'. Valid next steps: ${valid}`,
      current,
      validTargets
    );
  }
}

export class CycleDetectedError extends TaskflowError {
  constructor(predecessorId: string, successorId: string) {
    super(
      'cycle_detected',
      `Adding dependency ${predecessorId} -> ${successorId} would create a cycle`
    );
  }
}

export class SelfDependencyError extends TaskflowError {
  constructor(taskId: string) {
    super('self_dependency', `Task ${taskId} cannot depend on itself`);
  }
}

export type EntityKind = 'project' | 'step' | 'task' | 'dependency' | 'run' | 'event';

export class NotFoundError extends TaskflowError {
  readonly entity: EntityKind;
  readonly id: string;

  constructor(entity: EntityKind, id: string) {
    super('not_found', `${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${id}`);
    this.entity = entity;
    this.id = id;
  }
}

export class InvalidInputError extends TaskflowError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

export class WorkerLaunchError extends TaskflowError {
  constructor(message: string) {
    super('worker_launch_failure', message);
  }
}

export class ConfigError extends TaskflowError {
  constructor(message: string) {
    super('config_error', message);
  }
}
