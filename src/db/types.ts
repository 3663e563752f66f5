export const WORKER_ROLES = ['planner', 'coder', 'reviewer', 'researcher', 'orchestrator'] as const;
export type WorkerRole = (typeof WORKER_ROLES)[number];

export type AuthorRole = WorkerRole | 'human';

export const TASK_KINDS = ['unit', 'research', 'milestone'] as const;
export type TaskKind = (typeof TASK_KINDS)[number];

export type ProjectStatus = 'active' | 'cancelled';

export function isWorkerRole(value: unknown): value is WorkerRole {
  return typeof value === 'string' && (WORKER_ROLES as readonly string[]).includes(value);
}

export function isAuthorRole(value: unknown): value is AuthorRole {
  return value === 'human' || isWorkerRole(value);
}

export function isTaskKind(value: unknown): value is TaskKind {
  return typeof value === 'string' && (TASK_KINDS as readonly string[]).includes(value);
}

export interface Project {
  id: string;
  title: string;
  description: string;
  status: ProjectStatus;
  repo_path: string | null;
  base_branch: string | null;
  created_at: string;
  updated_at: string;
}

export interface WorkflowStep {
  id: string;
  project_id: string;
  name: string;
  position: number;
  dispatchable: boolean;
  role: WorkerRole | null;
  model: string | null;
  created_at: string;
}

export interface Task {
  id: string;
  project_id: string;
  parent_task_id: string | null;
  title: string;
  description: string;
  kind: TaskKind;
  step_id: string;
  cancelled: boolean;
  plan_approved: boolean;
  fan_in: boolean;
  worktree_path: string | null;
  branch: string | null;
  session_id: string | null;
  output: string | null;
  created_at: string;
  updated_at: string;
}

/** A task joined with the step it currently sits in. */
export interface TaskView extends Task {
  step_name: string;
  step_position: number;
}

export interface Dependency {
  id: string;
  predecessor_id: string;
  successor_id: string;
  created_at: string;
}

export interface Comment {
  id: string;
  task_id: string;
  author_role: AuthorRole;
  content: string;
  created_at: string;
}

export interface AgentRun {
  id: string;
  task_id: string;
  step_id: string;
  started_at: string;
  completed_at: string | null;
  exit_code: number | null;
  error: string | null;
}

export const EVENT_TYPES = [
  'project_created',
  'task_created',
  'task_moved',
  'task_cancelled',
  'task_uncancelled',
  'task_updated',
  'task_ready',
  'plan_approved',
  'comment_added',
  'dependency_created',
  'dependency_removed',
  'fan_in_triggered',
  'run_started',
  'run_completed',
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export function isEventType(value: unknown): value is EventType {
  return typeof value === 'string' && (EVENT_TYPES as readonly string[]).includes(value);
}

export type ConsumerClass = 'broadcast' | 'dispatch';

export interface StepSummary {
  id: string;
  name: string;
  position: number;
}

/** Payload shapes, keyed by event type. Every payload carries resolved entities. */
export interface EventPayloads {
  project_created: { project: Project; steps: WorkflowStep[] };
  task_created: { task: TaskView };
  task_moved: {
    task: TaskView;
    from_step: StepSummary;
    to_step: StepSummary;
    direction: 'forward' | 'backward';
  };
  task_cancelled: { task: TaskView };
  task_uncancelled: { task: TaskView };
  task_updated: { task: TaskView };
  task_ready: { task: TaskView };
  plan_approved: { task: TaskView };
  comment_added: { comment: Comment };
  dependency_created: { dependency: Dependency };
  dependency_removed: { dependency: Dependency };
  fan_in_triggered: { parent_task_id: string; task: TaskView; sibling_ids: string[] };
  run_started: { run: AgentRun };
  run_completed: { run: AgentRun };
}

export interface OutboxEvent<T extends EventType = EventType> {
  id: string;
  type: T;
  payload: EventPayloads[T];
  created_at: string;
  broadcast_consumed: boolean;
  dispatch_consumed: boolean;
}

export type AnyOutboxEvent = { [K in EventType]: OutboxEvent<K> }[EventType];
