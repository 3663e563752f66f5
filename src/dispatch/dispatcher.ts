import { CONFIG } from '../utils/config.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { withTransaction } from '../db/client.js';
import { emitEvent, markConsumed, pollUnconsumed } from '../db/events.js';
import { getStep, getTerminalStep } from '../db/projects.js';
import { getTask, requireTask } from '../db/tasks.js';
import { getPredecessors, isBlocked } from '../db/dependencies.js';
import { getComments } from '../db/comments.js';
import {
  completeRun,
  countActiveRuns,
  failRun,
  getActiveRun,
  recoverInterruptedRuns,
  startRun,
} from '../db/runs.js';
import type { AgentRun, AnyOutboxEvent, TaskView, WorkerRole, WorkflowStep } from '../db/types.js';
import { awaitingPlanApproval } from '../workflow/operations.js';
import { synchronizeParent } from '../workflow/fan-in.js';
import { WorkspaceManager } from '../workspace/manager.js';
import { buildPrompt } from '../runner/context.js';
import { loadRolePrompt } from '../runner/prompts.js';
import { WorkerLaunchError } from '../errors.js';
import type { WorkerExit, WorkerLauncher } from '../runner/worker.js';

const log = createLogger('dispatcher');

export type DispatchOutcome = 'launched' | 'deferred' | 'skipped' | 'cleanup' | 'failed';

export type CycleSummary = Record<DispatchOutcome, number>;

export interface DispatcherOptions {
  launcher: WorkerLauncher;
  workspaces?: WorkspaceManager;
  maxParallel?: number;
  intervalMs?: number;
  defaultModel?: string;
  promptsDir?: string;
}

type Admission =
  | { outcome: 'skipped' | 'deferred'; reason: string }
  | { outcome: 'launched'; run: AgentRun; task: TaskView; step: WorkflowStep; role: WorkerRole };

/**
 * Turns dispatch-class outbox events into worker launches. Each cycle is
 * synchronous over the database; worker executions continue in the
 * background and are tracked until they settle.
 */
export class Dispatcher {
  private readonly launcher: WorkerLauncher;
  private readonly workspaces: WorkspaceManager;
  private readonly maxParallel: number;
  private readonly intervalMs: number;
  private readonly defaultModel: string;
  private readonly promptsDir: string;

  private readonly inFlight = new Set<Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(options: DispatcherOptions) {
    this.launcher = options.launcher;
    this.workspaces = options.workspaces ?? new WorkspaceManager();
    this.maxParallel = options.maxParallel ?? CONFIG.maxParallelAgents;
    this.intervalMs = options.intervalMs ?? CONFIG.dispatchIntervalMs;
    this.defaultModel = options.defaultModel ?? CONFIG.defaultModel;
    this.promptsDir = options.promptsDir ?? CONFIG.promptsDir;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async start(): Promise<void> {
    if (this.running) return;

    const interrupted = recoverInterruptedRuns();
    if (interrupted.length > 0) {
      log.warn(`Marked ${interrupted.length} interrupted run(s) as failed`);
    }
    try {
      await this.workspaces.prune();
    } catch (err) {
      log.warn(`Worktree prune failed: ${errorMessage(err)}`);
    }

    this.running = true;
    log.info(`Dispatching every ${this.intervalMs}ms with up to ${this.maxParallel} parallel worker(s)`);
    this.schedule();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.drain();
  }

  /** Resolves once every tracked execution and teardown has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      try {
        this.runCycle();
      } catch (err) {
        log.error(`Dispatch cycle failed: ${errorMessage(err)}`);
      }
      if (this.running) this.schedule();
    }, this.intervalMs);
  }

  runCycle(): CycleSummary {
    const summary: CycleSummary = { launched: 0, deferred: 0, skipped: 0, cleanup: 0, failed: 0 };

    for (const event of pollUnconsumed('dispatch')) {
      let outcome: DispatchOutcome;
      try {
        outcome = this.handleEvent(event);
      } catch (err) {
        log.error(`Failed to handle ${event.type} event ${event.id}: ${errorMessage(err)}`);
        markConsumed(event.id, 'dispatch');
        outcome = 'failed';
      }
      summary[outcome]++;
    }

    if (summary.launched + summary.cleanup + summary.failed > 0) {
      log.debug(`Cycle: ${JSON.stringify(summary)}`);
    }
    return summary;
  }

  private handleEvent(event: AnyOutboxEvent): DispatchOutcome {
    switch (event.type) {
      case 'task_cancelled':
        return this.handleCleanup(event.id, event.payload.task.id);

      case 'task_moved': {
        const { task, to_step } = event.payload;
        if (getTerminalStep(task.project_id).id === to_step.id) {
          return this.handleCleanup(event.id, task.id);
        }
        return this.admit(event.id, task.id, to_step.id);
      }

      case 'task_created':
      case 'task_ready':
      case 'task_uncancelled':
        return this.admit(event.id, event.payload.task.id, null);

      default:
        markConsumed(event.id, 'dispatch');
        return 'skipped';
    }
  }

  /**
   * Runs every guard and, when all pass, inserts the run and consumes the
   * event in the same transaction, so the capacity count and the insert
   * cannot interleave with another admission.
   */
  private admit(eventId: string, taskId: string, expectedStepId: string | null): DispatchOutcome {
    const admission = withTransaction((): Admission => {
      const skip = (reason: string): Admission => {
        markConsumed(eventId, 'dispatch');
        return { outcome: 'skipped', reason };
      };

      const task = getTask(taskId);
      if (!task) return skip('task no longer exists');
      if (task.cancelled) return skip('task is cancelled');
      if (expectedStepId && task.step_id !== expectedStepId) return skip('task has left the step');

      const step = getStep(task.step_id);
      if (!step || !step.dispatchable || !step.role) return skip(`step '${task.step_name}' has no worker`);

      if (getActiveRun(task.id)) return skip('a run is already active');
      if (countActiveRuns() >= this.maxParallel) {
        return { outcome: 'deferred', reason: `${this.maxParallel} run(s) already active` };
      }
      if (isBlocked(task.id)) return skip('waiting on predecessors');
      if (awaitingPlanApproval(task)) return skip('parent plan is not approved');

      const run = startRun(task.id, step.id);
      markConsumed(eventId, 'dispatch');
      return { outcome: 'launched', run, task, step, role: step.role };
    });

    if (admission.outcome !== 'launched') {
      log.debug(`Task ${taskId} ${admission.outcome}: ${admission.reason}`);
      return admission.outcome;
    }

    const { run, task, step, role } = admission;
    log.info(`Launching ${role} for task ${task.id} in '${step.name}' (run ${run.id})`);
    this.track(this.execute(run, task, step, role));
    return 'launched';
  }

  private handleCleanup(eventId: string, taskId: string): DispatchOutcome {
    markConsumed(eventId, 'dispatch');
    if (getActiveRun(taskId)) {
      log.debug(`Teardown of task ${taskId} waits for its active run`);
      return 'cleanup';
    }
    this.track(this.teardown(taskId));
    return 'cleanup';
  }

  private async execute(run: AgentRun, task: TaskView, step: WorkflowStep, role: WorkerRole): Promise<void> {
    let exit: WorkerExit | null = null;

    try {
      const workspace = await this.workspaces.ensureWorkspace(task);
      const current = requireTask(task.id);
      const systemPrompt = await loadRolePrompt(role, this.promptsDir);
      const prompt = buildPrompt({
        task: current,
        comments: getComments(task.id),
        systemPrompt,
        workspace,
        predecessors: getPredecessors(task.id),
      });

      const handle = await this.launcher.launch(
        {
          taskId: task.id,
          runId: run.id,
          role,
          model: step.model ?? this.defaultModel,
          prompt,
          cwd: workspace.path,
          sessionId: this.workspaces.resumeHandle(current),
        },
        { onSessionId: (sessionId) => this.workspaces.recordSession(task.id, sessionId) }
      );
      exit = await handle.exited;
    } catch (err) {
      const message = err instanceof WorkerLaunchError ? err.message : `worker launch failed: ${errorMessage(err)}`;
      log.error(`Run ${run.id} for task ${task.id} failed: ${message}`);
      failRun(run.id, message);
    }

    if (exit) {
      completeRun(run.id, exit.exitCode, exit.error);
      if (exit.sessionId) {
        this.workspaces.recordSession(task.id, exit.sessionId);
      }
      log.info(`Run ${run.id} for task ${task.id} exited with code ${exit.exitCode}`);
    }

    await this.afterExit(task.id, run.step_id);
  }

  private async afterExit(taskId: string, runStepId: string): Promise<void> {
    const task = getTask(taskId);
    if (!task) return;

    const done = getTerminalStep(task.project_id).id === task.step_id;
    if (done && task.parent_task_id && !task.fan_in) {
      synchronizeParent(task.parent_task_id);
    }
    if (done || task.cancelled) {
      await this.workspaces.teardown(taskId);
      return;
    }

    // A move made while the run was active was skipped by the active-run guard
    if (task.step_id !== runStepId && getStep(task.step_id)?.dispatchable) {
      withTransaction(() => {
        emitEvent('task_ready', { task: requireTask(taskId) });
      });
      log.debug(`Task ${taskId} moved to '${task.step_name}' during its run; offered again`);
    }
  }

  private async teardown(taskId: string): Promise<void> {
    await this.workspaces.teardown(taskId);
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((err: unknown) => {
        log.error(`Background work failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
