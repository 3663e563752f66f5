#!/usr/bin/env node

import { Command } from 'commander';
import {
  initializeSchema,
  createProject,
  getAllProjects,
  getWorkflowSteps,
  requireProject,
  findStep,
  createTask,
  setTaskOutput,
  addComment,
  addDependency,
  removeDependency,
  getRunsByTask,
  markConsumed,
  pollUnconsumed,
  pruneConsumed,
} from './db/index.js';
import {
  approvePlan,
  cancelTask,
  completeTask,
  moveTask,
  uncancelTask,
} from './workflow/operations.js';
import { getBoard, getTaskDetail, type BoardTask } from './workflow/board.js';
import { Dispatcher } from './dispatch/dispatcher.js';
import { WorkspaceManager } from './workspace/manager.js';
import { ClaudeWorkerLauncher } from './runner/launcher.js';
import { runBoardServer } from './mcp/server.js';
import { detectDefaultBranch } from './git/operations.js';
import { parseStepList } from './utils/step-spec.js';
import { CONFIG } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import { TaskflowError, InvalidInputError } from './errors.js';

const log = createLogger('cli');
const program = new Command();

program
  .name('taskflow')
  .description('Board-driven orchestration of autonomous coding workers')
  .version('0.1.0');

initializeSchema();

function action<A extends unknown[]>(fn: (...args: A) => void | Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof TaskflowError) {
        console.error(`Error [${err.code}]: ${err.message}`);
      } else {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exit(1);
    }
  };
}

function printTask(task: BoardTask): void {
  const flags = [
    task.cancelled ? 'cancelled' : null,
    task.blocked ? 'blocked' : null,
    task.has_active_run ? 'running' : null,
    task.kind !== 'unit' ? task.kind : null,
    task.fan_in ? 'integration' : null,
  ].filter(Boolean);
  const suffix = flags.length > 0 ? ` (${flags.join(', ')})` : '';
  console.log(`  ${task.id}  ${task.title}${suffix}`);
}

const project = program.command('project').description('Manage projects');

project
  .command('create <title>')
  .description('Create a project with its workflow')
  .requiredOption('-s, --steps <steps>', 'Comma-separated steps; "name:role[@model]" marks a dispatch step')
  .option('-d, --description <text>', 'Project description', '')
  .option('-r, --repo <path>', 'Repository for worktrees (defaults to REPO_PATH)')
  .option('-b, --base-branch <branch>', 'Branch worktrees start from (defaults to BASE_BRANCH)')
  .action(action(async (title: string, options: { steps: string; description: string; repo?: string; baseBranch?: string }) => {
    let baseBranch = options.baseBranch;
    if (options.repo && !baseBranch) {
      baseBranch = await detectDefaultBranch(options.repo);
    }
    const { project: created, steps } = createProject({
      title,
      description: options.description,
      steps: parseStepList(options.steps),
      repo_path: options.repo,
      base_branch: baseBranch,
    });
    console.log(`Created project ${created.id}`);
    for (const step of steps) {
      console.log(`  ${step.position}. ${step.name}${step.role ? ` [${step.role}]` : ''}`);
    }
  }));

project
  .command('list')
  .description('List projects')
  .action(action(() => {
    const projects = getAllProjects();
    if (projects.length === 0) {
      console.log('No projects yet. Create one with: taskflow project create <title> --steps ...');
      return;
    }
    for (const p of projects) {
      const steps = getWorkflowSteps(p.id).map(s => s.name).join(' -> ');
      console.log(`${p.id}  ${p.title}\n  ${steps}`);
    }
  }));

const task = program.command('task').description('Manage tasks');

task
  .command('create <project-id> <title>')
  .description('Create a task')
  .option('-d, --description <text>', 'Task description', '')
  .option('-s, --step <step>', 'Step id or name (defaults to the first step)')
  .option('-p, --parent <task-id>', 'Parent task')
  .option('-k, --kind <kind>', 'unit, research or milestone', 'unit')
  .action(action((projectId: string, title: string, options: { description: string; step?: string; parent?: string; kind: string }) => {
    requireProject(projectId);
    let stepId: string | undefined;
    if (options.step) {
      const step = findStep(projectId, options.step);
      if (!step) throw new InvalidInputError(`Step '${options.step}' is not part of project ${projectId}`);
      stepId = step.id;
    }
    const created = createTask({
      project_id: projectId,
      title,
      description: options.description,
      step_id: stepId,
      parent_task_id: options.parent,
      kind: options.kind,
    });
    console.log(`Created task ${created.id} in '${created.step_name}'`);
  }));

task
  .command('move <task-id> <step>')
  .description('Move a task to the next step or back to an earlier one')
  .action(action((taskId: string, step: string) => {
    const moved = moveTask(taskId, step);
    console.log(`Task ${moved.id} is now in '${moved.step_name}'`);
  }));

task
  .command('complete <task-id>')
  .description('Move a task straight to the terminal step')
  .action(action((taskId: string) => {
    const done = completeTask(taskId);
    console.log(`Task ${done.id} is done`);
  }));

task
  .command('cancel <task-id>')
  .action(action((taskId: string) => {
    cancelTask(taskId);
    console.log(`Task ${taskId} cancelled`);
  }));

task
  .command('uncancel <task-id>')
  .action(action((taskId: string) => {
    const restored = uncancelTask(taskId);
    console.log(`Task ${taskId} restored in '${restored.step_name}'`);
  }));

task
  .command('output <task-id> <text>')
  .description('Record the result of a task')
  .action(action((taskId: string, text: string) => {
    setTaskOutput(taskId, text);
    console.log(`Output recorded for task ${taskId}`);
  }));

task
  .command('show <task-id>')
  .description('Show a task with comments, dependencies and runs')
  .action(action((taskId: string) => {
    const detail = getTaskDetail(taskId);
    const t = detail.task;
    console.log(`${t.title} (${t.id})`);
    console.log(`  Step: ${detail.step.name}${t.cancelled ? ' (cancelled)' : ''}${t.blocked ? ' (blocked)' : ''}`);
    if (t.description) console.log(`  Description: ${t.description}`);
    if (t.branch) console.log(`  Branch: ${t.branch} at ${t.worktree_path}`);
    if (t.session_id) console.log(`  Session: ${t.session_id}`);
    if (t.output) console.log(`  Output: ${t.output}`);

    for (const p of detail.predecessors) {
      console.log(`  Waits on: ${p.title} [${p.step_name}]${p.done ? ' done' : ''}`);
    }
    for (const s of detail.successors) {
      console.log(`  Blocks: ${s.title} [${s.step_name}]`);
    }
    if (detail.comments.length > 0) {
      console.log('\n  Comments:');
      for (const c of detail.comments) {
        console.log(`  [${c.author_role}] ${c.created_at}: ${c.content}`);
      }
    }
    if (detail.runs.length > 0) {
      console.log('\n  Runs:');
      for (const r of detail.runs) {
        const status = r.completed_at === null ? 'running' : `exit ${r.exit_code}`;
        console.log(`  ${r.id.slice(0, 8)} | ${status} | ${r.started_at}${r.error ? ` | ${r.error}` : ''}`);
      }
    }
  }));

program
  .command('comment <task-id> <content>')
  .description('Add a comment to a task')
  .option('-r, --role <role>', 'Author role', 'human')
  .action(action((taskId: string, content: string, options: { role: string }) => {
    const comment = addComment(taskId, options.role, content);
    console.log(`Comment ${comment.id} added`);
  }));

program
  .command('depend <predecessor-id> <successor-id>')
  .description('Make the successor wait until the predecessor is done')
  .action(action((predecessorId: string, successorId: string) => {
    const dependency = addDependency(predecessorId, successorId);
    console.log(`Dependency ${dependency.id} created`);
  }));

program
  .command('undepend <dependency-id>')
  .description('Remove a dependency')
  .action(action((dependencyId: string) => {
    const removed = removeDependency(dependencyId);
    console.log(removed ? `Dependency ${dependencyId} removed` : `Dependency ${dependencyId} did not exist`);
  }));

program
  .command('approve <milestone-id>')
  .description('Approve a milestone plan so its subtasks can run')
  .action(action((milestoneId: string) => {
    approvePlan(milestoneId);
    console.log(`Plan for ${milestoneId} approved`);
  }));

program
  .command('board <project-id>')
  .description('Show the project board')
  .action(action((projectId: string) => {
    const board = getBoard(projectId);
    console.log(`\n${board.project.title}\n`);
    for (const column of board.columns) {
      const role = column.step.role ? ` [${column.step.role}]` : '';
      console.log(`${column.step.name}${role} (${column.tasks.length})`);
      column.tasks.forEach(printTask);
    }
    if (board.cancelled.length > 0) {
      console.log(`Cancelled (${board.cancelled.length})`);
      board.cancelled.forEach(printTask);
    }
  }));

program
  .command('runs <task-id>')
  .description('List the runs of a task')
  .action(action((taskId: string) => {
    const runs = getRunsByTask(taskId);
    if (runs.length === 0) {
      console.log('No runs yet.');
      return;
    }
    for (const r of runs) {
      const status = r.completed_at === null ? 'running' : `exit ${r.exit_code}`;
      console.log(`${r.id}  ${status}  ${r.started_at}${r.error ? `  ${r.error}` : ''}`);
    }
  }));

program
  .command('events')
  .description('Print unconsumed broadcast events as JSON lines and mark them consumed')
  .option('-f, --follow', 'Keep polling for new events')
  .option('-i, --interval <ms>', 'Poll interval when following', '1000')
  .action(action(async (options: { follow?: boolean; interval: string }) => {
    const interval = Number(options.interval);
    if (!Number.isInteger(interval) || interval < 100) {
      throw new InvalidInputError('--interval must be an integer >= 100');
    }

    let stopped = false;
    process.once('SIGINT', () => {
      stopped = true;
    });

    do {
      for (const event of pollUnconsumed('broadcast')) {
        console.log(JSON.stringify({ id: event.id, type: event.type, created_at: event.created_at, payload: event.payload }));
        markConsumed(event.id, 'broadcast');
      }
      if (options.follow && !stopped) {
        await new Promise(resolve => setTimeout(resolve, interval));
      }
    } while (options.follow && !stopped);
  }));

program
  .command('prune-events')
  .description('Delete events every consumer has processed')
  .option('--older-than-days <days>', 'Only events older than this', '7')
  .action(action((options: { olderThanDays: string }) => {
    const days = Number(options.olderThanDays);
    if (!Number.isFinite(days) || days < 0) {
      throw new InvalidInputError('--older-than-days must be a non-negative number');
    }
    const cutoff = new Date(Date.now() - days * 24 * 60 * 60 * 1000).toISOString();
    console.log(`Deleted ${pruneConsumed(cutoff)} event(s)`);
  }));

program
  .command('serve')
  .description('Run the dispatch loop until interrupted')
  .action(action(async () => {
    const dispatcher = new Dispatcher({
      launcher: new ClaudeWorkerLauncher(),
      workspaces: new WorkspaceManager(),
    });
    await dispatcher.start();
    log.info(`Database: ${CONFIG.databasePath}`);

    const shutdown = (signal: string) => {
      log.info(`${signal} received, waiting for ${dispatcher.pending} worker(s)`);
      dispatcher.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  }));

program
  .command('mcp')
  .description('Serve the board tools over stdio (started by workers)')
  .option('-t, --task-id <id>', 'Task the calling worker is running')
  .action(action(async (options: { taskId?: string }) => {
    await runBoardServer({ taskId: options.taskId ?? null });
  }));

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
