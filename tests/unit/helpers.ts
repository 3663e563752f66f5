import { closeDb } from '../../src/db/client.js';
import { initializeSchema } from '../../src/db/schema.js';
import { createProject, type StepInput } from '../../src/db/projects.js';
import type { Project, WorkflowStep } from '../../src/db/types.js';
import type { WorktreeBackend } from '../../src/workspace/manager.js';
import type {
  LaunchCallbacks,
  LaunchRequest,
  WorkerExit,
  WorkerHandle,
  WorkerLauncher,
} from '../../src/runner/worker.js';

export function resetDb(): void {
  closeDb();
  initializeSchema();
}

export const DEFAULT_STEPS: StepInput[] = [
  { name: 'Plan' },
  { name: 'Build', dispatchable: true, role: 'coder' },
  { name: 'Review' },
  { name: 'Done' },
];

export interface Fixture {
  project: Project;
  steps: WorkflowStep[];
  step(name: string): WorkflowStep;
}

export function makeProject(steps: StepInput[] = DEFAULT_STEPS, repoPath: string | null = '/repo'): Fixture {
  const created = createProject({ title: 'Demo', steps, repo_path: repoPath });
  return {
    ...created,
    step(name: string): WorkflowStep {
      const found = created.steps.find(s => s.name === name);
      if (!found) throw new Error(`No step named ${name}`);
      return found;
    },
  };
}

export class FakeWorktreeBackend implements WorktreeBackend {
  readonly worktrees = new Map<string, string>();
  readonly branches = new Set<string>();
  readonly removed: string[] = [];
  readonly deletedBranches: string[] = [];
  pruned = 0;

  async exists(path: string): Promise<boolean> {
    return this.worktrees.has(path);
  }

  async create(_repoPath: string, path: string, branch: string): Promise<void> {
    if (this.branches.has(branch)) {
      throw new Error(`a branch named '${branch}' already exists`);
    }
    this.branches.add(branch);
    this.worktrees.set(path, branch);
  }

  async remove(_repoPath: string, path: string, branch: string): Promise<void> {
    this.worktrees.delete(path);
    this.removed.push(path);
    this.branches.delete(branch);
    this.deletedBranches.push(branch);
  }

  async prune(): Promise<void> {
    this.pruned++;
  }
}

interface PendingWorker {
  request: LaunchRequest;
  callbacks: LaunchCallbacks;
  finish(exit: Partial<WorkerExit>): void;
}

/** Launches nothing; each "worker" stays alive until the test finishes it. */
export class FakeLauncher implements WorkerLauncher {
  readonly launched: PendingWorker[] = [];
  failWith: Error | null = null;

  async launch(request: LaunchRequest, callbacks: LaunchCallbacks = {}): Promise<WorkerHandle> {
    if (this.failWith) throw this.failWith;

    let resolveExit: (exit: WorkerExit) => void = () => undefined;
    const exited = new Promise<WorkerExit>((resolve) => {
      resolveExit = resolve;
    });
    this.launched.push({
      request,
      callbacks,
      finish: (exit) => resolveExit({ exitCode: 0, error: null, sessionId: request.sessionId, ...exit }),
    });
    return { exited };
  }

  last(): PendingWorker {
    const worker = this.launched[this.launched.length - 1];
    if (!worker) throw new Error('No worker launched');
    return worker;
  }
}

/** Lets pending promise callbacks run. */
export async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await new Promise(resolve => setImmediate(resolve));
  }
}
