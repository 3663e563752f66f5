import { mkdir, stat } from 'fs/promises';
import { dirname, join } from 'path';
import { CONFIG } from '../utils/config.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { WorkerLaunchError } from '../errors.js';
import { getProject, getTerminalStep } from '../db/projects.js';
import { clearTaskWorkspace, getTask, setTaskSession, setTaskWorkspace } from '../db/tasks.js';
import { getActiveRun } from '../db/runs.js';
import type { TaskView } from '../db/types.js';
import {
  addWorktree,
  deleteBranch,
  isGitRepo,
  pruneWorktrees,
  removeWorktree,
} from '../git/operations.js';

const log = createLogger('workspace');

export interface WorktreeBackend {
  exists(path: string): Promise<boolean>;
  create(repoPath: string, path: string, branch: string, baseBranch: string): Promise<void>;
  remove(repoPath: string, path: string, branch: string): Promise<void>;
  prune(repoPath: string): Promise<void>;
}

export class GitWorktreeBackend implements WorktreeBackend {
  /** A linked worktree is a directory whose `.git` is a file, not a directory. */
  async exists(path: string): Promise<boolean> {
    try {
      const [dir, gitFile] = await Promise.all([stat(path), stat(join(path, '.git'))]);
      return dir.isDirectory() && gitFile.isFile();
    } catch {
      return false;
    }
  }

  async create(repoPath: string, path: string, branch: string, baseBranch: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await addWorktree(repoPath, path, branch, baseBranch);
  }

  async remove(repoPath: string, path: string, branch: string): Promise<void> {
    if (await this.exists(path)) {
      await removeWorktree(repoPath, path);
    }
    try {
      await deleteBranch(repoPath, branch);
    } catch (err) {
      log.debug(`Branch ${branch} was not deleted: ${errorMessage(err)}`);
    }
  }

  async prune(repoPath: string): Promise<void> {
    if (await isGitRepo(repoPath)) {
      await pruneWorktrees(repoPath);
    }
  }
}

export interface Workspace {
  path: string;
  branch: string;
}

export interface RepositoryTarget {
  repoPath: string;
  baseBranch: string;
}

export interface WorkspaceManagerOptions {
  worktreesPath?: string;
  repoPath?: string | null;
  baseBranch?: string;
  clock?: () => number;
}

export function branchName(taskId: string, timestampMs: number): string {
  return `task-${taskId.slice(0, 8)}-${Math.floor(timestampMs / 1000)}`;
}

/**
 * Owns the per-task worktree and the worker session bound to it. The board
 * row is the record of what exists on disk; the backend does the git work.
 */
export class WorkspaceManager {
  private readonly worktreesPath: string;
  private readonly repoPath: string | null;
  private readonly baseBranch: string;
  private readonly clock: () => number;

  constructor(
    private readonly backend: WorktreeBackend = new GitWorktreeBackend(),
    options: WorkspaceManagerOptions = {}
  ) {
    this.worktreesPath = options.worktreesPath ?? CONFIG.worktreesPath;
    this.repoPath = options.repoPath === undefined ? CONFIG.repoPath : options.repoPath;
    this.baseBranch = options.baseBranch ?? CONFIG.baseBranch;
    this.clock = options.clock ?? Date.now;
  }

  resolveRepository(projectId: string): RepositoryTarget {
    const project = getProject(projectId);
    const repoPath = project?.repo_path ?? this.repoPath;
    if (!repoPath) {
      throw new WorkerLaunchError(`No repository configured for project ${projectId}; set REPO_PATH`);
    }
    return { repoPath, baseBranch: project?.base_branch ?? this.baseBranch };
  }

  workspacePath(task: Pick<TaskView, 'id' | 'project_id'>): string {
    return join(this.worktreesPath, task.project_id, task.id);
  }

  async ensureWorkspace(task: TaskView): Promise<Workspace> {
    if (task.worktree_path && task.branch && (await this.backend.exists(task.worktree_path))) {
      return { path: task.worktree_path, branch: task.branch };
    }

    const { repoPath, baseBranch } = this.resolveRepository(task.project_id);
    if (task.worktree_path && task.branch) {
      // The recorded worktree is gone; free its branch before creating another
      await this.backend.remove(repoPath, task.worktree_path, task.branch);
      log.warn(`Worktree ${task.worktree_path} of task ${task.id} vanished; recreating it`);
    }
    const path = this.workspacePath(task);
    const branch = branchName(task.id, this.clock());

    await this.backend.create(repoPath, path, branch, baseBranch);
    setTaskWorkspace(task.id, path, branch);
    log.info(`Created worktree for task ${task.id} at ${path} on ${branch}`);
    return { path, branch };
  }

  resumeHandle(task: TaskView): string | null {
    return task.session_id;
  }

  /** Persists the session handle; returns false when it was already stored. */
  recordSession(taskId: string, sessionId: string): boolean {
    const task = getTask(taskId);
    if (!task || task.session_id === sessionId) return false;
    setTaskSession(taskId, sessionId);
    log.info(`Recorded session ${sessionId} for task ${taskId}`);
    return true;
  }

  /**
   * Removes the worktree and branch of a finished or cancelled task. Refuses
   * while a run is still active.
   */
  async teardown(taskId: string): Promise<boolean> {
    const task = getTask(taskId);
    if (!task || !task.worktree_path || !task.branch) return false;

    const terminal = getTerminalStep(task.project_id);
    if (task.step_id !== terminal.id && !task.cancelled) {
      log.warn(`Not tearing down task ${taskId}: it is neither done nor cancelled`);
      return false;
    }
    if (getActiveRun(taskId)) {
      log.warn(`Not tearing down task ${taskId}: a run is still active`);
      return false;
    }

    const { repoPath } = this.resolveRepository(task.project_id);
    await this.backend.remove(repoPath, task.worktree_path, task.branch);
    clearTaskWorkspace(taskId);
    log.info(`Removed worktree for task ${taskId}`);
    return true;
  }

  async prune(): Promise<void> {
    if (!this.repoPath) return;
    await this.backend.prune(this.repoPath);
  }
}
