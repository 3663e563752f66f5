import { execFile } from 'child_process';
import { promisify } from 'util';
import { WorkerLaunchError } from '../errors.js';

const execFileAsync = promisify(execFile);

async function git(cwd: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd, encoding: 'utf-8' });
    return stdout.trim();
  } catch (err) {
    const stderr = err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
    const reason = stderr || (err instanceof Error ? err.message : String(err));
    throw new WorkerLaunchError(`git ${args[0]} failed in ${cwd}: ${reason}`);
  }
}

async function tryGit(cwd: string, args: string[]): Promise<string | null> {
  return git(cwd, args).catch(() => null);
}

export async function isGitRepo(cwd: string): Promise<boolean> {
  return (await tryGit(cwd, ['rev-parse', '--is-inside-work-tree'])) === 'true';
}

export async function branchExists(cwd: string, branch: string): Promise<boolean> {
  return (await tryGit(cwd, ['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`])) !== null;
}

/** Remote default branch, else main or master if present locally, else main. */
export async function detectDefaultBranch(cwd: string): Promise<string> {
  const ref = await tryGit(cwd, ['symbolic-ref', 'refs/remotes/origin/HEAD']);
  const remoteDefault = ref?.split('/').pop();
  if (remoteDefault) return remoteDefault;

  for (const candidate of ['main', 'master']) {
    if (await branchExists(cwd, candidate)) return candidate;
  }
  return 'main';
}


export async function addWorktree(repoPath: string, path: string, branch: string, base: string): Promise<void> {
  await git(repoPath, ['worktree', 'add', '-b', branch, path, base]);
}

export async function removeWorktree(repoPath: string, path: string): Promise<void> {
  await git(repoPath, ['worktree', 'remove', '--force', path]);
}

export async function deleteBranch(repoPath: string, branch: string): Promise<void> {
  await git(repoPath, ['branch', '-D', branch]);
}

export async function pruneWorktrees(repoPath: string): Promise<void> {
  await git(repoPath, ['worktree', 'prune']);
}
