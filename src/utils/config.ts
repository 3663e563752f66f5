import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(__dirname, '../..');

config({ path: resolve(projectRoot, '.env') });

export function readInt(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readPath(name: string, fallback: string): string {
  const raw = process.env[name];
  if (!raw) return fallback;
  // ':memory:' is a SQLite pseudo-path, not a file
  return raw === ':memory:' ? raw : resolve(projectRoot, raw);
}

export const CONFIG = {
  databasePath: readPath('DATABASE_PATH', resolve(projectRoot, 'data/taskflow.db')),
  repoPath: process.env.REPO_PATH ? resolve(projectRoot, process.env.REPO_PATH) : null,
  baseBranch: process.env.BASE_BRANCH || 'main',
  worktreesPath: readPath('WORKTREES_PATH', resolve(projectRoot, 'worktrees')),
  dispatchIntervalMs: readInt('DISPATCH_INTERVAL_MS', 1000, 100),
  maxParallelAgents: readInt('MAX_PARALLEL_AGENTS', 3, 1),
  defaultModel: process.env.DEFAULT_MODEL || 'claude-sonnet-4-5',
  claudeCodePath: process.env.CLAUDE_CODE_PATH || 'claude',
  inactivityTimeoutMs: readInt('INACTIVITY_TIMEOUT_MS', 600000),
  promptsDir: readPath('PROMPTS_DIR', resolve(projectRoot, 'prompts')),
  projectRoot,
} as const;
