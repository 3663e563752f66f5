import type { RunResult } from './pty-runner.js';

export interface ClaudeArgsOptions {
  model: string;
  mcpConfigPath: string;
  prompt: string;
  sessionId?: string | null;
}

export function buildClaudeArgs(options: ClaudeArgsOptions): string[] {
  const args = [
    '--dangerously-skip-permissions',
    '--output-format', 'stream-json',
    '--verbose',
    '--model', options.model,
    '--mcp-config', options.mcpConfigPath,
    '--strict-mcp-config',
  ];
  if (options.sessionId) {
    args.push('--resume', options.sessionId);
  }
  args.push('-p', options.prompt);
  return args;
}

export interface McpServerEntry {
  command: string;
  args: string[];
  env: Record<string, string>;
}

/**
 * Points the worker's tool server back at this CLI, scoped to one task and
 * sharing the coordinator's database file.
 */
export function buildMcpConfig(options: {
  taskId: string;
  databasePath: string;
  command?: string;
  entryArgs?: string[];
}): { mcpServers: Record<string, McpServerEntry> } {
  const command = options.command ?? process.execPath;
  const entryArgs = options.entryArgs ?? [...process.execArgv, process.argv[1] ?? ''];
  return {
    mcpServers: {
      taskflow: {
        command,
        args: [...entryArgs, 'mcp', '--task-id', options.taskId],
        env: { DATABASE_PATH: options.databasePath },
      },
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Session id from a stream-json `system/init` line, else null. */
export function extractSessionId(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;

  let message: unknown;
  try {
    message = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(message)) return null;
  if (message.type !== 'system' || message.subtype !== 'init') return null;
  return typeof message.session_id === 'string' && message.session_id ? message.session_id : null;
}

/** Reassembles terminal output chunks into complete lines. */
export class LineSplitter {
  private pending = '';

  push(chunk: string): string[] {
    const parts = (this.pending + chunk).split(/\r?\n/);
    this.pending = parts.pop() ?? '';
    return parts.filter(line => line.length > 0);
  }

  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    return rest ? [rest] : [];
  }
}

/** Nested CLI sessions misbehave when they inherit the parent's CLAUDE* variables. */
export function workerEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const clean: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && !key.startsWith('CLAUDE')) {
      clean[key] = value;
    }
  }
  return clean;
}

export function describeFailure(result: RunResult, inactivityTimeoutMs: number): string | null {
  if (result.timedOut) {
    return `worker timed out after ${inactivityTimeoutMs}ms of inactivity`;
  }
  if (result.exitCode === 0) return null;
  const tail = result.tail.trim().slice(-500);
  return tail || `worker exited with code ${result.exitCode}`;
}
