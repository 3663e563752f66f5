import * as pty from 'node-pty';
import { CONFIG } from '../utils/config.js';

export interface RunResult {
  exitCode: number | null;
  timedOut: boolean;
  duration: number;
  /** Last few KB of output, for error reports. */
  tail: string;
}

export interface RunOptions {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
  inactivityTimeoutMs?: number;
  onOutput?: (data: string) => void;
}

export interface RunningCommand {
  pid: number;
  result: Promise<RunResult>;
}

const TAIL_LIMIT = 4000;

export function runCommand(options: RunOptions): RunningCommand {
  const {
    command,
    args,
    cwd,
    env = {},
    inactivityTimeoutMs = CONFIG.inactivityTimeoutMs,
    onOutput,
  } = options;

  const startTime = Date.now();
  let lastActivityTime = Date.now();
  let timedOut = false;
  let tail = '';

  const ptyProcess = pty.spawn(command, args, {
    name: 'xterm-256color',
    cols: 200,
    rows: 50,
    cwd,
    env: { ...env, TERM: 'xterm-256color' },
  });

  const result = new Promise<RunResult>((resolve) => {
    const inactivityTimer = inactivityTimeoutMs > 0
      ? setInterval(() => {
          if (Date.now() - lastActivityTime > inactivityTimeoutMs) {
            timedOut = true;
            ptyProcess.kill();
          }
        }, 1000)
      : null;

    ptyProcess.onData((data) => {
      lastActivityTime = Date.now();
      tail = (tail + data).slice(-TAIL_LIMIT);
      onOutput?.(data);
    });

    ptyProcess.onExit(({ exitCode }) => {
      if (inactivityTimer) clearInterval(inactivityTimer);
      resolve({
        exitCode,
        timedOut,
        duration: Date.now() - startTime,
        tail,
      });
    });
  });

  return {
    pid: ptyProcess.pid,
    result,
  };
}
