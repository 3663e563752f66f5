import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CONFIG } from '../utils/config.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { WorkerLaunchError } from '../errors.js';
import { runCommand, type RunningCommand } from './pty-runner.js';
import {
  buildClaudeArgs,
  buildMcpConfig,
  describeFailure,
  extractSessionId,
  LineSplitter,
  workerEnv,
} from './claude.js';
import type { LaunchCallbacks, LaunchRequest, WorkerExit, WorkerHandle, WorkerLauncher } from './worker.js';

const log = createLogger('launcher');

export interface ClaudeLauncherOptions {
  claudePath?: string;
  inactivityTimeoutMs?: number;
  databasePath?: string;
}

/** Runs the `claude` CLI in a pseudo-terminal, one process per run. */
export class ClaudeWorkerLauncher implements WorkerLauncher {
  private readonly claudePath: string;
  private readonly inactivityTimeoutMs: number;
  private readonly databasePath: string;

  constructor(options: ClaudeLauncherOptions = {}) {
    this.claudePath = options.claudePath ?? CONFIG.claudeCodePath;
    this.inactivityTimeoutMs = options.inactivityTimeoutMs ?? CONFIG.inactivityTimeoutMs;
    this.databasePath = options.databasePath ?? CONFIG.databasePath;
  }

  async launch(request: LaunchRequest, callbacks: LaunchCallbacks = {}): Promise<WorkerHandle> {
    const configDir = await mkdtemp(join(tmpdir(), 'taskflow-mcp-'));
    const mcpConfigPath = join(configDir, 'mcp.json');
    await writeFile(
      mcpConfigPath,
      JSON.stringify(buildMcpConfig({ taskId: request.taskId, databasePath: this.databasePath }), null, 2)
    );

    const splitter = new LineSplitter();
    let sessionId = request.sessionId;

    const onLine = (line: string) => {
      const reported = extractSessionId(line);
      if (!reported || reported === sessionId) return;
      sessionId = reported;
      log.info(`Run ${request.runId} for task ${request.taskId} is in session ${reported}`);
      try {
        callbacks.onSessionId?.(reported);
      } catch (err) {
        log.error(`Could not record session for run ${request.runId}: ${errorMessage(err)}`);
      }
    };

    let running: RunningCommand;
    try {
      running = runCommand({
        command: this.claudePath,
        args: buildClaudeArgs({
          model: request.model,
          mcpConfigPath,
          prompt: request.prompt,
          sessionId: request.sessionId,
        }),
        cwd: request.cwd,
        env: workerEnv(process.env),
        inactivityTimeoutMs: this.inactivityTimeoutMs,
        onOutput: (data) => splitter.push(data).forEach(onLine),
      });
    } catch (err) {
      await rm(configDir, { recursive: true, force: true });
      throw new WorkerLaunchError(`Could not start ${this.claudePath}: ${errorMessage(err)}`);
    }

    log.info(`Started ${request.role} worker for task ${request.taskId}, run ${request.runId} (pid ${running.pid})`);

    const exited = running.result
      .then((result): WorkerExit => {
        splitter.flush().forEach(onLine);
        return {
          exitCode: result.exitCode ?? -1,
          error: describeFailure(result, this.inactivityTimeoutMs),
          sessionId,
        };
      })
      .finally(() => rm(configDir, { recursive: true, force: true }));

    return { exited };
  }
}
