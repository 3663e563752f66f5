import type { WorkerRole } from '../db/types.js';

export interface LaunchRequest {
  taskId: string;
  runId: string;
  role: WorkerRole;
  model: string;
  prompt: string;
  cwd: string;
  /** Session to resume, when the task already has one. */
  sessionId: string | null;
}

export interface WorkerExit {
  exitCode: number;
  error: string | null;
  sessionId: string | null;
}

export interface WorkerHandle {
  exited: Promise<WorkerExit>;
}

export interface LaunchCallbacks {
  onSessionId?: (sessionId: string) => void;
}

export interface WorkerLauncher {
  launch(request: LaunchRequest, callbacks?: LaunchCallbacks): Promise<WorkerHandle>;
}
