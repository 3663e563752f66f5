import { getDb } from './client.js';

export function initializeSchema(): void {
  const db = getDb();

  db.exec(`
    CREATE TABLE IF NOT EXISTS projects (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'cancelled')),
      repo_path TEXT,
      base_branch TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS workflow_steps (
      id TEXT PRIMARY KEY,
      project_id TEXT NOT NULL,
      name TEXT NOT NULL,
      position INTEGER NOT NULL,
      dispatchable INTEGER NOT NULL DEFAULT 0,
      role TEXT,
      model TEXT,
      created_at TEXT NOT NULL,
      FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE,
      UNIQUE (project_id, position),
      UNIQUE (project_id, name)
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      project_id TEXT NOT NULL,
      parent_task_id TEXT,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      kind TEXT NOT NULL DEFAULT 'unit' CHECK (kind IN ('unit', 'research', 'milestone')),
      step_id TEXT NOT NULL,
      cancelled INTEGER NOT NULL DEFAULT 0,
      plan_approved INTEGER NOT NULL DEFAULT 0,
      fan_in INTEGER NOT NULL DEFAULT 0,
      worktree_path TEXT,
      branch TEXT,
      session_id TEXT,
      output TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE,
      FOREIGN KEY (parent_task_id) REFERENCES tasks(id) ON DELETE CASCADE,
      FOREIGN KEY (step_id) REFERENCES workflow_steps(id)
    );

    CREATE TABLE IF NOT EXISTS task_dependencies (
      id TEXT PRIMARY KEY,
      predecessor_id TEXT NOT NULL,
      successor_id TEXT NOT NULL,
      created_at TEXT NOT NULL,
      FOREIGN KEY (predecessor_id) REFERENCES tasks(id) ON DELETE CASCADE,
      FOREIGN KEY (successor_id) REFERENCES tasks(id) ON DELETE CASCADE,
      UNIQUE (predecessor_id, successor_id),
      CHECK (predecessor_id <> successor_id)
    );

    CREATE TABLE IF NOT EXISTS comments (
      id TEXT PRIMARY KEY,
      task_id TEXT NOT NULL,
      author_role TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL,
      FOREIGN KEY (task_id) REFERENCES tasks(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS agent_runs (
      id TEXT PRIMARY KEY,
      task_id TEXT NOT NULL,
      step_id TEXT NOT NULL,
      started_at TEXT NOT NULL,
      completed_at TEXT,
      exit_code INTEGER,
      error TEXT,
      FOREIGN KEY (task_id) REFERENCES tasks(id) ON DELETE CASCADE,
      FOREIGN KEY (step_id) REFERENCES workflow_steps(id)
    );

    CREATE TABLE IF NOT EXISTS events (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      payload TEXT NOT NULL,
      created_at TEXT NOT NULL,
      broadcast_consumed INTEGER NOT NULL DEFAULT 0,
      dispatch_consumed INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_steps_project ON workflow_steps(project_id, position);
    CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks(project_id);
    CREATE INDEX IF NOT EXISTS idx_tasks_parent ON tasks(parent_task_id);
    CREATE INDEX IF NOT EXISTS idx_tasks_step ON tasks(step_id);
    CREATE INDEX IF NOT EXISTS idx_deps_successor ON task_dependencies(successor_id);
    CREATE INDEX IF NOT EXISTS idx_comments_task ON comments(task_id, created_at);
    CREATE INDEX IF NOT EXISTS idx_runs_task ON agent_runs(task_id);
    CREATE INDEX IF NOT EXISTS idx_runs_active ON agent_runs(completed_at) WHERE completed_at IS NULL;
    CREATE INDEX IF NOT EXISTS idx_events_broadcast ON events(broadcast_consumed, created_at);
    CREATE INDEX IF NOT EXISTS idx_events_dispatch ON events(dispatch_consumed, created_at);

    -- At most one live synchronization task per parent
    CREATE UNIQUE INDEX IF NOT EXISTS idx_tasks_single_fan_in
      ON tasks(parent_task_id) WHERE fan_in = 1 AND cancelled = 0;
  `);
}
