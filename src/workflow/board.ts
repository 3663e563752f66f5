import { requireProject, getWorkflowSteps, requireStep } from '../db/projects.js';
import { getTasksByProject, requireTask } from '../db/tasks.js';
import { getDependencies, getProjectDependencies, isBlocked, type LinkedTask } from '../db/dependencies.js';
import { getComments } from '../db/comments.js';
import { getActiveRun, getRunsByTask } from '../db/runs.js';
import type { AgentRun, Comment, Dependency, Project, TaskView, WorkflowStep } from '../db/types.js';

export interface BoardTask extends TaskView {
  blocked: boolean;
  has_active_run: boolean;
}

export interface BoardColumn {
  step: WorkflowStep;
  tasks: BoardTask[];
}

export interface Board {
  project: Project;
  columns: BoardColumn[];
  cancelled: BoardTask[];
  dependencies: Dependency[];
}

export interface TaskDetail {
  task: BoardTask;
  step: WorkflowStep;
  comments: Comment[];
  predecessors: LinkedTask[];
  successors: LinkedTask[];
  runs: AgentRun[];
}

function annotate(task: TaskView): BoardTask {
  return {
    ...task,
    blocked: isBlocked(task.id),
    has_active_run: getActiveRun(task.id) !== null,
  };
}

export function getBoard(projectId: string): Board {
  const project = requireProject(projectId);
  const tasks = getTasksByProject(projectId).map(annotate);

  const columns = getWorkflowSteps(projectId).map(step => ({
    step,
    tasks: tasks.filter(t => !t.cancelled && t.step_id === step.id),
  }));

  return {
    project,
    columns,
    cancelled: tasks.filter(t => t.cancelled),
    dependencies: getProjectDependencies(projectId),
  };
}

export function getTaskDetail(taskId: string): TaskDetail {
  const task = annotate(requireTask(taskId));
  const { predecessors, successors } = getDependencies(taskId);
  return {
    task,
    step: requireStep(task.step_id),
    comments: getComments(taskId),
    predecessors,
    successors,
    runs: getRunsByTask(taskId),
  };
}
