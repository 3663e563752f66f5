import type { Comment, TaskView } from '../db/types.js';
import type { LinkedTask } from '../db/dependencies.js';

export interface PromptContext {
  task: TaskView;
  comments: Comment[];
  systemPrompt: string;
  workspace: { path: string; branch: string };
  /** Finished predecessors whose results the worker builds on. */
  predecessors?: LinkedTask[];
}

/**
 * Assembles the prompt a worker starts with: its role instructions, the task
 * itself, then the comment thread oldest first. Empty sections are left out.
 */
export function buildPrompt(context: PromptContext): string {
  const { task, comments, systemPrompt, workspace, predecessors = [] } = context;
  const sections: string[] = [];

  sections.push(`<system_prompt>\n${systemPrompt}\n</system_prompt>`);

  const issue = [
    `Task ID: ${task.id}`,
    `Project ID: ${task.project_id}`,
    `Parent Task ID: ${task.parent_task_id ?? ''}`,
    `Kind: ${task.kind}`,
    `Title: ${task.title}`,
    `Description: ${task.description}`,
    `Step: ${task.step_name}`,
    `Branch: ${workspace.branch}`,
    `Worktree: ${workspace.path}`,
  ];
  sections.push(`<issue>\n${issue.join('\n')}\n</issue>`);

  const done = predecessors.filter(p => p.done);
  if (done.length > 0) {
    const lines = done.map(p => `- ${p.title} (${p.task_id})`);
    sections.push(`<depends_on>\n${lines.join('\n')}\n</depends_on>`);
  }

  if (comments.length > 0) {
    const lines = comments.map(c => `[${c.author_role}] ${c.created_at}: ${c.content}`);
    sections.push(`<comments>\n${lines.join('\n')}\n</comments>`);
  }

  return sections.join('\n\n');
}
