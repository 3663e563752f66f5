import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { buildPrompt } from '../../../src/runner/context.js';
import { loadRolePrompt } from '../../../src/runner/prompts.js';
import { createTask } from '../../../src/db/tasks.js';
import { addComment, getComments } from '../../../src/db/comments.js';
import { addDependency, getPredecessors } from '../../../src/db/dependencies.js';
import { completeTask } from '../../../src/workflow/operations.js';
import { WorkerLaunchError } from '../../../src/errors.js';
import { makeProject, resetDb, type Fixture } from '../helpers.js';

describe('buildPrompt', () => {
  let fx: Fixture;

  beforeEach(() => {
    resetDb();
    fx = makeProject();
  });

  const workspace = { path: '/wt/p/t', branch: 'task-abc' };

  it('renders the role prompt and the task, leaving out empty sections', () => {
    const task = createTask({ project_id: fx.project.id, title: 'Add login', description: 'Use sessions' });
    const prompt = buildPrompt({ task, comments: [], systemPrompt: 'Be a coder.', workspace });

    expect(prompt).toBe(
      [
        '<system_prompt>\nBe a coder.\n</system_prompt>',
        [
          '<issue>',
          `Task ID: ${task.id}`,
          `Project ID: ${fx.project.id}`,
          'Parent Task ID: ',
          'Kind: unit',
          'Title: Add login',
          'Description: Use sessions',
          'Step: Plan',
          'Branch: task-abc',
          'Worktree: /wt/p/t',
          '</issue>',
        ].join('\n'),
      ].join('\n\n')
    );
  });

  it('appends finished predecessors and the comment thread in order', () => {
    const before = createTask({ project_id: fx.project.id, title: 'Schema' });
    const task = createTask({ project_id: fx.project.id, title: 'API' });
    addDependency(before.id, task.id);
    completeTask(before.id);

    const first = addComment(task.id, 'human', 'Please keep it small');
    const second = addComment(task.id, 'reviewer', 'Missing tests');

    const prompt = buildPrompt({
      task,
      comments: getComments(task.id),
      systemPrompt: 'x',
      workspace,
      predecessors: getPredecessors(task.id),
    });

    expect(prompt.endsWith(
      [
        '<depends_on>',
        `- Schema (${before.id})`,
        '</depends_on>',
        '',
        '<comments>',
        `[human] ${first.created_at}: Please keep it small`,
        `[reviewer] ${second.created_at}: Missing tests`,
        '</comments>',
      ].join('\n')
    )).toBe(true);
  });
});

describe('loadRolePrompt', () => {
  it('reads <role>.md from the prompts directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'prompts-'));
    await writeFile(join(dir, 'reviewer.md'), '  Review carefully.\n');
    expect(await loadRolePrompt('reviewer', dir)).toBe('Review carefully.');
  });

  it('fails the launch when the file is missing', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'prompts-'));
    await expect(loadRolePrompt('planner', dir)).rejects.toThrow(WorkerLaunchError);
  });

  it('ships a prompt for every role', async () => {
    for (const role of ['planner', 'coder', 'reviewer', 'researcher', 'orchestrator'] as const) {
      expect((await loadRolePrompt(role)).length).toBeGreaterThan(0);
    }
  });
});
