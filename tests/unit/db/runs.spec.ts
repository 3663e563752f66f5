import { beforeEach, describe, expect, it } from 'vitest';
import {
  completeRun,
  countActiveRuns,
  failRun,
  getActiveRun,
  getRunsByTask,
  recoverInterruptedRuns,
  startRun,
} from '../../../src/db/runs.js';
import { addComment, getComments } from '../../../src/db/comments.js';
import { createTask } from '../../../src/db/tasks.js';
import { pollUnconsumed } from '../../../src/db/events.js';
import { InvalidInputError, NotFoundError } from '../../../src/errors.js';
import { makeProject, resetDb, type Fixture } from '../helpers.js';

describe('run recorder', () => {
  let fx: Fixture;

  beforeEach(() => {
    resetDb();
    fx = makeProject();
  });

  it('tracks active runs and closes them once', () => {
    const t = createTask({ project_id: fx.project.id, title: 'A' });
    const run = startRun(t.id, fx.step('Build').id);
    expect(getActiveRun(t.id)?.id).toBe(run.id);
    expect(countActiveRuns()).toBe(1);

    const done = completeRun(run.id, 0);
    expect(done).toMatchObject({ exit_code: 0, error: null });
    expect(countActiveRuns()).toBe(0);

    const again = failRun(run.id, 'late failure');
    expect(again).toEqual(done);

    const types = pollUnconsumed('broadcast').map(e => e.type);
    expect(types.filter(type => type === 'run_completed')).toHaveLength(1);
  });

  it('fails every run left open', () => {
    const a = createTask({ project_id: fx.project.id, title: 'A' });
    const b = createTask({ project_id: fx.project.id, title: 'B' });
    startRun(a.id, fx.step('Build').id);
    startRun(b.id, fx.step('Build').id);

    const recovered = recoverInterruptedRuns();
    expect(recovered.map(r => [r.exit_code, r.error])).toEqual([
      [-1, 'interrupted: coordinator restarted'],
      [-1, 'interrupted: coordinator restarted'],
    ]);
    expect(countActiveRuns()).toBe(0);
    expect(getRunsByTask(a.id)).toHaveLength(1);
  });

  it('rejects completing an unknown run', () => {
    expect(() => completeRun('missing', 0)).toThrow(NotFoundError);
  });
});

describe('comments', () => {
  beforeEach(() => {
    resetDb();
  });

  it('appends to the thread and validates the author role', () => {
    const fx = makeProject();
    const t = createTask({ project_id: fx.project.id, title: 'A' });

    addComment(t.id, 'planner', 'split it');
    addComment(t.id, 'human', 'ok');
    expect(getComments(t.id).map(c => `${c.author_role}: ${c.content}`)).toEqual(['planner: split it', 'human: ok']);

    expect(() => addComment(t.id, 'robot', 'hi')).toThrow(InvalidInputError);
    expect(() => addComment(t.id, 'human', '   ')).toThrow('Comment content is required');
    expect(() => addComment('missing', 'human', 'hi')).toThrow(NotFoundError);
  });
});
