import { beforeEach, describe, expect, it } from 'vitest';
import {
  emitEvent,
  getEvent,
  markConsumed,
  pollUnconsumed,
  pruneConsumed,
} from '../../../src/db/events.js';
import { withTransaction } from '../../../src/db/client.js';
import { createTask, getTasksByProject } from '../../../src/db/tasks.js';
import { makeProject, resetDb, type Fixture } from '../helpers.js';

describe('event outbox', () => {
  let fx: Fixture;

  beforeEach(() => {
    resetDb();
    fx = makeProject();
  });

  it('keeps consumer flags independent', () => {
    const task = createTask({ project_id: fx.project.id, title: 'A' });
    const created = pollUnconsumed('broadcast').find(e => e.type === 'task_created');
    expect(created?.payload).toEqual({ task });
    if (!created) return;

    expect(markConsumed(created.id, 'broadcast')).toBe(true);
    expect(pollUnconsumed('broadcast').map(e => e.id)).not.toContain(created.id);
    expect(pollUnconsumed('dispatch').map(e => e.id)).toContain(created.id);

    expect(markConsumed(created.id, 'dispatch')).toBe(true);
    expect(getEvent(created.id)).toMatchObject({ broadcast_consumed: true, dispatch_consumed: true });
  });

  it('is idempotent and reports unknown events', () => {
    const event = emitEvent('run_started', {
      run: {
        id: 'run-1',
        task_id: 'task-1',
        step_id: 'step-1',
        started_at: '2024-01-01T00:00:00.000Z',
        completed_at: null,
        exit_code: null,
        error: null,
      },
    });
    expect(markConsumed(event.id, 'dispatch')).toBe(true);
    expect(markConsumed(event.id, 'dispatch')).toBe(true);
    expect(markConsumed('nope', 'dispatch')).toBe(false);
  });

  it('returns events in creation order', () => {
    const titles = ['one', 'two', 'three', 'four'];
    titles.forEach(title => createTask({ project_id: fx.project.id, title }));

    const seen = pollUnconsumed('dispatch').flatMap(e => (e.type === 'task_created' ? [e.payload.task.title] : []));
    expect(seen).toEqual(titles);
  });

  it('rolls the mutation back with its event', () => {
    expect(() =>
      withTransaction(() => {
        createTask({ project_id: fx.project.id, title: 'doomed' });
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(getTasksByProject(fx.project.id)).toEqual([]);
    expect(pollUnconsumed('dispatch').map(e => e.type)).toEqual(['project_created']);
  });

  it('prunes only events every consumer has processed', () => {
    createTask({ project_id: fx.project.id, title: 'A' });
    const [projectEvent, taskEvent] = pollUnconsumed('dispatch');
    markConsumed(projectEvent.id, 'dispatch');
    markConsumed(projectEvent.id, 'broadcast');
    markConsumed(taskEvent.id, 'dispatch');

    expect(pruneConsumed('9999-01-01T00:00:00.000Z')).toBe(1);
    expect(getEvent(projectEvent.id)).toBeNull();
    expect(getEvent(taskEvent.id)).not.toBeNull();
  });
});
