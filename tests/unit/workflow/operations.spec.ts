import { beforeEach, describe, expect, it } from 'vitest';
import {
  approvePlan,
  cancelTask,
  completeTask,
  createSubtasks,
  moveTask,
  uncancelTask,
} from '../../../src/workflow/operations.js';
import { createTask, getChildren, requireTask } from '../../../src/db/tasks.js';
import { addDependency, getDependencies, isBlocked } from '../../../src/db/dependencies.js';
import { markConsumed, pollUnconsumed } from '../../../src/db/events.js';
import type { AnyOutboxEvent } from '../../../src/db/types.js';
import { InvalidInputError, InvalidTransitionError, NotFoundError } from '../../../src/errors.js';
import { makeProject, resetDb, type Fixture } from '../helpers.js';

function drainEvents(): AnyOutboxEvent[] {
  const events = pollUnconsumed('broadcast');
  events.forEach(e => markConsumed(e.id, 'broadcast'));
  return events;
}

function readyIds(events: AnyOutboxEvent[]): string[] {
  return events.flatMap(e => (e.type === 'task_ready' ? [e.payload.task.id] : []));
}

describe('board operations', () => {
  let fx: Fixture;

  beforeEach(() => {
    resetDb();
    fx = makeProject();
  });

  function task(title: string, extra: { parent?: string; kind?: string } = {}) {
    return createTask({
      project_id: fx.project.id,
      title,
      parent_task_id: extra.parent,
      kind: extra.kind,
    });
  }

  describe('moveTask', () => {
    it('moves one step forward and emits task_moved', () => {
      const t = task('A');
      drainEvents();

      const moved = moveTask(t.id, fx.step('Build').id);
      expect(moved.step_name).toBe('Build');

      const [event] = drainEvents();
      expect(event.type).toBe('task_moved');
      if (event.type !== 'task_moved') return;
      expect(event.payload.from_step).toEqual({ id: fx.step('Plan').id, name: 'Plan', position: 0 });
      expect(event.payload.to_step).toEqual({ id: fx.step('Build').id, name: 'Build', position: 1 });
      expect(event.payload.direction).toBe('forward');
      expect(event.payload.task.step_name).toBe('Build');
    });

    it('accepts step names and moves backward', () => {
      const t = task('A');
      moveTask(t.id, 'Build');
      moveTask(t.id, 'Review');
      const back = moveTask(t.id, 'Plan');
      expect(back.step_name).toBe('Plan');

      const last = drainEvents().pop();
      expect(last?.type === 'task_moved' && last.payload.direction).toBe('backward');
    });

    it('rejects skips, unknown steps and foreign steps', () => {
      const t = task('A');
      expect(() => moveTask(t.id, 'Review')).toThrow(InvalidTransitionError);
      expect(() => moveTask(t.id, 'Nowhere')).toThrow(NotFoundError);

      const other = makeProject();
      expect(() => moveTask(t.id, other.step('Build').id)).toThrow(InvalidInputError);
      expect(requireTask(t.id).step_name).toBe('Plan');
    });

    it('rejects moving a cancelled task', () => {
      const t = task('A');
      cancelTask(t.id);
      expect(() => moveTask(t.id, 'Build')).toThrow(InvalidTransitionError);
    });
  });

  describe('cancel and uncancel', () => {
    it('keeps the step across cancel and uncancel', () => {
      const t = task('A');
      moveTask(t.id, 'Build');
      drainEvents();

      expect(cancelTask(t.id).cancelled).toBe(true);
      const restored = uncancelTask(t.id);
      expect(restored.cancelled).toBe(false);
      expect(restored.step_name).toBe('Build');
      expect(drainEvents().map(e => e.type)).toEqual(['task_cancelled', 'task_uncancelled']);
    });

    it('validates the current state', () => {
      const t = task('A');
      expect(() => uncancelTask(t.id)).toThrow('Task is not cancelled');
      cancelTask(t.id);
      expect(() => cancelTask(t.id)).toThrow('Task is already cancelled');

      const done = task('B');
      completeTask(done.id);
      expect(() => cancelTask(done.id)).toThrow("Cannot cancel a task in the terminal step 'Done'");
    });

    it('wakes successors that the cancelled task was holding back', () => {
      const a = task('A');
      const b = task('B');
      const c = task('C');
      addDependency(a.id, b.id);
      addDependency(a.id, c.id);
      addDependency(c.id, b.id);
      const d = task('D');
      addDependency(a.id, d.id);
      cancelTask(d.id);
      drainEvents();

      cancelTask(a.id);
      const events = drainEvents();
      expect(events.map(e => e.type)).toEqual(['task_cancelled', 'task_ready']);
      expect(readyIds(events)).toEqual([c.id]);
    });
  });

  describe('completeTask', () => {
    it('jumps to the terminal step and wakes unblocked successors', () => {
      const a = task('A');
      const b = task('B');
      const c = task('C');
      addDependency(a.id, c.id);
      addDependency(b.id, c.id);
      drainEvents();

      completeTask(a.id);
      expect(requireTask(a.id).step_name).toBe('Done');
      expect(readyIds(drainEvents())).toEqual([]);

      completeTask(b.id);
      expect(readyIds(drainEvents())).toEqual([c.id]);
    });

    it('does not wake cancelled successors', () => {
      const a = task('A');
      const b = task('B');
      addDependency(a.id, b.id);
      cancelTask(b.id);
      drainEvents();

      completeTask(a.id);
      expect(readyIds(drainEvents())).toEqual([]);
    });

    it('refuses cancelled and finished tasks', () => {
      const a = task('A');
      completeTask(a.id);
      expect(() => completeTask(a.id)).toThrow("Task is already in the terminal step 'Done'");

      const b = task('B');
      cancelTask(b.id);
      expect(() => completeTask(b.id)).toThrow('Cannot complete a cancelled task');
    });

    it('runs the completion hook when moveTask reaches the terminal step', () => {
      const a = task('A');
      const b = task('B');
      addDependency(a.id, b.id);
      moveTask(a.id, 'Build');
      moveTask(a.id, 'Review');
      drainEvents();

      moveTask(a.id, 'Done');
      expect(readyIds(drainEvents())).toEqual([b.id]);
    });
  });

  describe('milestones', () => {
    it('approves a plan and readies its unblocked children', () => {
      const milestone = task('M', { kind: 'milestone' });
      const first = task('first', { parent: milestone.id });
      const second = task('second', { parent: milestone.id });
      addDependency(first.id, second.id);
      drainEvents();

      const approved = approvePlan(milestone.id);
      expect(approved.plan_approved).toBe(true);

      const events = drainEvents();
      expect(events.map(e => e.type)).toEqual(['plan_approved', 'task_ready']);
      expect(readyIds(events)).toEqual([first.id]);
    });

    it('validates approval', () => {
      const plain = task('P');
      expect(() => approvePlan(plain.id)).toThrow('Only milestones can be approved');

      const milestone = task('M', { kind: 'milestone' });
      expect(() => approvePlan(milestone.id)).toThrow('Milestone must have at least one child task before approval');

      task('child', { parent: milestone.id });
      approvePlan(milestone.id);
      expect(() => approvePlan(milestone.id)).toThrow('This milestone is already approved');
    });

    it('holds back successors under an unapproved milestone', () => {
      const milestone = task('M', { kind: 'milestone' });
      const a = task('A');
      const child = task('child', { parent: milestone.id });
      addDependency(a.id, child.id);
      drainEvents();

      completeTask(a.id);
      expect(readyIds(drainEvents())).toEqual([]);
    });

    it('advances the milestone when its integration task finishes', () => {
      const milestone = task('M', { kind: 'milestone' });
      const child = task('child', { parent: milestone.id });
      approvePlan(milestone.id);

      completeTask(child.id);
      const integration = getChildren(milestone.id).find(c => c.fan_in);
      expect(integration?.step_name).toBe('Build');
      if (!integration) return;
      drainEvents();

      completeTask(integration.id);
      expect(requireTask(milestone.id).step_name).toBe('Build');

      const moves = drainEvents().flatMap(e => (e.type === 'task_moved' ? [e.payload.task.id] : []));
      expect(moves).toEqual([integration.id, milestone.id]);
    });
  });

  describe('createSubtasks', () => {
    it('places children in the step after the parent with batch dependencies', () => {
      const parent = task('P');
      drainEvents();

      const created = createSubtasks(
        parent.id,
        [{ title: 'one' }, { title: 'two', description: 'second' }],
        { dependencies: [{ from: 0, to: 1 }] }
      );

      expect(created.map(t => [t.title, t.step_name, t.parent_task_id])).toEqual([
        ['one', 'Build', parent.id],
        ['two', 'Build', parent.id],
      ]);
      expect(isBlocked(created[1].id)).toBe(true);

      const types = drainEvents().map(e => e.type);
      expect(types).toEqual(['dependency_created', 'task_created', 'task_created']);
    });

    it('uses the first dispatch step when the parent is done', () => {
      const parent = task('P');
      completeTask(parent.id);
      const [child] = createSubtasks(parent.id, [{ title: 'follow-up' }]);
      expect(child.step_name).toBe('Build');
    });

    it('honours an explicit step and cascades successors', () => {
      const parent = task('P');
      const downstream = task('downstream');
      addDependency(parent.id, downstream.id);

      const [child] = createSubtasks(parent.id, [{ title: 'c', step: 'Plan' }], { cascadeFrom: parent.id });
      expect(child.step_name).toBe('Plan');
      expect(getDependencies(downstream.id).predecessors.map(p => p.task_id)).toEqual([parent.id, child.id]);
    });

    it('creates nothing when an edge is out of range', () => {
      const parent = task('P');
      expect(() => createSubtasks(parent.id, [{ title: 'one' }], { dependencies: [{ from: 0, to: 3 }] })).toThrow(
        InvalidInputError
      );
      expect(getChildren(parent.id)).toEqual([]);
    });
  });
});
