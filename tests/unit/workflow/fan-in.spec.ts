import { beforeEach, describe, expect, it } from 'vitest';
import { pickIntegrationStep, synchronizeParent } from '../../../src/workflow/fan-in.js';
import { cancelTask, completeTask } from '../../../src/workflow/operations.js';
import { createTask, getChildren, setTaskOutput } from '../../../src/db/tasks.js';
import { pollUnconsumed } from '../../../src/db/events.js';
import { makeProject, resetDb, type Fixture } from '../helpers.js';

describe('fan-in synchronizer', () => {
  let fx: Fixture;

  beforeEach(() => {
    resetDb();
    fx = makeProject([
      { name: 'Todo' },
      { name: 'Build', dispatchable: true, role: 'coder' },
      { name: 'Integrate', dispatchable: true, role: 'orchestrator' },
      { name: 'Done' },
    ]);
  });

  function family(count: number) {
    const parent = createTask({ project_id: fx.project.id, title: 'Parent' });
    const children = Array.from({ length: count }, (_, i) =>
      createTask({ project_id: fx.project.id, title: `Child ${i + 1}`, parent_task_id: parent.id })
    );
    return { parent, children };
  }

  function integrationTasks(parentId: string) {
    return getChildren(parentId).filter(c => c.fan_in);
  }

  it('waits for every sibling, then creates exactly one integration task', () => {
    const { parent, children } = family(3);

    completeTask(children[0].id);
    completeTask(children[1].id);
    expect(integrationTasks(parent.id)).toEqual([]);

    completeTask(children[2].id);
    const created = integrationTasks(parent.id);
    expect(created).toHaveLength(1);
    expect(created[0]).toMatchObject({
      title: 'Integrate: Parent',
      kind: 'unit',
      step_name: 'Integrate',
      project_id: fx.project.id,
    });

    expect(synchronizeParent(parent.id)).toBeNull();
    expect(synchronizeParent(parent.id)).toBeNull();
    expect(integrationTasks(parent.id)).toHaveLength(1);

    const triggered = pollUnconsumed('dispatch').filter(e => e.type === 'fan_in_triggered');
    expect(triggered).toHaveLength(1);
    const [event] = triggered;
    if (event.type === 'fan_in_triggered') {
      expect(event.payload.parent_task_id).toBe(parent.id);
      expect(event.payload.sibling_ids).toEqual(children.map(c => c.id));
      expect(event.payload.task.id).toBe(created[0].id);
    }
  });

  it('ignores cancelled siblings', () => {
    const { parent, children } = family(2);
    cancelTask(children[1].id);
    completeTask(children[0].id);
    expect(integrationTasks(parent.id)).toHaveLength(1);
  });

  it('lists child outputs in the description', () => {
    const { parent, children } = family(1);
    setTaskOutput(children[0].id, 'use sqlite');
    completeTask(children[0].id);

    const [created] = integrationTasks(parent.id);
    expect(created.description).toBe(
      ['All subtasks are done. Integrate their results:', '', `- Child 1 (${children[0].id})`, '  Output: use sqlite'].join('\n')
    );
  });

  it('does nothing for a parent without children', () => {
    const lonely = createTask({ project_id: fx.project.id, title: 'Lonely' });
    expect(synchronizeParent(lonely.id)).toBeNull();
  });

  it('creates a new integration task once the previous one is cancelled', () => {
    const { parent, children } = family(1);
    completeTask(children[0].id);
    const [first] = integrationTasks(parent.id);
    cancelTask(first.id);

    const second = synchronizeParent(parent.id);
    expect(second).not.toBeNull();
    expect(second?.id).not.toBe(first.id);
  });

  it('prefers orchestrator steps, then the first dispatch step', () => {
    expect(pickIntegrationStep(fx.steps)?.name).toBe('Integrate');

    const plain = makeProject();
    expect(pickIntegrationStep(plain.steps)?.name).toBe('Build');

    const manual = makeProject([{ name: 'Todo' }, { name: 'Done' }]);
    expect(pickIntegrationStep(manual.steps)).toBeNull();
  });
});
