import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { TaskflowError, InvalidInputError } from '../errors.js';
import { findStep, getStep } from '../db/projects.js';
import { createTask, requireTask, setTaskOutput } from '../db/tasks.js';
import { addComment } from '../db/comments.js';
import { addDependency, removeDependency } from '../db/dependencies.js';
import { completeTask, createSubtasks, moveTask, type SubtaskSpec } from '../workflow/operations.js';
import { getBoard, getTaskDetail } from '../workflow/board.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolArgs = Record<string, unknown>;

/** The task whose worker owns this tool server; used when an argument is left out. */
export interface ToolScope {
  taskId: string | null;
}

const taskIdProperty = {
  type: 'string',
  description: 'Task id (defaults to the task this worker is running)',
};

export const tools: Tool[] = [
  {
    name: 'get_board',
    description: 'Show the project board: steps, tasks per step, cancelled tasks and dependencies.',
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'string', description: 'Project id (defaults to the current task\'s project)' },
      },
    },
  },
  {
    name: 'get_task',
    description: 'Show a task with its step, comments, dependencies and runs.',
    inputSchema: { type: 'object', properties: { task_id: taskIdProperty } },
  },
  {
    name: 'create_task',
    description: 'Create a task in a project. The step defaults to the first step.',
    inputSchema: {
      type: 'object',
      properties: {
        title: { type: 'string' },
        description: { type: 'string' },
        project_id: { type: 'string', description: 'Defaults to the current task\'s project' },
        step: { type: 'string', description: 'Step id or name' },
        parent_task_id: { type: 'string' },
        kind: { type: 'string', enum: ['unit', 'research', 'milestone'] },
      },
      required: ['title'],
    },
  },
  {
    name: 'create_subtasks',
    description: 'Create several subtasks under a parent in one go, optionally with dependencies between them by index.',
    inputSchema: {
      type: 'object',
      properties: {
        parent_task_id: taskIdProperty,
        tasks: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              title: { type: 'string' },
              description: { type: 'string' },
              kind: { type: 'string', enum: ['unit', 'research', 'milestone'] },
              step: { type: 'string' },
            },
            required: ['title'],
          },
        },
        dependencies: {
          type: 'array',
          items: {
            type: 'object',
            properties: { from: { type: 'number' }, to: { type: 'number' } },
            required: ['from', 'to'],
          },
        },
        cascade_from: {
          type: 'string',
          description: 'Successors of this task will also wait on every new subtask',
        },
      },
      required: ['tasks'],
    },
  },
  {
    name: 'move_task',
    description: 'Move a task to the next step or back to an earlier one.',
    inputSchema: {
      type: 'object',
      properties: {
        task_id: taskIdProperty,
        step: { type: 'string', description: 'Target step id or name' },
      },
      required: ['step'],
    },
  },
  {
    name: 'complete_task',
    description: 'Mark a task as done by moving it to the terminal step.',
    inputSchema: { type: 'object', properties: { task_id: taskIdProperty } },
  },
  {
    name: 'add_comment',
    description: 'Append a comment to a task\'s thread.',
    inputSchema: {
      type: 'object',
      properties: {
        task_id: taskIdProperty,
        content: { type: 'string' },
        author_role: {
          type: 'string',
          description: 'Defaults to the role of the task\'s current step',
        },
      },
      required: ['content'],
    },
  },
  {
    name: 'add_dependency',
    description: 'Make one task wait for another to be done.',
    inputSchema: {
      type: 'object',
      properties: {
        predecessor_id: { type: 'string' },
        successor_id: { type: 'string' },
      },
      required: ['predecessor_id', 'successor_id'],
    },
  },
  {
    name: 'remove_dependency',
    description: 'Delete a dependency edge by id.',
    inputSchema: {
      type: 'object',
      properties: { dependency_id: { type: 'string' } },
      required: ['dependency_id'],
    },
  },
  {
    name: 'set_task_output',
    description: 'Record the result of a task (research findings, summaries) for later tasks to read.',
    inputSchema: {
      type: 'object',
      properties: {
        task_id: taskIdProperty,
        output: { type: 'string' },
      },
      required: ['output'],
    },
  },
];

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidInputError(`'${key}' must be a string`);
  }
  return value;
}

function requireString(args: ToolArgs, key: string): string {
  const value = optionalString(args, key);
  if (!value) throw new InvalidInputError(`'${key}' is required`);
  return value;
}

function scopedTaskId(args: ToolArgs, scope: ToolScope, key = 'task_id'): string {
  const value = optionalString(args, key) ?? scope.taskId;
  if (!value) throw new InvalidInputError(`'${key}' is required`);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSubtasks(value: unknown): SubtaskSpec[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new InvalidInputError("'tasks' must be a non-empty array");
  }
  return value.map((item, index) => {
    if (!isRecord(item)) throw new InvalidInputError(`tasks[${index}] must be an object`);
    return {
      title: requireString(item, 'title'),
      description: optionalString(item, 'description'),
      kind: optionalString(item, 'kind'),
      step: optionalString(item, 'step'),
    };
  });
}

function readEdges(value: unknown): Array<{ from: number; to: number }> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new InvalidInputError("'dependencies' must be an array");
  return value.map((item, index) => {
    if (!isRecord(item) || !Number.isInteger(item.from) || !Number.isInteger(item.to)) {
      throw new InvalidInputError(`dependencies[${index}] needs integer 'from' and 'to'`);
    }
    return { from: Number(item.from), to: Number(item.to) };
  });
}

function defaultAuthorRole(taskId: string): string {
  const task = requireTask(taskId);
  return getStep(task.step_id)?.role ?? 'human';
}

function run(name: string, args: ToolArgs, scope: ToolScope): unknown {
  switch (name) {
    case 'get_board': {
      const projectId = optionalString(args, 'project_id') ?? requireTask(scopedTaskId(args, scope)).project_id;
      return getBoard(projectId);
    }

    case 'get_task':
      return getTaskDetail(scopedTaskId(args, scope));

    case 'create_task': {
      const projectId = optionalString(args, 'project_id') ?? requireTask(scopedTaskId(args, scope)).project_id;
      const stepRef = optionalString(args, 'step');
      let stepId: string | undefined;
      if (stepRef) {
        const step = findStep(projectId, stepRef);
        if (!step) throw new InvalidInputError(`Step '${stepRef}' is not part of project ${projectId}`);
        stepId = step.id;
      }
      return createTask({
        project_id: projectId,
        title: requireString(args, 'title'),
        description: optionalString(args, 'description'),
        step_id: stepId,
        parent_task_id: optionalString(args, 'parent_task_id'),
        kind: optionalString(args, 'kind'),
      });
    }

    case 'create_subtasks':
      return createSubtasks(scopedTaskId(args, scope, 'parent_task_id'), readSubtasks(args.tasks), {
        dependencies: readEdges(args.dependencies),
        cascadeFrom: optionalString(args, 'cascade_from'),
      });

    case 'move_task':
      return moveTask(scopedTaskId(args, scope), requireString(args, 'step'));

    case 'complete_task':
      return completeTask(scopedTaskId(args, scope));

    case 'add_comment': {
      const taskId = scopedTaskId(args, scope);
      const role = optionalString(args, 'author_role') ?? defaultAuthorRole(taskId);
      return addComment(taskId, role, requireString(args, 'content'));
    }

    case 'add_dependency':
      return addDependency(requireString(args, 'predecessor_id'), requireString(args, 'successor_id'));

    case 'remove_dependency': {
      const id = requireString(args, 'dependency_id');
      return { id, removed: removeDependency(id) };
    }

    case 'set_task_output':
      return setTaskOutput(scopedTaskId(args, scope), requireString(args, 'output'));

    default:
      throw new InvalidInputError(`Unknown tool: ${name}`);
  }
}

export function callTool(name: string, args: ToolArgs | undefined, scope: ToolScope): ToolResult {
  try {
    const result = run(name, args ?? {}, scope);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    const error = err instanceof TaskflowError
      ? { error: err.code, message: err.message }
      : { error: 'internal_error', message: err instanceof Error ? err.message : String(err) };
    return { content: [{ type: 'text', text: JSON.stringify(error) }], isError: true };
  }
}
