import { InvalidInputError } from '../errors.js';
import type { StepInput } from '../db/projects.js';

/**
 * Parses a comma-separated workflow such as `Plan,Build:coder,Review:reviewer@opus,Done`.
 * A step with `:role` is a dispatch step; `@model` overrides the worker model.
 */
export function parseStepList(spec: string): StepInput[] {
  const parts = spec.split(',').map(p => p.trim()).filter(Boolean);
  if (parts.length === 0) {
    throw new InvalidInputError('No steps given');
  }

  return parts.map(part => {
    const [head, model] = part.split('@', 2);
    const [name, role] = head.split(':', 2).map(s => s.trim());
    if (!role) {
      if (model !== undefined) {
        throw new InvalidInputError(`Step '${name}' names a model but no role`);
      }
      return { name };
    }
    return { name, dispatchable: true, role, model: model?.trim() || null };
  });
}
