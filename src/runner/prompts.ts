import { readFile } from 'fs/promises';
import { join } from 'path';
import { CONFIG } from '../utils/config.js';
import { WorkerLaunchError } from '../errors.js';
import { errorMessage } from '../utils/logger.js';
import type { WorkerRole } from '../db/types.js';

export async function loadRolePrompt(role: WorkerRole, promptsDir: string = CONFIG.promptsDir): Promise<string> {
  const path = join(promptsDir, `${role}.md`);
  try {
    return (await readFile(path, 'utf-8')).trim();
  } catch (err) {
    throw new WorkerLaunchError(`No system prompt for role '${role}' at ${path}: ${errorMessage(err)}`);
  }
}
