import { readFile } from 'fs/promises';
import { parseWorkspace } from '../serialization/workspace-reader.js';
import { validatePath } from '../utils/validation.js';
import { SilentProgress } from './progress.js';
import type { ProgressReporter } from './progress.js';
import type { Workspace } from '../model/workspace.js';

export async function loadWorkspace(
  workspacePath: string,
  progress?: ProgressReporter
): Promise<Workspace> {
  const p = progress ?? new SilentProgress();
  validatePath(workspacePath);

  p.start('Loading workspace');
  const content = await readFile(workspacePath, 'utf-8');
  const workspace = parseWorkspace(content);
  p.succeed(
    `Loaded workspace "${workspace.name}" with ${String(workspace.model.getElements().length)} elements`
  );
  return workspace;
}
