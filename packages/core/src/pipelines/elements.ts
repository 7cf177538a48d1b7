import { loadWorkspace } from './load-workspace.js';
import { displayNameOf } from './describe.js';
import { SilentProgress } from './progress.js';
import type { ProgressReporter } from './progress.js';
import type { ElementType } from '../model/element.js';

export interface ElementsOptions {
  workspacePath: string;
  type?: ElementType;
}

export interface ElementRow {
  id: string;
  type: ElementType;
  name: string;
  canonicalName: string;
  tags: string[];
  parentId: string | null;
}

export async function runElements(
  options: ElementsOptions,
  progress?: ProgressReporter
): Promise<ElementRow[]> {
  const p = progress ?? new SilentProgress();
  p.section('Loading Architecture Workspace');
  const workspace = await loadWorkspace(options.workspacePath, p);

  const rows = workspace.model
    .getElements()
    .filter((element) => !options.type || element.type === options.type)
    .map((element) => ({
      id: element.id,
      type: element.type,
      name: displayNameOf(element),
      canonicalName: element.getCanonicalName(),
      tags: element.getTags(),
      parentId: element.getParent()?.id ?? null,
    }));

  p.succeed(`Found ${String(rows.length)} element(s)`);
  return rows;
}
