import { loadWorkspace } from './load-workspace.js';
import { SilentProgress } from './progress.js';
import type { ProgressReporter } from './progress.js';
import type { InteractionStyle } from '../model/interaction-style.js';

export interface RelationshipsOptions {
  workspacePath: string;
}

export interface RelationshipRow {
  id: string;
  source: string;
  destination: string;
  description: string;
  technology: string;
  interactionStyle: InteractionStyle;
}

export async function runRelationships(
  options: RelationshipsOptions,
  progress?: ProgressReporter
): Promise<RelationshipRow[]> {
  const p = progress ?? new SilentProgress();
  p.section('Loading Architecture Workspace');
  const workspace = await loadWorkspace(options.workspacePath, p);

  const rows = workspace.model.getRelationships().map((relationship) => ({
    id: relationship.id,
    source: relationship.source.getCanonicalName(),
    destination: relationship.destination.getCanonicalName(),
    description: relationship.description,
    technology: relationship.technology,
    interactionStyle: relationship.interactionStyle,
  }));

  p.succeed(`Found ${String(rows.length)} relationship(s)`);
  return rows;
}
