import { CONFIG } from '../utils/config.js';
import { isContainerInstance, isStaticStructureElement } from '../model/element-kinds.js';
import { loadWorkspace } from './load-workspace.js';
import { displayNameOf } from './describe.js';
import { SilentProgress } from './progress.js';
import type { ProgressReporter } from './progress.js';
import type { Model } from '../model/model.js';

export type FindingSeverity = 'error' | 'warning' | 'info';

export type FindingCheckId =
  | 'UNRESOLVED_CONTAINER_INSTANCE'
  | 'MISSING_DESCRIPTION'
  | 'ORPHAN_ELEMENT'
  | 'INSTANCE_WITHOUT_HEALTH_CHECKS';

export interface ValidationFinding {
  checkId: FindingCheckId;
  severity: FindingSeverity;
  elementId: string;
  message: string;
}

export interface ValidateOptions {
  workspacePath: string;
  requireDescriptions?: boolean;
  failOnWarnings?: boolean;
}

export interface ValidateResult {
  workspace: string;
  elements: number;
  relationships: number;
  findings: ValidationFinding[];
  summary: Record<FindingSeverity, number>;
  hasIssues: boolean;
}

interface AuditRules {
  requireDescriptions: boolean;
}

/** Passive integrity audit: reports problems, never repairs them. */
export function auditModel(model: Model, rules: AuditRules): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const element of model.getElements()) {
    const name = displayNameOf(element);

    if (isContainerInstance(element)) {
      if (element.getContainer() === null) {
        findings.push({
          checkId: 'UNRESOLVED_CONTAINER_INSTANCE',
          severity: 'error',
          elementId: element.id,
          message: `Container instance ${element.id} refers to unknown container ${element.getContainerId()}`,
        });
      }
      if (element.getHealthChecks().size === 0) {
        findings.push({
          checkId: 'INSTANCE_WITHOUT_HEALTH_CHECKS',
          severity: 'info',
          elementId: element.id,
          message: `${name} has no health checks`,
        });
      }
      continue;
    }

    if (rules.requireDescriptions && element.description.trim().length === 0) {
      findings.push({
        checkId: 'MISSING_DESCRIPTION',
        severity: 'warning',
        elementId: element.id,
        message: `${name} has no description`,
      });
    }

    if (
      isStaticStructureElement(element) &&
      element.getEfferentRelationships().length === 0 &&
      element.getAfferentRelationships().length === 0
    ) {
      findings.push({
        checkId: 'ORPHAN_ELEMENT',
        severity: 'info',
        elementId: element.id,
        message: `${name} has no relationships`,
      });
    }
  }

  return findings;
}

export async function runValidate(
  options: ValidateOptions,
  progress?: ProgressReporter
): Promise<ValidateResult> {
  const p = progress ?? new SilentProgress();
  const requireDescriptions = options.requireDescriptions ?? CONFIG.validation.requireDescriptions;
  const failOnWarnings = options.failOnWarnings ?? CONFIG.validation.failOnWarnings;

  p.section('Validating Architecture Workspace');
  const workspace = await loadWorkspace(options.workspacePath, p);

  p.start('Checking model integrity');
  const findings = auditModel(workspace.model, { requireDescriptions });
  const summary: Record<FindingSeverity, number> = { error: 0, warning: 0, info: 0 };
  for (const finding of findings) {
    summary[finding.severity] += 1;
  }

  if (summary.error > 0) {
    p.fail(`${String(summary.error)} error(s) found`);
  }
  if (summary.warning > 0) {
    p.warn(`${String(summary.warning)} warning(s) found`);
  }
  if (summary.error === 0 && summary.warning === 0) {
    p.succeed('No integrity problems found');
  }

  return {
    workspace: workspace.name,
    elements: workspace.model.getElements().length,
    relationships: workspace.model.getRelationships().length,
    findings,
    summary,
    hasIssues: summary.error > 0 || (failOnWarnings && summary.warning > 0),
  };
}
