// Model
export { Model } from './model/model.js';
export { Workspace } from './model/workspace.js';
export { ModelItem } from './model/model-item.js';
export { Element, CANONICAL_NAME_SEPARATOR } from './model/element.js';
export type { ElementType } from './model/element.js';
export { StaticStructureElement } from './model/static-structure-element.js';
export { Person } from './model/person.js';
export { SoftwareSystem } from './model/software-system.js';
export { Container } from './model/container.js';
export { Component } from './model/component.js';
export { DeploymentNode, DEFAULT_DEPLOYMENT_ENVIRONMENT } from './model/deployment-node.js';
export {
  ContainerInstance,
  DEFAULT_HEALTH_CHECK_INTERVAL_IN_SECONDS,
  DEFAULT_HEALTH_CHECK_TIMEOUT_IN_MILLISECONDS,
} from './model/container-instance.js';
export { HttpHealthCheck } from './model/http-health-check.js';
export { Relationship } from './model/relationship.js';
export { InteractionStyle } from './model/interaction-style.js';
export { Location } from './model/location.js';
export { Tags, TagSet, parseTags } from './model/tags.js';
export { SequentialIntegerIdGenerator } from './model/id-generator.js';
export type { IdGenerator, IdentifiedKind } from './model/id-generator.js';
export {
  isPerson,
  isSoftwareSystem,
  isContainer,
  isComponent,
  isDeploymentNode,
  isContainerInstance,
  isStaticStructureElement,
} from './model/element-kinds.js';

// Serialization
export { readWorkspace, parseWorkspace } from './serialization/workspace-reader.js';
export { writeWorkspace, stringifyWorkspace } from './serialization/workspace-writer.js';
export type {
  WorkspaceJson,
  ModelJson,
  RelationshipJson,
  ContainerInstanceJson,
  DeploymentNodeJson,
  HttpHealthCheckJson,
} from './schemas/workspace.schema.js';
export { WorkspaceJsonSchema } from './schemas/workspace.schema.js';

// Uses facts
export { applyUsesContainers, applyUsesSoftwareSystems } from './facts/uses-facts.js';
export type { RejectedUsesFact, UsesFactsResult } from './facts/uses-facts.js';
export type { UsesFact, UsesFactInput } from './schemas/uses-facts.schema.js';

// Pipelines (headless orchestration functions)
export { loadWorkspace } from './pipelines/load-workspace.js';
export { runElements } from './pipelines/elements.js';
export type { ElementsOptions, ElementRow } from './pipelines/elements.js';
export { runRelationships } from './pipelines/relationships.js';
export type { RelationshipsOptions, RelationshipRow } from './pipelines/relationships.js';
export { runValidate, auditModel } from './pipelines/validate.js';
export type {
  ValidateOptions,
  ValidateResult,
  ValidationFinding,
  FindingSeverity,
  FindingCheckId,
} from './pipelines/validate.js';
export { displayNameOf } from './pipelines/describe.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';

// Config
export { CONFIG } from './utils/config.js';
export type { Config } from './utils/config.js';

// Errors
export {
  C4GraphError,
  ConfigurationError,
  InvalidArgumentError,
  SerializationError,
  ErrorCode,
} from './errors.js';
export type { HealthCheckConstraint } from './errors.js';

// Validation (core utilities only)
export { validate, validatePath } from './utils/validation.js';
export { isUrl } from './utils/url-utils.js';

// Schemas (re-export for consumers that need them)
export { PackageJsonSchema } from './schemas/package.schema.js';
