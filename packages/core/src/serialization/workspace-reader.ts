import { Workspace } from '../model/workspace.js';
import { InteractionStyle } from '../model/interaction-style.js';
import { Location } from '../model/location.js';
import { DEFAULT_DEPLOYMENT_ENVIRONMENT } from '../model/deployment-node.js';
import { Tags, parseTags } from '../model/tags.js';
import { SerializationError } from '../errors.js';
import { validate } from '../utils/validation.js';
import { WorkspaceJsonSchema } from '../schemas/workspace.schema.js';
import type { Container } from '../model/container.js';
import type { DeploymentNode } from '../model/deployment-node.js';
import type { Element } from '../model/element.js';
import type { Model } from '../model/model.js';
import type { SoftwareSystem } from '../model/software-system.js';
import type {
  ComponentJson,
  ContainerInstanceJson,
  ContainerJson,
  DeploymentNodeJson,
  PersonJson,
  RelationshipJson,
  SoftwareSystemJson,
  WorkspaceJson,
} from '../schemas/workspace.schema.js';

const RELATIONSHIP_STYLE_TAGS = new Set<string>([
  Tags.RELATIONSHIP,
  Tags.SYNCHRONOUS,
  Tags.ASYNCHRONOUS,
]);

interface DecoratedJson {
  tags?: string;
  url?: string;
  properties?: Record<string, string>;
  relationships?: RelationshipJson[];
}

/**
 * Rebuilds a {@link Workspace} from its JSON wire form. Elements keep the ids
 * they were written with; container instances store their `containerId` and
 * are linked to the container once every element exists.
 */
class WorkspaceReader {
  private readonly relationships: RelationshipJson[] = [];

  private readonly model: Model;

  constructor(model: Model) {
    this.model = model;
  }

  readPerson(json: PersonJson): void {
    const person = this.model.restoreWithId(json.id, () =>
      this.model.addPerson(json.name, json.description ?? '', json.location ?? Location.Unspecified)
    );
    this.decorate(person, json);
  }

  readSoftwareSystem(json: SoftwareSystemJson): void {
    const softwareSystem = this.model.restoreWithId(json.id, () =>
      this.model.addSoftwareSystem(
        json.name,
        json.description ?? '',
        json.location ?? Location.Unspecified
      )
    );
    this.decorate(softwareSystem, json);
    for (const container of json.containers ?? []) {
      this.readContainer(softwareSystem, container);
    }
  }

  readContainer(softwareSystem: SoftwareSystem, json: ContainerJson): void {
    const container = this.model.restoreWithId(json.id, () =>
      softwareSystem.addContainer(json.name, json.description ?? '', json.technology ?? '')
    );
    this.decorate(container, json);
    for (const component of json.components ?? []) {
      this.readComponent(container, component);
    }
  }

  readComponent(container: Container, json: ComponentJson): void {
    const component = this.model.restoreWithId(json.id, () =>
      container.addComponent(json.name, json.description ?? '', json.technology ?? '')
    );
    this.decorate(component, json);
  }

  readDeploymentNode(json: DeploymentNodeJson, parent: DeploymentNode | null): void {
    const environment = parent?.environment ?? json.environment ?? DEFAULT_DEPLOYMENT_ENVIRONMENT;
    const node = this.model.restoreWithId(json.id, () =>
      this.model.addDeploymentNode(
        json.name,
        json.description ?? '',
        json.technology ?? '',
        json.instances ?? 1,
        environment,
        parent
      )
    );
    this.decorate(node, json);
    for (const child of json.children ?? []) {
      this.readDeploymentNode(child, node);
    }
    for (const instance of json.containerInstances ?? []) {
      this.readContainerInstance(node, instance);
    }
  }

  readContainerInstance(node: DeploymentNode, json: ContainerInstanceJson): void {
    const instance = this.model.restoreWithId(json.id, () =>
      this.model.restoreContainerInstance(node, json.containerId, json.instanceId)
    );
    this.decorate(instance, json);
    for (const check of json.healthChecks ?? []) {
      instance.addHealthCheck(check.name, check.url, check.interval, check.timeout);
    }
  }

  /** Relationships go last: both ends must exist before an edge can be added. */
  readRelationships(): void {
    for (const json of this.relationships) {
      const source = this.model.getElement(json.sourceId);
      const destination = this.model.getElement(json.destinationId);
      if (!source || !destination) {
        const missing = !source ? json.sourceId : json.destinationId;
        throw new SerializationError(
          `Relationship ${json.id ?? '(no id)'} refers to unknown element ${missing}`,
          `Relationship refers to an element that is not in the workspace: ${missing}`,
          { relationshipId: json.id, elementId: missing },
          ['Check that sourceId and destinationId match the id of an element in the model']
        );
      }
      const add = () =>
        this.model.addRelationship(
          source,
          destination,
          json.description ?? '',
          json.technology ?? '',
          json.interactionStyle ?? InteractionStyle.Synchronous
        );
      const relationship = json.id ? this.model.restoreWithId(json.id, add) : add();
      if (!relationship) continue;
      relationship.addTags(...parseTags(json.tags).filter((t) => !RELATIONSHIP_STYLE_TAGS.has(t)));
      for (const [name, value] of Object.entries(json.properties ?? {})) {
        relationship.addProperty(name, value);
      }
    }
  }

  private decorate(element: Element, json: DecoratedJson): void {
    element.addTags(...parseTags(json.tags));
    if (json.url) {
      element.setUrl(json.url);
    }
    for (const [name, value] of Object.entries(json.properties ?? {})) {
      element.addProperty(name, value);
    }
    this.relationships.push(...(json.relationships ?? []));
  }
}

/**
 * Parse and validate a workspace document.
 *
 * @throws SerializationError if the document does not match the wire format
 *   or breaks a model rule
 */
export function readWorkspace(raw: unknown): Workspace {
  let json: WorkspaceJson;
  try {
    json = validate(WorkspaceJsonSchema, raw, 'workspace');
  } catch (error) {
    throw SerializationError.fromLoadError(error);
  }

  const workspace = new Workspace(json.name ?? 'Workspace', json.description ?? '');
  const reader = new WorkspaceReader(workspace.model);

  try {
    for (const person of json.model?.people ?? []) {
      reader.readPerson(person);
    }
    for (const softwareSystem of json.model?.softwareSystems ?? []) {
      reader.readSoftwareSystem(softwareSystem);
    }
    for (const node of json.model?.deploymentNodes ?? []) {
      reader.readDeploymentNode(node, null);
    }
    workspace.model.resolveContainerReferences();
    reader.readRelationships();
  } catch (error) {
    throw SerializationError.fromLoadError(error);
  }

  return workspace;
}

export function parseWorkspace(text: string): Workspace {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw SerializationError.fromLoadError(error);
  }
  return readWorkspace(raw);
}
