import type { Component } from '../model/component.js';
import type { Container } from '../model/container.js';
import type { ContainerInstance } from '../model/container-instance.js';
import type { DeploymentNode } from '../model/deployment-node.js';
import type { Element } from '../model/element.js';
import type { Person } from '../model/person.js';
import type { Relationship } from '../model/relationship.js';
import type { SoftwareSystem } from '../model/software-system.js';
import type { Workspace } from '../model/workspace.js';
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

interface CommonElementJson {
  id: string;
  name: string;
  description?: string;
  tags?: string;
  url?: string;
  properties?: Record<string, string>;
  relationships?: RelationshipJson[];
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

function propertiesOf(item: Element | Relationship): Record<string, string> | undefined {
  const properties = item.getProperties();
  return Object.keys(properties).length > 0 ? properties : undefined;
}

function writeRelationship(relationship: Relationship): RelationshipJson {
  return {
    id: relationship.id,
    sourceId: relationship.getSourceId(),
    destinationId: relationship.getDestinationId(),
    description: nonEmpty(relationship.description),
    technology: nonEmpty(relationship.technology),
    interactionStyle: relationship.interactionStyle,
    tags: relationship.getTagsAsString(),
    properties: propertiesOf(relationship),
  };
}

function writeRelationshipsOf(element: Element): RelationshipJson[] | undefined {
  const relationships = element.getEfferentRelationships().map(writeRelationship);
  return relationships.length > 0 ? relationships : undefined;
}

function writeCommon(element: Element): CommonElementJson {
  return {
    id: element.id,
    name: element.getName() ?? '',
    description: nonEmpty(element.description),
    tags: element.getTagsAsString(),
    url: element.getUrl(),
    properties: propertiesOf(element),
    relationships: writeRelationshipsOf(element),
  };
}

function writeComponent(component: Component): ComponentJson {
  return { ...writeCommon(component), technology: nonEmpty(component.technology) };
}

function writeContainer(container: Container): ContainerJson {
  const components = container.getComponents().map(writeComponent);
  return {
    ...writeCommon(container),
    technology: nonEmpty(container.technology),
    components: components.length > 0 ? components : undefined,
  };
}

function writeSoftwareSystem(softwareSystem: SoftwareSystem): SoftwareSystemJson {
  const containers = softwareSystem.getContainers().map(writeContainer);
  return {
    ...writeCommon(softwareSystem),
    location: softwareSystem.location,
    containers: containers.length > 0 ? containers : undefined,
  };
}

function writePerson(person: Person): PersonJson {
  return { ...writeCommon(person), location: person.location };
}

/** Canonical name, parent and the resolved container are derived, so only `containerId` is written. */
function writeContainerInstance(instance: ContainerInstance): ContainerInstanceJson {
  const healthChecks = Array.from(instance.getHealthChecks()).map((check) => ({
    name: check.name,
    url: check.url,
    interval: check.interval,
    timeout: check.timeout,
  }));
  return {
    id: instance.id,
    containerId: instance.getContainerId(),
    instanceId: instance.instanceId,
    environment: instance.environment,
    tags: instance.getTagsAsString(),
    properties: propertiesOf(instance),
    healthChecks: healthChecks.length > 0 ? healthChecks : undefined,
    relationships: writeRelationshipsOf(instance),
  };
}

function writeDeploymentNode(node: DeploymentNode): DeploymentNodeJson {
  const children = node.getChildren().map(writeDeploymentNode);
  const containerInstances = node.getContainerInstances().map(writeContainerInstance);
  return {
    ...writeCommon(node),
    technology: nonEmpty(node.technology),
    environment: node.environment,
    instances: node.getInstances(),
    children: children.length > 0 ? children : undefined,
    containerInstances: containerInstances.length > 0 ? containerInstances : undefined,
  };
}

/** Build the JSON wire form of a workspace. Derived fields are never written. */
export function writeWorkspace(workspace: Workspace): WorkspaceJson {
  const { model } = workspace;
  const people = model.getPeople().map(writePerson);
  const softwareSystems = model.getSoftwareSystems().map(writeSoftwareSystem);
  const deploymentNodes = model.getDeploymentNodes().map(writeDeploymentNode);

  return {
    name: workspace.name,
    description: nonEmpty(workspace.description),
    model: {
      people: people.length > 0 ? people : undefined,
      softwareSystems: softwareSystems.length > 0 ? softwareSystems : undefined,
      deploymentNodes: deploymentNodes.length > 0 ? deploymentNodes : undefined,
    },
  };
}

export function stringifyWorkspace(workspace: Workspace, indent = 2): string {
  return JSON.stringify(writeWorkspace(workspace), null, indent);
}
