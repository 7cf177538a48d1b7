import { Component } from './component.js';
import { Container } from './container.js';
import { ContainerInstance } from './container-instance.js';
import { DEFAULT_DEPLOYMENT_ENVIRONMENT, DeploymentNode } from './deployment-node.js';
import {
  isComponent,
  isContainer,
  isContainerInstance,
  isDeploymentNode,
  isPerson,
  isSoftwareSystem,
} from './element-kinds.js';
import { SequentialIntegerIdGenerator } from './id-generator.js';
import { InteractionStyle } from './interaction-style.js';
import { Location } from './location.js';
import { Person } from './person.js';
import { Relationship } from './relationship.js';
import { SoftwareSystem } from './software-system.js';
import { ErrorCode, InvalidArgumentError } from '../errors.js';
import { requireNonBlank } from '../utils/validation.js';
import type { Element } from './element.js';
import type { IdGenerator, IdentifiedKind } from './id-generator.js';

function duplicateName(message: string): InvalidArgumentError {
  return new InvalidArgumentError(message, 'name', { code: ErrorCode.MODEL_DUPLICATE_ELEMENT });
}

function invalidRelationship(message: string, argument: string): InvalidArgumentError {
  return new InvalidArgumentError(message, argument, {
    code: ErrorCode.MODEL_INVALID_RELATIONSHIP,
  });
}

/**
 * Owns every element and relationship, keyed by identifier, plus the
 * child-to-parent index. All creation goes through here so that identifier
 * assignment and validity checks live in one place.
 */
export class Model {
  private readonly elementsById = new Map<string, Element>();
  private readonly relationshipsById = new Map<string, Relationship>();
  private readonly parentIndex = new Map<string, string>();
  private idGenerator: IdGenerator = new SequentialIntegerIdGenerator();
  private pendingId: string | null = null;

  setIdGenerator(idGenerator: IdGenerator): void {
    for (const id of [...this.elementsById.keys(), ...this.relationshipsById.keys()]) {
      idGenerator.found(id);
    }
    this.idGenerator = idGenerator;
  }

  // --- Element factories ---

  addPerson(name: string, description = '', location = Location.Unspecified): Person {
    requireNonBlank(name, 'name');
    this.requireUniquePersonOrSystemName(name, null);
    const person = new Person(this, this.nextId('element'), name, description, location);
    this.register(person, null);
    return person;
  }

  addSoftwareSystem(name: string, description = '', location = Location.Unspecified): SoftwareSystem {
    requireNonBlank(name, 'name');
    this.requireUniquePersonOrSystemName(name, null);
    const softwareSystem = new SoftwareSystem(
      this,
      this.nextId('element'),
      name,
      description,
      location
    );
    this.register(softwareSystem, null);
    return softwareSystem;
  }

  addContainer(
    softwareSystem: SoftwareSystem,
    name: string,
    description = '',
    technology = ''
  ): Container {
    this.requireOwned(softwareSystem, 'softwareSystem');
    requireNonBlank(name, 'name');
    this.requireUniqueContainerName(softwareSystem, name, null);
    const container = new Container(this, this.nextId('element'), name, description, technology);
    this.register(container, softwareSystem);
    return container;
  }

  addComponent(container: Container, name: string, description = '', technology = ''): Component {
    this.requireOwned(container, 'container');
    requireNonBlank(name, 'name');
    this.requireUniqueComponentName(container, name, null);
    const component = new Component(this, this.nextId('element'), name, description, technology);
    this.register(component, container);
    return component;
  }

  addDeploymentNode(
    name: string,
    description = '',
    technology = '',
    instances = 1,
    environment = DEFAULT_DEPLOYMENT_ENVIRONMENT,
    parent: DeploymentNode | null = null
  ): DeploymentNode {
    requireNonBlank(name, 'name');
    requireNonBlank(environment, 'environment');
    if (parent) {
      this.requireOwned(parent, 'parent');
      if (parent.environment !== environment) {
        throw new InvalidArgumentError(
          `A child deployment node must be in the "${parent.environment}" environment.`,
          'environment'
        );
      }
    }
    this.requireUniqueDeploymentNodeName(parent, environment, name, null);
    const node = new DeploymentNode(
      this,
      this.nextId('element'),
      name,
      description,
      technology,
      instances,
      environment
    );
    this.register(node, parent);
    return node;
  }

  /**
   * Deploy `container` onto `deploymentNode`. Instance numbers start at 1
   * and count instances of the same container within the node's environment.
   */
  addContainerInstance(deploymentNode: DeploymentNode, container: Container): ContainerInstance {
    this.requireOwned(deploymentNode, 'deploymentNode');
    this.requireOwned(container, 'container');
    const highest = this.getContainerInstances()
      .filter(
        (ci) =>
          ci.environment === deploymentNode.environment && ci.getContainerId() === container.id
      )
      .reduce((max, ci) => Math.max(max, ci.instanceId), 0);
    const instance = new ContainerInstance(
      this,
      this.nextId('element'),
      container,
      highest + 1,
      deploymentNode.environment
    );
    this.register(instance, deploymentNode);
    return instance;
  }

  /**
   * @internal Recreate a container instance from its stored container id.
   * The container reference stays unresolved until {@link resolveContainerReferences}.
   */
  restoreContainerInstance(
    deploymentNode: DeploymentNode,
    containerId: string,
    instanceId: number
  ): ContainerInstance {
    this.requireOwned(deploymentNode, 'deploymentNode');
    requireNonBlank(containerId, 'containerId');
    const instance = new ContainerInstance(
      this,
      this.nextId('element'),
      containerId,
      instanceId,
      deploymentNode.environment
    );
    this.register(instance, deploymentNode);
    return instance;
  }

  /**
   * Link every container instance whose container is not yet resolved to
   * the container with the stored id. Unknown ids are left as they are.
   *
   * @returns the instances that remain unresolved
   */
  resolveContainerReferences(): ContainerInstance[] {
    const unresolved: ContainerInstance[] = [];
    for (const instance of this.getContainerInstances()) {
      if (instance.getContainer() !== null) continue;
      const container = this.elementsById.get(instance.getContainerId());
      if (isContainer(container)) {
        instance.setContainer(container);
      } else {
        unresolved.push(instance);
      }
    }
    return unresolved;
  }

  /**
   * @internal Check that `element` may take `name` under the same rules the
   * factories apply. Renaming to the current name is allowed.
   */
  checkRename(element: Element, name: string): void {
    this.requireOwned(element, 'element');
    requireNonBlank(name, 'name');
    if (isPerson(element) || isSoftwareSystem(element)) {
      this.requireUniquePersonOrSystemName(name, element);
    } else if (isContainer(element)) {
      this.requireUniqueContainerName(element.getSoftwareSystem(), name, element);
    } else if (isComponent(element)) {
      this.requireUniqueComponentName(element.getContainer(), name, element);
    } else if (isDeploymentNode(element)) {
      this.requireUniqueDeploymentNodeName(
        element.getParent(),
        element.environment,
        name,
        element
      );
    }
  }

  // --- Relationships ---

  /**
   * The only way relationships come into being.
   *
   * @returns the new relationship, or null if `source` already has one to
   *   `destination` with the same description
   */
  addRelationship(
    source: Element | null | undefined,
    destination: Element | null | undefined,
    description = '',
    technology = '',
    interactionStyle = InteractionStyle.Synchronous
  ): Relationship | null {
    if (!source) {
      throw invalidRelationship('The source of a relationship must be specified.', 'source');
    }
    if (!destination) {
      throw invalidRelationship(
        'The destination of a relationship must be specified.',
        'destination'
      );
    }
    this.requireOwned(source, 'source');
    this.requireOwned(destination, 'destination');
    if (source === destination) {
      throw invalidRelationship(
        'Relationships from an element to itself are not permitted.',
        'destination'
      );
    }
    if (this.isAncestor(source, destination) || this.isAncestor(destination, source)) {
      throw invalidRelationship(
        'Relationships cannot be added between parents and children.',
        'destination'
      );
    }
    if (source.hasEfferentRelationshipWith(destination, description)) {
      return null;
    }

    const relationship = new Relationship(
      this.nextId('relationship'),
      source,
      destination,
      description,
      technology,
      interactionStyle
    );
    this.relationshipsById.set(relationship.id, relationship);
    return relationship;
  }

  // --- Lookups ---

  getElement(id: string): Element | null {
    return this.elementsById.get(id) ?? null;
  }

  getRelationship(id: string): Relationship | null {
    return this.relationshipsById.get(id) ?? null;
  }

  getElements(): Element[] {
    return Array.from(this.elementsById.values());
  }

  getRelationships(): Relationship[] {
    return Array.from(this.relationshipsById.values());
  }

  getPeople(): Person[] {
    return this.getElements().filter(isPerson);
  }

  getSoftwareSystems(): SoftwareSystem[] {
    return this.getElements().filter(isSoftwareSystem);
  }

  /** Top-level deployment nodes, across all environments. */
  getDeploymentNodes(): DeploymentNode[] {
    return this.getElements().filter(
      (e): e is DeploymentNode => isDeploymentNode(e) && !this.parentIndex.has(e.id)
    );
  }

  getContainerInstances(): ContainerInstance[] {
    return this.getElements().filter(isContainerInstance);
  }

  getPersonWithName(name: string): Person | null {
    return this.getPeople().find((p) => p.getName() === name) ?? null;
  }

  getSoftwareSystemWithName(name: string): SoftwareSystem | null {
    return this.getSoftwareSystems().find((s) => s.getName() === name) ?? null;
  }

  getElementWithCanonicalName(canonicalName: string): Element | null {
    if (canonicalName.trim().length === 0) return null;
    return this.getElements().find((e) => e.getCanonicalName() === canonicalName) ?? null;
  }

  /** The registered parent of an element: its containing system, container or deployment node. */
  getParentOf(id: string): Element | null {
    const parentId = this.parentIndex.get(id);
    if (parentId === undefined) return null;
    return this.elementsById.get(parentId) ?? null;
  }

  getChildrenOf(id: string): Element[] {
    const children: Element[] = [];
    for (const [childId, parentId] of this.parentIndex) {
      if (parentId !== id) continue;
      const child = this.elementsById.get(childId);
      if (child) children.push(child);
    }
    return children;
  }

  getEfferentRelationshipsOf(element: Element): Relationship[] {
    return this.getRelationships().filter((r) => r.source === element);
  }

  getAfferentRelationshipsOf(element: Element): Relationship[] {
    return this.getRelationships().filter((r) => r.destination === element);
  }

  contains(item: Element | Relationship): boolean {
    return this.elementsById.get(item.id) === item || this.relationshipsById.get(item.id) === item;
  }

  isEmpty(): boolean {
    return this.elementsById.size === 0;
  }

  /**
   * @internal Run `create` so that the next element or relationship it
   * registers takes `id` instead of a generated one.
   */
  restoreWithId<T>(id: string, create: () => T): T {
    requireNonBlank(id, 'id');
    if (this.elementsById.has(id) || this.relationshipsById.has(id)) {
      throw new InvalidArgumentError(
        `An element or relationship with ID "${id}" already exists.`,
        'id',
        { code: ErrorCode.MODEL_DUPLICATE_ELEMENT }
      );
    }
    this.pendingId = id;
    try {
      return create();
    } finally {
      this.pendingId = null;
    }
  }

  // --- Private helpers ---

  private nextId(kind: IdentifiedKind): string {
    if (this.pendingId !== null) {
      const id = this.pendingId;
      this.pendingId = null;
      this.idGenerator.found(id);
      return id;
    }
    let id = this.idGenerator.generateId(kind);
    while (this.elementsById.has(id) || this.relationshipsById.has(id)) {
      id = this.idGenerator.generateId(kind);
    }
    return id;
  }

  private register(element: Element, parent: Element | null): void {
    this.elementsById.set(element.id, element);
    if (parent) {
      this.parentIndex.set(element.id, parent.id);
    }
  }

  private requireUniquePersonOrSystemName(name: string, self: Element | null): void {
    const clash = [...this.getPeople(), ...this.getSoftwareSystems()].some(
      (e) => e !== self && e.getName() === name
    );
    if (clash) {
      throw duplicateName(`A person or software system named "${name}" already exists.`);
    }
  }

  private requireUniqueContainerName(
    softwareSystem: SoftwareSystem,
    name: string,
    self: Element | null
  ): void {
    if (softwareSystem.getContainers().some((c) => c !== self && c.getName() === name)) {
      throw duplicateName(
        `A container named "${name}" already exists for this software system.`
      );
    }
  }

  private requireUniqueComponentName(
    container: Container,
    name: string,
    self: Element | null
  ): void {
    if (container.getComponents().some((c) => c !== self && c.getName() === name)) {
      throw duplicateName(`A component named "${name}" already exists for this container.`);
    }
  }

  private requireUniqueDeploymentNodeName(
    parent: DeploymentNode | null,
    environment: string,
    name: string,
    self: Element | null
  ): void {
    const siblings = parent
      ? parent.getChildren()
      : this.getDeploymentNodes().filter((n) => n.environment === environment);
    if (siblings.some((n) => n !== self && n.getName() === name)) {
      throw duplicateName(
        `A deployment node named "${name}" already exists in the "${environment}" environment.`
      );
    }
  }

  private requireOwned(element: Element, argument: string): void {
    if (this.elementsById.get(element.id) !== element) {
      throw new InvalidArgumentError(
        `The ${argument} (ID ${element.id}) does not belong to this model.`,
        argument,
        { code: ErrorCode.MODEL_ELEMENT_NOT_FOUND }
      );
    }
  }

  private isAncestor(candidate: Element, element: Element): boolean {
    let parent = element.getParent();
    while (parent) {
      if (parent === candidate) return true;
      parent = parent.getParent();
    }
    return false;
  }
}
