import { CANONICAL_NAME_SEPARATOR, Element } from './element.js';
import { isContainerInstance, isDeploymentNode } from './element-kinds.js';
import { InteractionStyle } from './interaction-style.js';
import { Tags } from './tags.js';
import { InvalidArgumentError } from '../errors.js';
import type { Container } from './container.js';
import type { ContainerInstance } from './container-instance.js';
import type { Model } from './model.js';
import type { Relationship } from './relationship.js';

export const DEFAULT_DEPLOYMENT_ENVIRONMENT = 'Default';

const REQUIRED_TAGS = [Tags.ELEMENT, Tags.DEPLOYMENT_NODE] as const;

/** Infrastructure (a server, cluster, runtime) that container instances are deployed onto. */
export class DeploymentNode extends Element {
  readonly type = 'DeploymentNode' as const;
  readonly environment: string;
  technology: string;
  private instances = 1;

  constructor(
    model: Model,
    id: string,
    name: string,
    description = '',
    technology = '',
    instances = 1,
    environment = DEFAULT_DEPLOYMENT_ENVIRONMENT
  ) {
    super(model, id, name, description);
    this.technology = technology;
    this.environment = environment;
    this.setInstances(instances);
  }

  getRequiredTags(): readonly string[] {
    return REQUIRED_TAGS;
  }

  getParent(): DeploymentNode | null {
    const parent = this.getModel().getParentOf(this.id);
    return isDeploymentNode(parent) ? parent : null;
  }

  getCanonicalName(): string {
    const parent = this.getParent();
    const prefix = parent
      ? parent.getCanonicalName()
      : CANONICAL_NAME_SEPARATOR +
        'Deployment' +
        CANONICAL_NAME_SEPARATOR +
        this.formatForCanonicalName(this.environment);
    return prefix + CANONICAL_NAME_SEPARATOR + this.formatForCanonicalName(this.name);
  }

  getInstances(): number {
    return this.instances;
  }

  setInstances(instances: number): void {
    if (!Number.isInteger(instances) || instances < 1) {
      throw new InvalidArgumentError(
        'Number of instances must be a positive integer.',
        'instances'
      );
    }
    this.instances = instances;
  }

  addDeploymentNode(name: string, description = '', technology = '', instances = 1): DeploymentNode {
    return this.getModel().addDeploymentNode(
      name,
      description,
      technology,
      instances,
      this.environment,
      this
    );
  }

  /** Deploy an instance of `container` onto this node. */
  add(container: Container): ContainerInstance {
    return this.getModel().addContainerInstance(this, container);
  }

  getChildren(): DeploymentNode[] {
    return this.getModel().getChildrenOf(this.id).filter(isDeploymentNode);
  }

  getDeploymentNodeWithName(name: string): DeploymentNode | null {
    return this.getChildren().find((n) => n.getName() === name) ?? null;
  }

  getContainerInstances(): ContainerInstance[] {
    return this.getModel().getChildrenOf(this.id).filter(isContainerInstance);
  }

  uses(
    destination: DeploymentNode | null | undefined,
    description = '',
    technology = '',
    interactionStyle = InteractionStyle.Synchronous
  ): Relationship | null {
    if (!destination) {
      throw new InvalidArgumentError(
        'The destination of a relationship must be specified.',
        'destination'
      );
    }
    return this.getModel().addRelationship(
      this,
      destination,
      description,
      technology,
      interactionStyle
    );
  }
}
