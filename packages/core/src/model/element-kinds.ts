import type { Component } from './component.js';
import type { Container } from './container.js';
import type { ContainerInstance } from './container-instance.js';
import type { DeploymentNode } from './deployment-node.js';
import type { Element } from './element.js';
import type { Person } from './person.js';
import type { SoftwareSystem } from './software-system.js';
import type { StaticStructureElement } from './static-structure-element.js';

type MaybeElement = Element | null | undefined;

export function isPerson(element: MaybeElement): element is Person {
  return element?.type === 'Person';
}

export function isSoftwareSystem(element: MaybeElement): element is SoftwareSystem {
  return element?.type === 'SoftwareSystem';
}

export function isContainer(element: MaybeElement): element is Container {
  return element?.type === 'Container';
}

export function isComponent(element: MaybeElement): element is Component {
  return element?.type === 'Component';
}

export function isDeploymentNode(element: MaybeElement): element is DeploymentNode {
  return element?.type === 'DeploymentNode';
}

export function isContainerInstance(element: MaybeElement): element is ContainerInstance {
  return element?.type === 'ContainerInstance';
}

export function isStaticStructureElement(element: MaybeElement): element is StaticStructureElement {
  return isPerson(element) || isSoftwareSystem(element) || isContainer(element) || isComponent(element);
}
