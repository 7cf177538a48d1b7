import { CANONICAL_NAME_SEPARATOR } from './element.js';
import { isComponent, isSoftwareSystem } from './element-kinds.js';
import { StaticStructureElement } from './static-structure-element.js';
import { Tags } from './tags.js';
import { C4GraphError, ErrorCode } from '../errors.js';
import type { Component } from './component.js';
import type { Model } from './model.js';
import type { SoftwareSystem } from './software-system.js';

const REQUIRED_TAGS = [Tags.ELEMENT, Tags.CONTAINER] as const;

export class Container extends StaticStructureElement {
  readonly type = 'Container' as const;
  technology: string;

  constructor(model: Model, id: string, name: string, description = '', technology = '') {
    super(model, id, name, description);
    this.technology = technology;
  }

  getRequiredTags(): readonly string[] {
    return REQUIRED_TAGS;
  }

  getSoftwareSystem(): SoftwareSystem {
    const parent = this.getModel().getParentOf(this.id);
    if (!isSoftwareSystem(parent)) {
      throw new C4GraphError(
        `Container ${this.id} is not registered under a software system`,
        ErrorCode.MODEL_ELEMENT_NOT_FOUND,
        undefined,
        { containerId: this.id }
      );
    }
    return parent;
  }

  getParent(): SoftwareSystem {
    return this.getSoftwareSystem();
  }

  getCanonicalName(): string {
    return (
      this.getSoftwareSystem().getCanonicalName() +
      CANONICAL_NAME_SEPARATOR +
      this.formatForCanonicalName(this.name)
    );
  }

  addComponent(name: string, description = '', technology = ''): Component {
    return this.getModel().addComponent(this, name, description, technology);
  }

  getComponents(): Component[] {
    return this.getModel().getChildrenOf(this.id).filter(isComponent);
  }

  getComponentWithName(name: string): Component | null {
    return this.getComponents().find((c) => c.getName() === name) ?? null;
  }
}
