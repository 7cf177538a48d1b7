import { CANONICAL_NAME_SEPARATOR } from './element.js';
import { isContainer } from './element-kinds.js';
import { StaticStructureElement } from './static-structure-element.js';
import { Tags } from './tags.js';
import { C4GraphError, ErrorCode } from '../errors.js';
import type { Container } from './container.js';
import type { Model } from './model.js';

const REQUIRED_TAGS = [Tags.ELEMENT, Tags.COMPONENT] as const;

export class Component extends StaticStructureElement {
  readonly type = 'Component' as const;
  technology: string;

  constructor(model: Model, id: string, name: string, description = '', technology = '') {
    super(model, id, name, description);
    this.technology = technology;
  }

  getRequiredTags(): readonly string[] {
    return REQUIRED_TAGS;
  }

  getContainer(): Container {
    const parent = this.getModel().getParentOf(this.id);
    if (!isContainer(parent)) {
      throw new C4GraphError(
        `Component ${this.id} is not registered under a container`,
        ErrorCode.MODEL_ELEMENT_NOT_FOUND,
        undefined,
        { componentId: this.id }
      );
    }
    return parent;
  }

  getParent(): Container {
    return this.getContainer();
  }

  getCanonicalName(): string {
    return (
      this.getContainer().getCanonicalName() +
      CANONICAL_NAME_SEPARATOR +
      this.formatForCanonicalName(this.name)
    );
  }
}
