import { CANONICAL_NAME_SEPARATOR } from './element.js';
import { isContainer } from './element-kinds.js';
import { Location } from './location.js';
import { StaticStructureElement } from './static-structure-element.js';
import { Tags } from './tags.js';
import type { Container } from './container.js';
import type { Model } from './model.js';

const REQUIRED_TAGS = [Tags.ELEMENT, Tags.SOFTWARE_SYSTEM] as const;

export class SoftwareSystem extends StaticStructureElement {
  readonly type = 'SoftwareSystem' as const;
  location: Location;

  constructor(model: Model, id: string, name: string, description = '', location = Location.Unspecified) {
    super(model, id, name, description);
    this.location = location;
  }

  getRequiredTags(): readonly string[] {
    return REQUIRED_TAGS;
  }

  getCanonicalName(): string {
    return CANONICAL_NAME_SEPARATOR + this.formatForCanonicalName(this.name);
  }

  getParent(): null {
    return null;
  }

  addContainer(name: string, description = '', technology = ''): Container {
    return this.getModel().addContainer(this, name, description, technology);
  }

  getContainers(): Container[] {
    return this.getModel().getChildrenOf(this.id).filter(isContainer);
  }

  getContainerWithName(name: string): Container | null {
    return this.getContainers().find((c) => c.getName() === name) ?? null;
  }
}
