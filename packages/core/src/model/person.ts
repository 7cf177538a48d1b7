import { CANONICAL_NAME_SEPARATOR } from './element.js';
import { Location } from './location.js';
import { StaticStructureElement } from './static-structure-element.js';
import { Tags } from './tags.js';
import type { Model } from './model.js';

const REQUIRED_TAGS = [Tags.ELEMENT, Tags.PERSON] as const;

export class Person extends StaticStructureElement {
  readonly type = 'Person' as const;
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
}
