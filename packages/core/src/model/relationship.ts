import { ModelItem } from './model-item.js';
import { InteractionStyle } from './interaction-style.js';
import { Tags } from './tags.js';
import type { Element } from './element.js';

/** A directed, described edge between two elements. Created only by {@link Model.addRelationship}. */
export class Relationship extends ModelItem {
  readonly source: Element;
  readonly destination: Element;
  description: string;
  technology: string;
  interactionStyle: InteractionStyle;

  /** @internal */
  constructor(
    id: string,
    source: Element,
    destination: Element,
    description = '',
    technology = '',
    interactionStyle = InteractionStyle.Synchronous
  ) {
    super(id);
    this.source = source;
    this.destination = destination;
    this.description = description;
    this.technology = technology;
    this.interactionStyle = interactionStyle;
  }

  getSourceId(): string {
    return this.source.id;
  }

  getDestinationId(): string {
    return this.destination.id;
  }

  getRequiredTags(): readonly string[] {
    return [
      Tags.RELATIONSHIP,
      this.interactionStyle === InteractionStyle.Asynchronous
        ? Tags.ASYNCHRONOUS
        : Tags.SYNCHRONOUS,
    ];
  }

  toString(): string {
    return `${this.source.getCanonicalName()} ---[${this.description}]---> ${this.destination.getCanonicalName()}`;
  }
}
