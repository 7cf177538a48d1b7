import { Element } from './element.js';
import { InteractionStyle } from './interaction-style.js';
import { InvalidArgumentError } from '../errors.js';
import type { Relationship } from './relationship.js';

/** People, software systems, containers and components: the elements that can use one another. */
export abstract class StaticStructureElement extends Element {
  /**
   * Add a relationship from this element to another.
   *
   * @returns the new relationship, or null when an identical one already exists
   */
  uses(
    destination: StaticStructureElement | null | undefined,
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
