import { ModelItem } from './model-item.js';
import { InvalidArgumentError } from '../errors.js';
import { isUrl } from '../utils/url-utils.js';
import type { Model } from './model.js';
import type { Relationship } from './relationship.js';

export type ElementType =
  | 'Person'
  | 'SoftwareSystem'
  | 'Container'
  | 'Component'
  | 'DeploymentNode'
  | 'ContainerInstance';

export const CANONICAL_NAME_SEPARATOR = '/';

/**
 * A named, identified, taggable node in the architecture graph.
 *
 * Elements never hold a pointer to their parent: `getParent()` asks the
 * owning {@link Model}, which keeps the child-to-parent index.
 */
export abstract class Element extends ModelItem {
  abstract readonly type: ElementType;
  private readonly model: Model;
  protected name: string;
  description: string;
  private url?: string;

  protected constructor(model: Model, id: string, name: string, description = '') {
    super(id);
    this.model = model;
    this.name = name;
    this.description = description;
  }

  getModel(): Model {
    return this.model;
  }

  getName(): string | null {
    return this.name;
  }

  /** Rename this element. The model's naming rules apply as they do on creation. */
  setName(name: string): void {
    this.model.checkRename(this, name);
    this.name = name;
  }

  getUrl(): string | undefined {
    return this.url;
  }

  /** Set a URL for this element; an empty value clears it. */
  setUrl(url: string | undefined): void {
    if (url === undefined || url.trim().length === 0) {
      this.url = undefined;
      return;
    }
    if (!isUrl(url)) {
      throw new InvalidArgumentError(`${url} is not a valid URL.`, 'url');
    }
    this.url = url;
  }

  /** A hierarchy-derived name, unique within the model. Never stored. */
  abstract getCanonicalName(): string;

  getParent(): Element | null {
    return this.model.getParentOf(this.id);
  }

  getEfferentRelationships(): Relationship[] {
    return this.model.getEfferentRelationshipsOf(this);
  }

  getAfferentRelationships(): Relationship[] {
    return this.model.getAfferentRelationshipsOf(this);
  }

  /**
   * Find a relationship from this element to `destination`. When a
   * description is given it must match as well.
   */
  getEfferentRelationshipWith(destination: Element, description?: string): Relationship | null {
    for (const relationship of this.getEfferentRelationships()) {
      if (relationship.destination !== destination) continue;
      if (description === undefined || relationship.description === description) {
        return relationship;
      }
    }
    return null;
  }

  hasEfferentRelationshipWith(destination: Element, description?: string): boolean {
    return this.getEfferentRelationshipWith(destination, description) !== null;
  }

  protected formatForCanonicalName(name: string): string {
    return name.replaceAll(CANONICAL_NAME_SEPARATOR, '');
  }
}
