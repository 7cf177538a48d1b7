import { TagSet } from './tags.js';
import { requireNonBlank } from '../utils/validation.js';

/**
 * Anything the model assigns an identifier to: elements and relationships.
 *
 * Visible tags are the item's required tags followed by whatever callers
 * added. Required tags are recomputed on every read, so removing one has no
 * lasting effect.
 */
export abstract class ModelItem {
  readonly id: string;
  private readonly userTags = new TagSet();
  private readonly properties = new Map<string, string>();

  protected constructor(id: string) {
    this.id = id;
  }

  /** The minimum set of tags this kind of item always carries. */
  abstract getRequiredTags(): readonly string[];

  getTags(): string[] {
    const merged = new TagSet(this.getRequiredTags());
    for (const tag of this.userTags.toArray()) {
      merged.add(tag);
    }
    return merged.toArray();
  }

  getTagsAsString(): string {
    return this.getTags().join(',');
  }

  hasTag(tag: string): boolean {
    return this.getTags().includes(tag.trim());
  }

  addTags(...tags: string[]): void {
    for (const tag of tags) {
      this.userTags.add(tag);
    }
  }

  removeTag(tag: string): void {
    this.userTags.remove(tag);
  }

  getProperties(): Record<string, string> {
    return Object.fromEntries(this.properties);
  }

  addProperty(name: string, value: string): void {
    requireNonBlank(name, 'property name', 'A property name must be specified.');
    requireNonBlank(value, 'property value', 'A property value must be specified.');
    this.properties.set(name, value);
  }
}
