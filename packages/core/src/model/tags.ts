export const Tags = {
  ELEMENT: 'Element',
  RELATIONSHIP: 'Relationship',
  PERSON: 'Person',
  SOFTWARE_SYSTEM: 'Software System',
  CONTAINER: 'Container',
  COMPONENT: 'Component',
  DEPLOYMENT_NODE: 'Deployment Node',
  CONTAINER_INSTANCE: 'Container Instance',
  SYNCHRONOUS: 'Synchronous',
  ASYNCHRONOUS: 'Asynchronous',
} as const;

/** Insertion-ordered, de-duplicated tag list. Blank tags are dropped. */
export class TagSet {
  private readonly tags: string[] = [];

  constructor(initial: Iterable<string> = []) {
    for (const tag of initial) {
      this.add(tag);
    }
  }

  add(tag: string): boolean {
    const trimmed = tag.trim();
    if (trimmed.length === 0 || this.tags.includes(trimmed)) {
      return false;
    }
    this.tags.push(trimmed);
    return true;
  }

  remove(tag: string): boolean {
    const index = this.tags.indexOf(tag.trim());
    if (index === -1) {
      return false;
    }
    this.tags.splice(index, 1);
    return true;
  }

  has(tag: string): boolean {
    return this.tags.includes(tag.trim());
  }

  toArray(): string[] {
    return [...this.tags];
  }

  get size(): number {
    return this.tags.length;
  }
}

/** Split a comma-separated wire-format tag string. */
export function parseTags(tags: string | undefined): string[] {
  if (!tags) return [];
  return tags
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}
