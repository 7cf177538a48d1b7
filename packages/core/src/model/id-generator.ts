export type IdentifiedKind = 'element' | 'relationship';

export interface IdGenerator {
  /** Produce an identifier for a newly created element or relationship. */
  generateId(kind: IdentifiedKind): string;

  /** Record an identifier that already exists, e.g. one read back from a workspace file. */
  found(id: string): void;
}

/** Hands out "1", "2", "3"... and never re-issues a numeric id it has been told about. */
export class SequentialIntegerIdGenerator implements IdGenerator {
  private counter = 0;

  generateId(_kind: IdentifiedKind): string {
    this.counter += 1;
    return String(this.counter);
  }

  found(id: string): void {
    if (!/^\d+$/.test(id)) return;
    const n = parseInt(id, 10);
    if (n > this.counter) {
      this.counter = n;
    }
  }
}
