import { Schema } from './types';

/**
 * Cycle guard for one diff invocation.
 *
 * Holds the schema pairs currently open on the recursion path. A pair that is
 * already open is not entered again, which bounds recursion on self- and
 * mutually-referential schemas. Pairs are popped on the way out, so the same
 * pair reached again from a sibling location is still diffed.
 */
export class DiffState {
  private readonly active = new Map<Schema, Set<Schema>>();

  isActive(schema1: Schema, schema2: Schema): boolean {
    return this.active.get(schema1)?.has(schema2) ?? false;
  }

  push(schema1: Schema, schema2: Schema): void {
    let partners = this.active.get(schema1);
    if (!partners) {
      partners = new Set();
      this.active.set(schema1, partners);
    }
    partners.add(schema2);
  }

  pop(schema1: Schema, schema2: Schema): void {
    const partners = this.active.get(schema1);
    if (!partners) return;
    partners.delete(schema2);
    if (partners.size === 0) {
      this.active.delete(schema1);
    }
  }
}
