/**
 * Global string pool.
 *
 * Equal texts share one `string` cell. The pool is weak: an entry whose
 * cell is swept is dropped, so unused strings don't live forever.
 * A pool belongs to exactly one store between attach() and detach().
 */

import { ValueId } from './values';
import { SimulatorError } from './errors';

export class StringPool {
  private table = new Map<string, ValueId>();
  private owner: object | null = null;

  /** Bind the pool to a store. */
  attach(owner: object): void {
    if (this.owner !== null && this.owner !== owner) {
      throw new SimulatorError('string pool is already attached to another store');
    }
    this.owner = owner;
  }

  /** Release the pool and forget every entry. */
  detach(): void {
    this.table.clear();
    this.owner = null;
  }

  get attached(): boolean {
    return this.owner !== null;
  }

  lookup(text: string): ValueId | undefined {
    return this.table.get(text);
  }

  register(text: string, id: ValueId): void {
    this.table.set(text, id);
  }

  /** Drop `text` if it still points at `id`. */
  evict(text: string, id: ValueId): void {
    if (this.table.get(text) === id) {
      this.table.delete(text);
    }
  }

  get size(): number {
    return this.table.size;
  }
}
