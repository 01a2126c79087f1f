/**
 * Tracing garbage collector.
 *
 * Stop-the-world mark-sweep over the value store. Marking starts from the
 * root set and follows every reference a payload holds; it uses an explicit
 * worklist, and a cell that is already marked is not visited again, so
 * self-referencing environments and other cycles terminate.
 *
 * Reference counts play no part here. A cycle nothing roots is reclaimed
 * even though each member's count says it is referenced.
 */

import { ValueStore } from './store';
import { ValueId, children } from './values';

export type RootProvider = () => Iterable<ValueId>;

export type GcTrigger = 'explicit' | 'pressure';

export interface GcStats {
  collections: number;
  /** Total cells reclaimed over the store's lifetime. */
  reclaimed: number;
  lastReclaimed: number;
  lastTrigger: GcTrigger | null;
  /** Current soft ceiling in bytes. */
  threshold: number;
}

export interface CollectorOptions {
  verbose?: boolean;
  log?: (message: string) => void;
}

export class Collector {
  private store: ValueStore;
  private roots: RootProvider;
  private verbose: boolean;
  private log: (message: string) => void;
  private running = false;
  private counters: Omit<GcStats, 'threshold'> = {
    collections: 0,
    reclaimed: 0,
    lastReclaimed: 0,
    lastTrigger: null,
  };

  constructor(store: ValueStore, roots: RootProvider, options?: CollectorOptions) {
    this.store = store;
    this.roots = roots;
    this.verbose = options?.verbose ?? false;
    this.log = options?.log ?? ((message: string) => console.log(message));
    store.onPressure((_requested, inFlight) => {
      this.run('pressure', inFlight);
    });
  }

  /** Run a full collection from the root set. Returns the number of cells reclaimed. */
  collect(): number {
    return this.run('explicit');
  }

  get stats(): GcStats {
    return { ...this.counters, threshold: this.store.gcThreshold };
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  private run(trigger: GcTrigger, inFlight: readonly ValueId[] = []): number {
    // A collection never nests inside another.
    if (this.running) return 0;
    this.running = true;
    try {
      let seeds: ValueId[] = Array.from(this.roots());
      // Fresh allocations nothing references yet belong to an operation
      // still in progress; only a collection under allocation pressure
      // keeps them.
      if (trigger === 'pressure') seeds = seeds.concat(this.store.pendingIds(), inFlight);
      this.mark(seeds);
      const reclaimed = this.store.sweep();

      this.counters.collections++;
      this.counters.reclaimed += reclaimed;
      this.counters.lastReclaimed = reclaimed;
      this.counters.lastTrigger = trigger;
      if (this.verbose) {
        this.log(
          `gc #${this.counters.collections} (${trigger}): reclaimed ${reclaimed} values, ` +
          `${this.store.bytesInUse} bytes in use`,
        );
      }
      return reclaimed;
    } finally {
      this.running = false;
    }
  }

  private mark(seeds: ValueId[]): void {
    const worklist = seeds.filter(id => this.store.has(id));
    while (worklist.length > 0) {
      const id = worklist.pop();
      if (id === undefined || !this.store.mark(id)) continue;
      for (const child of children(this.store.read(id))) {
        if (!this.store.isMarked(child)) worklist.push(child);
      }
    }
  }
}
