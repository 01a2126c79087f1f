/**
 * Value store: an index-based arena of Values.
 *
 * Each cell carries its payload, a saturating reference count and its
 * shallow byte size. Liveness and GC marks live in separate bitmaps
 * indexed by ValueId; freed slots go on a free list and are reused.
 *
 * Reference counts take three states, 0, 1 and many. Once a cell reaches
 * many it stays there: release() only ever moves 1 to 0. Copy-on-modify
 * decisions read this count, and the collector ignores it entirely.
 */

import { Payload, ValueId, children } from './values';
import { cellBytes } from './sizes';
import { StringPool } from './strings';
import { InvalidValueError, OutOfMemoryError, SimulatorError } from './errors';

export const MANY = 2;
export type RefCount = 0 | 1 | typeof MANY;

interface Cell {
  payload: Payload;
  refs: RefCount;
  bytes: number;
}

export interface ValueStoreOptions {
  /** Interning table for `string` cells; a fresh pool when omitted. */
  strings?: StringPool;
  /** Soft ceiling in bytes; crossing it triggers a collection first. */
  gcThreshold?: number;
  /** Ceiling growth after a collection that did not free enough. */
  growthFactor?: number;
  /** Hard limit in bytes; null for unbounded. */
  memoryLimit?: number | null;
}

/**
 * Called when an allocation would cross the soft ceiling. `inFlight` are
 * cells the caller still needs that nothing may reference yet.
 */
export type PressureHandler = (requested: number, inFlight: readonly ValueId[]) => void;

export type FreeListener = (id: ValueId) => void;

export const DEFAULT_GC_THRESHOLD = 8 * 1024 * 1024;
export const DEFAULT_GROWTH_FACTOR = 1.5;

const INITIAL_SLOTS = 64;

export class ValueStore {
  readonly strings: StringPool;

  private cells: Array<Cell | undefined> = [];
  private live = new Uint8Array(INITIAL_SLOTS);
  private marks = new Uint8Array(INITIAL_SLOTS);
  private freeSlots: ValueId[] = [];
  private pending = new Set<ValueId>();
  private depth = 0;
  private inUse = 0;
  private liveCount = 0;
  private threshold: number;
  private readonly growthFactor: number;
  private readonly memoryLimit: number | null;
  private pressure: PressureHandler | null = null;
  private freeListeners: FreeListener[] = [];

  constructor(options?: ValueStoreOptions) {
    this.strings = options?.strings ?? new StringPool();
    this.strings.attach(this);
    this.threshold = options?.gcThreshold ?? DEFAULT_GC_THRESHOLD;
    this.growthFactor = options?.growthFactor ?? DEFAULT_GROWTH_FACTOR;
    this.memoryLimit = options?.memoryLimit ?? null;
  }

  /** Install the collector hook used by reserve(). */
  onPressure(handler: PressureHandler): void {
    this.pressure = handler;
  }

  /** Subscribe to cell deallocation. Returns an unsubscribe function. */
  onFree(listener: FreeListener): () => void {
    this.freeListeners.push(listener);
    return () => {
      this.freeListeners = this.freeListeners.filter(l => l !== listener);
    };
  }

  /**
   * Run `fn` as one operation. Cells allocated meanwhile stay pending
   * until they are first retained or the outermost operation ends.
   */
  operation<T>(fn: () => T): T {
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
      if (this.depth === 0) this.pending.clear();
    }
  }

  // ---------------------------------------------------------------------------
  // Allocation
  // ---------------------------------------------------------------------------

  /**
   * Allocate a cell for `payload` and return its identity.
   *
   * Always a fresh identity, except for `string` payloads: those are
   * interned, and an equal live text returns the existing cell (pending
   * again if nothing references it).
   *
   * `inFlight` are further cells the caller holds unreferenced; they and
   * the payload's children survive a collection run by the reservation.
   */
  allocate(payload: Payload, inFlight: readonly ValueId[] = []): ValueId {
    if (payload.kind === 'string') {
      const existing = this.strings.lookup(payload.text);
      if (existing !== undefined && this.has(existing)) {
        if (this.cell(existing).refs === 0) this.pending.add(existing);
        return existing;
      }
    }

    const refs = children(payload);
    for (const child of refs) this.cell(child);

    const bytes = cellBytes(payload);
    this.reserve(bytes, [...refs, ...inFlight]);

    const id = this.freeSlots.pop() ?? this.cells.length;
    this.ensureCapacity(id);
    this.cells[id] = { payload, refs: 0, bytes };
    this.live[id] = 1;
    this.inUse += bytes;
    this.liveCount++;
    this.pending.add(id);

    for (const child of refs) this.retain(child);
    if (payload.kind === 'string') this.strings.register(payload.text, id);
    return id;
  }

  /**
   * Make room for `bytes` more. Runs the pressure handler (a collection)
   * when the soft ceiling or the hard limit would be crossed, then fails
   * if the hard limit still would be. The collection keeps `inFlight`.
   */
  reserve(bytes: number, inFlight: readonly ValueId[] = []): void {
    const overThreshold = this.inUse + bytes > this.threshold;
    const overLimit = this.memoryLimit !== null && this.inUse + bytes > this.memoryLimit;
    if (!overThreshold && !overLimit) return;

    if (this.pressure !== null) this.pressure(bytes, inFlight);

    const needed = this.inUse + bytes;
    if (this.memoryLimit !== null && needed > this.memoryLimit) {
      throw new OutOfMemoryError(bytes, this.inUse, this.memoryLimit);
    }
    if (needed > this.threshold) {
      this.threshold = Math.max(Math.floor(this.threshold * this.growthFactor), needed);
    }
  }

  // ---------------------------------------------------------------------------
  // Access
  // ---------------------------------------------------------------------------

  has(id: ValueId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.cells.length && this.live[id] === 1;
  }

  /**
   * The live payload. Edits made through it are in-place mutations;
   * follow them with touch() and the matching retain()/release().
   */
  read(id: ValueId): Payload {
    return this.cell(id).payload;
  }

  /** Recompute a cell's byte size after an in-place edit. */
  touch(id: ValueId): void {
    const cell = this.cell(id);
    const bytes = cellBytes(cell.payload);
    this.inUse += bytes - cell.bytes;
    cell.bytes = bytes;
  }

  /**
   * Replace a cell's payload in place; the identity stays the same.
   * References gained are retained and references dropped are released.
   */
  setPayload(id: ValueId, payload: Payload): void {
    const cell = this.cell(id);
    if (cell.payload.kind === 'string' || payload.kind === 'string') {
      throw new SimulatorError('interned strings cannot be replaced in place');
    }
    const added = children(payload);
    for (const child of added) this.cell(child);

    const bytes = cellBytes(payload);
    if (bytes > cell.bytes) this.reserve(bytes - cell.bytes, [id, ...added]);

    const removed = children(cell.payload);
    cell.payload = payload;
    for (const child of added) this.retain(child);
    for (const child of removed) {
      if (!added.includes(child) && this.has(child)) this.release(child);
    }
    this.touch(id);
  }

  bytesOf(id: ValueId): number {
    return this.cell(id).bytes;
  }

  // ---------------------------------------------------------------------------
  // Reference counts
  // ---------------------------------------------------------------------------

  refCount(id: ValueId): RefCount {
    return this.cell(id).refs;
  }

  retain(id: ValueId): void {
    const cell = this.cell(id);
    cell.refs = cell.refs === 0 ? 1 : MANY;
    this.pending.delete(id);
  }

  release(id: ValueId): void {
    const cell = this.cell(id);
    if (cell.refs === 1) cell.refs = 0;
  }

  /** Fresh cells nothing has referenced yet. */
  pendingIds(): ValueId[] {
    return Array.from(this.pending);
  }

  /** Stop holding a fresh cell; the next collection may reclaim it. */
  settle(id: ValueId): void {
    this.pending.delete(id);
  }

  // ---------------------------------------------------------------------------
  // Mark / sweep
  // ---------------------------------------------------------------------------

  /** Mark a live cell. Returns false if it was already marked. */
  mark(id: ValueId): boolean {
    this.cell(id);
    if (this.marks[id] === 1) return false;
    this.marks[id] = 1;
    return true;
  }

  isMarked(id: ValueId): boolean {
    return this.has(id) && this.marks[id] === 1;
  }

  /** Free every live cell left unmarked, then clear all marks. */
  sweep(): number {
    let reclaimed = 0;
    for (let id = 0; id < this.cells.length; id++) {
      if (this.live[id] !== 1 || this.marks[id] === 1) continue;
      const cell = this.cells[id];
      if (cell === undefined) continue;
      if (cell.payload.kind === 'string') this.strings.evict(cell.payload.text, id);
      this.cells[id] = undefined;
      this.live[id] = 0;
      this.inUse -= cell.bytes;
      this.liveCount--;
      this.pending.delete(id);
      this.freeSlots.push(id);
      reclaimed++;
      for (const listener of this.freeListeners) listener(id);
    }
    this.marks.fill(0);
    return reclaimed;
  }

  // ---------------------------------------------------------------------------
  // Statistics
  // ---------------------------------------------------------------------------

  *liveIds(): IterableIterator<ValueId> {
    for (let id = 0; id < this.cells.length; id++) {
      if (this.live[id] === 1) yield id;
    }
  }

  get count(): number {
    return this.liveCount;
  }

  get bytesInUse(): number {
    return this.inUse;
  }

  get gcThreshold(): number {
    return this.threshold;
  }

  /** Tear down: detach the string pool so it can be reused. */
  dispose(): void {
    this.strings.detach();
  }

  private cell(id: ValueId): Cell {
    const cell = this.has(id) ? this.cells[id] : undefined;
    if (cell === undefined) throw new InvalidValueError(id);
    return cell;
  }

  private ensureCapacity(id: ValueId): void {
    if (id < this.live.length) return;
    let size = this.live.length;
    while (size <= id) size *= 2;
    const live = new Uint8Array(size);
    live.set(this.live);
    const marks = new Uint8Array(size);
    marks.set(this.marks);
    this.live = live;
    this.marks = marks;
  }
}
