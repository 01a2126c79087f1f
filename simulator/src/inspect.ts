/**
 * Introspection over the value store: tracemem-style copy tracing,
 * obj_size-style sizing, ref-style sharing trees, and a one-line deparse.
 */

import { ValueStore } from './store';
import { Payload, ValueId, children, typeTag } from './values';

// ---------------------------------------------------------------------------
// Copy tracing
// ---------------------------------------------------------------------------

export type CopyCallback = (oldId: ValueId, newId: ValueId) => void;

const ADDRESS_BASE = 0x55d0c4a00000;
const ADDRESS_STRIDE = 0x38;

/** Address-like label for a cell. Opaque; only equality is meaningful. */
export function traceId(id: ValueId): string {
  return `<0x${(ADDRESS_BASE + id * ADDRESS_STRIDE).toString(16)}>`;
}

export class Tracer {
  private subscribers = new Map<ValueId, CopyCallback[]>();

  constructor(store: ValueStore) {
    store.onFree(id => {
      this.subscribers.delete(id);
    });
  }

  /** Call `callback` whenever `id` is copied. Returns an unsubscribe function. */
  onCopy(id: ValueId, callback: CopyCallback): () => void {
    const list = this.subscribers.get(id) ?? [];
    list.push(callback);
    this.subscribers.set(id, list);
    return () => {
      const current = this.subscribers.get(id);
      if (current === undefined) return;
      const remaining = current.filter(cb => cb !== callback);
      if (remaining.length === 0) this.subscribers.delete(id);
      else this.subscribers.set(id, remaining);
    };
  }

  /** Stop tracing `id` altogether. */
  untrace(id: ValueId): boolean {
    return this.subscribers.delete(id);
  }

  isTraced(id: ValueId): boolean {
    return this.subscribers.has(id);
  }

  /** Fan a copy event out to subscribers of the original. */
  notify(oldId: ValueId, newId: ValueId): void {
    const list = this.subscribers.get(oldId);
    if (list === undefined) return;
    for (const callback of [...list]) callback(oldId, newId);
  }
}

// ---------------------------------------------------------------------------
// Sizes
// ---------------------------------------------------------------------------

/**
 * Every cell reachable from `ids`, each once. Cells in `boundary` are
 * neither counted nor walked through.
 */
export function reachable(store: ValueStore, ids: ValueId[], boundary: ReadonlySet<ValueId>): Set<ValueId> {
  const seen = new Set<ValueId>();
  const worklist = ids.filter(id => !boundary.has(id));
  while (worklist.length > 0) {
    const id = worklist.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    for (const child of children(store.read(id))) {
      if (!seen.has(child) && !boundary.has(child)) worklist.push(child);
    }
  }
  return seen;
}

/** Combined size of everything reachable from `ids`, shared cells counted once. */
export function sizeOf(store: ValueStore, ids: ValueId[], boundary: ReadonlySet<ValueId> = new Set()): number {
  for (const id of ids) store.read(id);
  let total = 0;
  for (const id of reachable(store, ids, boundary)) {
    total += store.bytesOf(id);
  }
  return total;
}

// ---------------------------------------------------------------------------
// Reference trees
// ---------------------------------------------------------------------------

export interface RefTreeOptions {
  /** Show the interned strings behind character vectors. */
  strings?: boolean;
  /** Environments shown by label only, never expanded. */
  boundary?: ReadonlySet<ValueId>;
}

/**
 * Render the reference structure below `id`. Each cell gets a sequence
 * number on first sight; a later line carrying the same number is the same
 * cell, shown without its children.
 *
 *   [1:<0x...>] <list>
 *   ├─[2:<0x...>] <dbl>
 *   └─[2:<0x...>]
 */
export function refTree(store: ValueStore, id: ValueId, options?: RefTreeOptions): string {
  const numbers = new Map<ValueId, number>();
  const boundary = options?.boundary ?? new Set<ValueId>();
  const showStrings = options?.strings ?? false;
  const lines: string[] = [];

  const visit = (node: ValueId, label: string, prefix: string, childPrefix: string): void => {
    const seen = numbers.get(node);
    if (seen !== undefined) {
      lines.push(`${prefix}${label}[${seen}:${traceId(node)}]`);
      return;
    }
    const n = numbers.size + 1;
    numbers.set(node, n);
    const payload = store.read(node);
    lines.push(`${prefix}${label}[${n}:${traceId(node)}] ${describeNode(payload)}`);
    if (boundary.has(node)) return;

    const edges = treeEdges(payload, showStrings);
    edges.forEach((edge, i) => {
      const last = i === edges.length - 1;
      visit(
        edge.id,
        edge.name === null ? '' : `${edge.name} = `,
        childPrefix + (last ? '└─' : '├─'),
        childPrefix + (last ? '  ' : '│ '),
      );
    });
  };

  visit(id, '', '', '');
  return lines.join('\n');
}

interface Edge {
  name: string | null;
  id: ValueId;
}

function treeEdges(payload: Payload, showStrings: boolean): Edge[] {
  switch (payload.kind) {
    case 'list':
      return payload.elements.map((id, i) => ({ name: payload.names ? payload.names[i] : null, id }));
    case 'character':
      if (!showStrings) return [];
      return payload.elements
        .filter((e): e is ValueId => e !== null)
        .map(id => ({ name: null, id }));
    case 'environment':
      return Array.from(payload.frame.entries()).map(([name, id]) => ({ name, id }));
    case 'closure':
      return [{ name: null, id: payload.env }];
    case 'promise':
      return payload.value === null ? [] : [{ name: null, id: payload.value }];
    default:
      return [];
  }
}

function describeNode(payload: Payload): string {
  switch (payload.kind) {
    case 'string':
      return `<string: ${JSON.stringify(payload.text)}>`;
    case 'environment':
      return payload.label === null ? '<env>' : `<env: ${payload.label}>`;
    default:
      return `<${typeTag(payload)}>`;
  }
}

// ---------------------------------------------------------------------------
// Deparse
// ---------------------------------------------------------------------------

/** One-line R-like rendering of a Value. */
export function formatValue(store: ValueStore, id: ValueId): string {
  const payload = store.read(id);
  switch (payload.kind) {
    case 'null':
      return 'NULL';
    case 'logical':
      return combine(payload.data.map(b => (b === null ? 'NA' : b ? 'TRUE' : 'FALSE')));
    case 'integer':
      return combine(payload.data.map(n => (n === null ? 'NA' : `${n}L`)));
    case 'double':
      return combine(payload.data.map(formatDouble));
    case 'string':
      return JSON.stringify(payload.text);
    case 'character':
      return combine(payload.elements.map(e => (e === null ? 'NA' : formatValue(store, e))));
    case 'list': {
      const items = payload.elements.map((e, i) => {
        const name = payload.names ? payload.names[i] : '';
        const value = formatValue(store, e);
        return name === '' ? value : `${name} = ${value}`;
      });
      return `list(${items.join(', ')})`;
    }
    case 'environment':
      return `<environment: ${payload.label ?? traceId(id)}>`;
    case 'closure':
      return `function(${payload.formals.map(f => f.name).join(', ')})`;
    case 'promise':
      return payload.value === null ? '<promise>' : formatValue(store, payload.value);
  }
}

function combine(items: string[]): string {
  if (items.length === 1) return items[0];
  if (items.length === 0) return 'c()';
  return `c(${items.join(', ')})`;
}

function formatDouble(n: number | null): string {
  if (n === null) return 'NA';
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'Inf';
  if (n === -Infinity) return '-Inf';
  return String(n);
}
