/**
 * Value payloads held in the value store.
 *
 * A payload never embeds another payload: aggregates (lists, character
 * vectors, environments, closures, promises) hold ValueIds, so sharing is
 * by reference and cycles go through the arena rather than through object
 * ownership.
 */

import type { Environment } from './environment';

/** Arena index of a Value. Stable for the life of the cell. */
export type ValueId = number;

/** An element written by a mutation; `null` stands for NA. */
export type Scalar = number | boolean | string | null;

export interface ValueRef {
  ref: ValueId;
}

export type Element = Scalar | ValueRef;

/** Evaluates a lazy argument in `env` and returns the resulting Value. */
export type Thunk = (env: Environment) => ValueId;

/** Host-side body of a closure; runs with the fresh call frame. */
export type ClosureBody = (frame: Environment) => ValueId;

export interface Formal {
  name: string;
  default?: Thunk;
}

export type PromiseOrigin = 'supplied' | 'default' | 'missing';

export type Payload =
  | { kind: 'null' }
  | { kind: 'logical'; data: Array<boolean | null> }
  | { kind: 'integer'; data: Array<number | null> }
  | { kind: 'double'; data: Array<number | null> }
  | { kind: 'string'; text: string }
  | { kind: 'character'; elements: Array<ValueId | null> }
  | { kind: 'list'; elements: ValueId[]; names: string[] | null }
  | { kind: 'environment'; frame: Map<string, ValueId>; parent: ValueId | null; label: string | null }
  | { kind: 'closure'; formals: Formal[]; body: ClosureBody; env: ValueId }
  | {
      kind: 'promise';
      name: string;
      thunk: Thunk;
      env: ValueId | null;
      value: ValueId | null;
      origin: PromiseOrigin;
      forcing: boolean;
    };

export type PayloadKind = Payload['kind'];

export type AtomicPayload = Extract<Payload, { kind: 'logical' | 'integer' | 'double' }>;
export type EnvironmentPayload = Extract<Payload, { kind: 'environment' }>;
export type ListPayload = Extract<Payload, { kind: 'list' }>;
export type CharacterPayload = Extract<Payload, { kind: 'character' }>;
export type ClosurePayload = Extract<Payload, { kind: 'closure' }>;
export type PromisePayload = Extract<Payload, { kind: 'promise' }>;

// ---- Payload constructors ----

export function mkNull(): Payload {
  return { kind: 'null' };
}

export function mkLogical(data: Array<boolean | null>): Payload {
  return { kind: 'logical', data };
}

export function mkInteger(data: Array<number | null>): Payload {
  for (const n of data) {
    if (n !== null && !Number.isInteger(n)) {
      throw new RangeError(`integer vector cannot hold ${n}`);
    }
  }
  return { kind: 'integer', data };
}

export function mkDouble(data: Array<number | null>): Payload {
  return { kind: 'double', data };
}

export function mkString(text: string): Payload {
  return { kind: 'string', text };
}

export function mkCharacter(elements: Array<ValueId | null>): Payload {
  return { kind: 'character', elements };
}

export function mkList(elements: ValueId[], names: string[] | null = null): Payload {
  if (names !== null && names.length !== elements.length) {
    throw new RangeError(`list has ${elements.length} elements but ${names.length} names`);
  }
  return { kind: 'list', elements, names };
}

export function mkEnvironment(parent: ValueId | null, label: string | null = null): Payload {
  return { kind: 'environment', frame: new Map(), parent, label };
}

export function mkClosure(formals: Formal[], body: ClosureBody, env: ValueId): Payload {
  return { kind: 'closure', formals, body, env };
}

export function mkPromise(name: string, thunk: Thunk, env: ValueId | null, origin: PromiseOrigin): Payload {
  return { kind: 'promise', name, thunk, env, value: null, origin, forcing: false };
}

/** Integer sequence `from:to`, counting down when `to < from`. */
/** Largest integer an R integer vector holds, and the longest vector built here. */
export const INT_MAX = 2 ** 31 - 1;
export const MAX_VECTOR_LENGTH = INT_MAX;

/** An integer within R's 32-bit integer range (NA excluded). */
export function isIntValue(n: number): boolean {
  return Number.isInteger(n) && Math.abs(n) <= INT_MAX;
}

export function mkSeq(from: number, to: number): Payload {
  if (!isIntValue(from) || !isIntValue(to)) {
    throw new RangeError(`sequence bounds ${from}:${to} are not integers`);
  }
  const data: number[] = [];
  const step = from <= to ? 1 : -1;
  for (let i = from; step > 0 ? i <= to : i >= to; i += step) {
    data.push(i);
  }
  return mkInteger(data);
}

// ---- Payload utilities ----

export function isAtomic(p: Payload): p is AtomicPayload {
  return p.kind === 'logical' || p.kind === 'integer' || p.kind === 'double';
}

export function isRef(e: Element): e is ValueRef {
  return typeof e === 'object' && e !== null;
}

/** Number of addressable elements, or null for non-sequence kinds. */
export function lengthOf(p: Payload): number | null {
  switch (p.kind) {
    case 'logical':
    case 'integer':
    case 'double':
      return p.data.length;
    case 'character':
    case 'list':
      return p.elements.length;
    case 'null':
      return 0;
    default:
      return null;
  }
}

/**
 * Every ValueId a payload references. This is the edge set the collector
 * marks through and sizeOf walks.
 */
export function children(p: Payload): ValueId[] {
  switch (p.kind) {
    case 'character':
      return p.elements.filter((e): e is ValueId => e !== null);
    case 'list':
      return [...p.elements];
    case 'environment': {
      const out = Array.from(p.frame.values());
      if (p.parent !== null) out.push(p.parent);
      return out;
    }
    case 'closure':
      return [p.env];
    case 'promise': {
      const out: ValueId[] = [];
      if (p.env !== null) out.push(p.env);
      if (p.value !== null) out.push(p.value);
      return out;
    }
    default:
      return [];
  }
}

/**
 * Shallow copy: containers get fresh element arrays, but the ids inside
 * are the same ids.
 */
export function shallowCopy(p: Payload): Payload {
  switch (p.kind) {
    case 'logical': return { kind: 'logical', data: [...p.data] };
    case 'integer': return { kind: 'integer', data: [...p.data] };
    case 'double': return { kind: 'double', data: [...p.data] };
    case 'character': return { kind: 'character', elements: [...p.elements] };
    case 'list': return { kind: 'list', elements: [...p.elements], names: p.names ? [...p.names] : null };
    case 'environment': return { ...p, frame: new Map(p.frame) };
    case 'closure': return { ...p, formals: [...p.formals] };
    default: return { ...p };
  }
}

/** Short type tag, as `typeof` abbreviations print in R tooling. */
export function typeTag(p: Payload): string {
  switch (p.kind) {
    case 'null': return 'NULL';
    case 'logical': return 'lgl';
    case 'integer': return 'int';
    case 'double': return 'dbl';
    case 'string': return 'string';
    case 'character': return 'chr';
    case 'list': return 'list';
    case 'environment': return 'env';
    case 'closure': return 'fn';
    case 'promise': return 'promise';
  }
}
