/**
 * Copy-on-modify engine.
 *
 * A mutation walks `path` from the Value bound to `name`. At each level the
 * container is edited in place when nothing else can observe it (reference
 * count 1) and shallow-copied otherwise. Environments are the exception:
 * they are always edited in place, whatever their count.
 *
 * Validation and the memory reservation happen before the first write, so
 * a failing mutation leaves bindings, payloads and counts untouched.
 */

import { Environment, forceValue } from './environment';
import { ValueStore } from './store';
import {
  Element,
  Payload,
  Scalar,
  ValueId,
  isRef,
  lengthOf,
  mkCharacter,
  mkDouble,
  mkLogical,
  mkString,
  shallowCopy,
} from './values';
import { NODE_SIZE, cellBytes } from './sizes';
import { ImmutableTargetError } from './errors';

export type PathSegment = number | string;
export type Path = PathSegment | PathSegment[];

export type CopyListener = (oldId: ValueId, newId: ValueId) => void;

export interface MutationResult {
  /** Identity now bound to the mutated name. */
  id: ValueId;
  /** Every copy made on the way, outermost first. */
  copies: Array<[ValueId, ValueId]>;
}

/** One resolved level of the path. */
interface Step {
  container: ValueId;
  segment: PathSegment;
  /** Slot index for sequences; -1 for environments. */
  index: number;
  copy: boolean;
}

export class CopyOnModify {
  private store: ValueStore;
  private notify: CopyListener;

  constructor(store: ValueStore, notify: CopyListener) {
    this.store = store;
    this.notify = notify;
  }

  /**
   * Replace the element at `path` inside the Value bound to `name`.
   * If the outermost Value had to be copied, `name` is rebound in `env`.
   */
  mutate(env: Environment, name: string, path: Path, element: Element): MutationResult {
    const root = env.lookup(name);
    const segments = Array.isArray(path) ? path : [path];
    if (segments.length === 0) {
      throw new ImmutableTargetError(`empty path for '${name}'`);
    }

    // A binding found further up the chain is never edited through: the
    // result is always a local copy.
    const inherited = !env.hasOwn(name);
    const steps = this.plan(name, root, segments, element, inherited);
    const held = isRef(element) ? [env.id, element.ref] : [env.id];
    this.store.reserve(this.bytesNeeded(steps, element, inherited), held);

    const copies: Array<[ValueId, ValueId]> = [];
    const result = this.apply(steps, 0, element, copies);
    if (result !== root) env.define(name, result);
    return { id: result, copies };
  }

  // ---------------------------------------------------------------------------
  // Planning: validates the whole path before any write. Stepping through
  // a lazy binding forces it, which may run its thunk and allocate.
  // ---------------------------------------------------------------------------

  private plan(name: string, root: ValueId, segments: PathSegment[], element: Element, inherited: boolean): Step[] {
    if (isRef(element)) this.store.read(element.ref);

    const steps: Step[] = [];
    let container = root;
    let ancestorCopied = inherited;

    for (let depth = 0; depth < segments.length; depth++) {
      const segment = segments[depth];
      const payload = this.store.read(container);
      const isEnv = payload.kind === 'environment';
      const copy = !isEnv && (ancestorCopied || this.store.refCount(container) !== 1);
      const index = resolveSegment(name, payload, segment);
      steps.push({ container, segment, index, copy });

      const last = depth === segments.length - 1;
      if (last) {
        checkElement(name, payload, element);
        break;
      }

      const child = childAt(this.store, payload, segment, index);
      if (child === null) {
        throw new ImmutableTargetError(`'${name}' has no container at ${describeSegment(segment)}`);
      }
      // A copied list shares its elements with the original, so they are
      // no longer exclusively owned. Stepping through an environment
      // does not copy anything.
      ancestorCopied = copy;
      container = child;
    }
    return steps;
  }

  private bytesNeeded(steps: Step[], element: Element, inherited: boolean): number {
    let bytes = 0;
    for (const step of steps) {
      if (step.copy) bytes += this.store.bytesOf(step.container);
    }
    // A copied inherited value gets a new local binding.
    if (inherited && steps[0].copy) bytes += NODE_SIZE;
    const last = steps[steps.length - 1];
    const target = this.store.read(last.container);
    if (target.kind === 'environment' && !target.frame.has(String(last.segment))) bytes += NODE_SIZE;
    if (!isRef(element)) {
      if (target.kind === 'list' || target.kind === 'environment') {
        const wrapped = wrapScalar(element, null);
        bytes += cellBytes(wrapped);
        if (typeof element === 'string') bytes += cellBytes(mkString(element));
      } else if (target.kind === 'character' && typeof element === 'string') {
        bytes += cellBytes(mkString(element));
      }
    }
    return bytes;
  }

  // ---------------------------------------------------------------------------
  // Applying
  // ---------------------------------------------------------------------------

  private apply(steps: Step[], depth: number, element: Element, copies: Array<[ValueId, ValueId]>): ValueId {
    const step = steps[depth];
    let target = step.container;
    if (step.copy) {
      target = this.store.allocate(shallowCopy(this.store.read(step.container)));
      copies.push([step.container, target]);
      this.notify(step.container, target);
    }

    if (depth === steps.length - 1) {
      this.writeElement(target, step, element);
      return target;
    }

    const payload = this.store.read(target);
    const child = childAt(this.store, payload, step.segment, step.index);
    if (child === null) {
      throw new ImmutableTargetError(`no container at ${describeSegment(step.segment)}`);
    }
    const updated = this.apply(steps, depth + 1, element, copies);
    if (updated !== child) this.writeRef(target, step, updated);
    return target;
  }

  private writeElement(target: ValueId, step: Step, element: Element): void {
    const payload = this.store.read(target);
    switch (payload.kind) {
      case 'logical': {
        if (typeof element !== 'boolean' && element !== null) {
          throw new ImmutableTargetError('logical vectors take booleans');
        }
        payload.data[step.index] = element;
        break;
      }
      case 'integer':
      case 'double': {
        if (typeof element !== 'number' && element !== null) {
          throw new ImmutableTargetError(`${payload.kind} vectors take numbers`);
        }
        payload.data[step.index] = element;
        break;
      }
      case 'character': {
        if (isRef(element) || (element !== null && typeof element !== 'string')) {
          throw new ImmutableTargetError('character vectors take strings');
        }
        const text = element === null ? null : this.store.allocate(mkString(element));
        const old = payload.elements[step.index];
        if (text !== null) this.store.retain(text);
        payload.elements[step.index] = text;
        if (old !== null && old !== text) this.store.release(old);
        break;
      }
      case 'list':
      case 'environment': {
        const id = isRef(element) ? element.ref : this.allocateScalar(element);
        this.writeRef(target, step, id);
        return;
      }
      default:
        throw new ImmutableTargetError(`cannot modify a ${payload.kind}`);
    }
    this.store.touch(target);
  }

  private writeRef(target: ValueId, step: Step, id: ValueId): void {
    const payload = this.store.read(target);
    if (payload.kind === 'environment') {
      new Environment(this.store, target).define(String(step.segment), id);
      return;
    }
    if (payload.kind !== 'list') {
      throw new ImmutableTargetError(`cannot store a reference in a ${payload.kind}`);
    }
    const old = payload.elements[step.index];
    if (old === id) return;
    this.store.retain(id);
    payload.elements[step.index] = id;
    if (this.store.has(old)) this.store.release(old);
    this.store.touch(target);
  }

  private allocateScalar(value: Scalar): ValueId {
    const text = typeof value === 'string' ? this.store.allocate(mkString(value)) : null;
    return this.store.allocate(wrapScalar(value, text));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Length-1 vector holding `value`, as a literal would be in R. */
function wrapScalar(value: Scalar, text: ValueId | null): Payload {
  if (value === null) return mkLogical([null]);
  if (typeof value === 'number') return mkDouble([value]);
  if (typeof value === 'boolean') return mkLogical([value]);
  return mkCharacter([text]);
}

function describeSegment(segment: PathSegment): string {
  return typeof segment === 'number' ? `index ${segment}` : `'${segment}'`;
}

function resolveSegment(name: string, payload: Payload, segment: PathSegment): number {
  if (payload.kind === 'environment') {
    if (typeof segment !== 'string') {
      throw new ImmutableTargetError(`environments are indexed by name, not ${segment}`);
    }
    return -1;
  }

  const length = lengthOf(payload);
  if (length === null || payload.kind === 'null') {
    throw new ImmutableTargetError(`'${name}' is a ${payload.kind} and cannot be modified by element`);
  }

  if (typeof segment === 'string') {
    const names = payload.kind === 'list' ? payload.names : null;
    const index = names === null ? -1 : names.indexOf(segment);
    if (index < 0) throw new ImmutableTargetError(`'${name}' has no element named '${segment}'`);
    return index;
  }

  if (!Number.isInteger(segment) || segment < 0 || segment >= length) {
    throw new ImmutableTargetError(`index ${segment} out of range for '${name}' of length ${length}`);
  }
  return segment;
}

function childAt(store: ValueStore, payload: Payload, segment: PathSegment, index: number): ValueId | null {
  if (payload.kind === 'list') return payload.elements[index];
  if (payload.kind === 'environment' && typeof segment === 'string') {
    const bound = payload.frame.get(segment);
    return bound === undefined ? null : forceValue(store, bound);
  }
  return null;
}

function checkElement(name: string, payload: Payload, element: Element): void {
  if (payload.kind === 'list' || payload.kind === 'environment') return;
  if (isRef(element)) {
    throw new ImmutableTargetError(`cannot store a reference in ${payload.kind} vector '${name}'`);
  }
  if (element === null) return;
  const ok =
    (payload.kind === 'integer' && typeof element === 'number' && Number.isInteger(element)) ||
    (payload.kind === 'double' && typeof element === 'number') ||
    (payload.kind === 'logical' && typeof element === 'boolean') ||
    (payload.kind === 'character' && typeof element === 'string');
  if (!ok) {
    throw new ImmutableTargetError(`cannot store ${JSON.stringify(element)} in ${payload.kind} vector '${name}'`);
  }
}
