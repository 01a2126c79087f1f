/**
 * Closures, argument matching and function application.
 *
 * A call creates a frame whose parent is the closure's *defining*
 * environment, so free names resolve lexically, and they resolve when
 * they are looked up, not when the closure was made. Arguments are bound
 * as promises and only evaluated when the body first looks them up.
 */

import { Environment, forceValue } from './environment';
import { ValueStore } from './store';
import { ClosurePayload, Formal, Thunk, ValueId, mkEnvironment, mkList, mkPromise } from './values';
import { ArgumentMatchError, MissingArgumentError, ReturnSignal, SimulatorError } from './errors';

/** The formal that collects unmatched arguments. */
export const DOTS = '...';

/**
 * An actual argument: either an already-evaluated Value, or a thunk to be
 * evaluated lazily in the calling environment.
 */
export interface Arg {
  name?: string;
  value: ValueId | Thunk;
}

export interface ArgumentMatch {
  /** Formal name to the index of the supplied argument bound to it. */
  matched: Map<string, number>;
  /** Indexes of supplied arguments collected by `...`. */
  dots: number[];
}

// ---------------------------------------------------------------------------
// Argument matching
// ---------------------------------------------------------------------------

/**
 * Match supplied arguments to formals in three passes: exact names, then
 * unique prefixes (only for formals before `...`), then position.
 */
export function matchArguments(formals: string[], supplied: Array<{ name?: string }>): ArgumentMatch {
  const dotsAt = formals.indexOf(DOTS);
  const beforeDots = (k: number): boolean => dotsAt < 0 || k < dotsAt;
  const matched = new Map<string, number>();
  const used = supplied.map(() => false);

  // Pass 1: exact
  supplied.forEach((arg, i) => {
    if (!arg.name || arg.name === DOTS || !formals.includes(arg.name)) return;
    if (matched.has(arg.name)) {
      throw new ArgumentMatchError(`formal argument "${arg.name}" matched by multiple actual arguments`);
    }
    matched.set(arg.name, i);
    used[i] = true;
  });

  // Pass 2: partial
  const partial = formals.filter((f, k) => f !== DOTS && beforeDots(k) && !matched.has(f));
  supplied.forEach((arg, i) => {
    const name = arg.name;
    if (used[i] || !name) return;
    const hits = partial.filter(f => f.startsWith(name));
    if (hits.length > 1) {
      throw new ArgumentMatchError(`argument ${i + 1} matches multiple formal arguments`);
    }
    if (hits.length === 0) return;
    if (matched.has(hits[0])) {
      throw new ArgumentMatchError(`formal argument "${hits[0]}" matched by multiple actual arguments`);
    }
    matched.set(hits[0], i);
    used[i] = true;
  });

  // Pass 3: positional
  const positional = formals.filter((f, k) => f !== DOTS && beforeDots(k) && !matched.has(f));
  const dots: number[] = [];
  let next = 0;
  supplied.forEach((arg, i) => {
    if (used[i]) return;
    if (!arg.name && next < positional.length) {
      matched.set(positional[next++], i);
      return;
    }
    if (dotsAt >= 0) {
      dots.push(i);
      return;
    }
    throw new ArgumentMatchError(
      arg.name ? `unused argument (${arg.name} = ...)` : `unused argument (argument ${i + 1})`,
    );
  });

  return { matched, dots };
}

// ---------------------------------------------------------------------------
// Call stack
// ---------------------------------------------------------------------------

export interface Frame {
  env: Environment;
  closure: ValueId;
  /** The closure and the evaluated arguments, held for the whole call. */
  pinned: ValueId[];
  exitHandlers: Array<() => void>;
}

/** Active call frames. Every frame environment and pinned Value is a collector root. */
export class CallStack {
  private frames: Frame[] = [];

  push(frame: Frame): void {
    this.frames.push(frame);
  }

  pop(): Frame | undefined {
    return this.frames.pop();
  }

  get depth(): number {
    return this.frames.length;
  }

  current(): Frame | null {
    return this.frames.length > 0 ? this.frames[this.frames.length - 1] : null;
  }

  /** The frame running in `env`, if any. */
  find(env: Environment): Frame | null {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (this.frames[i].env.id === env.id) return this.frames[i];
    }
    return null;
  }

  rootIds(): ValueId[] {
    return this.frames.flatMap(f => [f.env.id, ...f.pinned]);
  }
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

function readClosure(store: ValueStore, id: ValueId): ClosurePayload {
  const payload = store.read(id);
  if (payload.kind !== 'closure') {
    throw new SimulatorError(`attempt to apply non-function (${payload.kind})`);
  }
  return payload;
}

function missingThunk(name: string): Thunk {
  return () => {
    throw new MissingArgumentError(name);
  };
}

function bindArgument(store: ValueStore, formal: string, arg: Arg, caller: Environment): ValueId {
  if (typeof arg.value === 'function') {
    return store.allocate(mkPromise(formal, arg.value, caller.id, 'supplied'));
  }
  store.read(arg.value);
  return arg.value;
}

function bindFormal(store: ValueStore, frame: Environment, formal: Formal, arg: Arg | undefined, caller: Environment): void {
  if (arg !== undefined) {
    frame.define(formal.name, bindArgument(store, formal.name, arg, caller));
  } else if (formal.default !== undefined) {
    frame.define(formal.name, store.allocate(mkPromise(formal.name, formal.default, frame.id, 'default')));
  } else {
    frame.define(formal.name, store.allocate(mkPromise(formal.name, missingThunk(formal.name), frame.id, 'missing')));
  }
}

/**
 * Apply the closure `fn` to `args` from `caller`.
 *
 * The frame stays on `stack` (and so stays a root) until the body and
 * its exit handlers have finished. After that it is no longer held, so a
 * frame nothing captured can be reclaimed by the next collection. The
 * returned Value is unrooted until the caller binds it.
 */
export function applyClosure(store: ValueStore, stack: CallStack, fn: ValueId, args: Arg[], caller: Environment): ValueId {
  const closure = readClosure(store, fn);
  const match = matchArguments(closure.formals.map(f => f.name), args);

  const values = args.map(a => a.value).filter((v): v is ValueId => typeof v === 'number');
  const pinned = [fn, caller.id, ...values];
  const frame = new Environment(store, store.allocate(mkEnvironment(closure.env), pinned));
  const record: Frame = { env: frame, closure: fn, pinned, exitHandlers: [] };
  stack.push(record);
  let result: ValueId | null = null;
  try {
    for (const formal of closure.formals) {
      if (formal.name === DOTS) {
        const elements = match.dots.map(i => bindArgument(store, DOTS, args[i], caller));
        const names = match.dots.map(i => args[i].name ?? '');
        const named = names.some(n => n !== '');
        frame.define(DOTS, store.allocate(mkList(elements, named ? names : null)));
        continue;
      }
      const index = match.matched.get(formal.name);
      bindFormal(store, frame, formal, index === undefined ? undefined : args[index], caller);
    }

    let value: ValueId;
    try {
      value = closure.body(frame);
    } catch (e) {
      if (!(e instanceof ReturnSignal)) throw e;
      value = e.value;
    }
    store.read(value);
    result = value;
    return value;
  } finally {
    try {
      for (const handler of record.exitHandlers) handler();
    } finally {
      stack.pop();
      if (result !== frame.id) store.settle(frame.id);
    }
  }
}

/** Return early from a closure body. */
export function returnValue(id: ValueId): never {
  throw new ReturnSignal(id);
}

/** True when the formal `name` was not supplied by the caller. */
export function isMissing(frame: Environment, name: string): boolean {
  const bound = frame.getOwn(name);
  if (bound === undefined) throw new SimulatorError(`'${name}' is not a formal argument of this frame`);
  const payload = frame.store.read(bound);
  return payload.kind === 'promise' && payload.origin !== 'supplied';
}

/** Force and return the Values collected by `...` in `frame`. */
export function dotsValues(frame: Environment): ValueId[] {
  const bound = frame.getOwn(DOTS);
  if (bound === undefined) return [];
  const payload = frame.store.read(bound);
  if (payload.kind !== 'list') return [];
  return payload.elements.map(id => forceValue(frame.store, id));
}
