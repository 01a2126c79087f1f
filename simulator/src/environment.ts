/**
 * Lexical scoping environments.
 *
 * An Environment is a handle onto an `environment` Value in the store:
 * a frame of bindings plus a parent link. Because it is a Value, other
 * Values can reference it (including itself), and it shares the
 * store's lifetime rules.
 */

import { ValueStore } from './store';
import { NODE_SIZE } from './sizes';
import { EnvironmentPayload, ValueId, mkEnvironment } from './values';
import { NameNotFoundError, PromiseRecursionError, SimulatorError } from './errors';

export class Environment {
  readonly store: ValueStore;
  readonly id: ValueId;

  constructor(store: ValueStore, id: ValueId) {
    if (store.read(id).kind !== 'environment') {
      throw new SimulatorError(`value ${id} is not an environment`);
    }
    this.store = store;
    this.id = id;
  }

  /** Allocate a new environment enclosed by `parent`. */
  static create(store: ValueStore, parent: Environment | null, label: string | null = null): Environment {
    const id = store.allocate(mkEnvironment(parent === null ? null : parent.id, label));
    return new Environment(store, id);
  }

  get label(): string | null {
    return this.payload().label;
  }

  get parent(): Environment | null {
    const parent = this.payload().parent;
    return parent === null ? null : new Environment(this.store, parent);
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   * Lazy bindings are forced and the forced value is returned.
   */
  lookup(name: string): ValueId {
    const env = this.where(name);
    if (env === null) throw new NameNotFoundError(name);
    const id = env.payload().frame.get(name);
    if (id === undefined) throw new NameNotFoundError(name);
    return forceValue(this.store, id);
  }

  /** The binding in this frame only, unforced. */
  getOwn(name: string): ValueId | undefined {
    return this.payload().frame.get(name);
  }

  /** Check if a variable is defined in this environment or any parent. */
  has(name: string): boolean {
    return this.where(name) !== null;
  }

  hasOwn(name: string): boolean {
    return this.payload().frame.has(name);
  }

  /** The nearest environment in the chain that binds `name`. */
  where(name: string): Environment | null {
    let current: ValueId | null = this.id;
    while (current !== null) {
      const payload = readEnvironment(this.store, current);
      if (payload.frame.has(name)) {
        return current === this.id ? this : new Environment(this.store, current);
      }
      current = payload.parent;
    }
    return null;
  }

  /**
   * Bind `name` in this frame, replacing any local binding. A new name
   * grows the frame, so its node is reserved first.
   */
  define(name: string, id: ValueId): void {
    this.store.read(id);
    const frame = this.payload().frame;
    const old = frame.get(name);
    if (old === id) return;
    if (old === undefined) this.store.reserve(NODE_SIZE, [this.id, id]);
    this.store.retain(id);
    frame.set(name, id);
    if (old !== undefined && this.store.has(old)) this.store.release(old);
    this.store.touch(this.id);
  }

  /**
   * Superassignment: rebind the nearest existing binding of `name`.
   * Fails if nothing in the chain binds it.
   */
  assign(name: string, id: ValueId): void {
    const env = this.where(name);
    if (env === null) throw new NameNotFoundError(name);
    env.define(name, id);
  }

  /** Remove a binding from this frame. */
  remove(name: string): boolean {
    const frame = this.payload().frame;
    const old = frame.get(name);
    if (old === undefined) return false;
    frame.delete(name);
    if (this.store.has(old)) this.store.release(old);
    this.store.touch(this.id);
    return true;
  }

  names(): string[] {
    return Array.from(this.payload().frame.keys());
  }

  /** Create a child scope. */
  child(label: string | null = null): Environment {
    return Environment.create(this.store, this, label);
  }

  private payload(): EnvironmentPayload {
    return readEnvironment(this.store, this.id);
  }
}

function readEnvironment(store: ValueStore, id: ValueId): EnvironmentPayload {
  const payload = store.read(id);
  if (payload.kind !== 'environment') {
    throw new SimulatorError(`value ${id} is not an environment`);
  }
  return payload;
}

/**
 * Force a promise, returning the value it stands for. Non-promises are
 * returned as they are. A promise is evaluated at most once; its
 * evaluation environment is dropped after that.
 */
export function forceValue(store: ValueStore, id: ValueId): ValueId {
  const p = store.read(id);
  if (p.kind !== 'promise') return id;
  if (p.value !== null) return p.value;
  if (p.forcing) throw new PromiseRecursionError(p.name);

  p.forcing = true;
  let value: ValueId;
  try {
    const evalEnv = p.env === null ? null : new Environment(store, p.env);
    if (evalEnv === null) throw new SimulatorError(`promise for '${p.name}' has no environment`);
    value = forceValue(store, p.thunk(evalEnv));
  } finally {
    p.forcing = false;
  }

  store.retain(value);
  p.value = value;
  if (p.env !== null) {
    const env = p.env;
    p.env = null;
    store.release(env);
  }
  return value;
}
