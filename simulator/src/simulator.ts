/**
 * The simulator: one value store with its top-level environment, call
 * stack, copy-on-modify engine, collector and tracer wired together.
 *
 * Every operation runs to completion before the next one starts; nothing
 * here suspends.
 */

import { ValueStore } from './store';
import { StringPool } from './strings';
import { Environment } from './environment';
import { CopyOnModify, MutationResult, Path } from './cow';
import { Collector, GcStats } from './gc';
import { RefTreeOptions, Tracer, CopyCallback, formatValue, refTree, sizeOf, traceId } from './inspect';
import { Arg, CallStack, applyClosure, dotsValues, isMissing } from './functions';
import { SimulatorConfig, parseConfig } from './config';
import {
  ClosureBody,
  Element,
  Formal,
  Payload,
  Scalar,
  ValueId,
  mkCharacter,
  mkClosure,
  mkDouble,
  mkInteger,
  mkList,
  mkLogical,
  mkNull,
  mkSeq,
  mkString,
  MAX_VECTOR_LENGTH,
  isIntValue,
} from './values';
import { POINTER_SIZE, vectorBytes } from './sizes';
import { SimulatorError } from './errors';

export interface SimulatorOptions extends Partial<SimulatorConfig> {
  /** String pool to intern into; the simulator makes its own when omitted. */
  strings?: StringPool;
  /** Sink for collector logging. */
  log?: (message: string) => void;
}

export const GLOBAL_ENV_LABEL = 'R_GlobalEnv';

export class Simulator {
  readonly config: SimulatorConfig;
  readonly store: ValueStore;
  readonly tracer: Tracer;
  readonly collector: Collector;
  readonly global: Environment;

  private cow: CopyOnModify;
  private stack = new CallStack();

  constructor(options: SimulatorOptions = {}) {
    const { strings, log, ...settings } = options;
    this.config = parseConfig(settings);
    this.store = new ValueStore({
      strings,
      gcThreshold: this.config.gcThreshold,
      growthFactor: this.config.growthFactor,
      memoryLimit: this.config.memoryLimit,
    });
    this.tracer = new Tracer(this.store);
    // The top-level environment exists before the collector can run.
    this.global = Environment.create(this.store, null, GLOBAL_ENV_LABEL);
    this.collector = new Collector(this.store, () => this.roots(), { verbose: this.config.gcVerbose, log });
    this.cow = new CopyOnModify(this.store, (oldId, newId) => this.tracer.notify(oldId, newId));
  }

  /** The root set: the top-level environment plus every active frame. */
  roots(): ValueId[] {
    return [this.global.id, ...this.stack.rootIds()];
  }

  /**
   * Run `fn` as one operation. Values it allocates survive automatic
   * collections until it returns, bound or not. The methods below that
   * allocate or bind each run as an operation of their own.
   */
  operation<T>(fn: () => T): T {
    return this.store.operation(fn);
  }

  get callDepth(): number {
    return this.stack.depth;
  }

  // ---------------------------------------------------------------------------
  // Constructing values
  // ---------------------------------------------------------------------------

  allocate(payload: Payload): ValueId {
    return this.operation(() => this.store.allocate(payload));
  }

  nil(): ValueId {
    return this.allocate(mkNull());
  }

  logical(values: Array<boolean | null>): ValueId {
    return this.allocate(mkLogical([...values]));
  }

  integer(values: Array<number | null>): ValueId {
    return this.allocate(mkInteger([...values]));
  }

  double(values: Array<number | null>): ValueId {
    return this.allocate(mkDouble([...values]));
  }

  /** Character vector; each text goes through the string pool. */
  character(values: Array<string | null>): ValueId {
    return this.operation(() => {
      const elements = values.map(v => (v === null ? null : this.allocate(mkString(v))));
      return this.allocate(mkCharacter(elements));
    });
  }

  /** Integer sequence `from:to`; both ends must be integers R can hold. */
  seq(from: number, to: number): ValueId {
    if (!isIntValue(from) || !isIntValue(to)) {
      throw new SimulatorError(`invalid sequence bounds ${from}:${to}`);
    }
    return this.operation(() => {
      // Room for the data is made before it is built.
      this.store.reserve(vectorBytes(Math.abs(to - from) + 1, 4));
      return this.allocate(mkSeq(from, to));
    });
  }

  /** `value` repeated `times` times, as rep() would. */
  rep(value: Scalar, times: number): ValueId {
    if (!Number.isInteger(times) || times < 0 || times > MAX_VECTOR_LENGTH) {
      throw new SimulatorError(`invalid 'times' argument: ${times}`);
    }
    return this.operation(() => {
      if (typeof value === 'string') {
        const text = this.allocate(mkString(value));
        this.store.reserve(vectorBytes(times, POINTER_SIZE), [text]);
        return this.allocate(mkCharacter(new Array<ValueId>(times).fill(text)));
      }
      if (typeof value === 'number') {
        this.store.reserve(vectorBytes(times, 8));
        return this.double(new Array<number>(times).fill(value));
      }
      this.store.reserve(vectorBytes(times, 4));
      return this.logical(new Array<boolean | null>(times).fill(value));
    });
  }

  list(elements: ValueId[], names: string[] | null = null): ValueId {
    return this.allocate(mkList([...elements], names === null ? null : [...names]));
  }

  environment(parent: Environment | null = this.global, label: string | null = null): Environment {
    return this.operation(() => Environment.create(this.store, parent, label));
  }

  /** View an environment Value as an Environment. */
  asEnvironment(id: ValueId): Environment {
    return new Environment(this.store, id);
  }

  /** A closure capturing `env` as its defining environment. */
  closure(formals: Formal[], body: ClosureBody, env: Environment = this.global): ValueId {
    return this.allocate(mkClosure([...formals], body, env.id));
  }

  // ---------------------------------------------------------------------------
  // Bindings
  // ---------------------------------------------------------------------------

  bind(name: string, id: ValueId, env: Environment = this.global): ValueId {
    this.operation(() => env.define(name, id));
    return id;
  }

  get(name: string, env: Environment = this.global): ValueId {
    return env.lookup(name);
  }

  assign(name: string, id: ValueId, env: Environment = this.global): void {
    this.operation(() => env.assign(name, id));
  }

  remove(name: string, env: Environment = this.global): boolean {
    return env.remove(name);
  }

  mutate(name: string, path: Path, element: Element, env: Environment = this.global): MutationResult {
    return this.operation(() => this.cow.mutate(env, name, path, element));
  }

  // ---------------------------------------------------------------------------
  // Functions
  // ---------------------------------------------------------------------------

  /** Call a closure (by identity, or by name looked up from `env`). */
  call(fn: ValueId | string, args: Arg[] = [], env: Environment = this.global): ValueId {
    return this.operation(() => {
      const id = typeof fn === 'string' ? env.lookup(fn) : fn;
      return applyClosure(this.store, this.stack, id, args, env);
    });
  }

  /** Register a handler to run when the call running in `frame` exits. */
  onExit(frame: Environment, handler: () => void): void {
    const record = this.stack.find(frame);
    if (record === null) throw new SimulatorError('onExit() outside of an active call frame');
    record.exitHandlers.push(handler);
  }

  isMissing(frame: Environment, name: string): boolean {
    return isMissing(frame, name);
  }

  dots(frame: Environment): ValueId[] {
    return dotsValues(frame);
  }

  // ---------------------------------------------------------------------------
  // Collection
  // ---------------------------------------------------------------------------

  collect(): number {
    return this.collector.collect();
  }

  get gcStats(): GcStats {
    return this.collector.stats;
  }

  // ---------------------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------------------

  read(id: ValueId): Payload {
    return this.store.read(id);
  }

  refCount(id: ValueId): number {
    return this.store.refCount(id);
  }

  traceId(id: ValueId): string {
    this.store.read(id);
    return traceId(id);
  }

  onCopy(id: ValueId, callback: CopyCallback): () => void {
    this.store.read(id);
    return this.tracer.onCopy(id, callback);
  }

  untrace(id: ValueId): boolean {
    return this.tracer.untrace(id);
  }

  /** Combined size of the Values reachable from `ids`; the top-level environment is not counted. */
  sizeOf(...ids: ValueId[]): number {
    return sizeOf(this.store, ids, new Set([this.global.id]));
  }

  memUsed(): number {
    return this.store.bytesInUse;
  }

  refTree(id: ValueId, options?: Omit<RefTreeOptions, 'boundary'>): string {
    return refTree(this.store, id, { ...options, boundary: new Set([this.global.id]) });
  }

  format(id: ValueId): string {
    return formatValue(this.store, id);
  }

  /** Elements of a vector as host scalars; strings are resolved through the pool. */
  toScalars(id: ValueId): Scalar[] {
    const payload = this.store.read(id);
    switch (payload.kind) {
      case 'logical':
      case 'integer':
      case 'double':
        return [...payload.data];
      case 'character':
        return payload.elements.map(e => {
          if (e === null) return null;
          const text = this.store.read(e);
          return text.kind === 'string' ? text.text : null;
        });
      case 'string':
        return [payload.text];
      case 'null':
        return [];
      default:
        throw new SimulatorError(`a ${payload.kind} has no scalar elements`);
    }
  }

  /** Detach the string pool. The simulator must not be used afterwards. */
  dispose(): void {
    this.store.dispose();
  }
}
