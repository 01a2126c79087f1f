/**
 * cowsim: a simulator of R's binding, copy-on-modify and garbage
 * collection semantics.
 */

export { Simulator, SimulatorOptions, GLOBAL_ENV_LABEL } from './simulator';
export { ValueStore, ValueStoreOptions, RefCount, MANY } from './store';
export { StringPool } from './strings';
export { Environment, forceValue } from './environment';
export { CopyOnModify, MutationResult, Path, PathSegment } from './cow';
export { Collector, GcStats, GcTrigger } from './gc';
export { Tracer, CopyCallback, traceId, sizeOf, reachable, refTree, formatValue } from './inspect';
export { Arg, ArgumentMatch, CallStack, DOTS, matchArguments, applyClosure, returnValue, isMissing, dotsValues } from './functions';
export { SimulatorConfig, SimulatorConfigSchema, DEFAULT_CONFIG, parseConfig, loadConfig } from './config';
export { cellBytes, roundVectorData } from './sizes';
export * from './values';
export * from './errors';
