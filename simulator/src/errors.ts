/**
 * Error types for the simulator.
 *
 * Every failure surfaces synchronously as a subclass of SimulatorError.
 * The message starts with the taxonomy tag so REPL output reads the same
 * whichever layer raised it.
 */

export class SimulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatorError';
  }
}

export class NameNotFoundError extends SimulatorError {
  public readonly symbol: string;

  constructor(symbol: string) {
    super(`NameNotFound: object '${symbol}' not found`);
    this.name = 'NameNotFoundError';
    this.symbol = symbol;
  }
}

export class ImmutableTargetError extends SimulatorError {
  constructor(reason: string) {
    super(`ImmutableTarget: ${reason}`);
    this.name = 'ImmutableTargetError';
  }
}

export class OutOfMemoryError extends SimulatorError {
  public readonly requested: number;
  public readonly limit: number;

  constructor(requested: number, inUse: number, limit: number) {
    super(`OutOfMemory: cannot allocate ${requested} bytes (${inUse} in use, limit ${limit})`);
    this.name = 'OutOfMemoryError';
    this.requested = requested;
    this.limit = limit;
  }
}

export class InvalidValueError extends SimulatorError {
  constructor(id: number) {
    super(`InvalidValue: no live value with id ${id}`);
    this.name = 'InvalidValueError';
  }
}

export class ArgumentMatchError extends SimulatorError {
  constructor(message: string) {
    super(`ArgumentMatch: ${message}`);
    this.name = 'ArgumentMatchError';
  }
}

export class MissingArgumentError extends SimulatorError {
  constructor(formal: string) {
    super(`MissingArgument: argument "${formal}" is missing, with no default`);
    this.name = 'MissingArgumentError';
  }
}

export class PromiseRecursionError extends SimulatorError {
  constructor(name: string) {
    super(`PromiseRecursion: promise for '${name}' already under evaluation`);
    this.name = 'PromiseRecursionError';
  }
}

export class ConfigError extends SimulatorError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`ConfigError: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Signal thrown by a closure body to return early.
 * This is NOT an error -- function application catches it.
 */
export class ReturnSignal {
  public readonly value: number;

  constructor(value: number) {
    this.value = value;
  }
}
