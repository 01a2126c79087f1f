/**
 * Textual command layer over the simulator, shared by the REPL and the
 * script runner.
 *
 *   bind x 1:3          bind a new Value (or an existing one: bind y x)
 *   mutate y 3 4        y[[3]] <- 4 (1-based; names and a/b paths too)
 *   trace x             report copies of x's current Value
 *   gc | size x y | ref x | refs x | mem | ls | rm x | print x
 */

import { Simulator } from './simulator';
import { Element, Scalar, ValueId } from './values';
import { PathSegment } from './cow';
import { SimulatorError } from './errors';

export class CommandError extends SimulatorError {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export interface CommandOutcome {
  output: string[];
  error: SimulatorError | null;
}

const NAME = /^[A-Za-z.][A-Za-z0-9._]*$/;

export const HELP_TEXT = [
  'Commands:',
  '  bind <name> <expr>        Bind a value. <expr> is a:b, 1,2.5, TRUE, NA, "text",',
  '                            rep(<literal>, n), env(), list(a, k = b), NULL, or a name',
  '  mutate <name> <at> <val>  Replace one element (1-based index, a name, or a/b path)',
  '  trace <name>              Print copy notifications for the bound value',
  '  untrace <name>            Stop tracing',
  '  print <name>              Show a value (a bare name works too)',
  '  ref <name> [strings]      Show the reference tree',
  '  refs <name>               Show the reference count (0, 1 or many)',
  '  size <name>...            Combined size in bytes',
  '  mem                       Bytes in use',
  '  gc                        Run the garbage collector',
  '  ls                        List bindings',
  '  rm <name>                 Remove a binding',
  '  help                      Show this help',
];

export class CommandInterpreter {
  readonly sim: Simulator;
  private out: string[] = [];

  constructor(sim: Simulator = new Simulator()) {
    this.sim = sim;
  }

  /**
   * Run one input line; `;` separates commands. Execution stops at the
   * first failing command, keeping what earlier ones printed.
   */
  execute(line: string): CommandOutcome {
    this.out = [];
    try {
      for (const command of splitOutsideQuotes(line, ';')) {
        const trimmed = command.trim();
        // One operation per command: automatic collections keep what an
        // expression builds until the command has bound it.
        if (trimmed !== '' && !trimmed.startsWith('#')) this.sim.operation(() => this.run(trimmed));
      }
      return { output: this.out, error: null };
    } catch (e) {
      if (e instanceof SimulatorError) return { output: this.out, error: e };
      throw e;
    }
  }

  private run(command: string): void {
    const space = command.search(/\s/);
    const verb = space < 0 ? command : command.slice(0, space);
    const rest = space < 0 ? '' : command.slice(space + 1).trim();
    const args = rest === '' ? [] : rest.split(/\s+/);

    switch (verb) {
      case 'bind':
        this.bind(rest);
        break;
      case 'mutate':
        this.mutate(rest);
        break;
      case 'gc': {
        const reclaimed = this.sim.collect();
        this.out.push(`reclaimed ${reclaimed} values, ${this.sim.memUsed()} bytes in use`);
        break;
      }
      case 'size':
        if (args.length === 0) throw new CommandError('usage: size <name>...');
        this.out.push(`${this.sim.sizeOf(...args.map(a => this.value(a)))} bytes`);
        break;
      case 'mem':
        this.out.push(`${this.sim.memUsed()} bytes in use (${this.sim.store.count} values)`);
        break;
      case 'trace':
        this.trace(single(args, 'trace <name>'));
        break;
      case 'untrace':
        this.sim.untrace(this.value(single(args, 'untrace <name>')));
        break;
      case 'ref': {
        if (args.length < 1 || args.length > 2 || (args.length === 2 && args[1] !== 'strings')) {
          throw new CommandError('usage: ref <name> [strings]');
        }
        const tree = this.sim.refTree(this.value(args[0]), { strings: args.length === 2 });
        this.out.push(...tree.split('\n'));
        break;
      }
      case 'refs': {
        const count = this.sim.refCount(this.value(single(args, 'refs <name>')));
        this.out.push(count > 1 ? 'many' : String(count));
        break;
      }
      case 'print':
        this.out.push(this.sim.format(this.value(single(args, 'print <name>'))));
        break;
      case 'ls':
        for (const name of this.sim.global.names().sort()) {
          this.out.push(`${name} ${this.sim.traceId(this.sim.get(name))}`);
        }
        break;
      case 'rm': {
        const name = single(args, 'rm <name>');
        if (!this.sim.remove(name)) throw new CommandError(`object '${name}' not found`);
        break;
      }
      case 'help':
        this.out.push(...HELP_TEXT);
        break;
      default:
        if (args.length === 0 && NAME.test(verb)) {
          this.out.push(this.sim.format(this.value(verb)));
          break;
        }
        throw new CommandError(`unknown command '${verb}' (try help)`);
    }
  }

  private bind(rest: string): void {
    const space = rest.search(/\s/);
    if (space < 0) throw new CommandError('usage: bind <name> <expr>');
    const name = rest.slice(0, space);
    if (!NAME.test(name)) throw new CommandError(`invalid name '${name}'`);
    const id = this.evaluate(rest.slice(space + 1).trim());
    this.sim.bind(name, id);
    this.out.push(`${name} ${this.sim.traceId(id)}`);
  }

  private mutate(rest: string): void {
    const parts = splitOutsideQuotes(rest, ' ').filter(p => p !== '');
    if (parts.length !== 3) throw new CommandError('usage: mutate <name> <index|name> <value>');
    const [name, at, raw] = parts;
    const path = at.split('/').map(parseSegment);
    const element: Element = NAME.test(raw) && !isKeyword(raw) ? { ref: this.value(raw) } : parseScalar(raw);
    const result = this.sim.mutate(name, path, element);
    this.out.push(`${name} ${this.sim.traceId(result.id)}`);
  }

  private trace(name: string): void {
    const id = this.value(name);
    const label = this.sim.traceId(id);
    if (!this.sim.tracer.isTraced(id)) {
      this.sim.onCopy(id, (oldId, newId) => {
        this.out.push(`tracemem[${this.sim.traceId(oldId)} -> ${this.sim.traceId(newId)}]`);
      });
    }
    this.out.push(label);
  }

  private value(name: string): ValueId {
    return this.sim.get(name);
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private evaluate(expr: string): ValueId {
    const range = /^(-?\d+):(-?\d+)$/.exec(expr);
    if (range) return this.sim.seq(Number(range[1]), Number(range[2]));

    if (expr === 'env()') return this.sim.environment().id;
    if (expr === 'NULL') return this.sim.nil();

    const call = /^(rep|list)\((.*)\)$/.exec(expr);
    if (call) {
      const args = call[2].trim() === '' ? [] : splitOutsideQuotes(call[2], ',').map(a => a.trim());
      return call[1] === 'rep' ? this.evaluateRep(args) : this.evaluateList(args);
    }

    if (NAME.test(expr) && !isKeyword(expr)) return this.value(expr);

    const literals = splitOutsideQuotes(expr, ',').map(a => parseScalar(a.trim()));
    return this.vector(literals);
  }

  private evaluateRep(args: string[]): ValueId {
    if (args.length !== 2) throw new CommandError('usage: rep(<literal>, <times>)');
    const times = Number(args[1]);
    if (!Number.isInteger(times) || times < 0) throw new CommandError(`invalid times '${args[1]}'`);
    return this.sim.rep(parseScalar(args[0]), times);
  }

  private evaluateList(args: string[]): ValueId {
    const names: string[] = [];
    const elements = args.map(arg => {
      const eq = /^([A-Za-z.][A-Za-z0-9._]*)\s*=\s*(.+)$/.exec(arg);
      names.push(eq ? eq[1] : '');
      const source = eq ? eq[2] : arg;
      if (NAME.test(source) && !isKeyword(source)) return this.value(source);
      return this.vector([parseScalar(source)]);
    });
    return this.sim.list(elements, names.some(n => n !== '') ? names : null);
  }

  /** Build a vector from literals; the type follows the non-NA elements. */
  private vector(items: Scalar[]): ValueId {
    const present = items.filter((v): v is number | boolean | string => v !== null);
    if (present.length === 0 || present.every(v => typeof v === 'boolean')) {
      return this.sim.logical(items.map(v => (typeof v === 'boolean' ? v : null)));
    }
    if (present.every(v => typeof v === 'number')) {
      return this.sim.double(items.map(v => (typeof v === 'number' ? v : null)));
    }
    if (present.every(v => typeof v === 'string')) {
      return this.sim.character(items.map(v => (typeof v === 'string' ? v : null)));
    }
    throw new CommandError('cannot mix literal types in one vector');
  }
}

// ---------------------------------------------------------------------------
// Lexical helpers
// ---------------------------------------------------------------------------

function isKeyword(word: string): boolean {
  return word === 'TRUE' || word === 'FALSE' || word === 'NA' || word === 'NULL';
}

function single(args: string[], usage: string): string {
  if (args.length !== 1) throw new CommandError(`usage: ${usage}`);
  return args[0];
}

function parseSegment(raw: string): PathSegment {
  if (/^\d+$/.test(raw)) {
    const n = Number(raw);
    if (n < 1) throw new CommandError(`indexes start at 1, got ${raw}`);
    return n - 1;
  }
  if (!NAME.test(raw)) throw new CommandError(`invalid path segment '${raw}'`);
  return raw;
}

/** Parse a literal: number, TRUE, FALSE, NA or a double-quoted string. */
export function parseScalar(raw: string): Scalar {
  if (raw === 'TRUE') return true;
  if (raw === 'FALSE') return false;
  if (raw === 'NA') return null;
  if (raw.startsWith('"')) {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed === 'string') return parsed;
    } catch (e) {
      throw new CommandError(`malformed string ${raw}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  if (/^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(raw)) return Number(raw);
  throw new CommandError(`cannot parse '${raw}'`);
}

/** Split on `sep`, ignoring separators inside double quotes. */
export function splitOutsideQuotes(text: string, sep: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (inString) {
      current += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    if (ch === sep) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

// ---------------------------------------------------------------------------
// Scripts
// ---------------------------------------------------------------------------

export interface ScriptSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * Run a script line by line, stopping at the first error.
 * Returns true if every line succeeded.
 */
export function runScript(source: string, interpreter: CommandInterpreter, sink: ScriptSink): boolean {
  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const outcome = interpreter.execute(lines[i]);
    for (const line of outcome.output) sink.out(line);
    if (outcome.error !== null) {
      sink.err(`line ${i + 1}: ${outcome.error.message}`);
      return false;
    }
  }
  return true;
}
