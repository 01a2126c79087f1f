/**
 * Command layer tests: the textual forms the REPL and scripts accept.
 */

import { CommandError, CommandInterpreter, HELP_TEXT, parseScalar, runScript, splitOutsideQuotes } from '../src/commands';
import { traceId } from '../src/inspect';
import { ImmutableTargetError, NameNotFoundError, SimulatorError } from '../src/errors';

function run(interp: CommandInterpreter, line: string): string[] {
  const outcome = interp.execute(line);
  if (outcome.error !== null) throw outcome.error;
  return outcome.output;
}

// ==================================================================
// Binding and copying
// ==================================================================

describe('CommandInterpreter', () => {
  test('copying a shared vector is traced', () => {
    const interp = new CommandInterpreter();
    const output = run(interp, 'bind x 1:3; bind y x; trace x; mutate y 3 4');
    const x = interp.sim.traceId(interp.sim.get('x'));
    const y = interp.sim.traceId(interp.sim.get('y'));
    expect(output).toEqual([`x ${x}`, `y ${x}`, x, `tracemem[${x} -> ${y}]`, `y ${y}`]);

    expect(run(interp, 'print x')).toEqual(['c(1L, 2L, 3L)']);
    expect(run(interp, 'y')).toEqual(['c(1L, 2L, 4L)']);
  });

  test('environments are shared, not copied', () => {
    const interp = new CommandInterpreter();
    const output = run(interp, 'bind e1 env(); bind e2 e1; trace e1; mutate e1 c 4');
    const sim = interp.sim;
    const e = sim.traceId(sim.get('e1'));
    expect(output).toEqual([`e1 ${e}`, `e2 ${e}`, e, `e1 ${e}`]);
    expect(sim.toScalars(sim.get('c', sim.asEnvironment(sim.get('e2'))))).toEqual([4]);
  });

  test('lists and nested paths are 1-based', () => {
    const interp = new CommandInterpreter();
    run(interp, 'bind a 1:2; bind l list(a, k = 3)');
    expect(run(interp, 'print l')).toEqual(['list(c(1L, 2L), k = 3)']);
    run(interp, 'mutate l 1/2 7');
    expect(run(interp, 'print l')).toEqual(['list(c(1L, 7L), k = 3)']);
    run(interp, 'mutate l k "z"');
    expect(run(interp, 'print l')).toEqual(['list(c(1L, 7L), k = "z")']);
  });

  test('literal vectors take their type from the elements', () => {
    const interp = new CommandInterpreter();
    run(interp, 'bind b TRUE, NA; bind d 1.5, NA; bind s "a", "b;c"; bind n NULL');
    expect(run(interp, 'print b')).toEqual(['c(TRUE, NA)']);
    expect(run(interp, 'print d')).toEqual(['c(1.5, NA)']);
    expect(run(interp, 'print s')).toEqual(['c("a", "b;c")']);
    expect(run(interp, 'print n')).toEqual(['NULL']);
  });

  test('mixed literal types are rejected', () => {
    const interp = new CommandInterpreter();
    const outcome = interp.execute('bind v 1, "a"');
    expect(outcome.error).toBeInstanceOf(CommandError);
    expect(interp.sim.global.hasOwn('v')).toBe(false);
  });
});

// ==================================================================
// Inspection commands
// ==================================================================

describe('inspection commands', () => {
  test('size reports shared strings once', () => {
    const interp = new CommandInterpreter();
    run(interp, 'bind a "bananas"; bind b rep("bananas", 100)');
    expect(run(interp, 'size a')).toEqual(['112 bytes']);
    expect(run(interp, 'size b')).toEqual(['904 bytes']);
    expect(run(interp, 'size a b')).toEqual(['960 bytes']);
  });

  test('refs reports 1 or many', () => {
    const interp = new CommandInterpreter();
    const output = run(interp, 'bind x 1:3; refs x; bind y x; refs x');
    expect([output[1], output[3]]).toEqual(['1', 'many']);
  });

  test('gc and mem', () => {
    const interp = new CommandInterpreter();
    expect(run(interp, 'bind x 1:3; rm x; gc')).toEqual([
      `x ${traceId(1)}`,
      'reclaimed 1 values, 56 bytes in use',
    ]);
    expect(run(interp, 'mem')).toEqual(['56 bytes in use (1 values)']);
  });

  test('ref draws the sharing tree', () => {
    const interp = new CommandInterpreter();
    run(interp, 'bind x 1:2; bind l list(x, x)');
    const x = interp.sim.traceId(interp.sim.get('x'));
    const l = interp.sim.traceId(interp.sim.get('l'));
    expect(run(interp, 'ref l')).toEqual([`[1:${l}] <list>`, `├─[2:${x}] <int>`, `└─[2:${x}]`]);
  });

  test('ls lists bindings in name order', () => {
    const interp = new CommandInterpreter();
    run(interp, 'bind b 1:2; bind a 1:3');
    const a = interp.sim.traceId(interp.sim.get('a'));
    const b = interp.sim.traceId(interp.sim.get('b'));
    expect(run(interp, 'ls')).toEqual([`a ${a}`, `b ${b}`]);
  });

  test('help prints the command list', () => {
    const interp = new CommandInterpreter();
    expect(run(interp, 'help')).toEqual(HELP_TEXT);
  });
});

// ==================================================================
// Errors
// ==================================================================

describe('command errors', () => {
  test('an unbound name', () => {
    const interp = new CommandInterpreter();
    const outcome = interp.execute('mutate x 1 2');
    expect(outcome.output).toEqual([]);
    expect(outcome.error).toBeInstanceOf(NameNotFoundError);
  });

  test('a failing command stops the rest of the line', () => {
    const interp = new CommandInterpreter();
    const outcome = interp.execute('bind x 1:3; mutate x 9 1; bind z 1:2');
    expect(outcome.output).toHaveLength(1);
    expect(outcome.error).toBeInstanceOf(ImmutableTargetError);
    expect(interp.sim.global.hasOwn('z')).toBe(false);
  });

  test('unknown commands and bad usage', () => {
    const interp = new CommandInterpreter();
    expect(interp.execute('frobnicate now').error).toBeInstanceOf(CommandError);
    expect(interp.execute('rm q').error?.message).toBe("object 'q' not found");
    expect(interp.execute('size').error?.message).toBe('usage: size <name>...');
    expect(interp.execute('bind x 1:3; mutate x 0 1').error?.message).toBe('indexes start at 1, got 0');
  });

  test('sequence bounds and repeat counts are range checked', () => {
    const interp = new CommandInterpreter();
    expect(interp.execute('bind x 9007199254740992:9007199254740993').error).toBeInstanceOf(SimulatorError);
    expect(interp.sim.global.hasOwn('x')).toBe(false);
    expect(interp.execute('bind s 1:2147483648').error?.message).toBe('invalid sequence bounds 1:2147483648');
    expect(interp.execute('bind r rep(1, 5000000000)').error?.message).toBe(
      "invalid 'times' argument: 5000000000",
    );
  });

  test('comments and blank commands are ignored', () => {
    const interp = new CommandInterpreter();
    expect(interp.execute('# nothing here')).toEqual({ output: [], error: null });
    expect(interp.execute(' ; ')).toEqual({ output: [], error: null });
  });
});

// ==================================================================
// Lexical helpers and scripts
// ==================================================================

describe('parseScalar', () => {
  test('literals', () => {
    expect(parseScalar('TRUE')).toBe(true);
    expect(parseScalar('FALSE')).toBe(false);
    expect(parseScalar('NA')).toBeNull();
    expect(parseScalar('2.5')).toBe(2.5);
    expect(parseScalar('-3')).toBe(-3);
    expect(parseScalar('1e3')).toBe(1000);
    expect(parseScalar('"a;b"')).toBe('a;b');
  });

  test('rejects anything else', () => {
    expect(() => parseScalar('foo')).toThrow(CommandError);
    expect(() => parseScalar('"open')).toThrow(CommandError);
  });
});

describe('splitOutsideQuotes', () => {
  test('keeps quoted separators', () => {
    expect(splitOutsideQuotes('a;"b;c";d', ';')).toEqual(['a', '"b;c"', 'd']);
    expect(splitOutsideQuotes('"a\\";b"', ';')).toEqual(['"a\\";b"']);
  });
});

describe('runScript', () => {
  test('stops at the first failing line', () => {
    const out: string[] = [];
    const err: string[] = [];
    const interp = new CommandInterpreter();
    const ok = runScript('bind x 1:3\nprint x\nmutate x 7 1\nprint x', interp, {
      out: line => out.push(line),
      err: line => err.push(line),
    });
    expect(ok).toBe(false);
    expect(out).toEqual([`x ${interp.sim.traceId(interp.sim.get('x'))}`, 'c(1L, 2L, 3L)']);
    expect(err).toEqual(["line 3: ImmutableTarget: index 6 out of range for 'x' of length 3"]);
  });

  test('returns true when every line succeeds', () => {
    const interp = new CommandInterpreter();
    const ok = runScript('bind x 1:3\n\n# done\n', interp, { out: () => undefined, err: () => undefined });
    expect(ok).toBe(true);
  });
});
