/**
 * Closure tests: argument matching, lazy arguments, lexical scoping and
 * frame lifetime.
 */

import { Simulator } from '../src/simulator';
import { matchArguments, returnValue } from '../src/functions';
import { Environment } from '../src/environment';
import { ArgumentMatchError, MissingArgumentError, SimulatorError } from '../src/errors';

// ==================================================================
// Argument matching
// ==================================================================

describe('matchArguments', () => {
  test('exact names first, then position', () => {
    const m = matchArguments(['x', 'y', 'z'], [{ name: 'z' }, {}, {}]);
    expect(Object.fromEntries(m.matched)).toEqual({ z: 0, x: 1, y: 2 });
    expect(m.dots).toEqual([]);
  });

  test('unique prefixes match', () => {
    const m = matchArguments(['value', 'verbose'], [{ name: 'val' }]);
    expect(Object.fromEntries(m.matched)).toEqual({ value: 0 });
  });

  test('ambiguous prefixes fail', () => {
    expect(() => matchArguments(['value', 'verbose'], [{ name: 'v' }])).toThrow(
      'ArgumentMatch: argument 1 matches multiple formal arguments',
    );
  });

  test('a formal cannot be matched twice', () => {
    expect(() => matchArguments(['x'], [{ name: 'x' }, { name: 'x' }])).toThrow(
      'ArgumentMatch: formal argument "x" matched by multiple actual arguments',
    );
  });

  test('leftover arguments fail without dots', () => {
    expect(() => matchArguments(['abc', 'xyz'], [{ name: 'abc' }, { name: 'ab' }])).toThrow(
      'ArgumentMatch: unused argument (ab = ...)',
    );
    expect(() => matchArguments(['a', 'b'], [{}, {}, {}])).toThrow(ArgumentMatchError);
    expect(() => matchArguments(['a', 'b'], [{}, {}, {}])).toThrow('unused argument (argument 3)');
  });

  test('dots collect the rest', () => {
    const m = matchArguments(['x', '...', 'y'], [{}, {}, { name: 'y' }, { name: 'ext' }]);
    expect(Object.fromEntries(m.matched)).toEqual({ x: 0, y: 2 });
    expect(m.dots).toEqual([1, 3]);
  });

  test('formals after dots only match exactly', () => {
    const m = matchArguments(['...', 'yes'], [{ name: 'ye' }]);
    expect(m.matched.size).toBe(0);
    expect(m.dots).toEqual([0]);
  });
});

// ==================================================================
// Scoping
// ==================================================================

describe('closures', () => {
  test('free names resolve at call time', () => {
    const sim = new Simulator();
    sim.bind('y', sim.double([1]));
    sim.bind('f', sim.closure([], frame => sim.get('y', frame)));
    sim.bind('y', sim.double([2]));
    expect(sim.toScalars(sim.call('f'))).toEqual([2]);
  });

  test('free names resolve in the defining environment, not the caller', () => {
    const sim = new Simulator();
    const outer = sim.environment();
    outer.define('y', sim.double([10]));
    const parents: Array<number | null> = [];
    const g = sim.closure(
      [],
      frame => {
        parents.push(frame.parent?.id ?? null);
        return sim.get('y', frame);
      },
      outer,
    );
    const caller = sim.environment();
    caller.define('y', sim.double([20]));

    expect(sim.toScalars(sim.call(g, [], caller))).toEqual([10]);
    expect(parents).toEqual([outer.id]);
  });

  test('superassignment reaches the defining environment', () => {
    const sim = new Simulator();
    sim.bind('count', sim.double([0]));
    let ownBinding = true;
    const inc = sim.closure([], frame => {
      sim.assign('count', sim.double([1]), frame);
      ownBinding = frame.hasOwn('count');
      return sim.nil();
    });
    sim.call(inc);
    expect(sim.toScalars(sim.get('count'))).toEqual([1]);
    expect(ownBinding).toBe(false);
  });

  test('calling a non-function fails', () => {
    const sim = new Simulator();
    expect(() => sim.call(sim.seq(1, 2))).toThrow(SimulatorError);
    expect(() => sim.call(sim.seq(1, 2))).toThrow('attempt to apply non-function (integer)');
  });
});

// ==================================================================
// Arguments
// ==================================================================

describe('closure arguments', () => {
  test('an unused lazy argument is never evaluated', () => {
    const sim = new Simulator();
    const thunk = jest.fn(() => sim.double([1]));
    const f = sim.closure([{ name: 'x' }], () => sim.nil());
    sim.call(f, [{ value: thunk }]);
    expect(thunk).not.toHaveBeenCalled();
  });

  test('a lazy argument is evaluated once, in the caller', () => {
    const sim = new Simulator();
    const seen: number[] = [];
    const thunk = jest.fn((env: Environment) => {
      seen.push(env.id);
      return sim.double([1]);
    });
    const f = sim.closure([{ name: 'x' }], frame => {
      sim.get('x', frame);
      return sim.get('x', frame);
    });
    const caller = sim.environment();
    sim.call(f, [{ value: thunk }], caller);
    expect(thunk).toHaveBeenCalledTimes(1);
    expect(seen).toEqual([caller.id]);
  });

  test('defaults are evaluated in the call frame', () => {
    const sim = new Simulator();
    const f = sim.closure(
      [{ name: 'x' }, { name: 'y', default: env => sim.get('x', env) }],
      frame => sim.get('y', frame),
    );
    expect(sim.toScalars(sim.call(f, [{ value: sim.double([5]) }]))).toEqual([5]);
  });

  test('a missing argument without a default fails only when used', () => {
    const sim = new Simulator();
    let missing = false;
    const f = sim.closure([{ name: 'x' }, { name: 'y', default: () => sim.nil() }], frame => {
      missing = sim.isMissing(frame, 'x') && sim.isMissing(frame, 'y');
      return sim.get('x', frame);
    });
    expect(() => sim.call(f)).toThrow(MissingArgumentError);
    expect(() => sim.call(f)).toThrow('MissingArgument: argument "x" is missing, with no default');
    expect(missing).toBe(true);
  });

  test('supplied arguments are not missing', () => {
    const sim = new Simulator();
    let missing = true;
    const f = sim.closure([{ name: 'x' }], frame => {
      missing = sim.isMissing(frame, 'x');
      return sim.nil();
    });
    sim.call(f, [{ value: () => sim.nil() }]);
    expect(missing).toBe(false);
  });

  test('modifying an argument copies the caller value', () => {
    const sim = new Simulator();
    const x = sim.bind('x', sim.seq(1, 3));
    let copies = 0;
    const f = sim.closure([{ name: 'a' }], frame => {
      copies = sim.mutate('a', 0, 99, frame).copies.length;
      return sim.get('a', frame);
    });
    const result = sim.call(f, [{ value: x }]);
    expect(copies).toBe(1);
    expect(sim.toScalars(result)).toEqual([99, 2, 3]);
    expect(sim.toScalars(sim.get('x'))).toEqual([1, 2, 3]);
  });

  test('dots collect unmatched arguments', () => {
    const sim = new Simulator();
    const a = sim.double([1]);
    const b = sim.double([2]);
    let collected: number[] = [];
    const f = sim.closure([{ name: '...' }], frame => {
      collected = sim.dots(frame);
      return sim.get('...', frame);
    });
    const dots = sim.call(f, [{ value: a }, { name: 'k', value: () => b }]);
    expect(collected).toEqual([a, b]);
    expect(sim.format(dots)).toBe('list(1, k = 2)');
  });
});

// ==================================================================
// Frames
// ==================================================================

describe('call frames', () => {
  test('early return', () => {
    const sim = new Simulator();
    const f = sim.closure([], () => returnValue(sim.double([1])));
    expect(sim.toScalars(sim.call(f))).toEqual([1]);
  });

  test('exit handlers run and the frame is popped even on failure', () => {
    const sim = new Simulator();
    const handler = jest.fn();
    let depth = 0;
    const f = sim.closure([], frame => {
      sim.onExit(frame, handler);
      depth = sim.callDepth;
      throw new Error('boom');
    });
    expect(() => sim.call(f)).toThrow('boom');
    expect(handler).toHaveBeenCalledTimes(1);
    expect(depth).toBe(1);
    expect(sim.callDepth).toBe(0);
  });

  test('onExit outside a call fails', () => {
    const sim = new Simulator();
    expect(() => sim.onExit(sim.global, () => undefined)).toThrow(SimulatorError);
  });
});
