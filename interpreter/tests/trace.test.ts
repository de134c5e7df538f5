/**
 * Tests for trace events: numbering, depth, ordering and formatting.
 */

import { Interpreter } from '../src/interpreter';
import { TraceEvent, formatTraceEvent } from '../src/trace';
import { mkInt, mkBool } from '../src/values';
import { add, div, intLit } from '../src/ast';
import { SprigDivisionByZeroError } from '../src/errors';
import { findProgram } from '../src/programs';

describe('Trace events', () => {
  test('one event per step, reported once the step has a value', () => {
    const events: TraceEvent[] = [];
    new Interpreter({ onStep: (event) => events.push(event) }).run(add(intLit(1), intLit(2)));
    expect(events).toEqual([
      { step: 1, description: 'int 1', value: mkInt(1), depth: 1 },
      { step: 2, description: 'int 2', value: mkInt(2), depth: 1 },
      { step: 0, description: 'binop +', value: mkInt(3), depth: 0 },
    ]);
  });

  test('observer receives the step as a single event object', () => {
    const onStep = jest.fn();
    new Interpreter({ onStep }).run(intLit(7));
    expect(onStep).toHaveBeenCalledTimes(1);
    expect(onStep).toHaveBeenCalledWith({ step: 0, description: 'int 7', value: mkInt(7), depth: 0 });
  });

  test('failing steps emit nothing', () => {
    const events: TraceEvent[] = [];
    const interpreter = new Interpreter({ onStep: (event) => events.push(event) });
    expect(() => interpreter.run(add(intLit(1), div(intLit(1), intLit(0))))).toThrow(SprigDivisionByZeroError);
    expect(events.map((e) => e.step)).toEqual([1, 3, 4]);
  });

  test('step indices cover the whole run exactly once', () => {
    const example = findProgram('functions');
    expect(example).toBeDefined();
    if (!example) return;

    const events: TraceEvent[] = [];
    const { value, steps } = new Interpreter({ onStep: (event) => events.push(event) }).run(example.program);
    expect(steps).toBe(30);
    expect(events.map((e) => e.step).sort((a, b) => a - b)).toEqual(Array.from({ length: 30 }, (_, i) => i));
    expect(events[events.length - 1]).toEqual({ step: 0, description: 'fun f(top, bot)', value, depth: 0 });
  });

  test('numbering restarts on every run', () => {
    const steps: number[] = [];
    const interpreter = new Interpreter({ onStep: (event) => steps.push(event.step) });
    interpreter.run(intLit(1));
    interpreter.run(intLit(2));
    expect(steps).toEqual([0, 0]);
  });

  test('an observer that throws aborts evaluation', () => {
    const interpreter = new Interpreter({
      onStep: () => {
        throw new Error('observer failed');
      },
    });
    expect(() => interpreter.run(intLit(1))).toThrow('observer failed');
  });
});

describe('formatTraceEvent', () => {
  test('indents by depth', () => {
    expect(formatTraceEvent({ step: 3, description: 'int 74', value: mkInt(74), depth: 2 })).toBe(
      '    PC=3 -> int 74 = 74',
    );
    expect(formatTraceEvent({ step: 0, description: 'binop ==', value: mkBool(true), depth: 0 })).toBe(
      'PC=0 -> binop == = true',
    );
  });
});
