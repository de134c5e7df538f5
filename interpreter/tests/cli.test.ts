/**
 * Tests for the command line driver, with output captured in memory.
 */

import { parseArgs, runCli, CliIO } from '../src/cli';
import { SprigConfigError } from '../src/errors';

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe('parseArgs', () => {
  test('defaults to the functions example without tracing', () => {
    expect(parseArgs([])).toEqual({ kind: 'run', program: 'functions', trace: false, maxDepth: undefined });
  });

  test('reads program name, trace flag and max depth', () => {
    expect(parseArgs(['shadow', '--trace', '--max-depth', '50'])).toEqual({
      kind: 'run',
      program: 'shadow',
      trace: true,
      maxDepth: 50,
    });
  });

  test('help and list short-circuit', () => {
    expect(parseArgs(['arith', '--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['--list'])).toEqual({ kind: 'list' });
  });

  test('rejects unknown options and extra arguments', () => {
    expect(() => parseArgs(['--fast'])).toThrow("ConfigError: unknown option '--fast'");
    expect(() => parseArgs(['arith', 'shadow'])).toThrow("ConfigError: unexpected argument 'shadow'");
  });

  test('--max-depth needs a numeric value', () => {
    expect(() => parseArgs(['--max-depth'])).toThrow(SprigConfigError);
    expect(() => parseArgs(['--max-depth', 'abc'])).toThrow("ConfigError: --max-depth expects a number, got 'abc'");
  });
});

describe('runCli', () => {
  test('prints the program and its result', () => {
    const io = captureIO();
    expect(runCli(['literal'], io)).toBe(0);
    expect(io.stdout).toEqual(['474', '>>> Result: 474 | Steps: 1']);
    expect(io.stderr).toEqual([]);
  });

  test('runs the functions example by default', () => {
    const io = captureIO();
    expect(runCli([], io)).toBe(0);
    expect(io.stdout[io.stdout.length - 1]).toBe('>>> Result: 160 | Steps: 30');
  });

  test('--trace prints one indented line per step', () => {
    const io = captureIO();
    expect(runCli(['arith', '--trace'], io)).toBe(0);
    expect(io.stdout).toEqual([
      '(400 + 74) / 3',
      '    PC=2 -> int 400 = 400',
      '    PC=3 -> int 74 = 74',
      '  PC=1 -> binop + = 474',
      '  PC=4 -> int 3 = 3',
      'PC=0 -> binop / = 158',
      '>>> Result: 158 | Steps: 5',
    ]);
  });

  test('--list prints every example on one line', () => {
    const io = captureIO();
    expect(runCli(['--list'], io)).toBe(0);
    expect(io.stdout).toHaveLength(6);
    expect(io.stdout[0]).toBe('literal    474');
  });

  test('evaluation errors go to stderr with exit code 1', () => {
    const io = captureIO();
    expect(runCli(['arith', '--max-depth', '2'], io)).toBe(1);
    expect(io.stdout).toEqual(['(400 + 74) / 3']);
    expect(io.stderr).toEqual(['RuntimeError: stack exhausted after 2 nested evaluations']);
  });

  test('configuration errors print the usage', () => {
    const io = captureIO();
    expect(runCli(['nope'], io)).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(io.stderr[0]).toBe("ConfigError: unknown program 'nope' (try --list)");
    expect(io.stderr[1]).toBe('Sprig v0.1.0');
  });

  test('invalid max depth is reported as a configuration error', () => {
    const io = captureIO();
    expect(runCli(['--max-depth', '0'], io)).toBe(1);
    expect(io.stderr[0]).toMatch(/^ConfigError: maxDepth: /);
  });
});
