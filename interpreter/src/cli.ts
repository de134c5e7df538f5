/**
 * Command line driver: runs one of the bundled example programs and
 * prints its result, optionally with a step-by-step trace.
 */

import { Interpreter } from './interpreter';
import { SprigError, SprigConfigError } from './errors';
import { valueToString } from './values';
import { TraceEvent, formatTraceEvent } from './trace';
import { examplePrograms, findProgram, DEFAULT_PROGRAM } from './programs';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list' }
  | { kind: 'run'; program: string; trace: boolean; maxDepth?: number };

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Parse CLI arguments (without the node/script prefix).
 */
export function parseArgs(args: string[]): CliCommand {
  let program: string | undefined;
  let trace = false;
  let maxDepth: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--list':
        return { kind: 'list' };
      case '--trace':
      case '-t':
        trace = true;
        break;
      case '--max-depth': {
        const raw = args[++i];
        if (raw === undefined) {
          throw new SprigConfigError('--max-depth requires a value');
        }
        maxDepth = Number(raw);
        if (Number.isNaN(maxDepth)) {
          throw new SprigConfigError(`--max-depth expects a number, got '${raw}'`);
        }
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new SprigConfigError(`unknown option '${arg}'`);
        }
        if (program !== undefined) {
          throw new SprigConfigError(`unexpected argument '${arg}'`);
        }
        program = arg;
    }
  }

  return { kind: 'run', program: program ?? DEFAULT_PROGRAM, trace, maxDepth };
}

/**
 * Run the CLI and return the process exit code.
 */
export function runCli(args: string[], io: CliIO = consoleIO): number {
  try {
    const command = parseArgs(args);
    switch (command.kind) {
      case 'help':
        printUsage(io.out);
        return 0;
      case 'list':
        for (const example of examplePrograms) {
          io.out(`${example.name.padEnd(10)} ${example.source.split('\n').join(' ')}`);
        }
        return 0;
      case 'run':
        return runProgram(command.program, command.trace, command.maxDepth, io);
    }
  } catch (e) {
    if (e instanceof SprigConfigError) {
      io.err(e.message);
      printUsage(io.err);
      return 1;
    }
    if (e instanceof SprigError) {
      io.err(e.message);
      return 1;
    }
    throw e;
  }
}

function runProgram(name: string, trace: boolean, maxDepth: number | undefined, io: CliIO): number {
  const example = findProgram(name);
  if (!example) {
    throw new SprigConfigError(`unknown program '${name}' (try --list)`);
  }

  const interpreter = new Interpreter({
    maxDepth,
    onStep: trace ? (event: TraceEvent) => io.out(formatTraceEvent(event)) : undefined,
  });

  io.out(example.source);
  const { value, steps } = interpreter.run(example.program);
  io.out(`>>> Result: ${valueToString(value)} | Steps: ${steps}`);
  return 0;
}

function printUsage(write: (line: string) => void): void {
  write('Sprig v0.1.0');
  write('');
  write('Usage:');
  write('  sprig [program]            Run an example program (default: functions)');
  write('  sprig [program] --trace    Print every evaluation step');
  write('  sprig --max-depth <n>      Limit evaluation nesting depth');
  write('  sprig --list               List the example programs');
  write('  sprig --help               Show this help');
}
