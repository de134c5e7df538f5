/**
 * Runtime value representations for the Sprig interpreter.
 */

import type { Expression } from './ast';
import type { Environment } from './environment';

export type SprigValue =
  | { kind: 'int'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'function'; name: string; params: readonly string[]; body: Expression; closure: Environment };

export type FunctionValue = Extract<SprigValue, { kind: 'function' }>;

// ---- Value constructors ----

export function mkInt(value: number): SprigValue {
  return { kind: 'int', value };
}

export function mkBool(value: boolean): SprigValue {
  return { kind: 'bool', value };
}

export function mkFunction(
  name: string,
  params: readonly string[],
  body: Expression,
  closure: Environment,
): FunctionValue {
  return { kind: 'function', name, params, body, closure };
}

// ---- Value utilities ----

export function valueToString(v: SprigValue): string {
  switch (v.kind) {
    case 'int': return String(v.value);
    case 'bool': return String(v.value);
    case 'function': return `<function ${v.name}>`;
  }
}

/**
 * Structural equality for ints and bools. Functions compare by identity,
 * since two closures over the same body may still see different scopes.
 * Values of different kinds are never equal; the interpreter rejects
 * such comparisons before calling this.
 */
export function valuesEqual(a: SprigValue, b: SprigValue): boolean {
  switch (a.kind) {
    case 'int':
      return b.kind === 'int' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'function':
      return a === b;
  }
}
