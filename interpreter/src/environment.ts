/**
 * Lexical scoping environment for the Sprig interpreter.
 *
 * Each environment holds a map of storage cells and a reference to its
 * parent scope. Closures keep a reference to the environment they were
 * declared in, so a frame lives as long as any closure over it.
 */

import { SprigValue } from './values';
import { SprigUnboundVariableError } from './errors';

interface Cell {
  value: SprigValue;
}

export class Environment {
  private vars: Map<string, Cell>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  lookup(name: string): SprigValue {
    return this.findCell(name).value;
  }

  /**
   * Overwrite the cell of an existing binding, in whichever frame bound it.
   */
  assign(name: string, value: SprigValue): void {
    this.findCell(name).value = value;
  }

  /**
   * Bind a fresh cell in this frame. Outer bindings of the same name are
   * shadowed, never touched.
   */
  define(name: string, value: SprigValue): void {
    this.vars.set(name, { value });
  }

  /**
   * Create a child scope.
   */
  childScope(): Environment {
    return new Environment(this);
  }

  private findCell(name: string): Cell {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      const cell = env.vars.get(name);
      if (cell !== undefined) return cell;
    }
    throw new SprigUnboundVariableError(name);
  }
}
