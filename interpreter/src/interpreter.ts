/**
 * Tree-walking interpreter for Sprig.
 *
 * Evaluates an expression tree by recursively visiting nodes. All mutable
 * state of a run (the step counter and the current nesting depth) lives on
 * the instance, so separate interpreters never observe each other.
 */

import { Environment } from './environment';
import { Expression, ExpressionOf, BinaryOperator, OPERATOR_SYMBOLS, describeExpression } from './ast';
import { SprigValue, mkInt, mkBool, mkFunction, valuesEqual } from './values';
import {
  SprigTypeMismatchError,
  SprigNotCallableError,
  SprigArityError,
  SprigDivisionByZeroError,
  SprigIntegerOverflowError,
  SprigStackExhaustedError,
} from './errors';
import { InterpreterOptions, ResolvedInterpreterOptions, resolveOptions } from './options';

export interface RunResult {
  value: SprigValue;
  /** Number of evaluation steps the run took. */
  steps: number;
}

export class Interpreter {
  private readonly options: ResolvedInterpreterOptions;
  private stepCounter = 0;
  private depth = 0;
  private deepest = 0;

  constructor(options: InterpreterOptions = {}) {
    this.options = resolveOptions(options);
  }

  /**
   * Evaluate a whole program in a fresh root environment. The step
   * counter restarts at 0, so consecutive runs are independent.
   */
  run(program: Expression): RunResult {
    this.stepCounter = 0;
    this.depth = 0;
    const value = this.evaluate(program, new Environment());
    return { value, steps: this.stepCounter };
  }

  /**
   * Evaluate `expr` in `env`. Step numbering continues from earlier calls
   * on this instance until the next `run`.
   */
  evaluate(expr: Expression, env: Environment = new Environment()): SprigValue {
    if (this.depth === 0) this.deepest = 0;
    try {
      return this.evalNode(expr, env);
    } catch (e) {
      if (isHostStackOverflow(e)) {
        throw new SprigStackExhaustedError(this.deepest);
      }
      throw e;
    }
  }

  /** Steps taken since the last `run`. */
  getStepCount(): number {
    return this.stepCounter;
  }

  // ==================================================================
  // Dispatch
  // ==================================================================

  private evalNode(expr: Expression, env: Environment): SprigValue {
    const depth = this.depth;
    const { maxDepth } = this.options;
    if (maxDepth !== undefined && depth >= maxDepth) {
      throw new SprigStackExhaustedError(depth);
    }
    const step = this.stepCounter++;
    this.depth = depth + 1;
    if (this.depth > this.deepest) this.deepest = this.depth;

    let value: SprigValue;
    try {
      value = this.dispatch(expr, env);
    } finally {
      this.depth = depth;
    }

    if (this.options.onStep) {
      this.options.onStep({ step, description: describeExpression(expr), value, depth });
    }
    return value;
  }

  private dispatch(expr: Expression, env: Environment): SprigValue {
    switch (expr.kind) {
      case 'int_literal':
        return this.evalIntLiteral(expr);
      case 'bool_literal':
        return mkBool(expr.value);
      case 'binary_op':
        return this.evalBinaryOp(expr, env);
      case 'if':
        return this.evalIf(expr, env);
      case 'var_read':
        return env.lookup(expr.name);
      case 'var_write':
        return this.evalVarWrite(expr, env);
      case 'let':
        return this.evalLet(expr, env);
      case 'seq':
        this.evalNode(expr.first, env);
        return this.evalNode(expr.second, env);
      case 'function_decl':
        return this.evalFunctionDecl(expr, env);
      case 'call':
        return this.evalCall(expr, env);
    }
  }

  // ==================================================================
  // Literals & operators
  // ==================================================================

  private evalIntLiteral(expr: ExpressionOf<'int_literal'>): SprigValue {
    if (!Number.isSafeInteger(expr.value)) {
      throw new SprigTypeMismatchError('integer', String(expr.value), 'integer literal');
    }
    return mkInt(expr.value);
  }

  private evalBinaryOp(expr: ExpressionOf<'binary_op'>, env: Environment): SprigValue {
    // Strict: both operands always run, left first.
    const left = this.evalNode(expr.left, env);
    const right = this.evalNode(expr.right, env);
    const symbol = OPERATOR_SYMBOLS[expr.op];

    if (expr.op === 'equal') {
      if (left.kind !== right.kind) {
        throw new SprigTypeMismatchError(left.kind, right.kind, `'${symbol}'`);
      }
      return mkBool(valuesEqual(left, right));
    }

    if (left.kind !== 'int') {
      throw new SprigTypeMismatchError('int', left.kind, `left operand of '${symbol}'`);
    }
    if (right.kind !== 'int') {
      throw new SprigTypeMismatchError('int', right.kind, `right operand of '${symbol}'`);
    }
    return this.evalArith(expr.op, left.value, right.value);
  }

  private evalArith(op: Exclude<BinaryOperator, 'equal'>, a: number, b: number): SprigValue {
    const symbol = OPERATOR_SYMBOLS[op];
    if ((op === 'div' || op === 'mod') && b === 0) {
      throw new SprigDivisionByZeroError(symbol);
    }
    const result = applyArith(op, a, b);
    if (!Number.isSafeInteger(result)) {
      throw new SprigIntegerOverflowError(symbol);
    }
    // Normalize -0 (e.g. from -1 / 2).
    return mkInt(result === 0 ? 0 : result);
  }

  // ==================================================================
  // Control flow & bindings
  // ==================================================================

  private evalIf(expr: ExpressionOf<'if'>, env: Environment): SprigValue {
    const condition = this.evalNode(expr.condition, env);
    if (condition.kind !== 'bool') {
      throw new SprigTypeMismatchError('bool', condition.kind, 'if condition');
    }
    return condition.value
      ? this.evalNode(expr.thenBranch, env)
      : this.evalNode(expr.elseBranch, env);
  }

  private evalVarWrite(expr: ExpressionOf<'var_write'>, env: Environment): SprigValue {
    const value = this.evalNode(expr.value, env);
    env.assign(expr.name, value);
    return value;
  }

  private evalLet(expr: ExpressionOf<'let'>, env: Environment): SprigValue {
    const bound = this.evalNode(expr.boundValue, env);
    const scope = env.childScope();
    scope.define(expr.name, bound);
    return this.evalNode(expr.body, scope);
  }

  // ==================================================================
  // Functions
  // ==================================================================

  private evalFunctionDecl(expr: ExpressionOf<'function_decl'>, env: Environment): SprigValue {
    const scope = env.childScope();
    // The closure captures the scope that binds its own name, so the body can recurse.
    scope.define(expr.name, mkFunction(expr.name, expr.params, expr.body, scope));
    return this.evalNode(expr.rest, scope);
  }

  private evalCall(expr: ExpressionOf<'call'>, env: Environment): SprigValue {
    const callee = env.lookup(expr.functionName);
    if (callee.kind !== 'function') {
      throw new SprigNotCallableError(expr.functionName, callee.kind);
    }
    if (callee.params.length !== expr.args.length) {
      throw new SprigArityError(expr.functionName, callee.params.length, expr.args.length);
    }

    // Arguments run in the caller's scope, the body in the callee's.
    const args = expr.args.map((arg) => this.evalNode(arg, env));
    const frame = callee.closure.childScope();
    callee.params.forEach((param, i) => frame.define(param, args[i]));
    return this.evalNode(callee.body, frame);
  }
}

/**
 * Integer arithmetic. Division truncates toward zero and the remainder
 * takes the sign of the dividend, so `a == (a / b) * b + a % b`.
 */
function applyArith(op: Exclude<BinaryOperator, 'equal'>, a: number, b: number): number {
  switch (op) {
    case 'add': return a + b;
    case 'sub': return a - b;
    case 'mul': return a * b;
    case 'div': return Math.trunc(a / b);
    case 'mod': return a % b;
  }
}

function isHostStackOverflow(e: unknown): boolean {
  return e instanceof RangeError && /call stack/i.test(e.message);
}
