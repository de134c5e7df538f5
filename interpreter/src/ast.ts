/**
 * Expression tree for Sprig programs.
 *
 * Programs are built directly through the constructor helpers below;
 * there is no textual syntax. Every node is readonly once built and the
 * interpreter never mutates it.
 */

export type BinaryOperator = 'add' | 'sub' | 'mul' | 'div' | 'mod' | 'equal';

export type Expression =
  | { readonly kind: 'int_literal'; readonly value: number }
  | { readonly kind: 'bool_literal'; readonly value: boolean }
  | { readonly kind: 'binary_op'; readonly op: BinaryOperator; readonly left: Expression; readonly right: Expression }
  | { readonly kind: 'if'; readonly condition: Expression; readonly thenBranch: Expression; readonly elseBranch: Expression }
  | { readonly kind: 'var_read'; readonly name: string }
  | { readonly kind: 'var_write'; readonly name: string; readonly value: Expression }
  | { readonly kind: 'let'; readonly name: string; readonly boundValue: Expression; readonly body: Expression }
  | { readonly kind: 'seq'; readonly first: Expression; readonly second: Expression }
  | { readonly kind: 'function_decl'; readonly name: string; readonly params: readonly string[]; readonly body: Expression; readonly rest: Expression }
  | { readonly kind: 'call'; readonly functionName: string; readonly args: readonly Expression[] };

export type ExpressionKind = Expression['kind'];

/** Narrow an expression to one variant. */
export type ExpressionOf<K extends ExpressionKind> = Extract<Expression, { kind: K }>;

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator, string>> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  mod: '%',
  equal: '==',
};

// ---- Constructors ----

export function intLit(value: number): Expression {
  return { kind: 'int_literal', value };
}

export function boolLit(value: boolean): Expression {
  return { kind: 'bool_literal', value };
}

export function binOp(op: BinaryOperator, left: Expression, right: Expression): Expression {
  return { kind: 'binary_op', op, left, right };
}

export const add = (left: Expression, right: Expression): Expression => binOp('add', left, right);
export const sub = (left: Expression, right: Expression): Expression => binOp('sub', left, right);
export const mul = (left: Expression, right: Expression): Expression => binOp('mul', left, right);
export const div = (left: Expression, right: Expression): Expression => binOp('div', left, right);
export const mod = (left: Expression, right: Expression): Expression => binOp('mod', left, right);
export const eq = (left: Expression, right: Expression): Expression => binOp('equal', left, right);

export function ifExpr(condition: Expression, thenBranch: Expression, elseBranch: Expression): Expression {
  return { kind: 'if', condition, thenBranch, elseBranch };
}

export function varRead(name: string): Expression {
  return { kind: 'var_read', name };
}

export function varWrite(name: string, value: Expression): Expression {
  return { kind: 'var_write', name, value };
}

export function letIn(name: string, boundValue: Expression, body: Expression): Expression {
  return { kind: 'let', name, boundValue, body };
}

export function seq(first: Expression, second: Expression): Expression {
  return { kind: 'seq', first, second };
}

/**
 * Declare `name(params) = body`, visible in `rest` and inside `body` itself.
 * A single parameter may be passed as a bare string.
 */
export function funcDecl(
  name: string,
  params: string | readonly string[],
  body: Expression,
  rest: Expression,
): Expression {
  return { kind: 'function_decl', name, params: typeof params === 'string' ? [params] : [...params], body, rest };
}

export function call(functionName: string, args: Expression | readonly Expression[]): Expression {
  return { kind: 'call', functionName, args: isExpressionList(args) ? [...args] : [args] };
}

function isExpressionList(args: Expression | readonly Expression[]): args is readonly Expression[] {
  return Array.isArray(args);
}

// ---- Helpers ----

/**
 * One-line description of a node, used as the trace event label.
 * Children are not rendered.
 */
export function describeExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'int_literal': return `int ${expr.value}`;
    case 'bool_literal': return `bool ${expr.value}`;
    case 'binary_op': return `binop ${OPERATOR_SYMBOLS[expr.op]}`;
    case 'if': return 'if';
    case 'var_read': return `read ${expr.name}`;
    case 'var_write': return `write ${expr.name}`;
    case 'let': return `let ${expr.name}`;
    case 'seq': return 'seq';
    case 'function_decl': return `fun ${expr.name}(${expr.params.join(', ')})`;
    case 'call': return `call ${expr.functionName}`;
  }
}
