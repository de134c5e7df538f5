/**
 * Runtime error types for the Sprig interpreter.
 *
 * Every error is fatal to the evaluation that raised it and carries a
 * stable `code`.
 */

export type SprigErrorCode =
  | 'UNBOUND_VARIABLE'
  | 'TYPE_MISMATCH'
  | 'NOT_CALLABLE'
  | 'ARITY_MISMATCH'
  | 'DIVISION_BY_ZERO'
  | 'INTEGER_OVERFLOW'
  | 'STACK_EXHAUSTED'
  | 'CONFIG';

export class SprigError extends Error {
  public readonly code: SprigErrorCode;

  constructor(code: SprigErrorCode, message: string) {
    super(message);
    this.name = 'SprigError';
    this.code = code;
  }
}

export class SprigUnboundVariableError extends SprigError {
  public readonly variable: string;

  constructor(name: string) {
    super('UNBOUND_VARIABLE', `NameError: undefined variable '${name}'`);
    this.name = 'SprigUnboundVariableError';
    this.variable = name;
  }
}

export class SprigTypeMismatchError extends SprigError {
  public readonly expected: string;
  public readonly found: string;

  constructor(expected: string, found: string, context?: string) {
    const where = context !== undefined ? ` in ${context}` : '';
    super('TYPE_MISMATCH', `TypeError: expected ${expected}${where}, found ${found}`);
    this.name = 'SprigTypeMismatchError';
    this.expected = expected;
    this.found = found;
  }
}

export class SprigNotCallableError extends SprigError {
  public readonly found: string;

  constructor(name: string, found: string) {
    super('NOT_CALLABLE', `TypeError: '${name}' is not callable (found ${found})`);
    this.name = 'SprigNotCallableError';
    this.found = found;
  }
}

export class SprigArityError extends SprigError {
  constructor(name: string, expected: number, found: number) {
    const plural = expected === 1 ? '' : 's';
    super('ARITY_MISMATCH', `ArityError: '${name}' takes ${expected} argument${plural}, got ${found}`);
    this.name = 'SprigArityError';
  }
}

export class SprigDivisionByZeroError extends SprigError {
  constructor(op: string) {
    super('DIVISION_BY_ZERO', `RuntimeError: division by zero in '${op}'`);
    this.name = 'SprigDivisionByZeroError';
  }
}

export class SprigIntegerOverflowError extends SprigError {
  constructor(op: string) {
    super('INTEGER_OVERFLOW', `RuntimeError: integer overflow in '${op}'`);
    this.name = 'SprigIntegerOverflowError';
  }
}

export class SprigStackExhaustedError extends SprigError {
  public readonly depth: number;

  constructor(depth: number) {
    super('STACK_EXHAUSTED', `RuntimeError: stack exhausted after ${depth} nested evaluations`);
    this.name = 'SprigStackExhaustedError';
    this.depth = depth;
  }
}

export class SprigConfigError extends SprigError {
  constructor(message: string) {
    super('CONFIG', `ConfigError: ${message}`);
    this.name = 'SprigConfigError';
  }
}
