/**
 * Example programs run by the demo driver.
 */

import { Expression, intLit, add, div, eq, ifExpr, letIn, varRead, funcDecl, call } from './ast';

export interface ExampleProgram {
  name: string;
  /** Human-readable rendering of the program. */
  source: string;
  program: Expression;
}

const sum474 = (): Expression => add(intLit(400), intLit(74));

export const examplePrograms: readonly ExampleProgram[] = [
  {
    name: 'literal',
    source: '474',
    program: intLit(474),
  },
  {
    name: 'arith',
    source: '(400 + 74) / 3',
    program: div(sum474(), intLit(3)),
  },
  {
    name: 'compare',
    source: '((400 + 74) / 3) == 158',
    program: eq(div(sum474(), intLit(3)), intLit(158)),
  },
  {
    name: 'branch',
    source: 'if ((400 + 74) / 3) == 158 then 474 else 474 / 0',
    program: ifExpr(
      eq(div(sum474(), intLit(3)), intLit(158)),
      intLit(474),
      div(intLit(474), intLit(0)),
    ),
  },
  {
    name: 'shadow',
    source: 'let bot = 3 in (let bot = 2 in bot) + (if bot == 0 then 474 / 0 else (400 + 74) / bot)',
    program: letIn(
      'bot',
      intLit(3),
      add(
        letIn('bot', intLit(2), varRead('bot')),
        ifExpr(
          eq(varRead('bot'), intLit(0)),
          div(intLit(474), intLit(0)),
          div(sum474(), varRead('bot')),
        ),
      ),
    ),
  },
  {
    name: 'functions',
    source: [
      'fun f(top, bot) = if bot == 0 then 0 else top / bot in',
      '  let bot = 3 in (let bot = 2 in bot) + (f(400 + 74, bot) + f(470 + 4, 0))',
    ].join('\n'),
    program: funcDecl(
      'f',
      ['top', 'bot'],
      ifExpr(eq(varRead('bot'), intLit(0)), intLit(0), div(varRead('top'), varRead('bot'))),
      letIn(
        'bot',
        intLit(3),
        add(
          letIn('bot', intLit(2), varRead('bot')),
          add(
            call('f', [sum474(), varRead('bot')]),
            call('f', [add(intLit(470), intLit(4)), intLit(0)]),
          ),
        ),
      ),
    ),
  },
];

export const DEFAULT_PROGRAM = 'functions';

export function findProgram(name: string): ExampleProgram | undefined {
  return examplePrograms.find((p) => p.name === name);
}
