/**
 * Interpreter configuration, validated with zod at construction time.
 */

import { z } from 'zod';
import { SprigConfigError } from './errors';
import type { TraceObserver } from './trace';

export const interpreterOptionsSchema = z.object({
  maxDepth: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Deepest allowed nesting of evaluate calls; unset means the host stack is the limit'),
  onStep: z
    .custom<TraceObserver>((v) => typeof v === 'function', { message: 'onStep must be a function' })
    .optional()
    .describe('Observer called once per evaluation step'),
});

export type InterpreterOptions = z.input<typeof interpreterOptionsSchema>;
export type ResolvedInterpreterOptions = z.output<typeof interpreterOptionsSchema>;

export function resolveOptions(options: InterpreterOptions = {}): ResolvedInterpreterOptions {
  const parsed = interpreterOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new SprigConfigError(issues.join('; '));
  }
  return parsed.data;
}
