/**
 * Trace events: one per `evaluate` call, reported after the step has
 * produced its value. Observers only watch; they cannot alter a result.
 */

import { SprigValue, valueToString } from './values';

export interface TraceEvent {
  /** Pre-order index of the step within the current run, starting at 0. */
  step: number;
  description: string;
  value: SprigValue;
  /** Nesting depth of the step; the root expression is depth 0. */
  depth: number;
}

export type TraceObserver = (event: TraceEvent) => void;

/**
 * Render a trace event as a driver line, e.g. `  PC=3 -> binop + = 474`.
 */
export function formatTraceEvent(event: TraceEvent): string {
  const indent = '  '.repeat(event.depth);
  return `${indent}PC=${event.step} -> ${event.description} = ${valueToString(event.value)}`;
}
