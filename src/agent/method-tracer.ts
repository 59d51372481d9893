/**
 * Method Tracer
 *
 * Wraps a traced operation in a push/pop pair and records its total and
 * exclusive time under the current transaction.
 */

import { now, type Clock } from '../engine/clock.js';
import type { ScopeFrame } from '../engine/scope-frame.js';
import type { StatsEngine } from '../engine/stats-engine.js';

export interface TraceOptions {
  /** false: elapsed time is not charged to the caller's self time */
  deductFromParent?: boolean;
  clock?: Clock;
}

function begin(engine: StatsEngine, metricName: string, options: TraceOptions) {
  const clock = options.clock ?? now;
  const startTime = clock();
  const frame = engine.transactions.pushScope(metricName, startTime, options.deductFromParent ?? true);

  return (): ScopeFrame | undefined => {
    const endTime = clock();
    const popped = engine.transactions.popScope(frame, metricName, endTime);
    if (popped) {
      engine.recordScopedMetric(metricName, endTime - startTime, popped.exclusiveTime(endTime));
    }
    return popped;
  };
}

/**
 * Trace a synchronous operation. Errors from fn propagate after the frame is popped.
 */
export function traceMethod<T>(engine: StatsEngine, metricName: string, fn: () => T, options: TraceOptions = {}): T {
  const finish = begin(engine, metricName, options);
  try {
    return fn();
  } finally {
    finish();
  }
}

/**
 * Trace an async operation. Concurrent traced operations must each run in
 * their own execution context, or their pops will not nest.
 */
export async function traceMethodAsync<T>(
  engine: StatsEngine,
  metricName: string,
  fn: () => Promise<T>,
  options: TraceOptions = {},
): Promise<T> {
  const finish = begin(engine, metricName, options);
  try {
    return await fn();
  } finally {
    finish();
  }
}
