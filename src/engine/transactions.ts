/**
 * Transaction Recorder
 *
 * Pushes and pops scope frames for traced operations, attributes elapsed
 * time to parents, and buffers per-transaction stats whose scope is resolved
 * to the transaction name when the transaction's stats are popped.
 */

import { ScopeFrame } from './scope-frame.js';
import { now } from './clock.js';
import type { ExecutionContextStore } from './context-store.js';
import type { EventBus } from './events.js';
import type { Sampler } from './sampler.js';
import { StatsHash } from '../stats/stats-hash.js';
import { StackCorruptionError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { StackmeterConfig } from '../shared/types.js';

// =============================================================================
// Types
// =============================================================================

/** Surface shared by the live recorder and the disabled shim. */
export interface TransactionApi {
  pushScope(tag: string, startTime?: number, deductFromParent?: boolean): ScopeFrame | undefined;
  popScope(expectedFrame: ScopeFrame | undefined, resolvedName: string, endTime?: number): ScopeFrame | undefined;
  startTransaction(): void;
  endTransaction(): void;
  pushTransactionStats(): void;
  popTransactionStats(resolvedTransactionName: string): StatsHash | undefined;
  transactionStatsHash(): StatsHash | undefined;
  currentScopeStack(): ScopeFrame[] | undefined;
  currentStatsStack(): StatsHash[] | undefined;
  setCurrentTransactionName(name: string | undefined): void;
  currentTransactionName(): string | undefined;
  /** @deprecated the recorder always uses the sampler it was built with */
  setTransactionSampler(sampler: Sampler): void;
}

/** Engine-wide store receiving resolved transaction stats. */
export interface StatsSink {
  merge(stats: StatsHash): void;
}

export interface TransactionRecorderDeps {
  contexts: ExecutionContextStore;
  sampler: Sampler;
  events: EventBus;
  /** Read on every push and pop, so flag changes apply immediately */
  config: Pick<StackmeterConfig, 'developer_mode' | 'transaction_tracer'>;
  sink: StatsSink;
  logger: Logger;
}

// =============================================================================
// Recorder
// =============================================================================

export class TransactionRecorder implements TransactionApi {
  private readonly contexts: ExecutionContextStore;
  private readonly sampler: Sampler;
  private readonly events: EventBus;
  private readonly config: TransactionRecorderDeps['config'];
  private readonly sink: StatsSink;
  private readonly logger: Logger;

  constructor(deps: TransactionRecorderDeps) {
    this.contexts = deps.contexts;
    this.sampler = deps.sampler;
    this.events = deps.events;
    this.config = deps.config;
    this.sink = deps.sink;
    this.logger = deps.logger;
  }

  /**
   * Push a frame for a traced operation. The returned frame must be handed
   * back to the matching popScope call.
   *
   * @param tag - only used to identify the frame if the stack gets corrupted
   */
  pushScope(tag: string, startTime: number = now(), deductFromParent: boolean = true): ScopeFrame {
    const stack = this.contexts.scopeStack();
    if (this.samplerEnabled()) {
      this.sampler.noticePushScope(startTime);
    }
    const frame = new ScopeFrame(tag, startTime, deductFromParent);
    stack.push(frame);
    return frame;
  }

  /**
   * Pop the top frame, charge its time to the new top, and name it.
   *
   * @throws StackCorruptionError when the top frame is not expectedFrame
   */
  popScope(expectedFrame: ScopeFrame | undefined, resolvedName: string, endTime: number = now()): ScopeFrame {
    const stack = this.contexts.scopeStack();
    const frame = stack.pop();
    if (frame === undefined || frame !== expectedFrame) {
      throw new StackCorruptionError(frame ? frame.tag : 'none', expectedFrame ? expectedFrame.tag : 'none');
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.childrenTime += frame.deductFromParent ? endTime - frame.startTime : frame.childrenTime;
    }

    if (this.samplerEnabled()) {
      this.sampler.noticePopScope(resolvedName, endTime);
    }
    frame.name = resolvedName;
    return frame;
  }

  /** The calling context's scope stack, created on first access. */
  currentScopeStack(): ScopeFrame[] {
    return this.contexts.scopeStack();
  }

  /** The calling context's stats layer, created on first access. */
  currentStatsStack(): StatsHash[] {
    return this.contexts.statsStack();
  }

  samplerEnabled(): boolean {
    return this.config.transaction_tracer.enabled || this.config.developer_mode;
  }

  setTransactionSampler(_sampler: Sampler): void {
    this.logger.warn('TransactionRecorder#setTransactionSampler is deprecated');
  }

  /**
   * Name the current transaction. Traced operations in this context are
   * scoped to it until the scope stack drains.
   */
  setCurrentTransactionName(name: string | undefined): void {
    this.contexts.setTransactionName(name);
  }

  currentTransactionName(): string | undefined {
    return this.contexts.transactionName();
  }

  /** Detecting a transaction already in progress is left to listeners. */
  startTransaction(): void {
    this.events.notify('start_transaction');
  }

  /**
   * Release this context's scope state if its stack has drained. A non-empty
   * stack means an inner transaction ended; the state is left as is.
   */
  endTransaction(): void {
    const stack = this.contexts.peekScopeStack();
    if (stack && stack.length === 0) {
      this.contexts.releaseScope();
    }
  }

  transactionStatsHash(): StatsHash | undefined {
    const layer = this.contexts.statsStack();
    return layer[layer.length - 1];
  }

  pushTransactionStats(): void {
    this.contexts.statsStack().push(new StatsHash());
  }

  /**
   * Pop the current transaction's stats, resolve placeholder scopes to
   * resolvedTransactionName and merge the result into the engine store.
   *
   * @returns the popped hash as recorded, before scope resolution
   */
  popTransactionStats(resolvedTransactionName: string): StatsHash | undefined {
    this.contexts.scopeStack();
    const stats = this.contexts.statsStack().pop();
    if (stats) {
      this.sink.merge(applyScopes(stats, resolvedTransactionName));
    }
    return stats;
  }
}

/**
 * Copy stats into a new hash, rewriting placeholder scopes to resolvedName.
 * Unscoped ('') and concrete scopes are kept.
 */
export function applyScopes(stats: StatsHash, resolvedName: string): StatsHash {
  const resolved = new StatsHash();
  for (const [spec, entry] of stats) {
    const target = spec.isPlaceholder ? spec.withScope(resolvedName) : spec;
    const existing = resolved.get(target);
    if (existing) {
      existing.merge(entry);
    } else {
      resolved.set(target, entry.clone());
    }
  }
  return resolved;
}
