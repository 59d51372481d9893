/**
 * Execution-Context Store
 *
 * Binds a scope stack, a stats layer and the resolved transaction name to
 * each async call chain. A chain entered through run() gets its own state;
 * code outside any run() shares the root state.
 *
 * Each piece is created on first access and may be discarded independently.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { ScopeFrame } from './scope-frame.js';
import type { StatsHash } from '../stats/stats-hash.js';

export interface ExecutionContextState {
  scopeStack?: ScopeFrame[];
  statsStack?: StatsHash[];
  transactionName?: string;
}

export class ExecutionContextStore {
  private readonly storage = new AsyncLocalStorage<ExecutionContextState>();
  private readonly root: ExecutionContextState = {};

  /** Run fn with a fresh, empty context bound to it and everything it awaits. */
  run<T>(fn: () => T): T {
    return this.storage.run({}, fn);
  }

  current(): ExecutionContextState {
    return this.storage.getStore() ?? this.root;
  }

  scopeStack(): ScopeFrame[] {
    const state = this.current();
    state.scopeStack ??= [];
    return state.scopeStack;
  }

  /** The scope stack without creating one. */
  peekScopeStack(): ScopeFrame[] | undefined {
    return this.current().scopeStack;
  }

  statsStack(): StatsHash[] {
    const state = this.current();
    state.statsStack ??= [];
    return state.statsStack;
  }

  transactionName(): string | undefined {
    return this.current().transactionName;
  }

  setTransactionName(name: string | undefined): void {
    this.current().transactionName = name;
  }

  /** Drop the scope stack and transaction name. The stats layer is kept. */
  releaseScope(): void {
    const state = this.current();
    state.scopeStack = undefined;
    state.transactionName = undefined;
  }
}
