/**
 * Agent Event Bus
 *
 * Typed wrapper over EventEmitter for transaction lifecycle listeners.
 */

import { EventEmitter } from 'node:events';
import type { StatsHash } from '../stats/stats-hash.js';

export interface AgentEventMap {
  start_transaction: [];
  transaction_finished: [name: string, stats: StatsHash | undefined];
}

export type AgentEventName = keyof AgentEventMap;

export class EventBus {
  private readonly emitter = new EventEmitter();

  subscribe<E extends AgentEventName>(event: E, listener: (...args: AgentEventMap[E]) => void): () => void {
    const handler = (...args: AgentEventMap[E]): void => listener(...args);
    this.emitter.on(event, handler);
    return () => {
      this.emitter.off(event, handler);
    };
  }

  /** Listener exceptions propagate to the notifying call site. */
  notify<E extends AgentEventName>(event: E, ...args: AgentEventMap[E]): void {
    this.emitter.emit(event, ...args);
  }

  listenerCount(event: AgentEventName): number {
    return this.emitter.listenerCount(event);
  }
}
