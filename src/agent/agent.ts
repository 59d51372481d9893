/**
 * Agent Facade
 *
 * Wires config, logging, the event bus, the sampler and the stats engine
 * together. With agent_enabled: false the transaction surface is the no-op
 * shim and the engine drops every metric recorded into it.
 */

import { loadConfig } from '../shared/config.js';
import { createLogger, type Logger } from '../shared/logger.js';
import type { StackmeterConfig } from '../shared/types.js';
import { ExecutionContextStore } from '../engine/context-store.js';
import { EventBus } from '../engine/events.js';
import { NullSampler, type Sampler } from '../engine/sampler.js';
import { StatsEngine } from '../engine/stats-engine.js';
import type { TransactionApi } from '../engine/transactions.js';
import { traceMethod, traceMethodAsync, type TraceOptions } from './method-tracer.js';

export interface AgentOptions {
  /** Takes precedence over configPath */
  config?: StackmeterConfig;
  configPath?: string;
  sampler?: Sampler;
  /** Directory for agent.log. Defaults to ~/.stackmeter/logs */
  logDir?: string;
}

export class Agent {
  readonly config: StackmeterConfig;
  readonly logger: Logger;
  readonly events = new EventBus();
  readonly contexts = new ExecutionContextStore();
  readonly engine: StatsEngine;

  constructor(options: AgentOptions = {}) {
    this.config = options.config ?? loadConfig(options.configPath);
    this.logger = createLogger('agent', { dir: options.logDir, level: this.config.log_level });

    this.engine = new StatsEngine(
      this.config.agent_enabled
        ? {
            contexts: this.contexts,
            sampler: options.sampler ?? new NullSampler(),
            events: this.events,
            config: this.config,
            logger: this.logger,
          }
        : undefined,
    );

    this.logger.info(`Stackmeter agent ${this.config.agent_enabled ? 'enabled' : 'disabled'}`);
  }

  get transactions(): TransactionApi {
    return this.engine.transactions;
  }

  /** Run fn in a fresh execution context with its own scope stack and stats layer. */
  runInContext<T>(fn: () => T): T {
    return this.contexts.run(fn);
  }

  /**
   * Run fn as one transaction. A top-level transaction gets its own
   * execution context; one started while another is open in this context
   * nests inside it, pushing a second stats layer onto the same scope stack.
   * Stats are resolved to name and merged into the engine once fn settles.
   */
  inTransaction<T>(name: string, fn: () => T | Promise<T>): Promise<T> {
    const nested = (this.contexts.current().statsStack?.length ?? 0) > 0;
    const body = async (): Promise<T> => {
      const tx = this.transactions;
      const enclosingName = tx.currentTransactionName();
      tx.startTransaction();
      tx.pushTransactionStats();
      tx.setCurrentTransactionName(name);
      try {
        return await fn();
      } finally {
        const stats = tx.popTransactionStats(name);
        tx.endTransaction();
        if (nested) {
          tx.setCurrentTransactionName(enclosingName);
        }
        this.events.notify('transaction_finished', name, stats);
      }
    };
    return nested ? body() : this.contexts.run(body);
  }

  trace<T>(metricName: string, fn: () => T, options?: TraceOptions): T {
    return traceMethod(this.engine, metricName, fn, options);
  }

  traceAsync<T>(metricName: string, fn: () => Promise<T>, options?: TraceOptions): Promise<T> {
    return traceMethodAsync(this.engine, metricName, fn, options);
  }
}

export function createAgent(options: AgentOptions = {}): Agent {
  return new Agent(options);
}
