/**
 * Stats Engine
 *
 * Engine-wide metric store. Transactions merge their resolved stats into it
 * once, when their stats layer is popped; harvest() hands the accumulated
 * store to the caller and starts a new one.
 */

import { MetricSpec, SCOPE_PLACEHOLDER } from '../stats/metric-spec.js';
import { StatsHash } from '../stats/stats-hash.js';
import type { Stats } from '../stats/stats.js';
import { TransactionRecorder, type StatsSink, type TransactionApi, type TransactionRecorderDeps } from './transactions.js';
import { DisabledTransactionRecorder } from './shim.js';

export class StatsEngine implements StatsSink {
  private store = new StatsHash();
  readonly transactions: TransactionApi;
  /** false: the transaction surface is the no-op shim and records are dropped */
  readonly enabled: boolean;

  /**
   * @param recorderDeps - omit to build a disabled engine
   */
  constructor(recorderDeps?: Omit<TransactionRecorderDeps, 'sink'>) {
    this.enabled = recorderDeps !== undefined;
    this.transactions = recorderDeps
      ? new TransactionRecorder({ ...recorderDeps, sink: this })
      : new DisabledTransactionRecorder();
  }

  merge(stats: StatsHash): void {
    this.store.merge(stats);
  }

  /** Record an unscoped metric directly into the engine store. */
  recordMetric(name: string, value: number, exclusive: number = value): Stats | undefined {
    if (!this.enabled) return undefined;
    return this.store.record(new MetricSpec(name), value, exclusive);
  }

  /**
   * Record a metric for the current transaction. The scoped entry carries
   * SCOPE_PLACEHOLDER until the transaction's stats are popped; the unscoped
   * roll-up is buffered alongside it. Outside a transaction only the
   * unscoped metric is recorded, straight into the store.
   */
  recordScopedMetric(name: string, value: number, exclusive: number = value): void {
    if (!this.enabled) return;
    const txStats = this.transactions.transactionStatsHash();
    if (!txStats) {
      this.recordMetric(name, value, exclusive);
      return;
    }
    txStats.record(new MetricSpec(name, SCOPE_PLACEHOLDER), value, exclusive);
    txStats.record(new MetricSpec(name), value, exclusive);
  }

  getStats(name: string, scope: string = ''): Stats | undefined {
    return this.store.get(new MetricSpec(name, scope));
  }

  /** Return everything recorded since the last harvest and start over. */
  harvest(): StatsHash {
    const harvested = this.store;
    this.store = new StatsHash();
    return harvested;
  }

  reset(): void {
    this.store = new StatsHash();
  }
}
