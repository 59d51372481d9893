/**
 * Stats Accumulator
 *
 * Map from MetricSpec to Stats. Specs are keyed by value, so two specs with
 * the same name and scope address the same bucket.
 */

import { MetricSpec } from './metric-spec.js';
import { Stats } from './stats.js';

interface Entry {
  spec: MetricSpec;
  stats: Stats;
}

export class StatsHash implements Iterable<[MetricSpec, Stats]> {
  private readonly entries = new Map<string, Entry>();

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  has(spec: MetricSpec): boolean {
    return this.entries.has(spec.key);
  }

  get(spec: MetricSpec): Stats | undefined {
    return this.entries.get(spec.key)?.stats;
  }

  set(spec: MetricSpec, stats: Stats): void {
    this.entries.set(spec.key, { spec, stats });
  }

  getOrCreate(spec: MetricSpec): Stats {
    const existing = this.entries.get(spec.key);
    if (existing) return existing.stats;

    const stats = new Stats();
    this.entries.set(spec.key, { spec, stats });
    return stats;
  }

  record(spec: MetricSpec, value: number, exclusive: number = value): Stats {
    return this.getOrCreate(spec).recordDataPoint(value, exclusive);
  }

  /**
   * Merge every entry of other into this hash. Stats objects are never shared
   * between hashes: entries this hash lacks are cloned.
   */
  merge(other: StatsHash): this {
    for (const [spec, stats] of other) {
      const mine = this.get(spec);
      if (mine) {
        mine.merge(stats);
      } else {
        this.set(spec, stats.clone());
      }
    }
    return this;
  }

  *[Symbol.iterator](): Iterator<[MetricSpec, Stats]> {
    for (const { spec, stats } of this.entries.values()) {
      yield [spec, stats];
    }
  }
}
