/**
 * Stats Record
 *
 * Aggregate for one metric bucket. All times in seconds.
 */

export interface StatsSnapshot {
  callCount: number;
  totalCallTime: number;
  totalExclusiveTime: number;
  minCallTime: number;
  maxCallTime: number;
  sumOfSquares: number;
}

export class Stats implements StatsSnapshot {
  callCount = 0;
  totalCallTime = 0;
  totalExclusiveTime = 0;
  minCallTime = 0;
  maxCallTime = 0;
  sumOfSquares = 0;

  /**
   * Record one call. Exclusive time defaults to the full value.
   */
  recordDataPoint(value: number, exclusive: number = value): this {
    if (this.callCount === 0) {
      this.minCallTime = value;
      this.maxCallTime = value;
    } else {
      this.minCallTime = Math.min(this.minCallTime, value);
      this.maxCallTime = Math.max(this.maxCallTime, value);
    }
    this.callCount += 1;
    this.totalCallTime += value;
    this.totalExclusiveTime += exclusive;
    this.sumOfSquares += value * value;
    return this;
  }

  merge(other: StatsSnapshot): this {
    if (other.callCount === 0) return this;

    if (this.callCount === 0) {
      this.minCallTime = other.minCallTime;
      this.maxCallTime = other.maxCallTime;
    } else {
      this.minCallTime = Math.min(this.minCallTime, other.minCallTime);
      this.maxCallTime = Math.max(this.maxCallTime, other.maxCallTime);
    }
    this.callCount += other.callCount;
    this.totalCallTime += other.totalCallTime;
    this.totalExclusiveTime += other.totalExclusiveTime;
    this.sumOfSquares += other.sumOfSquares;
    return this;
  }

  isReset(): boolean {
    return this.callCount === 0 && this.totalCallTime === 0 && this.totalExclusiveTime === 0;
  }

  clone(): Stats {
    return new Stats().merge(this);
  }

  toJSON(): StatsSnapshot {
    return {
      callCount: this.callCount,
      totalCallTime: this.totalCallTime,
      totalExclusiveTime: this.totalExclusiveTime,
      minCallTime: this.minCallTime,
      maxCallTime: this.maxCallTime,
      sumOfSquares: this.sumOfSquares,
    };
  }
}
