/**
 * Metric Spec
 *
 * The (name, scope) key of one statistic bucket.
 */

/**
 * Scope value meaning "the enclosing transaction's name, once known".
 * Rewritten by TransactionRecorder.popTransactionStats.
 */
export const SCOPE_PLACEHOLDER = '__SCOPE__';

export class MetricSpec {
  readonly name: string;
  /** '' is unscoped; SCOPE_PLACEHOLDER is resolved at transaction end */
  readonly scope: string;

  constructor(name: string, scope: string = '') {
    this.name = name;
    this.scope = scope;
  }

  /** Stable identity used as the StatsHash map key. */
  get key(): string {
    return `${this.name}\u0000${this.scope}`;
  }

  get isPlaceholder(): boolean {
    return this.scope === SCOPE_PLACEHOLDER;
  }

  withScope(scope: string): MetricSpec {
    return new MetricSpec(this.name, scope);
  }

  equals(other: MetricSpec): boolean {
    return this.name === other.name && this.scope === other.scope;
  }

  toString(): string {
    return this.scope ? `${this.name}:${this.scope}` : this.name;
  }
}
