/**
 * Disabled Transaction Surface
 *
 * Stands in for TransactionRecorder when the agent is turned off, so call
 * sites never branch on whether instrumentation is enabled.
 */

import type { TransactionApi } from './transactions.js';
import type { ScopeFrame } from './scope-frame.js';
import type { Sampler } from './sampler.js';
import type { StatsHash } from '../stats/stats-hash.js';

export class DisabledTransactionRecorder implements TransactionApi {
  pushScope(_tag: string, _startTime?: number, _deductFromParent?: boolean): undefined {
    return undefined;
  }

  popScope(_expectedFrame: ScopeFrame | undefined, _resolvedName: string, _endTime?: number): undefined {
    return undefined;
  }

  startTransaction(): void {}
  endTransaction(): void {}
  pushTransactionStats(): void {}

  popTransactionStats(_resolvedTransactionName: string): undefined {
    return undefined;
  }

  transactionStatsHash(): StatsHash | undefined {
    return undefined;
  }

  currentScopeStack(): undefined {
    return undefined;
  }

  currentStatsStack(): undefined {
    return undefined;
  }

  setCurrentTransactionName(_name: string | undefined): void {}

  currentTransactionName(): undefined {
    return undefined;
  }

  setTransactionSampler(_sampler: Sampler): void {}
}
