export { Agent, createAgent, type AgentOptions } from './agent/agent.js';
export { traceMethod, traceMethodAsync, type TraceOptions } from './agent/method-tracer.js';
export { now, type Clock } from './engine/clock.js';
export { ExecutionContextStore, type ExecutionContextState } from './engine/context-store.js';
export { EventBus, type AgentEventMap, type AgentEventName } from './engine/events.js';
export { NullSampler, type Sampler } from './engine/sampler.js';
export { ScopeFrame } from './engine/scope-frame.js';
export { DisabledTransactionRecorder } from './engine/shim.js';
export { StatsEngine } from './engine/stats-engine.js';
export {
  TransactionRecorder,
  applyScopes,
  type StatsSink,
  type TransactionApi,
  type TransactionRecorderDeps,
} from './engine/transactions.js';
export { MetricSpec, SCOPE_PLACEHOLDER } from './stats/metric-spec.js';
export { Stats, type StatsSnapshot } from './stats/stats.js';
export { StatsHash } from './stats/stats-hash.js';
export { loadConfig, parseConfig } from './shared/config.js';
export { ConfigError, StackCorruptionError, StackmeterError } from './shared/errors.js';
export { createLogger, formatArgs, type Logger, type LoggerOptions } from './shared/logger.js';
export { PATHS, resolveConfigPath } from './shared/paths.js';
export { DEFAULT_CONFIG, type StackmeterConfig, type LogLevelName } from './shared/types.js';
