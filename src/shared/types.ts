/**
 * Shared Type Definitions
 *
 * Configuration contract read by the agent facade and the transaction
 * recorder. Changes here affect every module.
 */

// =============================================================================
// Logging
// =============================================================================

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

// =============================================================================
// Configuration
// =============================================================================

/** Configuration from ~/.stackmeter/stackmeter.yml */
export interface StackmeterConfig {
  /** false selects the disabled (no-op) transaction surface */
  agent_enabled: boolean;
  /** Forces sampler notifications on, regardless of transaction_tracer.enabled */
  developer_mode: boolean;
  log_level: LogLevelName;
  transaction_tracer: {
    enabled: boolean;
  };
}

/** Default configuration values */
export const DEFAULT_CONFIG: StackmeterConfig = {
  agent_enabled: true,
  developer_mode: false,
  log_level: 'info',
  transaction_tracer: {
    enabled: true,
  },
};
