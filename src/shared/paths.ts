/**
 * Path Constants
 *
 * All paths to Stackmeter runtime files. Uses path.join() for cross-platform support.
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** ~/.stackmeter/, the Stackmeter global root */
export const STACKMETER_HOME = path.join(os.homedir(), '.stackmeter');

/** All Stackmeter runtime paths */
export const PATHS = {
  home: STACKMETER_HOME,

  // Logs
  logs: path.join(STACKMETER_HOME, 'logs'),

  // Configuration
  config: path.join(STACKMETER_HOME, 'stackmeter.yml'),
} as const;

/**
 * Resolve the config file location.
 * STACKMETER_CONFIG wins over the default under the home directory.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['STACKMETER_CONFIG'];
  return override && override.trim() ? path.resolve(override.trim()) : PATHS.config;
}
