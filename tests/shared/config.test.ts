/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig, parseConfig } from '../../src/shared/config.js';
import { ConfigError } from '../../src/shared/errors.js';
import { PATHS, resolveConfigPath } from '../../src/shared/paths.js';
import { DEFAULT_CONFIG } from '../../src/shared/types.js';

let tmpDir: string;
let configPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackmeter-config-'));
  configPath = path.join(tmpDir, 'stackmeter.yml');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('returns defaults when config file does not exist', () => {
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults when config file is empty', () => {
    fs.writeFileSync(configPath, '', 'utf-8');
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults when config file is malformed', () => {
    fs.writeFileSync(configPath, 'transaction_tracer: [unclosed', 'utf-8');
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('overrides defaults field by field', () => {
    fs.writeFileSync(configPath, [
      'developer_mode: true',
      'log_level: debug',
      'transaction_tracer:',
      '  enabled: false',
    ].join('\n'), 'utf-8');

    const config = loadConfig(configPath);
    expect(config.developer_mode).toBe(true);
    expect(config.log_level).toBe('debug');
    expect(config.transaction_tracer.enabled).toBe(false);
    expect(config.agent_enabled).toBe(DEFAULT_CONFIG.agent_enabled);
  });

  it('falls back to defaults for values of the wrong type', () => {
    fs.writeFileSync(configPath, [
      'agent_enabled: "yes"',
      'log_level: loud',
      'transaction_tracer:',
      '  enabled: 1',
    ].join('\n'), 'utf-8');

    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('does not hand out the shared defaults object', () => {
    const config = loadConfig(configPath);
    config.transaction_tracer.enabled = false;
    expect(DEFAULT_CONFIG.transaction_tracer.enabled).toBe(true);
  });
});

describe('parseConfig', () => {
  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b\n')).toThrow(ConfigError);
  });

  it('ignores keys it does not know', () => {
    const config = parseConfig('transaction_tracer:\n  enabled: false\n  sample_rate: 2\n');
    expect(config.transaction_tracer).toEqual({ enabled: false });
  });
});

describe('resolveConfigPath', () => {
  it('prefers STACKMETER_CONFIG', () => {
    expect(resolveConfigPath({ STACKMETER_CONFIG: '/etc/stackmeter.yml' })).toBe('/etc/stackmeter.yml');
  });

  it('falls back to the home directory file', () => {
    expect(resolveConfigPath({})).toBe(PATHS.config);
    expect(resolveConfigPath({ STACKMETER_CONFIG: '  ' })).toBe(PATHS.config);
  });
});
