/**
 * Configuration Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, loadConfig, parseArgs, parseServerFile } from './config.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const SERVER_FILE = `
[db01]
address = "10.0.0.1"
username = "monitor"
password = "test-secret"

[db02]
address = "10.0.0.2:27018"
operations = false
replicationOperations = false
`;

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'fleettop-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(text: string): string {
  const path = join(dir, 'fleettop.toml');
  writeFileSync(path, text);
  return path;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('defaults to the local server', () => {
    expect(parseArgs([])).toEqual({ addresses: ['localhost:27017'], version: false, help: false });
  });

  it('collects addresses and options', () => {
    expect(parseArgs(['db01', '-c', '/etc/fleettop.toml', 'db02:27018', '-V'])).toEqual({
      addresses: ['db01', 'db02:27018'],
      conf: '/etc/fleettop.toml',
      version: true,
      help: false,
    });
    expect(parseArgs(['--conf=/tmp/x.toml', '--help'])).toMatchObject({ conf: '/tmp/x.toml', help: true });
  });

  it('rejects unknown options and a missing path', () => {
    expect(() => parseArgs(['--daemon'])).toThrow('Unknown option: --daemon');
    expect(() => parseArgs(['--conf'])).toThrow('--conf requires a file path');
  });
});

describe('parseServerFile', () => {
  it('reads one server per section in file order', () => {
    const servers = parseServerFile(SERVER_FILE, 'fleettop.toml');

    expect(servers).toEqual([
      {
        identity: { name: 'db01', address: '10.0.0.1:27017', username: 'monitor', password: 'test-secret' },
        views: ['status', 'replicationInfo', 'replicaSet', 'operations', 'replicationOperations'],
      },
      {
        identity: { name: 'db02', address: '10.0.0.2:27018', username: undefined, password: undefined },
        views: ['status', 'replicationInfo', 'replicaSet'],
      },
    ]);
  });

  it('lists every problem with a section', () => {
    expect(() => parseServerFile('[db01]\nstatus = "yes"\n', 'bad.toml')).toThrow(ConfigError);
    expect(() => parseServerFile('[db01]\nstatus = "yes"\n', 'bad.toml')).toThrow(/Invalid configuration in bad\.toml:\n {2}- db01\.address: Required/);
  });

  it('reports TOML syntax errors', () => {
    expect(() => parseServerFile('[db01\naddress = ', 'broken.toml')).toThrow('Failed to parse config file: broken.toml');
  });
});

describe('loadConfig', () => {
  it('uses the file servers when there are any', () => {
    const path = writeConfig(SERVER_FILE);
    const config = loadConfig(parseArgs(['-c', path, 'ignored:27017']), {});

    expect(config.configPath).toBe(path);
    expect(config.servers.map(s => s.identity.name)).toEqual(['db01', 'db02']);
  });

  it('falls back to the command line addresses', () => {
    const config = loadConfig(parseArgs(['db01', 'db02:27018']), { FLEETTOP_CONF: join(dir, 'missing.toml') });

    expect(config.servers).toEqual([
      { identity: { name: 'db01', address: 'db01:27017' }, views: ['status', 'replicationInfo', 'replicaSet', 'operations', 'replicationOperations'] },
      { identity: { name: 'db02:27018', address: 'db02:27018' }, views: ['status', 'replicationInfo', 'replicaSet', 'operations', 'replicationOperations'] },
    ]);
  });

  it('falls back to the addresses when the file has no sections', () => {
    const path = writeConfig('# no servers yet\n');
    const config = loadConfig(parseArgs(['-c', path]), {});
    expect(config.servers.map(s => s.identity.address)).toEqual(['localhost:27017']);
  });

  it('fails when an explicit file is missing', () => {
    expect(() => loadConfig(parseArgs(['-c', join(dir, 'nope.toml')]), {})).toThrow(ConfigError);
  });

  it('reads timing overrides from the environment', () => {
    const config = loadConfig(parseArgs([]), {
      FLEETTOP_CONF: join(dir, 'missing.toml'),
      REFRESH_INTERVAL_MS: '500',
      EXECUTE_ATTEMPTS: '3',
      EXECUTE_RETRY_DELAY_MS: '50',
      LOG_FILE: '/tmp/fleettop.log',
    });

    expect(config.refreshIntervalMs).toBe(500);
    expect(config.executeAttempts).toBe(3);
    expect(config.executeRetryDelayMs).toBe(50);
    expect(config.logFile).toBe('/tmp/fleettop.log');
  });

  it('uses the defaults when nothing is set', () => {
    const config = loadConfig(parseArgs([]), { FLEETTOP_CONF: join(dir, 'missing.toml') });

    expect(config.refreshIntervalMs).toBe(1000);
    expect(config.executeAttempts).toBe(10);
    expect(config.executeRetryDelayMs).toBe(100);
    expect(config.logFile).toBeUndefined();
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig(parseArgs([]), { FLEETTOP_CONF: join(dir, 'missing.toml'), EXECUTE_ATTEMPTS: 'many' })).toThrow(
      'Expected a non-negative integer, got "many"',
    );
  });
});
