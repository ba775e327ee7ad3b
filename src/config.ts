/**
 * Dashboard configuration.
 *
 * Servers come from the TOML file when it has any sections, otherwise from
 * the addresses on the command line. Timing values can be overridden via
 * environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { z, ZodError } from 'zod';
import { ALL_VIEWS, type View } from './types.js';
import {
  DEFAULT_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  MAX_NAME_LENGTH,
  normalizeAddress,
  type ServerIdentity,
} from './services/server.js';
import { DEFAULT_REFRESH_INTERVAL_MS } from './screen/query-screen.js';
import { log } from './logger.js';

export const DEFAULT_ADDRESS = 'localhost:27017';
export const DEFAULT_CONFIG_FILE = '.fleettop.toml';

export class ConfigError extends Error {
  override cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ConfigError';
    this.cause = cause;
  }
}

export interface CliArgs {
  addresses: string[];
  conf?: string;
  version: boolean;
  help: boolean;
}

export interface ServerConfig {
  identity: ServerIdentity;
  /** Views this server takes part in */
  views: View[];
}

export interface Config {
  servers: ServerConfig[];
  /** File the servers were read from, when they were */
  configPath: string;

  refreshIntervalMs: number;
  executeAttempts: number;
  executeRetryDelayMs: number;

  /** Log destination; stderr when unset */
  logFile?: string;
}

export const USAGE = `Usage: fleettop [options] [address ...]

Live dashboard of MongoDB servers: status, replication and running operations.

Arguments:
  address            host[:port] to monitor (default: ${DEFAULT_ADDRESS})

Options:
  -c, --conf <path>  server configuration file (default: $FLEETTOP_CONF or ~/${DEFAULT_CONFIG_FILE})
  -V, --version      print the version and exit
  -h, --help         print this help and exit

Keys:
  e  explain a running query     k  kill an operation
  K  kill operations slower than N seconds
  q  quit`;

// =============================================================================
// Command line
// =============================================================================

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { addresses: [], version: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-c':
      case '--conf': {
        const value = argv[++i];
        if (value === undefined || value.startsWith('-')) {
          throw new ConfigError(`${arg} requires a file path`);
        }
        args.conf = value;
        break;
      }
      case '-V':
      case '--version':
        args.version = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        if (arg.startsWith('--conf=')) {
          args.conf = arg.slice('--conf='.length);
        } else if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        } else {
          args.addresses.push(arg);
        }
    }
  }

  if (args.addresses.length === 0) args.addresses.push(DEFAULT_ADDRESS);
  return args;
}

// =============================================================================
// Server file
// =============================================================================

const ServerSectionSchema = z
  .object({
    address: z.string().min(1),
    username: z.string().optional(),
    password: z.string().optional(),
    status: z.boolean().default(true),
    replicationInfo: z.boolean().default(true),
    replicaSet: z.boolean().default(true),
    operations: z.boolean().default(true),
    replicationOperations: z.boolean().default(true),
  })
  .strict();

export const ServerFileSchema = z.record(z.string(), ServerSectionSchema);

export type ServerSection = z.infer<typeof ServerSectionSchema>;

/** Servers listed in a TOML file, in file order. */
export function parseServerFile(text: string, filePath: string): ServerConfig[] {
  let raw: unknown;
  try {
    raw = parseToml(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, err);
  }

  let sections: Record<string, ServerSection>;
  try {
    sections = ServerFileSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map(i => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Invalid configuration in ${filePath}:\n${issues}`, err);
    }
    throw err;
  }

  return Object.entries(sections).map(([name, section]) => ({
    identity: {
      name,
      address: normalizeAddress(section.address),
      username: section.username,
      password: section.password,
    },
    views: ALL_VIEWS.filter(view => section[view]),
  }));
}

/** Every address in every view, named after the address itself. */
export function serversFromAddresses(addresses: readonly string[]): ServerConfig[] {
  return addresses.map(address => ({
    identity: { name: address, address: normalizeAddress(address) },
    views: [...ALL_VIEWS],
  }));
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.FLEETTOP_CONF || join(homedir(), DEFAULT_CONFIG_FILE);
}

// =============================================================================
// Loading
// =============================================================================

export function loadConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = args.conf ?? defaultConfigPath(env);

  if (args.conf !== undefined && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const fromFile = existsSync(configPath)
    ? parseServerFile(readFileSync(configPath, 'utf8'), configPath)
    : [];
  const servers = fromFile.length > 0 ? fromFile : serversFromAddresses(args.addresses);

  for (const server of fromFile) {
    if (server.identity.name.length > MAX_NAME_LENGTH) {
      log(`[Config] Server name "${server.identity.name}" is longer than ${MAX_NAME_LENGTH} characters; columns will not line up`);
    }
  }

  return {
    servers,
    configPath,

    refreshIntervalMs: int(env.REFRESH_INTERVAL_MS, DEFAULT_REFRESH_INTERVAL_MS),
    executeAttempts: int(env.EXECUTE_ATTEMPTS, DEFAULT_ATTEMPTS),
    executeRetryDelayMs: int(env.EXECUTE_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),

    logFile: env.LOG_FILE || undefined,
  };
}

function int(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new ConfigError(`Expected a non-negative integer, got "${val}"`);
  }
  return parsed;
}
