/**
 * Server Handle
 *
 * One configured database server: its identity, its admin connection, and
 * the counter state kept between polls for rate computation.
 *
 * Every remote call goes through execute(): lost connections are retried a
 * bounded number of times with a fixed pause, and anything that still fails
 * surfaces as ExecuteFailure so the caller can drop the server from the
 * current view instead of crashing.
 */

import type { ExplainResult, QueryParts } from '../types.js';
import {
  OperationFailureError,
  TransientConnectionError,
  type DatabaseAdmin,
} from './database-admin.js';
import { RateTracker } from '../metrics/rate-tracker.js';
import { readServerStatus, type ServerStatus } from '../metrics/server-status.js';
import { readOperation, visibleOperations, type OperationRecord } from '../operations/operation.js';
import { readReplicaSet, type ReplicaSet } from '../replica/replica-set.js';
import { readReplicationInfo, type ReplicationInfo } from '../replica/replication-info.js';
import { log } from '../logger.js';

export const DEFAULT_PORT = 27017;
export const DEFAULT_ATTEMPTS = 10;
export const DEFAULT_RETRY_DELAY_MS = 100;

/** Longest server name that keeps the tables aligned */
export const MAX_NAME_LENGTH = 13;

export interface ServerIdentity {
  readonly name: string;
  /** host:port */
  readonly address: string;
  readonly username?: string;
  readonly password?: string;
}

export interface ExecuteOptions {
  /** Total attempts for a call that keeps losing its connection */
  attempts?: number;
  retryDelayMs?: number;
}

/** A remote call could not be completed; not retried any further. */
export class ExecuteFailure extends Error {
  override cause?: unknown;

  constructor(
    readonly server: string,
    readonly operation: string,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${operation} failed on ${server}${reason}`);
    this.name = 'ExecuteFailure';
    this.cause = cause;
  }
}

/** Append the default port when the address has none. */
export function normalizeAddress(address: string): string {
  return address.includes(':') ? address : `${address}:${DEFAULT_PORT}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class ServerHandle {
  readonly identity: ServerIdentity;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private rates: RateTracker | null = new RateTracker();

  constructor(
    identity: ServerIdentity,
    private readonly admin: DatabaseAdmin,
    options: ExecuteOptions = {},
  ) {
    this.identity = { ...identity, address: normalizeAddress(identity.address) };
    this.attempts = Math.max(1, options.attempts ?? DEFAULT_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  get name(): string {
    return this.identity.name;
  }

  get address(): string {
    return this.identity.address;
  }

  toString(): string {
    return this.identity.name;
  }

  private async execute<T>(operation: string, procedure: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await procedure();
      } catch (err) {
        if (err instanceof TransientConnectionError) {
          if (attempt >= this.attempts) {
            throw new ExecuteFailure(this.name, operation, err);
          }
          await sleep(this.retryDelayMs);
          continue;
        }
        if (err instanceof OperationFailureError) {
          throw new ExecuteFailure(this.name, operation, err);
        }
        throw err;
      }
    }
  }

  /** Poll serverStatus; counters become rates against the previous poll. */
  async status(now?: Date): Promise<ServerStatus> {
    const report = await this.execute('serverStatus', () => this.admin.getStatus());
    if (!this.rates) {
      throw new Error(`Server ${this.name} is closed`);
    }
    return readServerStatus(this, report, this.rates, now);
  }

  /**
   * Operations in progress, one pass per call. Replication traffic can be
   * hidden (see visibleOperations).
   */
  async *currentOperations(hideReplication = false): AsyncGenerator<OperationRecord> {
    const reports = await this.execute('currentOp', () => this.admin.listOperations());
    for (const report of visibleOperations(reports, hideReplication)) {
      yield readOperation(this, report);
    }
  }

  async replicaSet(): Promise<ReplicaSet> {
    const report = await this.execute('replSetGetStatus', () => this.admin.getReplicaSetStatus());
    return readReplicaSet(this, report);
  }

  /** Master/slave replication source, or null when this server has none. */
  async replicationSource(): Promise<ReplicationInfo | null> {
    const report = await this.execute('local.sources', () => this.admin.getReplicationSource());
    return report ? readReplicationInfo(this, report) : null;
  }

  async explainQuery(database: string, collection: string, parts: QueryParts): Promise<ExplainResult> {
    return this.execute('explain', () => this.admin.explain(database, collection, parts));
  }

  async killOperation(opid: number | string): Promise<void> {
    log(`[Server ${this.name}] Killing operation ${opid}`);
    await this.execute('killOp', () => this.admin.kill(opid));
  }

  /** Drop the counter state and the connection. */
  async close(): Promise<void> {
    this.rates = null;
    await this.admin.close();
  }
}
