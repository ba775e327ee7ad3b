/**
 * Database Admin Interface
 *
 * The remote calls the dashboard makes against one server. Implementations
 * report failures as one of two kinds so the server handle knows which ones
 * are worth retrying.
 */

import type {
  ExplainResult,
  OperationReport,
  QueryParts,
  ReplicaSetStatusReport,
  ReplicationSourceReport,
  ServerStatusReport,
} from '../types.js';

export interface DatabaseAdmin {
  getStatus(): Promise<ServerStatusReport>;
  listOperations(): Promise<OperationReport[]>;
  getReplicaSetStatus(): Promise<ReplicaSetStatusReport>;
  getReplicationSource(): Promise<ReplicationSourceReport | null>;
  explain(database: string, collection: string, parts: QueryParts): Promise<ExplainResult>;
  kill(opid: number | string): Promise<void>;
  close(): Promise<void>;
}

/** Connection dropped or server not selectable; worth another attempt. */
export class TransientConnectionError extends Error {
  override cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'TransientConnectionError';
    this.cause = cause;
  }
}

/** The server refused or failed the command; retrying will not help. */
export class OperationFailureError extends Error {
  override cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'OperationFailureError';
    this.cause = cause;
  }
}
