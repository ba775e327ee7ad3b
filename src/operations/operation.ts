/**
 * Running Operations
 *
 * One tagged record per entry of a server's currentOp list. An operation
 * carrying a query payload is tagged 'query'; everything else is a bare
 * 'operation'. Opids are only unique within a server, so records are keyed
 * by (server name, opid).
 */

import { BSON } from 'mongodb';
import type { ServerHandle } from '../services/server.js';
import type { Cell, Displayable, OperationReport, QueryDocument, QueryPayload } from '../types.js';
import { Block } from '../display/block.js';

export interface OperationRecord extends Displayable {
  readonly display: 'operation';
  kind: 'operation' | 'query';
  server: ServerHandle;
  opid: number | string;
  /** Operation type as reported (query, getmore, update, ...) */
  state: string;
  /** Seconds running, when the server reports it */
  duration?: number;
  /** "database.collection" */
  namespace?: string;
  query?: QueryPayload;
}

/** Sort key used for operations whose running time is unknown */
export const UNKNOWN_DURATION = -1;

export function operationKey(serverName: string, opid: number | string): string {
  return `${serverName}/${opid}`;
}

export function isDocument(value: unknown): value is QueryDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize the payload a server reports for an operation. JSON-looking
 * strings are parsed as extended JSON; empty payloads count as none.
 */
export function parseQuery(raw: QueryPayload | null | undefined): QueryPayload | undefined {
  if (raw === null || raw === undefined) return undefined;

  if (typeof raw === 'string') {
    if (raw.startsWith('{') && raw.endsWith('}')) {
      try {
        const parsed: unknown = BSON.EJSON.parse(raw, { relaxed: true });
        if (isDocument(parsed)) return parsed;
      } catch {
        // Truncated payloads are not valid JSON; keep them as text
        return raw;
      }
    }
    return raw || undefined;
  }

  return Object.keys(raw).length > 0 ? raw : undefined;
}

/**
 * Query payload of an operation. Servers that report the whole command
 * instead of a query expose find filters as { $query, $orderby }.
 */
export function queryPayload(report: OperationReport): QueryPayload | undefined {
  const query = parseQuery(report.query);
  if (query !== undefined) return query;

  const command = report.command;
  if (command && isDocument(command.filter)) {
    return isDocument(command.sort) && Object.keys(command.sort).length > 0
      ? { $query: command.filter, $orderby: command.sort }
      : command.filter;
  }
  return undefined;
}

export function readOperation(server: ServerHandle, report: OperationReport): OperationRecord {
  const query = queryPayload(report);
  return {
    display: 'operation',
    kind: query === undefined ? 'operation' : 'query',
    server,
    opid: report.opid,
    state: report.op,
    duration: report.secs_running,
    namespace: report.ns || undefined,
    query,
  };
}

/**
 * Drop replication noise from a currentOp list:
 *   - getmore cursors tailing local.oplog.* (a master feeding its slaves)
 *   - the leading run of ops with no namespace or on local.sources (a slave
 *     pulling from its master); the run ends at the first op on a real
 *     namespace
 */
export function* visibleOperations(
  reports: Iterable<OperationReport>,
  hideReplication: boolean,
): Generator<OperationReport> {
  let leadingRun = true;

  for (const op of reports) {
    if (hideReplication) {
      if (op.op === 'getmore' && op.ns?.includes('local.oplog.')) continue;
      if (leadingRun && (!op.ns || op.ns === 'local.sources')) continue;
      if (op.ns) leadingRun = false;
    }
    yield op;
  }
}

export function sortOrder(operation: OperationRecord): number {
  return operation.duration ?? UNKNOWN_DURATION;
}

/** Longest-running first; ties keep their incoming order. */
export function sortOperations(operations: Iterable<OperationRecord>): OperationRecord[] {
  return [...operations].sort((a, b) => sortOrder(b) - sortOrder(a));
}

export function queryText(query: QueryPayload | undefined): string | undefined {
  if (query === undefined) return undefined;
  if (typeof query === 'string') return query;

  const message = query.$msg;
  if (typeof message === 'string') return message;

  return BSON.EJSON.stringify(query, { relaxed: true });
}

export const OPERATION_HEADERS = ['Server', 'Opid', 'State', 'Sec', 'Namespace', 'Query'];

/** Column holding the running time in seconds */
export const DURATION_COLUMN = 3;

export function operationCells(operation: OperationRecord): Cell[] {
  return [
    operation.server.name,
    operation.opid,
    operation.state,
    operation.duration ?? null,
    operation.namespace,
    queryText(operation.query),
  ];
}

export function createOperationBlock(): Block<OperationRecord> {
  return new Block<OperationRecord>('operation', OPERATION_HEADERS, operationCells);
}
