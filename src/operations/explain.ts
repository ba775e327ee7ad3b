/**
 * Explaining Running Queries
 *
 * Rebuilds the find() a running query corresponds to, asks the server to
 * explain it, and formats the plan for the operator.
 */

import { BSON } from 'mongodb';
import type { ExplainResult, QueryDocument, QueryParts, SortDirection } from '../types.js';
import { isDocument, type OperationRecord } from './operation.js';

/** A query wrapper key the explain logic does not know how to translate */
export class UnsupportedQueryError extends Error {
  constructor(readonly part: string) {
    super(`Unknown query part: ${part}`);
    this.name = 'UnsupportedQueryError';
  }
}

export interface ExplainTarget {
  database: string;
  collection: string;
  query: QueryDocument;
}

/**
 * Database, collection and query document of an operation, or undefined
 * when the operation cannot be explained (no namespace, opaque payload).
 */
export function explainTarget(operation: OperationRecord): ExplainTarget | undefined {
  const { namespace, query } = operation;
  if (!namespace || !isDocument(query) || Object.keys(query).length === 0) return undefined;
  if (typeof query.$msg === 'string') return undefined;

  const dot = namespace.indexOf('.');
  if (dot <= 0 || dot === namespace.length - 1) return undefined;

  return {
    database: namespace.slice(0, dot),
    collection: namespace.slice(dot + 1),
    query,
  };
}

function sortSpec(part: string, value: unknown): Array<[string, SortDirection]> {
  if (!isDocument(value)) throw new UnsupportedQueryError(part);
  return Object.entries(value).map(([field, direction]): [string, SortDirection] => [
    field,
    Number(direction) < 0 ? -1 : 1,
  ]);
}

/**
 * Translate a query payload into find() arguments. A payload without a
 * query/$query wrapper is the filter itself.
 */
export function toQueryParts(query: QueryDocument): QueryParts {
  const keys = Object.keys(query);
  if (!keys.includes('query') && !keys.includes('$query')) {
    return { filter: query };
  }

  const parts: QueryParts = { filter: {} };
  for (const [key, value] of Object.entries(query)) {
    switch (key) {
      case 'query':
      case '$query':
        if (!isDocument(value)) throw new UnsupportedQueryError(key);
        parts.filter = value;
        break;
      case 'explain':
      case '$explain':
        parts.explain = true;
        break;
      case 'orderby':
      case '$orderby':
        parts.sort = sortSpec(key, value);
        break;
      default:
        throw new UnsupportedQueryError(key);
    }
  }
  return parts;
}

export function formatQueryParts(parts: QueryParts): string[] {
  const lines = [`Filter: ${BSON.EJSON.stringify(parts.filter, { relaxed: true })}`];
  if (parts.sort) {
    lines.push(`Sort: ${parts.sort.map(([field, direction]) => `${field}: ${direction}`).join(', ')}`);
  }
  if (parts.explain) lines.push('Explain: true');
  return lines;
}

export function formatExplain(result: ExplainResult): string[] {
  const lines = [
    `Cursor: ${result.cursor}`,
    `Indexes: ${result.indexes.join(' ')}`,
  ];

  const optional: Array<[string, boolean | number | undefined]> = [
    ['IndexOnly', result.indexOnly],
    ['MultiKey', result.multiKey],
    ['Milliseconds', result.millis],
    ['Documents', result.documents],
    ['ChunkSkips', result.chunkSkips],
    ['Yields', result.yields],
    ['Scanned', result.scanned],
    ['ScannedObjects', result.scannedObjects],
    ['ScanAndOrder', result.scanAndOrder],
  ];
  for (const [label, value] of optional) {
    if (value !== undefined) lines.push(`${label}: ${value}`);
  }

  return lines;
}

/** Explain an operation on its own server and return the report lines. */
export async function explainOperation(operation: OperationRecord, target: ExplainTarget): Promise<string[]> {
  const parts = toQueryParts(target.query);
  const result = await operation.server.explainQuery(target.database, target.collection, parts);
  return [...formatQueryParts(parts), ...formatExplain(result)];
}
