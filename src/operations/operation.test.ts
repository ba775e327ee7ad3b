/**
 * Running Operation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  operationCells,
  operationKey,
  parseQuery,
  queryPayload,
  queryText,
  readOperation,
  sortOperations,
  sortOrder,
  UNKNOWN_DURATION,
  visibleOperations,
} from './operation.js';
import { makeServer } from '../testing/fakes.js';
import type { OperationReport } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const db01 = makeServer('db01');
const db02 = makeServer('db02');

function op(opid: number, fields: Partial<OperationReport> = {}): OperationReport {
  return { opid, op: 'query', ...fields };
}

const replicationTraffic: OperationReport[] = [
  op(1),
  op(2, { ns: 'local.sources' }),
  op(3, { op: 'getmore', ns: 'local.oplog.rs' }),
  op(4, { ns: 'app.users' }),
  op(5, { op: 'none' }),
  op(6, { op: 'getmore', ns: 'local.oplog.$main' }),
];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('readOperation', () => {
  it('tags operations with a query payload as queries', () => {
    const record = readOperation(db01, op(42, { ns: 'app.users', secs_running: 7, query: { age: 3 } }));
    expect(record.kind).toBe('query');
    expect(record.namespace).toBe('app.users');
    expect(record.duration).toBe(7);
  });

  it('tags operations without a payload as bare operations', () => {
    const record = readOperation(db01, op(43, { op: 'insert', ns: '', query: {} }));
    expect(record.kind).toBe('operation');
    expect(record.namespace).toBeUndefined();
  });

  it('renders one row per operation', () => {
    const record = readOperation(db01, op(42, { ns: 'app.users', secs_running: 7, query: { a: 1 } }));
    expect(operationCells(record)).toEqual(['db01', 42, 'query', 7, 'app.users', '{"a":1}']);
  });

  it('leaves the duration cell blank when unknown', () => {
    const record = readOperation(db01, op(44));
    expect(operationCells(record)[3]).toBeNull();
  });
});

describe('parseQuery', () => {
  it('parses JSON-looking strings', () => {
    expect(parseQuery('{"a": 1}')).toEqual({ a: 1 });
  });

  it('keeps truncated or invalid payloads as text', () => {
    expect(parseQuery('{"a": ')).toBe('{"a": ');
    expect(parseQuery('{bad}')).toBe('{bad}');
  });

  it('treats empty payloads as none', () => {
    expect(parseQuery('')).toBeUndefined();
    expect(parseQuery({})).toBeUndefined();
    expect(parseQuery(null)).toBeUndefined();
  });
});

describe('queryPayload', () => {
  it('rebuilds a wrapped query from a find command', () => {
    const payload = queryPayload(op(1, { command: { find: 'users', filter: { age: 3 }, sort: { name: 1 } } }));
    expect(payload).toEqual({ $query: { age: 3 }, $orderby: { name: 1 } });
  });

  it('uses the bare filter when the command has no sort', () => {
    expect(queryPayload(op(1, { command: { find: 'users', filter: { age: 3 } } }))).toEqual({ age: 3 });
  });

  it('prefers the reported query over the command', () => {
    expect(queryPayload(op(1, { query: { a: 1 }, command: { filter: { b: 2 } } }))).toEqual({ a: 1 });
  });
});

describe('queryText', () => {
  it('shows server notes instead of the payload', () => {
    expect(queryText({ $msg: 'query not recording (too large)' })).toBe('query not recording (too large)');
  });

  it('serializes documents as relaxed extended JSON', () => {
    expect(queryText({ a: 1, b: 'x' })).toBe('{"a":1,"b":"x"}');
  });
});

describe('visibleOperations', () => {
  it('hides oplog tailing and the leading slave traffic', () => {
    const visible = [...visibleOperations(replicationTraffic, true)].map(o => o.opid);
    expect(visible).toEqual([4, 5]);
  });

  it('shows everything when replication operations are wanted', () => {
    const visible = [...visibleOperations(replicationTraffic, false)].map(o => o.opid);
    expect(visible).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('sortOperations', () => {
  it('puts the longest running first and unknown durations last', () => {
    const records = [
      readOperation(db01, op(1)),
      readOperation(db01, op(2, { secs_running: 0 })),
      readOperation(db01, op(3, { secs_running: 5 })),
      readOperation(db02, op(4, { secs_running: 5 })),
      readOperation(db02, op(5, { secs_running: 12 })),
    ];

    const sorted = sortOperations(records).map(r => operationKey(r.server.name, r.opid));
    expect(sorted).toEqual(['db02/5', 'db01/3', 'db02/4', 'db01/2', 'db01/1']);
  });

  it('uses the unknown duration sentinel as the sort key', () => {
    expect(sortOrder(readOperation(db01, op(1)))).toBe(UNKNOWN_DURATION);
    expect(UNKNOWN_DURATION).toBe(-1);
  });
});
