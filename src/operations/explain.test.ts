/**
 * Explain Tests
 */

import { describe, it, expect } from 'vitest';
import {
  explainOperation,
  explainTarget,
  formatExplain,
  formatQueryParts,
  toQueryParts,
  UnsupportedQueryError,
} from './explain.js';
import { readOperation } from './operation.js';
import { FakeAdmin, makeServer } from '../testing/fakes.js';
import type { OperationReport } from '../types.js';

function op(fields: Partial<OperationReport>): OperationReport {
  return { opid: 1, op: 'query', ...fields };
}

describe('explainTarget', () => {
  const db01 = makeServer('db01');

  it('splits the namespace at the first dot', () => {
    const target = explainTarget(readOperation(db01, op({ ns: 'app.users.archive', query: { a: 1 } })));
    expect(target).toEqual({ database: 'app', collection: 'users.archive', query: { a: 1 } });
  });

  it('rejects operations that cannot be explained', () => {
    expect(explainTarget(readOperation(db01, op({ query: { a: 1 } })))).toBeUndefined();
    expect(explainTarget(readOperation(db01, op({ ns: 'app.users', query: 'opaque' })))).toBeUndefined();
    expect(explainTarget(readOperation(db01, op({ ns: 'app.users', query: { $msg: 'too large' } })))).toBeUndefined();
    expect(explainTarget(readOperation(db01, op({ ns: 'app', query: { a: 1 } })))).toBeUndefined();
  });
});

describe('toQueryParts', () => {
  it('treats an unwrapped payload as the filter', () => {
    expect(toQueryParts({ a: 1 })).toEqual({ filter: { a: 1 } });
  });

  it('unwraps query, sort and explain flags', () => {
    expect(toQueryParts({ $query: { a: 1 }, $orderby: { b: -1, c: 1 }, $explain: true })).toEqual({
      filter: { a: 1 },
      sort: [['b', -1], ['c', 1]],
      explain: true,
    });
    expect(toQueryParts({ query: { a: 1 }, orderby: { b: 1 } })).toEqual({
      filter: { a: 1 },
      sort: [['b', 1]],
    });
  });

  it('fails on wrapper keys it does not know', () => {
    expect(() => toQueryParts({ query: { a: 1 }, $hint: { x: 1 } })).toThrow(UnsupportedQueryError);
    expect(() => toQueryParts({ query: { a: 1 }, $hint: { x: 1 } })).toThrow('Unknown query part: $hint');
  });
});

describe('formatting', () => {
  it('prints the filter and sort', () => {
    expect(formatQueryParts({ filter: { a: 1 }, sort: [['b', -1]] })).toEqual(['Filter: {"a":1}', 'Sort: b: -1']);
  });

  it('notes a query that asked for its own explain', () => {
    const parts = toQueryParts({ $query: { a: 1 }, $explain: true });
    expect(formatQueryParts(parts)).toEqual(['Filter: {"a":1}', 'Explain: true']);
  });

  it('prints only the plan fields the server reported', () => {
    expect(formatExplain({ cursor: 'BtreeCursor a_1', indexes: ['a_1'], millis: 3, scanAndOrder: false })).toEqual([
      'Cursor: BtreeCursor a_1',
      'Indexes: a_1',
      'Milliseconds: 3',
      'ScanAndOrder: false',
    ]);
  });
});

describe('explainOperation', () => {
  it('explains the rebuilt find on the operation server', async () => {
    const admin = new FakeAdmin();
    const server = makeServer('db01', admin);
    const record = readOperation(server, op({ ns: 'app.users', query: { $query: { a: 1 }, $orderby: { b: 1 } } }));
    const target = explainTarget(record);
    if (!target) throw new Error('expected an explainable operation');

    const lines = await explainOperation(record, target);

    expect(admin.explained).toEqual([
      { database: 'app', collection: 'users', parts: { filter: { a: 1 }, sort: [['b', 1]] } },
    ]);
    expect(lines).toEqual(['Filter: {"a":1}', 'Sort: b: 1', 'Cursor: BasicCursor', 'Indexes: ']);
  });
});
