/**
 * MongoDB Admin Client
 *
 * DatabaseAdmin over the official driver. Each configured server gets its
 * own direct connection so replica set members are polled one by one
 * rather than through the set's primary.
 *
 * Server documents are validated with zod on the way in; a document that
 * does not match is reported as an operation failure for that call.
 */

import {
  Long,
  MongoClient,
  MongoNetworkError,
  MongoServerError,
  MongoServerSelectionError,
  Timestamp,
  type Document,
  type MongoClientOptions,
} from 'mongodb';
import { z, ZodError } from 'zod';
import type {
  ExplainResult,
  OperationReport,
  QueryParts,
  ReplicaSetStatusReport,
  ReplicationSourceReport,
  ServerStatusReport,
} from '../types.js';
import {
  OperationFailureError,
  TransientConnectionError,
  type DatabaseAdmin,
} from './database-admin.js';
import type { ServerIdentity } from './server.js';

const CONNECT_TIMEOUT_MS = 1_000;
/** Bounds one attempt against an unreachable server; ServerHandle retries */
export const SERVER_SELECTION_TIMEOUT_MS = 100;

// =============================================================================
// Response schemas
// =============================================================================

/** Int64 counters arrive as Long when they do not fit a double exactly */
const numeric = z.union([z.number(), z.instanceof(Long).transform(value => value.toNumber())]);

const documentSchema = z.record(z.string(), z.unknown());

const ServerStatusSchema = z.object({
  opcounters: z
    .record(z.string(), z.unknown())
    .transform(counters => {
      const numbers: Record<string, number> = {};
      for (const [name, value] of Object.entries(counters)) {
        const parsed = numeric.safeParse(value);
        if (parsed.success) numbers[name] = parsed.data;
      }
      return numbers;
    })
    .optional(),
  globalLock: z
    .object({
      activeClients: z.object({ total: numeric }).optional(),
      currentQueue: z.object({ total: numeric }).optional(),
    })
    .optional(),
  backgroundFlushing: z.object({ flushes: numeric }).optional(),
  connections: z.object({ current: numeric, available: numeric }).optional(),
  mem: z.object({ resident: numeric.optional(), mapped: numeric.optional() }).optional(),
  network: z.object({ bytesIn: numeric, bytesOut: numeric }).optional(),
});

const OperationSchema = z.object({
  opid: z.union([numeric, z.string()]),
  op: z.string().default('none'),
  ns: z.string().optional(),
  secs_running: numeric.optional(),
  query: z.union([documentSchema, z.string()]).nullable().optional(),
  command: documentSchema.optional(),
});

const CurrentOpSchema = z.object({ inprog: z.array(OperationSchema) });

/** optime is a bare Timestamp on old servers, { ts, t } since protocol version 1 */
const OptimeSchema = z.union([
  z.instanceof(Timestamp),
  z.object({ ts: z.instanceof(Timestamp) }).transform(optime => optime.ts),
]);

const MemberSchema = z.object({
  name: z.string(),
  stateStr: z.string(),
  uptime: numeric.optional(),
  optimeDate: z.date().optional(),
  optime: OptimeSchema.optional(),
  pingMs: numeric.optional(),
});

const ReplicaSetStatusSchema = z.object({
  set: z.string(),
  myState: numeric,
  date: z.date(),
  members: z.array(MemberSchema),
});

const SourceSchema = z.object({
  host: z.string(),
  syncedTo: z.instanceof(Timestamp),
});

/** Explain output before queryPlanner (cursor, nscanned, ...) */
const LegacyExplainSchema = z.object({
  cursor: z.string(),
  indexBounds: documentSchema.default({}),
  indexOnly: z.boolean().optional(),
  isMultiKey: z.boolean().optional(),
  millis: numeric.optional(),
  n: numeric.optional(),
  nChunkSkips: numeric.optional(),
  nYields: numeric.optional(),
  nscanned: numeric.optional(),
  nscannedObjects: numeric.optional(),
  scanAndOrder: z.boolean().optional(),
});

interface PlanStage {
  stage?: string;
  indexName?: string;
  isMultiKey?: boolean;
  inputStage?: PlanStage;
  inputStages?: PlanStage[];
  /** Slot-based engine wraps the classic plan */
  queryPlan?: PlanStage;
}

const PlanStageSchema: z.ZodType<PlanStage> = z.lazy(() =>
  z.object({
    stage: z.string().optional(),
    indexName: z.string().optional(),
    isMultiKey: z.boolean().optional(),
    inputStage: PlanStageSchema.optional(),
    inputStages: z.array(PlanStageSchema).optional(),
    queryPlan: PlanStageSchema.optional(),
  }),
);

const PlannerExplainSchema = z.object({
  queryPlanner: z.object({ winningPlan: PlanStageSchema }),
  executionStats: z
    .object({
      executionTimeMillis: numeric.optional(),
      nReturned: numeric.optional(),
      totalKeysExamined: numeric.optional(),
      totalDocsExamined: numeric.optional(),
    })
    .optional(),
});

// =============================================================================
// Parsing
// =============================================================================

export function parseServerStatus(doc: Document): ServerStatusReport {
  return ServerStatusSchema.parse(doc);
}

export function parseCurrentOp(doc: Document): OperationReport[] {
  return CurrentOpSchema.parse(doc).inprog;
}

export function parseReplicaSetStatus(doc: Document): ReplicaSetStatusReport {
  const status = ReplicaSetStatusSchema.parse(doc);
  return {
    set: status.set,
    myState: status.myState,
    date: status.date,
    members: status.members.map(m => ({
      name: m.name,
      stateStr: m.stateStr,
      uptime: m.uptime,
      optimeDate: m.optimeDate,
      optimeIncrement: m.optime ? m.optime.i : 0,
      pingMs: m.pingMs,
    })),
  };
}

export function parseReplicationSource(doc: Document | null): ReplicationSourceReport | null {
  if (!doc) return null;
  const source = SourceSchema.parse(doc);
  return { host: source.host, syncedTo: new Date(source.syncedTo.t * 1000) };
}

function planStages(root: PlanStage): PlanStage[] {
  const stage = root.queryPlan ?? root;
  const children = [
    ...(stage.inputStage ? [stage.inputStage] : []),
    ...(stage.inputStages ?? []),
  ];
  return [stage, ...children.flatMap(planStages)];
}

/** Normalize legacy and queryPlanner explain documents into one shape. */
export function normalizeExplain(doc: Document): ExplainResult {
  const legacy = LegacyExplainSchema.safeParse(doc);
  if (legacy.success) {
    const e = legacy.data;
    return {
      cursor: e.cursor,
      indexes: Object.keys(e.indexBounds),
      indexOnly: e.indexOnly,
      multiKey: e.isMultiKey,
      millis: e.millis,
      documents: e.n,
      chunkSkips: e.nChunkSkips,
      yields: e.nYields,
      scanned: e.nscanned,
      scannedObjects: e.nscannedObjects,
      scanAndOrder: e.scanAndOrder,
    };
  }

  const planner = PlannerExplainSchema.parse(doc);
  const stages = planStages(planner.queryPlanner.winningPlan);
  const names = stages.flatMap(s => (s.stage ? [s.stage] : []));
  const indexes = stages.flatMap(s => (s.indexName ? [s.indexName] : []));
  const stats = planner.executionStats;

  return {
    cursor: names.join(' > '),
    indexes,
    indexOnly: indexes.length > 0 && !names.includes('FETCH'),
    multiKey: stages.some(s => s.isMultiKey === true),
    millis: stats?.executionTimeMillis,
    documents: stats?.nReturned,
    scanned: stats?.totalKeysExamined,
    scannedObjects: stats?.totalDocsExamined,
    scanAndOrder: names.includes('SORT'),
  };
}

// =============================================================================
// Error classification
// =============================================================================

/** Map a driver error onto the admin interface's failure kinds. */
export function classifyError(operation: string, err: unknown): unknown {
  if (err instanceof MongoNetworkError || err instanceof MongoServerSelectionError) {
    return new TransientConnectionError(`${operation}: ${err.message}`, err);
  }
  if (err instanceof MongoServerError) {
    return new OperationFailureError(`${operation}: ${err.message}`, err);
  }
  if (err instanceof ZodError) {
    return new OperationFailureError(`${operation}: unexpected response (${err.issues[0]?.message ?? 'invalid'})`, err);
  }
  return err;
}

// =============================================================================
// Client
// =============================================================================

export function clientOptions(identity: ServerIdentity): MongoClientOptions {
  const auth = identity.username && identity.password
    ? { username: identity.username, password: identity.password }
    : undefined;

  return {
    auth,
    directConnection: true,
    readPreference: 'secondaryPreferred',
    connectTimeoutMS: CONNECT_TIMEOUT_MS,
    serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
  };
}

export class MongoAdmin implements DatabaseAdmin {
  private readonly client: MongoClient;

  constructor(identity: ServerIdentity) {
    this.client = new MongoClient(`mongodb://${identity.address}`, clientOptions(identity));
  }

  private async run<T>(operation: string, procedure: () => Promise<T>): Promise<T> {
    try {
      return await procedure();
    } catch (err) {
      throw classifyError(operation, err);
    }
  }

  async getStatus(): Promise<ServerStatusReport> {
    return this.run('serverStatus', async () =>
      parseServerStatus(await this.client.db('admin').command({ serverStatus: 1 })),
    );
  }

  async listOperations(): Promise<OperationReport[]> {
    return this.run('currentOp', async () =>
      parseCurrentOp(await this.client.db('admin').command({ currentOp: 1 })),
    );
  }

  async getReplicaSetStatus(): Promise<ReplicaSetStatusReport> {
    return this.run('replSetGetStatus', async () =>
      parseReplicaSetStatus(await this.client.db('admin').command({ replSetGetStatus: 1 })),
    );
  }

  async getReplicationSource(): Promise<ReplicationSourceReport | null> {
    return this.run('local.sources', async () =>
      parseReplicationSource(await this.client.db('local').collection('sources').findOne()),
    );
  }

  async explain(database: string, collection: string, parts: QueryParts): Promise<ExplainResult> {
    return this.run('explain', async () => {
      const cursor = this.client.db(database).collection(collection).find(parts.filter);
      if (parts.sort) cursor.sort(parts.sort);
      return normalizeExplain(await cursor.explain('executionStats'));
    });
  }

  async kill(opid: number | string): Promise<void> {
    await this.run('killOp', () => this.client.db('admin').command({ killOp: 1, op: opid }));
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
