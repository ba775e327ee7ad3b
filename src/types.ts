/** Dashboard views a configured server can take part in */
export type View =
  | 'status'
  | 'replicationInfo'
  | 'replicaSet'
  | 'operations'
  | 'replicationOperations';

export const ALL_VIEWS: View[] = [
  'status',
  'replicationInfo',
  'replicaSet',
  'operations',
  'replicationOperations',
];

/** Record family a table block is bound to */
export type DisplayClass = 'status' | 'replicationInfo' | 'replicaSetMember' | 'operation';

export interface Displayable {
  readonly display: DisplayClass;
}

/** Raw value held in a table cell before it is rendered */
export type Cell = string | number | null | undefined;

/** Plain BSON-ish document */
export type QueryDocument = Record<string, unknown>;

/** Query payload of a running operation: a document, or an opaque string */
export type QueryPayload = QueryDocument | string;

// =============================================================================
// Reports returned by the database admin interface
// =============================================================================

/** Subset of serverStatus read by the dashboard */
export interface ServerStatusReport {
  opcounters?: Record<string, number>;
  globalLock?: {
    activeClients?: { total: number };
    currentQueue?: { total: number };
  };
  backgroundFlushing?: { flushes: number };
  connections?: { current: number; available: number };
  /** Megabytes */
  mem?: { resident?: number; mapped?: number };
  network?: { bytesIn: number; bytesOut: number };
}

/** One entry of currentOp's inprog list */
export interface OperationReport {
  opid: number | string;
  op: string;
  ns?: string;
  secs_running?: number;
  query?: QueryPayload | null;
  command?: QueryDocument;
}

export interface MemberReport {
  name: string;
  stateStr: string;
  /** Seconds */
  uptime?: number;
  optimeDate?: Date;
  optimeIncrement: number;
  pingMs?: number;
}

/** Subset of replSetGetStatus */
export interface ReplicaSetStatusReport {
  set: string;
  myState: number;
  date: Date;
  members: MemberReport[];
}

/** Master/slave replication source from local.sources */
export interface ReplicationSourceReport {
  host: string;
  syncedTo: Date;
}

export type SortDirection = 1 | -1;

/** Arguments of the find() an explain runs */
export interface QueryParts {
  filter: QueryDocument;
  sort?: Array<[string, SortDirection]>;
  explain?: boolean;
}

/** Explain output, normalized over legacy and queryPlanner formats */
export interface ExplainResult {
  cursor: string;
  indexes: string[];
  indexOnly?: boolean;
  multiKey?: boolean;
  millis?: number;
  documents?: number;
  chunkSkips?: number;
  yields?: number;
  scanned?: number;
  scannedObjects?: number;
  scanAndOrder?: boolean;
}
