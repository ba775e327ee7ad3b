/**
 * Master/slave replication source rows (local.sources on a slave).
 */

import type { ServerHandle } from '../services/server.js';
import type { Cell, Displayable, ReplicationSourceReport } from '../types.js';
import { Block } from '../display/block.js';
import { formatTimestamp } from '../logger.js';

export interface ReplicationInfo extends Displayable {
  readonly display: 'replicationInfo';
  server: ServerHandle;
  source: string;
  syncedTo: Date;
}

export function readReplicationInfo(server: ServerHandle, report: ReplicationSourceReport): ReplicationInfo {
  return { display: 'replicationInfo', server, source: report.host, syncedTo: report.syncedTo };
}

export const REPLICATION_INFO_HEADERS = ['Server', 'Source', 'SyncedTo'];

export function replicationInfoCells(info: ReplicationInfo): Cell[] {
  return [info.server.name, info.source, formatTimestamp(info.syncedTo)];
}

export function createReplicationInfoBlock(): Block<ReplicationInfo> {
  return new Block<ReplicationInfo>('replicationInfo', REPLICATION_INFO_HEADERS, replicationInfoCells);
}
