/**
 * Server Status Rows
 *
 * Reads one serverStatus report into a status row. Op counters, flushes and
 * network bytes are cumulative on the server, so they go through the
 * server's RateTracker; everything else is a gauge shown as-is.
 */

import type { ServerHandle } from '../services/server.js';
import type { Cell, Displayable, ServerStatusReport } from '../types.js';
import { Block } from '../display/block.js';
import type { RateTracker } from './rate-tracker.js';
import { formatOptionalValue, formatPair, formatValue } from './value.js';

export interface ServerStatus extends Displayable {
  readonly display: 'status';
  server: ServerHandle;
  takenAt: Date;
  qps: number;
  activeClients?: number;
  currentQueue?: number;
  flushes?: number;
  currentConnections?: number;
  totalConnections?: number;
  /** Bytes */
  residentMemory?: number;
  /** Bytes */
  mappedMemory?: number;
  bytesIn?: number;
  bytesOut?: number;
}

export const STATUS_HEADERS = ['Server', 'QPS', 'Client', 'Queue', 'Flush', 'Connection', 'Memory', 'Network I/O'];

const MEGABYTE = 10 ** 6;

function megabytes(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value * MEGABYTE;
}

export function readServerStatus(
  server: ServerHandle,
  report: ServerStatusReport,
  rates: RateTracker,
  now: Date = new Date(),
): ServerStatus {
  rates.begin(now.getTime());

  const totalOps = Object.values(report.opcounters ?? {}).reduce((sum, n) => sum + n, 0);
  const { connections, network, backgroundFlushing } = report;

  return {
    display: 'status',
    server,
    takenAt: now,
    qps: rates.perSecond('qps', totalOps),
    activeClients: report.globalLock?.activeClients?.total,
    currentQueue: report.globalLock?.currentQueue?.total,
    flushes: backgroundFlushing ? rates.perSecond('flushes', backgroundFlushing.flushes) : undefined,
    currentConnections: connections?.current,
    totalConnections: connections ? connections.current + connections.available : undefined,
    residentMemory: megabytes(report.mem?.resident),
    mappedMemory: megabytes(report.mem?.mapped),
    bytesIn: network ? rates.perSecond('bytesIn', network.bytesIn) : undefined,
    bytesOut: network ? rates.perSecond('bytesOut', network.bytesOut) : undefined,
  };
}

export function statusCells(status: ServerStatus): Cell[] {
  return [
    status.server.name,
    formatValue(status.qps),
    formatOptionalValue(status.activeClients),
    formatOptionalValue(status.currentQueue),
    formatOptionalValue(status.flushes),
    formatPair(status.currentConnections, status.totalConnections),
    formatPair(status.residentMemory, status.mappedMemory),
    formatPair(status.bytesIn, status.bytesOut),
  ];
}

export function createStatusBlock(): Block<ServerStatus> {
  return new Block<ServerStatus>('status', STATUS_HEADERS, statusCells);
}
