/**
 * Replica Set Merging
 *
 * Every polled member reports the whole set as it sees it. Views of the
 * same set (matched by name) are folded into one, member by member (matched
 * by reported host), so each host shows up once per set.
 *
 * Merge rules, existing ← incoming:
 *   uptime     larger of the two
 *   lag        incoming, but only when reported by the primary
 *   increment  larger of the two
 *   ping       larger of the two
 *   server     existing back-reference wins
 */

import type { ServerHandle } from '../services/server.js';
import type { Cell, Displayable, ReplicaSetStatusReport } from '../types.js';
import { Block } from '../display/block.js';
import { formatDuration } from '../metrics/value.js';

/** replSetGetStatus myState value of a primary */
export const PRIMARY_STATE = 1;

export interface ReplicaSetMember extends Displayable {
  readonly display: 'replicaSetMember';
  setName: string;
  /** Host as reported by the set */
  name: string;
  /** Lower-cased state label */
  state: string;
  /** Seconds */
  uptime?: number;
  /** Seconds behind the reporting member's clock */
  lag?: number;
  increment: number;
  /** Milliseconds */
  ping?: number;
  /** Set when the member is itself a polled server */
  server?: ServerHandle;
}

export type MemberFields = Omit<ReplicaSetMember, 'display' | 'setName'>;

function larger(existing: number | undefined, incoming: number | undefined): number | undefined {
  if (incoming === undefined) return existing;
  if (existing === undefined) return incoming;
  return Math.max(existing, incoming);
}

export class ReplicaSet {
  readonly members: ReplicaSetMember[] = [];

  constructor(
    readonly name: string,
    readonly myState: number,
  ) {}

  isPrimary(): boolean {
    return this.myState === PRIMARY_STATE;
  }

  addMember(fields: MemberFields): ReplicaSetMember {
    const member: ReplicaSetMember = {
      ...fields,
      display: 'replicaSetMember',
      setName: this.name,
      state: fields.state.toLowerCase(),
    };
    this.members.push(member);
    return member;
  }

  findMember(name: string): ReplicaSetMember | undefined {
    return this.members.find(m => m.name === name);
  }

  /** Fold another view of this set into this one. */
  revise(other: ReplicaSet): void {
    const authoritativeLag = other.isPrimary();

    for (const incoming of other.members) {
      const member = this.findMember(incoming.name);
      if (!member) {
        this.members.push({ ...incoming, setName: this.name });
        continue;
      }

      member.uptime = larger(member.uptime, incoming.uptime);
      if (authoritativeLag) {
        member.lag = incoming.lag;
      }
      member.increment = Math.max(member.increment, incoming.increment);
      member.ping = larger(member.ping, incoming.ping);
      member.server ??= incoming.server;
    }
  }
}

/**
 * Build a server's view of its replica set. Arbiters are left out; the
 * member whose host matches the server's own address points back to it.
 */
export function readReplicaSet(server: ServerHandle, report: ReplicaSetStatusReport): ReplicaSet {
  const replicaSet = new ReplicaSet(report.set, report.myState);

  for (const m of report.members) {
    if (m.stateStr === 'ARBITER') continue;

    replicaSet.addMember({
      name: m.name,
      state: m.stateStr,
      uptime: m.uptime,
      lag: m.optimeDate ? (report.date.getTime() - m.optimeDate.getTime()) / 1000 : undefined,
      increment: m.optimeIncrement,
      ping: m.pingMs,
      server: m.name === server.address ? server : undefined,
    });
  }

  return replicaSet;
}

/** Merge views set by set, keeping the order sets and hosts were first seen. */
export function mergeReplicaSets(views: Iterable<ReplicaSet>): ReplicaSet[] {
  const merged: ReplicaSet[] = [];

  for (const view of views) {
    const existing = merged.find(s => s.name === view.name);
    if (existing) {
      existing.revise(view);
    } else {
      merged.push(view);
    }
  }

  return merged;
}

export function replicaSetMembers(sets: Iterable<ReplicaSet>): ReplicaSetMember[] {
  return [...sets].flatMap(s => s.members);
}

export const REPLICA_SET_HEADERS = ['Server', 'Set', 'State', 'Uptime', 'Lag', 'Inc', 'Ping'];

export function memberCells(member: ReplicaSetMember): Cell[] {
  return [
    member.server ? member.server.name : member.name,
    member.setName,
    member.state,
    formatDuration(member.uptime),
    formatDuration(member.lag),
    member.increment,
    member.ping,
  ];
}

export function createReplicaSetBlock(): Block<ReplicaSetMember> {
  return new Block<ReplicaSetMember>('replicaSetMember', REPLICA_SET_HEADERS, memberCells);
}
