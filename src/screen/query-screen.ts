/**
 * Query Screen
 *
 * The refresh loop: poll every view, redraw, then wait for a key.
 *
 *   e  explain an operation shown on screen
 *   k  kill an operation shown on screen
 *   K  kill every shown operation running longer than a threshold
 *   q  quit
 *
 * After e/k the screen stays frozen on the rows the operator picked from
 * until a key other than e/k is pressed.
 */

import type { View } from '../types.js';
import type { ServerConfig } from '../config.js';
import type { Terminal } from '../console/console.js';
import type { RenderableBlock } from '../display/block.js';
import { ExecuteFailure, type ServerHandle, type ServerIdentity } from '../services/server.js';
import { createStatusBlock, type ServerStatus } from '../metrics/server-status.js';
import { createReplicationInfoBlock, type ReplicationInfo } from '../replica/replication-info.js';
import {
  createReplicaSetBlock,
  mergeReplicaSets,
  replicaSetMembers,
  type ReplicaSetMember,
} from '../replica/replica-set.js';
import {
  createOperationBlock,
  DURATION_COLUMN,
  sortOperations,
  type OperationRecord,
} from '../operations/operation.js';
import { explainOperation, explainTarget, UnsupportedQueryError } from '../operations/explain.js';
import { log } from '../logger.js';

export const DEFAULT_REFRESH_INTERVAL_MS = 1_000;

export type ChosenServers = Record<View, ServerHandle[]>;

export interface QueryScreenOptions {
  refreshIntervalMs?: number;
}

/**
 * Open one handle per configured server and list it under every view it
 * takes part in. Handles are shared, so rate state survives across views.
 */
export function chooseServers(
  servers: readonly ServerConfig[],
  open: (identity: ServerIdentity) => ServerHandle,
): ChosenServers {
  const chosen: ChosenServers = {
    status: [],
    replicationInfo: [],
    replicaSet: [],
    operations: [],
    replicationOperations: [],
  };
  for (const server of servers) {
    const handle = open(server.identity);
    for (const view of server.views) chosen[view].push(handle);
  }
  return chosen;
}

/** Every distinct handle across the views. */
export function allServers(chosen: ChosenServers): ServerHandle[] {
  return [...new Set(Object.values(chosen).flat())];
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

export class QueryScreen {
  private readonly refreshIntervalMs: number;
  private readonly statusBlock = createStatusBlock();
  private readonly replicationInfoBlock = createReplicationInfoBlock();
  private readonly replicaSetBlock = createReplicaSetBlock();
  private readonly operationBlock = createOperationBlock();

  constructor(
    private readonly terminal: Terminal,
    private readonly chosen: ChosenServers,
    options: QueryScreenOptions = {},
  ) {
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
  }

  /** Servers currently taking part in a view. */
  servers(view: View): readonly ServerHandle[] {
    return this.chosen[view];
  }

  // ===========================================================================
  // Polling
  // ===========================================================================

  /**
   * Run fetch against every server of a view at once. Servers that fail are
   * taken out of the view; the rest keep their configured order.
   */
  private async poll<T>(view: View, fetch: (server: ServerHandle) => Promise<T>): Promise<Array<[ServerHandle, T]>> {
    const servers = this.chosen[view];
    const results = await Promise.allSettled(servers.map(fetch));

    const fetched: Array<[ServerHandle, T]> = [];
    const failed: ServerHandle[] = [];
    results.forEach((result, i) => {
      const server = servers[i];
      if (result.status === 'fulfilled') {
        fetched.push([server, result.value]);
      } else if (result.reason instanceof ExecuteFailure) {
        log(`[QueryScreen] Dropping ${server.name} from ${view}: ${result.reason.message}`);
        failed.push(server);
      } else {
        throw result.reason;
      }
    });

    this.exclude(view, failed);
    return fetched;
  }

  private exclude(view: View, servers: readonly ServerHandle[]): void {
    if (servers.length === 0) return;
    this.chosen[view] = this.chosen[view].filter(server => !servers.includes(server));
  }

  private async statuses(): Promise<ServerStatus[]> {
    const polled = await this.poll('status', server => server.status());
    return polled.map(([, status]) => status);
  }

  private async replicationInfos(): Promise<ReplicationInfo[]> {
    const polled = await this.poll('replicationInfo', server => server.replicationSource());
    const infos: ReplicationInfo[] = [];
    const withoutSource: ServerHandle[] = [];
    for (const [server, info] of polled) {
      if (info) infos.push(info);
      else withoutSource.push(server);
    }
    this.exclude('replicationInfo', withoutSource);
    return infos;
  }

  private async replicaSetMembers(): Promise<ReplicaSetMember[]> {
    const polled = await this.poll('replicaSet', server => server.replicaSet());
    return replicaSetMembers(mergeReplicaSets(polled.map(([, set]) => set)));
  }

  private async operations(): Promise<OperationRecord[]> {
    const visible = this.chosen.replicationOperations;
    const polled = await this.poll('operations', server =>
      collect(server.currentOperations(!visible.includes(server))),
    );
    return sortOperations(polled.flatMap(([, operations]) => operations));
  }

  /** Poll every view and return the blocks to draw, in screen order. */
  async refresh(): Promise<RenderableBlock[]> {
    const blocks: RenderableBlock[] = [];
    const views: Array<[View, RenderableBlock, () => Promise<void>]> = [
      ['status', this.statusBlock, async () => this.statusBlock.reset(await this.statuses())],
      ['replicationInfo', this.replicationInfoBlock, async () => this.replicationInfoBlock.reset(await this.replicationInfos())],
      ['replicaSet', this.replicaSetBlock, async () => this.replicaSetBlock.reset(await this.replicaSetMembers())],
      ['operations', this.operationBlock, async () => this.operationBlock.reset(await this.operations())],
    ];

    for (const [view, block, update] of views) {
      if (this.chosen[view].length === 0) continue;
      await update();
      blocks.push(block);
    }
    return blocks;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /** The displayed operation the operator names, if exactly one matches. */
  private async askForOperation(): Promise<OperationRecord | undefined> {
    const answers = await this.terminal.askForInput('Server', 'OpId');
    if (answers.length !== 2) return undefined;

    const [server, opid] = answers;
    const matches = this.operationBlock.findLines(cells => String(cells[0]) === server && String(cells[1]) === opid);
    if (matches.length !== 1) {
      this.terminal.print('Invalid operation.');
      return undefined;
    }
    return matches[0];
  }

  private async explainAction(): Promise<void> {
    const operation = await this.askForOperation();
    if (!operation) return;

    const target = explainTarget(operation);
    if (!target) {
      this.terminal.print('Only queries with namespace can be explained.');
      return;
    }

    try {
      this.terminal.print(...(await explainOperation(operation, target)));
    } catch (err) {
      if (err instanceof UnsupportedQueryError || err instanceof ExecuteFailure) {
        this.terminal.print(err.message);
        return;
      }
      throw err;
    }
  }

  private async kill(operation: OperationRecord): Promise<void> {
    try {
      await operation.server.killOperation(operation.opid);
    } catch (err) {
      if (err instanceof ExecuteFailure) {
        this.terminal.print(err.message);
        return;
      }
      throw err;
    }
  }

  private async killAction(): Promise<void> {
    const operation = await this.askForOperation();
    if (operation) await this.kill(operation);
  }

  private async batchKillAction(): Promise<void> {
    const answers = await this.terminal.askForInput('Sec');
    if (answers.length === 0) return;

    const threshold = Number(answers[0]);
    if (!Number.isFinite(threshold)) {
      this.terminal.print('Invalid duration.');
      return;
    }

    const killed = new Map<ServerHandle, Set<number | string>>();
    const operations = this.operationBlock.findLines(cells => {
      const duration = cells[DURATION_COLUMN];
      return typeof duration === 'number' && duration > threshold;
    });
    for (const operation of operations) {
      const opids = killed.get(operation.server) ?? new Set<number | string>();
      if (opids.has(operation.opid)) continue;
      killed.set(operation.server, opids.add(operation.opid));
      await this.kill(operation);
    }
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  /** Refresh, draw and handle keys until the operator quits. */
  async run(): Promise<void> {
    let button: string | undefined;
    while (button !== 'q') {
      this.terminal.refresh(await this.refresh());
      button = await this.terminal.checkButton(this.refreshIntervalMs);

      while (button === 'e' || button === 'k') {
        if (button === 'e') await this.explainAction();
        else await this.killAction();
        button = await this.terminal.checkButton();
      }

      if (button === 'K') await this.batchKillAction();
    }
  }
}
