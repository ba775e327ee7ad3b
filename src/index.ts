/**
 * fleettop
 *
 * Live terminal dashboard for a fleet of MongoDB servers. Polls every
 * configured server each refresh interval for status counters, replication
 * state and running operations, and lets the operator explain or kill what
 * is on screen.
 *
 * Usage:
 *   npx tsx src/index.ts                          # localhost:27017
 *   npx tsx src/index.ts db01:27017 db02:27017    # several servers
 *   npx tsx src/index.ts --conf ./fleettop.toml   # servers from a file
 *
 * Log lines go to stderr, or to LOG_FILE when set so the screen stays clean.
 */

import { loadConfig, parseArgs, USAGE } from './config.js';
import { Interrupted, withConsole } from './console/console.js';
import { allServers, chooseServers, QueryScreen, type ChosenServers } from './screen/query-screen.js';
import { MongoAdmin } from './services/mongo-admin.js';
import { ServerHandle } from './services/server.js';
import { log, setLogFile } from './logger.js';
import { NAME, VERSION } from './version.js';

async function closeAll(chosen: ChosenServers): Promise<void> {
  const results = await Promise.allSettled(allServers(chosen).map(server => server.close()));
  for (const result of results) {
    if (result.status === 'rejected') {
      log(`[Main] Error closing connection: ${result.reason}`);
    }
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.version) {
    console.log(`${NAME} ${VERSION}`);
    return;
  }
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(args);
  setLogFile(config.logFile);

  log(`${NAME} ${VERSION} starting`);
  log(`Servers: ${config.servers.map(s => `${s.identity.name}(${s.identity.address})`).join(', ')}`);
  log(`Interval: ${config.refreshIntervalMs}ms`);

  const chosen = chooseServers(config.servers, identity =>
    new ServerHandle(identity, new MongoAdmin(identity), {
      attempts: config.executeAttempts,
      retryDelayMs: config.executeRetryDelayMs,
    }),
  );

  // Ctrl-C while a prompt has the terminal in line mode arrives as a signal
  const stopped = new Promise<void>(resolve => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

  try {
    await withConsole(terminal => {
      const screen = new QueryScreen(terminal, chosen, { refreshIntervalMs: config.refreshIntervalMs });
      return Promise.race([screen.run(), stopped]);
    });
  } catch (err) {
    if (!(err instanceof Interrupted)) throw err;
  } finally {
    log('[Main] Shutting down...');
    await closeAll(chosen);
  }
}

main()
  .then(() => process.exit(0))
  .catch(err => {
    console.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
