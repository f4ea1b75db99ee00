#!/usr/bin/env node
/**
 * Fleet Supervisor
 *
 * Launches a fleet of provider workloads and keeps watch over them: each node
 * gets its own health monitor, dead nodes are stopped and (with
 * --keep-running) replaced, and on SIGINT/SIGTERM every node is stopped
 * unless --no-rm is given.
 *
 * Usage:
 *   npx tsx src/index.ts --nodes 3 --keep-running
 *   npx tsx src/index.ts --nodes 2 --type large --poll 60 --no-rm
 *
 * Data Flow:
 *   Supervisor → Launcher → Provider API
 *   Monitors (one per node) → Death channel → Replacement controller → Launcher
 */

import { loadConfig, USAGE, wantsHelp, type Config } from './config.js';
import { ComputeApiClient } from './services/provider-api.js';
import { EventPublisher } from './services/events.js';
import { webhookNotifier } from './services/notify.js';
import { FleetSupervisor } from './fleet/supervisor.js';
import { StartupError } from './errors.js';
import { describeError, log } from './logger.js';

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

async function run(config: Config): Promise<number> {
  const provider = new ComputeApiClient(config);
  const eventPublisher = new EventPublisher(config);
  const supervisor = new FleetSupervisor(config, provider, eventPublisher, webhookNotifier(config));

  log('Fleet supervisor starting');
  log(`Provider: ${config.apiUrl}`);
  log(`Target: ${config.nodes} node(s), type policy ${config.typePolicy}, keep running: ${config.keepRunning}`);
  log(`Interval: ${config.pollIntervalSeconds}s (boot delay ${config.bootDelaySeconds}s, check timeout ${config.healthCheckTimeoutSeconds}s)`);

  const signal = waitForSignal();

  // A signal during the initial fill wins the race; shutdown() then ends the fill
  let interrupted: NodeJS.Signals | null;
  try {
    interrupted = await Promise.race([supervisor.start().then(() => null), signal]);
  } catch (err) {
    if (err instanceof StartupError) {
      log(`[Supervisor] ${err.message}`);
      await supervisor.shutdown();
      await eventPublisher.close();
      return 1;
    }
    throw err;
  }

  await eventPublisher.publishLifecycle(true, { nodes: config.nodes, typePolicy: config.typePolicy });

  const outcome = interrupted
    ? `Received ${interrupted} during startup`
    : await Promise.race([
      signal.then(name => `Received ${name}`),
      supervisor.whenEmpty().then(() => 'All nodes are gone'),
    ]);
  log(`[Supervisor] ${outcome}, shutting down`);

  const summary = await supervisor.shutdown();
  await eventPublisher.publishLifecycle(false, { ...summary });
  await eventPublisher.close();

  log('Bye!');
  return 0;
}

async function main(): Promise<void> {
  if (wantsHelp(process.argv.slice(2))) {
    console.log(USAGE);
    return;
  }

  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof StartupError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      process.exit(1);
    }
    throw err;
  }

  process.exit(await run(config));
}

main().catch(err => {
  console.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
