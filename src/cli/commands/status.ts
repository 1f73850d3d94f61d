import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { createCliContext } from '../context.js';
import { topologyRoles } from '../../topology.js';
import { workerIndex } from '../../roles.js';
import { logger } from '../../utils/logger.js';

export interface StatusOptions {
  wait?: boolean;
  timeout?: number;
  interval?: number;
}

export function parseMilliseconds(value: string): number {
  const ms = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(ms)) {
    throw new InvalidArgumentError('Expected a whole number of milliseconds, such as 5000.');
  }
  return ms;
}

/**
 * Show which sessions are up and which workers have written a completion marker.
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  try {
    const { gateway, orchestrator } = await createCliContext();
    const channel = orchestrator.completionChannel;
    const workerIds = topologyRoles(orchestrator.descriptor)
      .map(workerIndex)
      .filter((id): id is number => id !== null);

    if (options.wait) {
      console.log(chalk.gray(`Waiting for ${workerIds.length} worker(s) to finish...`));
      const allDone = await channel.waitForAll(workerIds, {
        timeoutMs: options.timeout,
        pollIntervalMs: options.interval,
      });
      if (!allDone) {
        process.exitCode = 2;
      }
    }

    const running = (await gateway.isAvailable()) ? await gateway.listSessions() : [];
    console.log(chalk.cyan('\n📺 Sessions\n'));
    for (const session of orchestrator.descriptor.sessions) {
      const state = running.includes(session.name) ? chalk.green('running') : chalk.gray('stopped');
      console.log(`  ${session.name}: ${state}`);
    }

    const done = await channel.completedWorkers();
    console.log(chalk.cyan(`\n📋 Completion markers (${channel.markerDir})\n`));
    for (const id of workerIds) {
      const state = done.includes(id) ? chalk.green('done') : chalk.yellow('pending');
      console.log(`  worker${id}: ${state}`);
    }
    console.log();
  } catch (err) {
    logger.error('Could not read completion markers', err);
    process.exitCode = 1;
  }
}
