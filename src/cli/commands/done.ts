import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { createCliContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function parseWorkerId(value: string): number {
  const id = Number(value.replace(/^worker/, ''));
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidArgumentError('Expected a worker number such as 2 or worker2.');
  }
  return id;
}

/**
 * Run by a worker when its unit of work is finished.
 */
export async function doneCommand(workerId: number): Promise<void> {
  try {
    const { orchestrator } = await createCliContext();
    const channel = orchestrator.completionChannel;
    await channel.markComplete(workerId);
    console.log(chalk.green(`✓ worker${workerId} marked done`) + chalk.gray(` (${channel.markerPath(workerId)})`));
  } catch (err) {
    logger.error('Could not write completion marker', err);
    process.exitCode = 1;
  }
}
