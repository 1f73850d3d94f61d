import chalk from 'chalk';
import { createCliContext } from '../context.js';
import { printCleanup } from '../summary.js';
import { logger } from '../../utils/logger.js';

export async function downCommand(): Promise<void> {
  try {
    const { orchestrator } = await createCliContext();
    const report = await orchestrator.teardown();
    console.log(chalk.cyan('\n🧹 Teardown\n'));
    printCleanup(report);
  } catch (err) {
    logger.error('Teardown failed', err);
    process.exitCode = 1;
  }
}
