import chalk from 'chalk';
import { createCliContext } from '../context.js';
import { printCleanup, printRunSummary } from '../summary.js';
import { logger } from '../../utils/logger.js';

/**
 * Default command: reset, build, bootstrap.
 * Exits 0 once the steady state is reached, even if some panes failed.
 */
export async function upCommand(): Promise<void> {
  console.log(chalk.cyan('\n🤖 Multi-agent session setup\n'));

  try {
    const { orchestrator } = await createCliContext();
    const result = await orchestrator.run();

    console.log(chalk.white('  Cleanup:'));
    printCleanup(result.cleanup);
    printRunSummary(result);

    console.log(chalk.green('🎉 Setup complete'));
  } catch (err) {
    logger.error('Setup failed', err);
    process.exitCode = 1;
  }
}
