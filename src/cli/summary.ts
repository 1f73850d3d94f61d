import chalk from 'chalk';
import type { RunResult } from '../orchestrator.js';
import type { CleanupReport } from '../orchestrator/cleanup.js';
import { roleColor, type Role } from '../roles.js';

function paintRole(role: Role): string {
  return chalk[roleColor(role)].bold(role);
}

export function printCleanup(report: CleanupReport): void {
  for (const name of report.destroyed) {
    console.log(chalk.gray(`  - removed session ${name}`));
  }
  for (const name of report.absent) {
    console.log(chalk.gray(`  - session ${name} was not running`));
  }
  for (const name of report.failed) {
    console.log(chalk.yellow(`  - could not remove session ${name}`));
  }
  console.log(chalk.gray(`  - ${report.markersRemoved} completion marker(s) cleared`));
}

/**
 * Operator-facing summary printed after `crew up`.
 */
export function printRunSummary(result: RunResult): void {
  const { topology, bootstrap } = result;

  console.log(chalk.cyan('\n📊 Setup result\n'));

  for (const session of topology.sessions) {
    console.log(chalk.white(`  ${session.name} (${session.panes.length} pane(s))`));
    for (const pane of session.panes) {
      const failure = bootstrap.failed.get(pane.role);
      const state = failure ? chalk.red(`✗ ${failure.message}`) : chalk.green('✓ instructed');
      console.log(`    Pane ${pane.index}: ${paintRole(pane.role)} ${chalk.gray(`[${pane.position}]`)} ${state}`);
    }
    console.log();
  }

  console.log(chalk.white('  Attach to a session:'));
  for (const session of topology.sessions) {
    console.log(chalk.gray(`    tmux attach-session -t ${session.name}`));
  }
  console.log(chalk.gray('    Ctrl+b, d detaches again'));
  console.log();
}
