#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { upCommand } from './commands/up.js';
import { downCommand } from './commands/down.js';
import { doneCommand, parseWorkerId } from './commands/done.js';
import { statusCommand, parseMilliseconds } from './commands/status.js';

const program = new Command();

program
  .name('crew')
  .description(chalk.cyan('pane-crew') + ' - Run a team of assistant panes in tmux')
  .version('1.0.0');

program
  .command('up', { isDefault: true })
  .description('Tear down the previous run, build the sessions and brief every role')
  .action(upCommand);

program
  .command('down')
  .description('Kill the sessions and clear completion markers')
  .action(downCommand);

program
  .command('done')
  .description('Mark a worker as finished (run from the worker pane)')
  .argument('<worker>', 'worker number, e.g. 2 or worker2', parseWorkerId)
  .action(doneCommand);

program
  .command('status')
  .description('List completion markers')
  .option('-w, --wait', 'poll until every worker is done')
  .option('-t, --timeout <ms>', 'give up waiting after this many milliseconds', parseMilliseconds)
  .option('-i, --interval <ms>', 'poll interval in milliseconds', parseMilliseconds)
  .action(statusCommand);

await program.parseAsync();
