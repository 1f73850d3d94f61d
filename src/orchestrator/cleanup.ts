import type { MultiplexerGateway } from '../tmux/gateway.js';
import { CompletionChannel } from '../signals/completion-channel.js';
import { describeError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface CleanupReport {
  destroyed: string[];
  absent: string[];
  /** Sessions whose teardown errored; logged, never thrown */
  failed: string[];
  markersRemoved: number;
}

/**
 * Cleanup Stage
 *
 * Brings tmux and the marker directory back to "nothing from a previous run".
 * Never throws: a failure is logged and treated as already being in the desired state.
 */
export class CleanupStage {
  constructor(private gateway: MultiplexerGateway) {}

  async reset(sessionNames: Iterable<string>, markerDir: string): Promise<CleanupReport> {
    const report: CleanupReport = { destroyed: [], absent: [], failed: [], markersRemoved: 0 };

    logger.info('Cleaning up previous sessions...');

    for (const name of new Set(sessionNames)) {
      try {
        const outcome = await this.gateway.destroySession(name);
        if (outcome === 'destroyed') {
          report.destroyed.push(name);
          logger.info(`Session ${name} destroyed`);
        } else {
          report.absent.push(name);
          logger.info(`Session ${name} did not exist`);
        }
      } catch (err) {
        report.failed.push(name);
        logger.warn(`Could not destroy session ${name}: ${describeError(err)}`);
      }
    }

    const channel = new CompletionChannel(markerDir);
    try {
      await channel.ensureDirectory();
      report.markersRemoved = await channel.clear();
      logger.info(
        report.markersRemoved > 0
          ? `Cleared ${report.markersRemoved} completion marker(s)`
          : 'No completion markers to clear',
        { markerDir: channel.markerDir }
      );
    } catch (err) {
      logger.warn(`Could not clear completion markers: ${describeError(err)}`, { markerDir: channel.markerDir });
    }

    logger.info('Cleanup complete');
    return report;
  }
}
