/**
 * Settle barriers for the bootstrap's commit phase.
 *
 * Nothing tells us when an assistant process has finished starting, so every
 * barrier here is a heuristic: the commit can still race a slow start.
 */

import type { PaneHandle } from '../tmux/gateway.js';
import type { TmuxCommands } from '../tmux/commands.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/shell.js';

export interface SettleBarrier {
  /** Resolves once, for all panes together */
  wait(panes: PaneHandle[]): Promise<void>;
}

/**
 * Waits a fixed time regardless of pane state.
 */
export class FixedDelayBarrier implements SettleBarrier {
  constructor(
    private readonly settleMs: number,
    private readonly delay: (ms: number) => Promise<void> = sleep
  ) {}

  async wait(panes: PaneHandle[]): Promise<void> {
    logger.info(`Waiting ${this.settleMs}ms for ${panes.length} pane(s) to settle`);
    await this.delay(this.settleMs);
  }
}

export interface ReadinessProbeOptions {
  readyPattern: RegExp;
  timeoutMs: number;
  pollIntervalMs: number;
}

/**
 * Polls every pane's output for a ready pattern in parallel. Panes that never
 * match within the timeout are logged and released anyway.
 */
export class ReadinessProbeBarrier implements SettleBarrier {
  constructor(
    private readonly commands: TmuxCommands,
    private readonly options: ReadinessProbeOptions
  ) {}

  async wait(panes: PaneHandle[]): Promise<void> {
    const { readyPattern, timeoutMs, pollIntervalMs } = this.options;
    logger.info(`Probing ${panes.length} pane(s) for ${readyPattern} (timeout ${timeoutMs}ms)`);

    const results = await Promise.all(
      panes.map(async (pane) => ({
        pane,
        ready: await this.commands.waitForPattern(pane, readyPattern, timeoutMs, pollIntervalMs),
      }))
    );

    const notReady = results.filter((result) => !result.ready).map((result) => result.pane.id);
    if (notReady.length > 0) {
      logger.warn('Panes did not report ready before the probe timeout', { panes: notReady });
    }
  }
}
