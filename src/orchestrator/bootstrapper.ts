import type { MultiplexerGateway, PaneHandle } from '../tmux/gateway.js';
import { TmuxCommands } from '../tmux/commands.js';
import { compareRoles, type Role } from '../roles.js';
import type { InstructionRenderer } from '../instructions.js';
import { DeliveryError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { SettleBarrier } from './barrier.js';

export type BootstrapPhase = 'launch' | 'instruction' | 'commit';

export interface BootstrapReport {
  /** Roles in the order they were addressed */
  order: Role[];
  /** Roles whose instruction was submitted */
  committed: Role[];
  failed: Map<Role, DeliveryError>;
}

/**
 * Role Bootstrapper
 *
 * launch (command + Enter everywhere) → stage instructions (no Enter) →
 * one barrier for all panes → Enter everywhere. A pane that fails delivery
 * drops out of the later phases; the others are unaffected.
 */
export class RoleBootstrapper {
  private readonly commands: TmuxCommands;

  constructor(
    gateway: MultiplexerGateway,
    private barrier: SettleBarrier
  ) {
    this.commands = new TmuxCommands(gateway);
  }

  async bootstrap(
    paneMap: ReadonlyMap<Role, PaneHandle>,
    assistantCommand: string,
    instructionFor: InstructionRenderer
  ): Promise<BootstrapReport> {
    const order = [...paneMap.keys()].sort(compareRoles);
    const failed = new Map<Role, DeliveryError>();

    const deliver = async (
      phase: BootstrapPhase,
      role: Role,
      action: (pane: PaneHandle) => Promise<void>
    ): Promise<void> => {
      const pane = paneMap.get(role);
      if (!pane || failed.has(role)) {
        return;
      }
      try {
        await action(pane);
      } catch (err) {
        const error = new DeliveryError(`${phase} failed for ${role}: ${describeError(err)}`, role, { cause: err });
        failed.set(role, error);
        logger.error(`Skipping ${role} for the rest of the bootstrap`, { pane: pane.id, error: error.message });
      }
    };

    logger.info(`Launching assistant in ${order.length} pane(s): ${assistantCommand}`);
    for (const role of order) {
      await deliver('launch', role, (pane) => this.commands.run(pane, assistantCommand));
    }

    logger.info('Staging role instructions...');
    for (const role of order) {
      await deliver('instruction', role, (pane) => this.commands.stageText(pane, instructionFor(role)));
    }

    const waiting = order.filter((role) => !failed.has(role));
    await this.barrier.wait(
      waiting.map((role) => paneMap.get(role)).filter((pane): pane is PaneHandle => pane !== undefined)
    );

    const committed: Role[] = [];
    for (const role of order) {
      await deliver('commit', role, (pane) => this.commands.submit(pane));
      if (!failed.has(role)) {
        committed.push(role);
      }
    }

    if (failed.size > 0) {
      logger.warn(`Instructions committed to ${committed.length}/${order.length} pane(s)`, {
        failed: [...failed.keys()],
      });
    } else {
      logger.info(`Instructions committed to all ${committed.length} pane(s)`);
    }

    return { order, committed, failed };
  }
}
