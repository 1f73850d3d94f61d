import type { MultiplexerGateway, PaneHandle } from '../tmux/gateway.js';
import { TmuxCommands } from '../tmux/commands.js';
import {
  layoutPlanFor,
  validateTopology,
  type BuiltPane,
  type BuiltSession,
  type SessionDescriptor,
  type Topology,
  type TopologyDescriptor,
} from '../topology.js';
import type { Role } from '../roles.js';
import { TopologyError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface LayoutBuilderOptions {
  /** Directory every pane changes into (default: process.cwd()) */
  workingDirectory?: string;
}

/**
 * Layout Builder
 *
 * Creates each session fresh, splits it into its fixed layout, then labels
 * every pane with its role. Assumes the Cleanup Stage already ran.
 */
export class LayoutBuilder {
  private readonly commands: TmuxCommands;
  private readonly workingDirectory: string;

  constructor(
    private gateway: MultiplexerGateway,
    options: LayoutBuilderOptions = {}
  ) {
    this.commands = new TmuxCommands(gateway);
    this.workingDirectory = options.workingDirectory ?? process.cwd();
  }

  async build(descriptor: TopologyDescriptor): Promise<Topology> {
    validateTopology(descriptor);

    const sessions: BuiltSession[] = [];
    const panes = new Map<Role, PaneHandle>();

    for (const sessionDescriptor of descriptor.sessions) {
      const session = await this.createLayout(sessionDescriptor);
      sessions.push(session);
      for (const pane of session.panes) {
        panes.set(pane.role, pane.handle);
      }
    }

    for (const session of sessions) {
      for (const pane of session.panes) {
        await this.decorate(pane);
      }
      logger.info(`Session ${session.name} ready (${session.panes.length} pane(s))`);
    }

    return { sessions, panes };
  }

  private async createLayout(descriptor: SessionDescriptor): Promise<BuiltSession> {
    const plan = layoutPlanFor(descriptor.panes.length);
    logger.info(`Creating session ${descriptor.name} (${descriptor.panes.length} pane(s))...`);

    let root: PaneHandle;
    try {
      const handle = await this.gateway.createSession(descriptor.name, { cwd: this.workingDirectory });
      root = handle.rootPane;
    } catch (err) {
      throw new TopologyError(`Failed to create session ${descriptor.name}: ${describeError(err)}`, { cause: err });
    }

    const slots: PaneHandle[] = [root];
    for (const step of plan.steps) {
      const source = slots[step.from];
      if (!source) {
        throw new TopologyError(`Layout step splits slot ${step.from} before it exists`);
      }
      try {
        slots[step.slot] = await this.gateway.splitPane(source, step.orientation);
      } catch (err) {
        throw new TopologyError(
          `Failed to split ${descriptor.name} pane ${step.from} ${step.orientation}ly: ${describeError(err)}`,
          { cause: err }
        );
      }
    }

    const panes = descriptor.panes.map((role, index): BuiltPane => {
      const handle = slots[index];
      const position = plan.positions[index];
      if (!handle || !position) {
        throw new TopologyError(`Layout for ${descriptor.name} produced no pane ${index}`);
      }
      return { index, role, position, handle };
    });

    return { name: descriptor.name, panes };
  }

  /**
   * title → prompt → cwd → clear. A failure stops this pane's decoration only.
   */
  private async decorate(pane: BuiltPane): Promise<void> {
    try {
      await this.gateway.setPaneTitle(pane.handle, pane.role);
      await this.commands.applyRolePrompt(pane.handle, pane.role);
      await this.commands.changeDirectory(pane.handle, this.workingDirectory);
      await this.commands.clearScreen(pane.handle);
      logger.debug(`Pane ${pane.handle.session}.${pane.index} labelled ${pane.role}`, { position: pane.position });
    } catch (err) {
      logger.warn(`Could not finish setting up pane for ${pane.role}: ${describeError(err)}`, {
        pane: pane.handle.id,
      });
    }
  }
}
