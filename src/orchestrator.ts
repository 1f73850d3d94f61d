/**
 * Orchestrator
 *
 * Runs the whole setup once: check the multiplexer, tear down the previous
 * topology, build the layout, bootstrap every role. Sequential and
 * single-threaded; the assistant processes it starts run on their own.
 */

import { resolve } from 'path';
import type { CrewConfig, BarrierConfig } from './config/schema.js';
import type { MultiplexerGateway } from './tmux/gateway.js';
import { TmuxCommands } from './tmux/commands.js';
import { CleanupStage, type CleanupReport } from './orchestrator/cleanup.js';
import { LayoutBuilder } from './orchestrator/layout-builder.js';
import { RoleBootstrapper, type BootstrapReport } from './orchestrator/bootstrapper.js';
import { FixedDelayBarrier, ReadinessProbeBarrier, type SettleBarrier } from './orchestrator/barrier.js';
import { createInstructionRenderer } from './instructions.js';
import { CompletionChannel } from './signals/completion-channel.js';
import { SubstrateUnavailableError } from './errors.js';
import type { Topology, TopologyDescriptor } from './topology.js';
import { logger } from './utils/logger.js';

export interface OrchestratorOptions {
  config: CrewConfig;
  gateway: MultiplexerGateway;
  /** Directory shared by all panes and the base of `markerDir` (default: process.cwd()) */
  workingDirectory?: string;
  /** Overrides the barrier described by `config.barrier` */
  barrier?: SettleBarrier;
}

export interface RunResult {
  topology: Topology;
  cleanup: CleanupReport;
  bootstrap: BootstrapReport;
}

export function createBarrier(config: BarrierConfig, commands: TmuxCommands): SettleBarrier {
  if (config.mode === 'probe') {
    return new ReadinessProbeBarrier(commands, {
      readyPattern: new RegExp(config.readyPattern, 'm'),
      timeoutMs: config.timeoutMs,
      pollIntervalMs: config.pollIntervalMs,
    });
  }
  return new FixedDelayBarrier(config.settleMs);
}

export class Orchestrator {
  private readonly config: CrewConfig;
  private readonly gateway: MultiplexerGateway;
  private readonly workingDirectory: string;
  private readonly cleanupStage: CleanupStage;
  private readonly layoutBuilder: LayoutBuilder;
  private readonly bootstrapper: RoleBootstrapper;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.gateway = options.gateway;
    this.workingDirectory = resolve(options.workingDirectory ?? process.cwd());

    const barrier = options.barrier ?? createBarrier(this.config.barrier, new TmuxCommands(this.gateway));
    this.cleanupStage = new CleanupStage(this.gateway);
    this.layoutBuilder = new LayoutBuilder(this.gateway, { workingDirectory: this.workingDirectory });
    this.bootstrapper = new RoleBootstrapper(this.gateway, barrier);
  }

  get descriptor(): TopologyDescriptor {
    return { sessions: this.config.sessions };
  }

  get markerDir(): string {
    return resolve(this.workingDirectory, this.config.markerDir);
  }

  get completionChannel(): CompletionChannel {
    return new CompletionChannel(this.markerDir);
  }

  async ensureSubstrate(): Promise<void> {
    if (!(await this.gateway.isAvailable())) {
      throw new SubstrateUnavailableError('tmux is not installed or cannot be started');
    }
  }

  /**
   * Remove this topology's sessions and markers without building anything.
   */
  async teardown(): Promise<CleanupReport> {
    await this.ensureSubstrate();
    return this.cleanupStage.reset(
      this.config.sessions.map((session) => session.name),
      this.markerDir
    );
  }

  async run(): Promise<RunResult> {
    const cleanup = await this.teardown();

    logger.info('Building session layout...');
    const topology = await this.layoutBuilder.build(this.descriptor);

    const instructionFor = createInstructionRenderer(this.config.instructionTemplate, this.config.instructionFile);
    const bootstrap = await this.bootstrapper.bootstrap(topology.panes, this.config.assistantCommand, instructionFor);

    logger.info('Setup complete', {
      sessions: topology.sessions.map((session) => session.name),
      committed: bootstrap.committed.length,
      failed: bootstrap.failed.size,
    });

    return { topology, cleanup, bootstrap };
  }
}
