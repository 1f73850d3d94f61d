/**
 * pane-crew
 *
 * Library entry point. For CLI usage, run the `crew` command.
 */

// Core orchestrator
export { Orchestrator, createBarrier, type OrchestratorOptions, type RunResult } from './orchestrator.js';

// Stages
export { CleanupStage, type CleanupReport } from './orchestrator/cleanup.js';
export { LayoutBuilder, type LayoutBuilderOptions } from './orchestrator/layout-builder.js';
export { RoleBootstrapper, type BootstrapReport, type BootstrapPhase } from './orchestrator/bootstrapper.js';
export {
  FixedDelayBarrier,
  ReadinessProbeBarrier,
  type SettleBarrier,
  type ReadinessProbeOptions,
} from './orchestrator/barrier.js';

// Completion markers
export { CompletionChannel, markerFileName, type WaitOptions } from './signals/completion-channel.js';

// Multiplexer
export type {
  MultiplexerGateway,
  PaneHandle,
  SessionHandle,
  SplitOrientation,
  DestroyOutcome,
  CreateSessionOptions,
} from './tmux/gateway.js';
export { TmuxGateway, type TmuxGatewayOptions, type CommandRunner, type CommandResult } from './tmux/tmux-gateway.js';
export { TmuxCommands } from './tmux/commands.js';

// Topology and roles
export {
  DEFAULT_TOPOLOGY,
  LAYOUT_PLANS,
  layoutPlanFor,
  validateTopology,
  topologyProblems,
  topologyRoles,
  type TopologyDescriptor,
  type SessionDescriptor,
  type Topology,
  type BuiltSession,
  type BuiltPane,
  type PanePosition,
  type LayoutPlan,
  type SplitStep,
} from './topology.js';
export {
  parseRole,
  workerRole,
  workerIndex,
  isWorkerRole,
  compareRoles,
  roleColor,
  buildPromptCommand,
  type Role,
  type WorkerRole,
  type PromptColor,
} from './roles.js';
export { createInstructionRenderer, DEFAULT_INSTRUCTION_TEMPLATE, type InstructionRenderer } from './instructions.js';

// Errors
export { SubstrateUnavailableError, TopologyError, DeliveryError, TmuxCommandError } from './errors.js';

// Config
export { CrewConfigSchema, type CrewConfig, type BarrierConfig } from './config/schema.js';
export { ConfigLoader, CONFIG_FILE_NAME } from './config/loader.js';

// Utilities
export { logger, configureLogDirectory } from './utils/logger.js';
