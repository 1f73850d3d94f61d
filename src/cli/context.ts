import { ConfigLoader } from '../config/loader.js';
import type { CrewConfig } from '../config/schema.js';
import { Orchestrator } from '../orchestrator.js';
import type { MultiplexerGateway } from '../tmux/gateway.js';
import { TmuxGateway } from '../tmux/tmux-gateway.js';
import { configureLogDirectory } from '../utils/logger.js';
import { resolve } from 'path';

export interface CliContext {
  config: CrewConfig;
  gateway: MultiplexerGateway;
  orchestrator: Orchestrator;
}

/**
 * Load crew.json from the current directory and wire an orchestrator to tmux.
 */
export async function createCliContext(
  cwd: string = process.cwd(),
  gateway: MultiplexerGateway = new TmuxGateway()
): Promise<CliContext> {
  const config = await new ConfigLoader(cwd).load();
  if (config.logDirectory) {
    configureLogDirectory(resolve(cwd, config.logDirectory));
  }
  const orchestrator = new Orchestrator({ config, gateway, workingDirectory: cwd });
  return { config, gateway, orchestrator };
}
