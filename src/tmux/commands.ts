import type { MultiplexerGateway, PaneHandle } from './gateway.js';
import { buildPromptCommand, type Role } from '../roles.js';
import { sleep } from '../utils/shell.js';

/**
 * Higher-level pane commands built on the gateway's primitives.
 */
export class TmuxCommands {
  constructor(private gateway: MultiplexerGateway) {}

  /**
   * Give the pane's shell a prompt showing the role in its colour.
   */
  async applyRolePrompt(pane: PaneHandle, role: Role): Promise<void> {
    await this.gateway.sendText(pane, buildPromptCommand(role), true);
  }

  async changeDirectory(pane: PaneHandle, path: string): Promise<void> {
    await this.gateway.setWorkingDirectory(pane, path);
  }

  async clearScreen(pane: PaneHandle): Promise<void> {
    await this.gateway.sendText(pane, 'clear', true);
  }

  /**
   * Run a command line in the pane (text + Enter).
   */
  async run(pane: PaneHandle, command: string): Promise<void> {
    await this.gateway.sendText(pane, command, true);
  }

  /**
   * Type text onto the pane's input line without submitting it.
   */
  async stageText(pane: PaneHandle, text: string): Promise<void> {
    await this.gateway.sendText(pane, text, false);
  }

  /**
   * Press Enter.
   */
  async submit(pane: PaneHandle): Promise<void> {
    await this.gateway.sendText(pane, '', true);
  }

  /**
   * Wait for a specific pattern in the pane's output.
   * Resolves false on timeout; capture failures count as "not yet".
   */
  async waitForPattern(
    pane: PaneHandle,
    pattern: RegExp,
    timeoutMs: number = 30000,
    pollIntervalMs: number = 1000
  ): Promise<boolean> {
    const startTime = Date.now();

    while (Date.now() - startTime < timeoutMs) {
      let output = '';
      try {
        output = await this.gateway.capturePane(pane, 50);
      } catch {
        output = '';
      }

      if (pattern.test(output)) {
        return true;
      }

      await sleep(pollIntervalMs);
    }

    return false;
  }
}
