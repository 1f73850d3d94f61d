import { execa } from 'execa';
import { TmuxCommandError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { quoteShellArg } from '../utils/shell.js';
import type {
  CreateSessionOptions,
  DestroyOutcome,
  MultiplexerGateway,
  PaneHandle,
  SessionHandle,
  SplitOrientation,
} from './gateway.js';

export interface CommandResult {
  failed: boolean;
  exitCode?: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export interface TmuxGatewayOptions {
  /** tmux binary (default: `tmux`) */
  binary?: string;
  /** Shell started in every new pane (default: `bash`) */
  shell?: string;
  /** Process runner; replaced in tests */
  run?: CommandRunner;
}

const execaRunner: CommandRunner = async (file, args) => {
  const result = await execa(file, args, { reject: false });
  return {
    failed: result.failed,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

// stderr fragments tmux prints when the target (or the whole server) is gone
const ABSENT_MARKERS = ["can't find session", 'session not found', 'no server running', 'error connecting to'];

function isAbsentError(err: unknown): boolean {
  if (!(err instanceof TmuxCommandError) || !err.stderr) {
    return false;
  }
  const stderr = err.stderr;
  return ABSENT_MARKERS.some((marker) => stderr.includes(marker));
}

/**
 * MultiplexerGateway backed by the tmux CLI.
 */
export class TmuxGateway implements MultiplexerGateway {
  private readonly binary: string;
  private readonly shell: string;
  private readonly runCommand: CommandRunner;

  constructor(options: TmuxGatewayOptions = {}) {
    this.binary = options.binary ?? 'tmux';
    this.shell = options.shell ?? 'bash';
    this.runCommand = options.run ?? execaRunner;
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.runCommand(this.binary, ['-V']);
    if (result.failed) {
      logger.debug('tmux is not available', { binary: this.binary, stderr: result.stderr });
      return false;
    }
    logger.debug(`Using ${result.stdout.trim()}`);
    return true;
  }

  async createSession(name: string, options: CreateSessionOptions = {}): Promise<SessionHandle> {
    const args = ['new-session', '-d', '-s', name];
    if (options.cwd) {
      args.push('-c', options.cwd);
    }
    args.push('-P', '-F', '#{pane_id}', this.shell);

    const paneId = await this.tmux(args);
    if (!paneId) {
      throw new TmuxCommandError(`tmux did not report a pane for session ${name}`, args.join(' '));
    }

    // Show pane titles in the border; cosmetic, so failure is only logged
    try {
      await this.tmux(['set-option', '-t', name, 'pane-border-status', 'top']);
    } catch (err) {
      logger.debug('Could not enable pane border titles', { session: name, err });
    }

    return { name, rootPane: { session: name, id: paneId } };
  }

  async destroySession(name: string): Promise<DestroyOutcome> {
    try {
      // `=` asks tmux for an exact name match instead of a prefix match
      await this.tmux(['kill-session', '-t', `=${name}`]);
      return 'destroyed';
    } catch (err) {
      if (isAbsentError(err)) {
        return 'absent';
      }
      throw err;
    }
  }

  async splitPane(pane: PaneHandle, orientation: SplitOrientation): Promise<PaneHandle> {
    const flag = orientation === 'horizontal' ? '-h' : '-v';
    const args = ['split-window', flag, '-t', pane.id, '-P', '-F', '#{pane_id}', this.shell];
    const paneId = await this.tmux(args);
    if (!paneId) {
      throw new TmuxCommandError(`tmux did not report the pane split from ${pane.id}`, args.join(' '));
    }
    return { session: pane.session, id: paneId };
  }

  async setPaneTitle(pane: PaneHandle, title: string): Promise<void> {
    await this.tmux(['select-pane', '-t', pane.id, '-T', title]);
  }

  async setWorkingDirectory(pane: PaneHandle, path: string): Promise<void> {
    await this.sendText(pane, `cd ${quoteShellArg(path)}`, true);
  }

  async sendText(pane: PaneHandle, text: string, commit: boolean): Promise<void> {
    if (text.length > 0) {
      // -l sends the characters literally instead of as key names
      await this.tmux(['send-keys', '-t', pane.id, '-l', text]);
    }
    if (commit) {
      await this.tmux(['send-keys', '-t', pane.id, 'Enter']);
    }
  }

  async capturePane(pane: PaneHandle, lines: number = 50): Promise<string> {
    return this.tmux(['capture-pane', '-t', pane.id, '-p', '-J', '-S', `-${lines}`]);
  }

  async listSessions(): Promise<string[]> {
    try {
      const output = await this.tmux(['list-sessions', '-F', '#{session_name}']);
      return output.split('\n').filter(Boolean);
    } catch (err) {
      if (isAbsentError(err)) {
        return [];
      }
      throw err;
    }
  }

  private async tmux(args: string[]): Promise<string> {
    const result = await this.runCommand(this.binary, args);
    if (result.failed) {
      const command = [this.binary, ...args].join(' ');
      throw new TmuxCommandError(
        `tmux ${args[0]} failed${result.stderr ? `: ${result.stderr.trim()}` : ''}`,
        command,
        result.exitCode,
        result.stderr
      );
    }
    return result.stdout.trim();
  }
}
