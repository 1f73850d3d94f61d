/**
 * Multiplexer Gateway
 *
 * The only surface the orchestrator uses to talk to a terminal multiplexer.
 * TmuxGateway is the production implementation; tests substitute an in-memory one.
 */

export type SplitOrientation = 'horizontal' | 'vertical';

export interface PaneHandle {
  /** Owning session name */
  session: string;
  /** Multiplexer pane id (e.g. `%3` for tmux) */
  id: string;
}

export interface SessionHandle {
  name: string;
  /** The pane the session starts with */
  rootPane: PaneHandle;
}

export type DestroyOutcome = 'destroyed' | 'absent';

export interface CreateSessionOptions {
  /** Start directory of the first shell */
  cwd?: string;
}

export interface MultiplexerGateway {
  /** Whether the multiplexer binary can be run at all */
  isAvailable(): Promise<boolean>;

  /** Create a detached session. Rejects if the name is already in use. */
  createSession(name: string, options?: CreateSessionOptions): Promise<SessionHandle>;

  /** Kill a session. A session that does not exist resolves to `'absent'`. */
  destroySession(name: string): Promise<DestroyOutcome>;

  /**
   * Split `pane`. `horizontal` puts the new pane to the right,
   * `vertical` puts it below.
   */
  splitPane(pane: PaneHandle, orientation: SplitOrientation): Promise<PaneHandle>;

  setPaneTitle(pane: PaneHandle, title: string): Promise<void>;

  setWorkingDirectory(pane: PaneHandle, path: string): Promise<void>;

  /**
   * Type `text` into the pane. With `commit` the line is submitted (Enter);
   * without it the text stays staged on the input line.
   */
  sendText(pane: PaneHandle, text: string, commit: boolean): Promise<void>;

  /** Last `lines` lines of the pane's visible output */
  capturePane(pane: PaneHandle, lines?: number): Promise<string>;

  listSessions(): Promise<string[]>;
}
