import type {
  CreateSessionOptions,
  DestroyOutcome,
  MultiplexerGateway,
  PaneHandle,
  SessionHandle,
  SplitOrientation,
} from '../../src/tmux/gateway.js';

export interface FakePane {
  id: string;
  session: string;
  title?: string;
  cwd?: string;
  splitFrom?: string;
  orientation?: SplitOrientation;
  /** Text typed but not yet submitted */
  input: string;
  /** Lines submitted with Enter, in order */
  submitted: string[];
}

export interface GatewayCall {
  method: keyof MultiplexerGateway;
  target: string;
  detail?: string;
}

/**
 * In-memory stand-in for tmux. Records every call and lets tests inject failures.
 */
export class FakeMultiplexer implements MultiplexerGateway {
  available = true;
  readonly sessions = new Map<string, string[]>();
  readonly panes = new Map<string, FakePane>();
  readonly calls: GatewayCall[] = [];
  /** Text returned by capturePane, per pane id */
  readonly screens = new Map<string, string>();

  failCreateSession = new Set<string>();
  failDestroySession = new Set<string>();
  failSplit = false;
  failSendText: (pane: PaneHandle, text: string, commit: boolean) => boolean = () => false;

  private nextPaneId = 0;

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async createSession(name: string, options: CreateSessionOptions = {}): Promise<SessionHandle> {
    this.calls.push({ method: 'createSession', target: name });
    if (this.failCreateSession.has(name)) {
      throw new Error('server exited unexpectedly');
    }
    if (this.sessions.has(name)) {
      throw new Error(`duplicate session: ${name}`);
    }
    const pane = this.addPane(name);
    pane.cwd = options.cwd;
    this.sessions.set(name, [pane.id]);
    return { name, rootPane: { session: name, id: pane.id } };
  }

  async destroySession(name: string): Promise<DestroyOutcome> {
    this.calls.push({ method: 'destroySession', target: name });
    if (this.failDestroySession.has(name)) {
      throw new Error('lost server');
    }
    const paneIds = this.sessions.get(name);
    if (!paneIds) {
      return 'absent';
    }
    for (const id of paneIds) {
      this.panes.delete(id);
    }
    this.sessions.delete(name);
    return 'destroyed';
  }

  async splitPane(pane: PaneHandle, orientation: SplitOrientation): Promise<PaneHandle> {
    this.calls.push({ method: 'splitPane', target: pane.id, detail: orientation });
    if (this.failSplit) {
      throw new Error('no space for new pane');
    }
    const paneIds = this.sessions.get(pane.session);
    if (!paneIds || !this.panes.has(pane.id)) {
      throw new Error(`can't find pane: ${pane.id}`);
    }
    const created = this.addPane(pane.session);
    created.splitFrom = pane.id;
    created.orientation = orientation;
    paneIds.push(created.id);
    return { session: pane.session, id: created.id };
  }

  async setPaneTitle(pane: PaneHandle, title: string): Promise<void> {
    this.calls.push({ method: 'setPaneTitle', target: pane.id, detail: title });
    this.requirePane(pane).title = title;
  }

  async setWorkingDirectory(pane: PaneHandle, path: string): Promise<void> {
    this.calls.push({ method: 'setWorkingDirectory', target: pane.id, detail: path });
    this.requirePane(pane).cwd = path;
  }

  async sendText(pane: PaneHandle, text: string, commit: boolean): Promise<void> {
    this.calls.push({ method: 'sendText', target: pane.id, detail: commit ? `${text}⏎` : text });
    if (this.failSendText(pane, text, commit)) {
      throw new Error(`can't find pane: ${pane.id}`);
    }
    const target = this.requirePane(pane);
    target.input += text;
    if (commit) {
      target.submitted.push(target.input);
      target.input = '';
    }
  }

  async capturePane(pane: PaneHandle): Promise<string> {
    this.calls.push({ method: 'capturePane', target: pane.id });
    this.requirePane(pane);
    return this.screens.get(pane.id) ?? '';
  }

  async listSessions(): Promise<string[]> {
    this.calls.push({ method: 'listSessions', target: '*' });
    return [...this.sessions.keys()];
  }

  pane(id: string): FakePane {
    const pane = this.panes.get(id);
    if (!pane) {
      throw new Error(`No fake pane ${id}`);
    }
    return pane;
  }

  callsTo(method: keyof MultiplexerGateway): GatewayCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  private addPane(session: string): FakePane {
    const pane: FakePane = { id: `%${this.nextPaneId++}`, session, input: '', submitted: [] };
    this.panes.set(pane.id, pane);
    return pane;
  }

  private requirePane(handle: PaneHandle): FakePane {
    const pane = this.panes.get(handle.id);
    if (!pane) {
      throw new Error(`can't find pane: ${handle.id}`);
    }
    return pane;
  }
}

/**
 * Barrier that records when it ran instead of sleeping.
 */
export class RecordingBarrier {
  readonly waits: string[][] = [];

  constructor(private readonly onWait: () => void = () => undefined) {}

  async wait(panes: PaneHandle[]): Promise<void> {
    this.waits.push(panes.map((pane) => pane.id));
    this.onWait();
  }
}
