import type { Role } from './roles.js';

/**
 * tmux is not installed or cannot be reached. Raised before any session is touched.
 */
export class SubstrateUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubstrateUnavailableError';
  }
}

/**
 * A topology could not be materialized: invalid descriptor, a session that
 * could not be created, or a split that failed. Aborts the run.
 */
export class TopologyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TopologyError';
  }
}

/**
 * Text or a keystroke could not be delivered to one pane.
 * Only that pane is affected; the rest of the bootstrap carries on.
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly role: Role,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

export class TmuxCommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message);
    this.name = 'TmuxCommandError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
