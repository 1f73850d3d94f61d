/**
 * Roles bound to panes.
 *
 * A role is its own wire name: `coordinator`, `supervisor`, or `worker<N>` for
 * a positive N. Using the string itself keeps roles usable as Map keys and in
 * pane titles without a separate lookup.
 */

export type WorkerRole = `worker${number}`;

export type Role = 'coordinator' | 'supervisor' | WorkerRole;

const WORKER_PATTERN = /^worker([1-9]\d*)$/;

export function workerRole(index: number): WorkerRole {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Worker index must be a positive integer, got ${index}`);
  }
  return `worker${index}`;
}

export function isWorkerRole(role: Role): role is WorkerRole {
  return WORKER_PATTERN.test(role);
}

/**
 * Parse a role name, returning null for anything outside the closed set.
 */
export function parseRole(text: string): Role | null {
  const value = text.trim();
  if (value === 'coordinator' || value === 'supervisor') {
    return value;
  }
  const match = WORKER_PATTERN.exec(value);
  if (match) {
    return workerRole(Number(match[1]));
  }
  return null;
}

export function workerIndex(role: Role): number | null {
  const match = WORKER_PATTERN.exec(role);
  return match ? Number(match[1]) : null;
}

function rank(role: Role): number {
  if (role === 'coordinator') return 0;
  if (role === 'supervisor') return 1;
  return 2;
}

/**
 * Fixed bootstrap order: coordinator, supervisor, then workers by index.
 */
export function compareRoles(a: Role, b: Role): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) {
    return byRank;
  }
  return (workerIndex(a) ?? 0) - (workerIndex(b) ?? 0);
}

// ─────────────────────────────────────────────────────────────
// Prompt colours
// ─────────────────────────────────────────────────────────────

export type PromptColor = 'magenta' | 'red' | 'blue';

/** Bold ANSI SGR codes used inside PS1. */
const ANSI_CODES: Record<PromptColor, string> = {
  red: '1;31',
  blue: '1;34',
  magenta: '1;35',
};

export function roleColor(role: Role): PromptColor {
  if (role === 'coordinator') return 'magenta';
  if (role === 'supervisor') return 'red';
  return 'blue';
}

/**
 * Shell command that gives the pane a `(role) cwd$ ` prompt with the role in its colour.
 */
export function buildPromptCommand(role: Role): string {
  const code = ANSI_CODES[roleColor(role)];
  const ps1 = `(\\[\\033[${code}m\\]${role}\\[\\033[0m\\]) \\[\\033[1;32m\\]\\w\\[\\033[0m\\]\\$ `;
  return `export PS1='${ps1}'`;
}
