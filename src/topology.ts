/**
 * Topology Descriptor
 *
 * Static description of which sessions exist, how many panes each has, and
 * which role sits in each pane. Also holds the fixed split plans that turn a
 * pane count into a reproducible spatial layout.
 */

import { TopologyError } from './errors.js';
import { compareRoles, workerRole, type Role } from './roles.js';
import type { PaneHandle, SplitOrientation } from './tmux/gateway.js';

export interface SessionDescriptor {
  name: string;
  /** Role per pane; the array index is the pane index */
  panes: Role[];
}

export interface TopologyDescriptor {
  sessions: SessionDescriptor[];
}

export const DEFAULT_TOPOLOGY: TopologyDescriptor = {
  sessions: [
    { name: 'multiagent', panes: ['supervisor', workerRole(1), workerRole(2), workerRole(3)] },
    { name: 'president', panes: ['coordinator'] },
  ],
};

export const MAX_PANES_PER_SESSION = 4;

// tmux target syntax reserves ':' and '.'
const SESSION_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

// ─────────────────────────────────────────────────────────────
// Layout plans
// ─────────────────────────────────────────────────────────────

export type PanePosition = 'full' | 'left' | 'right' | 'top-left' | 'bottom-left' | 'top-right' | 'bottom-right';

export interface SplitStep {
  /** Slot of an already created pane to split */
  from: number;
  orientation: SplitOrientation;
  /** Slot the new pane occupies */
  slot: number;
}

export interface LayoutPlan {
  steps: SplitStep[];
  /** Spatial position of each slot, indexed by pane index */
  positions: PanePosition[];
}

/**
 * Split sequences per pane count. Slots are the pane indices tmux assigns
 * (column by column, top to bottom), so pane 0 is always top-left.
 */
export const LAYOUT_PLANS: Readonly<Record<number, LayoutPlan>> = {
  1: { steps: [], positions: ['full'] },
  2: {
    steps: [{ from: 0, orientation: 'horizontal', slot: 1 }],
    positions: ['left', 'right'],
  },
  3: {
    steps: [
      { from: 0, orientation: 'horizontal', slot: 2 },
      { from: 0, orientation: 'vertical', slot: 1 },
    ],
    positions: ['top-left', 'bottom-left', 'right'],
  },
  4: {
    steps: [
      { from: 0, orientation: 'horizontal', slot: 2 },
      { from: 0, orientation: 'vertical', slot: 1 },
      { from: 2, orientation: 'vertical', slot: 3 },
    ],
    positions: ['top-left', 'bottom-left', 'top-right', 'bottom-right'],
  },
};

export function layoutPlanFor(paneCount: number): LayoutPlan {
  const plan = LAYOUT_PLANS[paneCount];
  if (!plan) {
    throw new TopologyError(`No layout for ${paneCount} panes (supported: 1-${MAX_PANES_PER_SESSION})`);
  }
  return plan;
}

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

/**
 * Problems with a descriptor, empty when it is valid.
 */
export function topologyProblems(descriptor: TopologyDescriptor): string[] {
  const problems: string[] = [];
  const sessionNames = new Set<string>();
  const seenRoles = new Map<Role, string>();

  if (descriptor.sessions.length === 0) {
    problems.push('Topology must declare at least one session');
  }

  for (const session of descriptor.sessions) {
    if (!SESSION_NAME_PATTERN.test(session.name)) {
      problems.push(`Invalid session name "${session.name}" (letters, digits, "-" and "_" only)`);
    }
    if (sessionNames.has(session.name)) {
      problems.push(`Duplicate session name "${session.name}"`);
    }
    sessionNames.add(session.name);

    if (session.panes.length < 1 || session.panes.length > MAX_PANES_PER_SESSION) {
      problems.push(
        `Session "${session.name}" has ${session.panes.length} panes (supported: 1-${MAX_PANES_PER_SESSION})`
      );
    }

    session.panes.forEach((role, index) => {
      const previous = seenRoles.get(role);
      if (previous) {
        problems.push(`Role "${role}" is assigned twice (${previous} and ${session.name}.${index})`);
      } else {
        seenRoles.set(role, `${session.name}.${index}`);
      }
    });
  }

  return problems;
}

export function validateTopology(descriptor: TopologyDescriptor): void {
  const problems = topologyProblems(descriptor);
  if (problems.length > 0) {
    throw new TopologyError(`Invalid topology:\n  ${problems.join('\n  ')}`);
  }
}

export function topologyRoles(descriptor: TopologyDescriptor): Role[] {
  return descriptor.sessions.flatMap((session) => session.panes).sort(compareRoles);
}

// ─────────────────────────────────────────────────────────────
// Materialized topology
// ─────────────────────────────────────────────────────────────

export interface BuiltPane {
  index: number;
  role: Role;
  position: PanePosition;
  handle: PaneHandle;
}

export interface BuiltSession {
  name: string;
  panes: BuiltPane[];
}

/**
 * The topology a run actually created. Owned by the run that built it; the
 * session names are only the wire-level identifiers for tmux.
 */
export interface Topology {
  sessions: BuiltSession[];
  panes: Map<Role, PaneHandle>;
}
