import { describe, it, expect, beforeEach } from 'vitest';
import { LayoutBuilder } from '../../src/orchestrator/layout-builder.js';
import { DEFAULT_TOPOLOGY, type Topology } from '../../src/topology.js';
import { TopologyError } from '../../src/errors.js';
import { buildPromptCommand } from '../../src/roles.js';
import { FakeMultiplexer } from '../helpers/fake-multiplexer.js';

function shape(topology: Topology) {
  return topology.sessions.map((session) => ({
    name: session.name,
    panes: session.panes.map(({ index, role, position }) => ({ index, role, position })),
  }));
}

describe('LayoutBuilder', () => {
  let gateway: FakeMultiplexer;
  let builder: LayoutBuilder;

  beforeEach(() => {
    gateway = new FakeMultiplexer();
    builder = new LayoutBuilder(gateway, { workingDirectory: '/work' });
  });

  it('should build a 2x2 session and a single-pane session', async () => {
    const topology = await builder.build(DEFAULT_TOPOLOGY);

    expect(shape(topology)).toEqual([
      {
        name: 'multiagent',
        panes: [
          { index: 0, role: 'supervisor', position: 'top-left' },
          { index: 1, role: 'worker1', position: 'bottom-left' },
          { index: 2, role: 'worker2', position: 'top-right' },
          { index: 3, role: 'worker3', position: 'bottom-right' },
        ],
      },
      { name: 'president', panes: [{ index: 0, role: 'coordinator', position: 'full' }] },
    ]);
  });

  it('should split left/right first and then each half top/bottom', async () => {
    await builder.build(DEFAULT_TOPOLOGY);

    expect(gateway.callsTo('splitPane')).toEqual([
      { method: 'splitPane', target: '%0', detail: 'horizontal' },
      { method: 'splitPane', target: '%0', detail: 'vertical' },
      { method: 'splitPane', target: '%1', detail: 'vertical' },
    ]);
    expect(gateway.pane('%1')).toMatchObject({ splitFrom: '%0', orientation: 'horizontal' });
    expect(gateway.pane('%2')).toMatchObject({ splitFrom: '%0', orientation: 'vertical' });
    expect(gateway.pane('%3')).toMatchObject({ splitFrom: '%1', orientation: 'vertical' });
  });

  it('should map every role to exactly one pane', async () => {
    const topology = await builder.build(DEFAULT_TOPOLOGY);

    expect([...topology.panes.entries()]).toEqual([
      ['supervisor', { session: 'multiagent', id: '%0' }],
      ['worker1', { session: 'multiagent', id: '%2' }],
      ['worker2', { session: 'multiagent', id: '%1' }],
      ['worker3', { session: 'multiagent', id: '%3' }],
      ['coordinator', { session: 'president', id: '%4' }],
    ]);
    const paneIds = [...topology.panes.values()].map((pane) => pane.id);
    expect(new Set(paneIds).size).toBe(gateway.panes.size);
  });

  it('should title, colour, cd and clear every pane', async () => {
    await builder.build(DEFAULT_TOPOLOGY);

    expect(gateway.pane('%2')).toMatchObject({
      title: 'worker1',
      cwd: '/work',
      input: '',
      submitted: [buildPromptCommand('worker1'), 'clear'],
    });
    expect(gateway.pane('%4')).toMatchObject({
      title: 'coordinator',
      submitted: [buildPromptCommand('coordinator'), 'clear'],
    });
    expect(gateway.calls.filter((call) => call.target === '%0').map((call) => call.method)).toEqual([
      'splitPane',
      'splitPane',
      'setPaneTitle',
      'sendText',
      'setWorkingDirectory',
      'sendText',
    ]);
  });

  it('should produce the same layout on every run', async () => {
    const first = await builder.build(DEFAULT_TOPOLOGY);
    const other = new FakeMultiplexer();
    const second = await new LayoutBuilder(other, { workingDirectory: '/work' }).build(DEFAULT_TOPOLOGY);

    expect(shape(second)).toEqual(shape(first));
    expect(other.calls).toEqual(gateway.calls);
  });

  it('should reject an invalid descriptor before touching tmux', async () => {
    await expect(
      builder.build({ sessions: [{ name: 'team', panes: ['worker1', 'worker1'] }] })
    ).rejects.toBeInstanceOf(TopologyError);
    expect(gateway.calls).toEqual([]);
  });

  it('should raise TopologyError when a session cannot be created', async () => {
    gateway.failCreateSession.add('president');

    await expect(builder.build(DEFAULT_TOPOLOGY)).rejects.toThrow(
      'Failed to create session president: server exited unexpectedly'
    );
  });

  it('should raise TopologyError when a split fails', async () => {
    gateway.failSplit = true;

    const error = await builder.build(DEFAULT_TOPOLOGY).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TopologyError);
    expect(error).toMatchObject({ message: 'Failed to split multiagent pane 0 horizontally: no space for new pane' });
  });

  it('should keep going when one pane cannot be decorated', async () => {
    gateway.failSendText = (pane) => pane.id === '%2';

    const topology = await builder.build(DEFAULT_TOPOLOGY);

    expect(topology.panes.size).toBe(5);
    expect(gateway.pane('%2')).toMatchObject({ title: 'worker1', submitted: [] });
    expect(gateway.pane('%2').cwd).toBeUndefined();
    expect(gateway.pane('%3').submitted).toEqual([buildPromptCommand('worker3'), 'clear']);
  });
});
