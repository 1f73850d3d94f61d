import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CleanupStage } from '../../src/orchestrator/cleanup.js';
import { CompletionChannel } from '../../src/signals/completion-channel.js';
import { FakeMultiplexer } from '../helpers/fake-multiplexer.js';

describe('CleanupStage', () => {
  let root: string;
  let markerDir: string;
  let gateway: FakeMultiplexer;
  let stage: CleanupStage;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'crew-cleanup-'));
    markerDir = join(root, 'tmp');
    gateway = new FakeMultiplexer();
    stage = new CleanupStage(gateway);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should destroy existing sessions and clear markers', async () => {
    await gateway.createSession('multiagent');
    await gateway.createSession('unrelated');
    const channel = new CompletionChannel(markerDir);
    await channel.markComplete(1);
    await channel.markComplete(2);

    const report = await stage.reset(['multiagent', 'president'], markerDir);

    expect(report).toEqual({ destroyed: ['multiagent'], absent: ['president'], failed: [], markersRemoved: 2 });
    expect(await gateway.listSessions()).toEqual(['unrelated']);
    expect(await readdir(markerDir)).toEqual([]);
  });

  it('should be idempotent on an already clean state', async () => {
    const first = await stage.reset(['multiagent', 'president'], markerDir);
    const second = await stage.reset(['multiagent', 'president'], markerDir);

    expect(first).toEqual({ destroyed: [], absent: ['multiagent', 'president'], failed: [], markersRemoved: 0 });
    expect(second).toEqual(first);
    expect(await gateway.listSessions()).toEqual([]);
    expect(await readdir(markerDir)).toEqual([]);
  });

  it('should create the marker directory when it is missing', async () => {
    await stage.reset([], markerDir);

    expect(await readdir(root)).toEqual(['tmp']);
  });

  it('should log and continue when a session cannot be destroyed', async () => {
    await gateway.createSession('president');
    gateway.failDestroySession.add('multiagent');

    const report = await stage.reset(['multiagent', 'president'], markerDir);

    expect(report.failed).toEqual(['multiagent']);
    expect(report.destroyed).toEqual(['president']);
  });

  it('should not throw when the marker directory is unusable', async () => {
    // a file sits where a parent directory should be
    await new CompletionChannel(root).markComplete(1);

    const report = await stage.reset([], join(root, 'worker1_done.txt', 'nested'));

    expect(report.markersRemoved).toBe(0);
  });

  it('should visit each session name once', async () => {
    await stage.reset(['president', 'president'], markerDir);

    expect(gateway.callsTo('destroySession')).toEqual([{ method: 'destroySession', target: 'president' }]);
  });
});
