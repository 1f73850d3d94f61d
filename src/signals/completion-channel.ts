/**
 * Completion Signal Channel
 *
 * One empty marker file per finished worker (`worker<N>_done.txt`) in a shared
 * directory. Presence is the signal; there is no in-progress or failed state.
 * Polling only, at-least-once, no locking: writing the same marker twice is a no-op.
 */

import { mkdir, rm, stat, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { glob } from 'glob';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/shell.js';

const MARKER_GLOB = 'worker*_done.txt';
const MARKER_PATTERN = /^worker([1-9]\d*)_done\.txt$/;

export interface WaitOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
}

function assertWorkerId(workerId: number): void {
  if (!Number.isInteger(workerId) || workerId < 1) {
    throw new RangeError(`Worker id must be a positive integer, got ${workerId}`);
  }
}

function assertDuration(name: string, value: number, allowInfinite: boolean): void {
  const valid = Number.isFinite(value) || (allowInfinite && value === Number.POSITIVE_INFINITY);
  if (!valid || value < 0) {
    throw new RangeError(`${name} must be a non-negative number of milliseconds, got ${value}`);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export function markerFileName(workerId: number): string {
  assertWorkerId(workerId);
  return `worker${workerId}_done.txt`;
}

export class CompletionChannel {
  readonly markerDir: string;

  constructor(markerDir: string) {
    this.markerDir = resolve(markerDir);
  }

  markerPath(workerId: number): string {
    return join(this.markerDir, markerFileName(workerId));
  }

  async ensureDirectory(): Promise<void> {
    await mkdir(this.markerDir, { recursive: true });
  }

  /**
   * Record that a worker finished. Called by workers, not by the orchestrator.
   */
  async markComplete(workerId: number): Promise<void> {
    const path = this.markerPath(workerId);
    await this.ensureDirectory();
    await writeFile(path, '');
    logger.info(`Worker ${workerId} marked complete`, { path });
  }

  async isComplete(workerId: number): Promise<boolean> {
    const path = this.markerPath(workerId);
    try {
      const info = await stat(path);
      return info.isFile();
    } catch (err) {
      if (isMissing(err)) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Worker ids with a marker present, ascending.
   */
  async completedWorkers(): Promise<number[]> {
    const names = await this.listMarkers();
    return names
      .filter((name) => MARKER_PATTERN.test(name))
      .map((name) => MARKER_PATTERN.exec(name))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => Number(match[1]))
      .sort((a, b) => a - b);
  }

  /**
   * Delete every `worker*_done.txt` file, including ones no worker id maps to.
   * A missing directory counts as already clear.
   * @returns number of markers removed
   */
  async clear(): Promise<number> {
    const names = await this.listMarkers();
    for (const name of names) {
      await rm(join(this.markerDir, name), { force: true });
    }
    return names.length;
  }

  /**
   * Poll until every listed worker has a marker.
   * @returns false when `timeoutMs` elapses first (default: wait forever)
   */
  async waitForAll(workerIds: number[], options: WaitOptions = {}): Promise<boolean> {
    const pollIntervalMs = options.pollIntervalMs ?? 1000;
    const timeoutMs = options.timeoutMs ?? Number.POSITIVE_INFINITY;
    workerIds.forEach(assertWorkerId);
    assertDuration('pollIntervalMs', pollIntervalMs, false);
    assertDuration('timeoutMs', timeoutMs, true);

    const startTime = Date.now();
    for (;;) {
      const done = await this.completedWorkers();
      if (workerIds.every((id) => done.includes(id))) {
        return true;
      }
      if (Date.now() - startTime >= timeoutMs) {
        return false;
      }
      await sleep(pollIntervalMs);
    }
  }

  private async listMarkers(): Promise<string[]> {
    // glob yields nothing for a missing directory
    const names = await glob(MARKER_GLOB, { cwd: this.markerDir, nodir: true });
    return names.sort();
  }
}
