/**
 * Serialises runs per project.
 *
 * Within one process, runs for the same project queue behind each other.
 * Across processes, a `run.lock` file holding the owner's pid guards the
 * project directory; a lock whose pid is no longer alive is stale and is
 * taken over.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { RunLockedError, getLogger } from '@gitbrief/core';

export const LOCK_FILENAME = 'run.lock';

const queues = new Map<string, Promise<unknown>>();

/** True when a process with this pid exists */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export class ProjectLock {
  readonly lockPath: string;
  private readonly project: string;

  constructor(projectDir: string, project: string) {
    this.lockPath = path.join(projectDir, LOCK_FILENAME);
    this.project = project;
  }

  /** Run `fn` once every earlier run for this project has settled */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const key = this.lockPath;
    const previous = queues.get(key) ?? Promise.resolve();

    // The earlier run reports its own failure to its own caller
    const current = previous
      .catch(() => undefined)
      .then(async () => {
        this.acquire();
        try {
          return await fn();
        } finally {
          this.release();
        }
      });

    queues.set(key, current);
    try {
      return await current;
    } finally {
      if (queues.get(key) === current) queues.delete(key);
    }
  }

  /** Throws RunLockedError when another live process holds the lock */
  acquire(): void {
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });

    while (!this.tryCreate()) {
      const holder = this.readHolder();
      if (holder !== null && holder !== process.pid && isProcessAlive(holder)) {
        throw new RunLockedError(this.project, holder);
      }
      getLogger().warn('lock', `Removing stale lock for ${this.project}`, { pid: holder });
      fs.rmSync(this.lockPath, { force: true });
    }
  }

  /** Removes the lock file only while it still names this process */
  release(): void {
    if (this.readHolder() === process.pid) {
      fs.rmSync(this.lockPath, { force: true });
    }
  }

  private tryCreate(): boolean {
    try {
      fs.writeFileSync(this.lockPath, String(process.pid), { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return false;
      throw error;
    }
  }

  /** Pid in the lock file; null when the file is gone or holds no pid */
  private readHolder(): number | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.lockPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
    const pid = parseInt(raw.trim(), 10);
    return Number.isInteger(pid) ? pid : null;
  }
}
