import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  DistillFailedError,
  Logger,
  MemoryOrderError,
  MemoryWriteError,
  ProviderError,
  RunLockedError,
  UsageTracker,
  type MemoryLogEntry,
} from '@gitbrief/core';
import { distillProjectMemory, shouldDistill } from '../memory/distiller.js';
import { LOCK_FILENAME, ProjectLock } from '../memory/lock.js';
import { LOG_FILENAME, MEMORY_FILENAME, MemoryStore } from '../memory/store.js';
import { MockProvider } from '../providers/mock.js';
import { PromptLibrary } from '../prompts.js';
import { StubProvider, makeTempDir, testConfig } from './helpers.js';

function entry(date: string, summary = `work on ${date}`, additions = 10, deletions = 2): MemoryLogEntry {
  return { date, summary, additions, deletions, magnitude: additions + deletions };
}

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('MemoryStore', () => {
  it('returns N entries in order after N appends', () => {
    const store = new MemoryStore(dir, new Logger());
    const dates = ['2024-05-06', '2024-05-07', '2024-05-08', '2024-05-09'];

    for (const date of dates) store.append(entry(date));

    expect(store.readAll().map((e) => e.date)).toEqual(dates);
    const lines = fs.readFileSync(path.join(dir, LOG_FILENAME), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(4);
    expect(JSON.parse(lines[0])).toEqual(entry('2024-05-06'));
  });

  it('accepts a second entry for the same day', () => {
    const store = new MemoryStore(dir, new Logger());
    store.append(entry('2024-05-10', 'morning'));
    store.append(entry('2024-05-10', 'evening'));
    expect(store.readAll().map((e) => e.summary)).toEqual(['morning', 'evening']);
  });

  it('rejects an entry dated before the last one', () => {
    const store = new MemoryStore(dir, new Logger());
    store.append(entry('2024-05-10'));

    expect(() => store.append(entry('2024-05-09'))).toThrow(MemoryOrderError);
    expect(store.readAll()).toHaveLength(1);
  });

  it('rejects a malformed entry with MemoryWriteError', () => {
    const store = new MemoryStore(dir, new Logger());
    expect(() => store.append({ ...entry('2024-05-10'), date: '10 May' })).toThrow(MemoryWriteError);
    expect(fs.existsSync(store.logPath)).toBe(false);
  });

  it('skips malformed lines and reports their numbers', () => {
    const logger = new Logger();
    const store = new MemoryStore(dir, logger);
    fs.writeFileSync(
      store.logPath,
      [JSON.stringify(entry('2024-05-08')), '{not json', JSON.stringify({ date: '2024-05-09' }), JSON.stringify(entry('2024-05-10'))].join('\n') + '\n',
    );

    const { entries, skippedLines } = store.readLog();

    expect(entries.map((e) => e.date)).toEqual(['2024-05-08', '2024-05-10']);
    expect(skippedLines).toEqual([2, 3]);
    expect(logger.allEntries.some((e) => e.level === 'warn' && e.category === 'memory')).toBe(true);
  });

  it('reads an absent memory document as empty and replaces it wholesale', () => {
    const store = new MemoryStore(dir, new Logger());
    expect(store.readMemory()).toBe('');

    store.writeMemory('# first');
    store.writeMemory('# second');

    expect(fs.readFileSync(path.join(dir, MEMORY_FILENAME), 'utf-8')).toBe('# second');
    expect(fs.readdirSync(dir).filter((f) => f.endsWith('.tmp'))).toEqual([]);
  });
});

describe('shouldDistill', () => {
  it('fires on multiples of distillEvery', () => {
    expect(shouldDistill(1, 1)).toBe(true);
    expect(shouldDistill(3, 2)).toBe(false);
    expect(shouldDistill(4, 2)).toBe(true);
    expect(shouldDistill(5, 0)).toBe(false);
    expect(shouldDistill(0, 1)).toBe(false);
  });
});

describe('distillProjectMemory', () => {
  function mockProvider(): MockProvider {
    return new MockProvider({
      name: 'mock',
      settings: { model: 'mock' },
      temperature: 0,
      maxTokens: 100,
      requestTimeoutMs: 1000,
      prompts: new PromptLibrary(),
      usage: new UsageTracker(),
      logger: new Logger(),
    });
  }

  it('produces the same document twice from an unchanged log', async () => {
    const store = new MemoryStore(dir, new Logger());
    store.append(entry('2024-05-09', '## Summary\nAdded login.', 30, 5));
    store.append(entry('2024-05-10', 'Fixed the cache.', 4, 1));
    const opts = { project: 'widgets', provider: mockProvider(), store, config: testConfig(), logger: new Logger() };

    const first = await distillProjectMemory(opts);
    const second = await distillProjectMemory(opts);

    expect(second).toBe(first);
    expect(first).toBe(
      [
        '# Project memory: widgets',
        '',
        'Weighting: recency high, magnitude medium.',
        '',
        '1. 2024-05-10 (magnitude 5): Fixed the cache.',
        '2. 2024-05-09 (magnitude 35): Added login.',
      ].join('\n'),
    );
    expect(store.readMemory()).toBe(first);
  });

  it('fails on an empty log without calling the provider', async () => {
    const provider = new StubProvider();
    let called = false;
    provider.distill = async () => {
      called = true;
      return '';
    };
    const store = new MemoryStore(dir, new Logger());

    await expect(
      distillProjectMemory({ project: 'widgets', provider, store, config: testConfig(), logger: new Logger() }),
    ).rejects.toThrow(DistillFailedError);
    expect(called).toBe(false);
  });

  it('leaves the previous document in place when the provider fails', async () => {
    const provider = new StubProvider();
    provider.distill = async () => {
      throw new ProviderError('bad key', 'stub', 'auth', 401);
    };
    const store = new MemoryStore(dir, new Logger());
    store.append(entry('2024-05-10'));
    store.writeMemory('# previous');

    await expect(
      distillProjectMemory({ project: 'widgets', provider, store, config: testConfig(), logger: new Logger() }),
    ).rejects.toMatchObject({ code: 'DISTILL_FAILED', message: 'Memory distillation failed: bad key' });
    expect(store.readMemory()).toBe('# previous');
    expect(store.readAll()).toHaveLength(1);
  });
});

describe('ProjectLock', () => {
  it('writes its pid while running and removes the lock afterwards', async () => {
    const lock = new ProjectLock(dir, 'widgets');
    let during = '';

    await lock.run(async () => {
      during = fs.readFileSync(path.join(dir, LOCK_FILENAME), 'utf-8');
    });

    expect(during).toBe(String(process.pid));
    expect(fs.existsSync(path.join(dir, LOCK_FILENAME))).toBe(false);
  });

  it('queues runs for the same project inside one process', async () => {
    const order: string[] = [];
    const slow = new ProjectLock(dir, 'widgets').run(async () => {
      order.push('first:start');
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('first:end');
    });
    const fast = new ProjectLock(dir, 'widgets').run(async () => {
      order.push('second');
    });

    await Promise.all([slow, fast]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('refuses a lock held by another live process', () => {
    // The parent of this process is alive for the duration of the test
    fs.writeFileSync(path.join(dir, LOCK_FILENAME), String(process.ppid));
    expect(() => new ProjectLock(dir, 'widgets').acquire()).toThrow(RunLockedError);
  });

  it('takes over a lock whose process is gone', () => {
    fs.writeFileSync(path.join(dir, LOCK_FILENAME), '999999999');
    new ProjectLock(dir, 'widgets').acquire();
    expect(fs.readFileSync(path.join(dir, LOCK_FILENAME), 'utf-8')).toBe(String(process.pid));
  });

  it('leaves the lock file of a live holder untouched when refusing', () => {
    fs.writeFileSync(path.join(dir, LOCK_FILENAME), String(process.ppid));

    expect(() => new ProjectLock(dir, 'widgets').acquire()).toThrow(RunLockedError);
    expect(fs.readFileSync(path.join(dir, LOCK_FILENAME), 'utf-8')).toBe(String(process.ppid));
  });

  it('leaves a lock file owned by another process on release', () => {
    const lock = new ProjectLock(dir, 'widgets');
    lock.acquire();
    fs.writeFileSync(path.join(dir, LOCK_FILENAME), String(process.ppid));

    lock.release();

    expect(fs.readFileSync(path.join(dir, LOCK_FILENAME), 'utf-8')).toBe(String(process.ppid));
  });

  it('releases its own lock file', () => {
    const lock = new ProjectLock(dir, 'widgets');
    lock.acquire();

    lock.release();

    expect(fs.existsSync(path.join(dir, LOCK_FILENAME))).toBe(false);
  });
});
