// src/core/export/__tests__/pipeline.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';
import { ErrorCode, ErrorKind, VaultError } from '../../errors.js';
import { ManualClock } from '../../pacing/clock.js';
import { PacingController } from '../../pacing/controller.js';
import { InMemoryExportStateStore } from '../../state/memory-store.js';
import type { ExportJob } from '../../types/index.js';
import { FileUserCache } from '../../users/cache.js';
import { ExportPipeline, buildExportQuery, shiftDate, validateDateRange, type PipelineDeps } from '../pipeline.js';
import { FakeSlackApi, StaticUserDirectory, match, searchPage } from '../../__tests__/helpers/fake-slack.js';

const QUERY = 'from:<@U1> after:2025-12-31 before:2026-02-01';
const RANGE = { from: '2026-01-01', to: '2026-01-31' };
const FIXED_NOW = new Date('2026-02-02T09:00:00.000Z');

/** Aborts the run as soon as a checkpoint with the given status is saved. */
class InterruptingStore extends InMemoryExportStateStore {
  controller = new AbortController();

  constructor(private interruptAt: ExportJob['status']) {
    super();
  }

  async save(workspace: string, job: ExportJob): Promise<void> {
    await super.save(workspace, job);
    if (job.status === this.interruptAt) {
      this.controller.abort();
    }
  }
}

/** Records the fetched count of every thread-phase checkpoint; aborts once `after` threads are in. */
class ThreadInterruptingStore extends InMemoryExportStateStore {
  controller = new AbortController();
  checkpoints: number[] = [];

  constructor(private after: number) {
    super();
  }

  async save(workspace: string, job: ExportJob): Promise<void> {
    await super.save(workspace, job);
    if (job.status !== 'fetching_threads') return;
    this.checkpoints.push(job.threadProgress.fetched.length);
    if (job.threadProgress.fetched.length >= this.after) {
      this.controller.abort();
    }
  }
}

function standalone(count: number, offset: number) {
  return Array.from({ length: count }, (_, i) => match('C1', `${1000 + offset + i}.000100`));
}

/** Page 1: 99 standalone + one reply in thread C1:111.1; page 2: 5 standalone. */
function twoPageApi(): FakeSlackApi {
  const api = new FakeSlackApi();
  api.setSearch(QUERY, [
    searchPage([...standalone(99, 0), match('C1', '111.2', { thread_ts: '111.1' })], 2, 105),
    searchPage(standalone(5, 99), 2, 105),
  ]);
  api.setThread('C1', '111.1', [
    { ts: '111.1', user: 'U2', text: 'root' },
    { ts: '111.2', user: 'U1', text: 'reply' },
  ]);
  return api;
}

/** Three of the user's replies in one thread, found by thread_ts and by permalink. */
function repeatedThreadApi(): FakeSlackApi {
  const api = new FakeSlackApi();
  api.setSearch(QUERY, [
    searchPage(
      [
        match('C1', '111.2', { thread_ts: '111.1' }),
        match('C1', '111.3', { permalink: 'https://acme.slack.com/archives/C1/p1113?thread_ts=111.1' }),
      ],
      2,
      3
    ),
    searchPage([match('C1', '111.4', { thread_ts: '111.1' })], 2, 3),
  ]);
  api.setThread('C1', '111.1', [
    { ts: '111.1', user: 'U2', text: 'root' },
    { ts: '111.2', user: 'U1', text: 'reply' },
    { ts: '111.3', user: 'U1', text: 'another' },
    { ts: '111.4', user: 'U1', text: 'and another' },
  ]);
  return api;
}

/** Five of the user's replies, each in its own thread C1:<n>.1. */
function fiveThreadApi(): FakeSlackApi {
  const api = new FakeSlackApi();
  const numbers = [1, 2, 3, 4, 5];
  api.setSearch(QUERY, [searchPage(numbers.map((n) => match('C1', `${n}.2`, { thread_ts: `${n}.1` })), 1, 5)]);
  for (const n of numbers) {
    api.setThread('C1', `${n}.1`, [
      { ts: `${n}.1`, user: 'U2', text: 'root' },
      { ts: `${n}.2`, user: 'U1', text: 'reply' },
    ]);
  }
  return api;
}

const FIVE_KEYS = ['C1:1.1', 'C1:2.1', 'C1:3.1', 'C1:4.1', 'C1:5.1'];

describe('ExportPipeline', () => {
  let tmpDir: string;
  let outputPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slack-vault-pipeline-'));
    outputPath = path.join(tmpDir, 'out', 'export.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function pipeline(api: FakeSlackApi, store: InMemoryExportStateStore, extra: Partial<PipelineDeps> = {}): ExportPipeline {
    return new ExportPipeline({
      api,
      store,
      users: new StaticUserDirectory({ U1: 'Alice', U2: 'Bob' }),
      pacing: new PacingController({ clock: new ManualClock() }),
      now: () => FIXED_NOW,
      createId: () => 'job00001',
      ...extra,
    });
  }

  it('should pause after searching with every page accumulated', async () => {
    const api = twoPageApi();
    const store = new InterruptingStore('fetching_threads');

    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath, signal: store.controller.signal })
    ).rejects.toMatchObject({ code: ErrorCode.CANCELLED });

    const job = await store.load('acme');
    expect(job?.status).toBe('paused');
    expect(job?.pausedFrom).toBe('fetching_threads');
    expect(job?.threadProgress.pending).toEqual(['C1:111.1']);
    expect(job?.threadProgress.fetched).toEqual([]);
    expect(job?.accumulatedData.standaloneMessages).toHaveLength(104);
    expect(job?.searchProgress).toEqual({ totalMatches: 105, totalPages: 2, currentPage: 2, messagesFetched: 105 });
    expect(api.count('conversations.replies')).toBe(0);
  });

  it('should produce identical output whether or not the run was interrupted', async () => {
    const straightStore = new InMemoryExportStateStore();
    await pipeline(twoPageApi(), straightStore).run({ workspace: 'acme', dateRange: RANGE, outputPath });
    const straight = await fs.readFile(outputPath, 'utf-8');
    await fs.rm(outputPath);

    const api = twoPageApi();
    const store = new InterruptingStore('fetching_threads');
    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath, signal: store.controller.signal })
    ).rejects.toBeInstanceOf(VaultError);

    const resumed = await pipeline(api, store).run({ workspace: 'acme', resume: true });
    expect(resumed.status).toBe('completed');
    expect(await fs.readFile(outputPath, 'utf-8')).toBe(straight);
    expect(api.count('search.messages')).toBe(2);
    expect(api.count('conversations.replies')).toBe(1);
  });

  it('should fetch a thread once even when several matches point at it', async () => {
    const api = repeatedThreadApi();
    const store = new InMemoryExportStateStore();

    const job = await pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath });

    expect(job.threadProgress.pending).toEqual(['C1:111.1']);
    expect(job.accumulatedData.standaloneMessages).toEqual([]);
    expect(job.accumulatedData.threads).toHaveLength(1);
    expect(job.accumulatedData.threads[0]).toMatchObject({
      threadKey: 'C1:111.1',
      channelId: 'C1',
      threadTs: '111.1',
      totalMessageCount: 4,
      targetUserMessageCount: 3,
    });
    expect(api.count('conversations.replies')).toBe(1);
  });

  it('should write the export document with only the authors present', async () => {
    const store = new InMemoryExportStateStore();
    await pipeline(twoPageApi(), store).run({ workspace: 'acme', dateRange: RANGE, outputPath });

    const document = JSON.parse(await fs.readFile(outputPath, 'utf-8'));
    expect(document.metadata).toMatchObject({
      jobId: 'job00001',
      workspace: 'acme',
      user: { id: 'U1', name: 'alice' },
      completedAt: '2026-02-02T09:00:00.000Z',
    });
    expect(document.metadata.counts).toEqual({
      totalMatches: 105,
      standaloneMessages: 104,
      threads: 1,
      threadMessages: 2,
      targetUserThreadMessages: 1,
      skippedThreads: 0,
    });
    expect(document.users).toEqual({ U1: 'Alice', U2: 'Bob' });
    expect(document.channels).toEqual({ C1: { id: 'C1', type: 'channel' } });
  });

  it('should skip an inaccessible thread and log it', async () => {
    const api = new FakeSlackApi();
    api.setSearch(QUERY, [
      searchPage([match('C1', '1.1', { thread_ts: '1.0' }), match('G2', '2.1', { thread_ts: '2.0' })], 1, 2),
    ]);
    api.setThread('C1', '1.0', [{ ts: '1.0', user: 'U1', text: 'root' }, { ts: '1.1', user: 'U1', text: 'me' }]);
    api.setThreadError('G2', '2.0', 'not_in_channel');
    const store = new InMemoryExportStateStore();

    const job = await pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath });

    expect(job.status).toBe('completed');
    expect(job.threadProgress.fetched).toEqual(['C1:1.0', 'G2:2.0']);
    expect(job.accumulatedData.threads.map((thread) => thread.threadKey)).toEqual(['C1:1.0']);
    expect(job.errors).toEqual([
      {
        timestamp: '2026-02-02T09:00:00.000Z',
        kind: ErrorKind.NotAccessible,
        code: 'not_in_channel',
        detail: 'Skipped thread G2:2.0: not_in_channel',
      },
    ]);
    expect(job.accumulatedData.channels.G2).toEqual({ id: 'G2', type: 'group' });
  });

  it('should wait out a rate limit and carry on', async () => {
    const api = twoPageApi();
    api.queuedSearch.push({ ok: false, error: 'ratelimited' });
    const clock = new ManualClock();
    const store = new InMemoryExportStateStore();

    const job = await pipeline(api, store, { pacing: new PacingController({ clock }) }).run({
      workspace: 'acme',
      dateRange: RANGE,
      outputPath,
    });

    expect(job.status).toBe('completed');
    expect(clock.sleeps).toEqual([30000]);
    expect(api.count('search.messages')).toBe(3);
  });

  it('should stop with a resumable job when rate limiting persists', async () => {
    const api = twoPageApi();
    api.queuedSearch.push({ ok: false, error: 'ratelimited' }, { ok: false, error: 'ratelimited' });
    const store = new InMemoryExportStateStore();

    await expect(
      pipeline(api, store, { maxRateLimitRetries: 1 }).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.RATE_LIMITED, retryable: true });

    const job = await store.load('acme');
    expect(job?.status).toBe('searching');
    expect(job?.errors.map((entry) => [entry.kind, entry.code])).toEqual([[ErrorKind.RateLimited, 'rate_limited']]);

    const resumed = await pipeline(api, store).run({ workspace: 'acme', resume: true });
    expect(resumed.status).toBe('completed');
    expect(resumed.accumulatedData.standaloneMessages).toHaveLength(104);
  });

  it('should checkpoint every few threads and resume a pause without refetching', async () => {
    const api = fiveThreadApi();
    const store = new ThreadInterruptingStore(2);

    await expect(
      pipeline(api, store, { checkpointInterval: 2 }).run({
        workspace: 'acme',
        dateRange: RANGE,
        outputPath,
        signal: store.controller.signal,
      })
    ).rejects.toMatchObject({ code: ErrorCode.CANCELLED });

    expect(store.checkpoints).toEqual([0, 2]);
    const paused = await store.load('acme');
    expect(paused?.status).toBe('paused');
    expect(paused?.pausedFrom).toBe('fetching_threads');
    expect(paused?.threadProgress.fetched).toEqual(['C1:1.1', 'C1:2.1']);
    expect(paused?.threadProgress.cursor).toBe(2);
    expect(paused?.accumulatedData.threads.map((thread) => thread.threadKey)).toEqual(['C1:1.1', 'C1:2.1']);

    const resumed = await pipeline(api, store, { checkpointInterval: 2 }).run({ workspace: 'acme', resume: true });

    expect(resumed.status).toBe('completed');
    expect(resumed.threadProgress.fetched).toEqual(FIVE_KEYS);
    expect(resumed.threadProgress.cursor).toBe(5);
    expect(resumed.accumulatedData.threads.map((thread) => thread.threadKey)).toEqual(FIVE_KEYS);
    expect(api.threadRequests).toEqual(FIVE_KEYS);
  });

  it('should record a failed search page and stop', async () => {
    const api = twoPageApi();
    api.queuedSearch.push({ ok: false, error: 'internal_error' });
    const store = new InMemoryExportStateStore();

    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.API_ERROR, message: 'search.messages page 1 failed: internal_error' });

    const job = await store.load('acme');
    expect(job?.status).toBe('searching');
    expect(job?.searchProgress.currentPage).toBe(0);
    expect(job?.errors).toEqual([
      {
        timestamp: '2026-02-02T09:00:00.000Z',
        kind: ErrorKind.Unknown,
        code: 'internal_error',
        detail: 'search.messages page 1 failed: internal_error',
      },
    ]);
    expect(store.isLocked('acme')).toBe(false);
  });

  it('should stop on a transient thread failure without marking the thread fetched', async () => {
    const api = twoPageApi();
    api.setThreadError('C1', '111.1', 'internal_error');
    const store = new InMemoryExportStateStore();

    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.API_ERROR });

    const failed = await store.load('acme');
    expect(failed?.status).toBe('fetching_threads');
    expect(failed?.threadProgress.fetched).toEqual([]);
    expect(failed?.accumulatedData.threads).toEqual([]);
    expect(failed?.errors.map((entry) => [entry.kind, entry.code, entry.detail])).toEqual([
      [ErrorKind.Unknown, 'internal_error', 'conversations.replies failed for C1:111.1: internal_error'],
    ]);

    api.setThread('C1', '111.1', [{ ts: '111.1', user: 'U2', text: 'root' }]);
    const resumed = await pipeline(api, store).run({ workspace: 'acme', resume: true });

    expect(resumed.status).toBe('completed');
    expect(resumed.threadProgress.fetched).toEqual(['C1:111.1']);
    expect(api.threadRequests).toEqual(['C1:111.1', 'C1:111.1']);
  });

  it('should pace the user list fill and wait out its rate limit', async () => {
    const api = twoPageApi();
    api.users = [
      { id: 'U1', name: 'alice', profile: { display_name: 'Alice' } },
      { id: 'U2', name: 'bob' },
    ];
    api.queuedUsers.push({ ok: false, error: 'ratelimited' });
    const clock = new ManualClock();
    const users = new FileUserCache(path.join(tmpDir, 'users'), { launcher: () => undefined });

    const job = await pipeline(api, new InMemoryExportStateStore(), {
      users,
      pacing: new PacingController({ clock }),
    }).run({ workspace: 'acme', dateRange: RANGE, outputPath });

    expect(job.status).toBe('completed');
    expect(job.errors).toEqual([]);
    expect(clock.sleeps).toEqual([30000]);
    expect(api.count('users.list')).toBe(3);
    const document = JSON.parse(await fs.readFile(outputPath, 'utf-8'));
    expect(document.users).toEqual({ U1: 'Alice', U2: 'bob' });
  });

  it('should leave a resumable job when the user list stays rate limited', async () => {
    const api = twoPageApi();
    api.users = [{ id: 'U1', name: 'alice' }];
    api.queuedUsers.push({ ok: false, error: 'ratelimited' });
    const store = new InMemoryExportStateStore();
    const users = new FileUserCache(path.join(tmpDir, 'users'), { launcher: () => undefined });

    await expect(
      pipeline(api, store, { users, maxRateLimitRetries: 0 }).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.RATE_LIMITED });

    const stopped = await store.load('acme');
    expect(stopped?.status).toBe('writing_output');
    expect(stopped?.errors.map((entry) => [entry.kind, entry.code])).toEqual([[ErrorKind.RateLimited, 'rate_limited']]);

    const resumed = await pipeline(api, store, { users }).run({ workspace: 'acme', resume: true });
    expect(resumed.status).toBe('completed');
    expect(await users.lookup('acme')).toEqual({ U1: 'alice' });
  });

  it('should refuse a second concurrent run for the same workspace', async () => {
    const store = new InMemoryExportStateStore();
    const release = await store.lock('acme');

    await expect(
      pipeline(twoPageApi(), store).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.JOB_LOCKED });

    await release();
    expect(store.isLocked('acme')).toBe(false);
  });

  it('should release the lock when the run fails', async () => {
    const api = twoPageApi();
    api.auth = { ok: false, error: 'invalid_auth' };
    const store = new InMemoryExportStateStore();

    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.AUTH_FAILED });
    expect(store.isLocked('acme')).toBe(false);
    expect(await store.load('acme')).toBeNull();
  });

  it('should return a completed job on resume without calling the API', async () => {
    const api = twoPageApi();
    const store = new InMemoryExportStateStore();
    await pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath });
    const callsBefore = api.calls.length;

    const job = await pipeline(api, store).run({ workspace: 'acme', resume: true });

    expect(job.status).toBe('completed');
    expect(api.calls).toHaveLength(callsBefore);
  });

  it('should fail to resume when nothing is stored', async () => {
    await expect(
      pipeline(new FakeSlackApi(), new InMemoryExportStateStore()).run({ workspace: 'acme', resume: true })
    ).rejects.toMatchObject({ code: ErrorCode.NOTHING_TO_RESUME });
  });

  it('should refuse to replace an unfinished job unless forced', async () => {
    const api = twoPageApi();
    const store = new InterruptingStore('fetching_threads');
    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath, signal: store.controller.signal })
    ).rejects.toBeInstanceOf(VaultError);

    await expect(
      pipeline(api, store).run({ workspace: 'acme', dateRange: RANGE, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.JOB_IN_PROGRESS });

    const forced = await pipeline(api, store).run({
      workspace: 'acme',
      dateRange: RANGE,
      outputPath,
      force: true,
    });
    expect(forced.status).toBe('completed');
  });

  it('should reject a fresh run without a date range', async () => {
    const api = new FakeSlackApi();

    await expect(
      pipeline(api, new InMemoryExportStateStore()).run({ workspace: 'acme', outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.CONFIG_ERROR });
    await expect(
      pipeline(api, new InMemoryExportStateStore()).run({ workspace: 'acme', dateRange: { from: '2026-13-01' }, outputPath })
    ).rejects.toMatchObject({ code: ErrorCode.CONFIG_ERROR });
    expect(api.calls).toEqual([]);
  });

  it('should fill a cold user cache before writing', async () => {
    const users = new StaticUserDirectory();
    const store = new InMemoryExportStateStore();

    await pipeline(twoPageApi(), store, { users }).run({ workspace: 'acme', dateRange: RANGE, outputPath });

    expect(users.refreshes).toEqual(['acme']);
    const document = JSON.parse(await fs.readFile(outputPath, 'utf-8'));
    expect(document.users).toEqual({ U1: 'Alice', U2: 'U2' });
  });

  it('should trigger a background refresh for a stale user cache', async () => {
    const users = new StaticUserDirectory({ U1: 'Alice' });
    users.stale = true;

    await pipeline(twoPageApi(), new InMemoryExportStateStore(), { users }).run({
      workspace: 'acme',
      dateRange: RANGE,
      outputPath,
    });

    expect(users.refreshes).toEqual([]);
    expect(users.backgroundRefreshes).toEqual(['acme']);
  });
});

describe('buildExportQuery', () => {
  it('should widen the range by a day on each side', () => {
    expect(buildExportQuery('U1', RANGE)).toBe(QUERY);
  });

  it('should leave out before: for an open range', () => {
    expect(buildExportQuery('U1', { from: '2026-03-01' })).toBe('from:<@U1> after:2026-02-28');
  });
});

describe('shiftDate', () => {
  it('should cross month and year boundaries', () => {
    expect(shiftDate('2026-01-01', -1)).toBe('2025-12-31');
    expect(shiftDate('2024-02-28', 1)).toBe('2024-02-29');
  });
});

describe('validateDateRange', () => {
  it('should reject malformed dates', () => {
    expect(() => validateDateRange({ from: '2026/01/01' })).toThrow('Invalid date: 2026/01/01');
  });

  it('should reject a range that ends before it starts', () => {
    expect(() => validateDateRange({ from: '2026-02-01', to: '2026-01-01' })).toThrow(VaultError);
  });
});
