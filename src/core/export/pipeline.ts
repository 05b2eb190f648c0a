// src/core/export/pipeline.ts
import { randomUUID } from 'node:crypto';
import { SEARCH_PAGE_SIZE, THREAD_CHECKPOINT_INTERVAL } from '../config/constants.js';
import { ErrorCode, ErrorKind, VaultError, errorKindFor, isPermanentThreadError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { cancelledError } from '../pacing/clock.js';
import { PacingController } from '../pacing/controller.js';
import { pacedCall } from '../pacing/paced-call.js';
import {
  parseThreadKey,
  threadKeyForMatch,
  toMessageRecord,
} from '../slack/messages.js';
import type { SearchMatch, SlackApi, SlackMessage } from '../slack/types.js';
import { JobTracker, createExportJob, resumePhase } from '../state/job.js';
import type { ExportStateStore } from '../state/store.js';
import type { DateRange, ExportJob, ThreadKey, ThreadRecord } from '../types/index.js';
import type { UserDirectory } from '../users/cache.js';
import { buildExportDocument, countExport, formatJsonOutput, writeFileAtomic } from './document.js';

export interface ExportOptions {
  workspace: string;
  /** Required for a fresh export; a resumed job keeps its own. */
  dateRange?: DateRange;
  outputPath?: string;
  resume?: boolean;
  /** Discard an unfinished job instead of refusing to start. */
  force?: boolean;
  signal?: AbortSignal;
}

export interface PipelineDeps {
  api: SlackApi;
  store: ExportStateStore;
  users: UserDirectory;
  pacing?: PacingController;
  logger?: Logger;
  now?: () => Date;
  createId?: () => string;
  maxRateLimitRetries?: number;
  checkpointInterval?: number;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function shiftDate(date: string, days: number): string {
  const [year, month, day] = date.split('-').map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return shifted.toISOString().slice(0, 10);
}

/** `after:` and `before:` are exclusive, so the range is widened by a day each side. */
export function buildExportQuery(userId: string, range: DateRange): string {
  const parts = [`from:<@${userId}>`, `after:${shiftDate(range.from, -1)}`];
  if (range.to) {
    parts.push(`before:${shiftDate(range.to, 1)}`);
  }
  return parts.join(' ');
}

export function validateDateRange(range: DateRange): void {
  const invalid = [range.from, range.to].find(
    (value) => value !== undefined && (!ISO_DATE.test(value) || Number.isNaN(Date.parse(value)))
  );
  if (invalid !== undefined) {
    throw new VaultError(ErrorCode.CONFIG_ERROR, `Invalid date: ${invalid}`, false, 'Use YYYY-MM-DD');
  }
  if (range.to && range.to < range.from) {
    throw new VaultError(ErrorCode.CONFIG_ERROR, `Date range ends before it starts: ${range.from}..${range.to}`);
  }
}

function requireFreshJobOptions(options: ExportOptions): { dateRange: DateRange; outputPath: string } {
  if (!options.dateRange || !options.outputPath) {
    throw new VaultError(
      ErrorCode.CONFIG_ERROR,
      'A new export needs a date range and an output path',
      false,
      'Pass --from <YYYY-MM-DD> and --out <file>'
    );
  }
  validateDateRange(options.dateRange);
  return { dateRange: options.dateRange, outputPath: options.outputPath };
}

export function buildThreadRecord(
  key: ThreadKey,
  messages: SlackMessage[],
  targetUserId: string
): ThreadRecord {
  const { channelId, threadTs } = parseThreadKey(key);
  const records = messages.map((message) => toMessageRecord(message, channelId, targetUserId));
  return {
    threadKey: key,
    channelId,
    threadTs,
    totalMessageCount: records.length,
    targetUserMessageCount: records.filter((record) => record.isAuthoredByTargetUser).length,
    messages: records,
  };
}

function kindForFailure(error: unknown): { kind: ErrorKind; code: string } {
  if (error instanceof VaultError) {
    const remoteCode = error.context?.remoteCode;
    if (typeof remoteCode === 'string') {
      return { kind: errorKindFor(remoteCode), code: remoteCode };
    }
    switch (error.code) {
      case ErrorCode.RATE_LIMITED:
        return { kind: ErrorKind.RateLimited, code: error.code };
      case ErrorCode.AUTH_FAILED:
        return { kind: ErrorKind.AuthFailure, code: error.code };
      case ErrorCode.CONFIG_ERROR:
        return { kind: ErrorKind.ConfigurationError, code: error.code };
      default:
        return { kind: ErrorKind.Unknown, code: error.code };
    }
  }
  return { kind: ErrorKind.Unknown, code: 'unexpected' };
}

function isCancellation(error: unknown): boolean {
  return error instanceof VaultError && error.code === ErrorCode.CANCELLED;
}

/**
 * Exports one user's messages in three checkpointed phases:
 * searching → fetching_threads → writing_output → completed.
 */
export class ExportPipeline {
  private api: SlackApi;
  private store: ExportStateStore;
  private users: UserDirectory;
  private pacing: PacingController;
  private logger: Logger;
  private now: () => Date;
  private createId: () => string;
  private maxRateLimitRetries?: number;
  private checkpointInterval: number;

  constructor(deps: PipelineDeps) {
    this.api = deps.api;
    this.store = deps.store;
    this.users = deps.users;
    this.logger = deps.logger ?? silentLogger;
    this.pacing = deps.pacing ?? new PacingController({ logger: this.logger });
    this.now = deps.now ?? (() => new Date());
    this.createId = deps.createId ?? (() => randomUUID().replace(/-/g, '').slice(0, 8));
    this.maxRateLimitRetries = deps.maxRateLimitRetries;
    this.checkpointInterval = deps.checkpointInterval ?? THREAD_CHECKPOINT_INTERVAL;
  }

  async run(options: ExportOptions): Promise<ExportJob> {
    if (!options.resume) {
      requireFreshJobOptions(options);
    }
    const release = await this.store.lock(options.workspace);

    try {
      const tracker = await this.prepare(options);
      if (tracker.job.status === 'completed') {
        this.logger.info(`Export ${tracker.job.id} is already completed: ${tracker.job.outputPath}`);
        return tracker.job;
      }
      await this.drive(tracker, options.signal);
      return tracker.job;
    } finally {
      await release();
    }
  }

  private async prepare(options: ExportOptions): Promise<JobTracker> {
    const existing = await this.store.load(options.workspace);

    if (options.resume) {
      if (!existing) {
        throw new VaultError(
          ErrorCode.NOTHING_TO_RESUME,
          `No export to resume for workspace "${options.workspace}"`,
          false,
          'Start a new export without --resume'
        );
      }
      this.logger.info(`Resuming export ${existing.id} (${existing.status})`);
      return new JobTracker(existing);
    }

    if (existing && existing.status !== 'completed' && !options.force) {
      throw new VaultError(
        ErrorCode.JOB_IN_PROGRESS,
        `Export ${existing.id} for workspace "${options.workspace}" is unfinished (${existing.status})`,
        false,
        'Use --resume to continue it, or --force to start over'
      );
    }
    if (existing) {
      await this.store.delete(options.workspace);
    }

    const { dateRange, outputPath } = requireFreshJobOptions(options);
    const auth = await this.api.authTest();
    if (!auth.ok) {
      throw new VaultError(
        ErrorCode.AUTH_FAILED,
        `auth.test failed for workspace "${options.workspace}": ${auth.error}`,
        false,
        'Refresh the xoxc/xoxd tokens in the config file'
      );
    }

    const job = createExportJob({
      id: this.createId(),
      workspace: options.workspace,
      user: { id: auth.user_id, name: auth.user },
      dateRange,
      outputPath,
      now: this.now().toISOString(),
    });
    await this.store.save(options.workspace, job);
    this.logger.info(`Started export ${job.id} for ${auth.user} in ${options.workspace}`);
    return new JobTracker(job);
  }

  private async drive(tracker: JobTracker, signal?: AbortSignal): Promise<void> {
    let phase = resumePhase(tracker.job);

    try {
      if (phase === 'completed') return;
      tracker.setStatus(phase);

      if (phase === 'searching') {
        await this.search(tracker, signal);
        phase = 'fetching_threads';
      }
      if (phase === 'fetching_threads') {
        await this.fetchThreads(tracker, signal);
        phase = 'writing_output';
      }
      this.checkCancelled(signal);
      await this.writeOutput(tracker, signal);
    } catch (error) {
      if (isCancellation(error)) {
        tracker.pause();
        await this.checkpoint(tracker);
        this.logger.info(`Export ${tracker.job.id} paused during ${tracker.job.pausedFrom ?? phase}`);
        throw error;
      }

      const { kind, code } = kindForFailure(error);
      tracker.recordError(code, error instanceof Error ? error.message : String(error), this.timestamp(), kind);
      await this.checkpoint(tracker);
      throw error;
    }
  }

  private async search(tracker: JobTracker, signal?: AbortSignal): Promise<void> {
    const job = tracker.job;
    const progress = job.searchProgress;
    const query = buildExportQuery(job.user.id, job.dateRange);
    this.logger.debug(`[Search] ${query}`);

    while (!(progress.currentPage > 0 && progress.currentPage >= progress.totalPages)) {
      this.checkCancelled(signal);
      const page = progress.currentPage + 1;

      const response = await pacedCall(
        this.pacing,
        'search',
        () =>
          this.api.searchMessagesPaginated({
            query,
            page,
            count: SEARCH_PAGE_SIZE,
            sort: 'timestamp',
            sortDir: 'asc',
          }),
        { label: `search page ${page}`, signal, maxRateLimitRetries: this.maxRateLimitRetries }
      );

      if (!response.ok) {
        throw new VaultError(
          ErrorCode.API_ERROR,
          `search.messages page ${page} failed: ${response.error}`,
          false,
          undefined,
          { remoteCode: response.error }
        );
      }

      const { matches, total, paging } = response.messages;
      for (const match of matches) {
        this.recordMatch(tracker, match);
      }

      progress.currentPage = page;
      progress.totalPages = paging.pages;
      progress.totalMatches = total;
      progress.messagesFetched += matches.length;
      await this.checkpoint(tracker);

      this.logger.info(
        `Search page ${page}/${Math.max(paging.pages, page)}: ${matches.length} messages, ${job.threadProgress.pending.length} threads pending`
      );

      if (page >= paging.pages) break;
    }

    tracker.setStatus('fetching_threads');
    await this.checkpoint(tracker);
  }

  private recordMatch(tracker: JobTracker, match: SearchMatch): void {
    tracker.registerChannel(match.channel.id, match.channel.name);

    const key = threadKeyForMatch(match);
    if (key) {
      tracker.addPending(key);
      return;
    }
    tracker.appendStandalone(toMessageRecord(match, match.channel.id, tracker.job.user.id));
  }

  private async fetchThreads(tracker: JobTracker, signal?: AbortSignal): Promise<void> {
    const remaining = tracker.unfetchedKeys();
    const total = tracker.job.threadProgress.pending.length;
    let sinceCheckpoint = 0;

    this.logger.info(`Fetching ${remaining.length} of ${total} threads`);

    for (const key of remaining) {
      this.checkCancelled(signal);
      const { channelId, threadTs } = parseThreadKey(key);

      const response = await pacedCall(
        this.pacing,
        'thread',
        () => this.api.conversationsReplies(channelId, threadTs),
        { label: `thread ${key}`, signal, maxRateLimitRetries: this.maxRateLimitRetries }
      );

      if (response.ok) {
        tracker.appendThread(buildThreadRecord(key, response.messages, tracker.job.user.id));
        tracker.markFetched(key);
        this.logger.debug(`[Threads] ${key}: ${response.messages.length} messages`);
      } else if (isPermanentThreadError(response.error)) {
        tracker.markFetched(key);
        tracker.recordError(response.error, `Skipped thread ${key}: ${response.error}`, this.timestamp());
        this.logger.warn(`Skipping thread ${key}: ${response.error}`);
      } else {
        throw new VaultError(
          ErrorCode.API_ERROR,
          `conversations.replies failed for ${key}: ${response.error}`,
          false,
          undefined,
          { remoteCode: response.error, threadKey: key }
        );
      }

      sinceCheckpoint += 1;
      if (sinceCheckpoint >= this.checkpointInterval) {
        await this.checkpoint(tracker);
        sinceCheckpoint = 0;
        this.logger.info(`Threads ${tracker.job.threadProgress.cursor}/${total}`);
      }
    }

    tracker.setStatus('writing_output');
    await this.checkpoint(tracker);
  }

  private async writeOutput(tracker: JobTracker, signal?: AbortSignal): Promise<void> {
    const job = tracker.job;

    if (await this.users.isEmpty(job.workspace)) {
      const count = await this.users.refresh(job.workspace, this.api, {
        pacing: this.pacing,
        signal,
        maxRateLimitRetries: this.maxRateLimitRetries,
      });
      this.logger.debug(`[Users] Cached ${count} display names`);
    } else if (await this.users.isStale(job.workspace)) {
      this.users.triggerBackgroundRefresh(job.workspace);
    }
    const names = await this.users.lookup(job.workspace);

    const completedAt = this.timestamp();
    const document = buildExportDocument(job, names, completedAt);
    await writeFileAtomic(job.outputPath, formatJsonOutput(document));

    job.completedAt = completedAt;
    tracker.setStatus('completed');
    await this.checkpoint(tracker);

    const counts = countExport(job);
    this.logger.info(
      `Exported ${counts.standaloneMessages} messages and ${counts.threads} threads to ${job.outputPath}`
    );
  }

  private checkCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw cancelledError();
    }
  }

  private async checkpoint(tracker: JobTracker): Promise<void> {
    await this.store.save(tracker.job.workspace, tracker.touch(this.timestamp()));
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
