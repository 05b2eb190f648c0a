// src/core/state/job.ts
import { errorKindFor, type ErrorKind } from '../errors.js';
import { classifyChannel } from '../slack/messages.js';
import type {
  ActiveStatus,
  DateRange,
  ExportJob,
  JobStatus,
  MessageRecord,
  ThreadKey,
  ThreadRecord,
  UserIdentity,
} from '../types/index.js';

export interface NewJobInput {
  id: string;
  workspace: string;
  user: UserIdentity;
  dateRange: DateRange;
  outputPath: string;
  now: string;
}

export function createExportJob(input: NewJobInput): ExportJob {
  return {
    id: input.id,
    workspace: input.workspace,
    user: input.user,
    status: 'searching',
    dateRange: input.dateRange,
    outputPath: input.outputPath,
    searchProgress: { totalMatches: 0, totalPages: 0, currentPage: 0, messagesFetched: 0 },
    threadProgress: { pending: [], fetched: [], cursor: 0 },
    accumulatedData: { channels: {}, threads: [], standaloneMessages: [] },
    errors: [],
    createdAt: input.now,
    updatedAt: input.now,
  };
}

/** The phase a job continues in: its status, or the status it was paused from. */
export function resumePhase(job: ExportJob): ActiveStatus | 'completed' {
  if (job.status === 'paused') {
    return job.pausedFrom ?? 'searching';
  }
  return job.status;
}

/**
 * Mutation surface over an `ExportJob`. Keeps set views of the pending and
 * fetched thread keys so inserts stay idempotent while the job itself stays
 * plain JSON.
 */
export class JobTracker {
  readonly job: ExportJob;
  private pending: Set<ThreadKey>;
  private fetched: Set<ThreadKey>;

  constructor(job: ExportJob) {
    this.job = job;
    this.pending = new Set(job.threadProgress.pending);
    this.fetched = new Set(job.threadProgress.fetched);
  }

  /** False when the key was already pending. */
  addPending(key: ThreadKey): boolean {
    if (this.pending.has(key)) {
      return false;
    }
    this.pending.add(key);
    this.job.threadProgress.pending.push(key);
    return true;
  }

  isFetched(key: ThreadKey): boolean {
    return this.fetched.has(key);
  }

  markFetched(key: ThreadKey): void {
    if (this.fetched.has(key)) {
      return;
    }
    this.fetched.add(key);
    this.job.threadProgress.fetched.push(key);
    this.job.threadProgress.cursor = this.fetched.size;
  }

  unfetchedKeys(): ThreadKey[] {
    return this.job.threadProgress.pending.filter((key) => !this.fetched.has(key));
  }

  allFetched(): boolean {
    return this.job.threadProgress.pending.every((key) => this.fetched.has(key));
  }

  registerChannel(channelId: string, name?: string): void {
    const channels = this.job.accumulatedData.channels;
    if (channels[channelId]) {
      if (name && !channels[channelId].name) {
        channels[channelId].name = name;
      }
      return;
    }
    channels[channelId] = {
      id: channelId,
      type: classifyChannel(channelId),
      ...(name ? { name } : {}),
    };
  }

  appendStandalone(message: MessageRecord): void {
    this.job.accumulatedData.standaloneMessages.push(message);
  }

  appendThread(thread: ThreadRecord): void {
    this.job.accumulatedData.threads.push(thread);
  }

  recordError(code: string, detail: string, at: string, kind: ErrorKind = errorKindFor(code)): void {
    this.job.errors.push({ timestamp: at, kind, code, detail });
  }

  setStatus(status: Exclude<JobStatus, 'paused'>): void {
    this.job.status = status;
    delete this.job.pausedFrom;
  }

  pause(): void {
    if (this.job.status === 'paused' || this.job.status === 'completed') {
      return;
    }
    this.job.pausedFrom = this.job.status;
    this.job.status = 'paused';
  }

  touch(at: string): ExportJob {
    this.job.updatedAt = at;
    return this.job;
  }
}
