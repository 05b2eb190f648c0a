// src/core/export/document.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import type { DisplayNames } from '../users/cache.js';
import type {
  ChannelMeta,
  DateRange,
  ExportJob,
  MessageRecord,
  ThreadRecord,
  UserIdentity,
} from '../types/index.js';

export interface ExportCounts {
  totalMatches: number;
  standaloneMessages: number;
  threads: number;
  threadMessages: number;
  targetUserThreadMessages: number;
  skippedThreads: number;
}

export interface ExportDocument {
  metadata: {
    jobId: string;
    workspace: string;
    user: UserIdentity;
    dateRange: DateRange;
    completedAt: string;
    counts: ExportCounts;
  };
  users: DisplayNames;
  channels: Record<string, ChannelMeta>;
  threads: ThreadRecord[];
  standaloneMessages: MessageRecord[];
}

export function countExport(job: ExportJob): ExportCounts {
  const { threads, standaloneMessages } = job.accumulatedData;
  return {
    totalMatches: job.searchProgress.totalMatches,
    standaloneMessages: standaloneMessages.length,
    threads: threads.length,
    threadMessages: threads.reduce((sum, thread) => sum + thread.totalMessageCount, 0),
    targetUserThreadMessages: threads.reduce((sum, thread) => sum + thread.targetUserMessageCount, 0),
    skippedThreads: job.threadProgress.fetched.length - threads.length,
  };
}

/** Only authors that appear in the export make it into the name table. */
export function buildExportDocument(job: ExportJob, names: DisplayNames, completedAt: string): ExportDocument {
  const authors = new Set<string>();
  for (const message of job.accumulatedData.standaloneMessages) {
    authors.add(message.authorId);
  }
  for (const thread of job.accumulatedData.threads) {
    for (const message of thread.messages) {
      authors.add(message.authorId);
    }
  }

  const users: DisplayNames = {};
  for (const id of [...authors].sort()) {
    users[id] = names[id] ?? (id === job.user.id ? job.user.name : id);
  }

  return {
    metadata: {
      jobId: job.id,
      workspace: job.workspace,
      user: job.user,
      dateRange: job.dateRange,
      completedAt,
      counts: countExport(job),
    },
    users,
    channels: job.accumulatedData.channels,
    threads: job.accumulatedData.threads,
    standaloneMessages: job.accumulatedData.standaloneMessages,
  };
}

export function formatJsonOutput(document: unknown): string {
  return JSON.stringify(document, null, 2) + '\n';
}

/** Writes through a sibling temp file so readers never see a partial file. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, filePath);
}
