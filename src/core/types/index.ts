// src/core/types/index.ts
import type { ErrorKind } from '../errors.js';

export type ChannelType = 'channel' | 'dm' | 'group' | 'unknown';

export type JobStatus =
  | 'searching'
  | 'fetching_threads'
  | 'writing_output'
  | 'completed'
  | 'paused';

export type ActiveStatus = Exclude<JobStatus, 'completed' | 'paused'>;

/** `channelId:threadTs` */
export type ThreadKey = string;

export interface ChannelMeta {
  id: string;
  name?: string;
  type: ChannelType;
}

export interface MessageRecord {
  timestamp: string;
  channelId: string;
  authorId: string;
  text: string;
  isAuthoredByTargetUser: boolean;
  permalink?: string;
}

export interface ThreadRecord {
  threadKey: ThreadKey;
  channelId: string;
  threadTs: string;
  totalMessageCount: number;
  targetUserMessageCount: number;
  messages: MessageRecord[];
}

export interface JobErrorEntry {
  timestamp: string;
  kind: ErrorKind;
  code: string;
  detail: string;
}

export interface DateRange {
  from: string;      // YYYY-MM-DD
  to?: string;       // YYYY-MM-DD, open-ended when absent
}

export interface UserIdentity {
  id: string;
  name: string;
}

export interface SearchProgress {
  totalMatches: number;
  totalPages: number;
  currentPage: number;
  messagesFetched: number;
}

export interface ThreadProgress {
  pending: ThreadKey[];
  fetched: ThreadKey[];
  cursor: number;
}

export interface AccumulatedData {
  channels: Record<string, ChannelMeta>;
  threads: ThreadRecord[];
  standaloneMessages: MessageRecord[];
}

export interface ExportJob {
  id: string;
  workspace: string;
  user: UserIdentity;
  status: JobStatus;
  pausedFrom?: ActiveStatus;
  dateRange: DateRange;
  outputPath: string;
  searchProgress: SearchProgress;
  threadProgress: ThreadProgress;
  accumulatedData: AccumulatedData;
  errors: JobErrorEntry[];
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}
