// src/core/state/schema.ts
import { z } from 'zod';
import { ErrorKind } from '../errors.js';
import type { ExportJob } from '../types/index.js';

const MessageRecordSchema = z.object({
  timestamp: z.string(),
  channelId: z.string(),
  authorId: z.string(),
  text: z.string(),
  isAuthoredByTargetUser: z.boolean(),
  permalink: z.string().optional(),
});

const ThreadRecordSchema = z.object({
  threadKey: z.string(),
  channelId: z.string(),
  threadTs: z.string(),
  totalMessageCount: z.number().int().nonnegative(),
  targetUserMessageCount: z.number().int().nonnegative(),
  messages: z.array(MessageRecordSchema),
});

const ChannelMetaSchema = z.object({
  id: z.string(),
  type: z.enum(['channel', 'dm', 'group', 'unknown']),
  name: z.string().optional(),
});

const ActiveStatusSchema = z.enum(['searching', 'fetching_threads', 'writing_output']);

export const ExportJobSchema = z.object({
  id: z.string().min(1),
  workspace: z.string().min(1),
  user: z.object({ id: z.string(), name: z.string() }),
  status: z.union([ActiveStatusSchema, z.literal('completed'), z.literal('paused')]),
  pausedFrom: ActiveStatusSchema.optional(),
  dateRange: z.object({ from: z.string(), to: z.string().optional() }),
  outputPath: z.string(),
  searchProgress: z.object({
    totalMatches: z.number().int().nonnegative(),
    totalPages: z.number().int().nonnegative(),
    currentPage: z.number().int().nonnegative(),
    messagesFetched: z.number().int().nonnegative(),
  }),
  threadProgress: z.object({
    pending: z.array(z.string()),
    fetched: z.array(z.string()),
    cursor: z.number().int().nonnegative(),
  }),
  accumulatedData: z.object({
    channels: z.record(ChannelMetaSchema),
    threads: z.array(ThreadRecordSchema),
    standaloneMessages: z.array(MessageRecordSchema),
  }),
  errors: z.array(
    z.object({
      timestamp: z.string(),
      kind: z.nativeEnum(ErrorKind),
      code: z.string(),
      detail: z.string(),
    })
  ),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
}).refine(
  (job) => job.status !== 'paused' || job.pausedFrom !== undefined,
  { message: 'paused jobs must record the status they were paused from', path: ['pausedFrom'] }
);

export function parseExportJob(raw: unknown): { success: true; job: ExportJob } | { success: false; issues: string } {
  const parsed = ExportJobSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    };
  }
  return { success: true, job: parsed.data };
}
