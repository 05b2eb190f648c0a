// src/core/state/store.ts
import type { ExportJob } from '../types/index.js';

export type ReleaseLock = () => Promise<void>;

/**
 * Durable, workspace-keyed record of export jobs.
 *
 * Single writer per workspace: callers take `lock(workspace)` before
 * mutating a job and must release it on every exit path. A second `lock`
 * for a held workspace rejects with `job_locked` instead of waiting.
 */
export interface ExportStateStore {
  load(workspace: string): Promise<ExportJob | null>;
  /** Overwrites; durable once the promise resolves. */
  save(workspace: string, job: ExportJob): Promise<void>;
  delete(workspace: string): Promise<void>;
  lock(workspace: string): Promise<ReleaseLock>;
}
