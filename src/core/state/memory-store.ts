// src/core/state/memory-store.ts
import { ErrorCode, VaultError } from '../errors.js';
import type { ExportJob } from '../types/index.js';
import { parseExportJob } from './schema.js';
import type { ExportStateStore, ReleaseLock } from './store.js';

/** Non-persistent store. Jobs are deep-copied in and out, as a file round trip would. */
export class InMemoryExportStateStore implements ExportStateStore {
  private jobs = new Map<string, string>();
  private locks = new Set<string>();
  saveCount = 0;

  async load(workspace: string): Promise<ExportJob | null> {
    const serialized = this.jobs.get(workspace);
    if (!serialized) return null;
    const parsed = parseExportJob(JSON.parse(serialized));
    if (!parsed.success) {
      throw new VaultError(ErrorCode.STATE_CORRUPT, `Stored job for "${workspace}" is invalid: ${parsed.issues}`);
    }
    return parsed.job;
  }

  async save(workspace: string, job: ExportJob): Promise<void> {
    this.saveCount += 1;
    this.jobs.set(workspace, JSON.stringify(job));
  }

  async delete(workspace: string): Promise<void> {
    this.jobs.delete(workspace);
  }

  async lock(workspace: string): Promise<ReleaseLock> {
    if (this.locks.has(workspace)) {
      throw new VaultError(
        ErrorCode.JOB_LOCKED,
        `Another export is already running for workspace "${workspace}"`,
        true
      );
    }
    this.locks.add(workspace);
    return async () => {
      this.locks.delete(workspace);
    };
  }

  isLocked(workspace: string): boolean {
    return this.locks.has(workspace);
  }
}
