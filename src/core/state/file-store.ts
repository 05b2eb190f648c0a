// src/core/state/file-store.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { randomUUID } from 'node:crypto';
import { LOCK_STALE_MS } from '../config/constants.js';
import { ErrorCode, VaultError } from '../errors.js';
import type { ExportJob } from '../types/index.js';
import { parseExportJob } from './schema.js';
import type { ExportStateStore, ReleaseLock } from './store.js';

interface HeldLock {
  lockPath: string;
  content: string;
}

/**
 * One JSON file per workspace under `stateDir`, written through a temp file
 * and rename. A `<workspace>.lock` file created with exclusive-create marks
 * the single writer. Every `save` by the holder touches the lock, so it only
 * goes stale once checkpoints stop for `lockStaleMs`.
 */
export class FileExportStateStore implements ExportStateStore {
  private stateDir: string;
  private lockStaleMs: number;
  private held = new Map<string, HeldLock>();

  constructor(stateDir: string, options: { lockStaleMs?: number } = {}) {
    this.stateDir = stateDir;
    this.lockStaleMs = options.lockStaleMs ?? LOCK_STALE_MS;
  }

  async load(workspace: string): Promise<ExportJob | null> {
    const statePath = this.statePath(workspace);

    let content: string;
    try {
      content = await fs.readFile(statePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw corruptState(statePath, 'not valid JSON');
    }

    const parsed = parseExportJob(raw);
    if (!parsed.success) {
      throw corruptState(statePath, parsed.issues);
    }
    return parsed.job;
  }

  async save(workspace: string, job: ExportJob): Promise<void> {
    const statePath = this.statePath(workspace);
    const tempPath = `${statePath}.tmp`;

    await fs.mkdir(this.stateDir, { recursive: true });
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(JSON.stringify(job, null, 2));
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, statePath);
    await this.touchLock(workspace);
  }

  async delete(workspace: string): Promise<void> {
    await fs.rm(this.statePath(workspace), { force: true });
  }

  async lock(workspace: string): Promise<ReleaseLock> {
    const lockPath = path.join(this.stateDir, `${safeName(workspace)}.lock`);
    await fs.mkdir(this.stateDir, { recursive: true });

    let content: string;
    try {
      content = await this.createLock(lockPath);
    } catch (error) {
      if (!isExisting(error)) {
        throw error;
      }
      if (!(await this.isStale(lockPath))) {
        throw new VaultError(
          ErrorCode.JOB_LOCKED,
          `Another export is already running for workspace "${workspace}"`,
          true,
          `Wait for it to finish, or remove ${lockPath} if no export is running`,
          { lockPath }
        );
      }
      await fs.rm(lockPath, { force: true });
      content = await this.createLock(lockPath);
    }
    this.held.set(workspace, { lockPath, content });

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      this.held.delete(workspace);
      // A lock taken over after going stale belongs to the new holder
      if ((await readLock(lockPath)) === content) {
        await fs.rm(lockPath, { force: true });
      }
    };
  }

  private async createLock(lockPath: string): Promise<string> {
    const content = JSON.stringify({ pid: process.pid, token: randomUUID(), acquiredAt: new Date().toISOString() });
    const handle = await fs.open(lockPath, 'wx');
    try {
      await handle.writeFile(content);
    } finally {
      await handle.close();
    }
    return content;
  }

  private async touchLock(workspace: string): Promise<void> {
    const lock = this.held.get(workspace);
    if (!lock) return;
    const now = new Date();
    try {
      await fs.utimes(lock.lockPath, now, now);
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(lockPath);
      return Date.now() - stats.mtimeMs > this.lockStaleMs;
    } catch (error) {
      return isMissing(error);
    }
  }

  private statePath(workspace: string): string {
    return path.join(this.stateDir, `${safeName(workspace)}.json`);
  }
}

function safeName(workspace: string): string {
  return workspace.replace(/[^\w.-]/g, '_');
}

async function readLock(lockPath: string): Promise<string | null> {
  try {
    return await fs.readFile(lockPath, 'utf-8');
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

function corruptState(statePath: string, issues: string): VaultError {
  return new VaultError(
    ErrorCode.STATE_CORRUPT,
    `Export state at ${statePath} is unreadable: ${issues}`,
    false,
    'Run "slack-vault reset" for this workspace to discard it',
    { statePath }
  );
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

function isExisting(error: unknown): boolean {
  return errorCode(error) === 'EEXIST';
}
