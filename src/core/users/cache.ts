// src/core/users/cache.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { spawn } from 'child_process';
import { z } from 'zod';
import { USER_CACHE_TTL_MS } from '../config/constants.js';
import { ErrorCode, VaultError } from '../errors.js';
import { PacingController } from '../pacing/controller.js';
import { pacedCall } from '../pacing/paced-call.js';
import { isSlackError, type SlackApi, type SlackUser } from '../slack/types.js';

export type DisplayNames = Record<string, string>;

/**
 * Author-id → display-name lookup, refreshed out of band. Every `lookup`
 * is a fresh snapshot; the underlying data may change between calls.
 */
export interface UserDirectory {
  lookup(workspace: string): Promise<DisplayNames>;
  isEmpty(workspace: string): Promise<boolean>;
  isStale(workspace: string): Promise<boolean>;
  /** Fire-and-forget. */
  triggerBackgroundRefresh(workspace: string): void;
  /** Synchronous fill, used on a cold cache. */
  refresh(workspace: string, api: SlackApi, options?: UserFetchOptions): Promise<number>;
}

export interface UserFetchOptions {
  /** Shared with the caller's other calls; a private controller otherwise. */
  pacing?: PacingController;
  signal?: AbortSignal;
  maxRateLimitRetries?: number;
}

const UserCacheFileSchema = z.object({
  version: z.number(),
  fetchedAt: z.string(),
  users: z.record(z.string()),
});

type UserCacheFile = z.infer<typeof UserCacheFileSchema>;

export function displayNameOf(user: SlackUser): string {
  return user.profile?.display_name || user.profile?.real_name || user.real_name || user.name;
}

export async function fetchAllUsers(api: SlackApi, options: UserFetchOptions = {}): Promise<DisplayNames> {
  const pacing = options.pacing ?? new PacingController();
  const users: DisplayNames = {};
  let cursor: string | undefined;

  do {
    const page = cursor;
    const response = await pacedCall(pacing, 'users', () => api.usersList(page), {
      label: 'users.list',
      signal: options.signal,
      maxRateLimitRetries: options.maxRateLimitRetries,
    });
    if (isSlackError(response)) {
      throw new VaultError(ErrorCode.API_ERROR, `users.list failed: ${response.error}`, false, undefined, {
        remoteCode: response.error,
      });
    }
    for (const member of response.members) {
      users[member.id] = displayNameOf(member);
    }
    cursor = response.response_metadata?.next_cursor || undefined;
  } while (cursor);

  return users;
}

export type RefreshLauncher = (workspace: string) => void;

/** Re-runs this CLI detached: `users refresh --workspace <name>`. */
export const spawnRefreshProcess: RefreshLauncher = (workspace) => {
  const entry = process.argv[1];
  if (!entry) return;
  const child = spawn(process.execPath, [entry, 'users', 'refresh', '--workspace', workspace], {
    detached: true,
    stdio: 'ignore',
  });
  child.on('error', (error) => {
    console.warn(`⚠ Background user refresh for ${workspace} failed to start: ${error.message}`);
  });
  child.unref();
};

export class FileUserCache implements UserDirectory {
  private usersDir: string;
  private ttlMs: number;
  private launcher: RefreshLauncher;

  constructor(usersDir: string, options: { ttlMs?: number; launcher?: RefreshLauncher } = {}) {
    this.usersDir = usersDir;
    this.ttlMs = options.ttlMs ?? USER_CACHE_TTL_MS;
    this.launcher = options.launcher ?? spawnRefreshProcess;
  }

  async lookup(workspace: string): Promise<DisplayNames> {
    const file = await this.read(workspace);
    return file?.users ?? {};
  }

  async isEmpty(workspace: string): Promise<boolean> {
    const file = await this.read(workspace);
    return !file || Object.keys(file.users).length === 0;
  }

  async isStale(workspace: string): Promise<boolean> {
    const file = await this.read(workspace);
    if (!file) return true;
    const fetchedAt = Date.parse(file.fetchedAt);
    return Number.isNaN(fetchedAt) || Date.now() - fetchedAt > this.ttlMs;
  }

  triggerBackgroundRefresh(workspace: string): void {
    this.launcher(workspace);
  }

  async refresh(workspace: string, api: SlackApi, options: UserFetchOptions = {}): Promise<number> {
    const users = await fetchAllUsers(api, options);
    await this.write(workspace, users);
    return Object.keys(users).length;
  }

  async write(workspace: string, users: DisplayNames, fetchedAt: Date = new Date()): Promise<void> {
    const cachePath = this.cachePath(workspace);
    const tempPath = `${cachePath}.${process.pid}.tmp`;
    const file: UserCacheFile = { version: 1, fetchedAt: fetchedAt.toISOString(), users };

    await fs.mkdir(this.usersDir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(file, null, 2));
    await fs.rename(tempPath, cachePath);
  }

  // A refresh may be rewriting the file; anything unreadable counts as empty.
  private async read(workspace: string): Promise<UserCacheFile | null> {
    try {
      const content = await fs.readFile(this.cachePath(workspace), 'utf-8');
      const parsed = UserCacheFileSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private cachePath(workspace: string): string {
    return path.join(this.usersDir, `${workspace.replace(/[^\w.-]/g, '_')}.json`);
  }
}
