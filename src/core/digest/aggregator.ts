// src/core/digest/aggregator.ts
import { DIGEST_DEFAULT_HOURS, DIGEST_MAX_SEARCH_PAGES, DIGEST_TEXT_LIMIT, SEARCH_PAGE_SIZE } from '../config/constants.js';
import { ErrorCode, VaultError } from '../errors.js';
import { shiftDate } from '../export/pipeline.js';
import { silentLogger, type Logger } from '../logger.js';
import { PacingController } from '../pacing/controller.js';
import { pacedCall } from '../pacing/paced-call.js';
import {
  authorOf,
  compareTs,
  extractText,
  extractThreadTs,
  isSystemNotice,
  toThreadKey,
  truncate,
} from '../slack/messages.js';
import type { SearchMatch, SlackApi, SlackMessage } from '../slack/types.js';
import type { ThreadKey } from '../types/index.js';
import type { DisplayNames, UserDirectory } from '../users/cache.js';
import type { DigestEntry, DigestReport, MentionRecord, ReplyRecord } from './types.js';

export interface DigestWorkspace {
  name: string;
  api: SlackApi;
}

export interface DigestOptions {
  workspaces: DigestWorkspace[];
  hours?: number;
  signal?: AbortSignal;
}

export interface DigestDeps {
  users: UserDirectory;
  logger?: Logger;
  now?: () => Date;
  pacingFor?: (workspace: string) => PacingController;
  maxSearchPages?: number;
  maxRateLimitRetries?: number;
}

interface WorkspaceRun {
  workspace: string;
  api: SlackApi;
  pacing: PacingController;
  userId: string;
  names: DisplayNames;
  windowStart: string;
  afterDate: string;
  threads: Map<ThreadKey, SlackMessage[] | null>;
  signal?: AbortSignal;
}

/** Seconds since the epoch in Slack's `seconds.micros` timestamp form. */
function toSlackTs(date: Date): string {
  return (date.getTime() / 1000).toFixed(6);
}

function messageKey(channelId: string, ts: string): string {
  return `${channelId}:${ts}`;
}

/**
 * One-shot report of who mentioned the user and who replied in the user's
 * threads within a lookback window, across workspaces.
 */
export class DigestAggregator {
  private users: UserDirectory;
  private logger: Logger;
  private now: () => Date;
  private pacingFor: (workspace: string) => PacingController;
  private maxSearchPages: number;
  private maxRateLimitRetries?: number;

  constructor(deps: DigestDeps) {
    this.users = deps.users;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.pacingFor = deps.pacingFor ?? (() => new PacingController({ logger: this.logger }));
    this.maxSearchPages = deps.maxSearchPages ?? DIGEST_MAX_SEARCH_PAGES;
    this.maxRateLimitRetries = deps.maxRateLimitRetries;
  }

  async run(options: DigestOptions): Promise<DigestReport> {
    const hours = options.hours ?? DIGEST_DEFAULT_HOURS;
    const to = this.now();
    const from = new Date(to.getTime() - hours * 60 * 60 * 1000);

    const report: DigestReport = {
      period: { from: from.toISOString(), to: to.toISOString(), hours },
      workspaces: [],
      skippedWorkspaces: [],
      mentions: [],
      replies: [],
      summary: { totalMentions: 0, unhandledMentions: 0, totalReplies: 0 },
    };
    // Shared across workspaces so a message lands in one section only
    const seen = new Set<string>();

    for (const workspace of options.workspaces) {
      try {
        const result = await this.processWorkspace(workspace, from, seen, options.signal);
        if ('skipped' in result) {
          report.skippedWorkspaces.push({ workspace: workspace.name, reason: result.skipped });
          continue;
        }
        report.workspaces.push(workspace.name);
        report.mentions.push(...result.mentions);
        report.replies.push(...result.replies);
      } catch (error) {
        if (error instanceof VaultError && error.code === ErrorCode.CANCELLED) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error(`[Digest] ${workspace.name}: ${reason}`);
        report.skippedWorkspaces.push({ workspace: workspace.name, reason });
      }
    }

    report.summary = {
      totalMentions: report.mentions.length,
      unhandledMentions: report.mentions.filter((mention) => !mention.handled).length,
      totalReplies: report.replies.length,
    };
    return report;
  }

  private async processWorkspace(
    workspace: DigestWorkspace,
    from: Date,
    seen: Set<string>,
    signal?: AbortSignal
  ): Promise<{ mentions: MentionRecord[]; replies: ReplyRecord[] } | { skipped: string }> {
    const auth = await workspace.api.authTest();
    if (!auth.ok) {
      this.logger.error(`[Digest] ${workspace.name}: auth.test failed (${auth.error}), skipping`);
      return { skipped: `auth_failed: ${auth.error}` };
    }

    const pacing = this.pacingFor(workspace.name);
    if (await this.users.isEmpty(workspace.name)) {
      const count = await this.users.refresh(workspace.name, workspace.api, {
        pacing,
        signal,
        maxRateLimitRetries: this.maxRateLimitRetries,
      });
      this.logger.debug(`[Digest] ${workspace.name}: cached ${count} display names`);
    } else if (await this.users.isStale(workspace.name)) {
      this.users.triggerBackgroundRefresh(workspace.name);
    }

    const run: WorkspaceRun = {
      workspace: workspace.name,
      api: workspace.api,
      pacing,
      userId: auth.user_id,
      names: await this.users.lookup(workspace.name),
      windowStart: toSlackTs(from),
      afterDate: shiftDate(from.toISOString().slice(0, 10), -1),
      threads: new Map(),
      signal,
    };

    const mentions = await this.collectMentions(run, seen);
    const replies = await this.collectReplies(run, seen);
    this.logger.info(`${workspace.name}: ${mentions.length} mentions, ${replies.length} replies`);
    return { mentions, replies };
  }

  private async collectMentions(run: WorkspaceRun, seen: Set<string>): Promise<MentionRecord[]> {
    const matches = await this.searchAll(run, `<@${run.userId}> after:${run.afterDate}`);
    const mentions: MentionRecord[] = [];

    for (const match of matches) {
      const channelId = match.channel.id;
      const key = messageKey(channelId, match.ts);
      if (compareTs(match.ts, run.windowStart) <= 0 || seen.has(key) || match.user === run.userId) {
        continue;
      }
      seen.add(key);

      const threadTs = extractThreadTs(match) ?? match.ts;
      const thread = await this.fetchThread(run, channelId, threadTs);
      const handled = (thread ?? []).some(
        (message) => message.user === run.userId && compareTs(message.ts, match.ts) > 0
      );

      mentions.push({
        ...this.entryFor(run, match, channelId, threadTs, match.channel.name),
        ...(match.permalink ? { permalink: match.permalink } : {}),
        handled,
      });
    }

    return mentions;
  }

  private async collectReplies(run: WorkspaceRun, seen: Set<string>): Promise<ReplyRecord[]> {
    const ownMessages = await this.searchAll(run, `from:<@${run.userId}> after:${run.afterDate}`);
    const visited = new Set<ThreadKey>();
    const replies: ReplyRecord[] = [];

    for (const own of ownMessages) {
      const channelId = own.channel.id;
      const threadTs = extractThreadTs(own) ?? own.ts;
      const threadKey = toThreadKey(channelId, threadTs);
      if (visited.has(threadKey)) {
        continue;
      }
      visited.add(threadKey);

      const thread = await this.fetchThread(run, channelId, threadTs);
      if (!thread) {
        continue;
      }

      const latestOwn = thread
        .filter((message) => message.user === run.userId)
        .reduce((latest, message) => (compareTs(message.ts, latest) > 0 ? message.ts : latest), '0');

      for (const message of thread) {
        const key = messageKey(channelId, message.ts);
        if (
          authorOf(message) === run.userId ||
          compareTs(message.ts, run.windowStart) < 0 ||
          seen.has(key) ||
          isSystemNotice(message)
        ) {
          continue;
        }
        seen.add(key);
        replies.push({
          ...this.entryFor(run, message, channelId, threadTs, own.channel.name),
          afterLastOwnMessage: compareTs(message.ts, latestOwn) > 0,
        });
      }
    }

    return replies;
  }

  private entryFor(
    run: WorkspaceRun,
    message: SlackMessage,
    channelId: string,
    threadTs: string,
    channelName?: string
  ): DigestEntry {
    const senderId = authorOf(message);
    return {
      workspace: run.workspace,
      channelId,
      ...(channelName ? { channelName } : {}),
      senderId,
      senderName: run.names[senderId] ?? message.username ?? senderId,
      text: truncate(extractText(message), DIGEST_TEXT_LIMIT),
      timestamp: message.ts,
      threadTs,
    };
  }

  private async searchAll(run: WorkspaceRun, query: string): Promise<SearchMatch[]> {
    const matches: SearchMatch[] = [];

    for (let page = 1; page <= this.maxSearchPages; page++) {
      const response = await pacedCall(
        run.pacing,
        'search',
        () => run.api.searchMessagesPaginated({ query, page, count: SEARCH_PAGE_SIZE, sort: 'timestamp', sortDir: 'desc' }),
        { label: `search "${query}"`, signal: run.signal, maxRateLimitRetries: this.maxRateLimitRetries }
      );
      if (!response.ok) {
        throw new VaultError(ErrorCode.API_ERROR, `search.messages failed: ${response.error}`, false, undefined, {
          remoteCode: response.error,
        });
      }

      matches.push(...response.messages.matches);
      if (page >= response.messages.paging.pages) break;
    }

    this.logger.debug(`[Digest] ${run.workspace}: "${query}" → ${matches.length} matches`);
    return matches;
  }

  /** Each thread is fetched once per workspace; unavailable threads come back as null. */
  private async fetchThread(run: WorkspaceRun, channelId: string, threadTs: string): Promise<SlackMessage[] | null> {
    const key = toThreadKey(channelId, threadTs);
    const cached = run.threads.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const response = await pacedCall(
      run.pacing,
      'thread',
      () => run.api.conversationsReplies(channelId, threadTs),
      { label: `thread ${key}`, signal: run.signal, maxRateLimitRetries: this.maxRateLimitRetries }
    );

    const messages = response.ok ? response.messages : null;
    if (!response.ok) {
      this.logger.debug(`[Digest] ${run.workspace}: thread ${key} unavailable (${response.error})`);
    }
    run.threads.set(key, messages);
    return messages;
  }
}
