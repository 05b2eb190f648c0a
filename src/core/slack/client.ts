// src/core/slack/client.ts
import { DEFAULT_USER_AGENT, SLACK_API_BASE_URL } from '../config/constants.js';
import { ErrorCode, VaultError } from '../errors.js';
import type {
  AuthTestResult,
  ChannelsListResult,
  HistoryResult,
  PostMessageResult,
  RepliesResult,
  SearchParams,
  SearchResult,
  SlackApi,
  SlackResponse,
  UsersListResult,
} from './types.js';

export interface SlackClientOptions {
  xoxcToken: string;
  xoxdToken: string;
  userAgent?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Calls the web API the way the desktop web client does: a browser session
 * token in the form body and the `d` cookie alongside it.
 */
export class SlackClient implements SlackApi {
  private token: string;
  private cookie: string;
  private userAgent: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: SlackClientOptions) {
    this.token = options.xoxcToken;
    this.cookie = `d=${options.xoxdToken}`;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.baseUrl = options.baseUrl ?? SLACK_API_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  authTest(): Promise<SlackResponse<AuthTestResult>> {
    return this.post('auth.test');
  }

  searchMessagesPaginated(params: SearchParams): Promise<SlackResponse<SearchResult>> {
    return this.post('search.messages', {
      query: params.query,
      page: String(params.page),
      count: String(params.count),
      sort: params.sort ?? 'timestamp',
      sort_dir: params.sortDir ?? 'desc',
    });
  }

  conversationsReplies(channel: string, threadTs: string): Promise<SlackResponse<RepliesResult>> {
    return this.post('conversations.replies', {
      channel,
      ts: threadTs,
      limit: '1000',
    });
  }

  conversationsHistory(channel: string, limit: number = 100): Promise<SlackResponse<HistoryResult>> {
    return this.post('conversations.history', {
      channel,
      limit: String(limit),
    });
  }

  usersList(cursor?: string, limit: number = 200): Promise<SlackResponse<UsersListResult>> {
    return this.post('users.list', {
      limit: String(limit),
      ...(cursor ? { cursor } : {}),
    });
  }

  channelsList(
    types: string = 'public_channel,private_channel,im,mpim',
    cursor?: string,
    limit: number = 200
  ): Promise<SlackResponse<ChannelsListResult>> {
    return this.post('conversations.list', {
      types,
      limit: String(limit),
      exclude_archived: 'true',
      ...(cursor ? { cursor } : {}),
    });
  }

  postMessage(channel: string, text: string, threadTs?: string): Promise<SlackResponse<PostMessageResult>> {
    return this.post('chat.postMessage', {
      channel,
      text,
      unfurl_links: 'true',
      unfurl_media: 'true',
      ...(threadTs ? { thread_ts: threadTs } : {}),
    });
  }

  private async post<T>(method: string, data: Record<string, string> = {}): Promise<SlackResponse<T>> {
    const body = new URLSearchParams({
      token: this.token,
      _x_reason: 'api-call',
      _x_mode: 'online',
      _x_sonic: 'true',
      _x_app_name: 'client',
      ...data,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/${method}`, {
        method: 'POST',
        headers: {
          'User-Agent': this.userAgent,
          'Accept-Language': 'en-US,en;q=0.9',
          'Content-Type': 'application/x-www-form-urlencoded',
          Cookie: this.cookie,
        },
        body,
      });
    } catch (error) {
      throw new VaultError(
        ErrorCode.NETWORK_ERROR,
        `${method} request failed: ${error instanceof Error ? error.message : String(error)}`,
        true,
        'Check your network connection and try again'
      );
    }

    if (response.status === 429) {
      const retryAfter = Number.parseInt(response.headers.get('retry-after') ?? '', 10);
      return {
        ok: false,
        error: 'ratelimited',
        ...(Number.isFinite(retryAfter) ? { retryAfter } : {}),
      };
    }

    const payload: unknown = await response.json().catch(() => null);
    if (!isSlackEnvelope(payload)) {
      throw new VaultError(
        ErrorCode.API_ERROR,
        `${method} returned an unexpected response (HTTP ${response.status})`,
        response.status >= 500
      );
    }

    return payload as SlackResponse<T>;
  }
}

function isSlackEnvelope(value: unknown): value is { ok: boolean } {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}
