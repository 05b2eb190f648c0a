// src/core/slack/types.ts

export interface SlackErrorResponse {
  ok: false;
  error: string;
  /** Seconds from the `Retry-After` header on HTTP 429. */
  retryAfter?: number;
}

export type SlackResponse<T> = (T & { ok: true }) | SlackErrorResponse;

export function isSlackError<T>(response: SlackResponse<T>): response is SlackErrorResponse {
  return response.ok === false;
}

export interface SlackBlockElement {
  type: string;
  text?: string | { type: string; text: string };
  elements?: SlackBlockElement[];
}

export interface SlackBlock {
  type: string;
  text?: { type: string; text: string };
  elements?: SlackBlockElement[];
}

export interface SlackMessage {
  ts: string;
  user?: string;
  username?: string;
  bot_id?: string;
  text?: string;
  blocks?: SlackBlock[];
  thread_ts?: string;
  reply_count?: number;
  subtype?: string;
  permalink?: string;
}

export interface SearchMatch extends SlackMessage {
  channel: {
    id: string;
    name?: string;
    is_im?: boolean;
    is_mpim?: boolean;
    is_private?: boolean;
  };
  iid?: string;
}

export interface AuthTestResult {
  url: string;
  team?: string;
  team_id?: string;
  user: string;
  user_id: string;
}

export interface SearchResult {
  query?: string;
  messages: {
    matches: SearchMatch[];
    total: number;
    paging: {
      count?: number;
      total?: number;
      page?: number;
      pages: number;
    };
  };
}

export interface RepliesResult {
  messages: SlackMessage[];
  has_more?: boolean;
}

export interface HistoryResult {
  messages: SlackMessage[];
  has_more?: boolean;
}

export interface SlackUser {
  id: string;
  name: string;
  deleted?: boolean;
  is_bot?: boolean;
  real_name?: string;
  profile?: {
    display_name?: string;
    real_name?: string;
  };
}

export interface UsersListResult {
  members: SlackUser[];
  response_metadata?: { next_cursor?: string };
}

export interface SlackConversation {
  id: string;
  name?: string;
  is_im?: boolean;
  is_mpim?: boolean;
  is_private?: boolean;
  user?: string;
}

export interface ChannelsListResult {
  channels: SlackConversation[];
  response_metadata?: { next_cursor?: string };
}

export interface PostMessageResult {
  channel: string;
  ts: string;
}

export type SortDirection = 'asc' | 'desc';

export interface SearchParams {
  query: string;
  page: number;
  count: number;
  sort?: 'timestamp' | 'score';
  sortDir?: SortDirection;
}

/**
 * The remote message source. Only the first three calls are used by the
 * export pipeline and digest; the rest back the pass-through CLI commands.
 */
export interface SlackApi {
  authTest(): Promise<SlackResponse<AuthTestResult>>;
  searchMessagesPaginated(params: SearchParams): Promise<SlackResponse<SearchResult>>;
  conversationsReplies(channel: string, threadTs: string): Promise<SlackResponse<RepliesResult>>;

  conversationsHistory(channel: string, limit?: number): Promise<SlackResponse<HistoryResult>>;
  usersList(cursor?: string, limit?: number): Promise<SlackResponse<UsersListResult>>;
  channelsList(types?: string, cursor?: string, limit?: number): Promise<SlackResponse<ChannelsListResult>>;
  postMessage(channel: string, text: string, threadTs?: string): Promise<SlackResponse<PostMessageResult>>;
}
