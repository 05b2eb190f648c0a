// src/core/config/constants.ts
export const APP_NAME = 'slack-vault';

export const SLACK_API_BASE_URL = 'https://slack.com/api';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36';

// Pacing: ceilings sit below the platform's per-minute quotas (search 20, replies 50, users 20)
export const PACING_WINDOW_MS = 60_000;
export const PACING_SAFETY_MARGIN_MS = 1_000;
export const TIER_CEILINGS = {
  search: 18,
  thread: 45,
  users: 18,
} as const;
export const BACKOFF_BASE_SECONDS = 30;
export const BACKOFF_CAP_SECONDS = 300;
export const MAX_RATE_LIMIT_RETRIES = 8;

export const SEARCH_PAGE_SIZE = 100;
export const THREAD_CHECKPOINT_INTERVAL = 10;

export const DIGEST_DEFAULT_HOURS = 24;
export const DIGEST_MAX_SEARCH_PAGES = 3;
export const DIGEST_TEXT_LIMIT = 500;

export const USER_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const LOCK_STALE_MS = 6 * 60 * 60 * 1000;
