// src/core/slack/permalink.ts
import { ErrorCode, VaultError } from '../errors.js';
import type { SlackApi } from './types.js';

export type LinkStyle = 'app' | 'browser';

/** `https://acme.slack.com/` → `acme` */
export function teamFromUrl(url: string): string {
  return url.replace(/^https?:\/\//, '').replace(/\.slack\.com\/?$/, '');
}

/**
 * `app` links use the /archives/ path and open in the desktop app;
 * `browser` links use /messages/.
 */
export function buildPermalink(team: string, channel: string, messageTs: string, style: LinkStyle = 'app'): string {
  const path = style === 'browser' ? 'messages' : 'archives';
  return `https://${team}.slack.com/${path}/${channel}/p${messageTs.replace('.', '')}`;
}

export async function resolvePermalink(
  api: SlackApi,
  channel: string,
  messageTs: string,
  options: { team?: string; style?: LinkStyle } = {}
): Promise<string> {
  let team = options.team;
  if (!team) {
    const auth = await api.authTest();
    if (!auth.ok) {
      throw new VaultError(ErrorCode.AUTH_FAILED, `Failed to get workspace: ${auth.error}`);
    }
    team = teamFromUrl(auth.url);
  }

  return buildPermalink(team, channel, messageTs, options.style);
}
