// src/core/slack/messages.ts
import type { ChannelType, MessageRecord, ThreadKey } from '../types/index.js';
import type { SearchMatch, SlackBlock, SlackBlockElement, SlackMessage } from './types.js';

const PERMALINK_THREAD_TS = /thread_ts=(\d+\.\d+)/;
const SYSTEM_SUBTYPES = new Set(['channel_join', 'channel_leave', 'group_join', 'group_leave']);

export function classifyChannel(channelId: string): ChannelType {
  switch (channelId.charAt(0)) {
    case 'C':
      return 'channel';
    case 'D':
      return 'dm';
    case 'G':
      return 'group';
    default:
      return 'unknown';
  }
}

export function toThreadKey(channelId: string, threadTs: string): ThreadKey {
  return `${channelId}:${threadTs}`;
}

export function parseThreadKey(key: ThreadKey): { channelId: string; threadTs: string } {
  const separator = key.indexOf(':');
  return {
    channelId: key.slice(0, separator),
    threadTs: key.slice(separator + 1),
  };
}

/**
 * Thread timestamp of a search match: the explicit `thread_ts` field, or the
 * `thread_ts` query parameter embedded in its permalink.
 */
export function extractThreadTs(message: SlackMessage): string | undefined {
  if (message.thread_ts) {
    return message.thread_ts;
  }
  return message.permalink?.match(PERMALINK_THREAD_TS)?.[1];
}

export function threadKeyForMatch(match: SearchMatch): ThreadKey | undefined {
  const threadTs = extractThreadTs(match);
  return threadTs ? toThreadKey(match.channel.id, threadTs) : undefined;
}

/** Plain text, or the first text found in the structured blocks. */
export function extractText(message: SlackMessage): string {
  if (message.text && message.text.trim().length > 0) {
    return message.text;
  }

  for (const block of message.blocks ?? []) {
    const text = textFromBlock(block);
    if (text) {
      return text;
    }
  }

  return '';
}

function textFromBlock(block: SlackBlock | SlackBlockElement): string | undefined {
  if (typeof block.text === 'string' && block.text.length > 0) {
    return block.text;
  }
  if (typeof block.text === 'object' && block.text.text) {
    return block.text.text;
  }

  for (const element of block.elements ?? []) {
    const text = textFromBlock(element);
    if (text) {
      return text;
    }
  }

  return undefined;
}

export function isSystemNotice(message: SlackMessage): boolean {
  return message.subtype !== undefined && SYSTEM_SUBTYPES.has(message.subtype);
}

export function authorOf(message: SlackMessage): string {
  return message.user ?? message.bot_id ?? message.username ?? 'unknown';
}

export function toMessageRecord(message: SlackMessage, channelId: string, targetUserId: string): MessageRecord {
  const authorId = authorOf(message);
  const record: MessageRecord = {
    timestamp: message.ts,
    channelId,
    authorId,
    text: extractText(message),
    isAuthoredByTargetUser: authorId === targetUserId,
  };
  if (message.permalink) {
    record.permalink = message.permalink;
  }
  return record;
}

/** Slack timestamps are `seconds.micros` strings; compare them numerically. */
export function compareTs(a: string, b: string): number {
  return Number.parseFloat(a) - Number.parseFloat(b);
}

/** Cuts to `limit` code points, so a surrogate pair is never split. */
export function truncate(text: string, limit: number): string {
  const codePoints = Array.from(text);
  return codePoints.length > limit ? codePoints.slice(0, limit).join('') : text;
}
