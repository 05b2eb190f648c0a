// src/core/digest/types.ts

export interface DigestEntry {
  workspace: string;
  channelId: string;
  channelName?: string;
  senderId: string;
  senderName: string;
  text: string;
  timestamp: string;
  threadTs: string;
  permalink?: string;
}

export interface MentionRecord extends DigestEntry {
  /** The user posted later in the same thread. */
  handled: boolean;
}

export interface ReplyRecord extends DigestEntry {
  afterLastOwnMessage: boolean;
}

export interface DigestSummary {
  totalMentions: number;
  unhandledMentions: number;
  totalReplies: number;
}

export interface DigestReport {
  period: {
    from: string;
    to: string;
    hours: number;
  };
  workspaces: string[];
  skippedWorkspaces: Array<{ workspace: string; reason: string }>;
  mentions: MentionRecord[];
  replies: ReplyRecord[];
  summary: DigestSummary;
}
