// src/core/digest/markdown.ts
import type { DigestEntry, DigestReport } from './types.js';

function formatTime(ts: string): string {
  const date = new Date(Number.parseFloat(ts) * 1000);
  return date.toISOString().replace('T', ' ').slice(0, 16);
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function where(entry: DigestEntry): string {
  const channel = entry.channelName ? `#${entry.channelName}` : entry.channelId;
  return `${entry.workspace}/${channel}`;
}

export function renderDigestMarkdown(report: DigestReport): string {
  const { summary } = report;
  const lines: string[] = [
    `# Digest (last ${report.period.hours}h)`,
    '',
    `${report.period.from} → ${report.period.to}`,
    '',
    `- Mentions: ${summary.totalMentions} (${summary.unhandledMentions} unhandled)`,
    `- Replies: ${summary.totalReplies}`,
  ];

  if (report.skippedWorkspaces.length > 0) {
    lines.push(`- Skipped: ${report.skippedWorkspaces.map((s) => `${s.workspace} (${s.reason})`).join(', ')}`);
  }

  lines.push('', '## Mentions', '');
  if (report.mentions.length === 0) {
    lines.push('_None_');
  }
  const ordered = [...report.mentions.filter((m) => !m.handled), ...report.mentions.filter((m) => m.handled)];
  for (const mention of ordered) {
    const link = mention.permalink ? ` ([link](${mention.permalink}))` : '';
    lines.push(
      `- [${mention.handled ? 'x' : ' '}] **${mention.senderName}** in ${where(mention)} at ${formatTime(mention.timestamp)}: ${oneLine(mention.text)}${link}`
    );
  }

  lines.push('', '## Replies', '');
  if (report.replies.length === 0) {
    lines.push('_None_');
  }
  for (const reply of report.replies) {
    const marker = reply.afterLastOwnMessage ? ' (new)' : '';
    lines.push(`- **${reply.senderName}** in ${where(reply)} at ${formatTime(reply.timestamp)}${marker}: ${oneLine(reply.text)}`);
  }

  return lines.join('\n') + '\n';
}
