// src/index.ts
export * from './core/types/index.js';
export * from './core/errors.js';
export { createConsoleLogger, silentLogger, type Logger } from './core/logger.js';
export { loadConfig, parseConfig, resolveWorkspace, type VaultConfig } from './core/config/workspaces.js';
export { SlackClient } from './core/slack/client.js';
export type { SlackApi, SlackResponse, SlackMessage, SearchMatch } from './core/slack/types.js';
export { buildPermalink, resolvePermalink, type LinkStyle } from './core/slack/permalink.js';
export { PacingController, backoffSeconds, type Tier } from './core/pacing/controller.js';
export { pacedCall } from './core/pacing/paced-call.js';
export { systemClock, ManualClock, type PacingClock } from './core/pacing/clock.js';
export type { ExportStateStore } from './core/state/store.js';
export { FileExportStateStore } from './core/state/file-store.js';
export { InMemoryExportStateStore } from './core/state/memory-store.js';
export { FileUserCache, type UserDirectory, type DisplayNames } from './core/users/cache.js';
export { ExportPipeline, buildExportQuery, type ExportOptions, type PipelineDeps } from './core/export/pipeline.js';
export { buildExportDocument, type ExportDocument } from './core/export/document.js';
export { DigestAggregator, type DigestWorkspace } from './core/digest/aggregator.js';
export { renderDigestMarkdown } from './core/digest/markdown.js';
export type { DigestReport, MentionRecord, ReplyRecord } from './core/digest/types.js';
