// src/cli/commands/api.ts
import { Command, InvalidArgumentError } from 'commander';
import { ErrorCode, VaultError } from '../../core/errors.js';
import { resolvePermalink, type LinkStyle } from '../../core/slack/permalink.js';
import { isSlackError, type SlackApi, type SlackResponse } from '../../core/slack/types.js';
import { exitWithError, loadCliContext, type CliContext } from '../context.js';

interface ApiCommandOptions {
  workspace?: string;
  config?: string;
}

type ApiCall = (api: SlackApi, context: { team?: string }) => Promise<unknown>;

function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError('Limit must be a positive integer');
  }
  return limit;
}

function parseLinkStyle(value: string): LinkStyle {
  if (value === 'app' || value === 'browser') {
    return value;
  }
  throw new InvalidArgumentError(`Invalid style: ${value}. Use app or browser`);
}

/** Unwraps a response envelope, turning `ok: false` into an API error. */
export function unwrap<T>(method: string, response: SlackResponse<T>): T {
  if (isSlackError(response)) {
    throw new VaultError(ErrorCode.API_ERROR, `${method} failed: ${response.error}`, response.error === 'ratelimited', undefined, {
      remoteCode: response.error,
    });
  }
  return response;
}

async function runApiCall(options: ApiCommandOptions, call: ApiCall): Promise<void> {
  try {
    const context: CliContext = await loadCliContext(options.config);
    const { api, team } = context.clientFor(options.workspace);
    const result = await call(api, { team });
    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    exitWithError(error, true);
  }
}

function withWorkspace(command: Command): Command {
  return command
    .option('-w, --workspace <name>', 'Workspace from the config file')
    .option('--config <path>', 'Config file path');
}

export function registerApiCommand(program: Command): void {
  const api = program
    .command('api')
    .description('Call single Slack Web API methods and print the JSON result');

  withWorkspace(api.command('auth').description('Show the authenticated user (auth.test)'))
    .action((options: ApiCommandOptions) => runApiCall(options, async (client) => unwrap('auth.test', await client.authTest())));

  withWorkspace(api.command('channels').description('List conversations (conversations.list)'))
    .option('--types <types>', 'Conversation types', 'public_channel,private_channel,mpim,im')
    .option('--cursor <cursor>', 'Pagination cursor')
    .option('--limit <n>', 'Page size', parseLimit, 200)
    .action((options: ApiCommandOptions & { types: string; cursor?: string; limit: number }) =>
      runApiCall(options, async (client) =>
        unwrap('conversations.list', await client.channelsList(options.types, options.cursor, options.limit))
      )
    );

  withWorkspace(api.command('users').description('List users (users.list)'))
    .option('--cursor <cursor>', 'Pagination cursor')
    .option('--limit <n>', 'Page size', parseLimit, 200)
    .action((options: ApiCommandOptions & { cursor?: string; limit: number }) =>
      runApiCall(options, async (client) => unwrap('users.list', await client.usersList(options.cursor, options.limit)))
    );

  withWorkspace(api.command('history').description('Recent messages of a conversation (conversations.history)'))
    .argument('<channel>', 'Channel id')
    .option('--limit <n>', 'Number of messages', parseLimit, 50)
    .action((channel: string, options: ApiCommandOptions & { limit: number }) =>
      runApiCall(options, async (client) =>
        unwrap('conversations.history', await client.conversationsHistory(channel, options.limit))
      )
    );

  withWorkspace(api.command('replies').description('All messages of a thread (conversations.replies)'))
    .argument('<channel>', 'Channel id')
    .argument('<ts>', 'Thread root timestamp')
    .action((channel: string, ts: string, options: ApiCommandOptions) =>
      runApiCall(options, async (client) => unwrap('conversations.replies', await client.conversationsReplies(channel, ts)))
    );

  withWorkspace(api.command('search').description('Search messages (search.messages)'))
    .argument('<query>', 'Slack search query')
    .option('--page <n>', 'Result page', parseLimit, 1)
    .option('--count <n>', 'Results per page', parseLimit, 20)
    .action((query: string, options: ApiCommandOptions & { page: number; count: number }) =>
      runApiCall(options, async (client) =>
        unwrap(
          'search.messages',
          await client.searchMessagesPaginated({ query, page: options.page, count: options.count, sort: 'timestamp', sortDir: 'desc' })
        )
      )
    );

  withWorkspace(api.command('send').description('Post a message (chat.postMessage)'))
    .argument('<channel>', 'Channel id')
    .argument('<text>', 'Message text')
    .option('--thread <ts>', 'Reply in this thread')
    .action((channel: string, text: string, options: ApiCommandOptions & { thread?: string }) =>
      runApiCall(options, async (client) => unwrap('chat.postMessage', await client.postMessage(channel, text, options.thread)))
    );

  withWorkspace(api.command('permalink').description('Build a link to a message'))
    .argument('<channel>', 'Channel id')
    .argument('<ts>', 'Message timestamp')
    .option('--style <style>', 'Link style (app|browser)', parseLinkStyle, 'app')
    .action((channel: string, ts: string, options: ApiCommandOptions & { style: LinkStyle }) =>
      runApiCall(options, async (client, { team }) => ({
        permalink: await resolvePermalink(client, channel, ts, { team, style: options.style }),
      }))
    );
}
