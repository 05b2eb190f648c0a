// src/cli/commands/digest.ts
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { DIGEST_DEFAULT_HOURS } from '../../core/config/constants.js';
import { DigestAggregator, type DigestWorkspace } from '../../core/digest/aggregator.js';
import { renderDigestMarkdown } from '../../core/digest/markdown.js';
import { formatJsonOutput, writeFileAtomic } from '../../core/export/document.js';
import { createConsoleLogger } from '../../core/logger.js';
import { exitWithError, loadCliContext } from '../context.js';

type DigestFormat = 'md' | 'json';

interface DigestCommandOptions {
  workspace?: string[];
  hours: number;
  format: DigestFormat;
  out?: string;
  verbose: boolean;
  config?: string;
}

export function parseHours(value: string): number {
  const hours = Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new InvalidArgumentError('Hours must be a positive number');
  }
  return hours;
}

export function parseFormat(value: string): DigestFormat {
  if (value === 'md' || value === 'json') {
    return value;
  }
  throw new InvalidArgumentError(`Invalid format: ${value}. Use md or json`);
}

export function registerDigestCommand(program: Command): void {
  program
    .command('digest')
    .description('Summarize recent mentions and thread replies')
    .option('-w, --workspace <names...>', 'Workspaces to include (default: all configured)')
    .option('--hours <n>', 'Lookback window in hours', parseHours, DIGEST_DEFAULT_HOURS)
    .option('--format <format>', 'Output format (md|json)', parseFormat, 'md')
    .option('--out <file>', 'Write the digest to a file instead of stdout')
    .option('--verbose', 'Verbose output', false)
    .option('--config <path>', 'Config file path')
    .action(async (options: DigestCommandOptions) => {
      await handleDigest(options);
    });
}

async function handleDigest(options: DigestCommandOptions): Promise<void> {
  // stdout carries the digest unless --out is given
  const logger = createConsoleLogger({ verbose: options.verbose, quiet: !options.out });

  try {
    const context = await loadCliContext(options.config);
    const names = options.workspace ?? Object.keys(context.config.workspaces);
    const workspaces: DigestWorkspace[] = names.map((name) => {
      const client = context.clientFor(name);
      return { name: client.name, api: client.api };
    });

    const aggregator = new DigestAggregator({ users: context.users, logger });
    const report = await aggregator.run({ workspaces, hours: options.hours });
    const output = options.format === 'json' ? formatJsonOutput(report) : renderDigestMarkdown(report);

    if (options.out) {
      await writeFileAtomic(path.resolve(options.out), output);
      console.log(`✓ Digest written to ${options.out}`);
    } else {
      process.stdout.write(output);
    }

    if (report.workspaces.length === 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    exitWithError(error);
  }
}
