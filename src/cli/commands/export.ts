// src/cli/commands/export.ts
import * as path from 'path';
import { Command } from 'commander';
import { ExportPipeline } from '../../core/export/pipeline.js';
import { countExport } from '../../core/export/document.js';
import { createConsoleLogger } from '../../core/logger.js';
import { PacingController } from '../../core/pacing/controller.js';
import { exitWithError, loadCliContext } from '../context.js';

interface ExportCommandOptions {
  workspace?: string;
  from?: string;
  to?: string;
  out?: string;
  resume: boolean;
  force: boolean;
  json: boolean;
  verbose: boolean;
  config?: string;
}

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Export your own messages and the threads they belong to (resumable)')
    .option('-w, --workspace <name>', 'Workspace from the config file')
    .option('--from <date>', 'First day to include (YYYY-MM-DD)')
    .option('--to <date>', 'Last day to include (YYYY-MM-DD)')
    .option('--out <file>', 'Output JSON file (default: ./exports/<workspace>-<from>.json)')
    .option('--resume', 'Continue the stored export for this workspace', false)
    .option('--force', 'Discard an unfinished export and start over', false)
    .option('--json', 'Print the final job as JSON', false)
    .option('--verbose', 'Verbose output', false)
    .option('--config <path>', 'Config file path')
    .action(async (options: ExportCommandOptions) => {
      await handleExport(options);
    });
}

async function handleExport(options: ExportCommandOptions): Promise<void> {
  const logger = createConsoleLogger({ verbose: options.verbose, quiet: options.json });
  const controller = new AbortController();
  const onSignal = () => {
    logger.warn('Interrupt received, pausing after the current call...');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const context = await loadCliContext(options.config);
    const { name, api } = context.clientFor(options.workspace);

    const pipeline = new ExportPipeline({
      api,
      store: context.store,
      users: context.users,
      pacing: new PacingController({ logger }),
      logger,
    });

    const job = await pipeline.run({
      workspace: name,
      dateRange: options.from ? { from: options.from, to: options.to } : undefined,
      outputPath: options.from
        ? path.resolve(options.out ?? path.join('exports', `${name}-${options.from}.json`))
        : undefined,
      resume: options.resume,
      force: options.force,
      signal: controller.signal,
    });

    if (options.json) {
      console.log(JSON.stringify({ status: job.status, id: job.id, outputPath: job.outputPath, counts: countExport(job) }, null, 2));
      return;
    }

    const counts = countExport(job);
    console.log(`✓ Export ${job.id} ${job.status}: ${job.outputPath}`);
    console.log(`  Messages: ${counts.standaloneMessages} standalone, ${counts.threads} threads (${counts.skippedThreads} skipped)`);
    if (job.errors.length > 0) {
      console.log(`  Errors logged: ${job.errors.length}`);
    }
  } catch (error) {
    exitWithError(error, options.json);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
