// src/cli/commands/status.ts
import { Command } from 'commander';
import { countExport } from '../../core/export/document.js';
import { resolveWorkspace } from '../../core/config/workspaces.js';
import type { ExportJob } from '../../core/types/index.js';
import { exitWithError, loadCliContext } from '../context.js';

export function describeJob(job: ExportJob): string[] {
  const counts = countExport(job);
  const { searchProgress, threadProgress } = job;
  const range = `${job.dateRange.from}..${job.dateRange.to ?? 'now'}`;
  const lines = [
    `Export ${job.id} (${job.workspace}, ${job.user.name}) ${range}`,
    `  Status: ${job.status}${job.pausedFrom ? ` (from ${job.pausedFrom})` : ''}`,
    `  Search: page ${searchProgress.currentPage}/${searchProgress.totalPages}, ${searchProgress.messagesFetched} of ${searchProgress.totalMatches} messages`,
    `  Threads: ${threadProgress.fetched.length}/${threadProgress.pending.length} fetched, ${counts.skippedThreads} skipped`,
    `  Output: ${job.outputPath}`,
  ];
  if (job.errors.length > 0) {
    const last = job.errors[job.errors.length - 1];
    lines.push(`  Errors: ${job.errors.length} (last: ${last.kind} ${last.code} at ${last.timestamp})`);
  }
  return lines;
}

export function registerStatusCommands(program: Command): void {
  program
    .command('status')
    .description('Show the stored export job for a workspace')
    .option('-w, --workspace <name>', 'Workspace from the config file')
    .option('--json', 'Print the job as JSON', false)
    .option('--config <path>', 'Config file path')
    .action(async (options: { workspace?: string; json: boolean; config?: string }) => {
      try {
        const context = await loadCliContext(options.config);
        const { name } = resolveWorkspace(context.config, options.workspace);
        const job = await context.store.load(name);

        if (!job) {
          console.log(options.json ? 'null' : `No export stored for ${name}`);
          return;
        }
        console.log(options.json ? JSON.stringify(job, null, 2) : describeJob(job).join('\n'));
      } catch (error) {
        exitWithError(error, options.json);
      }
    });

  program
    .command('reset')
    .description('Delete the stored export job for a workspace')
    .option('-w, --workspace <name>', 'Workspace from the config file')
    .option('--config <path>', 'Config file path')
    .action(async (options: { workspace?: string; config?: string }) => {
      try {
        const context = await loadCliContext(options.config);
        const { name } = resolveWorkspace(context.config, options.workspace);
        const release = await context.store.lock(name);
        try {
          await context.store.delete(name);
        } finally {
          await release();
        }
        console.log(`✓ Cleared export state for ${name}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
