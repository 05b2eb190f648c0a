// src/cli/commands/users.ts
import { Command } from 'commander';
import { exitWithError, loadCliContext } from '../context.js';

export function registerUsersCommand(program: Command): void {
  const users = program
    .command('users')
    .description('Manage the cached user display names');

  users
    .command('refresh')
    .description('Re-fetch every user of a workspace into the name cache')
    .option('-w, --workspace <name>', 'Workspace from the config file')
    .option('--config <path>', 'Config file path')
    .action(async (options: { workspace?: string; config?: string }) => {
      try {
        const context = await loadCliContext(options.config);
        const { name, api } = context.clientFor(options.workspace);
        const count = await context.users.refresh(name, api);
        console.log(`✓ Cached ${count} users for ${name}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
