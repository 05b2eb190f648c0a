#!/usr/bin/env node

import { Command } from 'commander';
import { registerApiCommand } from './commands/api.js';
import { registerDigestCommand } from './commands/digest.js';
import { registerExportCommand } from './commands/export.js';
import { registerStatusCommands } from './commands/status.js';
import { registerUsersCommand } from './commands/users.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('slack-vault')
    .description('Resumable Slack export and mention digest')
    .version('0.1.0');

  registerExportCommand(program);
  registerStatusCommands(program);
  registerDigestCommand(program);
  registerUsersCommand(program);
  registerApiCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
