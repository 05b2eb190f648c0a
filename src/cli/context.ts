// src/cli/context.ts
import { getAppPaths, type AppPaths } from '../core/config/app-dirs.js';
import { loadConfig, resolveWorkspace, type VaultConfig } from '../core/config/workspaces.js';
import { ErrorCode, VaultError, toErrorReport } from '../core/errors.js';
import { SlackClient } from '../core/slack/client.js';
import type { SlackApi } from '../core/slack/types.js';
import { FileExportStateStore } from '../core/state/file-store.js';
import type { ExportStateStore } from '../core/state/store.js';
import { FileUserCache, type UserDirectory } from '../core/users/cache.js';

export interface CliContext {
  paths: AppPaths;
  config: VaultConfig;
  store: ExportStateStore;
  users: UserDirectory;
  clientFor(workspace?: string): { name: string; api: SlackApi; team?: string };
}

export async function loadCliContext(configPath?: string): Promise<CliContext> {
  const paths = getAppPaths();
  const config = await loadConfig(configPath ?? paths.config);

  return {
    paths,
    config,
    store: new FileExportStateStore(paths.stateDir),
    users: new FileUserCache(paths.usersDir),
    clientFor(workspace?: string) {
      const { name, credentials } = resolveWorkspace(config, workspace);
      return {
        name,
        team: credentials.team,
        api: new SlackClient({
          xoxcToken: credentials.xoxcToken,
          xoxdToken: credentials.xoxdToken,
          userAgent: credentials.userAgent,
        }),
      };
    },
  };
}

/** Prints the failure and exits: 130 for a cancelled run, 1 otherwise. */
export function exitWithError(error: unknown, json: boolean = false): never {
  const report = toErrorReport(error);

  if (json) {
    console.log(JSON.stringify({ status: 'failed', error: report }, null, 2));
  } else {
    console.error(`Error [${report.code}]: ${report.message}`);
    if (report.suggestion) {
      console.error(`  → ${report.suggestion}`);
    }
  }

  process.exit(error instanceof VaultError && error.code === ErrorCode.CANCELLED ? 130 : 1);
}
