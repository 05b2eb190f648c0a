// src/core/config/workspaces.ts
import * as fs from 'fs/promises';
import { z } from 'zod';
import { ErrorCode, VaultError } from '../errors.js';

const WorkspaceCredentialsSchema = z.object({
  xoxcToken: z.string().startsWith('xoxc-', 'xoxcToken must be a browser session token (xoxc-...)'),
  xoxdToken: z.string().min(1, 'xoxdToken is required'),
  userAgent: z.string().optional(),
  team: z.string().optional(),
});

export const VaultConfigSchema = z.object({
  defaultWorkspace: z.string().optional(),
  workspaces: z.record(WorkspaceCredentialsSchema).refine(
    (workspaces) => Object.keys(workspaces).length > 0,
    'at least one workspace must be configured'
  ),
});

export type WorkspaceCredentials = z.infer<typeof WorkspaceCredentialsSchema>;
export type VaultConfig = z.infer<typeof VaultConfigSchema>;

const CONFIG_SUGGESTION =
  'Create the config file with {"workspaces": {"<name>": {"xoxcToken": "...", "xoxdToken": "..."}}}';

export async function loadConfig(configPath: string): Promise<VaultConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch {
    throw new VaultError(
      ErrorCode.CONFIG_ERROR,
      `Config not found: ${configPath}`,
      false,
      CONFIG_SUGGESTION
    );
  }

  return parseConfig(content, configPath);
}

export function parseConfig(content: string, source: string = 'config'): VaultConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new VaultError(
      ErrorCode.CONFIG_ERROR,
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = VaultConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new VaultError(ErrorCode.CONFIG_ERROR, `Invalid config in ${source}: ${issues}`, false, CONFIG_SUGGESTION);
  }

  return parsed.data;
}

/** Picks the named workspace, the configured default, or the only one there is. */
export function resolveWorkspace(
  config: VaultConfig,
  name?: string
): { name: string; credentials: WorkspaceCredentials } {
  const names = Object.keys(config.workspaces);
  const selected = name ?? config.defaultWorkspace ?? (names.length === 1 ? names[0] : undefined);

  if (!selected) {
    throw new VaultError(
      ErrorCode.CONFIG_ERROR,
      'No workspace selected',
      false,
      `Pass --workspace with one of: ${names.join(', ')}`
    );
  }

  const credentials = config.workspaces[selected];
  if (!credentials) {
    throw new VaultError(
      ErrorCode.CONFIG_ERROR,
      `Unknown workspace: ${selected}`,
      false,
      `Configured workspaces: ${names.join(', ')}`
    );
  }

  return { name: selected, credentials };
}
