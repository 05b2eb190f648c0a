// src/core/config/app-dirs.ts
import os from 'node:os';
import path from 'node:path';
import { APP_NAME } from './constants.js';

export function getAppDataDir(appName: string = APP_NAME): string {
  const platform = process.platform;
  if (platform === 'win32') {
    const base = process.env.LOCALAPPDATA || process.env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  const xdgDataHome = process.env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return path.join(xdgDataHome, appName);
  }

  return path.join(os.homedir(), '.local', 'share', appName);
}

export interface AppPaths {
  root: string;
  config: string;
  stateDir: string;
  usersDir: string;
}

export function getAppPaths(root: string = getAppDataDir()): AppPaths {
  return {
    root,
    config: process.env.SLACK_VAULT_CONFIG || path.join(root, 'config.json'),
    stateDir: path.join(root, 'state'),
    usersDir: path.join(root, 'users'),
  };
}
